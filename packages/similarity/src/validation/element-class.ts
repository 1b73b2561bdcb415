/**
 * Element classification for the homogeneity check.
 *
 * Integers and floats are both `number` and share the numeric class. A
 * bigint never equals a number inside a Set, so it gets its own class.
 * Every other value is classified by its tag, and objects additionally by
 * their exact prototype, so a Date and a Map never count as the same kind.
 */

export type ElementTag =
  | 'numeric'
  | 'bigint'
  | 'string'
  | 'boolean'
  | 'symbol'
  | 'undefined'
  | 'null'
  | 'function'
  | 'object';

export type ElementClass =
  | { tag: Exclude<ElementTag, 'object'> }
  | { tag: 'object'; prototype: object | null };

export function classifyElement(value: unknown): ElementClass {
  switch (typeof value) {
    case 'number':
      return { tag: 'numeric' };
    case 'bigint':
      return { tag: 'bigint' };
    case 'string':
      return { tag: 'string' };
    case 'boolean':
      return { tag: 'boolean' };
    case 'symbol':
      return { tag: 'symbol' };
    case 'undefined':
      return { tag: 'undefined' };
    case 'function':
      return { tag: 'function' };
    default:
      if (value === null) return { tag: 'null' };
      return { tag: 'object', prototype: Object.getPrototypeOf(value) };
  }
}

/**
 * Identity used to compare classes: the tag, or the prototype for objects.
 */
export function elementClassKey(elementClass: ElementClass): unknown {
  return elementClass.tag === 'object' ? elementClass.prototype : elementClass.tag;
}

/**
 * Distinct classes present in `elements`, in first-seen order.
 */
export function findElementClasses(elements: Iterable<unknown>): ElementClass[] {
  const seen = new Map<unknown, ElementClass>();
  for (const element of elements) {
    const elementClass = classifyElement(element);
    const key = elementClassKey(elementClass);
    if (!seen.has(key)) seen.set(key, elementClass);
  }
  return Array.from(seen.values());
}

export function describeElementClass(elementClass: ElementClass): string {
  if (elementClass.tag !== 'object') return elementClass.tag;
  const ctor: unknown = elementClass.prototype?.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
}

/**
 * Basic set algebra. Every operation returns a new Set and leaves its
 * inputs untouched.
 */

export function intersection<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): Set<T> {
  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
  const result = new Set<T>();
  for (const elem of smaller) {
    if (larger.has(elem)) result.add(elem);
  }
  return result;
}

export function union<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): Set<T> {
  const result = new Set(a);
  for (const elem of b) {
    result.add(elem);
  }
  return result;
}

/** Elements of `a` that are not in `b` */
export function difference<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): Set<T> {
  const result = new Set(a);
  for (const elem of b) {
    result.delete(elem);
  }
  return result;
}

export function symmetricDifference<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): Set<T> {
  const result = new Set(a);
  for (const elem of b) {
    if (result.has(elem)) {
      result.delete(elem);
    } else {
      result.add(elem);
    }
  }
  return result;
}

export function isSuperset<T>(superset: ReadonlySet<T>, subset: ReadonlySet<T>): boolean {
  if (superset.size < subset.size) return false;
  for (const elem of subset) {
    if (!superset.has(elem)) return false;
  }
  return true;
}

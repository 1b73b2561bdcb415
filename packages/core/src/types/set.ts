/**
 * Set types shared by the measures and the validation gate
 */

/** Any set of comparable elements */
export type AnySet = ReadonlySet<unknown>;

/** A measure over two sets and an optional universe */
export type SetMeasure<R = number> = (setA: AnySet, setB: AnySet, universe?: AnySet) => R;

/**
 * Validation gate applied to every set measure.
 *
 * Checks run in a fixed order: argument types, both-empty short-circuit,
 * the "one" policy, element homogeneity, then the optional universe.
 * Fatal problems throw a SimilarityError; the others are reported on the
 * diagnostic channel and the call still returns.
 */

import {
  SimilarityError,
  emitDiagnostic,
  emptySetPolicySchema,
  type AnySet,
  type SetMeasure,
} from '@setmetrics/core';
import { isSuperset, union } from '../utils/set-operations.js';
import { describeElementClass, findElementClasses } from './element-class.js';

export const VALIDATION_MESSAGES = {
  notSets: 'All arguments must be sets!',
  bothEmpty: 'Both sets are empty!',
  oneEmpty: 'At least one of the sets must be non-empty.',
  mixedTypes: 'Elements in the sets must be of the same type.',
  universeNotSuperset: 'The total range provided is not a superset of the other two sets',
} as const;

/**
 * Wraps a raw measure in the validation gate. `name` labels diagnostics and
 * errors and becomes the validated function's name; it defaults to the
 * measure's own name.
 */
export type MeasureValidator<R> = (measure: SetMeasure, name?: string) => SetMeasure<R>;

function describePolicy(policy: unknown): string {
  if (typeof policy === 'string') return `"${policy}"`;
  if ((typeof policy === 'object' && policy !== null) || typeof policy === 'function') {
    return Object.prototype.toString.call(policy);
  }
  return String(policy);
}

function isSet(value: unknown): boolean {
  return value instanceof Set;
}

/**
 * Build a validating wrapper for set measures.
 *
 * @param policy `"one"` requires at least one non-empty set; with `null`
 *   (the default) empty inputs reach the measure.
 * @throws SimilarityError INVALID_POLICY for any other policy value
 */
export function validateInput(policy: 'one'): MeasureValidator<number | undefined>;
export function validateInput(policy?: null): MeasureValidator<number>;
export function validateInput(policy: unknown = null): MeasureValidator<number | undefined> {
  const parsed = emptySetPolicySchema.safeParse(policy);
  if (!parsed.success) {
    throw new SimilarityError({
      code: 'INVALID_POLICY',
      message: `Invalid empty-set policy: ${describePolicy(policy)}`,
      suggestion: 'Pass "one" to require a non-empty set, or null for no requirement',
      context: { policy },
    });
  }
  const requireNonEmpty = parsed.data === 'one';

  return (measure, measureName) => {
    const name = measureName ?? (measure.name || 'anonymous');

    const validated = (setA: AnySet, setB: AnySet, universe?: AnySet): number | undefined => {
      if (!isSet(setA) || !isSet(setB) || (universe !== undefined && !isSet(universe))) {
        throw new SimilarityError({
          code: 'INVALID_SET_ARGUMENT',
          message: VALIDATION_MESSAGES.notSets,
          measure: name,
        });
      }

      if (setA.size === 0 && setB.size === 0) {
        emitDiagnostic({ code: 'BOTH_SETS_EMPTY', message: VALIDATION_MESSAGES.bothEmpty, measure: name });
        return 0;
      }

      if (requireNonEmpty && (setA.size === 0 || setB.size === 0)) {
        emitDiagnostic({ code: 'EMPTY_SET', message: VALIDATION_MESSAGES.oneEmpty, measure: name });
        return undefined;
      }

      const combined = union(setA, setB);
      const classes = findElementClasses(combined);
      if (classes.length > 1) {
        throw new SimilarityError({
          code: 'MIXED_ELEMENT_TYPES',
          message: VALIDATION_MESSAGES.mixedTypes,
          measure: name,
          context: { classes: classes.map(describeElementClass) },
        });
      }

      if (universe !== undefined && !isSuperset(universe, combined)) {
        emitDiagnostic({
          code: 'UNIVERSE_NOT_SUPERSET',
          message: VALIDATION_MESSAGES.universeNotSuperset,
          measure: name,
        });
        return measure(setA, setB);
      }

      return measure(setA, setB, universe);
    };

    Object.defineProperty(validated, 'name', { value: name });
    return validated;
  };
}

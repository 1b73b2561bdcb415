/**
 * Run set measures by name.
 */

import { SimilarityError, setSimilarityAlgorithmSchema, type AnySet } from '@setmetrics/core';
import type { SetSimilarityAlgorithm, SetSimilarityResult } from '../types/similarity.js';
import { intersection, union } from '../utils/set-operations.js';
import {
  cosineSimilarity,
  diceSorensenCoefficient,
  hammingCoefficient,
  jaccardSimilarity,
  overlapCoefficient,
  simpleMatchingCoefficient,
} from './set-similarity.js';

export const SET_SIMILARITY_ALGORITHMS: readonly SetSimilarityAlgorithm[] =
  setSimilarityAlgorithmSchema.options;

function score(
  setA: AnySet,
  setB: AnySet,
  algorithm: SetSimilarityAlgorithm,
  universe?: AnySet
): number | undefined {
  switch (algorithm) {
    case 'overlap':
      return overlapCoefficient(setA, setB, universe);
    case 'jaccard':
      return jaccardSimilarity(setA, setB, universe);
    case 'dice_sorensen':
      return diceSorensenCoefficient(setA, setB, universe);
    case 'cosine':
      return cosineSimilarity(setA, setB, universe);
    case 'simple_matching':
      return simpleMatchingCoefficient(setA, setB, universe);
    case 'hamming':
      return hammingCoefficient(setA, setB, universe);
  }
}

/**
 * Compare two sets with the named algorithm
 *
 * @returns The result, or undefined when the measure requires a non-empty
 *   set and one of them is empty
 * @throws SimilarityError UNKNOWN_ALGORITHM for an unsupported name
 */
export function compareSets(
  setA: AnySet,
  setB: AnySet,
  algorithm: SetSimilarityAlgorithm,
  universe?: AnySet
): SetSimilarityResult | undefined {
  const parsed = setSimilarityAlgorithmSchema.safeParse(algorithm);
  if (!parsed.success) {
    throw new SimilarityError({
      code: 'UNKNOWN_ALGORITHM',
      message: `Unknown algorithm: ${String(algorithm)}`,
      suggestion: `Use one of: ${SET_SIMILARITY_ALGORITHMS.join(', ')}`,
    });
  }

  const result = score(setA, setB, parsed.data, universe);
  if (result === undefined) {
    return undefined;
  }

  return {
    score: result,
    algorithm: parsed.data,
    details: `Intersection: ${intersection(setA, setB).size}, Union: ${union(setA, setB).size}`,
  };
}

/**
 * Compare two sets with every algorithm, skipping those that return no
 * result for the input.
 */
export function compareSetsWithAll(
  setA: AnySet,
  setB: AnySet,
  universe?: AnySet
): SetSimilarityResult[] {
  const results: SetSimilarityResult[] = [];
  for (const algorithm of SET_SIMILARITY_ALGORITHMS) {
    const result = compareSets(setA, setB, algorithm, universe);
    if (result) {
      results.push(result);
    }
  }
  return results;
}

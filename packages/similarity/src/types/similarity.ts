/**
 * Set Similarity Types
 */

import type { SetSimilarityAlgorithmInput } from '@setmetrics/core';

/** Available set similarity algorithms */
export type SetSimilarityAlgorithm = SetSimilarityAlgorithmInput;

/** Result of a set comparison */
export interface SetSimilarityResult {
  /** Similarity score between 0 (disjoint) and 1 (identical) */
  score: number;

  /** Which algorithm produced this result */
  algorithm: SetSimilarityAlgorithm;

  /** Cardinalities the score was computed from */
  details?: string;
}

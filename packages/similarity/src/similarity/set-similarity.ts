/**
 * Set Similarity Functions
 *
 * Coefficients over set cardinalities. Every exported measure except
 * hammingDistance runs behind the validation gate, so the bodies below can
 * assume matching element classes and a non-zero denominator.
 */

import type { AnySet } from '@setmetrics/core';
import { difference, intersection, symmetricDifference, union } from '../utils/set-operations.js';
import { validateInput } from '../validation/validate-input.js';

/**
 * Overlap (Szymkiewicz-Simpson) coefficient
 *
 * |A ∩ B| / min(|A|, |B|)
 */
export const overlapCoefficient = validateInput('one')(function overlap(setA, setB) {
  return intersection(setA, setB).size / Math.min(setA.size, setB.size);
}, 'overlapCoefficient');

/**
 * Jaccard similarity
 *
 * |A ∩ B| / |A ∪ B|
 */
export const jaccardSimilarity = validateInput()(function jaccard(setA, setB) {
  return intersection(setA, setB).size / union(setA, setB).size;
}, 'jaccardSimilarity');

/**
 * Dice-Sørensen coefficient
 *
 * 2 * |A ∩ B| / (|A| + |B|)
 */
export const diceSorensenCoefficient = validateInput()(function diceSorensen(setA, setB) {
  return (2 * intersection(setA, setB).size) / (setA.size + setB.size);
}, 'diceSorensenCoefficient');

/**
 * Cosine similarity of the 0/1 indicator vectors of both sets, indexed by
 * their union.
 */
export const cosineSimilarity = validateInput('one')(function cosine(setA, setB) {
  const index = Array.from(union(setA, setB));
  const vectorA = index.map((elem) => (setA.has(elem) ? 1 : 0));
  const vectorB = index.map((elem) => (setB.has(elem) ? 1 : 0));

  let dotProduct = 0;
  let sumA = 0;
  let sumB = 0;
  for (let i = 0; i < index.length; i++) {
    const a = vectorA[i] ?? 0;
    const b = vectorB[i] ?? 0;
    dotProduct += a * b;
    sumA += a * a;
    sumB += b * b;
  }

  if (dotProduct === 0) {
    return 0;
  }
  return dotProduct / (Math.sqrt(sumA) * Math.sqrt(sumB));
}, 'cosineSimilarity');

/**
 * Simple matching coefficient
 *
 * (p + s) / (p + q + r + s) over the universe U (A ∪ B unless given):
 * p = |A ∩ B|, q = |A − B|, r = |B − A|, s = |(U − A) ∩ (U − B)|.
 * Without an explicit universe s is always 0.
 */
export const simpleMatchingCoefficient = validateInput('one')(function simpleMatching(setA, setB, universe) {
  const total = universe ?? union(setA, setB);
  const p = intersection(setA, setB).size;
  const q = difference(setA, setB).size;
  const r = difference(setB, setA).size;
  const s = intersection(difference(total, setA), difference(total, setB)).size;
  return (p + s) / (p + q + r + s);
}, 'simpleMatchingCoefficient');

/**
 * Hamming distance: number of elements in exactly one of the sets.
 *
 * Not validated; accepts sets of any elements.
 */
export function hammingDistance(setA: AnySet, setB: AnySet): number {
  return symmetricDifference(setA, setB).size;
}

/**
 * Hamming distance normalized by the size of the universe (A ∪ B unless
 * given).
 */
export const hammingCoefficient = validateInput()(function hamming(setA, setB, universe) {
  const total = universe ?? union(setA, setB);
  return hammingDistance(setA, setB) / total.size;
}, 'hammingCoefficient');

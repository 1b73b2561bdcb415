/**
 * Build comparable sets from text
 */

import { SimilarityError, ngramSizeSchema } from '@setmetrics/core';

/**
 * Split text on whitespace into a set of words
 */
export function wordSet(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter((word) => word.length > 0));
}

/**
 * Extract character n-grams from a string
 *
 * A string shorter than `n` yields itself; empty text yields the empty set.
 */
export function ngramSet(text: string, n = 2): Set<string> {
  if (!ngramSizeSchema.safeParse(n).success) {
    throw new SimilarityError({
      code: 'INVALID_ARGUMENT',
      message: `N-gram size must be a positive integer, got ${n}`,
      context: { n },
    });
  }

  const ngrams = new Set<string>();
  if (text.length === 0) return ngrams;

  if (text.length < n) {
    ngrams.add(text);
    return ngrams;
  }

  for (let i = 0; i <= text.length - n; i++) {
    ngrams.add(text.substring(i, i + n));
  }

  return ngrams;
}

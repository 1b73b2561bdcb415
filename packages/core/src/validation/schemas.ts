/**
 * Zod schemas for validating measure configuration
 */

import { z } from 'zod';

/** Empty-set policy accepted by the validation gate */
export const emptySetPolicySchema = z.literal('one').nullable();

/** Set similarity algorithm names */
export const setSimilarityAlgorithmSchema = z.enum([
  'overlap',
  'jaccard',
  'dice_sorensen',
  'cosine',
  'simple_matching',
  'hamming',
]);

/** Character n-gram size */
export const ngramSizeSchema = z.number().int().min(1);

export type EmptySetPolicyInput = z.infer<typeof emptySetPolicySchema>;
export type SetSimilarityAlgorithmInput = z.infer<typeof setSimilarityAlgorithmSchema>;

export type { SetSimilarityAlgorithm, SetSimilarityResult } from './similarity.js';

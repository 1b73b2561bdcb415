export { SimilarityError } from './similarity-error.js';
export type { SimilarityErrorCode, SimilarityErrorDetails } from './similarity-error.js';

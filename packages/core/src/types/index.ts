export type { AnySet, SetMeasure } from './set.js';

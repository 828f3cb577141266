export { analyzeBenford, benfordProbability, leadingDigit, BENFORD_DIGITS } from './analyze.js';
export type { BenfordOptions } from './analyze.js';

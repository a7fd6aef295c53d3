export {
  loadHiGHS,
  resetHiGHS,
  parseHighsStatus,
  buildHighsOptions,
  HighsSolver,
} from './highs.js';
export { generateLP } from './lp-format.js';

export type { HighsWasm } from './highs.js';
export type { LPFormatResult } from './lp-format.js';

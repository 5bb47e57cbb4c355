// formatting
export { formatFormula } from './formatting/formatFormula.ts';
export { formatTable } from './formatting/formatTable.ts';
export type { ColumnAlignment } from './formatting/formatTable.ts';

// timing
export { timeIt } from './timing/timeIt.ts';
export type { Timing } from './timing/timeIt.ts';

export { loadHiGHS, solveLP, resetHiGHS, parseHighsStatus, buildHighsOptions } from './highs.js';
export { generateLP, rowKind, rowName, formatValue } from './lp-format.js';
export { SolverSettingsSchema, resolveSettings } from './settings.js';
export { solve } from './solve.js';

export type { HighsWasm, LPSolveResult } from './highs.js';
export type { LPFormatResult, RowKind } from './lp-format.js';
export type { SolverSettings, SolveStatus } from './settings.js';
export type { Solution } from './solve.js';

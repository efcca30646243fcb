export type { Resolution } from './symbol-env.js';
export { SymbolEnvironment } from './symbol-env.js';

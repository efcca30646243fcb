export { ESCAPE_PREFIX, sanitizeComponent, canonicalName, isValidFamilyName } from './naming.js';
export type {
  VariableType,
  Bounds,
  VariableFamily,
  VariableInstance,
  IndexPattern,
} from './variable-registry.js';
export { VariableRegistry, validateBounds } from './variable-registry.js';

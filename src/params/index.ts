export type { ParamScalar, ParamMap, ParamValue } from './value.js';
export {
  isParamList,
  isParamMap,
  isBindingValue,
  renderIndex,
  numericIndex,
  describeValue,
  lookupKey,
  domainValues,
  freezeParams,
} from './value.js';

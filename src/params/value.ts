import { DslError, type BindingValue } from '../error.js';

/**
 * Model parameter data: scalars, lists and string-keyed maps, nested to
 * any depth.
 */
export type ParamScalar = number | string | boolean | null;

export interface ParamMap {
  readonly [key: string]: ParamValue;
}

export type ParamValue = ParamScalar | readonly ParamValue[] | ParamMap;

export function isParamList(value: ParamValue): value is readonly ParamValue[] {
  return Array.isArray(value);
}

export function isParamMap(value: ParamValue): value is ParamMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Check that a value can be bound to a generator symbol or used as an index. */
export function isBindingValue(value: ParamValue): value is BindingValue {
  return typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean';
}

/**
 * Render an index component. Numbers use their decimal literal form, so
 * `1` and `'1'` render (and therefore index) identically.
 */
export function renderIndex(value: BindingValue): string {
  return typeof value === 'string' ? value : String(value);
}

/**
 * Numeric reading of a constant. Strings count when they are the
 * rendered form of a number, which is how map keys bind (`'1'` is `1`,
 * `'01'` and `'1e3'` are not).
 */
export function numericIndex(value: ParamValue): number | null {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value !== '') {
    const n = Number(value);
    return Number.isFinite(n) && String(n) === value ? n : null;
  }
  return null;
}

/** Short description of a value for error messages */
export function describeValue(value: ParamValue): string {
  if (isParamList(value)) {
    return `list of ${value.length}`;
  }
  if (isParamMap(value)) {
    return `map with keys [${Object.keys(value).join(', ')}]`;
  }
  return JSON.stringify(value);
}

/**
 * Look up `key` in a list or map parameter.
 *
 * @throws DslError `IndexOutOfBounds` for list positions past the end,
 * `MissingKey` for absent map keys, `UnsupportedOperation` for scalars.
 */
export function lookupKey(container: ParamValue, key: BindingValue): ParamValue {
  if (isParamList(container)) {
    // '2' and 2 are the same index
    const position = typeof key === 'string' && /^\d+$/.test(key) ? Number(key) : key;
    if (typeof position !== 'number' || !Number.isInteger(position)) {
      throw new DslError('UnsupportedOperation', `list index must be an integer, got ${JSON.stringify(key)}`);
    }
    if (position < 0 || position >= container.length) {
      throw new DslError(
        'IndexOutOfBounds',
        `index ${position} is out of bounds for a list of length ${container.length}`
      );
    }
    const item = container[position];
    return item === undefined ? null : item;
  }
  if (isParamMap(container)) {
    const name = renderIndex(key);
    if (!Object.prototype.hasOwnProperty.call(container, name)) {
      throw new DslError('MissingKey', `key ${JSON.stringify(name)} is not present in ${describeValue(container)}`);
    }
    const item = container[name];
    return item === undefined ? null : item;
  }
  throw new DslError('UnsupportedOperation', `cannot look up ${JSON.stringify(key)} in ${describeValue(container)}`);
}

/**
 * Enumerate a parameter used as a generator domain: a list yields its
 * items, a map its keys.
 */
export function domainValues(value: ParamValue): BindingValue[] {
  if (isParamMap(value)) {
    return Object.keys(value);
  }
  if (isParamList(value)) {
    return value.map((item, i) => {
      if (!isBindingValue(item)) {
        throw new DslError(
          'UnsupportedOperation',
          `domain item ${i} is ${describeValue(item)}; domains must contain numbers, strings or booleans`
        );
      }
      return item;
    });
  }
  throw new DslError('UnsupportedOperation', `${describeValue(value)} cannot be used as a domain`);
}

/** Freeze a parameter tree so expressions can only read it. */
export function freezeParams<T extends ParamValue>(value: T): T {
  if (isParamList(value)) {
    value.forEach((item) => freezeParams(item));
    Object.freeze(value);
  } else if (isParamMap(value)) {
    Object.values(value).forEach((item) => freezeParams(item));
    Object.freeze(value);
  }
  return value;
}

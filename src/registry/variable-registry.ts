import { DslError, type BindingValue } from '../error.js';
import { renderIndex } from '../params/index.js';
import type { VariableId } from '../poly/index.js';
import { canonicalName, isValidFamilyName } from './naming.js';

export type VariableType = 'continuous' | 'integer' | 'binary';

/**
 * Numeric bounds. A missing bound, or an infinite one, means unbounded
 * on that side.
 */
export interface Bounds {
  readonly min?: number;
  readonly max?: number;
}

/**
 * A named group of decision variables sharing a type.
 */
export interface VariableFamily {
  readonly name: string;
  readonly type: VariableType;
  readonly description?: string;
  /** Index arity, fixed by the first instance (undefined before that) */
  readonly arity?: number;
  /** Number of declarations that introduced instances of this family */
  readonly declarations: number;
  readonly size: number;
}

/**
 * One concrete decision variable.
 */
export interface VariableInstance {
  readonly id: VariableId;
  readonly family: string;
  readonly index: readonly BindingValue[];
  readonly type: VariableType;
  readonly min: number;
  readonly max: number;
  readonly description?: string;
  /** Declaration (1-based, per family) that created this instance */
  readonly declaration: number;
}

/**
 * Index pattern for wildcard matching: `null` marks a wildcard position.
 */
export type IndexPattern = readonly (BindingValue | null)[];

interface FamilyRecord {
  name: string;
  type: VariableType;
  description?: string;
  arity?: number;
  declarations: number;
  ids: VariableId[];
}

/**
 * Validate bounds against a variable type.
 *
 * @throws DslError `InvalidBounds` when a binary variable has bounds, an
 * integer variable has a finite non-integral bound, or min > max.
 */
export function validateBounds(type: VariableType, bounds: Bounds, subject = 'variable'): void {
  const { min, max } = bounds;
  if (type === 'binary') {
    if (min !== undefined || max !== undefined) {
      throw new DslError('InvalidBounds', `binary ${subject} takes no bounds (they are implicitly 0 and 1)`, {
        symbol: subject,
      });
    }
    return;
  }
  for (const [side, value] of [
    ['min', min],
    ['max', max],
  ] as const) {
    if (value === undefined) continue;
    if (Number.isNaN(value)) {
      throw new DslError('InvalidBounds', `${side} bound of ${subject} is NaN`, { symbol: subject });
    }
    if (type === 'integer' && Number.isFinite(value) && !Number.isInteger(value)) {
      throw new DslError('InvalidBounds', `integer ${subject} has non-integral ${side} bound ${value}`, {
        symbol: subject,
      });
    }
  }
  if (min !== undefined && max !== undefined && min > max) {
    throw new DslError('InvalidBounds', `${subject} has min bound ${min} above max bound ${max}`, {
      symbol: subject,
    });
  }
}

function resolvedBounds(type: VariableType, bounds: Bounds): { min: number; max: number } {
  if (type === 'binary') {
    return { min: 0, max: 1 };
  }
  return { min: bounds.min ?? -Infinity, max: bounds.max ?? Infinity };
}

function matchesPattern(index: readonly BindingValue[], pattern: IndexPattern): boolean {
  return pattern.every((p, i) => {
    const value = index[i];
    return p === null || (value !== undefined && renderIndex(value) === renderIndex(p));
  });
}

/**
 * Owns variable families and their instances.
 *
 * Instances are keyed by canonical name, so instantiation is idempotent:
 * the same `(family, index)` always yields the same instance object.
 */
export class VariableRegistry {
  private readonly _families: Map<string, FamilyRecord>;
  private readonly _instances: Map<VariableId, VariableInstance>;

  constructor() {
    this._families = new Map();
    this._instances = new Map();
  }

  /**
   * Copy of this registry. Instances are immutable and shared.
   */
  clone(): VariableRegistry {
    const copy = new VariableRegistry();
    for (const [name, record] of this._families) {
      copy._families.set(name, { ...record, ids: [...record.ids] });
    }
    for (const [id, instance] of this._instances) {
      copy._instances.set(id, instance);
    }
    return copy;
  }

  /**
   * Declare a family, or open a new declaration of an existing one.
   *
   * @throws DslError `InvalidName` for non-identifier names,
   * `DuplicateFamily` when redeclared with a different type.
   */
  declareFamily(name: string, type: VariableType, description?: string): VariableFamily {
    if (!isValidFamilyName(name)) {
      throw new DslError('InvalidName', `variable family name ${JSON.stringify(name)} is not an identifier`, {
        symbol: name,
      });
    }
    const existing = this._families.get(name);
    if (existing) {
      if (existing.type !== type) {
        throw new DslError(
          'DuplicateFamily',
          `variable family ${name} is already declared as ${existing.type}, cannot redeclare as ${type}`,
          { symbol: name }
        );
      }
      existing.declarations += 1;
      return this.view(existing);
    }
    const record: FamilyRecord = { name, type, description, declarations: 1, ids: [] };
    this._families.set(name, record);
    return this.view(record);
  }

  hasFamily(name: string): boolean {
    return this._families.has(name);
  }

  getFamily(name: string): VariableFamily | undefined {
    const record = this._families.get(name);
    return record ? this.view(record) : undefined;
  }

  families(): VariableFamily[] {
    return [...this._families.values()].map((record) => this.view(record));
  }

  /**
   * Get or create the instance of `family` at `index`. A new instance is
   * tagged with the family's current declaration; bounds are fixed by the
   * first instantiation.
   */
  instantiate(
    family: string,
    index: readonly BindingValue[],
    bounds: Bounds = {},
    description?: string
  ): VariableInstance {
    const record = this.record(family);
    this.checkArity(record, index);

    const id = canonicalName(family, index);
    const existing = this._instances.get(id);
    if (existing) {
      return existing;
    }

    validateBounds(record.type, bounds, id);
    const { min, max } = resolvedBounds(record.type, bounds);
    const instance: VariableInstance = {
      id,
      family,
      index: [...index],
      type: record.type,
      min,
      max,
      description: description ?? record.description,
      declaration: record.declarations,
    };
    record.arity ??= index.length;
    record.ids.push(id);
    this._instances.set(id, instance);
    return instance;
  }

  /**
   * Canonical name of an index tuple of a declared family.
   */
  canonicalName(family: string, index: readonly BindingValue[]): VariableId {
    this.record(family);
    return canonicalName(family, index);
  }

  /**
   * Find the declared instance of `family` at `index`.
   *
   * @throws DslError `UndefinedVariable` for unknown families or tuples
   * never declared, `ArityMismatch` for tuples of the wrong length.
   */
  lookup(family: string, index: readonly BindingValue[]): VariableInstance {
    const record = this.record(family);
    this.checkArity(record, index);
    const id = canonicalName(family, index);
    const instance = this._instances.get(id);
    if (!instance) {
      throw new DslError('UndefinedVariable', `variable ${id} was never declared`, { symbol: family });
    }
    return instance;
  }

  get(id: VariableId): VariableInstance | undefined {
    return this._instances.get(id);
  }

  /** All instances in declaration order */
  instances(): VariableInstance[] {
    return [...this._instances.values()];
  }

  /** Instances of one family in declaration order */
  instancesOf(family: string): VariableInstance[] {
    return this.record(family).ids.flatMap((id) => {
      const instance = this._instances.get(id);
      return instance ? [instance] : [];
    });
  }

  /**
   * Instances of `family` matching `pattern` (wildcard positions are
   * `null`), in declaration order.
   *
   * @throws DslError `UnresolvedWildcardDomain` when the matches come from
   * several declarations whose wildcard values differ.
   */
  match(family: string, pattern: IndexPattern): VariableInstance[] {
    const record = this.record(family);
    this.checkArity(record, pattern);
    const matches = this.instancesOf(family).filter((inst) => matchesPattern(inst.index, pattern));
    const wildcardPositions = pattern.flatMap((p, i) => (p === null ? [i] : []));
    this.checkSingleDomain(family, matches, wildcardPositions);
    return matches;
  }

  /**
   * Values taken at `position` by the instances matching `pattern`, in
   * first-appearance order. This is the implied domain of a wildcard.
   */
  wildcardValues(family: string, pattern: IndexPattern, position: number): BindingValue[] {
    const matches = this.match(family, pattern);
    const seen = new Map<string, BindingValue>();
    for (const inst of matches) {
      const value = inst.index[position];
      if (value !== undefined && !seen.has(renderIndex(value))) {
        seen.set(renderIndex(value), value);
      }
    }
    return [...seen.values()];
  }

  private checkSingleDomain(family: string, matches: readonly VariableInstance[], positions: readonly number[]): void {
    const byDeclaration = new Map<number, Set<string>>();
    for (const inst of matches) {
      const key = positions.map((p) => renderIndex(inst.index[p] ?? '')).join('\u0000');
      let keys = byDeclaration.get(inst.declaration);
      if (!keys) {
        keys = new Set();
        byDeclaration.set(inst.declaration, keys);
      }
      keys.add(key);
    }
    const [first, ...rest] = [...byDeclaration.values()];
    if (!first) return;
    for (const keys of rest) {
      if (keys.size !== first.size || [...keys].some((k) => !first.has(k))) {
        throw new DslError(
          'UnresolvedWildcardDomain',
          `wildcard over ${family} is ambiguous: its declarations cover different index values`,
          { symbol: family }
        );
      }
    }
  }

  private record(family: string): FamilyRecord {
    const record = this._families.get(family);
    if (!record) {
      throw new DslError('UndefinedVariable', `variable family ${family} is not declared`, { symbol: family });
    }
    return record;
  }

  private checkArity(record: FamilyRecord, index: readonly unknown[]): void {
    if (record.arity !== undefined && record.arity !== index.length) {
      throw new DslError(
        'ArityMismatch',
        `variable family ${record.name} takes ${record.arity} index value(s), got ${index.length}`,
        { symbol: record.name }
      );
    }
  }

  private view(record: FamilyRecord): VariableFamily {
    return {
      name: record.name,
      type: record.type,
      description: record.description,
      arity: record.arity,
      declarations: record.declarations,
      size: record.ids.length,
    };
  }
}

import { z } from 'zod';
import type { Comparison, ComparisonOp, GeneratorClause, Node, NodeInput } from './ast/index.js';
import { formatClause, formatComparison, formatNode, toNode } from './ast/index.js';
import { compileComparison, compileNumber, compileObjective, evaluateDomain, expand } from './compiler/index.js';
import { SymbolEnvironment } from './env/index.js';
import { DslError, type BindingValue } from './error.js';
import { getLogger } from './logger.js';
import type { ParamMap } from './params/index.js';
import { freezeParams, renderIndex } from './params/index.js';
import type { Polynomial, VariableId } from './poly/index.js';
import { formatPolynomial, polyConstantTerm, polyLinearCoefficients } from './poly/index.js';
import type { Bounds, VariableFamily, VariableInstance, VariableType } from './registry/index.js';
import { VariableRegistry } from './registry/index.js';
import { solve, type Solution, type SolverSettings } from './solver/index.js';

/**
 * Optimization direction.
 */
export type Direction = 'minimize' | 'maximize';

export const DirectionSchema = z.enum(['minimize', 'maximize']);

const VariableTypeSchema = z.enum(['continuous', 'integer', 'binary']);

/**
 * Constraint description: a string with `{symbol}` placeholders, or a
 * function of the generator bindings.
 */
export type Description = string | ((bindings: Readonly<Record<string, BindingValue>>) => string);

/**
 * A compiled constraint `lhs op rhs`. `lhs` has no constant term.
 */
export interface Constraint {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly lhs: Polynomial;
  readonly op: ComparisonOp;
  readonly rhs: number;
  /** Generator values the constraint was compiled under */
  readonly bindings: Readonly<Record<string, BindingValue>>;
}

export interface Objective {
  readonly polynomial: Polynomial;
  readonly direction: Direction;
}

export interface ProblemOptions {
  name: string;
  description?: string;
  /** Default direction for `objective()` calls that give none */
  direction?: Direction;
  params?: ParamMap;
}

export interface VariableOptions {
  /** Lower bound, evaluated per generator binding. Omitted means unbounded. */
  min?: NodeInput;
  /** Upper bound, evaluated per generator binding. Omitted means unbounded. */
  max?: NodeInput;
  /** Family description; `{symbol}` placeholders are filled per instance */
  description?: string;
}

// ==================== Solver boundary ====================

export interface SnapshotVariable {
  readonly id: VariableId;
  readonly type: VariableType;
  /** `-Infinity` when unbounded below */
  readonly min: number;
  /** `Infinity` when unbounded above */
  readonly max: number;
}

export interface SnapshotConstraint {
  readonly id: string;
  readonly name: string;
  readonly coefficients: ReadonlyMap<VariableId, number>;
  readonly constant: number;
  readonly op: ComparisonOp;
  readonly rhs: number;
}

export interface SnapshotObjective {
  readonly coefficients: ReadonlyMap<VariableId, number>;
  readonly constant: number;
  readonly direction: Direction;
}

/**
 * What the solver adapter consumes: linear rows over canonical variable
 * ids.
 */
export interface ProblemSnapshot {
  readonly name: string;
  readonly variables: readonly SnapshotVariable[];
  readonly constraints: readonly SnapshotConstraint[];
  readonly objective: SnapshotObjective | null;
}

// ==================== Helpers ====================

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `{symbol}` placeholders with binding values. Unknown
 * placeholders are left as written.
 */
export function interpolate(template: string, bindings: Readonly<Record<string, BindingValue>>): string {
  return template.replace(PLACEHOLDER, (match: string, name: string) => {
    const value = bindings[name];
    return value === undefined ? match : renderIndex(value);
  });
}

function describe(description: Description, bindings: Readonly<Record<string, BindingValue>>): string {
  return typeof description === 'string' ? interpolate(description, bindings) : description(bindings);
}

function autoName(values: readonly BindingValue[]): string {
  return ['constraint', ...values.map(renderIndex)].join('_');
}

function constraintId(counter: number): string {
  return `c${String(counter).padStart(8, '0')}`;
}

function parseDirection(direction: string | undefined, declaration: string): Direction {
  const parsed = DirectionSchema.safeParse(direction);
  if (!parsed.success) {
    throw new DslError(
      'InvalidDirection',
      direction === undefined
        ? 'no objective direction given and the problem has no default'
        : `objective direction must be minimize or maximize, got ${JSON.stringify(direction)}`,
      { context: { declaration } }
    );
  }
  return parsed.data;
}

function withDeclaration<T>(declaration: string, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof DslError) throw e.withContext({ declaration });
    throw e;
  }
}

function clauseLabel(clauses: readonly GeneratorClause[]): string {
  return clauses.length > 0 ? ` [${clauses.map(formatClause).join(', ')}]` : '';
}

interface ProblemState {
  readonly name: string;
  readonly description?: string;
  readonly direction?: Direction;
  readonly params: ParamMap;
  readonly registry: VariableRegistry;
  readonly constraints: readonly Constraint[];
  readonly constraintCounter: number;
  readonly objective: Objective | null;
}

/**
 * An optimization model: variable families, constraints and an objective
 * over fixed model parameters.
 *
 * Problems are immutable. Every declaration returns a new problem, and a
 * declaration that fails throws without changing the receiver.
 *
 * @example
 * ```ts
 * const problem = Problem.create({
 *   name: 'transport',
 *   direction: 'minimize',
 *   params: { supply: { S1: 20, S2: 25 }, customers: ['C1', 'C2'] },
 * })
 *   .variables('ship', [gen('s', 'supply'), gen('c', 'customers')], 'continuous', { min: 0 })
 *   .constraints([gen('s', 'supply')], le(sum(v('ship', sym('s'), _)), at('supply', sym('s'))), 'supply_{s}')
 *   .objective(sum(v('ship', _, _)));
 *
 * const solution = await problem.solve();
 * ```
 */
export class Problem {
  private readonly _state: ProblemState;

  private constructor(state: ProblemState) {
    this._state = state;
  }

  /**
   * Create an empty problem. Parameters are frozen and read-only from here
   * on.
   */
  static create(options: ProblemOptions): Problem {
    const direction =
      options.direction === undefined ? undefined : parseDirection(options.direction, `problem ${options.name}`);
    return new Problem({
      name: options.name,
      description: options.description,
      direction,
      params: freezeParams(options.params ?? {}),
      registry: new VariableRegistry(),
      constraints: [],
      constraintCounter: 0,
      objective: null,
    });
  }

  private with(changes: Partial<ProblemState>): Problem {
    return new Problem({ ...this._state, ...changes });
  }

  private environment(declaration: string, registry = this._state.registry): SymbolEnvironment {
    return SymbolEnvironment.root(this._state.params, registry, declaration);
  }

  // ==================== Declarations ====================

  /**
   * Declare a variable family with one instance per generator binding.
   * The instance index is the tuple of binding values in clause order.
   *
   * @example
   * ```ts
   * problem.variables('x', [gen('i', range(1, 3))], 'integer', { min: 0, max: at('cap', sym('i')) });
   * ```
   */
  variables(
    family: string,
    clauses: readonly GeneratorClause[],
    type: VariableType,
    options: VariableOptions = {}
  ): Problem {
    const declaration = `variables ${family}${clauseLabel(clauses)}`;
    const registry = this._state.registry.clone();

    const count = withDeclaration(declaration, () => {
      if (!VariableTypeSchema.safeParse(type).success) {
        throw new DslError('UnsupportedOperation', `unknown variable type ${JSON.stringify(type)}`, {
          symbol: family,
        });
      }
      if (type === 'binary' && (options.min !== undefined || options.max !== undefined)) {
        throw new DslError('InvalidBounds', `binary ${family} takes no bounds (they are implicitly 0 and 1)`, {
          symbol: family,
        });
      }
      registry.declareFamily(family, type, options.description);

      const min = options.min === undefined ? undefined : toNode(options.min);
      const max = options.max === undefined ? undefined : toNode(options.max);
      const env = this.environment(declaration, registry);

      const instances = expand(clauses, env, evaluateDomain, (point) => {
        const bounds: Bounds = {
          min: min === undefined ? undefined : compileNumber(min, point.env),
          max: max === undefined ? undefined : compileNumber(max, point.env),
        };
        const bindings = point.env.bindings();
        const description =
          options.description === undefined ? undefined : interpolate(options.description, bindings);
        try {
          return registry.instantiate(family, [...point.bindings.values()], bounds, description);
        } catch (e) {
          if (e instanceof DslError) throw e.withContext(point.env.context());
          throw e;
        }
      });
      return instances.length;
    });

    getLogger().debug({ family, type, instances: count }, 'declared variables');
    return this.with({ registry });
  }

  /**
   * Declare a scalar variable.
   */
  variable(family: string, type: VariableType, options: VariableOptions = {}): Problem {
    return this.variables(family, [], type, options);
  }

  /**
   * Add one constraint per generator binding.
   *
   * Without a description, constraints are named from their binding
   * values: `constraint_S1_C2`.
   *
   * @example
   * ```ts
   * problem.constraints(
   *   [gen('s', 'suppliers')],
   *   le(sum(v('ship', sym('s'), _)), at('supply', sym('s'))),
   *   'supply_{s}'
   * );
   * ```
   */
  constraints(clauses: readonly GeneratorClause[], comparison: Comparison, description?: Description): Problem {
    const declaration = `constraints${clauseLabel(clauses)} ${formatComparison(comparison)}`;
    let counter = this._state.constraintCounter;

    const added = withDeclaration(declaration, () =>
      expand(clauses, this.environment(declaration), evaluateDomain, (point): Constraint => {
        const { lhs, op, rhs } = compileComparison(comparison, point.env);
        const bindings = point.env.bindings();
        const text = description === undefined ? undefined : describe(description, bindings);
        const id = constraintId(counter);
        counter += 1;
        return {
          id,
          name: text ?? autoName([...point.bindings.values()]),
          description: text,
          lhs,
          op,
          rhs,
          bindings,
        };
      })
    );

    getLogger().debug({ declaration, constraints: added.length }, 'declared constraints');
    return this.with({
      constraints: [...this._state.constraints, ...added],
      constraintCounter: counter,
    });
  }

  /**
   * Add a single constraint.
   */
  constraint(comparison: Comparison, description?: Description): Problem {
    return this.constraints([], comparison, description);
  }

  /**
   * Set the objective, replacing any previous one. The direction defaults
   * to the one the problem was created with.
   *
   * @throws DslError `InvalidDirection` when the direction is neither
   * `minimize` nor `maximize`.
   */
  objective(expression: NodeInput, direction?: string): Problem {
    const node: Node = toNode(expression);
    const declaration = `objective ${formatNode(node)}`;
    const resolved = parseDirection(direction ?? this._state.direction, declaration);
    const polynomial = withDeclaration(declaration, () => compileObjective(node, this.environment(declaration)));

    if (this._state.objective) {
      getLogger().debug({ previous: formatPolynomial(this._state.objective.polynomial) }, 'replacing objective');
    }
    getLogger().debug({ direction: resolved, terms: polynomial.terms.size }, 'declared objective');
    return this.with({ objective: { polynomial, direction: resolved } });
  }

  /**
   * Apply a sequence of declarations to this problem.
   *
   * @example
   * ```ts
   * const extended = problem.modify((p) => p.variable('slack', 'continuous', { min: 0 }));
   * ```
   */
  modify(fn: (problem: Problem) => Problem): Problem {
    return fn(this);
  }

  // ==================== Read side ====================

  get name(): string {
    return this._state.name;
  }

  get description(): string | undefined {
    return this._state.description;
  }

  /** Direction of the objective, or the default one when none is set */
  get direction(): Direction | undefined {
    return this._state.objective?.direction ?? this._state.direction;
  }

  get params(): ParamMap {
    return this._state.params;
  }

  get families(): VariableFamily[] {
    return this._state.registry.families();
  }

  /** Variable instances in declaration order */
  get instances(): VariableInstance[] {
    return this._state.registry.instances();
  }

  /** Constraints in declaration order */
  getConstraints(): readonly Constraint[] {
    return this._state.constraints;
  }

  getObjective(): Objective | null {
    return this._state.objective;
  }

  getFamily(name: string): VariableFamily | undefined {
    return this._state.registry.getFamily(name);
  }

  getConstraint(id: string): Constraint | undefined {
    return this._state.constraints.find((c) => c.id === id);
  }

  /**
   * The declared instance of `family` at `index`.
   *
   * @throws DslError `UndefinedVariable` when it was never declared.
   */
  getVariable(family: string, ...index: BindingValue[]): VariableInstance {
    return this._state.registry.lookup(family, index);
  }

  /**
   * Build the solver-boundary view of the problem.
   */
  snapshot(): ProblemSnapshot {
    const objective = this._state.objective;
    return {
      name: this._state.name,
      variables: this._state.registry.instances().map((inst) => ({
        id: inst.id,
        type: inst.type,
        min: inst.min,
        max: inst.max,
      })),
      constraints: this._state.constraints.map((c) => ({
        id: c.id,
        name: c.name,
        coefficients: polyLinearCoefficients(c.lhs),
        constant: polyConstantTerm(c.lhs),
        op: c.op,
        rhs: c.rhs,
      })),
      objective: objective
        ? {
            coefficients: polyLinearCoefficients(objective.polynomial),
            constant: polyConstantTerm(objective.polynomial),
            direction: objective.direction,
          }
        : null,
    };
  }

  /**
   * Solve the problem with HiGHS.
   *
   * @throws InfeasibleError if the problem is infeasible
   * @throws UnboundedError if the problem is unbounded
   * @throws SolverUnavailableError if HiGHS cannot be loaded
   */
  async solve(settings: SolverSettings = {}): Promise<Solution> {
    return solve(this.snapshot(), settings);
  }
}

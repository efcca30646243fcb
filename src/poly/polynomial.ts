/**
 * Canonical polynomial over named decision variables.
 *
 * Maps each monomial (a sorted multiset of variable ids; the empty
 * multiset is the constant term) to its coefficient. Equal monomials are
 * always merged, so a polynomial never holds duplicate keys.
 */

/** Canonical variable identifier, e.g. `ship(S1,C2)` */
export type VariableId = string;

export interface Term {
  /** Sorted variable ids; empty for the constant term */
  readonly variables: readonly VariableId[];
  readonly coefficient: number;
}

export interface Polynomial {
  /** Monomial key -> term, in first-insertion order */
  readonly terms: ReadonlyMap<string, Term>;
}

/** Key of the constant monomial */
export const CONSTANT_KEY = '';

/**
 * Key for a monomial. Variable ids never contain `*` (the naming
 * sanitizer escapes it), so the join is unambiguous.
 */
export function monomialKey(variables: readonly VariableId[]): string {
  return [...variables].sort().join('*');
}

/** The zero polynomial */
export function polyZero(): Polynomial {
  return { terms: new Map() };
}

/** Constant polynomial; zero has no terms. */
export function polyConst(value: number): Polynomial {
  if (value === 0) {
    return polyZero();
  }
  return { terms: new Map([[CONSTANT_KEY, { variables: [], coefficient: value }]]) };
}

/** `coefficient * id` */
export function polyVariable(id: VariableId, coefficient = 1): Polynomial {
  return { terms: new Map([[id, { variables: [id], coefficient }]]) };
}

/**
 * Add two polynomials termwise.
 */
export function polyAdd(a: Polynomial, b: Polynomial): Polynomial {
  const terms = new Map(a.terms);
  for (const [key, term] of b.terms) {
    const existing = terms.get(key);
    terms.set(
      key,
      existing ? { variables: existing.variables, coefficient: existing.coefficient + term.coefficient } : term
    );
  }
  return { terms };
}

/**
 * Sum a list of polynomials.
 */
export function polySum(polys: Iterable<Polynomial>): Polynomial {
  const terms = new Map<string, Term>();
  for (const p of polys) {
    for (const [key, term] of p.terms) {
      const existing = terms.get(key);
      terms.set(
        key,
        existing ? { variables: existing.variables, coefficient: existing.coefficient + term.coefficient } : term
      );
    }
  }
  return { terms };
}

/**
 * Negate every coefficient.
 */
export function polyNeg(a: Polynomial): Polynomial {
  return polyScale(a, -1);
}

/**
 * Subtract two polynomials.
 */
export function polySub(a: Polynomial, b: Polynomial): Polynomial {
  return polyAdd(a, polyNeg(b));
}

/**
 * Scale every coefficient by a scalar.
 */
export function polyScale(a: Polynomial, scalar: number): Polynomial {
  const terms = new Map<string, Term>();
  for (const [key, term] of a.terms) {
    terms.set(key, { variables: term.variables, coefficient: term.coefficient * scalar });
  }
  return { terms };
}

/**
 * Multiply two polynomials. Monomials multiply by concatenating their
 * variable multisets.
 */
export function polyMul(a: Polynomial, b: Polynomial): Polynomial {
  const terms = new Map<string, Term>();
  for (const ta of a.terms.values()) {
    for (const tb of b.terms.values()) {
      const variables = [...ta.variables, ...tb.variables].sort();
      const key = variables.join('*');
      const coefficient = ta.coefficient * tb.coefficient;
      const existing = terms.get(key);
      terms.set(
        key,
        existing ? { variables, coefficient: existing.coefficient + coefficient } : { variables, coefficient }
      );
    }
  }
  return { terms };
}

/**
 * Check if a polynomial has no variable terms.
 */
export function polyIsConstant(a: Polynomial): boolean {
  for (const term of a.terms.values()) {
    if (term.variables.length > 0) {
      return false;
    }
  }
  return true;
}

/** Coefficient of the constant monomial (0 if absent) */
export function polyConstantTerm(a: Polynomial): number {
  return a.terms.get(CONSTANT_KEY)?.coefficient ?? 0;
}

/** The polynomial with its constant term removed */
export function polyWithoutConstant(a: Polynomial): Polynomial {
  const terms = new Map(a.terms);
  terms.delete(CONSTANT_KEY);
  return { terms };
}

/** Highest monomial degree (0 for constants and the zero polynomial) */
export function polyDegree(a: Polynomial): number {
  let degree = 0;
  for (const term of a.terms.values()) {
    degree = Math.max(degree, term.variables.length);
  }
  return degree;
}

/** Variables appearing in the polynomial, in first-appearance order */
export function polyVariables(a: Polynomial): Set<VariableId> {
  const vars = new Set<VariableId>();
  for (const term of a.terms.values()) {
    for (const id of term.variables) {
      vars.add(id);
    }
  }
  return vars;
}

/**
 * Coefficient per variable of a linear polynomial (constant excluded).
 * Throws if any monomial has degree above 1.
 */
export function polyLinearCoefficients(a: Polynomial): Map<VariableId, number> {
  const coeffs = new Map<VariableId, number>();
  for (const term of a.terms.values()) {
    if (term.variables.length > 1) {
      throw new Error(`Polynomial is not linear: monomial ${term.variables.join('*')}`);
    }
    const [id] = term.variables;
    if (id !== undefined) {
      coeffs.set(id, term.coefficient);
    }
  }
  return coeffs;
}

/** Drop zero-coefficient monomials */
export function polyPrune(a: Polynomial): Polynomial {
  const terms = new Map<string, Term>();
  for (const [key, term] of a.terms) {
    if (term.coefficient !== 0) {
      terms.set(key, term);
    }
  }
  return { terms };
}

/**
 * Structural equality after pruning zeros. Insertion order is ignored.
 */
export function polyEquals(a: Polynomial, b: Polynomial): boolean {
  const pa = polyPrune(a);
  const pb = polyPrune(b);
  if (pa.terms.size !== pb.terms.size) {
    return false;
  }
  for (const [key, term] of pa.terms) {
    if (pb.terms.get(key)?.coefficient !== term.coefficient) {
      return false;
    }
  }
  return true;
}

function formatTerm(term: Term, isFirst: boolean): string {
  const sign = term.coefficient < 0 ? '-' : '+';
  const abs = Math.abs(term.coefficient);
  const prefix = isFirst ? (term.coefficient < 0 ? '-' : '') : ` ${sign} `;
  if (term.variables.length === 0) {
    return `${prefix}${abs}`;
  }
  const monomial = term.variables.join(' * ');
  return abs === 1 ? `${prefix}${monomial}` : `${prefix}${abs} ${monomial}`;
}

/**
 * Render a polynomial, e.g. `2 x(1) - y + 3`. The constant goes last.
 */
export function formatPolynomial(a: Polynomial): string {
  const parts: string[] = [];
  for (const term of a.terms.values()) {
    if (term.variables.length > 0) {
      parts.push(formatTerm(term, parts.length === 0));
    }
  }
  const constant = a.terms.get(CONSTANT_KEY);
  if (constant && constant.coefficient !== 0) {
    parts.push(formatTerm(constant, parts.length === 0));
  }
  return parts.join('') || '0';
}

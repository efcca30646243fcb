import type { BindingValue } from '../error.js';
import { renderIndex } from '../params/index.js';

/**
 * Prefix added to index components the LP format would misread. A
 * component starting with `e`/`E` looks like the exponent of a number.
 */
export const ESCAPE_PREFIX = 'var_';

const SAFE_CHAR = /^[A-Za-z0-9_.!"#$%&;?@']$/;

const FAMILY_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Check that a family name is a plain identifier */
export function isValidFamilyName(name: string): boolean {
  return FAMILY_NAME.test(name);
}

function escapeChar(ch: string): string {
  const code = ch.codePointAt(0) ?? 0;
  const hex = code.toString(16);
  return code <= 0xff ? `~${hex.padStart(2, '0')}` : `~u{${hex}}`;
}

/**
 * Sanitize one rendered index component.
 *
 * Characters outside the LP-safe set (this includes `,`, `(`, `)` and the
 * escape character `~`) become `~XX`; then a component starting with
 * `e`, `E` or the escape prefix itself gets the escape prefix. Both steps
 * are injective, so distinct components stay distinct.
 *
 * @example
 * ```ts
 * sanitizeComponent('e5')       // 'var_e5'
 * sanitizeComponent('normal')   // 'normal'
 * sanitizeComponent('a,b')      // 'a~2cb'
 * ```
 */
export function sanitizeComponent(component: string): string {
  let out = '';
  for (const ch of component) {
    out += SAFE_CHAR.test(ch) ? ch : escapeChar(ch);
  }
  if (out.startsWith('e') || out.startsWith('E') || out.startsWith(ESCAPE_PREFIX)) {
    out = ESCAPE_PREFIX + out;
  }
  return out;
}

/**
 * Canonical variable identifier: `family(c1,c2,...)`, or the bare family
 * name for scalar variables. Sanitizing is applied per component.
 *
 * @example
 * ```ts
 * canonicalName('ship', ['S1', 'C2'])   // 'ship(S1,C2)'
 * canonicalName('cost', ['e5'])         // 'cost(var_e5)'
 * canonicalName('z', [])                // 'z'
 * ```
 */
export function canonicalName(family: string, index: readonly BindingValue[]): string {
  if (index.length === 0) {
    return family;
  }
  const components = index.map((value) => sanitizeComponent(renderIndex(value)));
  return `${family}(${components.join(',')})`;
}

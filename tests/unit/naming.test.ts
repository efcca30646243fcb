import { describe, it, expect } from 'vitest';
import { canonicalName, sanitizeComponent, isValidFamilyName, ESCAPE_PREFIX } from '../../src/registry/index.js';

describe('sanitizeComponent', () => {
  it('leaves ordinary components alone', () => {
    expect(sanitizeComponent('normal')).toBe('normal');
    expect(sanitizeComponent('S1')).toBe('S1');
    expect(sanitizeComponent('3.5')).toBe('3.5');
  });

  it('prefixes components that read as exponents', () => {
    expect(sanitizeComponent('e5')).toBe('var_e5');
    expect(sanitizeComponent('E')).toBe('var_E');
    expect(sanitizeComponent('east')).toBe('var_east');
  });

  it('prefixes components that already start with the escape prefix', () => {
    expect(ESCAPE_PREFIX).toBe('var_');
    expect(sanitizeComponent('var_e5')).toBe('var_var_e5');
  });

  it('hex-escapes separators, whitespace and the escape character', () => {
    expect(sanitizeComponent('a,b')).toBe('a~2cb');
    expect(sanitizeComponent('f(x)')).toBe('f~28x~29');
    expect(sanitizeComponent('New York')).toBe('New~20York');
    expect(sanitizeComponent('a~2cb')).toBe('a~7e2cb');
    expect(sanitizeComponent('x*y')).toBe('x~2ay');
  });

  it('escapes characters above 0xFF with a code point', () => {
    expect(sanitizeComponent('α')).toBe('~u{3b1}');
  });
});

describe('canonicalName', () => {
  it('joins components inside parentheses', () => {
    expect(canonicalName('ship', ['S1', 'C2'])).toBe('ship(S1,C2)');
    expect(canonicalName('x', [1, 2])).toBe('x(1,2)');
  });

  it('uses the bare family name for scalars', () => {
    expect(canonicalName('z', [])).toBe('z');
  });

  it('renders booleans and numbers in literal form', () => {
    expect(canonicalName('y', [true, 0.5])).toBe('y(true,0.5)');
  });

  it('treats 1 and "1" as the same index', () => {
    expect(canonicalName('x', [1])).toBe(canonicalName('x', ['1']));
  });

  it('keeps tuples with separators in components distinct', () => {
    const joined = canonicalName('x', ['a,b']);
    const split = canonicalName('x', ['a', 'b']);
    expect(joined).toBe('x(a~2cb)');
    expect(split).toBe('x(a,b)');
    expect(joined).not.toBe(split);
  });

  it('keeps escaped and pre-escaped components distinct', () => {
    const names = ['e5', 'var_e5', 'var_var_e5'].map((c) => canonicalName('cost', [c]));
    expect(names).toEqual(['cost(var_e5)', 'cost(var_var_e5)', 'cost(var_var_var_e5)']);
    expect(new Set(names).size).toBe(3);
  });
});

describe('isValidFamilyName', () => {
  it('accepts identifiers', () => {
    expect(isValidFamilyName('ship')).toBe(true);
    expect(isValidFamilyName('_x2')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isValidFamilyName('2x')).toBe(false);
    expect(isValidFamilyName('x(1)')).toBe(false);
    expect(isValidFamilyName('')).toBe(false);
  });
});

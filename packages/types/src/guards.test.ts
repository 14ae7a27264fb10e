import { describe, it, expect } from 'vitest';
import {
  isNonEmptyString,
  isHexOfLength,
  isPlainObject,
  isNonNegativeSafeInteger,
  assertNoDangerousKeys,
  sanitizeJsonInput,
  freezeDeep,
  assertNever,
} from './guards';

// ---------------------------------------------------------------------------
// isNonEmptyString
// ---------------------------------------------------------------------------
describe('isNonEmptyString', () => {
  it('returns true for a regular string', () => {
    expect(isNonEmptyString('tessera')).toBe(true);
  });

  it('returns false for empty and whitespace-only strings', () => {
    expect(isNonEmptyString('')).toBe(false);
    expect(isNonEmptyString('   ')).toBe(false);
  });

  it('returns false for non-strings', () => {
    expect(isNonEmptyString(null)).toBe(false);
    expect(isNonEmptyString(42)).toBe(false);
    expect(isNonEmptyString({})).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// isHexOfLength
// ---------------------------------------------------------------------------
describe('isHexOfLength', () => {
  it('accepts hex of the exact length in either case', () => {
    expect(isHexOfLength('ab'.repeat(32), 64)).toBe(true);
    expect(isHexOfLength('AB'.repeat(32), 64)).toBe(true);
  });

  it('rejects the wrong length', () => {
    expect(isHexOfLength('ab'.repeat(31), 64)).toBe(false);
    expect(isHexOfLength('a'.repeat(65), 64)).toBe(false);
  });

  it('rejects non-hex characters and prefixes', () => {
    expect(isHexOfLength('zz'.repeat(32), 64)).toBe(false);
    expect(isHexOfLength('0x' + 'a'.repeat(62), 64)).toBe(false);
  });

  it('rejects non-strings', () => {
    expect(isHexOfLength(123, 3)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// isPlainObject
// ---------------------------------------------------------------------------
describe('isPlainObject', () => {
  it('accepts object literals and null-prototype objects', () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
  });

  it('rejects arrays, null, class instances and typed arrays', () => {
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
    expect(isPlainObject(new Uint8Array(2))).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// isNonNegativeSafeInteger
// ---------------------------------------------------------------------------
describe('isNonNegativeSafeInteger', () => {
  it('accepts zero and positive integers', () => {
    expect(isNonNegativeSafeInteger(0)).toBe(true);
    expect(isNonNegativeSafeInteger(Number.MAX_SAFE_INTEGER)).toBe(true);
  });

  it('rejects negatives, fractions, unsafe integers and strings', () => {
    expect(isNonNegativeSafeInteger(-1)).toBe(false);
    expect(isNonNegativeSafeInteger(1.5)).toBe(false);
    expect(isNonNegativeSafeInteger(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
    expect(isNonNegativeSafeInteger('3')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// JSON input
// ---------------------------------------------------------------------------
describe('sanitizeJsonInput', () => {
  it('parses ordinary JSON', () => {
    expect(sanitizeJsonInput('{"round":3,"signatures":[]}')).toEqual({ round: 3, signatures: [] });
  });

  it('rejects a __proto__ key at any depth', () => {
    expect(() => sanitizeJsonInput('{"a":{"__proto__":{"x":1}}}')).toThrow(
      'Potentially dangerous key "__proto__" detected in JSON input',
    );
  });

  it('rejects a constructor key inside an array', () => {
    expect(() => sanitizeJsonInput('[{"constructor":1}]')).toThrow('"constructor"');
  });

  it('throws SyntaxError on malformed JSON', () => {
    expect(() => sanitizeJsonInput('{')).toThrow(SyntaxError);
  });
});

describe('assertNoDangerousKeys', () => {
  it('ignores primitives', () => {
    expect(() => assertNoDangerousKeys(5)).not.toThrow();
    expect(() => assertNoDangerousKeys(null)).not.toThrow();
  });
});

// ---------------------------------------------------------------------------
// freezeDeep
// ---------------------------------------------------------------------------
describe('freezeDeep', () => {
  it('freezes nested objects and arrays', () => {
    const value = freezeDeep({ tx: { parts: [{ n: 1 }] } });
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.tx)).toBe(true);
    expect(Object.isFrozen(value.tx.parts)).toBe(true);
    expect(Object.isFrozen(value.tx.parts[0])).toBe(true);
  });

  it('leaves typed arrays and class instances alone', () => {
    const bytes = new Uint8Array([1, 2]);
    const date = new Date(0);
    const value = freezeDeep({ bytes, date });
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(bytes)).toBe(false);
    expect(Object.isFrozen(date)).toBe(false);
  });

  it('returns primitives unchanged', () => {
    expect(freezeDeep(7)).toBe(7);
  });
});

// ---------------------------------------------------------------------------
// assertNever
// ---------------------------------------------------------------------------
describe('assertNever', () => {
  it('throws with the unexpected value', () => {
    const rogue: unknown = { type: 'rogue' };
    expect(() => assertNever(rogue as never)).toThrow('Unexpected value: {"type":"rogue"}');
  });
});

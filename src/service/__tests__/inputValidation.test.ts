import { describe, it, expect } from 'vitest';
import { isSuspicious, validateInput } from '../inputValidation';
import { InputValidationError } from '../../errors';

const limits = { maxFieldLength: 10, maxValueLength: 5 };

function violations(fn: () => unknown) {
  try {
    fn();
  } catch (err) {
    if (err instanceof InputValidationError) return err.errors;
    throw err;
  }
  throw new Error('expected InputValidationError');
}

/* ============= isSuspicious ============= */

describe('isSuspicious', () => {
  it('flags script and SQL lookalikes', () => {
    expect(isSuspicious('<SCRIPT src=x>')).toBe(true);
    expect(isSuspicious('javascript:void(0)')).toBe(true);
    expect(isSuspicious('<img onerror = "x">')).toBe(true);
    expect(isSuspicious("1; DROP TABLE users")).toBe(true);
    expect(isSuspicious('Jane Doe')).toBe(false);
    expect(isSuspicious('on time')).toBe(false);
  });
});

/* ============= validateInput ============= */

describe('validateInput', () => {
  it('returns the paths of suspicious values', () => {
    const warnings = validateInput({
      name: 'Jane',
      comment: '<script>alert(1)</script>',
      nested: { note: 'a -- b' },
      list: ['ok', 'javascript:x'],
    });
    expect(warnings).toEqual(['comment', 'nested.note', 'list[1]']);
  });

  it('accepts clean input', () => {
    expect(validateInput({ income: 4000, verified: true, address: { city: 'Lyon' } })).toEqual([]);
  });

  it('rejects oversized values', () => {
    expect(violations(() => validateInput({ name: 'abcdef', ok: 'abc' }, limits))).toEqual([
      { path: 'name', message: 'Value exceeds 5 characters' },
    ]);
  });

  it('rejects oversized field names with a shortened path', () => {
    const key = 'k'.repeat(40);
    expect(violations(() => validateInput({ [key]: 1 }, limits))).toEqual([
      { path: `${'k'.repeat(32)}...`, message: 'Field name exceeds 10 characters' },
    ]);
  });

  it('collects every violation, nested ones included', () => {
    const errors = violations(() => validateInput({ a: { b: 'toolong' }, c: ['x', 'yyyyyy'] }, limits));
    expect(errors.map((e) => e.path)).toEqual(['a.b', 'c[1]']);
  });
});

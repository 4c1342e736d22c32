import { describe, it, expect } from 'vitest';
import {
  collectIdentifiers,
  createIdentifierResolver,
  evaluateBooleanExpression,
  parseBooleanExpression,
} from '../booleanExpression';
import { ConfigurationError } from '../../errors';

function run(source: string, truth: Record<string, boolean>): boolean {
  const expr = parseBooleanExpression(source);
  return evaluateBooleanExpression(expr, (name) => truth[name] ?? false);
}

/* ============= Parsing ============= */

describe('parseBooleanExpression', () => {
  it('builds an AST with NOT binding tighter than AND, AND tighter than OR', () => {
    expect(parseBooleanExpression('a OR b AND NOT c')).toEqual({
      kind: 'or',
      left: { kind: 'ident', name: 'a' },
      right: {
        kind: 'and',
        left: { kind: 'ident', name: 'b' },
        right: { kind: 'not', operand: { kind: 'ident', name: 'c' } },
      },
    });
  });

  it('accepts lowercase keywords and symbolic aliases', () => {
    expect(parseBooleanExpression('a and b')).toEqual(parseBooleanExpression('a && b'));
    expect(parseBooleanExpression('a or !b')).toEqual(parseBooleanExpression('a OR NOT b'));
  });

  it('accepts dotted and dashed identifiers', () => {
    expect(collectIdentifiers(parseBooleanExpression('income.ok AND credit-score'))).toEqual([
      'income.ok',
      'credit-score',
    ]);
  });

  it('rejects an empty expression', () => {
    expect(() => parseBooleanExpression('   ', 'groups[0].booleanExpression')).toThrow(
      'Boolean expression must not be empty (at groups[0].booleanExpression)'
    );
  });

  it('rejects a dangling operator', () => {
    expect(() => parseBooleanExpression('a AND')).toThrow(
      'Invalid boolean expression "a AND": Unexpected end of expression'
    );
  });

  it('rejects an unclosed parenthesis', () => {
    expect(() => parseBooleanExpression('(a OR b')).toThrow(
      'Invalid boolean expression "(a OR b": Missing ")" for "(" at position 0'
    );
  });

  it('rejects adjacent identifiers', () => {
    expect(() => parseBooleanExpression('a b')).toThrow(ConfigurationError);
  });

  it('rejects characters outside the grammar', () => {
    expect(() => parseBooleanExpression('a + b')).toThrow('Unexpected character "+" at position 2');
  });
});

/* ============= Evaluation ============= */

describe('evaluateBooleanExpression', () => {
  it('evaluates (a AND b) OR c', () => {
    expect(run('(a AND b) OR c', { a: true, b: true, c: false })).toBe(true);
    expect(run('(a AND b) OR c', { a: true, b: false, c: false })).toBe(false);
    expect(run('(a AND b) OR c', { a: false, b: false, c: true })).toBe(true);
  });

  it('parentheses override precedence', () => {
    expect(run('a AND (b OR c)', { a: false, b: true, c: true })).toBe(false);
    expect(run('NOT (a OR b)', { a: false, b: false })).toBe(true);
  });

  it('lists identifiers once in order of appearance', () => {
    expect(collectIdentifiers(parseBooleanExpression('b AND (a OR b) AND NOT c'))).toEqual(['b', 'a', 'c']);
  });
});

/* ============= Identifier resolution ============= */

describe('createIdentifierResolver', () => {
  const resolve = createIdentifierResolver(['income', 'credit', 'age']);

  it('resolves member keys directly', () => {
    expect(resolve('credit')).toBe('credit');
  });

  it('resolves single letters by position', () => {
    expect(resolve('a')).toBe('income');
    expect(resolve('c')).toBe('age');
  });

  it('returns null past the member list or for unknown names', () => {
    expect(resolve('d')).toBeNull();
    expect(resolve('employment')).toBeNull();
  });

  it('prefers a member literally named with a single letter', () => {
    const byKey = createIdentifierResolver(['x', 'b']);
    expect(byKey('b')).toBe('b');
    expect(byKey('a')).toBe('x');
  });
});

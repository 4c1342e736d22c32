// src/engine/booleanExpression.ts
// Recursive-descent parser for group formulas such as "(a AND b) OR NOT c".
//
// Grammar (NOT binds tightest, then AND, then OR):
//   expr    := and ( OR and )*
//   and     := unary ( AND unary )*
//   unary   := NOT unary | primary
//   primary := IDENT | "(" expr ")"
//
// Keywords are case-insensitive; "&&", "||" and "!" are accepted as aliases.

import { ConfigurationError } from "../errors";

/* ============= AST ============= */

export type BooleanExpression =
  | { kind: "ident"; name: string }
  | { kind: "not"; operand: BooleanExpression }
  | { kind: "and"; left: BooleanExpression; right: BooleanExpression }
  | { kind: "or"; left: BooleanExpression; right: BooleanExpression };

/* ============= Tokenizer ============= */

type Token =
  | { type: "lparen" | "rparen" | "and" | "or" | "not"; pos: number }
  | { type: "ident"; value: string; pos: number };

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_.-]/;

function tokenize(source: string, path: string | null): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === "(") {
      tokens.push({ type: "lparen", pos: i++ });
      continue;
    }
    if (ch === ")") {
      tokens.push({ type: "rparen", pos: i++ });
      continue;
    }
    if (source.startsWith("&&", i)) {
      tokens.push({ type: "and", pos: i });
      i += 2;
      continue;
    }
    if (source.startsWith("||", i)) {
      tokens.push({ type: "or", pos: i });
      i += 2;
      continue;
    }
    if (ch === "!") {
      tokens.push({ type: "not", pos: i++ });
      continue;
    }
    if (IDENT_START.test(ch)) {
      const start = i;
      while (i < source.length && IDENT_PART.test(source[i])) i++;
      const word = source.slice(start, i);
      const upper = word.toUpperCase();
      if (upper === "AND") tokens.push({ type: "and", pos: start });
      else if (upper === "OR") tokens.push({ type: "or", pos: start });
      else if (upper === "NOT") tokens.push({ type: "not", pos: start });
      else tokens.push({ type: "ident", value: word, pos: start });
      continue;
    }

    throw new ConfigurationError(`Unexpected character "${ch}" at position ${i} in "${source}"`, path);
  }

  return tokens;
}

/* ============= Parser ============= */

class Parser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string,
    private readonly path: string | null
  ) {}

  parse(): BooleanExpression {
    const expr = this.parseOr();
    const extra = this.peek();
    if (extra) {
      this.fail(`Unexpected ${describe(extra)} at position ${extra.pos}`);
    }
    return expr;
  }

  private parseOr(): BooleanExpression {
    let left = this.parseAnd();
    while (this.peek()?.type === "or") {
      this.index++;
      left = { kind: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): BooleanExpression {
    let left = this.parseUnary();
    while (this.peek()?.type === "and") {
      this.index++;
      left = { kind: "and", left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): BooleanExpression {
    if (this.peek()?.type === "not") {
      this.index++;
      return { kind: "not", operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): BooleanExpression {
    const token = this.peek();
    if (!token) {
      return this.fail("Unexpected end of expression");
    }

    if (token.type === "ident") {
      this.index++;
      return { kind: "ident", name: token.value };
    }

    if (token.type === "lparen") {
      this.index++;
      const inner = this.parseOr();
      if (this.peek()?.type !== "rparen") {
        return this.fail(`Missing ")" for "(" at position ${token.pos}`);
      }
      this.index++;
      return inner;
    }

    return this.fail(`Unexpected ${describe(token)} at position ${token.pos}`);
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private fail(message: string): never {
    throw new ConfigurationError(`Invalid boolean expression "${this.source}": ${message}`, this.path);
  }
}

function describe(token: Token): string {
  return token.type === "ident" ? `identifier "${token.value}"` : `"${token.type.toUpperCase()}"`;
}

/* ============= Public API ============= */

/**
 * Parse a boolean formula.
 * @throws ConfigurationError on empty or malformed input
 */
export function parseBooleanExpression(source: string, path: string | null = null): BooleanExpression {
  if (source.trim() === "") {
    throw new ConfigurationError("Boolean expression must not be empty", path);
  }
  return new Parser(tokenize(source, path), source, path).parse();
}

/** Identifiers in order of first appearance */
export function collectIdentifiers(expr: BooleanExpression): string[] {
  const seen = new Set<string>();
  const walk = (node: BooleanExpression): void => {
    switch (node.kind) {
      case "ident":
        seen.add(node.name);
        return;
      case "not":
        walk(node.operand);
        return;
      case "and":
      case "or":
        walk(node.left);
        walk(node.right);
        return;
    }
  };
  walk(expr);
  return [...seen];
}

export function evaluateBooleanExpression(
  expr: BooleanExpression,
  resolve: (name: string) => boolean
): boolean {
  switch (expr.kind) {
    case "ident":
      return resolve(expr.name);
    case "not":
      return !evaluateBooleanExpression(expr.operand, resolve);
    case "and":
      return evaluateBooleanExpression(expr.left, resolve) && evaluateBooleanExpression(expr.right, resolve);
    case "or":
      return evaluateBooleanExpression(expr.left, resolve) || evaluateBooleanExpression(expr.right, resolve);
  }
}

/* ============= Identifier Resolution ============= */

const POSITIONAL = /^[a-z]$/;

/**
 * Map formula identifiers onto member keys. A member's own key wins; a
 * single lowercase letter otherwise addresses members by position (a = first).
 */
export function createIdentifierResolver(memberKeys: readonly string[]): (name: string) => string | null {
  const keys = new Set(memberKeys);
  return (name) => {
    if (keys.has(name)) return name;
    if (POSITIONAL.test(name)) {
      const idx = name.charCodeAt(0) - "a".charCodeAt(0);
      if (idx < memberKeys.length) return memberKeys[idx];
    }
    return null;
  };
}

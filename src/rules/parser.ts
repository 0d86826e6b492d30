/**
 * Restricted expression parser for data-quality rules.
 *
 * The grammar only knows boolean operators, comparison chains, arithmetic,
 * literals and bare names. Anything else is rejected while parsing, so an
 * expression that contains a disallowed construct is never evaluated.
 *
 *   or         := and ("or" and)*
 *   and        := not ("and" not)*
 *   not        := "not" not | comparison
 *   comparison := additive (cmp additive)*
 *   additive   := term (("+" | "-") term)*
 *   term       := unary (("*" | "/" | "%") unary)*
 *   unary      := ("-" | "+") unary | primary
 *   primary    := number | string | "true" | "false" | name | "(" or ")"
 */

import { DisallowedConstructError, RuleSyntaxError } from "../shared/errors.js";
import type { RuleValue } from "../shared/types.js";
import { tokenize, type Token } from "./lexer.js";

export type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=";
export type ArithmeticOp = "+" | "-" | "*" | "/" | "%";

export type Expr =
  | { type: "literal"; value: RuleValue }
  | { type: "name"; id: string; pos: number }
  | { type: "unary"; op: "-" | "+" | "not"; operand: Expr }
  | { type: "binary"; op: ArithmeticOp; left: Expr; right: Expr }
  | { type: "bool"; op: "and" | "or"; values: Expr[] }
  | { type: "compare"; left: Expr; ops: CompareOp[]; comparators: Expr[] };

const COMPARE_OPS: readonly CompareOp[] = ["==", "!=", "<", "<=", ">", ">="];

function asCompareOp(value: string): CompareOp | undefined {
  return COMPARE_OPS.find((op) => op === value);
}

const FORBIDDEN_OPERATORS: Record<string, string> = {
  "**": "power operator",
  "//": "floor division",
  "&": "bitwise operator",
  "|": "bitwise operator",
  "^": "bitwise operator",
  "~": "bitwise operator",
  "<<": "bitwise shift",
  ">>": "bitwise shift",
  "@": "matrix multiplication",
  "=": "assignment",
  ":=": "assignment expression",
  ";": "statement separator",
  ",": "tuple",
  ":": "slice",
  "{": "dict or set display",
};

const FORBIDDEN_KEYWORDS: Record<string, string> = {
  lambda: "lambda",
  if: "conditional expression",
  else: "conditional expression",
  for: "comprehension",
  in: "membership test",
  is: "identity test",
  await: "await expression",
  yield: "yield expression",
  import: "import",
};

const RESERVED = new Set(["and", "or", "not", "true", "false", ...Object.keys(FORBIDDEN_KEYWORDS)]);

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Expr {
    const expr = this.parseOr();
    const tok = this.peek();
    if (tok.kind !== "eof") this.reject(tok);
    return expr;
  }

  // ── Token helpers ──────────────────────────────────────────

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private advance(): Token {
    const tok = this.peek();
    if (tok.kind !== "eof") this.index++;
    return tok;
  }

  private isOp(value: string, offset = 0): boolean {
    const tok = this.peek(offset);
    return tok.kind === "op" && tok.value === value;
  }

  private isKeyword(value: string, offset = 0): boolean {
    const tok = this.peek(offset);
    return tok.kind === "name" && tok.value === value;
  }

  /** Throw the most specific error for a token the grammar cannot accept here. */
  private reject(tok: Token): never {
    if (tok.kind === "op") {
      const construct = FORBIDDEN_OPERATORS[tok.value];
      if (construct) throw new DisallowedConstructError(construct, tok.pos);
      if (tok.value === "(") throw new DisallowedConstructError("function call", tok.pos);
      if (tok.value === ".") throw new DisallowedConstructError("attribute access", tok.pos);
      if (tok.value === "[") throw new DisallowedConstructError("subscript", tok.pos);
    }
    if (tok.kind === "name" && FORBIDDEN_KEYWORDS[tok.value]) {
      throw new DisallowedConstructError(FORBIDDEN_KEYWORDS[tok.value], tok.pos);
    }
    if (tok.kind === "eof") {
      throw new RuleSyntaxError("unexpected end of expression", tok.pos);
    }
    const shown = tok.kind === "string" ? JSON.stringify(tok.value) : String(tok.value);
    throw new RuleSyntaxError(`unexpected token ${shown} at ${tok.pos}`, tok.pos);
  }

  // ── Grammar ────────────────────────────────────────────────

  private parseOr(): Expr {
    const values = [this.parseAnd()];
    while (this.isKeyword("or")) {
      this.advance();
      values.push(this.parseAnd());
    }
    return values.length === 1 ? values[0] : { type: "bool", op: "or", values };
  }

  private parseAnd(): Expr {
    const values = [this.parseNot()];
    while (this.isKeyword("and")) {
      this.advance();
      values.push(this.parseNot());
    }
    return values.length === 1 ? values[0] : { type: "bool", op: "and", values };
  }

  private parseNot(): Expr {
    if (this.isKeyword("not")) {
      this.advance();
      return { type: "unary", op: "not", operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const left = this.parseAdditive();
    const ops: CompareOp[] = [];
    const comparators: Expr[] = [];

    for (;;) {
      const tok = this.peek();
      const op = tok.kind === "op" ? asCompareOp(tok.value) : undefined;
      if (op) {
        this.advance();
        ops.push(op);
        comparators.push(this.parseAdditive());
        continue;
      }
      if (this.isKeyword("not") && this.isKeyword("in", 1)) {
        throw new DisallowedConstructError("membership test", tok.pos);
      }
      break;
    }

    return ops.length === 0 ? left : { type: "compare", left, ops, comparators };
  }

  private parseAdditive(): Expr {
    let left = this.parseTerm();
    for (;;) {
      const op = this.isOp("+") ? "+" : this.isOp("-") ? "-" : null;
      if (!op) return left;
      this.advance();
      left = { type: "binary", op, left, right: this.parseTerm() };
    }
  }

  private parseTerm(): Expr {
    let left = this.parseUnary();
    for (;;) {
      const op = this.isOp("*") ? "*" : this.isOp("/") ? "/" : this.isOp("%") ? "%" : null;
      if (!op) return left;
      this.advance();
      left = { type: "binary", op, left, right: this.parseUnary() };
    }
  }

  private parseUnary(): Expr {
    if (this.isOp("-") || this.isOp("+")) {
      const op = this.isOp("-") ? "-" : "+";
      this.advance();
      return { type: "unary", op, operand: this.parseUnary() };
    }
    const expr = this.parsePrimary();
    const next = this.peek();
    if (next.kind === "op" && (next.value === "(" || next.value === "." || next.value === "[")) {
      this.reject(next);
    }
    return expr;
  }

  private parsePrimary(): Expr {
    const tok = this.peek();

    switch (tok.kind) {
      case "number":
        this.advance();
        return { type: "literal", value: tok.value };
      case "string":
        this.advance();
        return { type: "literal", value: tok.value };
      case "name":
        if (tok.value === "true" || tok.value === "false") {
          this.advance();
          return { type: "literal", value: tok.value === "true" };
        }
        if (RESERVED.has(tok.value)) this.reject(tok);
        this.advance();
        return { type: "name", id: tok.value, pos: tok.pos };
      case "op":
        if (tok.value === "(") {
          this.advance();
          if (this.isOp(")")) throw new DisallowedConstructError("tuple", tok.pos);
          const inner = this.parseOr();
          if (!this.isOp(")")) this.reject(this.peek());
          this.advance();
          return inner;
        }
        if (tok.value === "[") {
          throw new DisallowedConstructError(this.bracketHasFor() ? "comprehension" : "list display", tok.pos);
        }
        return this.reject(tok);
      case "eof":
        return this.reject(tok);
    }
  }

  /** Look ahead inside a bracket for a `for` keyword. */
  private bracketHasFor(): boolean {
    let depth = 0;
    for (let i = this.index; i < this.tokens.length; i++) {
      const tok = this.tokens[i];
      if (tok.kind === "op" && (tok.value === "[" || tok.value === "(" || tok.value === "{")) depth++;
      if (tok.kind === "op" && (tok.value === "]" || tok.value === ")" || tok.value === "}")) depth--;
      if (depth === 0) return false;
      if (depth === 1 && tok.kind === "name" && tok.value === "for") return true;
    }
    return false;
  }
}

/**
 * Parse a rule expression into an AST.
 * Throws RuleSyntaxError (or DisallowedConstructError) on any input outside
 * the grammar.
 */
export function parseExpression(source: string): Expr {
  return new Parser(tokenize(source)).parse();
}

/** Every identifier the expression reads, in source order. */
export function collectNames(expr: Expr): Array<{ id: string; pos: number }> {
  switch (expr.type) {
    case "literal":
      return [];
    case "name":
      return [{ id: expr.id, pos: expr.pos }];
    case "unary":
      return collectNames(expr.operand);
    case "binary":
      return [...collectNames(expr.left), ...collectNames(expr.right)];
    case "bool":
      return expr.values.flatMap(collectNames);
    case "compare":
      return [...collectNames(expr.left), ...expr.comparators.flatMap(collectNames)];
  }
}

/**
 * Tree-walking interpreter for parsed rule expressions.
 *
 * Only the node types produced by the parser exist here; there is no path
 * from a rule to the host runtime. Numbers and booleans mix freely in
 * arithmetic (booleans count as 0/1). Any operation that combines a string
 * with a non-string raises RuleRuntimeError.
 */

import { RuleRuntimeError, UnknownVariableError } from "../shared/errors.js";
import type { RuleEnvironment, RuleValue } from "../shared/types.js";
import { collectNames, parseExpression, type CompareOp, type Expr } from "./parser.js";

/** Fail on the first identifier the environment does not define. */
export function validateIdentifiers(expr: Expr, env: RuleEnvironment): void {
  for (const { id } of collectNames(expr)) {
    if (!env.has(id)) throw new UnknownVariableError(id);
  }
}

export function isTruthy(value: RuleValue): boolean {
  if (typeof value === "string") return value.length > 0;
  if (typeof value === "number") return value !== 0;
  return value;
}

function typeName(value: RuleValue): string {
  return typeof value === "boolean" ? "bool" : typeof value === "number" ? "number" : "str";
}

function toNumber(value: RuleValue, op: string, other: RuleValue): number {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  throw new RuleRuntimeError(
    `unsupported operand types for ${op}: ${typeName(value)} and ${typeName(other)}`
  );
}

/** Modulo whose sign follows the divisor. */
export function flooredMod(a: number, b: number): number {
  const r = a % b;
  return r !== 0 && (r < 0) !== (b < 0) ? r + b : r;
}

function arithmetic(op: Extract<Expr, { type: "binary" }>["op"], left: RuleValue, right: RuleValue): RuleValue {
  if (op === "+" && typeof left === "string" && typeof right === "string") {
    return left + right;
  }
  const a = toNumber(left, op, right);
  const b = toNumber(right, op, left);

  switch (op) {
    case "+":
      return a + b;
    case "-":
      return a - b;
    case "*":
      return a * b;
    case "/":
      if (b === 0) throw new RuleRuntimeError("division by zero");
      return a / b;
    case "%":
      if (b === 0) throw new RuleRuntimeError("modulo by zero");
      return flooredMod(a, b);
  }
}

function kindOf(value: RuleValue): "num" | "str" {
  return typeof value === "string" ? "str" : "num";
}

function compare(op: CompareOp, left: RuleValue, right: RuleValue): boolean {
  if (op === "==" || op === "!=") {
    let equal = false;
    if (typeof left === "string" || typeof right === "string") {
      equal = left === right;
    } else {
      equal = toNumber(left, op, right) === toNumber(right, op, left);
    }
    return op === "==" ? equal : !equal;
  }

  if (kindOf(left) !== kindOf(right)) {
    throw new RuleRuntimeError(
      `'${op}' not supported between ${typeName(left)} and ${typeName(right)}`
    );
  }
  if (typeof left === "string" && typeof right === "string") {
    return ordered(op, left < right ? -1 : left > right ? 1 : 0, 0);
  }
  return ordered(op, toNumber(left, op, right), toNumber(right, op, left));
}

function ordered(op: Exclude<CompareOp, "==" | "!=">, a: number, b: number): boolean {
  switch (op) {
    case "<":
      return a < b;
    case "<=":
      return a <= b;
    case ">":
      return a > b;
    case ">=":
      return a >= b;
  }
}

function evaluateNode(expr: Expr, env: RuleEnvironment): RuleValue {
  switch (expr.type) {
    case "literal":
      return expr.value;

    case "name": {
      const value = env.get(expr.id);
      if (value === undefined) throw new UnknownVariableError(expr.id);
      return value;
    }

    case "unary": {
      const operand = evaluateNode(expr.operand, env);
      if (expr.op === "not") return !isTruthy(operand);
      const n = toNumber(operand, `unary ${expr.op}`, operand);
      return expr.op === "-" ? -n : n;
    }

    case "binary":
      return arithmetic(expr.op, evaluateNode(expr.left, env), evaluateNode(expr.right, env));

    case "bool": {
      // Yields the operand that settles the result; later operands are not evaluated.
      let value: RuleValue = expr.op === "and";
      for (const operand of expr.values) {
        value = evaluateNode(operand, env);
        if (expr.op === "and" ? !isTruthy(value) : isTruthy(value)) return value;
      }
      return value;
    }

    case "compare": {
      let left = evaluateNode(expr.left, env);
      for (let i = 0; i < expr.ops.length; i++) {
        const right = evaluateNode(expr.comparators[i], env);
        if (!compare(expr.ops[i], left, right)) return false;
        left = right;
      }
      return true;
    }
  }
}

/**
 * Parse, validate and evaluate an expression against a fixed environment.
 * Parsing and identifier validation both complete before any node is evaluated.
 */
export function evaluateExpression(source: string, env: RuleEnvironment): boolean {
  const expr = parseExpression(source);
  validateIdentifiers(expr, env);
  return isTruthy(evaluateNode(expr, env));
}

/**
 * Shell Arithmetic Expressions
 *
 * Expression trees compiled to `$(( ))` text. Every operator is fully
 * parenthesized, so the result never depends on the shell's precedence
 * table. Comparisons and logical operators evaluate to 1 or 0.
 */

import type { Env } from "./env.ts";
import type { Var } from "./vars.ts";
import { invalidNumber } from "../core/errors.ts";

// =============================================================================
// Expression Types
// =============================================================================

export interface NumberLiteral {
  type: "NumberLiteral";
  value: number | bigint;
}

export interface VariableReference {
  type: "VariableReference";
  variable: Var<number>;
}

export type UnaryArithmeticOperator = "-" | "!";

export interface UnaryArithmeticExpression {
  type: "UnaryArithmeticExpression";
  operator: UnaryArithmeticOperator;
  argument: Arith;
}

export type BinaryArithmeticOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "||"
  | "&&"
  | "=="
  | "!="
  | "<"
  | ">"
  | "<="
  | ">="
  | "|"
  | "^"
  | "&"
  | "<<"
  | ">>";

export interface BinaryArithmeticExpression {
  type: "BinaryArithmeticExpression";
  operator: BinaryArithmeticOperator;
  left: Arith;
  right: Arith;
}

export interface ConditionalArithmeticExpression {
  type: "ConditionalArithmeticExpression";
  test: Arith;
  consequent: Arith;
  alternate: Arith;
}

export type Arith =
  | NumberLiteral
  | VariableReference
  | UnaryArithmeticExpression
  | BinaryArithmeticExpression
  | ConditionalArithmeticExpression;

// =============================================================================
// Constructors
// =============================================================================

export function num(value: number | bigint): NumberLiteral {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw invalidNumber(value);
  }
  return { type: "NumberLiteral", value };
}

export function avar(variable: Var<number>): VariableReference {
  return { type: "VariableReference", variable };
}

function unary(operator: UnaryArithmeticOperator) {
  return (argument: Arith): UnaryArithmeticExpression => ({
    type: "UnaryArithmeticExpression",
    operator,
    argument,
  });
}

function binary(operator: BinaryArithmeticOperator) {
  return (left: Arith, right: Arith): BinaryArithmeticExpression => ({
    type: "BinaryArithmeticExpression",
    operator,
    left,
    right,
  });
}

export const negate = unary("-");
export const not = unary("!");

export const plus = binary("+");
export const minus = binary("-");
export const mult = binary("*");
export const div = binary("/");
export const mod = binary("%");
export const aor = binary("||");
export const aand = binary("&&");
export const equal = binary("==");
export const notEqual = binary("!=");
export const lt = binary("<");
export const gt = binary(">");
export const le = binary("<=");
export const ge = binary(">=");
export const bitOr = binary("|");
export const bitXor = binary("^");
export const bitAnd = binary("&");
export const shiftLeft = binary("<<");
export const shiftRight = binary(">>");

/** Second argument if the first is non-zero, else the third */
export function cond(test: Arith, consequent: Arith, alternate: Arith): ConditionalArithmeticExpression {
  return { type: "ConditionalArithmeticExpression", test, consequent, alternate };
}

// =============================================================================
// Compilation
// =============================================================================

/**
 * Render an arithmetic expression for use inside `$(( ))`.
 *
 * @example
 * fmtArith(plus(num(1), mult(num(2), num(3))), env)  // "(1 + (2 * 3))"
 */
export function fmtArith(expr: Arith, env: Env): string {
  switch (expr.type) {
    case "NumberLiteral":
      return expr.value.toString();
    case "VariableReference":
      // Arithmetic contexts need no quoting
      return expr.variable.expansion(env).text;
    case "UnaryArithmeticExpression":
      return `(${expr.operator} ${fmtArith(expr.argument, env)})`;
    case "BinaryArithmeticExpression":
      return `(${fmtArith(expr.left, env)} ${expr.operator} ${fmtArith(expr.right, env)})`;
    case "ConditionalArithmeticExpression":
      return `(${fmtArith(expr.test, env)} ? ${fmtArith(expr.consequent, env)} : ${fmtArith(expr.alternate, env)})`;
  }
}

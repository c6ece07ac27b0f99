/**
 * Shell Expression Tree
 *
 * Immutable nodes for emitted script fragments. Builders produce them,
 * combinators rewrite them into new trees, and the renderer consumes them.
 */

import { invalidFd } from "../core/errors.ts";

// =============================================================================
// File Descriptors
// =============================================================================

export type Fd = number;

export const stdInput: Fd = 0;
export const stdOutput: Fd = 1;
export const stdError: Fd = 2;

export function checkFd(fd: Fd): Fd {
  if (!Number.isSafeInteger(fd) || fd < 0) {
    throw invalidFd(fd);
  }
  return fd;
}

// =============================================================================
// Redirections
// =============================================================================

export type RedirSpec =
  | { type: "ToFile"; fd: Fd; path: string }
  | { type: "ToFileAppend"; fd: Fd; path: string }
  | { type: "FromFile"; fd: Fd; path: string }
  | { type: "Output"; fd: Fd; target: Fd }
  | { type: "Input"; fd: Fd; target: Fd }
  | { type: "HereDoc"; text: string };

// =============================================================================
// Expressions
// =============================================================================

export interface Command {
  type: "Command";
  /** Pre-joined, already quoted command text */
  text: string;
  /** Nesting depth; only the multi-line renderer uses it */
  indent: number;
  /** Control-flow keyword line (for/do/done, if/then/fi, case, function braces) */
  structural: boolean;
}

export interface Comment {
  type: "Comment";
  text: string;
  indent: number;
}

export interface Subshell {
  type: "Subshell";
  body: readonly Expr[];
  indent: number;
}

export interface Pipe {
  type: "Pipe";
  left: Expr;
  right: Expr;
}

export interface And {
  type: "And";
  left: Expr;
  right: Expr;
}

export interface Or {
  type: "Or";
  left: Expr;
  right: Expr;
}

export interface Redirect {
  type: "Redirect";
  expr: Expr;
  redir: RedirSpec;
}

export type Expr = Command | Comment | Subshell | Pipe | And | Or | Redirect;

// =============================================================================
// Constructors
// =============================================================================

export function command(text: string): Command {
  return { type: "Command", text, indent: 0, structural: false };
}

/** A keyword line of a control-flow construct */
export function keyword(text: string): Command {
  return { type: "Command", text, indent: 0, structural: true };
}

export function comment(text: string): Comment {
  return { type: "Comment", text, indent: 0 };
}

export function subshell(body: readonly Expr[]): Subshell {
  return { type: "Subshell", body, indent: 0 };
}

export function pipe(left: Expr, right: Expr): Pipe {
  return { type: "Pipe", left, right };
}

export function and(left: Expr, right: Expr): And {
  return { type: "And", left, right };
}

export function or(left: Expr, right: Expr): Or {
  return { type: "Or", left, right };
}

export function redirect(expr: Expr, redir: RedirSpec): Redirect {
  return { type: "Redirect", expr, redir };
}

// =============================================================================
// Transformations
// =============================================================================

/** Return a copy of the tree nested one level deeper */
export function indent(expr: Expr): Expr {
  switch (expr.type) {
    case "Command":
    case "Comment":
      return { ...expr, indent: expr.indent + 1 };
    case "Subshell":
      return { ...expr, indent: expr.indent + 1, body: expr.body.map(indent) };
    case "Pipe":
    case "And":
    case "Or":
      return { ...expr, left: indent(expr.left), right: indent(expr.right) };
    case "Redirect":
      return { ...expr, expr: indent(expr.expr) };
  }
}

/** Collapse a node list to one node, grouping several in a subshell */
export function toSingleExpr(exprs: readonly Expr[]): Expr {
  const [only] = exprs;
  if (exprs.length === 1 && only !== undefined) {
    return only;
  }
  return subshell(exprs);
}

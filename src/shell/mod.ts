/**
 * Shell Script Builder Module
 *
 * Builds POSIX shell scripts from typed pieces: commands, variables,
 * control flow, redirections and arithmetic.
 *
 * @example
 * ```ts
 * import { cmd, forCmd, script } from "./shell/mod.ts";
 *
 * const text = script(forCmd(cmd("seq", "1", "3"), (x) => cmd("echo", x)));
 * ```
 *
 * @module
 */

// Quoting
export { glob, Quoted, quote } from "./quote.ts";

// AST
export type * as AST from "./ast.ts";
export { type Expr, type Fd, indent, type RedirSpec, stdError, stdInput, stdOutput, toSingleExpr } from "./ast.ts";

// Environment
export { allocateName, type Env, emptyEnv, isAllocated, type NameKind, registerName } from "./env.ts";

// Builder
export {
  add,
  bind,
  done,
  map,
  pure,
  type Run,
  runM,
  runScript,
  type Script,
  type ScriptResult,
  sequence,
  steps,
  then,
} from "./script.ts";

// Variables
export {
  castVar,
  type Expansion,
  globalVar,
  newVar,
  newVarContaining,
  newVarUnsafe,
  positionalParameters,
  readVar,
  simpleVar,
  takeParameter,
  Var,
} from "./vars.ts";
export {
  defaultVar,
  type Direction,
  errUnlessVar,
  type Greediness,
  lengthVar,
  setVar,
  trimVar,
  whenVar,
} from "./expansions.ts";

// Parameters and commands
export { Output, output, type Param, renderParam, Val, val, WithVar, withVar } from "./params.ts";
export { cmd, comment, run } from "./commands.ts";

// Control flow
export {
  and,
  block,
  type CaseAlternative,
  caseOf,
  forCmd,
  func,
  ifCmd,
  or,
  pipe,
  type ShellFunction,
  unlessCmd,
  whenCmd,
  whileCmd,
} from "./control.ts";

// Error handling
export { ignoreFailure, stopOnFailure, tolerate } from "./failure.ts";

// Redirection
export {
  appendToFile,
  fromFile,
  hereDocument,
  type RedirFile,
  redirectInput,
  redirectOutput,
  toFile,
  toStderr,
} from "./redirect.ts";

// Arithmetic
export * as arith from "./arith.ts";
export { type Arith, fmtArith } from "./arith.ts";

// Rendering
export { eofMarker, fmt, linearScript, script, toLinearScript } from "./render.ts";

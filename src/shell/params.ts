/**
 * Command Parameters
 *
 * Everything that can be passed to a command, and how each kind is turned
 * into shell text.
 */

import { type Arith, fmtArith } from "./arith.ts";
import type { Env } from "./env.ts";
import { Quoted, quote } from "./quote.ts";
import { toLinearScript } from "./render.ts";
import type { Script } from "./script.ts";
import { Var } from "./vars.ts";

// =============================================================================
// Parameter Kinds
// =============================================================================

/**
 * A value rendered with its plain string form and no quoting. Only for
 * values that are always a single safe shell word, such as numbers.
 */
export class Val {
  constructor(readonly value: number | bigint | boolean) {}
}

/**
 * A variable whose quoted expansion is modified before it is passed on.
 *
 * @example
 * cmd("rmdir", withVar(name, (q) => Quoted.concat(quote("/home/"), q)))
 */
export class WithVar<T> {
  constructor(
    readonly variable: Var<T>,
    readonly modify: (expansion: Quoted) => Quoted,
  ) {}
}

/**
 * The output of a script, passed as a parameter via command substitution.
 *
 * @example
 * cmd("echo", "hello there,", output(cmd("whoami")))
 */
export class Output {
  constructor(readonly script: Script<unknown>) {}
}

export type Param =
  | string
  | Quoted
  | Val
  | Var<unknown>
  | WithVar<unknown>
  | Output
  | Arith;

export function val(value: number | bigint | boolean): Val {
  return new Val(value);
}

export function withVar<T>(variable: Var<T>, modify: (expansion: Quoted) => Quoted): WithVar<T> {
  return new WithVar(variable, modify);
}

export function output(script: Script<unknown>): Output {
  return new Output(script);
}

// =============================================================================
// Rendering
// =============================================================================

export interface RenderedParam {
  text: string;
  /** Environment after rendering; command substitutions may allocate names */
  env: Env;
}

/**
 * Render a parameter as shell text.
 */
export function renderParam(param: Param, env: Env): RenderedParam {
  if (typeof param === "string") {
    return { text: quote(param).text, env };
  }
  if (param instanceof Quoted) {
    return { text: param.text, env };
  }
  if (param instanceof Val) {
    return { text: String(param.value), env };
  }
  if (param instanceof Var) {
    return { text: `"${param.expansion(env).text}"`, env };
  }
  if (param instanceof WithVar) {
    const expanded = renderParam(param.variable, env);
    return { text: param.modify(new Quoted(expanded.text)).text, env: expanded.env };
  }
  if (param instanceof Output) {
    const result = param.script(env);
    return { text: `"$(${toLinearScript(result.nodes)})"`, env: result.env };
  }
  return { text: `"$((${fmtArith(param, env)}))"`, env };
}

/**
 * Render parameters in order, threading the environment through each.
 */
export function renderParams(params: readonly Param[], env: Env): { texts: string[]; env: Env } {
  const texts: string[] = [];
  let current = env;
  for (const param of params) {
    const rendered = renderParam(param, current);
    texts.push(rendered.text);
    current = rendered.env;
  }
  return { texts, env: current };
}

/**
 * Variable Assignment and Modified Expansions
 *
 * Derived variables read a base variable through a parameter expansion
 * such as `${name:-default}`. They are never assigned themselves.
 */

import { command } from "./ast.ts";
import { cmd } from "./commands.ts";
import type { Env } from "./env.ts";
import { output, type Param, renderParam } from "./params.ts";
import { Quoted } from "./quote.ts";
import { bind, map, pure, type Script, steps } from "./script.ts";
import { newVar, newVarUnsafe, requireScalar, simpleVar, Var } from "./vars.ts";

// =============================================================================
// Assignment
// =============================================================================

/**
 * Set a variable to the value of a parameter.
 *
 * @example
 * setVar(count, plus(avar(count), num(1)))   // _count="$(($_count + 1))"
 */
export function setVar<T>(v: Var<T>, param: Param): Script<void> {
  requireScalar(v, "assign to");
  return (env) => {
    const rendered = renderParam(param, env);
    return {
      nodes: [command(`${v.name}=${rendered.text}`)],
      env: rendered.env,
      value: undefined,
    };
  };
}

// =============================================================================
// Modified Expansions
// =============================================================================

/** Builds the text between `${` and `}` from the base name */
type ExpansionBody = (baseName: string, env: Env) => string;

function modVar<B>(v: Var<unknown>, body: ExpansionBody): Script<Var<B>> {
  return map(newVarUnsafe<B>(v.name), (fresh) =>
    new Var<B>(
      fresh.name,
      (env) => new Quoted("${" + body(v.name, env) + "}"),
      v.name,
    ));
}

function modWith<B>(operator: string, operation: string) {
  return <A>(v: Var<A>, param: Param): Script<Var<B>> => {
    requireScalar(v, operation);
    return modVar<B>(v, (name, env) => name + operator + renderParam(param, env).text);
  };
}

/**
 * A variable that expands like `v`, or to `param` when `v` is empty.
 */
export function defaultVar<T>(v: Var<T>, param: Param): Script<Var<T>> {
  return modWith<T>(":-", "set a default on")(v, param);
}

/**
 * A variable that expands to nothing when `v` is empty, else to `param`.
 */
export function whenVar<T>(v: Var<T>, param: Param): Script<Var<T>> {
  return modWith<T>(":+", "conditionally replace")(v, param);
}

/**
 * A variable that expands like `v`; expanding it when `v` is empty aborts
 * the script with `param` as the error message.
 */
export function errUnlessVar<T>(v: Var<T>, param: Param): Script<Var<T>> {
  return modWith<T>(":?", "require")(v, param);
}

export type Greediness = "shortest" | "longest";
export type Direction = "fromBeginning" | "fromEnd";

const TRIM_OPERATORS: Record<Direction, Record<Greediness, string>> = {
  fromBeginning: { shortest: "#", longest: "##" },
  fromEnd: { shortest: "%", longest: "%%" },
};

/**
 * A variable holding `v` with a pattern removed from its start or end.
 * A `glob` pattern can match several ways; `greediness` picks the shortest
 * or longest match. Trimming may change the kind of value held.
 *
 * @example
 * trimVar("longest", "fromEnd", path, glob("/*"))   // ${_path%%\/*}
 */
export function trimVar<T>(
  greediness: Greediness,
  direction: Direction,
  v: Var<string>,
  pattern: Quoted,
): Script<Var<T>> {
  return modWith<T>(TRIM_OPERATORS[direction][greediness], "trim")(v, pattern);
}

/**
 * A variable expanding to the length of `v`'s expansion. For the
 * positional parameters this is their count.
 */
export function lengthVar<T>(v: Var<T>): Script<Var<number>> {
  if (v.name === "@" || v.name === "*") {
    return pure(simpleVar<number>("#"));
  }

  if (!v.derived && !v.special) {
    return modVar<number>(v, (name) => "#" + name);
  }

  // ${#${foo:-bar}} is not valid shell, so copy the expansion into a
  // temporary first: ${_tmp:-$(_tmp="${foo:-bar}"; echo "${#_tmp}")}
  return bind(newVar<T>("tmp"), (tmp) =>
    modVar<number>(tmp, (tmpName, env) => {
      const measure = steps((run) => {
        run(setVar(tmp, v));
        run(cmd("echo", new Var<number>(tmpName, () => new Quoted("${#" + tmpName + "}"))));
      });
      return tmpName + ":-" + renderParam(output(measure), env).text;
    }));
}

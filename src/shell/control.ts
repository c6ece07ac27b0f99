/**
 * Control Flow Combinators
 *
 * Loops, conditionals, case dispatch, functions and command combinators.
 * Each runs its sub-scripts to completion, threading the environment, and
 * assembles the nodes into a fixed shell template that is valid in both
 * multi-line and single-line rendering.
 */

import {
  and as andNode,
  type Expr,
  indent,
  keyword,
  or as orNode,
  pipe as pipeNode,
  subshell,
  toSingleExpr,
} from "./ast.ts";
import { cmd } from "./commands.ts";
import { allocateName } from "./env.ts";
import { type Param, renderParam } from "./params.ts";
import type { Quoted } from "./quote.ts";
import { toLinearScript } from "./render.ts";
import { add, done, runM, type Script, steps } from "./script.ts";
import { newVarUnsafe, type Var } from "./vars.ts";

// =============================================================================
// Blocks
// =============================================================================

/**
 * Emit a block such as `do :` followed by the indented body. The leading
 * no-op keeps the block non-empty and lets it join onto one line.
 */
export function block(word: string, body: Script<unknown>): Script<void> {
  return steps((run) => {
    const nodes = run(runM(body));
    run(add(keyword(`${word} :`), ...nodes.map(indent)));
  });
}

// =============================================================================
// Functions
// =============================================================================

/** Calls a defined shell function with any number of parameters */
export type ShellFunction = (...params: Param[]) => Script<void>;

/**
 * Define a shell function and return a way to call it.
 *
 * The function gets a name no other function in the script uses. Names
 * allocated in its body stay unique across the whole script.
 *
 * @example
 * steps((run) => {
 *   const hohoho = run(func("hohoho", steps((run) => {
 *     const num = run(takeParameter<number>());
 *     run(forCmd(cmd("seq", "1", num), () => cmd("echo", "Ho, ho, ho!")));
 *   })));
 *   run(hohoho(val(1)));
 *   run(hohoho(val(3)));
 * })
 */
export function func(hint: string | undefined, body: Script<unknown>): Script<ShellFunction> {
  return (env) => {
    const allocation = allocateName(env, "func", hint);
    const name = allocation.name;
    const result = body(allocation.env);

    const nodes: Expr[] = [
      keyword(`${name} () { :`),
      ...result.nodes.map(indent),
      keyword("}"),
    ];
    const call: ShellFunction = (...params) => cmd(name, ...params);

    return { nodes, env: result.env, value: call };
  };
}

// =============================================================================
// Loops
// =============================================================================

/**
 * Run a command and split its output into words (using IFS); run `body`
 * once per word with a variable holding it.
 *
 * @example
 * forCmd(cmd("seq", "1", "3"), (x) => cmd("echo", x))
 * // for _x in $(seq 1 3)
 * // do :
 * // <TAB>echo "$_x"
 * // done
 */
export function forCmd<T>(
  source: Script<unknown>,
  body: (item: Var<T>) => Script<unknown>,
): Script<void> {
  return steps((run) => {
    const item = run(newVarUnsafe<T>("x"));
    const sourceNodes = run(runM(source));
    run(add(keyword(`for ${item.name} in $(${toLinearScript(sourceNodes)})`)));
    run(block("do", body(item)));
    run(add(keyword("done")));
  });
}

/**
 * Run `body` as long as `condition` succeeds.
 *
 * The condition is command-substituted, so its output is what runs as the
 * test on each iteration.
 */
export function whileCmd(condition: Script<unknown>, body: Script<unknown>): Script<void> {
  return steps((run) => {
    const conditionNodes = run(runM(condition));
    run(add(keyword(`while $(${toLinearScript(conditionNodes)})`)));
    run(block("do", body));
    run(add(keyword("done")));
  });
}

// =============================================================================
// Conditionals
// =============================================================================

/**
 * Run `thenBody` if `condition` exits 0, else `elseBody`.
 */
export function ifCmd(
  condition: Script<unknown>,
  thenBody: Script<unknown>,
  elseBody: Script<unknown>,
): Script<void> {
  return conditional("", condition, steps((run) => {
    run(block("then", thenBody));
    run(block("else", elseBody));
  }));
}

/**
 * Run `body` if `condition` exits 0.
 */
export function whenCmd(condition: Script<unknown>, body: Script<unknown>): Script<void> {
  return conditional("", condition, block("then", body));
}

/**
 * Run `body` if `condition` exits nonzero.
 */
export function unlessCmd(condition: Script<unknown>, body: Script<unknown>): Script<void> {
  return conditional("! ", condition, block("then", body));
}

function conditional(negation: string, condition: Script<unknown>, blocks: Script<void>): Script<void> {
  return steps((run) => {
    const nodes = run(runM(condition));
    run(add(keyword(`if ${negation}${toLinearScript([inlineCondition(nodes)])}`)));
    run(blocks);
    run(add(keyword("fi")));
  });
}

/** A lone command or subshell goes inline; anything else is grouped */
function inlineCondition(nodes: readonly Expr[]): Expr {
  const [only] = nodes;
  if (nodes.length === 1 && only !== undefined && (only.type === "Command" || only.type === "Subshell")) {
    return only;
  }
  return subshell(nodes);
}

// =============================================================================
// Case
// =============================================================================

/** One `case` branch: a pattern (see `glob`) and the script to run */
export type CaseAlternative = readonly [pattern: Quoted, body: Script<unknown>];

/**
 * Match the variable's value against each pattern in turn and run the
 * body of the first match.
 *
 * The layout is unusual so that it works in both rendering modes:
 *
 * ```sh
 * case "$foo" in ook) :
 * 	echo got ook
 * : ;; *) :
 * 	echo default
 * ;; esac
 * ```
 */
export function caseOf<T>(v: Var<T>, alternatives: readonly CaseAlternative[]): Script<void> {
  if (alternatives.length === 0) {
    return done;
  }

  return steps((run) => {
    const subject = run((env) => {
      const rendered = renderParam(v, env);
      return { nodes: [], env: rendered.env, value: rendered.text };
    });

    alternatives.forEach(([pattern, body], i) => {
      const leader = i === 0 ? `case ${subject} in ` : ": ;; ";
      const nodes = run(runM(body));
      run(add(keyword(`${leader}${pattern.text}) :`), ...nodes.map(indent)));
    });

    run(add(keyword(";; esac")));
  });
}

// =============================================================================
// Command Combinators
// =============================================================================

function combine(node: (left: Expr, right: Expr) => Expr) {
  return (left: Script<unknown>, right: Script<unknown>): Script<void> =>
    steps((run) => {
      const leftNodes = run(runM(left));
      const rightNodes = run(runM(right));
      run(add(node(toSingleExpr(leftNodes), toSingleExpr(rightNodes))));
    });
}

/** Pipe the output of the first script into the second */
export const pipe = combine(pipeNode);

/** Run the second script only if the first succeeds */
export const and = combine(andNode);

/** Run the second script only if the first fails */
export const or = combine(orNode);

/**
 * Script Builder
 *
 * Sequential composition of script steps. A step is a pure function from
 * the naming environment to the nodes it emits, the extended environment,
 * and a result value for the next step.
 */

import type { Expr } from "./ast.ts";
import { type Env, emptyEnv } from "./env.ts";

// =============================================================================
// Core Types
// =============================================================================

/**
 * Result of running one step.
 */
export interface ScriptResult<T> {
  /** Nodes emitted, in order */
  nodes: Expr[];
  /** Environment after the step, including every name it allocated */
  env: Env;
  /** Value handed to the next step */
  value: T;
}

/**
 * A script step. Pure: running it twice on the same environment gives the
 * same result.
 */
export type Script<T> = (env: Env) => ScriptResult<T>;

/** Runs a script against the current environment and returns its value */
export type Run = <U>(script: Script<U>) => U;

// =============================================================================
// Primitives
// =============================================================================

/**
 * Step that emits nothing and yields the given value.
 */
export function pure<T>(value: T): Script<T> {
  return (env) => ({ nodes: [], env, value });
}

/** Step that emits nothing */
export const done: Script<void> = pure(undefined);

/**
 * Emit nodes.
 */
export function add(...exprs: Expr[]): Script<void> {
  return (env) => ({ nodes: exprs, env, value: undefined });
}

/**
 * Run `script`, then the step `next` builds from its value, on the
 * environment `script` produced. Node lists are concatenated.
 *
 * @example
 * bind(newVar("name"), (name) => cmd("read", name))
 */
export function bind<A, B>(
  script: Script<A>,
  next: (value: A) => Script<B>,
): Script<B> {
  return (start) => {
    const left = script(start);
    const right = next(left.value)(left.env);
    return {
      nodes: [...left.nodes, ...right.nodes],
      env: right.env,
      value: right.value,
    };
  };
}

/**
 * Transform a step's value.
 */
export function map<A, B>(script: Script<A>, fn: (value: A) => B): Script<B> {
  return bind(script, (value) => pure(fn(value)));
}

/**
 * Run two steps in order, keeping the second value.
 */
export function then<B>(first: Script<unknown>, second: Script<B>): Script<B> {
  return bind(first, () => second);
}

/**
 * Run steps in order, discarding their values.
 */
export function sequence(scripts: readonly Script<unknown>[]): Script<void> {
  return scripts.reduce<Script<void>>(
    (acc, script) => then(acc, then(script, done)),
    done,
  );
}

/**
 * Imperative composition. `body` gets a `run` function that binds a step
 * against the current environment and returns its value.
 *
 * @example
 * steps((run) => {
 *   const name = run(newVar("name"));
 *   run(readVar(name));
 *   run(cmd("echo", "hello", name));
 *   return name;
 * })
 */
export function steps<T>(body: (run: Run) => T): Script<T> {
  return (start) => {
    const nodes: Expr[] = [];
    let env = start;

    const run: Run = (script) => {
      const result = script(env);
      nodes.push(...result.nodes);
      env = result.env;
      return result.value;
    };

    const value = body(run);
    return { nodes, env, value };
  };
}

// =============================================================================
// Running
// =============================================================================

/**
 * Execute a script once, returning everything it emitted.
 */
export function runScript<T>(script: Script<T>, env: Env = emptyEnv()): ScriptResult<T> {
  return script(env);
}

/**
 * Step that runs `script` on the current environment and yields its nodes
 * instead of emitting them. Names the nested run allocates are kept.
 */
export function runM(script: Script<unknown>): Script<Expr[]> {
  return (env) => {
    const result = script(env);
    return { nodes: [], env: result.env, value: result.nodes };
  };
}

/**
 * Shell Variables
 *
 * Typed handles over allocated variable names. A handle only refers to
 * shell state; several handles may read the same underlying name.
 */

import { command } from "./ast.ts";
import { allocateName, type Env, registerName } from "./env.ts";
import { Quoted, quote } from "./quote.ts";
import { add, bind, pure, type Script, then } from "./script.ts";
import { derivedVariable, invalidName, specialVariable } from "../core/errors.ts";

// =============================================================================
// Variable Handle
// =============================================================================

/** Expands a variable to shell text at render time */
export type Expansion = (env: Env, name: string) => Quoted;

const plainExpansion: Expansion = (_env, name) => new Quoted("$" + name);

/**
 * A shell variable. `T` tags the kind of value it is meant to hold and
 * has no runtime content.
 */
export class Var<T> {
  declare readonly __type?: T;

  constructor(
    /** Shell name of the variable */
    readonly name: string,
    /** Expansion used when the variable is read */
    readonly expand: Expansion = plainExpansion,
    /** For derived variables, the name of the variable they read */
    readonly base?: string,
  ) {}

  /** True for variables produced by modifying another variable */
  get derived(): boolean {
    return this.base !== undefined;
  }

  /** True for `$@`, `$#` and `$*` */
  get special(): boolean {
    return SPECIAL_PARAMETERS.has(this.name);
  }

  /** Expansion text for the given environment */
  expansion(env: Env): Quoted {
    return this.expand(env, this.name);
  }
}

const SPECIAL_PARAMETERS = new Set(["@", "#", "*"]);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Plain `$name` variable */
export function simpleVar<T>(name: string): Var<T> {
  return new Var<T>(name);
}

/**
 * Re-tag a variable as holding another kind of value.
 *
 * Unchecked: the representation is not converted. Meant for combinators
 * whose output legitimately changes the value's kind.
 */
export function castVar<A, B>(v: Var<A>): Var<B> {
  return new Var<B>(v.name, v.expand, v.base);
}

/**
 * Throw unless `v` names an assignable, scalar variable.
 */
export function requireScalar(v: Var<unknown>, operation: string): void {
  if (v.special) {
    throw specialVariable(v.name, operation);
  }
  if (v.base !== undefined) {
    throw derivedVariable(v.base, operation);
  }
}

// =============================================================================
// Special Parameters
// =============================================================================

/**
 * The parameters passed to the script, or to a function inside one (`$@`).
 */
export const positionalParameters: Var<string[]> = simpleVar("@");

// =============================================================================
// Creating Variables
// =============================================================================

/**
 * Allocate a variable name without emitting any code. Only for callers
 * that are about to assign the variable themselves.
 */
export function newVarUnsafe<T>(hint?: string): Script<Var<T>> {
  return (env) => {
    const allocation = allocateName(env, "var", hint);
    return { nodes: [], env: allocation.env, value: simpleVar<T>(allocation.name) };
  };
}

/**
 * Define a new variable, starting out empty. Each call produces a new
 * unique name, influenced by the hint.
 */
export function newVar<T>(hint?: string): Script<Var<T>> {
  return newVarWith<T>("", hint);
}

/**
 * Define a new variable holding the given value.
 *
 * @example
 * newVarContaining("foo bar", "s")   // _s='foo bar'
 * newVarContaining(1, "i")           // _i=1
 */
export function newVarContaining<T extends string | number | bigint | boolean>(
  value: T,
  hint?: string,
): Script<Var<Widen<T>>> {
  return newVarWith<Widen<T>>(quote(String(value)).text, hint);
}

/** The primitive type of a literal type, so `1` tags a `Var<number>` */
type Widen<T> = T extends string ? string
  : T extends number ? number
  : T extends bigint ? bigint
  : boolean;

function newVarWith<T>(value: string, hint?: string): Script<Var<T>> {
  return bind(newVarUnsafe<T>(hint), (v) => then(add(command(`${v.name}=${value}`)), pure(v)));
}

/**
 * Refer to a global variable such as PATH. The name is recorded so that
 * it is never allocated.
 */
export function globalVar<T>(name: string): Script<Var<T>> {
  if (!IDENTIFIER.test(name)) {
    throw invalidName(name);
  }
  return (env) => ({
    nodes: [],
    env: registerName(env, "var", name),
    value: simpleVar<T>(name),
  });
}

/**
 * Shift the first positional parameter into a new variable.
 *
 * @example
 * takeParameter("file")   // _file="$1"; shift
 */
export function takeParameter<T>(hint?: string): Script<Var<T>> {
  return bind(newVarUnsafe<T>(hint), (v) =>
    then(
      add(command(`${v.name}="$1"`), command("shift")),
      pure(v),
    ));
}

/**
 * Fill a variable with one line read from stdin.
 */
export function readVar(v: Var<string>): Script<void> {
  requireScalar(v, "read into");
  return add(command(`read ${quote(v.name).text}`));
}

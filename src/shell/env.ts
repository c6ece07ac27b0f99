/**
 * Naming Environment
 *
 * Records every variable and function name handed out during one script
 * build. Values are immutable: allocation returns a new environment that
 * extends the old one, and names are never freed.
 */

import { logger } from "../core/logger.ts";

// =============================================================================
// Types
// =============================================================================

export type NameKind = "var" | "func";

export interface Env {
  readonly vars: ReadonlySet<string>;
  readonly funcs: ReadonlySet<string>;
}

export interface Allocation {
  name: string;
  env: Env;
}

const DEFAULT_SEED: Record<NameKind, string> = {
  var: "v",
  func: "p",
};

// =============================================================================
// Operations
// =============================================================================

export function emptyEnv(): Env {
  return { vars: new Set(), funcs: new Set() };
}

export function isAllocated(env: Env, kind: NameKind, name: string): boolean {
  return namesOf(env, kind).has(name);
}

/**
 * Record a name that is already in use (such as a global variable), so it
 * is never handed out by `allocateName`.
 */
export function registerName(env: Env, kind: NameKind, name: string): Env {
  if (isAllocated(env, kind, name)) {
    return env;
  }
  const names = new Set(namesOf(env, kind));
  names.add(name);
  return kind === "var" ? { ...env, vars: names } : { ...env, funcs: names };
}

/**
 * Allocate a fresh name of the given kind.
 *
 * Only the letters of the hint are kept. Candidates are tried in the order
 * `_hint`, `_hint2`, `_hint3`, ... until one is unused.
 *
 * @example
 * allocateName(emptyEnv(), "var", "count-1").name  // "_count"
 * allocateName(emptyEnv(), "func").name            // "_p"
 */
export function allocateName(env: Env, kind: NameKind, hint?: string): Allocation {
  const seed = hint === undefined ? DEFAULT_SEED[kind] : seedOf(hint);
  const names = namesOf(env, kind);

  let attempt = 0;
  let candidate = `_${seed}`;
  while (names.has(candidate)) {
    attempt++;
    candidate = `_${seed}${attempt + 1}`;
  }

  logger.trace({ kind, hint, name: candidate }, "allocated name");
  return { name: candidate, env: registerName(env, kind, candidate) };
}

// =============================================================================
// Helpers
// =============================================================================

function namesOf(env: Env, kind: NameKind): ReadonlySet<string> {
  return kind === "var" ? env.vars : env.funcs;
}

function seedOf(hint: string): string {
  // ASCII only: POSIX names may not contain other letters
  return hint.replace(/[^A-Za-z]/g, "");
}

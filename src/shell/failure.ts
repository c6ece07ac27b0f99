/**
 * Error Handling Combinators
 */

import { command, type Expr, or } from "./ast.ts";
import { add, bind, runM, type Script } from "./script.ts";

/**
 * Shell scripts keep going past failing commands by default. Turn on
 * `set -e` to stop at the first failure, or turn it back off.
 */
export function stopOnFailure(enabled: boolean): Script<void> {
  return add(command(`set ${enabled ? "-" : "+"}e`));
}

/**
 * Run a script with every nonzero exit status ignored.
 */
export function ignoreFailure(script: Script<unknown>): Script<void> {
  return bind(runM(script), (nodes) => add(...nodes.map(tolerate)));
}

/**
 * Rewrite a node so its exit status is always 0. Assumes `pipefail` is
 * not set: only the last stage of a pipe decides its status.
 */
export function tolerate(expr: Expr): Expr {
  switch (expr.type) {
    case "Command":
      return expr.structural ? expr : or(expr, command("true"));
    case "Comment":
      return expr;
    case "Subshell":
      return { ...expr, body: expr.body.map(tolerate) };
    case "Pipe":
      return { ...expr, right: tolerate(expr.right) };
    // a && b || true already exits 0; no grouping needed
    case "And":
      return or(expr, command("true"));
    case "Or":
      return { ...expr, right: tolerate(expr.right) };
    case "Redirect":
      return { ...expr, expr: tolerate(expr.expr) };
  }
}

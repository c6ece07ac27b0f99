/**
 * Running Commands
 */

import { command, comment as commentNode } from "./ast.ts";
import { type Param, renderParams } from "./params.ts";
import { quote } from "./quote.ts";
import { add, type Script } from "./script.ts";

/**
 * Add a command with plain text arguments, all of them quoted.
 */
export function run(name: string, args: readonly string[] = []): Script<void> {
  return add(command([name, ...args].map((a) => quote(a).text).join(" ")));
}

/**
 * Add a command. The command itself and every argument may be any kind of
 * parameter: text, variables, command output, arithmetic, ...
 *
 * @example
 * steps((run) => {
 *   const name = run(newVar<string>("name"));
 *   run(readVar(name));
 *   run(cmd("echo", "hello", name));
 * })
 */
export function cmd(name: Param, ...params: Param[]): Script<void> {
  return (env) => {
    const rendered = renderParams([name, ...params], env);
    return {
      nodes: [command(rendered.texts.join(" "))],
      env: rendered.env,
      value: undefined,
    };
  };
}

/**
 * Add a comment to the generated script.
 */
export function comment(text: string): Script<void> {
  return add(commentNode(text));
}

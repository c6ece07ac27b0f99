/**
 * Redirection Combinators
 *
 * Each collapses the redirected script to one node (grouping several in a
 * subshell) and attaches the redirection to it.
 */

import { checkFd, type Fd, redirect, type RedirSpec, stdError, stdInput, stdOutput, toSingleExpr } from "./ast.ts";
import { add, bind, runM, type Script } from "./script.ts";

/**
 * A file to redirect to or from. A bare path uses the operator's default
 * descriptor; a `[fd, path]` pair names the descriptor explicitly.
 */
export type RedirFile = string | readonly [Fd, string];

function redir(script: Script<unknown>, spec: RedirSpec): Script<void> {
  return bind(runM(script), (nodes) => add(redirect(toSingleExpr(nodes), spec)));
}

function fileTarget(file: RedirFile, defaultFd: Fd): { fd: Fd; path: string } {
  if (typeof file === "string") {
    return { fd: defaultFd, path: file };
  }
  const [fd, path] = file;
  return { fd: checkFd(fd), path };
}

/**
 * Redirect output to a file, overwriting it.
 *
 * @example
 * toFile(cmd("find", "/"), "/dev/null")           // find / > /dev/null
 * toFile(cmd("find", "/"), [stdError, "errors"])  // find / 2> errors
 */
export function toFile(script: Script<unknown>, file: RedirFile): Script<void> {
  return redir(script, { type: "ToFile", ...fileTarget(file, stdOutput) });
}

/** Append output to a file, creating it if needed */
export function appendToFile(script: Script<unknown>, file: RedirFile): Script<void> {
  return redir(script, { type: "ToFileAppend", ...fileTarget(file, stdOutput) });
}

/** Read input from a file */
export function fromFile(script: Script<unknown>, file: RedirFile): Script<void> {
  return redir(script, { type: "FromFile", ...fileTarget(file, stdInput) });
}

/**
 * Make `fd` write to wherever `target` writes.
 *
 * @example
 * redirectOutput(cmd("foo"), stdError, stdOutput)   // foo 2>&1
 */
export function redirectOutput(script: Script<unknown>, fd: Fd, target: Fd): Script<void> {
  return redir(script, { type: "Output", fd: checkFd(fd), target: checkFd(target) });
}

/** Make `fd` read from wherever `target` reads */
export function redirectInput(script: Script<unknown>, fd: Fd, target: Fd): Script<void> {
  return redir(script, { type: "Input", fd: checkFd(fd), target: checkFd(target) });
}

/** Send a script's standard output to stderr */
export function toStderr(script: Script<unknown>): Script<void> {
  return redirectOutput(script, stdOutput, stdError);
}

/**
 * Feed text to a script's standard input as a here-document.
 */
export function hereDocument(script: Script<unknown>, text: string): Script<void> {
  return redir(script, { type: "HereDoc", text });
}

/**
 * Script Renderer
 *
 * Turns expression trees into shell source, either as a multi-line script
 * or as a single `;`-joined line. Rendering never mutates the tree, so the
 * same nodes can be rendered in both modes.
 */

import {
  command,
  type Expr,
  type Fd,
  indent,
  pipe,
  type RedirSpec,
  stdInput,
  stdOutput,
  subshell,
} from "./ast.ts";
import { quote } from "./quote.ts";
import { runScript, type Script } from "./script.ts";
import { type ResolvedOptions, resolveOptions, type ScriptOptions } from "../core/options.ts";
import { logger } from "../core/logger.ts";

// =============================================================================
// Public API
// =============================================================================

/**
 * Generate a complete script, with shebang, suitable for writing to a file.
 *
 * @example
 * script(cmd("echo", "hello world"))
 * // "#!/bin/sh\necho 'hello world'\n"
 */
export function script(s: Script<unknown>, options?: ScriptOptions): string {
  const resolved = resolveOptions(options);
  const { nodes } = runScript(s);
  logger.debug({ mode: "multiline", nodes: nodes.length }, "rendering script");

  const lines = nodes.map((expr) => fmt(expr, true, resolved));
  return [resolved.shebang, ...lines].join("\n") + "\n";
}

/**
 * Generate the script as one line of shell code.
 */
export function linearScript(s: Script<unknown>): string {
  const { nodes } = runScript(s);
  logger.debug({ mode: "linear", nodes: nodes.length }, "rendering script");
  return toLinearScript(nodes) + "\n";
}

/**
 * Join nodes into single-line shell code. Used for command substitutions
 * and inline conditions.
 */
export function toLinearScript(nodes: readonly Expr[]): string {
  return nodes.map((expr) => fmt(expr, false)).join("; ");
}

/**
 * Format one node. In multi-line mode the result may span several lines
 * (subshells, here-document bodies).
 */
export function fmt(
  expr: Expr,
  multiline: boolean,
  options: ResolvedOptions = resolveOptions(),
): string {
  return new Formatter(multiline, options).line(expr);
}

/**
 * Pick a here-document delimiter that does not occur in the body:
 * EOF, then EOF2, EOF3, ...
 */
export function eofMarker(body: string): string {
  let n = 1;
  let marker = "EOF";
  while (body.includes(marker)) {
    n++;
    marker = `EOF${n}`;
  }
  return marker;
}

// =============================================================================
// Formatter
// =============================================================================

interface Rendered {
  text: string;
  /** Here-document bodies (with their delimiter line) due after this line */
  heredocs: string[];
}

class Formatter {
  constructor(
    private readonly multiline: boolean,
    private readonly options: ResolvedOptions,
  ) {}

  /** Render a node that starts its own line, followed by any pending bodies */
  line(expr: Expr): string {
    const { text, heredocs } = this.go(expr, true);
    return [text, ...heredocs].join("\n");
  }

  private prefix(depth: number, atLineStart: boolean): string {
    return this.multiline && atLineStart ? this.options.indent.repeat(depth) : "";
  }

  private go(expr: Expr, atLineStart: boolean): Rendered {
    switch (expr.type) {
      case "Command":
        return { text: this.prefix(expr.indent, atLineStart) + expr.text, heredocs: [] };

      case "Comment": {
        const text = expr.text.replace(/\n/g, "");
        if (this.multiline) {
          return { text: this.prefix(expr.indent, atLineStart) + "# " + text, heredocs: [] };
        }
        // A comment runs to end of line, so use the no-op command instead
        return { text: ": " + quote(text).text, heredocs: [] };
      }

      case "Subshell": {
        const body = expr.body.length > 0 ? expr.body : [command(":")];
        if (this.multiline) {
          const open = this.prefix(expr.indent, atLineStart) + "(";
          const close = this.options.indent.repeat(expr.indent) + ")";
          const children = body.map((child) => this.line(indent(child)));
          return { text: [open, ...children, close].join("\n"), heredocs: [] };
        }
        const children = body.map((child) => this.line(child));
        return { text: "(" + children.join(";") + ")", heredocs: [] };
      }

      // A pipe binds tighter than && and ||, which group to the left
      case "Pipe":
        return this.join(expr.left, " | ", expr.right, atLineStart, isList(expr.left), isList(expr.right));
      case "And":
        return this.join(expr.left, " && ", expr.right, atLineStart, false, isList(expr.right));
      case "Or":
        return this.join(expr.left, " || ", expr.right, atLineStart, false, isList(expr.right));

      case "Redirect":
        return this.redirect(expr.expr, expr.redir, atLineStart);
    }
  }

  private join(
    left: Expr,
    op: string,
    right: Expr,
    atLineStart: boolean,
    groupLeft: boolean,
    groupRight: boolean,
  ): Rendered {
    const l = groupLeft ? this.group(left, atLineStart) : this.go(left, atLineStart);
    const r = groupRight ? this.group(right, false) : this.go(right, false);
    return { text: l.text + op + r.text, heredocs: [...l.heredocs, ...r.heredocs] };
  }

  private redirect(expr: Expr, redir: RedirSpec, atLineStart: boolean): Rendered {
    if (redir.type === "HereDoc" && !this.multiline) {
      // Here-documents cannot be written on one line: (echo l1;echo l2) | cmd
      const lines = splitLines(redir.text);
      const source = lines.length > 0
        ? subshell(lines.map((l) => command("echo " + quote(l).text)))
        : command(":");
      return this.go(pipe(source, isCompound(expr) ? subshell([expr]) : expr), atLineStart);
    }

    const inner = this.grouped(expr, atLineStart);
    const heredocs = [...inner.heredocs];
    return { text: inner.text + " " + redirOperator(redir, heredocs), heredocs };
  }

  /** A redirect applies to the whole of a pipe or list, so group those */
  private grouped(expr: Expr, atLineStart: boolean): Rendered {
    return isCompound(expr) ? this.group(expr, atLineStart) : this.go(expr, atLineStart);
  }

  private group(expr: Expr, atLineStart: boolean): Rendered {
    const inner = this.go(expr, false);
    return {
      text: this.prefix(leadingIndent(expr), atLineStart) + "(" + inner.text + ")",
      heredocs: inner.heredocs,
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * The fd number is left out when it is the operator's default
 * (">" redirects stdout, "<" stdin).
 */
function redirFd(fd: Fd, defaultFd: Fd): string {
  return fd === defaultFd ? "" : String(fd);
}

/** Operator and target of a redirection; here-document bodies go to `heredocs` */
function redirOperator(redir: RedirSpec, heredocs: string[]): string {
  switch (redir.type) {
    case "ToFile":
      return redirFd(redir.fd, stdOutput) + "> " + quote(redir.path).text;
    case "ToFileAppend":
      return redirFd(redir.fd, stdOutput) + ">> " + quote(redir.path).text;
    case "FromFile":
      return redirFd(redir.fd, stdInput) + "< " + quote(redir.path).text;
    case "Output":
      return redirFd(redir.fd, stdOutput) + ">&" + redir.target;
    case "Input":
      return redirFd(redir.fd, stdInput) + "<&" + redir.target;
    case "HereDoc": {
      const body = splitLines(redir.text).join("\n");
      const marker = eofMarker(body);
      heredocs.push(redir.text === "" ? marker : body + "\n" + marker);
      // Quoted delimiter: the body is literal text
      return "<<'" + marker + "'";
    }
  }
}

function isCompound(expr: Expr): boolean {
  return expr.type === "Pipe" || isList(expr);
}

function isList(expr: Expr): boolean {
  return expr.type === "And" || expr.type === "Or";
}

/** Depth of the node that starts the line */
function leadingIndent(expr: Expr): number {
  switch (expr.type) {
    case "Pipe":
    case "And":
    case "Or":
      return leadingIndent(expr.left);
    case "Redirect":
      return leadingIndent(expr.expr);
    default:
      return expr.indent;
  }
}

/** Split into lines; a trailing newline does not start another line */
function splitLines(text: string): string[] {
  if (text === "") {
    return [];
  }
  return (text.endsWith("\n") ? text.slice(0, -1) : text).split("\n");
}

/**
 * Conformance Tests
 *
 * These tests run the generated scripts under `sh`, in both rendering
 * modes, and check that the two behave the same.
 */

import { spawnSync } from "node:child_process";
import { describe, expect, it } from "vitest";
import { avar, cond, lt, mult, negate, num, plus } from "./arith.ts";
import { stdError } from "./ast.ts";
import { cmd } from "./commands.ts";
import { and, caseOf, forCmd, func, ifCmd, or, pipe, unlessCmd, whileCmd } from "./control.ts";
import { defaultVar, lengthVar, trimVar } from "./expansions.ts";
import { ignoreFailure, stopOnFailure } from "./failure.ts";
import { output } from "./params.ts";
import { glob } from "./quote.ts";
import { fromFile, hereDocument, toFile, toStderr } from "./redirect.ts";
import { linearScript, script } from "./render.ts";
import { type Script, sequence, steps } from "./script.ts";
import { newVar, newVarContaining, takeParameter } from "./vars.ts";

// =============================================================================
// Test Execution Helpers
// =============================================================================

interface ExecutionResult {
  stdout: string;
  stderr: string;
  code: number | null;
}

/**
 * Run shell source with `sh -c`, passing `args` as positional parameters
 */
function executeShell(source: string, args: readonly string[] = []): ExecutionResult {
  const result = spawnSync("sh", ["-c", source, "sh", ...args], { encoding: "utf8" });
  return { stdout: result.stdout, stderr: result.stderr, code: result.status };
}

/**
 * Run a script in both rendering modes and check that they agree
 */
function executeBoth(s: Script<unknown>, args: readonly string[] = []): ExecutionResult {
  const multiline = executeShell(script(s), args);
  const linear = executeShell(linearScript(s), args);
  expect(linear).toEqual(multiline);
  return multiline;
}

const hasShell = spawnSync("sh", ["-c", ":"]).status === 0;

describe.skipIf(!hasShell)("conformance", () => {
  // ===========================================================================
  // Quoting
  // ===========================================================================

  describe("quoting", () => {
    it("passes every text through the shell unchanged", () => {
      const samples = [
        "",
        "plain",
        "two words",
        "it's",
        "''",
        `say "hi"`,
        "$PATH and ${HOME}",
        "`uname`",
        "back\\slash",
        "tab\there",
        "line one\nline two",
        "*?[]",
        "~user",
        "a=b",
        "-n",
      ];
      for (const sample of samples) {
        expect(executeBoth(cmd("printf", "%s", sample)).stdout).toBe(sample);
      }
    });
  });

  // ===========================================================================
  // Grouping
  // ===========================================================================

  describe("nested lists", () => {
    it("runs the right side of && as one list", () => {
      const s = and(cmd("false"), or(cmd("false"), cmd("echo", "reached")));
      const result = executeBoth(s);
      expect(result.stdout).toBe("");
      expect(result.code).toBe(1);
    });

    it("pipes the whole of a list", () => {
      const s = pipe(and(cmd("echo", "a"), cmd("echo", "b")), cmd("tr", "a-z", "A-Z"));
      expect(executeBoth(s).stdout).toBe("A\nB\n");
    });
  });

  // ===========================================================================
  // Here-documents
  // ===========================================================================

  describe("here-documents", () => {
    it("keeps the body literal in both modes", () => {
      expect(executeBoth(hereDocument(cmd("cat"), "cost $HOME\n")).stdout).toBe("cost $HOME\n");
    });

    it("feeds a reader inside a pipe", () => {
      const s = pipe(hereDocument(cmd("cat"), "one\ntwo"), cmd("tr", "a-z", "A-Z"));
      expect(executeBoth(s).stdout).toBe("ONE\nTWO\n");
    });

    it("survives a body containing the default delimiter", () => {
      expect(executeBoth(hereDocument(cmd("cat"), "EOF\nend\n")).stdout).toBe("EOF\nend\n");
    });
  });

  // ===========================================================================
  // Failure handling
  // ===========================================================================

  describe("failure handling", () => {
    it("always exits 0 after ignoreFailure", () => {
      const s = ignoreFailure(sequence([
        cmd("false"),
        and(cmd("true"), cmd("false")),
        or(cmd("false"), cmd("false")),
        pipe(cmd("true"), cmd("false")),
      ]));
      expect(executeBoth(s).code).toBe(0);
    });

    it("keeps every command in order under set -e", () => {
      const s = sequence([
        stopOnFailure(true),
        ignoreFailure(sequence([cmd("echo", "one"), cmd("false"), cmd("echo", "two")])),
      ]);
      expect(executeBoth(s)).toEqual({ stdout: "one\ntwo\n", stderr: "", code: 0 });
    });

    it("stops at the first failure under set -e", () => {
      const s = sequence([stopOnFailure(true), cmd("echo", "one"), cmd("false"), cmd("echo", "two")]);
      expect(executeBoth(s)).toEqual({ stdout: "one\n", stderr: "", code: 1 });
    });
  });

  // ===========================================================================
  // Control flow
  // ===========================================================================

  describe("control flow", () => {
    it("loops over words", () => {
      const s = forCmd(cmd("echo", "1 2 3"), (x) => cmd("echo", "item", x));
      expect(executeBoth(s).stdout).toBe("item 1\nitem 2\nitem 3\n");
    });

    it("skips a loop whose condition fails", () => {
      expect(executeBoth(whileCmd(cmd("echo", "false"), cmd("echo", "never")))).toEqual({
        stdout: "",
        stderr: "",
        code: 0,
      });
    });

    it("picks the matching branch", () => {
      const branch = (test: string) => ifCmd(cmd("test", test, "x"), cmd("echo", "yes"), cmd("echo", "no"));
      expect(executeBoth(branch("-n")).stdout).toBe("yes\n");
      expect(executeBoth(branch("-z")).stdout).toBe("no\n");
      expect(executeBoth(unlessCmd(cmd("false"), cmd("echo", "ran"))).stdout).toBe("ran\n");
    });

    it("dispatches on case patterns", () => {
      const dispatch = (word: string) =>
        steps((run) => {
          const v = run(newVarContaining(word, "word"));
          run(caseOf(v, [
            [glob("ook"), cmd("echo", "got ook")],
            [glob("*"), cmd("echo", "default")],
          ]));
        });
      expect(executeBoth(dispatch("ook")).stdout).toBe("got ook\n");
      expect(executeBoth(dispatch("other")).stdout).toBe("default\n");
    });

    it("matches a pattern containing a newline", () => {
      const s = steps((run) => {
        const v = run(newVarContaining("two\nlines", "word"));
        run(caseOf(v, [
          [glob("two\nl*"), cmd("echo", "matched")],
          [glob("*"), cmd("echo", "default")],
        ]));
      });
      expect(executeBoth(s).stdout).toBe("matched\n");
    });

    it("calls functions with parameters", () => {
      const s = steps((run) => {
        const greet = run(func("greet", steps((run) => {
          const who = run(takeParameter<string>("who"));
          run(cmd("echo", "hello", who));
        })));
        run(greet("world"));
        run(greet("over there"));
      });
      expect(executeBoth(s).stdout).toBe("hello world\nhello over there\n");
    });
  });

  // ===========================================================================
  // Variables and arithmetic
  // ===========================================================================

  describe("expansions", () => {
    it("expands defaults and lengths", () => {
      const s = steps((run) => {
        const name = run(newVar<string>("name"));
        const fallback = run(defaultVar(name, "anon"));
        run(cmd("echo", fallback, run(lengthVar(fallback)), run(lengthVar(name))));
      });
      expect(executeBoth(s).stdout).toBe("anon 4 0\n");
    });

    it("trims patterns", () => {
      const s = steps((run) => {
        const path = run(newVarContaining("/usr/local/bin", "path"));
        run(cmd("echo", run(trimVar<string>("longest", "fromEnd", path, glob("/l*")))));
        run(cmd("echo", run(trimVar<string>("shortest", "fromBeginning", path, glob("*/")))));
      });
      expect(executeBoth(s).stdout).toBe("/usr\nusr/local/bin\n");
    });

    it("reads positional parameters", () => {
      const s = steps((run) => {
        const first = run(takeParameter<string>("first"));
        run(cmd("echo", first));
      });
      expect(executeBoth(s, ["a b", "c"]).stdout).toBe("a b\n");
    });

    it("evaluates arithmetic", () => {
      const s = steps((run) => {
        const n = run(newVarContaining(-5, "n"));
        run(cmd("echo", plus(num(2), mult(num(3), num(4)))));
        run(cmd("echo", cond(lt(avar(n), num(0)), negate(avar(n)), avar(n))));
      });
      expect(executeBoth(s).stdout).toBe("14\n5\n");
    });

    it("substitutes command output", () => {
      expect(executeBoth(cmd("echo", "user:", output(cmd("echo", "me")))).stdout).toBe("user: me\n");
    });
  });

  // ===========================================================================
  // Redirections
  // ===========================================================================

  describe("redirections", () => {
    it("sends output to stderr", () => {
      expect(executeBoth(toStderr(cmd("echo", "oops")))).toEqual({ stdout: "", stderr: "oops\n", code: 0 });
    });

    it("redirects to and from files", () => {
      expect(executeBoth(toFile(cmd("echo", "gone"), "/dev/null")).stdout).toBe("");
      expect(executeBoth(fromFile(cmd("cat"), "/dev/null")).stdout).toBe("");
      expect(executeBoth(toFile(cmd("ls", "/nonexistent-dir"), [stdError, "/dev/null"])).stderr).toBe("");
    });
  });
});

/**
 * Tests for shell quoting
 */

import { describe, expect, it } from "vitest";
import { glob, Quoted, quote } from "./quote.ts";

/**
 * Undo POSIX quoting of a single word made of bare safe characters,
 * single-quoted segments and double-quoted segments without expansions.
 */
function unquote(word: string): string {
  let result = "";
  let i = 0;
  while (i < word.length) {
    const char = word[i];
    if (char === "'" || char === '"') {
      const end = word.indexOf(char, i + 1);
      if (end < 0) throw new Error(`unterminated ${char} in ${word}`);
      const segment = word.slice(i + 1, end);
      if (char === '"' && /[$`\\]/.test(segment)) {
        throw new Error(`expansion inside double quotes in ${word}`);
      }
      result += segment;
      i = end + 1;
    } else if (char !== undefined && /[A-Za-z0-9_.,/:@%+-]/.test(char)) {
      result += char;
      i++;
    } else {
      throw new Error(`unquoted special character ${JSON.stringify(char)} in ${word}`);
    }
  }
  return result;
}

// =============================================================================
// quote
// =============================================================================

describe("quote", () => {
  it("leaves safe words unquoted", () => {
    expect(quote("hello").text).toBe("hello");
    expect(quote("/dev/null").text).toBe("/dev/null");
    expect(quote("-la").text).toBe("-la");
  });

  it("quotes the empty string", () => {
    expect(quote("").text).toBe("''");
  });

  it("single-quotes words with spaces and metacharacters", () => {
    expect(quote("hello world").text).toBe("'hello world'");
    expect(quote("$HOME").text).toBe("'$HOME'");
    expect(quote("a;b").text).toBe("'a;b'");
  });

  it("quotes assignment-looking words so they stay commands", () => {
    expect(quote("a=b").text).toBe("'a=b'");
  });

  it("escapes embedded single quotes", () => {
    expect(quote("it's").text).toBe(`'it'"'"'s'`);
  });

  it("round-trips awkward text", () => {
    const samples = [
      "",
      "plain",
      "two words",
      "it's",
      "'",
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
    ];
    for (const sample of samples) {
      expect(unquote(quote(sample).text)).toBe(sample);
    }
  });
});

// =============================================================================
// glob
// =============================================================================

describe("glob", () => {
  it("passes alphanumerics and wildcards through", () => {
    expect(glob("*").text).toBe("*");
    expect(glob("file?[0-9]").text).toBe("file?[0-9]");
    expect(glob("[!a]*").text).toBe("[!a]*");
  });

  it("escapes everything else", () => {
    expect(glob("my file*").text).toBe("my\\ file*");
    expect(glob("*.txt").text).toBe("*\\.txt");
    expect(glob("a'b").text).toBe("a\\'b");
  });

  it("single-quotes newlines", () => {
    expect(glob("a\nb*").text).toBe("a'\n'b*");
  });
});

// =============================================================================
// Quoted
// =============================================================================

describe("Quoted", () => {
  it("concatenates fragments", () => {
    expect(Quoted.concat(quote("/home/"), new Quoted('"$USER"')).text).toBe('/home/"$USER"');
  });

  it("converts to its text", () => {
    expect(String(quote("a b"))).toBe("'a b'");
  });
});

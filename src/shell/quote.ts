/**
 * Shell Quoting
 *
 * Turns arbitrary text into shell words that can be spliced into
 * generated source without further escaping.
 */

// =============================================================================
// Quoted Text
// =============================================================================

/**
 * Text that is safe to splice unescaped into shell source.
 *
 * Constructing one directly is the caller's promise that the text is
 * already valid shell syntax; `quote` and `glob` build it from raw text.
 */
export class Quoted {
  constructor(readonly text: string) {}

  /** Concatenate quoted fragments into one */
  static concat(...parts: Quoted[]): Quoted {
    return new Quoted(parts.map((p) => p.text).join(""));
  }

  toString(): string {
    return this.text;
  }
}

// =============================================================================
// Quoting
// =============================================================================

const SAFE_WORD = /^[A-Za-z0-9_.,/:@%+-]+$/;

/**
 * Quote text as a single shell word whose expansion is exactly the input.
 *
 * @example
 * quote("hello")        // hello
 * quote("it's here")    // 'it'"'"'s here'
 * quote("")             // ''
 */
export function quote(text: string): Quoted {
  if (text === "") {
    return new Quoted("''");
  }
  if (SAFE_WORD.test(text)) {
    return new Quoted(text);
  }
  return new Quoted("'" + text.replace(/'/g, `'"'"'`) + "'");
}

const GLOB_CHARS = new Set(["*", "?", "[", "!", "-", ":", "]", "\\"]);

/**
 * Treat text as a glob pattern.
 *
 * Alphanumerics and wildcard characters pass through; everything else is
 * backslash-escaped (newlines single-quoted), so a pattern may contain
 * spaces or quotes.
 */
export function glob(pattern: string): Quoted {
  let result = "";
  for (const char of pattern) {
    if (/^[\p{L}\p{N}]$/u.test(char) || GLOB_CHARS.has(char)) {
      result += char;
    } else if (char === "\n") {
      // A backslash before a newline would join the lines
      result += "'\n'";
    } else {
      result += "\\" + char;
    }
  }
  return new Quoted(result);
}

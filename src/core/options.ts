/**
 * Script Options
 *
 * User-facing render options and their resolved, validated form.
 */

import { z } from "zod";
import { invalidOptions } from "./errors.ts";

// =============================================================================
// Schema
// =============================================================================

export const ScriptOptionsSchema = z.object({
  /** Interpreter line written at the top of a multi-line script */
  shebang: z
    .string()
    .startsWith("#!", "shebang must start with '#!'")
    .refine((s) => !s.includes("\n"), "shebang must be a single line")
    .optional(),
  /** Indent unit for nested blocks (default: a tab) */
  indent: z
    .string()
    .regex(/^[ \t]*$/, "indent may only contain spaces and tabs")
    .optional(),
}).strict();

export type ScriptOptions = z.input<typeof ScriptOptionsSchema>;

export interface ResolvedOptions {
  shebang: string;
  indent: string;
}

export const DEFAULT_SHEBANG = "#!/bin/sh";
export const DEFAULT_INDENT = "\t";

// =============================================================================
// Resolution
// =============================================================================

export function resolveOptions(options?: ScriptOptions): ResolvedOptions {
  const parsed = ScriptOptionsSchema.safeParse(options ?? {});
  if (!parsed.success) {
    throw invalidOptions(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message
      ),
    );
  }

  return {
    shebang: parsed.data.shebang ?? DEFAULT_SHEBANG,
    indent: parsed.data.indent ?? DEFAULT_INDENT,
  };
}

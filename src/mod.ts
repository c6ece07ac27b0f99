/**
 * shellgen - typed POSIX shell script generation
 *
 * @module
 */

export * from "./shell/mod.ts";

export { type ErrorCode, type ErrorDetails, ShellGenError } from "./core/errors.ts";
export {
  type ResolvedOptions,
  resolveOptions,
  type ScriptOptions,
  ScriptOptionsSchema,
} from "./core/options.ts";
export { logger } from "./core/logger.ts";

/**
 * Library logger
 *
 * Silent unless SHELLGEN_LOG_LEVEL is set (e.g. "debug" or "trace").
 */

import { pino } from "pino";

export const logger = pino({
  name: "shellgen",
  level: process.env.SHELLGEN_LOG_LEVEL ?? "silent",
});

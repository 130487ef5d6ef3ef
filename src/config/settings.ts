import process from "node:process";

import { LOG_LEVELS, type LogLevel } from "../logger.js";
import type { MalformedLinePolicy } from "../io/edgeList.js";
import { readBool, readEnum, readOptionalString, type EnvSource } from "./env.js";

/** Settings resolved from the environment before CLI flags are applied. */
export interface GraphSettings {
  readonly directed: boolean;
  readonly onMalformedLine: MalformedLinePolicy;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
}

/**
 * Resolves `GRAPH_DIRECTED`, `GRAPH_SKIP_MALFORMED`, `GRAPH_LOG_LEVEL` and
 * `GRAPH_LOG_FILE`.
 */
export function loadSettings(env: EnvSource = process.env): GraphSettings {
  return {
    directed: readBool("GRAPH_DIRECTED", false, env),
    onMalformedLine: readBool("GRAPH_SKIP_MALFORMED", false, env) ? "skip" : "abort",
    logLevel: readEnum("GRAPH_LOG_LEVEL", LOG_LEVELS, "warn", env),
    logFile: readOptionalString("GRAPH_LOG_FILE", env) ?? null,
  };
}

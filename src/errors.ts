import { z } from "zod";

import { GraphEngineError } from "./graph/errors.js";

/** Longest message or hint kept in a normalised error. */
const ERROR_TEXT_MAX_LENGTH = 240;

/**
 * Machine readable representation of a thrown value, printed by the CLI and
 * attached to `*_failed` log entries.
 */
export interface NormalisedError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

export const INVALID_INPUT_CODE = "E-CLI-INPUT";
export const UNEXPECTED_CODE = "E-UNEXPECTED";

function collapse(text: string): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  if (collapsed.length <= ERROR_TEXT_MAX_LENGTH) {
    return collapsed;
  }
  return `${collapsed.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Errors raised by `node:fs` carry a string `code` such as `ENOENT`. */
function readErrnoCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

/**
 * Normalises an arbitrary error. Engine errors keep their own code, hint and
 * details; zod validation errors map to {@link INVALID_INPUT_CODE}; file-system
 * errors keep their errno code.
 */
export function describeError(error: unknown): NormalisedError {
  if (error instanceof GraphEngineError) {
    return {
      code: error.code,
      message: collapse(error.message),
      hint: collapse(error.hint),
      details: error.details,
    };
  }
  if (error instanceof z.ZodError) {
    return {
      code: INVALID_INPUT_CODE,
      message: collapse(error.issues.map((issue) => issue.message).join("; ")),
      hint: "invalid_input",
      details: { issues: error.issues },
    };
  }
  if (error instanceof Error) {
    const errno = readErrnoCode(error);
    return errno === undefined
      ? { code: UNEXPECTED_CODE, message: collapse(error.message) }
      : { code: errno, message: collapse(error.message) };
  }
  return { code: UNEXPECTED_CODE, message: collapse(String(error)) || "unexpected error" };
}

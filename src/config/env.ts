import process from "node:process";

/**
 * Helpers reading `GRAPH_*` environment variables with consistent coercion
 * rules. Unset, blank or unrecognised values resolve to the caller's default.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Environment source; tests pass a plain record instead of mutating `process.env`. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Trims the raw value, treating blank strings as unset. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Returns an optional boolean when {@link name} holds one of the accepted
 * literals ("1", "true", "yes", "on" and their falsy counterparts).
 */
export function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

/** Returns the trimmed value of {@link name}, or `undefined` when unset or blank. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively and
 * falling back to {@link defaultValue} for anything else.
 */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower) ?? defaultValue;
}

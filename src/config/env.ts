/**
 * Readers for `CI_TOOLBOX_*` and credential variables. Every reader takes the
 * environment as a parameter so option parsing stays testable without
 * mutating `process.env`.
 */
export type EnvSource = Record<string, string | undefined>;

/** Trimmed value, or `undefined` for unset and blank variables. */
function lookup(env: EnvSource, name: string): string | undefined {
  const raw = env[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

export interface IntegerBounds {
  readonly min?: number;
  readonly max?: number;
}

/**
 * Base-10 integer within {@link bounds}. Values that are not plain integer
 * literals, or fall outside the bounds, read as unset.
 */
export function readOptionalInt(
  name: string,
  bounds: IntegerBounds = {},
  env: EnvSource = process.env,
): number | undefined {
  const value = lookup(env, name);
  if (value === undefined || !/^[-+]?\d+$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) {
    return undefined;
  }
  if ((bounds.min !== undefined && parsed < bounds.min) || (bounds.max !== undefined && parsed > bounds.max)) {
    return undefined;
  }
  return parsed;
}

export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return lookup(env, name);
}

/** Case-insensitive match against {@link allowed}; returns the canonical spelling. */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const value = lookup(env, name)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  return allowed.find((candidate) => candidate.toLowerCase() === value);
}

/**
 * Readers for `IRPLAN_*` environment variables. Every reader trims the raw
 * value, treats blank strings as unset and falls back to the supplied default
 * when the literal cannot be interpreted.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(name: string): boolean | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
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

/**
 * Reads the variable as a boolean. "1", "true", "yes", "on" are truthy and
 * "0", "false", "no", "off" falsy; anything else yields the default.
 */
export function readBool(name: string, defaultValue: boolean): boolean {
  return readOptionalBool(name) ?? defaultValue;
}

export interface NumberBounds {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, bounds: NumberBounds | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (bounds?.min !== undefined && value < bounds.min) {
    return false;
  }
  if (bounds?.max !== undefined && value > bounds.max) {
    return false;
  }
  return true;
}

/** Reads a base-10 integer; out-of-range or malformed literals yield the default. */
export function readInt(name: string, defaultValue: number, bounds?: NumberBounds): number {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return defaultValue;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return defaultValue;
  }
  return withinBounds(value, bounds) ? value : defaultValue;
}

/** Reads a finite floating-point number; invalid input yields the default. */
export function readNumber(name: string, defaultValue: number, bounds?: NumberBounds): number {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const value = Number(normalised);
  return withinBounds(value, bounds) ? value : defaultValue;
}

/** Returns the trimmed value when {@link name} is set to a non-empty string. */
export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively and
 * returning the canonical spelling, or the default when absent or unknown.
 */
export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower) ?? defaultValue;
}

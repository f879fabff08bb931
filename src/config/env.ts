/**
 * Readers for environment variables. Every reader trims the raw value, treats
 * blank strings as unset and falls back to the caller's default whenever the
 * literal cannot be coerced.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Returns the trimmed value of {@link name}, or `undefined` when blank/unset. */
function readRaw(name: string): string | undefined {
  const raw = process.env[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Interprets {@link name} as a boolean flag. Accepts `1/true/yes/on` and
 * `0/false/no/off` in any case.
 */
export function readBool(name: string, defaultValue: boolean): boolean {
  return readOptionalBool(name) ?? defaultValue;
}

function readOptionalBool(name: string): boolean | undefined {
  const value = readRaw(name)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  if (TRUE_LITERALS.has(value)) {
    return true;
  }
  if (FALSE_LITERALS.has(value)) {
    return false;
  }
  return undefined;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Reads a base-10 integer; out-of-range or non-integer literals yield the default. */
export function readInt(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

function readOptionalInt(name: string, options?: NumberOptions): number | undefined {
  const value = readRaw(name);
  if (value === undefined || !/^[-+]?\d+$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) {
    return undefined;
  }
  return withinBounds(parsed, options) ? parsed : undefined;
}

/** Reads a floating-point number, e.g. a ratio such as `0.75`. */
export function readNumber(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalNumber(name, options) ?? defaultValue;
}

function readOptionalNumber(name: string, options?: NumberOptions): number | undefined {
  const value = readRaw(name);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return withinBounds(parsed, options) ? parsed : undefined;
}

export function readString(name: string, defaultValue: string): string {
  return readOptionalString(name) ?? defaultValue;
}

/** Returns the trimmed value when {@link name} holds a non-blank string. */
export function readOptionalString(name: string): string | undefined {
  return readRaw(name);
}

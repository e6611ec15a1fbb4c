/**
 * Shared string and query-parameter helpers.
 */

/**
 * Normalize an unknown value to a trimmed non-empty string or null.
 * Accepts `unknown` so it works with JSON bodies, env vars, and query params.
 */
export const normalizeString = (value: unknown): string | null => {
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

/**
 * Parse a boolean-ish string (1/0, true/false, yes/no, on/off).
 * Returns `undefined` for empty or unrecognised input.
 */
export const parseBoolean = (value: string | null | undefined): boolean | undefined => {
  if (!value) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return undefined;
};

/**
 * Parse an integer query parameter. Returns `null` when absent and `undefined`
 * when present but not an integer, so callers can tell "default" from "invalid".
 */
export const parseIntegerParam = (value: string | null | undefined): number | null | undefined => {
  const normalized = normalizeString(value);
  if (normalized === null) {
    return null;
  }

  if (!/^-?\d+$/.test(normalized)) {
    return undefined;
  }

  return Number.parseInt(normalized, 10);
};

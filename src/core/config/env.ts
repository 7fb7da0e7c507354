/**
 * Environment readers for AppConfig. Unset, empty or unusable values fall
 * back to the default so a bad setting never reaches the services.
 */

export const envStr = (key: string, fallback: string): string =>
  process.env[key] || fallback;

/**
 * Integer setting; values that do not parse, or fall below `min`, use the
 * fallback
 */
export const envInt = (
  key: string,
  fallback: number,
  min = Number.MIN_SAFE_INTEGER,
): number => {
  const raw = process.env[key]?.trim();
  if (!raw || !/^-?\d+$/.test(raw)) return fallback;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n >= min ? n : fallback;
};

/** "1", "true", "yes" and "on" (any case) are true; other set values are false */
export const envBool = (key: string, fallback: boolean): boolean => {
  const raw = process.env[key]?.trim();
  if (!raw) return fallback;
  return /^(1|true|yes|on)$/i.test(raw);
};

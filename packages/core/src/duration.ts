/**
 * @module duration
 * Parse human-readable durations used in deskmate.yaml ("8s", "500ms", "1m").
 */

const MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Convert a duration string to milliseconds.
 * A bare integer is taken as milliseconds.
 *
 * @throws {Error} If the string is not a recognised duration
 */
export function parseDuration(duration: string): number {
  const trimmed = duration.trim();

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h)$/);
  const value = match?.[1];
  const unit = match?.[2];
  if (value === undefined || unit === undefined) {
    throw new Error(`Invalid duration format: "${duration}". Expected "8s", "500ms", etc.`);
  }

  return Math.round(parseFloat(value) * (MULTIPLIERS[unit] ?? 1));
}

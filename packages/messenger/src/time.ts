/**
 * UTC timestamp strings in the fixed `YYYY-MM-DDTHH:MM:SS.ffffffZ` layout.
 *
 * Senders embed one of these as the key of every payload. Parsed values are
 * epoch microseconds so that comparisons keep the full six fractional digits,
 * which a `Date` cannot hold.
 */

const UTC_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{6})Z$/;

/** Characters of a server timestamp kept before the microsecond suffix */
const MILLIS_PREFIX_LENGTH = 23;

/**
 * Format a date with millisecond precision and a zero microsecond suffix,
 * e.g. `2019-02-11T03:44:36.179000Z`.
 */
export function formatUtcTime(date: Date): string {
  return date.toISOString().slice(0, MILLIS_PREFIX_LENGTH) + "000Z";
}

/**
 * Parse a fixed-format UTC timestamp into epoch microseconds.
 * @throws on any deviation from the layout or an impossible calendar date
 */
export function parseUtcTime(value: string): number {
  const match = UTC_TIME_PATTERN.exec(value);
  if (!match) {
    throw new Error(`time data '${value}' does not match format YYYY-MM-DDTHH:MM:SS.ffffffZ`);
  }

  const [year, month, day, hour, minute, second, micros] = match.slice(1).map(Number);
  const millis = Date.UTC(year, month - 1, day, hour, minute, second);
  const check = new Date(millis);

  // Date.UTC rolls over out-of-range fields (month 13, Feb 30); reject those
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    throw new Error(`time data '${value}' is not a valid calendar time`);
  }

  return millis * 1000 + micros;
}

/**
 * Bring a server `created` timestamp (`...SS.mmmZ`) into the six-digit layout
 * by keeping its first 23 characters and appending `000Z`.
 */
export function normalizeCreatedTime(created: string): string {
  return created.slice(0, MILLIS_PREFIX_LENGTH) + "000Z";
}

export function microsToDate(micros: number): Date {
  return new Date(Math.floor(micros / 1000));
}

export function gapSeconds(a: number, b: number): number {
  return Math.abs(a - b) / 1_000_000;
}

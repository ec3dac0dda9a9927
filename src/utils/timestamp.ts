/**
 * Timestamp utilities
 *
 * All values use the process local time zone (TZ)
 */

function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * ISO 8601 timestamp with the local offset
 * e.g. 2025-10-30T12:34:56.789-05:00
 */
export function getTimestampWithTimezone(date: Date = new Date()): string {
  const offset = -date.getTimezoneOffset();
  const offsetHours = Math.floor(Math.abs(offset) / 60);
  const offsetMinutes = Math.abs(offset) % 60;
  const offsetSign = offset >= 0 ? "+" : "-";

  return `${formatDate(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}${offsetSign}${pad(offsetHours)}:${pad(offsetMinutes)}`;
}

/**
 * YYYY-MM-DD (local)
 */
export function formatDate(date: Date = new Date()): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * "Last checked" column format: YYYY-MM-DD HH:mm:ss (local)
 *
 * Lexicographic order of these strings is chronological order,
 * which the "not checked since" filter relies on.
 */
export function formatCheckedAt(date: Date = new Date()): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Strict YYYY-MM-DD check (calendar-valid)
 */
export function isValidDateString(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  return (
    date.getFullYear() === Number(year) &&
    date.getMonth() === Number(month) - 1 &&
    date.getDate() === Number(day)
  );
}

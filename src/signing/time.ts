/**
 * Timestamp formats used by the signing schemes. All formats are UTC.
 */

const DAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;

const MONTH_NAMES = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format date as ISO 8601 basic format (YYYYMMDD).
 *
 * @example
 * ```typescript
 * formatDate(new Date('2026-10-19T08:05:09Z')); // '20261019'
 * ```
 */
export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}`;
}

/**
 * Format date as ISO 8601 basic format with time (YYYYMMDDTHHMMSSZ).
 *
 * @example
 * ```typescript
 * formatDateTime(new Date('2026-10-19T08:05:09Z')); // '20261019T080509Z'
 * ```
 */
export function formatDateTime(date: Date): string {
  return (
    `${formatDate(date)}T` +
    `${pad2(date.getUTCHours())}${pad2(date.getUTCMinutes())}${pad2(date.getUTCSeconds())}Z`
  );
}

/**
 * Format date for the `Date` header with a numeric zone
 * (`Mon, 19 Oct 2026 08:05:09 +0000`).
 */
export function formatHttpDate(date: Date): string {
  const day = DAY_NAMES[date.getUTCDay()];
  const month = MONTH_NAMES[date.getUTCMonth()];
  const time = `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
  return `${day}, ${pad2(date.getUTCDate())} ${month} ${date.getUTCFullYear()} ${time} +0000`;
}

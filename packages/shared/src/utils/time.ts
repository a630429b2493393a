/**
 * UTC timestamp helpers for the `YYYY-MM-DD HH:mm:ss` column
 */

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Render a Unix timestamp (seconds) as `YYYY-MM-DD HH:mm:ss` in UTC
 */
export function formatTimestamp(unix: number): string {
  const d = new Date(unix * 1000);
  return (
    `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

/**
 * Parse `YYYY-MM-DD HH:mm:ss` (UTC) into a Unix timestamp in seconds
 *
 * @returns null for text that is not a valid calendar date/time
 */
export function parseTimestamp(text: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const [year = 0, month = 1, day = 1, hour = 0, minute = 0, second = 0] = match
    .slice(1)
    .map(Number);
  const ms = Date.UTC(year, month - 1, day, hour, minute, second);

  // Date.UTC rolls over out-of-range fields (e.g. Feb 30); reject those
  if (formatTimestamp(ms / 1000) !== text) {
    return null;
  }

  return ms / 1000;
}

/**
 * Same as formatTimestamp with a ` UTC` suffix, used in JSON reports
 */
export function formatUtcDatetime(unix: number): string {
  return `${formatTimestamp(unix)} UTC`;
}

/**
 * Time utilities.
 *
 * Version timestamps use local wall-clock time, formatted as 14 digits
 * (YYYYMMDDHHMMSS). Use these functions instead of raw Date formatting.
 */

/**
 * Get current time as Date object.
 */
export function nowDate(): Date {
  return new Date();
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a date as a 14-digit `YYYYMMDDHHMMSS` version timestamp (local time).
 *
 * @example formatVersionTimestamp(new Date(2024, 0, 31, 9, 5, 7)) → '20240131090507'
 */
export function formatVersionTimestamp(date: Date): string {
  return (
    pad(date.getFullYear(), 4) +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

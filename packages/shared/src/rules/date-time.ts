/**
 * Date and time range parsing for form values such as
 * "01 Jan 2024 – 05 Jan 2024" and "08:00:00 - 17:00:00".
 */

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const DATE_PATTERN = /^(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4})$/;
const TIME_PATTERN = /^(\d{1,2}):(\d{1,2}):(\d{1,2})$/;

export const DATE_RANGE_SEPARATOR = '–';
export const TIME_RANGE_SEPARATOR = '-';

/**
 * Parse "D Mon YYYY" (English month abbreviation) into a UTC date.
 * Returns null for malformed text or impossible dates such as 31 Feb.
 */
export function parseDayMonthYear(text: string): Date | null {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) return null;

  const day = parseInt(match[1], 10);
  const month = MONTHS.indexOf(match[2].toLowerCase());
  const year = parseInt(match[3], 10);
  if (month === -1) return null;

  const date = new Date(Date.UTC(year, month, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parse "HH:MM:SS" into seconds since midnight
 */
export function parseClockTime(text: string): number | null {
  const match = TIME_PATTERN.exec(text.trim());
  if (!match) return null;

  const [hours, minutes, seconds] = match.slice(1, 4).map((part) => parseInt(part, 10));
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  return hours * 3600 + minutes * 60 + seconds;
}

export type DateRangeCheck = 'ok' | 'invalid_format' | 'not_ordered';

export function checkDateRange(value: string): DateRangeCheck {
  const parts = value.split(DATE_RANGE_SEPARATOR);
  if (parts.length !== 2) return 'invalid_format';

  const start = parseDayMonthYear(parts[0]);
  const end = parseDayMonthYear(parts[1]);
  if (!start || !end) return 'invalid_format';

  return start.getTime() < end.getTime() ? 'ok' : 'not_ordered';
}

export function isValidTimeRange(value: string): boolean {
  const parts = value.split(TIME_RANGE_SEPARATOR);
  if (parts.length !== 2) return false;
  return parseClockTime(parts[0]) !== null && parseClockTime(parts[1]) !== null;
}

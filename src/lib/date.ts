/**
 * Date Utilities
 * Helper functions for calendar dates and local time
 */

/**
 * A moment reduced to what budget rules look at: the calendar date and the
 * hour of day (0-23) in a given time zone.
 */
export interface LocalInstant {
  date: string;
  hour: number;
}

const DATE_ISO_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

/**
 * Resolve the local date and hour of a moment in a time zone
 *
 * @example
 * toLocalInstant(new Date('2026-03-15T23:30:00Z'), 'Asia/Tokyo') // { date: "2026-03-16", hour: 8 }
 */
export function toLocalInstant(at: Date, timeZone: string): LocalInstant {
  const parts = formatterFor(timeZone).formatToParts(at);
  const part = (type: Intl.DateTimeFormatPartTypes): string => {
    const value = parts.find((p) => p.type === type)?.value;
    if (value === undefined) {
      throw new Error(`Missing ${type} when formatting ${at.toISOString()} in ${timeZone}`);
    }
    return value;
  };

  return {
    date: `${part('year')}-${part('month')}-${part('day')}`,
    hour: parseInt(part('hour'), 10),
  };
}

/**
 * First day of the calendar month of an ISO date
 *
 * @example
 * monthStartISO("2026-10-19") // "2026-10-01"
 */
export function monthStartISO(dateISO: string): string {
  return `${dateISO.slice(0, 7)}-01`;
}

/**
 * Check that a string is a real calendar date in YYYY-MM-DD format
 *
 * @example
 * isDateISO("2026-02-29") // false
 */
export function isDateISO(value: string): boolean {
  const match = DATE_ISO_REGEX.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // setUTCFullYear keeps years 0-99 literal (Date.UTC maps them to 19xx)
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

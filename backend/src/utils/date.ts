import { addDays, format, getISODay, isValid, parseISO } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

/**
 * Calendar-day helpers.
 *
 * A "day" is a plain `yyyy-MM-dd` string in the clinic's time zone. Arithmetic on
 * days never touches instants, so DST transitions cannot shift a day.
 */

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isValidDay(day: string): boolean {
  if (!DAY_PATTERN.test(day)) {
    return false;
  }
  const parsed = parseISO(day);
  return isValid(parsed) && format(parsed, 'yyyy-MM-dd') === day;
}

/** Local calendar day of an instant */
export function localDay(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, 'yyyy-MM-dd');
}

export function shiftDay(day: string, days: number): string {
  return format(addDays(parseISO(day), days), 'yyyy-MM-dd');
}

/** ISO weekday, 1 = Monday ... 7 = Sunday */
export function isoWeekday(day: string): number {
  return getISODay(parseISO(day));
}

export function zonedDateTime(day: string, hour: number, minute: number, timeZone: string): Date {
  const hh = String(hour).padStart(2, '0');
  const mm = String(minute).padStart(2, '0');
  return fromZonedTime(`${day}T${hh}:${mm}:00`, timeZone);
}

/** Half-open instant range [local midnight, next local midnight) */
export function dayBounds(day: string, timeZone: string): { start: Date; end: Date } {
  return {
    start: zonedDateTime(day, 0, 0, timeZone),
    end: zonedDateTime(shiftDay(day, 1), 0, 0, timeZone),
  };
}

/** ISO-8601 with the local offset, e.g. 2024-01-05T10:00:00-08:00 */
export function formatLocalIso(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, "yyyy-MM-dd'T'HH:mm:ssXXX");
}

import { isoWeekday, localDay, shiftDay, zonedDateTime } from '../utils/date';

/**
 * Natural-language appointment time parser
 *
 * Handles the phrases patients actually text back: "tomorrow at 3pm",
 * "Friday 2:30pm for 45 minutes", "next tue 10am for 1.5 hours".
 */

export type ParseStatus = 'ok' | 'no_time_found' | 'invalid_time';

export interface ParsedTime {
  start: Date | null;
  durationMinutes: number | null;
  status: ParseStatus;
}

export const DEFAULT_DURATION_MINUTES = 60;

// Scan order matters: the first alias contained in the text wins.
const WEEKDAY_ALIASES: Array<[alias: string, isoDay: number]> = [
  ['monday', 1], ['mon', 1],
  ['tuesday', 2], ['tues', 2], ['tue', 2],
  ['wednesday', 3], ['wed', 3],
  ['thursday', 4], ['thurs', 4], ['thur', 4], ['thu', 4],
  ['friday', 5], ['fri', 5],
  ['saturday', 6], ['sat', 6],
  ['sunday', 7], ['sun', 7],
];

const TIME_TOKEN = /\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)?\b/gi;
const DURATION_UNIT_AHEAD = /^(?:\.\d+)?\s*(?:m|min|mins|minutes?|h|hr|hrs|hours?)\b/i;
const MINUTES_DURATION = /\b(\d+)\s*(?:minutes|mins|min)\b/i;
const HOURS_DURATION = /\b(\d+(?:\.\d+)?)\s*(?:hours|hour|hrs|hr|h)\b/i;

interface TimeToken {
  hour: number;
  minute: number;
  meridiem: 'am' | 'pm' | null;
  explicit: boolean;
}

function resolveDay(text: string, referenceDay: string): string {
  if (text.includes('tomorrow')) {
    return shiftDay(referenceDay, 1);
  }

  const match = WEEKDAY_ALIASES.find(([alias]) => text.includes(alias));
  if (!match) {
    return referenceDay;
  }

  let delta = (match[1] - isoWeekday(referenceDay) + 7) % 7;
  if (delta === 0 && text.includes('next')) {
    delta = 7;
  }
  return shiftDay(referenceDay, delta);
}

function findTimeToken(text: string): TimeToken | null {
  let fallback: TimeToken | null = null;

  for (const match of text.matchAll(TIME_TOKEN)) {
    const end = (match.index ?? 0) + match[0].length;
    const meridiem = match[3] ? (match[3].toLowerCase() === 'pm' ? 'pm' : 'am') : null;

    // "45 minutes" and "1.5 hours" are durations, not times of day
    if (!meridiem && DURATION_UNIT_AHEAD.test(text.slice(end))) {
      continue;
    }

    const token: TimeToken = {
      hour: Number(match[1]),
      minute: match[2] ? Number(match[2]) : 0,
      meridiem,
      explicit: Boolean(meridiem || match[2]),
    };

    if (token.explicit) {
      return token;
    }
    if (!fallback) {
      fallback = token;
    }
  }

  return fallback;
}

function toTwentyFourHour(token: TimeToken): { hour: number; minute: number } | null {
  if (token.minute < 0 || token.minute > 59) {
    return null;
  }

  if (token.meridiem) {
    if (token.hour < 1 || token.hour > 12) {
      return null;
    }
    let hour = token.hour;
    if (token.meridiem === 'pm' && hour !== 12) hour += 12;
    if (token.meridiem === 'am' && hour === 12) hour = 0;
    return { hour, minute: token.minute };
  }

  // "0:30" is not a time patients write; 24-hour input starts at 1
  if (token.hour < 1 || token.hour > 23) {
    return null;
  }
  return { hour: token.hour, minute: token.minute };
}

export function parseDuration(text: string): number {
  const minutes = MINUTES_DURATION.exec(text);
  if (minutes) {
    return Number(minutes[1]);
  }
  const hours = HOURS_DURATION.exec(text);
  if (hours) {
    return Math.round(Number(hours[1]) * 60);
  }
  return DEFAULT_DURATION_MINUTES;
}

export function parseAppointmentTime(
  text: string | null | undefined,
  referenceNow: Date,
  timeZone: string
): ParsedTime {
  const lowered = (text ?? '').toLowerCase();

  const token = findTimeToken(lowered);
  if (!token) {
    return { start: null, durationMinutes: null, status: 'no_time_found' };
  }

  const time = toTwentyFourHour(token);
  if (!time) {
    return { start: null, durationMinutes: null, status: 'invalid_time' };
  }

  const day = resolveDay(lowered, localDay(referenceNow, timeZone));

  return {
    start: zonedDateTime(day, time.hour, time.minute, timeZone),
    durationMinutes: parseDuration(lowered),
    status: 'ok',
  };
}

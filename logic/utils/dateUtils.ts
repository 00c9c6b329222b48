/**
 * Date and Time Utilities
 *
 * Zone-aware helpers for local calendar days, hours and daily trigger times.
 * All timestamps are epoch milliseconds; all days are ISO dates (yyyy-MM-dd) in a named IANA zone.
 */

import { DateTime, Info } from 'luxon';

/**
 * Milliseconds in one day
 */
export const MILLISECONDS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Milliseconds in one hour
 */
export const MILLISECONDS_PER_HOUR = 60 * 60 * 1000;

/**
 * Milliseconds in one minute
 */
export const MILLISECONDS_PER_MINUTE = 60 * 1000;

/**
 * Minutes in a regular (non-DST-transition) day
 */
export const MINUTES_PER_DAY = 24 * 60;

const DAY_FORMAT = 'yyyy-MM-dd';

export interface DayBounds {
  start: number;
  end: number;
}

export interface TimeOfDay {
  hour: number;
  minute: number;
}

/**
 * Check whether a string names a time zone luxon can resolve
 */
export function isValidTimeZone(zone: string): boolean {
  return Info.isValidIANAZone(zone);
}

/**
 * Local calendar day of a timestamp
 * @param timestamp - Unix timestamp in milliseconds
 * @param zone - IANA zone (e.g. 'Europe/Zurich')
 * @returns ISO date (e.g. "2025-03-30")
 */
export function getLocalDay(timestamp: number, zone: string): string {
  return DateTime.fromMillis(timestamp, { zone }).toFormat(DAY_FORMAT);
}

/**
 * Shift an ISO date by a number of calendar days
 */
export function addDays(day: string, days: number): string {
  return DateTime.fromFormat(day, DAY_FORMAT, { zone: 'UTC' }).plus({ days }).toFormat(DAY_FORMAT);
}

/**
 * Start (inclusive) and end (exclusive) of a local day.
 * DST transition days are 23 or 25 hours long.
 */
export function getDayBounds(day: string, zone: string): DayBounds {
  const start = DateTime.fromFormat(day, DAY_FORMAT, { zone }).startOf('day');
  const end = start.plus({ days: 1 }).startOf('day');
  return { start: start.toMillis(), end: end.toMillis() };
}

/**
 * Local hour of day (0-23) for a timestamp
 */
export function getLocalHour(timestamp: number, zone: string): number {
  return DateTime.fromMillis(timestamp, { zone }).hour;
}

/**
 * Start of the local hour following the one containing `timestamp`
 */
export function getStartOfNextLocalHour(timestamp: number, zone: string): number {
  return DateTime.fromMillis(timestamp, { zone }).startOf('hour').plus({ hours: 1 }).toMillis();
}

/**
 * Local hours (0-23) that exist in a day, in chronological order without repeats.
 * Spring-forward days skip one hour; fall-back days repeat one, which is listed once.
 */
export function getLocalHoursOfDay(day: string, zone: string): Array<number> {
  const { start, end } = getDayBounds(day, zone);
  const hours: Array<number> = [];
  for (let t = start; t < end; t = getStartOfNextLocalHour(t, zone)) {
    const hour = getLocalHour(t, zone);
    if (!hours.includes(hour)) {
      hours.push(hour);
    }
  }
  return hours;
}

/**
 * Parse a "HH:mm" string
 * @throws RangeError if the value is not a valid time of day
 */
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new RangeError(`Invalid time of day "${value}", expected HH:mm`);
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    throw new RangeError(`Invalid time of day "${value}", expected HH:mm`);
  }
  return { hour, minute };
}

/**
 * Calculate milliseconds until the next occurrence of a local wall-clock time.
 * If `now` is exactly at that time, the following day's occurrence is used.
 * @param time - Local time of day
 * @param zone - IANA zone
 * @param now - Current timestamp in milliseconds (defaults to Date.now())
 */
export function getMillisecondsUntilLocalTime(time: TimeOfDay, zone: string, now: number = Date.now()): number {
  const current = DateTime.fromMillis(now, { zone });
  let target = current.set({ hour: time.hour, minute: time.minute, second: 0, millisecond: 0 });
  if (target.toMillis() <= now) {
    target = current.plus({ days: 1 }).set({ hour: time.hour, minute: time.minute, second: 0, millisecond: 0 });
  }
  return target.toMillis() - now;
}

/**
 * Render a timestamp as an ISO string with the zone's offset (e.g. "2025-03-30T18:30:00+02:00")
 */
export function formatLocalIso(timestamp: number, zone: string): string {
  return DateTime.fromMillis(timestamp, { zone }).toISO({ suppressMilliseconds: true }) ?? new Date(timestamp).toISOString();
}

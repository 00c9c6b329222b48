import type { QuantileMembership, QuantileMode, Schedule } from './types';
import { InsufficientCoverageError } from '../utils/errorUtils';
import {
  getLocalHour,
  getLocalHoursOfDay,
  getStartOfNextLocalHour,
  MILLISECONDS_PER_MINUTE,
} from '../utils/dateUtils';

/**
 * Minute-weighted average price for every local hour of day touched by the schedule.
 * An hour spanning several slots averages them by overlap; on fall-back days the repeated hour
 * is accumulated into one value.
 * @returns Map of hour of day (0-23) to average price
 */
export function computeHourlyPrices(schedule: Schedule): Map<number, number> {
  const sums = new Map<number, { weighted: number; minutes: number }>();

  for (const slot of schedule.slots) {
    let cursor = slot.start;
    while (cursor < slot.end) {
      const segmentEnd = Math.min(slot.end, getStartOfNextLocalHour(cursor, schedule.zone));
      const hour = getLocalHour(cursor, schedule.zone);
      const minutes = (segmentEnd - cursor) / MILLISECONDS_PER_MINUTE;
      const entry = sums.get(hour) ?? { weighted: 0, minutes: 0 };
      entry.weighted += slot.price * minutes;
      entry.minutes += minutes;
      sums.set(hour, entry);
      cursor = segmentEnd;
    }
  }

  const hourly = new Map<number, number>();
  for (const hour of [...sums.keys()].sort((a, b) => a - b)) {
    const entry = sums.get(hour);
    if (entry && entry.minutes > 0) {
      hourly.set(hour, entry.weighted / entry.minutes);
    }
  }
  return hourly;
}

/**
 * Threshold price at a quantile of the hourly prices.
 * Sorted ascending; index floor(n * q) for cheapest and floor(n * (1 - q)) for most expensive,
 * clamped to the valid range.
 */
export function getQuantileThreshold(hourlyPrices: ReadonlyArray<number>, quantile: number, mode: QuantileMode): number {
  const sorted = [...hourlyPrices].sort((a, b) => a - b);
  const fraction = mode === 'cheapest' ? quantile : 1 - quantile;
  const index = Math.max(0, Math.min(Math.floor(sorted.length * fraction), sorted.length - 1));
  return sorted[index];
}

/**
 * Classify the hours of a day into the cheapest or most expensive fraction.
 * Hours priced exactly at the threshold are members, so repeated prices can make the set
 * larger than 24 × quantile.
 * @param schedule - Normalized schedule of one day
 * @param quantile - Fraction in (0, 1), e.g. 0.25
 * @param mode - 'cheapest' (at or below threshold) or 'most_expensive' (at or above)
 * @throws RangeError if quantile is outside (0, 1)
 * @throws InsufficientCoverageError if any local hour of the day has no price
 */
export function classifyHours(schedule: Schedule, quantile: number, mode: QuantileMode): QuantileMembership {
  if (!(quantile > 0 && quantile < 1)) {
    throw new RangeError(`Quantile must be between 0 and 1 (exclusive), got ${quantile}`);
  }

  const hourly = computeHourlyPrices(schedule);
  const requiredHours = getLocalHoursOfDay(schedule.day, schedule.zone);
  const missing = requiredHours.filter((hour) => !hourly.has(hour));
  if (missing.length > 0) {
    throw new InsufficientCoverageError(
      `Schedule for ${schedule.day} has no prices for hour(s) ${missing.join(', ')}`,
      { coveredMinutes: schedule.coveredMinutes },
    );
  }

  const thresholdPrice = getQuantileThreshold([...hourly.values()], quantile, mode);
  const memberHours = [...hourly.entries()]
    .filter(([, price]) => (mode === 'cheapest' ? price <= thresholdPrice : price >= thresholdPrice))
    .map(([hour]) => hour)
    .sort((a, b) => a - b);

  const hourlyPrices: Record<number, number> = {};
  for (const [hour, price] of hourly) {
    hourlyPrices[hour] = price;
  }

  return Object.freeze({
    quantile,
    mode,
    thresholdPrice,
    memberHours: Object.freeze(memberHours),
    hourlyPrices: Object.freeze(hourlyPrices),
  });
}

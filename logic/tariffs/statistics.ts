import type { DailyStatistics, NoDataStatistics, Schedule, Slot } from './types';
import { MILLISECONDS_PER_MINUTE } from '../utils/dateUtils';

export const NO_DATA: NoDataStatistics = Object.freeze({ hasData: false, slotsCount: 0, coveredMinutes: 0 });

interface PriceRun {
  price: number;
  minutes: number;
}

/**
 * Group slots by price and sort ascending, giving the minute-resolution price distribution
 * in run-length form
 */
function toSortedRuns(slots: ReadonlyArray<Slot>): Array<PriceRun> {
  return slots
    .map((slot) => ({ price: slot.price, minutes: (slot.end - slot.start) / MILLISECONDS_PER_MINUTE }))
    .sort((a, b) => a.price - b.price);
}

/**
 * Price of the minute at a 0-based rank in the sorted distribution
 */
function priceAtRank(runs: ReadonlyArray<PriceRun>, rank: number): number {
  let seen = 0;
  for (const run of runs) {
    seen += run.minutes;
    if (rank < seen) {
      return run.price;
    }
  }
  return runs[runs.length - 1].price;
}

/**
 * Linear-interpolated quantile over the minute-weighted distribution.
 * Uses rank p * (N - 1) over the N covered minutes.
 * @param runs - Sorted price runs
 * @param totalMinutes - N
 * @param p - Probability in [0, 1]
 */
export function weightedQuantile(runs: ReadonlyArray<PriceRun>, totalMinutes: number, p: number): number {
  const rank = p * (totalMinutes - 1);
  const lowerRank = Math.floor(rank);
  const upperRank = Math.min(lowerRank + 1, totalMinutes - 1);
  const lower = priceAtRank(runs, lowerRank);
  const upper = priceAtRank(runs, upperRank);
  return lower + (upper - lower) * (rank - lowerRank);
}

/**
 * Daily price statistics, weighting every slot by the minutes it covers
 * so a 15-minute slot counts a quarter of a 60-minute slot.
 * @param schedule - Normalized schedule
 * @returns Statistics, or the no-data sentinel for an empty schedule
 */
export function computeDailyStatistics(schedule: Schedule): DailyStatistics {
  const { slots } = schedule;
  if (slots.length === 0) {
    return NO_DATA;
  }

  const runs = toSortedRuns(slots);
  const totalMinutes = runs.reduce((sum, run) => sum + run.minutes, 0);
  const weightedSum = runs.reduce((sum, run) => sum + run.price * run.minutes, 0);

  return Object.freeze({
    hasData: true,
    min: runs[0].price,
    max: runs[runs.length - 1].price,
    avg: weightedSum / totalMinutes,
    median: weightedQuantile(runs, totalMinutes, 0.5),
    q25: weightedQuantile(runs, totalMinutes, 0.25),
    q75: weightedQuantile(runs, totalMinutes, 0.75),
    slotsCount: slots.length,
    coveredMinutes: totalMinutes,
  });
}

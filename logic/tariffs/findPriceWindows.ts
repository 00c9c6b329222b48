import type { PriceWindow, Schedule, Slot, WindowMode } from './types';
import { InsufficientCoverageError } from '../utils/errorUtils';
import { MILLISECONDS_PER_MINUTE } from '../utils/dateUtils';

export interface WindowPair {
  min: PriceWindow;
  max: PriceWindow;
}

/**
 * Price integral (CHF/kWh × minutes) over [from, to), summing the overlap with each slot
 */
function integratePrice(slots: ReadonlyArray<Slot>, from: number, to: number): number {
  let sum = 0;
  for (const slot of slots) {
    if (slot.end <= from) {
      continue;
    }
    if (slot.start >= to) {
      break;
    }
    const overlap = Math.min(slot.end, to) - Math.max(slot.start, from);
    sum += slot.price * (overlap / MILLISECONDS_PER_MINUTE);
  }
  return sum;
}

/**
 * Find the lowest- and highest-average consecutive window of a given length.
 * - Windows start on slot boundaries and must fit inside the covered span
 * - Averages are minute-weighted
 * - On equal averages the earliest window wins
 * @param schedule - Normalized (gap-free) schedule
 * @param windowMinutes - Window length in minutes (e.g. 120 or 240)
 * @throws InsufficientCoverageError if the schedule covers less than the window length
 */
export function findPriceWindows(schedule: Schedule, windowMinutes: number): WindowPair {
  const { slots } = schedule;
  const windowMs = windowMinutes * MILLISECONDS_PER_MINUTE;
  const coveredMs = slots.length > 0 ? slots[slots.length - 1].end - slots[0].start : 0;

  if (windowMs <= 0 || coveredMs < windowMs) {
    throw new InsufficientCoverageError(
      `Schedule for ${schedule.day} covers ${coveredMs / MILLISECONDS_PER_MINUTE} minutes, ${windowMinutes}-minute window requested`,
      { requiredMinutes: windowMinutes, coveredMinutes: coveredMs / MILLISECONDS_PER_MINUTE },
    );
  }

  const spanEnd = slots[slots.length - 1].end;
  let best: { start: number; avg: number } | undefined;
  let worst: { start: number; avg: number } | undefined;

  for (const slot of slots) {
    const start = slot.start;
    const end = start + windowMs;
    if (end > spanEnd) {
      break;
    }
    const avg = integratePrice(slots, start, end) / windowMinutes;
    if (!best || avg < best.avg) {
      best = { start, avg };
    }
    if (!worst || avg > worst.avg) {
      worst = { start, avg };
    }
  }

  // The first slot always yields a candidate because coveredMs >= windowMs
  if (!best || !worst) {
    throw new InsufficientCoverageError(`No ${windowMinutes}-minute window fits the schedule for ${schedule.day}`);
  }

  const toWindow = (found: { start: number; avg: number }, mode: WindowMode): PriceWindow => Object.freeze({
    start: found.start,
    end: found.start + windowMs,
    windowMinutes,
    averagePrice: found.avg,
    mode,
  });

  return { min: toWindow(best, 'min'), max: toWindow(worst, 'max') };
}

/**
 * Convenience wrapper returning only one side of the pair
 */
export function findPriceWindow(schedule: Schedule, windowMinutes: number, mode: WindowMode): PriceWindow {
  const pair = findPriceWindows(schedule, windowMinutes);
  return mode === 'min' ? pair.min : pair.max;
}

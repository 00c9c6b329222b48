import type { Slot } from './types';

/**
 * Consecutive slots sharing one price, merged into a single interval
 */
export interface PriceRun extends Slot {
  slotCount: number;
}

/**
 * Fuse consecutive slots with the same price into runs.
 * - Slots must be sorted by start
 * - A slot extends the current run only if it starts exactly when the run ends and has the same price
 * - Example: 11:00–11:15 0.20, 11:15–11:30 0.20, 11:30–11:45 0.25 -> 11:00–11:30 0.20, 11:30–11:45 0.25
 * @param slots - Sorted slots (may span several days)
 * @returns Runs sorted by start
 */
export function fuseSlots(slots: ReadonlyArray<Slot>): Array<PriceRun> {
  const runs: Array<PriceRun> = [];

  for (const slot of slots) {
    const last = runs[runs.length - 1];
    if (last && last.end === slot.start && last.price === slot.price) {
      last.end = slot.end;
      last.slotCount++;
    } else {
      runs.push({ start: slot.start, end: slot.end, price: slot.price, slotCount: 1 });
    }
  }

  return runs;
}

/**
 * Run containing a moment (start inclusive, end exclusive)
 */
export function findCurrentRun(runs: ReadonlyArray<PriceRun>, now: number): PriceRun | undefined {
  return runs.find((run) => run.start <= now && now < run.end);
}

/**
 * Next moment the price can change:
 * - if currently inside a run: its end
 * - else: the start of the next run after now
 * @returns Timestamp in milliseconds, or undefined when nothing is known after now
 */
export function findNextChange(runs: ReadonlyArray<PriceRun>, now: number): number | undefined {
  const current = findCurrentRun(runs, now);
  if (current) {
    return current.end;
  }
  return runs.find((run) => run.start > now)?.start;
}

import type {
  DailyStatistics,
  DayOffset,
  PriceWindow,
  QuantileMembership,
  QuantileMode,
  Schedule,
  ScheduleIdentifier,
  WindowMode,
} from './types';
import { computeDailyStatistics, NO_DATA } from './statistics';
import { findPriceWindows } from './findPriceWindows';
import { classifyHours } from './classifyHours';
import { fuseSlots, findCurrentRun, findNextChange, type PriceRun } from './priceRuns';
import { buildCalendarEvents, type CalendarEvent } from './calendar';
import { InsufficientCoverageError, extractErrorMessage } from '../utils/errorUtils';
import { addDays, getLocalDay, getLocalHour } from '../utils/dateUtils';

export interface DerivationOptions {
  windowDurations: ReadonlyArray<number>;
  quantileFractions: ReadonlyArray<number>;
}

/**
 * Everything derived from one day's schedule
 */
export interface DayView {
  readonly schedule: Schedule;
  readonly statistics: DailyStatistics;
  readonly windows: ReadonlyArray<PriceWindow>;
  readonly quantiles: ReadonlyArray<QuantileMembership>;
}

export interface DerivationIssue {
  day: string;
  derivation: string;
  message: string;
  /** True when the last-good value was carried over */
  usedFallback: boolean;
}

const QUANTILE_MODES: ReadonlyArray<QuantileMode> = ['cheapest', 'most_expensive'];

/**
 * Run every derivation on a schedule.
 * A window or quantile that fails for lack of coverage falls back to the same derivation
 * in `previous` (when it describes the same day); the others are still computed.
 * @param schedule - Normalized schedule
 * @param options - Window durations and quantile fractions to derive
 * @param previous - Last-good view, used only if it has the same day
 */
export function buildDayView(
  schedule: Schedule,
  options: DerivationOptions,
  previous?: DayView,
): { view: DayView; issues: Array<DerivationIssue> } {
  const fallback = previous && previous.schedule.day === schedule.day ? previous : undefined;
  const issues: Array<DerivationIssue> = [];
  const windows: Array<PriceWindow> = [];
  const quantiles: Array<QuantileMembership> = [];

  for (const duration of options.windowDurations) {
    try {
      const pair = findPriceWindows(schedule, duration);
      windows.push(pair.min, pair.max);
    } catch (error: unknown) {
      if (!(error instanceof InsufficientCoverageError)) {
        throw error;
      }
      const carried = fallback?.windows.filter((w) => w.windowMinutes === duration) ?? [];
      windows.push(...carried);
      issues.push({
        day: schedule.day,
        derivation: `window_${duration}m`,
        message: extractErrorMessage(error),
        usedFallback: carried.length > 0,
      });
    }
  }

  for (const fraction of options.quantileFractions) {
    for (const mode of QUANTILE_MODES) {
      try {
        quantiles.push(classifyHours(schedule, fraction, mode));
      } catch (error: unknown) {
        if (!(error instanceof InsufficientCoverageError)) {
          throw error;
        }
        const carried = fallback?.quantiles.find((q) => q.quantile === fraction && q.mode === mode);
        if (carried) {
          quantiles.push(carried);
        }
        issues.push({
          day: schedule.day,
          derivation: `quantile_${mode}_${fraction}`,
          message: extractErrorMessage(error),
          usedFallback: carried !== undefined,
        });
      }
    }
  }

  const view: DayView = Object.freeze({
    schedule,
    statistics: computeDailyStatistics(schedule),
    windows: Object.freeze(windows),
    quantiles: Object.freeze(quantiles),
  });

  return { view, issues };
}

export interface SnapshotData {
  entryId: string;
  zone: string;
  identifier: ScheduleIdentifier;
  fetchedAt: number;
  days: ReadonlyArray<DayView>;
  /** Fetch time of days carried over from an earlier refresh, keyed by local day */
  dayFetchedAt?: Readonly<Record<string, number>>;
}

/**
 * Published, immutable result of one refresh cycle.
 * Day-relative accessors resolve "today" from `now`, so a snapshot fetched yesterday
 * serves its "tomorrow" as today after midnight.
 */
export class TariffSnapshot {
  readonly entryId: string;
  readonly zone: string;
  readonly identifier: ScheduleIdentifier;
  readonly fetchedAt: number;
  readonly days: ReadonlyArray<DayView>;
  private readonly daysByKey: ReadonlyMap<string, DayView>;
  private readonly fetchedAtByDay: ReadonlyMap<string, number>;
  private readonly runs: ReadonlyArray<PriceRun>;

  constructor(data: SnapshotData) {
    this.entryId = data.entryId;
    this.zone = data.zone;
    this.identifier = data.identifier;
    this.fetchedAt = data.fetchedAt;
    this.days = Object.freeze([...data.days].sort((a, b) => a.schedule.dayStart - b.schedule.dayStart));
    this.daysByKey = new Map(this.days.map((view) => [view.schedule.day, view]));
    this.fetchedAtByDay = new Map(this.days.map((view) => [
      view.schedule.day,
      Math.min(data.dayFetchedAt?.[view.schedule.day] ?? data.fetchedAt, data.fetchedAt),
    ]));
    this.runs = Object.freeze(fuseSlots(this.days.flatMap((view) => view.schedule.slots)));
    Object.freeze(this);
  }

  get tariffName(): string | undefined {
    return this.identifier.kind === 'tariff' ? this.identifier.tariffName : undefined;
  }

  /**
   * View for today or tomorrow relative to `now`
   */
  getDay(day: DayOffset, now: number = Date.now()): DayView | undefined {
    const today = getLocalDay(now, this.zone);
    return this.daysByKey.get(day === 'today' ? today : addDays(today, 1));
  }

  getSchedules(): Array<Schedule> {
    return this.days.map((view) => view.schedule);
  }

  /**
   * When the prices of a local day were fetched. Earlier than `fetchedAt` for a day
   * carried over because the last fetch had no usable prices for it.
   * @param day - ISO date of the local day
   */
  fetchedAtOf(day: string): number | undefined {
    return this.fetchedAtByDay.get(day);
  }

  currentSlot(now: number = Date.now()): PriceRun | null {
    return findCurrentRun(this.runs, now) ?? null;
  }

  currentPrice(now: number = Date.now()): number | null {
    return this.currentSlot(now)?.price ?? null;
  }

  nextChange(now: number = Date.now()): number | null {
    return findNextChange(this.runs, now) ?? null;
  }

  stats(day: DayOffset, now: number = Date.now()): DailyStatistics {
    return this.getDay(day, now)?.statistics ?? NO_DATA;
  }

  todayStats(now: number = Date.now()): DailyStatistics {
    return this.stats('today', now);
  }

  tomorrowStats(now: number = Date.now()): DailyStatistics {
    return this.stats('tomorrow', now);
  }

  window(durationMinutes: number, mode: WindowMode, day: DayOffset = 'today', now: number = Date.now()): PriceWindow | null {
    const view = this.getDay(day, now);
    return view?.windows.find((w) => w.windowMinutes === durationMinutes && w.mode === mode) ?? null;
  }

  quantileMembership(
    fraction: number,
    mode: QuantileMode,
    day: DayOffset = 'today',
    now: number = Date.now(),
  ): QuantileMembership | null {
    const view = this.getDay(day, now);
    return view?.quantiles.find((q) => q.quantile === fraction && q.mode === mode) ?? null;
  }

  /**
   * Whether `now` lies inside today's extreme window
   * @returns null when the window is unknown
   */
  isInWindow(durationMinutes: number, mode: WindowMode, now: number = Date.now()): boolean | null {
    const found = this.window(durationMinutes, mode, 'today', now);
    if (!found) {
      return null;
    }
    return found.start <= now && now < found.end;
  }

  /**
   * Whether the current local hour belongs to today's quantile membership
   * @returns null when the membership is unknown
   */
  isCurrentHourInQuantile(fraction: number, mode: QuantileMode, now: number = Date.now()): boolean | null {
    const membership = this.quantileMembership(fraction, mode, 'today', now);
    if (!membership) {
      return null;
    }
    return membership.memberHours.includes(getLocalHour(now, this.zone));
  }

  calendarEvents(from: number, to: number): Array<CalendarEvent> {
    return buildCalendarEvents(this.runs, from, to, {
      entryId: this.entryId,
      zone: this.zone,
      tariffName: this.tariffName,
    });
  }

  /**
   * Age of the data, the staleness indicator shown next to last-good values
   */
  ageMs(now: number = Date.now()): number {
    return now - this.fetchedAt;
  }

  /**
   * Age of the prices shown for today or tomorrow
   * @returns null when the day has no data
   */
  dayAgeMs(day: DayOffset, now: number = Date.now()): number | null {
    const view = this.getDay(day, now);
    const fetchedAt = view ? this.fetchedAtOf(view.schedule.day) : undefined;
    return fetchedAt === undefined ? null : now - fetchedAt;
  }
}

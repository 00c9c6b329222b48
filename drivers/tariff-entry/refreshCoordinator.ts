import type { RawSlotFetcher, FetchRange } from '../../logic/tariffs/priceSource';
import type { Schedule, ScheduleIdentifier } from '../../logic/tariffs/types';
import type { Logger } from '../../logic/utils/logger';
import type { JsonFileStore } from './jsonFileStore';
import { toScheduleFile, type ScheduleFile } from './storeSchemas';
import { buildSchedule, partitionRecords } from '../../logic/tariffs/normalizeSlots';
import {
  buildDayView,
  TariffSnapshot,
  type DayView,
  type DerivationIssue,
  type DerivationOptions,
} from '../../logic/tariffs/snapshot';
import { computeBackoffDelay, sleep as defaultSleep, type RetryPolicy, type SleepFn } from '../../logic/utils/retry';
import { addDays, getDayBounds, getLocalDay } from '../../logic/utils/dateUtils';
import {
  MalformedScheduleError,
  TransportError,
  describeErrorKind,
  extractErrorMessage,
  isRetryableError,
} from '../../logic/utils/errorUtils';

export type RefreshPhase = 'idle' | 'fetching' | 'normalizing' | 'computing' | 'publishing';

export type RefreshTrigger = 'startup' | 'schedule' | 'manual' | 'ems_link';

export interface RefreshFailure {
  at: number;
  trigger: RefreshTrigger;
  attempt: number;
  kind: string;
  reason: string;
}

export type RefreshResult =
  | { status: 'published'; snapshot: TariffSnapshot; attempts: number; issues: ReadonlyArray<DerivationIssue> }
  | { status: 'failed'; snapshot: TariffSnapshot | undefined; attempts: number; error: unknown }
  | { status: 'aborted'; snapshot: TariffSnapshot | undefined; attempts: number };

export type SnapshotListener = (snapshot: TariffSnapshot) => void;

export interface RefreshCoordinatorOptions {
  entryId: string;
  zone: string;
  identifier: ScheduleIdentifier;
  fetcher: RawSlotFetcher;
  derivation: DerivationOptions;
  retry: RetryPolicy;
  logger: Logger;
  /** Last published schedules survive restarts when a store is given */
  store?: JsonFileStore<ScheduleFile>;
  now?: () => number;
  sleep?: SleepFn;
}

/**
 * Fetch range for a refresh: local midnight today until local midnight two days later
 */
export function getFetchRange(now: number, zone: string): FetchRange {
  const today = getLocalDay(now, zone);
  return {
    start: getDayBounds(today, zone).start,
    end: getDayBounds(addDays(today, 2), zone).start,
  };
}

/**
 * Drives fetch -> normalize -> compute -> publish for one entry.
 *
 * Refreshes are serialized: a trigger arriving while one is in flight receives that
 * refresh's result. The published snapshot is only ever replaced, never mutated, and a
 * failed refresh leaves it untouched.
 */
export class RefreshCoordinator {
  private snapshot?: TariffSnapshot;
  private phase: RefreshPhase = 'idle';
  private lastFailure?: RefreshFailure;
  private inFlight?: Promise<RefreshResult>;
  private abortController?: AbortController;
  private stopped = false;
  private readonly listeners = new Set<SnapshotListener>();
  private readonly now: () => number;
  private readonly sleep: SleepFn;

  constructor(private readonly options: RefreshCoordinatorOptions) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get entryId(): string {
    return this.options.entryId;
  }

  getSnapshot(): TariffSnapshot | undefined {
    return this.snapshot;
  }

  getPhase(): RefreshPhase {
    return this.phase;
  }

  getLastFailure(): RefreshFailure | undefined {
    return this.lastFailure;
  }

  isRefreshing(): boolean {
    return this.inFlight !== undefined;
  }

  /**
   * Listen for published snapshots
   * @returns Unsubscribe function
   */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Rebuild the last-good snapshot from the store, if any
   * @returns True when a snapshot was restored
   */
  async restore(): Promise<boolean> {
    const stored = await this.options.store?.load();
    if (!stored) {
      return false;
    }
    if (stored.entryId !== this.options.entryId) {
      this.options.logger.error(`[STORE] Stored schedules belong to entry "${stored.entryId}", ignoring`);
      return false;
    }

    const days: Array<DayView> = [];
    const dayFetchedAt: Record<string, number> = {};
    for (const entry of stored.schedules) {
      if (entry.zone !== this.options.zone) {
        this.options.logger.log(`[STORE] Skipping stored ${entry.day}: zone ${entry.zone} differs from ${this.options.zone}`);
        continue;
      }
      try {
        const schedule = buildSchedule(entry.slots, { day: entry.day, zone: entry.zone, identifier: entry.identifier });
        days.push(buildDayView(schedule, this.options.derivation).view);
        dayFetchedAt[entry.day] = entry.fetchedAt ?? stored.fetchedAt;
      } catch (error: unknown) {
        this.options.logger.error(`[STORE] Stored schedule for ${entry.day} is unusable:`, extractErrorMessage(error));
      }
    }

    if (days.length === 0) {
      return false;
    }

    this.publish(new TariffSnapshot({
      entryId: this.options.entryId,
      zone: this.options.zone,
      identifier: this.options.identifier,
      fetchedAt: stored.fetchedAt,
      days,
      dayFetchedAt,
    }));
    this.options.logger.log(`[STORE] Restored ${days.length} day(s) fetched at ${new Date(stored.fetchedAt).toISOString()}`);
    return true;
  }

  /**
   * Run a refresh, or join the one in flight
   */
  requestRefresh(trigger: RefreshTrigger): Promise<RefreshResult> {
    if (this.inFlight) {
      this.options.logger.log(`[REFRESH] ${trigger} trigger joined the refresh in progress`);
      return this.inFlight;
    }
    if (this.stopped) {
      return Promise.resolve({ status: 'aborted', snapshot: this.snapshot, attempts: 0 });
    }

    this.inFlight = this.runWithRetry(trigger).finally(() => {
      this.inFlight = undefined;
      this.abortController = undefined;
    });
    return this.inFlight;
  }

  /**
   * Abort the refresh in flight and refuse new ones. Partial results are discarded.
   */
  shutdown(): void {
    this.stopped = true;
    this.abortController?.abort();
    this.listeners.clear();
  }

  private async runWithRetry(trigger: RefreshTrigger): Promise<RefreshResult> {
    const { retry, logger } = this.options;
    const controller = new AbortController();
    this.abortController = controller;

    logger.log(`[REFRESH] Starting refresh (trigger: ${trigger})`);

    for (let attempt = 1; ; attempt++) {
      try {
        const { snapshot, issues } = await this.attemptRefresh(controller.signal);
        logger.log(
          `[REFRESH] Published ${snapshot.days.length} day(s) after ${attempt} attempt(s)`
          + (issues.length > 0 ? `, ${issues.length} derivation issue(s)` : ''),
        );
        return { status: 'published', snapshot, attempts: attempt, issues };
      } catch (error: unknown) {
        this.phase = 'idle';
        if (controller.signal.aborted) {
          logger.log('[REFRESH] Refresh aborted');
          return { status: 'aborted', snapshot: this.snapshot, attempts: attempt };
        }

        this.lastFailure = {
          at: this.now(),
          trigger,
          attempt,
          kind: describeErrorKind(error),
          reason: extractErrorMessage(error),
        };

        if (!isRetryableError(error)) {
          logger.error(`[REFRESH] Attempt ${attempt} failed (${this.lastFailure.kind}), not retrying:`, this.lastFailure.reason);
          return { status: 'failed', snapshot: this.snapshot, attempts: attempt, error };
        }
        if (attempt >= retry.maxAttempts) {
          logger.error(
            `[REFRESH] Giving up after ${attempt} attempt(s), keeping previous data:`,
            this.lastFailure.reason,
          );
          return { status: 'failed', snapshot: this.snapshot, attempts: attempt, error };
        }

        const delay = computeBackoffDelay(attempt, retry);
        logger.error(`[REFRESH] Attempt ${attempt} failed (${this.lastFailure.kind}), retrying in ${delay} ms:`, this.lastFailure.reason);
        try {
          await this.sleep(delay, controller.signal);
        } catch (sleepError: unknown) {
          logger.log('[REFRESH] Refresh aborted during backoff:', extractErrorMessage(sleepError));
          return { status: 'aborted', snapshot: this.snapshot, attempts: attempt };
        }
      }
    }
  }

  private async attemptRefresh(signal: AbortSignal): Promise<{ snapshot: TariffSnapshot; issues: Array<DerivationIssue> }> {
    const { zone, identifier, fetcher, derivation, logger } = this.options;
    const now = this.now();
    const today = getLocalDay(now, zone);
    const previous = this.snapshot;

    this.phase = 'fetching';
    const records = await fetcher.fetch(getFetchRange(now, zone), signal);
    this.throwIfAborted(signal);

    this.phase = 'normalizing';
    const { slots, rejected } = partitionRecords(records, zone);
    for (const { start, reason } of rejected) {
      logger.error(`[SCHEDULE] Rejected price record${start === undefined ? '' : ` for ${getLocalDay(start, zone)}`}: ${reason}`);
    }

    const schedules: Array<{ day: string; schedule?: Schedule; error?: unknown }> = [];
    for (const day of [today, addDays(today, 1)]) {
      const { start: dayStart, end: dayEnd } = getDayBounds(day, zone);
      const invalid = rejected.find(({ start }) => start !== undefined && start >= dayStart && start < dayEnd);
      if (invalid) {
        schedules.push({ day, error: new MalformedScheduleError(invalid.reason) });
        continue;
      }
      try {
        schedules.push({ day, schedule: buildSchedule(slots, { day, zone, identifier }) });
      } catch (error: unknown) {
        if (!(error instanceof MalformedScheduleError)) {
          throw error;
        }
        schedules.push({ day, error });
      }
    }

    if (schedules.every(({ schedule, error }) => error === undefined && (!schedule || schedule.slots.length === 0))) {
      throw new MalformedScheduleError(`No prices returned for ${today} or ${addDays(today, 1)}`);
    }

    this.phase = 'computing';
    const days: Array<DayView> = [];
    const dayFetchedAt: Record<string, number> = {};
    const issues: Array<DerivationIssue> = [];
    for (const { day, schedule, error } of schedules) {
      const previousView = previous?.days.find((view) => view.schedule.day === day);
      if (!schedule || schedule.slots.length === 0) {
        if (previousView && previous) {
          days.push(previousView);
          dayFetchedAt[day] = previous.fetchedAtOf(day) ?? previous.fetchedAt;
        }
        if (error !== undefined) {
          issues.push({ day, derivation: 'schedule', message: extractErrorMessage(error), usedFallback: previousView !== undefined });
        } else if (previousView) {
          issues.push({ day, derivation: 'schedule', message: `No prices returned for ${day}`, usedFallback: true });
        }
        continue;
      }
      if (schedule.partial) {
        logger.log(`[SCHEDULE] ${day} is partial: ${schedule.coveredMinutes} minute(s) covered`);
      }
      const built = buildDayView(schedule, derivation, previousView);
      days.push(built.view);
      issues.push(...built.issues);
    }

    for (const issue of issues) {
      logger.error(
        `[SCHEDULE] ${issue.day} ${issue.derivation}: ${issue.message}`
        + (issue.usedFallback ? ' (using last-good value)' : ''),
      );
    }

    this.throwIfAborted(signal);
    this.phase = 'publishing';
    const snapshot = new TariffSnapshot({
      entryId: this.options.entryId,
      zone,
      identifier,
      fetchedAt: now,
      days,
      dayFetchedAt,
    });
    this.publish(snapshot);
    await this.persist(snapshot);
    this.phase = 'idle';

    return { snapshot, issues };
  }

  private throwIfAborted(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new TransportError('Aborted');
    }
  }

  private publish(snapshot: TariffSnapshot): void {
    this.snapshot = snapshot;
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error: unknown) {
        this.options.logger.error('[REFRESH] Snapshot listener failed:', extractErrorMessage(error));
      }
    }
  }

  private async persist(snapshot: TariffSnapshot): Promise<void> {
    const { store, logger } = this.options;
    if (!store) {
      return;
    }
    try {
      const dayFetchedAt: Record<string, number> = {};
      for (const { day } of snapshot.getSchedules()) {
        dayFetchedAt[day] = snapshot.fetchedAtOf(day) ?? snapshot.fetchedAt;
      }
      await store.save(toScheduleFile(snapshot.entryId, snapshot.fetchedAt, snapshot.getSchedules(), dayFetchedAt));
    } catch (error: unknown) {
      logger.error('[STORE] Failed to save schedules:', extractErrorMessage(error));
    }
  }
}

import type { AppConfig } from './logic/config/config';
import type { TariffSnapshot } from './logic/tariffs/snapshot';
import type { Logger } from './logic/utils/logger';
import type { SleepFn } from './logic/utils/retry';
import type { EmsLinkState } from './drivers/tariff-entry/emsLinkChecker';
import type { RefreshResult } from './drivers/tariff-entry/refreshCoordinator';
import { TariffEntry, type TariffStartListener } from './drivers/tariff-entry/entry';
import { createConsoleLogger } from './logic/utils/logger';
import { TariffError } from './logic/utils/errorUtils';

export interface TariffAppOptions {
  config: AppConfig;
  /** Logger factory, called once for the app and once per entry */
  createLogger?: (scope: string) => Logger;
  fetchFn?: typeof fetch;
  now?: () => number;
  sleep?: SleepFn;
}

export interface EntryRefreshResult {
  entryId: string;
  result: RefreshResult;
}

export interface EntryEmsLinkState {
  entryId: string;
  state: EmsLinkState;
}

export type AppSnapshotListener = (entryId: string, snapshot: TariffSnapshot) => void;

/**
 * Command surface of the service: owns one TariffEntry per configured entry
 */
export class TariffApp {
  private readonly entries = new Map<string, TariffEntry>();
  private readonly logger: Logger;

  constructor(options: TariffAppOptions) {
    const createLogger = options.createLogger ?? ((scope: string) => createConsoleLogger(scope));
    this.logger = createLogger('app');
    for (const entry of options.config.entries) {
      this.entries.set(entry.id, new TariffEntry({
        config: options.config,
        entry,
        logger: createLogger(entry.id),
        fetchFn: options.fetchFn,
        now: options.now,
        sleep: options.sleep,
      }));
    }
  }

  /**
   * Start every entry; resolves once each has finished its startup refresh
   */
  async start(): Promise<Array<EntryRefreshResult>> {
    this.log(`Starting ${this.entries.size} entry(ies)`);
    const results = await Promise.all([...this.entries.values()].map(async (entry) => ({
      entryId: entry.id,
      result: await entry.start(),
    })));
    const failed = results.filter(({ result }) => result.status !== 'published');
    if (failed.length > 0) {
      this.logger.error(`Startup refresh did not publish for: ${failed.map(({ entryId }) => entryId).join(', ')}`);
    }
    this.log('Tariff service has been initialized');
    return results;
  }

  stop(): void {
    for (const entry of this.entries.values()) {
      entry.stop();
    }
    this.log('Tariff service stopped');
  }

  getEntryIds(): Array<string> {
    return [...this.entries.keys()];
  }

  /**
   * Refresh one entry, or every entry when no id is given
   */
  async refresh(entryId?: string): Promise<Array<EntryRefreshResult>> {
    const targets = this.resolveEntries(entryId);
    return Promise.all(targets.map(async (entry) => ({ entryId: entry.id, result: await entry.refresh('manual') })));
  }

  /**
   * Check the EMS link of one entry, or of every OAuth entry when no id is given
   */
  async checkEmsLinkStatus(entryId?: string): Promise<Array<EntryEmsLinkState>> {
    const targets = this.resolveEntries(entryId).filter((entry) => entry.emsChecker !== undefined);
    const states = await Promise.all(targets.map(async (entry) => ({ entryId: entry.id, state: await entry.checkEmsLinkStatus() })));
    return states.flatMap(({ entryId: id, state }) => (state ? [{ entryId: id, state }] : []));
  }

  getSnapshot(entryId: string): TariffSnapshot | undefined {
    return this.getEntry(entryId).getSnapshot();
  }

  onSnapshot(listener: AppSnapshotListener): () => void {
    const unsubscribers = [...this.entries.values()].map((entry) => entry.onSnapshot((snapshot) => listener(entry.id, snapshot)));
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  onTariffStart(listener: TariffStartListener): () => void {
    const unsubscribers = [...this.entries.values()].map((entry) => entry.onTariffStart(listener));
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  getEntry(entryId: string): TariffEntry {
    const entry = this.entries.get(entryId);
    if (!entry) {
      throw new TariffError(`Unknown entry "${entryId}". Configured entries: ${this.getEntryIds().join(', ')}`);
    }
    return entry;
  }

  private resolveEntries(entryId?: string): Array<TariffEntry> {
    return entryId === undefined ? [...this.entries.values()] : [this.getEntry(entryId)];
  }

  private log(message: string): void {
    this.logger.log(message);
  }
}

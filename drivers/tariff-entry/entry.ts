import type { AppConfig, EntryConfig } from '../../logic/config/config';
import type { RawSlotFetcher } from '../../logic/tariffs/priceSource';
import type { ScheduleIdentifier } from '../../logic/tariffs/types';
import type { TariffSnapshot } from '../../logic/tariffs/snapshot';
import type { TokenSet } from '../../logic/auth/tokenProvider';
import type { Logger } from '../../logic/utils/logger';
import type { SleepFn } from '../../logic/utils/retry';
import { resolveScheduleFile, resolveTokenFile } from '../../logic/config/config';
import { PublicTariffSource } from '../../logic/tariffs/sources/publicTariffs';
import { CustomerTariffSource } from '../../logic/tariffs/sources/customerTariffs';
import { OAuthTokenClient } from '../../logic/auth/oauthClient';
import { TokenManager } from '../../logic/auth/tokenManager';
import { getMillisecondsUntilLocalTime, parseTimeOfDay, MILLISECONDS_PER_MINUTE } from '../../logic/utils/dateUtils';
import { extractErrorMessage } from '../../logic/utils/errorUtils';
import { JsonFileStore } from './jsonFileStore';
import { scheduleFileSchema, tokenFileSchema, toTokenSet, type ScheduleFile, type TokenFile } from './storeSchemas';
import { RefreshCoordinator, type RefreshResult, type RefreshTrigger, type SnapshotListener } from './refreshCoordinator';
import { EmsLinkChecker, LINK_REQUIRED, type EmsLinkState } from './emsLinkChecker';

export interface TariffStartEvent {
  entryId: string;
  start: number;
  end: number;
  price: number;
  tariffName?: string;
}

export type TariffStartListener = (event: TariffStartEvent) => void;

export interface TariffEntryOptions {
  config: AppConfig;
  entry: EntryConfig;
  logger: Logger;
  fetchFn?: typeof fetch;
  now?: () => number;
  sleep?: SleepFn;
}

/**
 * One configured tariff entry: its fetcher, coordinator and timers, plus token
 * management and EMS link checks for OAuth entries.
 */
export class TariffEntry {
  readonly id: string;
  readonly coordinator: RefreshCoordinator;
  readonly tokenManager?: TokenManager;
  readonly emsChecker?: EmsLinkChecker;

  private readonly tokenStore?: JsonFileStore<TokenFile>;
  private readonly tariffStartListeners = new Set<TariffStartListener>();
  private readonly unsubscribers: Array<() => void> = [];
  private readonly now: () => number;
  private dailyRefreshTimeout?: NodeJS.Timeout;
  private priceChangeTimeout?: NodeJS.Timeout;
  private emsCheckInterval?: NodeJS.Timeout;
  private started = false;

  constructor(private readonly options: TariffEntryOptions) {
    const { config, entry, logger, fetchFn } = options;
    this.id = entry.id;
    this.now = options.now ?? Date.now;

    let fetcher: RawSlotFetcher;
    let identifier: ScheduleIdentifier;

    if (entry.authType === 'oauth') {
      this.tokenStore = new JsonFileStore<TokenFile>(resolveTokenFile(config, entry), tokenFileSchema, logger);
      const tokenStore = this.tokenStore;
      this.tokenManager = new TokenManager({
        refresher: new OAuthTokenClient({
          tokenUrl: config.tokenUrl,
          clientId: entry.clientId,
          clientSecret: entry.clientSecret,
          fetchFn,
          now: this.now,
        }),
        logger,
        now: this.now,
        onTokenChange: (tokens: TokenSet) => tokenStore.save(tokens),
      });
      fetcher = new CustomerTariffSource(this.tokenManager, {
        emsInstanceId: entry.emsInstanceId,
        zone: entry.timezone,
        includeVat: entry.includeVat,
        baseUrl: config.apiBaseUrl,
        fetchFn,
      });
      identifier = { kind: 'metering_point', meteringPoint: entry.emsInstanceId };
      this.emsChecker = new EmsLinkChecker({
        tokens: this.tokenManager,
        emsInstanceId: entry.emsInstanceId,
        redirectUri: entry.redirectUri,
        baseUrl: config.apiBaseUrl,
        fetchFn,
        logger,
        now: this.now,
      });
    } else {
      fetcher = new PublicTariffSource({
        tariffName: entry.tariffName,
        zone: entry.timezone,
        includeVat: entry.includeVat,
        baseUrl: config.apiBaseUrl,
        fetchFn,
      });
      identifier = { kind: 'tariff', tariffName: entry.tariffName };
    }

    this.coordinator = new RefreshCoordinator({
      entryId: entry.id,
      zone: entry.timezone,
      identifier,
      fetcher,
      derivation: {
        windowDurations: entry.windowDurations,
        quantileFractions: entry.quantileFractions,
      },
      retry: entry.retry,
      logger,
      store: new JsonFileStore<ScheduleFile>(resolveScheduleFile(config, entry), scheduleFileSchema, logger),
      now: this.now,
      sleep: options.sleep,
    });
  }

  /**
   * Restore persisted state, arm timers and run the startup refresh (and EMS check)
   */
  async start(): Promise<RefreshResult> {
    const { entry, logger } = this.options;
    this.started = true;

    await this.restoreTokens();
    if (!this.started) {
      return this.stoppedDuringStart();
    }
    this.unsubscribers.push(this.coordinator.subscribe(() => this.schedulePriceChangeTimer()));
    await this.coordinator.restore();
    if (!this.started) {
      return this.stoppedDuringStart();
    }

    this.scheduleDailyRefresh();

    if (this.emsChecker && entry.authType === 'oauth') {
      this.unsubscribers.push(this.emsChecker.subscribe((state, previous) => this.onEmsLinkChange(state, previous)));
      const intervalMs = entry.emsCheckIntervalMinutes * MILLISECONDS_PER_MINUTE;
      this.emsCheckInterval = setInterval(() => {
        this.checkEmsLinkStatus().catch((error: unknown) => {
          logger.error('[EMS] Scheduled link status check failed:', extractErrorMessage(error));
        });
      }, intervalMs);
      await this.emsChecker.check();
    }

    return this.refresh('startup');
  }

  private stoppedDuringStart(): Promise<RefreshResult> {
    this.options.logger.log('Entry stopped during startup, no timers armed');
    // The coordinator is shut down, so this resolves as aborted
    return this.refresh('startup');
  }

  stop(): void {
    this.started = false;
    if (this.dailyRefreshTimeout) {
      clearTimeout(this.dailyRefreshTimeout);
      this.dailyRefreshTimeout = undefined;
    }
    if (this.priceChangeTimeout) {
      clearTimeout(this.priceChangeTimeout);
      this.priceChangeTimeout = undefined;
    }
    if (this.emsCheckInterval) {
      clearInterval(this.emsCheckInterval);
      this.emsCheckInterval = undefined;
    }
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    this.coordinator.shutdown();
    this.options.logger.log('Entry stopped');
  }

  getSnapshot(): TariffSnapshot | undefined {
    return this.coordinator.getSnapshot();
  }

  onSnapshot(listener: SnapshotListener): () => void {
    return this.coordinator.subscribe(listener);
  }

  onTariffStart(listener: TariffStartListener): () => void {
    this.tariffStartListeners.add(listener);
    return () => {
      this.tariffStartListeners.delete(listener);
    };
  }

  refresh(trigger: RefreshTrigger = 'manual'): Promise<RefreshResult> {
    return this.coordinator.requestRefresh(trigger);
  }

  /**
   * Check the EMS link now
   * @returns The new link state, or undefined for entries without OAuth
   */
  async checkEmsLinkStatus(): Promise<EmsLinkState | undefined> {
    return this.emsChecker?.check();
  }

  private async restoreTokens(): Promise<void> {
    if (!this.tokenManager || !this.tokenStore) {
      return;
    }
    const stored = await this.tokenStore.load();
    if (!stored) {
      this.options.logger.error(`[TOKEN] No token grant found, place one in ${this.tokenStore.filePath}`);
      return;
    }
    const tokens = toTokenSet(stored);
    if (tokens) {
      this.tokenManager.restore(tokens);
    } else {
      await this.tokenManager.authorize({
        accessToken: stored.accessToken,
        refreshToken: stored.refreshToken,
        expiresAt: stored.expiresAt,
      });
    }
  }

  private onEmsLinkChange(state: EmsLinkState, previous: EmsLinkState): void {
    if (previous.status !== LINK_REQUIRED || state.status === LINK_REQUIRED) {
      return;
    }
    this.options.logger.log(`[EMS] Link status changed from ${previous.status} to ${state.status}, refreshing tariffs`);
    this.refresh('ems_link').catch((error: unknown) => {
      this.options.logger.error('[REFRESH] Refresh after EMS linking failed:', extractErrorMessage(error));
    });
  }

  private scheduleDailyRefresh(): void {
    if (!this.started) {
      return;
    }
    const { entry, logger } = this.options;
    const delay = getMillisecondsUntilLocalTime(parseTimeOfDay(entry.refreshTime), entry.timezone, this.now());
    logger.log(`[REFRESH] Next scheduled refresh in ${Math.round(delay / MILLISECONDS_PER_MINUTE)} minute(s)`);

    this.dailyRefreshTimeout = setTimeout(() => {
      this.dailyRefreshTimeout = undefined;
      this.scheduleDailyRefresh();
      this.refresh('schedule').catch((error: unknown) => {
        logger.error('[REFRESH] Scheduled refresh failed:', extractErrorMessage(error));
      });
    }, delay);
  }

  /**
   * Arm a timer for the next price change of the current snapshot
   */
  private schedulePriceChangeTimer(): void {
    if (this.priceChangeTimeout) {
      clearTimeout(this.priceChangeTimeout);
      this.priceChangeTimeout = undefined;
    }
    const snapshot = this.coordinator.getSnapshot();
    if (!this.started || !snapshot) {
      return;
    }
    const changeAt = snapshot.nextChange(this.now());
    if (changeAt === null) {
      return;
    }

    this.priceChangeTimeout = setTimeout(() => {
      this.priceChangeTimeout = undefined;
      this.emitTariffStart(changeAt);
      this.schedulePriceChangeTimer();
    }, Math.max(0, changeAt - this.now()));
  }

  private emitTariffStart(at: number): void {
    const snapshot = this.coordinator.getSnapshot();
    const run = snapshot?.currentSlot(at);
    if (!snapshot || !run) {
      return;
    }
    const event: TariffStartEvent = {
      entryId: this.id,
      start: run.start,
      end: run.end,
      price: run.price,
      tariffName: snapshot.tariffName,
    };
    this.options.logger.log(`[SCHEDULE] Tariff start: ${run.price} CHF/kWh until ${new Date(run.end).toISOString()}`);
    for (const listener of this.tariffStartListeners) {
      try {
        listener(event);
      } catch (error: unknown) {
        this.options.logger.error('[SCHEDULE] Tariff start listener failed:', extractErrorMessage(error));
      }
    }
  }
}

import type { TokenProvider } from '../../logic/auth/tokenProvider';
import type { Logger } from '../../logic/utils/logger';
import { callWithToken } from '../../logic/auth/tokenProvider';
import { fetchEmsLinkStatus } from '../../logic/tariffApi/apiClient';
import { extractErrorMessage } from '../../logic/utils/errorUtils';

export const LINK_REQUIRED = 'link_required';

export type EmsLinkState =
  | { status: 'unknown' }
  | { status: 'linked'; checkedAt: number; linkStatus: string }
  | { status: 'link_required'; checkedAt: number; linkingUrl?: string }
  | { status: 'error'; checkedAt: number; message: string };

export type EmsLinkListener = (state: EmsLinkState, previous: EmsLinkState) => void;

export interface EmsLinkCheckerOptions {
  tokens: TokenProvider;
  emsInstanceId: string;
  redirectUri: string;
  logger: Logger;
  baseUrl?: string;
  fetchFn?: typeof fetch;
  now?: () => number;
}

/**
 * Polls whether the EMS instance is linked to the customer account.
 * Failures are published as the `error` state and never thrown.
 */
export class EmsLinkChecker {
  private state: EmsLinkState = { status: 'unknown' };
  private inFlight?: Promise<EmsLinkState>;
  private readonly listeners = new Set<EmsLinkListener>();
  private readonly now: () => number;

  constructor(private readonly options: EmsLinkCheckerOptions) {
    this.now = options.now ?? Date.now;
  }

  getState(): EmsLinkState {
    return this.state;
  }

  subscribe(listener: EmsLinkListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Check the link status now; concurrent calls share one request
   */
  check(): Promise<EmsLinkState> {
    if (!this.inFlight) {
      this.inFlight = this.performCheck().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async performCheck(): Promise<EmsLinkState> {
    const { tokens, emsInstanceId, redirectUri, baseUrl, fetchFn, logger } = this.options;
    let next: EmsLinkState;

    try {
      const response = await callWithToken(
        tokens,
        (accessToken) => fetchEmsLinkStatus(accessToken, emsInstanceId, redirectUri, { baseUrl, fetchFn }),
        'EMS link status',
      );
      const checkedAt = this.now();
      if (response.link_status === LINK_REQUIRED) {
        next = { status: 'link_required', checkedAt, linkingUrl: response.linking_process_redirect_uri };
        logger.log(`[EMS] Linking required${response.linking_process_redirect_uri ? `: ${response.linking_process_redirect_uri}` : ''}`);
      } else {
        next = { status: 'linked', checkedAt, linkStatus: response.link_status };
        logger.log(`[EMS] Link status: ${response.link_status}`);
      }
    } catch (error: unknown) {
      const message = extractErrorMessage(error);
      next = { status: 'error', checkedAt: this.now(), message };
      logger.error('[EMS] Link status check failed:', message);
    }

    this.setState(next);
    return next;
  }

  private setState(next: EmsLinkState): void {
    const previous = this.state;
    this.state = next;
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error: unknown) {
        this.options.logger.error('[EMS] Listener failed:', extractErrorMessage(error));
      }
    }
  }
}

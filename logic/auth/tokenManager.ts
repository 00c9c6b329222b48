import type { RefreshedToken } from './oauthClient';
import type { TokenProvider, TokenSet, TokenState } from './tokenProvider';
import type { Logger } from '../utils/logger';
import { AuthError, TransportError, extractErrorMessage } from '../utils/errorUtils';
import { MILLISECONDS_PER_DAY, MILLISECONDS_PER_MINUTE } from '../utils/dateUtils';

export const TOKEN_REFRESH_MARGIN_MS = 2 * MILLISECONDS_PER_MINUTE;
export const MAX_REFRESH_USES = 10;
export const REFRESH_TOKEN_VALIDITY_MS = 30 * MILLISECONDS_PER_DAY;

export interface TokenRefresher {
  refresh(refreshToken: string): Promise<RefreshedToken>;
}

/**
 * Tokens obtained out of band (authorization-code exchange)
 */
export interface TokenGrant {
  accessToken: string;
  refreshToken: string;
  /** Access token expiry in milliseconds */
  expiresAt: number;
}

export interface TokenManagerOptions {
  refresher: TokenRefresher;
  logger: Logger;
  now?: () => number;
  /** Called after every change of the token set, e.g. to persist it */
  onTokenChange?: (tokens: TokenSet) => Promise<void> | void;
}

/**
 * Access/refresh token lifecycle.
 *
 * unauthenticated -> valid -> expiring -> refreshing -> valid | failed
 *
 * `failed` is terminal until `authorize()` is called with a new grant. A network failure
 * on the token endpoint leaves the manager `expiring` so the next caller tries again.
 * Concurrent callers share one in-flight refresh.
 */
export class TokenManager implements TokenProvider {
  private tokens?: TokenSet;
  private failureReason?: string;
  private inFlight?: Promise<string>;
  private readonly now: () => number;

  constructor(private readonly options: TokenManagerOptions) {
    this.now = options.now ?? Date.now;
  }

  getState(now: number = this.now()): TokenState {
    if (this.failureReason !== undefined) {
      return 'failed';
    }
    if (this.inFlight) {
      return 'refreshing';
    }
    if (!this.tokens) {
      return 'unauthenticated';
    }
    return now < this.tokens.expiresAt - TOKEN_REFRESH_MARGIN_MS ? 'valid' : 'expiring';
  }

  getTokens(): TokenSet | undefined {
    return this.tokens ? { ...this.tokens } : undefined;
  }

  getFailureReason(): string | undefined {
    return this.failureReason;
  }

  /**
   * Start over with a fresh grant; resets the use count and the 30-day ceiling
   */
  async authorize(grant: TokenGrant): Promise<TokenSet> {
    const tokens: TokenSet = {
      accessToken: grant.accessToken,
      expiresAt: grant.expiresAt,
      refreshToken: grant.refreshToken,
      refreshUsesRemaining: MAX_REFRESH_USES,
      refreshExpiresAt: this.now() + REFRESH_TOKEN_VALIDITY_MS,
    };
    this.failureReason = undefined;
    this.options.logger.log('[TOKEN] Authorized with new grant');
    await this.setTokens(tokens);
    return { ...tokens };
  }

  /**
   * Load a previously persisted token set without notifying listeners
   */
  restore(tokens: TokenSet): void {
    this.tokens = { ...tokens };
    this.failureReason = undefined;
    this.options.logger.log(`[TOKEN] Restored token set, ${tokens.refreshUsesRemaining} refresh use(s) remaining`);
  }

  async currentToken(): Promise<string> {
    const state = this.getState();
    switch (state) {
      case 'failed':
        throw new AuthError(`Token refresh failed permanently: ${this.failureReason}`, { retryable: false });
      case 'unauthenticated':
        throw new AuthError('Not authorized: no token grant available', { retryable: false });
      case 'valid':
        if (this.tokens) {
          return this.tokens.accessToken;
        }
        return this.refresh();
      case 'expiring':
      case 'refreshing':
        return this.refresh();
    }
  }

  async forceRefresh(): Promise<string> {
    if (this.failureReason !== undefined) {
      throw new AuthError(`Token refresh failed permanently: ${this.failureReason}`, { retryable: false });
    }
    if (!this.tokens) {
      throw new AuthError('Not authorized: no token grant available', { retryable: false });
    }
    return this.refresh();
  }

  private refresh(): Promise<string> {
    if (!this.inFlight) {
      this.inFlight = this.performRefresh().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async performRefresh(): Promise<string> {
    const current = this.tokens;
    if (!current) {
      throw new AuthError('Not authorized: no token grant available', { retryable: false });
    }

    const now = this.now();
    if (current.refreshUsesRemaining <= 0) {
      this.fail('refresh token has no uses remaining');
    }
    if (now >= current.refreshExpiresAt) {
      this.fail(`refresh token expired at ${new Date(current.refreshExpiresAt).toISOString()}`);
    }

    this.options.logger.log(`[TOKEN] Refreshing access token (${current.refreshUsesRemaining} use(s) remaining)`);

    let result: RefreshedToken;
    try {
      result = await this.options.refresher.refresh(current.refreshToken);
    } catch (error) {
      if (error instanceof AuthError) {
        this.fail(extractErrorMessage(error));
      }
      this.options.logger.error('[TOKEN] Token endpoint failed, will retry:', extractErrorMessage(error));
      throw error instanceof TransportError
        ? error
        : new TransportError(`Token refresh failed: ${extractErrorMessage(error)}`, { cause: error });
    }

    const next: TokenSet = {
      accessToken: result.accessToken,
      expiresAt: result.expiresAt,
      refreshToken: result.refreshToken ?? current.refreshToken,
      refreshUsesRemaining: current.refreshUsesRemaining - 1,
      refreshExpiresAt: current.refreshExpiresAt,
    };
    this.options.logger.log(`[TOKEN] Access token refreshed, expires at ${new Date(next.expiresAt).toISOString()}`);
    await this.setTokens(next);
    return next.accessToken;
  }

  private fail(reason: string): never {
    this.failureReason = reason;
    this.options.logger.error(`[TOKEN] Token refresh failed permanently: ${reason}`);
    throw new AuthError(`Token refresh failed permanently: ${reason}`, { retryable: false });
  }

  private async setTokens(tokens: TokenSet): Promise<void> {
    this.tokens = tokens;
    if (!this.options.onTokenChange) {
      return;
    }
    try {
      await this.options.onTokenChange({ ...tokens });
    } catch (error) {
      this.options.logger.error('[TOKEN] Failed to persist token set:', extractErrorMessage(error));
    }
  }
}

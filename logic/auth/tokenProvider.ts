import { isAuthError, extractStatusCode } from '../tariffApi/apiClient';
import { AuthError, extractErrorMessage } from '../utils/errorUtils';

export type TokenState = 'unauthenticated' | 'valid' | 'expiring' | 'refreshing' | 'failed';

/**
 * Token material owned by the token manager
 */
export interface TokenSet {
  accessToken: string;
  /** Access token expiry in milliseconds */
  expiresAt: number;
  refreshToken: string;
  refreshUsesRemaining: number;
  /** Hard ceiling for the refresh token, in milliseconds */
  refreshExpiresAt: number;
}

export interface TokenProvider {
  /** Resolves with a usable access token, refreshing first if needed */
  currentToken(): Promise<string>;
  /** Refresh now, regardless of the current token's expiry */
  forceRefresh(): Promise<string>;
}

/**
 * Call an authenticated endpoint; on 401/403 force one token refresh and try again.
 * A second 401/403 becomes a retryable AuthError.
 * @param tokens - Token provider
 * @param call - Request taking an access token
 * @param what - Short label used in the error message
 */
export async function callWithToken<T>(
  tokens: TokenProvider,
  call: (accessToken: string) => Promise<T>,
  what: string,
): Promise<T> {
  const accessToken = await tokens.currentToken();
  try {
    return await call(accessToken);
  } catch (error) {
    if (!isAuthError(error)) {
      throw error;
    }
  }

  const refreshed = await tokens.forceRefresh();
  try {
    return await call(refreshed);
  } catch (error) {
    if (isAuthError(error)) {
      throw new AuthError(`${what} rejected after token refresh: ${extractErrorMessage(error)}`, {
        retryable: true,
        statusCode: extractStatusCode(error),
        cause: error,
      });
    }
    throw error;
  }
}

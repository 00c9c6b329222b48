/**
 * OAuth token endpoint client
 *
 * Only the refresh-token grant lives here; the authorization-code exchange happens
 * out of band and its result is handed to the token manager via `authorize()`.
 */

import { z } from 'zod';
import { parseErrorResponse, truncateErrorMessage } from '../tariffApi/apiClient';
import { AuthError, TransportError, extractErrorMessage } from '../utils/errorUtils';
import { MILLISECONDS_PER_MINUTE } from '../utils/dateUtils';

export const DEFAULT_TOKEN_URL = 'https://login.ekz.ch/auth/realms/myEKZ/protocol/openid-connect/token';
export const DEFAULT_ACCESS_TOKEN_LIFETIME_MS = 30 * MILLISECONDS_PER_MINUTE;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().positive().optional(),
});

export interface RefreshedToken {
  accessToken: string;
  /** Present when the server rotated the refresh token */
  refreshToken?: string;
  expiresAt: number;
}

export interface OAuthClientOptions {
  tokenUrl?: string;
  clientId: string;
  clientSecret: string;
  fetchFn?: typeof fetch;
  now?: () => number;
}

/**
 * Decode JWT exp (best-effort, no verification)
 * @returns Expiry in milliseconds, or undefined when the token carries no readable exp claim
 */
export function decodeAccessTokenExpiry(token: string): number | undefined {
  const segment = token.split('.')[1];
  if (!segment) {
    return undefined;
  }
  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(segment, 'base64url').toString());
  } catch (_error) {
    return undefined;
  }
  if (payload && typeof payload === 'object' && 'exp' in payload && typeof payload.exp === 'number') {
    return payload.exp * 1000;
  }
  return undefined;
}

/**
 * Access token expiry: expires_in when present, else the JWT exp claim, else the default lifetime
 */
export function resolveAccessTokenExpiry(accessToken: string, expiresInSeconds: number | undefined, now: number): number {
  if (expiresInSeconds !== undefined) {
    return now + expiresInSeconds * 1000;
  }
  return decodeAccessTokenExpiry(accessToken) ?? now + DEFAULT_ACCESS_TOKEN_LIFETIME_MS;
}

export class OAuthTokenClient {
  private readonly tokenUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;

  constructor(private readonly options: OAuthClientOptions) {
    this.tokenUrl = options.tokenUrl ?? DEFAULT_TOKEN_URL;
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? Date.now;
  }

  private basicAuthHeader(): string {
    const credentials = `${this.options.clientId}:${this.options.clientSecret}`;
    return `Basic ${Buffer.from(credentials).toString('base64')}`;
  }

  /**
   * Exchange a refresh token for a new access token
   * @throws AuthError (not retryable) when the endpoint rejects the refresh token (400/401)
   * @throws TransportError on network failures and any other status
   */
  async refresh(refreshToken: string): Promise<RefreshedToken> {
    let response: Response;
    try {
      response = await this.fetchFn(this.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: this.basicAuthHeader(),
        },
        body: new URLSearchParams({
          grant_type: 'refresh_token',
          refresh_token: refreshToken,
        }).toString(),
      });
    } catch (error) {
      throw new TransportError(`Token endpoint unreachable: ${extractErrorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const text = truncateErrorMessage(await parseErrorResponse(response));
      if (response.status === 400 || response.status === 401) {
        throw new AuthError(`Refresh token rejected (${response.status}): ${text}`, { statusCode: response.status });
      }
      throw new TransportError(`Token refresh failed ${response.status}: ${text}`, { statusCode: response.status });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransportError(`Invalid token response: ${extractErrorMessage(error)}`, { cause: error });
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError('Invalid response from token endpoint: missing access token');
    }

    const { access_token: accessToken, refresh_token: rotated, expires_in: expiresIn } = parsed.data;
    return {
      accessToken,
      refreshToken: rotated,
      expiresAt: resolveAccessTokenExpiry(accessToken, expiresIn, this.now()),
    };
  }
}

import {
  DEFAULT_ACCESS_TOKEN_LIFETIME_MS,
  OAuthTokenClient,
  decodeAccessTokenExpiry,
  resolveAccessTokenExpiry,
} from '../logic/auth/oauthClient';
import { AuthError, TransportError } from '../logic/utils/errorUtils';
import { createFetchMock, jsonResponse, textResponse } from './testUtils';

const TOKEN_URL = 'https://login.test/token';

function createJwt(payload: object): string {
  const encode = (value: object) => Buffer.from(JSON.stringify(value)).toString('base64url');
  return `${encode({ alg: 'none' })}.${encode(payload)}.signature`;
}

function createClient(fetchFn: typeof fetch): OAuthTokenClient {
  return new OAuthTokenClient({
    tokenUrl: TOKEN_URL,
    clientId: 'client-id',
    clientSecret: 'test-secret',
    fetchFn,
    now: () => 1_000_000,
  });
}

describe('decodeAccessTokenExpiry', () => {
  test('reads the exp claim in milliseconds', () => {
    expect(decodeAccessTokenExpiry(createJwt({ exp: 2000 }))).toBe(2_000_000);
  });

  test('undefined for tokens without a readable exp', () => {
    expect(decodeAccessTokenExpiry('opaque-token')).toBeUndefined();
    expect(decodeAccessTokenExpiry('a.!!!.c')).toBeUndefined();
    expect(decodeAccessTokenExpiry(createJwt({ sub: 'user' }))).toBeUndefined();
    expect(decodeAccessTokenExpiry(createJwt({ exp: 'soon' }))).toBeUndefined();
  });
});

describe('resolveAccessTokenExpiry', () => {
  test('prefers expires_in', () => {
    expect(resolveAccessTokenExpiry(createJwt({ exp: 2000 }), 300, 1_000_000)).toBe(1_300_000);
  });

  test('falls back to the exp claim, then the default lifetime', () => {
    expect(resolveAccessTokenExpiry(createJwt({ exp: 2000 }), undefined, 1_000_000)).toBe(2_000_000);
    expect(resolveAccessTokenExpiry('opaque', undefined, 1_000_000)).toBe(1_000_000 + DEFAULT_ACCESS_TOKEN_LIFETIME_MS);
  });
});

describe('OAuthTokenClient.refresh', () => {
  test('posts the refresh-token grant with basic auth', async () => {
    const fetchFn = createFetchMock(() => jsonResponse({ access_token: 'access-2', refresh_token: 'refresh-2', expires_in: 300 }));

    const result = await createClient(fetchFn).refresh('refresh-1');

    expect(result).toEqual({ accessToken: 'access-2', refreshToken: 'refresh-2', expiresAt: 1_300_000 });
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(TOKEN_URL);
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('grant_type=refresh_token&refresh_token=refresh-1');
    const headers = new Headers(init?.headers);
    expect(headers.get('Authorization')).toBe(`Basic ${Buffer.from('client-id:test-secret').toString('base64')}`);
    expect(headers.get('Content-Type')).toBe('application/x-www-form-urlencoded');
  });

  test('keeps the refresh token undefined when it was not rotated', async () => {
    const fetchFn = createFetchMock(() => jsonResponse({ access_token: 'access-2' }));

    const result = await createClient(fetchFn).refresh('refresh-1');

    expect(result.refreshToken).toBeUndefined();
    expect(result.expiresAt).toBe(1_000_000 + DEFAULT_ACCESS_TOKEN_LIFETIME_MS);
  });

  test.each([400, 401])('%i rejects the refresh token', async (status) => {
    const fetchFn = createFetchMock(() => textResponse('invalid_grant', status));

    const error = await createClient(fetchFn).refresh('refresh-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toHaveProperty('retryable', false);
    expect(error).toHaveProperty('message', `Refresh token rejected (${status}): invalid_grant`);
  });

  test('server errors are transport errors', async () => {
    const fetchFn = createFetchMock(() => textResponse('maintenance', 503));

    const error = await createClient(fetchFn).refresh('refresh-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('statusCode', 503);
    expect(error).toHaveProperty('message', 'Token refresh failed 503: maintenance');
  });

  test('network failures are transport errors', async () => {
    const fetchFn = createFetchMock(() => {
      throw new Error('ECONNRESET');
    });

    await expect(createClient(fetchFn).refresh('refresh-1')).rejects.toThrow('Token endpoint unreachable: ECONNRESET');
  });

  test('responses without an access token are transport errors', async () => {
    const fetchFn = createFetchMock(() => jsonResponse({ token_type: 'Bearer' }));

    await expect(createClient(fetchFn).refresh('refresh-1')).rejects.toBeInstanceOf(TransportError);
  });

  test('non-JSON responses are transport errors', async () => {
    const fetchFn = createFetchMock(() => textResponse('<html>', 200));

    await expect(createClient(fetchFn).refresh('refresh-1')).rejects.toThrow(/^Invalid token response/);
  });
});

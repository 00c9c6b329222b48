import fs from 'fs';
import os from 'os';
import path from 'path';

import { TariffApp } from '../app';
import { parseConfig } from '../logic/config/config';
import type { TariffStartEvent } from '../drivers/tariff-entry/entry';
import {
  DAY,
  createFetchMock,
  createMockLogger,
  jsonResponse,
  loadTariffPayload,
  localTime,
  textResponse,
  type FetchHandler,
} from './testUtils';

const BASE_URL = 'https://tariffs.test/v1';
const TOKEN_URL = 'https://login.test/token';

describe('TariffApp', () => {
  let tempDir: string;
  let app: TariffApp | undefined;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tariff-app-'));
  });

  afterEach(() => {
    app?.stop();
    app = undefined;
    jest.useRealTimers();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function publicConfig() {
    return parseConfig({
      apiBaseUrl: BASE_URL,
      tokenUrl: TOKEN_URL,
      dataDir: tempDir,
      entries: [{ id: 'home', authType: 'public', tariffName: '400D' }],
    });
  }

  const tariffRoutes: FetchHandler = (url) => (
    new URL(url).pathname === '/v1/tariffs' ? jsonResponse(loadTariffPayload()) : textResponse('not found', 404)
  );

  function createApp(config: ReturnType<typeof parseConfig>, handler: FetchHandler, now: () => number) {
    const fetchFn = createFetchMock(handler);
    const logger = createMockLogger();
    app = new TariffApp({
      config,
      createLogger: () => logger,
      fetchFn,
      now,
      sleep: async () => undefined,
    });
    return { app, fetchFn, logger };
  }

  test('start publishes a snapshot per entry', async () => {
    const now = localTime(DAY, '00:30');
    const { app, fetchFn } = createApp(publicConfig(), tariffRoutes, () => now);

    const results = await app.start();

    expect(results).toEqual([{ entryId: 'home', result: expect.objectContaining({ status: 'published', attempts: 1 }) }]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    const snapshot = app.getSnapshot('home');
    expect(snapshot?.currentPrice(localTime(DAY, '02:30'))).toBe(0.05);
    expect(snapshot?.window(120, 'min', 'today', now)?.start).toBe(localTime(DAY, '02:00'));
    expect(fs.existsSync(path.join(tempDir, 'home.schedules.json'))).toBe(true);
  });

  test('manual refresh and snapshot listeners', async () => {
    const now = localTime(DAY, '00:30');
    const { app, fetchFn } = createApp(publicConfig(), tariffRoutes, () => now);
    await app.start();
    const listener = jest.fn();
    app.onSnapshot(listener);

    const results = await app.refresh();

    expect(results.map(({ entryId, result }) => [entryId, result.status])).toEqual([['home', 'published']]);
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenCalledWith('home', app.getSnapshot('home'));
  });

  test('unknown entries are rejected', async () => {
    const { app } = createApp(publicConfig(), tariffRoutes, () => localTime(DAY, '00:30'));

    expect(app.getEntryIds()).toEqual(['home']);
    expect(() => app.getSnapshot('garage')).toThrow('Unknown entry "garage". Configured entries: home');
    await expect(app.refresh('garage')).rejects.toThrow('Unknown entry "garage"');
  });

  test('public entries have no EMS link', async () => {
    const { app } = createApp(publicConfig(), tariffRoutes, () => localTime(DAY, '00:30'));
    await expect(app.checkEmsLinkStatus()).resolves.toEqual([]);
  });

  test('a failed startup refresh is reported', async () => {
    const { app, logger } = createApp(publicConfig(), () => textResponse('down', 503), () => localTime(DAY, '00:30'));

    const [{ result }] = await app.start();

    expect(result.status).toBe('failed');
    expect(result.attempts).toBe(3);
    expect(app.getSnapshot('home')).toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith('Startup refresh did not publish for: home');
  });

  test('restores the last published schedules on restart', async () => {
    const now = localTime(DAY, '00:30');
    const first = createApp(publicConfig(), tariffRoutes, () => now).app;
    await first.start();
    first.stop();

    const { app } = createApp(publicConfig(), () => textResponse('down', 503), () => now);
    const [{ result }] = await app.start();

    expect(result.status).toBe('failed');
    expect(result.snapshot?.currentPrice(localTime(DAY, '02:30'))).toBe(0.05);
    expect(app.getSnapshot('home')).toBe(result.snapshot);
  });

  test('emits tariff start events when the price changes', async () => {
    jest.useFakeTimers({ now: localTime(DAY, '00:30'), doNotFake: ['nextTick', 'queueMicrotask', 'setImmediate'] });
    const { app } = createApp(publicConfig(), tariffRoutes, () => Date.now());
    await app.start();
    const events: Array<TariffStartEvent> = [];
    app.onTariffStart((event) => events.push(event));

    await jest.advanceTimersByTimeAsync(90 * 60 * 1000);

    expect(events).toEqual([{
      entryId: 'home',
      start: localTime(DAY, '02:00'),
      end: localTime(DAY, '04:00'),
      price: 0.05,
      tariffName: '400D',
    }]);

    await jest.advanceTimersByTimeAsync(2 * 60 * 60 * 1000);

    expect(events.map((event) => event.price)).toEqual([0.05, 0.2]);
  });

  test('refreshes daily at the configured time', async () => {
    jest.useFakeTimers({ now: localTime(DAY, '18:00'), doNotFake: ['nextTick', 'queueMicrotask', 'setImmediate'] });
    const { app, fetchFn } = createApp(publicConfig(), tariffRoutes, () => Date.now());
    await app.start();
    expect(fetchFn).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(29 * 60 * 1000);
    expect(fetchFn).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(60 * 1000);
    expect(fetchFn).toHaveBeenCalledTimes(2);

    // Joins the scheduled refresh so it settles before cleanup
    const [{ result }] = await app.refresh('home');
    expect(result.status).toBe('published');
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  describe('OAuth entries', () => {
    const now = localTime(DAY, '00:30');

    function oauthConfig() {
      return parseConfig({
        apiBaseUrl: BASE_URL,
        tokenUrl: TOKEN_URL,
        dataDir: tempDir,
        entries: [{
          id: 'ems',
          authType: 'oauth',
          emsInstanceId: 'ems-1',
          redirectUri: 'https://example.com/ems-linking',
          clientId: 'client-id',
          clientSecret: 'test-secret',
        }],
      });
    }

    function writeGrant(): string {
      const tokenFile = path.join(tempDir, 'ems.tokens.json');
      fs.writeFileSync(tokenFile, JSON.stringify({ accessToken: 'access-1', refreshToken: 'refresh-1', expiresAt: now + 60 * 60 * 1000 }));
      return tokenFile;
    }

    test('refreshes once the EMS gets linked', async () => {
      const tokenFile = writeGrant();
      let linkStatus = 'link_required';
      const { app, fetchFn } = createApp(oauthConfig(), (url) => {
        const { pathname } = new URL(url);
        if (pathname === '/v1/emsLinkStatus') {
          return jsonResponse({ link_status: linkStatus, linking_process_redirect_uri: 'https://login.test/link' });
        }
        if (pathname === '/v1/customerTariffs') {
          return jsonResponse(loadTariffPayload());
        }
        return textResponse('not found', 404);
      }, () => now);
      const customerCalls = () => fetchFn.mock.calls.filter(([input]) => String(input).includes('/customerTariffs')).length;

      const [{ result }] = await app.start();

      expect(result.status).toBe('published');
      expect(result.snapshot?.identifier).toEqual({ kind: 'metering_point', meteringPoint: 'ems-1' });
      expect(customerCalls()).toBe(1);
      const stored: unknown = JSON.parse(fs.readFileSync(tokenFile, 'utf8'));
      expect(stored).toEqual({
        accessToken: 'access-1',
        expiresAt: now + 60 * 60 * 1000,
        refreshToken: 'refresh-1',
        refreshUsesRemaining: 10,
        refreshExpiresAt: now + 30 * 24 * 60 * 60 * 1000,
      });

      linkStatus = 'linked';
      const states = await app.checkEmsLinkStatus();
      expect(states).toEqual([{ entryId: 'ems', state: { status: 'linked', checkedAt: now, linkStatus: 'linked' } }]);

      await app.refresh('ems');
      expect(customerCalls()).toBe(2);
    });

    test('stopping during startup leaves no timers behind', async () => {
      jest.useFakeTimers({ now, doNotFake: ['nextTick', 'queueMicrotask', 'setImmediate'] });
      writeGrant();
      const { app, fetchFn, logger } = createApp(oauthConfig(), () => jsonResponse(loadTariffPayload()), () => now);

      const starting = app.start();
      app.stop();
      const [{ result }] = await starting;

      expect(result).toEqual({ status: 'aborted', snapshot: undefined, attempts: 0 });
      expect(jest.getTimerCount()).toBe(0);
      expect(fetchFn).not.toHaveBeenCalled();
      expect(logger.log).toHaveBeenCalledWith('Entry stopped during startup, no timers armed');
    });

    test('without a token grant the refresh fails with an auth error', async () => {
      const { app, fetchFn, logger } = createApp(oauthConfig(), () => jsonResponse(loadTariffPayload()), () => now);

      const [{ result }] = await app.start();

      expect(result.status).toBe('failed');
      expect(result.attempts).toBe(1);
      expect(fetchFn).not.toHaveBeenCalled();
      expect(logger.error).toHaveBeenCalledWith(`[TOKEN] No token grant found, place one in ${path.join(tempDir, 'ems.tokens.json')}`);
      const [{ state }] = await app.checkEmsLinkStatus('ems');
      expect(state).toEqual({ status: 'error', checkedAt: now, message: 'Not authorized: no token grant available' });
    });
  });
});

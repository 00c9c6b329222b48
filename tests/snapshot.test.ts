import { buildDayView, TariffSnapshot, type DerivationOptions } from '../logic/tariffs/snapshot';
import { NO_DATA } from '../logic/tariffs/statistics';
import { DAY, TOMORROW, TARIFF, ZONE, SCENARIO_PRICES, localTime, scheduleOf } from './testUtils';

const OPTIONS: DerivationOptions = { windowDurations: [120, 240], quantileFractions: [0.25] };

describe('buildDayView', () => {
  test('derives every window and quantile for a full day', () => {
    const { view, issues } = buildDayView(scheduleOf(SCENARIO_PRICES), OPTIONS);

    expect(issues).toEqual([]);
    expect(view.windows.map((w) => [w.windowMinutes, w.mode])).toEqual([
      [120, 'min'],
      [120, 'max'],
      [240, 'min'],
      [240, 'max'],
    ]);
    expect(view.quantiles.map((q) => q.mode)).toEqual(['cheapest', 'most_expensive']);
    expect(view.statistics.hasData).toBe(true);
    expect(Object.isFrozen(view)).toBe(true);
  });

  test('carries quantiles over from the previous view of the same day', () => {
    const previous = buildDayView(scheduleOf(SCENARIO_PRICES), OPTIONS).view;
    const { view, issues } = buildDayView(scheduleOf(SCENARIO_PRICES.slice(0, 20)), OPTIONS, previous);

    expect(view.quantiles).toEqual(previous.quantiles);
    expect(view.windows).toHaveLength(4);
    expect(issues).toEqual([
      expect.objectContaining({ day: DAY, derivation: 'quantile_cheapest_0.25', usedFallback: true }),
      expect.objectContaining({ day: DAY, derivation: 'quantile_most_expensive_0.25', usedFallback: true }),
    ]);
    expect(issues[0].message).toContain('hour(s) 20, 21, 22, 23');
  });

  test('reports the issue without a fallback when nothing is known', () => {
    const { view, issues } = buildDayView(scheduleOf([0.1]), OPTIONS);

    expect(view.windows).toEqual([]);
    expect(view.quantiles).toEqual([]);
    expect(issues.map((issue) => issue.derivation)).toEqual([
      'window_120m',
      'window_240m',
      'quantile_cheapest_0.25',
      'quantile_most_expensive_0.25',
    ]);
    expect(issues.every((issue) => !issue.usedFallback)).toBe(true);
  });

  test('ignores a previous view of another day', () => {
    const previous = buildDayView(scheduleOf(SCENARIO_PRICES, TOMORROW), OPTIONS).view;
    const { view, issues } = buildDayView(scheduleOf(SCENARIO_PRICES.slice(0, 20)), OPTIONS, previous);

    expect(view.quantiles).toEqual([]);
    expect(issues.every((issue) => !issue.usedFallback)).toBe(true);
  });
});

describe('TariffSnapshot', () => {
  const fetchedAt = localTime(DAY, '00:10');
  const snapshot = new TariffSnapshot({
    entryId: 'home',
    zone: ZONE,
    identifier: TARIFF,
    fetchedAt,
    // Given out of order on purpose
    days: [
      buildDayView(scheduleOf(Array<number>(24).fill(0.3), TOMORROW), OPTIONS).view,
      buildDayView(scheduleOf(SCENARIO_PRICES), OPTIONS).view,
    ],
  });

  test('orders days and exposes schedules', () => {
    expect(snapshot.getSchedules().map((s) => s.day)).toEqual([DAY, TOMORROW]);
    expect(snapshot.tariffName).toBe('400D');
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  test('current price and next change', () => {
    const now = localTime(DAY, '02:30');
    expect(snapshot.currentPrice(now)).toBe(0.05);
    expect(snapshot.currentSlot(now)).toEqual({
      start: localTime(DAY, '02:00'),
      end: localTime(DAY, '04:00'),
      price: 0.05,
      slotCount: 2,
    });
    expect(snapshot.nextChange(now)).toBe(localTime(DAY, '04:00'));
  });

  test('next change crosses into tomorrow', () => {
    expect(snapshot.nextChange(localTime(DAY, '23:30'))).toBe(localTime(TOMORROW, '00:00'));
  });

  test('nothing known after the last slot', () => {
    const late = localTime(TOMORROW, '23:59') + 2 * 60 * 1000;
    expect(snapshot.currentPrice(late)).toBeNull();
    expect(snapshot.nextChange(late)).toBeNull();
  });

  test('statistics relative to now', () => {
    const now = localTime(DAY, '12:00');
    const today = snapshot.todayStats(now);
    const tomorrow = snapshot.tomorrowStats(now);
    expect(today.hasData && today.min).toBe(0.05);
    expect(tomorrow.hasData && tomorrow.min).toBe(0.3);
  });

  test('after midnight tomorrow becomes today', () => {
    const now = localTime(TOMORROW, '01:00');
    const today = snapshot.todayStats(now);
    expect(today.hasData && today.max).toBe(0.3);
    expect(snapshot.tomorrowStats(now)).toBe(NO_DATA);
    expect(snapshot.stats('tomorrow', now)).toBe(NO_DATA);
  });

  test('windows', () => {
    const now = localTime(DAY, '02:30');
    expect(snapshot.window(120, 'min', 'today', now)?.start).toBe(localTime(DAY, '02:00'));
    expect(snapshot.window(120, 'min', 'tomorrow', now)?.start).toBe(localTime(TOMORROW, '00:00'));
    expect(snapshot.window(60, 'min', 'today', now)).toBeNull();

    expect(snapshot.isInWindow(120, 'min', now)).toBe(true);
    expect(snapshot.isInWindow(120, 'min', localTime(DAY, '05:00'))).toBe(false);
    expect(snapshot.isInWindow(120, 'max', localTime(DAY, '05:00'))).toBe(true);
    expect(snapshot.isInWindow(60, 'min', now)).toBeNull();
  });

  test('quantile membership of the current hour', () => {
    expect(snapshot.isCurrentHourInQuantile(0.25, 'cheapest', localTime(DAY, '02:30'))).toBe(true);
    expect(snapshot.isCurrentHourInQuantile(0.25, 'most_expensive', localTime(DAY, '02:30'))).toBe(false);
    expect(snapshot.isCurrentHourInQuantile(0.25, 'most_expensive', localTime(DAY, '04:30'))).toBe(true);
    expect(snapshot.isCurrentHourInQuantile(0.5, 'cheapest', localTime(DAY, '02:30'))).toBeNull();
    expect(snapshot.quantileMembership(0.5, 'cheapest', 'today', localTime(DAY, '02:30'))).toBeNull();
  });

  test('calendar events span both days', () => {
    const events = snapshot.calendarEvents(localTime(DAY, '00:00'), localTime(TOMORROW, '23:59'));
    expect(events).toHaveLength(5);
    expect(events[4].summary).toBe('Tariff 400D: 0.30000 CHF/kWh');
    expect(events[4].uid).toBe('home:2025-06-11T00:00:00+02:00:4');
  });

  test('age of the data', () => {
    expect(snapshot.ageMs(fetchedAt + 5000)).toBe(5000);
    expect(snapshot.dayAgeMs('today', fetchedAt + 5000)).toBe(5000);
    expect(snapshot.fetchedAtOf(TOMORROW)).toBe(fetchedAt);
  });

  test('days carried from an earlier fetch keep their own age', () => {
    const earlier = fetchedAt - 60 * 60 * 1000;
    const carried = new TariffSnapshot({
      entryId: 'home',
      zone: ZONE,
      identifier: TARIFF,
      fetchedAt,
      days: snapshot.days,
      dayFetchedAt: { [DAY]: earlier },
    });
    const now = fetchedAt + 5000;

    expect(carried.ageMs(now)).toBe(5000);
    expect(carried.dayAgeMs('today', now)).toBe(now - earlier);
    expect(carried.dayAgeMs('tomorrow', now)).toBe(5000);
    expect(carried.fetchedAtOf('2025-06-12')).toBeUndefined();
    expect(carried.dayAgeMs('tomorrow', localTime(TOMORROW, '12:00'))).toBeNull();
  });

  test('metering point snapshots have no tariff name', () => {
    const customer = new TariffSnapshot({
      entryId: 'ems',
      zone: ZONE,
      identifier: { kind: 'metering_point', meteringPoint: 'ems-1' },
      fetchedAt,
      days: [],
    });
    expect(customer.tariffName).toBeUndefined();
    expect(customer.todayStats(fetchedAt)).toBe(NO_DATA);
    expect(customer.currentPrice(fetchedAt)).toBeNull();
  });
});

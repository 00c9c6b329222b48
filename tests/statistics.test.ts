import { computeDailyStatistics, NO_DATA } from '../logic/tariffs/statistics';
import { normalizeSchedule } from '../logic/tariffs/normalizeSlots';
import { DAY, TARIFF, ZONE, SCENARIO_PRICES, scheduleOf } from './testUtils';

describe('computeDailyStatistics', () => {
  test('scenario day', () => {
    const stats = computeDailyStatistics(scheduleOf(SCENARIO_PRICES));
    if (!stats.hasData) {
      throw new Error('expected statistics');
    }

    expect(stats.min).toBe(0.05);
    expect(stats.max).toBe(0.2);
    expect(stats.avg).toBeCloseTo(3.35 / 24, 10);
    expect(stats.median).toBeCloseTo(0.15, 10);
    expect(stats.q25).toBeCloseTo(0.15, 10);
    expect(stats.q75).toBeCloseTo(0.15, 10);
    expect(stats.slotsCount).toBe(24);
    expect(stats.coveredMinutes).toBe(1440);
  });

  test('interpolates quartiles over the minute distribution', () => {
    // 240 minutes: ranks 0-59 at 0.1, 60-119 at 0.2, 120-179 at 0.3, 180-239 at 0.4
    const stats = computeDailyStatistics(scheduleOf([0.1, 0.2, 0.3, 0.4]));
    if (!stats.hasData) {
      throw new Error('expected statistics');
    }

    expect(stats.median).toBeCloseTo(0.25, 10);
    expect(stats.q25).toBeCloseTo(0.175, 10);
    expect(stats.q75).toBeCloseTo(0.325, 10);
    expect(stats.avg).toBeCloseTo(0.25, 10);
    expect(stats.coveredMinutes).toBe(240);
  });

  test('weights slots by their length', () => {
    const schedule = normalizeSchedule([
      { start: '2025-06-10T00:00:00+02:00', timing: { kind: 'duration', minutes: 15 }, price: 1.0, unit: 'CHF_kWh' },
      { start: '2025-06-10T00:15:00+02:00', timing: { kind: 'duration', minutes: 45 }, price: 0.2, unit: 'CHF_kWh' },
    ], { day: DAY, zone: ZONE, identifier: TARIFF });
    const stats = computeDailyStatistics(schedule);
    if (!stats.hasData) {
      throw new Error('expected statistics');
    }

    expect(stats.avg).toBeCloseTo(0.4, 10);
    // 60 minutes, rank 29.5 lies in the 0.2 block (ranks 0-44)
    expect(stats.median).toBeCloseTo(0.2, 10);
    expect(stats.max).toBe(1.0);
  });

  test('keeps min <= q25 <= median <= q75 <= max', () => {
    const stats = computeDailyStatistics(scheduleOf([0.31, 0.07, 0.22, 0.19, 0.05, 0.4, 0.12, 0.12]));
    if (!stats.hasData) {
      throw new Error('expected statistics');
    }

    expect(stats.min).toBeLessThanOrEqual(stats.q25);
    expect(stats.q25).toBeLessThanOrEqual(stats.median);
    expect(stats.median).toBeLessThanOrEqual(stats.q75);
    expect(stats.q75).toBeLessThanOrEqual(stats.max);
  });

  test('empty schedule gives the no-data sentinel', () => {
    const stats = computeDailyStatistics(normalizeSchedule([], { day: DAY, zone: ZONE, identifier: TARIFF }));
    expect(stats).toBe(NO_DATA);
    expect(stats).toEqual({ hasData: false, slotsCount: 0, coveredMinutes: 0 });
  });

  test('is deterministic', () => {
    const schedule = scheduleOf(SCENARIO_PRICES);
    expect(computeDailyStatistics(schedule)).toEqual(computeDailyStatistics(schedule));
  });
});

/**
 * A fixed-price interval. Times are epoch milliseconds, `end` is exclusive, price is in CHF/kWh.
 */
export interface Slot {
  start: number;
  end: number;
  price: number;
}

/**
 * What a schedule describes: a public tariff or a customer's metering point
 */
export type ScheduleIdentifier =
  | { kind: 'tariff'; tariffName: string }
  | { kind: 'metering_point'; meteringPoint: string };

/**
 * Ordered, gap-free slots for one local calendar day
 */
export interface Schedule {
  /** ISO date of the local day (e.g. "2025-06-01") */
  readonly day: string;
  readonly zone: string;
  readonly dayStart: number;
  readonly dayEnd: number;
  readonly identifier: ScheduleIdentifier;
  readonly slots: ReadonlyArray<Slot>;
  readonly coveredMinutes: number;
  /** True when the slots cover less than the whole day */
  readonly partial: boolean;
}

export interface PriceStatistics {
  hasData: true;
  min: number;
  max: number;
  avg: number;
  median: number;
  q25: number;
  q75: number;
  slotsCount: number;
  coveredMinutes: number;
}

export interface NoDataStatistics {
  hasData: false;
  slotsCount: 0;
  coveredMinutes: 0;
}

export type DailyStatistics = PriceStatistics | NoDataStatistics;

export type WindowMode = 'min' | 'max';

/** Supported consecutive-window lengths in minutes (2h and 4h) */
export type WindowDuration = 120 | 240;

export interface PriceWindow {
  start: number;
  end: number;
  windowMinutes: number;
  averagePrice: number;
  mode: WindowMode;
}

export type QuantileMode = 'cheapest' | 'most_expensive';

export interface QuantileMembership {
  quantile: number;
  mode: QuantileMode;
  thresholdPrice: number;
  /** Local hours of day (0-23), ascending */
  memberHours: ReadonlyArray<number>;
  /** Minute-weighted average price per local hour of day */
  hourlyPrices: Readonly<Record<number, number>>;
}

export type DayOffset = 'today' | 'tomorrow';

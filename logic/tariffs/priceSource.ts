/**
 * Common contract for raw price data sources.
 * Sources convert vendor payloads into `RawPriceRecord`s; the normalizer turns those into schedules.
 */

export type PriceUnit = 'CHF_kWh' | 'Rp_kWh';

/**
 * How a raw record states its length: an explicit end timestamp or a duration
 */
export type SlotTiming =
  | { kind: 'range'; end: string }
  | { kind: 'duration'; minutes: number };

export interface RawPriceRecord {
  /** ISO 8601 timestamp; without an offset it is read in the configured zone */
  start: string;
  timing: SlotTiming;
  price: number;
  unit: PriceUnit;
}

export interface FetchRange {
  start: number;
  end: number;
}

export interface RawSlotFetcher {
  /**
   * Fetch raw price records covering the range.
   * Rejects with TransportError, AuthError or MalformedScheduleError.
   */
  fetch(range: FetchRange, signal?: AbortSignal): Promise<Array<RawPriceRecord>>;
}

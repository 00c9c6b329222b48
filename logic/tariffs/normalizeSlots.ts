import { DateTime } from 'luxon';
import type { RawPriceRecord, PriceUnit } from './priceSource';
import type { Schedule, ScheduleIdentifier, Slot } from './types';
import { MalformedScheduleError } from '../utils/errorUtils';
import { formatLocalIso, getDayBounds, isValidTimeZone, MILLISECONDS_PER_MINUTE } from '../utils/dateUtils';

export interface NormalizeOptions {
  /** ISO date of the local day to build */
  day: string;
  zone: string;
  identifier: ScheduleIdentifier;
}

/**
 * Parse an ISO 8601 timestamp. Explicit offsets are trusted; naive timestamps are read in `zone`.
 * @throws MalformedScheduleError if the value cannot be parsed
 */
export function parseTimestamp(value: string, zone: string): number {
  const parsed = DateTime.fromISO(value, { zone });
  if (!parsed.isValid) {
    throw new MalformedScheduleError(`Unparsable timestamp "${value}": ${parsed.invalidExplanation ?? parsed.invalidReason ?? 'invalid'}`);
  }
  return parsed.toMillis();
}

/**
 * Convert a vendor price to CHF/kWh
 */
export function toChfPerKwh(price: number, unit: PriceUnit): number {
  return unit === 'Rp_kWh' ? price / 100 : price;
}

/**
 * A record that could not be turned into a slot
 */
export interface RejectedRecord {
  /** Start of the record, when its timestamp parses */
  start?: number;
  reason: string;
}

export interface PartitionedRecords {
  /** Slots sorted by start */
  slots: Array<Slot>;
  /** Rejected records in vendor order */
  rejected: Array<RejectedRecord>;
}

function toSlot(record: RawPriceRecord, zone: string): Slot {
  const start = parseTimestamp(record.start, zone);
  const end = record.timing.kind === 'range'
    ? parseTimestamp(record.timing.end, zone)
    : start + record.timing.minutes * MILLISECONDS_PER_MINUTE;

  if (!(end > start)) {
    throw new MalformedScheduleError(`Slot starting ${record.start} does not end after its start`);
  }
  if (start % MILLISECONDS_PER_MINUTE !== 0 || end % MILLISECONDS_PER_MINUTE !== 0) {
    throw new MalformedScheduleError(`Slot starting ${record.start} is not aligned to whole minutes`);
  }

  const price = toChfPerKwh(record.price, record.unit);
  if (!Number.isFinite(price) || price < 0) {
    throw new MalformedScheduleError(`Slot starting ${record.start} has invalid price ${record.price}`);
  }
  return { start, end, price };
}

function tryParseTimestamp(value: string, zone: string): number | undefined {
  const parsed = DateTime.fromISO(value, { zone });
  return parsed.isValid ? parsed.toMillis() : undefined;
}

/**
 * Resolve raw records into sorted, de-duplicated slots, setting aside the ones that are invalid.
 * - Records with the same start: the one provided last wins (vendor corrections resend whole days),
 *   whether it is valid or not
 * - Every slot must have end > start, a finite non-negative price and whole-minute boundaries
 * @param records - Raw records in vendor order
 * @param zone - Zone used for timestamps without an offset
 * @throws MalformedScheduleError if the zone is unknown
 */
export function partitionRecords(records: ReadonlyArray<RawPriceRecord>, zone: string): PartitionedRecords {
  if (!isValidTimeZone(zone)) {
    throw new MalformedScheduleError(`Unknown time zone "${zone}"`);
  }

  const byStart = new Map<number, Slot>();
  let rejected: Array<RejectedRecord> = [];

  for (const record of records) {
    let slot: Slot;
    try {
      slot = toSlot(record, zone);
    } catch (error: unknown) {
      if (!(error instanceof MalformedScheduleError)) {
        throw error;
      }
      const start = tryParseTimestamp(record.start, zone);
      if (start !== undefined) {
        byStart.delete(start);
      }
      rejected.push({ start, reason: error.message });
      continue;
    }

    rejected = rejected.filter((entry) => entry.start !== slot.start);
    // Re-insert so iteration order reflects the latest write
    byStart.delete(slot.start);
    byStart.set(slot.start, slot);
  }

  return {
    slots: [...byStart.values()].sort((a, b) => a.start - b.start),
    rejected,
  };
}

/**
 * Resolve raw records into sorted, de-duplicated slots
 * @returns Slots sorted by start
 * @throws MalformedScheduleError for the first invalid record
 */
export function normalizeRecords(records: ReadonlyArray<RawPriceRecord>, zone: string): Array<Slot> {
  const { slots, rejected } = partitionRecords(records, zone);
  if (rejected.length > 0) {
    throw new MalformedScheduleError(rejected[0].reason);
  }
  return slots;
}

/**
 * Build the schedule of one local day from normalized slots.
 * Slots crossing midnight are clipped to the day. Any gap or overlap between adjacent slots is an error;
 * missing data at the start or end of the day only marks the schedule as partial.
 * @throws MalformedScheduleError on gaps or overlaps
 */
export function buildSchedule(slots: ReadonlyArray<Slot>, options: NormalizeOptions): Schedule {
  const { day, zone, identifier } = options;
  const { start: dayStart, end: dayEnd } = getDayBounds(day, zone);

  const daySlots: Array<Slot> = slots
    .filter((slot) => slot.end > dayStart && slot.start < dayEnd)
    .map((slot) => Object.freeze({
      start: Math.max(slot.start, dayStart),
      end: Math.min(slot.end, dayEnd),
      price: slot.price,
    }));

  for (let i = 1; i < daySlots.length; i++) {
    const previous = daySlots[i - 1];
    const current = daySlots[i];
    if (current.start < previous.end) {
      throw new MalformedScheduleError(
        `Overlapping slots on ${day}: ${formatLocalIso(previous.start, zone)}–${formatLocalIso(previous.end, zone)} and slot starting ${formatLocalIso(current.start, zone)}`,
      );
    }
    if (current.start > previous.end) {
      throw new MalformedScheduleError(
        `Gap in schedule on ${day}: no price between ${formatLocalIso(previous.end, zone)} and ${formatLocalIso(current.start, zone)}`,
      );
    }
  }

  const coveredMinutes = daySlots.reduce((sum, slot) => sum + (slot.end - slot.start), 0) / MILLISECONDS_PER_MINUTE;
  const dayMinutes = (dayEnd - dayStart) / MILLISECONDS_PER_MINUTE;

  return Object.freeze({
    day,
    zone,
    dayStart,
    dayEnd,
    identifier,
    slots: Object.freeze(daySlots),
    coveredMinutes,
    partial: coveredMinutes < dayMinutes,
  });
}

/**
 * Normalize raw vendor records into the schedule of one day
 */
export function normalizeSchedule(records: ReadonlyArray<RawPriceRecord>, options: NormalizeOptions): Schedule {
  return buildSchedule(normalizeRecords(records, options.zone), options);
}

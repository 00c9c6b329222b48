import { z } from 'zod';
import type { Schedule } from '../../logic/tariffs/types';
import type { TokenSet } from '../../logic/auth/tokenProvider';

/**
 * On-disk shapes of the per-entry files in the data directory
 */

const slotSchema = z.object({
  start: z.number().int(),
  end: z.number().int(),
  price: z.number().nonnegative(),
});

const identifierSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('tariff'), tariffName: z.string() }),
  z.object({ kind: z.literal('metering_point'), meteringPoint: z.string() }),
]);

const storedScheduleSchema = z.object({
  day: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  zone: z.string(),
  identifier: identifierSchema,
  slots: z.array(slotSchema),
  /** Absent in files written before days kept their own fetch time */
  fetchedAt: z.number().int().optional(),
});

export type StoredSchedule = z.infer<typeof storedScheduleSchema>;

export const scheduleFileSchema = z.object({
  version: z.literal(1),
  entryId: z.string(),
  fetchedAt: z.number().int(),
  schedules: z.array(storedScheduleSchema),
});

export type ScheduleFile = z.infer<typeof scheduleFileSchema>;

/**
 * Token file: either a full token set written by the service, or a bare grant
 * (access + refresh token) placed there after the out-of-band authorization.
 */
export const tokenFileSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresAt: z.number().int(),
  refreshUsesRemaining: z.number().int().nonnegative().optional(),
  refreshExpiresAt: z.number().int().optional(),
});

export type TokenFile = z.infer<typeof tokenFileSchema>;

/**
 * @param dayFetchedAt - Fetch time per local day, for days older than `fetchedAt`
 */
export function toScheduleFile(
  entryId: string,
  fetchedAt: number,
  schedules: ReadonlyArray<Schedule>,
  dayFetchedAt: Readonly<Record<string, number>> = {},
): ScheduleFile {
  return {
    version: 1,
    entryId,
    fetchedAt,
    schedules: schedules.map((schedule) => ({
      day: schedule.day,
      zone: schedule.zone,
      identifier: schedule.identifier,
      slots: schedule.slots.map((slot) => ({ start: slot.start, end: slot.end, price: slot.price })),
      fetchedAt: dayFetchedAt[schedule.day] ?? fetchedAt,
    })),
  };
}

/**
 * Full token set from a token file, or undefined when it only holds a grant
 */
export function toTokenSet(file: TokenFile): TokenSet | undefined {
  if (file.refreshUsesRemaining === undefined || file.refreshExpiresAt === undefined) {
    return undefined;
  }
  return {
    accessToken: file.accessToken,
    expiresAt: file.expiresAt,
    refreshToken: file.refreshToken,
    refreshUsesRemaining: file.refreshUsesRemaining,
    refreshExpiresAt: file.refreshExpiresAt,
  };
}

import type { PriceRun } from './priceRuns';
import { formatLocalIso } from '../utils/dateUtils';

export const PRICE_UNIT_LABEL = 'CHF/kWh';

export interface CalendarEvent {
  start: number;
  end: number;
  price: number;
  summary: string;
  description: string;
  uid: string;
}

export interface CalendarOptions {
  entryId: string;
  zone: string;
  tariffName?: string;
}

/**
 * Format price in a human-readable way, avoiding scientific notation
 * @param price - Price in CHF/kWh
 * @param decimals - Number of decimal places (default: 5)
 * @returns Formatted price string with unit (e.g. "0.21345 CHF/kWh")
 */
export function formatPrice(price: number, decimals: number = 5): string {
  if (price === 0) {
    return `0.${'0'.repeat(decimals)} ${PRICE_UNIT_LABEL}`;
  }

  const sign = price < 0 ? '-' : '';
  const rounded = Math.round(Math.abs(price) * Math.pow(10, decimals));
  const roundedStr = rounded.toString();

  let formatted: string;
  if (roundedStr.length <= decimals) {
    formatted = `0.${roundedStr.padStart(decimals, '0')}`;
  } else {
    const intPart = roundedStr.substring(0, roundedStr.length - decimals);
    const fracPart = roundedStr.substring(roundedStr.length - decimals);
    formatted = `${intPart}.${fracPart}`;
  }

  return `${sign}${formatted} ${PRICE_UNIT_LABEL}`;
}

/**
 * Calendar events for the price runs overlapping [from, to), one event per run
 * @param runs - Fused price runs sorted by start
 * @param from - Range start in milliseconds (inclusive)
 * @param to - Range end in milliseconds (exclusive)
 */
export function buildCalendarEvents(
  runs: ReadonlyArray<PriceRun>,
  from: number,
  to: number,
  options: CalendarOptions,
): Array<CalendarEvent> {
  const { entryId, zone, tariffName } = options;
  const label = tariffName ? `Tariff ${tariffName}` : 'Tariff';

  return runs
    .map((run, index) => ({ run, index }))
    .filter(({ run }) => run.end > from && run.start < to)
    .map(({ run, index }) => {
      const startIso = formatLocalIso(run.start, zone);
      const descriptionLines = [
        `Price: ${formatPrice(run.price, 6)}`,
        `From: ${startIso}`,
        `To: ${formatLocalIso(run.end, zone)}`,
      ];
      if (tariffName) {
        descriptionLines.unshift(`Tariff: ${tariffName}`);
      }
      return {
        start: run.start,
        end: run.end,
        price: run.price,
        summary: `${label}: ${formatPrice(run.price)}`,
        description: `${descriptionLines.join('\n')}\n`,
        uid: `${entryId}:${startIso}:${index}`,
      };
    });
}

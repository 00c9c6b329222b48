import type { FetchRange, RawPriceRecord, RawSlotFetcher } from '../priceSource';
import { fetchTariffPrices, toRawPriceRecords, type PublicTariffName } from '../../tariffApi/apiClient';

export interface PublicTariffSourceOptions {
  tariffName: PublicTariffName;
  zone: string;
  includeVat?: boolean;
  baseUrl?: string;
  fetchFn?: typeof fetch;
}

/**
 * Public tariff price data source.
 * Fetches the prices of a manually chosen tariff, no authentication needed.
 */
export class PublicTariffSource implements RawSlotFetcher {
  constructor(private readonly options: PublicTariffSourceOptions) {}

  async fetch(range: FetchRange, signal?: AbortSignal): Promise<Array<RawPriceRecord>> {
    const { tariffName, zone, includeVat = false, baseUrl, fetchFn } = this.options;
    const payload = await fetchTariffPrices(tariffName, range, zone, { baseUrl, fetchFn, signal });
    return toRawPriceRecords(payload, includeVat);
  }
}

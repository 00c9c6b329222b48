import type { FetchRange, RawPriceRecord, RawSlotFetcher } from '../priceSource';
import type { TokenProvider } from '../../auth/tokenProvider';
import { callWithToken } from '../../auth/tokenProvider';
import { fetchCustomerTariffs, toRawPriceRecords } from '../../tariffApi/apiClient';

export interface CustomerTariffSourceOptions {
  emsInstanceId: string;
  zone: string;
  includeVat?: boolean;
  baseUrl?: string;
  fetchFn?: typeof fetch;
}

/**
 * Customer tariff price data source.
 * Fetches the personalized tariff of an EMS instance using an OAuth access token.
 */
export class CustomerTariffSource implements RawSlotFetcher {
  constructor(
    private readonly tokens: TokenProvider,
    private readonly options: CustomerTariffSourceOptions,
  ) {}

  async fetch(range: FetchRange, signal?: AbortSignal): Promise<Array<RawPriceRecord>> {
    const { emsInstanceId, zone, includeVat = false, baseUrl, fetchFn } = this.options;
    const payload = await callWithToken(
      this.tokens,
      (accessToken) => fetchCustomerTariffs(accessToken, emsInstanceId, range, zone, { baseUrl, fetchFn, signal }),
      'Customer tariffs',
    );
    return toRawPriceRecords(payload, includeVat);
  }
}

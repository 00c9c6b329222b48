/**
 * Tariff API Client - Isolated API interaction functions
 *
 * Pure functions for the vendor's tariff endpoints (public tariffs, customer tariffs,
 * EMS link status). Payloads are validated with zod and converted to `RawPriceRecord`s here,
 * so nothing past this boundary knows which endpoint the prices came from.
 */

import { z } from 'zod';
import type { FetchRange, RawPriceRecord } from '../tariffs/priceSource';
import { formatLocalIso } from '../utils/dateUtils';
import { MalformedScheduleError, TransportError, extractErrorMessage } from '../utils/errorUtils';

export const DEFAULT_API_BASE_URL = 'https://api.tariffs.ekz.ch/v1';
export const REQUEST_TIMEOUT_MS = 30 * 1000;
export const VAT_RATE = 0.081;

export const PUBLIC_TARIFF_NAMES = ['400D', '400F', '400ST', '400WP', '400L', '400LS', '16L', '16LS'] as const;
export type PublicTariffName = typeof PUBLIC_TARIFF_NAMES[number];
export const DEFAULT_TARIFF_NAME: PublicTariffName = '400D';

const INTEGRATED_PREFIX = 'integrated_';
const PRICE_UNIT = 'CHF_kWh';

const priceComponentSchema = z.object({
  unit: z.string(),
  value: z.number(),
});

const priceItemSchema = z.object({
  start_timestamp: z.string(),
  end_timestamp: z.string(),
  integrated: z.array(priceComponentSchema).optional(),
});

export const pricesResponseSchema = z.object({
  prices: z.array(priceItemSchema).default([]),
});

export type PricesResponse = z.infer<typeof pricesResponseSchema>;

export const emsLinkStatusSchema = z.object({
  link_status: z.string(),
  linking_process_redirect_uri: z.string().optional(),
});

export type EmsLinkStatusResponse = z.infer<typeof emsLinkStatusSchema>;

/**
 * Prices as returned by either endpoint, tagged with where they came from
 */
export type VendorPayload =
  | { kind: 'public'; tariffName: PublicTariffName; response: PricesResponse }
  | { kind: 'customer'; emsInstanceId: string; response: PricesResponse };

export interface RequestOptions {
  baseUrl?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

/**
 * Build the URL of the public tariffs endpoint
 */
export function buildTariffsUrl(tariffName: PublicTariffName, range: FetchRange, zone: string, baseUrl: string = DEFAULT_API_BASE_URL): string {
  const params = new URLSearchParams({
    tariff_name: `${INTEGRATED_PREFIX}${tariffName}`,
    start_timestamp: formatLocalIso(range.start, zone),
    end_timestamp: formatLocalIso(range.end, zone),
  });
  return `${baseUrl}/tariffs?${params.toString()}`;
}

/**
 * Build the URL of the customer tariffs endpoint
 */
export function buildCustomerTariffsUrl(emsInstanceId: string, range: FetchRange, zone: string, baseUrl: string = DEFAULT_API_BASE_URL): string {
  const params = new URLSearchParams({
    ems_instance_id: emsInstanceId,
    start_timestamp: formatLocalIso(range.start, zone),
    end_timestamp: formatLocalIso(range.end, zone),
  });
  return `${baseUrl}/customerTariffs?${params.toString()}`;
}

/**
 * Build the URL of the EMS link status endpoint
 */
export function buildEmsLinkStatusUrl(emsInstanceId: string, redirectUri: string, baseUrl: string = DEFAULT_API_BASE_URL): string {
  const params = new URLSearchParams({
    ems_instance_id: emsInstanceId,
    redirect_uri: redirectUri,
  });
  return `${baseUrl}/emsLinkStatus?${params.toString()}`;
}

/**
 * Create authorization headers
 */
export function createAuthHeaders(accessToken: string): Record<string, string> {
  return {
    Authorization: `Bearer ${accessToken}`,
    Accept: 'application/json',
  };
}

/**
 * Extract status code from error if available
 */
export function extractStatusCode(error: unknown): number | undefined {
  if (error instanceof TransportError) {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Check if error is an authentication error (401 or 403)
 */
export function isAuthError(error: unknown): boolean {
  const statusCode = extractStatusCode(error);
  return statusCode === 401 || statusCode === 403;
}

/**
 * Parse error response text with fallback
 */
export async function parseErrorResponse(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (_error) {
    return 'Unable to read error response';
  }
}

/**
 * Truncate error message to max length
 */
export function truncateErrorMessage(message: string, maxLength: number = 200): string {
  return message.length > maxLength ? message.substring(0, maxLength) : message;
}

/**
 * Create API error with status code
 */
export function createApiError(
  message: string,
  statusCode?: number,
  responseText?: string,
): TransportError {
  const errorText = responseText ? truncateErrorMessage(responseText) : '';
  const errorDetail = errorText || 'Unknown error';
  const fullMessage = statusCode ? `${message} ${statusCode}: ${errorText}` : `${message}: ${errorDetail}`;
  return new TransportError(fullMessage, { statusCode });
}

/**
 * Check response and throw API error if not ok
 */
async function checkResponseAndThrow(
  response: Response,
  errorMessage: string,
): Promise<void> {
  if (!response.ok) {
    const text = await parseErrorResponse(response);
    throw createApiError(errorMessage, response.status, text);
  }
}

/**
 * GET a URL with a timeout, honouring an outer abort signal.
 * Every failure before a response arrives becomes a TransportError.
 */
async function getWithTimeout(url: string, headers: Record<string, string>, options: RequestOptions): Promise<Response> {
  const { signal, timeoutMs = REQUEST_TIMEOUT_MS, fetchFn = fetch } = options;
  if (signal?.aborted) {
    throw new TransportError('Aborted');
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    return await fetchFn(url, { method: 'GET', headers, signal: controller.signal });
  } catch (error) {
    if (timedOut) {
      throw new TransportError(`Request timed out after ${timeoutMs} ms`, { cause: error });
    }
    if (signal?.aborted) {
      throw new TransportError('Aborted', { cause: error });
    }
    throw new TransportError(`Network error: ${extractErrorMessage(error)}`, { cause: error });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Read a JSON body and validate it against a schema
 * @throws MalformedScheduleError if the body is not JSON or does not match
 */
async function readJson<T extends z.ZodTypeAny>(response: Response, schema: T, what: string): Promise<z.output<T>> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new MalformedScheduleError(`JSON parse error: ${extractErrorMessage(error)}`, { cause: error });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new MalformedScheduleError(`Unexpected ${what} payload at ${path}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

/**
 * Apply Swiss VAT to a price
 */
export function applyVat(price: number): number {
  return price * (1 + VAT_RATE);
}

/**
 * Convert a vendor payload into raw price records.
 * Items without a CHF_kWh component are skipped.
 */
export function toRawPriceRecords(payload: VendorPayload, includeVat: boolean = false): Array<RawPriceRecord> {
  const records: Array<RawPriceRecord> = [];
  for (const item of payload.response.prices) {
    const component = item.integrated?.find((c) => c.unit === PRICE_UNIT);
    if (!component) {
      continue;
    }
    records.push({
      start: item.start_timestamp,
      timing: { kind: 'range', end: item.end_timestamp },
      price: includeVat ? applyVat(component.value) : component.value,
      unit: 'CHF_kWh',
    });
  }
  return records;
}

/**
 * Fetch public tariff prices for a range (no authentication)
 */
export async function fetchTariffPrices(
  tariffName: PublicTariffName,
  range: FetchRange,
  zone: string,
  options: RequestOptions = {},
): Promise<VendorPayload> {
  const url = buildTariffsUrl(tariffName, range, zone, options.baseUrl);
  const response = await getWithTimeout(url, { Accept: 'application/json' }, options);

  await checkResponseAndThrow(response, 'Get tariffs failed');

  const data = await readJson(response, pricesResponseSchema, 'tariffs');
  return { kind: 'public', tariffName, response: data };
}

/**
 * Fetch customer-specific tariff prices for a range
 */
export async function fetchCustomerTariffs(
  accessToken: string,
  emsInstanceId: string,
  range: FetchRange,
  zone: string,
  options: RequestOptions = {},
): Promise<VendorPayload> {
  const url = buildCustomerTariffsUrl(emsInstanceId, range, zone, options.baseUrl);
  const response = await getWithTimeout(url, createAuthHeaders(accessToken), options);

  await checkResponseAndThrow(response, 'Get customer tariffs failed');

  const data = await readJson(response, pricesResponseSchema, 'customer tariffs');
  return { kind: 'customer', emsInstanceId, response: data };
}

/**
 * Fetch the EMS link status and, when linking is required, the linking URL
 */
export async function fetchEmsLinkStatus(
  accessToken: string,
  emsInstanceId: string,
  redirectUri: string,
  options: RequestOptions = {},
): Promise<EmsLinkStatusResponse> {
  const url = buildEmsLinkStatusUrl(emsInstanceId, redirectUri, options.baseUrl);
  const response = await getWithTimeout(url, createAuthHeaders(accessToken), options);

  await checkResponseAndThrow(response, 'EMS link status check failed');

  return readJson(response, emsLinkStatusSchema, 'EMS link status');
}

/**
 * CoinAPI client - daily OHLCV history
 * https://rest.coinapi.io
 */

import { z } from 'zod';
import { API_ENDPOINTS } from '@crypto-backfill/config';
import { ApiClient, createApiClient, type ApiClientConfig } from '../client';
import { lenientNumber, lenientString, type FetchResult } from '../types';

// One OHLCV period; field names are CoinAPI's
export const CoinApiOhlcvSchema = z.object({
  time_period_start: lenientString(),
  time_period_end: lenientString(),
  price_open: lenientNumber(),
  price_high: lenientNumber(),
  price_low: lenientNumber(),
  price_close: lenientNumber(),
  volume_traded: lenientNumber(),
  trades_count: lenientNumber(),
}).passthrough();

// Items stay raw here so one bad period cannot reject the page
export const CoinApiOhlcvResponseSchema = z.array(z.unknown());

export type CoinApiOhlcv = z.infer<typeof CoinApiOhlcvSchema>;

export interface OhlcvHistoryParams {
  period_id: string;
  time_start: string;
  time_end: string;
  limit?: number;
}

export interface CoinApiClientConfig extends Partial<ApiClientConfig> {
  apiKey: string;
}

/**
 * Exchange-qualified spot instrument for a plain ticker
 *
 * @example
 * buildSymbolId('btc') // 'BITSTAMP_SPOT_BTC_USD'
 */
export function buildSymbolId(symbol: string, quote = 'USD', exchange = 'BITSTAMP'): string {
  return `${exchange.toUpperCase()}_SPOT_${symbol.toUpperCase()}_${quote.toUpperCase()}`;
}

export class CoinApiClient {
  private client: ApiClient;

  constructor(config: CoinApiClientConfig) {
    const { apiKey, ...clientConfig } = config;
    this.client = createApiClient({
      ...clientConfig,
      baseUrl: clientConfig.baseUrl ?? API_ENDPOINTS.coinapi.base,
      defaultHeaders: {
        ...clientConfig.defaultHeaders,
        'X-CoinAPI-Key': apiKey,
      },
    });
  }

  /**
   * Get OHLCV periods for an instrument between two timestamps
   */
  async getOhlcvHistory(symbolId: string, params: OhlcvHistoryParams): Promise<FetchResult<unknown[]>> {
    return this.client.get(
      API_ENDPOINTS.coinapi.ohlcvHistory(symbolId),
      { params: { ...params } },
      CoinApiOhlcvResponseSchema
    );
  }
}

/**
 * Create a CoinAPI client
 */
export function createCoinApiClient(config: CoinApiClientConfig): CoinApiClient {
  return new CoinApiClient(config);
}

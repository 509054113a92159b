/**
 * Yahoo Finance client - daily chart data for macro symbols and indices
 * https://query1.finance.yahoo.com/v8/finance/chart
 */

import { z } from 'zod';
import { API_ENDPOINTS } from '@crypto-backfill/config';
import { ApiClient, createApiClient, type ApiClientConfig } from '../client';
import { nullableNumber, type FetchResult } from '../types';

const seriesSchema = z.array(nullableNumber()).optional().catch(undefined);

export const YahooQuoteSchema = z.object({
  open: seriesSchema,
  high: seriesSchema,
  low: seriesSchema,
  close: seriesSchema,
  volume: seriesSchema,
}).passthrough();

export const YahooChartResultSchema = z.object({
  meta: z.object({ symbol: z.string().optional().catch(undefined) }).passthrough().optional().catch(undefined),
  timestamp: z.array(nullableNumber()).optional().catch(undefined),
  indicators: z
    .object({ quote: z.array(YahooQuoteSchema).optional().catch(undefined) })
    .passthrough()
    .optional()
    .catch(undefined),
}).passthrough();

export const YahooChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(YahooChartResultSchema).nullable().optional(),
    error: z
      .object({ code: z.string().optional(), description: z.string().optional() })
      .passthrough()
      .nullable()
      .optional(),
  }).passthrough(),
}).passthrough();

export type YahooQuote = z.infer<typeof YahooQuoteSchema>;
export type YahooChartResult = z.infer<typeof YahooChartResultSchema>;
export type YahooChartResponse = z.infer<typeof YahooChartResponseSchema>;

export interface YahooChartParams {
  period1: number;
  period2: number;
  interval?: string;
}

export class YahooFinanceClient {
  private client: ApiClient;

  constructor(config?: Partial<ApiClientConfig>) {
    this.client = createApiClient({
      ...config,
      baseUrl: config?.baseUrl ?? API_ENDPOINTS.yahoo.base,
      defaultHeaders: {
        'User-Agent': 'Mozilla/5.0',
        ...config?.defaultHeaders,
      },
    });
  }

  /**
   * Get the chart for one symbol; a missing result means no data for the range
   */
  async getChart(symbol: string, params: YahooChartParams): Promise<FetchResult<YahooChartResult | null>> {
    const result = await this.client.get(
      API_ENDPOINTS.yahoo.chart(symbol),
      {
        params: {
          interval: '1d',
          includePrePost: false,
          ...params,
        },
      },
      YahooChartResponseSchema
    );

    if (!result.ok) {
      return result;
    }

    return {
      ok: true,
      data: result.data.chart.result?.[0] ?? null,
      retried: result.retried,
    };
  }
}

/**
 * Create a Yahoo Finance client
 */
export function createYahooFinanceClient(config?: Partial<ApiClientConfig>): YahooFinanceClient {
  return new YahooFinanceClient(config);
}

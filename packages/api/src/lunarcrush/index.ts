/**
 * LunarCrush client - social sentiment time series
 * https://lunarcrush.com
 */

import { z } from 'zod';
import { API_ENDPOINTS } from '@crypto-backfill/config';
import { ApiClient, createApiClient, type ApiClientConfig } from '../client';
import { lenientNumber, rawItems, type FetchResult } from '../types';

// Field names differ between subscription tiers; every candidate is optional
export const LunarCrushPointSchema = z.object({
  time: lenientNumber(),
  timestamp: lenientNumber(),
  galaxy_score: lenientNumber(),
  sentiment: lenientNumber(),
  social_bullish: lenientNumber(),
  social_positive: lenientNumber(),
  social_bearish: lenientNumber(),
  social_negative: lenientNumber(),
  social_volume: lenientNumber(),
}).passthrough();

export const LunarCrushAssetSchema = z.object({
  symbol: z.string().optional().catch(undefined),
  timeSeries: rawItems(),
  time_series: rawItems(),
}).passthrough();

export const LunarCrushAssetsResponseSchema = z.object({
  data: rawItems(),
}).passthrough();

export type LunarCrushPoint = z.infer<typeof LunarCrushPointSchema>;
export type LunarCrushAsset = z.infer<typeof LunarCrushAssetSchema>;
export type LunarCrushAssetsResponse = z.infer<typeof LunarCrushAssetsResponseSchema>;

export interface LunarCrushAssetsParams {
  symbol: string;
  interval?: 'day' | 'hour';
  data_points?: number;
  start_time: string;
  end_time: string;
}

export interface LunarCrushClientConfig extends Partial<ApiClientConfig> {
  apiKey: string;
}

export class LunarCrushClient {
  private client: ApiClient;
  private apiKey: string;

  constructor(config: LunarCrushClientConfig) {
    const { apiKey, ...clientConfig } = config;
    this.apiKey = apiKey;
    this.client = createApiClient({
      ...clientConfig,
      baseUrl: clientConfig.baseUrl ?? API_ENDPOINTS.lunarcrush.base,
    });
  }

  /**
   * Get asset time series for one symbol
   */
  async getAssets(params: LunarCrushAssetsParams): Promise<FetchResult<LunarCrushAssetsResponse>> {
    return this.client.get(
      API_ENDPOINTS.lunarcrush.assets,
      { params: { interval: 'day', ...params, key: this.apiKey } },
      LunarCrushAssetsResponseSchema
    );
  }
}

/**
 * Create a LunarCrush client
 */
export function createLunarCrushClient(config: LunarCrushClientConfig): LunarCrushClient {
  return new LunarCrushClient(config);
}

/**
 * LunarCrush adapter - daily social sentiment per token window
 */

import { utcDayFromUnixSeconds, type DateWindow } from '@crypto-backfill/config';
import {
  LunarCrushAssetSchema,
  LunarCrushPointSchema,
  type LunarCrushClient,
  type LunarCrushPoint,
} from '@crypto-backfill/api/lunarcrush';
import { createChildLogger } from '../lib/logger';
import type { SentimentScoreDraft } from '../records';
import { balanceScore, int, parseItem } from './normalize';
import type { AdapterResult, ProviderAdapter, WorkItem } from './types';

export interface LunarCrushAdapterOptions {
  client: LunarCrushClient;
  dataPoints?: number;
}

/**
 * Mention counts and score of one time-series point
 *
 * Field names depend on the subscription tier; the score falls back to the
 * count balance when neither galaxy_score nor sentiment is reported.
 */
export function socialSentiment(point: LunarCrushPoint): {
  sentimentScore: number;
  positiveCount: number;
  negativeCount: number;
  neutralCount: number;
} {
  const positiveCount = Math.max(int(point.social_bullish, point.social_positive), 0);
  const negativeCount = Math.max(int(point.social_bearish, point.social_negative), 0);
  const neutralCount = Math.max(int(point.social_volume) - positiveCount - negativeCount, 0);
  const sentimentScore = point.galaxy_score ?? point.sentiment ?? balanceScore(positiveCount, negativeCount);
  return { sentimentScore, positiveCount, negativeCount, neutralCount };
}

export class LunarCrushAdapter implements ProviderAdapter {
  readonly provider = 'lunarcrush' as const;
  private logger = createChildLogger({ module: 'lunarcrush-adapter' });
  private client: LunarCrushClient;
  private dataPoints: number;

  constructor(options: LunarCrushAdapterOptions) {
    this.client = options.client;
    this.dataPoints = options.dataPoints ?? 1000;
  }

  plan(token: string, window: DateWindow): WorkItem[] {
    return [{ token, window }];
  }

  async fetch(item: WorkItem): Promise<AdapterResult> {
    const result = await this.client.getAssets({
      symbol: item.token,
      interval: 'day',
      data_points: this.dataPoints,
      start_time: `${item.window.start}T00:00:00Z`,
      end_time: `${item.window.end}T00:00:00Z`,
    });
    if (!result.ok) {
      return result;
    }

    const records: SentimentScoreDraft[] = [];
    for (const rawSeries of result.data.data ?? []) {
      const series = parseItem(LunarCrushAssetSchema, rawSeries, this.logger, { token: item.token });
      // An empty camelCase series falls through to the snake_case key
      const points = series.timeSeries?.length ? series.timeSeries : series.time_series ?? [];

      for (const rawPoint of points) {
        const point = parseItem(LunarCrushPointSchema, rawPoint, this.logger, { token: item.token });
        records.push({
          kind: 'sentiment_score',
          token: item.token,
          date:
            utcDayFromUnixSeconds(point.time) ??
            utcDayFromUnixSeconds(point.timestamp) ??
            item.window.start,
          ...socialSentiment(point),
          source: 'lunarcrush',
        });
      }
    }

    return { ok: true, records };
  }
}

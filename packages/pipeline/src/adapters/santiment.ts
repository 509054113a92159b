/**
 * Santiment adapter - sentiment group and on-chain metrics per token
 *
 * The sentiment work item fetches three metrics and consolidates them by day
 * into one SentimentScore per day; it fails only when the balance metric
 * does. Every on-chain metric is its own work item.
 */

import { utcDayFromTimestamp, type DateWindow, type IsoDay } from '@crypto-backfill/config';
import { getFailureDetails } from '@crypto-backfill/api';
import { SantimentPointSchema, type SantimentClient } from '@crypto-backfill/api/santiment';
import { createChildLogger } from '../lib/logger';
import type { OnchainMetricDraft, SentimentScoreDraft } from '../records';
import { num, parseItem } from './normalize';
import type { AdapterResult, ProviderAdapter, WorkItem } from './types';

export const SENTIMENT_GROUP = 'sentiment';

export const SENTIMENT_METRICS = [
  'sentiment_volume_consumed_1d',
  'social_volume_total',
  'sentiment_balance_total',
] as const;

export const ONCHAIN_METRICS = ['active_addresses_24h', 'dev_activity', 'transaction_volume'] as const;

const BALANCE_METRIC = 'sentiment_balance_total';

const SLUGS: Record<string, string> = {
  BTC: 'bitcoin',
  ETH: 'ethereum',
  SOL: 'solana',
  ADA: 'cardano',
  XRP: 'xrp',
  DOGE: 'dogecoin',
  DOT: 'polkadot-new',
  AVAX: 'avalanche',
  LINK: 'chainlink',
  MATIC: 'matic-network',
  BNB: 'binance-coin',
  LTC: 'litecoin',
};

/**
 * Santiment project slug for a ticker; unknown tickers are lower-cased
 *
 * @example
 * toSlug('BTC') // 'bitcoin'
 * toSlug('Uni') // 'uni'
 */
export function toSlug(token: string): string {
  return SLUGS[token.toUpperCase()] ?? token.toLowerCase();
}

/**
 * Mention counts implied by a signed sentiment balance
 */
export function balanceMentions(balance: number): { positiveCount: number; negativeCount: number } {
  return {
    positiveCount: Math.max(Math.round((balance + Math.abs(balance)) / 2), 0),
    negativeCount: Math.max(Math.round((Math.abs(balance) - balance) / 2), 0),
  };
}

export interface SantimentAdapterOptions {
  client: SantimentClient;
  onchainMetrics?: readonly string[];
}

interface MetricPoint {
  date: IsoDay;
  value: number;
}

export class SantimentAdapter implements ProviderAdapter {
  readonly provider = 'santiment' as const;
  private logger = createChildLogger({ module: 'santiment-adapter' });
  private client: SantimentClient;
  private onchainMetrics: readonly string[];

  constructor(options: SantimentAdapterOptions) {
    this.client = options.client;
    this.onchainMetrics = options.onchainMetrics ?? ONCHAIN_METRICS;
  }

  plan(token: string, window: DateWindow): WorkItem[] {
    return [SENTIMENT_GROUP, ...this.onchainMetrics].map((metric) => ({ token, window, metric }));
  }

  async fetch(item: WorkItem): Promise<AdapterResult> {
    if (item.metric === undefined || item.metric === SENTIMENT_GROUP) {
      return this.fetchSentiment(item);
    }
    return this.fetchOnchain(item, item.metric);
  }

  private async fetchSentiment(item: WorkItem): Promise<AdapterResult> {
    // Insertion order of days follows the first metric that reports them
    const byDay = new Map<IsoDay, Map<string, number>>();

    for (const metric of SENTIMENT_METRICS) {
      const series = await this.fetchSeries(item, metric);
      if (!series.ok) {
        // Only the balance feeds the score; the volume metrics are auxiliary
        if (metric === BALANCE_METRIC) {
          return series;
        }
        this.logger.warn(
          { token: item.token, metric, ...getFailureDetails(series.failure) },
          'Sentiment metric failed, continuing without it'
        );
        continue;
      }
      for (const point of series.points) {
        const values = byDay.get(point.date) ?? new Map<string, number>();
        values.set(metric, point.value);
        byDay.set(point.date, values);
      }
    }

    const records: SentimentScoreDraft[] = [];
    for (const [date, values] of byDay) {
      const sentimentScore = values.get(BALANCE_METRIC) ?? 0;
      records.push({
        kind: 'sentiment_score',
        token: item.token,
        date,
        sentimentScore,
        ...balanceMentions(sentimentScore),
        neutralCount: 0,
        source: 'santiment',
      });
    }
    return { ok: true, records };
  }

  private async fetchOnchain(item: WorkItem, metric: string): Promise<AdapterResult> {
    const series = await this.fetchSeries(item, metric);
    if (!series.ok) {
      return series;
    }

    const records: OnchainMetricDraft[] = series.points.map((point) => ({
      kind: 'onchain_metric',
      token: item.token,
      date: point.date,
      metricName: metric,
      metricValue: point.value,
      source: 'santiment',
    }));
    return { ok: true, records };
  }

  private async fetchSeries(
    item: WorkItem,
    metric: string
  ): Promise<Extract<AdapterResult, { ok: false }> | { ok: true; points: MetricPoint[] }> {
    const slug = toSlug(item.token);
    const result = await this.client.getMetricTimeseries(metric, {
      slug,
      from: `${item.window.start}T00:00:00Z`,
      to: `${item.window.end}T00:00:00Z`,
      interval: '1d',
    });
    if (!result.ok) {
      return result;
    }

    const points: MetricPoint[] = [];
    for (const raw of result.data) {
      const point = parseItem(SantimentPointSchema, raw, this.logger, { token: item.token, metric });
      const date = utcDayFromTimestamp(point.datetime);
      if (date === null) {
        this.logger.debug({ token: item.token, metric, datetime: point.datetime }, 'Point without a date skipped');
        continue;
      }
      points.push({ date, value: num(point.value) });
    }
    return { ok: true, points };
  }
}

/**
 * Canonical record types
 *
 * Adapters produce drafts; the coordinator stamps them with the capture time
 * and, just before the sink, the run id. Records are never mutated: every
 * stamp returns a new object.
 */

import type { IsoDay, ProviderName } from '@crypto-backfill/config';

// =============================================================================
// Drafts (adapter output)
// =============================================================================

export interface PriceBarDraft {
  kind: 'price_bar';
  token: string;
  date: IsoDay;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  source: string;
}

export interface NewsEventDraft {
  kind: 'news_event';
  token: string;
  date: IsoDay;
  title: string;
  description: string;
  source: string;
  sentimentScore: number;
  url: string;
}

export interface SentimentScoreDraft {
  kind: 'sentiment_score';
  token: string;
  date: IsoDay;
  sentimentScore: number;
  positiveCount: number;
  negativeCount: number;
  neutralCount: number;
  source: string;
}

export interface OnchainMetricDraft {
  kind: 'onchain_metric';
  token: string;
  date: IsoDay;
  metricName: string;
  metricValue: number;
  source: string;
}

export interface MacroBarDraft {
  kind: 'macro_bar';
  symbol: string;
  date: IsoDay;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
  value: number | null;
}

export type RecordDraft =
  | PriceBarDraft
  | NewsEventDraft
  | SentimentScoreDraft
  | OnchainMetricDraft
  | MacroBarDraft;

export type RecordKind = RecordDraft['kind'];

// =============================================================================
// Canonical records (stamped)
// =============================================================================

export interface RecordStamp {
  fetchedAt: Date;
  /** Empty while the record is in flight */
  runId: string;
}

export type Stamped<D extends RecordDraft> = Readonly<D & RecordStamp>;

export type PriceBar = Stamped<PriceBarDraft>;
export type NewsEvent = Stamped<NewsEventDraft>;
export type SentimentScore = Stamped<SentimentScoreDraft>;
export type OnchainMetric = Stamped<OnchainMetricDraft>;
export type MacroBar = Stamped<MacroBarDraft>;

export type CanonicalRecord = PriceBar | NewsEvent | SentimentScore | OnchainMetric | MacroBar;

/**
 * Capture-time stamp; the record stays in flight until withRunId
 */
export function stamp<D extends RecordDraft>(draft: D, fetchedAt: Date): Stamped<D> {
  return { ...draft, fetchedAt, runId: '' };
}

export function withRunId<R extends CanonicalRecord>(record: R, runId: string): R {
  return { ...record, runId };
}

export function isInFlight(record: CanonicalRecord): boolean {
  return record.runId === '';
}

// =============================================================================
// Datasets
// =============================================================================

export const RECORD_KINDS: readonly RecordKind[] = [
  'price_bar',
  'news_event',
  'sentiment_score',
  'onchain_metric',
  'macro_bar',
];

/**
 * Export dataset name per record kind
 */
export const DATASET_NAMES = {
  price_bar: 'ohlcv',
  news_event: 'news',
  sentiment_score: 'sentiment',
  onchain_metric: 'onchain',
  macro_bar: 'macro',
} as const satisfies Record<RecordKind, string>;

export type DatasetName = (typeof DATASET_NAMES)[RecordKind];

/**
 * Records of one kind, tagged so consumers can switch on the kind
 */
export type RecordBatch =
  | { kind: 'price_bar'; records: PriceBar[] }
  | { kind: 'news_event'; records: NewsEvent[] }
  | { kind: 'sentiment_score'; records: SentimentScore[] }
  | { kind: 'onchain_metric'; records: OnchainMetric[] }
  | { kind: 'macro_bar'; records: MacroBar[] };

/**
 * Split a mixed batch by kind, in RECORD_KINDS order; empty kinds are omitted
 */
export function groupByKind(records: readonly CanonicalRecord[]): RecordBatch[] {
  const priceBars: PriceBar[] = [];
  const newsEvents: NewsEvent[] = [];
  const sentimentScores: SentimentScore[] = [];
  const onchainMetrics: OnchainMetric[] = [];
  const macroBars: MacroBar[] = [];

  for (const record of records) {
    switch (record.kind) {
      case 'price_bar':
        priceBars.push(record);
        break;
      case 'news_event':
        newsEvents.push(record);
        break;
      case 'sentiment_score':
        sentimentScores.push(record);
        break;
      case 'onchain_metric':
        onchainMetrics.push(record);
        break;
      case 'macro_bar':
        macroBars.push(record);
        break;
    }
  }

  const batches: RecordBatch[] = [
    { kind: 'price_bar', records: priceBars },
    { kind: 'news_event', records: newsEvents },
    { kind: 'sentiment_score', records: sentimentScores },
    { kind: 'onchain_metric', records: onchainMetrics },
    { kind: 'macro_bar', records: macroBars },
  ];
  return batches.filter((batch) => batch.records.length > 0);
}

export function countByKind(records: readonly CanonicalRecord[]): Partial<Record<RecordKind, number>> {
  const counts: Partial<Record<RecordKind, number>> = {};
  for (const record of records) {
    counts[record.kind] = (counts[record.kind] ?? 0) + 1;
  }
  return counts;
}

/**
 * Deterministic export file stem, e.g. coinapi_ohlcv_run-1
 */
export function exportFileStem(provider: ProviderName, kind: RecordKind, runId: string): string {
  return `${provider}_${DATASET_NAMES[kind]}_${runId}`;
}

export * from './columns';

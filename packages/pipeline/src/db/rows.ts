/**
 * Canonical records to insert rows
 */

import type { MacroBar, NewsEvent, OnchainMetric, PriceBar, SentimentScore } from '../records';
import type {
  NewHistoricalMarketDataRow,
  NewMacroDataRow,
  NewMarketNewsEventRow,
  NewMarketSentimentRow,
  NewOnchainMetricRow,
} from './schema';

export function toHistoricalMarketDataRow(record: PriceBar): NewHistoricalMarketDataRow {
  return {
    tokenSymbol: record.token,
    date: record.date,
    openPrice: record.open,
    highPrice: record.high,
    lowPrice: record.low,
    closePrice: record.close,
    volume: record.volume,
    sourceApi: record.source,
    timestampFetched: record.fetchedAt,
    backfillRunId: record.runId,
  };
}

export function toMarketNewsEventRow(record: NewsEvent): NewMarketNewsEventRow {
  return {
    tokenSymbol: record.token,
    date: record.date,
    title: record.title,
    description: record.description,
    source: record.source,
    sentimentScore: record.sentimentScore,
    url: record.url,
    timestampFetched: record.fetchedAt,
    backfillRunId: record.runId,
  };
}

export function toMarketSentimentRow(record: SentimentScore): NewMarketSentimentRow {
  return {
    tokenSymbol: record.token,
    date: record.date,
    sentimentScore: record.sentimentScore,
    positiveMentions: record.positiveCount,
    negativeMentions: record.negativeCount,
    neutralMentions: record.neutralCount,
    sourceApi: record.source,
    timestampFetched: record.fetchedAt,
    backfillRunId: record.runId,
  };
}

export function toOnchainMetricRow(record: OnchainMetric): NewOnchainMetricRow {
  return {
    tokenSymbol: record.token,
    date: record.date,
    metricName: record.metricName,
    metricValue: record.metricValue,
    sourceApi: record.source,
    timestampFetched: record.fetchedAt,
    backfillRunId: record.runId,
  };
}

export function toMacroDataRow(record: MacroBar): NewMacroDataRow {
  return {
    symbol: record.symbol,
    date: record.date,
    openPrice: record.open,
    highPrice: record.high,
    lowPrice: record.low,
    closePrice: record.close,
    volume: record.volume,
    value: record.value,
    timestampFetched: record.fetchedAt,
    backfillRunId: record.runId,
  };
}

/**
 * PostgreSQL schema for the backfill tables
 * Using Drizzle ORM
 *
 * Five append-only tables, one per record family. There are deliberately no
 * primary keys or unique constraints: re-running a window with the same
 * backfill_run_id appends a parallel set of rows.
 */

import {
  pgTable,
  text,
  integer,
  doublePrecision,
  date,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

// ============================================
// HISTORICAL MARKET DATA (OHLCV)
// ============================================

export const historicalMarketData = pgTable('bf_historical_market_data', {
  tokenSymbol: text('token_symbol').notNull(),
  date: date('date', { mode: 'string' }).notNull(),
  openPrice: doublePrecision('open_price').notNull(),
  highPrice: doublePrecision('high_price').notNull(),
  lowPrice: doublePrecision('low_price').notNull(),
  closePrice: doublePrecision('close_price').notNull(),
  volume: doublePrecision('volume').notNull(),
  sourceApi: text('source_api').notNull(),
  timestampFetched: timestamp('timestamp_fetched', { withTimezone: true }).notNull(),
  backfillRunId: text('backfill_run_id').notNull(),
}, (table) => [
  index('bf_historical_market_data_run_idx').on(table.backfillRunId),
]);

// ============================================
// MARKET NEWS EVENTS
// ============================================

export const marketNewsEvents = pgTable('bf_market_news_events', {
  tokenSymbol: text('token_symbol').notNull(),
  date: date('date', { mode: 'string' }).notNull(),
  title: text('title').notNull(),
  description: text('description').notNull(),
  source: text('source').notNull(),
  sentimentScore: doublePrecision('sentiment_score').notNull(),
  url: text('url').notNull(),
  timestampFetched: timestamp('timestamp_fetched', { withTimezone: true }).notNull(),
  backfillRunId: text('backfill_run_id').notNull(),
}, (table) => [
  index('bf_market_news_events_run_idx').on(table.backfillRunId),
]);

// ============================================
// MARKET SENTIMENT
// ============================================

export const marketSentiment = pgTable('bf_market_sentiment', {
  tokenSymbol: text('token_symbol').notNull(),
  date: date('date', { mode: 'string' }).notNull(),
  sentimentScore: doublePrecision('sentiment_score').notNull(),
  positiveMentions: integer('positive_mentions').notNull(),
  negativeMentions: integer('negative_mentions').notNull(),
  neutralMentions: integer('neutral_mentions').notNull(),
  sourceApi: text('source_api').notNull(),
  timestampFetched: timestamp('timestamp_fetched', { withTimezone: true }).notNull(),
  backfillRunId: text('backfill_run_id').notNull(),
}, (table) => [
  index('bf_market_sentiment_run_idx').on(table.backfillRunId),
]);

// ============================================
// ON-CHAIN METRICS
// ============================================

export const onchainMetrics = pgTable('bf_onchain_metrics', {
  tokenSymbol: text('token_symbol').notNull(),
  date: date('date', { mode: 'string' }).notNull(),
  metricName: text('metric_name').notNull(),
  metricValue: doublePrecision('metric_value').notNull(),
  sourceApi: text('source_api').notNull(),
  timestampFetched: timestamp('timestamp_fetched', { withTimezone: true }).notNull(),
  backfillRunId: text('backfill_run_id').notNull(),
}, (table) => [
  index('bf_onchain_metrics_run_idx').on(table.backfillRunId),
]);

// ============================================
// MACRO DATA
// ============================================

export const macroData = pgTable('bf_macro_data', {
  symbol: text('symbol').notNull(),
  date: date('date', { mode: 'string' }).notNull(),
  openPrice: doublePrecision('open_price'),
  highPrice: doublePrecision('high_price'),
  lowPrice: doublePrecision('low_price'),
  closePrice: doublePrecision('close_price'),
  volume: doublePrecision('volume'),
  value: doublePrecision('value'),
  timestampFetched: timestamp('timestamp_fetched', { withTimezone: true }).notNull(),
  backfillRunId: text('backfill_run_id').notNull(),
}, (table) => [
  index('bf_macro_data_run_idx').on(table.backfillRunId),
]);

// ============================================
// TYPE EXPORTS
// ============================================

export type HistoricalMarketDataRow = typeof historicalMarketData.$inferSelect;
export type NewHistoricalMarketDataRow = typeof historicalMarketData.$inferInsert;
export type MarketNewsEventRow = typeof marketNewsEvents.$inferSelect;
export type NewMarketNewsEventRow = typeof marketNewsEvents.$inferInsert;
export type MarketSentimentRow = typeof marketSentiment.$inferSelect;
export type NewMarketSentimentRow = typeof marketSentiment.$inferInsert;
export type OnchainMetricRow = typeof onchainMetrics.$inferSelect;
export type NewOnchainMetricRow = typeof onchainMetrics.$inferInsert;
export type MacroDataRow = typeof macroData.$inferSelect;
export type NewMacroDataRow = typeof macroData.$inferInsert;

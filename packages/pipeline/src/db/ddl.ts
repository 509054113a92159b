/**
 * Idempotent table creation, run once per process before the first write
 *
 * Kept in step with ./schema.ts; the tables are append-only so there is no
 * migration history to replay.
 */

export const CREATE_TABLE_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS bf_historical_market_data (
    token_symbol text NOT NULL,
    date date NOT NULL,
    open_price double precision NOT NULL,
    high_price double precision NOT NULL,
    low_price double precision NOT NULL,
    close_price double precision NOT NULL,
    volume double precision NOT NULL,
    source_api text NOT NULL,
    timestamp_fetched timestamptz NOT NULL,
    backfill_run_id text NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS bf_historical_market_data_run_idx ON bf_historical_market_data (backfill_run_id)`,

  `CREATE TABLE IF NOT EXISTS bf_market_news_events (
    token_symbol text NOT NULL,
    date date NOT NULL,
    title text NOT NULL,
    description text NOT NULL,
    source text NOT NULL,
    sentiment_score double precision NOT NULL,
    url text NOT NULL,
    timestamp_fetched timestamptz NOT NULL,
    backfill_run_id text NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS bf_market_news_events_run_idx ON bf_market_news_events (backfill_run_id)`,

  `CREATE TABLE IF NOT EXISTS bf_market_sentiment (
    token_symbol text NOT NULL,
    date date NOT NULL,
    sentiment_score double precision NOT NULL,
    positive_mentions integer NOT NULL,
    negative_mentions integer NOT NULL,
    neutral_mentions integer NOT NULL,
    source_api text NOT NULL,
    timestamp_fetched timestamptz NOT NULL,
    backfill_run_id text NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS bf_market_sentiment_run_idx ON bf_market_sentiment (backfill_run_id)`,

  `CREATE TABLE IF NOT EXISTS bf_onchain_metrics (
    token_symbol text NOT NULL,
    date date NOT NULL,
    metric_name text NOT NULL,
    metric_value double precision NOT NULL,
    source_api text NOT NULL,
    timestamp_fetched timestamptz NOT NULL,
    backfill_run_id text NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS bf_onchain_metrics_run_idx ON bf_onchain_metrics (backfill_run_id)`,

  `CREATE TABLE IF NOT EXISTS bf_macro_data (
    symbol text NOT NULL,
    date date NOT NULL,
    open_price double precision,
    high_price double precision,
    low_price double precision,
    close_price double precision,
    volume double precision,
    value double precision,
    timestamp_fetched timestamptz NOT NULL,
    backfill_run_id text NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS bf_macro_data_run_idx ON bf_macro_data (backfill_run_id)`,
];

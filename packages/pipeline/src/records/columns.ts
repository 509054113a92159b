/**
 * Export column layout per record kind
 *
 * Column names match the durable tables. Dates are YYYY-MM-DD strings and
 * capture timestamps ISO-8601 UTC strings, so a snapshot reads back without
 * any timezone interpretation.
 */

import type { CanonicalRecord, RecordKind } from './index';

export type ColumnType = 'UTF8' | 'DOUBLE' | 'INT32';

export interface ExportColumn {
  name: string;
  type: ColumnType;
  optional?: boolean;
}

export type ExportValue = string | number | null;
export type ExportRow = Record<string, ExportValue>;

const stampColumns: ExportColumn[] = [
  { name: 'timestamp_fetched', type: 'UTF8' },
  { name: 'backfill_run_id', type: 'UTF8' },
];

export const EXPORT_COLUMNS: Record<RecordKind, readonly ExportColumn[]> = {
  price_bar: [
    { name: 'token_symbol', type: 'UTF8' },
    { name: 'date', type: 'UTF8' },
    { name: 'open_price', type: 'DOUBLE' },
    { name: 'high_price', type: 'DOUBLE' },
    { name: 'low_price', type: 'DOUBLE' },
    { name: 'close_price', type: 'DOUBLE' },
    { name: 'volume', type: 'DOUBLE' },
    { name: 'source_api', type: 'UTF8' },
    ...stampColumns,
  ],
  news_event: [
    { name: 'token_symbol', type: 'UTF8' },
    { name: 'date', type: 'UTF8' },
    { name: 'title', type: 'UTF8' },
    { name: 'description', type: 'UTF8' },
    { name: 'source', type: 'UTF8' },
    { name: 'sentiment_score', type: 'DOUBLE' },
    { name: 'url', type: 'UTF8' },
    ...stampColumns,
  ],
  sentiment_score: [
    { name: 'token_symbol', type: 'UTF8' },
    { name: 'date', type: 'UTF8' },
    { name: 'sentiment_score', type: 'DOUBLE' },
    { name: 'positive_mentions', type: 'INT32' },
    { name: 'negative_mentions', type: 'INT32' },
    { name: 'neutral_mentions', type: 'INT32' },
    { name: 'source_api', type: 'UTF8' },
    ...stampColumns,
  ],
  onchain_metric: [
    { name: 'token_symbol', type: 'UTF8' },
    { name: 'date', type: 'UTF8' },
    { name: 'metric_name', type: 'UTF8' },
    { name: 'metric_value', type: 'DOUBLE' },
    { name: 'source_api', type: 'UTF8' },
    ...stampColumns,
  ],
  macro_bar: [
    { name: 'symbol', type: 'UTF8' },
    { name: 'date', type: 'UTF8' },
    { name: 'open_price', type: 'DOUBLE', optional: true },
    { name: 'high_price', type: 'DOUBLE', optional: true },
    { name: 'low_price', type: 'DOUBLE', optional: true },
    { name: 'close_price', type: 'DOUBLE', optional: true },
    { name: 'volume', type: 'DOUBLE', optional: true },
    { name: 'value', type: 'DOUBLE', optional: true },
    ...stampColumns,
  ],
};

/**
 * Flatten a record into its export row (snake_case keys, column order)
 */
export function toExportRow(record: CanonicalRecord): ExportRow {
  const stampValues = {
    timestamp_fetched: record.fetchedAt.toISOString(),
    backfill_run_id: record.runId,
  };

  switch (record.kind) {
    case 'price_bar':
      return {
        token_symbol: record.token,
        date: record.date,
        open_price: record.open,
        high_price: record.high,
        low_price: record.low,
        close_price: record.close,
        volume: record.volume,
        source_api: record.source,
        ...stampValues,
      };
    case 'news_event':
      return {
        token_symbol: record.token,
        date: record.date,
        title: record.title,
        description: record.description,
        source: record.source,
        sentiment_score: record.sentimentScore,
        url: record.url,
        ...stampValues,
      };
    case 'sentiment_score':
      return {
        token_symbol: record.token,
        date: record.date,
        sentiment_score: record.sentimentScore,
        positive_mentions: record.positiveCount,
        negative_mentions: record.negativeCount,
        neutral_mentions: record.neutralCount,
        source_api: record.source,
        ...stampValues,
      };
    case 'onchain_metric':
      return {
        token_symbol: record.token,
        date: record.date,
        metric_name: record.metricName,
        metric_value: record.metricValue,
        source_api: record.source,
        ...stampValues,
      };
    case 'macro_bar':
      return {
        symbol: record.symbol,
        date: record.date,
        open_price: record.open,
        high_price: record.high,
        low_price: record.low,
        close_price: record.close,
        volume: record.volume,
        value: record.value,
        ...stampValues,
      };
  }
}

/**
 * Rebuild an export row from values read back from a snapshot
 *
 * CSV cells arrive as strings and Parquet omits unset optional values; both
 * are coerced to the column's type, with empty or absent cells as null.
 */
export function fromSnapshotValues(kind: RecordKind, raw: Record<string, unknown>): ExportRow {
  const row: ExportRow = {};
  for (const column of EXPORT_COLUMNS[kind]) {
    row[column.name] = coerceCell(column, raw[column.name]);
  }
  return row;
}

function coerceCell(column: ExportColumn, value: unknown): ExportValue {
  if (value === undefined || value === null) return null;

  if (column.type === 'UTF8') {
    if (typeof value === 'string') return value;
    if (value instanceof Uint8Array) return Buffer.from(value).toString('utf8');
    return String(value);
  }

  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string') {
    if (value.trim() === '') return null;
    const parsed = Number(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * Durable store tests - batching, transactions and DDL kept in step with the Drizzle schema
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { getTableConfig, type PgTable } from 'drizzle-orm/pg-core';
import { EXPORT_COLUMNS, RECORD_KINDS, type MacroBar, type PriceBar, type RecordKind } from '../../records';
import { loadConfig } from '../../lib/config';
import { CREATE_TABLE_STATEMENTS } from '../ddl';
import { closeDb } from '../index';
import { historicalMarketData, macroData, marketNewsEvents, marketSentiment, onchainMetrics } from '../schema';
import { chunk, createPostgresStore } from '../store';

interface InsertCall {
  table: unknown;
  rows: unknown[];
}

// In-process database: inserts are staged per transaction and only kept on commit
const fakeDb = vi.hoisted(() => {
  const committed: InsertCall[] = [];
  const state = {
    executed: 0,
    failNextExecute: false,
    transactions: 0,
    committed,
    failOnInsert: -1,
  };

  const instance = {
    async execute(): Promise<void> {
      state.executed++;
      if (state.failNextExecute) {
        state.failNextExecute = false;
        throw new Error('permission denied for schema public');
      }
    },
    async transaction<T>(fn: (tx: { insert: (table: unknown) => { values: (rows: unknown[]) => Promise<void> } }) => Promise<T>): Promise<T> {
      state.transactions++;
      const staged: InsertCall[] = [];
      const tx = {
        insert: (table: unknown) => ({
          values: async (rows: unknown[]) => {
            if (staged.length === state.failOnInsert) {
              throw new Error('insert failed');
            }
            staged.push({ table, rows });
          },
        }),
      };
      const result = await fn(tx);
      state.committed.push(...staged);
      return result;
    },
  };

  return { state, instance };
});

vi.mock('../index', () => ({
  getDb: vi.fn(() => fakeDb.instance),
  closeDb: vi.fn(async () => undefined),
}));

const TABLES: Record<RecordKind, PgTable> = {
  price_bar: historicalMarketData,
  news_event: marketNewsEvents,
  sentiment_score: marketSentiment,
  onchain_metric: onchainMetrics,
  macro_bar: macroData,
};

const CASES = RECORD_KINDS.map((kind) => ({ kind, table: TABLES[kind] }));

/**
 * [column, notNull] pairs of a CREATE TABLE statement
 */
function ddlColumns(tableName: string): Array<[string, boolean]> {
  const statement = CREATE_TABLE_STATEMENTS.find((s) => s.startsWith(`CREATE TABLE IF NOT EXISTS ${tableName} (`));
  if (statement === undefined) return [];
  return statement
    .split('\n')
    .slice(1, -1)
    .map((line) => line.trim().replace(/,$/, ''))
    .map((line): [string, boolean] => [line.split(' ')[0] ?? '', line.endsWith('NOT NULL')]);
}

describe('chunk', () => {
  it('splits into fixed-size chunks with a shorter tail', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('returns no chunks for no items', () => {
    expect(chunk([], 500)).toEqual([]);
  });
});

describe('schema', () => {
  it.each(CASES)('$kind DDL matches the Drizzle table', ({ table }) => {
    const config = getTableConfig(table);

    expect(ddlColumns(config.name)).toEqual(config.columns.map((column) => [column.name, column.notNull]));
  });

  it.each(CASES)('$kind export columns follow the table columns', ({ kind, table }) => {
    const exportColumns = EXPORT_COLUMNS[kind].map((column) => column.name);

    expect(exportColumns).toEqual(getTableConfig(table).columns.map((column) => column.name));
  });

  it('indexes every table by run id', () => {
    for (const table of Object.values(TABLES)) {
      const { name } = getTableConfig(table);
      expect(CREATE_TABLE_STATEMENTS).toContain(
        `CREATE INDEX IF NOT EXISTS ${name}_run_idx ON ${name} (backfill_run_id)`
      );
    }
  });
});

describe('PostgresStore', () => {
  const fetchedAt = new Date('2024-01-03T00:00:00.000Z');

  function priceBar(date: string): PriceBar {
    return { kind: 'price_bar', token: 'BTC', date, open: 1, high: 2, low: 0.5, close: 1.5, volume: 10, source: 'coinapi', fetchedAt, runId: 'run-1' };
  }

  const macroBar: MacroBar = {
    kind: 'macro_bar', symbol: '^GSPC', date: '2024-01-02', open: 1, high: 1, low: 1, close: 1, volume: 0, value: 1, fetchedAt, runId: 'run-1',
  };

  function store() {
    return createPostgresStore(loadConfig({ INSERT_BATCH_SIZE: '2' }));
  }

  beforeEach(() => {
    fakeDb.state.executed = 0;
    fakeDb.state.failNextExecute = false;
    fakeDb.state.transactions = 0;
    fakeDb.state.committed = [];
    fakeDb.state.failOnInsert = -1;
    vi.mocked(closeDb).mockClear();
  });

  it('runs the DDL once across repeated ensureSchema calls', async () => {
    const pg = store();

    await pg.ensureSchema();
    await pg.ensureSchema();

    expect(fakeDb.state.executed).toBe(CREATE_TABLE_STATEMENTS.length);
  });

  it('retries schema creation after a failed attempt', async () => {
    const pg = store();
    fakeDb.state.failNextExecute = true;

    await expect(pg.ensureSchema()).rejects.toThrow('permission denied for schema public');
    await pg.ensureSchema();

    expect(fakeDb.state.executed).toBe(CREATE_TABLE_STATEMENTS.length + 1);
  });

  it('inserts every batch in one transaction, chunked by batch size', async () => {
    const pg = store();
    const bars = [priceBar('2024-01-01'), priceBar('2024-01-02'), priceBar('2024-01-03')];

    const inserted = await pg.insertRun(
      [
        { kind: 'price_bar', records: bars },
        { kind: 'macro_bar', records: [macroBar] },
      ],
      'run-1'
    );

    expect(inserted).toBe(4);
    expect(fakeDb.state.transactions).toBe(1);
    expect(fakeDb.state.committed.map((call) => [call.table, call.rows.length])).toEqual([
      [historicalMarketData, 2],
      [historicalMarketData, 1],
      [macroData, 1],
    ]);
    expect(fakeDb.state.committed[0]?.rows[0]).toEqual({
      tokenSymbol: 'BTC',
      date: '2024-01-01',
      openPrice: 1,
      highPrice: 2,
      lowPrice: 0.5,
      closePrice: 1.5,
      volume: 10,
      sourceApi: 'coinapi',
      timestampFetched: fetchedAt,
      backfillRunId: 'run-1',
    });
  });

  it('rejects the whole run when one chunk fails', async () => {
    const pg = store();
    fakeDb.state.failOnInsert = 2;
    const bars = [priceBar('2024-01-01'), priceBar('2024-01-02'), priceBar('2024-01-03')];

    await expect(
      pg.insertRun(
        [
          { kind: 'price_bar', records: bars },
          { kind: 'macro_bar', records: [macroBar] },
        ],
        'run-1'
      )
    ).rejects.toThrow('insert failed');

    expect(fakeDb.state.transactions).toBe(1);
    expect(fakeDb.state.committed).toEqual([]);
  });

  it('ends the pool on close', async () => {
    await store().close();

    expect(closeDb).toHaveBeenCalledTimes(1);
  });
});

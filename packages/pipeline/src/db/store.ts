/**
 * Durable store - one transaction per run, chunked multi-row inserts
 */

import { sql } from 'drizzle-orm';
import type { RecordBatch } from '../records';
import { createChildLogger } from '../lib/logger';
import type { Config } from '../lib/config';
import { closeDb, getDb, type Database } from './index';
import { CREATE_TABLE_STATEMENTS } from './ddl';
import {
  toHistoricalMarketDataRow,
  toMacroDataRow,
  toMarketNewsEventRow,
  toMarketSentimentRow,
  toOnchainMetricRow,
} from './rows';
import {
  historicalMarketData,
  macroData,
  marketNewsEvents,
  marketSentiment,
  onchainMetrics,
} from './schema';

/**
 * What the persistence sink needs from a database
 */
export interface DurableStore {
  /** Create the tables if absent; repeated calls are no-ops */
  ensureSchema(): Promise<void>;
  /** Insert every batch inside one transaction; resolves to the rows written */
  insertRun(batches: readonly RecordBatch[], runId: string): Promise<number>;
  close(): Promise<void>;
}

type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export interface PostgresStoreOptions {
  db: Database;
  batchSize: number;
  onClose?: () => Promise<void>;
}

export class PostgresStore implements DurableStore {
  private logger = createChildLogger({ module: 'store' });
  private db: Database;
  private batchSize: number;
  private onClose?: () => Promise<void>;
  private schemaReady: Promise<void> | null = null;

  constructor(options: PostgresStoreOptions) {
    this.db = options.db;
    this.batchSize = options.batchSize;
    this.onClose = options.onClose;
  }

  ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createTables().catch((error: unknown) => {
        this.schemaReady = null;
        throw error;
      });
    }
    return this.schemaReady;
  }

  async insertRun(batches: readonly RecordBatch[], runId: string): Promise<number> {
    const start = Date.now();
    const inserted = await this.db.transaction(async (tx) => {
      let total = 0;
      for (const batch of batches) {
        total += await this.insertBatch(tx, batch);
      }
      return total;
    });
    this.logger.info({ runId, inserted, durationMs: Date.now() - start }, 'Run committed');
    return inserted;
  }

  async close(): Promise<void> {
    await this.onClose?.();
  }

  private async createTables(): Promise<void> {
    for (const statement of CREATE_TABLE_STATEMENTS) {
      await this.db.execute(sql.raw(statement));
    }
    this.logger.debug({ statements: CREATE_TABLE_STATEMENTS.length }, 'Schema ensured');
  }

  private async insertBatch(tx: Transaction, batch: RecordBatch): Promise<number> {
    switch (batch.kind) {
      case 'price_bar':
        for (const rows of chunk(batch.records.map(toHistoricalMarketDataRow), this.batchSize)) {
          await tx.insert(historicalMarketData).values(rows);
        }
        break;
      case 'news_event':
        for (const rows of chunk(batch.records.map(toMarketNewsEventRow), this.batchSize)) {
          await tx.insert(marketNewsEvents).values(rows);
        }
        break;
      case 'sentiment_score':
        for (const rows of chunk(batch.records.map(toMarketSentimentRow), this.batchSize)) {
          await tx.insert(marketSentiment).values(rows);
        }
        break;
      case 'onchain_metric':
        for (const rows of chunk(batch.records.map(toOnchainMetricRow), this.batchSize)) {
          await tx.insert(onchainMetrics).values(rows);
        }
        break;
      case 'macro_bar':
        for (const rows of chunk(batch.records.map(toMacroDataRow), this.batchSize)) {
          await tx.insert(macroData).values(rows);
        }
        break;
    }
    this.logger.debug({ kind: batch.kind, rows: batch.records.length }, 'Batch inserted');
    return batch.records.length;
  }
}

/**
 * Store over the process-wide postgres pool; closing it ends the pool
 */
export function createPostgresStore(config: Config): PostgresStore {
  return new PostgresStore({
    db: getDb(config),
    batchSize: config.insertBatchSize,
    onClose: closeDb,
  });
}

/**
 * Persistence sink - export snapshot first, then one durable transaction
 */

import type { ProviderName } from '@crypto-backfill/config';
import type { DurableStore } from '../db/store';
import { SinkFailure } from '../lib/errors';
import { createChildLogger } from '../lib/logger';
import {
  DATASET_NAMES,
  exportFileStem,
  groupByKind,
  toExportRow,
  type CanonicalRecord,
  type DatasetName,
  type RecordKind,
} from '../records';
import { writeSnapshot, type SnapshotFiles } from './snapshot';

export interface ExportedDataset extends SnapshotFiles {
  kind: RecordKind;
  dataset: DatasetName;
}

export interface PersistResult {
  exports: ExportedDataset[];
  inserted: number;
}

export interface PersistenceSinkOptions {
  provider: ProviderName;
  exportsDir: string;
  store: DurableStore;
}

export class PersistenceSink {
  private logger = createChildLogger({ module: 'sink' });
  private provider: ProviderName;
  private exportsDir: string;
  private store: DurableStore;

  constructor(options: PersistenceSinkOptions) {
    this.provider = options.provider;
    this.exportsDir = options.exportsDir;
    this.store = options.store;
  }

  /**
   * Write the run's snapshots, then insert every record in one transaction
   *
   * Throws SinkFailure; snapshot files written before a store failure stay
   * on disk. The records must already carry the run id.
   */
  async persist(records: readonly CanonicalRecord[], runId: string): Promise<PersistResult> {
    if (records.length === 0) {
      this.logger.info({ runId, provider: this.provider }, 'Nothing to persist');
      return { exports: [], inserted: 0 };
    }

    const batches = groupByKind(records);

    const exports: ExportedDataset[] = [];
    try {
      for (const batch of batches) {
        const files = await writeSnapshot(
          this.exportsDir,
          exportFileStem(this.provider, batch.kind, runId),
          batch.kind,
          batch.records.map(toExportRow)
        );
        exports.push({ ...files, kind: batch.kind, dataset: DATASET_NAMES[batch.kind] });
        this.logger.info(
          { runId, dataset: DATASET_NAMES[batch.kind], rows: files.rows, csv: files.csvPath, parquet: files.parquetPath },
          'Export snapshot written'
        );
      }
    } catch (error) {
      throw SinkFailure.wrap('export', runId, error);
    }

    try {
      await this.store.ensureSchema();
    } catch (error) {
      throw SinkFailure.wrap('schema', runId, error);
    }

    let inserted: number;
    try {
      inserted = await this.store.insertRun(batches, runId);
    } catch (error) {
      throw SinkFailure.wrap('store', runId, error);
    }

    return { exports, inserted };
  }
}

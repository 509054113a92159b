/**
 * Persistence sink tests - export first, then one all-or-nothing store write
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SinkFailure } from '../../lib/errors';
import { stamp, withRunId, type CanonicalRecord } from '../../records';
import { PersistenceSink } from '../sink';
import { readCsvSnapshot } from '../snapshot';
import { createTempDir, MemoryStore, removeTempDir } from '../../test/fakes';

const fetchedAt = new Date('2024-01-05T12:00:00.000Z');

function records(runId: string): CanonicalRecord[] {
  return [
    withRunId(
      stamp(
        { kind: 'price_bar', token: 'BTC', date: '2024-01-01', open: 1, high: 2, low: 1, close: 2, volume: 5, source: 'coinapi' },
        fetchedAt
      ),
      runId
    ),
    withRunId(
      stamp(
        { kind: 'onchain_metric', token: 'BTC', date: '2024-01-01', metricName: 'dev_activity', metricValue: 3, source: 'santiment' },
        fetchedAt
      ),
      runId
    ),
  ];
}

describe('PersistenceSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('writes one export per kind and commits every record', async () => {
    const store = new MemoryStore();
    const sink = new PersistenceSink({ provider: 'santiment', exportsDir: dir, store });

    const result = await sink.persist(records('run-1'), 'run-1');

    expect(result.inserted).toBe(2);
    expect(result.exports.map((entry) => [entry.dataset, entry.rows])).toEqual([
      ['ohlcv', 1],
      ['onchain', 1],
    ]);
    expect(result.exports[1]?.csvPath).toBe(join(dir, 'santiment_onchain_run-1.csv'));
    expect(store.rowsForRun('run-1')).toHaveLength(2);
    expect(store.schemaCalls).toBe(1);
  });

  it('does nothing for an empty batch', async () => {
    const store = new MemoryStore();
    const sink = new PersistenceSink({ provider: 'coinapi', exportsDir: join(dir, 'unused'), store });

    expect(await sink.persist([], 'run-1')).toEqual({ exports: [], inserted: 0 });
    expect(store.schemaCalls).toBe(0);
    await expect(stat(join(dir, 'unused'))).rejects.toThrow();
  });

  it('keeps the exports and writes no rows when the store fails', async () => {
    const store = new MemoryStore({ failOn: 'onchain_metric' });
    const sink = new PersistenceSink({ provider: 'santiment', exportsDir: dir, store });

    const error = await sink.persist(records('run-2'), 'run-2').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SinkFailure);
    if (error instanceof SinkFailure) {
      expect(error.stage).toBe('store');
      expect(error.runId).toBe('run-2');
      expect(error.message).toBe('store failed for run run-2: insert into onchain_metric failed');
    }
    expect(store.rows).toHaveLength(0);
    expect(await readCsvSnapshot(join(dir, 'santiment_ohlcv_run-2.csv'), 'price_bar')).toHaveLength(1);
    expect((await stat(join(dir, 'santiment_onchain_run-2.parquet'))).size).toBeGreaterThan(0);
  });

  it('reports a schema failure before inserting', async () => {
    const store = new MemoryStore({ failSchema: true });
    const sink = new PersistenceSink({ provider: 'coinapi', exportsDir: dir, store });

    await expect(sink.persist(records('run-3'), 'run-3')).rejects.toMatchObject({
      code: 'SINK_FAILURE',
      stage: 'schema',
    });
    expect(store.rows).toHaveLength(0);
  });

  it('reports an export failure without touching the store', async () => {
    const blocked = join(dir, 'not-a-dir');
    await writeFile(blocked, 'x');
    const store = new MemoryStore();
    const sink = new PersistenceSink({ provider: 'coinapi', exportsDir: blocked, store });

    await expect(sink.persist(records('run-4'), 'run-4')).rejects.toMatchObject({ stage: 'export' });
    expect(store.schemaCalls).toBe(0);
  });
});

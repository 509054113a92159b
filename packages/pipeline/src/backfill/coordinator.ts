/**
 * Run coordinator - drives one provider backfill for a token set and window
 *
 * Work items are fetched one at a time (tokens outer, plan order inner). A
 * failed item is logged and skipped; only the sink can abort a run.
 */

import { assertWindow, type DateWindow, type ProviderName } from '@crypto-backfill/config';
import { getFailureDetails, type FetchFailure } from '@crypto-backfill/api';
import { createAdapter, type AdapterDeps, type ProviderAdapter, type WorkItem } from '../adapters';
import { createPostgresStore, type DurableStore } from '../db/store';
import { assertProviderCredentials, type Config } from '../lib/config';
import { createChildLogger } from '../lib/logger';
import {
  countByKind,
  stamp,
  withRunId,
  type CanonicalRecord,
  type RecordKind,
} from '../records';
import { PersistenceSink, type PersistResult } from './sink';

export interface FailedItem {
  token: string;
  window: DateWindow;
  metric?: string;
  kind: FetchFailure['kind'];
  status?: number;
  message: string;
}

export interface RunSummary {
  runId: string;
  provider: ProviderName;
  workItems: number;
  acceptedCount: number;
  countsByKind: Partial<Record<RecordKind, number>>;
  failedItems: FailedItem[];
  persisted: PersistResult;
}

export interface RunCoordinatorOptions {
  adapter: ProviderAdapter;
  sink: PersistenceSink;
  /** Capture-time source for fetchedAt */
  clock?: () => Date;
}

/**
 * Trim, uppercase and de-duplicate tokens, keeping first occurrences
 *
 * @example
 * normalizeTokens([' btc', 'ETH', 'Btc', '']) // ['BTC', 'ETH']
 */
export function normalizeTokens(tokens: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const token of tokens) {
    const normalized = token.trim().toUpperCase();
    if (normalized !== '') {
      seen.add(normalized);
    }
  }
  return [...seen];
}

export class RunCoordinator {
  private logger = createChildLogger({ module: 'coordinator' });
  private adapter: ProviderAdapter;
  private sink: PersistenceSink;
  private clock: () => Date;

  constructor(options: RunCoordinatorOptions) {
    this.adapter = options.adapter;
    this.sink = options.sink;
    this.clock = options.clock ?? (() => new Date());
  }

  async run(tokens: Iterable<string>, window: DateWindow, runId: string): Promise<RunSummary> {
    const provider = this.adapter.provider;
    const tokenList = normalizeTokens(tokens);
    if (tokenList.length === 0) {
      throw new RangeError('At least one token is required');
    }
    assertWindow(window);

    const start = Date.now();
    this.logger.info({ provider, runId, tokens: tokenList, window }, 'Backfill run started');

    const accumulated: CanonicalRecord[] = [];
    const failedItems: FailedItem[] = [];
    let workItems = 0;

    for (const token of tokenList) {
      for (const item of this.adapter.plan(token, window)) {
        workItems++;
        const result = await this.adapter.fetch(item);

        if (!result.ok) {
          failedItems.push(this.recordFailure(item, result.failure));
          continue;
        }

        const fetchedAt = this.clock();
        for (const draft of result.records) {
          accumulated.push(stamp(draft, fetchedAt));
        }
        this.logger.debug(
          { token, window: item.window, metric: item.metric, records: result.records.length },
          'Work item fetched'
        );
      }
    }

    const records = accumulated.map((record) => withRunId(record, runId));
    const countsByKind = countByKind(records);

    if (records.length === 0) {
      this.logger.info({ provider, runId, workItems, failed: failedItems.length }, 'Backfill completed with zero records');
    }

    const persisted = await this.sink.persist(records, runId);

    this.logger.info(
      {
        provider,
        runId,
        workItems,
        acceptedCount: records.length,
        countsByKind,
        failed: failedItems.length,
        inserted: persisted.inserted,
        durationMs: Date.now() - start,
      },
      'Backfill run completed'
    );

    return {
      runId,
      provider,
      workItems,
      acceptedCount: records.length,
      countsByKind,
      failedItems,
      persisted,
    };
  }

  private recordFailure(item: WorkItem, failure: FetchFailure): FailedItem {
    const details = getFailureDetails(failure);
    this.logger.warn(
      { token: item.token, window: item.window, metric: item.metric, ...details },
      'Work item failed, skipping'
    );
    return {
      token: item.token,
      window: item.window,
      metric: item.metric,
      kind: failure.kind,
      status: failure.status,
      message: failure.message,
    };
  }
}

export interface CoordinatorDeps extends AdapterDeps {
  /** Durable store; defaults to PostgreSQL from the config */
  store?: DurableStore;
  clock?: () => Date;
}

/**
 * Wire adapter, sink and store for one provider from validated configuration
 *
 * Credentials are checked before anything is constructed, so a missing key
 * fails without network or database activity.
 */
export function createRunCoordinator(
  provider: ProviderName,
  config: Config,
  deps: CoordinatorDeps = {}
): { coordinator: RunCoordinator; store: DurableStore } {
  assertProviderCredentials(config, provider);

  const adapter = createAdapter(provider, config, { fetch: deps.fetch });
  const store = deps.store ?? createPostgresStore(config);
  const sink = new PersistenceSink({ provider, exportsDir: config.exportsDir, store });

  return {
    coordinator: new RunCoordinator({ adapter, sink, clock: deps.clock }),
    store,
  };
}

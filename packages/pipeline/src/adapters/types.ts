/**
 * Provider adapter contract
 */

import type { DateWindow, ProviderName } from '@crypto-backfill/config';
import type { FetchFailure } from '@crypto-backfill/api';
import type { RecordDraft } from '../records';

/**
 * Smallest unit of fetch work: a token-day, a token-window or a token-metric
 */
export interface WorkItem {
  token: string;
  window: DateWindow;
  metric?: string;
}

export type AdapterResult =
  | { ok: true; records: RecordDraft[] }
  | { ok: false; failure: FetchFailure };

export interface ProviderAdapter {
  readonly provider: ProviderName;

  /**
   * Work items for one token, in the order they must be fetched
   */
  plan(token: string, window: DateWindow): WorkItem[];

  /**
   * Fetch and normalize one work item; transport problems come back as a
   * failure value, never as a rejection
   */
  fetch(item: WorkItem): Promise<AdapterResult>;
}

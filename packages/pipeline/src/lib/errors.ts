/**
 * Run-level errors - the only failures that end a backfill with a non-zero exit
 */

import { BaseAPIError } from '@crypto-backfill/api';

/**
 * Missing credential or invalid environment; raised before any I/O
 */
export class ConfigError extends BaseAPIError {
  readonly code = 'CONFIG_ERROR';
}

export type SinkStage = 'schema' | 'export' | 'store';

/**
 * Export write, schema creation or transaction failed; the run's durable
 * write is rolled back and already-written exports stay on disk
 */
export class SinkFailure extends BaseAPIError {
  readonly code = 'SINK_FAILURE';

  constructor(
    message: string,
    public readonly stage: SinkStage,
    public readonly runId: string,
    public readonly cause?: Error
  ) {
    super(message);
  }

  static wrap(stage: SinkStage, runId: string, error: unknown): SinkFailure {
    if (error instanceof SinkFailure) return error;
    const cause = error instanceof Error ? error : new Error(String(error));
    return new SinkFailure(`${stage} failed for run ${runId}: ${cause.message}`, stage, runId, cause);
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isSinkFailure(error: unknown): error is SinkFailure {
  return error instanceof SinkFailure;
}

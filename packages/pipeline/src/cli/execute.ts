/**
 * Run executor behind the CLI - env file, wiring, signals and store cleanup
 */

import { config as loadEnvFile } from 'dotenv';
import type { ProviderName } from '@crypto-backfill/config';
import { createRunCoordinator, type RunCoordinator, type RunSummary } from '../backfill/coordinator';
import type { DurableStore } from '../db/store';
import { getConfig, type Config } from '../lib/config';
import { getLogger } from '../lib/logger';
import type { RunRequest } from './program';

export interface ExecuteDeps {
  /** Replaces the production wiring (tests) */
  createCoordinator?: (
    provider: ProviderName,
    config: Config
  ) => { coordinator: RunCoordinator; store: DurableStore };
}

/**
 * Close the store without letting a close error mask the run's own outcome
 */
async function closeStore(store: DurableStore): Promise<void> {
  try {
    await store.close();
  } catch (error) {
    getLogger().error({ error }, 'Failed to close database connection');
  }
}

export async function executeRun(request: RunRequest, deps: ExecuteDeps = {}): Promise<RunSummary> {
  // Variables already in the environment win over the file
  const envFile = loadEnvFile({ path: request.envFile });

  const config = getConfig();
  const logger = getLogger();
  logger.debug({ envFile: request.envFile, loaded: !envFile.error }, 'Environment file');

  const { coordinator, store } = (deps.createCoordinator ?? createRunCoordinator)(request.provider, config);

  // No mid-run cancellation: close the pool (rolling back an open transaction) and exit
  const shutdown = async (signal: NodeJS.Signals) => {
    logger.warn({ signal, runId: request.runId }, 'Interrupted, closing database connection');
    await closeStore(store);
    process.exit(1);
  };
  const onSigint = () => void shutdown('SIGINT');
  const onSigterm = () => void shutdown('SIGTERM');
  process.once('SIGINT', onSigint);
  process.once('SIGTERM', onSigterm);

  try {
    return await coordinator.run(request.tokens, request.window, request.runId);
  } finally {
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
    await closeStore(store);
  }
}

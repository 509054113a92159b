/**
 * Crypto backfill pipeline - Main exports
 */

// Records
export * from './records';

// Adapters
export * from './adapters';

// Backfill
export {
  RunCoordinator,
  createRunCoordinator,
  normalizeTokens,
  type RunSummary,
  type FailedItem,
  type RunCoordinatorOptions,
  type CoordinatorDeps,
} from './backfill/coordinator';
export {
  PersistenceSink,
  type PersistResult,
  type ExportedDataset,
  type PersistenceSinkOptions,
} from './backfill/sink';
export {
  writeSnapshot,
  writeCsvSnapshot,
  writeParquetSnapshot,
  readCsvSnapshot,
  readParquetSnapshot,
  type SnapshotFiles,
} from './backfill/snapshot';

// Database
export * from './db';
export { PostgresStore, createPostgresStore, chunk, type DurableStore } from './db/store';
export { CREATE_TABLE_STATEMENTS } from './db/ddl';

// CLI
export { buildProgram, runCli, exitCodeFor, EXIT_CODES, type RunRequest, type CliDeps } from './cli/program';
export { executeRun, type ExecuteDeps } from './cli/execute';

// Config, errors & logger
export {
  getConfig,
  loadConfig,
  resetConfig,
  requireProviderKey,
  assertProviderCredentials,
  type Config,
} from './lib/config';
export { ConfigError, SinkFailure, isConfigError, isSinkFailure } from './lib/errors';
export { getLogger, createChildLogger } from './lib/logger';

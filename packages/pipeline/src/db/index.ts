/**
 * Drizzle database client
 */

import { drizzle, PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';
import { getConfig, type Config } from '../lib/config';
import { getLogger } from '../lib/logger';

export * from './schema';

export type Database = PostgresJsDatabase<typeof schema>;

let db: Database | null = null;
let queryClient: postgres.Sql | null = null;

/**
 * Get or create the database connection
 */
export function getDb(config: Config = getConfig()): Database {
  if (db) {
    return db;
  }

  const logger = getLogger();

  logger.info(
    { host: config.dbHost, port: config.dbPort, database: config.dbName, user: config.dbUser, password: '****' },
    'Connecting to database'
  );

  queryClient = postgres({
    host: config.dbHost,
    port: config.dbPort,
    database: config.dbName,
    username: config.dbUser,
    password: config.dbPassword,
    max: config.dbPoolMax,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: () => {},
    connection: {
      statement_timeout: config.queryTimeoutMs,
    },
  });

  db = drizzle(queryClient, { schema });

  return db;
}

/**
 * Close the database connection
 */
export async function closeDb(): Promise<void> {
  if (queryClient) {
    await queryClient.end();
    queryClient = null;
    db = null;
    getLogger().info('Database connection closed');
  }
}

import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import * as schema from './schema.js';
import { config } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { seedPersonas } from './seed.js';

const logger = createLogger('database');

const SCHEMA_FILE = join(process.cwd(), 'sql', 'schema.sql');

export type AppDatabase = BetterSQLite3Database<typeof schema>;

let db: AppDatabase | null = null;
let sqlite: Database.Database | null = null;

/**
 * Opens the SQLite database, applies `sql/schema.sql` and seeds the default
 * personas. Pass `':memory:'` for an isolated throwaway database.
 */
export async function initializeDatabase(url: string = config.database.url): Promise<AppDatabase> {
  logger.info('Initializing database', { url });

  if (sqlite) {
    closeDatabase();
  }

  if (url !== ':memory:') {
    mkdirSync(dirname(url), { recursive: true });
  }

  sqlite = new Database(url);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.exec(readFileSync(SCHEMA_FILE, 'utf-8'));

  db = drizzle(sqlite, { schema });

  const seeded = await seedPersonas(db);
  logger.info('Database initialized', { personasSeeded: seeded });
  return db;
}

export function getDatabase(): AppDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return db;
}

/** Cheap round trip used by the readiness probe. */
export function pingDatabase(): boolean {
  if (!sqlite) return false;
  const row = sqlite.prepare('SELECT 1 AS ok').get();
  return typeof row === 'object' && row !== null && 'ok' in row && row.ok === 1;
}

export function closeDatabase(): void {
  if (sqlite) {
    logger.info('Closing database connection');
    sqlite.close();
    sqlite = null;
    db = null;
  }
}

export { schema };
export * from './schema.js';

/**
 * Database Service
 *
 * SQLite database management for the fleet fuel store.
 * Implements SEC-006: Parameterized queries (enforced by better-sqlite3 API).
 *
 * @module main/services/database
 * @security SEC-006: Prepared statements for all queries
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * Database instance type exported for DAL usage
 */
export type DatabaseInstance = Database.Database;

/**
 * Database configuration options
 */
export interface DatabaseOptions {
  /** Path to database file, or `:memory:` */
  dbPath: string;
  /** Enable verbose SQL logging (debug only) */
  verbose?: boolean;
  /** Memory limit for SQLite in KB (default: 64MB) */
  memoryLimit?: number;
}

// ============================================================================
// Constants
// ============================================================================

const IN_MEMORY_PATH = ':memory:';
const DEFAULT_MEMORY_LIMIT_KB = 64 * 1024; // 64MB

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('database');

// ============================================================================
// Singleton State
// ============================================================================

let dbInstance: Database.Database | null = null;

// ============================================================================
// Database Initialization
// ============================================================================

/**
 * Open the SQLite database and apply connection pragmas.
 * Returns the existing instance when already open.
 *
 * @throws Error if the file cannot be opened or read
 */
export function initializeDatabase(options: DatabaseOptions): Database.Database {
  if (dbInstance) {
    log.debug('Returning existing database instance');
    return dbInstance;
  }

  const finalDbPath = options.dbPath;
  const inMemory = finalDbPath === IN_MEMORY_PATH;

  if (!inMemory) {
    const dbDir = path.dirname(path.resolve(finalDbPath));
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
      log.debug('Database directory created', { path: dbDir });
    }
  }

  let instance: Database.Database;
  try {
    instance = new Database(finalDbPath, {
      verbose: options.verbose
        ? (message?: unknown) =>
            log.debug('SQL executed', { sql: String(message).substring(0, 200) })
        : undefined,
    });
    log.debug('Database file opened', { path: finalDbPath });
  } catch (error) {
    log.error('Failed to open database file', {
      path: finalDbPath,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    throw new Error(
      `Failed to open database: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  // Verify database is accessible
  try {
    instance.exec('SELECT count(*) FROM sqlite_master');
  } catch (error) {
    instance.close();
    log.error('Database access verification failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    throw new Error('Database access verification failed. The database may be corrupted.');
  }

  applyPerformancePragmas(instance, options, inMemory);

  dbInstance = instance;

  log.info('Database initialized successfully', { path: finalDbPath });

  return instance;
}

/**
 * Apply performance optimization pragmas
 */
function applyPerformancePragmas(
  db: Database.Database,
  options: DatabaseOptions,
  inMemory: boolean
): void {
  // WAL needs a file; in-memory databases keep their own journal
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }

  db.pragma('synchronous = NORMAL');

  const memoryLimit = options.memoryLimit || DEFAULT_MEMORY_LIMIT_KB;
  db.pragma(`cache_size = -${memoryLimit}`);

  db.pragma('foreign_keys = ON');
  db.pragma('temp_store = MEMORY');

  log.debug('Performance pragmas applied', { memoryLimitKB: memoryLimit });
}

// ============================================================================
// Database Access
// ============================================================================

/**
 * Get the database instance
 *
 * @throws Error if database not initialized
 */
export function getDatabase(): Database.Database {
  if (!dbInstance) {
    throw new Error(
      'Database not initialized. Call initializeDatabase() first. ' +
        'This typically occurs during application startup.'
    );
  }
  return dbInstance;
}

export function isDatabaseInitialized(): boolean {
  return dbInstance !== null;
}

/**
 * Run integrity check on database
 *
 * @returns true if database passes integrity check
 */
export function checkDatabaseIntegrity(): boolean {
  const db = getDatabase();
  const result = db.pragma('integrity_check') as Array<{ integrity_check: string }>;

  const isOk = result.length === 1 && result[0].integrity_check === 'ok';

  if (isOk) {
    log.info('Database integrity check passed');
  } else {
    log.error('Database integrity check failed', { result });
  }

  return isOk;
}

// ============================================================================
// Database Lifecycle
// ============================================================================

/**
 * Close the database connection
 * Call this during shutdown and between isolated test runs
 */
export function closeDatabase(): void {
  if (!dbInstance) {
    return;
  }

  const instance = dbInstance;
  dbInstance = null;

  if (instance.memory) {
    instance.close();
  } else {
    // Checkpoint WAL before closing
    instance.pragma('wal_checkpoint(TRUNCATE)');
    instance.close();
  }
  log.info('Database closed successfully');
}

/**
 * Execute a function within a database transaction
 * Automatically commits on success, rolls back on error
 */
export function withTransaction<T>(fn: () => T): T {
  const db = getDatabase();
  return db.transaction(fn)();
}

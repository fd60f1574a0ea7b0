/**
 * Database Bootstrap Service
 *
 * Startup orchestration for the fleet fuel store:
 * - Open the SQLite database
 * - Transactional migrations (DB-003)
 * - Schema validation and health check after initialization
 * - Structured logging (LM-001)
 *
 * Failures come back as a sanitized {@link BootstrapResult}, never a throw.
 *
 * @module main/services/database-bootstrap
 * @security LM-001: Structured logging with no secrets
 * @security API-003: Centralized error handling
 */

import { randomUUID } from 'crypto';
import {
  initializeDatabase,
  isDatabaseInitialized,
  getDatabase,
  checkDatabaseIntegrity,
  closeDatabase,
} from './database.service';
import {
  runMigrations,
  getCurrentSchemaVersion,
  DEFAULT_MIGRATIONS_DIR,
  type MigrationSummary,
} from './migration.service';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * Bootstrap initialization result
 */
export interface BootstrapResult {
  success: boolean;
  /** Correlation ID for error tracking (API-003) */
  correlationId: string;
  state: DatabaseState;
  migrations?: MigrationSummary;
  /** Sanitized error information if failed */
  error?: BootstrapError;
  durationMs: number;
}

export type DatabaseState = 'uninitialized' | 'initializing' | 'migrating' | 'validating' | 'ready' | 'failed';

export interface BootstrapError {
  code: BootstrapErrorCode;
  /** User-facing message (no stack traces or internal details) */
  message: string;
  recoverable: boolean;
  recoveryAction?: string;
}

export type BootstrapErrorCode =
  | 'DATABASE_LOCKED'
  | 'DATABASE_CORRUPTED'
  | 'MIGRATION_FAILED'
  | 'SCHEMA_VALIDATION_FAILED'
  | 'UNKNOWN_ERROR';

export interface BootstrapOptions {
  /** Database file, or `:memory:` */
  dbPath: string;
  /** Override the bundled migrations directory */
  migrationsDir?: string;
  /** Close and re-open an already initialized database */
  force?: boolean;
}

export interface HealthCheckResult {
  healthy: boolean;
  checks: {
    connection: boolean;
    integrity: boolean;
    schemaVersion: number;
    tableCount: number;
    requiredTablesPresent: boolean;
  };
  error?: string;
}

// ============================================================================
// Constants
// ============================================================================

const REQUIRED_TABLES = [
  'schema_migrations',
  'vehicles',
  'drivers',
  'fuel_stations',
  'cost_centers',
  'fuel_transactions',
] as const;

// ============================================================================
// Logger & State
// ============================================================================

const log = createLogger('database-bootstrap');

let currentState: DatabaseState = 'uninitialized';

export function getDatabaseState(): DatabaseState {
  return currentState;
}

export function isDatabaseReady(): boolean {
  return currentState === 'ready' && isDatabaseInitialized();
}

function setState(newState: DatabaseState, correlationId: string): void {
  log.debug('Database state transition', { correlationId, from: currentState, to: newState });
  currentState = newState;
}

// ============================================================================
// Schema Validation
// ============================================================================

function listTables(): Set<string> {
  const rows = getDatabase()
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table'")
    .all() as Array<{ name: string }>;
  return new Set(rows.map((t) => t.name));
}

function validateSchema(correlationId: string): BootstrapError | null {
  const tableNames = listTables();
  const missingTables = REQUIRED_TABLES.filter((table) => !tableNames.has(table));

  if (missingTables.length > 0) {
    log.error('Schema validation failed - missing tables', { correlationId, missingTables });
    return {
      code: 'SCHEMA_VALIDATION_FAILED',
      message: 'Database schema is incomplete. Some required tables are missing.',
      recoverable: false,
      recoveryAction: 'Delete the database file and run again to recreate the schema.',
    };
  }

  log.info('Schema validation passed', { correlationId, tableCount: tableNames.size });
  return null;
}

// ============================================================================
// Health Check
// ============================================================================

export function performHealthCheck(): HealthCheckResult {
  if (!isDatabaseInitialized()) {
    return {
      healthy: false,
      checks: {
        connection: false,
        integrity: false,
        schemaVersion: 0,
        tableCount: 0,
        requiredTablesPresent: false,
      },
      error: 'Database not initialized',
    };
  }

  try {
    const connectionTest = getDatabase().prepare('SELECT 1 as result').get() as { result: number };
    const connection = connectionTest.result === 1;
    const integrity = checkDatabaseIntegrity();
    const tableNames = listTables();
    const requiredTablesPresent = REQUIRED_TABLES.every((table) => tableNames.has(table));

    return {
      healthy: connection && integrity && requiredTablesPresent,
      checks: {
        connection,
        integrity,
        schemaVersion: getCurrentSchemaVersion(),
        tableCount: tableNames.size,
        requiredTablesPresent,
      },
    };
  } catch (error) {
    return {
      healthy: false,
      checks: {
        connection: false,
        integrity: false,
        schemaVersion: 0,
        tableCount: 0,
        requiredTablesPresent: false,
      },
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}

// ============================================================================
// Bootstrap
// ============================================================================

function classifyOpenError(errorMessage: string): BootstrapError {
  if (errorMessage.includes('locked') || errorMessage.includes('SQLITE_BUSY')) {
    return {
      code: 'DATABASE_LOCKED',
      message: 'Database is locked by another process.',
      recoverable: true,
      recoveryAction: 'Close other processes using the database and retry.',
    };
  }
  if (errorMessage.includes('corrupt') || errorMessage.includes('malformed')) {
    return {
      code: 'DATABASE_CORRUPTED',
      message: 'Database file is corrupted.',
      recoverable: false,
      recoveryAction: 'Delete the database file and run again to recreate.',
    };
  }
  return { code: 'UNKNOWN_ERROR', message: 'Failed to initialize database.', recoverable: false };
}

/**
 * Open the database, apply pending migrations and verify the schema
 */
export function bootstrapDatabase(options: BootstrapOptions): BootstrapResult {
  const correlationId = randomUUID();
  const startTime = Date.now();

  const fail = (error: BootstrapError, migrations?: MigrationSummary): BootstrapResult => {
    setState('failed', correlationId);
    return {
      success: false,
      correlationId,
      state: 'failed',
      migrations,
      error,
      durationMs: Date.now() - startTime,
    };
  };

  log.info('Starting database bootstrap', { correlationId, dbPath: options.dbPath });

  if (isDatabaseInitialized()) {
    if (!options.force) {
      log.info('Database already initialized', { correlationId });
      setState('ready', correlationId);
      return { success: true, correlationId, state: 'ready', durationMs: Date.now() - startTime };
    }
    closeDatabase();
  }

  // Step 1: Open database
  setState('initializing', correlationId);
  try {
    initializeDatabase({ dbPath: options.dbPath });
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    log.error('Database initialization failed', { correlationId, error: errorMessage });
    return fail(classifyOpenError(errorMessage));
  }

  // Step 2: Run migrations
  setState('migrating', correlationId);
  let migrationSummary: MigrationSummary;
  try {
    migrationSummary = runMigrations(options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR);
  } catch (error) {
    log.error('Migration execution error', {
      correlationId,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return fail({
      code: 'MIGRATION_FAILED',
      message: 'Failed to execute database migrations.',
      recoverable: false,
    });
  }

  if (migrationSummary.failed) {
    log.error('Migration failed', { correlationId, failedMigration: migrationSummary.failed.name });
    return fail(
      {
        code: 'MIGRATION_FAILED',
        message: `Database migration failed: ${migrationSummary.failed.name}`,
        recoverable: false,
      },
      migrationSummary
    );
  }

  // Step 3: Validate schema
  setState('validating', correlationId);
  const schemaError = validateSchema(correlationId);
  if (schemaError) {
    return fail(schemaError, migrationSummary);
  }

  setState('ready', correlationId);
  log.info('Database bootstrap completed successfully', {
    correlationId,
    schemaVersion: getCurrentSchemaVersion(),
    applied: migrationSummary.applied.length,
    durationMs: Date.now() - startTime,
  });

  return {
    success: true,
    correlationId,
    state: 'ready',
    migrations: migrationSummary,
    durationMs: Date.now() - startTime,
  };
}

// ============================================================================
// Shutdown
// ============================================================================

export function shutdownDatabase(): void {
  log.info('Shutting down database');

  try {
    closeDatabase();
  } catch (error) {
    log.error('Error during database shutdown', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
  currentState = 'uninitialized';
}

/**
 * Migration Service
 *
 * Applies `v###_name.sql` files in version order, one transaction each, and
 * records every applied version in `schema_migrations`.
 *
 * @module main/services/migration
 * @security SEC-006: All SQL via parameterized queries
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { getDatabase } from './database.service';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface Migration {
  version: number;
  /** File name after the version, underscores read as spaces */
  name: string;
  sql: string;
}

export interface MigrationResult {
  success: boolean;
  version: number;
  name: string;
  error?: string;
}

export interface MigrationSummary {
  applied: MigrationResult[];
  /** Versions found already recorded */
  skipped: number[];
  failed: MigrationResult | null;
}

// ============================================================================
// Constants
// ============================================================================

const MIGRATION_FILE_PATTERN = /^v(\d{3})_(.+)\.sql$/;

export const DEFAULT_MIGRATIONS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../migrations'
);

const log = createLogger('migration');

// ============================================================================
// Version Tracking
// ============================================================================

export function initializeMigrationTable(): void {
  getDatabase().exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);
}

export function getAppliedMigrations(): number[] {
  const rows = getDatabase()
    .prepare('SELECT version FROM schema_migrations ORDER BY version')
    .all() as Array<{ version: number }>;
  return rows.map((row) => row.version);
}

/**
 * @returns Highest applied version, 0 on a fresh database
 */
export function getCurrentSchemaVersion(): number {
  const row = getDatabase().prepare('SELECT MAX(version) AS version FROM schema_migrations').get() as {
    version: number | null;
  };
  return row.version ?? 0;
}

// ============================================================================
// Applying
// ============================================================================

/**
 * Run one migration and record it. A failing statement rolls back the
 * whole file, including statements before it.
 */
export function applyMigration(migration: Migration): MigrationResult {
  const { version, name } = migration;
  const db = getDatabase();

  try {
    db.transaction(() => {
      db.exec(migration.sql);
      db.prepare('INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)').run(
        version,
        name,
        new Date().toISOString()
      );
    })();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error('Migration failed', { version, name, error: message });
    return { success: false, version, name, error: message };
  }

  log.info('Migration applied', { version, name });
  return { success: true, version, name };
}

export function loadMigrationsFromDirectory(migrationsDir: string): Migration[] {
  if (!fs.existsSync(migrationsDir)) {
    log.warn('Migrations directory does not exist', { path: migrationsDir });
    return [];
  }

  return fs
    .readdirSync(migrationsDir)
    .flatMap((file): Migration[] => {
      const match = MIGRATION_FILE_PATTERN.exec(file);
      if (!match) {
        return [];
      }
      return [
        {
          version: Number(match[1]),
          name: match[2].replace(/_/g, ' '),
          sql: fs.readFileSync(path.join(migrationsDir, file), 'utf-8'),
        },
      ];
    })
    .sort((a, b) => a.version - b.version);
}

/**
 * Apply every pending migration in `migrationsDir`, stopping at the first
 * failure
 */
export function runMigrations(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): MigrationSummary {
  initializeMigrationTable();
  const alreadyApplied = new Set(getAppliedMigrations());
  const summary: MigrationSummary = { applied: [], skipped: [], failed: null };

  for (const migration of loadMigrationsFromDirectory(migrationsDir)) {
    if (alreadyApplied.has(migration.version)) {
      summary.skipped.push(migration.version);
      continue;
    }

    const result = applyMigration(migration);
    if (!result.success) {
      summary.failed = result;
      break;
    }
    summary.applied.push(result);
  }

  return summary;
}

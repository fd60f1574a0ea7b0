/**
 * Base Data Access Layer
 *
 * Abstract base classes providing common read operations. All queries use
 * parameterized statements to prevent SQL injection.
 *
 * @module main/dal/base
 * @security SEC-006: All queries use prepared statements with parameter binding
 * @security DB-001: ORM-like patterns with safe query building
 */

import { getDatabase, isDatabaseInitialized, type DatabaseInstance } from '../services/database.service';
import { randomUUID } from 'crypto';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * Base entity with common fields
 */
export interface BaseEntity {
  created_at: string;
  updated_at: string;
}

/**
 * Reference entity (vehicle, driver, station, cost center)
 * `active` is stored as 0/1
 */
export interface ReferenceEntity extends BaseEntity {
  active: number;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('dal');

// ============================================================================
// Base DAL Class
// ============================================================================

/**
 * Abstract base class for Data Access Layer implementations
 *
 * @template T - Entity type
 */
export abstract class BaseDAL<T extends BaseEntity> {
  /** Table name (must match schema exactly) */
  protected abstract readonly tableName: string;

  /** Primary key column name */
  protected abstract readonly primaryKey: string;

  /**
   * Get database instance
   * @throws Error if database is not initialized
   */
  protected get db(): DatabaseInstance {
    if (!isDatabaseInitialized()) {
      throw new Error(
        `Database not initialized. Cannot perform ${this.tableName} operations. ` +
          'Ensure initializeDatabase() completes before accessing DAL.'
      );
    }
    return getDatabase();
  }

  protected generateId(): string {
    return randomUUID();
  }

  protected now(): string {
    return new Date().toISOString();
  }

  // ==========================================================================
  // Read Operations (SEC-006: Parameterized queries)
  // ==========================================================================

  /**
   * Find entity by primary key
   *
   * @returns Entity or undefined if not found
   */
  findById(id: string): T | undefined {
    const stmt = this.db.prepare(`SELECT * FROM ${this.tableName} WHERE ${this.primaryKey} = ?`);

    const result = stmt.get(id) as T | undefined;

    log.debug('findById executed', {
      table: this.tableName,
      found: result !== undefined,
    });

    return result;
  }

  count(): number {
    const stmt = this.db.prepare(`SELECT COUNT(*) as count FROM ${this.tableName}`);
    const result = stmt.get() as { count: number };
    return result.count;
  }
}

// ============================================================================
// Reference Entity Base DAL
// ============================================================================

/**
 * Base DAL for reference entities the importer resolves by natural key
 *
 * @template T - Entity type extending ReferenceEntity
 */
export abstract class ReferenceEntityDAL<T extends ReferenceEntity> extends BaseDAL<T> {
  /** Natural key column (plate or name) */
  protected abstract readonly naturalKeyColumn: string;

  /**
   * All active rows ordered by natural key
   * SEC-006: Static query with no user input
   */
  findActive(): T[] {
    const stmt = this.db.prepare(
      `SELECT * FROM ${this.tableName} WHERE active = 1 ORDER BY ${this.naturalKeyColumn} ASC`
    );
    const rows = stmt.all() as T[];

    log.debug('findActive executed', { table: this.tableName, count: rows.length });
    return rows;
  }

  /**
   * Activate or deactivate an entity
   *
   * @returns true if a row was updated
   */
  setActive(id: string, active: boolean): boolean {
    const stmt = this.db.prepare(
      `UPDATE ${this.tableName} SET active = ?, updated_at = ? WHERE ${this.primaryKey} = ?`
    );
    const result = stmt.run(active ? 1 : 0, this.now(), id);
    return result.changes > 0;
  }
}

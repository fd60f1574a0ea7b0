/**
 * Drivers Data Access Layer
 *
 * @module main/dal/drivers
 * @security SEC-006: All queries use prepared statements
 */

import { ReferenceEntityDAL, type ReferenceEntity } from './base.dal';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface Driver extends ReferenceEntity {
  driver_id: string;
  name: string;
  doc_id: string;
  phone: string;
}

export interface CreateDriverData {
  driver_id?: string;
  name: string;
  doc_id?: string;
  phone?: string;
  active?: boolean;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('drivers-dal');

// ============================================================================
// Drivers DAL
// ============================================================================

export class DriversDAL extends ReferenceEntityDAL<Driver> {
  protected readonly tableName = 'drivers';
  protected readonly primaryKey = 'driver_id';
  protected readonly naturalKeyColumn = 'name';

  create(data: CreateDriverData): Driver {
    const driverId = data.driver_id || this.generateId();
    const now = this.now();

    // SEC-006: Parameterized query
    const stmt = this.db.prepare(`
      INSERT INTO drivers (driver_id, name, doc_id, phone, active, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      driverId,
      data.name.trim(),
      data.doc_id || '',
      data.phone || '',
      data.active === false ? 0 : 1,
      now,
      now
    );

    log.info('Driver created', { driverId });

    const created = this.findById(driverId);
    if (!created) {
      throw new Error(`Failed to retrieve created driver: ${driverId}`);
    }
    return created;
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const driversDAL = new DriversDAL();

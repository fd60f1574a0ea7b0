/**
 * Fuel Transactions Data Access Layer
 *
 * Persistence for refuelings. The importer relies on `findByDedupKey` to
 * detect rows that were already loaded by an earlier run.
 *
 * @module main/dal/fuel-transactions
 * @security SEC-006: All queries use prepared statements
 */

import { BaseDAL, type BaseEntity } from './base.dal';
import type { FuelType } from '../../shared/types/fuel-import.types';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

/**
 * Fuel transaction entity
 * `purchased_at` is an ISO-8601 UTC string
 */
export interface FuelTransaction extends BaseEntity {
  transaction_id: string;
  vehicle_id: string;
  driver_id: string | null;
  station_id: string | null;
  cost_center_id: string | null;
  purchased_at: string;
  liters: number;
  unit_price: number;
  total_cost: number;
  odometer_km: number;
  fuel_type: FuelType;
  notes: string;
}

export interface CreateFuelTransactionData {
  transaction_id?: string;
  vehicle_id: string;
  driver_id?: string | null;
  station_id?: string | null;
  cost_center_id?: string | null;
  purchased_at: string;
  liters: number;
  unit_price: number;
  total_cost: number;
  odometer_km: number;
  fuel_type: FuelType;
  notes?: string;
}

// ============================================================================
// Constants
// ============================================================================

/** Liters are stored with 3 decimals; match within half a unit of the last place */
const LITERS_MATCH_TOLERANCE = 0.0005;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('fuel-transactions-dal');

// ============================================================================
// Fuel Transactions DAL
// ============================================================================

export class FuelTransactionsDAL extends BaseDAL<FuelTransaction> {
  protected readonly tableName = 'fuel_transactions';
  protected readonly primaryKey = 'transaction_id';

  /**
   * Insert a fuel transaction
   * SEC-006: Parameterized INSERT
   */
  create(data: CreateFuelTransactionData): FuelTransaction {
    const transactionId = data.transaction_id || this.generateId();
    const now = this.now();

    const stmt = this.db.prepare(`
      INSERT INTO fuel_transactions (
        transaction_id, vehicle_id, driver_id, station_id, cost_center_id,
        purchased_at, liters, unit_price, total_cost, odometer_km,
        fuel_type, notes, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      transactionId,
      data.vehicle_id,
      data.driver_id ?? null,
      data.station_id ?? null,
      data.cost_center_id ?? null,
      data.purchased_at,
      data.liters,
      data.unit_price,
      data.total_cost,
      data.odometer_km,
      data.fuel_type,
      data.notes ?? '',
      now,
      now
    );

    log.debug('Fuel transaction created', {
      transactionId,
      vehicleId: data.vehicle_id,
      purchasedAt: data.purchased_at,
    });

    const created = this.findById(transactionId);
    if (!created) {
      throw new Error(`Failed to retrieve created fuel transaction: ${transactionId}`);
    }
    return created;
  }

  /**
   * Transactions for the same vehicle, instant and liters
   * Callers decide whether a match is a duplicate by comparing totals.
   *
   * @param purchasedAt - ISO-8601 UTC instant
   */
  findByDedupKey(vehicleId: string, purchasedAt: string, liters: number): FuelTransaction[] {
    const stmt = this.db.prepare(`
      SELECT * FROM fuel_transactions
      WHERE vehicle_id = ?
        AND purchased_at = ?
        AND ABS(liters - ?) < ?
      ORDER BY created_at ASC
    `);

    return stmt.all(vehicleId, purchasedAt, liters, LITERS_MATCH_TOLERANCE) as FuelTransaction[];
  }

  /**
   * Transactions for a vehicle, most recent first
   */
  findByVehicle(vehicleId: string, limit: number = 100): FuelTransaction[] {
    const safeLimit = Math.min(Math.max(1, limit), 1000);
    const stmt = this.db.prepare(`
      SELECT * FROM fuel_transactions
      WHERE vehicle_id = ?
      ORDER BY purchased_at DESC
      LIMIT ?
    `);
    return stmt.all(vehicleId, safeLimit) as FuelTransaction[];
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

/**
 * Singleton instance for fuel transaction operations
 */
export const fuelTransactionsDAL = new FuelTransactionsDAL();

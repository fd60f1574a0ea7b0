/**
 * Vehicles Data Access Layer
 *
 * Fleet vehicles, keyed for import by licence plate.
 *
 * @module main/dal/vehicles
 * @security SEC-006: All queries use prepared statements
 */

import { ReferenceEntityDAL, type ReferenceEntity } from './base.dal';
import type { FuelType } from '../../shared/types/fuel-import.types';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface Vehicle extends ReferenceEntity {
  vehicle_id: string;
  plate: string;
  name: string;
  model: string;
  fuel_type: FuelType;
}

export interface CreateVehicleData {
  vehicle_id?: string;
  plate: string;
  name: string;
  model?: string;
  fuel_type?: FuelType;
  active?: boolean;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('vehicles-dal');

// ============================================================================
// Vehicles DAL
// ============================================================================

export class VehiclesDAL extends ReferenceEntityDAL<Vehicle> {
  protected readonly tableName = 'vehicles';
  protected readonly primaryKey = 'vehicle_id';
  protected readonly naturalKeyColumn = 'plate';

  /**
   * Register a vehicle. Plates are stored trimmed and upper-cased.
   * SEC-006: Parameterized INSERT
   */
  create(data: CreateVehicleData): Vehicle {
    const vehicleId = data.vehicle_id || this.generateId();
    const now = this.now();

    const stmt = this.db.prepare(`
      INSERT INTO vehicles (
        vehicle_id, plate, name, model, fuel_type, active, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      vehicleId,
      data.plate.trim().toUpperCase(),
      data.name.trim(),
      data.model || '',
      data.fuel_type || 'GASOLINE',
      data.active === false ? 0 : 1,
      now,
      now
    );

    log.info('Vehicle created', { vehicleId, plate: data.plate });

    const created = this.findById(vehicleId);
    if (!created) {
      throw new Error(`Failed to retrieve created vehicle: ${vehicleId}`);
    }
    return created;
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const vehiclesDAL = new VehiclesDAL();

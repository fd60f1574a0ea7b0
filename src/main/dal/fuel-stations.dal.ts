/**
 * Fuel Stations Data Access Layer
 *
 * @module main/dal/fuel-stations
 * @security SEC-006: All queries use prepared statements
 */

import { ReferenceEntityDAL, type ReferenceEntity } from './base.dal';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface FuelStation extends ReferenceEntity {
  station_id: string;
  name: string;
  city: string;
  address: string;
}

export interface CreateFuelStationData {
  station_id?: string;
  name: string;
  city?: string;
  address?: string;
  active?: boolean;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('fuel-stations-dal');

// ============================================================================
// Fuel Stations DAL
// ============================================================================

export class FuelStationsDAL extends ReferenceEntityDAL<FuelStation> {
  protected readonly tableName = 'fuel_stations';
  protected readonly primaryKey = 'station_id';
  protected readonly naturalKeyColumn = 'name';

  create(data: CreateFuelStationData): FuelStation {
    const stationId = data.station_id || this.generateId();
    const now = this.now();

    const stmt = this.db.prepare(`
      INSERT INTO fuel_stations (station_id, name, city, address, active, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      stationId,
      data.name.trim(),
      data.city || '',
      data.address || '',
      data.active === false ? 0 : 1,
      now,
      now
    );

    log.info('Fuel station created', { stationId, name: data.name });

    const created = this.findById(stationId);
    if (!created) {
      throw new Error(`Failed to retrieve created fuel station: ${stationId}`);
    }
    return created;
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const fuelStationsDAL = new FuelStationsDAL();

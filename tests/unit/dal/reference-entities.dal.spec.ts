/**
 * Reference Entity DAL Tests
 *
 * Vehicles, drivers, stations and cost centers against an in-memory database.
 *
 * @module tests/unit/dal/reference-entities.dal.spec
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestDatabase, type TestDatabaseContext } from '../../helpers/test-database';
import { vehiclesDAL } from '../../../src/main/dal/vehicles.dal';
import { driversDAL } from '../../../src/main/dal/drivers.dal';
import { fuelStationsDAL } from '../../../src/main/dal/fuel-stations.dal';
import { costCentersDAL } from '../../../src/main/dal/cost-centers.dal';

describe('reference entity DALs', () => {
  let ctx: TestDatabaseContext;

  beforeEach(() => {
    ctx = createTestDatabase({ empty: true });
  });

  afterEach(() => {
    ctx.cleanup();
  });

  describe('VehiclesDAL', () => {
    it('stores plates trimmed and upper-cased with defaults', () => {
      const vehicle = vehiclesDAL.create({ plate: '  abc-1234 ', name: ' Van 01 ' });

      expect(vehicle.plate).toBe('ABC-1234');
      expect(vehicle.name).toBe('Van 01');
      expect(vehicle.model).toBe('');
      expect(vehicle.fuel_type).toBe('GASOLINE');
      expect(vehicle.active).toBe(1);
      expect(vehicle.created_at).toBe(vehicle.updated_at);
    });

    it('rejects a second vehicle with the same plate', () => {
      vehiclesDAL.create({ plate: 'ABC-1234', name: 'Van 01' });
      expect(() => vehiclesDAL.create({ plate: 'abc-1234', name: 'Van 02' })).toThrow();
    });

    it('lists only active vehicles ordered by plate', () => {
      vehiclesDAL.create({ plate: 'XYZ-5678', name: 'Truck' });
      const van = vehiclesDAL.create({ plate: 'ABC-1234', name: 'Van' });
      vehiclesDAL.create({ plate: 'DEF-0001', name: 'Retired', active: false });

      expect(vehiclesDAL.findActive().map((v) => v.plate)).toEqual(['ABC-1234', 'XYZ-5678']);

      expect(vehiclesDAL.setActive(van.vehicle_id, false)).toBe(true);
      expect(vehiclesDAL.findActive().map((v) => v.plate)).toEqual(['XYZ-5678']);
    });

    it('reports no change when deactivating an unknown id', () => {
      expect(vehiclesDAL.setActive('missing', false)).toBe(false);
    });
  });

  describe('name-keyed entities', () => {
    it('creates drivers, stations and cost centers', () => {
      const driver = driversDAL.create({ name: ' Joao Silva ' });
      const station = fuelStationsDAL.create({ name: 'Posto Shell Centro' });
      const costCenter = costCentersDAL.create({ name: 'Rural', category: 'RURAL' });

      expect(driversDAL.findById(driver.driver_id)?.name).toBe('Joao Silva');
      expect(fuelStationsDAL.findById(station.station_id)?.name).toBe('Posto Shell Centro');
      expect(costCenter.category).toBe('RURAL');
      expect(costCentersDAL.create({ name: 'Urbano' }).category).toBe('URBAN');
    });

    it('counts rows per table', () => {
      driversDAL.create({ name: 'A' });
      driversDAL.create({ name: 'B' });

      expect(driversDAL.count()).toBe(2);
      expect(fuelStationsDAL.count()).toBe(0);
    });
  });
});

/**
 * Data Access Layer Index
 *
 * Central export point for all DAL classes and utilities.
 *
 * @module main/dal
 */

// Base DAL
export {
  BaseDAL,
  ReferenceEntityDAL,
  type BaseEntity,
  type ReferenceEntity,
} from './base.dal';

// Reference entities
export { VehiclesDAL, vehiclesDAL, type Vehicle, type CreateVehicleData } from './vehicles.dal';
export { DriversDAL, driversDAL, type Driver, type CreateDriverData } from './drivers.dal';
export {
  FuelStationsDAL,
  fuelStationsDAL,
  type FuelStation,
  type CreateFuelStationData,
} from './fuel-stations.dal';
export {
  CostCentersDAL,
  costCentersDAL,
  type CostCenter,
  type CostCenterCategory,
  type CreateCostCenterData,
} from './cost-centers.dal';

// Fuel transactions
export {
  FuelTransactionsDAL,
  fuelTransactionsDAL,
  type FuelTransaction,
  type CreateFuelTransactionData,
} from './fuel-transactions.dal';

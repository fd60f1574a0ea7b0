/**
 * Fuel Transaction Import Types
 *
 * Stage records for the CSV import pipeline (RawRow → ValidatedRow) and the
 * report shape returned to callers.
 *
 * @module shared/types/fuel-import.types
 */

// ============================================================================
// Enumerations
// ============================================================================

export const FUEL_TYPES = ['GASOLINE', 'ETHANOL', 'DIESEL'] as const;

export type FuelType = (typeof FUEL_TYPES)[number];

// ============================================================================
// Decoder Output
// ============================================================================

/**
 * One input line keyed by normalized header name
 * Row 1 is the header, so data rows start at 2
 */
export interface RawRow {
  rowNumber: number;
  values: Readonly<Record<string, string>>;
}

// ============================================================================
// Reference Snapshot
// ============================================================================

export interface VehicleRef {
  readonly id: string;
  readonly plate: string;
}

export interface NamedRef {
  readonly id: string;
  readonly name: string;
}

/**
 * Active reference entities keyed by trimmed, upper-cased plate or name.
 * Built once per import call and passed explicitly to the validator.
 */
export interface ReferenceSnapshot {
  readonly vehicles: ReadonlyMap<string, VehicleRef>;
  readonly drivers: ReadonlyMap<string, NamedRef>;
  readonly stations: ReadonlyMap<string, NamedRef>;
  readonly costCenters: ReadonlyMap<string, NamedRef>;
}

// ============================================================================
// Validator Output
// ============================================================================

/**
 * Normalized candidate transaction
 *
 * Invariants: liters > 0 (3 dp), unitPrice > 0 (4 dp), totalCost 2 dp,
 * odometerKm >= 0.
 */
export interface ValidatedRow {
  rowNumber: number;
  vehicle: VehicleRef;
  driverId: string | null;
  stationId: string | null;
  costCenterId: string | null;
  /** Instant resolved from the wall-clock value in the configured timezone */
  purchasedAt: Date;
  liters: number;
  unitPrice: number;
  totalCost: number;
  /** true when total came from the file rather than liters × unitPrice */
  totalSupplied: boolean;
  odometerKm: number;
  fuelType: FuelType;
  notes: string;
}

export interface RowFieldError {
  column: string;
  value: string;
  message: string;
}

export type RowValidationResult =
  | { ok: true; row: ValidatedRow }
  | { ok: false; errors: RowFieldError[] };

// ============================================================================
// Import Report
// ============================================================================

/**
 * Row 0 with column `file` marks a file-level error
 */
export interface ImportError {
  row: number;
  column: string;
  value: string;
  message: string;
}

export interface ImportedTransaction {
  row: number;
  transaction_id: string;
  vehicle_plate: string;
  /** dd/MM/yyyy HH:mm in the configured timezone */
  purchased_at: string;
  /** 3-decimal string */
  liters: string;
  /** 2-decimal string */
  total_cost: string;
}

export interface SkippedRow {
  row: number;
  reason: string;
}

export interface ImportResult {
  /** true iff error_count is 0; skips do not affect it */
  success: boolean;
  total_rows: number;
  imported_count: number;
  skipped_count: number;
  error_count: number;
  errors: readonly ImportError[];
  imported: readonly ImportedTransaction[];
  skipped: readonly SkippedRow[];
}

/**
 * Fuel Import Service
 *
 * Imports fleet refuelings from a spreadsheet export.
 *
 * Pipeline: decode → validate every row → commit. The import is fail-closed:
 * if any row has an error nothing is written, and the report lists every
 * problem found. Valid batches are written in a single transaction; rows
 * already stored (same vehicle, instant, liters and total) are skipped.
 *
 * @module main/services/fuel-import
 * @security SEC-006: Writes go through parameterized DAL statements
 * @security SEC-014: INPUT_VALIDATION - Rows validated before any write
 * @security SEC-015: File size limit enforced before reading uploads
 */

import fs from 'fs/promises';
import path from 'path';
import { formatInTimeZone } from 'date-fns-tz';
import { withTransaction } from './database.service';
import { createLogger } from '../utils/logger';
import { vehiclesDAL } from '../dal/vehicles.dal';
import { driversDAL } from '../dal/drivers.dal';
import { fuelStationsDAL } from '../dal/fuel-stations.dal';
import { costCentersDAL } from '../dal/cost-centers.dal';
import { fuelTransactionsDAL } from '../dal/fuel-transactions.dal';
import { DEFAULT_CONFIG } from '../../shared/types/config.types';
import { decodeCsv } from '../../shared/fuel-import/csv-decoder';
import { validateRow } from '../../shared/fuel-import/row-validator';
import { createReferenceSnapshot } from '../../shared/fuel-import/reference-snapshot';
import { ImportCommitError, ImportFileTooLargeError } from '../../shared/fuel-import/errors';
import type {
  ImportError,
  ImportResult,
  ImportedTransaction,
  ReferenceSnapshot,
  SkippedRow,
  ValidatedRow,
} from '../../shared/types/fuel-import.types';

// ============================================================================
// Types
// ============================================================================

export interface FuelImportOptions {
  /** IANA zone for naive CSV timestamps and report formatting */
  timezone?: string;
  /** Upload cap enforced by {@link importFuelTransactionsFromFile} */
  maxFileSizeBytes?: number;
}

interface CommitOutcome {
  imported: ImportedTransaction[];
  skipped: SkippedRow[];
}

// ============================================================================
// Constants
// ============================================================================

const REPORT_DATE_FORMAT = 'dd/MM/yyyy HH:mm';

/** Totals closer than two cents are the same refueling */
const DUPLICATE_TOTAL_TOLERANCE_CENTS = 2;

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('fuel-import');

// ============================================================================
// Result Builder
// ============================================================================

/**
 * Accumulates report entries; `build()` returns a frozen snapshot
 */
export class ImportResultBuilder {
  private totalRows = 0;
  private readonly errors: ImportError[] = [];
  private readonly imported: ImportedTransaction[] = [];
  private readonly skipped: SkippedRow[] = [];

  countRow(): void {
    this.totalRows++;
  }

  addError(error: ImportError): void {
    this.errors.push({ ...error });
  }

  addImported(entry: ImportedTransaction): void {
    this.imported.push({ ...entry });
  }

  addSkipped(entry: SkippedRow): void {
    this.skipped.push({ ...entry });
  }

  get errorCount(): number {
    return this.errors.length;
  }

  build(): ImportResult {
    return Object.freeze({
      success: this.errors.length === 0,
      total_rows: this.totalRows,
      imported_count: this.imported.length,
      skipped_count: this.skipped.length,
      error_count: this.errors.length,
      errors: Object.freeze(this.errors.map((e) => Object.freeze({ ...e }))),
      imported: Object.freeze(this.imported.map((i) => Object.freeze({ ...i }))),
      skipped: Object.freeze(this.skipped.map((s) => Object.freeze({ ...s }))),
    });
  }
}

// ============================================================================
// Reference Snapshot
// ============================================================================

/**
 * Read the active reference entities once for an import call
 */
export function loadReferenceSnapshot(): ReferenceSnapshot {
  return createReferenceSnapshot({
    vehicles: vehiclesDAL.findActive().map((v) => ({ id: v.vehicle_id, plate: v.plate })),
    drivers: driversDAL.findActive().map((d) => ({ id: d.driver_id, name: d.name })),
    stations: fuelStationsDAL.findActive().map((s) => ({ id: s.station_id, name: s.name })),
    costCenters: costCentersDAL.findActive().map((c) => ({ id: c.cost_center_id, name: c.name })),
  });
}

// ============================================================================
// Commit
// ============================================================================

function isSameTotal(stored: number, candidate: number): boolean {
  return Math.round(Math.abs(stored - candidate) * 100) < DUPLICATE_TOTAL_TOLERANCE_CENTS;
}

/**
 * Write validated rows in one transaction, skipping those already stored
 *
 * Rows inserted earlier in the batch are visible to later duplicate checks.
 *
 * @throws ImportCommitError on any storage failure; nothing is persisted
 */
function commitRows(rows: readonly ValidatedRow[], timezone: string): CommitOutcome {
  try {
    return withTransaction(() => {
      const outcome: CommitOutcome = { imported: [], skipped: [] };

      for (const row of rows) {
        const purchasedAt = row.purchasedAt.toISOString();
        const displayDate = formatInTimeZone(row.purchasedAt, timezone, REPORT_DATE_FORMAT);

        const existing = fuelTransactionsDAL
          .findByDedupKey(row.vehicle.id, purchasedAt, row.liters)
          .find((tx) => isSameTotal(tx.total_cost, row.totalCost));

        if (existing) {
          outcome.skipped.push({
            row: row.rowNumber,
            reason: `Duplicado: ${row.vehicle.plate} em ${displayDate}`,
          });
          continue;
        }

        const created = fuelTransactionsDAL.create({
          vehicle_id: row.vehicle.id,
          driver_id: row.driverId,
          station_id: row.stationId,
          cost_center_id: row.costCenterId,
          purchased_at: purchasedAt,
          liters: row.liters,
          unit_price: row.unitPrice,
          total_cost: row.totalCost,
          odometer_km: row.odometerKm,
          fuel_type: row.fuelType,
          notes: row.notes,
        });

        outcome.imported.push({
          row: row.rowNumber,
          transaction_id: created.transaction_id,
          vehicle_plate: row.vehicle.plate,
          purchased_at: displayDate,
          liters: row.liters.toFixed(3),
          total_cost: row.totalCost.toFixed(2),
        });
      }

      return outcome;
    });
  } catch (error) {
    log.error('Fuel import commit failed, batch rolled back', {
      rowCount: rows.length,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new ImportCommitError(rows.length, error);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Import fuel transactions from CSV content
 *
 * @returns Frozen report; `success` is false when any row failed validation
 * @throws ImportCommitError if storage fails while writing a valid batch
 */
export function importFuelTransactions(
  content: Buffer | Uint8Array | string,
  options: FuelImportOptions = {}
): ImportResult {
  const timezone = options.timezone ?? DEFAULT_CONFIG.timezone;
  const startTime = Date.now();
  const builder = new ImportResultBuilder();

  const decoded = decodeCsv(content);
  if (!decoded.ok) {
    log.warn('Fuel import rejected at file level', { message: decoded.error.message });
    builder.addError(decoded.error);
    return builder.build();
  }

  log.info('Fuel import started', {
    encoding: decoded.encoding,
    delimiter: decoded.delimiter,
    columns: decoded.headers.length,
  });

  for (const warning of decoded.warnings) {
    log.warn('CSV tokenizer warning', { row: warning.row, message: warning.message });
  }

  const snapshot = loadReferenceSnapshot();
  const candidates: ValidatedRow[] = [];

  for (const raw of decoded.rows) {
    builder.countRow();
    const result = validateRow(raw, snapshot, { timezone });
    if (result.ok) {
      candidates.push(result.row);
    } else {
      for (const error of result.errors) {
        builder.addError({ row: raw.rowNumber, ...error });
      }
    }
  }

  if (builder.errorCount > 0) {
    log.warn('Fuel import rejected, rows failed validation', {
      errorCount: builder.errorCount,
      validRows: candidates.length,
    });
    return builder.build();
  }

  if (candidates.length > 0) {
    const outcome = commitRows(candidates, timezone);
    outcome.imported.forEach((entry) => builder.addImported(entry));
    outcome.skipped.forEach((entry) => builder.addSkipped(entry));
  }

  const result = builder.build();
  log.info('Fuel import completed', {
    totalRows: result.total_rows,
    imported: result.imported_count,
    skipped: result.skipped_count,
    durationMs: Date.now() - startTime,
  });
  return result;
}

/**
 * Import fuel transactions from a CSV file on disk
 *
 * @throws ImportFileTooLargeError when the file exceeds the size cap
 * @throws ImportCommitError if storage fails while writing a valid batch
 */
export async function importFuelTransactionsFromFile(
  filePath: string,
  options: FuelImportOptions = {}
): Promise<ImportResult> {
  const maxBytes = options.maxFileSizeBytes ?? DEFAULT_CONFIG.maxImportFileSizeBytes;
  const fileName = path.basename(filePath);

  // SEC-015: Check file size limit
  const stats = await fs.stat(filePath);
  if (stats.size > maxBytes) {
    log.warn('Import file exceeds size limit', { fileName, size: stats.size, maxBytes });
    throw new ImportFileTooLargeError(stats.size, maxBytes);
  }

  log.info('Reading import file', { fileName, size: stats.size });
  const content = await fs.readFile(filePath);
  return importFuelTransactions(content, options);
}

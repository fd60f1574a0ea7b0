/**
 * Fleet Fuel Import
 *
 * Entry point for the importer library. `startFleetFuel()` resolves the
 * configuration, opens the database and applies migrations; the returned
 * runtime imports CSV uploads with that configuration.
 *
 * @module main
 * @security SEC-014: Input validation, LM-001: Structured logging
 */

import { ConfigService } from './services/config.service';
import {
  bootstrapDatabase,
  shutdownDatabase,
  type BootstrapResult,
} from './services/database-bootstrap.service';
import {
  importFuelTransactions,
  importFuelTransactionsFromFile,
} from './services/fuel-import.service';
import { createLogger } from './utils/logger';
import type { FleetFuelConfig, FleetFuelConfigUpdate } from '../shared/types/config.types';
import type { ImportResult } from '../shared/types/fuel-import.types';

const log = createLogger('main');

// ============================================================================
// Runtime
// ============================================================================

export interface FleetFuelRuntime {
  readonly config: FleetFuelConfig;
  readonly bootstrap: BootstrapResult;
  importContent(content: Buffer | Uint8Array | string): ImportResult;
  importFile(filePath: string): Promise<ImportResult>;
  close(): void;
}

/**
 * Open the configured store and return an import runtime
 *
 * @throws Error if configuration is invalid or the database cannot be bootstrapped
 */
export function startFleetFuel(
  overrides: FleetFuelConfigUpdate = {},
  env: NodeJS.ProcessEnv = process.env
): FleetFuelRuntime {
  const config = new ConfigService(env, overrides).getConfig();
  const bootstrap = bootstrapDatabase({ dbPath: config.dbPath });

  if (!bootstrap.success) {
    log.error('Fleet fuel store unavailable', {
      correlationId: bootstrap.correlationId,
      code: bootstrap.error?.code,
    });
    throw new Error(
      `Database bootstrap failed (${bootstrap.error?.code ?? 'UNKNOWN_ERROR'}): ` +
        (bootstrap.error?.message ?? 'unknown error')
    );
  }

  const importOptions = {
    timezone: config.timezone,
    maxFileSizeBytes: config.maxImportFileSizeBytes,
  };

  return {
    config,
    bootstrap,
    importContent: (content) => importFuelTransactions(content, importOptions),
    importFile: (filePath) => importFuelTransactionsFromFile(filePath, importOptions),
    close: shutdownDatabase,
  };
}

// ============================================================================
// Public API
// ============================================================================

export {
  importFuelTransactions,
  importFuelTransactionsFromFile,
  loadReferenceSnapshot,
  ImportResultBuilder,
  type FuelImportOptions,
} from './services/fuel-import.service';
export { generateCsvTemplate, getCsvFormatSpecification } from '../shared/fuel-import/template';
export type { CsvFormatSpecification, CsvColumnSpecification } from '../shared/fuel-import/template';
export { ImportCommitError, ImportFileTooLargeError } from '../shared/fuel-import/errors';
export { loadConfig, ConfigService } from './services/config.service';
export { bootstrapDatabase, shutdownDatabase } from './services/database-bootstrap.service';
export type { BootstrapResult } from './services/database-bootstrap.service';
export type { FleetFuelConfig, FleetFuelConfigUpdate } from '../shared/types/config.types';
export type {
  FuelType,
  ImportError,
  ImportResult,
  ImportedTransaction,
  SkippedRow,
} from '../shared/types/fuel-import.types';
export * from './dal';

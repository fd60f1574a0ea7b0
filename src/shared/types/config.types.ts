/**
 * Configuration Types for the Fleet Fuel Importer
 *
 * Type definitions with Zod validation schemas. Raw values come from the
 * process environment and are coerced here.
 *
 * @module shared/types/config.types
 * @security SEC-014: Strict input validation schemas
 */

import { z } from 'zod';

// ============================================================================
// Validation Schemas (SEC-014: Input Validation)
// ============================================================================

/**
 * Database file path schema
 * SEC-014: Path traversal prevention
 */
export const DbPathSchema = z
  .string()
  .min(1, 'Database path is required')
  .max(500, 'Database path too long')
  .refine((p) => !p.includes('..'), 'Path cannot contain parent directory references (..)')
  .refine((p) => !/[<>"|?*]/.test(p), 'Path contains invalid characters');

/**
 * IANA timezone name, checked against the runtime's tz database
 */
export const TimezoneSchema = z
  .string()
  .min(1, 'Timezone is required')
  .refine((tz) => {
    try {
      new Intl.DateTimeFormat('en-US', { timeZone: tz });
      return true;
    } catch {
      return false;
    }
  }, 'Unknown IANA timezone');

/**
 * Upload size cap for import files
 * SEC-015: Bounded numeric input
 */
export const MaxImportFileSizeSchema = z.coerce
  .number()
  .int('Max import file size must be an integer')
  .min(1024, 'Max import file size must be at least 1KB')
  .max(100 * 1024 * 1024, 'Max import file size cannot exceed 100MB');

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Complete configuration schema
 */
export const FleetFuelConfigSchema = z.object({
  dbPath: DbPathSchema,
  timezone: TimezoneSchema,
  maxImportFileSizeBytes: MaxImportFileSizeSchema,
  logLevel: LogLevelSchema,
});

/**
 * Partial configuration schema for overrides
 */
export const FleetFuelConfigUpdateSchema = FleetFuelConfigSchema.partial();

// ============================================================================
// Type Exports
// ============================================================================

export type FleetFuelConfig = z.infer<typeof FleetFuelConfigSchema>;
export type FleetFuelConfigUpdate = z.infer<typeof FleetFuelConfigUpdateSchema>;

// ============================================================================
// Default Values
// ============================================================================

/** Zone for wall-clock dates in import files and reports */
export const DEFAULT_TIMEZONE = 'America/Sao_Paulo';

export const DEFAULT_CONFIG: FleetFuelConfig = {
  dbPath: 'data/fleet-fuel.db',
  timezone: DEFAULT_TIMEZONE,
  maxImportFileSizeBytes: 10 * 1024 * 1024,
  logLevel: 'info',
};

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate full configuration
 * @throws ZodError on validation failure
 */
export function validateConfig(data: unknown): FleetFuelConfig {
  return FleetFuelConfigSchema.parse(data);
}

/**
 * Safe validation that returns result object
 */
export function safeValidateConfig(data: unknown) {
  return FleetFuelConfigSchema.safeParse(data);
}

/**
 * Safe validation for config overrides
 */
export function safeValidateConfigUpdate(data: unknown) {
  return FleetFuelConfigUpdateSchema.safeParse(data);
}

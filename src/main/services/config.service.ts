/**
 * Config Service
 *
 * Resolves importer configuration from the process environment, applies
 * explicit overrides, and validates the result.
 *
 * Environment variables:
 * - `FLEET_FUEL_DB_PATH` - SQLite database file (default `data/fleet-fuel.db`)
 * - `FLEET_FUEL_TIMEZONE` - IANA zone for naive CSV timestamps (default `America/Sao_Paulo`)
 * - `FLEET_FUEL_MAX_IMPORT_BYTES` - upload size cap (default 10MB)
 * - `LOG_LEVEL` - debug | info | warn | error
 *
 * @module main/services/config.service
 * @security
 * - SEC-014: Input validation via Zod schemas
 * - LM-001: Structured logging
 */

import type { ZodIssue } from 'zod';
import { createLogger, logger } from '../utils/logger';
import {
  type FleetFuelConfig,
  type FleetFuelConfigUpdate,
  DEFAULT_CONFIG,
  FleetFuelConfigSchema,
  safeValidateConfig,
  safeValidateConfigUpdate,
} from '../../shared/types/config.types';

// ============================================================================
// Logger Setup (LM-001)
// ============================================================================

const log = createLogger('config-service');

// ============================================================================
// Environment Mapping
// ============================================================================

const ENV_KEYS: Record<keyof FleetFuelConfig, string> = {
  dbPath: 'FLEET_FUEL_DB_PATH',
  timezone: 'FLEET_FUEL_TIMEZONE',
  maxImportFileSizeBytes: 'FLEET_FUEL_MAX_IMPORT_BYTES',
  logLevel: 'LOG_LEVEL',
};

function readEnvironment(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const raw = env[envName]?.trim();
    if (raw) {
      values[key] = key === 'logLevel' ? raw.toLowerCase() : raw;
    }
  }
  return values;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((e) => e.path.join('.') + ': ' + e.message).join(', ');
}

// ============================================================================
// Config Service Class
// ============================================================================

export class ConfigService {
  private config: FleetFuelConfig;

  /**
   * @throws Error if the environment or overrides fail validation
   */
  constructor(env: NodeJS.ProcessEnv = process.env, overrides: FleetFuelConfigUpdate = {}) {
    this.config = loadConfig(env, overrides);
    logger.setLevel(this.config.logLevel);

    log.info('Config service initialized', {
      dbPath: this.config.dbPath,
      timezone: this.config.timezone,
    });
  }

  getConfig(): FleetFuelConfig {
    return { ...this.config };
  }

  get<K extends keyof FleetFuelConfig>(key: K): FleetFuelConfig[K] {
    return this.config[key];
  }

  /**
   * Set a specific config value with validation
   * @security SEC-014: Validate individual field updates
   */
  set<K extends keyof FleetFuelConfig>(key: K, value: FleetFuelConfig[K]): void {
    const validation = safeValidateConfigUpdate({ [key]: value });

    if (!validation.success) {
      log.error('Config value validation failed', { key });
      const firstError = validation.error.issues[0];
      throw new Error('Invalid value for ' + key + ': ' + (firstError?.message || 'Unknown error'));
    }

    const updated = FleetFuelConfigSchema.parse({ ...this.config, ...validation.data });
    this.config = updated;
    if (key === 'logLevel') {
      logger.setLevel(updated.logLevel);
    }
    log.debug('Config value updated', { key });
  }
}

// ============================================================================
// Loader
// ============================================================================

/**
 * Merge defaults, environment and overrides, then validate.
 *
 * @throws Error listing every failing field
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: FleetFuelConfigUpdate = {}
): FleetFuelConfig {
  const candidate = { ...DEFAULT_CONFIG, ...readEnvironment(env), ...overrides };
  const validation = safeValidateConfig(candidate);

  if (!validation.success) {
    const errorMessage = formatIssues(validation.error.issues);
    log.error('Config validation failed', { errorCount: validation.error.issues.length });
    throw new Error('Invalid configuration: ' + errorMessage);
  }

  return validation.data;
}

export type { FleetFuelConfig, FleetFuelConfigUpdate };

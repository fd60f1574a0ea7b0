/**
 * Fuel Import Row Validator
 *
 * Checks one decoded row against the field rules and the reference snapshot.
 * Every column is checked before returning, so a row with three problems
 * reports three errors.
 *
 * Pure: no storage access; lookups go through the snapshot argument.
 *
 * @module shared/fuel-import/row-validator
 * @security SEC-014: INPUT_VALIDATION - All user-provided cells validated
 */

import type {
  RawRow,
  ReferenceSnapshot,
  RowFieldError,
  RowValidationResult,
  ValidatedRow,
} from '../types/fuel-import.types';
import {
  DEFAULT_IMPORT_TIMEZONE,
  multiplyHalfDown,
  parseBrazilianDecimal,
  parseFuelType,
  parseImportDate,
  parseImportInteger,
  roundTo,
} from './field-parsers';
import { readColumn } from './import-columns';
import { referenceKey } from './reference-snapshot';

// ============================================================================
// Types
// ============================================================================

export interface ValidateRowOptions {
  /** IANA zone that wall-clock dates are read in */
  timezone?: string;
}

// ============================================================================
// Messages
// ============================================================================

export const ROW_ERROR_MESSAGES = {
  dateInvalid: 'Data invalida. Use DD/MM/YYYY ou DD/MM/YYYY HH:MM.',
  plateRequired: 'Placa e obrigatoria.',
  vehicleNotFound: (plate: string) => `Veiculo com placa "${plate}" nao encontrado.`,
  litersInvalid: 'Litros invalido. Use formato numerico (ex: 45,5 ou 45.5).',
  litersNotPositive: 'Litros deve ser maior que zero.',
  priceInvalid: 'Preco por litro invalido.',
  priceNotPositive: 'Preco deve ser maior que zero.',
  totalInvalid: 'Total invalido.',
  totalNotPositive: 'Total deve ser maior que zero.',
  odometerInvalid: 'Odometro invalido. Use numero inteiro.',
  odometerNegative: 'Odometro nao pode ser negativo.',
} as const;

const LITERS_PLACES = 3;
const PRICE_PLACES = 4;
const MONEY_PLACES = 2;

// ============================================================================
// Validator
// ============================================================================

/**
 * Validate and normalize one row
 *
 * @example
 * ```typescript
 * const result = validateRow(row, snapshot, { timezone: 'America/Sao_Paulo' });
 * if (!result.ok) report.push(...result.errors);
 * ```
 */
export function validateRow(
  row: RawRow,
  snapshot: ReferenceSnapshot,
  options: ValidateRowOptions = {}
): RowValidationResult {
  const errors: RowFieldError[] = [];
  const fail = (column: string, value: string, message: string): void => {
    errors.push({ column, value, message });
  };

  const timezone = options.timezone ?? DEFAULT_IMPORT_TIMEZONE;

  // data
  const dateRaw = readColumn(row.values, 'data').trim();
  const date = parseImportDate(dateRaw, timezone);
  if (date.status !== 'ok') {
    fail('data', dateRaw, ROW_ERROR_MESSAGES.dateInvalid);
  }

  // placa
  const plate = referenceKey(readColumn(row.values, 'placa'));
  const vehicle = plate === '' ? undefined : snapshot.vehicles.get(plate);
  if (plate === '') {
    fail('placa', '', ROW_ERROR_MESSAGES.plateRequired);
  } else if (!vehicle) {
    fail('placa', plate, ROW_ERROR_MESSAGES.vehicleNotFound(plate));
  }

  // litros
  const litersRaw = readColumn(row.values, 'litros').trim();
  const litersParsed = parseBrazilianDecimal(litersRaw);
  let liters = 0;
  if (litersParsed.status !== 'ok') {
    fail('litros', litersRaw, ROW_ERROR_MESSAGES.litersInvalid);
  } else {
    liters = roundTo(litersParsed.value, LITERS_PLACES);
    if (liters <= 0) {
      fail('litros', litersRaw, ROW_ERROR_MESSAGES.litersNotPositive);
    }
  }

  // preco_litro
  const priceRaw = readColumn(row.values, 'preco_litro').trim();
  const priceParsed = parseBrazilianDecimal(priceRaw);
  let unitPrice = 0;
  if (priceParsed.status !== 'ok') {
    fail('preco_litro', priceRaw, ROW_ERROR_MESSAGES.priceInvalid);
  } else {
    unitPrice = roundTo(priceParsed.value, PRICE_PLACES);
    if (unitPrice <= 0) {
      fail('preco_litro', priceRaw, ROW_ERROR_MESSAGES.priceNotPositive);
    }
  }

  // total (optional)
  const totalRaw = readColumn(row.values, 'total').trim();
  const totalParsed = parseBrazilianDecimal(totalRaw);
  let suppliedTotal: number | null = null;
  if (totalParsed.status === 'invalid') {
    fail('total', totalRaw, ROW_ERROR_MESSAGES.totalInvalid);
  } else if (totalParsed.status === 'ok') {
    suppliedTotal = roundTo(totalParsed.value, MONEY_PLACES);
    if (suppliedTotal <= 0) {
      fail('total', totalRaw, ROW_ERROR_MESSAGES.totalNotPositive);
    }
  }

  // odometro
  const odometerRaw = readColumn(row.values, 'odometro').trim();
  const odometer = parseImportInteger(odometerRaw);
  if (odometer.status !== 'ok') {
    fail('odometro', odometerRaw, ROW_ERROR_MESSAGES.odometerInvalid);
  } else if (odometer.value < 0) {
    fail('odometro', odometerRaw, ROW_ERROR_MESSAGES.odometerNegative);
  }

  if (errors.length > 0 || date.status !== 'ok' || !vehicle || odometer.status !== 'ok') {
    return { ok: false, errors };
  }

  const driver = snapshot.drivers.get(referenceKey(readColumn(row.values, 'motorista')));
  const station = snapshot.stations.get(referenceKey(readColumn(row.values, 'posto')));
  const costCenter = snapshot.costCenters.get(referenceKey(readColumn(row.values, 'centro_custo')));

  const validated: ValidatedRow = {
    rowNumber: row.rowNumber,
    vehicle,
    driverId: driver?.id ?? null,
    stationId: station?.id ?? null,
    costCenterId: costCenter?.id ?? null,
    purchasedAt: date.value,
    liters,
    unitPrice,
    totalCost:
      suppliedTotal ?? multiplyHalfDown(liters, LITERS_PLACES, unitPrice, PRICE_PLACES, MONEY_PLACES),
    totalSupplied: suppliedTotal !== null,
    odometerKm: odometer.value,
    fuelType: parseFuelType(readColumn(row.values, 'combustivel')),
    notes: readColumn(row.values, 'observacoes').trim(),
  };

  return { ok: true, row: validated };
}

/**
 * Fuel Import Row Validator Unit Tests
 *
 * @module tests/unit/shared/row-validator
 * @security SEC-014: Input validation at system boundary
 */

import { describe, it, expect } from 'vitest';
import { validateRow, ROW_ERROR_MESSAGES } from '../../../src/shared/fuel-import/row-validator';
import { createReferenceSnapshot } from '../../../src/shared/fuel-import/reference-snapshot';
import type { RawRow, RowValidationResult } from '../../../src/shared/types/fuel-import.types';

// ============================================================================
// Fixtures
// ============================================================================

const snapshot = createReferenceSnapshot({
  vehicles: [
    { id: 'veh-1', plate: 'ABC-1234' },
    { id: 'veh-2', plate: 'XYZ-5678' },
  ],
  drivers: [{ id: 'drv-1', name: 'Joao Silva' }],
  stations: [{ id: 'st-1', name: 'Posto Shell Centro' }],
  costCenters: [{ id: 'cc-1', name: 'Urbano' }],
});

const VALID_VALUES: Record<string, string> = {
  data: '15/01/2025 08:30',
  placa: 'ABC-1234',
  litros: '45,5',
  preco_litro: '5,89',
  total: '',
  odometro: '125430',
  combustivel: 'GASOLINA',
  motorista: '',
  posto: '',
  centro_custo: '',
  observacoes: '',
};

function rawRow(values: Record<string, string>, rowNumber = 2): RawRow {
  return { rowNumber, values };
}

function errorsOf(result: RowValidationResult) {
  if (result.ok) {
    throw new Error('expected validation errors');
  }
  return result.errors;
}

function rowOf(result: RowValidationResult) {
  if (!result.ok) {
    throw new Error(`unexpected errors: ${JSON.stringify(result.errors)}`);
  }
  return result.row;
}

// ============================================================================
// Tests
// ============================================================================

describe('validateRow', () => {
  describe('valid rows', () => {
    it('normalizes every field', () => {
      const row = rowOf(
        validateRow(
          rawRow({
            data: '15/01/2025 08:30',
            placa: ' abc-1234 ',
            litros: '45,5',
            preco_litro: '5,89',
            total: '',
            odometro: '125.430',
            combustivel: 'etanol',
            motorista: 'JOAO SILVA',
            posto: ' posto shell centro ',
            centro_custo: 'Desconhecido',
            observacoes: '  rotina ',
          }),
          snapshot
        )
      );

      expect(row).toEqual({
        rowNumber: 2,
        vehicle: { id: 'veh-1', plate: 'ABC-1234' },
        driverId: 'drv-1',
        stationId: 'st-1',
        costCenterId: null,
        purchasedAt: new Date('2025-01-15T11:30:00.000Z'),
        liters: 45.5,
        unitPrice: 5.89,
        totalCost: 267.99,
        totalSupplied: false,
        odometerKm: 125430,
        fuelType: 'ETHANOL',
        notes: 'rotina',
      });
    });

    it('computes a blank total from liters and price', () => {
      const row = rowOf(validateRow(rawRow({ ...VALID_VALUES, litros: '45,5', preco_litro: '5,89' }), snapshot));
      expect(row.totalCost).toBe(267.99);
      expect(row.totalSupplied).toBe(false);
    });

    it('rounds a computed total to the nearest cent', () => {
      const first = rowOf(validateRow(rawRow({ ...VALID_VALUES, litros: '10', preco_litro: '1.0999' }), snapshot));
      const second = rowOf(validateRow(rawRow({ ...VALID_VALUES, litros: '20', preco_litro: '5.4999' }), snapshot));

      expect(first.totalCost).toBe(11);
      expect(second.totalCost).toBe(110);
    });

    it('keeps a supplied total rounded to cents', () => {
      const row = rowOf(validateRow(rawRow({ ...VALID_VALUES, total: '250,489' }), snapshot));
      expect(row.totalCost).toBe(250.49);
      expect(row.totalSupplied).toBe(true);
    });

    it('rounds liters to 3 and price to 4 decimals', () => {
      const row = rowOf(
        validateRow(rawRow({ ...VALID_VALUES, litros: '10.12345', preco_litro: '5.123456' }), snapshot)
      );
      expect(row.liters).toBe(10.123);
      expect(row.unitPrice).toBe(5.1235);
    });

    it('reads alias columns', () => {
      const row = rowOf(
        validateRow(
          rawRow({
            data_hora: '2025-01-15 08:30',
            placa: 'XYZ-5678',
            litros: '38,750',
            preco: '6,459',
            valor_total: '250,49',
            km: '89200',
            tipo_combustivel: 'diesel',
            cc: 'urbano',
            obs: 'via alias',
          }),
          snapshot
        )
      );

      expect(row.vehicle).toEqual({ id: 'veh-2', plate: 'XYZ-5678' });
      expect(row.purchasedAt.toISOString()).toBe('2025-01-15T11:30:00.000Z');
      expect(row.liters).toBe(38.75);
      expect(row.unitPrice).toBe(6.459);
      expect(row.totalCost).toBe(250.49);
      expect(row.odometerKm).toBe(89200);
      expect(row.fuelType).toBe('DIESEL');
      expect(row.costCenterId).toBe('cc-1');
      expect(row.notes).toBe('via alias');
    });

    it('falls back to an alias when the canonical column is blank', () => {
      const row = rowOf(validateRow(rawRow({ ...VALID_VALUES, data: ' ', data_hora: '16/01/2025' }), snapshot));
      expect(row.purchasedAt.toISOString()).toBe('2025-01-16T03:00:00.000Z');
    });

    it('defaults unknown fuel labels to GASOLINE', () => {
      const row = rowOf(validateRow(rawRow({ ...VALID_VALUES, combustivel: 'querosene' }), snapshot));
      expect(row.fuelType).toBe('GASOLINE');
    });

    it('accepts a zero odometer', () => {
      const row = rowOf(validateRow(rawRow({ ...VALID_VALUES, odometro: '0' }), snapshot));
      expect(row.odometerKm).toBe(0);
    });

    it('reads dates in the requested timezone', () => {
      const row = rowOf(validateRow(rawRow(VALID_VALUES), snapshot, { timezone: 'UTC' }));
      expect(row.purchasedAt.toISOString()).toBe('2025-01-15T08:30:00.000Z');
    });
  });

  describe('invalid rows', () => {
    it('reports an unknown plate exactly once, upper-cased', () => {
      const errors = errorsOf(validateRow(rawRow({ ...VALID_VALUES, placa: 'zzz-0000' }), snapshot));

      expect(errors).toEqual([
        {
          column: 'placa',
          value: 'ZZZ-0000',
          message: 'Veiculo com placa "ZZZ-0000" nao encontrado.',
        },
      ]);
    });

    it('reports a missing plate', () => {
      const errors = errorsOf(validateRow(rawRow({ ...VALID_VALUES, placa: '  ' }), snapshot));
      expect(errors).toEqual([{ column: 'placa', value: '', message: ROW_ERROR_MESSAGES.plateRequired }]);
    });

    it('collects every failing field in column order', () => {
      const errors = errorsOf(
        validateRow(
          rawRow({
            data: '31/02/2025',
            placa: '',
            litros: 'abc',
            preco_litro: '0',
            total: '-1',
            odometro: '-5',
          }),
          snapshot
        )
      );

      expect(errors).toEqual([
        { column: 'data', value: '31/02/2025', message: ROW_ERROR_MESSAGES.dateInvalid },
        { column: 'placa', value: '', message: ROW_ERROR_MESSAGES.plateRequired },
        { column: 'litros', value: 'abc', message: ROW_ERROR_MESSAGES.litersInvalid },
        { column: 'preco_litro', value: '0', message: ROW_ERROR_MESSAGES.priceNotPositive },
        { column: 'total', value: '-1', message: ROW_ERROR_MESSAGES.totalNotPositive },
        { column: 'odometro', value: '-5', message: ROW_ERROR_MESSAGES.odometerNegative },
      ]);
    });

    it('reports required columns that are absent', () => {
      const errors = errorsOf(validateRow(rawRow({ placa: 'ABC-1234' }), snapshot));

      expect(errors.map((e) => e.column)).toEqual(['data', 'litros', 'preco_litro', 'odometro']);
      expect(errors.map((e) => e.message)).toEqual([
        'Data invalida. Use DD/MM/YYYY ou DD/MM/YYYY HH:MM.',
        'Litros invalido. Use formato numerico (ex: 45,5 ou 45.5).',
        'Preco por litro invalido.',
        'Odometro invalido. Use numero inteiro.',
      ]);
    });

    it.each([
      ['-5', 'Litros deve ser maior que zero.'],
      ['0.0004', 'Litros deve ser maior que zero.'],
      ['quarenta', 'Litros invalido. Use formato numerico (ex: 45,5 ou 45.5).'],
    ])('rejects liters %j', (litros, message) => {
      const errors = errorsOf(validateRow(rawRow({ ...VALID_VALUES, litros }), snapshot));
      expect(errors).toEqual([{ column: 'litros', value: litros, message }]);
    });

    it.each([
      ['abc', 'Preco por litro invalido.'],
      ['0.00001', 'Preco deve ser maior que zero.'],
    ])('rejects price %j', (preco, message) => {
      const errors = errorsOf(validateRow(rawRow({ ...VALID_VALUES, preco_litro: preco }), snapshot));
      expect(errors).toEqual([{ column: 'preco_litro', value: preco, message }]);
    });

    it('rejects a total that does not parse', () => {
      const errors = errorsOf(validateRow(rawRow({ ...VALID_VALUES, total: 'dez reais' }), snapshot));
      expect(errors).toEqual([{ column: 'total', value: 'dez reais', message: 'Total invalido.' }]);
    });

    it('rejects a total that rounds to zero instead of computing one', () => {
      const errors = errorsOf(validateRow(rawRow({ ...VALID_VALUES, total: '0,004' }), snapshot));
      expect(errors).toEqual([
        { column: 'total', value: '0,004', message: 'Total deve ser maior que zero.' },
      ]);
    });

    it('rejects a fractional odometer', () => {
      const errors = errorsOf(validateRow(rawRow({ ...VALID_VALUES, odometro: '12,5' }), snapshot));
      expect(errors).toEqual([
        { column: 'odometro', value: '12,5', message: 'Odometro invalido. Use numero inteiro.' },
      ]);
    });

    it('does not resolve vehicles missing from the snapshot', () => {
      const emptySnapshot = createReferenceSnapshot();
      const errors = errorsOf(validateRow(rawRow(VALID_VALUES), emptySnapshot));
      expect(errors).toEqual([
        {
          column: 'placa',
          value: 'ABC-1234',
          message: 'Veiculo com placa "ABC-1234" nao encontrado.',
        },
      ]);
    });
  });
});

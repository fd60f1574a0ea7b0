/**
 * Fuel Import Service Tests
 *
 * End-to-end import calls against an in-memory database seeded with the
 * vehicles, drivers, stations and cost centers the template refers to.
 *
 * @module tests/unit/services/fuel-import.service.spec
 * @security SEC-014: Fail-closed validation
 * @security SEC-015: Upload size limit
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  importFuelTransactions,
  importFuelTransactionsFromFile,
  loadReferenceSnapshot,
} from '../../../src/main/services/fuel-import.service';
import { fuelTransactionsDAL } from '../../../src/main/dal/fuel-transactions.dal';
import { vehiclesDAL } from '../../../src/main/dal/vehicles.dal';
import { generateCsvTemplate } from '../../../src/shared/fuel-import/template';
import { EMPTY_FILE_ERROR_MESSAGE } from '../../../src/shared/fuel-import/csv-decoder';
import { ImportCommitError, ImportFileTooLargeError } from '../../../src/shared/fuel-import/errors';
import { createTestDatabase, type TestDatabaseContext } from '../../helpers/test-database';

// ============================================================================
// Helpers
// ============================================================================

const MINIMAL_HEADER = 'data;placa;litros;preco_litro;total;odometro';

function csv(...rows: string[]): string {
  return [MINIMAL_HEADER, ...rows].join('\n') + '\n';
}

// ============================================================================
// Tests
// ============================================================================

describe('Fuel Import Service', () => {
  let ctx: TestDatabaseContext;

  beforeEach(() => {
    ctx = createTestDatabase();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    ctx.cleanup();
  });

  describe('importFuelTransactions', () => {
    it('imports the template rows and reports them', () => {
      const result = importFuelTransactions(generateCsvTemplate());

      expect(result.success).toBe(true);
      expect(result.total_rows).toBe(2);
      expect(result.imported_count).toBe(2);
      expect(result.skipped_count).toBe(0);
      expect(result.error_count).toBe(0);
      expect(result.imported).toEqual([
        {
          row: 2,
          transaction_id: expect.any(String),
          vehicle_plate: 'ABC-1234',
          purchased_at: '15/01/2025 08:30',
          liters: '45.500',
          total_cost: '267.99',
        },
        {
          row: 3,
          transaction_id: expect.any(String),
          vehicle_plate: 'XYZ-5678',
          purchased_at: '16/01/2025 14:15',
          liters: '38.750',
          total_cost: '250.49',
        },
      ]);
    });

    it('stores normalized values with resolved references', () => {
      const result = importFuelTransactions(generateCsvTemplate());

      const first = fuelTransactionsDAL.findById(result.imported[0].transaction_id);
      expect(first).toMatchObject({
        vehicle_id: ctx.ids.vehicles['ABC-1234'],
        driver_id: ctx.ids.drivers['Joao Silva'],
        station_id: ctx.ids.stations['Posto Shell Centro'],
        cost_center_id: ctx.ids.costCenters['Urbano'],
        purchased_at: '2025-01-15T11:30:00.000Z',
        liters: 45.5,
        unit_price: 5.89,
        total_cost: 267.99,
        odometer_km: 125430,
        fuel_type: 'GASOLINE',
        notes: 'Abastecimento rotina',
      });

      const second = fuelTransactionsDAL.findById(result.imported[1].transaction_id);
      expect(second).toMatchObject({
        vehicle_id: ctx.ids.vehicles['XYZ-5678'],
        driver_id: null,
        station_id: ctx.ids.stations['Ipiranga BR-101'],
        cost_center_id: ctx.ids.costCenters['Rural'],
        purchased_at: '2025-01-16T17:15:00.000Z',
        liters: 38.75,
        unit_price: 6.459,
        total_cost: 250.49,
        odometer_km: 89200,
        fuel_type: 'ETHANOL',
        notes: '',
      });
    });

    it('skips every row when the same file is imported again', () => {
      importFuelTransactions(generateCsvTemplate());
      const again = importFuelTransactions(generateCsvTemplate());

      expect(again.success).toBe(true);
      expect(again.imported_count).toBe(0);
      expect(again.skipped).toEqual([
        { row: 2, reason: 'Duplicado: ABC-1234 em 15/01/2025 08:30' },
        { row: 3, reason: 'Duplicado: XYZ-5678 em 16/01/2025 14:15' },
      ]);
      expect(fuelTransactionsDAL.count()).toBe(2);
    });

    it('writes nothing when any row fails validation', () => {
      const result = importFuelTransactions(
        csv('15/01/2025 08:30;ABC-1234;45,5;5,89;;125430', '16/01/2025 09:00;XYZ-5678;-5;5,89;;89200')
      );

      expect(result.success).toBe(false);
      expect(result.total_rows).toBe(2);
      expect(result.imported_count).toBe(0);
      expect(result.errors).toEqual([
        { row: 3, column: 'litros', value: '-5', message: 'Litros deve ser maior que zero.' },
      ]);
      expect(fuelTransactionsDAL.count()).toBe(0);
    });

    it('reports an unknown plate once', () => {
      const result = importFuelTransactions(csv('15/01/2025 08:30;QQQ-9999;45,5;5,89;;125430'));

      expect(result.error_count).toBe(1);
      expect(result.errors[0]).toEqual({
        row: 2,
        column: 'placa',
        value: 'QQQ-9999',
        message: 'Veiculo com placa "QQQ-9999" nao encontrado.',
      });
    });

    it('treats inactive vehicles as unknown', () => {
      vehiclesDAL.setActive(ctx.ids.vehicles['ABC-1234'], false);

      const result = importFuelTransactions(generateCsvTemplate());

      expect(result.errors).toEqual([
        {
          row: 2,
          column: 'placa',
          value: 'ABC-1234',
          message: 'Veiculo com placa "ABC-1234" nao encontrado.',
        },
      ]);
      expect(fuelTransactionsDAL.count()).toBe(0);
    });

    it('imports a near-duplicate whose total differs by two cents or more', () => {
      const first = importFuelTransactions(csv('15/01/2025 08:30;ABC-1234;10;10;100,00;1000'));
      const differentTotal = importFuelTransactions(csv('15/01/2025 08:30;ABC-1234;10;10;100,05;1000'));
      const sameTotal = importFuelTransactions(csv('15/01/2025 08:30;ABC-1234;10;10;100,01;1000'));

      expect(first.imported_count).toBe(1);
      expect(differentTotal.imported_count).toBe(1);
      expect(sameTotal.imported_count).toBe(0);
      expect(sameTotal.skipped_count).toBe(1);
      expect(fuelTransactionsDAL.count()).toBe(2);
    });

    it('detects duplicates within one file', () => {
      const line = '15/01/2025 08:30;ABC-1234;45,5;5,89;;125430';
      const result = importFuelTransactions(csv(line, line));

      expect(result.imported.map((i) => i.row)).toEqual([2]);
      expect(result.skipped).toEqual([{ row: 3, reason: 'Duplicado: ABC-1234 em 15/01/2025 08:30' }]);
    });

    it('rolls back the whole batch when a write fails', () => {
      const realCreate = fuelTransactionsDAL.create.bind(fuelTransactionsDAL);
      let calls = 0;
      vi.spyOn(fuelTransactionsDAL, 'create').mockImplementation((data) => {
        calls++;
        if (calls === 2) {
          throw new Error('disk I/O error');
        }
        return realCreate(data);
      });

      let caught: unknown;
      try {
        importFuelTransactions(generateCsvTemplate());
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ImportCommitError);
      if (!(caught instanceof ImportCommitError)) return;
      expect(caught.code).toBe('COMMIT_FAILED');
      expect(caught.rowCount).toBe(2);
      expect(caught.message).toBe('Failed to commit fuel import batch of 2 row(s): disk I/O error');
      expect(fuelTransactionsDAL.count()).toBe(0);
    });

    it('reports an empty file as a file-level error', () => {
      const result = importFuelTransactions('');

      expect(result).toEqual({
        success: false,
        total_rows: 0,
        imported_count: 0,
        skipped_count: 0,
        error_count: 1,
        errors: [{ row: 0, column: 'file', value: '', message: EMPTY_FILE_ERROR_MESSAGE }],
        imported: [],
        skipped: [],
      });
    });

    it('succeeds with nothing to do for a header-only file', () => {
      const result = importFuelTransactions(`${MINIMAL_HEADER}\n`);

      expect(result.success).toBe(true);
      expect(result.total_rows).toBe(0);
      expect(result.imported_count).toBe(0);
    });

    it('keeps accented notes from Latin-1 uploads', () => {
      const bytes = Buffer.from(
        'data;placa;litros;preco_litro;odometro;observações\n15/01/2025 08:30;ABC-1234;20;6;500;São Paulo\n',
        'latin1'
      );

      const result = importFuelTransactions(bytes);

      expect(result.imported_count).toBe(1);
      expect(fuelTransactionsDAL.findById(result.imported[0].transaction_id)?.notes).toBe('São Paulo');
    });

    it('reads and reports dates in the requested timezone', () => {
      const result = importFuelTransactions(generateCsvTemplate(), { timezone: 'UTC' });

      expect(result.imported[0].purchased_at).toBe('15/01/2025 08:30');
      expect(fuelTransactionsDAL.findById(result.imported[0].transaction_id)?.purchased_at).toBe(
        '2025-01-15T08:30:00.000Z'
      );
    });

    it('returns a frozen report', () => {
      const result = importFuelTransactions(generateCsvTemplate());

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.imported)).toBe(true);
      expect(Object.isFrozen(result.imported[0])).toBe(true);
    });
  });

  describe('loadReferenceSnapshot', () => {
    it('keys active entities by upper-cased natural key', () => {
      const snapshot = loadReferenceSnapshot();

      expect(snapshot.vehicles.get('ABC-1234')).toEqual({
        id: ctx.ids.vehicles['ABC-1234'],
        plate: 'ABC-1234',
      });
      expect(snapshot.drivers.get('JOAO SILVA')?.id).toBe(ctx.ids.drivers['Joao Silva']);
      expect(snapshot.costCenters.size).toBe(2);
    });
  });

  describe('importFuelTransactionsFromFile', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fleet-fuel-import-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('imports a file from disk', async () => {
      const filePath = path.join(tempDir, 'abastecimentos.csv');
      await fs.writeFile(filePath, generateCsvTemplate(), 'utf-8');

      const result = await importFuelTransactionsFromFile(filePath);

      expect(result.imported_count).toBe(2);
    });

    it('rejects files over the size cap before reading them', async () => {
      const filePath = path.join(tempDir, 'grande.csv');
      await fs.writeFile(filePath, generateCsvTemplate(), 'utf-8');

      await expect(importFuelTransactionsFromFile(filePath, { maxFileSizeBytes: 10 })).rejects.toBeInstanceOf(
        ImportFileTooLargeError
      );
      expect(fuelTransactionsDAL.count()).toBe(0);
    });
  });
});

/**
 * Fuel Import CSV Decoder
 *
 * Turns uploaded bytes into header-keyed rows:
 *
 * 1. Decode text as strict UTF-8 (BOM stripped), falling back to ISO-8859-1
 * 2. Pick the delimiter from the first line (`;` `,` tab `|`)
 * 3. Tokenize with papaparse (quoted fields, doubled quotes, embedded newlines)
 * 4. Normalize header names and yield one {@link RawRow} per data line
 *
 * @module shared/fuel-import/csv-decoder
 */

import Papa from 'papaparse';
import type { ImportError, RawRow } from '../types/fuel-import.types';

// ============================================================================
// Types
// ============================================================================

export type CsvDelimiter = ';' | ',' | '\t' | '|';

export interface CsvParseWarning {
  row: number | undefined;
  message: string;
}

export type DecodeResult =
  | {
      ok: true;
      delimiter: CsvDelimiter;
      encoding: 'utf-8' | 'latin1';
      /** Normalized header names in file order */
      headers: string[];
      /** Tokenizer complaints that did not stop parsing (e.g. unbalanced quotes) */
      warnings: CsvParseWarning[];
      rows: Generator<RawRow, void, undefined>;
    }
  | { ok: false; error: ImportError };

// ============================================================================
// Constants
// ============================================================================

/** Candidates in tie-break order */
const DELIMITER_CANDIDATES: readonly CsvDelimiter[] = [';', ',', '\t', '|'];

const DEFAULT_DELIMITER: CsvDelimiter = ';';

/** Data rows are numbered from 2; row 1 is the header */
const FIRST_DATA_ROW = 2;

export const ENCODING_ERROR_MESSAGE = 'Encoding nao suportado. Use UTF-8 ou ISO-8859-1.';
export const EMPTY_FILE_ERROR_MESSAGE = 'Arquivo CSV vazio ou sem cabecalho.';

// ============================================================================
// Text Decoding
// ============================================================================

/**
 * Decode raw upload bytes
 *
 * ISO-8859-1 maps every byte, so the fallback only fails for content that is
 * not text at all (NUL characters, as in spreadsheets or archives).
 *
 * @returns Text and the encoding that produced it, or null when the content
 *          is not UTF-8 or ISO-8859-1 text
 */
export function decodeContent(
  content: Buffer | Uint8Array | string
): { text: string; encoding: 'utf-8' | 'latin1' } | null {
  if (typeof content === 'string') {
    return asText(content.replace(/^\uFEFF/, ''), 'utf-8');
  }

  try {
    return asText(new TextDecoder('utf-8', { fatal: true }).decode(content), 'utf-8');
  } catch (error) {
    if (!(error instanceof TypeError)) {
      throw error;
    }
    return asText(Buffer.from(content).toString('latin1'), 'latin1');
  }
}

function asText(
  text: string,
  encoding: 'utf-8' | 'latin1'
): { text: string; encoding: 'utf-8' | 'latin1' } | null {
  return text.includes('\u0000') ? null : { text, encoding };
}

// ============================================================================
// Delimiter Detection
// ============================================================================

/**
 * Count candidate delimiters in the first line; the highest count wins, ties go
 * to the earlier candidate, and a line with none of them yields `;`.
 */
export function detectDelimiter(text: string): CsvDelimiter {
  const firstLine = text.split('\n')[0] ?? '';

  let best = DEFAULT_DELIMITER;
  let bestCount = 0;
  for (const candidate of DELIMITER_CANDIDATES) {
    const count = firstLine.split(candidate).length - 1;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

// ============================================================================
// Header Normalization
// ============================================================================

/**
 * `  Preço/Litro ` → `preco_litro`, `Observações` → `observacoes`
 */
export function normalizeHeader(header: string): string {
  return header
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9_]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
}

// ============================================================================
// Decoder
// ============================================================================

function fileError(message: string): { ok: false; error: ImportError } {
  return { ok: false, error: { row: 0, column: 'file', value: '', message } };
}

function* iterateRows(
  headers: readonly string[],
  records: readonly string[][]
): Generator<RawRow, void, undefined> {
  for (let i = 0; i < records.length; i++) {
    const cells = records[i];
    const values: Record<string, string> = {};

    headers.forEach((header, column) => {
      if (header !== '' && !(header in values)) {
        values[header] = cells[column] ?? '';
      }
    });

    yield { rowNumber: FIRST_DATA_ROW + i, values };
  }
}

/**
 * Decode an upload into header-keyed rows
 *
 * File-level problems (undecodable bytes, no header) come back as a single
 * `ImportError` on row 0 with column `file`.
 */
export function decodeCsv(content: Buffer | Uint8Array | string): DecodeResult {
  const decoded = decodeContent(content);
  if (!decoded) {
    return fileError(ENCODING_ERROR_MESSAGE);
  }

  const { text, encoding } = decoded;
  if (text.trim() === '') {
    return fileError(EMPTY_FILE_ERROR_MESSAGE);
  }

  const delimiter = detectDelimiter(text);
  const parsed = Papa.parse<string[]>(text, {
    header: false,
    delimiter,
    skipEmptyLines: 'greedy',
  });

  const [headerCells, ...records] = parsed.data;
  const headers = (headerCells ?? []).map(normalizeHeader);
  if (!headers.some((header) => header !== '')) {
    return fileError(EMPTY_FILE_ERROR_MESSAGE);
  }

  const warnings = parsed.errors.map((error) => ({
    row: error.row === undefined ? undefined : error.row + 1,
    message: error.message,
  }));

  return {
    ok: true,
    delimiter,
    encoding,
    headers,
    warnings,
    rows: iterateRows(headers, records),
  };
}

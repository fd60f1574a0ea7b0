/**
 * Fuel Import Template & Format Specification
 *
 * @module shared/fuel-import/template
 */

import Papa from 'papaparse';
import { IMPORT_DATE_FORMATS } from './field-parsers';
import { IMPORT_COLUMNS, IMPORT_COLUMN_NAMES, type ImportColumnName } from './import-columns';

// ============================================================================
// Types
// ============================================================================

export interface CsvColumnSpecification {
  name: ImportColumnName;
  required: boolean;
  description: string;
  example: string;
  default?: string;
  aliases: string[];
}

export interface CsvFormatSpecification {
  encoding: string;
  delimiter: string;
  decimal_separator: string;
  date_formats: string[];
  columns: CsvColumnSpecification[];
  notes: string[];
}

// ============================================================================
// Template
// ============================================================================

const TEMPLATE_DELIMITER = ';';
const TEMPLATE_NEWLINE = '\r\n';

/** Two sample refuelings; the first leaves `total` blank to show the computed total */
const TEMPLATE_EXAMPLE_ROWS: readonly (readonly string[])[] = [
  [
    '15/01/2025 08:30',
    'ABC-1234',
    '45,5',
    '5,89',
    '',
    '125430',
    'GASOLINA',
    'Joao Silva',
    'Posto Shell Centro',
    'Urbano',
    'Abastecimento rotina',
  ],
  [
    '16/01/2025 14:15',
    'XYZ-5678',
    '38,750',
    '6,459',
    '250,49',
    '89200',
    'ETANOL',
    '',
    'Ipiranga BR-101',
    'Rural',
    '',
  ],
];

/**
 * `;`-delimited CSV with the canonical header and two example rows,
 * CRLF line endings, ending with a line break
 */
export function generateCsvTemplate(): string {
  const csv = Papa.unparse(
    {
      fields: [...IMPORT_COLUMN_NAMES],
      data: TEMPLATE_EXAMPLE_ROWS.map((row) => [...row]),
    },
    { delimiter: TEMPLATE_DELIMITER, newline: TEMPLATE_NEWLINE }
  );
  return csv + TEMPLATE_NEWLINE;
}

// ============================================================================
// Format Specification
// ============================================================================

function describeDateFormat(format: string): string {
  return format.replace('dd', 'DD').replace('yyyy', 'YYYY').replace('mm', 'MM').replace('ss', 'SS');
}

/**
 * Machine-readable description of the accepted CSV layout, for help screens
 * and API docs
 */
export function getCsvFormatSpecification(): CsvFormatSpecification {
  return {
    encoding: 'UTF-8 ou ISO-8859-1 (Latin-1)',
    delimiter: 'Ponto-e-virgula (;), virgula (,), tabulacao ou barra vertical (|)',
    decimal_separator: 'Virgula (,) ou ponto (.) - ambos sao aceitos',
    date_formats: IMPORT_DATE_FORMATS.map(describeDateFormat),
    columns: IMPORT_COLUMNS.map((column) => ({
      name: column.name,
      required: column.required,
      description: column.description,
      example: column.example,
      ...(column.default !== undefined ? { default: column.default } : {}),
      aliases: [...column.aliases],
    })),
    notes: [
      'A primeira linha deve conter os nomes das colunas (cabecalho).',
      'Linhas duplicadas (mesma placa, data e litros) sao ignoradas automaticamente.',
      'Veiculos, motoristas, postos e centros de custo devem estar cadastrados previamente.',
      'O campo "total" e calculado automaticamente se deixado vazio.',
      'Se qualquer linha tiver erro, nenhuma linha do arquivo e importada.',
      'Formatos de data flexiveis: DD/MM/YYYY, DD-MM-YYYY ou YYYY-MM-DD, com ou sem horario.',
    ],
  };
}

/**
 * Fuel Import Column Definitions
 *
 * Canonical CSV columns in template order. Header cells are matched after
 * normalization (see `normalizeHeader`), so `Preço Litro` and `preco_litro`
 * address the same column.
 *
 * @module shared/fuel-import/import-columns
 */

// ============================================================================
// Types
// ============================================================================

export type ImportColumnName =
  | 'data'
  | 'placa'
  | 'litros'
  | 'preco_litro'
  | 'total'
  | 'odometro'
  | 'combustivel'
  | 'motorista'
  | 'posto'
  | 'centro_custo'
  | 'observacoes';

export interface ImportColumnDefinition {
  readonly name: ImportColumnName;
  readonly required: boolean;
  readonly description: string;
  readonly example: string;
  readonly default?: string;
  /** Alternative header names, consulted in order after `name` */
  readonly aliases: readonly string[];
}

// ============================================================================
// Column Table
// ============================================================================

export const IMPORT_COLUMNS: readonly ImportColumnDefinition[] = [
  {
    name: 'data',
    required: true,
    description: 'Data e hora do abastecimento',
    example: '15/01/2025 08:30',
    aliases: ['data_hora'],
  },
  {
    name: 'placa',
    required: true,
    description: 'Placa do veiculo (deve estar cadastrado)',
    example: 'ABC-1234',
    aliases: [],
  },
  {
    name: 'litros',
    required: true,
    description: 'Quantidade de litros abastecidos',
    example: '45,5',
    aliases: [],
  },
  {
    name: 'preco_litro',
    required: true,
    description: 'Preco por litro do combustivel',
    example: '5,89',
    aliases: ['preco'],
  },
  {
    name: 'total',
    required: false,
    description: 'Valor total (calculado automaticamente se vazio)',
    example: '267,99',
    aliases: ['valor_total'],
  },
  {
    name: 'odometro',
    required: true,
    description: 'Leitura do odometro em km',
    example: '125430',
    aliases: ['km'],
  },
  {
    name: 'combustivel',
    required: false,
    description: 'Tipo de combustivel (GASOLINA, ETANOL, DIESEL)',
    example: 'GASOLINA',
    default: 'GASOLINA',
    aliases: ['tipo_combustivel'],
  },
  {
    name: 'motorista',
    required: false,
    description: 'Nome do motorista (deve estar cadastrado)',
    example: 'Joao Silva',
    aliases: [],
  },
  {
    name: 'posto',
    required: false,
    description: 'Nome do posto (deve estar cadastrado)',
    example: 'Posto Shell Centro',
    aliases: [],
  },
  {
    name: 'centro_custo',
    required: false,
    description: 'Nome do centro de custo (deve estar cadastrado)',
    example: 'Urbano',
    aliases: ['cc'],
  },
  {
    name: 'observacoes',
    required: false,
    description: 'Observacoes adicionais',
    example: 'Abastecimento rotina',
    aliases: ['obs'],
  },
];

export const IMPORT_COLUMN_NAMES: readonly ImportColumnName[] = IMPORT_COLUMNS.map((c) => c.name);

const COLUMN_BY_NAME = new Map(IMPORT_COLUMNS.map((c) => [c.name, c]));

// ============================================================================
// Lookup
// ============================================================================

/**
 * Read a column from a decoded row, falling back through its aliases
 *
 * The first non-empty (after trim) value wins. Returns `''` when the column
 * and all aliases are absent or blank.
 */
export function readColumn(
  values: Readonly<Record<string, string>>,
  column: ImportColumnName
): string {
  const definition = COLUMN_BY_NAME.get(column);
  const keys = definition ? [definition.name, ...definition.aliases] : [column];

  for (const key of keys) {
    const value = values[key];
    if (value !== undefined && value.trim() !== '') {
      return value;
    }
  }
  return '';
}

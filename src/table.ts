import type { CellValue, FlatRecord, ResultTable, SourceKind } from './types';
import { toFiniteNumber } from './units';

export interface SortKey {
  column: string;
  order: 'asc' | 'desc';
}

export interface TableSchema {
  numericColumns: readonly string[];
  timestampColumns: readonly string[];
  sortBy: readonly SortKey[];
}

export const TABLE_SCHEMAS: Record<SourceKind, TableSchema> = {
  evm: {
    numericColumns: ['block_number', 'balance_eth', 'delta_eth', 'delta_eth_abs', 'next_block_number', 'next_items_count'],
    timestampColumns: ['timestamp', 'block_datetime'],
    sortBy: [{ column: 'block_number', order: 'desc' }]
  },
  tron: {
    numericColumns: ['balance_trx', 'lock_balance_trx', 'resource_value', 'lock_resource_value', 'resource_type'],
    timestampColumns: ['timestamp', 'expire_time', 'operation_time'],
    sortBy: [
      { column: 'timestamp', order: 'desc' },
      { column: 'query_address', order: 'asc' }
    ]
  },
  bridge: {
    numericColumns: [
      'amount_in',
      'amount_out',
      'price',
      'effective_price',
      'price_impact',
      'minimum_amount_out',
      'expected_amount_out',
      'gas_fee',
      'bridge_fee',
      'total_fee_in_usd',
      'mayan_fee',
      'relayer_fee',
      'execution_time_seconds',
      'slippage_bps',
      'max_slippage_bps',
      'suggested_slippage_bps',
      'gas_price',
      'gas_drop_amount',
      'from_token_decimals',
      'to_token_decimals',
      'routes_count',
      'route_steps_count',
      'warnings_count'
    ],
    timestampColumns: ['timestamp'],
    sortBy: [{ column: 'timestamp', order: 'desc' }]
  }
};

export function toDateCell(value: CellValue | undefined): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  if (typeof value === 'string') {
    if (value.trim().length === 0) {
      return null;
    }
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  return null;
}

function comparable(value: CellValue | undefined): number | string | null {
  if (value == null) {
    return null;
  }
  if (value instanceof Date) {
    return value.getTime();
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  return value;
}

function compareCells(a: CellValue | undefined, b: CellValue | undefined, order: SortKey['order']): number {
  const left = comparable(a);
  const right = comparable(b);

  // Missing values go last regardless of direction.
  if (left === null || right === null) {
    return left === right ? 0 : left === null ? 1 : -1;
  }

  let cmp: number;
  if (typeof left === 'number' && typeof right === 'number') {
    cmp = left - right;
  } else {
    const l = String(left);
    const r = String(right);
    cmp = l < r ? -1 : l > r ? 1 : 0;
  }

  return order === 'asc' ? cmp : -cmp;
}

export function collectColumns(rows: readonly FlatRecord[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }
  return [...seen];
}

/**
 * Coerces declared numeric and timestamp columns, then sorts. Rows are
 * copied; coercion failures become null. Running it twice is a no-op.
 */
export function formatTable(records: readonly FlatRecord[], schema: TableSchema): ResultTable {
  if (records.length === 0) {
    return { columns: [], rows: [] };
  }

  const rows = records.map((record) => {
    const row: FlatRecord = { ...record };

    for (const column of schema.numericColumns) {
      if (column in row) {
        row[column] = toFiniteNumber(row[column]);
      }
    }

    for (const column of schema.timestampColumns) {
      if (column in row) {
        row[column] = toDateCell(row[column]);
      }
    }

    return row;
  });

  const sorted = rows
    .map((row, index) => ({ row, index }))
    .sort((a, b) => {
      for (const key of schema.sortBy) {
        const cmp = compareCells(a.row[key.column], b.row[key.column], key.order);
        if (cmp !== 0) {
          return cmp;
        }
      }
      return a.index - b.index;
    })
    .map(({ row }) => row);

  return { columns: collectColumns(rows), rows: sorted };
}

import type { CellValue, FlatRecord, ResultTable, SourceKind } from './types';

export interface BaseSummary {
  source: SourceKind;
  rows: number;
  errors: number;
}

export interface EvmSummary extends BaseSummary {
  source: 'evm';
  uniqueAddresses: number;
  firstBlockAt: string | null;
  lastBlockAt: string | null;
  currentBalanceEth: number | null;
  largestIncomingEth: number | null;
  largestOutgoingEth: number | null;
}

export interface TronSummary extends BaseSummary {
  source: 'tron';
  uniqueAddresses: number;
  totalBalanceTrx: number;
  averageBalanceTrx: number | null;
}

export interface BridgeSummary extends BaseSummary {
  source: 'bridge';
  quotes: number;
}

export type TableSummary = EvmSummary | TronSummary | BridgeSummary;

function isError(row: FlatRecord): boolean {
  return typeof row.error === 'string';
}

function numberCell(value: CellValue | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function maxOf(values: Array<number | null>): number | null {
  const present = values.filter((value): value is number => value !== null);
  return present.length === 0 ? null : Math.max(...present);
}

function uniqueAddresses(rows: FlatRecord[]): number {
  return new Set(rows.map((row) => row.query_address).filter((value) => typeof value === 'string')).size;
}

function summarizeEvm(rows: FlatRecord[]): EvmSummary {
  const data = rows.filter((row) => !isError(row));
  const blockTimes = data
    .map((row) => row.block_datetime)
    .filter((value): value is Date => value instanceof Date)
    .map((value) => value.getTime());

  const largest = (type: string) =>
    maxOf(data.filter((row) => row.transaction_type === type).map((row) => numberCell(row.delta_eth_abs)));

  return {
    source: 'evm',
    rows: rows.length,
    errors: rows.length - data.length,
    uniqueAddresses: uniqueAddresses(rows),
    firstBlockAt: blockTimes.length > 0 ? new Date(Math.min(...blockTimes)).toISOString() : null,
    lastBlockAt: blockTimes.length > 0 ? new Date(Math.max(...blockTimes)).toISOString() : null,
    currentBalanceEth: data.length > 0 ? numberCell(data[0]?.balance_eth) : null,
    largestIncomingEth: largest('INCOMING'),
    largestOutgoingEth: largest('OUTGOING')
  };
}

function summarizeTron(rows: FlatRecord[]): TronSummary {
  const balances = rows
    .filter((row) => !isError(row))
    .map((row) => numberCell(row.balance_trx))
    .filter((value): value is number => value !== null);
  const total = balances.reduce((sum, value) => sum + value, 0);

  return {
    source: 'tron',
    rows: rows.length,
    errors: rows.filter(isError).length,
    uniqueAddresses: uniqueAddresses(rows),
    totalBalanceTrx: total,
    averageBalanceTrx: balances.length > 0 ? total / balances.length : null
  };
}

/** Headline figures for a formatted table; expects rows in table sort order. */
export function summarizeTable(source: SourceKind, table: ResultTable): TableSummary {
  switch (source) {
    case 'evm':
      return summarizeEvm(table.rows);
    case 'tron':
      return summarizeTron(table.rows);
    case 'bridge': {
      const errors = table.rows.filter(isError).length;
      return { source: 'bridge', rows: table.rows.length, errors, quotes: table.rows.length - errors };
    }
  }
}

import { describe, expect, it } from 'vitest';
import { TABLE_SCHEMAS, formatTable } from '../src/table';
import type { FlatRecord } from '../src/types';

const T1 = '2026-01-01T00:00:00.000Z';
const T2 = '2026-01-02T00:00:00.000Z';

describe('formatTable', () => {
  it('returns an empty table without a schema for no records', () => {
    expect(formatTable([], TABLE_SCHEMAS.evm)).toEqual({ columns: [], rows: [] });
  });

  it('sorts EVM rows by block number, highest first, errors last', () => {
    const table = formatTable(
      [
        { timestamp: T1, query_address: '0xa', block_number: 5 },
        { timestamp: T1, query_address: '0xb', error: 'HTTP 500: down', error_type: 'http_error' },
        { timestamp: T1, query_address: '0xa', block_number: 9 }
      ],
      TABLE_SCHEMAS.evm
    );

    expect(table.rows.map((row) => row.block_number ?? row.error)).toEqual([9, 5, 'HTTP 500: down']);
    expect(table.columns).toEqual(['timestamp', 'query_address', 'block_number', 'error', 'error_type']);
  });

  it('coerces numeric and timestamp columns, nulling what fails', () => {
    const table = formatTable(
      [
        {
          timestamp: T1,
          query_address: '0xa',
          block_number: '12',
          balance_eth: 'lots',
          block_datetime: 'garbage',
          balance_wei: '12000'
        }
      ],
      TABLE_SCHEMAS.evm
    );

    expect(table.rows[0]).toEqual({
      timestamp: new Date(T1),
      query_address: '0xa',
      block_number: 12,
      balance_eth: null,
      block_datetime: null,
      balance_wei: '12000'
    });
  });

  it('does not add declared columns a row lacks', () => {
    const table = formatTable([{ timestamp: T1, query_address: '0xa' }], TABLE_SCHEMAS.evm);

    expect(table.rows[0]).not.toHaveProperty('block_number');
  });

  it('sorts TRON rows by capture time desc then address asc', () => {
    const table = formatTable(
      [
        { timestamp: T1, query_address: 'TB', balance_trx: 1 },
        { timestamp: T2, query_address: 'TC', balance_trx: 2 },
        { timestamp: T1, query_address: 'TA', balance_trx: 3 }
      ],
      TABLE_SCHEMAS.tron
    );

    expect(table.rows.map((row) => row.query_address)).toEqual(['TC', 'TA', 'TB']);
  });

  it('sorts bridge quotes by capture time desc', () => {
    const table = formatTable(
      [
        { timestamp: T1, from_chain: 'ethereum', amount_in: '1' },
        { timestamp: T2, from_chain: 'arbitrum', amount_in: 2 }
      ],
      TABLE_SCHEMAS.bridge
    );

    expect(table.rows.map((row) => row.from_chain)).toEqual(['arbitrum', 'ethereum']);
    expect(table.rows[1]?.amount_in).toBe(1);
  });

  it('is idempotent', () => {
    const records: FlatRecord[] = [
      { timestamp: T2, query_address: 'TB', balance_trx: '1.5', expire_time: '2023-11-14T22:13:20.000Z', operation_time: null },
      { timestamp: T1, query_address: 'TA', balance_trx: 'x', expire_time: 'never', is_token: true }
    ];

    const once = formatTable(records, TABLE_SCHEMAS.tron);
    const twice = formatTable(once.rows, TABLE_SCHEMAS.tron);

    expect(twice).toEqual(once);
  });

  it('leaves the input records untouched', () => {
    const record: FlatRecord = { timestamp: T1, query_address: '0xa', block_number: '3' };
    formatTable([record], TABLE_SCHEMAS.evm);

    expect(record.block_number).toBe('3');
  });
});

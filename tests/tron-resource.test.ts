import { describe, expect, it, vi } from 'vitest';
import type { JsonClient, JsonRequestOptions } from '../src/http';
import { createLogger } from '../src/logging';
import {
  buildTronResourceUrl,
  fetchTronResources,
  flattenTronResourcePage,
  resourceTypeName
} from '../src/tron-resource';

const BASE_URL = 'https://tron.test/api/account/resourcev2';
const NOW = new Date('2026-01-01T00:00:00.000Z');
const logger = createLogger('silent', false);

function delegation(receiver: string) {
  return {
    receiverAddress: receiver,
    ownerAddress: 'TOwner',
    balance: 2_500_000,
    lockBalance: 1_000_000,
    resourceValue: 3400,
    lockResourceValue: 0,
    resource: 1,
    expireTime: 1_700_000_000_000,
    operationTime: 0,
    receiverAddressTag: 'Exchange'
  };
}

describe('resourceTypeName', () => {
  it('maps known codes and labels the rest', () => {
    expect(resourceTypeName(0)).toBe('BANDWIDTH');
    expect(resourceTypeName(1)).toBe('ENERGY');
    expect(resourceTypeName(2)).toBe('TRON_POWER');
    expect(resourceTypeName(7)).toBe('UNKNOWN_7');
  });
});

describe('buildTronResourceUrl', () => {
  it('encodes paging and resource filters', () => {
    expect(buildTronResourceUrl(BASE_URL, 'TAddr', 100, 200)).toBe(
      'https://tron.test/api/account/resourcev2?limit=100&start=200&address=TAddr&type=1&resourceType=0'
    );
  });
});

describe('flattenTronResourcePage', () => {
  it('converts sun to TRX and joins contract metadata', () => {
    const page = flattenTronResourcePage(
      {
        total: 1,
        data: [delegation('TRecv')],
        contractInfo: { TRecv: { isToken: true, name: 'SomeToken', vip: false, risk: true } }
      },
      { address: 'TQuery' },
      NOW
    );

    expect(page.total).toBe(1);
    expect(page.records).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        query_address: 'TQuery',
        receiver_address: 'TRecv',
        owner_address: 'TOwner',
        balance_trx: 2.5,
        lock_balance_trx: 1,
        resource_value: 3400,
        lock_resource_value: 0,
        resource_type: 1,
        resource_type_name: 'ENERGY',
        expire_time: '2023-11-14T22:13:20.000Z',
        operation_time: null,
        receiver_address_tag: 'Exchange',
        is_token: true,
        contract_name: 'SomeToken',
        is_vip: false,
        risk: true
      }
    ]);
  });

  it('defaults contract flags when the receiver has no metadata', () => {
    const { records } = flattenTronResourcePage({ total: 1, data: [delegation('TOther')], contractInfo: {} }, { address: 'TQuery' }, NOW);

    expect(records[0]?.is_token).toBe(false);
    expect(records[0]?.contract_name).toBe('');
    expect(records[0]?.is_vip).toBe(false);
    expect(records[0]?.risk).toBe(false);
  });

  it('emits one placeholder row when the response has no data rows', () => {
    const { records } = flattenTronResourcePage({ total: 0, data: [] }, { address: 'TEmpty' }, NOW);

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      query_address: 'TEmpty',
      receiver_address: 'TEmpty',
      balance_trx: 0,
      resource_type: 0,
      resource_type_name: 'BANDWIDTH'
    });
  });

  it('emits nothing for an empty body', () => {
    expect(flattenTronResourcePage({}, { address: 'TEmpty' }, NOW)).toEqual({ records: [], total: 0 });
  });
});

describe('fetchTronResources', () => {
  it('walks offsets until start + limit reaches the total', async () => {
    const getJson = vi.fn(
      async (_url: string, _options?: JsonRequestOptions): Promise<unknown> => ({ total: 250, data: [delegation('TRecv')] })
    );
    const client: JsonClient = { getJson, close: vi.fn() };

    const records = await fetchTronResources(client, { address: 'TAddr' }, { baseUrl: BASE_URL, logger, now: () => NOW });

    expect(records).toHaveLength(3);
    expect(getJson.mock.calls.map(([url]) => new URL(url).searchParams.get('start'))).toEqual(['0', '100', '200']);
  });

  it('sends the API key header when configured', async () => {
    const getJson = vi.fn(
      async (_url: string, _options?: JsonRequestOptions): Promise<unknown> => ({ total: 1, data: [delegation('TRecv')] })
    );

    await fetchTronResources(
      { getJson, close: vi.fn() },
      { address: 'TAddr' },
      { baseUrl: BASE_URL, apiKey: 'test-key', logger, now: () => NOW }
    );

    expect(getJson).toHaveBeenCalledWith(
      'https://tron.test/api/account/resourcev2?limit=100&start=0&address=TAddr&type=1&resourceType=0',
      { headers: { 'TRON-PRO-API-KEY': 'test-key' } }
    );
  });

  it('stops on a page that yields no records', async () => {
    const getJson = vi.fn(async (): Promise<unknown> => ({}));

    const records = await fetchTronResources({ getJson, close: vi.fn() }, { address: 'TAddr' }, { baseUrl: BASE_URL, logger });

    expect(records).toEqual([]);
    expect(getJson).toHaveBeenCalledTimes(1);
  });

  it('keeps paging through empty data pages while the total says there is more', async () => {
    const getJson = vi.fn(async (): Promise<unknown> => ({ total: 1000, data: [] }));

    const records = await fetchTronResources(
      { getJson, close: vi.fn() },
      { address: 'TAddr' },
      { baseUrl: BASE_URL, logger, now: () => NOW }
    );

    expect(getJson).toHaveBeenCalledTimes(10);
    expect(records).toHaveLength(10);
    expect(records.every((record) => record.receiver_address === 'TAddr')).toBe(true);
  });

  it('honours an explicit page ceiling', async () => {
    const getJson = vi.fn(async (): Promise<unknown> => ({ total: 1_000_000, data: [delegation('TRecv')] }));

    const records = await fetchTronResources(
      { getJson, close: vi.fn() },
      { address: 'TAddr' },
      { baseUrl: BASE_URL, maxPages: 4, logger, now: () => NOW }
    );

    expect(getJson).toHaveBeenCalledTimes(4);
    expect(records).toHaveLength(4);
  });
});

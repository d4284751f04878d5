import type { Logger } from 'pino';
import type { BatchSource } from './batch';
import type { JsonClient } from './http';
import { isJsonObject, readArray, readBoolean, readObject, readString } from './json';
import { countOffset, type OffsetPage } from './paginate';
import type { TronResourceRecord, TronResourceTarget } from './types';
import { SUN_DECIMALS, normalizeEpochMillis, toDisplayUnit, toFiniteNumber, toNumberOr } from './units';

export const TRON_PAGE_SIZE = 100;
export const TRON_API_KEY_HEADER = 'TRON-PRO-API-KEY';

const RESOURCE_TYPE_NAMES: Record<number, string> = {
  0: 'BANDWIDTH',
  1: 'ENERGY',
  2: 'TRON_POWER'
};

export function resourceTypeName(code: number): string {
  return RESOURCE_TYPE_NAMES[code] ?? `UNKNOWN_${code}`;
}

export function buildTronResourceUrl(baseUrl: string, address: string, limit: number, start: number): string {
  const params = new URLSearchParams({
    limit: String(limit),
    start: String(start),
    address,
    type: '1',
    resourceType: '0'
  });

  return `${baseUrl}?${params.toString()}`;
}

function placeholderRecord(address: string, capturedAt: string): TronResourceRecord {
  return {
    timestamp: capturedAt,
    query_address: address,
    receiver_address: address,
    owner_address: '',
    balance_trx: 0,
    lock_balance_trx: 0,
    resource_value: 0,
    lock_resource_value: 0,
    resource_type: 0,
    resource_type_name: resourceTypeName(0),
    expire_time: null,
    operation_time: null,
    receiver_address_tag: '',
    is_token: false,
    contract_name: '',
    is_vip: false,
    risk: false
  };
}

/**
 * Flattens one `resourcev2` page. A non-empty response without rows still
 * yields one placeholder row so the queried address shows up in the table.
 */
export function flattenTronResourcePage(
  body: unknown,
  target: TronResourceTarget,
  now: Date = new Date()
): OffsetPage<TronResourceRecord> {
  const capturedAt = now.toISOString();
  const contracts = readObject(body, 'contractInfo');
  const records: TronResourceRecord[] = [];

  for (const item of readArray(body, 'data')) {
    if (!isJsonObject(item)) {
      continue;
    }

    const receiver = readString(item, 'receiverAddress');
    const resourceType = toNumberOr(item.resource, 0);
    const contract = contracts?.[receiver];
    const info = isJsonObject(contract) ? contract : {};

    records.push({
      timestamp: capturedAt,
      query_address: target.address,
      receiver_address: receiver,
      owner_address: readString(item, 'ownerAddress'),
      balance_trx: toDisplayUnit(item.balance, SUN_DECIMALS),
      lock_balance_trx: toDisplayUnit(item.lockBalance, SUN_DECIMALS),
      resource_value: toNumberOr(item.resourceValue, 0),
      lock_resource_value: toNumberOr(item.lockResourceValue, 0),
      resource_type: resourceType,
      resource_type_name: resourceTypeName(resourceType),
      expire_time: normalizeEpochMillis(item.expireTime),
      operation_time: normalizeEpochMillis(item.operationTime),
      receiver_address_tag: readString(item, 'receiverAddressTag'),
      is_token: readBoolean(info, 'isToken'),
      contract_name: readString(info, 'name'),
      is_vip: readBoolean(info, 'vip'),
      risk: readBoolean(info, 'risk')
    });
  }

  if (records.length === 0 && isJsonObject(body) && Object.keys(body).length > 0) {
    records.push(placeholderRecord(target.address, capturedAt));
  }

  const total = isJsonObject(body) ? toFiniteNumber(body.total) ?? 0 : 0;
  return { records, total };
}

export interface TronResourceFetchOptions {
  baseUrl: string;
  apiKey?: string;
  maxPages?: number;
  logger: Logger;
  now?: () => Date;
}

export async function fetchTronResources(
  client: JsonClient,
  target: TronResourceTarget,
  options: TronResourceFetchOptions
): Promise<TronResourceRecord[]> {
  const now = options.now ?? (() => new Date());
  const headers: Record<string, string> = {};
  if (options.apiKey) {
    headers[TRON_API_KEY_HEADER] = options.apiKey;
  }

  return countOffset(
    TRON_PAGE_SIZE,
    async (start, limit) => {
      const url = buildTronResourceUrl(options.baseUrl, target.address, limit, start);
      options.logger.debug({ url, start }, 'Fetching resource page');
      const body = await client.getJson(url, { headers });
      return flattenTronResourcePage(body, target, now());
    },
    options.maxPages
  );
}

export function createTronResourceSource(client: JsonClient, options: TronResourceFetchOptions): BatchSource<TronResourceTarget> {
  return {
    kind: 'tron',
    identify: (target) => ({ query_address: target.address }),
    describe: (target) => target.address,
    fetch: (target) => fetchTronResources(client, target, options)
  };
}

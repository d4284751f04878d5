import type { Logger } from 'pino';
import type { BatchSource } from './batch';
import type { JsonClient } from './http';
import { isJsonObject, readArray, readObject, readString } from './json';
import { followCursor, type CursorPage } from './paginate';
import type { EvmBalanceRecord, EvmBalanceTarget, TransactionType } from './types';
import { WEI_DECIMALS, normalizeIsoTimestamp, toDisplayUnit, toFiniteNumber } from './units';

export const DEFAULT_ITEMS_COUNT = 50;

export interface EvmCursor {
  blockNumber?: number;
  itemsCount: number;
}

export function buildEvmBalanceUrl(baseUrl: string, address: string, cursor: EvmCursor): string {
  const params = new URLSearchParams({ items_count: String(cursor.itemsCount) });
  if (cursor.blockNumber !== undefined) {
    params.set('block_number', String(cursor.blockNumber));
  }

  return `${baseUrl}/${encodeURIComponent(address)}/coin-balance-history?${params.toString()}`;
}

function classifyDelta(delta: number): TransactionType {
  if (delta > 0) {
    return 'INCOMING';
  }
  if (delta < 0) {
    return 'OUTGOING';
  }
  return 'NO_CHANGE';
}

/**
 * Flattens one `coin-balance-history` page. When the page carries
 * `next_page_params`, the hint is copied onto the last record and returned
 * as the next cursor.
 */
export function flattenEvmBalancePage(
  body: unknown,
  target: EvmBalanceTarget,
  now: Date = new Date()
): CursorPage<EvmBalanceRecord, EvmCursor> {
  const capturedAt = now.toISOString();
  const records: EvmBalanceRecord[] = [];

  for (const item of readArray(body, 'items')) {
    if (!isJsonObject(item)) {
      continue;
    }

    const balanceWei = readString(item, 'value', '0');
    const deltaWei = readString(item, 'delta', '0');
    const blockTimestamp = readString(item, 'block_timestamp');
    const deltaEth = toDisplayUnit(deltaWei, WEI_DECIMALS);

    records.push({
      timestamp: capturedAt,
      query_address: target.address,
      block_number: toFiniteNumber(item.block_number) ?? 0,
      block_timestamp: blockTimestamp,
      transaction_hash: readString(item, 'transaction_hash'),
      balance_eth: toDisplayUnit(balanceWei, WEI_DECIMALS),
      delta_eth: deltaEth,
      balance_wei: balanceWei,
      delta_wei: deltaWei,
      block_datetime: normalizeIsoTimestamp(blockTimestamp),
      transaction_type: classifyDelta(deltaEth),
      delta_eth_abs: Math.abs(deltaEth)
    });
  }

  const hint = readObject(body, 'next_page_params');
  if (!hint || Object.keys(hint).length === 0) {
    return { records, next: null };
  }

  const nextBlockNumber = toFiniteNumber(hint.block_number);
  const nextItemsCount = toFiniteNumber(hint.items_count);
  const last = records[records.length - 1];
  if (last) {
    last.next_block_number = nextBlockNumber;
    last.next_items_count = nextItemsCount;
  }

  // A hint without a block number cannot move the cursor forward.
  if (nextBlockNumber === null) {
    return { records, next: null };
  }

  return {
    records,
    next: { blockNumber: nextBlockNumber, itemsCount: nextItemsCount ?? target.itemsCount }
  };
}

export interface EvmBalanceFetchOptions {
  baseUrl: string;
  maxPages: number;
  logger: Logger;
  now?: () => Date;
}

export async function fetchEvmBalanceHistory(
  client: JsonClient,
  target: EvmBalanceTarget,
  options: EvmBalanceFetchOptions
): Promise<EvmBalanceRecord[]> {
  const now = options.now ?? (() => new Date());
  const initial: EvmCursor = { blockNumber: target.blockNumber, itemsCount: target.itemsCount };

  return followCursor(initial, options.maxPages, async (cursor, pageIndex) => {
    const url = buildEvmBalanceUrl(options.baseUrl, target.address, cursor);
    options.logger.debug({ url, page: pageIndex + 1 }, 'Fetching balance history page');
    const body = await client.getJson(url);
    return flattenEvmBalancePage(body, target, now());
  });
}

export function createEvmBalanceSource(client: JsonClient, options: EvmBalanceFetchOptions): BatchSource<EvmBalanceTarget> {
  return {
    kind: 'evm',
    identify: (target) => ({ query_address: target.address }),
    describe: (target) => target.address,
    fetch: (target) => fetchEvmBalanceHistory(client, target, options)
  };
}

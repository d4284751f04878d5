import type { Logger } from 'pino';
import type { BatchSource } from './batch';
import type { JsonClient } from './http';
import { isJsonObject, readObject, readScalar, readString, type JsonObject } from './json';
import type { BridgeQuoteRecord, BridgeQuoteTarget, FlatRecord } from './types';

export const DEFAULT_REFERRER = '7HN4qCvG2dP5oagZRxj2dTGPhksgRnKCaLPjtjKEr1Ho';

// Route families and SDK identifiers the quote endpoint expects on every call.
const FEATURE_FLAGS: ReadonlyArray<[string, string]> = [
  ['wormhole', 'true'],
  ['swift', 'true'],
  ['mctp', 'true'],
  ['shuttle', 'false'],
  ['fastMctp', 'true'],
  ['gasless', 'true'],
  ['onlyDirect', 'false'],
  ['fullList', 'false'],
  ['monoChain', 'true'],
  ['solanaProgram', 'FC4eXxkyrMPTjiYUpp4EAnkmwMbQyZ6NDCh1kfLn6vsf'],
  ['forwarderAddress', '0x337685fdaB40D39bd02028545a4FfA7D287cC3E2']
];

const SCALAR_FIELDS: ReadonlyArray<[column: string, key: string, fallback: string | number]> = [
  ['amount_out', 'amountOut', 0],
  ['effective_price', 'effectivePrice', 0],
  ['price', 'price', 0],
  ['price_impact', 'priceImpact', 0],
  ['minimum_amount_out', 'minimumAmountOut', 0],
  ['expected_amount_out', 'expectedAmountOut', 0],
  ['gas_fee', 'gasFee', 0],
  ['bridge_fee', 'bridgeFee', 0],
  ['total_fee_in_usd', 'totalFeeInUsd', 0],
  ['mayan_fee', 'mayanFee', 0],
  ['relayer_fee', 'relayerFee', 0],
  ['route_type', 'routeType', ''],
  ['execution_time_seconds', 'executionTimeSeconds', 0],
  ['quote_type', 'type', ''],
  ['slippage_bps', 'slippageBps', 0],
  ['max_slippage_bps', 'maxSlippageBps', 0],
  ['suggested_slippage_bps', 'suggestedSlippageBps', 0],
  ['gas_price', 'gasPrice', 0],
  ['gas_drop_amount', 'gasDropAmount', 0]
];

const LIST_FIELDS: ReadonlyArray<[prefix: string, key: string]> = [
  ['routes', 'routes'],
  ['route_steps', 'routeSteps'],
  ['warnings', 'warnings']
];

export function buildBridgeQuoteUrl(baseUrl: string, target: BridgeQuoteTarget): string {
  const params = new URLSearchParams(FEATURE_FLAGS.map(([key, value]): [string, string] => [key, value]));
  params.set('amountIn', String(target.amountIn));
  params.set('fromToken', target.fromToken);
  params.set('fromChain', target.fromChain);
  params.set('toToken', target.toToken);
  params.set('toChain', target.toChain);
  params.set('slippageBps', target.slippageBps);
  params.set('referrer', target.referrer);
  params.set('gasDrop', '0');
  params.set('sdkVersion', '11_0_0');

  return `${baseUrl}?${params.toString()}`;
}

export function bridgeQuoteIdentity(target: BridgeQuoteTarget): FlatRecord {
  return {
    from_chain: target.fromChain,
    to_chain: target.toChain,
    from_token: target.fromToken,
    to_token: target.toToken,
    amount_in: target.amountIn
  };
}

function unpackTokenMetadata(record: FlatRecord, prefix: 'from_token' | 'to_token', meta: JsonObject): void {
  record[`${prefix}_symbol`] = readString(meta, 'symbol');
  record[`${prefix}_decimals`] = readScalar(meta, 'decimals', 0);
  record[`${prefix}_name`] = readString(meta, 'name');
  record[`${prefix}_logo_uri`] = readString(meta, 'logoURI');
}

export function flattenBridgeQuote(body: unknown, target: BridgeQuoteTarget, now: Date = new Date()): BridgeQuoteRecord {
  const record: BridgeQuoteRecord = {
    timestamp: now.toISOString(),
    from_chain: target.fromChain,
    to_chain: target.toChain,
    from_token: target.fromToken,
    to_token: target.toToken,
    amount_in: target.amountIn,
    requested_slippage_bps: target.slippageBps,
    referrer: target.referrer
  };

  if (!isJsonObject(body)) {
    return record;
  }

  for (const [column, key, fallback] of SCALAR_FIELDS) {
    record[column] = readScalar(body, key, fallback);
  }

  for (const [prefix, key] of LIST_FIELDS) {
    const value = body[key];
    if (Array.isArray(value)) {
      record[`${prefix}_json`] = JSON.stringify(value);
      record[`${prefix}_count`] = value.length;
    }
  }

  const fromMeta = readObject(body, 'fromTokenMetadata');
  if (fromMeta) {
    unpackTokenMetadata(record, 'from_token', fromMeta);
  }
  const toMeta = readObject(body, 'toTokenMetadata');
  if (toMeta) {
    unpackTokenMetadata(record, 'to_token', toMeta);
  }

  return record;
}

export interface BridgeQuoteFetchOptions {
  baseUrl: string;
  logger: Logger;
  now?: () => Date;
}

export async function fetchBridgeQuote(
  client: JsonClient,
  target: BridgeQuoteTarget,
  options: BridgeQuoteFetchOptions
): Promise<BridgeQuoteRecord> {
  const url = buildBridgeQuoteUrl(options.baseUrl, target);
  options.logger.debug({ url }, 'Fetching bridge quote');
  const body = await client.getJson(url);
  return flattenBridgeQuote(body, target, options.now ? options.now() : new Date());
}

export function createBridgeQuoteSource(client: JsonClient, options: BridgeQuoteFetchOptions): BatchSource<BridgeQuoteTarget> {
  return {
    kind: 'bridge',
    identify: bridgeQuoteIdentity,
    describe: (target) => `${target.fromChain}->${target.toChain} ${target.fromToken}->${target.toToken}`,
    fetch: async (target) => [await fetchBridgeQuote(client, target, options)]
  };
}

import { promises as fs } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_REFERRER } from './bridge-quote';
import { DEFAULT_ITEMS_COUNT } from './evm-balance';
import type { BridgeQuoteTarget, EvmBalanceTarget, SourceKind, TargetCliOptions, TronResourceTarget } from './types';

const address = z.string().trim().min(1);

export const evmTargetSchema = z.object({
  address,
  blockNumber: z.number().int().min(0).optional(),
  itemsCount: z.number().int().min(1).max(50).default(DEFAULT_ITEMS_COUNT)
});

export const tronTargetSchema = z.object({ address });

export const bridgeTargetSchema = z.object({
  fromChain: z.string().min(1),
  toChain: z.string().min(1),
  fromToken: z.string().min(1),
  toToken: z.string().min(1),
  amountIn: z.number().positive().default(1),
  slippageBps: z.union([z.string().min(1), z.number().int().min(0).transform(String)]).default('auto'),
  referrer: z.string().min(1).default(DEFAULT_REFERRER)
});

export interface TargetsByKind {
  evm: EvmBalanceTarget;
  tron: TronResourceTarget;
  bridge: BridgeQuoteTarget;
}

const SCHEMAS: { [K in SourceKind]: z.ZodType<TargetsByKind[K], z.ZodTypeDef, unknown> } = {
  evm: evmTargetSchema,
  tron: tronTargetSchema,
  bridge: bridgeTargetSchema
};

/** Accepts bare address strings for the address-based sources. */
function coerceEntry(kind: SourceKind, entry: unknown): unknown {
  if (kind !== 'bridge' && typeof entry === 'string') {
    return { address: entry };
  }
  return entry;
}

export function parseTargets<K extends SourceKind>(kind: K, input: unknown): TargetsByKind[K][] {
  if (!Array.isArray(input)) {
    throw new Error(`Expected a JSON array of ${kind} targets`);
  }

  const schema: z.ZodType<TargetsByKind[K], z.ZodTypeDef, unknown> = SCHEMAS[kind];
  return input.map((entry) => schema.parse(coerceEntry(kind, entry)));
}

export async function loadTargetsFile<K extends SourceKind>(kind: K, filePath: string): Promise<TargetsByKind[K][]> {
  const content = await fs.readFile(filePath, 'utf8');
  return parseTargets(kind, JSON.parse(content));
}

/**
 * Builds targets from command-line flags. A targets file and inline flags
 * are combined, file entries first.
 */
export async function resolveCliTargets<K extends SourceKind>(
  kind: K,
  cli: TargetCliOptions,
  defaults: { itemsCount: number }
): Promise<TargetsByKind[K][]> {
  const fromFile = cli.targets ? await loadTargetsFile(kind, cli.targets) : [];
  const inline: unknown[] = [];

  if (kind === 'bridge') {
    if (cli.fromChain || cli.toChain || cli.fromToken || cli.toToken) {
      inline.push({
        fromChain: cli.fromChain,
        toChain: cli.toChain,
        fromToken: cli.fromToken,
        toToken: cli.toToken,
        amountIn: cli.amountIn,
        slippageBps: cli.slippageBps,
        referrer: cli.referrer
      });
    }
  } else {
    for (const entry of cli.address ?? []) {
      inline.push(
        kind === 'evm' ? { address: entry, blockNumber: cli.blockNumber, itemsCount: defaults.itemsCount } : { address: entry }
      );
    }
  }

  const targets = [...fromFile, ...parseTargets(kind, inline)];
  if (targets.length === 0) {
    throw new Error(`No ${kind} targets given; pass --address or --targets`);
  }

  return targets;
}

import { z } from 'zod';
import type { AppConfig, CliOptions, LogLevel } from './types';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const DEFAULT_EVM_BASE_URL = 'https://scan.everclear.org/api/v2/addresses';
export const DEFAULT_TRON_BASE_URL = 'https://apilist.tronscanapi.com/api/account/resourcev2';
export const DEFAULT_BRIDGE_BASE_URL = 'https://price-api.mayan.finance/v3/quote';

function parseBool(input: string | undefined): boolean | undefined {
  if (input == null) {
    return undefined;
  }

  const normalized = input.toLowerCase().trim();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }

  return undefined;
}

function optionalString(input: string | undefined): string | undefined {
  if (!input) {
    return undefined;
  }

  const trimmed = input.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function optionalNumber(input: string | undefined): number | undefined {
  const value = optionalString(input);
  return value === undefined ? undefined : Number(value);
}

function removeTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

const configSchema = z.object({
  evmBaseUrl: z.string().url(),
  tronBaseUrl: z.string().url(),
  bridgeBaseUrl: z.string().url(),
  tronApiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().min(1),
  maxPages: z.number().int().min(1),
  tronMaxPages: z.number().int().min(1).optional(),
  itemsCount: z.number().int().min(1).max(50),
  concurrency: z.number().int().min(1),
  outputDir: z.string().min(1),
  exportFiles: z.boolean(),
  logLevel: z.enum(LOG_LEVELS)
});

export function buildAppConfig(cli: CliOptions, env = process.env): AppConfig {
  const raw = {
    evmBaseUrl: optionalString(env.HARVEST_EVM_BASE_URL) ?? DEFAULT_EVM_BASE_URL,
    tronBaseUrl: optionalString(env.HARVEST_TRON_BASE_URL) ?? DEFAULT_TRON_BASE_URL,
    bridgeBaseUrl: optionalString(env.HARVEST_BRIDGE_BASE_URL) ?? DEFAULT_BRIDGE_BASE_URL,
    tronApiKey: optionalString(cli.apiKey) ?? optionalString(env.TRONSCAN_API_KEY),
    timeoutMs: cli.timeoutMs ?? Number(env.HARVEST_TIMEOUT_MS ?? 30_000),
    maxPages: cli.maxPages ?? Number(env.HARVEST_MAX_PAGES ?? 10),
    tronMaxPages: cli.tronMaxPages ?? optionalNumber(env.HARVEST_TRON_MAX_PAGES),
    itemsCount: cli.itemsCount ?? Number(env.HARVEST_ITEMS_COUNT ?? 50),
    concurrency: cli.concurrency ?? Number(env.HARVEST_CONCURRENCY ?? 1),
    outputDir: cli.outputDir ?? env.HARVEST_OUTPUT_DIR ?? './out',
    exportFiles: cli.export === false ? false : parseBool(env.HARVEST_EXPORT) ?? true,
    logLevel: cli.logLevel ?? optionalString(env.HARVEST_LOG_LEVEL) ?? 'info'
  };

  const parsed = configSchema.parse(raw);

  return {
    ...parsed,
    evmBaseUrl: removeTrailingSlash(parsed.evmBaseUrl),
    tronBaseUrl: removeTrailingSlash(parsed.tronBaseUrl),
    bridgeBaseUrl: removeTrailingSlash(parsed.bridgeBaseUrl)
  };
}

export function parseNumberFlag(name: string, value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`${name} must be a valid number`);
  }

  return parsed;
}

export function parseLogLevel(value: string): LogLevel {
  const lower = value.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === lower);
  if (!level) {
    throw new Error(`Invalid log level: ${value}`);
  }

  return level;
}

import type { Logger } from 'pino';
import { fetchBatch, type BatchResult } from './batch';
import { createBridgeQuoteSource } from './bridge-quote';
import { createEvmBalanceSource } from './evm-balance';
import { createHttpClient, type HttpClientOptions, type JsonClient } from './http';
import { writeOutputs } from './output';
import { TABLE_SCHEMAS, formatTable } from './table';
import { createTronResourceSource } from './tron-resource';
import type {
  AppConfig,
  BridgeQuoteTarget,
  EvmBalanceTarget,
  ResultTable,
  RunMetadata,
  TargetOutcome,
  TronResourceTarget
} from './types';

export type BatchRequest =
  | { source: 'evm'; targets: EvmBalanceTarget[] }
  | { source: 'tron'; targets: TronResourceTarget[] }
  | { source: 'bridge'; targets: BridgeQuoteTarget[] };

export interface BatchRunResult {
  table: ResultTable;
  outcomes: TargetOutcome[];
  metadata?: RunMetadata;
}

export interface RunDependencies {
  createClient?: (options: HttpClientOptions) => JsonClient;
  now?: () => Date;
}

function errorMessages(outcomes: TargetOutcome[]): string[] {
  return outcomes.flatMap((outcome) => (outcome.ok ? [] : [outcome.error]));
}

async function runRequest(
  client: JsonClient,
  cfg: AppConfig,
  request: BatchRequest,
  logger: Logger,
  now?: () => Date
): Promise<BatchResult> {
  const batchOptions = { logger, concurrency: cfg.concurrency, now };

  switch (request.source) {
    case 'evm': {
      const source = createEvmBalanceSource(client, {
        baseUrl: cfg.evmBaseUrl,
        maxPages: cfg.maxPages,
        logger,
        now
      });
      return fetchBatch(request.targets, source, batchOptions);
    }
    case 'tron': {
      if (cfg.tronMaxPages === undefined) {
        logger.debug('Resource pagination has no page ceiling; stopping on the reported total');
      }
      const source = createTronResourceSource(client, {
        baseUrl: cfg.tronBaseUrl,
        apiKey: cfg.tronApiKey,
        maxPages: cfg.tronMaxPages,
        logger,
        now
      });
      return fetchBatch(request.targets, source, batchOptions);
    }
    case 'bridge': {
      const source = createBridgeQuoteSource(client, { baseUrl: cfg.bridgeBaseUrl, logger, now });
      return fetchBatch(request.targets, source, batchOptions);
    }
  }
}

/**
 * Runs one batch end to end: fetch every target, format the table and
 * export it. The HTTP client lives for exactly this call.
 */
export async function runBatch(
  cfg: AppConfig,
  request: BatchRequest,
  logger: Logger,
  deps: RunDependencies = {}
): Promise<BatchRunResult> {
  const startedAt = new Date();
  const client = (deps.createClient ?? createHttpClient)({ timeoutMs: cfg.timeoutMs });

  try {
    const { records, outcomes } = await runRequest(client, cfg, request, logger, deps.now);
    const table = formatTable(records, TABLE_SCHEMAS[request.source]);
    const failedTargets = outcomes.filter((outcome) => !outcome.ok).length;

    logger.info(
      { source: request.source, targets: request.targets.length, rows: table.rows.length, failedTargets },
      'Batch finished'
    );

    if (!cfg.exportFiles || table.rows.length === 0) {
      return { table, outcomes };
    }

    const endedAt = new Date();
    const metadata = await writeOutputs(cfg.outputDir, request.source, table, {
      source: request.source,
      startedAt: startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationMs: endedAt.getTime() - startedAt.getTime(),
      targets: request.targets.length,
      records: table.rows.length,
      failedTargets,
      errors: errorMessages(outcomes)
    });

    logger.info({ csv: metadata.outputCsv, json: metadata.outputJson }, 'Table exported');
    return { table, outcomes, metadata };
  } finally {
    client.close();
  }
}

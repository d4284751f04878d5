import { Command } from 'commander';
import { buildAppConfig, parseLogLevel, parseNumberFlag } from './config';
import { createLogger } from './logging';
import { runBatch, type BatchRequest } from './run';
import { summarizeTable } from './summary';
import { resolveCliTargets } from './targets';
import type { AppConfig, CliOptions, SourceKind, TargetCliOptions } from './types';

type CommandOptions = CliOptions & TargetCliOptions;

async function buildRequest(source: SourceKind, options: CommandOptions, cfg: AppConfig): Promise<BatchRequest> {
  const defaults = { itemsCount: cfg.itemsCount };
  switch (source) {
    case 'evm':
      return { source, targets: await resolveCliTargets('evm', options, defaults) };
    case 'tron':
      return { source, targets: await resolveCliTargets('tron', options, defaults) };
    case 'bridge':
      return { source, targets: await resolveCliTargets('bridge', options, defaults) };
  }
}

async function execute(source: SourceKind, options: CommandOptions): Promise<void> {
  const cfg = buildAppConfig(options);
  const logger = createLogger(cfg.logLevel, true);

  logger.info(
    {
      source,
      maxPages: cfg.maxPages,
      concurrency: cfg.concurrency,
      timeoutMs: cfg.timeoutMs,
      outputDir: cfg.exportFiles ? cfg.outputDir : undefined
    },
    'Starting batch'
  );

  try {
    const request = await buildRequest(source, options, cfg);
    const result = await runBatch(cfg, request, logger);
    logger.info({ summary: summarizeTable(source, result.table) }, 'Run completed');
  } catch (error) {
    logger.error({ error }, 'Run failed');
    process.exitCode = 1;
  }
}

function withSharedOptions(command: Command): Command {
  return command
    .option('--targets <path>', 'JSON file with an array of targets')
    .option('--max-pages <n>', 'Maximum cursor pages per address', (value) => parseNumberFlag('max-pages', value))
    .option('--concurrency <n>', 'Targets fetched at once (1 = sequential)', (value) => parseNumberFlag('concurrency', value))
    .option('--timeout-ms <ms>', 'Per-request timeout', (value) => parseNumberFlag('timeout-ms', value))
    .option('--output-dir <path>', 'Output directory for CSV/JSON')
    .option('--no-export', 'Skip writing output files')
    .option('--log-level <level>', 'fatal|error|warn|info|debug|trace|silent', parseLogLevel);
}

const program = new Command();
program.name('balance-harvest').description('Balance history and bridge quote export');

withSharedOptions(
  program
    .command('evm')
    .description('Fetch EVM coin balance history')
    .option('--address <address...>', 'Addresses to query')
    .option('--block-number <n>', 'Start below this block', (value) => parseNumberFlag('block-number', value))
    .option('--items-count <n>', 'Page size (max 50)', (value) => parseNumberFlag('items-count', value))
).action((options: CommandOptions) => execute('evm', options));

withSharedOptions(
  program
    .command('tron')
    .description('Fetch TRON resource delegations and balances')
    .option('--address <address...>', 'Addresses to query')
    .option('--api-key <key>', 'Tronscan API key (fallback: TRONSCAN_API_KEY)')
    .option('--tron-max-pages <n>', 'Optional page ceiling for offset pagination', (value) =>
      parseNumberFlag('tron-max-pages', value)
    )
).action((options: CommandOptions) => execute('tron', options));

withSharedOptions(
  program
    .command('bridge')
    .description('Fetch cross-chain bridge quotes')
    .option('--from-chain <chain>', 'Source chain')
    .option('--to-chain <chain>', 'Destination chain')
    .option('--from-token <address>', 'Source token address')
    .option('--to-token <address>', 'Destination token address')
    .option('--amount-in <amount>', 'Input amount', (value) => parseNumberFlag('amount-in', value))
    .option('--slippage-bps <bps>', 'Slippage tolerance in bps or "auto"')
    .option('--referrer <address>', 'Referrer address')
).action((options: CommandOptions) => execute('bridge', options));

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});

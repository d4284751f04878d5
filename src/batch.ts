import pLimit from 'p-limit';
import type { Logger } from 'pino';
import { HttpStatusError } from './http';
import type { ErrorRecord, ErrorType, FlatRecord, SourceKind, TargetOutcome } from './types';

export interface BatchSource<TTarget> {
  kind: SourceKind;
  /** Identifying columns shared by success and error rows of one target. */
  identify(target: TTarget): FlatRecord;
  describe(target: TTarget): string;
  fetch(target: TTarget): Promise<FlatRecord[]>;
}

export interface BatchOptions {
  logger: Logger;
  concurrency?: number;
  now?: () => Date;
}

export interface BatchResult {
  records: FlatRecord[];
  outcomes: TargetOutcome[];
}

function classifyError(error: unknown): { errorType: ErrorType; message: string } {
  if (error instanceof HttpStatusError) {
    return { errorType: 'http_error', message: `HTTP ${error.statusCode}: ${error.message}` };
  }

  return {
    errorType: 'general_error',
    message: error instanceof Error ? error.message : String(error)
  };
}

export function createErrorRecord(
  identity: FlatRecord,
  message: string,
  errorType: ErrorType,
  now: Date = new Date()
): ErrorRecord {
  return {
    ...identity,
    timestamp: now.toISOString(),
    error: message,
    error_type: errorType
  };
}

export async function fetchBatch<TTarget>(
  targets: readonly TTarget[],
  source: BatchSource<TTarget>,
  options: BatchOptions
): Promise<BatchResult> {
  const { logger } = options;
  const now = options.now ?? (() => new Date());
  const limiter = pLimit(Math.max(1, options.concurrency ?? 1));

  const settle = async (target: TTarget, index: number): Promise<TargetOutcome> => {
    const label = source.describe(target);
    try {
      const records = await source.fetch(target);
      logger.info({ source: source.kind, target: label, records: records.length }, 'Target fetched');
      return { ok: true, index, records };
    } catch (error) {
      const { errorType, message } = classifyError(error);
      logger.warn({ source: source.kind, target: label, errorType, message }, 'Target failed');
      const record = createErrorRecord(source.identify(target), message, errorType, now());
      return { ok: false, index, errorType, error: message, record };
    }
  };

  const outcomes = await Promise.all(targets.map((target, index) => limiter(() => settle(target, index))));

  const records: FlatRecord[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      records.push(...outcome.records);
    } else {
      records.push(outcome.record);
    }
  }

  return { records, outcomes };
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type SourceKind = 'evm' | 'tron' | 'bridge';

export interface CliOptions {
  maxPages?: number;
  tronMaxPages?: number;
  itemsCount?: number;
  concurrency?: number;
  timeoutMs?: number;
  outputDir?: string;
  export?: boolean;
  logLevel?: LogLevel;
  apiKey?: string;
}

export interface TargetCliOptions {
  address?: string[];
  targets?: string;
  blockNumber?: number;
  fromChain?: string;
  toChain?: string;
  fromToken?: string;
  toToken?: string;
  amountIn?: number;
  slippageBps?: string;
  referrer?: string;
}

export interface SourceEndpoints {
  evmBaseUrl: string;
  tronBaseUrl: string;
  bridgeBaseUrl: string;
}

export interface AppConfig extends SourceEndpoints {
  tronApiKey?: string;
  timeoutMs: number;
  maxPages: number;
  tronMaxPages?: number;
  itemsCount: number;
  concurrency: number;
  outputDir: string;
  exportFiles: boolean;
  logLevel: LogLevel;
}

export interface EvmBalanceTarget {
  readonly address: string;
  readonly blockNumber?: number;
  readonly itemsCount: number;
}

export interface TronResourceTarget {
  readonly address: string;
}

export interface BridgeQuoteTarget {
  readonly fromChain: string;
  readonly toChain: string;
  readonly fromToken: string;
  readonly toToken: string;
  readonly amountIn: number;
  readonly slippageBps: string;
  readonly referrer: string;
}

export type CellValue = string | number | boolean | Date | null;

export type FlatRecord = Record<string, CellValue | undefined>;

export type TransactionType = 'INCOMING' | 'OUTGOING' | 'NO_CHANGE';

export type EvmBalanceRecord = {
  timestamp: string;
  query_address: string;
  block_number: number;
  block_timestamp: string;
  transaction_hash: string;
  balance_eth: number;
  delta_eth: number;
  balance_wei: string;
  delta_wei: string;
  block_datetime: string | null;
  transaction_type: TransactionType;
  delta_eth_abs: number;
  next_block_number?: number | null;
  next_items_count?: number | null;
};

export type TronResourceRecord = {
  timestamp: string;
  query_address: string;
  receiver_address: string;
  owner_address: string;
  balance_trx: number;
  lock_balance_trx: number;
  resource_value: number;
  lock_resource_value: number;
  resource_type: number;
  resource_type_name: string;
  expire_time: string | null;
  operation_time: string | null;
  receiver_address_tag: string;
  is_token: boolean;
  contract_name: string;
  is_vip: boolean;
  risk: boolean;
};

export type BridgeQuoteRecord = FlatRecord & {
  timestamp: string;
  from_chain: string;
  to_chain: string;
  from_token: string;
  to_token: string;
  amount_in: number;
};

export type ErrorType = 'http_error' | 'general_error';

export type ErrorRecord = FlatRecord & {
  timestamp: string;
  error: string;
  error_type: ErrorType;
};

export interface ResultTable {
  columns: string[];
  rows: FlatRecord[];
}

export type TargetOutcome =
  | { ok: true; index: number; records: FlatRecord[] }
  | { ok: false; index: number; errorType: ErrorType; error: string; record: ErrorRecord };

export interface RunMetadata {
  source: SourceKind;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  targets: number;
  records: number;
  failedTargets: number;
  errors: string[];
  outputJson: string;
  outputCsv: string;
}

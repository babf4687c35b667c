export interface PricePoint {
  ticker: string;
  date: string; // YYYY-MM-DD format

  open: number;
  high: number;
  low: number;
  close: number;
  adjClose: number;
  volume: number;
}

export interface FetchWindow {
  startDate?: string;
  endDate?: string;
}

/**
 * A remote source of daily bars. Implementations return the provider's rows
 * for one symbol and classify failures as FetchError.
 */
export interface DataService {
  readonly name: string;
  hasCredentials(): boolean;
  fetchDaily(
    ticker: string,
    startDate?: string,
    endDate?: string
  ): Promise<PricePoint[]>;
}

export type UniverseSource =
  | { kind: "csv"; path: string; column?: string }
  | { kind: "text"; path: string }
  | { kind: "inline"; symbols: string[] };

export interface Config {
  sources: {
    tiingo: {
      apiKey: string;
      credentialsFile?: string;
      baseUrl: string;
      timeoutMs: number;
    };
  };
  storage: {
    dataDir: string;
    partitionDir: string;
    databasePath: string;
  };
  fetch: {
    startDate: string;
    concurrency: number;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  universe: UniverseSource[];
}

export type FetchStatus = "skipped" | "succeeded" | "empty" | "failed";

export interface FetchFailure {
  symbol: string;
  kind: "transient" | "permanent" | "write";
  reason: string;
  message: string;
}

export interface FetchProgress {
  symbol: string;
  status: FetchStatus;
  completed: number;
  total: number;
  rows?: number;
  error?: string;
}

export interface FetchReport {
  total: number;
  skipped: string[];
  succeeded: string[];
  empty: string[];
  failed: FetchFailure[];
  maxInFlight: number;
  durationMs: number;
}

export interface TableSummary {
  symbols: number;
  rows: number;
  firstDate: string | null;
  lastDate: string | null;
}

export interface TickerActivity {
  ticker: string;
  lastDate: string;
  days: number;
}

export interface RejectedPartition {
  symbol: string;
  message: string;
}

export interface MergeReport {
  partitions: number;
  loadedSymbols: string[];
  /** Symbols whose partition was removed; their rows were dropped. */
  removedSymbols: string[];
  acceptedRows: number;
  rejectedRows: number;
  duplicateRows: number;
  rejectedPartitions: RejectedPartition[];
  summary: TableSummary;
}

export interface PriceSummary {
  firstDate: string;
  lastDate: string;
  tradingDays: number;
  averageClose: number;
  highest: { price: number; date: string };
  lowest: { price: number; date: string };
  totalVolume: number;
  averageVolume: number;
  change: number | null;
  percentChange: number | null;
}

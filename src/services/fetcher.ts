import { AuthenticationError, FetchError, getErrorMessage } from "../errors.js";
import { logFetch } from "../logging.js";
import { withRetry } from "../utils/retry.js";
import type { DataService, FetchWindow, PricePoint } from "../types/index.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface PriceFetcherOptions extends RetryPolicy {
  startDate: string;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Full daily history for one symbol, with transient failures retried under
 * exponential backoff. Rows come back sorted by date with one row per date.
 */
export class PriceFetcher {
  constructor(
    private readonly service: DataService,
    private readonly options: PriceFetcherOptions
  ) {}

  assertCredentials(): void {
    if (!this.service.hasCredentials()) {
      throw new AuthenticationError(`No API key configured for ${this.service.name}`);
    }
  }

  async fetch(symbol: string, window: FetchWindow = {}): Promise<PricePoint[]> {
    this.assertCredentials();

    const startDate = window.startDate ?? this.options.startDate;

    try {
      const rows = await withRetry(
        () => this.service.fetchDaily(symbol, startDate, window.endDate),
        {
          maxAttempts: this.options.maxAttempts,
          baseDelayMs: this.options.baseDelayMs,
          maxDelayMs: this.options.maxDelayMs,
          sleep: this.options.sleep,
          shouldRetry: (error) => !(error instanceof FetchError) || error.retryable,
          onRetry: ({ attempt, delayMs, error }) => {
            logFetch.warn(
              { symbol, attempt, delayMs },
              `${symbol} attempt ${attempt} failed, retrying in ${delayMs}ms: ${getErrorMessage(error)}`
            );
          },
        }
      );
      return sortAndDedupe(rows);
    } catch (error) {
      if (error instanceof FetchError && !error.retryable) {
        throw error;
      }
      throw new FetchError(
        symbol,
        "transient",
        error instanceof FetchError ? error.reason : "network",
        `${symbol}: gave up after ${this.options.maxAttempts} attempts: ${getErrorMessage(error)}`,
        error
      );
    }
  }
}

// Later rows win when the provider repeats a date
export function sortAndDedupe(rows: PricePoint[]): PricePoint[] {
  const byDate = new Map<string, PricePoint>();
  for (const row of rows) {
    byDate.set(row.date, row);
  }
  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

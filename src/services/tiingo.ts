import axios, { type AxiosInstance } from "axios";
import * as t from "typanion";
import { FetchError } from "../errors.js";
import type { DataService, PricePoint } from "../types/index.js";

const isTiingoBar = t.isPartial({
  date: t.isString(),
  open: t.isNumber(),
  high: t.isNumber(),
  low: t.isNumber(),
  close: t.isNumber(),
  adjClose: t.isNumber(),
  volume: t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(0)]),
});

const isTiingoResponse = t.isArray(isTiingoBar);

export interface TiingoServiceOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export class TiingoService implements DataService {
  readonly name = "tiingo";
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;
  private http: AxiosInstance;

  constructor(options: TiingoServiceOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.http = options.http ?? axios.create();
  }

  hasCredentials(): boolean {
    return this.apiKey.length > 0;
  }

  async fetchDaily(
    ticker: string,
    startDate?: string,
    endDate?: string
  ): Promise<PricePoint[]> {
    const params: Record<string, string> = {
      token: this.apiKey,
    };

    if (startDate) params.startDate = startDate;
    if (endDate) params.endDate = endDate;

    let data: unknown;
    try {
      const response = await this.http.get<unknown>(
        `${this.baseUrl}/${encodeURIComponent(ticker.toLowerCase())}/prices`,
        {
          params,
          headers: { "Content-Type": "application/json" },
          timeout: this.timeoutMs,
        }
      );
      data = response.data;
    } catch (error) {
      throw classifyError(ticker, error);
    }

    const errors: string[] = [];
    if (!isTiingoResponse(data, { errors })) {
      throw new FetchError(
        ticker,
        "permanent",
        "invalid-payload",
        `Invalid response for ticker ${ticker}: ${errors.slice(0, 3).join("; ")}`
      );
    }

    return data.map((row) => transformTiingoBar(ticker, row));
  }
}

function classifyError(ticker: string, error: unknown): FetchError {
  if (!axios.isAxiosError(error)) {
    return new FetchError(ticker, "transient", "network", `Request for ${ticker} failed: ${String(error)}`, error);
  }

  const status = error.response?.status;
  if (status === undefined) {
    return new FetchError(ticker, "transient", "network", `Network error for ${ticker}: ${error.message}`, error);
  }

  const detail = `Tiingo API error for ${ticker}: ${status} ${error.response?.statusText ?? ""}`.trim();
  if (status === 429) {
    return new FetchError(ticker, "transient", "rate-limited", detail, error);
  }
  if (status >= 500) {
    return new FetchError(ticker, "transient", "server-error", detail, error);
  }
  if (status === 401 || status === 403) {
    return new FetchError(ticker, "permanent", "auth", detail, error);
  }
  if (status === 404) {
    return new FetchError(ticker, "permanent", "not-found", `Ticker ${ticker} not found`, error);
  }
  return new FetchError(ticker, "permanent", "bad-request", detail, error);
}

// Tiingo timestamps are midnight UTC ("2024-01-02T00:00:00.000Z")
function transformTiingoBar(ticker: string, row: t.InferType<typeof isTiingoBar>): PricePoint {
  return {
    ticker: ticker.toUpperCase(),
    date: row.date.slice(0, 10),
    open: row.open,
    high: row.high,
    low: row.low,
    close: row.close,
    adjClose: row.adjClose,
    volume: row.volume,
  };
}

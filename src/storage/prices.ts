import * as t from "typanion";
import { DuckDBBase, sqlString } from "./base.js";
import type { PricePoint, TableSummary, TickerActivity } from "../types/index.js";

export const PRICE_TABLE = "fact_price_daily";

const isPriceRow = t.isObject({
  ticker: t.isString(),
  date: t.isString(),
  open: t.isNumber(),
  high: t.isNumber(),
  low: t.isNumber(),
  close: t.isNumber(),
  adj_close: t.isNumber(),
  volume: t.isNumber(),
});

const isSummaryRow = t.isObject({
  symbols: t.isNumber(),
  total_rows: t.isNumber(),
  first_date: t.isNullable(t.isString()),
  last_date: t.isNullable(t.isString()),
});

const isActivityRow = t.isObject({
  ticker: t.isString(),
  last_date: t.isString(),
  days: t.isNumber(),
});

const isStageCounts = t.isObject({
  total: t.isNumber(),
  valid: t.isNumber(),
  staged: t.isNumber(),
});

export interface StageResult {
  totalRows: number;
  acceptedRows: number;
  rejectedRows: number;
  duplicateRows: number;
}

// Row is usable: key present, ticker matches its partition, prices finite
const VALID_ROW = `
  ticker IS NOT NULL AND ticker = $1
  AND dt IS NOT NULL
  AND open IS NOT NULL AND isfinite(open)
  AND high IS NOT NULL AND isfinite(high)
  AND low IS NOT NULL AND isfinite(low)
  AND close IS NOT NULL AND isfinite(close)
  AND adj_close IS NOT NULL AND isfinite(adj_close)
  AND volume IS NOT NULL AND volume >= 0
`;

function validate<T>(predicate: t.StrictValidator<unknown, T>, row: unknown, what: string): T {
  const errors: string[] = [];
  if (!predicate(row, { errors })) {
    throw new Error(`Unexpected ${what} row: ${errors.join("; ")}`);
  }
  return row;
}

/**
 * The consolidated daily price table, keyed by (ticker, dt).
 *
 * Writers stage partitions into connection-local temp tables and then swap
 * the staged symbols in with `commitStaged`, one transaction for the whole
 * batch.
 */
export class PriceTableStorage extends DuckDBBase {
  override async init(): Promise<void> {
    await super.init();
    if (this.readOnly) return;

    await this.execute(`
      CREATE TABLE IF NOT EXISTS ${PRICE_TABLE} (
        ticker VARCHAR,
        dt DATE,
        open DOUBLE,
        high DOUBLE,
        low DOUBLE,
        close DOUBLE,
        adj_close DOUBLE,
        volume BIGINT,
        PRIMARY KEY (ticker, dt)
      )
    `);
  }

  async beginStaging(): Promise<void> {
    await this.execute(`
      CREATE OR REPLACE TEMP TABLE merge_staging (
        ticker VARCHAR,
        dt DATE,
        open DOUBLE,
        high DOUBLE,
        low DOUBLE,
        close DOUBLE,
        adj_close DOUBLE,
        volume BIGINT
      )
    `);
    await this.execute(`CREATE OR REPLACE TEMP TABLE merge_symbols (ticker VARCHAR)`);
  }

  /**
   * Read one partition file into staging. Throws when the file cannot be read
   * or lacks a partition column; row-level problems are counted instead.
   */
  async stagePartition(symbol: string, parquetPath: string): Promise<StageResult> {
    await this.execute(`
      CREATE OR REPLACE TEMP TABLE partition_rows AS
      SELECT
        upper(CAST(ticker AS VARCHAR)) AS ticker,
        TRY_CAST(dt AS DATE) AS dt,
        TRY_CAST(open AS DOUBLE) AS open,
        TRY_CAST(high AS DOUBLE) AS high,
        TRY_CAST(low AS DOUBLE) AS low,
        TRY_CAST(close AS DOUBLE) AS close,
        TRY_CAST(adj_close AS DOUBLE) AS adj_close,
        TRY_CAST(volume AS BIGINT) AS volume,
        file_row_number AS row_ord
      FROM read_parquet(${sqlString(parquetPath)}, file_row_number = true)
    `);

    try {
      // One row per date; the last row in file order wins, as in the fetcher
      await this.execute(
        `
        INSERT INTO merge_staging
        SELECT ticker, dt, open, high, low, close, adj_close, volume
        FROM partition_rows
        WHERE ${VALID_ROW}
        QUALIFY row_number() OVER (PARTITION BY dt ORDER BY row_ord DESC) = 1
        `,
        [symbol]
      );
      await this.execute(`INSERT INTO merge_symbols VALUES ($1)`, [symbol]);

      const counts = validate(
        isStageCounts,
        await this.queryOne(
          `
          SELECT
            CAST(count(*) AS DOUBLE) AS total,
            CAST(count(*) FILTER (WHERE ${VALID_ROW}) AS DOUBLE) AS valid,
            CAST((SELECT count(*) FROM merge_staging WHERE ticker = $1) AS DOUBLE) AS staged
          FROM partition_rows
          `,
          [symbol]
        ),
        "staging count"
      );

      return {
        totalRows: counts.total,
        acceptedRows: counts.staged,
        rejectedRows: counts.total - counts.valid,
        duplicateRows: counts.valid - counts.staged,
      };
    } finally {
      await this.execute(`DROP TABLE IF EXISTS partition_rows`);
    }
  }

  /**
   * Replace every staged symbol's rows in one transaction: all prior rows for
   * the symbol go, the staged rows come in. Rows of `dropSymbols` are deleted
   * with nothing in their place.
   */
  async commitStaged(dropSymbols: string[] = []): Promise<void> {
    try {
      for (const symbol of dropSymbols) {
        await this.execute(`INSERT INTO merge_symbols VALUES ($1)`, [symbol]);
      }

      await this.transaction(async () => {
        await this.execute(`
          DELETE FROM ${PRICE_TABLE}
          WHERE ticker IN (SELECT ticker FROM merge_symbols)
        `);
        await this.execute(`
          INSERT INTO ${PRICE_TABLE}
          SELECT ticker, dt, open, high, low, close, adj_close, volume
          FROM merge_staging
          ORDER BY ticker, dt
        `);
      });
    } finally {
      await this.execute(`DROP TABLE IF EXISTS merge_staging`);
      await this.execute(`DROP TABLE IF EXISTS merge_symbols`);
    }
  }

  async summary(): Promise<TableSummary> {
    const row = validate(
      isSummaryRow,
      await this.queryOne(`
        SELECT
          CAST(COUNT(DISTINCT ticker) AS DOUBLE) AS symbols,
          CAST(COUNT(*) AS DOUBLE) AS total_rows,
          strftime(MIN(dt), '%Y-%m-%d') AS first_date,
          strftime(MAX(dt), '%Y-%m-%d') AS last_date
        FROM ${PRICE_TABLE}
      `),
      "summary"
    );

    return {
      symbols: row.symbols,
      rows: row.total_rows,
      firstDate: row.first_date,
      lastDate: row.last_date,
    };
  }

  /** Tickers with the most recent data, newest first. */
  async recentActivity(limit = 5): Promise<TickerActivity[]> {
    const rows = await this.query(`
      SELECT
        ticker,
        strftime(MAX(dt), '%Y-%m-%d') AS last_date,
        CAST(COUNT(*) AS DOUBLE) AS days
      FROM ${PRICE_TABLE}
      GROUP BY ticker
      ORDER BY MAX(dt) DESC, ticker
      LIMIT ${Math.max(0, Math.floor(limit))}
    `);

    return rows.map((row) => {
      const activity = validate(isActivityRow, row, "activity");
      return { ticker: activity.ticker, lastDate: activity.last_date, days: activity.days };
    });
  }

  /** The newest `days` rows for a ticker, ordered oldest to newest. */
  async recentPrices(ticker: string, days: number): Promise<PricePoint[]> {
    const rows = await this.query(
      `
      SELECT
        ticker,
        strftime(dt, '%Y-%m-%d') AS date,
        open, high, low, close, adj_close,
        CAST(volume AS DOUBLE) AS volume
      FROM ${PRICE_TABLE}
      WHERE ticker = $1
      ORDER BY dt DESC
      LIMIT ${Math.max(0, Math.floor(days))}
      `,
      [ticker.toUpperCase()]
    );

    return rows
      .map((row) => {
        const price = validate(isPriceRow, row, "price");
        return {
          ticker: price.ticker,
          date: price.date,
          open: price.open,
          high: price.high,
          low: price.low,
          close: price.close,
          adjClose: price.adj_close,
          volume: price.volume,
        };
      })
      .reverse();
  }
}

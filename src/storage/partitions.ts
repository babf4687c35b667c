import { join } from "path";
import { existsSync, statSync } from "fs";
import { mkdir, readdir, rename, rm, writeFile } from "fs/promises";
import * as t from "typanion";
import { DuckDBBase, sqlString, type SqlParams } from "./base.js";
import { PartitionWriteError, getErrorMessage } from "../errors.js";
import { logPartitions } from "../logging.js";
import type { PricePoint } from "../types/index.js";

export const PARTITION_FILE = "daily.parquet";
// Left in a symbol's directory when its partition is removed on purpose
export const REMOVED_MARKER = ".removed";

export const PARTITION_SCHEMA = {
  ticker: "VARCHAR",
  dt: "DATE",
  open: "DOUBLE",
  high: "DOUBLE",
  low: "DOUBLE",
  close: "DOUBLE",
  adj_close: "DOUBLE",
  volume: "BIGINT",
} as const;

const COLUMNS = Object.keys(PARTITION_SCHEMA);

const isStoredRow = t.isObject({
  ticker: t.isString(),
  dt: t.isString(),
  open: t.isNumber(),
  high: t.isNumber(),
  low: t.isNumber(),
  close: t.isNumber(),
  adj_close: t.isNumber(),
  volume: t.isNumber(),
});

/**
 * Per-symbol storage of fetched history. `has` is the "already fetched"
 * probe used to skip work. `pathFor` must name a readable Parquet file for
 * every listed symbol: the loader reads partitions straight from disk.
 */
export interface PartitionStore {
  has(symbol: string): Promise<boolean>;
  list(): Promise<string[]>;
  pathFor(symbol: string): string;
  write(symbol: string, rows: PricePoint[]): Promise<void>;
  /** Delete a partition and remember that its rows should leave the table. */
  remove(symbol: string): Promise<void>;
  /** Symbols removed through `remove` that have not been written since. */
  removed(): Promise<string[]>;
}

export class ParquetPartitionStore extends DuckDBBase implements PartitionStore {
  private readonly stocksDir: string;
  private writeCounter = 0;

  constructor(stocksDir: string) {
    // Scratch database; partitions themselves live in Parquet files
    super(":memory:");
    this.stocksDir = stocksDir;
  }

  override async init(): Promise<void> {
    await mkdir(this.stocksDir, { recursive: true });
    await super.init();
  }

  pathFor(symbol: string): string {
    return join(this.stocksDir, symbol.toUpperCase(), PARTITION_FILE);
  }

  async has(symbol: string): Promise<boolean> {
    const path = this.pathFor(symbol);
    return existsSync(path) && statSync(path).size > 0;
  }

  async list(): Promise<string[]> {
    const symbols: string[] = [];
    for (const symbol of await this.symbolDirs()) {
      if (await this.has(symbol)) symbols.push(symbol);
    }
    return symbols.sort();
  }

  async removed(): Promise<string[]> {
    const symbols: string[] = [];
    for (const symbol of await this.symbolDirs()) {
      const marker = join(this.stocksDir, symbol, REMOVED_MARKER);
      if (existsSync(marker) && !(await this.has(symbol))) symbols.push(symbol);
    }
    return symbols.sort();
  }

  private async symbolDirs(): Promise<string[]> {
    if (!existsSync(this.stocksDir)) {
      return [];
    }
    const entries = await readdir(this.stocksDir, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name.toUpperCase());
  }

  async read(symbol: string): Promise<PricePoint[]> {
    const path = this.pathFor(symbol);
    if (!existsSync(path)) {
      return [];
    }

    const rows = await this.query(`
      SELECT
        ticker,
        strftime(dt, '%Y-%m-%d') AS dt,
        open, high, low, close, adj_close,
        CAST(volume AS DOUBLE) AS volume
      FROM read_parquet(${sqlString(path)})
      ORDER BY dt
    `);

    return rows.map((row) => {
      const errors: string[] = [];
      if (!isStoredRow(row, { errors })) {
        throw new Error(`Malformed row in ${path}: ${errors.join("; ")}`);
      }
      return {
        ticker: row.ticker,
        date: row.dt,
        open: row.open,
        high: row.high,
        low: row.low,
        close: row.close,
        adjClose: row.adj_close,
        volume: row.volume,
      };
    });
  }

  /**
   * Write a symbol's rows as one Parquet file. The file is written next to
   * its final path and renamed into place, so the partition is either the
   * old file, the new file, or absent; never truncated.
   */
  async write(symbol: string, rows: PricePoint[]): Promise<void> {
    if (rows.length === 0) return;

    const target = this.pathFor(symbol);
    const tempPath = `${target}.tmp`;
    const table = `partition_write_${++this.writeCounter}`;
    // Each write gets its own connection: temp tables are connection-local
    const connection = await this.openConnection();

    try {
      await mkdir(join(this.stocksDir, symbol.toUpperCase()), { recursive: true });

      const columns = Object.entries(PARTITION_SCHEMA)
        .map(([name, type]) => `${name} ${type}`)
        .join(", ");
      await this.execute(`CREATE TEMP TABLE ${table} (${columns})`, undefined, connection);

      const ordered = [...rows].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
      const batchSize = 500;
      for (let i = 0; i < ordered.length; i += batchSize) {
        const batch = ordered.slice(i, i + batchSize);
        const params: SqlParams = [];
        const values = batch
          .map((row) => {
            const base = params.length;
            params.push(
              symbol.toUpperCase(),
              row.date,
              row.open,
              row.high,
              row.low,
              row.close,
              row.adjClose,
              row.volume
            );
            const p = (offset: number) => `$${base + offset}`;
            return `(${p(1)}, CAST(${p(2)} AS DATE), ${p(3)}, ${p(4)}, ${p(5)}, ${p(6)}, ${p(7)}, CAST(${p(8)} AS BIGINT))`;
          })
          .join(", ");

        await this.execute(`INSERT INTO ${table} (${COLUMNS.join(", ")}) VALUES ${values}`, params, connection);
      }

      await this.execute(
        `COPY (SELECT * FROM ${table} ORDER BY dt) TO ${sqlString(tempPath)} (FORMAT PARQUET, COMPRESSION 'ZSTD')`,
        undefined,
        connection
      );
      await this.execute(`DROP TABLE ${table}`, undefined, connection);

      // Atomic replace
      await rename(tempPath, target);
      await rm(join(this.stocksDir, symbol.toUpperCase(), REMOVED_MARKER), { force: true });
      logPartitions.debug({ symbol, rows: rows.length, path: target }, "Partition written");
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new PartitionWriteError(symbol, `Failed to write partition for ${symbol}: ${getErrorMessage(error)}`, error);
    } finally {
      connection.closeSync();
    }
  }

  async remove(symbol: string): Promise<void> {
    const dir = join(this.stocksDir, symbol.toUpperCase());
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, REMOVED_MARKER), new Date().toISOString());
    await rm(this.pathFor(symbol), { force: true });
    logPartitions.debug({ symbol }, "Partition removed");
  }
}

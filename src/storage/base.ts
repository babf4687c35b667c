import {
  DuckDBInstance,
  type DuckDBConnection,
  type DuckDBValue,
} from "@duckdb/node-api";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";

export type SqlParams = DuckDBValue[];

export interface DuckDBBaseOptions {
  readOnly?: boolean;
}

/** Quote a value as a SQL string literal. */
export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export class DuckDBBase {
  protected instance: DuckDBInstance | null = null;
  protected connection: DuckDBConnection | null = null;
  protected readonly databasePath: string;
  protected readonly readOnly: boolean;

  /** `databasePath` may be ":memory:" for a scratch database. */
  constructor(databasePath: string, options: DuckDBBaseOptions = {}) {
    this.databasePath = databasePath;
    this.readOnly = options.readOnly ?? false;
  }

  async init(): Promise<void> {
    if (this.connection) return;

    if (this.databasePath !== ":memory:") {
      // Ensure the directory holding the database exists
      const dir = dirname(this.databasePath);
      if (!this.readOnly && !existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.instance = await DuckDBInstance.create(
      this.databasePath,
      this.readOnly ? { access_mode: "READ_ONLY" } : undefined
    );
    this.connection = await this.instance.connect();
  }

  protected get conn(): DuckDBConnection {
    if (!this.connection) throw new Error("Database not initialized");
    return this.connection;
  }

  /** A separate connection on the same database, for concurrent work. */
  protected async openConnection(): Promise<DuckDBConnection> {
    if (!this.instance) throw new Error("Database not initialized");
    return this.instance.connect();
  }

  async query(sql: string, params?: SqlParams, connection?: DuckDBConnection): Promise<Record<string, unknown>[]> {
    const reader = await (connection ?? this.conn).runAndReadAll(sql, params);
    return reader.getRowObjectsJS();
  }

  async queryOne(sql: string, params?: SqlParams, connection?: DuckDBConnection): Promise<Record<string, unknown> | null> {
    const rows = await this.query(sql, params, connection);
    return rows[0] ?? null;
  }

  async execute(sql: string, params?: SqlParams, connection?: DuckDBConnection): Promise<void> {
    await (connection ?? this.conn).run(sql, params);
  }

  /**
   * Run `work` between BEGIN and COMMIT, rolling back if it throws.
   */
  async transaction<T>(work: () => Promise<T>): Promise<T> {
    await this.execute("BEGIN TRANSACTION");
    try {
      const result = await work();
      await this.execute("COMMIT");
      return result;
    } catch (error) {
      await this.execute("ROLLBACK");
      throw error;
    }
  }

  async close(): Promise<void> {
    this.connection?.closeSync();
    this.connection = null;
    this.instance?.closeSync();
    this.instance = null;
  }
}

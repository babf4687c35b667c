import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readdirSync, rmSync, writeFileSync, mkdirSync } from "fs";
import { join } from "path";
import { ParquetPartitionStore, PARTITION_FILE } from "../partitions.js";
import { bar, createTempDir } from "../../test-utils/fixtures.js";

describe("ParquetPartitionStore", () => {
  let temp: ReturnType<typeof createTempDir>;
  let store: ParquetPartitionStore;

  beforeEach(async () => {
    temp = createTempDir();
    store = new ParquetPartitionStore(join(temp.path, "stocks"));
    await store.init();
  });

  afterEach(async () => {
    await store.close();
    temp.cleanup();
  });

  it("lays partitions out as <dir>/<SYMBOL>/daily.parquet", () => {
    expect(store.pathFor("brk-b")).toBe(join(temp.path, "stocks", "BRK-B", PARTITION_FILE));
  });

  it("writes rows that read back sorted by date", async () => {
    await store.write("AAPL", [
      bar("AAPL", "2024-01-03", 186.5, 58_414_500),
      bar("AAPL", "2024-01-02", 185.64, 82_488_700),
    ]);

    expect(await store.read("AAPL")).toEqual([
      bar("AAPL", "2024-01-02", 185.64, 82_488_700),
      bar("AAPL", "2024-01-03", 186.5, 58_414_500),
    ]);
  });

  it("leaves no temporary file behind", async () => {
    await store.write("AAPL", [bar("AAPL", "2024-01-02", 10)]);
    expect(readdirSync(join(temp.path, "stocks", "AAPL"))).toEqual([PARTITION_FILE]);
  });

  it("replaces an existing partition on rewrite", async () => {
    await store.write("AAPL", [bar("AAPL", "2024-01-02", 10), bar("AAPL", "2024-01-03", 11)]);
    await store.write("AAPL", [bar("AAPL", "2024-01-02", 12)]);

    expect(await store.read("AAPL")).toEqual([bar("AAPL", "2024-01-02", 12)]);
  });

  it("writes nothing for an empty history", async () => {
    await store.write("NEWCO", []);

    expect(existsSync(store.pathFor("NEWCO"))).toBe(false);
    expect(await store.has("NEWCO")).toBe(false);
  });

  it("tracks which symbols have a partition", async () => {
    await store.write("MSFT", [bar("MSFT", "2024-01-02", 370)]);
    await store.write("AAPL", [bar("AAPL", "2024-01-02", 185)]);
    // A directory without a partition file does not count
    mkdirSync(join(temp.path, "stocks", "EMPTY"));
    // Neither does a zero-byte file
    mkdirSync(join(temp.path, "stocks", "ZERO"));
    writeFileSync(join(temp.path, "stocks", "ZERO", PARTITION_FILE), "");

    expect(await store.has("AAPL")).toBe(true);
    expect(await store.has("ZERO")).toBe(false);
    expect(await store.list()).toEqual(["AAPL", "MSFT"]);
  });

  it("handles concurrent writes to different symbols", async () => {
    const symbols = ["A", "B", "C", "D", "E"];
    await Promise.all(symbols.map((symbol, i) => store.write(symbol, [bar(symbol, "2024-01-02", 10 + i)])));

    expect(await store.list()).toEqual(symbols);
    expect(await store.read("E")).toEqual([bar("E", "2024-01-02", 14)]);
  });

  it("removes a partition", async () => {
    await store.write("AAPL", [bar("AAPL", "2024-01-02", 10)]);
    await store.remove("AAPL");

    expect(await store.has("AAPL")).toBe(false);
    expect(await store.list()).toEqual([]);
    expect(await store.read("AAPL")).toEqual([]);
    expect(await store.removed()).toEqual(["AAPL"]);
  });

  it("forgets a removal once the symbol is written again", async () => {
    await store.remove("AAPL");
    await store.write("AAPL", [bar("AAPL", "2024-01-02", 10)]);

    expect(await store.removed()).toEqual([]);
    expect(readdirSync(join(temp.path, "stocks", "AAPL"))).toEqual([PARTITION_FILE]);
  });

  it("does not treat a hand-deleted partition as removed", async () => {
    await store.write("AAPL", [bar("AAPL", "2024-01-02", 10)]);
    rmSync(store.pathFor("AAPL"));

    expect(await store.list()).toEqual([]);
    expect(await store.removed()).toEqual([]);
  });

  it("lists nothing before the directory exists", async () => {
    const fresh = new ParquetPartitionStore(join(temp.path, "missing"));
    expect(await fresh.list()).toEqual([]);
  });
});

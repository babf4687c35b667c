import { Command, Option } from "clipanion";
import { format } from "date-fns";
import * as t from "typanion";
import { PriceStore } from "../../index.js";
import { loadConfig, type ConfigOverrides } from "../../config.js";
import { ConfigurationError, MergeIOError } from "../../errors.js";
import { printFetchReport, printHeading, printMergeReport, printTableSummary } from "../report.js";
import type { FetchProgress } from "../../types/index.js";

const isDate = () => t.cascade(t.isString(), [t.matchesRegExp(/^\d{4}-\d{2}-\d{2}$/)]);

export class UpdateCommand extends Command {
  static override paths = [["update"], Command.Default];

  static override usage = Command.Usage({
    description: "Fetch daily prices and merge them into the price table",
    details: `
      Fetches the full daily history of every ticker in the configured lists
      into one Parquet partition per ticker, then merges all partitions into
      the DuckDB table fact_price_daily.

      Tickers that already have a partition are skipped unless --refresh is
      given, so re-running after a partial failure only fetches what is
      missing. Pass tickers on the command line to limit the run to them.

      The exit code is non-zero only for configuration errors or when the
      merge fails as a whole; individual ticker failures are listed.
    `,
    examples: [
      ["Fetch and load everything", "price-store update"],
      ["Only fetch new tickers", "price-store update --fetch-only"],
      ["Only rebuild the table from partitions", "price-store update --load-only"],
      ["Re-fetch two tickers", "price-store update --refresh AAPL MSFT"],
    ],
  });

  tickers = Option.Rest();

  fetchOnly = Option.Boolean("--fetch-only", false, {
    description: "Only fetch price data, don't load into DuckDB",
  });

  loadOnly = Option.Boolean("--load-only", false, {
    description: "Only load existing partitions into DuckDB",
  });

  refresh = Option.Boolean("--refresh", false, {
    description: "Re-fetch tickers even if a partition exists",
  });

  start = Option.String("--start", {
    description: "Start date (YYYY-MM-DD)",
    validator: isDate(),
  });

  end = Option.String("--end", {
    description: "End date (YYYY-MM-DD)",
    validator: isDate(),
  });

  concurrency = Option.String("--concurrency,-j", {
    description: "Maximum simultaneous fetches",
    validator: t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(1)]),
  });

  configPath = Option.String("--config", {
    description: "Path to the YAML config file",
  });

  verbose = Option.Boolean("--verbose,-v", false, {
    description: "Show every ticker as it completes",
  });

  async execute(): Promise<number> {
    if (this.fetchOnly && this.loadOnly) {
      console.error("--fetch-only and --load-only cannot be combined");
      return 1;
    }

    printHeading(`Daily Stock Price Update\nStarted: ${format(new Date(), "yyyy-MM-dd HH:mm:ss")}`);

    let store: PriceStore | null = null;
    try {
      const overrides: ConfigOverrides = {
        fetch: { concurrency: this.concurrency, startDate: this.start },
      };
      store = new PriceStore(loadConfig(this.configPath, overrides));
      await store.init();

      let ok = true;

      if (!this.loadOnly) {
        printHeading("STEP 1: Fetching historical price data");
        const report = await store.fetch({
          symbols: this.tickers,
          refresh: this.refresh,
          endDate: this.end,
          onProgress: (progress) => this.progress(progress),
        });
        printFetchReport(report);
      }

      if (!this.fetchOnly) {
        printHeading("STEP 2: Loading partitions into DuckDB");
        const merge = await store.load();
        printMergeReport(merge);

        if (merge.partitions > 0 && merge.loadedSymbols.length === 0) {
          console.error("\n✗ Every partition was rejected");
          ok = false;
        }

        printHeading("SUMMARY: Database Statistics");
        printTableSummary(merge.summary, await store.recentActivity(5));
      }

      printHeading(
        `${ok ? "✓ Update completed successfully!" : "✗ Update completed with errors"}\nFinished: ${format(new Date(), "yyyy-MM-dd HH:mm:ss")}`
      );
      return ok ? 0 : 1;
    } catch (error) {
      if (error instanceof ConfigurationError || error instanceof MergeIOError) {
        console.error(`\n✗ ${error.message}`);
        return 1;
      }
      throw error;
    } finally {
      await store?.close();
    }
  }

  private progress(progress: FetchProgress): void {
    const prefix = `Progress: ${progress.completed}/${progress.total} - ${progress.symbol}`;
    switch (progress.status) {
      case "failed":
        console.log(`✗ ${prefix} failed: ${progress.error ?? "unknown error"}`);
        break;
      case "skipped":
        if (this.verbose) console.log(`- ${prefix} already fetched`);
        break;
      case "empty":
        console.log(`- ${prefix} no data`);
        break;
      case "succeeded":
        console.log(`✓ ${prefix} completed (${progress.rows ?? 0} records)`);
        break;
    }
  }
}

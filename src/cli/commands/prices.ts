import { Command, Option } from "clipanion";
import * as t from "typanion";
import { openPriceTable } from "../../index.js";
import { loadConfig } from "../../config.js";
import { ConfigurationError } from "../../errors.js";
import { getRecentPrices, summarizePrices } from "../../services/query.js";
import type { PricePoint, PriceSummary } from "../../types/index.js";

const money = (value: number) => `$${value.toFixed(2)}`;
const signed = (value: number, digits = 2) => `${value >= 0 ? "+" : ""}${value.toFixed(digits)}`;

export class PricesCommand extends Command {
  static override paths = [["prices"]];

  static override usage = Command.Usage({
    description: "Show the most recent daily prices for a ticker",
    details: `
      Reads the merged price table (read-only) and prints the last N trading
      days for the ticker, oldest first, followed by summary statistics.
    `,
    examples: [
      ["Last 10 trading days of AAPL", "price-store prices AAPL"],
      ["Last 30 trading days as JSON", "price-store prices MSFT --days 30 --json"],
    ],
  });

  ticker = Option.String({ required: true });

  days = Option.String("--days,-n", {
    description: "Number of recent trading days (default 10)",
    validator: t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(1)]),
  });

  json = Option.Boolean("--json", false, {
    description: "Print rows as JSON",
  });

  configPath = Option.String("--config", {
    description: "Path to the YAML config file",
  });

  async execute(): Promise<number> {
    const symbol = this.ticker.toUpperCase();

    try {
      const table = await openPriceTable(loadConfig(this.configPath));
      try {
        const rows = await getRecentPrices(table, symbol, this.days ?? 10);

        if (this.json) {
          console.log(JSON.stringify(rows, null, 2));
          return 0;
        }
        if (rows.length === 0) {
          console.log(`No data available for ${symbol}. Run: price-store update ${symbol}`);
          return 0;
        }

        printRows(symbol, rows);
        const summary = summarizePrices(rows);
        if (summary) printSummary(summary);
        return 0;
      } finally {
        await table.close();
      }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        console.error(error.message);
        return 1;
      }
      throw error;
    }
  }
}

function printRows(symbol: string, rows: PricePoint[]): void {
  const rule = "=".repeat(70);
  console.log(`\n${rule}\nPrice Data for ${symbol}\n${rule}`);
  console.log(
    ["date".padEnd(10), "open", "high", "low", "close", "adj_close"].map((h) => h.padStart(10)).join(" ") +
      "volume".padStart(14)
  );
  for (const row of rows) {
    console.log(
      [row.date.padEnd(10), ...[row.open, row.high, row.low, row.close, row.adjClose].map((v) => v.toFixed(2))]
        .map((cell) => cell.padStart(10))
        .join(" ") + row.volume.toLocaleString("en-US").padStart(14)
    );
  }
}

function printSummary(summary: PriceSummary): void {
  const rule = "=".repeat(70);
  console.log(`\n${rule}\nSummary Statistics:\n${rule}`);
  console.log(`Date Range: ${summary.firstDate} to ${summary.lastDate}`);
  console.log(`Total Trading Days: ${summary.tradingDays}`);
  console.log(`Average Close Price: ${money(summary.averageClose)}`);
  console.log(`Highest Price: ${money(summary.highest.price)} on ${summary.highest.date}`);
  console.log(`Lowest Price: ${money(summary.lowest.price)} on ${summary.lowest.date}`);
  console.log(`Total Volume: ${summary.totalVolume.toLocaleString("en-US")}`);
  console.log(`Average Daily Volume: ${Math.round(summary.averageVolume).toLocaleString("en-US")}`);
  if (summary.change !== null && summary.percentChange !== null) {
    console.log(`\nPrice Change: ${signed(summary.change)} (${signed(summary.percentChange)}%)`);
  }
}

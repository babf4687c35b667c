import { Command, Option } from "clipanion";
import * as t from "typanion";
import { openPriceTable } from "../../index.js";
import { loadConfig } from "../../config.js";
import { ConfigurationError } from "../../errors.js";
import { printHeading, printTableSummary } from "../report.js";

export class SummaryCommand extends Command {
  static override paths = [["summary"]];

  static override usage = Command.Usage({
    description: "Show statistics of the merged price table",
    examples: [["Show table statistics", "price-store summary"]],
  });

  recent = Option.String("--recent", {
    description: "Number of most recently updated tickers to list (default 5)",
    validator: t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(0)]),
  });

  configPath = Option.String("--config", {
    description: "Path to the YAML config file",
  });

  async execute(): Promise<number> {
    try {
      const table = await openPriceTable(loadConfig(this.configPath));
      try {
        printHeading("SUMMARY: Database Statistics");
        printTableSummary(await table.summary(), await table.recentActivity(this.recent ?? 5));
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

import { Command, Option } from "clipanion";
import { loadConfig } from "../../config.js";
import { ConfigurationError } from "../../errors.js";
import { loadUniverse } from "../../services/universe.js";

export class UniverseCommand extends Command {
  static override paths = [["universe"]];

  static override usage = Command.Usage({
    description: "Resolve and print the configured ticker universe",
    details: `
      Reads every configured ticker list, normalizes the symbols and prints
      the de-duplicated universe in the order it will be fetched.
    `,
    examples: [
      ["Show the universe size and first symbols", "price-store universe"],
      ["Print every symbol, one per line", "price-store universe --all"],
    ],
  });

  all = Option.Boolean("--all", false, {
    description: "Print every symbol",
  });

  configPath = Option.String("--config", {
    description: "Path to the YAML config file",
  });

  async execute(): Promise<number> {
    try {
      const symbols = await loadUniverse(loadConfig(this.configPath).universe);

      if (this.all) {
        console.log(symbols.join("\n"));
        return 0;
      }

      console.log(`Total tickers to process: ${symbols.length}`);
      console.log(`Sample: ${symbols.slice(0, 10).join(", ")}${symbols.length > 10 ? ", ..." : ""}`);
      return 0;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        console.error(error.message);
        return 1;
      }
      throw error;
    }
  }
}

#!/usr/bin/env node

import { Cli, Builtins } from "clipanion";
import { UpdateCommand } from "./commands/update.js";
import { PricesCommand } from "./commands/prices.js";
import { SummaryCommand } from "./commands/summary.js";
import { UniverseCommand } from "./commands/universe.js";

const cli = new Cli({
  binaryLabel: "price-store",
  binaryName: "price-store",
  binaryVersion: "0.1.0",
});

cli.register(UpdateCommand);
cli.register(PricesCommand);
cli.register(SummaryCommand);
cli.register(UniverseCommand);
cli.register(Builtins.HelpCommand);
cli.register(Builtins.VersionCommand);

void cli.runExit(process.argv.slice(2));

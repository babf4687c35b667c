import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import { ConfigurationError } from "../errors.js";
import { logger } from "../logging.js";
import type { UniverseSource } from "../types/index.js";

const SYMBOL_PATTERN = /^[A-Z0-9][A-Z0-9-]{0,14}$/;

/**
 * Normalize one raw list entry. Share-class separators (`BRK.B`, `MS^Q`)
 * become dashes, the form the provider expects. Returns null for blanks,
 * commented-out entries and anything that is not a symbol.
 */
export function normalizeSymbol(raw: unknown): string | null {
  if (typeof raw !== "string") return null;

  const trimmed = raw.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;

  const symbol = trimmed.toUpperCase().replace(/[\^.]/g, "-");
  return SYMBOL_PATTERN.test(symbol) ? symbol : null;
}

/**
 * Merge symbol lists into one de-duplicated list, keeping the order in which
 * each symbol is first seen.
 */
export function resolveUniverse(lists: ReadonlyArray<ReadonlyArray<unknown>>): string[] {
  if (lists.length === 0) {
    throw new ConfigurationError("No ticker lists configured");
  }

  const seen = new Set<string>();
  for (const list of lists) {
    for (const entry of list) {
      const symbol = normalizeSymbol(entry);
      if (symbol) seen.add(symbol);
    }
  }

  if (seen.size === 0) {
    throw new ConfigurationError("All ticker lists are empty");
  }
  return [...seen];
}

async function readCsvColumn(path: string, column: string): Promise<string[]> {
  const content = await readFile(path, "utf-8");
  const rows: Array<Record<string, string>> = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  if (rows.length > 0 && !(column in (rows[0] ?? {}))) {
    throw new ConfigurationError(`Ticker list ${path} has no "${column}" column`);
  }
  return rows.map((row) => row[column] ?? "");
}

async function readTextList(path: string): Promise<string[]> {
  const content = await readFile(path, "utf-8");
  return content.split(/\r?\n/);
}

/**
 * Read every configured source and resolve the universe. File sources that
 * do not exist are skipped; at least one source must be found.
 */
export async function loadUniverse(sources: UniverseSource[]): Promise<string[]> {
  if (sources.length === 0) {
    throw new ConfigurationError("No ticker lists configured");
  }

  const lists: string[][] = [];
  for (const source of sources) {
    if (source.kind === "inline") {
      lists.push(source.symbols);
      continue;
    }

    if (!existsSync(source.path)) {
      logger.warn({ path: source.path }, "Ticker list not found, skipping");
      continue;
    }

    const list =
      source.kind === "csv"
        ? await readCsvColumn(source.path, source.column ?? "Symbol")
        : await readTextList(source.path);
    logger.debug({ path: source.path, entries: list.length }, "Read ticker list");
    lists.push(list);
  }

  if (lists.length === 0) {
    throw new ConfigurationError(
      `None of the ${sources.length} configured ticker lists were found`
    );
  }

  return resolveUniverse(lists);
}

import { readFileSync, existsSync } from "fs";
import { homedir } from "os";
import { join, resolve, dirname, isAbsolute } from "path";
import yaml from "yaml";
import dotenv from "dotenv";
import * as t from "typanion";
import { ConfigurationError } from "./errors.js";
import type { Config, UniverseSource } from "./types/index.js";

// Load environment variables
dotenv.config();

export const DEFAULT_CONFIG_PATH = join(homedir(), ".price-store", "config.yml");
const DEFAULT_DATA_DIR = join(process.cwd(), "data");

export const DEFAULT_START_DATE = "2000-01-01";
export const TIINGO_BASE_URL = "https://api.tiingo.com/tiingo/daily";

// ETFs tracked alongside the index lists
export const ADDITIONAL_ETFS = ["SPY", "QQQ", "SOXL", "SOXS", "VOO", "SOXX", "XLK"];

const isIsoDate = () => t.matchesRegExp(/^\d{4}-\d{2}-\d{2}$/);

const isUniverseSource = t.isOneOf(
  [
    t.isObject({
      kind: t.isLiteral("csv"),
      path: t.isString(),
      column: t.isOptional(t.isString()),
    }),
    t.isObject({ kind: t.isLiteral("text"), path: t.isString() }),
    t.isObject({ kind: t.isLiteral("inline"), symbols: t.isArray(t.isString()) }),
  ],
  { exclusive: true }
);

const isFileConfig = t.isPartial({
  sources: t.isOptional(
    t.isPartial({
      tiingo: t.isOptional(
        t.isPartial({
          apiKey: t.isOptional(t.isString()),
          credentialsFile: t.isOptional(t.isString()),
          baseUrl: t.isOptional(t.isString()),
          timeoutMs: t.isOptional(t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(1)])),
        })
      ),
    })
  ),
  storage: t.isOptional(
    t.isPartial({
      dataDir: t.isOptional(t.isString()),
      partitionDir: t.isOptional(t.isString()),
      databasePath: t.isOptional(t.isString()),
    })
  ),
  fetch: t.isOptional(
    t.isPartial({
      startDate: t.isOptional(t.cascade(t.isString(), [isIsoDate()])),
      concurrency: t.isOptional(t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(1)])),
      maxAttempts: t.isOptional(t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(1)])),
      baseDelayMs: t.isOptional(t.cascade(t.isNumber(), [t.isAtLeast(0)])),
      maxDelayMs: t.isOptional(t.cascade(t.isNumber(), [t.isAtLeast(0)])),
    })
  ),
  universe: t.isOptional(t.isArray(isUniverseSource)),
});

type FileConfig = t.InferType<typeof isFileConfig>;

export interface ConfigOverrides {
  sources?: { tiingo?: Partial<Config["sources"]["tiingo"]> };
  storage?: Partial<Config["storage"]>;
  fetch?: Partial<Config["fetch"]>;
  universe?: UniverseSource[];
}

function readConfigFile(path: string): FileConfig {
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(path, "utf-8")) ?? {};
  } catch (error) {
    throw new ConfigurationError(`Failed to parse config file ${path}`, error);
  }

  const errors: string[] = [];
  if (!isFileConfig(parsed, { errors })) {
    throw new ConfigurationError(
      `Invalid config file ${path}: ${errors.join("; ")}`
    );
  }
  return parsed;
}

function envInteger(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

// File paths in the config file are relative to its directory; "~" is home
function resolveFilePath(path: string, baseDir: string): string {
  if (path === "~" || path.startsWith("~/")) {
    return join(homedir(), path.slice(1));
  }
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

function resolveSources(sources: UniverseSource[], baseDir: string): UniverseSource[] {
  return sources.map((source) =>
    source.kind === "inline" ? source : { ...source, path: resolveFilePath(source.path, baseDir) }
  );
}

function defaultUniverse(dataDir: string): UniverseSource[] {
  const assets = join(dataDir, "stock_assets");
  return [
    { kind: "csv", path: join(assets, "latest_sp500.csv"), column: "Symbol" },
    { kind: "text", path: join(assets, "nyse_tickers.txt") },
    { kind: "csv", path: join(assets, "nasdaqlisted.csv"), column: "Symbol" },
    { kind: "inline", symbols: ADDITIONAL_ETFS },
  ];
}

/**
 * Build the run configuration. Precedence: overrides, environment, config
 * file, defaults.
 */
export function loadConfig(
  configPath?: string,
  overrides?: ConfigOverrides
): Config {
  const path = configPath || process.env.PRICE_STORE_CONFIG || DEFAULT_CONFIG_PATH;
  const fileConfig = readConfigFile(path);
  const baseDir = dirname(resolve(path));
  const fileCredentials = fileConfig.sources?.tiingo?.credentialsFile;

  const dataDir = resolve(
    overrides?.storage?.dataDir ||
      process.env.PRICE_STORE_DATA_DIR ||
      fileConfig.storage?.dataDir ||
      DEFAULT_DATA_DIR
  );

  const config: Config = {
    sources: {
      tiingo: {
        apiKey:
          overrides?.sources?.tiingo?.apiKey ||
          process.env.TIINGO_API_KEY ||
          fileConfig.sources?.tiingo?.apiKey ||
          "",
        credentialsFile:
          overrides?.sources?.tiingo?.credentialsFile ||
          (fileCredentials ? resolveFilePath(fileCredentials, baseDir) : undefined),
        baseUrl:
          overrides?.sources?.tiingo?.baseUrl ||
          fileConfig.sources?.tiingo?.baseUrl ||
          TIINGO_BASE_URL,
        timeoutMs:
          overrides?.sources?.tiingo?.timeoutMs ||
          fileConfig.sources?.tiingo?.timeoutMs ||
          60_000,
      },
    },
    storage: {
      dataDir,
      partitionDir:
        overrides?.storage?.partitionDir ||
        fileConfig.storage?.partitionDir ||
        join(dataDir, "stocks"),
      databasePath:
        overrides?.storage?.databasePath ||
        fileConfig.storage?.databasePath ||
        join(dataDir, "price.duckdb"),
    },
    fetch: {
      startDate:
        overrides?.fetch?.startDate ||
        fileConfig.fetch?.startDate ||
        DEFAULT_START_DATE,
      concurrency:
        overrides?.fetch?.concurrency ||
        envInteger("PRICE_STORE_CONCURRENCY") ||
        fileConfig.fetch?.concurrency ||
        10,
      maxAttempts:
        overrides?.fetch?.maxAttempts || fileConfig.fetch?.maxAttempts || 4,
      baseDelayMs:
        overrides?.fetch?.baseDelayMs ?? fileConfig.fetch?.baseDelayMs ?? 500,
      maxDelayMs:
        overrides?.fetch?.maxDelayMs ?? fileConfig.fetch?.maxDelayMs ?? 8_000,
    },
    universe:
      overrides?.universe ||
      (fileConfig.universe
        ? resolveSources(fileConfig.universe, baseDir)
        : defaultUniverse(dataDir)),
  };

  return config;
}

/**
 * The provider credential: configured key first, then the credentials file.
 * Returns an empty string when neither is present; the fetcher refuses to
 * run without one. An unreadable credentials file is a ConfigurationError.
 */
export function resolveApiKey(config: Config): string {
  const { apiKey, credentialsFile } = config.sources.tiingo;
  if (apiKey.trim()) {
    return apiKey.trim();
  }

  if (credentialsFile && existsSync(credentialsFile)) {
    try {
      return readFileSync(credentialsFile, "utf-8").trim();
    } catch (error) {
      throw new ConfigurationError(`Cannot read credentials file ${credentialsFile}`, error);
    }
  }

  return "";
}

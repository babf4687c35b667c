import { logQuery } from "../logging.js";
import type { PriceTableStorage } from "../storage/prices.js";
import type { PricePoint, PriceSummary } from "../types/index.js";

/**
 * Get the most recent `days` rows for a ticker from the consolidated table,
 * oldest first.
 */
export async function getRecentPrices(
  table: PriceTableStorage,
  ticker: string,
  days = 10
): Promise<PricePoint[]> {
  if (!Number.isInteger(days) || days < 1) {
    throw new RangeError(`days must be a positive integer, got ${days}`);
  }

  const rows = await table.recentPrices(ticker, days);
  if (rows.length === 0) {
    logQuery.info(`No data found for ticker: ${ticker}`);
  }
  return rows;
}

export function summarizePrices(rows: PricePoint[]): PriceSummary | null {
  const first = rows[0];
  const last = rows[rows.length - 1];
  if (!first || !last) return null;

  let highest = first;
  let lowest = first;
  let closeSum = 0;
  let totalVolume = 0;

  for (const row of rows) {
    if (row.high > highest.high) highest = row;
    if (row.low < lowest.low) lowest = row;
    closeSum += row.close;
    totalVolume += row.volume;
  }

  const change = rows.length > 1 ? last.close - first.close : null;

  return {
    firstDate: first.date,
    lastDate: last.date,
    tradingDays: rows.length,
    averageClose: closeSum / rows.length,
    highest: { price: highest.high, date: highest.date },
    lowest: { price: lowest.low, date: lowest.date },
    totalVolume,
    averageVolume: totalVolume / rows.length,
    change,
    percentChange: change !== null && first.close !== 0 ? (change / first.close) * 100 : null,
  };
}

import type { FetchReport, MergeReport, TableSummary, TickerActivity } from "../types/index.js";

const RULE = "=".repeat(60);

export function printHeading(title: string): void {
  console.log(`\n${RULE}\n${title}\n${RULE}`);
}

export function printFetchReport(report: FetchReport): void {
  console.log(`\nTotal tickers: ${report.total}`);
  console.log(`  Skipped (already fetched): ${report.skipped.length}`);
  console.log(`  Succeeded: ${report.succeeded.length}${report.empty.length ? ` (${report.empty.length} with no data)` : ""}`);
  console.log(`  Failed: ${report.failed.length}`);

  if (report.failed.length > 0) {
    console.log("\nFailed tickers:");
    for (const failure of report.failed) {
      console.log(`  ${failure.symbol.padEnd(10)} [${failure.kind}/${failure.reason}] ${failure.message}`);
    }
    console.log(`\nRetry with: price-store update --fetch-only ${report.failed.map((f) => f.symbol).join(" ")}`);
  }
}

export function printMergeReport(report: MergeReport): void {
  console.log(`\nPartitions scanned: ${report.partitions}`);
  console.log(`  Loaded tickers: ${report.loadedSymbols.length}`);
  if (report.removedSymbols.length > 0) {
    console.log(`  Removed tickers: ${report.removedSymbols.join(", ")}`);
  }
  console.log(`  Accepted rows: ${report.acceptedRows.toLocaleString("en-US")}`);
  console.log(`  Rejected rows: ${report.rejectedRows.toLocaleString("en-US")}`);
  if (report.duplicateRows > 0) {
    console.log(`  Duplicate rows dropped: ${report.duplicateRows.toLocaleString("en-US")}`);
  }
  if (report.rejectedPartitions.length > 0) {
    console.log(`\nRejected partitions (${report.rejectedPartitions.length}):`);
    for (const rejected of report.rejectedPartitions) {
      console.log(`  ${rejected.symbol.padEnd(10)} ${rejected.message}`);
    }
  }
}

export function printTableSummary(summary: TableSummary, recent: TickerActivity[] = []): void {
  if (summary.rows === 0) {
    console.log("\n  No data found in database");
    return;
  }

  console.log(`\n  Total Tickers: ${summary.symbols.toLocaleString("en-US")}`);
  console.log(`  Total Records: ${summary.rows.toLocaleString("en-US")}`);
  console.log(`  Date Range: ${summary.firstDate} to ${summary.lastDate}`);

  if (recent.length > 0) {
    console.log("\n  Recent Data (sample):");
    for (const activity of recent) {
      console.log(`  ${activity.ticker.padEnd(10)} ${activity.lastDate} ${activity.days.toString().padStart(6)} days`);
    }
  }
}

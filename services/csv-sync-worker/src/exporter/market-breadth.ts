// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/exporter/market-breadth`
 * Purpose: Market breadth export — NSE most-active and advances/declines tables to Google Sheets and CSV.
 * Scope: Fetch, clean, upload, then write each table. Does not commit anything (the sync job does).
 * Invariants:
 * - A table whose fetch failed or came back empty is skipped entirely (no upload, no file)
 * - Upload happens before the CSV write; an upload failure aborts the export
 * Side-effects: IO via injected deps (HTTP, filesystem)
 * Links: adapters/market/nse-client.ts, adapters/market/sheets-client.ts, export.ts
 * @internal
 */

import { join } from "node:path";

import type { Logger } from "pino";

import type { MarketDataSource } from "../adapters/market/nse-client.js";
import type { SheetUploader } from "../adapters/market/sheets-client.js";
import {
  buildTable,
  type CellCleaner,
  cleanAdvDecCell,
  cleanMostActiveCell,
  type DataRecord,
  type Table,
} from "./tabular.js";

export interface MarketBreadthExport {
  readonly key: "most_active" | "adv_dec";
  readonly tab: string;
  readonly fileName: string;
  readonly clean: CellCleaner;
}

export const MOST_ACTIVE_EXPORT: MarketBreadthExport = {
  key: "most_active",
  tab: "Most Active",
  fileName: "Most_Active.csv",
  clean: cleanMostActiveCell,
};

export const ADV_DEC_EXPORT: MarketBreadthExport = {
  key: "adv_dec",
  tab: "Adv_Dec",
  fileName: "Adv_Dec.csv",
  clean: cleanAdvDecCell,
};

export interface MarketBreadthDeps {
  source: MarketDataSource;
  sheets: SheetUploader;
  writeCsv: (path: string, table: Table) => Promise<void>;
  spreadsheetId: string;
  outputDir: string;
  logger: Logger;
}

/**
 * Runs both exports in order and returns the CSV paths written.
 */
export async function exportMarketBreadth(
  deps: MarketBreadthDeps
): Promise<string[]> {
  const written: string[] = [];

  const mostActive = await deps.source.fetchMostActive();
  const mostActivePath = await exportTable(deps, MOST_ACTIVE_EXPORT, mostActive);
  if (mostActivePath) written.push(mostActivePath);

  const advDec = await deps.source.fetchAdvancesDeclines();
  const advDecPath = await exportTable(deps, ADV_DEC_EXPORT, advDec);
  if (advDecPath) written.push(advDecPath);

  return written;
}

async function exportTable(
  deps: MarketBreadthDeps,
  target: MarketBreadthExport,
  records: readonly DataRecord[] | null
): Promise<string | null> {
  const log = deps.logger.child({ export: target.key });
  if (!records || records.length === 0) {
    log.warn({}, `No ${target.tab} data returned; skipping`);
    return null;
  }

  const table = buildTable(records, target.clean);
  await deps.sheets.uploadTable(deps.spreadsheetId, target.tab, table);

  const path = join(deps.outputDir, target.fileName);
  await deps.writeCsv(path, table);
  log.info({ path, rows: table.rows.length }, `${target.tab} data saved to CSV`);
  return path;
}

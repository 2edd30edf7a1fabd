// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/adapters/market/csv-writer`
 * Purpose: Serialises tables to CSV files (header row, no index column).
 * Scope: csv-stringify formatting + file write. Does not clean cells.
 * Invariants: LF line endings; booleans written as True/False so existing files keep their diff stable.
 * Side-effects: IO (file write)
 * @internal
 */

import { writeFile } from "node:fs/promises";

import { stringify } from "csv-stringify/sync";

import { type Table, toValues } from "../../exporter/tabular.js";

export function formatCsv(table: Table): string {
  return stringify(toValues(table), {
    record_delimiter: "unix",
    cast: { boolean: (value) => (value ? "True" : "False") },
  });
}

export async function writeCsv(path: string, table: Table): Promise<void> {
  await writeFile(path, formatCsv(table), "utf-8");
}

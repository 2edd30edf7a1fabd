// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/exporter/tabular`
 * Purpose: Turns NSE JSON records into rectangular tables for CSV and Sheets output.
 * Scope: Pure column discovery and cell cleaning. Does not perform I/O.
 * Invariants:
 * - Columns are the union of record keys in first-seen order
 * - Every row has exactly one cell per column
 * - Cells are scalars (string | number | boolean); missing values are ""
 * Side-effects: none
 * Links: exporter/market-breadth.ts
 * @internal
 */

export type Cell = string | number | boolean;

export type DataRecord = Readonly<Record<string, unknown>>;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly Cell[])[];
}

/** Google Sheets rejects cells longer than this. */
export const MAX_CELL_LENGTH = 50_000;

export type CellCleaner = (value: unknown) => Cell;

function isMissing(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    (typeof value === "number" && Number.isNaN(value))
  );
}

/**
 * Most-active cleaning: nested values are serialised, long strings truncated.
 */
export const cleanMostActiveCell: CellCleaner = (value) => {
  if (isMissing(value)) return "";
  const cell =
    typeof value === "object" ? JSON.stringify(value) : scalar(value);
  return typeof cell === "string" && cell.length > MAX_CELL_LENGTH
    ? cell.slice(0, MAX_CELL_LENGTH)
    : cell;
};

/**
 * Advances/declines cleaning: nested and missing values are blanked.
 */
export const cleanAdvDecCell: CellCleaner = (value) => {
  if (isMissing(value) || typeof value === "object") return "";
  return scalar(value);
};

function scalar(value: unknown): Cell {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  return String(value);
}

export function buildTable(
  records: readonly DataRecord[],
  clean: CellCleaner
): Table {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  const rows = records.map((record) =>
    columns.map((column) => clean(record[column]))
  );
  return { columns, rows };
}

/** Header row followed by data rows, as written to Sheets. */
export function toValues(table: Table): Cell[][] {
  return [[...table.columns], ...table.rows.map((row) => [...row])];
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/tests/tabular`
 * Purpose: Unit tests for record-to-table shaping and cell cleaning.
 * Side-effects: none
 * Links: src/exporter/tabular.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  buildTable,
  cleanAdvDecCell,
  cleanMostActiveCell,
  MAX_CELL_LENGTH,
  toValues,
} from "../src/exporter/tabular.js";
import { ADV_DEC_RECORDS, MOST_ACTIVE_RECORDS } from "./fixtures.js";

describe("cleanMostActiveCell", () => {
  it("keeps scalars", () => {
    expect(cleanMostActiveCell("ALPHA")).toBe("ALPHA");
    expect(cleanMostActiveCell(101.5)).toBe(101.5);
    expect(cleanMostActiveCell(false)).toBe(false);
  });

  it("blanks missing values", () => {
    expect(cleanMostActiveCell(null)).toBe("");
    expect(cleanMostActiveCell(undefined)).toBe("");
    expect(cleanMostActiveCell(Number.NaN)).toBe("");
  });

  it("serialises nested values as JSON", () => {
    expect(cleanMostActiveCell({ series: "EQ" })).toBe('{"series":"EQ"}');
    expect(cleanMostActiveCell([1, 2])).toBe("[1,2]");
  });

  it("truncates long strings to the cell limit", () => {
    const cell = cleanMostActiveCell("x".repeat(MAX_CELL_LENGTH + 10));
    expect(cell).toBe("x".repeat(MAX_CELL_LENGTH));
  });
});

describe("cleanAdvDecCell", () => {
  it("keeps scalars and blanks nested or missing values", () => {
    expect(cleanAdvDecCell("BETA")).toBe("BETA");
    expect(cleanAdvDecCell(41)).toBe(41);
    expect(cleanAdvDecCell({ isin: "X1" })).toBe("");
    expect(cleanAdvDecCell([1])).toBe("");
    expect(cleanAdvDecCell(null)).toBe("");
  });
});

describe("buildTable", () => {
  it("unions columns in first-seen order and fills gaps", () => {
    const table = buildTable(MOST_ACTIVE_RECORDS, cleanMostActiveCell);

    expect(table).toEqual({
      columns: [
        "symbol",
        "lastPrice",
        "pChange",
        "totalTradedValue",
        "meta",
        "isFNO",
      ],
      rows: [
        ["ALPHA", 101.5, -1.25, 987654321, '{"series":"EQ"}', ""],
        ["BETA", 42, 0.5, 123456789, "", true],
      ],
    });
  });

  it("applies the advances/declines cleaner", () => {
    const table = buildTable(ADV_DEC_RECORDS, cleanAdvDecCell);

    expect(table).toEqual({
      columns: ["symbol", "open", "lastPrice", "meta"],
      rows: [
        ["ALPHA", 100, 101.5, ""],
        ["BETA", 41, "", ""],
      ],
    });
  });

  it("returns an empty table for no records", () => {
    expect(buildTable([], cleanAdvDecCell)).toEqual({ columns: [], rows: [] });
  });
});

describe("toValues", () => {
  it("prepends the header row", () => {
    expect(
      toValues({ columns: ["a", "b"], rows: [[1, "x"], [2, ""]] })
    ).toEqual([
      ["a", "b"],
      [1, "x"],
      [2, ""],
    ]);
  });
});

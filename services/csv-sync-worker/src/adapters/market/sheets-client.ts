// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/adapters/market/sheets-client`
 * Purpose: Google Sheets upload — service-account auth + Sheets REST v4 (find/clear or add tab, write values).
 * Scope: Uses google-auth-library for the access token; plain fetch for the REST calls. Does not build tables.
 * Invariants:
 * - Existing tab: cleared, then overwritten from A1
 * - Missing tab: created with rows = data rows + 1 and cols = column count
 * - Values written RAW (no formula or date parsing)
 * Side-effects: HTTP (oauth2.googleapis.com, sheets.googleapis.com)
 * Links: exporter/market-breadth.ts
 * @internal
 */

import { JWT } from "google-auth-library";
import type { Logger } from "pino";
import { z } from "zod";

import { type Table, toValues } from "../../exporter/tabular.js";

export const SHEETS_SCOPE = "https://www.googleapis.com/auth/spreadsheets";
export const SHEETS_API_BASE = "https://sheets.googleapis.com/v4/spreadsheets";

const ServiceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

const SpreadsheetSchema = z.object({
  sheets: z
    .array(
      z.object({
        properties: z.object({
          sheetId: z.number(),
          title: z.string(),
        }),
      })
    )
    .default([]),
});

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

/**
 * Service-account token provider. Tokens are cached and refreshed by google-auth-library.
 */
export class ServiceAccountTokenProvider implements AccessTokenProvider {
  private readonly client: JWT;

  /**
   * @param credentialsJson - service-account key file contents
   * @throws Error when the JSON is malformed or lacks client_email/private_key
   */
  constructor(credentialsJson: string) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(credentialsJson);
    } catch (cause) {
      throw new Error("Google Sheets credentials are not valid JSON", {
        cause,
      });
    }
    const result = ServiceAccountSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(
        "Google Sheets credentials must include client_email and private_key"
      );
    }
    this.client = new JWT({
      email: result.data.client_email,
      key: result.data.private_key,
      scopes: [SHEETS_SCOPE],
    });
  }

  async getAccessToken(): Promise<string> {
    const { token } = await this.client.getAccessToken();
    if (!token) {
      throw new Error("Google service account returned no access token");
    }
    return token;
  }
}

export interface SheetUploader {
  uploadTable(
    spreadsheetId: string,
    tabName: string,
    table: Table
  ): Promise<void>;
}

/** A1 range for a tab (whole tab when no cell is given), with the title quoted. */
export function tabRange(tabName: string, cell?: string): string {
  const quoted = `'${tabName.replace(/'/g, "''")}'`;
  return cell ? `${quoted}!${cell}` : quoted;
}

export class SheetsClient implements SheetUploader {
  constructor(
    private readonly tokens: AccessTokenProvider,
    private readonly log: Logger
  ) {}

  async uploadTable(
    spreadsheetId: string,
    tabName: string,
    table: Table
  ): Promise<void> {
    const base = `${SHEETS_API_BASE}/${encodeURIComponent(spreadsheetId)}`;
    const log = this.log.child({ tab: tabName });

    const spreadsheet = SpreadsheetSchema.parse(
      await this.call("GET", `${base}?fields=sheets.properties(sheetId,title)`)
    );
    const exists = spreadsheet.sheets.some(
      (sheet) => sheet.properties.title === tabName
    );

    if (exists) {
      await this.call(
        "POST",
        `${base}/values/${encodeURIComponent(tabRange(tabName))}:clear`,
        {}
      );
      log.info({}, `Worksheet '${tabName}' found, cleared existing data.`);
    } else {
      await this.call("POST", `${base}:batchUpdate`, {
        requests: [
          {
            addSheet: {
              properties: {
                title: tabName,
                gridProperties: {
                  rowCount: table.rows.length + 1,
                  columnCount: table.columns.length,
                },
              },
            },
          },
        ],
      });
      log.info({}, `Worksheet '${tabName}' not found. Created a new one.`);
    }

    const range = tabRange(tabName, "A1");
    await this.call(
      "PUT",
      `${base}/values/${encodeURIComponent(range)}?valueInputOption=RAW`,
      { range, majorDimension: "ROWS", values: toValues(table) }
    );
    log.info(
      { rows: table.rows.length },
      `Data uploaded to '${tabName}' successfully.`
    );
  }

  private async call(
    method: "GET" | "POST" | "PUT",
    url: string,
    body?: unknown
  ): Promise<unknown> {
    const token = await this.tokens.getAccessToken();
    const response = await fetch(url, {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        ...(body === undefined ? {} : { "Content-Type": "application/json" }),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(
        `Sheets API ${method} failed: ${response.status} - ${errorText}`
      );
    }
    return response.json();
  }
}

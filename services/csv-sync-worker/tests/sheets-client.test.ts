// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/tests/sheets-client`
 * Purpose: Unit tests for the Google Sheets uploader and service-account token provider.
 * Scope: REST call sequence for existing and missing tabs, error surfacing, credential validation. fetch and google-auth-library are mocked.
 * Side-effects: none
 * Links: src/adapters/market/sheets-client.ts
 * @internal
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const auth = vi.hoisted(() => {
  const jwtOptions: unknown[] = [];
  const getAccessToken = vi.fn(
    async (): Promise<{ token?: string | null }> => ({
      token: "test-access-token",
    })
  );
  return { jwtOptions, getAccessToken };
});

vi.mock("google-auth-library", () => ({
  JWT: class {
    constructor(options: unknown) {
      auth.jwtOptions.push(options);
    }
    getAccessToken = auth.getAccessToken;
  },
}));

import {
  SHEETS_API_BASE,
  SHEETS_SCOPE,
  ServiceAccountTokenProvider,
  SheetsClient,
  tabRange,
} from "../src/adapters/market/sheets-client.js";
import type { Table } from "../src/exporter/tabular.js";
import {
  createCapturingLogger,
  jsonResponse,
  TEST_SERVICE_ACCOUNT,
  textResponse,
} from "./fixtures.js";

const SHEET = `${SHEETS_API_BASE}/sheet-1`;
const METADATA_URL = `${SHEET}?fields=sheets.properties(sheetId,title)`;

const TABLE: Table = {
  columns: ["symbol", "lastPrice"],
  rows: [
    ["ALPHA", 101.5],
    ["BETA", 42],
  ],
};

function stubFetch(routes: Record<string, () => Response>) {
  const fetchMock = vi.fn(
    async (input: string | URL | Request, init?: RequestInit) => {
      const key = `${init?.method ?? "GET"} ${String(input)}`;
      const route = routes[key];
      if (!route) throw new Error(`Unexpected fetch ${key}`);
      return route();
    }
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function requestLog(fetchMock: ReturnType<typeof stubFetch>) {
  return fetchMock.mock.calls.map(([url, init]) => ({
    method: init?.method,
    url: String(url),
    body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
  }));
}

function createClient() {
  const capture = createCapturingLogger();
  const client = new SheetsClient(
    { getAccessToken: async () => "test-access-token" },
    capture.logger
  );
  return { client, ...capture };
}

describe("tabRange", () => {
  it("quotes the tab title", () => {
    expect(tabRange("Adv_Dec")).toBe("'Adv_Dec'");
    expect(tabRange("Most Active", "A1")).toBe("'Most Active'!A1");
  });

  it("escapes single quotes in the title", () => {
    expect(tabRange("Trader's View", "A1")).toBe("'Trader''s View'!A1");
  });
});

describe("SheetsClient.uploadTable", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("clears an existing tab and writes values from A1", async () => {
    const fetchMock = stubFetch({
      [`GET ${METADATA_URL}`]: () =>
        jsonResponse({
          sheets: [
            { properties: { sheetId: 0, title: "Sheet1" } },
            { properties: { sheetId: 7, title: "Most Active" } },
          ],
        }),
      [`POST ${SHEET}/values/'Most%20Active':clear`]: () => jsonResponse({}),
      [`PUT ${SHEET}/values/'Most%20Active'!A1?valueInputOption=RAW`]: () =>
        jsonResponse({ updatedRows: 3 }),
    });
    const { client, messages } = createClient();

    await client.uploadTable("sheet-1", "Most Active", TABLE);

    expect(requestLog(fetchMock)).toEqual([
      { method: "GET", url: METADATA_URL, body: undefined },
      {
        method: "POST",
        url: `${SHEET}/values/'Most%20Active':clear`,
        body: {},
      },
      {
        method: "PUT",
        url: `${SHEET}/values/'Most%20Active'!A1?valueInputOption=RAW`,
        body: {
          range: "'Most Active'!A1",
          majorDimension: "ROWS",
          values: [
            ["symbol", "lastPrice"],
            ["ALPHA", 101.5],
            ["BETA", 42],
          ],
        },
      },
    ]);
    expect(messages(30)).toEqual([
      "Worksheet 'Most Active' found, cleared existing data.",
      "Data uploaded to 'Most Active' successfully.",
    ]);
  });

  it("creates a missing tab sized to the table", async () => {
    const fetchMock = stubFetch({
      [`GET ${METADATA_URL}`]: () =>
        jsonResponse({ sheets: [{ properties: { sheetId: 0, title: "Sheet1" } }] }),
      [`POST ${SHEET}:batchUpdate`]: () => jsonResponse({ replies: [] }),
      [`PUT ${SHEET}/values/'Adv_Dec'!A1?valueInputOption=RAW`]: () =>
        jsonResponse({}),
    });
    const { client, messages } = createClient();

    await client.uploadTable("sheet-1", "Adv_Dec", TABLE);

    expect(requestLog(fetchMock)[1]).toEqual({
      method: "POST",
      url: `${SHEET}:batchUpdate`,
      body: {
        requests: [
          {
            addSheet: {
              properties: {
                title: "Adv_Dec",
                gridProperties: { rowCount: 3, columnCount: 2 },
              },
            },
          },
        ],
      },
    });
    expect(messages(30)[0]).toBe(
      "Worksheet 'Adv_Dec' not found. Created a new one."
    );
  });

  it("sends the bearer token on every call", async () => {
    const fetchMock = stubFetch({
      [`GET ${METADATA_URL}`]: () => jsonResponse({}),
      [`POST ${SHEET}:batchUpdate`]: () => jsonResponse({}),
      [`PUT ${SHEET}/values/'Adv_Dec'!A1?valueInputOption=RAW`]: () =>
        jsonResponse({}),
    });
    const { client } = createClient();

    await client.uploadTable("sheet-1", "Adv_Dec", TABLE);

    expect(fetchMock).toHaveBeenCalledTimes(3);
    for (const [, init] of fetchMock.mock.calls) {
      expect(init?.headers).toMatchObject({
        Authorization: "Bearer test-access-token",
      });
    }
  });

  it("surfaces API errors with status and body", async () => {
    stubFetch({
      [`GET ${METADATA_URL}`]: () => textResponse("permission denied", 403),
    });
    const { client } = createClient();

    await expect(
      client.uploadTable("sheet-1", "Adv_Dec", TABLE)
    ).rejects.toThrow("Sheets API GET failed: 403 - permission denied");
  });
});

describe("ServiceAccountTokenProvider", () => {
  beforeEach(() => {
    auth.jwtOptions.length = 0;
    auth.getAccessToken.mockClear();
  });

  it("builds a JWT client scoped to spreadsheets", async () => {
    const provider = new ServiceAccountTokenProvider(TEST_SERVICE_ACCOUNT);

    expect(await provider.getAccessToken()).toBe("test-access-token");
    expect(auth.jwtOptions).toEqual([
      {
        email: "sync-bot@example.iam.gserviceaccount.com",
        key: "test-private-key",
        scopes: [SHEETS_SCOPE],
      },
    ]);
  });

  it("rejects malformed JSON", () => {
    expect(() => new ServiceAccountTokenProvider("{not json")).toThrow(
      "Google Sheets credentials are not valid JSON"
    );
  });

  it("rejects credentials without a private key", () => {
    expect(
      () =>
        new ServiceAccountTokenProvider(
          JSON.stringify({ client_email: "sync-bot@example.com" })
        )
    ).toThrow(
      "Google Sheets credentials must include client_email and private_key"
    );
  });

  it("fails when no token is issued", async () => {
    auth.getAccessToken.mockResolvedValueOnce({ token: null });
    const provider = new ServiceAccountTokenProvider(TEST_SERVICE_ACCOUNT);

    await expect(provider.getAccessToken()).rejects.toThrow(
      "Google service account returned no access token"
    );
  });
});

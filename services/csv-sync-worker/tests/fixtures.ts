// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/tests/fixtures`
 * Purpose: Reusable test fixtures for csv-sync-worker unit tests.
 * Scope: In-memory loggers, placeholder credentials, canned NSE payloads and fetch responses.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import type { Logger } from "pino";
import pino from "pino";

import { makeNoopLogger } from "../src/observability/logger.js";

export const TEST_SECRET = "test-secret";

export const TEST_SERVICE_ACCOUNT = JSON.stringify({
  type: "service_account",
  client_email: "sync-bot@example.iam.gserviceaccount.com",
  private_key: "test-private-key",
});

export type LogEntry = Record<string, unknown> & { level: number; msg?: string };

/**
 * Pino logger writing JSON lines into memory. Levels: 20 debug, 30 info, 40 warn, 50 error.
 */
export function createCapturingLogger(): {
  logger: Logger;
  entries: LogEntry[];
  messages: (level?: number) => string[];
} {
  const entries: LogEntry[] = [];
  const logger = pino(
    { level: "debug", messageKey: "msg", base: null },
    {
      write(line: string) {
        entries.push(JSON.parse(line));
      },
    }
  );
  const messages = (level?: number) =>
    entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.msg ?? "");
  return { logger, entries, messages };
}

export { makeNoopLogger };

export const MOST_ACTIVE_RECORDS = [
  {
    symbol: "ALPHA",
    lastPrice: 101.5,
    pChange: -1.25,
    totalTradedValue: 987654321,
    meta: { series: "EQ" },
  },
  {
    symbol: "BETA",
    lastPrice: 42,
    pChange: 0.5,
    totalTradedValue: 123456789,
    isFNO: true,
  },
];

export const ADV_DEC_RECORDS = [
  { symbol: "ALPHA", open: 100, lastPrice: 101.5, meta: { isin: "X1" } },
  { symbol: "BETA", open: 41, lastPrice: null },
];

export function jsonResponse(
  body: unknown,
  init: { status?: number; setCookie?: string[] } = {}
): Response {
  const headers = new Headers({ "Content-Type": "application/json" });
  for (const cookie of init.setCookie ?? []) {
    headers.append("Set-Cookie", cookie);
  }
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers,
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, { status });
}

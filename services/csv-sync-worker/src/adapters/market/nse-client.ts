// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/adapters/market/nse-client`
 * Purpose: NSE public API client for most-active securities and advances/declines.
 * Scope: Cookie priming + JSON GETs with browser-like headers, payload validation with Zod. Does not shape tables.
 * Invariants:
 * - Session cookies come from a GET of the site root before the first API call
 * - fetchMostActive() yields null and fetchAdvancesDeclines() yields [] on any failure (logged, never thrown)
 * Side-effects: HTTP (nseindia.com)
 * Links: exporter/market-breadth.ts
 * @internal
 */

import type { Logger } from "pino";
import { z } from "zod";

import type { DataRecord } from "../../exporter/tabular.js";

export const MOST_ACTIVE_PATH =
  "/api/live-analysis-most-active-securities?index=value";
export const ADVANCES_DECLINES_PATH =
  "/api/equity-stockIndices?index=SECURITIES%20IN%20F%26O";

const RecordSchema = z.record(z.unknown());

const MostActivePayloadSchema = z.object({
  data: z.union([z.array(RecordSchema), RecordSchema]),
});

const AdvancesDeclinesPayloadSchema = z.object({
  data: z.array(RecordSchema).optional(),
});

export interface NseClientConfig {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Source of the two market breadth tables.
 */
export interface MarketDataSource {
  fetchMostActive(): Promise<DataRecord[] | null>;
  fetchAdvancesDeclines(): Promise<DataRecord[]>;
}

export class NseClient implements MarketDataSource {
  private cookie: string | null = null;
  private readonly headers: Record<string, string>;

  constructor(
    private readonly config: NseClientConfig,
    private readonly log: Logger
  ) {
    this.headers = {
      "User-Agent":
        "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
      Accept: "*/*",
      "Accept-Language": "en-US,en;q=0.9",
      Referer: `${config.baseUrl}/`,
    };
  }

  async fetchMostActive(): Promise<DataRecord[] | null> {
    try {
      const payload = MostActivePayloadSchema.parse(
        await this.getJson(MOST_ACTIVE_PATH)
      );
      return Array.isArray(payload.data) ? payload.data : [payload.data];
    } catch (err) {
      this.log.error({ err }, "Error fetching NSE most active data");
      return null;
    }
  }

  async fetchAdvancesDeclines(): Promise<DataRecord[]> {
    try {
      // `meta` and any other top-level keys are dropped by the schema
      const payload = AdvancesDeclinesPayloadSchema.parse(
        await this.getJson(ADVANCES_DECLINES_PATH)
      );
      return payload.data ?? [];
    } catch (err) {
      this.log.error({ err }, "Error fetching advances/declines data");
      return [];
    }
  }

  private async getJson(path: string): Promise<unknown> {
    if (this.cookie === null) {
      this.cookie = await this.primeCookies();
    }
    const url = `${this.config.baseUrl}${path}`;
    const response = await fetch(url, {
      headers: { ...this.headers, Cookie: this.cookie },
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`NSE request ${path} failed (HTTP ${response.status})`);
    }
    return response.json();
  }

  private async primeCookies(): Promise<string> {
    const response = await fetch(this.config.baseUrl, {
      headers: this.headers,
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`NSE session priming failed (HTTP ${response.status})`);
    }
    const cookie = response.headers
      .getSetCookie()
      .map((entry) => entry.split(";")[0]?.trim() ?? "")
      .filter(Boolean)
      .join("; ");
    this.log.debug({ cookies: cookie.split("; ").length }, "NSE session primed");
    return cookie;
  }
}

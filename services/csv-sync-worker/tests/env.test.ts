// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/tests/env`
 * Purpose: Unit tests for worker and exporter env parsing.
 * Scope: Defaults, secret lookup by name, blank optional values, validation failures.
 * Side-effects: none
 * Links: src/bootstrap/env.ts
 * @internal
 */

import { DEFAULT_BOT_IDENTITY, DEFAULT_COMMIT_MESSAGE } from "@csv-sync/core";
import { describe, expect, it } from "vitest";

import { parseEnv, parseExporterEnv } from "../src/bootstrap/env.js";
import { TEST_SECRET } from "./fixtures.js";

describe("parseEnv", () => {
  it("applies defaults and reads the default secret", () => {
    const config = parseEnv({ GOOGLE_SHEETS_CREDENTIALS: TEST_SECRET });

    expect(config).toMatchObject({
      SYNC_WORKDIR: ".",
      SYNC_INSTALL_COMMAND: "python -m pip install -r requirements.txt",
      SYNC_SCRIPT_COMMAND: "python advdec.py",
      SYNC_SECRET_NAME: "GOOGLE_SHEETS_CREDENTIALS",
      SYNC_SECRET_VALUE: TEST_SECRET,
      SYNC_COMMIT_MESSAGE: DEFAULT_COMMIT_MESSAGE,
      SYNC_BOT_NAME: DEFAULT_BOT_IDENTITY.name,
      SYNC_BOT_EMAIL: DEFAULT_BOT_IDENTITY.email,
      SYNC_CRON: "0 11 * * 1-5",
      SYNC_TIMEZONE: "UTC",
      LOG_LEVEL: "info",
      HEALTH_PORT: 9000,
    });
    expect(config.SYNC_REPO_URL).toBeUndefined();
    expect(config.SYNC_GIT_TOKEN).toBeUndefined();
  });

  it("reads the secret from the variable named by SYNC_SECRET_NAME", () => {
    const config = parseEnv({
      SYNC_SECRET_NAME: "EXPORT_API_KEY",
      EXPORT_API_KEY: TEST_SECRET,
    });

    expect(config.SYNC_SECRET_VALUE).toBe(TEST_SECRET);
  });

  it("treats blank optional values as unset", () => {
    const config = parseEnv({
      GOOGLE_SHEETS_CREDENTIALS: TEST_SECRET,
      SYNC_REPO_URL: "",
      SYNC_BRANCH: "",
    });

    expect(config.SYNC_REPO_URL).toBeUndefined();
    expect(config.SYNC_BRANCH).toBeUndefined();
  });

  it("coerces HEALTH_PORT", () => {
    const config = parseEnv({
      GOOGLE_SHEETS_CREDENTIALS: TEST_SECRET,
      HEALTH_PORT: "8081",
    });

    expect(config.HEALTH_PORT).toBe(8081);
  });

  it("fails when the secret is missing", () => {
    expect(() => parseEnv({})).toThrow(
      "Invalid environment configuration:\n  GOOGLE_SHEETS_CREDENTIALS: secret is required (named by SYNC_SECRET_NAME)"
    );
  });

  it("fails when the secret is empty", () => {
    expect(() => parseEnv({ GOOGLE_SHEETS_CREDENTIALS: "" })).toThrow(
      "secret is required"
    );
  });

  it("rejects a secret name that is not an env var name", () => {
    expect(() =>
      parseEnv({ SYNC_SECRET_NAME: "1-bad", "1-bad": TEST_SECRET })
    ).toThrow(
      "  SYNC_SECRET_NAME: SYNC_SECRET_NAME must be a valid environment variable name"
    );
  });

  it("rejects an unknown log level", () => {
    expect(() =>
      parseEnv({ GOOGLE_SHEETS_CREDENTIALS: TEST_SECRET, LOG_LEVEL: "loud" })
    ).toThrow("LOG_LEVEL");
  });
});

describe("parseExporterEnv", () => {
  it("requires Google Sheets credentials", () => {
    expect(() => parseExporterEnv({ SHEET_ID: "sheet-1" })).toThrow(
      "GOOGLE_SHEETS_CREDENTIALS: GOOGLE_SHEETS_CREDENTIALS environment variable is not set."
    );
  });

  it("requires a sheet id", () => {
    expect(() =>
      parseExporterEnv({ GOOGLE_SHEETS_CREDENTIALS: TEST_SECRET })
    ).toThrow("SHEET_ID: SHEET_ID is required");
  });

  it("applies exporter defaults", () => {
    expect(
      parseExporterEnv({
        GOOGLE_SHEETS_CREDENTIALS: TEST_SECRET,
        SHEET_ID: "sheet-1",
      })
    ).toEqual({
      GOOGLE_SHEETS_CREDENTIALS: TEST_SECRET,
      SHEET_ID: "sheet-1",
      EXPORT_OUTPUT_DIR: ".",
      NSE_BASE_URL: "https://www.nseindia.com",
      NSE_TIMEOUT_MS: 15_000,
    });
  });
});

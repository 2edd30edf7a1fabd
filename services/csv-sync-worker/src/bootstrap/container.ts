// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/bootstrap/container`
 * Purpose: Composition root — wires concrete adapters to port interfaces.
 * Scope: All adapter construction lives here. Returns typed containers against port interfaces.
 * Invariants:
 * - Only file that instantiates adapters
 * - scheduler.ts and the core job import ports only, never this module
 * Side-effects: none at construction (adapters connect lazily)
 * Links: packages/csv-sync-core/src/ports/index.ts
 * @internal
 */

import { createSyncJob, type SyncJob } from "@csv-sync/core";

import { CsvGlobScanner } from "../adapters/artifacts/csv-glob.adapter.js";
import { writeCsv } from "../adapters/market/csv-writer.js";
import { NseClient } from "../adapters/market/nse-client.js";
import {
  ServiceAccountTokenProvider,
  SheetsClient,
} from "../adapters/market/sheets-client.js";
import { GitCliAdapter } from "../adapters/git/git-cli.adapter.js";
import { SpawnProcessRunner } from "../adapters/process/spawn-runner.adapter.js";
import type { MarketBreadthDeps } from "../exporter/market-breadth.js";
import type { Logger } from "../observability/logger.js";
import { parseCommand } from "../utils/command.js";
import type { Env, ExporterEnv } from "./env.js";

/**
 * Sync container — the job plus what the scheduler needs to know about it.
 */
export interface SyncContainer {
  job: SyncJob;
  /** Clone mode runs are isolated and may overlap */
  allowOverlap: boolean;
  mode: "clone" | "in-place";
}

/**
 * Build the sync container from validated env and logger.
 */
export function createSyncContainer(config: Env, logger: Logger): SyncContainer {
  const git = new GitCliAdapter(
    {
      repoUrl: config.SYNC_REPO_URL,
      workdir: config.SYNC_WORKDIR,
      branch: config.SYNC_BRANCH,
      token: config.SYNC_GIT_TOKEN,
    },
    logger.child({ component: "git" })
  );

  const script = parseCommand(config.SYNC_SCRIPT_COMMAND);
  if (!script) {
    throw new Error("SYNC_SCRIPT_COMMAND must not be empty");
  }

  const job = createSyncJob(
    {
      workspaces: git,
      git,
      runner: new SpawnProcessRunner(logger.child({ component: "process" })),
      scanner: new CsvGlobScanner(),
      logger: logger.child({ component: "sync-job" }),
    },
    {
      install: parseCommand(config.SYNC_INSTALL_COMMAND),
      script,
      secret: {
        name: config.SYNC_SECRET_NAME,
        value: config.SYNC_SECRET_VALUE,
      },
      commitMessage: config.SYNC_COMMIT_MESSAGE,
      identity: { name: config.SYNC_BOT_NAME, email: config.SYNC_BOT_EMAIL },
    }
  );

  return { job, allowOverlap: git.mode === "clone", mode: git.mode };
}

/**
 * Build exporter deps. Credentials are parsed here so a bad key fails before any fetch.
 */
export function createExporterDeps(
  config: ExporterEnv,
  logger: Logger
): MarketBreadthDeps {
  return {
    source: new NseClient(
      { baseUrl: config.NSE_BASE_URL, timeoutMs: config.NSE_TIMEOUT_MS },
      logger.child({ component: "nse" })
    ),
    sheets: new SheetsClient(
      new ServiceAccountTokenProvider(config.GOOGLE_SHEETS_CREDENTIALS),
      logger.child({ component: "sheets" })
    ),
    writeCsv,
    spreadsheetId: config.SHEET_ID,
    outputDir: config.EXPORT_OUTPUT_DIR,
    logger,
  };
}

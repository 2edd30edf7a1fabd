// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/core/types`
 * Purpose: Shared sync job type definitions and constants (logic-free).
 * Scope: Defines trigger, identity, run status and result shapes. Does not contain logic.
 * Invariants:
 * - ONLY exports: enums (as const arrays), literal union types, interfaces and constants
 * - FORBIDDEN: functions, computations, I/O
 * Side-effects: none (constants and types only)
 * Links: packages/csv-sync-core/src/sync-job.ts
 * @public
 */

/**
 * What started a run. Recorded on the result and on every log line.
 */
export const SYNC_TRIGGERS = ["schedule", "manual"] as const;

export type SyncTrigger = (typeof SYNC_TRIGGERS)[number];

/**
 * Terminal success statuses of a run. Failures surface as thrown errors.
 * - committed: CSV changes were committed and pushed
 * - no_csv_files: the tree held no CSV files, nothing was staged
 * - no_changes: CSV files exist but match HEAD, no commit was created
 */
export const SYNC_RUN_STATUSES = [
  "committed",
  "no_csv_files",
  "no_changes",
] as const;

export type SyncRunStatus = (typeof SYNC_RUN_STATUSES)[number];

/** Author and committer used for every automated commit. */
export interface BotIdentity {
  readonly name: string;
  readonly email: string;
}

export const DEFAULT_BOT_IDENTITY: BotIdentity = {
  name: "github-actions[bot]",
  email: "41898282+github-actions[bot]@users.noreply.github.com",
};

export const DEFAULT_COMMIT_MESSAGE = "Add or update CSV files";

export const NO_CSV_FILES_MESSAGE = "No CSV files found. No changes to commit.";

export const NO_CSV_CHANGES_MESSAGE =
  "CSV files unchanged. No changes to commit.";

/**
 * A command line split into executable + args. Never run through a shell.
 */
export interface CommandSpec {
  readonly command: string;
  readonly args: readonly string[];
}

/** Credential handed to the script through its process environment. */
export interface SecretInput {
  /** Env var name the script reads (e.g. GOOGLE_SHEETS_CREDENTIALS) */
  readonly name: string;
  /** Secret value (never logged) */
  readonly value: string;
}

/**
 * Outcome of a successful run.
 */
export interface SyncRunResult {
  readonly runId: string;
  readonly trigger: SyncTrigger;
  readonly branch: string;
  readonly status: SyncRunStatus;
  /** Every CSV path found at job end, repo-relative and sorted */
  readonly csvFiles: readonly string[];
  /** CSV paths that entered the commit (empty unless status=committed) */
  readonly committedFiles: readonly string[];
  readonly commitSha: string | null;
  readonly startedAt: Date;
  readonly finishedAt: Date;
}

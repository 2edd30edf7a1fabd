// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/core`
 * Purpose: Sync job core: types, port interfaces, step errors and the job pipeline.
 * Scope: Pure orchestration over ports. Does not contain adapters or I/O.
 * Invariants:
 * - FORBIDDEN: imports from services/, child_process, fs, network clients
 * - ALLOWED: types, interfaces, error classes, port-driven orchestration
 * Side-effects: none
 * @public
 */

// Errors
export {
  CheckoutError,
  DependencyInstallError,
  isCheckoutError,
  isDependencyInstallError,
  isPushRejectedError,
  isScriptFailedError,
  PushRejectedError,
  ScriptFailedError,
  SPAWN_FAILURE_EXIT_CODE,
  SYNC_STEPS,
  type SyncStep,
} from "./errors.js";
// Ports
export type {
  ArtifactScanner,
  CommitRequest,
  GitCommitPort,
  ProcessRunner,
  ProcessRunRequest,
  ProcessRunResult,
  Workspace,
  WorkspaceProvider,
} from "./ports/index.js";
// Job
export {
  createSyncJob,
  formatCommand,
  type LoggerLike,
  type SyncJob,
  type SyncJobConfig,
  type SyncJobDeps,
  type SyncRunParams,
} from "./sync-job.js";
// Types
export {
  type BotIdentity,
  type CommandSpec,
  DEFAULT_BOT_IDENTITY,
  DEFAULT_COMMIT_MESSAGE,
  NO_CSV_CHANGES_MESSAGE,
  NO_CSV_FILES_MESSAGE,
  type SecretInput,
  SYNC_RUN_STATUSES,
  SYNC_TRIGGERS,
  type SyncRunResult,
  type SyncRunStatus,
  type SyncTrigger,
} from "./types.js";

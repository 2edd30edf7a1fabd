// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/core/errors`
 * Purpose: Step failure errors raised by the sync job pipeline.
 * Scope: One error class per failing step plus name-based type guards. Does not contain recovery logic.
 * Invariants:
 * - Every step failure halts the run; none of these are retried
 * - Guards match on `name` so errors survive module duplication
 * Side-effects: none
 * Links: packages/csv-sync-core/src/sync-job.ts
 * @public
 */

/**
 * Pipeline step names, in execution order.
 */
export const SYNC_STEPS = [
  "checkout",
  "install",
  "script",
  "scan",
  "stage",
  "commit",
  "push",
] as const;

export type SyncStep = (typeof SYNC_STEPS)[number];

/** Exit code recorded when a step's command could not be started at all. */
export const SPAWN_FAILURE_EXIT_CODE = -1;

/**
 * Raised when a clean working tree cannot be obtained.
 */
export class CheckoutError extends Error {
  constructor(
    public readonly branch: string | undefined,
    options?: { cause?: unknown }
  ) {
    super(
      branch
        ? `Failed to check out branch "${branch}"`
        : "Failed to check out repository",
      options
    );
    this.name = "CheckoutError";
  }
}

/**
 * Raised when the dependency install command exits non-zero or cannot be started.
 */
export class DependencyInstallError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    options?: { cause?: unknown }
  ) {
    super(
      exitCode === SPAWN_FAILURE_EXIT_CODE
        ? `Dependency install "${command}" could not be started`
        : `Dependency install "${command}" failed with exit code ${exitCode}`,
      options
    );
    this.name = "DependencyInstallError";
  }
}

/**
 * Raised when the data script exits non-zero or cannot be started. No git operation follows.
 */
export class ScriptFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    options?: { cause?: unknown }
  ) {
    super(
      exitCode === SPAWN_FAILURE_EXIT_CODE
        ? `Script "${command}" could not be started`
        : `Script "${command}" failed with exit code ${exitCode}`,
      options
    );
    this.name = "ScriptFailedError";
  }
}

/**
 * Raised when the push is rejected. The local commit already exists.
 */
export class PushRejectedError extends Error {
  constructor(
    public readonly branch: string,
    public readonly commitSha: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Push of ${commitSha.slice(0, 7)} to "${branch}" was rejected`,
      options
    );
    this.name = "PushRejectedError";
  }
}

export function isCheckoutError(error: unknown): error is CheckoutError {
  return error instanceof Error && error.name === "CheckoutError";
}

export function isDependencyInstallError(
  error: unknown
): error is DependencyInstallError {
  return error instanceof Error && error.name === "DependencyInstallError";
}

export function isScriptFailedError(
  error: unknown
): error is ScriptFailedError {
  return error instanceof Error && error.name === "ScriptFailedError";
}

export function isPushRejectedError(
  error: unknown
): error is PushRejectedError {
  return error instanceof Error && error.name === "PushRejectedError";
}

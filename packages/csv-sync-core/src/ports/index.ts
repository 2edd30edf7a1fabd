// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/core/ports`
 * Purpose: Sync job ports barrel export.
 * Scope: Re-exports all port interfaces. Does not contain implementations.
 * Invariants: All exports are interfaces only.
 * Side-effects: none
 * @public
 */

export type { ArtifactScanner } from "./artifact-scanner.port.js";
export type { CommitRequest, GitCommitPort } from "./git-commit.port.js";
export type {
  ProcessRunner,
  ProcessRunRequest,
  ProcessRunResult,
} from "./process-runner.port.js";
export type { Workspace, WorkspaceProvider } from "./workspace.port.js";

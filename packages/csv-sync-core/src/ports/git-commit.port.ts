// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/core/ports/git-commit`
 * Purpose: Git port for staging, committing and pushing CSV artifacts.
 * Scope: Defines contract for index and remote operations. Does not contain implementations.
 * Invariants:
 * - commit() only records the paths it is given, whatever else is staged or dirty
 * - commit() applies the identity as both author and committer
 * - push() targets the originating branch; no force push
 * Side-effects: none (interface definition only)
 * Links: services/csv-sync-worker/src/adapters/git/git-cli.adapter.ts
 * @public
 */

import type { BotIdentity } from "../types.js";

export interface CommitRequest {
  readonly message: string;
  readonly identity: BotIdentity;
  readonly paths: readonly string[];
}

export interface GitCommitPort {
  /** Adds the paths to the index. */
  stage: (root: string, paths: readonly string[]) => Promise<void>;
  /** Returns the subset of paths whose staged content differs from HEAD. */
  stagedChanges: (
    root: string,
    paths: readonly string[]
  ) => Promise<readonly string[]>;
  /** Creates the commit and returns its full sha. */
  commit: (root: string, request: CommitRequest) => Promise<string>;
  /** Pushes HEAD to the branch on origin. */
  push: (root: string, branch: string) => Promise<void>;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/core/ports/workspace`
 * Purpose: Workspace provider port for obtaining a clean working tree per run.
 * Scope: Defines contract for checkout and disposal. Does not contain implementations.
 * Invariants:
 * - prepare() returns a tree at the remote branch head with no local changes
 * - dispose() is idempotent and always called by the job, also on failure
 * Side-effects: none (interface definition only)
 * Links: services/csv-sync-worker/src/adapters/git/git-cli.adapter.ts
 * @public
 */

/**
 * A checked-out working tree owned by a single run.
 */
export interface Workspace {
  /** Absolute path to the working tree root */
  readonly root: string;
  /** Branch the tree was checked out from (push target) */
  readonly branch: string;
  /** Releases the tree (removes ephemeral clones, no-op for in-place trees) */
  dispose: () => Promise<void>;
}

export interface WorkspaceProvider {
  /**
   * Obtains a clean copy of the repository at the branch head.
   * @param branch - Branch override; the provider's configured or current branch when omitted
   * @throws CheckoutError when the tree cannot be prepared
   */
  prepare: (branch?: string) => Promise<Workspace>;
}

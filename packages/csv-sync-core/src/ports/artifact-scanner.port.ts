// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/core/ports/artifact-scanner`
 * Purpose: Port for enumerating CSV artifacts in a working tree.
 * Invariants: Paths are repo-relative, POSIX separated, sorted, and never include `.git/`.
 * Side-effects: none (interface definition only)
 * @public
 */

export interface ArtifactScanner {
  findCsvFiles: (root: string) => Promise<readonly string[]>;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/adapters/artifacts/csv-glob`
 * Purpose: ArtifactScanner that finds every `.csv` file under a working tree.
 * Scope: Recursive fast-glob search, dot directories included, `.git/` excluded.
 * Invariants: Returned paths are repo-relative, POSIX separated and sorted.
 * Side-effects: IO (filesystem reads)
 * @internal
 */

import type { ArtifactScanner } from "@csv-sync/core";
import fg from "fast-glob";

export const CSV_PATTERN = "**/*.csv";

export class CsvGlobScanner implements ArtifactScanner {
  findCsvFiles = async (root: string): Promise<readonly string[]> => {
    const paths = await fg(CSV_PATTERN, {
      cwd: root,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      ignore: ["**/.git/**"],
    });
    return paths.sort();
  };
}

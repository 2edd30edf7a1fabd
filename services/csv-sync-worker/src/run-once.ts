// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/run-once`
 * Purpose: Manual trigger CLI — performs one sync run and exits with its status.
 * Scope: Entry point only. Usage: run-once [--branch <name>]
 * Invariants: Exit 0 for committed / no_csv_files / no_changes; exit 1 on any step failure.
 * Side-effects: IO (git, child processes), process exit
 * Links: bootstrap/container.ts
 * @public
 */

import { createSyncContainer } from "./bootstrap/container.js";
import { env } from "./bootstrap/env.js";
import { flushLogger, makeLogger } from "./observability/logger.js";

export function parseRunOnceArgs(argv: readonly string[]): { branch?: string } {
  const index = argv.indexOf("--branch");
  if (index === -1) return {};
  const branch = argv[index + 1];
  if (!branch || branch.startsWith("--")) {
    throw new Error("Usage: run-once [--branch <name>]");
  }
  return { branch };
}

async function main(): Promise<void> {
  const { branch } = parseRunOnceArgs(process.argv.slice(2));
  const logger = makeLogger();
  const container = createSyncContainer(env(), logger);

  const result = await container.job({ trigger: "manual", branch });
  logger.info(
    {
      runId: result.runId,
      status: result.status,
      committedFiles: result.committedFiles,
      commitSha: result.commitSha,
    },
    "Manual sync run finished"
  );
  flushLogger();
}

const bootLogger = makeLogger({ phase: "run-once" });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Sync run failed");
  flushLogger();
  process.exit(1);
});

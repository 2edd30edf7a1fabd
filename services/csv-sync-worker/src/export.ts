// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/export`
 * Purpose: Market breadth exporter entry point (the data script the sync job can run).
 * Scope: Reads exporter env, runs exportMarketBreadth, exits non-zero on failure.
 * Side-effects: IO (HTTP, filesystem), process exit
 * Links: exporter/market-breadth.ts
 * @public
 */

import { createExporterDeps } from "./bootstrap/container.js";
import { exporterEnv } from "./bootstrap/env.js";
import { exportMarketBreadth } from "./exporter/market-breadth.js";
import { flushLogger, makeLogger } from "./observability/logger.js";

async function main(): Promise<void> {
  const logger = makeLogger({ phase: "export" });
  const deps = createExporterDeps(exporterEnv(), logger);
  const written = await exportMarketBreadth(deps);
  logger.info({ files: written }, "Market breadth export finished");
  flushLogger();
}

main().catch((err: unknown) => {
  makeLogger({ phase: "export" }).fatal({ err }, "Market breadth export failed");
  flushLogger();
  process.exit(1);
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers. Does not handle per-run bindings (callers use child()).
 * Invariants: Always emits JSON to stdout; silenced under Vitest / NODE_ENV=test. Safe to call at module scope (no env validation).
 * Side-effects: none
 * Notes: Reads logging-specific env vars directly (NODE_ENV, LOG_LEVEL, SERVICE_NAME) so that env() validation is not triggered at module load.
 * Links: observability/redact.ts
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

let destination: ReturnType<typeof pino.destination> | undefined;

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = process.env.LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "csv-sync-worker";

  const config = {
    level,
    enabled: !(isVitest || nodeEnv === "test"),
    // Stable base: bindings first, then reserved keys (prevents overwrite)
    base: { ...bindings, service: serviceName },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  destination ??= pino.destination({
    dest: 1,
    sync: nodeEnv !== "production",
    minLength: 4096,
  });
  return pino(config, destination);
}

/**
 * Flushes buffered output before process.exit (async destination in production).
 */
export function flushLogger(): void {
  destination?.flushSync();
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

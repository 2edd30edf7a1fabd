// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/utils/command`
 * Purpose: Splits configured command strings into executable + args.
 * Scope: Whitespace splitting only; no quoting, globbing or variable expansion (commands never run through a shell).
 * Side-effects: none
 * @internal
 */

import type { CommandSpec } from "@csv-sync/core";

/**
 * Returns null for a blank string (step disabled).
 */
export function parseCommand(line: string): CommandSpec | null {
  const [command, ...args] = line.trim().split(/\s+/).filter(Boolean);
  if (!command) return null;
  return { command, args };
}

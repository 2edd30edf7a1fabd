// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/core/ports/process-runner`
 * Purpose: Child process port used for the install and script steps.
 * Scope: Defines the run contract. Does not contain implementations.
 * Invariants:
 * - Resolves with the exit code; never rejects on a non-zero exit
 * - Rejects only when the process cannot be started
 * Side-effects: none (interface definition only)
 * @public
 */

export interface ProcessRunRequest {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  /** Extra env vars layered over the inherited environment */
  readonly env?: Readonly<Record<string, string>>;
  /** Values masked in any captured output */
  readonly redact?: readonly string[];
  /** Short label for logs (e.g. "install", "script") */
  readonly label: string;
}

export interface ProcessRunResult {
  readonly exitCode: number;
}

export interface ProcessRunner {
  run: (request: ProcessRunRequest) => Promise<ProcessRunResult>;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/adapters/process/spawn-runner`
 * Purpose: ProcessRunner over child_process.spawn for the install and script steps.
 * Scope: Starts the command without a shell, forwards its output to the logger line by line. Does not interpret exit codes.
 * Invariants:
 *   - Child env = inherited process env + request.env
 *   - Redacted values, and each line of a multi-line value, never reach the logger
 *   - Killed / signalled children resolve with exit code 1
 * Side-effects: IO (subprocess execution)
 * Links: packages/csv-sync-core/src/ports/process-runner.port.ts
 * @internal
 */

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

import type {
  ProcessRunner,
  ProcessRunRequest,
  ProcessRunResult,
} from "@csv-sync/core";
import type { Logger } from "pino";

/**
 * The slice of a spawned child the runner relies on.
 */
export interface SpawnedProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): unknown;
}

export type SpawnFn = (
  command: string,
  args: string[],
  options: { cwd: string; env: NodeJS.ProcessEnv }
) => SpawnedProcess;

const spawnPiped: SpawnFn = (command, args, options) =>
  spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ["ignore", "pipe", "pipe"],
  });

/** Shorter secret lines (lone braces, brackets) are left visible. */
export const MIN_MASKED_LINE_LENGTH = 4;

/**
 * Output is masked line by line, so a multi-line secret is masked as a whole
 * and as each of its trimmed lines. Longest first.
 */
export function expandSecrets(secrets: readonly string[]): string[] {
  const values = new Set<string>();
  for (const secret of secrets) {
    if (secret.length === 0) continue;
    values.add(secret);
    for (const line of secret.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (trimmed.length >= MIN_MASKED_LINE_LENGTH) values.add(trimmed);
    }
  }
  return [...values].sort((a, b) => b.length - a.length);
}

export function maskSecrets(line: string, secrets: readonly string[]): string {
  return secrets
    .filter((secret) => secret.length > 0)
    .reduce((masked, secret) => masked.split(secret).join("[REDACTED]"), line);
}

export class SpawnProcessRunner implements ProcessRunner {
  constructor(
    private readonly log: Logger,
    private readonly spawnFn: SpawnFn = spawnPiped
  ) {}

  run = (request: ProcessRunRequest): Promise<ProcessRunResult> => {
    const log = this.log.child({ label: request.label });
    const redact = expandSecrets(request.redact ?? []);

    return new Promise<ProcessRunResult>((resolve, reject) => {
      const child = this.spawnFn(request.command, [...request.args], {
        cwd: request.cwd,
        env: { ...process.env, ...request.env },
      });

      const forward = (stream: Readable, level: "info" | "warn") => {
        const lines = createInterface({ input: stream, crlfDelay: Infinity });
        lines.on("line", (line) => {
          log[level](
            { stream: level === "info" ? "stdout" : "stderr" },
            maskSecrets(line, redact)
          );
        });
      };
      forward(child.stdout, "info");
      forward(child.stderr, "warn");

      child.on("error", reject);
      child.on("close", (code, signal) => {
        if (signal) {
          log.warn({ signal }, "Process terminated by signal");
        }
        resolve({ exitCode: code ?? 1 });
      });
    });
  };
}

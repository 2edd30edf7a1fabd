// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/core/sync-job`
 * Purpose: The sync job pipeline: checkout, install, script, scan, then conditional commit and push.
 * Scope: Orchestrates ports in a fixed order. Does not perform I/O itself; all effects go through injected ports.
 * Invariants:
 * - FAIL_FAST: a failing step throws and no later step runs
 * - NO_GIT_ON_SCRIPT_FAILURE: install/script failures never reach stage/commit/push
 * - NO_EMPTY_COMMITS: commit only when at least one staged CSV differs from HEAD
 * - CSV_ONLY_COMMITS: the commit carries exactly the changed CSV paths
 * - FIXED_IDENTITY: every commit uses the configured bot identity, whatever the trigger
 * - Workspace disposed in finally, also on failure
 * Side-effects: none directly (delegated to ports)
 * Links: packages/csv-sync-core/src/ports/index.ts
 * @public
 */

import { randomUUID } from "node:crypto";

import {
  DependencyInstallError,
  PushRejectedError,
  ScriptFailedError,
  SPAWN_FAILURE_EXIT_CODE,
  type SyncStep,
} from "./errors.js";
import type {
  ArtifactScanner,
  GitCommitPort,
  ProcessRunner,
  ProcessRunRequest,
  WorkspaceProvider,
} from "./ports/index.js";
import {
  type BotIdentity,
  type CommandSpec,
  NO_CSV_CHANGES_MESSAGE,
  NO_CSV_FILES_MESSAGE,
  type SecretInput,
  type SyncRunResult,
  type SyncTrigger,
} from "./types.js";

/**
 * Logger interface expected by the job.
 * Compatible with pino's Logger type.
 */
export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug?(obj: Record<string, unknown>, msg?: string): void;
  child?(bindings: Record<string, unknown>): LoggerLike;
}

export interface SyncJobDeps {
  workspaces: WorkspaceProvider;
  runner: ProcessRunner;
  scanner: ArtifactScanner;
  git: GitCommitPort;
  logger: LoggerLike;
  /** Clock (default: new Date()) */
  now?: () => Date;
  /** Run id factory (default: randomUUID) */
  createRunId?: () => string;
}

/**
 * Static job configuration, fixed for the lifetime of a worker.
 */
export interface SyncJobConfig {
  /** Dependency install command; null skips the step */
  install: CommandSpec | null;
  script: CommandSpec;
  secret: SecretInput;
  commitMessage: string;
  identity: BotIdentity;
}

export interface SyncRunParams {
  trigger: SyncTrigger;
  /** Branch override; the workspace provider decides when omitted */
  branch?: string;
}

export type SyncJob = (params: SyncRunParams) => Promise<SyncRunResult>;

export function formatCommand(command: CommandSpec): string {
  return [command.command, ...command.args].join(" ");
}

/**
 * Creates the sync job with injected dependencies.
 * The returned function performs one complete run per call.
 */
export function createSyncJob(deps: SyncJobDeps, config: SyncJobConfig): SyncJob {
  const { workspaces, runner, scanner, git } = deps;
  const now = deps.now ?? (() => new Date());
  const createRunId = deps.createRunId ?? randomUUID;

  /**
   * Runs a step command. A non-zero exit, or a command that cannot be
   * started (exit code SPAWN_FAILURE_EXIT_CODE), becomes the step's error.
   */
  async function runStep(
    request: ProcessRunRequest,
    toError: (exitCode: number, options?: { cause?: unknown }) => Error
  ): Promise<void> {
    let exitCode: number;
    try {
      ({ exitCode } = await runner.run(request));
    } catch (cause) {
      throw toError(SPAWN_FAILURE_EXIT_CODE, { cause });
    }
    if (exitCode !== 0) {
      throw toError(exitCode);
    }
  }

  return async function runSyncJob(params) {
    const runId = createRunId();
    const startedAt = now();
    const runLog =
      deps.logger.child?.({ runId, trigger: params.trigger }) ?? deps.logger;
    const stepLog = (step: SyncStep) => runLog.child?.({ step }) ?? runLog;

    runLog.info({ runId, trigger: params.trigger }, "Sync run started");

    const workspace = await workspaces.prepare(params.branch);
    const { root, branch } = workspace;
    stepLog("checkout").info({ root, branch }, "Working tree ready");

    try {
      if (config.install) {
        const command = formatCommand(config.install);
        stepLog("install").info({ command }, "Installing dependencies");
        await runStep(
          {
            command: config.install.command,
            args: config.install.args,
            cwd: root,
            label: "install",
          },
          (exitCode, options) =>
            new DependencyInstallError(command, exitCode, options)
        );
      }

      const scriptCommand = formatCommand(config.script);
      stepLog("script").info(
        { command: scriptCommand, secretName: config.secret.name },
        "Running script"
      );
      await runStep(
        {
          command: config.script.command,
          args: config.script.args,
          cwd: root,
          env: { [config.secret.name]: config.secret.value },
          redact: [config.secret.value],
          label: "script",
        },
        (exitCode, options) =>
          new ScriptFailedError(scriptCommand, exitCode, options)
      );

      const csvFiles = await scanner.findCsvFiles(root);
      stepLog("scan").info({ count: csvFiles.length }, "CSV files enumerated");

      const finish = (
        status: SyncRunResult["status"],
        committedFiles: readonly string[],
        commitSha: string | null
      ): SyncRunResult => {
        const result: SyncRunResult = {
          runId,
          trigger: params.trigger,
          branch,
          status,
          csvFiles,
          committedFiles,
          commitSha,
          startedAt,
          finishedAt: now(),
        };
        runLog.info(
          { status, committed: committedFiles.length, commitSha },
          "Sync run finished"
        );
        return result;
      };

      if (csvFiles.length === 0) {
        runLog.info({}, NO_CSV_FILES_MESSAGE);
        return finish("no_csv_files", [], null);
      }

      await git.stage(root, csvFiles);
      const changed = await git.stagedChanges(root, csvFiles);
      stepLog("stage").info(
        { staged: csvFiles.length, changed: changed.length },
        "CSV files staged"
      );
      if (changed.length === 0) {
        runLog.info({}, NO_CSV_CHANGES_MESSAGE);
        return finish("no_changes", [], null);
      }

      const commitSha = await git.commit(root, {
        message: config.commitMessage,
        identity: config.identity,
        paths: changed,
      });
      stepLog("commit").info(
        { commitSha, files: changed, author: config.identity.name },
        "Commit created"
      );

      try {
        await git.push(root, branch);
      } catch (cause) {
        throw new PushRejectedError(branch, commitSha, { cause });
      }
      stepLog("push").info({ branch, commitSha }, "Pushed to remote");

      return finish("committed", changed, commitSha);
    } finally {
      await workspace.dispose();
    }
  };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/adapters/git/git-cli`
 * Purpose: Git CLI adapter — clean checkout per run, CSV staging, bot-identity commit and push.
 * Scope: Spawns `git` with fixed flags (no shell). Implements WorkspaceProvider and GitCommitPort. Does NOT decide whether to commit.
 * Invariants:
 *   - CLONE_MODE_EPHEMERAL: with a repo URL, every prepare() clones into a fresh temp dir removed by dispose()
 *   - IN_PLACE_RESET: without one, the existing checkout is hard-reset to origin/<branch> (ignored files kept)
 *   - TOKEN_VIA_ASKPASS: the git token is passed to git through GIT_ASKPASS + env, never in args or on disk
 *   - IDENTITY_VIA_ENV: author and committer come from GIT_AUTHOR_* / GIT_COMMITTER_* env on the commit call
 *   - PATH_LIMITED_COMMIT: `git commit -- <paths>` records only the listed paths
 *   - IGNORED_NOT_STAGED: untracked paths matched by .gitignore are skipped by stage()
 * Side-effects: IO (subprocess execution, temp directories)
 * Links: packages/csv-sync-core/src/ports/workspace.port.ts, packages/csv-sync-core/src/ports/git-commit.port.ts
 * @internal
 */

import { execFile } from "node:child_process";
import { chmod, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { promisify } from "node:util";

import {
  CheckoutError,
  type CommitRequest,
  type GitCommitPort,
  type Workspace,
  type WorkspaceProvider,
} from "@csv-sync/core";
import type { Logger } from "pino";

const execFileAsync = promisify(execFile);

const DEFAULT_TIMEOUT_MS = 120_000;

export interface GitExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

/**
 * Runs `git <args>` and resolves with stdout. Rejects on non-zero exit.
 */
export type GitExec = (
  args: readonly string[],
  options: GitExecOptions
) => Promise<{ stdout: string }>;

export const execGit: GitExec = async (args, options) => {
  try {
    const { stdout } = await execFileAsync("git", [...args], {
      cwd: options.cwd,
      env: options.env,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxBuffer: 10 * 1024 * 1024, // 10MB
    });
    return { stdout };
  } catch (error) {
    if (
      error instanceof Error &&
      "code" in error &&
      error.code === "ENOENT"
    ) {
      throw new Error(
        "git binary not found. Ensure git is installed and available in PATH."
      );
    }
    throw error;
  }
};

export interface GitCliAdapterConfig {
  /** Remote URL; enables clone mode when set */
  repoUrl?: string;
  /** Existing checkout for in-place mode */
  workdir: string;
  /** Default branch; resolved from the checkout when omitted */
  branch?: string;
  /** HTTPS token for clone/fetch/push (treat as secret) */
  token?: string;
  /** Parent dir for ephemeral clones (default: os.tmpdir()) */
  tmpRoot?: string;
  /** Timeout per git call in ms (default: 120000) */
  timeoutMs?: number;
  /** Git runner override for tests */
  exec?: GitExec;
}

const ASKPASS_SCRIPT = `#!/bin/sh
case "$1" in
  Username*) echo "x-access-token" ;;
  *) echo "$CSV_SYNC_GIT_TOKEN" ;;
esac
`;

export class GitCliAdapter implements WorkspaceProvider, GitCommitPort {
  private readonly exec: GitExec;
  private readonly timeoutMs: number;

  constructor(
    private readonly config: GitCliAdapterConfig,
    private readonly log: Logger
  ) {
    this.exec = config.exec ?? execGit;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get mode(): "clone" | "in-place" {
    return this.config.repoUrl ? "clone" : "in-place";
  }

  // ─────────────────────────────────────────────────────────────────────────
  // WorkspaceProvider
  // ─────────────────────────────────────────────────────────────────────────

  prepare = async (branch?: string): Promise<Workspace> => {
    const requested = branch ?? this.config.branch;
    return this.config.repoUrl
      ? this.prepareClone(this.config.repoUrl, requested)
      : this.prepareInPlace(requested);
  };

  private async prepareClone(
    repoUrl: string,
    branch: string | undefined
  ): Promise<Workspace> {
    const dir = await this.scratchDir("csv-sync-");
    const root = join(dir, "repo");
    const dispose = () => rm(dir, { recursive: true, force: true });

    try {
      this.log.info(
        { branch: branch ?? "(default)", root },
        "Cloning repository"
      );
      await this.withRemoteAuth(dir, (env) =>
        this.git(
          [
            "clone",
            "--depth=1",
            ...(branch ? [`--branch=${branch}`] : []),
            "--",
            repoUrl,
            root,
          ],
          { env }
        )
      );
      const resolved = branch ?? (await this.currentBranch(root));
      return { root, branch: resolved, dispose };
    } catch (cause) {
      await dispose();
      throw new CheckoutError(branch, { cause });
    }
  }

  private async prepareInPlace(branch: string | undefined): Promise<Workspace> {
    const root = resolve(this.config.workdir);
    let resolved = branch;
    try {
      resolved ??= await this.currentBranch(root);
      const target = resolved;
      this.log.info(
        { branch: target, root },
        "Resetting working tree to remote head"
      );

      const scratch = await this.scratchDir("csv-sync-auth-");
      try {
        await this.withRemoteAuth(scratch, (env) =>
          this.git(["fetch", "origin", target], { cwd: root, env })
        );
      } finally {
        await rm(scratch, { recursive: true, force: true });
      }
      await this.git(["checkout", "-B", target, `origin/${target}`], {
        cwd: root,
      });
      await this.git(["reset", "--hard", `origin/${target}`], { cwd: root });
      await this.git(["clean", "-fd"], { cwd: root });

      return { root, branch: target, dispose: async () => {} };
    } catch (cause) {
      throw new CheckoutError(resolved, { cause });
    }
  }

  private async untrackedIgnored(
    root: string,
    paths: readonly string[]
  ): Promise<string[]> {
    const { stdout } = await this.git(
      [
        "ls-files",
        "-z",
        "--others",
        "--ignored",
        "--exclude-standard",
        "--",
        ...paths,
      ],
      { cwd: root }
    );
    return stdout.split("\0").filter(Boolean);
  }

  private async currentBranch(root: string): Promise<string> {
    const { stdout } = await this.git(["rev-parse", "--abbrev-ref", "HEAD"], {
      cwd: root,
    });
    const name = stdout.trim();
    if (!name || name === "HEAD") {
      throw new Error(
        `Working tree at ${root} has a detached HEAD; set SYNC_BRANCH`
      );
    }
    return name;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // GitCommitPort
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Untracked paths matched by .gitignore are left out: `git add` refuses them
   * and they never enter a commit.
   */
  stage = async (root: string, paths: readonly string[]): Promise<void> => {
    const ignored = new Set(await this.untrackedIgnored(root, paths));
    const stageable = paths.filter((path) => !ignored.has(path));
    if (ignored.size > 0) {
      this.log.info(
        { ignored: [...ignored] },
        "Skipping CSV files ignored by .gitignore"
      );
    }
    if (stageable.length === 0) return;
    await this.git(["add", "--", ...stageable], { cwd: root });
  };

  stagedChanges = async (
    root: string,
    paths: readonly string[]
  ): Promise<readonly string[]> => {
    const { stdout } = await this.git(
      ["diff", "--cached", "--name-only", "-z", "--", ...paths],
      { cwd: root }
    );
    return stdout.split("\0").filter(Boolean);
  };

  commit = async (root: string, request: CommitRequest): Promise<string> => {
    const { identity } = request;
    await this.git(
      [
        "-c",
        "commit.gpgsign=false",
        "commit",
        "--no-verify",
        "-m",
        request.message,
        "--",
        ...request.paths,
      ],
      {
        cwd: root,
        env: {
          ...process.env,
          GIT_AUTHOR_NAME: identity.name,
          GIT_AUTHOR_EMAIL: identity.email,
          GIT_COMMITTER_NAME: identity.name,
          GIT_COMMITTER_EMAIL: identity.email,
        },
      }
    );
    const { stdout } = await this.git(["rev-parse", "HEAD"], { cwd: root });
    return stdout.trim();
  };

  push = async (root: string, branch: string): Promise<void> => {
    const scratch = await this.scratchDir("csv-sync-auth-");
    try {
      await this.withRemoteAuth(scratch, (env) =>
        this.git(["push", "origin", `HEAD:refs/heads/${branch}`], {
          cwd: root,
          env,
        })
      );
    } finally {
      await rm(scratch, { recursive: true, force: true });
    }
  };

  // ─────────────────────────────────────────────────────────────────────────
  // Private helpers
  // ─────────────────────────────────────────────────────────────────────────

  private git(args: readonly string[], options: GitExecOptions) {
    const subcommand = args[0] === "-c" ? args[2] : args[0];
    this.log.debug({ subcommand, cwd: options.cwd }, "Running git");
    return this.exec(args, { timeoutMs: this.timeoutMs, ...options });
  }

  private scratchDir(prefix: string): Promise<string> {
    return mkdtemp(join(this.config.tmpRoot ?? tmpdir(), prefix));
  }

  /**
   * Runs a network git call. With a token, installs a GIT_ASKPASS script in
   * `dir` that reads the token from the child env.
   */
  private async withRemoteAuth<T>(
    dir: string,
    fn: (env: NodeJS.ProcessEnv) => Promise<T>
  ): Promise<T> {
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      GIT_TERMINAL_PROMPT: "0",
    };
    if (this.config.token) {
      const askpass = join(dir, "git-askpass.sh");
      await writeFile(askpass, ASKPASS_SCRIPT);
      await chmod(askpass, 0o700);
      env.GIT_ASKPASS = askpass;
      env.CSV_SYNC_GIT_TOKEN = this.config.token;
    }
    return fn(env);
  }
}

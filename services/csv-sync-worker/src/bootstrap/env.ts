// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singletons.
 * Scope: Config parsing only — no client construction, no side-effects beyond process.env read.
 * Invariants:
 * - The secret named by SYNC_SECRET_NAME must be present and non-empty (treat as secret - never log)
 * - SYNC_SCRIPT_COMMAND required (defaulted); SYNC_INSTALL_COMMAND="" disables the install step
 * - Exporter config (GOOGLE_SHEETS_CREDENTIALS, SHEET_ID) is validated separately, only by export.ts
 * - Fails fast with clear errors on invalid config
 * Side-effects: Reads process.env
 * Links: bootstrap/container.ts, export.ts
 * @internal
 */

import { DEFAULT_BOT_IDENTITY, DEFAULT_COMMIT_MESSAGE } from "@csv-sync/core";
import { z } from "zod";

const optionalString = z
  .string()
  .min(1)
  .optional()
  .or(z.literal("").transform(() => undefined));

const EnvSchema = z.object({
  /** Remote to clone per run; in-place mode on SYNC_WORKDIR when unset */
  SYNC_REPO_URL: optionalString,

  /** Existing checkout used in in-place mode (default: cwd) */
  SYNC_WORKDIR: z.string().min(1).default("."),

  /** Branch to sync; current branch (in-place) or remote default (clone) when unset */
  SYNC_BRANCH: optionalString,

  /** Token for clone/push over HTTPS (optional, treat as secret - never log) */
  SYNC_GIT_TOKEN: optionalString,

  /** Dependency install command, split on whitespace; "" disables the step */
  SYNC_INSTALL_COMMAND: z
    .string()
    .default("python -m pip install -r requirements.txt"),

  /** Data script command, split on whitespace */
  SYNC_SCRIPT_COMMAND: z
    .string()
    .trim()
    .min(1, "SYNC_SCRIPT_COMMAND must not be empty")
    .default("python advdec.py"),

  /** Env var name the script reads its credential from */
  SYNC_SECRET_NAME: z
    .string()
    .regex(
      /^[A-Za-z_][A-Za-z0-9_]*$/,
      "SYNC_SECRET_NAME must be a valid environment variable name"
    )
    .default("GOOGLE_SHEETS_CREDENTIALS"),

  SYNC_COMMIT_MESSAGE: z.string().min(1).default(DEFAULT_COMMIT_MESSAGE),

  /** Bot author/committer identity (fixed per deployment) */
  SYNC_BOT_NAME: z.string().min(1).default(DEFAULT_BOT_IDENTITY.name),
  SYNC_BOT_EMAIL: z.string().min(1).default(DEFAULT_BOT_IDENTITY.email),

  /** Cron expression for scheduled runs (default: 11:00 on weekdays) */
  SYNC_CRON: z.string().min(1).default("0 11 * * 1-5"),

  /** IANA timezone the cron expression is evaluated in */
  SYNC_TIMEZONE: z.string().min(1).default("UTC"),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: csv-sync-worker) */
  SERVICE_NAME: z.string().default("csv-sync-worker"),

  /** Health/dispatch endpoint port (default: 9000) */
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
});

export type Env = z.infer<typeof EnvSchema> & {
  /** Value of the env var named by SYNC_SECRET_NAME */
  readonly SYNC_SECRET_VALUE: string;
};

const ExporterEnvSchema = z.object({
  /** Service-account JSON (string) for Google Sheets (required, treat as secret) */
  GOOGLE_SHEETS_CREDENTIALS: z
    .string({
      required_error: "GOOGLE_SHEETS_CREDENTIALS environment variable is not set.",
    })
    .min(1, "GOOGLE_SHEETS_CREDENTIALS environment variable is not set."),

  /** Target spreadsheet id (required) */
  SHEET_ID: z
    .string({ required_error: "SHEET_ID is required" })
    .min(1, "SHEET_ID is required"),

  /** Directory the CSV files are written to (default: cwd) */
  EXPORT_OUTPUT_DIR: z.string().min(1).default("."),

  /** NSE site root (overridable for proxies) */
  NSE_BASE_URL: z.string().url().default("https://www.nseindia.com"),

  /** Request timeout per NSE call in ms */
  NSE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
});

export type ExporterEnv = z.infer<typeof ExporterEnvSchema>;

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => `  ${e.path.join(".")}: ${e.message}`)
    .join("\n");
}

/**
 * Parses worker config from an env source. Pure; used by env() and tests.
 * Throws on invalid config with one line per problem.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    throw new Error(
      `Invalid environment configuration:\n${formatIssues(result.error)}`
    );
  }
  const secretName = result.data.SYNC_SECRET_NAME;
  const secretValue = source[secretName];
  if (!secretValue) {
    throw new Error(
      `Invalid environment configuration:\n  ${secretName}: secret is required (named by SYNC_SECRET_NAME)`
    );
  }
  return { ...result.data, SYNC_SECRET_VALUE: secretValue };
}

/**
 * Parses exporter config from an env source.
 */
export function parseExporterEnv(source: NodeJS.ProcessEnv): ExporterEnv {
  const result = ExporterEnvSchema.safeParse(source);
  if (!result.success) {
    throw new Error(
      `Invalid environment configuration:\n${formatIssues(result.error)}`
    );
  }
  return result.data;
}

let _env: Env | null = null;
let _exporterEnv: ExporterEnv | null = null;

/**
 * Returns validated worker environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}

/**
 * Returns validated exporter environment singleton.
 */
export function exporterEnv(): ExporterEnv {
  if (!_exporterEnv) {
    _exporterEnv = parseExporterEnv(process.env);
  }
  return _exporterEnv;
}

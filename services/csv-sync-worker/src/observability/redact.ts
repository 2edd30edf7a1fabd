// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/observability/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by logger module; defines sensitive path patterns.
 * @internal
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "access_token",
  "secret",
  "apiKey",
  "privateKey",
  "private_key",
  "credentials",
  // Worker specific secrets
  "gitToken",
  "secretValue",
  "config.secret.value",
  "env.GOOGLE_SHEETS_CREDENTIALS",
  "env.SYNC_GIT_TOKEN",
  "GOOGLE_SHEETS_CREDENTIALS",
  "SYNC_GIT_TOKEN",
  // HTTP headers
  "headers.authorization",
  "headers.cookie",
  "req.headers.authorization",
];

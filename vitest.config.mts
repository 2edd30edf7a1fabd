// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for every workspace package.
 * Scope: Unit tests only; nothing here needs git, a network or a running server.
 * Invariants: Tests import describe/it/expect from "vitest".
 * Side-effects: none
 * @public
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "packages/*/tests/**/*.{test,spec}.ts",
      "services/*/tests/**/*.{test,spec}.ts",
    ],
    exclude: ["node_modules", "dist"],
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/health`
 * Purpose: Health and manual-dispatch HTTP server.
 * Scope: /livez (liveness), /readyz (readiness), /version, POST /dispatch (manual trigger).
 * Invariants:
 * - /livez always returns 200 (process alive)
 * - /readyz returns 200 only when ready=true, 503 otherwise
 * - POST /dispatch returns 202 when a run started, 409 when rejected, 503 before ready
 * Side-effects: Binds HTTP server to HEALTH_PORT
 * Links: scheduler.ts, main.ts
 * @internal
 */

import { createServer, type Server, type ServerResponse } from "node:http";

import type { DispatchResult } from "./scheduler.js";

export interface HealthState {
  ready: boolean;
}

export interface HealthServerOptions {
  /** Manual trigger hook; POST /dispatch answers 404 without it */
  onDispatch?: () => DispatchResult;
}

/** Build metadata from env vars (set at build time or runtime) */
const versionInfo = {
  sha: process.env.GIT_SHA ?? "unknown",
  service: "csv-sync-worker",
  buildTs: process.env.BUILD_TS ?? "unknown",
};

export interface HealthReply {
  status: number;
  body: string | Record<string, unknown>;
  headers?: Record<string, string>;
}

/**
 * Routes one request. Pure apart from calling onDispatch.
 */
export function routeHealthRequest(
  state: HealthState,
  options: HealthServerOptions,
  method: string | undefined,
  url: string | undefined
): HealthReply {
  switch (url) {
    case "/livez":
      return { status: 200, body: "ok" };
    case "/readyz":
      return state.ready
        ? { status: 200, body: "ok" }
        : { status: 503, body: "not ready" };
    case "/version":
      return { status: 200, body: versionInfo };
    case "/dispatch":
      if (!options.onDispatch) break;
      if (method !== "POST") {
        return {
          status: 405,
          body: "method not allowed",
          headers: { Allow: "POST" },
        };
      }
      if (!state.ready) {
        return { status: 503, body: { accepted: false, reason: "not_ready" } };
      }
      return replyToDispatch(options.onDispatch());
  }
  return { status: 404, body: "not found" };
}

function replyToDispatch(result: DispatchResult): HealthReply {
  return result.accepted
    ? { status: 202, body: { accepted: true, trigger: "manual" } }
    : { status: 409, body: { accepted: false, reason: result.reason } };
}

function send(res: ServerResponse, reply: HealthReply): void {
  const json = typeof reply.body !== "string";
  res.writeHead(reply.status, {
    "Content-Type": json ? "application/json" : "text/plain",
    ...reply.headers,
  });
  res.end(
    typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body)
  );
}

export function createHealthServer(
  state: HealthState,
  options: HealthServerOptions = {}
): Server {
  return createServer((req, res) => {
    send(res, routeHealthRequest(state, options, req.method, req.url));
  });
}

export function startHealthServer(
  state: HealthState,
  port: number,
  options?: HealthServerOptions
): Server {
  const server = createHealthServer(state, options);
  server.listen(port);
  return server;
}

/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests create the app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { LedgerService } from "./services/ledger-service.js";
import { createErrorEnvelope } from "./types/error.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  authMiddleware,
  headerActorMiddleware,
  requireMethodPermission,
} from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createPayableRoutes } from "./routes/payables.js";
import { createReceivableRoutes } from "./routes/receivables.js";
import { createLedgerRoutes } from "./routes/ledger.js";
import { createReportRoutes } from "./routes/reports.js";
import { createCashFlowRoutes } from "./routes/cash-flow.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: LedgerService;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** When provided, API key auth is enforced on /api/*. */
  readonly auth?: AuthConfig | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LedgerService;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
    app.use("/api/*", requireMethodPermission());
  } else {
    // Unsecured mode (tests, dev): X-Actor header or "system"
    app.use("/api/*", headerActorMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/payables", createPayableRoutes());
  app.route("/api/v1/receivables", createReceivableRoutes());
  app.route("/api/v1/reports", createReportRoutes());
  app.route("/api/v1/cashflow", createCashFlowRoutes());
  app.route("/api/v1", createLedgerRoutes());

  return { app, service };
}

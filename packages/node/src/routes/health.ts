/**
 * Health check route.
 *
 * GET /health — Liveness probe, with the ledger's currency and day
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerService } from "../services/ledger-service.js";

export function createHealthRoutes(service: LedgerService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      currency: service.currency,
      today: service.today(),
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}

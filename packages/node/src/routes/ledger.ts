/**
 * Ledger-wide routes.
 *
 * GET  /api/v1/categories  — Category taxonomy
 * GET  /api/v1/search?q=   — Search both sides by id, description, party
 * POST /api/v1/refresh     — Recompute and persist stored due statuses
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AsOfQuerySchema, SearchQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/categories", (c) => {
    return c.json({ data: c.get("service").categories() });
  });

  routes.get("/search", validateQuery(SearchQuerySchema), (c) => {
    const { q } = c.req.valid("query");
    return c.json({ data: c.get("service").search(q) });
  });

  routes.post("/refresh", validateQuery(AsOfQuerySchema), (c) => {
    const { asOf } = c.req.valid("query");
    return c.json({ data: c.get("service").refreshDueStatuses(asOf) });
  });

  return routes;
}

/**
 * Accounts receivable routes.
 *
 * POST   /api/v1/receivables              — Register a receivable
 * GET    /api/v1/receivables              — List active receivables
 * GET    /api/v1/receivables/:id          — Get one receivable
 * POST   /api/v1/receivables/:id/receive  — Record receipt
 * DELETE /api/v1/receivables/:id          — Deactivate (soft delete)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ListReceivablesQuerySchema,
  RegisterReceivableSchema,
  SettleSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

export function createReceivableRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(RegisterReceivableSchema), (c) => {
    const body = c.req.valid("json");
    const record = c.get("service").registerReceivable({ ...body, actor: c.get("actor") });
    return c.json({ data: record }, 201);
  });

  routes.get("/", validateQuery(ListReceivablesQuerySchema), (c) => {
    const filter = c.req.valid("query");
    return c.json({ data: c.get("service").listReceivables(filter) });
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getReceivable(c.req.param("id")) });
  });

  routes.post("/:id/receive", validateBody(SettleSchema), (c) => {
    const { settlementDate } = c.req.valid("json");
    const record = c.get("service").recordReceipt(c.req.param("id"), {
      settlementDate,
      actor: c.get("actor"),
    });
    return c.json({ data: record });
  });

  routes.delete("/:id", (c) => {
    const record = c.get("service").deactivateReceivable(c.req.param("id"), c.get("actor"));
    return c.json({ data: record });
  });

  return routes;
}

/**
 * Accounts payable routes.
 *
 * POST   /api/v1/payables          — Register a payable
 * GET    /api/v1/payables          — List active payables
 * GET    /api/v1/payables/:id      — Get one payable
 * POST   /api/v1/payables/:id/pay  — Record payment
 * DELETE /api/v1/payables/:id      — Deactivate (soft delete)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ListPayablesQuerySchema,
  RegisterPayableSchema,
  SettleSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

export function createPayableRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(RegisterPayableSchema), (c) => {
    const body = c.req.valid("json");
    const record = c.get("service").registerPayable({ ...body, actor: c.get("actor") });
    return c.json({ data: record }, 201);
  });

  routes.get("/", validateQuery(ListPayablesQuerySchema), (c) => {
    const filter = c.req.valid("query");
    return c.json({ data: c.get("service").listPayables(filter) });
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("service").getPayable(c.req.param("id")) });
  });

  routes.post("/:id/pay", validateBody(SettleSchema), (c) => {
    const { settlementDate } = c.req.valid("json");
    const record = c.get("service").recordPayment(c.req.param("id"), {
      settlementDate,
      actor: c.get("actor"),
    });
    return c.json({ data: record });
  });

  routes.delete("/:id", (c) => {
    const record = c.get("service").deactivatePayable(c.req.param("id"), c.get("actor"));
    return c.json({ data: record });
  });

  return routes;
}

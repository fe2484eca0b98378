/**
 * Report routes.
 *
 * GET /api/v1/reports/summary?from&to&asOf  — Obligations by due date
 * GET /api/v1/reports/alerts?asOf           — Due today, due soon, overdue
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AsOfQuerySchema, SummaryQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/summary", validateQuery(SummaryQuerySchema), (c) => {
    return c.json({ data: c.get("service").summary(c.req.valid("query")) });
  });

  routes.get("/alerts", validateQuery(AsOfQuerySchema), (c) => {
    const { asOf } = c.req.valid("query");
    return c.json({ data: c.get("service").dueAlerts(asOf) });
  });

  return routes;
}

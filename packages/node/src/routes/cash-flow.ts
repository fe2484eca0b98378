/**
 * Cash-flow routes.
 *
 * GET /api/v1/cashflow/daily?date          — One settlement day
 * GET /api/v1/cashflow/monthly?year&month  — One month, with daily series
 * GET /api/v1/cashflow/range?from&to       — Inclusive day range
 *
 * Every route takes `format=json|text`. JSON answers the report and its
 * chart data; text answers the rendered table and chart listing.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { cashFlowChartData, renderCashFlowReport } from "@tally/reports";
import type { CashFlowReport } from "@tally/reports";
import type { AppEnv } from "../types/api-contract.js";
import {
  DailyCashFlowQuerySchema,
  MonthlyCashFlowQuerySchema,
  RangeCashFlowQuerySchema,
} from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

function respond(
  c: Context<AppEnv>,
  report: CashFlowReport,
  format: "json" | "text",
): Response {
  if (format === "text") {
    return c.text(renderCashFlowReport(report));
  }
  return c.json({ data: { report, chart: cashFlowChartData(report) } });
}

export function createCashFlowRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/daily", validateQuery(DailyCashFlowQuerySchema), (c) => {
    const { date, format } = c.req.valid("query");
    return respond(c, c.get("service").dailyCashFlow(date), format);
  });

  routes.get("/monthly", validateQuery(MonthlyCashFlowQuerySchema), (c) => {
    const { year, month, format } = c.req.valid("query");
    return respond(c, c.get("service").monthlyCashFlow(year, month), format);
  });

  routes.get("/range", validateQuery(RangeCashFlowQuerySchema), (c) => {
    const { from, to, format } = c.req.valid("query");
    return respond(c, c.get("service").rangeCashFlow(from, to), format);
  });

  return routes;
}

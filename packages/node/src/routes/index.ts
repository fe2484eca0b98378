/**
 * Route barrel — re-exports all route factories.
 */

export { createHealthRoutes } from "./health.js";
export { createPayableRoutes } from "./payables.js";
export { createReceivableRoutes } from "./receivables.js";
export { createLedgerRoutes } from "./ledger.js";
export { createReportRoutes } from "./reports.js";
export { createCashFlowRoutes } from "./cash-flow.js";

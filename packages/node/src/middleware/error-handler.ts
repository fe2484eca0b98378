/**
 * Global error handler.
 *
 * Catches everything thrown by route handlers and answers with the
 * error envelope. Ledger and report errors keep their own code and map
 * to a status through one table; anything else is a 500 whose message
 * never reaches the client.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { LedgerError } from "@tally/ledger";
import type { LedgerErrorCode } from "@tally/ledger";
import { ReportError } from "@tally/reports";
import type { ReportErrorCode } from "@tally/reports";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type DomainStatus = 400 | 404 | 409 | 422;

export const STATUS_MAP: Record<LedgerErrorCode | ReportErrorCode, DomainStatus> = {
  // Ledger errors
  INVALID_AMOUNT: 400,
  INVALID_MONEY: 400,
  CURRENCY_MISMATCH: 400,
  INVALID_DATE: 400,
  MISSING_FIELD: 400,
  INVALID_CATEGORY: 422,
  RECORD_NOT_FOUND: 404,
  RECORD_INACTIVE: 409,
  ALREADY_SETTLED: 409,

  // Report errors
  INVALID_RANGE: 400,
  INVALID_PERIOD: 400,
};

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof LedgerError || err instanceof ReportError) {
    return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
  }

  // Malformed JSON bodies surface from the validator as a 400 HTTPException
  if (err instanceof HTTPException && err.status === 400) {
    return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), 400);
  }

  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}

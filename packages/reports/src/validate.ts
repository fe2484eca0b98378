/**
 * @tally/reports — Input checks shared by every report.
 */

import { DEFAULT_CURRENCY, DEFAULT_DECIMALS, isValidDate } from "@tally/ledger";
import type { ReportCurrency } from "./types.js";
import { ReportError } from "./types.js";

export interface ResolvedCurrency {
  readonly currency: string;
  readonly decimals: number;
}

export function resolveCurrency(options: ReportCurrency | undefined): ResolvedCurrency {
  return {
    currency: options?.currency ?? DEFAULT_CURRENCY,
    decimals: options?.decimals ?? DEFAULT_DECIMALS,
  };
}

export function requireDate(value: string, label: string): string {
  if (!isValidDate(value)) {
    throw new ReportError("INVALID_DATE", `Invalid ${label} "${value}", expected YYYY-MM-DD`);
  }
  return value;
}

/** Both bounds valid and in order. */
export function requireRange(from: string, to: string): void {
  requireDate(from, "start date");
  requireDate(to, "end date");
  if (from > to) {
    throw new ReportError("INVALID_RANGE", `Start date ${from} is after end date ${to}`);
  }
}

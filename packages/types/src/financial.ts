/**
 * Financial Types
 *
 * Monetary primitives shared by the ledger and its reports.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit
 * - Scale is carried with the amount (decimals)
 */

/**
 * Currency identifier, an ISO 4217 code (e.g. "BRL", "USD").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 * Arithmetic lives in @tally/ledger money-math (bigint).
 */
export interface Money {
  /** String representation of the amount (e.g., "1500.00", "-20.50") */
  readonly amount: string;

  /** Currency code (e.g., "BRL") */
  readonly currency: Currency;

  /** Number of decimal places for this currency. BRL = 2. */
  readonly decimals: number;
}

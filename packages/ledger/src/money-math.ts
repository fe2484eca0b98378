/**
 * @tally/ledger — Fixed-point money.
 *
 * Amounts travel as decimal strings and are scaled to bigint for every
 * sum or difference, so "0.10" + "0.20" is exactly "0.30". Values in
 * different currencies, or at different scales, never mix.
 */

import type { Money } from "@tally/types";
import { LedgerError } from "./types.js";

const DECIMAL_STRING = /^-?\d+(\.\d+)?$/;

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Decimal string to scaled bigint: "1500.5" at 2 decimals is 150050n.
 * Rejects anything finer than the scale instead of rounding it.
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const text = amount.trim();
  if (!DECIMAL_STRING.test(text)) {
    throw new LedgerError("INVALID_AMOUNT", `Not a decimal amount: "${amount}"`);
  }

  const negative = text.startsWith("-");
  const [whole = "0", fraction = ""] = (negative ? text.slice(1) : text).split(".");
  if (fraction.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `"${text}" has ${String(fraction.length)} fractional digits, the currency takes ${String(decimals)}`,
    );
  }

  const scaled = BigInt(whole + fraction.padEnd(decimals, "0"));
  return negative ? -scaled : scaled;
}

/** Scaled bigint back to a decimal string with exactly `decimals` digits. */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) return scaled.toString();

  const digits = (scaled < 0n ? -scaled : scaled).toString().padStart(decimals + 1, "0");
  const split = digits.length - decimals;
  const text = `${digits.slice(0, split)}.${digits.slice(split)}`;
  return scaled < 0n ? `-${text}` : text;
}

// ─── Checks ──────────────────────────────────────────────────────────────

/**
 * Throws INVALID_MONEY for an empty currency or a bad scale, and
 * INVALID_AMOUNT when the amount does not parse at that scale.
 */
export function validateMoney(money: Money): void {
  if (money.currency.trim() === "") {
    throw new LedgerError("INVALID_MONEY", "Money currency is empty");
  }
  if (!Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new LedgerError("INVALID_MONEY", `Money decimals must be a non-negative integer, got ${String(money.decimals)}`);
  }
  parseAmount(money.amount, money.decimals);
}

export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency || a.decimals !== b.decimals) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Cannot combine ${a.currency}/${String(a.decimals)} with ${b.currency}/${String(b.decimals)}`,
    );
  }
}

export function isPositive(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) > 0n;
}

export function isNegative(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) < 0n;
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function zeroMoney(currency: string, decimals: number): Money {
  return { amount: formatAmount(0n, decimals), currency, decimals };
}

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const total = parseAmount(a.amount, a.decimals) + parseAmount(b.amount, b.decimals);
  return { ...a, amount: formatAmount(total, a.decimals) };
}

export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  const difference = parseAmount(a.amount, a.decimals) - parseAmount(b.amount, b.decimals);
  return { ...a, amount: formatAmount(difference, a.decimals) };
}

/** Sum in the given currency; an empty list is zero. */
export function sumMoney(values: readonly Money[], currency: string, decimals: number): Money {
  const zero = zeroMoney(currency, decimals);
  let total = 0n;
  for (const value of values) {
    assertSameCurrency(zero, value);
    total += parseAmount(value.amount, value.decimals);
  }
  return { ...zero, amount: formatAmount(total, decimals) };
}

/**
 * Money from user input at the ledger's scale ("0.1" becomes "0.10").
 */
export function toMoney(amount: string, currency: string, decimals: number): Money {
  return { amount: formatAmount(parseAmount(amount, decimals), decimals), currency, decimals };
}

/**
 * @tally/reports — Display formatting for money.
 */

import type { Money } from "@tally/types";
import { formatAmount, isNegative, parseAmount } from "@tally/ledger";

/**
 * "BRL 1,500.00", "-BRL 20.00". Thousands grouped with commas.
 */
export function formatMoney(money: Money): string {
  const normalized = formatAmount(parseAmount(money.amount, money.decimals), money.decimals);
  const negative = isNegative(money);
  const unsigned = negative ? normalized.slice(1) : normalized;

  const [intPart = "0", fracPart] = unsigned.split(".");
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  const body = fracPart === undefined ? grouped : `${grouped}.${fracPart}`;

  return `${negative ? "-" : ""}${money.currency} ${body}`;
}

/**
 * Shared ledger fixtures for report tests.
 *
 * Reference day 2024-03-10. Records:
 *
 *   CP001 rent         1500.00  due 03-05  paid 03-10
 *   CP002 internet        0.10  due 03-01  pending (overdue)
 *   CP003 electricity     0.20  due 03-20  pending
 *   CP004 rent           99.99  due 03-15  paid 03-10, then deactivated
 *
 *   CR001 service       980.50  due 03-08  received 03-09
 *   CR002 sale          200.00  due 04-02  pending
 *   CR003 sale           50.00  due 03-02  pending (overdue)
 */

import { InMemoryLedgerStore } from "@tally/store";
import { Ledger } from "@tally/ledger";

export const NOW = new Date(2024, 2, 10, 12, 0, 0);

export function emptyLedger(): Ledger {
  return new Ledger({ store: new InMemoryLedgerStore(), clock: () => NOW });
}

export function sampleLedger(): Ledger {
  const ledger = emptyLedger();
  const actor = "alice";

  ledger.registerPayable({
    description: "Rent", category: "rent", amount: "1500.00",
    dueDate: "2024-03-05", supplier: "Landlord Ltd", actor,
  });
  ledger.registerPayable({
    description: "Fiber", category: "internet", amount: "0.10",
    dueDate: "2024-03-01", supplier: "NetCo", actor,
  });
  ledger.registerPayable({
    description: "Power", category: "electricity", amount: "0.20",
    dueDate: "2024-03-20", actor,
  });
  ledger.registerPayable({
    description: "Duplicate rent", category: "rent", amount: "99.99",
    dueDate: "2024-03-15", actor,
  });

  ledger.registerReceivable({
    payer: "ACME Corp", description: "Consulting invoice", category: "service",
    amount: "980.50", dueDate: "2024-03-08", actor,
  });
  ledger.registerReceivable({
    payer: "Beta Ltd", description: "Order 17", category: "sale",
    amount: "200.00", dueDate: "2024-04-02", actor,
  });
  ledger.registerReceivable({
    payer: "Gamma SA", description: "Order 12", category: "sale",
    amount: "50.00", dueDate: "2024-03-02", actor,
  });

  ledger.recordPayment("CP001", { settlementDate: "2024-03-10", actor });
  ledger.recordPayment("CP004", { settlementDate: "2024-03-10", actor });
  ledger.deactivatePayable("CP004", "bob");
  ledger.recordReceipt("CR001", { settlementDate: "2024-03-09", actor });

  return ledger;
}

export function brl(amount: string): { amount: string; currency: string; decimals: number } {
  return { amount, currency: "BRL", decimals: 2 };
}

/**
 * Tests for InMemoryLedgerStore.
 */

import { describe, it, expect } from "vitest";
import { InMemoryLedgerStore } from "../src/in-memory-store.js";
import { EMPTY_TAXONOMY } from "../src/types.js";

describe("InMemoryLedgerStore", () => {
  it("starts empty", () => {
    const store = new InMemoryLedgerStore();
    expect(store.load()).toEqual({ payables: [], receivables: [], categories: EMPTY_TAXONOMY });
    expect(store.saveCount).toBe(0);
  });

  it("returns copies, not shared references", () => {
    const store = new InMemoryLedgerStore();
    const first = store.load();
    const second = store.load();

    expect(first).toEqual(second);
    expect(first).not.toBe(second);
    expect(first.payables).not.toBe(second.payables);
  });

  it("counts saves", () => {
    const store = new InMemoryLedgerStore();
    store.save(store.load());
    store.save(store.load());
    expect(store.saveCount).toBe(2);
  });

  it("seeds categories once", () => {
    const store = new InMemoryLedgerStore();
    const seeded = store.initDefaultCategories();

    expect(seeded.contas_receber["sale"]?.name).toBe("Sale");
    expect(store.load().categories).toEqual(seeded);
    expect(store.initDefaultCategories()).toEqual(seeded);
  });

  it("keeps a provided taxonomy", () => {
    const categories = {
      contas_pagar: {},
      contas_receber: { tips: { name: "Tips", type: "variable" as const, tag: "green" } },
    };
    const store = new InMemoryLedgerStore({ categories });

    expect(store.initDefaultCategories()).toEqual(categories);
  });
});

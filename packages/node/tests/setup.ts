/**
 * Test helpers for @tally/node.
 *
 * Builds the Hono app over an in-memory store with a silent logger and a
 * pinned clock (2024-03-10 12:00 local). No HTTP server is started.
 */

import pino from "pino";
import { InMemoryLedgerStore } from "@tally/store";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import { LedgerService } from "../src/services/ledger-service.js";

export const NOW = new Date(2024, 2, 10, 12, 0, 0);

export interface TestAppOptions {
  readonly store?: InMemoryLedgerStore | undefined;
  readonly auth?: CreateAppOptions["auth"];
  readonly logFn?: CreateAppOptions["logFn"];
}

export function createTestService(store: InMemoryLedgerStore = new InMemoryLedgerStore()): LedgerService {
  return new LedgerService({
    store,
    logger: pino({ level: "silent" }),
    clock: () => NOW,
  });
}

export function createTestApp(options: TestAppOptions = {}): AppInstance {
  return createApp({
    service: createTestService(options.store),
    auth: options.auth,
    logFn: options.logFn,
  });
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export const RENT = {
  description: "Rent",
  category: "rent",
  amount: "1500.00",
  dueDate: "2024-03-05",
  supplier: "Landlord Ltd",
};

export const CONSULTING = {
  payer: "ACME Corp",
  description: "Consulting invoice",
  category: "service",
  amount: "980.50",
  dueDate: "2024-03-15",
};

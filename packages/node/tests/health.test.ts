/**
 * Tests for the health route and fallbacks outside /api.
 */

import { describe, it, expect } from "vitest";
import type { ErrorEnvelope } from "../src/types/error.js";
import { createTestApp } from "./setup.js";

describe("GET /health", () => {
  it("returns status ok with the ledger currency and day", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; currency: string; today: string };
    expect(body.status).toBe("ok");
    expect(body.currency).toBe("BRL");
    expect(body.today).toBe("2024-03-10");
  });

  it("echoes an incoming request id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health", { headers: { "X-Request-Id": "req-42" } });

    expect(res.headers.get("X-Request-Id")).toBe("req-42");
  });

  it("generates a request id when none is sent", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("unknown routes", () => {
  it("answer 404 with the error envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nothing-here");

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorEnvelope;
    expect(body.error).toEqual({
      code: "NOT_FOUND",
      message: "No route for GET /api/v1/nothing-here",
    });
  });
});

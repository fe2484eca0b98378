/**
 * @tally/node — Entry point.
 *
 * Loads config, opens the ledger directory, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { JsonFileLedgerStore } from "@tally/store";
import type { LoadIssue } from "@tally/store";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { createAuthConfig } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { LedgerService } from "./services/ledger-service.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const onLoadIssue = (issue: LoadIssue): void => {
    logger.warn(issue, `Degraded load of ${issue.collection}`);
  };
  const store = new JsonFileLedgerStore({ directory: config.DATA_DIR, onLoadIssue });

  const service = new LedgerService({
    store,
    logger: logger.child({ component: "ledger" }),
    currency: config.CURRENCY,
    decimals: config.CURRENCY_DECIMALS,
    onLoadIssue,
  });

  let auth: AuthConfig | undefined;
  const keys = parseApiKeys(config.API_KEYS);
  if (keys.length > 0) {
    auth = createAuthConfig(keys);
    logger.info({ apiKeyCount: keys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, running in unsecured mode");
  }

  const { app } = createApp({
    service,
    auth,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, dataDir: config.DATA_DIR },
    "Tally node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}

/**
 * @tally/node — HTTP API for the Tally back office.
 *
 * Public API for embedding the server; `main.ts` is the runnable entry.
 */

export { LedgerService } from "./services/ledger-service.js";
export type { LedgerServiceConfig, SummaryRequest } from "./services/ledger-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";

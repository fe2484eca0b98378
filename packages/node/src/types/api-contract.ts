/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { LedgerService } from "../services/ledger-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    service: LedgerService;

    /** Who performs the operation; stamped on every record written */
    actor: string;

    /** Authentication context. Absent in unsecured mode. */
    auth: AuthContext | undefined;
  };
}

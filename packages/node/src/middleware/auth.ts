/**
 * Authentication middleware.
 *
 * An API key in the X-Api-Key header is looked up in the configured key
 * registry. On success the key's username becomes the request actor and
 * `c.set("auth", ...)` carries the role for permission checks.
 *
 * Without configured keys the server runs unsecured: the actor is taken
 * from the X-Actor header and every request may write.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACTOR_HEADER = "X-Actor";
export const DEFAULT_ACTOR = "system";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Build the key registry from parsed API_KEYS entries.
 */
export function createAuthConfig(keys: readonly ApiKeyRecord[]): AuthConfig {
  return { apiKeys: new Map(keys.map((record) => [record.key, record])) };
}

/**
 * Returns 401 when the key is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", { username: record.username, role: record.role });
    c.set("actor", record.username);
    return next();
  };
}

/**
 * Unsecured mode: actor from X-Actor, falling back to "system".
 */
export function headerActorMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const actor = c.req.header(ACTOR_HEADER)?.trim();
    c.set("auth", undefined);
    c.set("actor", actor !== undefined && actor !== "" ? actor : DEFAULT_ACTOR);
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Returns 403 if the authenticated role lacks the permission.
 * A request without an auth context (unsecured mode) passes.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (auth !== undefined && !hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

const READ_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

/**
 * Reads need `read`; every other method needs `write`.
 */
export function requireMethodPermission(): MiddlewareHandler<AppEnv> {
  const read = requirePermission("read");
  const write = requirePermission("write");
  return async (c, next) =>
    READ_METHODS.has(c.req.method) ? read(c, next) : write(c, next);
}

import type { MiddlewareHandler } from "hono";
import { createHash, timingSafeEqual } from "node:crypto";

import type { AppEnv } from "../types/env.js";
import { unauthorized } from "../lib/errors.js";

const PUBLIC_PATHS = new Set(["/api/health"]);

function digest(value: string) {
  return createHash("sha256").update(value).digest();
}

/** Bearer auth against the single operator token. */
export function createAuthMiddleware(token: string | undefined): MiddlewareHandler<AppEnv> {
  const expected = token ? digest(token) : null;

  return async (c, next) => {
    if (PUBLIC_PATHS.has(c.req.path)) {
      await next();
      return;
    }

    const auth = c.req.header("authorization");
    if (!auth) throw unauthorized("Missing Authorization header");

    const m = auth.match(/^Bearer\s+(.+)$/i);
    if (!m) throw unauthorized("Invalid Authorization header format");

    // Misconfiguration: treat as 401 to avoid leaking server state.
    if (!expected) throw unauthorized("Invalid API token");

    if (!timingSafeEqual(digest(m[1].trim()), expected)) throw unauthorized("Invalid API token");

    await next();
  };
}

import { createHash, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";

export const TOKEN_QUERY_PARAM = "token";

// Digests first so the comparison does not leak the secret's length
function tokensMatch(supplied: string, secret: string): boolean {
  const a = createHash("sha256").update(supplied).digest();
  const b = createHash("sha256").update(secret).digest();
  return timingSafeEqual(a, b);
}

/**
 * Requires `?token=<secret>` on the wrapped routes. An empty secret
 * leaves them open.
 */
export function tokenGate(secret: string): MiddlewareHandler {
  return async (c, next) => {
    if (secret === "") {
      await next();
      return;
    }

    const supplied = c.req.query(TOKEN_QUERY_PARAM);
    if (supplied === undefined || !tokensMatch(supplied, secret)) {
      return c.text("Unauthorized", 401);
    }

    await next();
  };
}

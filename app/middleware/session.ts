import { getCookie } from "hono/cookie";
import { createMiddleware } from "hono/factory";
import type { AppEnv } from "@/app/env";
import { unauthorized } from "@/lib/api";
import { getBearerToken, SESSION_COOKIE_NAME, verifySessionToken } from "@/lib/auth";

/**
 * Accepts the session JWT from the `session` cookie or a Bearer header and
 * exposes its claims as `c.get("session")`.
 */
export function requireSession(secret: string) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const token =
      getCookie(c, SESSION_COOKIE_NAME) ?? getBearerToken(c.req.header("Authorization"));

    if (!token) {
      return unauthorized(c, "Not authenticated");
    }

    try {
      c.set("session", await verifySessionToken(token, secret));
    } catch {
      return unauthorized(c, "Invalid or expired session");
    }

    await next();
  });
}

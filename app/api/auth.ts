import { Hono } from "hono";
import { deleteCookie, getCookie, setCookie } from "hono/cookie";
import type { AppDeps, AppEnv } from "@/app/env";
import { noContent, parseJson, unauthorized } from "@/lib/api";
import {
  getBearerToken,
  SESSION_COOKIE_NAME,
  signSessionToken,
  verifyPin,
  verifySessionToken
} from "@/lib/auth";
import { logEvent } from "@/lib/log";
import { loginSchema } from "@/lib/schemas";

export function authRoutes({ config }: AppDeps) {
  const routes = new Hono<AppEnv>();

  routes.post("/login", async (c) => {
    const parsed = await parseJson(c, loginSchema);
    if (!parsed.ok) {
      return parsed.response;
    }

    const valid = await verifyPin(parsed.data.pin, config.ADMIN_PIN_HASH);
    if (!valid) {
      return unauthorized(c, "Incorrect PIN");
    }

    const signed = await signSessionToken({
      secret: config.SESSION_SECRET,
      name: parsed.data.name,
      ttlSeconds: config.SESSION_TTL_SECONDS
    });

    setCookie(c, SESSION_COOKIE_NAME, signed.token, {
      httpOnly: true,
      sameSite: "Lax",
      path: "/",
      maxAge: config.SESSION_TTL_SECONDS
    });

    logEvent("login", { userId: signed.userId });
    return c.json({ token: signed.token, expiresAt: signed.expiresAt }, 200);
  });

  routes.get("/me", async (c) => {
    const token =
      getCookie(c, SESSION_COOKIE_NAME) ?? getBearerToken(c.req.header("Authorization"));
    if (!token) {
      return c.json({ authenticated: false }, 200);
    }

    try {
      const claims = await verifySessionToken(token, config.SESSION_SECRET);
      return c.json({ authenticated: true, user_id: claims.userId, name: claims.name }, 200);
    } catch {
      return c.json({ authenticated: false }, 200);
    }
  });

  routes.post("/logout", (c) => {
    deleteCookie(c, SESSION_COOKIE_NAME, { path: "/" });
    return noContent(c);
  });

  return routes;
}

import { Hono } from "hono";
import { authRoutes } from "@/app/api/auth";
import { matchRoutes } from "@/app/api/matches";
import { playerRoutes } from "@/app/api/players";
import { statsRoutes } from "@/app/api/stats";
import type { AppDeps, AppEnv } from "@/app/env";
import { requireSession } from "@/app/middleware/session";
import { notFound, serverError } from "@/lib/api";
import { InvalidMatchDataError } from "@/lib/errors";
import { logError } from "@/lib/log";

export function createApp(deps: AppDeps) {
  const app = new Hono<AppEnv>();

  app.get("/health", (c) => c.json({ status: "ok" }, 200));

  // Login, logout and "who am I" are public; registered ahead of the session guard.
  app.route("/api/auth", authRoutes(deps));

  app.use("/api/*", requireSession(deps.config.SESSION_SECRET));

  app.route("/api/players", playerRoutes(deps));
  app.route("/api/matches", matchRoutes(deps));
  app.route("/api", statsRoutes(deps));

  app.notFound((c) => notFound(c));

  app.onError((error, c) => {
    if (error instanceof InvalidMatchDataError) {
      logError("snapshot", error);
      return serverError(c, "Stored match data is invalid");
    }

    logError(c.req.path, error);
    return serverError(c);
  });

  return app;
}

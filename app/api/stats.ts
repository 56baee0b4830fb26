import { Hono } from "hono";
import type { AppDeps, AppEnv } from "@/app/env";
import { parseQuery } from "@/lib/api";
import { minGamesQuerySchema } from "@/lib/schemas";
import { leaderboardView, loadSnapshot, rivalriesView, shameView } from "@/lib/scoreboard";

export function statsRoutes({ repository, settings }: AppDeps) {
  const routes = new Hono<AppEnv>();

  routes.get("/leaderboard", async (c) => {
    const query = parseQuery(c, minGamesQuerySchema);
    if (!query.ok) {
      return query.response;
    }

    const snapshot = await loadSnapshot(repository);
    return c.json(leaderboardView(snapshot, query.data.min_games ?? settings.leaderboardMinGames), 200);
  });

  routes.get("/rivalries", async (c) => {
    const query = parseQuery(c, minGamesQuerySchema);
    if (!query.ok) {
      return query.response;
    }

    const snapshot = await loadSnapshot(repository);
    return c.json(rivalriesView(snapshot, query.data.min_games ?? settings.rivalryMinGames), 200);
  });

  routes.get("/shame", async (c) => {
    const snapshot = await loadSnapshot(repository);
    return c.json(shameView(snapshot, settings), 200);
  });

  return routes;
}

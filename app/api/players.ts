import { Hono } from "hono";
import type { AppDeps, AppEnv } from "@/app/env";
import { conflict, noContent, notFound, parseJson, serializeMatch } from "@/lib/api";
import { PlayerExistsError } from "@/lib/errors";
import { logEvent } from "@/lib/log";
import { createPlayerSchema, updatePlayerSchema } from "@/lib/schemas";
import { loadSnapshot, playerProfileView } from "@/lib/scoreboard";
import { DEFAULT_AVATAR } from "@/lib/snapshot";

export function playerRoutes({ repository, settings }: AppDeps) {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const players = await repository.listPlayers();
    return c.json(players, 200);
  });

  routes.post("/", async (c) => {
    const parsed = await parseJson(c, createPlayerSchema);
    if (!parsed.ok) {
      return parsed.response;
    }

    try {
      const player = await repository.createPlayer({
        id: parsed.data.id,
        name: parsed.data.name,
        nickname: parsed.data.nickname || null,
        avatar_emoji: parsed.data.avatar_emoji ?? DEFAULT_AVATAR
      });

      logEvent("player_created", { playerId: player.id, by: c.get("session").userId });
      return c.json(player, 201);
    } catch (error) {
      if (error instanceof PlayerExistsError) {
        return conflict(c, error.message);
      }

      throw error;
    }
  });

  routes.put("/:id", async (c) => {
    const parsed = await parseJson(c, updatePlayerSchema);
    if (!parsed.ok) {
      return parsed.response;
    }

    const player = await repository.updatePlayer(c.req.param("id"), {
      name: parsed.data.name,
      nickname: parsed.data.nickname === "" ? null : parsed.data.nickname,
      avatar_emoji: parsed.data.avatar_emoji
    });
    if (!player) {
      return notFound(c, `Player '${c.req.param("id")}' not found`);
    }

    return c.json(player, 200);
  });

  routes.delete("/:id", async (c) => {
    const playerId = c.req.param("id");
    const deleted = await repository.deletePlayer(playerId);
    if (!deleted) {
      return notFound(c, `Player '${playerId}' not found`);
    }

    logEvent("player_deleted", { playerId, by: c.get("session").userId });
    return noContent(c);
  });

  routes.get("/:id/stats", async (c) => {
    const playerId = c.req.param("id");
    const snapshot = await loadSnapshot(repository);
    const profile = playerProfileView(snapshot, playerId, settings);
    if (!profile) {
      return notFound(c, `Player '${playerId}' not found`);
    }

    return c.json(
      {
        ...profile,
        recentMatches: profile.recentMatches.map(serializeMatch)
      },
      200
    );
  });

  return routes;
}

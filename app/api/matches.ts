import { Hono } from "hono";
import type { AppDeps, AppEnv } from "@/app/env";
import { badRequest, noContent, notFound, parseJson, parseQuery, serializeMatch } from "@/lib/api";
import { InvalidMatchDataError } from "@/lib/errors";
import { logEvent } from "@/lib/log";
import type { NewMatch } from "@/lib/repository";
import { createMatchSchema, listMatchesQuerySchema } from "@/lib/schemas";
import { validateMatchRow } from "@/lib/snapshot";
import { compareByRecency } from "@/lib/stats";

export function matchRoutes({ repository }: AppDeps) {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const query = parseQuery(c, listMatchesQuerySchema);
    if (!query.ok) {
      return query.response;
    }

    const rows = await repository.listMatches(query.data.limit);
    const matches = rows.map(validateMatchRow).sort(compareByRecency);
    return c.json(matches.map(serializeMatch), 200);
  });

  routes.post("/", async (c) => {
    const parsed = await parseJson(c, createMatchSchema);
    if (!parsed.ok) {
      return parsed.response;
    }

    const body = parsed.data;
    const input: NewMatch = {
      winner1_id: body.winner1_id,
      winner2_id: body.winner2_id,
      loser1_id: body.loser1_id,
      loser2_id: body.loser2_id,
      winner_score: body.winner_score ?? null,
      loser_score: body.loser_score ?? null,
      comment: body.comment || null,
      recorded_by: c.get("session").userId,
      played_at: body.played_at ? new Date(body.played_at) : new Date()
    };

    try {
      validateMatchRow({ id: "", ...input });
    } catch (error) {
      if (error instanceof InvalidMatchDataError) {
        return badRequest(c, error.reason);
      }

      throw error;
    }

    const row = await repository.createMatch(input);
    logEvent("match_recorded", {
      matchId: row.id,
      winners: [row.winner1_id, row.winner2_id],
      losers: [row.loser1_id, row.loser2_id],
      recordedBy: row.recorded_by
    });

    return c.json(serializeMatch(validateMatchRow(row)), 201);
  });

  routes.delete("/:id", async (c) => {
    const matchId = c.req.param("id");
    const deleted = await repository.deleteMatch(matchId);
    if (!deleted) {
      return notFound(c, `Match '${matchId}' not found`);
    }

    logEvent("match_deleted", { matchId, by: c.get("session").userId });
    return noContent(c);
  });

  return routes;
}

import type { Context } from "hono";
import { ZodError, type ZodSchema } from "zod";
import type { Match } from "@/lib/types";

export async function parseJson<T>(c: Context, schema: ZodSchema<T>) {
  try {
    const payload: unknown = await c.req.json();
    return { ok: true as const, data: schema.parse(payload) };
  } catch (error) {
    if (error instanceof ZodError) {
      return {
        ok: false as const,
        response: badRequest(c, "Invalid request body", error.flatten())
      };
    }

    return { ok: false as const, response: badRequest(c, "Invalid JSON") };
  }
}

export function parseQuery<T>(c: Context, schema: ZodSchema<T>) {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    return {
      ok: false as const,
      response: badRequest(c, "Invalid query parameters", result.error.flatten())
    };
  }

  return { ok: true as const, data: result.data };
}

/** Wire shape of a match: timestamps as ISO 8601 UTC strings. */
export function serializeMatch(match: Match) {
  return {
    id: match.id,
    winner_ids: [...match.winner_ids],
    loser_ids: [...match.loser_ids],
    score: match.score ? { ...match.score } : null,
    comment: match.comment,
    recorded_by: match.recorded_by,
    played_at: match.played_at.toISOString()
  };
}

export function noContent(c: Context) {
  return c.body(null, 204);
}

export function badRequest(c: Context, message: string, details?: unknown) {
  return c.json({ error: message, details }, 400);
}

export function unauthorized(c: Context, message = "Unauthorized") {
  return c.json({ error: message }, 401);
}

export function notFound(c: Context, message = "Not found") {
  return c.json({ error: message }, 404);
}

export function conflict(c: Context, message: string) {
  return c.json({ error: message }, 409);
}

export function serverError(c: Context, message = "Internal server error") {
  return c.json({ error: message }, 500);
}

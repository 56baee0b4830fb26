import { z } from "zod";

const playerId = z
  .string()
  .min(1)
  .max(40)
  .regex(/^[a-z0-9-]+$/, "Player ids are lowercase letters, digits and dashes");

const score = z.number().int().min(0).max(99);

export const loginSchema = z.object({
  name: z.string().trim().min(1).max(80),
  pin: z.string().min(4).max(32)
});

export const createPlayerSchema = z.object({
  id: playerId,
  name: z.string().trim().min(1).max(80),
  nickname: z.string().trim().max(80).nullable().optional(),
  avatar_emoji: z.string().min(1).max(16).optional()
});

export const updatePlayerSchema = z
  .object({
    name: z.string().trim().min(1).max(80).optional(),
    nickname: z.string().trim().max(80).nullable().optional(),
    avatar_emoji: z.string().min(1).max(16).optional()
  })
  .refine((value) => Object.values(value).some((field) => field !== undefined), {
    message: "At least one field must be provided"
  });

export const createMatchSchema = z
  .object({
    winner1_id: playerId,
    winner2_id: playerId,
    loser1_id: playerId,
    loser2_id: playerId,
    winner_score: score.nullable().optional(),
    loser_score: score.nullable().optional(),
    comment: z.string().trim().max(280).optional(),
    played_at: z.string().datetime({ offset: true }).optional()
  })
  .superRefine((value, ctx) => {
    const ids = [value.winner1_id, value.winner2_id, value.loser1_id, value.loser2_id];
    if (new Set(ids).size !== 4) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "The four players must be distinct"
      });
    }

    const hasWinnerScore = value.winner_score !== undefined && value.winner_score !== null;
    const hasLoserScore = value.loser_score !== undefined && value.loser_score !== null;
    if (hasWinnerScore !== hasLoserScore) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [hasWinnerScore ? "loser_score" : "winner_score"],
        message: "winner_score and loser_score must be given together"
      });
    }
  });

const nonNegativeInt = z.coerce.number().int().min(0);

export const listMatchesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional()
});

export const minGamesQuerySchema = z.object({
  min_games: nonNegativeInt.optional()
});

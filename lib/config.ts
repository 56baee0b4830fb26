import { z } from "zod";

const configSchema = z.object({
  // Empty means the in-memory store; handy for local runs, not for production.
  DATABASE_URL: z.string().default(""),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  SESSION_SECRET: z.string().min(16, "SESSION_SECRET must be at least 16 characters"),
  ADMIN_PIN_HASH: z.string().min(1, "ADMIN_PIN_HASH is required"),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 24),

  // Ranking and summary thresholds
  LEADERBOARD_MIN_GAMES: z.coerce.number().int().min(0).default(0),
  RIVALRY_MIN_GAMES: z.coerce.number().int().min(1).default(1),
  MIN_GAMES_FOR_WORST_RATE: z.coerce.number().int().min(1).default(5),
  LOSING_STREAK_THRESHOLD: z.coerce.number().int().min(1).default(3),
  MIN_PARTNER_GAMES: z.coerce.number().int().min(1).default(1),
  MIN_NEMESIS_LOSSES: z.coerce.number().int().min(1).default(1),
  RECENT_MATCH_LIMIT: z.coerce.number().int().min(1).max(100).default(10),
  ACHIEVEMENTS_PATH: z.string().optional(),

  STATS_DEBUG: z
    .string()
    .optional()
    .default("0")
    .transform((value) => value === "1")
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return parsed.data;
}

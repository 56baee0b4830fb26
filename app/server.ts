import { serve } from "@hono/node-server";
import { createApp } from "@/app/index";
import { DEFAULT_ACHIEVEMENTS_PATH, loadAchievementRules } from "@/lib/achievements";
import { loadConfig } from "@/lib/config";
import { createSql, ensureSchema } from "@/lib/db";
import { configureLogging, logError, logEvent } from "@/lib/log";
import { createMemoryRepository } from "@/lib/memoryRepository";
import { createPostgresRepository, type ScoreboardRepository } from "@/lib/repository";

async function main() {
  const config = loadConfig();
  configureLogging({ debug: config.STATS_DEBUG, databaseUrl: config.DATABASE_URL });

  let repository: ScoreboardRepository;
  if (config.DATABASE_URL) {
    const sql = createSql(config.DATABASE_URL);
    await ensureSchema(sql);
    repository = createPostgresRepository(sql);
  } else {
    logEvent("memory_store", { warning: "DATABASE_URL is empty; data will not survive a restart" });
    repository = createMemoryRepository();
  }

  const rulesPath = config.ACHIEVEMENTS_PATH ?? DEFAULT_ACHIEVEMENTS_PATH;
  const rules = loadAchievementRules(rulesPath);
  logEvent("achievements_loaded", { path: rulesPath, rules: rules.length });

  const app = createApp({
    repository,
    config,
    settings: {
      leaderboardMinGames: config.LEADERBOARD_MIN_GAMES,
      rivalryMinGames: config.RIVALRY_MIN_GAMES,
      minGamesForWorstRate: config.MIN_GAMES_FOR_WORST_RATE,
      losingStreakThreshold: config.LOSING_STREAK_THRESHOLD,
      minPartnerGames: config.MIN_PARTNER_GAMES,
      minNemesisLosses: config.MIN_NEMESIS_LOSSES,
      recentMatchLimit: config.RECENT_MATCH_LIMIT,
      rules
    }
  });

  serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    logEvent("listening", { port: info.port });
  });
}

main().catch((error: unknown) => {
  logError("startup", error);
  process.exit(1);
});

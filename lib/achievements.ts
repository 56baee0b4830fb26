import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Achievement, RelationshipStat, WinLossStats } from "@/lib/types";

export const DEFAULT_ACHIEVEMENTS_PATH = fileURLToPath(
  new URL("../config/achievements.json", import.meta.url)
);

const metricSchema = z.enum([
  "wins",
  "losses",
  "totalGames",
  "winRate",
  "streak",
  "partnerWins",
  "nemesisLosses"
]);

export const achievementRuleSchema = z.object({
  id: z.string().min(1).max(64),
  emoji: z.string().min(1),
  title: z.string().min(1).max(80),
  description: z.string().max(200),
  tone: z.enum(["brag", "shame"]).default("brag"),
  metric: metricSchema,
  comparator: z.enum(["gte", "lte"]),
  threshold: z.number(),
  minGames: z.number().int().min(0).optional()
});

export const achievementTableSchema = z
  .array(achievementRuleSchema)
  .superRefine((rules, ctx) => {
    const seen = new Set<string>();
    rules.forEach((rule, index) => {
      if (seen.has(rule.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "id"],
          message: `Duplicate achievement id '${rule.id}'`
        });
      }
      seen.add(rule.id);
    });
  });

export type AchievementMetric = z.infer<typeof metricSchema>;
export type AchievementRule = z.infer<typeof achievementRuleSchema>;

export function parseAchievementTable(raw: unknown): AchievementRule[] {
  return achievementTableSchema.parse(raw);
}

export function loadAchievementRules(path = DEFAULT_ACHIEVEMENTS_PATH): AchievementRule[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return parseAchievementTable(raw);
}

export function evaluateAchievements(
  rules: readonly AchievementRule[],
  stats: WinLossStats,
  relationships: RelationshipStat
): Achievement[] {
  const earned: Achievement[] = [];

  for (const rule of rules) {
    if (rule.minGames !== undefined && stats.totalGames < rule.minGames) {
      continue;
    }

    const value = readMetric(rule.metric, stats, relationships);
    if (value === null) {
      continue;
    }

    const holds = rule.comparator === "gte" ? value >= rule.threshold : value <= rule.threshold;
    if (holds) {
      earned.push({
        id: rule.id,
        emoji: rule.emoji,
        title: rule.title,
        description: rule.description,
        tone: rule.tone
      });
    }
  }

  return earned;
}

function readMetric(
  metric: AchievementMetric,
  stats: WinLossStats,
  relationships: RelationshipStat
): number | null {
  switch (metric) {
    case "wins":
      return stats.wins;
    case "losses":
      return stats.losses;
    case "totalGames":
      return stats.totalGames;
    case "winRate":
      return stats.winRate;
    case "streak":
      return stats.streak;
    case "partnerWins":
      return relationships.bestPartner?.wins ?? null;
    case "nemesisLosses":
      return relationships.nemesis?.lossesAgainst ?? null;
  }
}

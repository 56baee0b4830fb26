import { evaluateAchievements, type AchievementRule } from "@/lib/achievements";
import { analyzeRelationships, type RelationshipOptions } from "@/lib/relationships";
import type { MatchSnapshot } from "@/lib/snapshot";
import { playerMatches, summarizePlayed } from "@/lib/stats";
import type { Achievement, Match, NemesisRecord, PartnerRecord, Player, WinLossStats } from "@/lib/types";

export const DEFAULT_RECENT_MATCH_LIMIT = 10;

export interface PlayerProfileOptions extends RelationshipOptions {
  rules: readonly AchievementRule[];
  recentMatchLimit?: number;
}

export interface PlayerProfile {
  player: Player;
  stats: WinLossStats;
  relationships: {
    bestPartner: (PartnerRecord & { partnerName: string }) | null;
    nemesis: (NemesisRecord & { opponentName: string }) | null;
  };
  achievements: Achievement[];
  recentMatches: Match[];
}

export function buildPlayerProfile(
  snapshot: MatchSnapshot,
  playerId: string,
  options: PlayerProfileOptions
): PlayerProfile {
  const played = playerMatches(snapshot.matches, playerId);
  const stats = summarizePlayed(playerId, played);
  const relationships = analyzeRelationships(snapshot.matches, playerId, options);
  const { bestPartner, nemesis } = relationships;

  return {
    player: snapshot.directory.resolve(playerId),
    stats,
    relationships: {
      bestPartner: bestPartner
        ? { ...bestPartner, partnerName: snapshot.directory.resolve(bestPartner.partnerId).name }
        : null,
      nemesis: nemesis
        ? { ...nemesis, opponentName: snapshot.directory.resolve(nemesis.opponentId).name }
        : null
    },
    achievements: evaluateAchievements(options.rules, stats, relationships),
    recentMatches: played
      .slice(0, options.recentMatchLimit ?? DEFAULT_RECENT_MATCH_LIMIT)
      .map((entry) => entry.match)
  };
}

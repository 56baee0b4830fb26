import { compareIds, type PlayerDirectory } from "@/lib/snapshot";
import type { LeaderboardEntry, WinLossStats } from "@/lib/types";

export interface LeaderboardOptions {
  minGames?: number;
}

export function compareStandings(a: WinLossStats, b: WinLossStats) {
  if (a.winRate !== b.winRate) {
    return b.winRate - a.winRate;
  }

  if (a.totalGames !== b.totalGames) {
    return b.totalGames - a.totalGames;
  }

  return compareIds(a.playerId, b.playerId);
}

export function buildLeaderboard(
  stats: readonly WinLossStats[],
  directory: PlayerDirectory,
  options: LeaderboardOptions = {}
): LeaderboardEntry[] {
  const minGames = options.minGames ?? 0;

  return stats
    .filter((entry) => entry.totalGames >= minGames)
    .sort(compareStandings)
    .map((entry, index) => {
      const player = directory.resolve(entry.playerId);

      return {
        ...entry,
        rank: index + 1,
        playerName: player.name,
        nickname: player.nickname,
        avatarEmoji: player.avatar_emoji
      };
    });
}

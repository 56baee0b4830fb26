import { encounters } from "@/lib/rivalries";
import { compareIds } from "@/lib/snapshot";
import type { LeaderboardEntry, RivalryEntry } from "@/lib/types";

export interface ShameOptions {
  minGamesForWorstRate: number;
  losingStreakThreshold: number;
}

export interface ShameReport {
  worstWinRate: LeaderboardEntry | null;
  coldStreaks: LeaderboardEntry[];
  mostLosses: LeaderboardEntry | null;
  mostLopsidedRivalry: RivalryEntry | null;
}

export function buildShameReport(
  leaderboard: readonly LeaderboardEntry[],
  rivalries: readonly RivalryEntry[],
  options: ShameOptions
): ShameReport {
  const worstWinRate =
    leaderboard
      .filter((entry) => entry.totalGames >= Math.max(1, options.minGamesForWorstRate))
      .sort(
        (a, b) =>
          a.winRate - b.winRate || b.totalGames - a.totalGames || compareIds(a.playerId, b.playerId)
      )[0] ?? null;

  const coldStreaks = leaderboard
    .filter((entry) => entry.streak < 0 && entry.streak <= -options.losingStreakThreshold)
    .sort((a, b) => a.streak - b.streak || compareIds(a.playerId, b.playerId));

  const mostLosses =
    leaderboard
      .filter((entry) => entry.losses > 0)
      .sort((a, b) => b.losses - a.losses || compareIds(a.playerId, b.playerId))[0] ?? null;

  const mostLopsidedRivalry =
    rivalries
      .filter((entry) => entry.player1Wins !== entry.player2Wins)
      .sort(
        (a, b) =>
          lopsidedness(b) - lopsidedness(a) ||
          encounters(b) - encounters(a) ||
          compareIds(a.player1Id, b.player1Id) ||
          compareIds(a.player2Id, b.player2Id)
      )[0] ?? null;

  return { worstWinRate, coldStreaks, mostLosses, mostLopsidedRivalry };
}

function lopsidedness(entry: RivalryEntry) {
  return Math.abs(entry.player1Wins - entry.player2Wins);
}

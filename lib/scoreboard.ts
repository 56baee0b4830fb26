import type { AchievementRule } from "@/lib/achievements";
import { buildLeaderboard } from "@/lib/leaderboard";
import { logDebug } from "@/lib/log";
import { buildPlayerProfile } from "@/lib/profile";
import type { ScoreboardRepository } from "@/lib/repository";
import { buildRivalryTable, rankRivalries } from "@/lib/rivalries";
import { buildShameReport } from "@/lib/shame";
import { buildSnapshot, knownPlayerIds, type MatchSnapshot, type PlayerDirectory } from "@/lib/snapshot";
import { computeAllStats } from "@/lib/stats";
import type { RivalryEntry } from "@/lib/types";

export interface ScoreboardSettings {
  leaderboardMinGames: number;
  rivalryMinGames: number;
  minGamesForWorstRate: number;
  losingStreakThreshold: number;
  minPartnerGames: number;
  minNemesisLosses: number;
  recentMatchLimit: number;
  rules: readonly AchievementRule[];
}

/** One point-in-time read of the full history; stats need every match. */
export async function loadSnapshot(repository: ScoreboardRepository): Promise<MatchSnapshot> {
  const [players, matches] = await Promise.all([repository.listPlayers(), repository.listMatches()]);
  const snapshot = buildSnapshot({ players, matches });

  logDebug("snapshot_loaded", { players: players.length, matches: matches.length });
  return snapshot;
}

export function leaderboardView(snapshot: MatchSnapshot, minGames: number) {
  return buildLeaderboard(computeAllStats(snapshot), snapshot.directory, { minGames });
}

export function rivalriesView(snapshot: MatchSnapshot, minEncounters: number) {
  return rankRivalries(buildRivalryTable(snapshot.matches), { minEncounters }).map((entry) =>
    nameRivalry(entry, snapshot.directory)
  );
}

export function playerProfileView(snapshot: MatchSnapshot, playerId: string, settings: ScoreboardSettings) {
  if (!knownPlayerIds(snapshot).includes(playerId)) {
    return null;
  }

  return buildPlayerProfile(snapshot, playerId, {
    rules: settings.rules,
    recentMatchLimit: settings.recentMatchLimit,
    minPartnerGames: settings.minPartnerGames,
    minNemesisLosses: settings.minNemesisLosses
  });
}

export function shameView(snapshot: MatchSnapshot, settings: ScoreboardSettings) {
  const report = buildShameReport(
    leaderboardView(snapshot, 0),
    buildRivalryTable(snapshot.matches),
    {
      minGamesForWorstRate: settings.minGamesForWorstRate,
      losingStreakThreshold: settings.losingStreakThreshold
    }
  );

  return {
    ...report,
    mostLopsidedRivalry: report.mostLopsidedRivalry
      ? nameRivalry(report.mostLopsidedRivalry, snapshot.directory)
      : null
  };
}

function nameRivalry(entry: RivalryEntry, directory: PlayerDirectory) {
  return {
    ...entry,
    player1Name: directory.resolve(entry.player1Id).name,
    player2Name: directory.resolve(entry.player2Id).name
  };
}

import { compareIds, knownPlayerIds, type MatchSnapshot } from "@/lib/snapshot";
import type { Match, WinLossStats } from "@/lib/types";

export type Outcome = "win" | "loss";

export interface PlayerMatch {
  match: Match;
  outcome: Outcome;
}

/** Newest first; equal timestamps fall back to match id ascending. */
export function compareByRecency(a: Match, b: Match) {
  const timeDiff = b.played_at.getTime() - a.played_at.getTime();
  if (timeDiff !== 0) {
    return timeDiff;
  }

  return compareIds(a.id, b.id);
}

export function outcomeFor(match: Match, playerId: string): Outcome | null {
  if (match.winner_ids.includes(playerId)) {
    return "win";
  }

  if (match.loser_ids.includes(playerId)) {
    return "loss";
  }

  return null;
}

export function playerMatches(matches: readonly Match[], playerId: string): PlayerMatch[] {
  const played: PlayerMatch[] = [];

  for (const match of matches) {
    const outcome = outcomeFor(match, playerId);
    if (outcome) {
      played.push({ match, outcome });
    }
  }

  return played.sort((a, b) => compareByRecency(a.match, b.match));
}

export function computeStreak(outcomesNewestFirst: readonly Outcome[]) {
  const latest = outcomesNewestFirst[0];
  if (!latest) {
    return 0;
  }

  let count = 0;
  for (const outcome of outcomesNewestFirst) {
    if (outcome !== latest) {
      break;
    }

    count += 1;
  }

  return latest === "win" ? count : -count;
}

export function computeWinLossStats(matches: readonly Match[], playerId: string): WinLossStats {
  return summarizePlayed(playerId, playerMatches(matches, playerId));
}

export function computeAllStats(snapshot: MatchSnapshot): WinLossStats[] {
  const byPlayer = new Map<string, PlayerMatch[]>();

  for (const match of snapshot.matches) {
    for (const id of match.winner_ids) {
      appendTo(byPlayer, id, { match, outcome: "win" });
    }

    for (const id of match.loser_ids) {
      appendTo(byPlayer, id, { match, outcome: "loss" });
    }
  }

  return knownPlayerIds(snapshot).map((playerId) => {
    const played = byPlayer.get(playerId) ?? [];
    played.sort((a, b) => compareByRecency(a.match, b.match));
    return summarizePlayed(playerId, played);
  });
}

/** `played` must already be in recency order. */
export function summarizePlayed(playerId: string, played: readonly PlayerMatch[]): WinLossStats {
  const wins = played.filter((entry) => entry.outcome === "win").length;
  const losses = played.length - wins;
  const totalGames = wins + losses;

  return {
    playerId,
    wins,
    losses,
    totalGames,
    winRate: totalGames === 0 ? 0 : wins / totalGames,
    streak: computeStreak(played.map((entry) => entry.outcome))
  };
}

function appendTo(byPlayer: Map<string, PlayerMatch[]>, playerId: string, entry: PlayerMatch) {
  const existing = byPlayer.get(playerId);
  if (existing) {
    existing.push(entry);
    return;
  }

  byPlayer.set(playerId, [entry]);
}

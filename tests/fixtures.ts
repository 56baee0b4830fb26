import type { MatchRow, Player } from "../lib/types";

export function player(id: string, name = id.toUpperCase()): Player {
  return { id, name, nickname: null, avatar_emoji: "🏓" };
}

export function matchRow(
  id: string,
  winners: [string, string],
  losers: [string, string],
  playedAt: string,
  score: [number, number] | null = null
): MatchRow {
  return {
    id,
    winner1_id: winners[0],
    winner2_id: winners[1],
    loser1_id: losers[0],
    loser2_id: losers[1],
    winner_score: score ? score[0] : null,
    loser_score: score ? score[1] : null,
    comment: null,
    recorded_by: "tester",
    played_at: playedAt
  };
}

/** A,B beat C,D; C,D beat A,B; A,B beat C,D (oldest to newest). */
export function threeMatchSeries(): MatchRow[] {
  return [
    matchRow("m1", ["a", "b"], ["c", "d"], "2024-05-01T10:00:00Z", [11, 5]),
    matchRow("m2", ["c", "d"], ["a", "b"], "2024-05-01T10:30:00Z", [11, 9]),
    matchRow("m3", ["a", "b"], ["c", "d"], "2024-05-01T11:00:00Z", [11, 3])
  ];
}

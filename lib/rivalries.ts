import { compareIds } from "@/lib/snapshot";
import type { Match, RivalryEntry } from "@/lib/types";

export function buildRivalryTable(matches: readonly Match[]): RivalryEntry[] {
  const byPair = new Map<string, RivalryEntry>();

  for (const match of matches) {
    for (const winnerId of match.winner_ids) {
      for (const loserId of match.loser_ids) {
        const winnerIsFirst = compareIds(winnerId, loserId) < 0;
        const player1Id = winnerIsFirst ? winnerId : loserId;
        const player2Id = winnerIsFirst ? loserId : winnerId;
        const key = pairKey(player1Id, player2Id);

        const entry = byPair.get(key) ?? { player1Id, player2Id, player1Wins: 0, player2Wins: 0 };
        if (winnerIsFirst) {
          entry.player1Wins += 1;
        } else {
          entry.player2Wins += 1;
        }
        byPair.set(key, entry);
      }
    }
  }

  return [...byPair.values()].sort(
    (a, b) => compareIds(a.player1Id, b.player1Id) || compareIds(a.player2Id, b.player2Id)
  );
}

export function encounters(entry: RivalryEntry) {
  return entry.player1Wins + entry.player2Wins;
}

/** Busiest rivalries first, dropping pairs below `minEncounters`. */
export function rankRivalries(
  entries: readonly RivalryEntry[],
  { minEncounters = 1 }: { minEncounters?: number } = {}
) {
  return entries
    .filter((entry) => encounters(entry) >= minEncounters)
    .sort(
      (a, b) =>
        encounters(b) - encounters(a) ||
        compareIds(a.player1Id, b.player1Id) ||
        compareIds(a.player2Id, b.player2Id)
    );
}

function pairKey(a: string, b: string) {
  return `${a}\u0000${b}`;
}

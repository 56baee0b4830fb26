import { InvalidMatchDataError } from "@/lib/errors";
import type { Match, MatchRow, Player } from "@/lib/types";

export const DEFAULT_AVATAR = "🏓";

export interface PlayerDirectory {
  has(playerId: string): boolean;
  resolve(playerId: string): Player;
}

export interface MatchSnapshot {
  readonly players: readonly Player[];
  readonly matches: readonly Match[];
  readonly directory: PlayerDirectory;
}

export function buildSnapshot({
  players,
  matches
}: {
  players: readonly Player[];
  matches: readonly MatchRow[];
}): MatchSnapshot {
  const validated = matches.map((row) => Object.freeze(validateMatchRow(row)));

  return Object.freeze({
    players: Object.freeze([...players]),
    matches: Object.freeze(validated),
    directory: createPlayerDirectory(players)
  });
}

export function validateMatchRow(row: MatchRow): Match {
  const ids = [row.winner1_id, row.winner2_id, row.loser1_id, row.loser2_id];

  if (ids.some((id) => typeof id !== "string" || id.trim().length === 0)) {
    throw new InvalidMatchDataError(row.id || null, "all four player ids are required");
  }

  if (new Set(ids).size !== 4) {
    throw new InvalidMatchDataError(row.id || null, "the four players must be distinct");
  }

  const hasWinnerScore = row.winner_score !== null;
  const hasLoserScore = row.loser_score !== null;
  if (hasWinnerScore !== hasLoserScore) {
    throw new InvalidMatchDataError(
      row.id || null,
      "winner_score and loser_score must be given together or not at all"
    );
  }

  let score: Match["score"] = null;
  if (row.winner_score !== null && row.loser_score !== null) {
    if (!isScore(row.winner_score) || !isScore(row.loser_score)) {
      throw new InvalidMatchDataError(row.id || null, "scores must be non-negative integers");
    }

    score = { winner: row.winner_score, loser: row.loser_score };
  }

  const playedAt = row.played_at instanceof Date ? row.played_at : new Date(row.played_at);
  if (Number.isNaN(playedAt.getTime())) {
    throw new InvalidMatchDataError(row.id || null, `played_at '${String(row.played_at)}' is not a valid instant`);
  }

  return {
    id: row.id,
    winner_ids: [row.winner1_id, row.winner2_id],
    loser_ids: [row.loser1_id, row.loser2_id],
    score,
    comment: row.comment,
    recorded_by: row.recorded_by,
    played_at: playedAt
  };
}

export function createPlayerDirectory(players: readonly Player[]): PlayerDirectory {
  const byId = new Map(players.map((player) => [player.id, player]));

  return Object.freeze({
    has: (playerId: string) => byId.has(playerId),
    resolve: (playerId: string) =>
      byId.get(playerId) ?? {
        id: playerId,
        name: playerId,
        nickname: null,
        avatar_emoji: DEFAULT_AVATAR
      }
  });
}

/** Directory ids plus every id referenced by a match, ascending. */
export function knownPlayerIds(snapshot: MatchSnapshot) {
  const ids = new Set(snapshot.players.map((player) => player.id));

  for (const match of snapshot.matches) {
    for (const id of [...match.winner_ids, ...match.loser_ids]) {
      ids.add(id);
    }
  }

  return [...ids].sort(compareIds);
}

export function compareIds(a: string, b: string) {
  if (a === b) {
    return 0;
  }

  return a < b ? -1 : 1;
}

function isScore(value: number) {
  return Number.isInteger(value) && value >= 0;
}

import { randomUUID } from "node:crypto";
import { PlayerExistsError } from "@/lib/errors";
import type { NewMatch, ScoreboardRepository } from "@/lib/repository";
import type { MatchRow, Player } from "@/lib/types";

export interface MemorySeed {
  players?: Player[];
  matches?: MatchRow[];
}

/**
 * In-process store with the same contract as the Postgres repository.
 * Backs local runs without DATABASE_URL and the HTTP tests.
 */
export function createMemoryRepository(
  seed: MemorySeed = {},
  generateId: () => string = randomUUID
): ScoreboardRepository {
  const players = new Map<string, Player>();
  const matches = new Map<string, MatchRow>();

  for (const player of seed.players ?? []) {
    players.set(player.id, { ...player });
  }

  for (const match of seed.matches ?? []) {
    matches.set(match.id, { ...match });
  }

  return {
    async listPlayers() {
      return [...players.values()]
        .sort((a, b) => a.name.localeCompare(b.name) || a.id.localeCompare(b.id))
        .map((player) => ({ ...player }));
    },

    async getPlayer(playerId) {
      const player = players.get(playerId);
      return player ? { ...player } : null;
    },

    async createPlayer(input) {
      if (players.has(input.id)) {
        throw new PlayerExistsError(input.id);
      }

      const player: Player = { ...input };
      players.set(player.id, player);
      return { ...player };
    },

    async updatePlayer(playerId, patch) {
      const current = players.get(playerId);
      if (!current) {
        return null;
      }

      const next: Player = {
        ...current,
        name: patch.name ?? current.name,
        nickname: patch.nickname === undefined ? current.nickname : patch.nickname,
        avatar_emoji: patch.avatar_emoji ?? current.avatar_emoji
      };
      players.set(playerId, next);
      return { ...next };
    },

    async deletePlayer(playerId) {
      return players.delete(playerId);
    },

    async listMatches(limit) {
      const sorted = [...matches.values()].sort(newestFirst).map((match) => ({ ...match }));
      return limit === undefined ? sorted : sorted.slice(0, limit);
    },

    async createMatch(input: NewMatch) {
      const row: MatchRow = { id: generateId(), ...input };
      matches.set(row.id, row);
      return { ...row };
    },

    async deleteMatch(matchId) {
      return matches.delete(matchId);
    }
  };
}

function newestFirst(a: MatchRow, b: MatchRow) {
  const timeDiff = Date.parse(toIso(b.played_at)) - Date.parse(toIso(a.played_at));
  if (timeDiff !== 0) {
    return timeDiff;
  }

  if (a.id === b.id) {
    return 0;
  }

  return a.id < b.id ? -1 : 1;
}

function toIso(value: Date | string) {
  return value instanceof Date ? value.toISOString() : value;
}

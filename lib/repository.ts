import type { Sql } from "@/lib/db";
import { PlayerExistsError } from "@/lib/errors";
import type { MatchRow, Player } from "@/lib/types";

export interface NewPlayer {
  id: string;
  name: string;
  nickname: string | null;
  avatar_emoji: string;
}

export interface PlayerPatch {
  name?: string;
  nickname?: string | null;
  avatar_emoji?: string;
}

export interface NewMatch {
  winner1_id: string;
  winner2_id: string;
  loser1_id: string;
  loser2_id: string;
  winner_score: number | null;
  loser_score: number | null;
  comment: string | null;
  recorded_by: string;
  played_at: Date;
}

export interface ScoreboardRepository {
  listPlayers(): Promise<Player[]>;
  getPlayer(playerId: string): Promise<Player | null>;
  createPlayer(input: NewPlayer): Promise<Player>;
  updatePlayer(playerId: string, patch: PlayerPatch): Promise<Player | null>;
  deletePlayer(playerId: string): Promise<boolean>;
  /** Newest first. Omitting `limit` returns the complete history. */
  listMatches(limit?: number): Promise<MatchRow[]>;
  createMatch(input: NewMatch): Promise<MatchRow>;
  deleteMatch(matchId: string): Promise<boolean>;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function createPostgresRepository(sql: Sql): ScoreboardRepository {
  return {
    async listPlayers() {
      return sql<Player[]>`
        select id, name, nickname, avatar_emoji
        from players
        order by name asc, id asc
      `;
    },

    async getPlayer(playerId) {
      const rows = await sql<Player[]>`
        select id, name, nickname, avatar_emoji
        from players
        where id = ${playerId}
        limit 1
      `;

      return rows[0] ?? null;
    },

    async createPlayer(input) {
      try {
        const rows = await sql<Player[]>`
          insert into players (id, name, nickname, avatar_emoji)
          values (${input.id}, ${input.name}, ${input.nickname}, ${input.avatar_emoji})
          returning id, name, nickname, avatar_emoji
        `;

        return rows[0];
      } catch (error) {
        if (isDuplicateKeyError(error)) {
          throw new PlayerExistsError(input.id);
        }

        throw error;
      }
    },

    async updatePlayer(playerId, patch) {
      // nickname may be cleared explicitly, so it cannot go through coalesce.
      const clearNickname = patch.nickname === null;
      const rows = await sql<Player[]>`
        update players
        set
          name = coalesce(${patch.name ?? null}, name),
          nickname = case
            when ${clearNickname} then null
            else coalesce(${patch.nickname ?? null}, nickname)
          end,
          avatar_emoji = coalesce(${patch.avatar_emoji ?? null}, avatar_emoji)
        where id = ${playerId}
        returning id, name, nickname, avatar_emoji
      `;

      return rows[0] ?? null;
    },

    async deletePlayer(playerId) {
      const rows = await sql<Array<{ id: string }>>`
        delete from players
        where id = ${playerId}
        returning id
      `;

      return rows.length > 0;
    },

    async listMatches(limit) {
      if (limit === undefined) {
        return sql<MatchRow[]>`
          select ${sql(MATCH_COLUMNS)}
          from matches
          order by played_at desc, id asc
        `;
      }

      return sql<MatchRow[]>`
        select ${sql(MATCH_COLUMNS)}
        from matches
        order by played_at desc, id asc
        limit ${limit}
      `;
    },

    async createMatch(input) {
      const rows = await sql<MatchRow[]>`
        insert into matches (
          winner1_id,
          winner2_id,
          loser1_id,
          loser2_id,
          winner_score,
          loser_score,
          comment,
          recorded_by,
          played_at
        )
        values (
          ${input.winner1_id},
          ${input.winner2_id},
          ${input.loser1_id},
          ${input.loser2_id},
          ${input.winner_score},
          ${input.loser_score},
          ${input.comment},
          ${input.recorded_by},
          ${input.played_at}
        )
        returning ${sql(MATCH_COLUMNS)}
      `;

      return rows[0];
    },

    async deleteMatch(matchId) {
      if (!UUID_PATTERN.test(matchId)) {
        return false;
      }

      const rows = await sql<Array<{ id: string }>>`
        delete from matches
        where id = ${matchId}
        returning id
      `;

      return rows.length > 0;
    }
  };
}

const MATCH_COLUMNS = [
  "id",
  "winner1_id",
  "winner2_id",
  "loser1_id",
  "loser2_id",
  "winner_score",
  "loser_score",
  "comment",
  "recorded_by",
  "played_at"
];

function isDuplicateKeyError(error: unknown) {
  const message = error instanceof Error ? error.message : "";
  return message.includes("duplicate key") || message.includes("players_pkey");
}

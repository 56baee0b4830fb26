export interface Player {
  id: string;
  name: string;
  nickname: string | null;
  avatar_emoji: string;
}

export interface MatchRow {
  id: string;
  winner1_id: string;
  winner2_id: string;
  loser1_id: string;
  loser2_id: string;
  winner_score: number | null;
  loser_score: number | null;
  comment: string | null;
  recorded_by: string;
  played_at: Date | string;
}

export interface ScorePair {
  winner: number;
  loser: number;
}

export interface Match {
  id: string;
  winner_ids: readonly [string, string];
  loser_ids: readonly [string, string];
  score: ScorePair | null;
  comment: string | null;
  recorded_by: string;
  played_at: Date;
}

export interface WinLossStats {
  playerId: string;
  wins: number;
  losses: number;
  totalGames: number;
  winRate: number;
  streak: number;
}

export interface LeaderboardEntry extends WinLossStats {
  rank: number;
  playerName: string;
  nickname: string | null;
  avatarEmoji: string;
}

export interface PartnerRecord {
  partnerId: string;
  wins: number;
  losses: number;
}

export interface NemesisRecord {
  opponentId: string;
  lossesAgainst: number;
  winsAgainst: number;
}

export interface RelationshipStat {
  bestPartner: PartnerRecord | null;
  nemesis: NemesisRecord | null;
}

export interface RivalryEntry {
  player1Id: string;
  player2Id: string;
  player1Wins: number;
  player2Wins: number;
}

export type AchievementTone = "brag" | "shame";

export interface Achievement {
  id: string;
  emoji: string;
  title: string;
  description: string;
  tone: AchievementTone;
}

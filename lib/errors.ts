export class InvalidMatchDataError extends Error {
  readonly matchId: string | null;
  readonly reason: string;

  constructor(matchId: string | null, reason: string) {
    super(matchId ? `Match ${matchId} is invalid: ${reason}` : `Match is invalid: ${reason}`);
    this.name = "InvalidMatchDataError";
    this.matchId = matchId;
    this.reason = reason;
  }
}

export class PlayerExistsError extends Error {
  readonly playerId: string;

  constructor(playerId: string) {
    super(`Player '${playerId}' already exists`);
    this.name = "PlayerExistsError";
    this.playerId = playerId;
  }
}

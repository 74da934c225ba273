import type { RejectionCode } from "./types.js";

export class LobbyError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: RejectionCode,
    message: string
  ) {
    super(message);
  }
}

export function lobbyNotFound(lobbyId: string): LobbyError {
  return new LobbyError(404, "lobby_not_found", `Lobby ${lobbyId} not found.`);
}

export function raceNotFound(raceId: string): LobbyError {
  return new LobbyError(404, "race_not_found", `Race ${raceId} not found.`);
}

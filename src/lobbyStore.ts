import { randomUUID } from "node:crypto";
import { LobbyError, lobbyNotFound } from "./errors.js";
import { pickIndex } from "./rng.js";
import {
  EQUIPMENT_TYPES,
  type BotDifficulty,
  type Clock,
  type CreateLobbyInput,
  type JoinParticipantInput,
  type Lobby,
  type LobbyParticipant,
  type PublicLobby,
  type Race,
  type RaceResult,
  type RandomSource
} from "./types.js";

export const DEFAULT_MAX_PARTICIPANTS = 10;
export const DEFAULT_MIN_PARTICIPANTS = 2;

export const BOT_NAMES = [
  "RoboRower",
  "CyberSki",
  "BikeBotX",
  "IronPull",
  "SteelStroke",
  "TurboErg",
  "MechRacer",
  "AlphaBot",
  "BetaRow",
  "GammaGlide",
  "DeltaDrive",
  "EpsilonErg",
  "ZetaZoom",
  "ThetaThrust",
  "OmegaOar"
] as const;

export interface LobbyStoreOptions {
  random?: RandomSource;
  now?: Clock;
  createId?: () => string;
}

export function toPublicLobby(lobby: Lobby): PublicLobby {
  return {
    ...lobby,
    participants: lobby.participants.map((p) => ({ ...p })),
    raceResults: lobby.raceResults?.map((r) => ({ ...r })),
    participantCount: lobby.participants.length
  };
}

function toRaceResults(race: Race): RaceResult[] {
  return race.participants.map((p) => ({
    participantId: p.id,
    displayName: p.displayName,
    isBot: p.isBot,
    position: p.position,
    finishTime: p.finishTime,
    distance: p.distance,
    pace: p.pace,
    watts: p.watts,
    isFinished: p.isFinished
  }));
}

export class LobbyStore {
  private lobbies = new Map<string, Lobby>();
  private readonly random: RandomSource;
  private readonly now: Clock;
  private readonly createId: () => string;

  constructor(options: LobbyStoreOptions = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => Date.now());
    this.createId = options.createId ?? randomUUID;
  }

  count(): number {
    return this.lobbies.size;
  }

  getLobby(lobbyId: string): Lobby | undefined {
    return this.lobbies.get(lobbyId);
  }

  getLobbyOrThrow(lobbyId: string): Lobby {
    const lobby = this.lobbies.get(lobbyId);
    if (!lobby) {
      throw lobbyNotFound(lobbyId);
    }
    return lobby;
  }

  createLobby(input: CreateLobbyInput): Lobby {
    const maxParticipants = input.maxParticipants ?? DEFAULT_MAX_PARTICIPANTS;
    const minParticipants = input.minParticipants ?? DEFAULT_MIN_PARTICIPANTS;
    if (!Number.isInteger(input.raceDistanceMeters) || input.raceDistanceMeters <= 0) {
      throw new LobbyError(400, "malformed_command", "raceDistanceMeters must be a positive integer.");
    }
    if (minParticipants < 2 || minParticipants > maxParticipants) {
      throw new LobbyError(400, "malformed_command", "Participant limits must satisfy 2 <= min <= max.");
    }

    const now = this.now();
    const lobby: Lobby = {
      id: this.createId(),
      creatorId: input.creatorId,
      raceDistanceMeters: input.raceDistanceMeters,
      entryFee: input.entryFee ?? "0",
      payoutMode: input.payoutMode ?? "winner_takes_all",
      status: "WAITING",
      maxParticipants,
      minParticipants,
      createdAt: now,
      updatedAt: now,
      participants: []
    };

    this.lobbies.set(lobby.id, lobby);
    return lobby;
  }

  restoreLobby(lobby: Lobby): Lobby {
    const restored: Lobby = { ...lobby, status: "WAITING", participants: [], updatedAt: this.now() };
    this.lobbies.set(restored.id, restored);
    return restored;
  }

  private assertJoinable(lobby: Lobby): void {
    if (lobby.status !== "WAITING") {
      throw new LobbyError(409, "lobby_not_joinable", "New participants can only join while lobby is waiting.");
    }
    if (lobby.participants.length >= lobby.maxParticipants) {
      throw new LobbyError(409, "lobby_full", `Lobby ${lobby.id} is full.`);
    }
  }

  private assertWaiting(lobby: Lobby): void {
    if (lobby.status !== "WAITING") {
      throw new LobbyError(409, "lobby_not_waiting", `Lobby ${lobby.id} is no longer waiting.`);
    }
  }

  addParticipant(lobbyId: string, input: JoinParticipantInput): { lobby: Lobby; isReconnect: boolean } {
    const lobby = this.getLobbyOrThrow(lobbyId);
    if (lobby.participants.some((p) => p.id === input.id)) {
      return { lobby, isReconnect: true };
    }
    this.assertJoinable(lobby);

    const now = this.now();
    lobby.participants.push({
      id: input.id,
      displayName: input.displayName,
      walletAddress: input.walletAddress ?? "",
      equipmentType: input.equipmentType ?? "rower",
      status: "DEPOSITED",
      isBot: false,
      botDifficulty: null,
      joinedAt: now
    });
    lobby.updatedAt = now;
    return { lobby, isReconnect: false };
  }

  addBot(lobbyId: string, difficulty: BotDifficulty): { lobby: Lobby; bot: LobbyParticipant } {
    const lobby = this.getLobbyOrThrow(lobbyId);
    this.assertJoinable(lobby);

    const name = BOT_NAMES[pickIndex(this.random, BOT_NAMES.length)];
    const equipmentType = EQUIPMENT_TYPES[pickIndex(this.random, EQUIPMENT_TYPES.length)];
    const now = this.now();
    const bot: LobbyParticipant = {
      id: `bot-${this.createId().replace(/-/g, "").slice(0, 8)}`,
      displayName: `${name} (${difficulty})`,
      walletAddress: "",
      equipmentType,
      status: "READY",
      isBot: true,
      botDifficulty: difficulty,
      joinedAt: now
    };

    lobby.participants.push(bot);
    lobby.updatedAt = now;
    return { lobby, bot };
  }

  setReady(lobbyId: string, participantId: string): Lobby | undefined {
    const lobby = this.lobbies.get(lobbyId);
    if (!lobby) return undefined;
    this.assertWaiting(lobby);

    const participant = lobby.participants.find((p) => p.id === participantId);
    if (participant && participant.status !== "READY") {
      participant.status = "READY";
      lobby.updatedAt = this.now();
    }
    return lobby;
  }

  removeParticipant(lobbyId: string, participantId: string): Lobby | undefined {
    const lobby = this.lobbies.get(lobbyId);
    if (!lobby) return undefined;
    this.assertWaiting(lobby);

    const remaining = lobby.participants.filter((p) => p.id !== participantId);
    if (remaining.length !== lobby.participants.length) {
      lobby.participants = remaining;
      lobby.updatedAt = this.now();
    }
    return lobby;
  }

  canStart(lobby: Lobby): boolean {
    return (
      lobby.status === "WAITING" &&
      lobby.participants.length >= lobby.minParticipants &&
      lobby.participants.every((p) => p.isBot || p.status === "READY")
    );
  }

  listVisible(userId?: string): Lobby[] {
    return Array.from(this.lobbies.values()).filter((lobby) => {
      if (lobby.status !== "WAITING" && lobby.status !== "COMPLETED") return false;
      if (userId === undefined) return true;
      return lobby.creatorId === userId || lobby.participants.some((p) => p.id === userId);
    });
  }

  completeLobby(lobbyId: string, race: Race): Lobby {
    const lobby = this.getLobbyOrThrow(lobbyId);
    const finished = new Set(race.participants.filter((p) => p.isFinished).map((p) => p.id));
    for (const participant of lobby.participants) {
      if (finished.has(participant.id)) {
        participant.status = "FINISHED";
      }
    }
    lobby.status = "COMPLETED";
    lobby.raceId = race.id;
    lobby.raceResults = toRaceResults(race);
    lobby.updatedAt = this.now();
    return lobby;
  }

  cancelLobby(lobbyId: string, requesterId: string): Lobby {
    const lobby = this.getLobbyOrThrow(lobbyId);
    if (lobby.creatorId !== requesterId) {
      throw new LobbyError(403, "not_lobby_creator", "Only the lobby creator can cancel it.");
    }
    if (lobby.status !== "WAITING") {
      throw new LobbyError(409, "lobby_not_cancellable", "Only a waiting lobby can be cancelled.");
    }
    lobby.status = "CANCELLED";
    lobby.updatedAt = this.now();
    return lobby;
  }
}

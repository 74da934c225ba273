export type LobbyStatus = "WAITING" | "STARTING" | "IN_PROGRESS" | "COMPLETED" | "CANCELLED";
export type ParticipantStatus = "DEPOSITED" | "READY" | "RACING" | "FINISHED" | "DISCONNECTED";
export type RaceStatus = "PENDING" | "RACING" | "COMPLETED";

export type PayoutMode = "winner_takes_all" | "top_three";
export type EquipmentType = "rower" | "bike" | "ski";
export type BotDifficulty = "easy" | "medium" | "hard" | "elite";

export const EQUIPMENT_TYPES: readonly EquipmentType[] = ["rower", "bike", "ski"];
export const BOT_DIFFICULTIES: readonly BotDifficulty[] = ["easy", "medium", "hard", "elite"];

/** Returns a float in [0, 1). */
export type RandomSource = () => number;
export type Clock = () => number;

export interface LobbyParticipant {
  id: string;
  displayName: string;
  walletAddress: string;
  equipmentType: EquipmentType;
  status: ParticipantStatus;
  isBot: boolean;
  botDifficulty: BotDifficulty | null;
  joinedAt: number;
}

export interface RaceResult {
  participantId: string;
  displayName: string;
  isBot: boolean;
  position: number | null;
  finishTime: number | null;
  distance: number;
  pace: number;
  watts: number;
  isFinished: boolean;
}

export interface Lobby {
  id: string;
  creatorId: string;
  raceDistanceMeters: number;
  entryFee: string;
  payoutMode: PayoutMode;
  status: LobbyStatus;
  maxParticipants: number;
  minParticipants: number;
  createdAt: number;
  updatedAt: number;
  participants: LobbyParticipant[];
  raceId?: string;
  raceResults?: RaceResult[];
}

export interface PublicLobby extends Lobby {
  participantCount: number;
}

export interface RaceParticipant {
  id: string;
  displayName: string;
  walletAddress: string;
  equipmentType: EquipmentType;
  isBot: boolean;
  botDifficulty: BotDifficulty | null;
  distance: number;
  pace: number;
  watts: number;
  isFinished: boolean;
  finishTime: number | null;
  position: number | null;
}

export interface Race {
  id: string;
  lobbyId: string;
  status: RaceStatus;
  startTime: number | null;
  completedAt: number | null;
  targetDistanceMeters: number;
  participants: RaceParticipant[];
  finishedCount: number;
}

export interface RaceMetrics {
  distance: number;
  pace: number;
  watts: number;
}

export interface CreateLobbyInput {
  creatorId: string;
  raceDistanceMeters: number;
  entryFee?: string;
  payoutMode?: PayoutMode;
  maxParticipants?: number;
  minParticipants?: number;
}

export interface JoinParticipantInput {
  id: string;
  displayName: string;
  walletAddress?: string;
  equipmentType?: EquipmentType;
}

export interface UserProfile {
  id: string;
  displayName: string;
  email?: string;
  walletAddress?: string;
  skillRating: number;
  totalRaces: number;
  totalWins: number;
  totalEarnings: string;
  createdAt: string;
  lastActive: string;
}

export interface UserProfileInput {
  displayName?: string;
  email?: string;
  walletAddress?: string;
}

export type RejectionCode =
  | "malformed_command"
  | "lobby_not_found"
  | "race_not_found"
  | "lobby_full"
  | "lobby_not_joinable"
  | "lobby_not_waiting"
  | "lobby_not_startable"
  | "lobby_not_cancellable"
  | "race_not_running"
  | "not_lobby_creator";

export type ServerEvent =
  | { event: "lobby.created"; payload: PublicLobby }
  | { event: "lobby.updated"; payload: PublicLobby }
  | { event: "lobby.list"; payload: PublicLobby[] }
  | { event: "race.countdown"; payload: { lobbyId: string; raceId: string; count: number } }
  | { event: "race.started"; payload: Race }
  | { event: "race.update"; payload: Race }
  | { event: "race.completed"; payload: Race }
  | { event: "command.ok"; payload: { requestId: string | null; command: string; result: unknown } }
  | {
      event: "command.rejected";
      payload: { requestId: string | null; command: string | null; error: RejectionCode; message: string };
    };

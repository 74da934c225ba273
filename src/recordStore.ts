import { z } from "zod";
import type { Lobby, LobbyStatus, Race, UserProfile, UserProfileInput } from "./types.js";

/**
 * Mirror of lobby, race and user records in an external store. Every write is
 * best effort: callers fire these without awaiting and only log failures.
 */
export interface RecordStore {
  onLobbyCreated(lobby: Lobby): Promise<void>;
  onLobbyStatusChanged(lobbyId: string, status: LobbyStatus, participantCount: number): Promise<void>;
  onLobbyCompleted(lobby: Lobby): Promise<void>;
  onRaceCompleted(race: Race): Promise<void>;
  /** Adds one race to every human participant and one win to the human in first place. */
  onUserStatsShouldUpdate(race: Race): Promise<void>;
  fetchUserProfile(userId: string): Promise<UserProfile | null>;
  saveUserProfile(userId: string, data: UserProfileInput): Promise<UserProfile>;
  loadWaitingLobbies(): Promise<Lobby[]>;
}

export interface RedisLikeClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

const LobbyStatusSchema = z.enum(["WAITING", "STARTING", "IN_PROGRESS", "COMPLETED", "CANCELLED"]);

const LobbyRecordSchema = z.object({
  id: z.string(),
  creatorId: z.string(),
  raceDistanceMeters: z.number(),
  entryFee: z.string(),
  payoutMode: z.enum(["winner_takes_all", "top_three"]),
  status: LobbyStatusSchema,
  maxParticipants: z.number().int(),
  minParticipants: z.number().int(),
  participantCount: z.number().int(),
  createdAt: z.number(),
  completedAt: z.number().nullable(),
  raceId: z.string().nullable()
});

export type LobbyRecord = z.infer<typeof LobbyRecordSchema>;

const RaceResultRecordSchema = z.object({
  participantId: z.string(),
  displayName: z.string(),
  walletAddress: z.string(),
  equipmentType: z.enum(["rower", "bike", "ski"]),
  position: z.number().nullable(),
  finishTime: z.number().nullable(),
  distance: z.number(),
  pace: z.number(),
  watts: z.number(),
  isBot: z.boolean(),
  isFinished: z.boolean()
});

const RaceRecordSchema = z.object({
  id: z.string(),
  lobbyId: z.string(),
  targetDistanceMeters: z.number(),
  status: z.enum(["PENDING", "RACING", "COMPLETED"]),
  startTime: z.number().nullable(),
  completedAt: z.number(),
  finishedCount: z.number().int(),
  results: z.array(RaceResultRecordSchema)
});

export type RaceRecord = z.infer<typeof RaceRecordSchema>;

const UserProfileSchema = z.object({
  id: z.string(),
  displayName: z.string(),
  email: z.string().optional(),
  walletAddress: z.string().optional(),
  skillRating: z.number(),
  totalRaces: z.number().int(),
  totalWins: z.number().int(),
  totalEarnings: z.string(),
  createdAt: z.string(),
  lastActive: z.string()
});

const LobbyIndexSchema = z.array(z.string());

const LOBBY_INDEX_KEY = "lobbies:index";
const lobbyKey = (lobbyId: string) => `lobby:${lobbyId}`;
const raceKey = (raceId: string) => `race:${raceId}`;
const userKey = (userId: string) => `user:${userId}`;

/**
 * Record logic shared by the store backends. Backends only provide raw string
 * reads and writes; read-modify-write sequences run one at a time.
 */
abstract class DocumentRecordStore implements RecordStore {
  private queue: Promise<unknown> = Promise.resolve();

  protected abstract readRaw(key: string): Promise<string | null>;
  protected abstract writeRaw(key: string, value: string): Promise<void>;

  constructor(protected readonly now: () => Date = () => new Date()) {}

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.queue.then(work, work);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async read<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    const raw = await this.readRaw(key);
    if (raw === null) return null;
    return schema.parse(JSON.parse(raw));
  }

  /** Like `read`, but a document that is not JSON or does not match the schema reads as null. */
  private async readIfValid<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    const raw = await this.readRaw(key);
    if (raw === null) return null;
    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      if (error instanceof SyntaxError) return null;
      throw error;
    }
    const parsed = schema.safeParse(document);
    return parsed.success ? parsed.data : null;
  }

  private async write(key: string, value: unknown): Promise<void> {
    await this.writeRaw(key, JSON.stringify(value));
  }

  private async unindexLobby(lobbyId: string): Promise<void> {
    const index = (await this.read(LOBBY_INDEX_KEY, LobbyIndexSchema)) ?? [];
    if (index.includes(lobbyId)) {
      await this.write(LOBBY_INDEX_KEY, index.filter((id) => id !== lobbyId));
    }
  }

  getLobbyRecord(lobbyId: string): Promise<LobbyRecord | null> {
    return this.read(lobbyKey(lobbyId), LobbyRecordSchema);
  }

  getRaceRecord(raceId: string): Promise<RaceRecord | null> {
    return this.read(raceKey(raceId), RaceRecordSchema);
  }

  onLobbyCreated(lobby: Lobby): Promise<void> {
    return this.exclusive(async () => {
      const record: LobbyRecord = {
        id: lobby.id,
        creatorId: lobby.creatorId,
        raceDistanceMeters: lobby.raceDistanceMeters,
        entryFee: lobby.entryFee,
        payoutMode: lobby.payoutMode,
        status: lobby.status,
        maxParticipants: lobby.maxParticipants,
        minParticipants: lobby.minParticipants,
        participantCount: lobby.participants.length,
        createdAt: lobby.createdAt,
        completedAt: null,
        raceId: null
      };
      await this.write(lobbyKey(lobby.id), record);
      const index = (await this.read(LOBBY_INDEX_KEY, LobbyIndexSchema)) ?? [];
      if (!index.includes(lobby.id)) {
        await this.write(LOBBY_INDEX_KEY, [...index, lobby.id]);
      }
    });
  }

  onLobbyStatusChanged(lobbyId: string, status: LobbyStatus, participantCount: number): Promise<void> {
    return this.exclusive(async () => {
      const record = await this.read(lobbyKey(lobbyId), LobbyRecordSchema);
      if (!record) return;
      await this.write(lobbyKey(lobbyId), { ...record, status, participantCount });
      if (status === "CANCELLED" || status === "COMPLETED") {
        await this.unindexLobby(lobbyId);
      }
    });
  }

  onLobbyCompleted(lobby: Lobby): Promise<void> {
    return this.exclusive(async () => {
      const record = await this.read(lobbyKey(lobby.id), LobbyRecordSchema);
      if (!record) return;
      await this.write(lobbyKey(lobby.id), {
        ...record,
        status: "COMPLETED",
        participantCount: lobby.participants.length,
        raceId: lobby.raceId ?? null,
        completedAt: this.now().getTime()
      });
      await this.unindexLobby(lobby.id);
    });
  }

  onRaceCompleted(race: Race): Promise<void> {
    return this.exclusive(async () => {
      const record: RaceRecord = {
        id: race.id,
        lobbyId: race.lobbyId,
        targetDistanceMeters: race.targetDistanceMeters,
        status: race.status,
        startTime: race.startTime,
        completedAt: race.completedAt ?? this.now().getTime(),
        finishedCount: race.finishedCount,
        results: race.participants.map((p) => ({
          participantId: p.id,
          displayName: p.displayName,
          walletAddress: p.walletAddress,
          equipmentType: p.equipmentType,
          position: p.position,
          finishTime: p.finishTime,
          distance: p.distance,
          pace: p.pace,
          watts: p.watts,
          isBot: p.isBot,
          isFinished: p.isFinished
        }))
      };
      await this.write(raceKey(race.id), record);
    });
  }

  onUserStatsShouldUpdate(race: Race): Promise<void> {
    return this.exclusive(async () => {
      const lastActive = this.now().toISOString();
      for (const participant of race.participants) {
        if (participant.isBot) continue;
        const profile =
          (await this.read(userKey(participant.id), UserProfileSchema)) ??
          this.defaultProfile(participant.id, participant.displayName, lastActive);
        await this.write(userKey(participant.id), {
          ...profile,
          totalRaces: profile.totalRaces + 1,
          totalWins: profile.totalWins + (participant.position === 1 ? 1 : 0),
          lastActive
        });
      }
    });
  }

  fetchUserProfile(userId: string): Promise<UserProfile | null> {
    return this.read(userKey(userId), UserProfileSchema);
  }

  saveUserProfile(userId: string, data: UserProfileInput): Promise<UserProfile> {
    return this.exclusive(async () => {
      const lastActive = this.now().toISOString();
      const existing = await this.read(userKey(userId), UserProfileSchema);
      const profile: UserProfile = {
        ...(existing ?? this.defaultProfile(userId, "Rower", lastActive)),
        lastActive
      };
      if (data.displayName) profile.displayName = data.displayName;
      if (data.email) profile.email = data.email;
      if (data.walletAddress) profile.walletAddress = data.walletAddress;
      await this.write(userKey(userId), profile);
      return profile;
    });
  }

  /**
   * Waiting lobbies listed in the index. Records that are missing, unreadable
   * or past WAITING are skipped and dropped from the index.
   */
  loadWaitingLobbies(): Promise<Lobby[]> {
    return this.exclusive(async () => {
      const index = (await this.read(LOBBY_INDEX_KEY, LobbyIndexSchema)) ?? [];
      const lobbies: Lobby[] = [];
      for (const lobbyId of index) {
        const record = await this.readIfValid(lobbyKey(lobbyId), LobbyRecordSchema);
        if (!record || record.status !== "WAITING") continue;
        lobbies.push({
          id: record.id,
          creatorId: record.creatorId,
          raceDistanceMeters: record.raceDistanceMeters,
          entryFee: record.entryFee,
          payoutMode: record.payoutMode,
          status: "WAITING",
          maxParticipants: record.maxParticipants,
          minParticipants: record.minParticipants,
          createdAt: record.createdAt,
          updatedAt: record.createdAt,
          participants: []
        });
      }
      if (lobbies.length !== index.length) {
        await this.write(LOBBY_INDEX_KEY, lobbies.map((lobby) => lobby.id));
      }
      return lobbies;
    });
  }

  private defaultProfile(userId: string, displayName: string, createdAt: string): UserProfile {
    return {
      id: userId,
      displayName,
      skillRating: 1500,
      totalRaces: 0,
      totalWins: 0,
      totalEarnings: "0",
      createdAt,
      lastActive: createdAt
    };
  }
}

export class MemoryRecordStore extends DocumentRecordStore {
  private documents = new Map<string, string>();

  protected async readRaw(key: string): Promise<string | null> {
    return this.documents.get(key) ?? null;
  }

  protected async writeRaw(key: string, value: string): Promise<void> {
    this.documents.set(key, value);
  }
}

export class RedisRecordStore extends DocumentRecordStore {
  constructor(
    private readonly redis: RedisLikeClient,
    now?: () => Date
  ) {
    super(now);
  }

  protected readRaw(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  protected async writeRaw(key: string, value: string): Promise<void> {
    await this.redis.set(key, value);
  }
}

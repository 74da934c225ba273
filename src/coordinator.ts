import type { FastifyBaseLogger } from "fastify";
import { EventBroadcaster, type EventSink, type Session } from "./eventBroadcaster.js";
import { LobbyStore, toPublicLobby } from "./lobbyStore.js";
import { RaceEngine, type RaceEngineListener } from "./raceEngine.js";
import type { RecordStore } from "./recordStore.js";
import type {
  BotDifficulty,
  Clock,
  CreateLobbyInput,
  JoinParticipantInput,
  Lobby,
  LobbyParticipant,
  PublicLobby,
  Race,
  RaceMetrics,
  RandomSource,
  UserProfile,
  UserProfileInput
} from "./types.js";

export type CoordinatorLogger = Pick<FastifyBaseLogger, "info" | "warn" | "error">;

export type LobbyListMode = "per_user" | "all";

export interface CoordinatorOptions {
  recordStore: RecordStore;
  logger: CoordinatorLogger;
  broadcaster?: EventBroadcaster;
  lobbyListMode?: LobbyListMode;
  countdownIntervalMs?: number;
  tickIntervalMs?: number;
  random?: RandomSource;
  now?: Clock;
}

/** Identifies the live connection a command arrived on, if any. */
export interface CommandContext {
  connId?: string;
}

export interface RejoinResult {
  lobby: PublicLobby;
  race: Race | null;
}

export function snapshotRace(race: Race): Race {
  return structuredClone(race);
}

/**
 * Command surface shared by the REST and WebSocket transports. Each command
 * mutates the registry or the engine synchronously, then fans events out and
 * fires record-store writes without waiting for them.
 */
export class RaceCoordinator implements RaceEngineListener {
  readonly lobbies: LobbyStore;
  readonly races: RaceEngine;
  readonly broadcaster: EventBroadcaster;
  private readonly recordStore: RecordStore;
  private readonly log: CoordinatorLogger;
  private readonly lobbyListMode: LobbyListMode;
  private pendingWrites = new Set<Promise<void>>();

  constructor(options: CoordinatorOptions) {
    this.recordStore = options.recordStore;
    this.log = options.logger;
    this.lobbyListMode = options.lobbyListMode ?? "per_user";
    this.broadcaster = options.broadcaster ?? new EventBroadcaster();
    this.lobbies = new LobbyStore({ random: options.random, now: options.now });
    this.races = new RaceEngine(this.lobbies, this, {
      countdownIntervalMs: options.countdownIntervalMs,
      tickIntervalMs: options.tickIntervalMs,
      random: options.random,
      now: options.now
    });
  }

  private logEvent(event: string, context: Record<string, unknown>): void {
    this.log.info({ event, ...context }, "race_event");
  }

  private persist(hook: keyof RecordStore, context: Record<string, unknown>, write: () => Promise<unknown>): void {
    const pending = Promise.resolve()
      .then(write)
      .then(
        () => undefined,
        (error: unknown) => {
          this.log.warn({ event: "persistence.failed", hook, ...context, err: error }, "race_event");
        }
      );
    this.pendingWrites.add(pending);
    void pending.finally(() => this.pendingWrites.delete(pending));
  }

  /** Resolves once every record-store write fired so far has settled. */
  async settled(): Promise<void> {
    while (this.pendingWrites.size > 0) {
      await Promise.all([...this.pendingWrites]);
    }
  }

  private persistStatus(lobby: Lobby): void {
    const { id, status } = lobby;
    const participantCount = lobby.participants.length;
    this.persist("onLobbyStatusChanged", { lobbyId: id }, () =>
      this.recordStore.onLobbyStatusChanged(id, status, participantCount)
    );
  }

  private visibleFor(userId: string | undefined): PublicLobby[] {
    const filterBy = this.lobbyListMode === "per_user" ? userId : undefined;
    return this.lobbies.listVisible(filterBy).map(toPublicLobby);
  }

  private refreshLobbyLists(): void {
    this.broadcaster.publishLobbyList((session: Session) => this.visibleFor(session.userId));
  }

  private publishLobby(lobby: Lobby): PublicLobby {
    const publicLobby = toPublicLobby(lobby);
    this.broadcaster.toRoom(lobby.id, { event: "lobby.updated", payload: publicLobby });
    return publicLobby;
  }

  connect(connId: string, sink: EventSink): void {
    this.broadcaster.connect(connId, sink);
    this.broadcaster.toConnection(connId, { event: "lobby.list", payload: this.visibleFor(undefined) });
    this.logEvent("ws.open", { connId });
  }

  disconnect(connId: string): void {
    this.broadcaster.disconnect(connId);
    this.logEvent("ws.close", { connId });
  }

  identify(connId: string, userId: string): PublicLobby[] {
    this.broadcaster.identify(connId, userId);
    const visible = this.visibleFor(userId);
    this.broadcaster.toConnection(connId, { event: "lobby.list", payload: visible });
    this.logEvent("session.identify", { connId, userId });
    return visible;
  }

  listLobbies(userId?: string): PublicLobby[] {
    return this.visibleFor(userId);
  }

  getLobby(lobbyId: string): PublicLobby {
    return toPublicLobby(this.lobbies.getLobbyOrThrow(lobbyId));
  }

  getRace(raceId: string): Race {
    return snapshotRace(this.races.getRaceOrThrow(raceId));
  }

  createLobby(input: CreateLobbyInput, ctx: CommandContext = {}): PublicLobby {
    const lobby = this.lobbies.createLobby(input);
    const publicLobby = toPublicLobby(lobby);
    if (ctx.connId) {
      this.broadcaster.joinRoom(ctx.connId, lobby.id);
      this.broadcaster.toConnection(ctx.connId, { event: "lobby.created", payload: publicLobby });
    }
    this.refreshLobbyLists();
    this.logEvent("lobby.create", { lobbyId: lobby.id, creatorId: lobby.creatorId, connId: ctx.connId });
    this.persist("onLobbyCreated", { lobbyId: lobby.id }, () => this.recordStore.onLobbyCreated(publicLobby));
    return publicLobby;
  }

  joinLobby(lobbyId: string, participant: JoinParticipantInput, ctx: CommandContext = {}): PublicLobby {
    const { lobby, isReconnect } = this.lobbies.addParticipant(lobbyId, participant);
    if (ctx.connId) {
      this.broadcaster.joinRoom(ctx.connId, lobby.id);
    }
    const publicLobby = this.publishLobby(lobby);
    this.logEvent(isReconnect ? "lobby.reconnect" : "lobby.join", {
      lobbyId,
      participantId: participant.id,
      participantCount: lobby.participants.length
    });
    if (!isReconnect) {
      this.refreshLobbyLists();
      this.persistStatus(lobby);
    }
    return publicLobby;
  }

  addBot(lobbyId: string, difficulty: BotDifficulty): { lobby: PublicLobby; bot: LobbyParticipant } {
    const { lobby, bot } = this.lobbies.addBot(lobbyId, difficulty);
    const publicLobby = this.publishLobby(lobby);
    this.refreshLobbyLists();
    this.logEvent("lobby.bot", { lobbyId, botId: bot.id, difficulty });
    this.persistStatus(lobby);
    return { lobby: publicLobby, bot: { ...bot } };
  }

  setReady(lobbyId: string, participantId: string): PublicLobby {
    const lobby = this.lobbies.setReady(lobbyId, participantId);
    if (!lobby) {
      return this.getLobby(lobbyId);
    }
    this.logEvent("lobby.ready", { lobbyId, participantId });
    return this.publishLobby(lobby);
  }

  leaveLobby(lobbyId: string, participantId: string, ctx: CommandContext = {}): PublicLobby {
    const lobby = this.lobbies.removeParticipant(lobbyId, participantId);
    if (!lobby) {
      return this.getLobby(lobbyId);
    }
    if (ctx.connId) {
      this.broadcaster.leaveRoom(ctx.connId, lobbyId);
    }
    const publicLobby = this.publishLobby(lobby);
    this.refreshLobbyLists();
    this.logEvent("lobby.leave", { lobbyId, participantId, participantCount: lobby.participants.length });
    this.persistStatus(lobby);
    return publicLobby;
  }

  cancelLobby(lobbyId: string, requesterId: string): PublicLobby {
    const lobby = this.lobbies.cancelLobby(lobbyId, requesterId);
    const publicLobby = this.publishLobby(lobby);
    this.refreshLobbyLists();
    this.logEvent("lobby.cancel", { lobbyId, requesterId });
    this.persistStatus(lobby);
    return publicLobby;
  }

  rejoin(lobbyId: string, ctx: CommandContext = {}): RejoinResult {
    const lobby = this.getLobby(lobbyId);
    const live = lobby.raceId ? this.races.getRace(lobby.raceId) : undefined;
    const race = live && live.status !== "COMPLETED" ? snapshotRace(live) : null;
    if (ctx.connId) {
      this.broadcaster.joinRoom(ctx.connId, lobbyId);
      this.broadcaster.toConnection(ctx.connId, { event: "lobby.updated", payload: lobby });
      if (race) {
        this.broadcaster.toConnection(ctx.connId, { event: "race.update", payload: race });
      }
    }
    this.logEvent("lobby.rejoin", { lobbyId, connId: ctx.connId, raceId: race?.id ?? null });
    return { lobby, race };
  }

  startRace(lobbyId: string): Race {
    const lobby = this.lobbies.getLobbyOrThrow(lobbyId);
    const race = this.races.start(lobby);
    this.publishLobby(lobby);
    this.refreshLobbyLists();
    this.logEvent("race.start", {
      lobbyId,
      raceId: race.id,
      participantCount: race.participants.length,
      targetDistanceMeters: race.targetDistanceMeters
    });
    this.persistStatus(lobby);
    return snapshotRace(race);
  }

  reportMetrics(raceId: string, participantId: string, metrics: RaceMetrics): Race {
    return snapshotRace(this.races.recordMetrics(raceId, participantId, metrics));
  }

  getUserProfile(userId: string): Promise<UserProfile | null> {
    return this.recordStore.fetchUserProfile(userId);
  }

  saveUserProfile(userId: string, data: UserProfileInput): Promise<UserProfile> {
    return this.recordStore.saveUserProfile(userId, data);
  }

  /** Re-registers waiting lobbies mirrored in the record store. */
  /** Re-registers waiting lobbies from the record store. A failed read leaves the registry empty. */
  async restoreWaitingLobbies(): Promise<number> {
    let lobbies: Lobby[];
    try {
      lobbies = await this.recordStore.loadWaitingLobbies();
    } catch (error) {
      this.log.warn({ event: "lobby.restore_failed", err: error }, "race_event");
      return 0;
    }
    for (const lobby of lobbies) {
      if (!this.lobbies.getLobby(lobby.id)) {
        this.lobbies.restoreLobby(lobby);
      }
    }
    this.logEvent("lobby.restore", { count: lobbies.length });
    return lobbies.length;
  }

  dispose(): void {
    this.races.dispose();
  }

  onCountdown(race: Race, count: number): void {
    this.broadcaster.toRoom(race.lobbyId, {
      event: "race.countdown",
      payload: { lobbyId: race.lobbyId, raceId: race.id, count }
    });
  }

  onRaceStarted(race: Race): void {
    this.broadcaster.toRoom(race.lobbyId, { event: "race.started", payload: race });
    this.logEvent("race.racing", { lobbyId: race.lobbyId, raceId: race.id, startTime: race.startTime });
  }

  onRaceUpdate(race: Race): void {
    this.broadcaster.toRoom(race.lobbyId, { event: "race.update", payload: race });
  }

  onRaceCompleted(race: Race): void {
    const lobby = this.lobbies.getLobby(race.lobbyId);
    if (!lobby) {
      this.log.error({ event: "race.orphaned", raceId: race.id, lobbyId: race.lobbyId }, "race_event");
      return;
    }
    this.lobbies.completeLobby(lobby.id, race);
    const results = snapshotRace(race);
    const completedLobby = toPublicLobby(lobby);
    this.broadcaster.toRoom(lobby.id, { event: "race.completed", payload: results });
    this.broadcaster.toRoom(lobby.id, { event: "lobby.updated", payload: completedLobby });
    this.refreshLobbyLists();
    this.logEvent("race.completed", {
      lobbyId: lobby.id,
      raceId: race.id,
      winnerId: race.participants.find((p) => p.position === 1)?.id ?? null
    });

    this.persist("onLobbyCompleted", { lobbyId: lobby.id }, () => this.recordStore.onLobbyCompleted(completedLobby));
    this.persist("onRaceCompleted", { raceId: race.id }, () => this.recordStore.onRaceCompleted(results));
    this.persist("onUserStatsShouldUpdate", { raceId: race.id }, () =>
      this.recordStore.onUserStatsShouldUpdate(results)
    );
  }
}

import { randomUUID } from "node:crypto";
import { advanceBot } from "./botSimulator.js";
import { LobbyError, raceNotFound } from "./errors.js";
import type { LobbyStore } from "./lobbyStore.js";
import type { Clock, Lobby, Race, RaceMetrics, RaceParticipant, RandomSource } from "./types.js";

export const COUNTDOWN_FROM = 5;
export const DEFAULT_COUNTDOWN_INTERVAL_MS = 1000;
export const DEFAULT_TICK_INTERVAL_MS = 500;

export interface RaceEngineListener {
  onCountdown(race: Race, count: number): void;
  onRaceStarted(race: Race): void;
  onRaceUpdate(race: Race): void;
  onRaceCompleted(race: Race): void;
}

export interface RaceEngineOptions {
  countdownIntervalMs?: number;
  tickIntervalMs?: number;
  random?: RandomSource;
  now?: Clock;
  createId?: () => string;
}

type ActiveRace = {
  race: Race;
  timer: ReturnType<typeof setInterval> | null;
  completed: boolean;
};

export class RaceEngine {
  private races = new Map<string, ActiveRace>();
  private readonly countdownIntervalMs: number;
  private readonly tickIntervalMs: number;
  private readonly random: RandomSource;
  private readonly now: Clock;
  private readonly createId: () => string;

  constructor(
    private readonly lobbyStore: LobbyStore,
    private readonly listener: RaceEngineListener,
    options: RaceEngineOptions = {}
  ) {
    this.countdownIntervalMs = options.countdownIntervalMs ?? DEFAULT_COUNTDOWN_INTERVAL_MS;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => Date.now());
    this.createId = options.createId ?? randomUUID;
  }

  count(): number {
    return this.races.size;
  }

  getRace(raceId: string): Race | undefined {
    return this.races.get(raceId)?.race;
  }

  getRaceOrThrow(raceId: string): Race {
    const race = this.getRace(raceId);
    if (!race) {
      throw raceNotFound(raceId);
    }
    return race;
  }

  start(lobby: Lobby): Race {
    if (!this.lobbyStore.canStart(lobby)) {
      throw new LobbyError(
        409,
        "lobby_not_startable",
        `Lobby ${lobby.id} needs ${lobby.minParticipants}+ participants, all ready.`
      );
    }

    const race: Race = {
      id: this.createId(),
      lobbyId: lobby.id,
      status: "PENDING",
      startTime: null,
      completedAt: null,
      targetDistanceMeters: lobby.raceDistanceMeters,
      participants: lobby.participants.map(
        (p): RaceParticipant => ({
          id: p.id,
          displayName: p.displayName,
          walletAddress: p.walletAddress,
          equipmentType: p.equipmentType,
          isBot: p.isBot,
          botDifficulty: p.botDifficulty,
          distance: 0,
          pace: 0,
          watts: 0,
          isFinished: false,
          finishTime: null,
          position: null
        })
      ),
      finishedCount: 0
    };

    lobby.status = "IN_PROGRESS";
    lobby.raceId = race.id;
    lobby.updatedAt = this.now();
    for (const participant of lobby.participants) {
      participant.status = "RACING";
    }

    const entry: ActiveRace = { race, timer: null, completed: false };
    this.races.set(race.id, entry);
    this.startCountdown(entry);
    return race;
  }

  private startCountdown(entry: ActiveRace): void {
    let remaining = COUNTDOWN_FROM;
    entry.timer = setInterval(() => {
      if (entry.completed || entry.race.status !== "PENDING") {
        this.clearTimer(entry);
        return;
      }
      if (remaining > 0) {
        this.listener.onCountdown(entry.race, remaining);
        remaining -= 1;
        return;
      }

      this.clearTimer(entry);
      entry.race.startTime = this.now();
      entry.race.status = "RACING";
      this.listener.onRaceStarted(entry.race);
      this.startTicking(entry);
    }, this.countdownIntervalMs);
  }

  private startTicking(entry: ActiveRace): void {
    entry.timer = setInterval(() => this.tick(entry.race.id), this.tickIntervalMs);
  }

  /** One bot-simulation step. Public so callers can drive a race without the timer. */
  tick(raceId: string): void {
    const entry = this.races.get(raceId);
    if (!entry || entry.completed || entry.race.status !== "RACING") {
      if (entry) this.clearTimer(entry);
      return;
    }

    const { race } = entry;
    const elapsedMs = this.now() - (race.startTime ?? this.now());
    for (const participant of race.participants) {
      if (!participant.isBot || participant.isFinished) continue;

      const progress = advanceBot(participant, race.targetDistanceMeters, elapsedMs / 1000, this.random);
      participant.distance = progress.distance;
      participant.pace = progress.pace;
      participant.watts = progress.watts;
      if (participant.distance >= race.targetDistanceMeters) {
        this.finishParticipant(race, participant, elapsedMs);
      }
    }

    this.listener.onRaceUpdate(race);
    this.completeIfFinished(entry);
  }

  recordMetrics(raceId: string, participantId: string, metrics: RaceMetrics): Race {
    const entry = this.races.get(raceId);
    if (!entry) {
      throw raceNotFound(raceId);
    }
    const { race } = entry;
    if (race.status === "PENDING") {
      throw new LobbyError(409, "race_not_running", `Race ${raceId} has not started yet.`);
    }

    const participant = race.participants.find((p) => p.id === participantId);
    if (!participant || participant.isFinished || race.status !== "RACING") {
      return race;
    }

    participant.distance = Math.min(Math.max(participant.distance, metrics.distance), race.targetDistanceMeters);
    participant.pace = metrics.pace;
    participant.watts = metrics.watts;
    if (participant.distance >= race.targetDistanceMeters) {
      this.finishParticipant(race, participant, this.now() - (race.startTime ?? this.now()));
    }

    this.listener.onRaceUpdate(race);
    this.completeIfFinished(entry);
    return race;
  }

  private finishParticipant(race: Race, participant: RaceParticipant, finishTimeMs: number): void {
    participant.isFinished = true;
    participant.finishTime = finishTimeMs;
    race.finishedCount += 1;
    participant.position = race.finishedCount;
  }

  private completeIfFinished(entry: ActiveRace): void {
    if (entry.completed || !entry.race.participants.every((p) => p.isFinished)) {
      return;
    }
    entry.completed = true;
    this.clearTimer(entry);
    entry.race.status = "COMPLETED";
    entry.race.completedAt = this.now();
    this.listener.onRaceCompleted(entry.race);
  }

  private clearTimer(entry: ActiveRace): void {
    if (entry.timer !== null) {
      clearInterval(entry.timer);
      entry.timer = null;
    }
  }

  /** Stops every countdown and tick loop. Races stay readable. */
  dispose(): void {
    for (const entry of this.races.values()) {
      entry.completed = true;
      this.clearTimer(entry);
    }
  }
}

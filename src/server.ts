import Fastify, { type FastifyBaseLogger } from "fastify";
import websocket from "@fastify/websocket";
import { pathToFileURL } from "node:url";
import { createClient } from "redis";
import type { RawData } from "ws";
import { ZodError } from "zod";
import { dispatchCommand, formatZodError } from "./commandDispatcher.js";
import {
  AddBotBodySchema,
  CancelLobbyBodySchema,
  CreateLobbySchema,
  ListLobbiesSchema,
  LobbyPathSchema,
  MetricsBodySchema,
  ParticipantActionBodySchema,
  ParticipantSchema,
  RacePathSchema,
  UserPathSchema,
  UserProfileInputSchema
} from "./commands.js";
import { loadConfig, type BackendConfig } from "./config.js";
import { RaceCoordinator } from "./coordinator.js";
import { LobbyError } from "./errors.js";
import { MemoryRecordStore, RedisRecordStore, type RecordStore } from "./recordStore.js";
import { createSeededRandom } from "./rng.js";
import type { RandomSource } from "./types.js";

const API_V1_PREFIX = "/api/v1";

type CreateAppOptions = {
  logger?: boolean;
  recordStore?: RecordStore;
  redis?: ReturnType<typeof createClient> | null;
  random?: RandomSource;
};

function rawToString(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString("utf8");
  return raw.toString("utf8");
}

const REDIS_CONNECT_RETRIES = 3;

async function createRecordStore(
  redisUrl: string,
  log: FastifyBaseLogger
): Promise<{
  recordStore: RecordStore;
  redis: ReturnType<typeof createClient> | null;
}> {
  if (redisUrl.length === 0) {
    return { recordStore: new MemoryRecordStore(), redis: null };
  }
  const redis = createClient({
    url: redisUrl,
    socket: {
      reconnectStrategy: (retries) =>
        retries >= REDIS_CONNECT_RETRIES ? new Error("Redis is unreachable.") : Math.min(retries * 100, 1000)
    }
  });
  redis.on("error", (err) => {
    log.warn({ err }, "redis_error");
  });
  try {
    await redis.connect();
    return { recordStore: new RedisRecordStore(redis), redis };
  } catch (error) {
    log.warn({ err: error }, "redis_unavailable_using_memory_store");
    try {
      await redis.disconnect();
    } catch (disconnectError) {
      log.debug({ err: disconnectError }, "redis_disconnect_failed");
    }
    return { recordStore: new MemoryRecordStore(), redis: null };
  }
}

export async function createApp(config: BackendConfig, options: CreateAppOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });
  const { recordStore, redis } = options.recordStore
    ? { recordStore: options.recordStore, redis: options.redis ?? null }
    : await createRecordStore(config.REDIS_URL, app.log);
  const random =
    options.random ?? (config.RANDOM_SEED === undefined ? Math.random : createSeededRandom(config.RANDOM_SEED));
  const coordinator = new RaceCoordinator({
    recordStore,
    logger: app.log,
    lobbyListMode: config.LOBBY_LIST_MODE,
    countdownIntervalMs: config.COUNTDOWN_INTERVAL_MS,
    tickIntervalMs: config.RACE_TICK_MS,
    random
  });
  let wsConnectionSeq = 1;
  const allowedOrigins = config.CORS_ALLOWED_ORIGINS.split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  const allowAnyOrigin = allowedOrigins.includes("*");

  function resolveAllowOrigin(requestOrigin: string | undefined): string {
    if (allowAnyOrigin) {
      return "*";
    }
    if (requestOrigin && allowedOrigins.includes(requestOrigin)) {
      return requestOrigin;
    }
    return allowedOrigins[0] ?? "*";
  }

  app.addHook("onRequest", async (request, reply) => {
    const allowOrigin = resolveAllowOrigin(request.headers.origin);

    reply.header("Access-Control-Allow-Origin", allowOrigin);
    reply.header("Access-Control-Allow-Methods", "GET,HEAD,POST,PUT,OPTIONS");
    reply.header("Access-Control-Allow-Headers", "Accept,Content-Type");
    reply.header("Access-Control-Max-Age", "86400");
    if (!allowAnyOrigin) {
      reply.header("Vary", "Origin");
    }

    if (request.method === "OPTIONS") {
      return reply.code(204).send();
    }
  });

  app.setErrorHandler((error: Error, _request, reply) => {
    if (error instanceof LobbyError) {
      reply.code(error.statusCode).send({ error: error.code, message: error.message });
      return;
    }
    if (error instanceof ZodError) {
      reply.code(400).send({ error: "malformed_command", message: formatZodError(error) });
      return;
    }
    if ("statusCode" in error && typeof error.statusCode === "number" && error.statusCode < 500) {
      reply.code(error.statusCode).send({ error: "malformed_command", message: error.message });
      return;
    }
    app.log.error(error);
    reply.code(500).send({ error: "internal_error" });
  });

  await app.register(websocket);

  app.get("/health", async () => ({
    ok: true,
    redis: redis?.isReady ?? false,
    lobbies: coordinator.lobbies.count(),
    races: coordinator.races.count(),
    connections: coordinator.broadcaster.sessionCount()
  }));

  app.post(`${API_V1_PREFIX}/lobbies`, async (request, reply) => {
    const body = CreateLobbySchema.parse(request.body);
    return reply.code(201).send({ lobby: coordinator.createLobby(body) });
  });

  app.get(`${API_V1_PREFIX}/lobbies`, async (request) => {
    const query = ListLobbiesSchema.parse(request.query);
    return { lobbies: coordinator.listLobbies(query.userId) };
  });

  app.get(`${API_V1_PREFIX}/lobbies/:lobbyId`, async (request) => {
    const params = LobbyPathSchema.parse(request.params);
    return { lobby: coordinator.getLobby(params.lobbyId) };
  });

  app.post(`${API_V1_PREFIX}/lobbies/:lobbyId/join`, async (request) => {
    const params = LobbyPathSchema.parse(request.params);
    const participant = ParticipantSchema.parse(request.body);
    return { lobby: coordinator.joinLobby(params.lobbyId, participant) };
  });

  app.post(`${API_V1_PREFIX}/lobbies/:lobbyId/bots`, async (request) => {
    const params = LobbyPathSchema.parse(request.params);
    const body = AddBotBodySchema.parse(request.body ?? {});
    return coordinator.addBot(params.lobbyId, body.difficulty);
  });

  app.post(`${API_V1_PREFIX}/lobbies/:lobbyId/ready`, async (request) => {
    const params = LobbyPathSchema.parse(request.params);
    const body = ParticipantActionBodySchema.parse(request.body);
    return { lobby: coordinator.setReady(params.lobbyId, body.participantId) };
  });

  app.post(`${API_V1_PREFIX}/lobbies/:lobbyId/leave`, async (request) => {
    const params = LobbyPathSchema.parse(request.params);
    const body = ParticipantActionBodySchema.parse(request.body);
    return { lobby: coordinator.leaveLobby(params.lobbyId, body.participantId) };
  });

  app.post(`${API_V1_PREFIX}/lobbies/:lobbyId/cancel`, async (request) => {
    const params = LobbyPathSchema.parse(request.params);
    const body = CancelLobbyBodySchema.parse(request.body);
    return { lobby: coordinator.cancelLobby(params.lobbyId, body.requesterId) };
  });

  app.post(`${API_V1_PREFIX}/lobbies/:lobbyId/start`, async (request) => {
    const params = LobbyPathSchema.parse(request.params);
    return { race: coordinator.startRace(params.lobbyId) };
  });

  app.get(`${API_V1_PREFIX}/races/:raceId`, async (request) => {
    const params = RacePathSchema.parse(request.params);
    return { race: coordinator.getRace(params.raceId) };
  });

  app.post(`${API_V1_PREFIX}/races/:raceId/metrics`, async (request) => {
    const params = RacePathSchema.parse(request.params);
    const { participantId, distance, pace, watts } = MetricsBodySchema.parse(request.body);
    return { race: coordinator.reportMetrics(params.raceId, participantId, { distance, pace, watts }) };
  });

  app.get(`${API_V1_PREFIX}/users/:userId/profile`, async (request) => {
    const params = UserPathSchema.parse(request.params);
    return { profile: await coordinator.getUserProfile(params.userId) };
  });

  app.put(`${API_V1_PREFIX}/users/:userId/profile`, async (request) => {
    const params = UserPathSchema.parse(request.params);
    const body = UserProfileInputSchema.parse(request.body ?? {});
    return { profile: await coordinator.saveUserProfile(params.userId, body) };
  });

  app.get("/ws", { websocket: true }, (socket) => {
    const connId = `ws-${wsConnectionSeq++}`;
    coordinator.connect(connId, socket);

    socket.on("message", (raw) => {
      try {
        const reply = dispatchCommand(coordinator, connId, rawToString(raw));
        coordinator.broadcaster.toConnection(connId, reply);
      } catch (error) {
        app.log.error({ err: error, connId }, "ws_command_failed");
        coordinator.broadcaster.toConnection(connId, {
          event: "command.rejected",
          payload: { requestId: null, command: null, error: "malformed_command", message: "internal_error" }
        });
      }
    });

    socket.on("close", () => {
      coordinator.disconnect(connId);
    });
  });

  app.addHook("onClose", async () => {
    coordinator.dispose();
    await coordinator.settled();
    if (redis) {
      await redis.disconnect();
    }
  });

  await coordinator.restoreWaitingLobbies();

  return app;
}

async function bootstrap() {
  const config = loadConfig();
  const app = await createApp(config);
  await app.listen({ host: config.HOST, port: config.PORT });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void bootstrap();
}

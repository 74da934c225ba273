import { ZodError } from "zod";
import {
  AddBotSchema,
  CancelLobbySchema,
  CommandEnvelopeSchema,
  CreateLobbySchema,
  IdentifySchema,
  JoinLobbySchema,
  ListLobbiesSchema,
  LobbyPathSchema,
  ParticipantActionSchema,
  RacePathSchema,
  ReportMetricsSchema,
  type CommandEnvelope
} from "./commands.js";
import type { RaceCoordinator } from "./coordinator.js";
import { LobbyError } from "./errors.js";
import type { ServerEvent } from "./types.js";

function parseFrame(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new LobbyError(400, "malformed_command", "Command frame is not valid JSON.");
  }
}

function runCommand(coordinator: RaceCoordinator, connId: string, envelope: CommandEnvelope): unknown {
  const ctx = { connId };
  const payload = envelope.payload ?? {};

  switch (envelope.command) {
    case "session.identify": {
      const { userId } = IdentifySchema.parse(payload);
      return coordinator.identify(connId, userId);
    }
    case "lobby.create":
      return coordinator.createLobby(CreateLobbySchema.parse(payload), ctx);
    case "lobby.list": {
      const { userId } = ListLobbiesSchema.parse(payload);
      return coordinator.listLobbies(userId ?? coordinator.broadcaster.getSession(connId)?.userId);
    }
    case "lobby.get":
      return coordinator.getLobby(LobbyPathSchema.parse(payload).lobbyId);
    case "lobby.join": {
      const { lobbyId, participant } = JoinLobbySchema.parse(payload);
      return coordinator.joinLobby(lobbyId, participant, ctx);
    }
    case "lobby.addBot": {
      const { lobbyId, difficulty } = AddBotSchema.parse(payload);
      return coordinator.addBot(lobbyId, difficulty);
    }
    case "lobby.ready": {
      const { lobbyId, participantId } = ParticipantActionSchema.parse(payload);
      return coordinator.setReady(lobbyId, participantId);
    }
    case "lobby.leave": {
      const { lobbyId, participantId } = ParticipantActionSchema.parse(payload);
      return coordinator.leaveLobby(lobbyId, participantId, ctx);
    }
    case "lobby.rejoin":
      return coordinator.rejoin(LobbyPathSchema.parse(payload).lobbyId, ctx);
    case "lobby.cancel": {
      const { lobbyId, requesterId } = CancelLobbySchema.parse(payload);
      return coordinator.cancelLobby(lobbyId, requesterId);
    }
    case "race.start":
      return coordinator.startRace(LobbyPathSchema.parse(payload).lobbyId);
    case "race.metrics": {
      const { raceId, participantId, distance, pace, watts } = ReportMetricsSchema.parse(payload);
      return coordinator.reportMetrics(raceId, participantId, { distance, pace, watts });
    }
    case "race.get":
      return coordinator.getRace(RacePathSchema.parse(payload).raceId);
  }
}

/**
 * Runs one WebSocket command frame and builds the reply for the sending
 * connection. Rejections never escape; anything unexpected is rethrown.
 */
export function dispatchCommand(coordinator: RaceCoordinator, connId: string, raw: string): ServerEvent {
  let envelope: CommandEnvelope | null = null;
  try {
    envelope = CommandEnvelopeSchema.parse(parseFrame(raw));
    const result = runCommand(coordinator, connId, envelope);
    return {
      event: "command.ok",
      payload: { requestId: envelope.requestId ?? null, command: envelope.command, result }
    };
  } catch (error) {
    if (error instanceof LobbyError || error instanceof ZodError) {
      return {
        event: "command.rejected",
        payload: {
          requestId: envelope?.requestId ?? null,
          command: envelope?.command ?? null,
          error: error instanceof LobbyError ? error.code : "malformed_command",
          message: error instanceof LobbyError ? error.message : formatZodError(error)
        }
      };
    }
    throw error;
  }
}

export function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`).join("; ");
}

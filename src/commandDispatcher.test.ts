import { describe, expect, it, vi } from "vitest";
import { dispatchCommand } from "./commandDispatcher.js";
import { RaceCoordinator } from "./coordinator.js";
import { MemoryRecordStore } from "./recordStore.js";
import type { PublicLobby, ServerEvent } from "./types.js";

function createCoordinator() {
  return new RaceCoordinator({
    recordStore: new MemoryRecordStore(),
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    random: () => 0
  });
}

function send(coordinator: RaceCoordinator, frame: unknown, connId = "c1"): ServerEvent {
  return dispatchCommand(coordinator, connId, JSON.stringify(frame));
}

function okResult(reply: ServerEvent): unknown {
  if (reply.event !== "command.ok") {
    throw new Error(`Expected command.ok, got ${JSON.stringify(reply)}`);
  }
  return reply.payload.result;
}

function lobbyId(result: unknown): string {
  if (typeof result === "object" && result !== null && "id" in result && typeof result.id === "string") {
    return result.id;
  }
  throw new Error("Result has no lobby id.");
}

describe("dispatchCommand", () => {
  it("rejects a frame that is not JSON", () => {
    const reply = dispatchCommand(createCoordinator(), "c1", "{not json");
    expect(reply).toEqual({
      event: "command.rejected",
      payload: {
        requestId: null,
        command: null,
        error: "malformed_command",
        message: "Command frame is not valid JSON."
      }
    });
  });

  it("rejects an unknown command name", () => {
    const reply = send(createCoordinator(), { command: "lobby.explode", requestId: "r1" });
    expect(reply).toMatchObject({
      event: "command.rejected",
      payload: { requestId: null, command: null, error: "malformed_command" }
    });
  });

  it("echoes the request id on success", () => {
    const reply = send(createCoordinator(), {
      command: "lobby.create",
      requestId: "r1",
      payload: { creatorId: "alice", raceDistanceMeters: 500 }
    });
    expect(reply).toMatchObject({
      event: "command.ok",
      payload: { requestId: "r1", command: "lobby.create", result: { creatorId: "alice", status: "WAITING" } }
    });
  });

  it("reports payload validation failures by field", () => {
    const reply = send(createCoordinator(), {
      command: "lobby.create",
      requestId: "r2",
      payload: { creatorId: "alice", raceDistanceMeters: -5 }
    });
    expect(reply).toEqual({
      event: "command.rejected",
      payload: {
        requestId: "r2",
        command: "lobby.create",
        error: "malformed_command",
        message: "raceDistanceMeters: Number must be greater than 0"
      }
    });
  });

  it("carries the lobby error code for domain rejections", () => {
    const reply = send(createCoordinator(), {
      command: "lobby.join",
      requestId: "r3",
      payload: { lobbyId: "missing", participant: { id: "bob", displayName: "Bob" } }
    });
    expect(reply).toEqual({
      event: "command.rejected",
      payload: {
        requestId: "r3",
        command: "lobby.join",
        error: "lobby_not_found",
        message: "Lobby missing not found."
      }
    });
  });

  it("runs a lobby through join, bot, ready and start", () => {
    const coordinator = createCoordinator();
    const id = lobbyId(okResult(send(coordinator, { command: "lobby.create", payload: { creatorId: "alice", raceDistanceMeters: 500 } })));

    okResult(send(coordinator, { command: "lobby.join", payload: { lobbyId: id, participant: { id: "alice", displayName: "Alice" } } }));
    okResult(send(coordinator, { command: "lobby.addBot", payload: { lobbyId: id } }));
    const early = send(coordinator, { command: "race.start", payload: { lobbyId: id } });
    expect(early).toMatchObject({ event: "command.rejected", payload: { error: "lobby_not_startable" } });

    okResult(send(coordinator, { command: "lobby.ready", payload: { lobbyId: id, participantId: "alice" } }));
    const race = okResult(send(coordinator, { command: "race.start", payload: { lobbyId: id } }));

    expect(race).toMatchObject({ lobbyId: id, status: "PENDING", targetDistanceMeters: 500 });
    expect(coordinator.getLobby(id).participants.map((p) => p.botDifficulty)).toEqual([null, "medium"]);
    coordinator.dispose();
  });

  it("lists lobbies for the identified session when no user is given", () => {
    const coordinator = createCoordinator();
    coordinator.connect("c1", { readyState: 1, send: () => undefined });
    send(coordinator, { command: "lobby.create", payload: { creatorId: "alice", raceDistanceMeters: 500 } });
    send(coordinator, { command: "lobby.create", payload: { creatorId: "bob", raceDistanceMeters: 500 } });

    okResult(send(coordinator, { command: "session.identify", payload: { userId: "alice" } }));
    const listed = okResult(send(coordinator, { command: "lobby.list" }));

    expect(Array.isArray(listed) && listed.map((l: PublicLobby) => l.creatorId)).toEqual(["alice"]);
  });

  it("rejects metrics for an unknown race", () => {
    const reply = send(createCoordinator(), {
      command: "race.metrics",
      payload: { raceId: "nope", participantId: "alice", distance: 10, pace: 120, watts: 150 }
    });
    expect(reply).toMatchObject({ event: "command.rejected", payload: { error: "race_not_found" } });
  });
});

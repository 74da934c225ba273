import { describe, expect, it } from "vitest";
import { LobbyError } from "./errors.js";
import { LobbyStore, toPublicLobby } from "./lobbyStore.js";
import type { Race, RandomSource } from "./types.js";

function sequence(values: number[]): RandomSource {
  let index = 0;
  return () => values[index++ % values.length] ?? 0;
}

function counterIds(prefix: string): () => string {
  let next = 1;
  return () => `${prefix}-${next++}`;
}

function createStore(random: RandomSource = () => 0) {
  let clock = 1_000;
  const store = new LobbyStore({
    random,
    now: () => clock,
    createId: counterIds("lobby")
  });
  return {
    store,
    advance(ms: number) {
      clock += ms;
    }
  };
}

function expectRejection(run: () => unknown, statusCode: number, code: string): void {
  try {
    run();
  } catch (error) {
    expect(error).toBeInstanceOf(LobbyError);
    expect(error).toMatchObject({ statusCode, code });
    return;
  }
  throw new Error(`Expected ${code} rejection.`);
}

describe("LobbyStore.createLobby", () => {
  it("applies defaults for optional settings", () => {
    const { store } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });

    expect(lobby).toEqual({
      id: "lobby-1",
      creatorId: "alice",
      raceDistanceMeters: 500,
      entryFee: "0",
      payoutMode: "winner_takes_all",
      status: "WAITING",
      maxParticipants: 10,
      minParticipants: 2,
      createdAt: 1_000,
      updatedAt: 1_000,
      participants: []
    });
    expect(store.count()).toBe(1);
  });

  it("rejects a non-positive distance and inverted limits", () => {
    const { store } = createStore();
    expectRejection(() => store.createLobby({ creatorId: "a", raceDistanceMeters: 0 }), 400, "malformed_command");
    expectRejection(
      () => store.createLobby({ creatorId: "a", raceDistanceMeters: 500, minParticipants: 4, maxParticipants: 3 }),
      400,
      "malformed_command"
    );
    expect(store.count()).toBe(0);
  });
});

describe("LobbyStore.addParticipant", () => {
  it("adds a human as deposited with default equipment", () => {
    const { store, advance } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });
    advance(50);

    const { lobby: joined, isReconnect } = store.addParticipant(lobby.id, { id: "alice", displayName: "Alice" });

    expect(isReconnect).toBe(false);
    expect(joined.participants).toEqual([
      {
        id: "alice",
        displayName: "Alice",
        walletAddress: "",
        equipmentType: "rower",
        status: "DEPOSITED",
        isBot: false,
        botDifficulty: null,
        joinedAt: 1_050
      }
    ]);
    expect(joined.updatedAt).toBe(1_050);
  });

  it("treats a repeated join as a reconnect without duplicating", () => {
    const { store } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500, maxParticipants: 2 });
    store.addParticipant(lobby.id, { id: "alice", displayName: "Alice" });
    store.addParticipant(lobby.id, { id: "bob", displayName: "Bob" });

    const again = store.addParticipant(lobby.id, { id: "bob", displayName: "Bob" });

    expect(again.isReconnect).toBe(true);
    expect(again.lobby.participants).toHaveLength(2);
  });

  it("rejects joins beyond capacity", () => {
    const { store } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500, maxParticipants: 2 });
    store.addParticipant(lobby.id, { id: "alice", displayName: "Alice" });
    store.addParticipant(lobby.id, { id: "bob", displayName: "Bob" });

    expectRejection(() => store.addParticipant(lobby.id, { id: "carol", displayName: "Carol" }), 409, "lobby_full");
    expect(lobby.participants).toHaveLength(2);
  });

  it("rejects joins once the lobby has left WAITING", () => {
    const { store } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });
    store.cancelLobby(lobby.id, "alice");

    expectRejection(
      () => store.addParticipant(lobby.id, { id: "bob", displayName: "Bob" }),
      409,
      "lobby_not_joinable"
    );
  });

  it("rejects an unknown lobby", () => {
    const { store } = createStore();
    expectRejection(() => store.addParticipant("missing", { id: "bob", displayName: "Bob" }), 404, "lobby_not_found");
  });
});

describe("LobbyStore.addBot", () => {
  it("draws a name and equipment and marks the bot ready", () => {
    const store = new LobbyStore({
      random: sequence([0.99, 0.5]),
      now: () => 5,
      createId: () => "abcd-ef12-3456"
    });
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });

    const { bot } = store.addBot(lobby.id, "hard");

    expect(bot).toEqual({
      id: "bot-abcdef12",
      displayName: "OmegaOar (hard)",
      walletAddress: "",
      equipmentType: "bike",
      status: "READY",
      isBot: true,
      botDifficulty: "hard",
      joinedAt: 5
    });
  });

  it("respects capacity like a human join", () => {
    const { store } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500, maxParticipants: 2 });
    store.addBot(lobby.id, "easy");
    store.addBot(lobby.id, "easy");

    expectRejection(() => store.addBot(lobby.id, "easy"), 409, "lobby_full");
  });
});

describe("LobbyStore readiness", () => {
  it("starts only with enough participants and every human ready", () => {
    const { store } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });
    store.addParticipant(lobby.id, { id: "alice", displayName: "Alice" });
    expect(store.canStart(lobby)).toBe(false);

    store.addBot(lobby.id, "easy");
    expect(store.canStart(lobby)).toBe(false);

    store.setReady(lobby.id, "alice");
    expect(store.canStart(lobby)).toBe(true);
  });

  it("ignores unknown participants and lobbies", () => {
    const { store } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });

    expect(store.setReady(lobby.id, "ghost")).toBe(lobby);
    expect(store.setReady("missing", "alice")).toBeUndefined();
    expect(store.removeParticipant("missing", "alice")).toBeUndefined();
  });

  it("removes a participant and touches updatedAt only on change", () => {
    const { store, advance } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });
    store.addParticipant(lobby.id, { id: "alice", displayName: "Alice" });
    advance(10);
    store.removeParticipant(lobby.id, "ghost");
    expect(lobby.updatedAt).toBe(1_000);

    store.removeParticipant(lobby.id, "alice");
    expect(lobby.participants).toEqual([]);
    expect(lobby.updatedAt).toBe(1_010);
  });

  it("locks ready and leave once the lobby stops waiting", () => {
    const { store, advance } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });
    store.addParticipant(lobby.id, { id: "alice", displayName: "Alice" });
    store.addParticipant(lobby.id, { id: "bob", displayName: "Bob" });
    lobby.status = "IN_PROGRESS";
    for (const participant of lobby.participants) participant.status = "RACING";
    advance(10);

    expectRejection(() => store.setReady(lobby.id, "alice"), 409, "lobby_not_waiting");
    expectRejection(() => store.removeParticipant(lobby.id, "bob"), 409, "lobby_not_waiting");
    expect(lobby.participants.map((p) => [p.id, p.status])).toEqual([
      ["alice", "RACING"],
      ["bob", "RACING"]
    ]);
    expect(lobby.updatedAt).toBe(1_000);

    lobby.status = "COMPLETED";
    expectRejection(() => store.removeParticipant(lobby.id, "alice"), 409, "lobby_not_waiting");
    expect(lobby.participants).toHaveLength(2);
  });
});

describe("LobbyStore.listVisible", () => {
  it("shows waiting and completed lobbies, filtered by membership", () => {
    const { store } = createStore();
    const mine = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });
    const joined = store.createLobby({ creatorId: "carol", raceDistanceMeters: 500 });
    store.addParticipant(joined.id, { id: "alice", displayName: "Alice" });
    const other = store.createLobby({ creatorId: "bob", raceDistanceMeters: 500 });
    const cancelled = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });
    store.cancelLobby(cancelled.id, "alice");

    expect(store.listVisible().map((l) => l.id)).toEqual([mine.id, joined.id, other.id]);
    expect(store.listVisible("alice").map((l) => l.id)).toEqual([mine.id, joined.id]);
    expect(store.listVisible("nobody")).toEqual([]);
  });
});

describe("LobbyStore.completeLobby", () => {
  it("records results and marks finishers", () => {
    const { store } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });
    store.addParticipant(lobby.id, { id: "alice", displayName: "Alice" });
    store.addParticipant(lobby.id, { id: "bob", displayName: "Bob" });
    const race: Race = {
      id: "race-1",
      lobbyId: lobby.id,
      status: "COMPLETED",
      startTime: 1_000,
      completedAt: 2_000,
      targetDistanceMeters: 500,
      finishedCount: 1,
      participants: [
        {
          id: "alice",
          displayName: "Alice",
          walletAddress: "",
          equipmentType: "rower",
          isBot: false,
          botDifficulty: null,
          distance: 500,
          pace: 110,
          watts: 200,
          isFinished: true,
          finishTime: 1_000,
          position: 1
        },
        {
          id: "bob",
          displayName: "Bob",
          walletAddress: "",
          equipmentType: "rower",
          isBot: false,
          botDifficulty: null,
          distance: 320,
          pace: 130,
          watts: 150,
          isFinished: false,
          finishTime: null,
          position: null
        }
      ]
    };

    const completed = store.completeLobby(lobby.id, race);

    expect(completed.status).toBe("COMPLETED");
    expect(completed.raceId).toBe("race-1");
    expect(completed.participants.map((p) => p.status)).toEqual(["FINISHED", "DEPOSITED"]);
    expect(completed.raceResults?.[0]).toEqual({
      participantId: "alice",
      displayName: "Alice",
      isBot: false,
      position: 1,
      finishTime: 1_000,
      distance: 500,
      pace: 110,
      watts: 200,
      isFinished: true
    });
  });
});

describe("LobbyStore.cancelLobby", () => {
  it("only lets the creator cancel a waiting lobby", () => {
    const { store } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });

    expectRejection(() => store.cancelLobby(lobby.id, "bob"), 403, "not_lobby_creator");
    expect(store.cancelLobby(lobby.id, "alice").status).toBe("CANCELLED");
    expectRejection(() => store.cancelLobby(lobby.id, "alice"), 409, "lobby_not_cancellable");
  });
});

describe("toPublicLobby", () => {
  it("adds the participant count and detaches participant objects", () => {
    const { store } = createStore();
    const lobby = store.createLobby({ creatorId: "alice", raceDistanceMeters: 500 });
    store.addParticipant(lobby.id, { id: "alice", displayName: "Alice" });

    const view = toPublicLobby(lobby);
    store.setReady(lobby.id, "alice");

    expect(view.participantCount).toBe(1);
    expect(view.participants[0]?.status).toBe("DEPOSITED");
  });
});

describe("LobbyStore.restoreLobby", () => {
  it("re-registers a lobby as waiting with no participants", () => {
    const { store } = createStore();
    const restored = store.restoreLobby({
      id: "saved-1",
      creatorId: "alice",
      raceDistanceMeters: 1000,
      entryFee: "5",
      payoutMode: "top_three",
      status: "WAITING",
      maxParticipants: 4,
      minParticipants: 2,
      createdAt: 10,
      updatedAt: 10,
      participants: []
    });

    expect(store.getLobby("saved-1")).toBe(restored);
    expect(restored.updatedAt).toBe(1_000);
  });
});

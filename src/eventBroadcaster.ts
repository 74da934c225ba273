import type { PublicLobby, ServerEvent } from "./types.js";

const WS_OPEN = 1;

/** The part of a WebSocket the broadcaster writes to. */
export interface EventSink {
  readonly readyState: number;
  send(data: string): void;
}

export interface Session {
  connId: string;
  sink: EventSink;
  userId?: string;
  rooms: Set<string>;
}

/** Computes the lobby list a given session is allowed to see. */
export type LobbyListResolver = (session: Session) => PublicLobby[];

export class EventBroadcaster {
  private sessions = new Map<string, Session>();
  private rooms = new Map<string, Set<string>>();

  sessionCount(): number {
    return this.sessions.size;
  }

  getSession(connId: string): Session | undefined {
    return this.sessions.get(connId);
  }

  connect(connId: string, sink: EventSink): Session {
    const session: Session = { connId, sink, rooms: new Set() };
    this.sessions.set(connId, session);
    return session;
  }

  disconnect(connId: string): void {
    const session = this.sessions.get(connId);
    if (!session) return;
    for (const lobbyId of session.rooms) {
      this.removeFromRoom(lobbyId, connId);
    }
    this.sessions.delete(connId);
  }

  identify(connId: string, userId: string): Session | undefined {
    const session = this.sessions.get(connId);
    if (session) {
      session.userId = userId;
    }
    return session;
  }

  joinRoom(connId: string, lobbyId: string): void {
    const session = this.sessions.get(connId);
    if (!session) return;
    session.rooms.add(lobbyId);
    const members = this.rooms.get(lobbyId) ?? new Set<string>();
    members.add(connId);
    this.rooms.set(lobbyId, members);
  }

  leaveRoom(connId: string, lobbyId: string): void {
    this.sessions.get(connId)?.rooms.delete(lobbyId);
    this.removeFromRoom(lobbyId, connId);
  }

  roomSize(lobbyId: string): number {
    return this.rooms.get(lobbyId)?.size ?? 0;
  }

  private removeFromRoom(lobbyId: string, connId: string): void {
    const members = this.rooms.get(lobbyId);
    if (!members) return;
    members.delete(connId);
    if (members.size === 0) {
      this.rooms.delete(lobbyId);
    }
  }

  /** Returns false when the sink is gone; the session is dropped in that case. */
  private deliver(session: Session, data: string): boolean {
    if (session.sink.readyState !== WS_OPEN) {
      this.disconnect(session.connId);
      return false;
    }
    try {
      session.sink.send(data);
      return true;
    } catch {
      this.disconnect(session.connId);
      return false;
    }
  }

  toConnection(connId: string, event: ServerEvent): boolean {
    const session = this.sessions.get(connId);
    if (!session) return false;
    return this.deliver(session, JSON.stringify(event));
  }

  toRoom(lobbyId: string, event: ServerEvent): number {
    const members = this.rooms.get(lobbyId);
    if (!members) return 0;
    const data = JSON.stringify(event);
    let delivered = 0;
    for (const connId of [...members]) {
      const session = this.sessions.get(connId);
      if (session && this.deliver(session, data)) {
        delivered += 1;
      }
    }
    return delivered;
  }

  /** Sends every session its own filtered lobby list. */
  publishLobbyList(resolve: LobbyListResolver): number {
    let delivered = 0;
    for (const session of [...this.sessions.values()]) {
      const event: ServerEvent = { event: "lobby.list", payload: resolve(session) };
      if (this.deliver(session, JSON.stringify(event))) {
        delivered += 1;
      }
    }
    return delivered;
  }
}

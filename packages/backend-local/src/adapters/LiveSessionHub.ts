/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { Logger, MessageBus, PlayerId, RoomCode } from "../core.js";

/** The part of a socket the hub needs. */
export interface LiveConnection {
  send(message: string): void;
  close?(code?: number, reason?: string): void;
}

export type OutboundFrame =
  | { readonly type: "connected"; readonly roomCode: RoomCode; readonly playerId: PlayerId }
  | { readonly type: "game_state"; readonly state: object }
  | { readonly type: "submit_ack"; readonly result: object }
  | { readonly type: "leaderboard"; readonly entries: readonly object[] }
  | { readonly type: "event"; readonly event: object }
  | { readonly type: "ping" }
  | { readonly type: "pong" }
  | { readonly type: "error"; readonly detail: string; readonly status?: number };

export type RoomStateSupplier = (playerId: PlayerId) => Promise<object>;

interface LiveSessionHubOptions {
  readonly logger?: Logger;
  /** Idle time before a `ping` frame is sent; 0 disables the keepalive */
  readonly keepaliveMs?: number;
}

const ROOM_CHANNEL_PREFIX = "room:";

/**
 * Live connections grouped by room and player. Also the message bus: events
 * published on `room:<CODE>` are forwarded to every connection in that room.
 */
export class LiveSessionHub implements MessageBus {
  #rooms: Map<RoomCode, Map<PlayerId, Set<LiveConnection>>> = new Map();
  #keepalive: Map<LiveConnection, ReturnType<typeof setTimeout>> = new Map();
  readonly #logger: Logger | undefined;
  readonly #keepaliveMs: number;

  constructor({ logger, keepaliveMs = 45_000 }: LiveSessionHubOptions = {}) {
    this.#logger = logger;
    this.#keepaliveMs = keepaliveMs;
  }

  connect(roomCode: RoomCode, playerId: PlayerId, connection: LiveConnection): void {
    let players = this.#rooms.get(roomCode);
    if (!players) {
      players = new Map();
      this.#rooms.set(roomCode, players);
    }

    let connections = players.get(playerId);
    if (!connections) {
      connections = new Set();
      players.set(playerId, connections);
    }

    connections.add(connection);
    this.touch(connection);

    this.#logger?.info?.("Live session connected", {
      roomCode,
      playerId,
      size: connections.size,
    });
  }

  disconnect(roomCode: RoomCode, playerId: PlayerId, connection: LiveConnection): void {
    this.#stopKeepalive(connection);

    const players = this.#rooms.get(roomCode);
    const connections = players?.get(playerId);
    if (!players || !connections?.delete(connection)) {
      return;
    }

    if (connections.size === 0) players.delete(playerId);
    if (players.size === 0) this.#rooms.delete(roomCode);

    this.#logger?.info?.("Live session disconnected", { roomCode, playerId });
  }

  /** Re-arm the idle keepalive after inbound traffic. */
  touch(connection: LiveConnection): void {
    if (this.#keepaliveMs <= 0) return;

    this.#stopKeepalive(connection);
    const timer = setTimeout(() => {
      this.#deliver(connection, { type: "ping" });
      this.touch(connection);
    }, this.#keepaliveMs);
    timer.unref?.();
    this.#keepalive.set(connection, timer);
  }

  /** Send to one connection; failures are logged, never thrown. */
  sendTo(connection: LiveConnection, frame: OutboundFrame): void {
    this.#deliver(connection, frame);
  }

  sendToPlayer(roomCode: RoomCode, playerId: PlayerId, frame: OutboundFrame): void {
    for (const connection of this.#rooms.get(roomCode)?.get(playerId) ?? []) {
      this.#deliver(connection, frame);
    }
  }

  broadcast(roomCode: RoomCode, frame: OutboundFrame): void {
    for (const connections of this.#rooms.get(roomCode)?.values() ?? []) {
      for (const connection of connections) {
        this.#deliver(connection, frame);
      }
    }
  }

  /** Send each connected player the state their supplier produces for them. */
  async broadcastRoomState(roomCode: RoomCode, supplier: RoomStateSupplier): Promise<void> {
    for (const playerId of this.playersIn(roomCode)) {
      try {
        const state = await supplier(playerId);
        this.sendToPlayer(roomCode, playerId, { type: "game_state", state });
      } catch (error) {
        this.#logger?.warn?.("Room state unavailable for player", { roomCode, playerId, error });
      }
    }
  }

  async publish(channel: string, event: object): Promise<void> {
    if (channel.startsWith(ROOM_CHANNEL_PREFIX)) {
      this.broadcast(channel.slice(ROOM_CHANNEL_PREFIX.length), { type: "event", event });
    }
    this.#logger?.debug?.("Event published", { channel, event });
  }

  playersIn(roomCode: RoomCode): PlayerId[] {
    return [...(this.#rooms.get(roomCode)?.keys() ?? [])];
  }

  connectionCount(roomCode: RoomCode): number {
    let count = 0;
    for (const connections of this.#rooms.get(roomCode)?.values() ?? []) {
      count += connections.size;
    }
    return count;
  }

  /** Stop every keepalive timer. */
  close(): void {
    for (const timer of this.#keepalive.values()) {
      clearTimeout(timer);
    }
    this.#keepalive.clear();
  }

  #stopKeepalive(connection: LiveConnection): void {
    const timer = this.#keepalive.get(connection);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.#keepalive.delete(connection);
    }
  }

  #deliver(connection: LiveConnection, frame: OutboundFrame): void {
    try {
      connection.send(JSON.stringify(frame));
    } catch (error) {
      this.#logger?.warn?.("Failed to deliver frame", { type: frame.type, error });
    }
  }
}

import type { LiveConnection } from "./adapters/LiveSessionHub.js";
import {
  ReadRoomState,
  SubmitAnswer,
  UnauthenticatedError,
  type Identity,
  type RoomCode,
  type SlidingWindowLimiter,
} from "./core.js";
import { describeError } from "./errorResponse.js";
import { pushLeaderboard, pushRoomState, type LiveUpdateDeps } from "./liveUpdates.js";

export const CLOSE_UNAUTHENTICATED = 4401;
export const CLOSE_FORBIDDEN = 4403;
const WS_WINDOW_SECONDS = 60;

export interface RoomSocketDeps extends LiveUpdateDeps {
  readonly wsLimiter: SlidingWindowLimiter;
  readonly wsMessagesPerMinute: number;
}

export interface RoomSocketRequest {
  readonly roomCode: string;
  readonly token: string | undefined;
  readonly ip: string;
}

/** Lifecycle of one upgraded socket, independent of the WebSocket library. */
export interface RoomSocketSession {
  open(connection: LiveConnection): Promise<void>;
  receive(raw: string): Promise<void>;
  close(): void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseFrame(raw: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/** Picks the token from `?token=`, a bearer header, or a `jwt, <token>` subprotocol. */
export function socketToken(
  query: string | undefined,
  authorization: string | undefined,
  protocols: string | undefined,
): string | undefined {
  if (query) return query;

  const [scheme, bearer] = (authorization ?? "").split(" ", 2);
  if (scheme?.toLowerCase() === "bearer" && bearer) return bearer.trim();

  const [kind, token] = (protocols ?? "").split(",").map((part) => part.trim());
  if (kind === "jwt" && token) return token;

  return undefined;
}

/**
 * Authenticates the socket and checks membership before it joins the hub.
 * Rejected sockets are closed with 4401 or 4403 as soon as they open.
 */
export async function openRoomSocket(
  request: RoomSocketRequest,
  deps: RoomSocketDeps,
): Promise<RoomSocketSession> {
  const ctx = deps.createContext();

  let identity: Identity;
  let roomCode: RoomCode;
  let initialState: object;
  try {
    if (!request.token) throw new UnauthenticatedError("Missing access token");
    identity = await ctx.identity.verify(request.token);

    const view = await deps.dispatch(
      new ReadRoomState(request.roomCode, identity.playerId, request.ip, ctx.clock.now()),
      ctx,
    );
    roomCode = view.roomCode;
    initialState = view;
  } catch (error) {
    return rejectedSession(error, deps);
  }

  return new AcceptedRoomSocket(identity, roomCode, request.ip, initialState, deps);
}

function rejectedSession(error: unknown, deps: RoomSocketDeps): RoomSocketSession {
  const { status, body } = describeError(error);
  const code = error instanceof UnauthenticatedError ? CLOSE_UNAUTHENTICATED : CLOSE_FORBIDDEN;

  deps.logger?.info?.("Live session rejected", { status, detail: body.detail });

  return {
    async open(connection: LiveConnection): Promise<void> {
      deps.hub.sendTo(connection, { type: "error", detail: body.detail, status });
      connection.close?.(code, body.detail);
    },
    async receive(): Promise<void> {},
    close(): void {},
  };
}

class AcceptedRoomSocket implements RoomSocketSession {
  #connection: LiveConnection | undefined;

  constructor(
    private readonly identity: Identity,
    private readonly roomCode: RoomCode,
    private readonly ip: string,
    private readonly initialState: object,
    private readonly deps: RoomSocketDeps,
  ) {}

  async open(connection: LiveConnection): Promise<void> {
    this.#connection = connection;
    this.deps.hub.connect(this.roomCode, this.identity.playerId, connection);

    this.deps.hub.sendTo(connection, {
      type: "connected",
      roomCode: this.roomCode,
      playerId: this.identity.playerId,
    });
    this.deps.hub.sendTo(connection, { type: "game_state", state: this.initialState });
  }

  async receive(raw: string): Promise<void> {
    const connection = this.#connection;
    if (!connection) return;

    this.deps.hub.touch(connection);

    const frame = parseFrame(raw);
    const type = frame?.["type"];

    if (type === "ping") {
      this.deps.hub.sendTo(connection, { type: "pong" });
      return;
    }

    const answer = frame?.["answer"];
    if ((type === "submit" || type === "move") && typeof answer === "string") {
      const allowed = this.deps.wsLimiter.allow(
        `ws:${this.roomCode}:${this.identity.playerId}`,
        this.deps.wsMessagesPerMinute,
        WS_WINDOW_SECONDS,
      );
      if (!allowed) {
        this.deps.hub.sendTo(connection, { type: "error", detail: "Too many messages", status: 429 });
        return;
      }

      await this.#submit(connection, answer);
      return;
    }

    this.deps.hub.sendTo(connection, { type: "error", detail: "Unsupported message" });
  }

  close(): void {
    if (this.#connection) {
      this.deps.hub.disconnect(this.roomCode, this.identity.playerId, this.#connection);
      this.#connection = undefined;
    }
  }

  async #submit(connection: LiveConnection, answer: string): Promise<void> {
    const ctx = this.deps.createContext();

    try {
      const outcome = await this.deps.dispatch(
        new SubmitAnswer(
          this.roomCode,
          this.identity.playerId,
          this.ip,
          answer,
          "ws",
          ctx.clock.now(),
        ),
        ctx,
      );

      await pushRoomState(this.deps, this.roomCode);
      await pushLeaderboard(this.deps, this.roomCode);
      this.deps.hub.sendToPlayer(this.roomCode, this.identity.playerId, {
        type: "submit_ack",
        result: outcome,
      });
    } catch (error) {
      const { status, body } = describeError(error);
      if (status === 500) {
        this.deps.logger?.error?.("Live submit failed", { roomCode: this.roomCode, error });
      }
      this.deps.hub.sendTo(connection, { type: "error", detail: body.detail, status });
    }
  }
}

import { Hono } from "hono";
import type { Context, Next } from "hono";

import type { LiveSessionHub } from "./adapters/LiveSessionHub.js";
import {
  CreateRoom,
  DuelCommandInputError,
  JoinRoom,
  ReadRoomState,
  RegisterGuest,
  ResetLadder,
  SubmitAnswer,
  UnauthenticatedError,
  getLeaderboard,
  getPlayerStats,
  isBanned,
  type CommandContext,
  type Identity,
  type Logger,
  type SlidingWindowLimiter,
} from "./core.js";
import { describeError } from "./errorResponse.js";
import { pushLeaderboard, pushRoomState, type DispatchCommand } from "./liveUpdates.js";

const HTTP_WINDOW_SECONDS = 60;
const DEFAULT_LEADERBOARD_LIMIT = 20;

export interface CreateBackendAppOptions {
  readonly hub: LiveSessionHub;
  readonly httpLimiter: SlidingWindowLimiter;
  readonly httpRequestsPerMinute: number;
  readonly corsOrigin: string;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
  /** Client address; defaults to the first `x-forwarded-for` entry */
  readonly resolveIp?: (c: Context) => string;
}

type JsonBody = Readonly<Record<string, unknown>>;

export function createBackendApp({
  hub,
  httpLimiter,
  httpRequestsPerMinute,
  corsOrigin,
  logger,
  createContext,
  dispatch,
  resolveIp = forwardedIp,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();
  const live = { createContext, dispatch, hub, logger };

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", corsOrigin);
    c.header("Access-Control-Allow-Headers", "Content-Type, Authorization");
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    const ip = resolveIp(c);
    if (!httpLimiter.allow(`http:${ip}`, httpRequestsPerMinute, HTTP_WINDOW_SECONDS)) {
      logger.warn?.("HTTP rate limit exceeded", { ip, path: c.req.path });
      return c.json({ error: "rate_limited", detail: "Too many requests" }, 429);
    }

    const ctx = createContext();
    const ipBanned = await ctx.gateway.transaction((tx) =>
      isBanned(tx, "ip", ip, ctx.clock.now()),
    );
    if (ipBanned) {
      return c.json({ error: "forbidden", detail: "IP is temporarily banned" }, 403);
    }

    await next();
    return c.res;
  });

  const respond = async (c: Context, work: () => Promise<Response>): Promise<Response> => {
    try {
      return await work();
    } catch (error) {
      const { status, body } = describeError(error);
      if (status === 500) {
        logger.error?.("Request failed", { path: c.req.path, error });
      }
      return c.json(body, status);
    }
  };

  const authenticate = async (c: Context, ctx: CommandContext): Promise<Identity> => {
    const header = c.req.header("Authorization") ?? "";
    const [scheme, token] = header.split(" ", 2);
    if (scheme?.toLowerCase() !== "bearer" || !token) {
      throw new UnauthenticatedError("Missing or invalid Authorization header");
    }

    const identity = await ctx.identity.verify(token.trim());
    const player = await ctx.gateway.transaction((tx) => tx.findPlayer(identity.playerId));
    if (!player) {
      throw new UnauthenticatedError("Player no longer exists");
    }
    return identity;
  };

  app.get("/api/health", (c) => c.json({ ok: true, timestamp: Date.now() }));

  app.post("/api/auth/guest", (c) =>
    respond(c, async () => {
      const ctx = createContext();
      const body = await readJson(c);
      const displayName = body["displayName"];
      if (typeof displayName !== "string") {
        throw DuelCommandInputError.because(["displayName is required"]);
      }

      const registration = await dispatch(
        new RegisterGuest(displayName, ctx.clock.now()),
        ctx,
      );
      return c.json(registration, 201);
    }),
  );

  app.post("/api/rooms", (c) =>
    respond(c, async () => {
      const ctx = createContext();
      const identity = await authenticate(c, ctx);
      const body = await readJson(c);

      const mode = body["mode"] ?? "classic";
      const targetScore = body["targetScore"] ?? ctx.config.defaultTargetScore;

      const entry = await dispatch(
        new CreateRoom(
          identity.playerId,
          resolveIp(c),
          typeof mode === "string" ? mode : "",
          typeof targetScore === "number" ? targetScore : Number.NaN,
          ctx.clock.now(),
        ),
        ctx,
      );
      return c.json(entry, 201);
    }),
  );

  app.post("/api/rooms/:code/join", (c) =>
    respond(c, async () => {
      const ctx = createContext();
      const identity = await authenticate(c, ctx);

      const entry = await dispatch(
        new JoinRoom(c.req.param("code"), identity.playerId, resolveIp(c), ctx.clock.now()),
        ctx,
      );

      await pushRoomState(live, entry.roomCode);
      return c.json(entry);
    }),
  );

  app.get("/api/rooms/:code/state", (c) =>
    respond(c, async () => {
      const ctx = createContext();
      const identity = await authenticate(c, ctx);

      const view = await dispatch(
        new ReadRoomState(c.req.param("code"), identity.playerId, resolveIp(c), ctx.clock.now()),
        ctx,
      );
      return c.json(view);
    }),
  );

  app.post("/api/rooms/:code/submit", (c) =>
    respond(c, async () => {
      const ctx = createContext();
      const identity = await authenticate(c, ctx);
      const body = await readJson(c);
      const answer = body["answer"];
      if (typeof answer !== "string") {
        throw DuelCommandInputError.because(["answer is required"]);
      }

      const outcome = await dispatch(
        new SubmitAnswer(
          c.req.param("code"),
          identity.playerId,
          resolveIp(c),
          answer,
          "http",
          ctx.clock.now(),
        ),
        ctx,
      );

      await pushRoomState(live, outcome.roomCode);
      await pushLeaderboard(live, outcome.roomCode);
      return c.json(outcome);
    }),
  );

  app.get("/api/leaderboard", (c) =>
    respond(c, async () => {
      const limit = Number(c.req.query("limit") ?? DEFAULT_LEADERBOARD_LIMIT);
      return c.json(await getLeaderboard(createContext().gateway, limit));
    }),
  );

  app.get("/api/players/:id/stats", (c) =>
    respond(c, async () =>
      c.json(await getPlayerStats(createContext().gateway, c.req.param("id"))),
    ),
  );

  app.post("/api/admin/reset", (c) =>
    respond(c, async () => {
      const ctx = createContext();
      const identity = await authenticate(c, ctx);
      await dispatch(new ResetLadder(identity, ctx.clock.now()), ctx);
      return c.json({ ok: true });
    }),
  );

  return app;
}

export function forwardedIp(c: Context): string {
  const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
  return forwarded || "unknown";
}

async function readJson(c: Context): Promise<JsonBody> {
  const body = await c.req.json<unknown>().catch(() => null);
  if (typeof body === "object" && body !== null && !Array.isArray(body)) {
    return Object.fromEntries(Object.entries(body));
  }
  return {};
}

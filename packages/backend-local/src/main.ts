import { serve } from "@hono/node-server";
import { getConnInfo } from "@hono/node-server/conninfo";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Context } from "hono";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { HonoJwtIdentityService } from "./adapters/HonoJwtIdentityService.js";
import { HttpScoringOracle } from "./adapters/HttpScoringOracle.js";
import { LiveSessionHub, type LiveConnection } from "./adapters/LiveSessionHub.js";
import { createBackendApp } from "./app.js";
import { loadBackendSettings } from "./config.js";
import {
  AnswerScorer,
  InMemoryDuelGateway,
  InMemoryScoreCacheGateway,
  ScoreCache,
  SlidingWindowLimiter,
  ViolationTracker,
  dispatchCommand,
  systemClock,
  type CommandContext,
} from "./core.js";
import { createConsoleLogger } from "./logger.js";
import { openRoomSocket, socketToken } from "./roomSocket.js";
import { loadWordCorpus } from "./wordCorpus.js";

const PRUNE_INTERVAL_MS = 60_000;
const LIMIT_WINDOW_SECONDS = 60;

export async function startServer(): Promise<void> {
  const settings = loadBackendSettings(process.env);
  const logger = createConsoleLogger("vocab-duel", settings.logLevel);
  const clock = systemClock;

  const gateway = new InMemoryDuelGateway();
  const hub = new LiveSessionHub({ logger, keepaliveMs: settings.keepaliveMs });
  const words = await loadWordCorpus(settings.wordsFile);
  logger.info("Word corpus loaded", { size: words.size });

  const cache = new ScoreCache({
    ttlSeconds: settings.duel.scoreCacheTtlSeconds,
    clock,
    store: new InMemoryScoreCacheGateway(),
    logger,
  });
  await cache.purgeExpired();

  if (!settings.oracle.enabled) {
    logger.warn("ORACLE_URL is not set or ENABLE_ORACLE is off. Scoring locally only.");
  }
  const judge = new AnswerScorer({
    cache,
    oracle: settings.oracle.enabled
      ? new HttpScoringOracle({ url: settings.oracle.url, apiKey: settings.oracle.apiKey, logger })
      : undefined,
    oracleTimeoutMs: settings.duel.oracleTimeoutMs,
    logger,
  });

  const identity = new HonoJwtIdentityService({
    secret: settings.secretKey,
    ttlMinutes: settings.tokenTtlMinutes,
  });

  const limits = {
    submits: new SlidingWindowLimiter(clock),
    joinFailures: new ViolationTracker(clock),
    violations: new ViolationTracker(clock),
  };
  const httpLimiter = new SlidingWindowLimiter(clock);
  const wsLimiter = new SlidingWindowLimiter(clock);

  const createContext = (): CommandContext => ({
    gateway,
    judge,
    words,
    identity,
    bus: hub,
    clock,
    limits,
    config: settings.duel,
    logger,
  });

  const resolveIp = (c: Context): string => getConnInfo(c).remote.address ?? "unknown";

  const app = createBackendApp({
    hub,
    httpLimiter,
    httpRequestsPerMinute: settings.httpRequestsPerMinute,
    corsOrigin: settings.corsOrigin,
    logger,
    createContext,
    dispatch: dispatchCommand,
    resolveIp,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws/rooms/:code",
    upgradeWebSocket(async (c) => {
      const session = await openRoomSocket(
        {
          roomCode: c.req.param("code"),
          token: socketToken(
            c.req.query("token"),
            c.req.header("Authorization"),
            c.req.header("Sec-WebSocket-Protocol"),
          ),
          ip: resolveIp(c),
        },
        {
          createContext,
          dispatch: dispatchCommand,
          hub,
          logger,
          wsLimiter,
          wsMessagesPerMinute: settings.wsMessagesPerMinute,
        },
      );

      const toConnection = (ws: WSContext<WebSocket>): LiveConnection => ({
        send: (message: string) => ws.send(message),
        close: (code?: number, reason?: string) => ws.close(code, reason),
      });

      return {
        onOpen(_event, ws): void {
          session.open(toConnection(ws)).catch((error: unknown) => {
            logger.error("Live session failed to open", { error });
          });
        },
        onMessage(event): void {
          const raw = typeof event.data === "string" ? event.data : "";
          session.receive(raw).catch((error: unknown) => {
            logger.error("Live message handling failed", { error });
          });
        },
        onClose(): void {
          session.close();
        },
      };
    }),
  );

  const pruneTimer = setInterval(() => {
    limits.submits.prune(LIMIT_WINDOW_SECONDS);
    limits.joinFailures.prune(LIMIT_WINDOW_SECONDS);
    limits.violations.prune(LIMIT_WINDOW_SECONDS);
    httpLimiter.prune(LIMIT_WINDOW_SECONDS);
    wsLimiter.prune(LIMIT_WINDOW_SECONDS);
    cache.purgeExpired().catch((error: unknown) => {
      logger.warn("Score cache purge failed", { error });
    });
  }, PRUNE_INTERVAL_MS);
  pruneTimer.unref();

  const server = serve({ fetch: app.fetch, port: settings.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  const shutdown = (): void => {
    clearInterval(pruneTimer);
    hub.close();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void startServer().catch((error) => {
  createConsoleLogger("vocab-duel").error("Failed to start backend", { error });
  process.exit(1);
});

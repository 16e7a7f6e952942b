import { describe, expect, it } from "vitest";

import { CreateRoom } from "../src/domain/commands/CreateRoom.js";
import { JoinRoom } from "../src/domain/commands/JoinRoom.js";
import { SubmitAnswer } from "../src/domain/commands/SubmitAnswer.js";
import { BannedError } from "../src/domain/errors/BannedError.js";
import { ConflictError } from "../src/domain/errors/ConflictError.js";
import { DuelCommandInputError } from "../src/domain/errors/DuelCommandInputError.js";
import { RoomNotFoundError } from "../src/domain/errors/RoomNotFoundError.js";
import { isBanned } from "../src/domain/services/BanStore.js";
import { START_TIME, createTestContext, registerGuest, startMatch } from "./support/testContext.js";

describe("JoinRoom command", () => {
  it("starts the match when the second player joins", async () => {
    const ctx = createTestContext();

    const { roomCode, creator, opponent } = await startMatch(ctx);

    expect(ctx.bus.types()).toEqual(["RoomCreated", "PlayerJoined", "MatchStarted"]);
    expect(ctx.bus.published[2]).toEqual({
      channel: `room:${roomCode}`,
      event: {
        type: "MatchStarted",
        roomCode,
        matchId: "match-1",
        currentTurn: creator.playerId,
        at: START_TIME,
      },
    });

    const room = await ctx.gateway.transaction((tx) => tx.findRoom(roomCode));
    expect(room).toMatchObject({
      status: "playing",
      matchId: "match-1",
      turnNumber: 1,
      currentTurn: creator.playerId,
      turnStartedAt: START_TIME,
      currentWord: { source: "кіт", target: "cat" },
    });

    const match = await ctx.gateway.transaction((tx) => tx.findMatch("match-1"));
    expect(match).toMatchObject({ playerA: creator.playerId, playerB: opponent.playerId, winnerId: null });
  });

  it("accepts codes in any case", async () => {
    const ctx = createTestContext();
    const alice = await registerGuest(ctx, "alice");
    const bob = await registerGuest(ctx, "bob");
    const { roomCode } = await new CreateRoom(alice.playerId, "10.0.0.1", "classic", 3, START_TIME).execute(ctx);

    const entry = await new JoinRoom(` ${roomCode.toLowerCase()} `, bob.playerId, "10.0.0.2", START_TIME).execute(ctx);

    expect(entry).toEqual({ roomCode, status: "playing" });
  });

  it("treats a repeated join by a member as a no-op", async () => {
    const ctx = createTestContext();
    const { roomCode, creator } = await startMatch(ctx);
    ctx.bus.clear();

    const entry = await new JoinRoom(roomCode, creator.playerId, "10.0.0.1", START_TIME).execute(ctx);

    expect(entry).toEqual({ roomCode, status: "playing" });
    expect(ctx.bus.published).toEqual([]);
  });

  it("rejects a third player", async () => {
    const ctx = createTestContext();
    const { roomCode } = await startMatch(ctx);
    const carol = await registerGuest(ctx, "carol");

    const attempt = new JoinRoom(roomCode, carol.playerId, "10.0.0.3", START_TIME).execute(ctx);
    await expect(attempt).rejects.toThrow(ConflictError);
    await expect(attempt).rejects.toThrow("Room is full");
  });

  it("rejects joining a finished room", async () => {
    const ctx = createTestContext();
    const { roomCode, creator } = await startMatch(ctx, { targetScore: 2 });
    await new SubmitAnswer(roomCode, creator.playerId, "10.0.0.1", "cat", "http", START_TIME).execute(ctx);
    const carol = await registerGuest(ctx, "carol");

    await expect(
      new JoinRoom(roomCode, carol.playerId, "10.0.0.3", START_TIME).execute(ctx),
    ).rejects.toThrow("Room already finished");
  });

  it("bans player and address after repeated unknown codes", async () => {
    const ctx = createTestContext({ config: { maxJoinFailuresPerMinute: 3, banSeconds: 300 } });
    const alice = await registerGuest(ctx, "alice");
    const mallory = await registerGuest(ctx, "mallory");
    const carol = await registerGuest(ctx, "carol");
    const { roomCode } = await new CreateRoom(alice.playerId, "10.0.0.1", "classic", 3, START_TIME).execute(ctx);

    for (let attempt = 0; attempt < 3; attempt += 1) {
      await expect(
        new JoinRoom("NOPE0000", mallory.playerId, "10.9.9.9", START_TIME).execute(ctx),
      ).rejects.toThrow(RoomNotFoundError);
    }

    const bans = await ctx.gateway.transaction(async (tx) => ({
      player: await isBanned(tx, "player", mallory.playerId, START_TIME),
      ip: await isBanned(tx, "ip", "10.9.9.9", START_TIME),
    }));
    expect(bans).toEqual({ player: true, ip: true });

    await expect(
      new JoinRoom(roomCode, mallory.playerId, "10.0.0.5", START_TIME).execute(ctx),
    ).rejects.toThrow("Player is temporarily banned");

    const fromSameAddress = new JoinRoom(roomCode, carol.playerId, "10.9.9.9", START_TIME).execute(ctx);
    await expect(fromSameAddress).rejects.toThrow(BannedError);
    await expect(fromSameAddress).rejects.toThrow("IP is temporarily banned");

    await expect(
      new JoinRoom(roomCode, carol.playerId, "10.9.9.9", START_TIME + 300_000).execute(ctx),
    ).resolves.toEqual({ roomCode, status: "playing" });
  });

  it("rejects malformed room codes before touching the store", () => {
    expect(() => new JoinRoom("AB-12", "player-1", "10.0.0.2", START_TIME)).toThrow(DuelCommandInputError);
    expect(() => new JoinRoom("   ", "player-1", "10.0.0.2", START_TIME)).toThrow(
      "Room code must contain only letters and digits",
    );
  });

  it("does not ban below the failure threshold", async () => {
    const ctx = createTestContext({ config: { maxJoinFailuresPerMinute: 3 } });
    const mallory = await registerGuest(ctx, "mallory");

    for (let attempt = 0; attempt < 2; attempt += 1) {
      await expect(
        new JoinRoom("NOPE0000", mallory.playerId, "10.9.9.9", START_TIME).execute(ctx),
      ).rejects.toThrow(RoomNotFoundError);
    }

    await expect(
      ctx.gateway.transaction((tx) => isBanned(tx, "player", mallory.playerId, START_TIME)),
    ).resolves.toBe(false);
  });
});

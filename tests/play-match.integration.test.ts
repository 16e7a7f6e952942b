import { describe, expect, it } from "vitest";

import type { Command } from "../src/domain/commands/Command.js";
import { CreateRoom } from "../src/domain/commands/CreateRoom.js";
import { JoinRoom } from "../src/domain/commands/JoinRoom.js";
import { ReadRoomState } from "../src/domain/commands/ReadRoomState.js";
import { RegisterGuest } from "../src/domain/commands/RegisterGuest.js";
import { SubmitAnswer } from "../src/domain/commands/SubmitAnswer.js";
import { dispatchCommand } from "../src/domain/commands/dispatchCommand.js";
import { BannedError } from "../src/domain/errors/BannedError.js";
import { getLeaderboard } from "../src/domain/queries/PlayerStandings.js";
import { isBanned } from "../src/domain/services/BanStore.js";
import { type TestContext, createTestContext, registerGuest, startMatch } from "./support/testContext.js";

function run<T>(ctx: TestContext, command: Command<T>): Promise<T> {
  return dispatchCommand(command, ctx);
}

describe("full duel", () => {
  it("plays a match to the target score through every command", async () => {
    const ctx = createTestContext();
    const now = (): number => ctx.clock.now();

    const alice = await run(ctx, new RegisterGuest("alice", now()));
    const bob = await run(ctx, new RegisterGuest("bob", now()));
    const { roomCode } = await run(ctx, new CreateRoom(alice.playerId, "10.0.0.1", "classic", 3, now()));
    await run(ctx, new JoinRoom(roomCode, bob.playerId, "10.0.0.2", now()));

    const answer = (playerId: string, text: string) =>
      run(ctx, new SubmitAnswer(roomCode, playerId, "10.0.0.9", text, "ws", now()));

    ctx.clock.advance(3_000);
    await expect(answer(alice.playerId, "cat")).resolves.toMatchObject({ turnNumber: 1, points: 2 });
    ctx.clock.advance(5_000);
    await expect(answer(bob.playerId, "kitten")).resolves.toMatchObject({ turnNumber: 2, points: 0 });

    ctx.clock.advance(31_000);
    const afterTimeout = await run(ctx, new ReadRoomState(roomCode, bob.playerId, "10.0.0.2", now()));
    expect(afterTimeout).toMatchObject({ turnNumber: 4, currentTurn: { playerId: bob.playerId } });
    expect(afterTimeout.lastMove).toMatchObject({ playerId: alice.playerId, status: "expired" });

    ctx.clock.advance(2_000);
    await expect(answer(bob.playerId, "cat")).resolves.toMatchObject({ gameOver: false });
    ctx.clock.advance(1_000);
    await expect(answer(alice.playerId, "CAT")).resolves.toMatchObject({
      turnNumber: 5,
      gameOver: true,
      winnerId: alice.playerId,
    });

    const final = await run(ctx, new ReadRoomState(roomCode, bob.playerId, "10.0.0.2", now()));
    expect(final.status).toBe("finished");
    expect(final.players.map(({ displayName, score }) => ({ displayName, score }))).toEqual([
      { displayName: "alice", score: 4 },
      { displayName: "bob", score: 2 },
    ]);

    const leaderboard = await getLeaderboard(ctx.gateway, 20);
    expect(leaderboard.map(({ displayName, rating, wins, losses }) => ({ displayName, rating, wins, losses }))).toEqual([
      { displayName: "alice", rating: 1016, wins: 1, losses: 0 },
      { displayName: "bob", rating: 984, wins: 0, losses: 1 },
    ]);
    expect(leaderboard[0]).toMatchObject({ totalGames: 1, winRate: 1, avgResponseTime: 11.3333 });
    expect(leaderboard[1]).toMatchObject({ totalGames: 1, winRate: 0, avgResponseTime: 3.5 });

    expect(ctx.logger.info).toHaveBeenCalledWith("[CMD OK] SubmitAnswer", { ms: expect.any(Number) });
  });

  it("bans a winner who farms the same opponent", async () => {
    const ctx = createTestContext({ config: { farmWinsPerMinuteThreshold: 2 } });
    const alice = await registerGuest(ctx, "alice");
    const bob = await registerGuest(ctx, "bob");

    const first = await startMatch(ctx, { creator: alice, opponent: bob, targetScore: 2 });
    await new SubmitAnswer(first.roomCode, alice.playerId, "10.0.0.1", "cat", "http", ctx.clock.now()).execute(ctx);
    ctx.clock.advance(10_000);

    const second = await startMatch(ctx, { creator: alice, opponent: bob, targetScore: 2 });
    await new SubmitAnswer(second.roomCode, alice.playerId, "10.0.0.1", "cat", "http", ctx.clock.now()).execute(ctx);

    await expect(
      ctx.gateway.transaction((tx) => isBanned(tx, "player", alice.playerId, ctx.clock.now())),
    ).resolves.toBe(true);
    expect(ctx.logger.warn).toHaveBeenCalledWith(
      "Entity temporarily banned",
      expect.objectContaining({ entityId: alice.playerId, reason: "anti_farm_triggered" }),
    );

    const leaderboard = await getLeaderboard(ctx.gateway, 20);
    expect(leaderboard.map(({ rating }) => rating)).toEqual([1031, 969]);

    await expect(
      new CreateRoom(alice.playerId, "10.0.0.1", "classic", 2, ctx.clock.now()).execute(ctx),
    ).rejects.toThrow(BannedError);
  });

  it("does not count wins older than a minute toward farming", async () => {
    const ctx = createTestContext({ config: { farmWinsPerMinuteThreshold: 2 } });
    const alice = await registerGuest(ctx, "alice");
    const bob = await registerGuest(ctx, "bob");

    const first = await startMatch(ctx, { creator: alice, opponent: bob, targetScore: 2 });
    await new SubmitAnswer(first.roomCode, alice.playerId, "10.0.0.1", "cat", "http", ctx.clock.now()).execute(ctx);
    ctx.clock.advance(61_000);

    const second = await startMatch(ctx, { creator: alice, opponent: bob, targetScore: 2 });
    await new SubmitAnswer(second.roomCode, alice.playerId, "10.0.0.1", "cat", "http", ctx.clock.now()).execute(ctx);

    await expect(
      ctx.gateway.transaction((tx) => isBanned(tx, "player", alice.playerId, ctx.clock.now())),
    ).resolves.toBe(false);
  });
});

import { describe, expect, it } from "vitest";

import {
  assertValidRoomState,
  feedbackFor,
  isTurnExpired,
  nextTurn,
  timeRemainingSeconds,
  turnId,
  visiblePrompt,
} from "../../src/domain/entities/RoomRules.js";
import { InvalidRoomStateError } from "../../src/domain/errors/InvalidRoomStateError.js";
import type { PlayingRoom, RoomState, WaitingRoom } from "../../src/domain/ports/DuelGateway.js";

const STARTED = 1_000_000;

function waitingRoom(overrides: Partial<WaitingRoom> = {}): WaitingRoom {
  return {
    code: "ROOM1234",
    mode: "classic",
    targetScore: 10,
    turnNumber: 0,
    createdAt: 1,
    status: "waiting",
    matchId: null,
    currentTurn: null,
    turnStartedAt: null,
    currentWord: null,
    ...overrides,
  };
}

function playingRoom(overrides: Partial<PlayingRoom> = {}): PlayingRoom {
  return {
    code: "ROOM1234",
    mode: "classic",
    targetScore: 10,
    turnNumber: 3,
    createdAt: 1,
    status: "playing",
    matchId: "match-1",
    currentTurn: "alice",
    turnStartedAt: STARTED,
    currentWord: { source: "кіт", target: "cat" },
    ...overrides,
  };
}

function expectInvalid(state: RoomState, reason: string): void {
  expect(() => assertValidRoomState(state)).toThrow(InvalidRoomStateError);
  expect(() => assertValidRoomState(state)).toThrow(`Invalid room state: ${reason}`);
}

describe("assertValidRoomState", () => {
  it("accepts waiting and playing rooms", () => {
    expect(() => assertValidRoomState(waitingRoom())).not.toThrow();
    expect(() => assertValidRoomState(playingRoom())).not.toThrow();
  });

  it("rejects lower-case codes", () => {
    expectInvalid(waitingRoom({ code: "room1234" }), "room code must be upper-case");
  });

  it("rejects a target score below one", () => {
    expectInvalid(waitingRoom({ targetScore: 0 }), "invalid target score");
  });

  it("rejects a playing room without a started turn", () => {
    expectInvalid(playingRoom({ turnNumber: 0 }), "playing room must have started a turn");
  });

  it("rejects a playing room without a match", () => {
    expectInvalid(playingRoom({ matchId: "" }), "playing room without match");
  });

  it("rejects a playing room without a turn start time", () => {
    expectInvalid(playingRoom({ turnStartedAt: 0 }), "missing or invalid turn start time");
  });
});

describe("turn timing", () => {
  it("expires only once the budget is exceeded", () => {
    const room = playingRoom();
    expect(isTurnExpired(room, STARTED + 30_000, 30)).toBe(false);
    expect(isTurnExpired(room, STARTED + 30_001, 30)).toBe(true);
    expect(isTurnExpired(waitingRoom(), STARTED + 90_000, 30)).toBe(false);
  });

  it("reports whole seconds remaining, never negative", () => {
    const room = playingRoom();
    expect(timeRemainingSeconds(room, STARTED, 30)).toBe(30);
    expect(timeRemainingSeconds(room, STARTED + 10_500, 30)).toBe(19);
    expect(timeRemainingSeconds(room, STARTED + 45_000, 30)).toBe(0);
  });

  it("starts a new turn for the next player", () => {
    const next = nextTurn(playingRoom(), "bob", { source: "пес", target: "dog" }, STARTED + 5_000);

    expect(next).toMatchObject({
      turnNumber: 4,
      currentTurn: "bob",
      turnStartedAt: STARTED + 5_000,
      currentWord: { source: "пес", target: "dog" },
    });
    expect(turnId(next)).toBe("match-1:4");
  });
});

describe("visibility", () => {
  it("shows the prompt only to the player whose turn it is", () => {
    const room = playingRoom();
    expect(visiblePrompt(room, "alice")).toBe("кіт");
    expect(visiblePrompt(room, "bob")).toBeNull();
    expect(visiblePrompt(waitingRoom(), "alice")).toBeNull();
  });

  it("labels points", () => {
    expect(feedbackFor(2)).toBe("correct");
    expect(feedbackFor(1)).toBe("partial");
    expect(feedbackFor(0)).toBe("wrong");
  });
});

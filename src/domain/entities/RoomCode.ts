import type { RandomSource, RoomCode } from "../typedefs.js";
import { randomIndex, secureRandom } from "./Random.js";

export const ROOM_CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

const ROOM_CODE_PATTERN = /^[A-Z0-9]+$/;

export function generateRoomCode(length: number, rng: RandomSource = secureRandom): RoomCode {
  let code = "";
  for (let i = 0; i < length; i += 1) {
    code += ROOM_CODE_ALPHABET.charAt(randomIndex(ROOM_CODE_ALPHABET.length, rng));
  }
  return code;
}

/** Room codes are case-insensitive and stored upper-case. */
export function normalizeRoomCode(code: string): RoomCode {
  return code.trim().toUpperCase();
}

export function isWellFormedRoomCode(code: string): boolean {
  return code.length > 0 && ROOM_CODE_PATTERN.test(code);
}

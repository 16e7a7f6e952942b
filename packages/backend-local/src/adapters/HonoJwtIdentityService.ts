import { sign, verify } from "hono/jwt";

import {
  UnauthenticatedError,
  type Identity,
  type IdentityService,
} from "../core.js";

interface HonoJwtIdentityServiceOptions {
  readonly secret: string;
  readonly ttlMinutes: number;
  /** Seconds since epoch; injectable so tests can mint expired tokens */
  readonly nowSeconds?: () => number;
}

/** HS256 bearer tokens carrying the player id, display name and admin flag. */
export class HonoJwtIdentityService implements IdentityService {
  readonly #secret: string;
  readonly #ttlSeconds: number;
  readonly #nowSeconds: () => number;

  constructor({ secret, ttlMinutes, nowSeconds }: HonoJwtIdentityServiceOptions) {
    if (!secret) {
      throw new Error("A signing secret is required");
    }
    this.#secret = secret;
    this.#ttlSeconds = ttlMinutes * 60;
    this.#nowSeconds = nowSeconds ?? (() => Math.floor(Date.now() / 1000));
  }

  async issue(identity: Identity): Promise<string> {
    const issuedAt = this.#nowSeconds();
    return sign(
      {
        sub: identity.playerId,
        name: identity.displayName,
        admin: identity.isAdmin,
        iat: issuedAt,
        exp: issuedAt + this.#ttlSeconds,
      },
      this.#secret,
      "HS256",
    );
  }

  async verify(token: string): Promise<Identity> {
    if (!token) {
      throw new UnauthenticatedError("Missing access token");
    }

    let payload: Record<string, unknown>;
    try {
      payload = await verify(token, this.#secret, "HS256");
    } catch {
      throw new UnauthenticatedError("Invalid or expired token");
    }

    const { sub, name, admin } = payload;
    if (typeof sub !== "string" || sub.length === 0 || typeof name !== "string") {
      throw new UnauthenticatedError("Malformed token payload");
    }

    return { playerId: sub, displayName: name, isAdmin: admin === true };
  }
}

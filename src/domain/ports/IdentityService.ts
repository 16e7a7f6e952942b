import type { PlayerId } from "../typedefs.js";

export interface Identity {
  readonly playerId: PlayerId;
  readonly displayName: string;
  readonly isAdmin: boolean;
}

/**
 * Issues and verifies opaque bearer credentials. `verify` rejects with
 * `UnauthenticatedError` for missing, expired or malformed credentials.
 */
export interface IdentityService {
  issue(identity: Identity): Promise<string>;
  verify(token: string): Promise<Identity>;
}

export { BannedError } from "./BannedError.js";
export { CapacityError } from "./CapacityError.js";
export { ConflictError } from "./ConflictError.js";
export { DuelCommandInputError } from "./DuelCommandInputError.js";
export { DuelError, type ErrorCategory } from "./DuelError.js";
export { ForbiddenActionError } from "./ForbiddenActionError.js";
export { InvalidRoomStateError } from "./InvalidRoomStateError.js";
export { PlayerNotFoundError } from "./PlayerNotFoundError.js";
export { RateLimitedError } from "./RateLimitedError.js";
export { RoomNotFoundError } from "./RoomNotFoundError.js";
export { UnauthenticatedError } from "./UnauthenticatedError.js";

// src/octree/errors.ts

export type OctreeErrorCode =
  | "INVALID_POSITION"
  | "ARENA_FAULT"
  | "UNSUPPORTED"
  | "INVALID_CONFIG"
  | "INVARIANT";

export class OctreeError extends Error {
  readonly code: OctreeErrorCode;

  constructor(code: OctreeErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidPositionError extends OctreeError {
  constructor(message: string) {
    super("INVALID_POSITION", message);
  }
}

export type ArenaFaultReason = "stale" | "out-of-bounds";

/** A handle was used that was never issued, or was already freed. Always a bug. */
export class ArenaFaultError extends OctreeError {
  readonly reason: ArenaFaultReason;
  readonly handle: number;

  constructor(arena: string, handle: number, reason: ArenaFaultReason) {
    super("ARENA_FAULT", `${arena}: ${reason} handle ${handle}`);
    this.reason = reason;
    this.handle = handle;
  }
}

export class UnsupportedOperationError extends OctreeError {
  constructor(operation: string) {
    super("UNSUPPORTED", `${operation} is not supported`);
  }
}

export class InvalidConfigError extends OctreeError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

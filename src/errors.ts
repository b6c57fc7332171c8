/**
 * Error types raised by FrameWatch outside the per-frame sweep.
 * Nothing in here is thrown from `DebugEngine.tick()`; sweep failures are
 * logged and counted instead.
 */

export abstract class FrameWatchError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class PacketNotFoundError extends FrameWatchError {
  readonly code = "PACKET_NOT_FOUND";

  constructor(public readonly packetId: number) {
    super(`No watch packet with id ${packetId}`);
  }
}

export class InvalidPacketError extends FrameWatchError {
  readonly code = "INVALID_PACKET";

  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Invalid packet field '${field}': ${reason}`);
  }
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

import type { Address, AssetId, EventPayloads, EventTopic } from "@roscaflow/shared";

/** Caller-supplied evidence that a request acts for `principal`. */
export interface AuthProof {
  principal: Address;
  token: string;
}

export interface Authorizer {
  verify(proof: AuthProof): boolean;
}

/**
 * Moves value between accounts. Implementations throw a `CircleError` of kind
 * `InsufficientAllowance` when `from` cannot cover `amount`.
 */
export interface AssetTransfer {
  transfer(asset: AssetId, from: Address, to: Address, amount: number): void;
}

export interface Clock {
  /** Unix seconds. */
  now(): number;
}

export interface Shuffler {
  shuffle<T>(items: readonly T[]): T[];
}

export interface EventSink {
  publish<T extends EventTopic>(topic: T, payload: EventPayloads[T]): void;
}

/** Returned by `checkpoint()`; undoes everything recorded since the checkpoint. */
export type Restore = () => void;

export interface Checkpointable {
  checkpoint(): Restore;
}

export interface EnginePorts {
  authorizer: Authorizer;
  assets: AssetTransfer;
  clock: Clock;
  shuffler: Shuffler;
  events: EventSink;
}

export function isCheckpointable(value: unknown): value is Checkpointable {
  return (
    typeof value === "object" &&
    value !== null &&
    "checkpoint" in value &&
    typeof value.checkpoint === "function"
  );
}

export type AggregatorErrorCode =
  | "NotOwner"
  | "NotProvider"
  | "Paused"
  | "CooldownActive"
  | "InvalidBatch"
  | "BatchClosedOrInvalid"
  | "ReplayAttempt"
  | "StateMismatch"
  | "InvalidProof"
  | "InvalidCleartext"
  | "InvalidArgument";

/**
 * Failure of a single aggregator operation. Thrown before any state is
 * touched, so the operation has no effect.
 */
export class AggregatorError extends Error {
  constructor(public readonly code: AggregatorErrorCode, message: string) {
    super(message);
    this.name = "AggregatorError";
  }
}

export function isAggregatorError(
  err: unknown,
  code?: AggregatorErrorCode
): err is AggregatorError {
  return err instanceof AggregatorError && (code === undefined || err.code === code);
}

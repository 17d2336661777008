/**
 * Encrypted batch aggregation with oracle-verified averages.
 *
 * @packageDocumentation
 */

export { DataAggregator, type DataAggregatorOptions } from "./service.js";
export { createState, type AggregatorState } from "./state.js";
export { loadConfig } from "./config.js";

// Components
export { AccessControl } from "./engine/accessControl.js";
export { BatchRegistry } from "./engine/batchRegistry.js";
export { SubmissionLedger } from "./engine/ledger.js";
export { AggregationEngine } from "./engine/aggregation.js";
export { Cooldown } from "./engine/cooldown.js";
export { computeCommitment } from "./engine/commitment.js";
export { DecryptionCoordinator } from "./oracle/coordinator.js";
export { CallbackVerifier, type DecryptionOutcome } from "./oracle/verifier.js";

// Oracle side
export {
  SignerSetAttestationVerifier,
  decryptionDigest,
  signDecryptionResult,
} from "./oracle/attestation.js";
export {
  AGGREGATE_BITS,
  MAX_AGGREGATE,
  decodeAggregateCleartext,
  encodeAggregateCleartext,
} from "./oracle/cleartext.js";
export {
  LocalDecryptionOracle,
  type DecryptionResponse,
  type FulfillmentOutcome,
} from "./oracle/localOracle.js";
export {
  SimulatedCiphertextCapability,
  UNINITIALIZED_HANDLE,
  UnknownHandleError,
  type SimulatedHandle,
} from "./fhe/simulatedCapability.js";

// Utilities
export { AggregatorError, isAggregatorError, type AggregatorErrorCode } from "./utils/errors.js";
export { EventBus } from "./utils/events.js";
export { createLogger, type Logger } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";

// Types
export type {
  Aggregate,
  Batch,
  BatchResult,
  Commitment,
  DecryptionContext,
  Fingerprint,
  SubmissionReceipt,
} from "./types/batch.js";
export type {
  AttestationVerifier,
  CiphertextCapability,
  Clock,
  DecryptionCallback,
  DecryptionOracle,
} from "./types/capabilities.js";
export type { AggregatorConfig } from "./types/config.js";
export type { AggregatorEvent, AggregatorEventListener } from "./types/events.js";

import type { Fingerprint } from "./batch.js";

/**
 * Opaque encrypted-value operations. `H` is whatever the scheme uses as a handle.
 */
export interface CiphertextCapability<H> {
  /** Encryption of zero. */
  zero(): H;
  add(left: H, right: H): H;
  /** Idempotent; must run before a handle is added or fingerprinted. */
  initializeIfNeeded(handle: H): void;
  fingerprint(handle: H): Fingerprint;
}

/**
 * Resume entry point the oracle calls once decryption has happened.
 * `cleartext` and `attestation` are 0x-prefixed hex bytes.
 */
export type DecryptionCallback = (
  requestId: bigint,
  cleartext: string,
  attestation: string
) => void;

export interface DecryptionOracle<H> {
  /** Queue an asynchronous decryption and return its fresh request id. */
  request(handle: H, resume: DecryptionCallback): bigint;
}

export interface AttestationVerifier {
  verify(requestId: bigint, cleartext: string, attestation: string): boolean;
}

/** Current time in whole seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * 0x-prefixed 32-byte hex digest of a ciphertext handle.
 */
export type Fingerprint = string;

/**
 * keccak256 over the ordered fingerprints of a batch plus the instance address.
 */
export type Commitment = string;

/**
 * A group of submissions. Only the batch with the highest id is open.
 */
export interface Batch {
  id: number;
  dataCount: number;
  closed: boolean;
}

/**
 * Pending or finalized decryption, keyed by the oracle's request id.
 * `processed` flips to true once and never back.
 */
export interface DecryptionContext {
  batchId: number;
  stateHash: Commitment;
  processed: boolean;
}

/**
 * Homomorphic sum of a batch and the commitment over what was summed.
 */
export interface Aggregate<H> {
  sum: H;
  commitment: Commitment;
  dataCount: number;
}

/**
 * Last average finalized for a batch.
 */
export interface BatchResult {
  requestId: bigint;
  average: bigint;
  dataCount: number;
}

export interface SubmissionReceipt {
  batchId: number;
  index: number;
  fingerprint: Fingerprint;
}

/**
 * Owned application state of one aggregator instance. Every component reads
 * and writes through this object; nothing is held in module-level globals.
 */

import type { Batch, BatchResult, DecryptionContext } from "./types/batch.js";

export interface AggregatorState<H> {
  owner: string;
  providers: Set<string>;
  paused: boolean;
  submitCooldownSeconds: number;
  requestCooldownSeconds: number;
  lastSubmissionAt: Map<string, number>;
  lastRequestAt: Map<string, number>;
  /** Id of the open batch; 0 until the first batch is opened. */
  currentBatchId: number;
  batches: Map<number, Batch>;
  /** Ciphertext handles per batch, position = submission index. */
  values: Map<number, H[]>;
  contexts: Map<bigint, DecryptionContext>;
  results: Map<number, BatchResult>;
}

export function createState<H>(opts: {
  owner: string;
  submitCooldownSeconds: number;
  requestCooldownSeconds: number;
}): AggregatorState<H> {
  return {
    owner: opts.owner,
    providers: new Set([opts.owner]),
    paused: false,
    submitCooldownSeconds: opts.submitCooldownSeconds,
    requestCooldownSeconds: opts.requestCooldownSeconds,
    lastSubmissionAt: new Map(),
    lastRequestAt: new Map(),
    currentBatchId: 0,
    batches: new Map(),
    values: new Map(),
    contexts: new Map(),
    results: new Map(),
  };
}

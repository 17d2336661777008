/**
 * In-process decryption oracle for development and tests.
 *
 * Requests are queued with sequential ids. Fulfilling a request reveals the
 * plaintext, encodes it as the aggregate cleartext, signs an attestation with
 * every configured signer and calls the resume entry point once. A callback
 * the aggregator rejects is reported back, never re-delivered.
 */

import type { BaseWallet } from "ethers";
import { isAggregatorError, type AggregatorErrorCode } from "../utils/errors.js";
import { withRetry } from "../utils/retry.js";
import { encodeAggregateCleartext } from "./cleartext.js";
import { signDecryptionResult } from "./attestation.js";
import type { Logger } from "../utils/logger.js";
import type { DecryptionCallback, DecryptionOracle } from "../types/capabilities.js";

export interface LocalOracleOptions<H> {
  /** Plaintext behind a handle. May be remote, hence retried. */
  reveal: (handle: H) => bigint | Promise<bigint>;
  signers: readonly BaseWallet[];
  logger: Logger;
  maxRetries?: number;
  baseDelayMs?: number;
  /** Return false for reveal failures that retrying cannot fix. */
  shouldRetry?: (err: unknown) => boolean;
}

export interface DecryptionResponse {
  requestId: bigint;
  cleartext: string;
  attestation: string;
}

export type FulfillmentOutcome =
  | { requestId: bigint; status: "delivered" }
  | { requestId: bigint; status: "rejected"; code: AggregatorErrorCode; message: string };

interface PendingRequest<H> {
  handle: H;
  resume: DecryptionCallback;
}

export class LocalDecryptionOracle<H> implements DecryptionOracle<H> {
  private pending = new Map<bigint, PendingRequest<H>>();
  private inFlight = new Set<bigint>();
  private nextRequestId = 1n;
  private reveal: (handle: H) => bigint | Promise<bigint>;
  private signers: readonly BaseWallet[];
  private logger: Logger;
  private maxRetries: number;
  private baseDelayMs: number;
  private shouldRetry?: (err: unknown) => boolean;

  constructor(opts: LocalOracleOptions<H>) {
    if (opts.signers.length === 0) {
      throw new Error("LocalDecryptionOracle needs at least one signer");
    }
    this.reveal = opts.reveal;
    this.signers = opts.signers;
    this.logger = opts.logger;
    this.maxRetries = opts.maxRetries ?? 3;
    this.baseDelayMs = opts.baseDelayMs ?? 1000;
    this.shouldRetry = opts.shouldRetry;
  }

  request(handle: H, resume: DecryptionCallback): bigint {
    const requestId = this.nextRequestId++;
    this.pending.set(requestId, { handle, resume });
    this.logger.debug({ requestId: requestId.toString() }, "Decryption queued");
    return requestId;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  pendingIds(): bigint[] {
    return [...this.pending.keys()];
  }

  /**
   * Build the signed response for a pending request without delivering it.
   */
  async respond(requestId: bigint): Promise<DecryptionResponse> {
    const entry = this.pending.get(requestId);
    if (!entry) {
      throw new Error(`Unknown or already fulfilled request ${requestId}`);
    }

    const sum = await withRetry(async () => this.reveal(entry.handle), {
      maxRetries: this.maxRetries,
      baseDelayMs: this.baseDelayMs,
      logger: this.logger,
      shouldRetry: this.shouldRetry,
    });
    const cleartext = encodeAggregateCleartext(sum);
    const attestation = signDecryptionResult(this.signers, requestId, cleartext);
    return { requestId, cleartext, attestation };
  }

  async fulfill(requestId: bigint): Promise<FulfillmentOutcome> {
    const entry = this.pending.get(requestId);
    if (!entry) {
      throw new Error(`Unknown or already fulfilled request ${requestId}`);
    }
    if (this.inFlight.has(requestId)) {
      throw new Error(`Request ${requestId} is already being fulfilled`);
    }

    // Held across the reveal. A failed reveal leaves the request pending.
    this.inFlight.add(requestId);
    let response: DecryptionResponse;
    try {
      response = await this.respond(requestId);
    } finally {
      this.inFlight.delete(requestId);
    }
    this.pending.delete(requestId);

    try {
      entry.resume(response.requestId, response.cleartext, response.attestation);
    } catch (err) {
      if (!isAggregatorError(err)) throw err;
      this.logger.warn(
        { requestId: requestId.toString(), code: err.code, err },
        "Decryption callback rejected"
      );
      return { requestId, status: "rejected", code: err.code, message: err.message };
    }

    this.logger.info({ requestId: requestId.toString() }, "Decryption delivered");
    return { requestId, status: "delivered" };
  }

  /**
   * Fulfill every pending request in id order.
   */
  async fulfillAll(): Promise<FulfillmentOutcome[]> {
    const outcomes: FulfillmentOutcome[] = [];
    for (const requestId of this.pendingIds()) {
      outcomes.push(await this.fulfill(requestId));
    }
    return outcomes;
  }
}

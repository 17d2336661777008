/**
 * Callback verifier: second half of the two-step reveal.
 *
 * Checks run in a fixed order and all of them complete before anything is
 * written:
 *   1. replay gate (context already processed)
 *   2. context and batch exist, batch non-empty
 *   3. commitment over the batch today equals the one stored at request time
 *   4. oracle attestation over (requestId, cleartext)
 *   5. cleartext decodes as the aggregate
 * Only then is the average computed and the context marked processed.
 */

import { AggregatorError } from "../utils/errors.js";
import { decodeAggregateCleartext } from "./cleartext.js";
import type { EventBus } from "../utils/events.js";
import type { Logger } from "../utils/logger.js";
import type { AggregationEngine } from "../engine/aggregation.js";
import type { AggregatorState } from "../state.js";
import type { AttestationVerifier } from "../types/capabilities.js";

export interface CallbackVerifierOptions<H> {
  state: AggregatorState<H>;
  engine: AggregationEngine<H>;
  attestations: AttestationVerifier;
  events: EventBus;
  logger: Logger;
}

export interface DecryptionOutcome {
  requestId: bigint;
  batchId: number;
  average: bigint;
}

export class CallbackVerifier<H> {
  private state: AggregatorState<H>;
  private engine: AggregationEngine<H>;
  private attestations: AttestationVerifier;
  private events: EventBus;
  private logger: Logger;

  constructor(opts: CallbackVerifierOptions<H>) {
    this.state = opts.state;
    this.engine = opts.engine;
    this.attestations = opts.attestations;
    this.events = opts.events;
    this.logger = opts.logger;
  }

  onDecryptionResult(requestId: bigint, cleartext: string, attestation: string): DecryptionOutcome {
    const context = this.state.contexts.get(requestId);
    if (context?.processed) {
      throw new AggregatorError("ReplayAttempt", `Request ${requestId} was already processed`);
    }
    if (!context) {
      throw new AggregatorError("InvalidBatch", `No decryption context for request ${requestId}`);
    }

    const { batchId } = context;
    const batch = this.state.batches.get(batchId);
    if (!batch || batch.dataCount === 0) {
      throw new AggregatorError("InvalidBatch", `Batch ${batchId} does not exist or is empty`);
    }

    const current = this.engine.computeCommitment(batchId);
    if (current !== context.stateHash) {
      throw new AggregatorError(
        "StateMismatch",
        `Batch ${batchId} changed since request ${requestId} was issued`
      );
    }

    if (!this.attestations.verify(requestId, cleartext, attestation)) {
      throw new AggregatorError("InvalidProof", `Attestation for request ${requestId} does not verify`);
    }

    const sum = decodeAggregateCleartext(cleartext);
    // dataCount > 0 was checked above and never decreases
    const average = sum / BigInt(batch.dataCount);

    context.processed = true;
    this.state.results.set(batchId, { requestId, average, dataCount: batch.dataCount });

    this.events.emit({ type: "DecryptionCompleted", requestId, batchId, average });
    this.logger.info(
      {
        requestId: requestId.toString(),
        batchId,
        dataCount: batch.dataCount,
        average: average.toString(),
      },
      "Decryption completed"
    );
    return { requestId, batchId, average };
  }
}

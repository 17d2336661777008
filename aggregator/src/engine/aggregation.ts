/**
 * Aggregation engine: homomorphic sum of a batch plus its commitment.
 *
 * Values are folded in strict index order starting from an encrypted zero.
 * Every handle, the accumulator included, is initialized before it is used.
 */

import { AggregatorError } from "../utils/errors.js";
import { computeCommitment } from "./commitment.js";
import type { AggregatorState } from "../state.js";
import type { Aggregate, Commitment, Fingerprint } from "../types/batch.js";
import type { CiphertextCapability } from "../types/capabilities.js";

export interface AggregationEngineOptions<H> {
  state: AggregatorState<H>;
  capability: CiphertextCapability<H>;
  instanceAddress: string;
}

export class AggregationEngine<H> {
  private state: AggregatorState<H>;
  private capability: CiphertextCapability<H>;
  private instanceAddress: string;

  constructor(opts: AggregationEngineOptions<H>) {
    this.state = opts.state;
    this.capability = opts.capability;
    this.instanceAddress = opts.instanceAddress;
  }

  computeAggregate(batchId: number): Aggregate<H> {
    const values = this.snapshot(batchId);

    let sum = this.capability.zero();
    this.capability.initializeIfNeeded(sum);

    const fingerprints: Fingerprint[] = [];
    for (const value of values) {
      this.capability.initializeIfNeeded(value);
      sum = this.capability.add(sum, value);
      this.capability.initializeIfNeeded(sum);
      fingerprints.push(this.capability.fingerprint(value));
    }

    return {
      sum,
      commitment: computeCommitment(fingerprints, this.instanceAddress),
      dataCount: values.length,
    };
  }

  /**
   * Commitment over the batch as it is right now.
   */
  computeCommitment(batchId: number): Commitment {
    const fingerprints = this.snapshot(batchId).map((value) => {
      this.capability.initializeIfNeeded(value);
      return this.capability.fingerprint(value);
    });
    return computeCommitment(fingerprints, this.instanceAddress);
  }

  private snapshot(batchId: number): readonly H[] {
    const batch = this.state.batches.get(batchId);
    if (!batch || batch.dataCount === 0) {
      throw new AggregatorError("InvalidBatch", `Batch ${batchId} does not exist or is empty`);
    }
    const values = this.state.values.get(batchId) ?? [];
    if (values.length !== batch.dataCount) {
      throw new AggregatorError(
        "InvalidBatch",
        `Batch ${batchId} holds ${values.length} values but counts ${batch.dataCount}`
      );
    }
    return values;
  }
}

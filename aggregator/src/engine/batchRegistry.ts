/**
 * Batch lifecycle: OPEN → CLOSED (terminal).
 *
 * Exactly one batch is open at any time and it always has the highest id.
 * Closing a batch opens its successor in the same step.
 */

import { AggregatorError } from "../utils/errors.js";
import type { EventBus } from "../utils/events.js";
import type { Logger } from "../utils/logger.js";
import type { AccessControl } from "./accessControl.js";
import type { AggregatorState } from "../state.js";
import type { Batch } from "../types/batch.js";

export interface BatchRegistryOptions<H> {
  state: AggregatorState<H>;
  access: AccessControl<H>;
  events: EventBus;
  logger: Logger;
}

export class BatchRegistry<H> {
  private state: AggregatorState<H>;
  private access: AccessControl<H>;
  private events: EventBus;
  private logger: Logger;

  constructor(opts: BatchRegistryOptions<H>) {
    this.state = opts.state;
    this.access = opts.access;
    this.events = opts.events;
    this.logger = opts.logger;
  }

  get currentBatchId(): number {
    return this.state.currentBatchId;
  }

  getBatch(id: number): Batch | undefined {
    const batch = this.state.batches.get(id);
    return batch ? { ...batch } : undefined;
  }

  /**
   * Allocate the next sequential id and make it the open batch.
   */
  openBatch(): Batch {
    const id = this.state.currentBatchId + 1;
    const batch: Batch = { id, dataCount: 0, closed: false };
    this.state.batches.set(id, batch);
    this.state.values.set(id, []);
    this.state.currentBatchId = id;

    this.events.emit({ type: "BatchOpened", batchId: id });
    this.logger.info({ batchId: id }, "Batch opened");
    return { ...batch };
  }

  /**
   * Close the open batch and open the next one. Owner only.
   */
  closeBatch(caller: string): { closed: Batch; opened: Batch } {
    this.access.requireOwner(caller);

    const id = this.state.currentBatchId;
    const batch = this.state.batches.get(id);
    if (!batch || batch.id !== id || batch.closed) {
      throw new AggregatorError("InvalidBatch", `Current batch ${id} is missing or already closed`);
    }

    batch.closed = true;
    this.events.emit({ type: "BatchClosed", batchId: id });
    this.logger.info({ batchId: id, dataCount: batch.dataCount }, "Batch closed");

    const opened = this.openBatch();
    return { closed: { ...batch }, opened };
  }

  /**
   * The live record of the open batch, for the ledger to append to.
   */
  requireOpenBatch(): Batch {
    const batch = this.state.batches.get(this.state.currentBatchId);
    if (!batch || batch.closed) {
      throw new AggregatorError(
        "BatchClosedOrInvalid",
        `Batch ${this.state.currentBatchId} is not open for submissions`
      );
    }
    return batch;
  }
}

/**
 * Submission ledger: appends encrypted readings to the open batch.
 *
 * Indices are handed out in submission order and never change. A rejected
 * submission leaves the batch, the value list and the cooldown table as they
 * were.
 */

import { normalizeIdentity } from "../utils/identity.js";
import type { EventBus } from "../utils/events.js";
import type { Logger } from "../utils/logger.js";
import type { AccessControl } from "./accessControl.js";
import type { BatchRegistry } from "./batchRegistry.js";
import type { Cooldown } from "./cooldown.js";
import type { AggregatorState } from "../state.js";
import type { SubmissionReceipt } from "../types/batch.js";
import type { CiphertextCapability } from "../types/capabilities.js";

export interface SubmissionLedgerOptions<H> {
  state: AggregatorState<H>;
  access: AccessControl<H>;
  registry: BatchRegistry<H>;
  cooldown: Cooldown;
  capability: CiphertextCapability<H>;
  events: EventBus;
  logger: Logger;
}

export class SubmissionLedger<H> {
  private state: AggregatorState<H>;
  private access: AccessControl<H>;
  private registry: BatchRegistry<H>;
  private cooldown: Cooldown;
  private capability: CiphertextCapability<H>;
  private events: EventBus;
  private logger: Logger;

  constructor(opts: SubmissionLedgerOptions<H>) {
    this.state = opts.state;
    this.access = opts.access;
    this.registry = opts.registry;
    this.cooldown = opts.cooldown;
    this.capability = opts.capability;
    this.events = opts.events;
    this.logger = opts.logger;
  }

  submit(value: H, submitter: string): SubmissionReceipt {
    const who = normalizeIdentity(submitter);
    this.access.requireProvider(who);
    this.access.requireNotPaused();
    this.cooldown.assertElapsed(who);
    const batch = this.registry.requireOpenBatch();

    this.capability.initializeIfNeeded(value);
    const fingerprint = this.capability.fingerprint(value);

    const values = this.valuesOf(batch.id);
    const index = batch.dataCount;
    values.push(value);
    batch.dataCount = index + 1;
    this.cooldown.record(who);

    this.events.emit({
      type: "DataSubmitted",
      submitter: who,
      batchId: batch.id,
      index,
      fingerprint,
    });
    this.logger.info({ submitter: who, batchId: batch.id, index, fingerprint }, "Data submitted");

    return { batchId: batch.id, index, fingerprint };
  }

  /**
   * Handles stored for a batch, in index order. Empty for unknown batches.
   */
  getValues(batchId: number): readonly H[] {
    return [...(this.state.values.get(batchId) ?? [])];
  }

  private valuesOf(batchId: number): H[] {
    let values = this.state.values.get(batchId);
    if (!values) {
      values = [];
      this.state.values.set(batchId, values);
    }
    return values;
  }
}

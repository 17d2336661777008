/**
 * DataAggregator: one instance of the encrypted-average service.
 *
 * Owns the application state and wires the components together:
 *
 *   BatchRegistry ← SubmissionLedger ← AggregationEngine
 *        ← DecryptionCoordinator → oracle → CallbackVerifier
 *
 * Every public operation is synchronous and runs to completion before the
 * next one starts. The only window between operations that matters is the
 * one between a decryption request and its callback; the verifier re-checks
 * the batch commitment when the callback arrives instead of locking.
 */

import { AccessControl } from "./engine/accessControl.js";
import { AggregationEngine } from "./engine/aggregation.js";
import { BatchRegistry } from "./engine/batchRegistry.js";
import { Cooldown } from "./engine/cooldown.js";
import { SubmissionLedger } from "./engine/ledger.js";
import { DecryptionCoordinator } from "./oracle/coordinator.js";
import { CallbackVerifier, type DecryptionOutcome } from "./oracle/verifier.js";
import { createState, type AggregatorState } from "./state.js";
import { EventBus } from "./utils/events.js";
import { isAggregatorError } from "./utils/errors.js";
import { normalizeIdentity } from "./utils/identity.js";
import { systemClock } from "./types/capabilities.js";
import type { Logger } from "./utils/logger.js";
import type {
  Aggregate,
  Batch,
  BatchResult,
  Commitment,
  DecryptionContext,
  SubmissionReceipt,
} from "./types/batch.js";
import type {
  AttestationVerifier,
  CiphertextCapability,
  Clock,
  DecryptionOracle,
} from "./types/capabilities.js";

export interface DataAggregatorOptions<H> {
  owner: string;
  instanceAddress: string;
  capability: CiphertextCapability<H>;
  oracle: DecryptionOracle<H>;
  attestations: AttestationVerifier;
  logger: Logger;
  submitCooldownSeconds?: number;
  requestCooldownSeconds?: number;
  clock?: Clock;
}

export class DataAggregator<H> {
  readonly events: EventBus;

  private state: AggregatorState<H>;
  private logger: Logger;
  private access: AccessControl<H>;
  private registry: BatchRegistry<H>;
  private ledger: SubmissionLedger<H>;
  private engine: AggregationEngine<H>;
  private coordinator: DecryptionCoordinator<H>;
  private verifier: CallbackVerifier<H>;

  constructor(opts: DataAggregatorOptions<H>) {
    const clock = opts.clock ?? systemClock;
    this.logger = opts.logger;
    this.events = new EventBus(opts.logger);
    this.state = createState<H>({
      owner: normalizeIdentity(opts.owner),
      submitCooldownSeconds: opts.submitCooldownSeconds ?? 60,
      requestCooldownSeconds: opts.requestCooldownSeconds ?? 300,
    });

    const state = this.state;
    const common = { state, events: this.events, logger: this.logger };

    this.access = new AccessControl({ state, logger: this.logger });
    this.registry = new BatchRegistry({ ...common, access: this.access });
    this.engine = new AggregationEngine({
      state,
      capability: opts.capability,
      instanceAddress: normalizeIdentity(opts.instanceAddress),
    });
    this.ledger = new SubmissionLedger({
      ...common,
      access: this.access,
      registry: this.registry,
      capability: opts.capability,
      cooldown: new Cooldown({
        table: state.lastSubmissionAt,
        interval: () => state.submitCooldownSeconds,
        clock,
        action: "submission",
      }),
    });
    this.verifier = new CallbackVerifier({
      ...common,
      engine: this.engine,
      attestations: opts.attestations,
    });
    this.coordinator = new DecryptionCoordinator({
      ...common,
      access: this.access,
      engine: this.engine,
      oracle: opts.oracle,
      resume: (requestId, cleartext, attestation) => {
        this.onDecryptionResult(requestId, cleartext, attestation);
      },
      cooldown: new Cooldown({
        table: state.lastRequestAt,
        interval: () => state.requestCooldownSeconds,
        clock,
        action: "decryption request",
      }),
    });

    this.registry.openBatch();
  }

  // ============ Core operations ============

  submit(value: H, submitter: string): SubmissionReceipt {
    return this.run("submit", () => this.ledger.submit(value, submitter));
  }

  closeBatch(caller: string): { closed: Batch; opened: Batch } {
    return this.run("closeBatch", () => this.registry.closeBatch(caller));
  }

  computeAggregate(batchId: number): Aggregate<H> {
    return this.engine.computeAggregate(batchId);
  }

  computeCommitment(batchId: number): Commitment {
    return this.engine.computeCommitment(batchId);
  }

  requestAggregateDecryption(batchId: number, requester: string): bigint {
    return this.run("requestAggregateDecryption", () =>
      this.coordinator.requestAggregateDecryption(batchId, requester)
    );
  }

  onDecryptionResult(requestId: bigint, cleartext: string, attestation: string): DecryptionOutcome {
    return this.run("onDecryptionResult", () =>
      this.verifier.onDecryptionResult(requestId, cleartext, attestation)
    );
  }

  // ============ Administration ============

  addProvider(caller: string, provider: string): void {
    this.run("addProvider", () => this.access.addProvider(caller, provider));
  }

  removeProvider(caller: string, provider: string): void {
    this.run("removeProvider", () => this.access.removeProvider(caller, provider));
  }

  pause(caller: string): void {
    this.run("pause", () => this.access.setPaused(caller, true));
  }

  unpause(caller: string): void {
    this.run("unpause", () => this.access.setPaused(caller, false));
  }

  setSubmitCooldown(caller: string, seconds: number): void {
    this.run("setSubmitCooldown", () => this.access.setSubmitCooldown(caller, seconds));
  }

  setRequestCooldown(caller: string, seconds: number): void {
    this.run("setRequestCooldown", () => this.access.setRequestCooldown(caller, seconds));
  }

  transferOwnership(caller: string, newOwner: string): void {
    this.run("transferOwnership", () => this.access.transferOwnership(caller, newOwner));
  }

  // ============ Queries ============

  getCurrentBatchId(): number {
    return this.registry.currentBatchId;
  }

  getBatch(batchId: number): Batch | undefined {
    return this.registry.getBatch(batchId);
  }

  getBatchValues(batchId: number): readonly H[] {
    return this.ledger.getValues(batchId);
  }

  getDecryptionContext(requestId: bigint): DecryptionContext | undefined {
    const context = this.state.contexts.get(requestId);
    return context ? { ...context } : undefined;
  }

  getLatestResult(batchId: number): BatchResult | undefined {
    const result = this.state.results.get(batchId);
    return result ? { ...result } : undefined;
  }

  pendingRequestCount(): number {
    let count = 0;
    for (const context of this.state.contexts.values()) {
      if (!context.processed) count++;
    }
    return count;
  }

  isProvider(identity: string): boolean {
    return this.access.isProvider(identity);
  }

  isPaused(): boolean {
    return this.state.paused;
  }

  get owner(): string {
    return this.state.owner;
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isAggregatorError(err)) {
        this.logger.warn({ operation, code: err.code, reason: err.message }, "Operation rejected");
      }
      throw err;
    }
  }
}

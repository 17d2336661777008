/**
 * Decryption request coordinator: first half of the two-step reveal.
 *
 * Sums the batch, asks the oracle to decrypt the sum and records what the
 * batch looked like at request time. The request id is whatever the oracle
 * hands back; the callback is matched against the stored context later.
 * Several requests may be pending for the same batch.
 */

import { normalizeIdentity } from "../utils/identity.js";
import type { EventBus } from "../utils/events.js";
import type { Logger } from "../utils/logger.js";
import type { AccessControl } from "../engine/accessControl.js";
import type { AggregationEngine } from "../engine/aggregation.js";
import type { Cooldown } from "../engine/cooldown.js";
import type { AggregatorState } from "../state.js";
import type { DecryptionCallback, DecryptionOracle } from "../types/capabilities.js";

export interface DecryptionCoordinatorOptions<H> {
  state: AggregatorState<H>;
  access: AccessControl<H>;
  cooldown: Cooldown;
  engine: AggregationEngine<H>;
  oracle: DecryptionOracle<H>;
  /** Entry point the oracle resumes with the decrypted result. */
  resume: DecryptionCallback;
  events: EventBus;
  logger: Logger;
}

export class DecryptionCoordinator<H> {
  private state: AggregatorState<H>;
  private access: AccessControl<H>;
  private cooldown: Cooldown;
  private engine: AggregationEngine<H>;
  private oracle: DecryptionOracle<H>;
  private resume: DecryptionCallback;
  private events: EventBus;
  private logger: Logger;

  constructor(opts: DecryptionCoordinatorOptions<H>) {
    this.state = opts.state;
    this.access = opts.access;
    this.cooldown = opts.cooldown;
    this.engine = opts.engine;
    this.oracle = opts.oracle;
    this.resume = opts.resume;
    this.events = opts.events;
    this.logger = opts.logger;
  }

  requestAggregateDecryption(batchId: number, requester: string): bigint {
    const who = normalizeIdentity(requester);
    this.access.requireNotPaused();
    this.cooldown.assertElapsed(who);

    const { sum, commitment, dataCount } = this.engine.computeAggregate(batchId);

    const requestId = this.oracle.request(sum, this.resume);
    if (this.state.contexts.has(requestId)) {
      throw new Error(`Oracle returned request id ${requestId} that is already in use`);
    }

    this.state.contexts.set(requestId, { batchId, stateHash: commitment, processed: false });
    this.cooldown.record(who);

    this.events.emit({ type: "DecryptionRequested", requestId, batchId, commitment });
    this.logger.info(
      { requestId: requestId.toString(), batchId, dataCount, commitment, requester: who },
      "Decryption requested"
    );
    return requestId;
  }
}

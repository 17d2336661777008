/**
 * Administrative surface: owner, provider allow-list, pause switch and
 * cooldown intervals. The rest of the engine only consumes these as
 * preconditions.
 */

import { AggregatorError } from "../utils/errors.js";
import { normalizeIdentity } from "../utils/identity.js";
import type { Logger } from "../utils/logger.js";
import type { AggregatorState } from "../state.js";

export interface AccessControlOptions<H> {
  state: AggregatorState<H>;
  logger: Logger;
}

export class AccessControl<H> {
  private state: AggregatorState<H>;
  private logger: Logger;

  constructor(opts: AccessControlOptions<H>) {
    this.state = opts.state;
    this.logger = opts.logger;
  }

  isProvider(identity: string): boolean {
    return this.state.providers.has(normalizeIdentity(identity));
  }

  requireOwner(caller: string): void {
    if (normalizeIdentity(caller) !== this.state.owner) {
      throw new AggregatorError("NotOwner", `${caller} is not the owner`);
    }
  }

  requireProvider(identity: string): void {
    if (!this.state.providers.has(identity)) {
      throw new AggregatorError("NotProvider", `${identity} is not an authorized provider`);
    }
  }

  requireNotPaused(): void {
    if (this.state.paused) {
      throw new AggregatorError("Paused", "Aggregator is paused");
    }
  }

  addProvider(caller: string, provider: string): void {
    this.requireOwner(caller);
    const who = normalizeIdentity(provider);
    this.state.providers.add(who);
    this.logger.info({ provider: who }, "Provider added");
  }

  removeProvider(caller: string, provider: string): void {
    this.requireOwner(caller);
    const who = normalizeIdentity(provider);
    this.state.providers.delete(who);
    this.logger.info({ provider: who }, "Provider removed");
  }

  setPaused(caller: string, paused: boolean): void {
    this.requireOwner(caller);
    this.state.paused = paused;
    this.logger.info({ paused }, paused ? "Aggregator paused" : "Aggregator unpaused");
  }

  setSubmitCooldown(caller: string, seconds: number): void {
    this.requireOwner(caller);
    this.state.submitCooldownSeconds = validateSeconds(seconds);
    this.logger.info({ seconds }, "Submission cooldown updated");
  }

  setRequestCooldown(caller: string, seconds: number): void {
    this.requireOwner(caller);
    this.state.requestCooldownSeconds = validateSeconds(seconds);
    this.logger.info({ seconds }, "Decryption request cooldown updated");
  }

  transferOwnership(caller: string, newOwner: string): void {
    this.requireOwner(caller);
    const next = normalizeIdentity(newOwner);
    const previous = this.state.owner;
    this.state.owner = next;
    this.logger.info({ previous, owner: next }, "Ownership transferred");
  }
}

function validateSeconds(seconds: number): number {
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new AggregatorError(
      "InvalidArgument",
      `Cooldown must be a non-negative integer of seconds, got ${seconds}`
    );
  }
  return seconds;
}

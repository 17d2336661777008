import { AggregatorError } from "../utils/errors.js";
import type { Clock } from "../types/capabilities.js";

export interface CooldownOptions {
  /** Last-action timestamps for this namespace, keyed by normalized identity. */
  table: Map<string, number>;
  /** Read on every check so that reconfiguration applies immediately. */
  interval: () => number;
  clock: Clock;
  action: string;
}

/**
 * Minimum spacing between two actions of one identity in one namespace.
 * An identity that never acted may act at once.
 */
export class Cooldown {
  private table: Map<string, number>;
  private interval: () => number;
  private clock: Clock;
  private action: string;

  constructor(opts: CooldownOptions) {
    this.table = opts.table;
    this.interval = opts.interval;
    this.clock = opts.clock;
    this.action = opts.action;
  }

  /** Seconds until `identity` may act again; 0 when it may act now. */
  remaining(identity: string): number {
    const last = this.table.get(identity);
    if (last === undefined) return 0;
    return Math.max(0, last + this.interval() - this.clock());
  }

  assertElapsed(identity: string): void {
    const wait = this.remaining(identity);
    if (wait > 0) {
      throw new AggregatorError(
        "CooldownActive",
        `${identity} must wait ${wait}s before the next ${this.action}`
      );
    }
  }

  record(identity: string): void {
    this.table.set(identity, this.clock());
  }
}

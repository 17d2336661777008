import { describe, it, expect } from "vitest";
import { ZeroHash, getAddress } from "ethers";
import { computeCommitment } from "./commitment.js";
import { UNINITIALIZED_HANDLE, UnknownHandleError } from "../fhe/simulatedCapability.js";
import { INSTANCE, OWNER, PROVIDER_A, codeOf, createHarness } from "../testing/harness.js";

describe("AggregationEngine", () => {
  it("rejects an empty batch", () => {
    const { aggregator } = createHarness();
    expect(codeOf(() => aggregator.computeAggregate(1))).toBe("InvalidBatch");
    expect(codeOf(() => aggregator.computeCommitment(1))).toBe("InvalidBatch");
  });

  it("rejects a batch that does not exist", () => {
    const { aggregator } = createHarness();
    expect(codeOf(() => aggregator.computeAggregate(7))).toBe("InvalidBatch");
  });

  it("sums the batch homomorphically", () => {
    const { aggregator, capability, submitAll } = createHarness();
    submitAll([10, 20, 30]);

    const { sum, dataCount } = aggregator.computeAggregate(1);

    expect(capability.reveal(sum)).toBe(60n);
    expect(dataCount).toBe(3);
  });

  it("commits to the ordered fingerprints and the instance address", () => {
    const { aggregator, submitAll } = createHarness();
    submitAll([1, 2, 3]);
    const fingerprints = [...aggregator.getBatchValues(1)];

    const { commitment } = aggregator.computeAggregate(1);

    expect(commitment).toBe(computeCommitment(fingerprints, getAddress(INSTANCE)));
    expect(aggregator.computeCommitment(1)).toBe(commitment);
  });

  it("returns the same commitment for an unchanged batch", () => {
    const { aggregator, submitAll } = createHarness();
    submitAll([4, 5]);
    expect(aggregator.computeCommitment(1)).toBe(aggregator.computeCommitment(1));
  });

  it("changes the commitment on every append", () => {
    const { aggregator, submitAll } = createHarness();
    submitAll([4]);
    const seen = new Set([aggregator.computeCommitment(1)]);
    for (const v of [4, 4, 4]) {
      submitAll([v]);
      seen.add(aggregator.computeCommitment(1));
    }
    expect(seen.size).toBe(4);
  });

  it("initializes an uninitialized handle as zero before using it", () => {
    const { aggregator, capability } = createHarness();
    aggregator.submit(capability.encrypt(10), PROVIDER_A);
    aggregator.submit(UNINITIALIZED_HANDLE, PROVIDER_A);
    aggregator.submit(capability.encrypt(20), PROVIDER_A);

    const { sum, dataCount } = aggregator.computeAggregate(1);

    expect(capability.reveal(sum)).toBe(30n);
    expect(dataCount).toBe(3);
    expect(aggregator.getBatchValues(1)[1]).toBe(ZeroHash);
  });

  it("still aggregates a closed batch", () => {
    const { aggregator, capability, submitAll } = createHarness();
    submitAll([7, 8]);
    const before = aggregator.computeCommitment(1);
    aggregator.closeBatch(OWNER);
    submitAll([100]);

    const { sum, commitment } = aggregator.computeAggregate(1);

    expect(capability.reveal(sum)).toBe(15n);
    expect(commitment).toBe(before);
  });

  it("adds the value behind a differently spelled handle", () => {
    const { aggregator, capability } = createHarness();
    const h = capability.encrypt(10);
    const first = aggregator.submit(h, PROVIDER_A);
    const second = aggregator.submit("0x" + h.slice(2).toUpperCase(), PROVIDER_A);

    const { sum } = aggregator.computeAggregate(1);

    expect(capability.reveal(sum)).toBe(20n);
    expect(second.fingerprint).toBe(first.fingerprint);
  });

  it("rejects a handle the capability never issued without recording it", () => {
    const { aggregator } = createHarness();
    expect(() => aggregator.submit("0x" + "cd".repeat(32), PROVIDER_A)).toThrow(UnknownHandleError);
    expect(aggregator.getBatchValues(1)).toEqual([]);
  });
});

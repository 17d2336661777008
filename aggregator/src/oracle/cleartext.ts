import { AbiCoder, isHexString, toBigInt } from "ethers";
import { AggregatorError } from "../utils/errors.js";

/** Width of the decrypted aggregate: abi.encode(uint32 sum). */
export const AGGREGATE_BITS = 32;
export const MAX_AGGREGATE = (1n << BigInt(AGGREGATE_BITS)) - 1n;

const abi = AbiCoder.defaultAbiCoder();

export function encodeAggregateCleartext(sum: bigint): string {
  if (sum < 0n || sum > MAX_AGGREGATE) {
    throw new RangeError(`Aggregate ${sum} does not fit in uint${AGGREGATE_BITS}`);
  }
  return abi.encode([`uint${AGGREGATE_BITS}`], [sum]);
}

/**
 * Strict decode: exactly one 32-byte word whose upper bits are zero.
 */
export function decodeAggregateCleartext(cleartext: string): bigint {
  if (!isHexString(cleartext, 32)) {
    throw new AggregatorError("InvalidCleartext", "Cleartext must be exactly one 32-byte word");
  }
  const sum = toBigInt(cleartext);
  if (sum > MAX_AGGREGATE) {
    throw new AggregatorError("InvalidCleartext", `Cleartext ${sum} exceeds uint${AGGREGATE_BITS}`);
  }
  return sum;
}

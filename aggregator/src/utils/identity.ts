import { getAddress, isAddress } from "ethers";
import { AggregatorError } from "./errors.js";

/**
 * Checksum an identity so that differently-cased spellings share one
 * cooldown slot and one provider entry.
 */
export function normalizeIdentity(identity: string): string {
  if (!isAddress(identity)) {
    throw new AggregatorError("InvalidArgument", `Invalid identity address: ${identity}`);
  }
  return getAddress(identity);
}

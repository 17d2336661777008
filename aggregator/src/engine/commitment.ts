/**
 * Batch content commitment.
 *
 *   commitment = keccak256(abi.encode(bytes32[] fingerprints, address instance))
 *
 * The instance address separates deployments, so a proof captured against one
 * instance or batch snapshot does not verify against another.
 */

import { AbiCoder, keccak256 } from "ethers";
import type { Commitment, Fingerprint } from "../types/batch.js";

const abi = AbiCoder.defaultAbiCoder();

export function computeCommitment(
  fingerprints: readonly Fingerprint[],
  instanceAddress: string
): Commitment {
  return keccak256(abi.encode(["bytes32[]", "address"], [[...fingerprints], instanceAddress]));
}

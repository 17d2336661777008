/**
 * Decryption attestations.
 *
 * An attestation is abi.encode(bytes[] signatures). Each signature is an
 * EIP-191 personal signature over the 32 bytes of
 *
 *   keccak256(abi.encode(uint256 requestId, bytes cleartext))
 *
 * and the attestation holds when enough distinct trusted signers are recovered.
 */

import {
  AbiCoder,
  getAddress,
  getBytes,
  keccak256,
  verifyMessage,
  type BaseWallet,
} from "ethers";
import type { AttestationVerifier } from "../types/capabilities.js";

const abi = AbiCoder.defaultAbiCoder();

export function decryptionDigest(requestId: bigint, cleartext: string): string {
  return keccak256(abi.encode(["uint256", "bytes"], [requestId, cleartext]));
}

export function signDecryptionResult(
  signers: readonly BaseWallet[],
  requestId: bigint,
  cleartext: string
): string {
  const digest = getBytes(decryptionDigest(requestId, cleartext));
  const signatures = signers.map((signer) => signer.signMessageSync(digest));
  return abi.encode(["bytes[]"], [signatures]);
}

export interface SignerSetOptions {
  signers: readonly string[];
  threshold: number;
}

export class SignerSetAttestationVerifier implements AttestationVerifier {
  private signers: Set<string>;
  private threshold: number;

  constructor(opts: SignerSetOptions) {
    if (!Number.isInteger(opts.threshold) || opts.threshold < 1) {
      throw new RangeError(`Attestation threshold must be a positive integer, got ${opts.threshold}`);
    }
    this.signers = new Set(opts.signers.map((s) => getAddress(s)));
    if (opts.threshold > this.signers.size) {
      throw new RangeError(
        `Attestation threshold ${opts.threshold} exceeds ${this.signers.size} trusted signers`
      );
    }
    this.threshold = opts.threshold;
  }

  verify(requestId: bigint, cleartext: string, attestation: string): boolean {
    const signatures = decodeSignatures(attestation);
    if (signatures.length === 0) return false;

    let digest: Uint8Array;
    try {
      digest = getBytes(decryptionDigest(requestId, cleartext));
    } catch {
      return false;
    }

    const recovered = new Set<string>();
    for (const signature of signatures) {
      const signer = recoverSigner(digest, signature);
      if (signer && this.signers.has(signer)) recovered.add(signer);
    }
    return recovered.size >= this.threshold;
  }
}

function decodeSignatures(attestation: string): string[] {
  let raw: unknown;
  try {
    raw = abi.decode(["bytes[]"], attestation)[0];
  } catch {
    return [];
  }
  if (!Array.isArray(raw)) return [];
  return Array.from(raw).filter((s): s is string => typeof s === "string");
}

function recoverSigner(digest: Uint8Array, signature: string): string | null {
  try {
    return verifyMessage(digest, signature);
  } catch {
    return null;
  }
}

/**
 * Simulated ciphertexts. No cryptography: handles are random 32-byte ids and
 * plaintexts live in a private table. Addition wraps at 2^32 like a 32-bit
 * encrypted integer. The all-zero handle stands for an uninitialized value.
 */

import { ZeroHash, hexlify, isHexString, randomBytes } from "ethers";
import type { CiphertextCapability } from "../types/capabilities.js";
import type { Fingerprint } from "../types/batch.js";

export type SimulatedHandle = string;

export const UNINITIALIZED_HANDLE: SimulatedHandle = ZeroHash;

const MODULUS = 1n << 32n;

/**
 * Raised for a well-formed handle this capability never issued.
 */
export class UnknownHandleError extends Error {
  constructor(handle: SimulatedHandle) {
    super(`Ciphertext handle ${handle} is not initialized`);
    this.name = "UnknownHandleError";
  }
}

// Hex spellings of one handle name one ciphertext.
function canonical(handle: SimulatedHandle): SimulatedHandle {
  if (!isHexString(handle, 32)) {
    throw new TypeError(`Not a ciphertext handle: ${handle}`);
  }
  return handle.toLowerCase();
}

export class SimulatedCiphertextCapability implements CiphertextCapability<SimulatedHandle> {
  private plaintexts = new Map<SimulatedHandle, bigint>();

  encrypt(value: bigint | number): SimulatedHandle {
    const plain = BigInt(value);
    if (plain < 0n || plain >= MODULUS) {
      throw new RangeError(`Value ${plain} is outside the 32-bit plaintext range`);
    }
    return this.store(plain);
  }

  zero(): SimulatedHandle {
    return this.store(0n);
  }

  add(left: SimulatedHandle, right: SimulatedHandle): SimulatedHandle {
    return this.store((this.plaintextOf(left) + this.plaintextOf(right)) % MODULUS);
  }

  isInitialized(handle: SimulatedHandle): boolean {
    return isHexString(handle, 32) && this.plaintexts.has(handle.toLowerCase());
  }

  /**
   * Gives the all-zero handle an encrypted zero. Issued handles are left as
   * they are; any other handle is rejected.
   */
  initializeIfNeeded(handle: SimulatedHandle): void {
    const key = canonical(handle);
    if (this.plaintexts.has(key)) return;
    if (key !== UNINITIALIZED_HANDLE) {
      throw new UnknownHandleError(handle);
    }
    this.plaintexts.set(key, 0n);
  }

  fingerprint(handle: SimulatedHandle): Fingerprint {
    this.plaintextOf(handle);
    return canonical(handle);
  }

  /**
   * Plaintext behind a handle. Only the development oracle should call this.
   */
  reveal(handle: SimulatedHandle): bigint {
    return this.plaintextOf(handle);
  }

  private plaintextOf(handle: SimulatedHandle): bigint {
    const plain = this.plaintexts.get(canonical(handle));
    if (plain === undefined) {
      throw new UnknownHandleError(handle);
    }
    return plain;
  }

  private store(plain: bigint): SimulatedHandle {
    const handle = hexlify(randomBytes(32));
    this.plaintexts.set(handle, plain);
    return handle;
  }
}

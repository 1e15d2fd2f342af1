/**
 * Totem Boost — Boost Request Signature Verifier
 *
 * Free boosts are authorized by the frontend signer, which signs
 * keccak256(abi.encodePacked(user, totem, timestamp)) as an EIP-191
 * personal message. Each digest is accepted once, and only while its
 * timestamp is within the tolerance window of the current time.
 */

import { ethers } from 'ethers';
import { BoostError } from './errors.js';

export interface SignatureCheck {
  digest: string;
  timestamp: number;
}

export function boostMessageDigest(user: string, totem: string, timestamp: number): string {
  return ethers.solidityPackedKeccak256(
    ['address', 'address', 'uint256'],
    [user, totem, timestamp],
  );
}

/** Produces the signature the frontend signer attaches to a boost request. */
export async function signBoostRequest(
  signer: ethers.Signer,
  user: string,
  totem: string,
  timestamp: number,
): Promise<string> {
  return signer.signMessage(ethers.getBytes(boostMessageDigest(user, totem, timestamp)));
}

export class SignatureVerifier {
  private signer: string;
  private readonly toleranceSeconds: number;
  /** digest → request timestamp */
  private readonly consumed = new Map<string, number>();

  constructor(signer: string, toleranceSeconds: number) {
    this.signer = ethers.getAddress(signer);
    this.toleranceSeconds = toleranceSeconds;
  }

  setSigner(signer: string): void {
    this.signer = ethers.getAddress(signer);
  }

  getSigner(): string {
    return this.signer;
  }

  /**
   * Validate a request without consuming it. Call consume() once the
   * surrounding operation has succeeded.
   */
  check(
    user: string,
    totem: string,
    timestamp: number,
    signature: string,
    now: number,
  ): SignatureCheck {
    const digest = boostMessageDigest(user, totem, timestamp);

    let recovered: string;
    try {
      recovered = ethers.verifyMessage(ethers.getBytes(digest), signature);
    } catch {
      throw new BoostError('InvalidSignature', 'Signature could not be parsed');
    }
    if (recovered !== this.signer) {
      throw new BoostError('InvalidSignature', `Signed by ${recovered}, expected ${this.signer}`);
    }

    if (Math.abs(now - timestamp) > this.toleranceSeconds) {
      throw new BoostError('SignatureExpired', `Timestamp ${timestamp} outside ±${this.toleranceSeconds}s of ${now}`);
    }

    if (this.consumed.has(digest)) {
      throw new BoostError('SignatureAlreadyUsed');
    }

    return { digest, timestamp };
  }

  consume(check: SignatureCheck, now: number): void {
    this.consumed.set(check.digest, check.timestamp);
    this.purge(now);
  }

  /** check() followed by consume(). */
  verify(user: string, totem: string, timestamp: number, signature: string, now: number): void {
    this.consume(this.check(user, totem, timestamp, signature, now), now);
  }

  isConsumed(user: string, totem: string, timestamp: number): boolean {
    return this.consumed.has(boostMessageDigest(user, totem, timestamp));
  }

  consumedCount(): number {
    return this.consumed.size;
  }

  // Expired digests can never pass check() again, so they are dropped.
  private purge(now: number): void {
    for (const [digest, timestamp] of this.consumed) {
      if (timestamp < now - this.toleranceSeconds) {
        this.consumed.delete(digest);
      }
    }
  }

  exportConsumed(): Array<[string, number]> {
    return [...this.consumed];
  }

  importConsumed(entries: Array<[string, number]>): void {
    this.consumed.clear();
    for (const [digest, timestamp] of entries) {
      this.consumed.set(digest, timestamp);
    }
  }
}

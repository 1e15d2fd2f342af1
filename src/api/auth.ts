/**
 * Totem Boost — Signed Actions
 *
 * Admin and badge routes act for whoever signed the request. The caller
 * signs keccak256(abi.encodePacked(action, payload, timestamp)) as an
 * EIP-191 personal message and the recovered address becomes the caller.
 * A signature is accepted once, within the tolerance window.
 */

import { ethers } from 'ethers';
import { BoostError } from '../boost/errors.js';

export function actionDigest(action: string, payload: string, timestamp: number): string {
  return ethers.solidityPackedKeccak256(['string', 'string', 'uint256'], [action, payload, timestamp]);
}

export async function signAction(
  signer: ethers.Signer,
  action: string,
  payload: string,
  timestamp: number,
): Promise<string> {
  return signer.signMessage(ethers.getBytes(actionDigest(action, payload, timestamp)));
}

export class ActionAuthenticator {
  private readonly toleranceSeconds: number;
  /** `${signer}:${digest}` → request timestamp */
  private readonly used = new Map<string, number>();

  constructor(toleranceSeconds: number) {
    this.toleranceSeconds = toleranceSeconds;
  }

  /**
   * @returns the checksummed address that signed the action
   */
  authenticate(action: string, payload: string, timestamp: number, signature: string, now: number): string {
    const digest = actionDigest(action, payload, timestamp);

    let signer: string;
    try {
      signer = ethers.verifyMessage(ethers.getBytes(digest), signature);
    } catch {
      throw new BoostError('InvalidSignature', 'Signature could not be parsed');
    }

    if (Math.abs(now - timestamp) > this.toleranceSeconds) {
      throw new BoostError('SignatureExpired', `Timestamp ${timestamp} outside ±${this.toleranceSeconds}s of ${now}`);
    }

    const key = `${signer}:${digest}`;
    if (this.used.has(key)) {
      throw new BoostError('SignatureAlreadyUsed');
    }
    this.used.set(key, timestamp);

    for (const [entry, at] of this.used) {
      if (at < now - this.toleranceSeconds) this.used.delete(entry);
    }
    return signer;
  }
}

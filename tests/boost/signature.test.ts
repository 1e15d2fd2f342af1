import { describe, it, expect } from 'vitest';
import { ethers } from 'ethers';
import { SignatureVerifier, signBoostRequest } from '../../src/boost/signature.js';
import { FRONTEND_KEY, OTHER_KEY, T0, TOTEM_A, TOTEM_B, USER, thrownCode } from '../helpers.js';

const frontend = new ethers.Wallet(FRONTEND_KEY);
const stranger = new ethers.Wallet(OTHER_KEY);

describe('SignatureVerifier', () => {
  it('accepts a signature once', async () => {
    const verifier = new SignatureVerifier(frontend.address, 300);
    const signature = await signBoostRequest(frontend, USER, TOTEM_A, T0);

    verifier.verify(USER, TOTEM_A, T0, signature, T0);
    expect(verifier.isConsumed(USER, TOTEM_A, T0)).toBe(true);
    expect(thrownCode(() => verifier.verify(USER, TOTEM_A, T0, signature, T0 + 10))).toBe('SignatureAlreadyUsed');
  });

  it('does not consume on check()', async () => {
    const verifier = new SignatureVerifier(frontend.address, 300);
    const signature = await signBoostRequest(frontend, USER, TOTEM_A, T0);

    verifier.check(USER, TOTEM_A, T0, signature, T0);
    expect(verifier.isConsumed(USER, TOTEM_A, T0)).toBe(false);
    expect(verifier.check(USER, TOTEM_A, T0, signature, T0).timestamp).toBe(T0);
  });

  it('rejects a signature from another key', async () => {
    const verifier = new SignatureVerifier(frontend.address, 300);
    const signature = await signBoostRequest(stranger, USER, TOTEM_A, T0);

    expect(thrownCode(() => verifier.check(USER, TOTEM_A, T0, signature, T0))).toBe('InvalidSignature');
  });

  it('rejects a signature for a different totem', async () => {
    const verifier = new SignatureVerifier(frontend.address, 300);
    const signature = await signBoostRequest(frontend, USER, TOTEM_A, T0);

    expect(thrownCode(() => verifier.check(USER, TOTEM_B, T0, signature, T0))).toBe('InvalidSignature');
  });

  it('rejects bytes that are not a signature', () => {
    const verifier = new SignatureVerifier(frontend.address, 300);

    expect(thrownCode(() => verifier.check(USER, TOTEM_A, T0, '0x1234', T0))).toBe('InvalidSignature');
  });

  it('enforces the tolerance window on both sides', async () => {
    const verifier = new SignatureVerifier(frontend.address, 300);
    const signature = await signBoostRequest(frontend, USER, TOTEM_A, T0);

    expect(verifier.check(USER, TOTEM_A, T0, signature, T0 + 300).digest).toMatch(/^0x[0-9a-f]{64}$/);
    expect(thrownCode(() => verifier.check(USER, TOTEM_A, T0, signature, T0 + 301))).toBe('SignatureExpired');
    expect(thrownCode(() => verifier.check(USER, TOTEM_A, T0, signature, T0 - 301))).toBe('SignatureExpired');
  });

  it('follows a signer rotation', async () => {
    const verifier = new SignatureVerifier(frontend.address, 300);
    const signature = await signBoostRequest(stranger, USER, TOTEM_A, T0);

    verifier.setSigner(stranger.address);
    verifier.verify(USER, TOTEM_A, T0, signature, T0);
    expect(verifier.getSigner()).toBe(stranger.address);
  });

  it('drops consumed digests once they can no longer pass the window', async () => {
    const verifier = new SignatureVerifier(frontend.address, 300);
    verifier.verify(USER, TOTEM_A, T0, await signBoostRequest(frontend, USER, TOTEM_A, T0), T0);
    verifier.verify(USER, TOTEM_A, T0 + 400, await signBoostRequest(frontend, USER, TOTEM_A, T0 + 400), T0 + 400);

    expect(verifier.consumedCount()).toBe(1);
    expect(verifier.isConsumed(USER, TOTEM_A, T0 + 400)).toBe(true);
  });
});

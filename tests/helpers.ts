/**
 * Shared fixtures: a BoostSystem on simulated collaborators and a clock
 * the test moves by hand.
 */

import { ethers } from 'ethers';
import { AccessPolicy } from '../src/boost/access.js';
import { BoostError } from '../src/boost/errors.js';
import { signBoostRequest } from '../src/boost/signature.js';
import { BoostSystem } from '../src/boost/system.js';
import type { BoostSettings } from '../src/boost/types.js';
import {
  SimulatedBadgeMinter,
  SimulatedMeritManager,
  SimulatedPaymentReceipts,
  SimulatedRandomnessOracle,
  SimulatedRefunds,
  SimulatedTotemHoldings,
  SimulatedTreasury,
} from '../src/collaborators/simulated.js';
import { BoostEmitter } from '../src/events/emitter.js';

export const T0 = 1_700_000_000;
export const DAY = 86_400;

export const FRONTEND_KEY = '0x' + '11'.repeat(32);
export const OTHER_KEY = '0x' + '22'.repeat(32);

export const managerWallet = new ethers.Wallet('0x' + '33'.repeat(32));
export const userWallet = new ethers.Wallet('0x' + '44'.repeat(32));
export const user2Wallet = new ethers.Wallet('0x' + '55'.repeat(32));

export const USER = userWallet.address;
export const USER_2 = user2Wallet.address;
export const MANAGER = managerWallet.address;
export const TOTEM_A = '0x2000000000000000000000000000000000000001';
export const TOTEM_B = '0x2000000000000000000000000000000000000002';
export const ORACLE = '0x4000000000000000000000000000000000000004';

/** Placeholder transaction hash `0x..nn`. */
export function txHash(n: number): string {
  return '0x' + n.toString(16).padStart(64, '0');
}

export interface HarnessOptions {
  settings?: Partial<BoostSettings>;
  /** Totems the merit manager accepts; null accepts all */
  registeredTotems?: string[] | null;
  withBadgeMinter?: boolean;
}

export function createHarness(options: HarnessOptions = {}) {
  const clock = { now: T0 };
  const frontend = new ethers.Wallet(FRONTEND_KEY);
  const merit = new SimulatedMeritManager(options.registeredTotems ?? null);
  const treasury = new SimulatedTreasury();
  const refunds = new SimulatedRefunds();
  const holdings = new SimulatedTotemHoldings(1n);
  const oracle = new SimulatedRandomnessOracle(ORACLE);
  const payments = new SimulatedPaymentReceipts();
  const minter = new SimulatedBadgeMinter();
  const emitter = new BoostEmitter();

  const system = new BoostSystem({
    merit,
    treasury,
    refunds,
    holdings,
    oracle,
    payments,
    access: new AccessPolicy([MANAGER], ORACLE),
    badgeMinter: options.withBadgeMinter === false ? null : minter,
    settings: { frontendSigner: frontend.address, ...options.settings },
    clock: () => clock.now,
    emitter,
  });
  oracle.onFulfill((caller, requestId, words) => system.fulfillRandomWords(caller, requestId, words));

  /** Move the clock to `at` and submit a freshly signed free boost. */
  const boostAt = async (at: number, user = USER, totem = TOTEM_A) => {
    clock.now = at;
    const signature = await signBoostRequest(frontend, user, totem, at);
    return system.boost(user, totem, at, signature);
  };

  /** Free boosts at T0 + i days for i in [from, to). */
  const boostDays = async (from: number, to: number, totem = TOTEM_A) => {
    const rewards: number[] = [];
    for (let day = from; day < to; day++) {
      const result = await boostAt(T0 + day * DAY, USER, totem);
      rewards.push(result.reward);
    }
    return rewards;
  };

  return { clock, frontend, merit, treasury, refunds, holdings, oracle, payments, minter, emitter, system, boostAt, boostDays };
}

export type Harness = ReturnType<typeof createHarness>;

/** Code of the BoostError a promise rejects with. */
export async function rejectionCode(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    return err instanceof BoostError ? err.code : `unexpected: ${String(err)}`;
  }
  return 'resolved';
}

/** Code of the BoostError a synchronous call throws. */
export function thrownCode(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    return err instanceof BoostError ? err.code : `unexpected: ${String(err)}`;
  }
  return 'returned';
}

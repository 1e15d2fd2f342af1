/**
 * Totem Boost — Premium Reward Resolver
 *
 * Two-phase premium boost settlement:
 *   1. request(): take payment, refund the excess, forward the price to the
 *      treasury and ask the oracle for one random word. The caller's streak
 *      state is snapshotted against the returned request id.
 *   2. fulfill(): invoked later by the oracle. The random word picks a
 *      reward tier, the snapshot picks the streak multiplier, and the merit
 *      ledger is credited.
 *
 * Requests the oracle never answers stay pending; there is no timeout.
 */

import { ethers } from 'ethers';
import { BoostError } from './errors.js';
import type { RewardCalculator } from './rewards.js';
import type { PendingPremiumRequest, PremiumFulfillment, StreakSnapshot } from './types.js';
import type { MeritManager, RandomnessOracle, Refunds, Treasury } from '../collaborators/types.js';

export interface PremiumRequestInput {
  user: string;
  totem: string;
  payment: bigint;
  price: bigint;
  snapshot: StreakSnapshot;
  now: number;
}

export interface PremiumRequestResult {
  requestId: bigint;
  refunded: bigint;
}

export interface RandomRewardDeps {
  oracle: RandomnessOracle;
  merit: MeritManager;
  treasury: Treasury;
  refunds: Refunds;
  calculator: RewardCalculator;
}

export class RandomRewardResolver {
  private readonly deps: RandomRewardDeps;
  private readonly pending = new Map<bigint, PendingPremiumRequest>();

  constructor(deps: RandomRewardDeps) {
    this.deps = deps;
  }

  async request(input: PremiumRequestInput): Promise<PremiumRequestResult> {
    if (input.payment < input.price) {
      throw new BoostError(
        'InsufficientPayment',
        `Paid ${ethers.formatEther(input.payment)} ETH, premium boost costs ${ethers.formatEther(input.price)} ETH`,
      );
    }

    const refunded = input.payment - input.price;
    if (refunded > 0n) {
      await this.deps.refunds.refund(input.user, refunded);
    }
    await this.deps.treasury.receive(input.price);

    const requestId = await this.deps.oracle.requestRandomWords(1);
    this.pending.set(requestId, {
      requestId,
      user: input.user,
      totem: input.totem,
      snapshot: { ...input.snapshot },
      requestedAt: input.now,
    });

    return { requestId, refunded };
  }

  async fulfill(requestId: bigint, randomWords: readonly bigint[]): Promise<PremiumFulfillment> {
    const request = this.pending.get(requestId);
    if (!request) {
      throw new BoostError('UnknownRequest', `No pending premium boost for request ${requestId}`);
    }
    const word = randomWords[0];
    if (word === undefined) {
      throw new BoostError('MissingRandomWords', `Request ${requestId} fulfilled without random words`);
    }

    const { calculator, merit } = this.deps;
    const tier = calculator.selectTier(word);
    const boostPeriodPct = (await merit.isBoostPeriod()) ? await merit.boostMultiplierPct() : null;
    const reward = calculator.premiumReward(tier.points, request.snapshot.streakLength, boostPeriodPct);

    await merit.creditMerit(request.totem, reward);
    this.pending.delete(requestId);

    return {
      requestId,
      user: request.user,
      totem: request.totem,
      tierPoints: tier.points,
      multiplierPct: calculator.multiplierPct(request.snapshot.streakLength),
      boostPeriodPct,
      reward,
    };
  }

  listPending(): PendingPremiumRequest[] {
    return [...this.pending.values()];
  }

  restorePending(requests: PendingPremiumRequest[]): void {
    this.pending.clear();
    for (const request of requests) {
      this.pending.set(request.requestId, request);
    }
  }
}

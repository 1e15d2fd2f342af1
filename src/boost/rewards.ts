/**
 * Totem Boost — Reward Calculator
 *
 * Streak multiplier: 100% on day one, +5% per further streak day, capped
 * at 245% (reached on day 30). A boost period (Mythum) applies its own
 * percentage on top. All rounding is floor, on integer points.
 */

import { PREMIUM_REWARD_TIERS } from './types.js';
import type { PremiumRewardTier } from './types.js';

export interface RewardPolicy {
  boostRewardPoints: number;
  streakBonusPct: number;
  maxStreakMultiplierPct: number;
}

export class RewardCalculator {
  private readonly policy: () => RewardPolicy;
  private readonly tiers: readonly PremiumRewardTier[];

  constructor(policy: () => RewardPolicy, tiers: readonly PremiumRewardTier[] = PREMIUM_REWARD_TIERS) {
    this.policy = policy;
    this.tiers = tiers;
  }

  multiplierPct(streakLength: number): number {
    const { streakBonusPct, maxStreakMultiplierPct } = this.policy();
    const days = Math.max(streakLength, 1) - 1;
    return Math.min(100 + streakBonusPct * days, maxStreakMultiplierPct);
  }

  freeReward(streakLength: number, boostPeriodPct: number | null = null): number {
    return this.scale(this.policy().boostRewardPoints, streakLength, boostPeriodPct);
  }

  premiumReward(tierPoints: number, streakLength: number, boostPeriodPct: number | null = null): number {
    return this.scale(tierPoints, streakLength, boostPeriodPct);
  }

  /**
   * Map a random word onto the cumulative tier table using `word mod 100`.
   */
  selectTier(randomWord: bigint): PremiumRewardTier {
    const roll = Number(randomWord % 100n);
    let cumulative = 0;
    for (const tier of this.tiers) {
      cumulative += tier.chancePct;
      if (roll < cumulative) return tier;
    }
    const last = this.tiers[this.tiers.length - 1];
    if (!last) throw new Error('Premium reward tier table is empty');
    return last;
  }

  getTiers(): readonly PremiumRewardTier[] {
    return this.tiers;
  }

  private scale(base: number, streakLength: number, boostPeriodPct: number | null): number {
    const reward = Math.floor((base * this.multiplierPct(streakLength)) / 100);
    if (boostPeriodPct === null) return reward;
    return Math.floor((reward * boostPeriodPct) / 100);
  }
}

/**
 * Totem Boost — Engine Types
 *
 * Per-(user, totem) boost records, streak outcomes, premium reward tiers
 * and the tunable settings of the boost engine.
 */

import { ethers } from 'ethers';

// ---------------------------------------------------------------------------
// Time
// ---------------------------------------------------------------------------

/** Returns the current unix timestamp in seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export const ONE_DAY_SECONDS = 86_400;

// ---------------------------------------------------------------------------
// Boost Record
// ---------------------------------------------------------------------------

/** Streak and badge state of one user on one totem. */
export interface BoostRecord {
  lastFreeBoostAt: number;         // unix seconds, 0 = never
  lastPremiumBoostAt: number;      // unix seconds, 0 = never
  streakAnchorAt: number;          // start of the current streak window
  streakLength: number;            // 0 until the first boost
  graceDaysEarned: number;
  graceDaysUsed: number;
  /** milestone (streak length) → badges available to mint */
  unmintedBadges: Map<number, number>;
  /** Oracle request ids of premium boosts awaiting fulfillment */
  pendingRequestIds: bigint[];
}

export function createEmptyRecord(): BoostRecord {
  return {
    lastFreeBoostAt: 0,
    lastPremiumBoostAt: 0,
    streakAnchorAt: 0,
    streakLength: 0,
    graceDaysEarned: 0,
    graceDaysUsed: 0,
    unmintedBadges: new Map(),
    pendingRequestIds: [],
  };
}

export function cloneRecord(record: BoostRecord): BoostRecord {
  return {
    ...record,
    unmintedBadges: new Map(record.unmintedBadges),
    pendingRequestIds: [...record.pendingRequestIds],
  };
}

export type StreakState = 'Uninitialized' | 'ActiveStreak';

// ---------------------------------------------------------------------------
// Streak
// ---------------------------------------------------------------------------

export interface StreakPolicy {
  cooldownSeconds: number;
  graceDayInterval: number;
  milestones: readonly number[];
  /** Milestones repeat every this many days past the last listed one */
  milestoneRepeatInterval: number;
}

export interface StreakAdvance {
  streakLength: number;
  graceDayGranted: boolean;
  graceDaysConsumed: number;
  reset: boolean;
  milestonesReached: number[];
}

/** Streak state captured when a premium boost is requested. */
export interface StreakSnapshot {
  streakLength: number;
  graceDaysEarned: number;
  graceDaysUsed: number;
}

// ---------------------------------------------------------------------------
// Premium Rewards
// ---------------------------------------------------------------------------

export interface PremiumRewardTier {
  points: number;
  chancePct: number;
}

/** Cumulative chances must add up to 100. */
export const PREMIUM_REWARD_TIERS: readonly PremiumRewardTier[] = [
  { points: 500, chancePct: 50 },
  { points: 700, chancePct: 25 },
  { points: 1000, chancePct: 15 },
  { points: 2000, chancePct: 7 },
  { points: 3000, chancePct: 3 },
];

export interface PendingPremiumRequest {
  requestId: bigint;
  user: string;
  totem: string;
  snapshot: StreakSnapshot;
  requestedAt: number;
}

export interface PremiumFulfillment {
  requestId: bigint;
  user: string;
  totem: string;
  tierPoints: number;
  multiplierPct: number;
  boostPeriodPct: number | null;
  reward: number;
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export interface BoostSettings {
  boostRewardPoints: number;
  premiumBoostPrice: bigint;       // wei
  freeBoostCooldown: number;       // seconds
  frontendSigner: string;
  minTotemTokenBalance: bigint;
  signatureToleranceSeconds: number;
  graceDayInterval: number;
  milestones: readonly number[];
  milestoneRepeatInterval: number;
  streakBonusPct: number;          // added per streak day
  maxStreakMultiplierPct: number;
}

export const DEFAULT_BOOST_SETTINGS: BoostSettings = {
  boostRewardPoints: 100,
  premiumBoostPrice: ethers.parseEther('0.001'),
  freeBoostCooldown: ONE_DAY_SECONDS,
  frontendSigner: ethers.ZeroAddress,
  minTotemTokenBalance: 1n,
  signatureToleranceSeconds: 300,  // ±5 minutes
  graceDayInterval: 30,
  milestones: [7, 14, 30, 60, 100, 180, 365],
  milestoneRepeatInterval: 365,
  streakBonusPct: 5,
  maxStreakMultiplierPct: 245,
};

// ---------------------------------------------------------------------------
// Query Shapes
// ---------------------------------------------------------------------------

export interface StreakInfo {
  user: string;
  totem: string;
  state: StreakState;
  streakLength: number;
  streakAnchorAt: number;
  graceDaysEarned: number;
  graceDaysUsed: number;
  graceDaysAvailable: number;
  multiplierPct: number;
  nextFreeBoostAt: number;
}

export interface BoostData {
  user: string;
  totem: string;
  lastFreeBoostAt: number;
  lastPremiumBoostAt: number;
  streakAnchorAt: number;
  streakLength: number;
  graceDaysEarned: number;
  graceDaysUsed: number;
  unmintedBadges: Record<string, number>;
  pendingRequestIds: string[];
}

export interface PremiumBoostConfig {
  price: bigint;
  tiers: readonly PremiumRewardTier[];
}

export interface FreeBoostResult {
  user: string;
  totem: string;
  reward: number;
  streak: StreakAdvance;
  boostPeriodPct: number | null;
  boostedAt: number;
}

export interface PremiumBoostRequest {
  requestId: bigint;
  user: string;
  totem: string;
  streak: StreakAdvance;
  refunded: bigint;
  requestedAt: number;
}

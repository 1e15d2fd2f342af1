/**
 * Totem Boost — Streak Tracker
 *
 * Advances the per-(user, totem) streak window state machine:
 *
 *   Uninitialized → ActiveStreak(1)
 *   ActiveStreak(n) → ActiveStreak(n)      same window
 *   ActiveStreak(n) → ActiveStreak(n + 1)  next window, or later windows
 *                                          covered by banked grace days
 *   ActiveStreak(n) → ActiveStreak(1)      gap too large, streak broken
 *
 * Windows are anchored: advancing moves the anchor by whole cooldowns rather
 * than to the boost time, so a boost late in a window does not shift the
 * next deadline.
 */

import type { BoostRecord, StreakAdvance, StreakPolicy } from './types.js';

export function isMilestone(streakLength: number, policy: StreakPolicy): boolean {
  if (policy.milestones.includes(streakLength)) return true;
  const last = policy.milestones[policy.milestones.length - 1] ?? 0;
  return (
    policy.milestoneRepeatInterval > 0 &&
    streakLength > last &&
    streakLength % policy.milestoneRepeatInterval === 0
  );
}

export function graceDaysAvailable(record: BoostRecord): number {
  return record.graceDaysEarned - record.graceDaysUsed;
}

/**
 * Apply one boost at `now` to `record` in place.
 */
export function advanceStreak(
  record: BoostRecord,
  now: number,
  isPremium: boolean,
  policy: StreakPolicy,
): StreakAdvance {
  const cooldown = policy.cooldownSeconds;
  const outcome: StreakAdvance = {
    streakLength: record.streakLength,
    graceDayGranted: false,
    graceDaysConsumed: 0,
    reset: false,
    milestonesReached: [],
  };

  const bump = (): void => {
    record.streakLength += 1;
    if (record.streakLength % policy.graceDayInterval === 0) {
      record.graceDaysEarned += 1;
      outcome.graceDayGranted = true;
    }
    if (isMilestone(record.streakLength, policy)) {
      record.unmintedBadges.set(
        record.streakLength,
        (record.unmintedBadges.get(record.streakLength) ?? 0) + 1,
      );
      outcome.milestonesReached.push(record.streakLength);
    }
  };

  if (record.streakLength === 0) {
    record.streakAnchorAt = now;
    bump();
  } else {
    const elapsed = now - record.streakAnchorAt;

    if (elapsed < cooldown) {
      // same window
    } else if (elapsed < 2 * cooldown) {
      bump();
      record.streakAnchorAt += cooldown;
    } else {
      const missed = Math.floor(elapsed / cooldown) - 1;
      if (missed <= graceDaysAvailable(record)) {
        record.graceDaysUsed += missed;
        outcome.graceDaysConsumed = missed;
        bump();
        record.streakAnchorAt += (missed + 1) * cooldown;
      } else {
        record.streakLength = 0;
        record.graceDaysEarned = 0;
        record.graceDaysUsed = 0;
        record.unmintedBadges.clear();
        record.streakAnchorAt = now;
        outcome.reset = true;
        bump();
      }
    }
  }

  if (
    isPremium &&
    (record.lastPremiumBoostAt === 0 || now - record.lastPremiumBoostAt >= cooldown)
  ) {
    record.graceDaysEarned += 1;
    outcome.graceDayGranted = true;
  }

  outcome.streakLength = record.streakLength;
  return outcome;
}

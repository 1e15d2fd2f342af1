import { describe, it, expect } from 'vitest';
import { RewardCalculator } from '../../src/boost/rewards.js';

const calculator = new RewardCalculator(() => ({
  boostRewardPoints: 100,
  streakBonusPct: 5,
  maxStreakMultiplierPct: 245,
}));

describe('RewardCalculator', () => {
  it('adds 5% per streak day up to 245%', () => {
    expect(calculator.multiplierPct(1)).toBe(100);
    expect(calculator.multiplierPct(2)).toBe(105);
    expect(calculator.multiplierPct(29)).toBe(240);
    expect(calculator.multiplierPct(30)).toBe(245);
    expect(calculator.multiplierPct(100)).toBe(245);
  });

  it('scales the free reward by streak and boost period', () => {
    expect(calculator.freeReward(1)).toBe(100);
    expect(calculator.freeReward(3)).toBe(110);
    expect(calculator.freeReward(30)).toBe(245);
    expect(calculator.freeReward(2, 150)).toBe(157);
  });

  it('scales premium tier points the same way', () => {
    expect(calculator.premiumReward(700, 3)).toBe(770);
    expect(calculator.premiumReward(700, 3, 150)).toBe(1155);
  });

  it('reads the policy on every call', () => {
    let points = 100;
    const live = new RewardCalculator(() => ({ boostRewardPoints: points, streakBonusPct: 5, maxStreakMultiplierPct: 245 }));
    points = 200;
    expect(live.freeReward(1)).toBe(200);
  });

  it.each([
    [0n, 500],
    [49n, 500],
    [50n, 700],
    [74n, 700],
    [75n, 1000],
    [89n, 1000],
    [90n, 2000],
    [96n, 2000],
    [97n, 3000],
    [99n, 3000],
    [123n, 500],
    [10n ** 30n + 98n, 3000],
  ])('maps random word %s to the %i-point tier', (word, points) => {
    expect(calculator.selectTier(word).points).toBe(points);
  });
});

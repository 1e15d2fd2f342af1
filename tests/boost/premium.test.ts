import { describe, it, expect } from 'vitest';
import { ethers } from 'ethers';
import { DAY, MANAGER, ORACLE, T0, TOTEM_A, USER, USER_2, createHarness, rejectionCode, txHash } from '../helpers.js';

const PRICE = ethers.parseEther('0.001');

describe('BoostSystem premium boosts', () => {
  it('refunds the excess and sends exactly the price to the treasury', async () => {
    const h = createHarness();
    const request = await h.system.premiumBoost(USER, TOTEM_A, PRICE + 123n);

    expect(request.requestId).toBe(1n);
    expect(request.refunded).toBe(123n);
    expect(h.refunds.refundedTo(USER)).toBe(123n);
    expect(h.treasury.deposits).toEqual([PRICE]);
  });

  it('skips the refund when the payment is exact', async () => {
    const h = createHarness();
    await h.system.premiumBoost(USER, TOTEM_A, PRICE);

    expect(h.refunds.refunds).toEqual([]);
    expect(h.treasury.totalReceived()).toBe(PRICE);
  });

  it('credits nothing until the oracle answers', async () => {
    const h = createHarness();
    await h.system.premiumBoost(USER, TOTEM_A, PRICE);

    expect(h.merit.credits).toEqual([]);
    expect(h.system.getPendingPremiumRequests()).toEqual([
      {
        requestId: 1n,
        user: USER,
        totem: TOTEM_A,
        snapshot: { streakLength: 1, graceDaysEarned: 1, graceDaysUsed: 0 },
        requestedAt: T0,
      },
    ]);
    expect(h.system.getBoostData(USER, TOTEM_A).pendingRequestIds).toEqual(['1']);
  });

  it('credits the selected tier on fulfillment', async () => {
    const h = createHarness();
    await h.system.premiumBoost(USER, TOTEM_A, PRICE);
    await h.oracle.fulfill(1n, [75n]);

    expect(h.merit.meritOf(TOTEM_A)).toBe(1000);
    expect(h.system.getPendingPremiumRequests()).toEqual([]);
    expect(h.system.getBoostData(USER, TOTEM_A).pendingRequestIds).toEqual([]);
  });

  it('rejects underpayment without moving funds or touching the streak', async () => {
    const h = createHarness();

    expect(await rejectionCode(h.system.premiumBoost(USER, TOTEM_A, PRICE - 1n))).toBe('InsufficientPayment');
    expect(h.treasury.deposits).toEqual([]);
    expect(h.oracle.pendingRequestIds()).toEqual([]);
    expect(h.system.getStreakInfo(USER, TOTEM_A).state).toBe('Uninitialized');
  });

  it('uses the streak from request time', async () => {
    const h = createHarness();
    await h.boostDays(0, 3);
    h.clock.now = T0 + 2 * DAY + 3600;
    await h.system.premiumBoost(USER, TOTEM_A, PRICE);
    await h.boostAt(T0 + 3 * DAY);

    const result = await h.system.fulfillRandomWords(ORACLE, 1n, [50n]);
    expect(result.tierPoints).toBe(700);
    expect(result.multiplierPct).toBe(110);
    expect(result.reward).toBe(770);
    expect(h.merit.meritOf(TOTEM_A)).toBe(100 + 105 + 110 + 115 + 770);
  });

  it('applies the boost period active at fulfillment', async () => {
    const h = createHarness();
    await h.system.premiumBoost(USER, TOTEM_A, PRICE);
    h.merit.setBoostPeriod(true, 200);

    const result = await h.system.fulfillRandomWords(ORACLE, 1n, [0n]);
    expect(result.boostPeriodPct).toBe(200);
    expect(result.reward).toBe(1000);
  });

  it('grants one grace day per cooldown of premium boosts', async () => {
    const h = createHarness();
    const first = await h.system.premiumBoost(USER, TOTEM_A, PRICE);
    h.clock.now = T0 + 3600;
    const second = await h.system.premiumBoost(USER, TOTEM_A, PRICE);

    expect(first.streak.graceDayGranted).toBe(true);
    expect(second.streak.graceDayGranted).toBe(false);
    expect(h.system.getStreakInfo(USER, TOTEM_A).graceDaysEarned).toBe(1);

    h.clock.now = T0 + 3600 + DAY;
    const third = await h.system.premiumBoost(USER, TOTEM_A, PRICE);
    expect(third.streak.streakLength).toBe(2);
    expect(h.system.getStreakInfo(USER, TOTEM_A).graceDaysEarned).toBe(2);
  });

  it('only accepts fulfillment from the oracle', async () => {
    const h = createHarness();
    await h.system.premiumBoost(USER, TOTEM_A, PRICE);

    expect(await rejectionCode(h.system.fulfillRandomWords(USER, 1n, [1n]))).toBe('NotOracle');
    expect(h.system.getPendingPremiumRequests()).toHaveLength(1);
  });

  it('rejects unknown requests and empty words', async () => {
    const h = createHarness();
    await h.system.premiumBoost(USER, TOTEM_A, PRICE);

    expect(await rejectionCode(h.system.fulfillRandomWords(ORACLE, 99n, [1n]))).toBe('UnknownRequest');
    expect(await rejectionCode(h.system.fulfillRandomWords(ORACLE, 1n, []))).toBe('MissingRandomWords');
    expect(h.system.getPendingPremiumRequests()).toHaveLength(1);
  });

  it('settles pending requests while paused', async () => {
    const h = createHarness();
    await h.system.premiumBoost(USER, TOTEM_A, PRICE);
    await h.system.pause(MANAGER);

    expect(await rejectionCode(h.system.premiumBoost(USER, TOTEM_A, PRICE))).toBe('Paused');
    await h.oracle.fulfill(1n, [0n]);
    expect(h.merit.meritOf(TOTEM_A)).toBe(500);
  });

  it('requires a totem balance', async () => {
    const h = createHarness();
    h.holdings.setBalance(TOTEM_A, USER, 0n);

    expect(await rejectionCode(h.system.premiumBoost(USER, TOTEM_A, PRICE))).toBe('NotEnoughTokens');
  });

  it('reports the price and reward tiers', () => {
    const h = createHarness();
    const config = h.system.getPremiumBoostConfig();

    expect(config.price).toBe(PRICE);
    expect(config.tiers.map((t) => [t.points, t.chancePct])).toEqual([
      [500, 50],
      [700, 25],
      [1000, 15],
      [2000, 7],
      [3000, 3],
    ]);
  });
});

describe('BoostSystem premium boosts paid by transaction', () => {
  it('boosts for the sender recorded on the transaction', async () => {
    const h = createHarness();
    h.payments.record(txHash(1), USER_2.toLowerCase(), PRICE + 7n);

    const request = await h.system.premiumBoostWithPayment(TOTEM_A, txHash(1));

    expect(request.user).toBe(USER_2);
    expect(request.refunded).toBe(7n);
    expect(h.refunds.refundedTo(USER_2)).toBe(7n);
    expect(h.system.getStreakInfo(USER, TOTEM_A).state).toBe('Uninitialized');
    expect(h.system.getStreakInfo(USER_2, TOTEM_A).streakLength).toBe(1);
  });

  it('rejects a transaction the chain does not know', async () => {
    const h = createHarness();

    expect(await rejectionCode(h.system.premiumBoostWithPayment(TOTEM_A, txHash(2)))).toBe('PaymentNotVerified');
    expect(h.treasury.deposits).toEqual([]);
    expect(h.oracle.pendingRequestIds()).toEqual([]);
  });

  it('spends a transaction once, whatever its case', async () => {
    const h = createHarness();
    const hash = '0x' + 'ab'.repeat(32);
    h.payments.record(hash, USER, PRICE);
    await h.system.premiumBoostWithPayment(TOTEM_A, hash);

    expect(await rejectionCode(h.system.premiumBoostWithPayment(TOTEM_A, hash.toUpperCase().replace('0X', '0x')))).toBe(
      'PaymentAlreadyUsed',
    );
    expect(h.treasury.deposits).toEqual([PRICE]);
  });

  it('leaves the transaction unspent when the boost fails', async () => {
    const h = createHarness();
    h.payments.record(txHash(3), USER, PRICE);
    h.holdings.setBalance(TOTEM_A, USER, 0n);

    expect(await rejectionCode(h.system.premiumBoostWithPayment(TOTEM_A, txHash(3)))).toBe('NotEnoughTokens');

    h.holdings.setBalance(TOTEM_A, USER, 1n);
    const retried = await h.system.premiumBoostWithPayment(TOTEM_A, txHash(3));
    expect(retried.requestId).toBe(1n);
  });

  it('rejects a malformed hash before looking it up', async () => {
    const h = createHarness();

    expect(await rejectionCode(h.system.premiumBoostWithPayment(TOTEM_A, '0x1234'))).toBe('InvalidParameter');
  });
});

/**
 * Totem Boost — Boost System
 *
 * Public entry points of the boost engine. Composes the signature verifier,
 * streak tracker, reward calculator, premium reward resolver and badge
 * ledger, and calls the external merit, treasury, badge and holdings
 * services.
 *
 * Mutating calls run one at a time through a promise chain. Each call reads
 * a copy of the record, performs every check and external effect, and only
 * then commits, so a rejected call leaves no trace.
 */

import { ethers } from 'ethers';
import type { AccessPolicy } from './access.js';
import { BadgeLedger } from './badges.js';
import { BoostError } from './errors.js';
import { RandomRewardResolver } from './random-rewards.js';
import { RewardCalculator } from './rewards.js';
import { SignatureVerifier } from './signature.js';
import {
  STATE_VERSION,
  pendingFromJson,
  pendingToJson,
  recordFromJson,
  recordToJson,
} from './state.js';
import type { BoostStateSnapshot } from './state.js';
import { BoostRecordStore } from './store.js';
import { advanceStreak, graceDaysAvailable } from './streak.js';
import { DEFAULT_BOOST_SETTINGS, systemClock } from './types.js';
import type {
  BoostData,
  BoostSettings,
  Clock,
  FreeBoostResult,
  PendingPremiumRequest,
  PremiumBoostConfig,
  PremiumBoostRequest,
  PremiumFulfillment,
  StreakInfo,
  StreakPolicy,
} from './types.js';
import { BoostEmitter } from '../events/emitter.js';
import type {
  BadgeMinter,
  MeritManager,
  PaymentReceipts,
  RandomnessOracle,
  Refunds,
  TotemHoldings,
  Treasury,
} from '../collaborators/types.js';

export interface BoostSystemDeps {
  merit: MeritManager;
  treasury: Treasury;
  refunds: Refunds;
  holdings: TotemHoldings;
  oracle: RandomnessOracle;
  payments: PaymentReceipts;
  access: AccessPolicy;
  badgeMinter?: BadgeMinter | null;
  settings?: Partial<BoostSettings>;
  clock?: Clock;
  emitter?: BoostEmitter;
}

export function toAddress(value: string, field = 'address'): string {
  try {
    return ethers.getAddress(value);
  } catch {
    throw new BoostError('InvalidAddress', `Invalid ${field}: ${value}`);
  }
}

const TX_HASH = /^0x[0-9a-fA-F]{64}$/;

function requirePositiveInteger(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new BoostError('InvalidParameter', `${field} must be a positive integer, got ${value}`);
  }
}

export class BoostSystem {
  private readonly deps: BoostSystemDeps;
  private readonly settings: BoostSettings;
  private readonly clock: Clock;
  private readonly emitter: BoostEmitter;
  private readonly store = new BoostRecordStore();
  private readonly verifier: SignatureVerifier;
  private readonly calculator: RewardCalculator;
  private readonly resolver: RandomRewardResolver;
  private readonly badges: BadgeLedger;
  /** Lowercased hashes of transactions already spent on a premium boost */
  private consumedPayments = new Set<string>();
  private paused = false;
  private tail: Promise<void> = Promise.resolve();

  constructor(deps: BoostSystemDeps) {
    this.deps = deps;
    this.settings = { ...DEFAULT_BOOST_SETTINGS, ...deps.settings };
    this.clock = deps.clock ?? systemClock;
    this.emitter = deps.emitter ?? new BoostEmitter();
    this.verifier = new SignatureVerifier(this.settings.frontendSigner, this.settings.signatureToleranceSeconds);
    this.settings.frontendSigner = this.verifier.getSigner();
    this.calculator = new RewardCalculator(() => this.settings);
    this.resolver = new RandomRewardResolver({
      oracle: deps.oracle,
      merit: deps.merit,
      treasury: deps.treasury,
      refunds: deps.refunds,
      calculator: this.calculator,
    });
    this.badges = new BadgeLedger(this.store, deps.badgeMinter ?? null);
  }

  // -----------------------------------------------------------------------
  // Boosts
  // -----------------------------------------------------------------------

  /**
   * Free daily boost, authorized by the frontend signer.
   */
  boost(user: string, totem: string, timestamp: number, signature: string): Promise<FreeBoostResult> {
    return this.exclusive(async () => {
      this.assertNotPaused();
      const u = toAddress(user, 'user');
      const t = toAddress(totem, 'totem');
      if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
        throw new BoostError('InvalidParameter', `timestamp must be a unix timestamp, got ${timestamp}`);
      }
      await this.assertHolding(u, t);

      const now = this.clock();
      const check = this.verifier.check(u, t, timestamp, signature, now);

      const record = this.store.get(u, t);
      const cooldown = this.settings.freeBoostCooldown;
      if (record.lastFreeBoostAt !== 0 && now - record.lastFreeBoostAt < cooldown) {
        throw new BoostError(
          'NotEnoughTimePassedForFreeBoost',
          `Next free boost on ${t} available at ${record.lastFreeBoostAt + cooldown}`,
        );
      }

      const streak = advanceStreak(record, now, false, this.streakPolicy());
      const boostPeriodPct = await this.currentBoostPeriodPct();
      const reward = this.calculator.freeReward(record.streakLength, boostPeriodPct);
      await this.deps.merit.creditMerit(t, reward);

      record.lastFreeBoostAt = now;
      this.verifier.consume(check, now);
      this.store.save(u, t, record);

      console.log(`[boost] ${u} boosted ${t}: streak ${streak.streakLength}, +${reward} merit`);
      this.emitter.emitEvent('boost:free', {
        type: 'boost:free',
        payload: {
          user: u,
          totem: t,
          reward,
          streakLength: streak.streakLength,
          graceDayGranted: streak.graceDayGranted,
          graceDaysConsumed: streak.graceDaysConsumed,
          milestonesReached: streak.milestonesReached,
          timestamp: now,
        },
      });
      if (streak.reset) this.emitReset(u, t, now);

      return { user: u, totem: t, reward, streak, boostPeriodPct, boostedAt: now };
    });
  }

  /**
   * Paid boost. The streak advances now; the reward is credited when the
   * oracle calls fulfillRandomWords().
   */
  premiumBoost(user: string, totem: string, payment: bigint): Promise<PremiumBoostRequest> {
    return this.exclusive(async () => {
      this.assertNotPaused();
      return this.runPremium(toAddress(user, 'user'), toAddress(totem, 'totem'), payment);
    });
  }

  /**
   * Paid boost backed by a transfer to the operator. The payer and the
   * amount are read from the transaction; each transaction pays for one
   * boost.
   */
  premiumBoostWithPayment(totem: string, txHash: string): Promise<PremiumBoostRequest> {
    return this.exclusive(async () => {
      this.assertNotPaused();
      const t = toAddress(totem, 'totem');
      if (!TX_HASH.test(txHash)) {
        throw new BoostError('InvalidParameter', `txHash must be a 0x-prefixed 32-byte hex string, got ${txHash}`);
      }
      const key = txHash.toLowerCase();
      if (this.consumedPayments.has(key)) {
        throw new BoostError('PaymentAlreadyUsed', `Transaction ${txHash} already paid for a premium boost`);
      }

      const payment = await this.deps.payments.verify(txHash);
      if (!payment.valid) {
        throw new BoostError('PaymentNotVerified', `Transaction ${txHash}: ${payment.reason}`);
      }

      return this.runPremium(toAddress(payment.from, 'payer'), t, payment.value, () => {
        this.consumedPayments.add(key);
      });
    });
  }

  /**
   * Randomness callback. Only the oracle may call it. It stays open while
   * the system is paused so that paid requests are never stranded.
   */
  fulfillRandomWords(caller: string, requestId: bigint, randomWords: readonly bigint[]): Promise<PremiumFulfillment> {
    return this.exclusive(async () => {
      this.deps.access.requireOracle(caller);

      const result = await this.resolver.fulfill(requestId, randomWords);

      const record = this.store.get(result.user, result.totem);
      record.pendingRequestIds = record.pendingRequestIds.filter((id) => id !== requestId);
      this.store.save(result.user, result.totem, record);

      const now = this.clock();
      console.log(
        `[premium] request ${requestId} fulfilled: ${result.tierPoints}-point tier, +${result.reward} merit to ${result.totem}`,
      );
      this.emitter.emitEvent('boost:premium-fulfilled', {
        type: 'boost:premium-fulfilled',
        payload: {
          requestId: requestId.toString(),
          user: result.user,
          totem: result.totem,
          tierPoints: result.tierPoints,
          reward: result.reward,
          timestamp: now,
        },
      });

      return result;
    });
  }

  // -----------------------------------------------------------------------
  // Badges
  // -----------------------------------------------------------------------

  mintBadge(user: string, milestone: number): Promise<void> {
    return this.exclusive(async () => {
      this.assertNotPaused();
      const u = toAddress(user, 'user');
      requirePositiveInteger(milestone, 'milestone');

      const totem = await this.badges.mintBadge(u, milestone);

      const now = this.clock();
      console.log(`[badges] ${u} minted the ${milestone}-day badge (earned on ${totem})`);
      this.emitter.emitEvent('badge:minted', {
        type: 'badge:minted',
        payload: { user: u, totem, milestone, timestamp: now },
      });
    });
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  getStreakInfo(user: string, totem: string): StreakInfo {
    const u = toAddress(user, 'user');
    const t = toAddress(totem, 'totem');
    const record = this.store.get(u, t);
    return {
      user: u,
      totem: t,
      state: record.streakLength === 0 ? 'Uninitialized' : 'ActiveStreak',
      streakLength: record.streakLength,
      streakAnchorAt: record.streakAnchorAt,
      graceDaysEarned: record.graceDaysEarned,
      graceDaysUsed: record.graceDaysUsed,
      graceDaysAvailable: graceDaysAvailable(record),
      multiplierPct: record.streakLength === 0 ? 100 : this.calculator.multiplierPct(record.streakLength),
      nextFreeBoostAt: record.lastFreeBoostAt === 0 ? 0 : record.lastFreeBoostAt + this.settings.freeBoostCooldown,
    };
  }

  getBoostData(user: string, totem: string): BoostData {
    const u = toAddress(user, 'user');
    const t = toAddress(totem, 'totem');
    return recordToJson(u, t, this.store.get(u, t));
  }

  getAvailableBadges(user: string, milestone: number): number {
    return this.badges.available(toAddress(user, 'user'), milestone);
  }

  getAllAvailableBadges(user: string): Map<number, number> {
    return this.badges.availableByMilestone(toAddress(user, 'user'));
  }

  getPremiumBoostConfig(): PremiumBoostConfig {
    return { price: this.settings.premiumBoostPrice, tiers: this.calculator.getTiers() };
  }

  getFreeBoostCooldown(): number {
    return this.settings.freeBoostCooldown;
  }

  getPendingPremiumRequests(): PendingPremiumRequest[] {
    return this.resolver.listPending();
  }

  isPaused(): boolean {
    return this.paused;
  }

  getSettings(): Readonly<BoostSettings> {
    return { ...this.settings };
  }

  // -----------------------------------------------------------------------
  // Admin (manager only)
  // -----------------------------------------------------------------------

  setBoostRewardPoints(caller: string, points: number): Promise<void> {
    return this.admin(caller, 'boostRewardPoints', String(points), () => {
      requirePositiveInteger(points, 'boostRewardPoints');
      this.settings.boostRewardPoints = points;
    });
  }

  setPremiumBoostPrice(caller: string, price: bigint): Promise<void> {
    return this.admin(caller, 'premiumBoostPrice', price.toString(), () => {
      if (price <= 0n) throw new BoostError('InvalidParameter', 'premiumBoostPrice must be positive');
      this.settings.premiumBoostPrice = price;
    });
  }

  setFreeBoostCooldown(caller: string, seconds: number): Promise<void> {
    return this.admin(caller, 'freeBoostCooldown', String(seconds), () => {
      requirePositiveInteger(seconds, 'freeBoostCooldown');
      this.settings.freeBoostCooldown = seconds;
    });
  }

  setFrontendSigner(caller: string, signer: string): Promise<void> {
    return this.admin(caller, 'frontendSigner', signer, () => {
      const address = toAddress(signer, 'frontendSigner');
      if (address === ethers.ZeroAddress) {
        throw new BoostError('InvalidAddress', 'frontendSigner cannot be the zero address');
      }
      this.verifier.setSigner(address);
      this.settings.frontendSigner = address;
    });
  }

  setBadgeNFT(caller: string, minter: BadgeMinter | null, label = minter ? 'set' : 'unset'): Promise<void> {
    return this.admin(caller, 'badgeNFT', label, () => {
      this.badges.setMinter(minter);
    });
  }

  pause(caller: string): Promise<void> {
    return this.admin(caller, 'paused', 'true', () => {
      this.paused = true;
    });
  }

  unpause(caller: string): Promise<void> {
    return this.admin(caller, 'paused', 'false', () => {
      this.paused = false;
    });
  }

  // -----------------------------------------------------------------------
  // State migration
  // -----------------------------------------------------------------------

  exportState(): BoostStateSnapshot {
    return {
      version: STATE_VERSION,
      paused: this.paused,
      settings: {
        boostRewardPoints: this.settings.boostRewardPoints,
        premiumBoostPrice: this.settings.premiumBoostPrice.toString(),
        freeBoostCooldown: this.settings.freeBoostCooldown,
        frontendSigner: this.settings.frontendSigner,
        badgeMinterSet: this.badges.hasMinter(),
      },
      records: this.store.all().map(({ user, totem, record }) => recordToJson(user, totem, record)),
      pending: this.resolver.listPending().map(pendingToJson),
      consumedSignatures: this.verifier.exportConsumed(),
      consumedPayments: [...this.consumedPayments],
    };
  }

  /**
   * Replace all engine state with a snapshot from parseStateSnapshot().
   * The badge minter is a live collaborator and is left as configured.
   */
  importState(snapshot: BoostStateSnapshot): Promise<void> {
    return this.exclusive(async () => {
      // Convert first; nothing after the store is cleared may throw.
      const signer = toAddress(snapshot.settings.frontendSigner, 'frontendSigner');
      const records = snapshot.records.map((data) => ({
        user: toAddress(data.user, 'user'),
        totem: toAddress(data.totem, 'totem'),
        record: recordFromJson(data),
      }));
      const pending = snapshot.pending.map((request) => ({
        ...pendingFromJson(request),
        user: toAddress(request.user, 'user'),
        totem: toAddress(request.totem, 'totem'),
      }));
      const price = BigInt(snapshot.settings.premiumBoostPrice);

      this.store.clear();
      for (const { user, totem, record } of records) {
        this.store.save(user, totem, record);
      }
      this.resolver.restorePending(pending);
      this.verifier.importConsumed(snapshot.consumedSignatures);
      this.verifier.setSigner(signer);
      this.consumedPayments = new Set(snapshot.consumedPayments.map((hash) => hash.toLowerCase()));

      this.settings.boostRewardPoints = snapshot.settings.boostRewardPoints;
      this.settings.premiumBoostPrice = price;
      this.settings.freeBoostCooldown = snapshot.settings.freeBoostCooldown;
      this.settings.frontendSigner = signer;
      this.paused = snapshot.paused;

      console.log(
        `[state] Restored ${snapshot.records.length} records, ${snapshot.pending.length} pending premium requests`,
      );
    });
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private async runPremium(
    u: string,
    t: string,
    payment: bigint,
    onCommit?: () => void,
  ): Promise<PremiumBoostRequest> {
    if (payment < 0n) {
      throw new BoostError('InvalidParameter', 'payment cannot be negative');
    }
    await this.assertHolding(u, t);

    const now = this.clock();
    const record = this.store.get(u, t);
    const streak = advanceStreak(record, now, true, this.streakPolicy());

    const { requestId, refunded } = await this.resolver.request({
      user: u,
      totem: t,
      payment,
      price: this.settings.premiumBoostPrice,
      snapshot: {
        streakLength: record.streakLength,
        graceDaysEarned: record.graceDaysEarned,
        graceDaysUsed: record.graceDaysUsed,
      },
      now,
    });

    record.lastPremiumBoostAt = now;
    record.pendingRequestIds.push(requestId);
    onCommit?.();
    this.store.save(u, t, record);

    console.log(`[premium] ${u} requested premium boost on ${t} (request ${requestId})`);
    this.emitter.emitEvent('boost:premium-requested', {
      type: 'boost:premium-requested',
      payload: {
        requestId: requestId.toString(),
        user: u,
        totem: t,
        streakLength: streak.streakLength,
        graceDayGranted: streak.graceDayGranted,
        refundedWei: refunded.toString(),
        timestamp: now,
      },
    });
    if (streak.reset) this.emitReset(u, t, now);

    return { requestId, user: u, totem: t, streak, refunded, requestedAt: now };
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private admin(caller: string, setting: string, value: string, apply: () => void): Promise<void> {
    return this.exclusive(async () => {
      this.deps.access.requireManager(caller);
      apply();
      console.log(`[boost] ${setting} set to ${value} by ${caller}`);
      this.emitter.emitEvent('settings:updated', {
        type: 'settings:updated',
        payload: { setting, value, updatedBy: caller, timestamp: this.clock() },
      });
    });
  }

  private assertNotPaused(): void {
    if (this.paused) throw new BoostError('Paused', 'Boost system is paused');
  }

  private async assertHolding(user: string, totem: string): Promise<void> {
    const { holdings } = this.deps;
    const [balance, isNft] = await Promise.all([
      holdings.balanceOf(totem, user),
      holdings.isNftTotem(totem),
    ]);
    const required = isNft ? 1n : this.settings.minTotemTokenBalance;
    if (balance < required) {
      throw new BoostError('NotEnoughTokens', `${user} holds ${balance} of ${totem}, needs ${required}`);
    }
  }

  private async currentBoostPeriodPct(): Promise<number | null> {
    const { merit } = this.deps;
    return (await merit.isBoostPeriod()) ? merit.boostMultiplierPct() : null;
  }

  private streakPolicy(): StreakPolicy {
    return {
      cooldownSeconds: this.settings.freeBoostCooldown,
      graceDayInterval: this.settings.graceDayInterval,
      milestones: this.settings.milestones,
      milestoneRepeatInterval: this.settings.milestoneRepeatInterval,
    };
  }

  private emitReset(user: string, totem: string, now: number): void {
    console.log(`[boost] ${user} broke their streak on ${totem}`);
    this.emitter.emitEvent('streak:reset', {
      type: 'streak:reset',
      payload: { user, totem, timestamp: now },
    });
  }
}

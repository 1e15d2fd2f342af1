/**
 * Totem Boost — Simulated Collaborators
 *
 * In-memory stand-ins for the merit ledger, treasury, badge NFT, totem
 * balances and randomness oracle. The server runs on these when no chain
 * is configured; tests drive them directly.
 */

import { randomBytes } from 'node:crypto';
import { ethers } from 'ethers';
import type {
  BadgeMinter,
  MeritManager,
  PaymentReceipts,
  PaymentVerificationResult,
  RandomnessOracle,
  Refunds,
  TotemHoldings,
  Treasury,
} from './types.js';

// ---------------------------------------------------------------------------
// Merit ledger
// ---------------------------------------------------------------------------

export interface MeritCredit {
  totem: string;
  amount: number;
}

export class SimulatedMeritManager implements MeritManager {
  /** null = every totem counts as registered */
  private readonly registered: Set<string> | null;
  private readonly balances = new Map<string, number>();
  readonly credits: MeritCredit[] = [];
  private boostPeriod = false;
  private multiplierPct = 100;

  constructor(registeredTotems: string[] | null = null) {
    this.registered = registeredTotems ? new Set(registeredTotems.map((t) => t.toLowerCase())) : null;
  }

  registerTotem(totem: string): void {
    this.registered?.add(totem.toLowerCase());
  }

  async creditMerit(totem: string, amount: number): Promise<void> {
    const key = totem.toLowerCase();
    if (this.registered && !this.registered.has(key)) {
      throw new Error(`Totem ${totem} is not registered with the merit manager`);
    }
    this.balances.set(key, (this.balances.get(key) ?? 0) + amount);
    this.credits.push({ totem, amount });
  }

  meritOf(totem: string): number {
    return this.balances.get(totem.toLowerCase()) ?? 0;
  }

  setBoostPeriod(active: boolean, multiplierPct = this.multiplierPct): void {
    this.boostPeriod = active;
    this.multiplierPct = multiplierPct;
  }

  async isBoostPeriod(): Promise<boolean> {
    return this.boostPeriod;
  }

  async boostMultiplierPct(): Promise<number> {
    return this.multiplierPct;
  }
}

// ---------------------------------------------------------------------------
// Value transfers
// ---------------------------------------------------------------------------

export class SimulatedTreasury implements Treasury {
  readonly deposits: bigint[] = [];

  async receive(amount: bigint): Promise<void> {
    this.deposits.push(amount);
  }

  totalReceived(): bigint {
    return this.deposits.reduce((sum, amount) => sum + amount, 0n);
  }
}

export class SimulatedRefunds implements Refunds {
  readonly refunds: Array<{ to: string; amount: bigint }> = [];

  async refund(to: string, amount: bigint): Promise<void> {
    this.refunds.push({ to, amount });
  }

  refundedTo(address: string): bigint {
    const needle = address.toLowerCase();
    return this.refunds
      .filter((r) => r.to.toLowerCase() === needle)
      .reduce((sum, r) => sum + r.amount, 0n);
  }
}

/**
 * Stand-in for the chain's transaction receipts. A payment exists once it
 * has been recorded here.
 */
export class SimulatedPaymentReceipts implements PaymentReceipts {
  private readonly payments = new Map<string, { from: string; value: bigint }>();

  record(txHash: string, from: string, value: bigint): void {
    this.payments.set(txHash.toLowerCase(), { from, value });
  }

  /** Record a transfer under a fresh transaction hash and return the hash. */
  simulate(from: string, value: bigint): string {
    const txHash = ethers.hexlify(randomBytes(32));
    this.record(txHash, from, value);
    return txHash;
  }

  async verify(txHash: string): Promise<PaymentVerificationResult> {
    const payment = this.payments.get(txHash.toLowerCase());
    if (!payment) return { valid: false, reason: 'Transaction not found' };
    return { valid: true, txHash, from: payment.from, value: payment.value };
  }
}

// ---------------------------------------------------------------------------
// Badge NFT
// ---------------------------------------------------------------------------

export class SimulatedBadgeMinter implements BadgeMinter {
  readonly minted: Array<{ user: string; milestoneId: number }> = [];

  async mint(user: string, milestoneId: number): Promise<void> {
    this.minted.push({ user, milestoneId });
  }
}

// ---------------------------------------------------------------------------
// Totem holdings
// ---------------------------------------------------------------------------

export class SimulatedTotemHoldings implements TotemHoldings {
  private readonly balances = new Map<string, bigint>();
  private readonly nftTotems = new Set<string>();
  /** Balance reported for pairs never set explicitly */
  private readonly defaultBalance: bigint;

  constructor(defaultBalance = 0n) {
    this.defaultBalance = defaultBalance;
  }

  setBalance(totem: string, user: string, amount: bigint): void {
    this.balances.set(`${totem.toLowerCase()}:${user.toLowerCase()}`, amount);
  }

  markNftTotem(totem: string): void {
    this.nftTotems.add(totem.toLowerCase());
  }

  async balanceOf(totem: string, user: string): Promise<bigint> {
    return this.balances.get(`${totem.toLowerCase()}:${user.toLowerCase()}`) ?? this.defaultBalance;
  }

  async isNftTotem(totem: string): Promise<boolean> {
    return this.nftTotems.has(totem.toLowerCase());
  }
}

// ---------------------------------------------------------------------------
// Randomness oracle
// ---------------------------------------------------------------------------

export type FulfillmentHandler = (
  oracle: string,
  requestId: bigint,
  randomWords: bigint[],
) => Promise<unknown>;

export function randomWord(): bigint {
  return BigInt(ethers.hexlify(randomBytes(32)));
}

/**
 * Queues requests and answers them when told to. Fulfillment never happens
 * inside requestRandomWords(), matching the asynchrony of a real oracle.
 */
export class SimulatedRandomnessOracle implements RandomnessOracle {
  readonly address: string;
  private readonly autoFulfillMs: number;
  private nextRequestId = 1n;
  private readonly queue = new Map<bigint, number>();
  private handler: FulfillmentHandler | null = null;

  /**
   * @param autoFulfillMs - answer each request with fresh random words after
   *   this delay; 0 leaves requests queued until fulfill() is called
   */
  constructor(address: string, autoFulfillMs = 0) {
    this.address = address;
    this.autoFulfillMs = autoFulfillMs;
  }

  onFulfill(handler: FulfillmentHandler): void {
    this.handler = handler;
  }

  async requestRandomWords(numWords: number): Promise<bigint> {
    const requestId = this.nextRequestId++;
    this.queue.set(requestId, numWords);
    if (this.autoFulfillMs > 0) {
      setTimeout(() => {
        this.fulfill(requestId).catch((err: unknown) => {
          console.error(
            `[oracle] Fulfillment of request ${requestId} failed:`,
            err instanceof Error ? err.message : err,
          );
        });
      }, this.autoFulfillMs);
    }
    return requestId;
  }

  /** Re-queue a request issued before a restart; new ids continue after it. */
  restoreRequest(requestId: bigint, numWords = 1): void {
    this.queue.set(requestId, numWords);
    if (requestId >= this.nextRequestId) this.nextRequestId = requestId + 1n;
  }

  pendingRequestIds(): bigint[] {
    return [...this.queue.keys()];
  }

  /** Deliver `words`, or fresh random words, for one queued request. */
  async fulfill(requestId: bigint, words?: bigint[]): Promise<void> {
    const numWords = this.queue.get(requestId);
    if (numWords === undefined) {
      throw new Error(`Randomness request ${requestId} is not queued`);
    }
    if (!this.handler) {
      throw new Error('No fulfillment handler registered with the oracle');
    }
    const delivered = words ?? Array.from({ length: numWords }, () => randomWord());
    await this.handler(this.address, requestId, delivered);
    this.queue.delete(requestId);
  }

  async fulfillAll(): Promise<number> {
    const ids = this.pendingRequestIds();
    for (const id of ids) {
      await this.fulfill(id);
    }
    return ids.length;
  }
}

/**
 * Totem Boost — Contract-Backed Collaborators
 *
 * ethers.js adapters for the merit manager, treasury, badge NFT, totem
 * tokens and the randomness coordinator. Writes go through the operator
 * signer and wait for one confirmation before resolving, so a reverted
 * transaction rejects the boost call that issued it.
 */

import { ethers } from 'ethers';
import { getProvider, getSigner } from './client.js';
import type {
  BadgeMinter,
  MeritManager,
  PaymentReceipts,
  PaymentVerificationResult,
  RandomnessOracle,
  Refunds,
  TotemHoldings,
  Treasury,
} from '../collaborators/types.js';
import type { FulfillmentHandler } from '../collaborators/simulated.js';

const MERIT_MANAGER_ABI = [
  'function creditMerit(address totem, uint256 amount)',
  'function isBoostPeriod() view returns (bool)',
  'function boostMultiplier() view returns (uint256)',
];

const BADGE_NFT_ABI = [
  'function mint(address to, uint256 milestoneId)',
];

const TOTEM_TOKEN_ABI = [
  'function balanceOf(address owner) view returns (uint256)',
];

const RANDOMNESS_COORDINATOR_ABI = [
  'function requestRandomWords(uint32 numWords) returns (uint256 requestId)',
  'event RandomWordsRequested(uint256 indexed requestId, uint32 numWords)',
  'event RandomWordsFulfilled(uint256 indexed requestId, uint256[] randomWords)',
];

async function send(method: ethers.BaseContractMethod, ...args: unknown[]): Promise<ethers.TransactionReceipt | null> {
  const tx: ethers.ContractTransactionResponse = await method(...args);
  return tx.wait();
}

async function sendValue(to: string, amount: bigint): Promise<void> {
  const tx = await getSigner().sendTransaction({ to, value: amount });
  await tx.wait();
}

// ---------------------------------------------------------------------------
// Merit manager
// ---------------------------------------------------------------------------

export class ContractMeritManager implements MeritManager {
  private readonly reader: ethers.Contract;
  private readonly writer: ethers.Contract;

  constructor(address: string) {
    this.reader = new ethers.Contract(address, MERIT_MANAGER_ABI, getProvider());
    this.writer = new ethers.Contract(address, MERIT_MANAGER_ABI, getSigner());
  }

  async creditMerit(totem: string, amount: number): Promise<void> {
    await send(this.writer.getFunction('creditMerit'), totem, amount);
  }

  async isBoostPeriod(): Promise<boolean> {
    return Boolean(await this.reader.getFunction('isBoostPeriod')());
  }

  async boostMultiplierPct(): Promise<number> {
    return Number(await this.reader.getFunction('boostMultiplier')());
  }
}

// ---------------------------------------------------------------------------
// Value transfers
// ---------------------------------------------------------------------------

export class ContractTreasury implements Treasury {
  private readonly address: string;

  constructor(address: string) {
    this.address = address;
  }

  async receive(amount: bigint): Promise<void> {
    await sendValue(this.address, amount);
  }
}

export class SignerRefunds implements Refunds {
  async refund(to: string, amount: bigint): Promise<void> {
    await sendValue(to, amount);
  }
}

/**
 * Premium boosts are paid with a plain transfer to the operator wallet.
 * The transaction, not the caller, supplies the payer and the amount.
 */
export class ChainPaymentReceipts implements PaymentReceipts {
  async verify(txHash: string): Promise<PaymentVerificationResult> {
    const provider = getProvider();

    let tx: ethers.TransactionResponse | null;
    let receipt: ethers.TransactionReceipt | null;
    try {
      [tx, receipt] = await Promise.all([
        provider.getTransaction(txHash),
        provider.getTransactionReceipt(txHash),
      ]);
    } catch {
      return { valid: false, reason: 'Failed to fetch transaction' };
    }

    if (!tx || !receipt) {
      return { valid: false, reason: 'Transaction not found or not yet mined' };
    }
    if (receipt.status !== 1) {
      return { valid: false, reason: 'Transaction reverted' };
    }

    const operator = getSigner().address;
    if (tx.to?.toLowerCase() !== operator.toLowerCase()) {
      return { valid: false, reason: `Transaction was not sent to the operator ${operator}` };
    }

    return { valid: true, txHash: receipt.hash, from: ethers.getAddress(tx.from), value: tx.value };
  }
}

// ---------------------------------------------------------------------------
// Badge NFT
// ---------------------------------------------------------------------------

export class ContractBadgeMinter implements BadgeMinter {
  private readonly contract: ethers.Contract;

  constructor(address: string) {
    this.contract = new ethers.Contract(address, BADGE_NFT_ABI, getSigner());
  }

  async mint(user: string, milestoneId: number): Promise<void> {
    await send(this.contract.getFunction('mint'), user, milestoneId);
  }
}

// ---------------------------------------------------------------------------
// Totem holdings
// ---------------------------------------------------------------------------

/**
 * Reads ERC-20 or ERC-721 balances straight from each totem's token
 * contract. Which totems are NFT collections comes from configuration.
 */
export class ContractTotemHoldings implements TotemHoldings {
  private readonly nftTotems: Set<string>;
  private readonly tokens = new Map<string, ethers.Contract>();

  constructor(nftTotems: string[]) {
    this.nftTotems = new Set(nftTotems.map((t) => t.toLowerCase()));
  }

  async balanceOf(totem: string, user: string): Promise<bigint> {
    const key = totem.toLowerCase();
    let token = this.tokens.get(key);
    if (!token) {
      token = new ethers.Contract(totem, TOTEM_TOKEN_ABI, getProvider());
      this.tokens.set(key, token);
    }
    return BigInt(await token.getFunction('balanceOf')(user));
  }

  async isNftTotem(totem: string): Promise<boolean> {
    return this.nftTotems.has(totem.toLowerCase());
  }
}

// ---------------------------------------------------------------------------
// Randomness coordinator
// ---------------------------------------------------------------------------

/**
 * Requests randomness from the coordinator contract and forwards its
 * RandomWordsFulfilled events to the registered handler.
 */
export class ContractRandomnessOracle implements RandomnessOracle {
  readonly address: string;
  private readonly contract: ethers.Contract;

  constructor(address: string) {
    this.address = ethers.getAddress(address);
    this.contract = new ethers.Contract(address, RANDOMNESS_COORDINATOR_ABI, getSigner());
  }

  async requestRandomWords(numWords: number): Promise<bigint> {
    const receipt = await send(this.contract.getFunction('requestRandomWords'), numWords);
    if (!receipt) throw new Error('Randomness request transaction was not mined');

    for (const log of receipt.logs) {
      const parsed = this.contract.interface.parseLog({ topics: [...log.topics], data: log.data });
      if (parsed?.name === 'RandomWordsRequested') {
        return BigInt(parsed.args.getValue('requestId'));
      }
    }
    throw new Error(`No RandomWordsRequested event in transaction ${receipt.hash}`);
  }

  async onFulfill(handler: FulfillmentHandler): Promise<void> {
    await this.contract.on('RandomWordsFulfilled', (requestId: bigint, randomWords: bigint[]) => {
      handler(this.address, BigInt(requestId), randomWords.map((w) => BigInt(w))).catch((err: unknown) => {
        console.error(
          `[chain] Fulfillment of request ${requestId} failed:`,
          err instanceof Error ? err.message : err,
        );
      });
    });
  }
}

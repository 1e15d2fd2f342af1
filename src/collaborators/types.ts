/**
 * Totem Boost — External Collaborators
 *
 * Services the boost engine calls but does not own. Each has a simulated
 * implementation (simulated.ts) and an on-chain one (../chain/contracts.ts).
 */

/** Merit ledger and period accounting. */
export interface MeritManager {
  /** Rejects if the totem is not registered. */
  creditMerit(totem: string, amount: number): Promise<void>;
  isBoostPeriod(): Promise<boolean>;
  /** Percentage applied to rewards while a boost period is active, e.g. 150 */
  boostMultiplierPct(): Promise<number>;
}

export interface Treasury {
  receive(amount: bigint): Promise<void>;
}

/** Returns overpaid premium boost value to the payer. */
export interface Refunds {
  refund(to: string, amount: bigint): Promise<void>;
}

export interface BadgeMinter {
  mint(user: string, milestoneId: number): Promise<void>;
}

export interface TotemHoldings {
  balanceOf(totem: string, user: string): Promise<bigint>;
  isNftTotem(totem: string): Promise<boolean>;
}

export interface RandomnessOracle {
  /** Returns the request id the fulfillment callback will carry. */
  requestRandomWords(numWords: number): Promise<bigint>;
}

export interface VerifiedPayment {
  valid: true;
  txHash: string;
  /** Sender of the transfer; the premium boost is credited to this address */
  from: string;
  value: bigint;
}

export interface PaymentVerificationError {
  valid: false;
  reason: string;
}

export type PaymentVerificationResult = VerifiedPayment | PaymentVerificationError;

/** Confirms that a premium boost payment reached the operator wallet. */
export interface PaymentReceipts {
  verify(txHash: string): Promise<PaymentVerificationResult>;
}

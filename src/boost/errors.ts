/**
 * Totem Boost — Error Taxonomy
 *
 * Every rejected call throws a BoostError. Failures are all-or-nothing:
 * nothing a failed call touched is committed.
 */

export type BoostErrorCategory =
  | 'AuthFailure'
  | 'EligibilityFailure'
  | 'RateLimitFailure'
  | 'PaymentFailure'
  | 'MilestoneFailure'
  | 'SystemFailure'
  | 'AccessFailure'
  | 'ValidationFailure'
  | 'OracleFailure';

const CODE_CATEGORIES = {
  InvalidSignature: 'AuthFailure',
  SignatureExpired: 'AuthFailure',
  SignatureAlreadyUsed: 'AuthFailure',
  NotEnoughTokens: 'EligibilityFailure',
  NotEnoughTimePassedForFreeBoost: 'RateLimitFailure',
  InsufficientPayment: 'PaymentFailure',
  PaymentNotVerified: 'PaymentFailure',
  PaymentAlreadyUsed: 'PaymentFailure',
  MilestoneNotAchieved: 'MilestoneFailure',
  Paused: 'SystemFailure',
  BadgeMinterNotSet: 'SystemFailure',
  NotManager: 'AccessFailure',
  NotOracle: 'AccessFailure',
  InvalidAddress: 'ValidationFailure',
  InvalidParameter: 'ValidationFailure',
  UnsupportedStateVersion: 'ValidationFailure',
  MalformedState: 'ValidationFailure',
  UnknownRequest: 'OracleFailure',
  MissingRandomWords: 'OracleFailure',
} as const satisfies Record<string, BoostErrorCategory>;

export type BoostErrorCode = keyof typeof CODE_CATEGORIES;

export class BoostError extends Error {
  readonly code: BoostErrorCode;
  readonly category: BoostErrorCategory;

  constructor(code: BoostErrorCode, message?: string) {
    super(message ?? code);
    this.name = 'BoostError';
    this.code = code;
    this.category = CODE_CATEGORIES[code];
  }
}

export function isBoostError(err: unknown, code?: BoostErrorCode): err is BoostError {
  return err instanceof BoostError && (code === undefined || err.code === code);
}

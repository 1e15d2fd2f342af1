/**
 * Boost engine barrel exports.
 */
export * from './types.js';
export { BoostError, isBoostError } from './errors.js';
export type { BoostErrorCode, BoostErrorCategory } from './errors.js';
export { AccessPolicy } from './access.js';
export { SignatureVerifier, boostMessageDigest, signBoostRequest } from './signature.js';
export { advanceStreak, isMilestone, graceDaysAvailable } from './streak.js';
export { RewardCalculator } from './rewards.js';
export type { RewardPolicy } from './rewards.js';
export { RandomRewardResolver } from './random-rewards.js';
export { BadgeLedger } from './badges.js';
export { BoostRecordStore } from './store.js';
export { STATE_VERSION, parseStateSnapshot } from './state.js';
export type { BoostStateSnapshot } from './state.js';
export { BoostSystem, toAddress } from './system.js';
export type { BoostSystemDeps } from './system.js';

/**
 * Totem Boost — State Snapshots
 *
 * JSON-safe, versioned export of everything the engine owns. Loading a
 * snapshot goes through parseStateSnapshot(), which is the single place a
 * future layout change gets migrated.
 */

import { ethers } from 'ethers';
import { BoostError } from './errors.js';
import type { BoostData, BoostRecord, PendingPremiumRequest } from './types.js';

export const STATE_VERSION = 1;

export interface PendingRequestJson {
  requestId: string;
  user: string;
  totem: string;
  snapshot: {
    streakLength: number;
    graceDaysEarned: number;
    graceDaysUsed: number;
  };
  requestedAt: number;
}

export interface SettingsJson {
  boostRewardPoints: number;
  premiumBoostPrice: string;
  freeBoostCooldown: number;
  frontendSigner: string;
  badgeMinterSet: boolean;
}

export interface BoostStateSnapshot {
  version: typeof STATE_VERSION;
  paused: boolean;
  settings: SettingsJson;
  records: BoostData[];
  pending: PendingRequestJson[];
  consumedSignatures: Array<[string, number]>;
  /** Transaction hashes already spent on premium boosts */
  consumedPayments: string[];
}

// ---------------------------------------------------------------------------
// Record <-> JSON
// ---------------------------------------------------------------------------

export function recordToJson(user: string, totem: string, record: BoostRecord): BoostData {
  const unmintedBadges: Record<string, number> = {};
  for (const [milestone, count] of record.unmintedBadges) {
    unmintedBadges[String(milestone)] = count;
  }
  return {
    user,
    totem,
    lastFreeBoostAt: record.lastFreeBoostAt,
    lastPremiumBoostAt: record.lastPremiumBoostAt,
    streakAnchorAt: record.streakAnchorAt,
    streakLength: record.streakLength,
    graceDaysEarned: record.graceDaysEarned,
    graceDaysUsed: record.graceDaysUsed,
    unmintedBadges,
    pendingRequestIds: record.pendingRequestIds.map(String),
  };
}

export function recordFromJson(data: BoostData): BoostRecord {
  return {
    lastFreeBoostAt: data.lastFreeBoostAt,
    lastPremiumBoostAt: data.lastPremiumBoostAt,
    streakAnchorAt: data.streakAnchorAt,
    streakLength: data.streakLength,
    graceDaysEarned: data.graceDaysEarned,
    graceDaysUsed: data.graceDaysUsed,
    unmintedBadges: new Map(
      Object.entries(data.unmintedBadges).map(([milestone, count]) => [Number(milestone), count]),
    ),
    pendingRequestIds: data.pendingRequestIds.map((id) => BigInt(id)),
  };
}

export function pendingToJson(request: PendingPremiumRequest): PendingRequestJson {
  return {
    requestId: request.requestId.toString(),
    user: request.user,
    totem: request.totem,
    snapshot: { ...request.snapshot },
    requestedAt: request.requestedAt,
  };
}

export function pendingFromJson(request: PendingRequestJson): PendingPremiumRequest {
  return {
    requestId: BigInt(request.requestId),
    user: request.user,
    totem: request.totem,
    snapshot: { ...request.snapshot },
    requestedAt: request.requestedAt,
  };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isDecimal(value: unknown): value is string {
  return typeof value === 'string' && /^\d+$/.test(value);
}

function isTxHash(value: unknown): value is string {
  return typeof value === 'string' && /^0x[0-9a-fA-F]{64}$/.test(value);
}

function malformed(path: string): BoostError {
  return new BoostError('MalformedState', `State snapshot field ${path} is invalid`);
}

function addressAt(value: unknown, path: string): string {
  if (typeof value !== 'string' || !ethers.isAddress(value)) throw malformed(path);
  return ethers.getAddress(value);
}

function parseRecord(raw: unknown, i: number): BoostData {
  const path = `records[${i}]`;
  if (!isObject(raw)) throw malformed(path);
  const { unmintedBadges, pendingRequestIds } = raw;
  const user = addressAt(raw.user, `${path}.user`);
  const totem = addressAt(raw.totem, `${path}.totem`);

  const counts = ['lastFreeBoostAt', 'lastPremiumBoostAt', 'streakAnchorAt', 'streakLength', 'graceDaysEarned', 'graceDaysUsed'] as const;
  const numbers: Record<(typeof counts)[number], number> = {
    lastFreeBoostAt: 0,
    lastPremiumBoostAt: 0,
    streakAnchorAt: 0,
    streakLength: 0,
    graceDaysEarned: 0,
    graceDaysUsed: 0,
  };
  for (const key of counts) {
    const value = raw[key];
    if (!isCount(value)) throw malformed(`${path}.${key}`);
    numbers[key] = value;
  }
  if (numbers.graceDaysUsed > numbers.graceDaysEarned) throw malformed(`${path}.graceDaysUsed`);

  if (!isObject(unmintedBadges)) throw malformed(`${path}.unmintedBadges`);
  const badges: Record<string, number> = {};
  for (const [milestone, count] of Object.entries(unmintedBadges)) {
    if (!/^\d+$/.test(milestone) || !isCount(count)) throw malformed(`${path}.unmintedBadges.${milestone}`);
    badges[milestone] = count;
  }

  if (!Array.isArray(pendingRequestIds) || !pendingRequestIds.every(isDecimal)) {
    throw malformed(`${path}.pendingRequestIds`);
  }

  return { user, totem, ...numbers, unmintedBadges: badges, pendingRequestIds: [...pendingRequestIds] };
}

function parsePending(raw: unknown, i: number): PendingRequestJson {
  const path = `pending[${i}]`;
  if (!isObject(raw)) throw malformed(path);
  const { requestId, snapshot, requestedAt } = raw;
  if (!isDecimal(requestId)) throw malformed(`${path}.requestId`);
  const user = addressAt(raw.user, `${path}.user`);
  const totem = addressAt(raw.totem, `${path}.totem`);
  if (!isCount(requestedAt)) throw malformed(`${path}.requestedAt`);
  if (!isObject(snapshot)) throw malformed(`${path}.snapshot`);
  const { streakLength, graceDaysEarned, graceDaysUsed } = snapshot;
  if (!isCount(streakLength) || !isCount(graceDaysEarned) || !isCount(graceDaysUsed)) {
    throw malformed(`${path}.snapshot`);
  }
  return {
    requestId,
    user,
    totem,
    snapshot: { streakLength, graceDaysEarned, graceDaysUsed },
    requestedAt,
  };
}

function parseSettings(raw: unknown): SettingsJson {
  if (!isObject(raw)) throw malformed('settings');
  const { boostRewardPoints, premiumBoostPrice, freeBoostCooldown, frontendSigner, badgeMinterSet } = raw;
  if (!isCount(boostRewardPoints)) throw malformed('settings.boostRewardPoints');
  if (!isDecimal(premiumBoostPrice)) throw malformed('settings.premiumBoostPrice');
  if (!isCount(freeBoostCooldown) || freeBoostCooldown === 0) throw malformed('settings.freeBoostCooldown');
  if (typeof badgeMinterSet !== 'boolean') throw malformed('settings.badgeMinterSet');
  return {
    boostRewardPoints,
    premiumBoostPrice,
    freeBoostCooldown,
    frontendSigner: addressAt(frontendSigner, 'settings.frontendSigner'),
    badgeMinterSet,
  };
}

/**
 * Validate an untrusted snapshot (e.g. parsed from the state file).
 */
export function parseStateSnapshot(raw: unknown): BoostStateSnapshot {
  if (!isObject(raw)) throw malformed('(root)');
  const { version, paused, settings, records, pending, consumedSignatures, consumedPayments = [] } = raw;
  if (version !== STATE_VERSION) {
    throw new BoostError(
      'UnsupportedStateVersion',
      `State snapshot version ${String(version)} is not supported (expected ${STATE_VERSION})`,
    );
  }
  if (typeof paused !== 'boolean') throw malformed('paused');
  if (!Array.isArray(records)) throw malformed('records');
  if (!Array.isArray(pending)) throw malformed('pending');
  if (!Array.isArray(consumedSignatures)) throw malformed('consumedSignatures');
  if (!Array.isArray(consumedPayments) || !consumedPayments.every(isTxHash)) {
    throw malformed('consumedPayments');
  }

  const consumed = consumedSignatures.map((entry: unknown, i: number): [string, number] => {
    if (!Array.isArray(entry) || entry.length !== 2) throw malformed(`consumedSignatures[${i}]`);
    const [digest, timestamp]: unknown[] = entry;
    if (typeof digest !== 'string' || !isCount(timestamp)) throw malformed(`consumedSignatures[${i}]`);
    return [digest, timestamp];
  });

  return {
    version: STATE_VERSION,
    paused,
    settings: parseSettings(settings),
    records: records.map(parseRecord),
    pending: pending.map(parsePending),
    consumedSignatures: consumed,
    consumedPayments: [...consumedPayments],
  };
}

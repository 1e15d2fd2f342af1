/**
 * Totem Boost — Configuration
 *
 * Reads the service configuration from environment variables (loaded from
 * .env by the server entry point). Unset variables fall back to the engine
 * defaults; malformed ones fail startup.
 */

import { ethers } from 'ethers';
import { DEFAULT_BOOST_SETTINGS } from './boost/types.js';
import type { BoostSettings } from './boost/types.js';

export interface ContractAddresses {
  meritManager: string | null;
  treasury: string | null;
  badgeNft: string | null;
  randomnessCoordinator: string | null;
}

export interface AppConfig {
  port: number;
  chainRpcUrl: string | null;
  operatorPrivateKey: string | null;
  contracts: ContractAddresses;
  nftTotems: string[];
  managers: string[];
  oracleAddress: string;
  stateFile: string | null;
  /** Simulated oracle answers requests after this delay; 0 waits for /api/oracle/fulfill */
  simulatedOracleDelayMs: number;
  /** Totem balance every user holds when holdings are simulated */
  simulatedTotemBalance: bigint;
  settings: Partial<BoostSettings>;
}

/** Identity the simulated oracle calls back with when ORACLE_ADDRESS is unset. */
export const SIMULATED_ORACLE_ADDRESS = '0x000000000000000000000000000000000000dEaD';

type Env = Record<string, string | undefined>;

function optional(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function address(env: Env, key: string): string | null {
  const value = optional(env, key);
  if (value === null) return null;
  if (!ethers.isAddress(value)) {
    throw new Error(`${key} is not a valid address: ${value}`);
  }
  return ethers.getAddress(value);
}

function addressList(env: Env, key: string): string[] {
  const value = optional(env, key);
  if (value === null) return [];
  return value.split(',').map((entry) => {
    const trimmed = entry.trim();
    if (!ethers.isAddress(trimmed)) {
      throw new Error(`${key} contains an invalid address: ${trimmed}`);
    }
    return ethers.getAddress(trimmed);
  });
}

function positiveInt(env: Env, key: string): number | null {
  const value = optional(env, key);
  if (value === null) return null;
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer, got ${value}`);
  }
  return parsed;
}

function nonNegativeInt(env: Env, key: string): number | null {
  const value = optional(env, key);
  if (value === null) return null;
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new Error(`${key} must be a non-negative integer, got ${value}`);
  }
  return parsed;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const settings: Partial<BoostSettings> = {};

  const rewardPoints = positiveInt(env, 'BOOST_REWARD_POINTS');
  if (rewardPoints !== null) settings.boostRewardPoints = rewardPoints;

  const cooldown = positiveInt(env, 'FREE_BOOST_COOLDOWN_SECONDS');
  if (cooldown !== null) settings.freeBoostCooldown = cooldown;

  const price = optional(env, 'PREMIUM_BOOST_PRICE_ETH');
  if (price !== null) {
    let wei: bigint;
    try {
      wei = ethers.parseEther(price);
    } catch {
      throw new Error(`PREMIUM_BOOST_PRICE_ETH is not an ether amount: ${price}`);
    }
    if (wei <= 0n) throw new Error('PREMIUM_BOOST_PRICE_ETH must be positive');
    settings.premiumBoostPrice = wei;
  }

  const minBalance = optional(env, 'MIN_TOTEM_TOKEN_BALANCE');
  if (minBalance !== null) {
    if (!/^\d+$/.test(minBalance)) {
      throw new Error(`MIN_TOTEM_TOKEN_BALANCE must be a whole number, got ${minBalance}`);
    }
    settings.minTotemTokenBalance = BigInt(minBalance);
  }

  const signer = address(env, 'FRONTEND_SIGNER_ADDRESS');
  if (signer !== null) settings.frontendSigner = signer;

  const rpcUrl = optional(env, 'CHAIN_RPC_URL');

  return {
    port: positiveInt(env, 'PORT') ?? 3001,
    chainRpcUrl: rpcUrl,
    operatorPrivateKey: optional(env, 'OPERATOR_PRIVATE_KEY'),
    contracts: {
      meritManager: address(env, 'MERIT_MANAGER_ADDRESS'),
      treasury: address(env, 'TREASURY_ADDRESS'),
      badgeNft: address(env, 'BADGE_NFT_ADDRESS'),
      randomnessCoordinator: address(env, 'RANDOMNESS_COORDINATOR_ADDRESS'),
    },
    nftTotems: addressList(env, 'NFT_TOTEM_ADDRESSES'),
    managers: addressList(env, 'MANAGER_ADDRESSES'),
    oracleAddress:
      address(env, 'ORACLE_ADDRESS') ?? address(env, 'RANDOMNESS_COORDINATOR_ADDRESS') ?? SIMULATED_ORACLE_ADDRESS,
    stateFile: optional(env, 'BOOST_STATE_FILE'),
    simulatedOracleDelayMs: nonNegativeInt(env, 'SIMULATED_ORACLE_DELAY_MS') ?? 2000,
    simulatedTotemBalance: BigInt(nonNegativeInt(env, 'SIMULATED_TOTEM_BALANCE') ?? 1),
    settings,
  };
}

export function describeSettings(settings: Partial<BoostSettings>): string {
  const merged = { ...DEFAULT_BOOST_SETTINGS, ...settings };
  return (
    `reward ${merged.boostRewardPoints} pts, ` +
    `cooldown ${merged.freeBoostCooldown}s, ` +
    `premium ${ethers.formatEther(merged.premiumBoostPrice)} ETH`
  );
}

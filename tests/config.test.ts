import { describe, it, expect } from 'vitest';
import { ethers } from 'ethers';
import { SIMULATED_ORACLE_ADDRESS, describeSettings, loadConfig } from '../src/config.js';
import { FRONTEND_KEY, MANAGER, ORACLE } from './helpers.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3001);
    expect(config.chainRpcUrl).toBeNull();
    expect(config.managers).toEqual([]);
    expect(config.oracleAddress).toBe(SIMULATED_ORACLE_ADDRESS);
    expect(config.stateFile).toBeNull();
    expect(config.simulatedOracleDelayMs).toBe(2000);
    expect(config.simulatedTotemBalance).toBe(1n);
    expect(config.settings).toEqual({});
  });

  it('reads engine settings', () => {
    const signer = new ethers.Wallet(FRONTEND_KEY).address;
    const config = loadConfig({
      BOOST_REWARD_POINTS: '150',
      FREE_BOOST_COOLDOWN_SECONDS: '3600',
      PREMIUM_BOOST_PRICE_ETH: '0.5',
      MIN_TOTEM_TOKEN_BALANCE: '10',
      FRONTEND_SIGNER_ADDRESS: signer.toLowerCase(),
    });

    expect(config.settings).toEqual({
      boostRewardPoints: 150,
      freeBoostCooldown: 3600,
      premiumBoostPrice: 500_000_000_000_000_000n,
      minTotemTokenBalance: 10n,
      frontendSigner: signer,
    });
  });

  it('parses address lists and the oracle identity', () => {
    const config = loadConfig({
      MANAGER_ADDRESSES: `${MANAGER}, ${ORACLE}`,
      RANDOMNESS_COORDINATOR_ADDRESS: ORACLE,
    });

    expect(config.managers).toEqual([MANAGER, ORACLE]);
    expect(config.contracts.randomnessCoordinator).toBe(ORACLE);
    expect(config.oracleAddress).toBe(ORACLE);
  });

  it('fails on malformed values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('PORT must be a positive integer, got abc');
    expect(() => loadConfig({ MANAGER_ADDRESSES: 'nope' })).toThrow('MANAGER_ADDRESSES contains an invalid address: nope');
    expect(() => loadConfig({ PREMIUM_BOOST_PRICE_ETH: '0' })).toThrow('PREMIUM_BOOST_PRICE_ETH must be positive');
    expect(() => loadConfig({ MIN_TOTEM_TOKEN_BALANCE: '-1' })).toThrow('MIN_TOTEM_TOKEN_BALANCE must be a whole number, got -1');
  });
});

describe('describeSettings', () => {
  it('summarizes the effective settings', () => {
    expect(describeSettings({})).toBe('reward 100 pts, cooldown 86400s, premium 0.001 ETH');
    expect(describeSettings({ boostRewardPoints: 250 })).toBe('reward 250 pts, cooldown 86400s, premium 0.001 ETH');
  });
});

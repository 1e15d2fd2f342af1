import { afterEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { signBoostRequest } from '../../src/boost/signature.js';
import { parseStateSnapshot } from '../../src/boost/state.js';
import type { BoostStateSnapshot } from '../../src/boost/state.js';
import { loadStateFile, saveStateFile } from '../../src/persistence/state-file.js';
import {
  DAY,
  MANAGER,
  ORACLE,
  T0,
  TOTEM_A,
  TOTEM_B,
  USER,
  createHarness,
  rejectionCode,
  thrownCode,
  txHash,
} from '../helpers.js';

async function populatedSnapshot() {
  const h = createHarness();
  await h.boostDays(0, 3);
  h.clock.now = T0 + 2 * DAY + 10;
  await h.system.premiumBoost(USER, TOTEM_A, 10n ** 15n);
  await h.system.setBoostRewardPoints(MANAGER, 200);
  return { source: h, snapshot: h.system.exportState() };
}

describe('state export and import', () => {
  it('restores records, pending requests, settings and consumed signatures', async () => {
    const { source, snapshot } = await populatedSnapshot();
    const restored = createHarness();
    restored.clock.now = T0 + 2 * DAY + 10;
    await restored.system.importState(parseStateSnapshot(JSON.parse(JSON.stringify(snapshot))));

    expect(restored.system.getStreakInfo(USER, TOTEM_A)).toEqual(source.system.getStreakInfo(USER, TOTEM_A));
    expect(restored.system.getPendingPremiumRequests()).toEqual(source.system.getPendingPremiumRequests());
    expect(restored.system.getSettings().boostRewardPoints).toBe(200);

    const replay = await signBoostRequest(source.frontend, USER, TOTEM_A, T0 + 2 * DAY);
    expect(await rejectionCode(restored.system.boost(USER, TOTEM_A, T0 + 2 * DAY, replay))).toBe('SignatureAlreadyUsed');

    const settled = await restored.system.fulfillRandomWords(ORACLE, 1n, [0n]);
    expect(settled.reward).toBe(550);
  });

  it('leaves the current state untouched when a later record is invalid', async () => {
    const { snapshot } = await populatedSnapshot();
    const [record] = snapshot.records;
    if (!record) throw new Error('expected a record');
    const target = createHarness();
    await target.boostDays(0, 5, TOTEM_B);

    const broken: BoostStateSnapshot = { ...snapshot, records: [record, { ...record, user: 'bogus' }] };
    expect(await rejectionCode(target.system.importState(broken))).toBe('InvalidAddress');

    expect(target.system.getStreakInfo(USER, TOTEM_B).streakLength).toBe(5);
    expect(target.system.getStreakInfo(USER, TOTEM_A).streakLength).toBe(0);
    expect(target.system.getPendingPremiumRequests()).toEqual([]);
    expect(target.system.getSettings().boostRewardPoints).toBe(100);
  });

  it('keeps spent payment transactions across a restore', async () => {
    const source = createHarness();
    source.payments.record(txHash(9), USER, 10n ** 15n);
    await source.system.premiumBoostWithPayment(TOTEM_A, txHash(9));
    const snapshot = parseStateSnapshot(JSON.parse(JSON.stringify(source.system.exportState())));
    expect(snapshot.consumedPayments).toEqual([txHash(9)]);

    const restored = createHarness();
    restored.payments.record(txHash(9), USER, 10n ** 15n);
    await restored.system.importState(snapshot);

    expect(await rejectionCode(restored.system.premiumBoostWithPayment(TOTEM_A, txHash(9)))).toBe(
      'PaymentAlreadyUsed',
    );
  });

  it('rejects other snapshot versions', async () => {
    const { snapshot } = await populatedSnapshot();

    expect(thrownCode(() => parseStateSnapshot({ ...snapshot, version: 2 }))).toBe('UnsupportedStateVersion');
  });

  it('rejects malformed snapshots', async () => {
    const { snapshot } = await populatedSnapshot();
    const [record] = snapshot.records;
    if (!record) throw new Error('expected a record');

    expect(thrownCode(() => parseStateSnapshot(null))).toBe('MalformedState');
    expect(thrownCode(() => parseStateSnapshot({ version: 1 }))).toBe('MalformedState');
    expect(
      thrownCode(() => parseStateSnapshot({ ...snapshot, records: [{ ...record, graceDaysUsed: record.graceDaysEarned + 1 }] })),
    ).toBe('MalformedState');
    expect(
      thrownCode(() => parseStateSnapshot({ ...snapshot, pending: [{ requestId: 'one', user: USER, totem: TOTEM_A }] })),
    ).toBe('MalformedState');
    expect(thrownCode(() => parseStateSnapshot({ ...snapshot, records: [{ ...record, totem: '0x12' }] }))).toBe(
      'MalformedState',
    );
    expect(thrownCode(() => parseStateSnapshot({ ...snapshot, consumedPayments: ['0xnope'] }))).toBe('MalformedState');
  });
});

describe('state file', () => {
  let dir = '';

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it('saves and loads a snapshot', async () => {
    dir = mkdtempSync(join(tmpdir(), 'boost-state-'));
    const path = join(dir, 'state.json');
    const { snapshot } = await populatedSnapshot();

    saveStateFile(path, snapshot);
    const loaded: BoostStateSnapshot | null = loadStateFile(path);
    expect(loaded).toEqual(snapshot);
  });

  it('returns null when no file exists', () => {
    dir = mkdtempSync(join(tmpdir(), 'boost-state-'));

    expect(loadStateFile(join(dir, 'missing.json'))).toBeNull();
  });

  it('validates what it loads', () => {
    dir = mkdtempSync(join(tmpdir(), 'boost-state-'));
    const path = join(dir, 'state.json');
    writeFileSync(path, JSON.stringify({ version: 7 }), 'utf8');

    expect(thrownCode(() => loadStateFile(path))).toBe('UnsupportedStateVersion');
  });
});

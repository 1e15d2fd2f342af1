/**
 * Totem Boost — Badge Ledger
 *
 * Milestone badges become mintable when a streak reaches a milestone on any
 * totem. Availability is summed across the user's totems; minting spends one
 * from the first record that holds it.
 */

import { BoostError } from './errors.js';
import type { BoostRecordStore } from './store.js';
import type { BadgeMinter } from '../collaborators/types.js';

export class BadgeLedger {
  private readonly store: BoostRecordStore;
  private minter: BadgeMinter | null;

  constructor(store: BoostRecordStore, minter: BadgeMinter | null = null) {
    this.store = store;
    this.minter = minter;
  }

  setMinter(minter: BadgeMinter | null): void {
    this.minter = minter;
  }

  hasMinter(): boolean {
    return this.minter !== null;
  }

  available(user: string, milestone: number): number {
    let total = 0;
    for (const { record } of this.store.forUser(user)) {
      total += record.unmintedBadges.get(milestone) ?? 0;
    }
    return total;
  }

  /** Milestone → available count, omitting milestones with nothing to mint. */
  availableByMilestone(user: string): Map<number, number> {
    const totals = new Map<number, number>();
    for (const { record } of this.store.forUser(user)) {
      for (const [milestone, count] of record.unmintedBadges) {
        if (count > 0) totals.set(milestone, (totals.get(milestone) ?? 0) + count);
      }
    }
    return new Map([...totals].sort(([a], [b]) => a - b));
  }

  async mintBadge(user: string, milestone: number): Promise<string> {
    const holder = this.store
      .forUser(user)
      .find(({ record }) => (record.unmintedBadges.get(milestone) ?? 0) > 0);
    if (!holder) {
      throw new BoostError('MilestoneNotAchieved', `No unminted ${milestone}-day badge for ${user}`);
    }
    if (!this.minter) {
      throw new BoostError('BadgeMinterNotSet', 'Badge NFT contract is not configured');
    }

    await this.minter.mint(user, milestone);

    const record = this.store.get(holder.user, holder.totem);
    const remaining = (record.unmintedBadges.get(milestone) ?? 0) - 1;
    if (remaining > 0) {
      record.unmintedBadges.set(milestone, remaining);
    } else {
      record.unmintedBadges.delete(milestone);
    }
    this.store.save(holder.user, holder.totem, record);

    return holder.totem;
  }
}

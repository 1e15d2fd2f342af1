/**
 * Totem Boost — Boost Record Store
 *
 * In-memory map of BoostRecords keyed by (user, totem). Records are created
 * lazily: get() hands out a fresh empty record for unknown pairs, and only
 * save() makes it part of the store. Records are never deleted.
 */

import { cloneRecord, createEmptyRecord } from './types.js';
import type { BoostRecord } from './types.js';

export interface StoredRecord {
  user: string;
  totem: string;
  record: BoostRecord;
}

function recordKey(user: string, totem: string): string {
  return `${user.toLowerCase()}:${totem.toLowerCase()}`;
}

export class BoostRecordStore {
  private readonly records = new Map<string, StoredRecord>();

  has(user: string, totem: string): boolean {
    return this.records.has(recordKey(user, totem));
  }

  /** Returns a copy; mutate it and save() to commit. */
  get(user: string, totem: string): BoostRecord {
    const stored = this.records.get(recordKey(user, totem));
    return stored ? cloneRecord(stored.record) : createEmptyRecord();
  }

  save(user: string, totem: string, record: BoostRecord): void {
    this.records.set(recordKey(user, totem), { user, totem, record: cloneRecord(record) });
  }

  /** The user's records across all totems, in first-boost order. */
  forUser(user: string): StoredRecord[] {
    const needle = user.toLowerCase();
    return [...this.records.values()].filter((r) => r.user.toLowerCase() === needle);
  }

  all(): StoredRecord[] {
    return [...this.records.values()];
  }

  clear(): void {
    this.records.clear();
  }

  get size(): number {
    return this.records.size;
  }
}

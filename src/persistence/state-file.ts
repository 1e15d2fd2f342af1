/**
 * Totem Boost — State File
 *
 * Persists engine snapshots as JSON. Writes go to a temporary file that is
 * renamed over the target, so a crash mid-write leaves the previous
 * snapshot intact.
 */

import { existsSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { parseStateSnapshot } from '../boost/state.js';
import type { BoostStateSnapshot } from '../boost/state.js';

export function loadStateFile(path: string): BoostStateSnapshot | null {
  if (!existsSync(path)) return null;
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseStateSnapshot(raw);
}

export function saveStateFile(path: string, snapshot: BoostStateSnapshot): void {
  const tmp = `${path}.tmp`;
  writeFileSync(tmp, JSON.stringify(snapshot, null, 2) + '\n', 'utf8');
  renameSync(tmp, path);
}

/**
 * Totem Boost — Access Policy
 *
 * Admin setters require the manager capability; the randomness callback
 * requires the oracle identity. Addresses compare case-insensitively.
 */

import { BoostError } from './errors.js';

export class AccessPolicy {
  private readonly managers: Set<string>;
  private readonly oracle: string;

  constructor(managers: string[], oracle: string) {
    this.managers = new Set(managers.map((m) => m.toLowerCase()));
    this.oracle = oracle.toLowerCase();
  }

  isManager(caller: string): boolean {
    return this.managers.has(caller.toLowerCase());
  }

  requireManager(caller: string): void {
    if (!this.isManager(caller)) {
      throw new BoostError('NotManager', `${caller} lacks the manager capability`);
    }
  }

  requireOracle(caller: string): void {
    if (caller.toLowerCase() !== this.oracle) {
      throw new BoostError('NotOracle', `${caller} is not the randomness oracle`);
    }
  }
}

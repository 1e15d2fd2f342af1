/**
 * Totem Boost — Event Bus
 *
 * The boost engine emits here after each committed mutation; the WebSocket
 * server and the state file writer subscribe.
 */

import { EventEmitter } from 'node:events';
import type { BoostEvents } from './types.js';

export class BoostEmitter extends EventEmitter {
  /**
   * Type-safe emit wrapper.
   */
  emitEvent<K extends keyof BoostEvents>(
    eventName: K,
    ...args: BoostEvents[K]
  ): boolean {
    return this.emit(eventName, ...args);
  }

  /**
   * Type-safe listener wrapper.
   */
  onEvent<K extends keyof BoostEvents>(
    eventName: K,
    listener: (...args: BoostEvents[K]) => void,
  ): this {
    return this.on(eventName, listener);
  }
}

/** Process-wide instance used by the server */
export const boostEmitter = new BoostEmitter();
boostEmitter.setMaxListeners(50);

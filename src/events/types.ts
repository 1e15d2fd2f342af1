/**
 * Totem Boost — Event Types
 *
 * Events that flow through the internal EventEmitter and are broadcast to
 * connected WebSocket clients. Payloads are JSON-safe: wei amounts and
 * request ids travel as decimal strings.
 */

// ---------------------------------------------------------------------------
// Event type discriminators
// ---------------------------------------------------------------------------

export type WSEventType =
  | 'boost:free'
  | 'boost:premium-requested'
  | 'boost:premium-fulfilled'
  | 'streak:reset'
  | 'badge:minted'
  | 'settings:updated'
  | 'connection:init';

// ---------------------------------------------------------------------------
// Event payloads
// ---------------------------------------------------------------------------

export interface FreeBoostEvent {
  type: 'boost:free';
  payload: {
    user: string;
    totem: string;
    reward: number;
    streakLength: number;
    graceDayGranted: boolean;
    graceDaysConsumed: number;
    milestonesReached: number[];
    timestamp: number;
  };
}

export interface PremiumRequestedEvent {
  type: 'boost:premium-requested';
  payload: {
    requestId: string;
    user: string;
    totem: string;
    streakLength: number;
    graceDayGranted: boolean;
    refundedWei: string;
    timestamp: number;
  };
}

export interface PremiumFulfilledEvent {
  type: 'boost:premium-fulfilled';
  payload: {
    requestId: string;
    user: string;
    totem: string;
    tierPoints: number;
    reward: number;
    timestamp: number;
  };
}

export interface StreakResetEvent {
  type: 'streak:reset';
  payload: {
    user: string;
    totem: string;
    timestamp: number;
  };
}

export interface BadgeMintedEvent {
  type: 'badge:minted';
  payload: {
    user: string;
    totem: string;
    milestone: number;
    timestamp: number;
  };
}

export interface SettingsUpdatedEvent {
  type: 'settings:updated';
  payload: {
    setting: string;
    value: string;
    updatedBy: string;
    timestamp: number;
  };
}

export interface ConnectionInitEvent {
  type: 'connection:init';
  payload: {
    serverTime: number;
    connectedClients: number;
  };
}

// ---------------------------------------------------------------------------
// Union type
// ---------------------------------------------------------------------------

export type WSEvent =
  | FreeBoostEvent
  | PremiumRequestedEvent
  | PremiumFulfilledEvent
  | StreakResetEvent
  | BadgeMintedEvent
  | SettingsUpdatedEvent
  | ConnectionInitEvent;

// ---------------------------------------------------------------------------
// Internal emitter event map
// ---------------------------------------------------------------------------

export interface BoostEvents {
  'boost:free': [FreeBoostEvent];
  'boost:premium-requested': [PremiumRequestedEvent];
  'boost:premium-fulfilled': [PremiumFulfilledEvent];
  'streak:reset': [StreakResetEvent];
  'badge:minted': [BadgeMintedEvent];
  'settings:updated': [SettingsUpdatedEvent];
}

/** Every event the engine emits after committing a mutation. */
export const BOOST_EVENT_TYPES: ReadonlyArray<keyof BoostEvents> = [
  'boost:free',
  'boost:premium-requested',
  'boost:premium-fulfilled',
  'streak:reset',
  'badge:minted',
  'settings:updated',
];

/**
 * Totem Boost — Express API
 *
 * Endpoints:
 *   GET  /api/health                     — Liveness + paused flag
 *   POST /api/boost                      — Free boost (signed by the frontend signer)
 *   POST /api/boost/premium              — Paid boost from a transfer to the operator (txHash)
 *   GET  /api/boost/:user/:totem         — Raw boost record
 *   GET  /api/streak/:user/:totem        — Streak and grace-day info
 *   POST /api/badges/mint                — Mint an achieved milestone badge (signed by the user)
 *   GET  /api/badges/:user               — Mintable badges per milestone
 *   GET  /api/badges/:user/:milestone    — Mintable count for one milestone
 *   GET  /api/premium/config             — Premium boost price + reward tiers
 *   GET  /api/premium/pending            — Premium boosts awaiting randomness
 *   GET  /api/cooldown                   — Free boost cooldown (seconds)
 *   POST /api/admin/:setting             — Manager settings (signed by a manager)
 *
 * Simulated collaborators only:
 *   POST /api/payments/simulate          — Record a transfer, returns its txHash
 *   POST /api/oracle/fulfill             — Deliver words through the simulated oracle
 *
 * Signed routes carry `timestamp` and `signature` in the body; see auth.ts.
 * Wei amounts and request ids are decimal strings in both directions.
 */

import express from 'express';
import cors from 'cors';
import type { Request, Response } from 'express';
import { ActionAuthenticator } from './auth.js';
import { BoostError } from '../boost/errors.js';
import type { BoostErrorCategory } from '../boost/errors.js';
import { toAddress } from '../boost/system.js';
import type { BoostSystem } from '../boost/system.js';
import { systemClock } from '../boost/types.js';
import type { Clock } from '../boost/types.js';
import type { SimulatedPaymentReceipts, SimulatedRandomnessOracle } from '../collaborators/simulated.js';
import type { BadgeMinter } from '../collaborators/types.js';

export interface AppOptions {
  /** Builds the badge minter for an address set through /api/admin/badgeNFT */
  badgeMinterFor?: (address: string) => BadgeMinter;
  /** Mounts POST /api/oracle/fulfill; leave unset when a real coordinator answers */
  simulatedOracle?: SimulatedRandomnessOracle;
  /** Mounts POST /api/payments/simulate; leave unset when payments are on chain */
  simulatedPayments?: SimulatedPaymentReceipts;
  clock?: Clock;
}

const ADMIN_SETTINGS = new Set([
  'boostRewardPoints',
  'premiumBoostPrice',
  'freeBoostCooldown',
  'frontendSigner',
  'badgeNFT',
  'pause',
  'unpause',
]);

const CATEGORY_STATUS: Record<BoostErrorCategory, number> = {
  AuthFailure: 401,
  EligibilityFailure: 403,
  RateLimitFailure: 429,
  PaymentFailure: 402,
  MilestoneFailure: 409,
  SystemFailure: 503,
  AccessFailure: 403,
  ValidationFailure: 400,
  OracleFailure: 404,
};

// ---------------------------------------------------------------------------
// Request parsing
// ---------------------------------------------------------------------------

type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyOf(req: Request): Body {
  const body: unknown = req.body;
  return isBody(body) ? body : {};
}

function invalid(message: string): BoostError {
  return new BoostError('InvalidParameter', message);
}

function stringField(body: Body, key: string): string {
  const value = body[key];
  if (typeof value !== 'string' || value.length === 0) throw invalid(`Missing required field: ${key}`);
  return value;
}

function integerField(body: Body, key: string): number {
  const value = body[key];
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
    throw invalid(`Field ${key} must be an integer`);
  }
  return parsed;
}

function weiValue(value: unknown, key: string): bigint {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw invalid(`Field ${key} must be a decimal string of wei`);
  }
  return BigInt(value);
}

function integerParam(value: string | undefined, key: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) throw invalid(`Path parameter ${key} must be an integer`);
  return parsed;
}

/** What an admin signature covers besides the setting name. */
export function adminPayload(value: unknown): string {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof BoostError) {
    res.status(CATEGORY_STATUS[err.category]).json({ error: err.message, code: err.code });
    return;
  }
  console.error('[api] Unexpected error:', err instanceof Error ? err.message : err);
  res.status(500).json({ error: 'Internal error' });
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

export function createApp(system: BoostSystem, options: AppOptions = {}): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  const clock = options.clock ?? systemClock;
  const auth = new ActionAuthenticator(system.getSettings().signatureToleranceSeconds);
  const signerOf = (body: Body, action: string, payload: string): string =>
    auth.authenticate(action, payload, integerField(body, 'timestamp'), stringField(body, 'signature'), clock());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', paused: system.isPaused(), timestamp: Date.now() });
  });

  // -----------------------------------------------------------------------
  // Boosts
  // -----------------------------------------------------------------------

  app.post('/api/boost', async (req, res) => {
    try {
      const body = bodyOf(req);
      const result = await system.boost(
        stringField(body, 'user'),
        stringField(body, 'totem'),
        integerField(body, 'timestamp'),
        stringField(body, 'signature'),
      );
      res.json({
        user: result.user,
        totem: result.totem,
        reward: result.reward,
        streakLength: result.streak.streakLength,
        graceDayGranted: result.streak.graceDayGranted,
        graceDaysConsumed: result.streak.graceDaysConsumed,
        streakReset: result.streak.reset,
        milestonesReached: result.streak.milestonesReached,
        boostPeriodPct: result.boostPeriodPct,
        boostedAt: result.boostedAt,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post('/api/boost/premium', async (req, res) => {
    try {
      const body = bodyOf(req);
      const result = await system.premiumBoostWithPayment(stringField(body, 'totem'), stringField(body, 'txHash'));
      res.status(202).json({
        requestId: result.requestId.toString(),
        user: result.user,
        totem: result.totem,
        streakLength: result.streak.streakLength,
        graceDayGranted: result.streak.graceDayGranted,
        refundedWei: result.refunded.toString(),
        requestedAt: result.requestedAt,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/boost/:user/:totem', (req, res) => {
    try {
      res.json(system.getBoostData(req.params.user, req.params.totem));
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/streak/:user/:totem', (req, res) => {
    try {
      res.json(system.getStreakInfo(req.params.user, req.params.totem));
    } catch (err) {
      sendError(res, err);
    }
  });

  // -----------------------------------------------------------------------
  // Badges
  // -----------------------------------------------------------------------

  app.post('/api/badges/mint', async (req, res) => {
    try {
      const body = bodyOf(req);
      const milestone = integerField(body, 'milestone');
      const user = signerOf(body, 'mintBadge', String(milestone));
      await system.mintBadge(user, milestone);
      res.json({ user, milestone, remaining: system.getAvailableBadges(user, milestone) });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/badges/:user', (req, res) => {
    try {
      const badges = system.getAllAvailableBadges(req.params.user);
      res.json({ user: req.params.user, badges: Object.fromEntries(badges) });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/badges/:user/:milestone', (req, res) => {
    try {
      const milestone = integerParam(req.params.milestone, 'milestone');
      res.json({
        user: req.params.user,
        milestone,
        available: system.getAvailableBadges(req.params.user, milestone),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  // -----------------------------------------------------------------------
  // Premium + oracle
  // -----------------------------------------------------------------------

  app.get('/api/premium/config', (_req, res) => {
    const config = system.getPremiumBoostConfig();
    res.json({ priceWei: config.price.toString(), tiers: config.tiers });
  });

  app.get('/api/premium/pending', (_req, res) => {
    res.json(
      system.getPendingPremiumRequests().map((r) => ({
        requestId: r.requestId.toString(),
        user: r.user,
        totem: r.totem,
        streakLength: r.snapshot.streakLength,
        requestedAt: r.requestedAt,
      })),
    );
  });

  app.get('/api/cooldown', (_req, res) => {
    res.json({ cooldownSeconds: system.getFreeBoostCooldown() });
  });

  const { simulatedOracle, simulatedPayments } = options;

  if (simulatedOracle) {
    app.post('/api/oracle/fulfill', async (req, res) => {
      try {
        const body = bodyOf(req);
        const requestId = weiValue(body.requestId, 'requestId');
        let words: bigint[] | undefined;
        if (body.randomWords !== undefined) {
          const raw = body.randomWords;
          if (!Array.isArray(raw)) throw invalid('Field randomWords must be an array');
          words = raw.map((w: unknown, i: number) => weiValue(w, `randomWords[${i}]`));
        }
        if (!system.getPendingPremiumRequests().some((r) => r.requestId === requestId)) {
          throw new BoostError('UnknownRequest', `No pending premium boost for request ${requestId}`);
        }
        await simulatedOracle.fulfill(requestId, words);
        res.json({ requestId: requestId.toString(), fulfilled: true });
      } catch (err) {
        sendError(res, err);
      }
    });
  }

  if (simulatedPayments) {
    app.post('/api/payments/simulate', (req, res) => {
      try {
        const body = bodyOf(req);
        const from = toAddress(stringField(body, 'from'), 'from');
        const value = weiValue(body.valueWei, 'valueWei');
        res.status(201).json({ txHash: simulatedPayments.simulate(from, value), from, valueWei: value.toString() });
      } catch (err) {
        sendError(res, err);
      }
    });
  }

  // -----------------------------------------------------------------------
  // Admin
  // -----------------------------------------------------------------------

  app.post('/api/admin/:setting', async (req, res) => {
    try {
      const { setting } = req.params;
      if (!ADMIN_SETTINGS.has(setting)) {
        res.status(404).json({ error: `Unknown setting: ${setting}` });
        return;
      }
      const body = bodyOf(req);
      const caller = signerOf(body, `admin:${setting}`, adminPayload(body.value));
      switch (setting) {
        case 'boostRewardPoints':
          await system.setBoostRewardPoints(caller, integerField(body, 'value'));
          break;
        case 'premiumBoostPrice':
          await system.setPremiumBoostPrice(caller, weiValue(body.value, 'value'));
          break;
        case 'freeBoostCooldown':
          await system.setFreeBoostCooldown(caller, integerField(body, 'value'));
          break;
        case 'frontendSigner':
          await system.setFrontendSigner(caller, stringField(body, 'value'));
          break;
        case 'badgeNFT': {
          if (body.value === null) {
            await system.setBadgeNFT(caller, null);
            break;
          }
          const address = toAddress(stringField(body, 'value'), 'badgeNFT');
          if (!options.badgeMinterFor) throw invalid('Badge NFT cannot be configured on this server');
          await system.setBadgeNFT(caller, options.badgeMinterFor(address), address);
          break;
        }
        case 'pause':
          await system.pause(caller);
          break;
        case 'unpause':
          await system.unpause(caller);
          break;
      }
      res.json({ ok: true, setting, caller });
    } catch (err) {
      sendError(res, err);
    }
  });

  return app;
}

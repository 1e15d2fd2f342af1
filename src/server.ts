/**
 * Totem Boost — API Server
 *
 * Loads configuration, builds the collaborators (contract-backed when a
 * chain is configured, simulated otherwise), restores engine state from the
 * state file and serves the HTTP API plus the /ws event stream.
 */

import 'dotenv/config';
import { createServer } from 'node:http';
import { createApp } from './api/app.js';
import { AccessPolicy, BoostSystem } from './boost/index.js';
import { closeClient, initChainClient, checkHealth } from './chain/client.js';
import {
  ChainPaymentReceipts,
  ContractBadgeMinter,
  ContractMeritManager,
  ContractRandomnessOracle,
  ContractTotemHoldings,
  ContractTreasury,
  SignerRefunds,
} from './chain/contracts.js';
import {
  SimulatedBadgeMinter,
  SimulatedMeritManager,
  SimulatedPaymentReceipts,
  SimulatedRandomnessOracle,
  SimulatedRefunds,
  SimulatedTotemHoldings,
  SimulatedTreasury,
} from './collaborators/simulated.js';
import type {
  BadgeMinter,
  MeritManager,
  PaymentReceipts,
  Refunds,
  TotemHoldings,
  Treasury,
} from './collaborators/types.js';
import { describeSettings, loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { boostEmitter, BOOST_EVENT_TYPES, closeWebSocketServer, initWebSocketServer } from './events/index.js';
import { loadStateFile, saveStateFile } from './persistence/state-file.js';

interface Collaborators {
  merit: MeritManager;
  treasury: Treasury;
  refunds: Refunds;
  payments: PaymentReceipts;
  holdings: TotemHoldings;
  badgeMinter: BadgeMinter | null;
  badgeMinterFor: (address: string) => BadgeMinter;
  oracle: ContractRandomnessOracle | SimulatedRandomnessOracle;
  sources: string[];
}

function buildCollaborators(config: AppConfig): Collaborators {
  const { meritManager, treasury: treasuryAddress, badgeNft, randomnessCoordinator } = config.contracts;
  const chain = config.chainRpcUrl !== null;
  if (config.chainRpcUrl) {
    initChainClient({ rpcUrl: config.chainRpcUrl, privateKey: config.operatorPrivateKey });
  }

  const sources: string[] = [];
  const pick = <T>(name: string, onChain: (() => T) | null, simulated: () => T): T => {
    if (chain && onChain) {
      sources.push(`${name}: chain`);
      return onChain();
    }
    sources.push(`${name}: simulated`);
    return simulated();
  };

  const merit = pick<MeritManager>(
    'merit',
    meritManager ? () => new ContractMeritManager(meritManager) : null,
    () => new SimulatedMeritManager(),
  );
  const treasury = pick<Treasury>(
    'treasury',
    treasuryAddress ? () => new ContractTreasury(treasuryAddress) : null,
    () => new SimulatedTreasury(),
  );
  const refunds = pick<Refunds>('refunds', () => new SignerRefunds(), () => new SimulatedRefunds());
  const payments = pick<PaymentReceipts>(
    'payments',
    () => new ChainPaymentReceipts(),
    () => new SimulatedPaymentReceipts(),
  );
  const holdings = pick<TotemHoldings>(
    'holdings',
    () => new ContractTotemHoldings(config.nftTotems),
    () => new SimulatedTotemHoldings(config.simulatedTotemBalance),
  );
  const badgeMinterFor = (address: string): BadgeMinter =>
    chain ? new ContractBadgeMinter(address) : new SimulatedBadgeMinter();
  const badgeMinter = badgeNft ? badgeMinterFor(badgeNft) : null;
  const oracle = pick<ContractRandomnessOracle | SimulatedRandomnessOracle>(
    'oracle',
    randomnessCoordinator ? () => new ContractRandomnessOracle(randomnessCoordinator) : null,
    () => new SimulatedRandomnessOracle(config.oracleAddress, config.simulatedOracleDelayMs),
  );

  return { merit, treasury, refunds, payments, holdings, badgeMinter, badgeMinterFor, oracle, sources };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const collaborators = buildCollaborators(config);

  if (config.managers.length === 0) {
    console.log('  [config] MANAGER_ADDRESSES is empty; admin endpoints will reject every caller');
  }

  const system = new BoostSystem({
    merit: collaborators.merit,
    treasury: collaborators.treasury,
    refunds: collaborators.refunds,
    payments: collaborators.payments,
    holdings: collaborators.holdings,
    oracle: collaborators.oracle,
    badgeMinter: collaborators.badgeMinter,
    access: new AccessPolicy(config.managers, collaborators.oracle.address),
    settings: config.settings,
    emitter: boostEmitter,
  });

  await collaborators.oracle.onFulfill((caller, requestId, words) =>
    system.fulfillRandomWords(caller, requestId, words),
  );

  const { stateFile } = config;
  if (stateFile) {
    const snapshot = loadStateFile(stateFile);
    if (snapshot) {
      await system.importState(snapshot);
      if (collaborators.oracle instanceof SimulatedRandomnessOracle) {
        for (const pending of system.getPendingPremiumRequests()) {
          collaborators.oracle.restoreRequest(pending.requestId);
        }
      }
    }
    for (const eventType of BOOST_EVENT_TYPES) {
      boostEmitter.on(eventType, () => {
        try {
          saveStateFile(stateFile, system.exportState());
        } catch (err) {
          console.error('  [state] Failed to write state file:', err instanceof Error ? err.message : err);
        }
      });
    }
  }

  const { oracle, payments } = collaborators;
  const app = createApp(system, {
    badgeMinterFor: collaborators.badgeMinterFor,
    simulatedOracle: oracle instanceof SimulatedRandomnessOracle ? oracle : undefined,
    simulatedPayments: payments instanceof SimulatedPaymentReceipts ? payments : undefined,
  });
  const httpServer = createServer(app);
  initWebSocketServer(httpServer, boostEmitter);

  if (config.chainRpcUrl) {
    const health = await checkHealth();
    console.log(health ? `  [chain] Connected at block ${health.blockNumber}` : '  [chain] RPC unreachable');
  }

  httpServer.listen(config.port, () => {
    console.log(`\n  Totem Boost API server running on http://localhost:${config.port}`);
    console.log(`  Settings: ${describeSettings(config.settings)}`);
    console.log(`  Collaborators: ${collaborators.sources.join(', ')}`);
    console.log(`    WS   ws://localhost:${config.port}/ws — Real-time event stream\n`);
  });

  const shutdown = (): void => {
    console.log('\n  Shutting down...');
    closeWebSocketServer()
      .then(() => {
        httpServer.close();
        closeClient();
        process.exit(0);
      })
      .catch((err: unknown) => {
        console.error('  Shutdown failed:', err instanceof Error ? err.message : err);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error('  Failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
});

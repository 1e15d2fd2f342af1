/**
 * Totem Boost — Chain Client
 *
 * Singleton ethers.js provider and operator signer for the contract-backed
 * collaborators. Configured once at startup from the loaded config.
 *
 * Usage:
 *   initChainClient({ rpcUrl, privateKey });
 *   const provider = getProvider();
 *   const signer = getSigner();
 */

import { ethers } from 'ethers';

export interface ChainClientConfig {
  rpcUrl: string;
  privateKey: string | null;
}

// ---------------------------------------------------------------------------
// Singleton instances
// ---------------------------------------------------------------------------

let _config: ChainClientConfig | null = null;
let _provider: ethers.JsonRpcProvider | null = null;
let _signer: ethers.Wallet | null = null;

export function initChainClient(config: ChainClientConfig): void {
  closeClient();
  _config = config;
}

/**
 * Get (or create) the singleton JSON-RPC provider.
 */
export function getProvider(): ethers.JsonRpcProvider {
  if (!_config) {
    throw new Error('Chain client not initialized. Set CHAIN_RPC_URL in .env');
  }
  if (!_provider) {
    _provider = new ethers.JsonRpcProvider(_config.rpcUrl);
  }
  return _provider;
}

/**
 * Get (or create) the singleton signer (Wallet) for write operations.
 */
export function getSigner(): ethers.Wallet {
  if (_signer) return _signer;

  const privateKey = _config?.privateKey;
  if (!privateKey) {
    throw new Error(
      'Missing OPERATOR_PRIVATE_KEY environment variable.\n' +
        'Add the operator wallet private key to .env',
    );
  }

  _signer = new ethers.Wallet(privateKey, getProvider());
  return _signer;
}

/**
 * Check connectivity by requesting the current block number.
 */
export async function checkHealth(): Promise<{
  blockNumber: number;
  rpcUrl: string;
} | null> {
  if (!_config) return null;
  try {
    const blockNumber = await getProvider().getBlockNumber();
    return { blockNumber, rpcUrl: _config.rpcUrl };
  } catch (err) {
    console.error('[chain] Health check failed:', err instanceof Error ? err.message : err);
    return null;
  }
}

/**
 * Close / reset the provider and signer. Call on shutdown.
 */
export function closeClient(): void {
  if (_provider) {
    _provider.destroy();
    _provider = null;
  }
  _signer = null;
}

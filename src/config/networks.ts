/**
 * Per-network constants for pool resolution.
 */

import { CHAIN_IDS, Network, NetworkConfig } from '../types';
import { UnsupportedNetworkError } from '../errors';
import { normalizeAddress } from '../utils/address';
import { BASE_TOKENS, MAINNET_TOKENS } from './tokens';

// Uniswap V2 on Ethereum
export const UNISWAP_V2_MAINNET_FACTORY = '0x5C69bEe701ef814a2B6a3EDD4B1652CB9cc5aA6f';

// Uniswap V2 deployment on Base
export const UNISWAP_V2_BASE_FACTORY = '0x8909Dc15e40173Ff4699343b6eB8132c65e18eC6';

export const MAINNET_NETWORK: NetworkConfig = {
  network: Network.MAINNET,
  chainId: CHAIN_IDS[Network.MAINNET],
  wrappedNativeAsset: MAINNET_TOKENS.WETH,
  referenceStable: MAINNET_TOKENS.DAI,
  factory: UNISWAP_V2_MAINNET_FACTORY,
};

export const BASE_NETWORK: NetworkConfig = {
  network: Network.BASE,
  chainId: CHAIN_IDS[Network.BASE],
  wrappedNativeAsset: BASE_TOKENS.WETH,
  referenceStable: BASE_TOKENS.USDC,
  factory: UNISWAP_V2_BASE_FACTORY,
};

export class NetworkRegistry {
  private readonly configs = new Map<string, NetworkConfig>();

  constructor(configs: NetworkConfig[] = []) {
    configs.forEach((config) => this.register(config));
  }

  register(config: NetworkConfig): void {
    this.configs.set(config.network, {
      ...config,
      wrappedNativeAsset: normalizeAddress(config.wrappedNativeAsset, 'wrappedNativeAsset'),
      referenceStable: normalizeAddress(config.referenceStable, 'referenceStable'),
      factory: normalizeAddress(config.factory, 'factory'),
    });
  }

  has(network: string): boolean {
    return this.configs.has(network);
  }

  get(network: string): NetworkConfig {
    const config = this.configs.get(network);
    if (!config) {
      throw new UnsupportedNetworkError(network);
    }
    return config;
  }

  networks(): string[] {
    return [...this.configs.keys()];
  }
}

/**
 * Registry with the networks the kit ships support for. Mainnet only;
 * other deployments are added with `register`.
 */
export const createDefaultRegistry = (): NetworkRegistry => new NetworkRegistry([MAINNET_NETWORK]);

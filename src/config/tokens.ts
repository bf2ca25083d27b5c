import { Address } from '../types';

export const MAINNET_TOKENS: Record<string, Address> = {
  WETH: '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2',
  USDC: '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48',
  DAI: '0x6B175474E89094C44Da98b954EedeAC495271d0F',
  USDT: '0xdAC17F958D2ee523a2206206994597C13D831ec7',
  WBTC: '0x2260FAC5E5542a773Aa44fBCfeDf7C193bc2C599',
};

export const BASE_TOKENS: Record<string, Address> = {
  WETH: '0x4200000000000000000000000000000000000006',
  USDC: '0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913',
};

export const TOKEN_SYMBOLS: Record<string, Record<string, Address>> = {
  mainnet: MAINNET_TOKENS,
  base: BASE_TOKENS,
};

/**
 * Accepts either a symbol known for the network or a raw address.
 */
export const resolveTokenAlias = (network: string, value: string): Address => {
  const table = TOKEN_SYMBOLS[network] ?? {};
  return table[value.toUpperCase()] ?? value;
};

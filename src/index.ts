export * from './types';
export * from './errors';
export * from './services/flashloan';
export { createFlashKit } from './kit';
export type { FlashKit, FlashKitOptions } from './kit';
export { NetworkRegistry, createDefaultRegistry, MAINNET_NETWORK, BASE_NETWORK } from './config/networks';
export { MAINNET_TOKENS, BASE_TOKENS } from './config/tokens';
export { EthersContractGateway } from './contracts/EthersContractGateway';
export type * from './contracts/interfaces';
export { sortTokens, toPoolHandle } from './utils/address';

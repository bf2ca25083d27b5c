export type Address = string;
export type Amount = bigint;
export type HexData = string;

export enum LogLevel {
  INFO = 'info',
  DEBUG = 'debug',
  WARN = 'warn',
  ERROR = 'error',
}

export enum Network {
  MAINNET = 'mainnet',
  BASE = 'base',
}

export const CHAIN_IDS: Record<Network, number> = {
  [Network.MAINNET]: 1,
  [Network.BASE]: 8453,
};

export interface NetworkConfig {
  network: Network;
  chainId: number;
  wrappedNativeAsset: Address;
  referenceStable: Address;
  // Uniswap V2 style factory exposing getPair(tokenA, tokenB)
  factory: Address;
}

declare const poolHandleBrand: unique symbol;

/**
 * Address of a constant-product pair. Only produced by `toPoolHandle`,
 * which validates the address, so a plain string never reaches the pair
 * collaborator unchecked.
 */
export type PoolHandle = Address & { readonly [poolHandleBrand]: true };

export type Slot = 'slot0' | 'slot1';

export interface SortedPair {
  slot0: Address;
  slot1: Address;
}

export interface ResolvedPair extends SortedPair {
  pool: PoolHandle;
}

export interface LoanContext {
  readonly pool: PoolHandle;
  readonly requestedAsset: Address;
  readonly amount: Amount;
}

export interface BorrowRequest {
  network: Network;
  asset: Address;
  amount: Amount;
  pool?: PoolHandle;
  extraParams?: HexData;
}

export interface BorrowCall {
  pool: PoolHandle;
  amount0Out: Amount;
  amount1Out: Amount;
  recipient: Address;
  callbackData: HexData;
  context: LoanContext;
}

export interface CallbackPayload {
  initiator: Address;
  amount0: Amount;
  amount1: Amount;
  extraParams: HexData;
}

export interface RepayTransfer {
  slot: Slot;
  asset: Address;
  to: PoolHandle;
  borrowed: Amount;
  fee: Amount;
  amount: Amount;
}

export interface SettlementContext {
  // msg.sender of the callback
  sender: Address;
  context: LoanContext;
}

export interface FlashLoanResult {
  call: BorrowCall;
  expectedRepayment: Amount;
  dryRun: boolean;
  txHash?: string;
  gasUsed?: bigint;
  timestamp: number;
}

export interface FlashKitConfig {
  rpcUrl: string;
  network: Network;
  flashReceiverContract: Address;
  privateKey?: string;
  dryRun: boolean;
  logLevel: LogLevel;
}

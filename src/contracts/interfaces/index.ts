import { Address, PoolHandle } from '../../types';
import { IERC20 } from './IERC20';
import { IFlashReceiver } from './IFlashReceiver';
import { IUniswapV2Factory } from './IUniswapV2Factory';
import { IUniswapV2Pair } from './IUniswapV2Pair';

export type { IUniswapV2Factory } from './IUniswapV2Factory';
export type { IUniswapV2Pair, PairReserves } from './IUniswapV2Pair';
export type { IERC20 } from './IERC20';
export type { IFlashReceiver } from './IFlashReceiver';
export type { TransactionOutcome } from './TransactionOutcome';

/**
 * Hands out typed collaborators for on-chain addresses.
 */
export interface ContractGateway {
  factory(address: Address): IUniswapV2Factory;
  pair(pool: PoolHandle): IUniswapV2Pair;
  token(address: Address): IERC20;
  receiver(address: Address): IFlashReceiver;
}

import { Address, Amount, HexData, PoolHandle } from '../../types';
import { TransactionOutcome } from './TransactionOutcome';

export interface PairReserves {
  reserve0: Amount;
  reserve1: Amount;
  blockTimestampLast: number;
}

/**
 * Two-asset constant-product pair. `swap` with non-empty `data` sends the
 * outputs first, calls `uniswapV2Call` on `to` and only then checks that the
 * fee-adjusted reserves did not shrink.
 */
export interface IUniswapV2Pair {
  readonly address: PoolHandle;
  token0(): Promise<Address>;
  token1(): Promise<Address>;
  getReserves(): Promise<PairReserves>;
  swap(amount0Out: Amount, amount1Out: Amount, to: Address, data: HexData): Promise<TransactionOutcome>;
}

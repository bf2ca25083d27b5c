import { Address, Amount, HexData, PoolHandle } from '../../types';
import { TransactionOutcome } from './TransactionOutcome';

/**
 * Borrowing contract. `flashBorrow` forwards to `pool.swap(..., address(this), data)`
 * and repays from inside its `uniswapV2Call`.
 */
export interface IFlashReceiver {
  readonly address: Address;
  flashBorrow(pool: PoolHandle, amount0Out: Amount, amount1Out: Amount, data: HexData): Promise<TransactionOutcome>;
}

import { Address } from '../../types';

/**
 * Factory of constant-product pairs. `getPair` answers the zero address when
 * no pair exists; argument order does not matter.
 */
export interface IUniswapV2Factory {
  readonly address: Address;
  getPair(tokenA: Address, tokenB: Address): Promise<Address>;
}

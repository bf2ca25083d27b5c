import { Address, Amount } from '../../types';

export interface IERC20 {
  readonly address: Address;
  balanceOf(owner: Address): Promise<Amount>;
  transfer(to: Address, amount: Amount): Promise<boolean>;
}

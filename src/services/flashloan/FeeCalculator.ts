import { MaxUint256 } from 'ethers';
import { Amount } from '../../types';
import { ArithmeticOverflowError, ValidationError } from '../../errors';

// A V2 pair keeps 997/1000 of every input; repaying x * 1000 / 997 covers the 0.3% swap fee.
export const FEE_NUMERATOR = 3n;
export const FEE_DENOMINATOR = 997n;

export const assertUint256 = (value: bigint, label = 'amount'): void => {
  if (value < 0n) {
    throw new ValidationError(`${label} must not be negative`, { [label]: value.toString() });
  }
  if (value > MaxUint256) {
    throw new ValidationError(`${label} exceeds uint256`, { [label]: value.toString() });
  }
};

export const checkedAdd = (a: bigint, b: bigint): bigint => {
  const sum = a + b;
  if (sum > MaxUint256) throw new ArithmeticOverflowError('add', a, b);
  return sum;
};

export const checkedMul = (a: bigint, b: bigint): bigint => {
  const product = a * b;
  if (product > MaxUint256) throw new ArithmeticOverflowError('mul', a, b);
  return product;
};

/**
 * Surcharge owed on top of a flash-borrowed amount: `floor(amount * 3 / 997) + 1`.
 * The trailing +1 keeps rounding from ever producing a zero fee.
 */
export const flashFee = (amount: Amount): Amount => {
  assertUint256(amount);
  return checkedAdd(checkedMul(amount, FEE_NUMERATOR) / FEE_DENOMINATOR, 1n);
};

export const repaymentAmount = (amount: Amount): Amount => checkedAdd(amount, flashFee(amount));

/**
 * Largest amount whose repayment fits into `budget`. Returns 0n when the
 * budget cannot cover the minimum fee.
 */
export const maxBorrowForRepayment = (budget: Amount): Amount => {
  assertUint256(budget, 'budget');
  if (budget < 2n) return 0n;

  let low = 0n;
  let high = budget - 1n;
  while (low < high) {
    const mid = (low + high + 1n) / 2n;
    if (mid + (mid * FEE_NUMERATOR) / FEE_DENOMINATOR + 1n <= budget) {
      low = mid;
    } else {
      high = mid - 1n;
    }
  }
  return low;
};

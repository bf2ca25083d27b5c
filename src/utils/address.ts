import { ZeroAddress, getAddress, isAddress } from 'ethers';
import { Address, PoolHandle, SortedPair } from '../types';
import { ValidationError } from '../errors';

export const sameAddress = (a: Address, b: Address): boolean => a.toLowerCase() === b.toLowerCase();

export const isZeroAddress = (address: Address): boolean => sameAddress(address, ZeroAddress);

/**
 * Checksums an address, rejecting anything that is not 20 bytes of hex.
 */
export const normalizeAddress = (value: string, label = 'address'): Address => {
  if (!isAddress(value)) {
    throw new ValidationError(`Invalid ${label}: ${value}`, { [label]: value });
  }
  return getAddress(value);
};

const isPoolHandle = (value: Address): value is PoolHandle => isAddress(value) && !isZeroAddress(value);

export const toPoolHandle = (value: string): PoolHandle => {
  const address = normalizeAddress(value, 'pool');
  if (!isPoolHandle(address)) {
    throw new ValidationError('Pool address must not be the zero address', { pool: value });
  }
  return address;
};

/**
 * Orders two tokens the way a V2 pair stores them: the numerically lower
 * address is token0.
 */
export const sortTokens = (tokenA: Address, tokenB: Address): SortedPair => {
  const a = normalizeAddress(tokenA, 'tokenA');
  const b = normalizeAddress(tokenB, 'tokenB');
  if (sameAddress(a, b)) {
    throw new ValidationError('Identical tokens cannot form a pair', { token: a });
  }
  return BigInt(a) < BigInt(b) ? { slot0: a, slot1: b } : { slot0: b, slot1: a };
};

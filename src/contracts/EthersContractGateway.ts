import { Contract, ContractRunner, ContractTransactionResponse } from 'ethers';
import { Address, Amount, HexData, PoolHandle } from '../types';
import { TransactionError, ValidationError } from '../errors';
import { normalizeAddress } from '../utils/address';
import { logger } from '../utils/logger';
import { UNISWAP_V2_FACTORY_ABI, UNISWAP_V2_PAIR_ABI } from './abis/UniswapV2.abi';
import { ERC20_ABI } from './abis/ERC20.abi';
import { FLASH_RECEIVER_ABI } from './abis/FlashReceiver.abi';
import {
  ContractGateway,
  IERC20,
  IFlashReceiver,
  IUniswapV2Factory,
  IUniswapV2Pair,
  PairReserves,
  TransactionOutcome,
} from './interfaces';

const readAddress = (value: unknown, label: string): Address => {
  if (typeof value !== 'string') {
    throw new ValidationError(`Contract returned a non-address for ${label}`, { [label]: String(value) });
  }
  return normalizeAddress(value, label);
};

const readBigInt = (value: unknown, label: string): bigint => {
  if (typeof value !== 'bigint') {
    throw new ValidationError(`Contract returned a non-integer for ${label}`, { [label]: String(value) });
  }
  return value;
};

const waitForOutcome = async (tx: ContractTransactionResponse, label: string): Promise<TransactionOutcome> => {
  const receipt = await tx.wait();
  if (!receipt || receipt.status !== 1) {
    throw new TransactionError(`${label} reverted`, tx.hash);
  }
  return { hash: tx.hash, gasUsed: receipt.gasUsed };
};

class EthersUniswapV2Factory implements IUniswapV2Factory {
  private readonly contract: Contract;

  constructor(readonly address: Address, runner: ContractRunner) {
    this.contract = new Contract(address, UNISWAP_V2_FACTORY_ABI, runner);
  }

  async getPair(tokenA: Address, tokenB: Address): Promise<Address> {
    const pair: unknown = await this.contract.getFunction('getPair').staticCall(tokenA, tokenB);
    return readAddress(pair, 'pair');
  }
}

class EthersUniswapV2Pair implements IUniswapV2Pair {
  private readonly contract: Contract;

  constructor(readonly address: PoolHandle, runner: ContractRunner) {
    this.contract = new Contract(address, UNISWAP_V2_PAIR_ABI, runner);
  }

  async token0(): Promise<Address> {
    const token: unknown = await this.contract.getFunction('token0').staticCall();
    return readAddress(token, 'token0');
  }

  async token1(): Promise<Address> {
    const token: unknown = await this.contract.getFunction('token1').staticCall();
    return readAddress(token, 'token1');
  }

  async getReserves(): Promise<PairReserves> {
    const result: unknown = await this.contract.getFunction('getReserves').staticCall();
    if (!Array.isArray(result) || result.length < 3) {
      throw new ValidationError('Unexpected getReserves result', { pool: this.address });
    }
    return {
      reserve0: readBigInt(result[0], 'reserve0'),
      reserve1: readBigInt(result[1], 'reserve1'),
      blockTimestampLast: Number(readBigInt(result[2], 'blockTimestampLast')),
    };
  }

  async swap(amount0Out: Amount, amount1Out: Amount, to: Address, data: HexData): Promise<TransactionOutcome> {
    const tx = await this.contract.getFunction('swap').send(amount0Out, amount1Out, to, data);
    return waitForOutcome(tx, 'swap');
  }
}

class EthersERC20 implements IERC20 {
  private readonly contract: Contract;

  constructor(readonly address: Address, runner: ContractRunner) {
    this.contract = new Contract(address, ERC20_ABI, runner);
  }

  async balanceOf(owner: Address): Promise<Amount> {
    const balance: unknown = await this.contract.getFunction('balanceOf').staticCall(owner);
    return readBigInt(balance, 'balance');
  }

  async transfer(to: Address, amount: Amount): Promise<boolean> {
    const tx = await this.contract.getFunction('transfer').send(to, amount);
    const receipt = await tx.wait();
    return receipt?.status === 1;
  }
}

class EthersFlashReceiver implements IFlashReceiver {
  private readonly contract: Contract;

  constructor(readonly address: Address, runner: ContractRunner) {
    this.contract = new Contract(address, FLASH_RECEIVER_ABI, runner);
  }

  async flashBorrow(pool: PoolHandle, amount0Out: Amount, amount1Out: Amount, data: HexData): Promise<TransactionOutcome> {
    const tx = await this.contract.getFunction('flashBorrow').send(pool, amount0Out, amount1Out, data);
    logger.debug('flashBorrow sent', { hash: tx.hash, pool });
    return waitForOutcome(tx, 'flashBorrow');
  }
}

/**
 * ContractGateway backed by ethers v6 contracts. Read calls work with any
 * runner that can `call`; transactions need a signer.
 */
export class EthersContractGateway implements ContractGateway {
  constructor(private readonly runner: ContractRunner) {}

  factory(address: Address): IUniswapV2Factory {
    return new EthersUniswapV2Factory(normalizeAddress(address, 'factory'), this.runner);
  }

  pair(pool: PoolHandle): IUniswapV2Pair {
    return new EthersUniswapV2Pair(pool, this.runner);
  }

  token(address: Address): IERC20 {
    return new EthersERC20(normalizeAddress(address, 'token'), this.runner);
  }

  receiver(address: Address): IFlashReceiver {
    return new EthersFlashReceiver(normalizeAddress(address, 'receiver'), this.runner);
  }
}

export default EthersContractGateway;

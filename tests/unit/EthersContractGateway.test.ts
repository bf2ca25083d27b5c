import { beforeEach, describe, expect, test } from '@jest/globals';
import { Interface } from 'ethers';
import { EthersContractGateway } from '../../src/contracts/EthersContractGateway';
import { ERC20_ABI } from '../../src/contracts/abis/ERC20.abi';
import { UNISWAP_V2_FACTORY_ABI, UNISWAP_V2_PAIR_ABI } from '../../src/contracts/abis/UniswapV2.abi';
import { createDefaultRegistry } from '../../src/config/networks';
import LoanRequestBuilder from '../../src/services/flashloan/LoanRequestBuilder';
import PairResolver from '../../src/services/flashloan/PairResolver';
import { Network } from '../../src/types';
import { toPoolHandle } from '../../src/utils/address';
import { MockProvider } from '../mocks/MockProvider';
import { TEST_ADDRESSES, TEST_TOKENS, ZERO_ADDRESS } from '../utils';

const factoryInterface = new Interface(UNISWAP_V2_FACTORY_ABI);
const pairInterface = new Interface(UNISWAP_V2_PAIR_ABI);
const erc20Interface = new Interface(ERC20_ABI);

describe('EthersContractGateway', () => {
  let provider: MockProvider;
  let gateway: EthersContractGateway;
  const pool = toPoolHandle(TEST_ADDRESSES.usdcWethPair);

  const mockGetPair = (tokenA: string, tokenB: string, pair: string): void => {
    provider.mockCall(
      TEST_ADDRESSES.factory,
      factoryInterface.encodeFunctionData('getPair', [tokenA, tokenB]),
      factoryInterface.encodeFunctionResult('getPair', [pair]),
    );
  };

  const mockTokens = (token0: string, token1: string): void => {
    provider.mockCall(pool, pairInterface.encodeFunctionData('token0'), pairInterface.encodeFunctionResult('token0', [token0]));
    provider.mockCall(pool, pairInterface.encodeFunctionData('token1'), pairInterface.encodeFunctionResult('token1', [token1]));
  };

  beforeEach(() => {
    provider = new MockProvider();
    gateway = new EthersContractGateway(provider);
  });

  test('reads a pair address from the factory', async () => {
    mockGetPair(TEST_TOKENS.USDC, TEST_TOKENS.WETH, TEST_ADDRESSES.usdcWethPair);

    await expect(gateway.factory(TEST_ADDRESSES.factory).getPair(TEST_TOKENS.USDC, TEST_TOKENS.WETH))
      .resolves.toBe(TEST_ADDRESSES.usdcWethPair);
  });

  test('passes the zero address through for a missing pair', async () => {
    mockGetPair(TEST_TOKENS.WBTC, TEST_TOKENS.WETH, ZERO_ADDRESS);

    await expect(gateway.factory(TEST_ADDRESSES.factory).getPair(TEST_TOKENS.WBTC, TEST_TOKENS.WETH))
      .resolves.toBe(ZERO_ADDRESS);
  });

  test('reads the pair tokens as checksummed addresses', async () => {
    mockTokens(TEST_TOKENS.USDC.toLowerCase(), TEST_TOKENS.WETH.toLowerCase());

    const pair = gateway.pair(pool);
    await expect(pair.token0()).resolves.toBe(TEST_TOKENS.USDC);
    await expect(pair.token1()).resolves.toBe(TEST_TOKENS.WETH);
  });

  test('reads reserves', async () => {
    provider.mockCall(
      pool,
      pairInterface.encodeFunctionData('getReserves'),
      pairInterface.encodeFunctionResult('getReserves', [1_000n, 2_000n, 1_700_000_000]),
    );

    await expect(gateway.pair(pool).getReserves()).resolves.toEqual({
      reserve0: 1_000n,
      reserve1: 2_000n,
      blockTimestampLast: 1_700_000_000,
    });
  });

  test('reads token balances', async () => {
    provider.mockCall(
      TEST_TOKENS.USDC,
      erc20Interface.encodeFunctionData('balanceOf', [TEST_ADDRESSES.receiver]),
      erc20Interface.encodeFunctionResult('balanceOf', [3_010n]),
    );

    await expect(gateway.token(TEST_TOKENS.USDC).balanceOf(TEST_ADDRESSES.receiver)).resolves.toBe(3_010n);
  });

  test('surfaces unmocked calls as errors', async () => {
    await expect(gateway.pair(pool).token0()).rejects.toThrow('Call result not mocked');
  });

  test('drives the loan builder over eth_call', async () => {
    mockGetPair(TEST_TOKENS.USDC, TEST_TOKENS.WETH, TEST_ADDRESSES.usdcWethPair);
    mockTokens(TEST_TOKENS.USDC, TEST_TOKENS.WETH);
    const builder = new LoanRequestBuilder(
      new PairResolver(createDefaultRegistry(), gateway),
      gateway,
      TEST_ADDRESSES.receiver,
    );

    const call = await builder.buildLoan(Network.MAINNET, undefined, TEST_TOKENS.USDC, 1_000_000n);

    expect(call.pool).toBe(TEST_ADDRESSES.usdcWethPair);
    expect([call.amount0Out, call.amount1Out]).toEqual([1_000_000n, 0n]);
    expect(provider.getCallHistory()).toHaveLength(3);
  });
});

import { beforeEach, describe, expect, test } from '@jest/globals';
import { createFlashKit, FlashKit } from '../../src/kit';
import { Network } from '../../src/types';
import { InsufficientLiquidityError, PoolNotFoundError } from '../../src/errors';
import { decodeLoanData } from '../../src/services/flashloan';
import {
  MockEnvironment,
  TEST_ADDRESSES,
  TEST_TOKENS,
  USDC_WETH_RESERVES,
  createMockEnvironment,
} from '../utils';

describe('FlashLoanService', () => {
  let env: MockEnvironment;

  const kitFor = (dryRun: boolean): FlashKit => createFlashKit({
    gateway: env.gateway,
    receiver: TEST_ADDRESSES.receiver,
    dryRun,
  });

  beforeEach(() => {
    env = createMockEnvironment();
  });

  describe('plan', () => {
    test('returns the borrow call for the request', async () => {
      const { service } = kitFor(true);
      const call = await service.plan({ network: Network.MAINNET, asset: TEST_TOKENS.USDC, amount: 1_000_000n });

      expect(call.pool).toBe(TEST_ADDRESSES.usdcWethPair);
      expect([call.amount0Out, call.amount1Out]).toEqual([1_000_000n, 0n]);
    });

    test('rejects a loan as large as the reserve', async () => {
      const { service } = kitFor(true);
      await expect(service.plan({
        network: Network.MAINNET,
        asset: TEST_TOKENS.USDC,
        amount: USDC_WETH_RESERVES.reserve0,
      })).rejects.toThrow(InsufficientLiquidityError);
    });

    test('passes extra params through to the callback data', async () => {
      const { service } = kitFor(true);
      const call = await service.plan({
        network: Network.MAINNET,
        asset: TEST_TOKENS.USDC,
        amount: 5n,
        extraParams: '0xabcd',
      });
      expect(decodeLoanData(call.callbackData).extraParams).toBe('0xabcd');
    });
  });

  describe('execute', () => {
    test('does not touch the chain in dry-run mode', async () => {
      const { service } = kitFor(true);
      const result = await service.execute({ network: Network.MAINNET, asset: TEST_TOKENS.USDC, amount: 1_000_000n });

      expect(result.dryRun).toBe(true);
      expect(result.txHash).toBeUndefined();
      expect(result.expectedRepayment).toBe(1_003_010n);
      expect(env.pairs.usdcWeth.getSwapHistory()).toHaveLength(0);
    });

    test('submits the loan through the receiver', async () => {
      const kit = kitFor(false);
      env.receiver.onCallback((sender, calldata, context) => kit.callbackHandler.onUniswapV2Call(sender, calldata, context));
      env.tokens.USDC.setBalance(TEST_ADDRESSES.receiver, 3010n);

      const result = await kit.service.execute({ network: Network.MAINNET, asset: TEST_TOKENS.USDC, amount: 1_000_000n });

      expect(result.dryRun).toBe(false);
      expect(result.txHash).toMatch(/^0x[0-9a-f]{64}$/);
      expect(env.pairs.usdcWeth.getSwapHistory()).toHaveLength(1);
      expect(env.receiver.getContexts()).toEqual([
        { pool: TEST_ADDRESSES.usdcWethPair, requestedAsset: TEST_TOKENS.USDC, amount: 1_000_000n },
      ]);
    });

    test('rethrows planning failures', async () => {
      const { service } = kitFor(false);
      await expect(service.execute({ network: Network.MAINNET, asset: TEST_TOKENS.WBTC, amount: 1n }))
        .rejects.toThrow(PoolNotFoundError);
    });

    test('rethrows failures raised inside the callback', async () => {
      const kit = kitFor(false);
      env.receiver.onCallback((sender, calldata, context) => kit.callbackHandler.onUniswapV2Call(sender, calldata, context));
      // the receiver holds no USDC to pay the fee with

      await expect(kit.service.execute({ network: Network.MAINNET, asset: TEST_TOKENS.USDC, amount: 1_000_000n }))
        .rejects.toThrow(`Repayment of ${TEST_TOKENS.USDC} failed: Insufficient balance`);
      expect(env.pairs.usdcWeth.getSwapHistory()).toHaveLength(0);
    });
  });
});

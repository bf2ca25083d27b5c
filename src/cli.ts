#!/usr/bin/env node
import { Wallet, formatUnits, parseUnits } from 'ethers';
import { createProvider, loadConfig } from './config';
import { BASE_NETWORK, NetworkRegistry, createDefaultRegistry } from './config/networks';
import { resolveTokenAlias } from './config/tokens';
import { EthersContractGateway } from './contracts/EthersContractGateway';
import { ContractGateway } from './contracts/interfaces';
import { createFlashKit } from './kit';
import { checkedAdd, maxBorrowForRepayment } from './services/flashloan';
import { Address, Amount, BorrowRequest, FlashKitConfig, Network } from './types';
import { errorMessage } from './errors';
import { normalizeAddress, toPoolHandle } from './utils/address';
import { logger } from './utils/logger';

const USAGE = 'Usage: v2-flash <asset> <amount> [pool] [--decimals <n>]';

interface CliArgs {
  asset: string;
  amount: string;
  pool?: string;
  decimals: number;
}

export const parseArgs = (argv: string[]): CliArgs => {
  const positional: string[] = [];
  let decimals = 0;
  for (let i = 0; i < argv.length; i += 1) {
    if (argv[i] === '--decimals') {
      decimals = Number(argv[i + 1]);
      if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
        throw new Error('--decimals must be an integer between 0 and 36');
      }
      i += 1;
    } else {
      positional.push(argv[i]);
    }
  }
  if (positional.length < 2 || positional.length > 3) {
    throw new Error(USAGE);
  }
  const [asset, amount, pool] = positional;
  return { asset, amount, pool, decimals };
};

export const toBorrowRequest = (args: CliArgs, config: Pick<FlashKitConfig, 'network'>): BorrowRequest => ({
  network: config.network,
  asset: normalizeAddress(resolveTokenAlias(config.network, args.asset), 'asset'),
  amount: parseUnits(args.amount, args.decimals),
  pool: args.pool ? toPoolHandle(args.pool) : undefined,
});

/**
 * Mainnet is always present; Base is added when it is the configured network.
 */
export const registryFor = (network: Network): NetworkRegistry => {
  const registry = createDefaultRegistry();
  if (network === Network.BASE) {
    registry.register(BASE_NETWORK);
  }
  return registry;
};

/**
 * Largest loan of the requested asset the receiver could repay once the
 * borrowed amount has arrived. Below the requested amount means the
 * receiver cannot cover the fee.
 */
export const repaymentHeadroom = async (
  gateway: ContractGateway,
  receiver: Address,
  request: BorrowRequest,
): Promise<Amount> => {
  const balance = await gateway.token(request.asset).balanceOf(receiver);
  return maxBorrowForRepayment(checkedAdd(balance, request.amount));
};

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  logger.level = config.logLevel;

  const provider = createProvider(config.rpcUrl);
  const runner = config.privateKey ? new Wallet(config.privateKey, provider) : provider;
  const gateway = new EthersContractGateway(runner);
  const kit = createFlashKit({
    gateway,
    receiver: config.flashReceiverContract,
    dryRun: config.dryRun,
    registry: registryFor(config.network),
  });

  const request = toBorrowRequest(args, config);
  const headroom = await repaymentHeadroom(gateway, config.flashReceiverContract, request);
  const result = await kit.service.execute(request);

  logger.info('Flash loan result', {
    pool: result.call.pool,
    amount0Out: formatUnits(result.call.amount0Out, args.decimals),
    amount1Out: formatUnits(result.call.amount1Out, args.decimals),
    repayment: formatUnits(result.expectedRepayment, args.decimals),
    headroom: formatUnits(headroom, args.decimals),
    feeCovered: headroom >= request.amount,
    dryRun: result.dryRun,
    txHash: result.txHash,
  });
}

if (require.main === module) {
  main().catch((err) => {
    logger.error('Fatal error', { error: errorMessage(err) });
    process.exit(1);
  });
}

import dotenv from 'dotenv';
import { JsonRpcProvider } from 'ethers';
import { FlashKitConfig, LogLevel, Network } from '../types';
import { normalizeAddress } from '../utils/address';

dotenv.config();

export const parseBoolean = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
};

export const requiredString = (name: string, value: string | undefined): string => {
  if (!value) {
    throw new Error(`Missing required env: ${name}`);
  }
  return value;
};

export const validatePrivateKey = (pk: string): void => {
  const hexRegex = /^[0-9a-fA-F]{64}$/;
  if (!hexRegex.test(pk)) {
    throw new Error('PRIVATE_KEY must be 64 hex characters without 0x prefix');
  }
};

const isNetwork = (value: string): value is Network => Object.values<string>(Network).includes(value);

export const parseNetwork = (value: string | undefined): Network => {
  const network = (value || Network.MAINNET).toLowerCase();
  if (!isNetwork(network)) {
    throw new Error(`NETWORK must be one of: ${Object.values(Network).join(', ')}`);
  }
  return network;
};

const isLogLevel = (value: string): value is LogLevel => Object.values<string>(LogLevel).includes(value);

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const level = (value || LogLevel.INFO).toLowerCase();
  return isLogLevel(level) ? level : LogLevel.INFO;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): FlashKitConfig => {
  const rpcUrl = requiredString('RPC_URL', env.RPC_URL);
  const network = parseNetwork(env.NETWORK);
  const flashReceiverContract = normalizeAddress(
    requiredString('FLASH_RECEIVER_CONTRACT', env.FLASH_RECEIVER_CONTRACT),
    'FLASH_RECEIVER_CONTRACT',
  );

  const privateKey = env.PRIVATE_KEY || undefined;
  if (privateKey !== undefined) {
    validatePrivateKey(privateKey);
  }

  // Without a key nothing can be signed, so the run is a plan only
  const dryRun = parseBoolean(env.DRY_RUN, false) || privateKey === undefined;

  return {
    rpcUrl,
    network,
    flashReceiverContract,
    privateKey,
    dryRun,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
};

export const createProvider = (rpcUrl: string): JsonRpcProvider => new JsonRpcProvider(rpcUrl);

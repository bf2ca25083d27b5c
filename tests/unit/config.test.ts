import { describe, expect, test } from '@jest/globals';
import { loadConfig, parseBoolean, parseLogLevel, parseNetwork } from '../../src/config';
import { LogLevel, Network } from '../../src/types';
import { ValidationError } from '../../src/errors';
import { TEST_ADDRESSES } from '../utils';

const baseEnv = {
  RPC_URL: 'http://127.0.0.1:8545',
  FLASH_RECEIVER_CONTRACT: TEST_ADDRESSES.receiver,
};

describe('config', () => {
  test('falls back to a dry run without a private key', () => {
    const config = loadConfig({ ...baseEnv });

    expect(config).toEqual({
      rpcUrl: 'http://127.0.0.1:8545',
      network: Network.MAINNET,
      flashReceiverContract: TEST_ADDRESSES.receiver,
      privateKey: undefined,
      dryRun: true,
      logLevel: LogLevel.INFO,
    });
  });

  test('submits when a key is present and DRY_RUN is unset', () => {
    const config = loadConfig({ ...baseEnv, PRIVATE_KEY: 'ab'.repeat(32), LOG_LEVEL: 'DEBUG' });

    expect(config.dryRun).toBe(false);
    expect(config.privateKey).toBe('ab'.repeat(32));
    expect(config.logLevel).toBe(LogLevel.DEBUG);
  });

  test('DRY_RUN=true wins over a private key', () => {
    expect(loadConfig({ ...baseEnv, PRIVATE_KEY: 'ab'.repeat(32), DRY_RUN: 'true' }).dryRun).toBe(true);
  });

  test('rejects a malformed private key', () => {
    expect(() => loadConfig({ ...baseEnv, PRIVATE_KEY: `0x${'ab'.repeat(32)}` }))
      .toThrow('PRIVATE_KEY must be 64 hex characters without 0x prefix');
  });

  test('requires RPC_URL', () => {
    expect(() => loadConfig({ FLASH_RECEIVER_CONTRACT: TEST_ADDRESSES.receiver }))
      .toThrow('Missing required env: RPC_URL');
  });

  test('rejects a receiver that is not an address', () => {
    expect(() => loadConfig({ ...baseEnv, FLASH_RECEIVER_CONTRACT: '0x1234' })).toThrow(ValidationError);
  });

  test('parses the network name case-insensitively', () => {
    expect(parseNetwork('BASE')).toBe(Network.BASE);
    expect(parseNetwork(undefined)).toBe(Network.MAINNET);
    expect(() => parseNetwork('goerli')).toThrow('NETWORK must be one of: mainnet, base');
  });

  test('parses booleans and log levels with defaults', () => {
    expect(parseBoolean(undefined, true)).toBe(true);
    expect(parseBoolean('TRUE', false)).toBe(true);
    expect(parseBoolean('yes', true)).toBe(false);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
  });
});

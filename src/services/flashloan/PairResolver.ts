import { Address, Network, NetworkConfig, PoolHandle, ResolvedPair } from '../../types';
import { ContractGateway } from '../../contracts/interfaces';
import { NetworkRegistry } from '../../config/networks';
import { PoolNotFoundError } from '../../errors';
import { isZeroAddress, normalizeAddress, sameAddress, sortTokens, toPoolHandle } from '../../utils/address';
import { logger } from '../../utils/logger';

/**
 * Maps a requested asset to the V2 pair it will be borrowed from.
 */
class PairResolver {
  constructor(
    private readonly registry: NetworkRegistry,
    private readonly gateway: ContractGateway,
  ) {}

  /**
   * Counterparty used when the caller names no pool. Pairing WETH with
   * itself is impossible, so a WETH loan is taken from the reference stable pair.
   */
  static counterpartyFor(config: NetworkConfig, asset: Address): Address {
    return sameAddress(asset, config.wrappedNativeAsset) ? config.referenceStable : config.wrappedNativeAsset;
  }

  /**
   * An explicit pool is trusted as given and returned without touching the factory.
   */
  async resolve(network: Network, explicitPool: PoolHandle | undefined, asset: Address): Promise<PoolHandle> {
    if (explicitPool) {
      logger.debug('Using explicit flash loan pool', { network, pool: explicitPool, asset });
      return explicitPool;
    }
    const { pool } = await this.resolvePair(network, asset);
    return pool;
  }

  async resolvePair(network: Network, asset: Address): Promise<ResolvedPair> {
    const config = this.registry.get(network);
    const token = normalizeAddress(asset, 'asset');
    const counterparty = PairResolver.counterpartyFor(config, token);
    const { slot0, slot1 } = sortTokens(counterparty, token);

    const factory = this.gateway.factory(config.factory);
    const pair = await factory.getPair(slot0, slot1);
    if (isZeroAddress(pair)) {
      throw new PoolNotFoundError(slot0, slot1);
    }

    const pool = toPoolHandle(pair);
    logger.debug('Resolved V2 pair', { network, pool, slot0, slot1 });
    return { pool, slot0, slot1 };
  }
}

export default PairResolver;

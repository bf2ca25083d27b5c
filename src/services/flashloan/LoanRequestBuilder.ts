import { AbiCoder, isHexString } from 'ethers';
import { Address, Amount, BorrowCall, HexData, LoanContext, Network, PoolHandle } from '../../types';
import { ContractGateway } from '../../contracts/interfaces';
import { AssetNotInPoolError, MalformedPayloadError, ValidationError, errorMessage } from '../../errors';
import { normalizeAddress, sameAddress } from '../../utils/address';
import { logger } from '../../utils/logger';
import { assertUint256 } from './FeeCalculator';
import PairResolver from './PairResolver';

const LOAN_DATA_TYPES = ['address', 'uint256', 'bytes'];

export interface LoanData {
  asset: Address;
  amount: Amount;
  extraParams: HexData;
}

/**
 * Data forwarded through `swap`. A pair only calls back when this is
 * non-empty, so it always carries at least the asset and amount.
 */
export const encodeLoanData = (asset: Address, amount: Amount, extraParams: HexData = '0x'): HexData => {
  if (!isHexString(extraParams, true)) {
    throw new ValidationError('extraParams must be 0x-prefixed whole bytes of hex', { extraParams });
  }
  return AbiCoder.defaultAbiCoder().encode(LOAN_DATA_TYPES, [asset, amount, extraParams]);
};

export const decodeLoanData = (data: HexData): LoanData => {
  try {
    const [asset, amount, extraParams] = AbiCoder.defaultAbiCoder().decode(LOAN_DATA_TYPES, data);
    return { asset: normalizeAddress(String(asset)), amount: BigInt(amount), extraParams: String(extraParams) };
  } catch (error) {
    throw new MalformedPayloadError('Loan data could not be decoded', { reason: errorMessage(error) });
  }
};

class LoanRequestBuilder {
  constructor(
    private readonly resolver: PairResolver,
    private readonly gateway: ContractGateway,
    private readonly recipient: Address,
  ) {}

  async buildLoan(
    network: Network,
    explicitPool: PoolHandle | undefined,
    asset: Address,
    amount: Amount,
    extraParams?: HexData,
  ): Promise<BorrowCall> {
    assertUint256(amount);
    if (amount === 0n) {
      throw new ValidationError('Flash loan amount must be greater than 0');
    }
    const requestedAsset = normalizeAddress(asset, 'asset');

    const pool = await this.resolver.resolve(network, explicitPool, requestedAsset);
    const pair = this.gateway.pair(pool);
    const [slot0, slot1] = await Promise.all([pair.token0(), pair.token1()]);

    let amount0Out: Amount;
    let amount1Out: Amount;
    if (sameAddress(slot0, requestedAsset)) {
      amount0Out = amount;
      amount1Out = 0n;
    } else if (sameAddress(slot1, requestedAsset)) {
      amount0Out = 0n;
      amount1Out = amount;
    } else {
      throw new AssetNotInPoolError(pool, requestedAsset);
    }

    const context: LoanContext = Object.freeze({ pool, requestedAsset, amount });
    const call: BorrowCall = {
      pool,
      amount0Out,
      amount1Out,
      recipient: this.recipient,
      callbackData: encodeLoanData(requestedAsset, amount, extraParams),
      context,
    };

    logger.debug('Borrow call built', {
      network,
      pool,
      slot0,
      slot1,
      amount0Out: amount0Out.toString(),
      amount1Out: amount1Out.toString(),
    });
    return call;
  }
}

export default LoanRequestBuilder;

import { AbiCoder, Interface, dataLength, dataSlice, isHexString } from 'ethers';
import { Address, Amount, CallbackPayload, HexData, RepayTransfer, SettlementContext, Slot } from '../../types';
import { ContractGateway } from '../../contracts/interfaces';
import { UNISWAP_V2_CALLEE_ABI } from '../../contracts/abis/UniswapV2.abi';
import { InvalidCallbackError, MalformedPayloadError, PoolMismatchError, errorMessage } from '../../errors';
import { normalizeAddress, sameAddress } from '../../utils/address';
import { logger } from '../../utils/logger';
import { checkedAdd, flashFee } from './FeeCalculator';

const calleeInterface = new Interface(UNISWAP_V2_CALLEE_ABI);

const CALLBACK_FRAGMENT = calleeInterface.getFunction('uniswapV2Call');

if (!CALLBACK_FRAGMENT) {
  throw new Error('uniswapV2Call missing from callee ABI');
}

export const UNISWAP_V2_CALL_SELECTOR = CALLBACK_FRAGMENT.selector;

const PAYLOAD_TYPES = ['address', 'uint256', 'uint256', 'bytes'];

// selector + four head words + bytes length word
const MIN_CALLDATA_LENGTH = 4 + 32 * 5;

// The bytes argument starts right after the four head words
const EXTRA_PARAMS_OFFSET = 32n * 4n;

const paddedLength = (length: number): number => Math.ceil(length / 32) * 32;

export const hasCallbackSelector = (calldata: HexData): boolean => (
  isHexString(calldata, true) && dataLength(calldata) >= 4 && dataSlice(calldata, 0, 4) === UNISWAP_V2_CALL_SELECTOR
);

export const encodeCallbackCalldata = (payload: CallbackPayload): HexData => calleeInterface.encodeFunctionData(
  'uniswapV2Call',
  [payload.initiator, payload.amount0, payload.amount1, payload.extraParams],
);

/**
 * Decodes `uniswapV2Call` calldata. Only the argument words are checked
 * here; the selector is checked by `assertCallbackSelector`.
 */
export const decodeCallbackPayload = (calldata: HexData): CallbackPayload => {
  if (!isHexString(calldata, true) || dataLength(calldata) < MIN_CALLDATA_LENGTH) {
    throw new MalformedPayloadError('Callback payload too short', {
      length: isHexString(calldata, true) ? dataLength(calldata) : null,
    });
  }
  let payload: CallbackPayload;
  try {
    const [initiator, amount0, amount1, extraParams] = AbiCoder.defaultAbiCoder().decode(
      PAYLOAD_TYPES,
      dataSlice(calldata, 4),
    );
    payload = {
      initiator: normalizeAddress(String(initiator), 'initiator'),
      amount0: BigInt(amount0),
      amount1: BigInt(amount1),
      extraParams: String(extraParams),
    };
  } catch (error) {
    throw new MalformedPayloadError('Callback payload could not be decoded', { reason: errorMessage(error) });
  }

  // AbiCoder ignores trailing bytes, so the layout is checked word for word
  const offset = BigInt(dataSlice(calldata, 4 + 32 * 3, 4 + 32 * 4));
  const expectedLength = MIN_CALLDATA_LENGTH + paddedLength(dataLength(payload.extraParams));
  if (offset !== EXTRA_PARAMS_OFFSET || dataLength(calldata) !== expectedLength) {
    throw new MalformedPayloadError('Callback payload has an unexpected layout', {
      offset: offset.toString(),
      length: dataLength(calldata),
      expectedLength,
    });
  }
  return payload;
};

export const assertCallbackSelector = (calldata: HexData): void => {
  if (!hasCallbackSelector(calldata)) {
    throw new InvalidCallbackError('Callback selector does not match uniswapV2Call', {
      expected: UNISWAP_V2_CALL_SELECTOR,
      actual: isHexString(calldata, true) && dataLength(calldata) >= 4 ? dataSlice(calldata, 0, 4) : calldata,
    });
  }
};

/**
 * Turns the pair's callback into the transfers that repay it.
 */
class CallbackSettler {
  constructor(
    private readonly gateway: ContractGateway,
    private readonly receiver?: Address,
  ) {}

  async settle(calldata: HexData, { sender, context }: SettlementContext): Promise<RepayTransfer[]> {
    assertCallbackSelector(calldata);
    const payload = decodeCallbackPayload(calldata);

    if (!sameAddress(sender, context.pool)) {
      throw new PoolMismatchError(context.pool, sender);
    }
    if (this.receiver && !sameAddress(payload.initiator, this.receiver)) {
      throw new InvalidCallbackError('Flash loan was not initiated by the receiver', {
        initiator: payload.initiator,
        receiver: this.receiver,
      });
    }

    const pair = this.gateway.pair(context.pool);
    const borrowed: Array<[Slot, Amount]> = [
      ['slot1', payload.amount1],
      ['slot0', payload.amount0],
    ];

    const transfers: RepayTransfer[] = [];
    for (const [slot, amount] of borrowed) {
      if (amount === 0n) continue;
      const asset = slot === 'slot0' ? await pair.token0() : await pair.token1();
      const fee = flashFee(amount);
      transfers.push({
        slot,
        asset,
        to: context.pool,
        borrowed: amount,
        fee,
        amount: checkedAdd(amount, fee),
      });
    }

    logger.debug('Flash loan settlement computed', {
      pool: context.pool,
      transfers: transfers.map((t) => ({ slot: t.slot, asset: t.asset, amount: t.amount.toString() })),
    });
    return transfers;
  }
}

export default CallbackSettler;

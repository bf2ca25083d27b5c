import { Address, HexData, LoanContext, RepayTransfer } from '../../types';
import CallbackSettler from './CallbackSettler';
import RepaymentExecutor from './RepaymentExecutor';

/**
 * Receiver-side half of the loan: what the borrowing contract does inside
 * `uniswapV2Call`. Lets a pair running in process drive the full cycle.
 */
class FlashCallbackHandler {
  constructor(
    private readonly settler: CallbackSettler,
    private readonly executor: RepaymentExecutor,
  ) {}

  async onUniswapV2Call(sender: Address, calldata: HexData, context: LoanContext): Promise<RepayTransfer[]> {
    const transfers = await this.settler.settle(calldata, { sender, context });
    await this.executor.execute(transfers);
    return transfers;
  }
}

export default FlashCallbackHandler;

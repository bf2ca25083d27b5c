import { BorrowCall, BorrowRequest, FlashKitConfig, FlashLoanResult } from '../../types';
import { ContractGateway } from '../../contracts/interfaces';
import { InsufficientLiquidityError, errorMessage } from '../../errors';
import { logLoanFailure, logLoanPlanned, logLoanSubmitted } from '../../utils/logger';
import { repaymentAmount } from './FeeCalculator';
import LoanRequestBuilder from './LoanRequestBuilder';

/**
 * Off-chain caller of the borrowing contract: plans the `swap` and asks the
 * receiver to perform it.
 */
class FlashLoanService {
  constructor(
    private readonly builder: LoanRequestBuilder,
    private readonly gateway: ContractGateway,
    private readonly config: Pick<FlashKitConfig, 'flashReceiverContract' | 'dryRun'>,
  ) {}

  async plan(request: BorrowRequest): Promise<BorrowCall> {
    const call = await this.builder.buildLoan(
      request.network,
      request.pool,
      request.asset,
      request.amount,
      request.extraParams,
    );

    // A V2 pair refuses to send out its whole reserve
    const { reserve0, reserve1 } = await this.gateway.pair(call.pool).getReserves();
    const [requested, reserve] = call.amount0Out > 0n ? [call.amount0Out, reserve0] : [call.amount1Out, reserve1];
    if (requested >= reserve) {
      throw new InsufficientLiquidityError(call.pool, requested, reserve);
    }

    logLoanPlanned({
      network: request.network,
      pool: call.pool,
      asset: call.context.requestedAsset,
      amount0Out: call.amount0Out.toString(),
      amount1Out: call.amount1Out.toString(),
      repayment: repaymentAmount(request.amount).toString(),
    });
    return call;
  }

  async execute(request: BorrowRequest): Promise<FlashLoanResult> {
    try {
      const call = await this.plan(request);
      const expectedRepayment = repaymentAmount(request.amount);

      if (this.config.dryRun) {
        return { call, expectedRepayment, dryRun: true, timestamp: Date.now() };
      }

      const receiver = this.gateway.receiver(this.config.flashReceiverContract);
      const outcome = await receiver.flashBorrow(call.pool, call.amount0Out, call.amount1Out, call.callbackData);

      logLoanSubmitted({ pool: call.pool, txHash: outcome.hash, gasUsed: outcome.gasUsed?.toString() });
      return {
        call,
        expectedRepayment,
        dryRun: false,
        txHash: outcome.hash,
        gasUsed: outcome.gasUsed,
        timestamp: Date.now(),
      };
    } catch (error) {
      logLoanFailure({ asset: request.asset, amount: request.amount.toString(), error: errorMessage(error) });
      throw error;
    }
  }
}

export default FlashLoanService;

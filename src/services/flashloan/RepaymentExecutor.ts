import { RepayTransfer } from '../../types';
import { ContractGateway } from '../../contracts/interfaces';
import { SettlementError, errorMessage } from '../../errors';
import { logger } from '../../utils/logger';

/**
 * Pays the pair back. The first failed transfer aborts the whole
 * repayment; the surrounding transaction is expected to revert.
 */
class RepaymentExecutor {
  constructor(private readonly gateway: ContractGateway) {}

  async execute(transfers: RepayTransfer[]): Promise<void> {
    for (const transfer of transfers) {
      const token = this.gateway.token(transfer.asset);
      let ok: boolean;
      try {
        ok = await token.transfer(transfer.to, transfer.amount);
      } catch (error) {
        logger.error('Repayment transfer threw', { asset: transfer.asset, error: errorMessage(error) });
        throw new SettlementError(`Repayment of ${transfer.asset} failed: ${errorMessage(error)}`, {
          asset: transfer.asset,
          amount: transfer.amount.toString(),
        });
      }
      if (!ok) {
        throw new SettlementError(`Repayment of ${transfer.asset} was rejected`, {
          asset: transfer.asset,
          amount: transfer.amount.toString(),
        });
      }
      logger.debug('Repayment transferred', {
        asset: transfer.asset,
        to: transfer.to,
        amount: transfer.amount.toString(),
      });
    }
  }
}

export default RepaymentExecutor;

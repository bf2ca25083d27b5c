import { Address, FlashKitConfig } from './types';
import { ContractGateway } from './contracts/interfaces';
import { NetworkRegistry, createDefaultRegistry } from './config/networks';
import {
  CallbackSettler,
  FlashCallbackHandler,
  FlashLoanService,
  LoanRequestBuilder,
  PairResolver,
  RepaymentExecutor,
} from './services/flashloan';

export interface FlashKit {
  resolver: PairResolver;
  builder: LoanRequestBuilder;
  settler: CallbackSettler;
  executor: RepaymentExecutor;
  callbackHandler: FlashCallbackHandler;
  service: FlashLoanService;
}

export interface FlashKitOptions {
  gateway: ContractGateway;
  receiver: Address;
  dryRun?: boolean;
  registry?: NetworkRegistry;
}

/**
 * Wires the flash loan services around one gateway and one receiver contract.
 */
export const createFlashKit = ({ gateway, receiver, dryRun = false, registry }: FlashKitOptions): FlashKit => {
  const resolver = new PairResolver(registry ?? createDefaultRegistry(), gateway);
  const builder = new LoanRequestBuilder(resolver, gateway, receiver);
  const settler = new CallbackSettler(gateway, receiver);
  const executor = new RepaymentExecutor(gateway);
  const config: Pick<FlashKitConfig, 'flashReceiverContract' | 'dryRun'> = { flashReceiverContract: receiver, dryRun };

  return {
    resolver,
    builder,
    settler,
    executor,
    callbackHandler: new FlashCallbackHandler(settler, executor),
    service: new FlashLoanService(builder, gateway, config),
  };
};

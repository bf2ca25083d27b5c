export { default as PairResolver } from './PairResolver';
export { default as LoanRequestBuilder, encodeLoanData, decodeLoanData } from './LoanRequestBuilder';
export type { LoanData } from './LoanRequestBuilder';
export {
  default as CallbackSettler,
  UNISWAP_V2_CALL_SELECTOR,
  assertCallbackSelector,
  decodeCallbackPayload,
  encodeCallbackCalldata,
  hasCallbackSelector,
} from './CallbackSettler';
export { default as RepaymentExecutor } from './RepaymentExecutor';
export { default as FlashCallbackHandler } from './FlashCallbackHandler';
export { default as FlashLoanService } from './FlashLoanService';
export * from './FeeCalculator';

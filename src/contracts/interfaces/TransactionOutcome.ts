export interface TransactionOutcome {
  hash: string;
  gasUsed?: bigint;
}

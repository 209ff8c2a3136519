import type { AccountId, FundingAsset } from '../ledger/types';

export interface TransferLeg {
  asset: FundingAsset;
  recipient: AccountId;
  amount: bigint;
}

/**
 * Value-transfer substrate. Every method reports success as a boolean; a
 * thrown error counts as a failure too.
 */
export interface ValueTransfer {
  /** Move `amount` from `from` into custody. */
  pull(asset: FundingAsset, from: AccountId, amount: bigint): Promise<boolean>;
  /** Move `amount` out of custody to `recipient`. */
  transfer(asset: FundingAsset, recipient: AccountId, amount: bigint): Promise<boolean>;
  /** Pay every leg or none of them. */
  transferAll(legs: TransferLeg[]): Promise<boolean>;
}

export interface BalanceEntry {
  account: AccountId;
  asset: FundingAsset;
  amount: bigint;
}

/** Durable home for custody balances. `save` writes absolute amounts atomically. */
export interface BalanceStore {
  load(): Promise<BalanceEntry[]>;
  save(entries: BalanceEntry[]): Promise<void>;
}

import { OperationQueue } from '../ledger/OperationQueue';
import { assetKey, type AccountId, type FundingAsset } from '../ledger/types';
import type { BalanceEntry, BalanceStore, TransferLeg, ValueTransfer } from './types';

export const CUSTODY_ACCOUNT = 'custody';

type Move = {
  asset: FundingAsset;
  from: AccountId;
  to: AccountId;
  amount: bigint;
};

export type CustodyOptions = {
  custodyAccount?: AccountId;
  store?: BalanceStore;
};

/**
 * Account book used as the transfer backend. Custody is an ordinary account;
 * pulls move value into it and transfers move value out. With a store
 * attached, every change is saved before it is applied in memory.
 */
export class CustodyLedger implements ValueTransfer {
  private readonly balances = new Map<string, Map<AccountId, bigint>>();
  private readonly queue = new OperationQueue();
  private readonly custodyAccount: AccountId;
  private readonly store?: BalanceStore;

  constructor(options: CustodyOptions = {}) {
    this.custodyAccount = options.custodyAccount ?? CUSTODY_ACCOUNT;
    this.store = options.store;
  }

  /** Build a ledger over `store` with the balances it already holds. */
  static async open(store: BalanceStore, custodyAccount?: AccountId): Promise<CustodyLedger> {
    const ledger = new CustodyLedger({ store, custodyAccount });
    for (const entry of await store.load()) {
      ledger.book(entry.asset).set(entry.account, entry.amount);
    }
    return ledger;
  }

  balanceOf(asset: FundingAsset, account: AccountId): bigint {
    return this.book(asset).get(account) ?? 0n;
  }

  custodyBalance(asset: FundingAsset): bigint {
    return this.balanceOf(asset, this.custodyAccount);
  }

  /** Seed an in-memory account, e.g. a test contributor's wallet. Use `deposit` when a store is attached. */
  mint(asset: FundingAsset, account: AccountId, amount: bigint): void {
    if (amount <= 0n) throw new Error('mint-amount-invalid');
    if (this.store) throw new Error('mint-unpersisted');
    const book = this.book(asset);
    book.set(account, (book.get(account) ?? 0n) + amount);
  }

  /** Credit value arriving from outside the book. Resolves to the new balance. */
  deposit(asset: FundingAsset, account: AccountId, amount: bigint): Promise<bigint> {
    if (amount <= 0n) return Promise.reject(new Error('deposit-amount-invalid'));
    return this.queue.run(async () => {
      const entry: BalanceEntry = { asset, account, amount: this.balanceOf(asset, account) + amount };
      await this.apply([entry]);
      return entry.amount;
    });
  }

  pull(asset: FundingAsset, from: AccountId, amount: bigint): Promise<boolean> {
    return this.queue.run(() => this.move([{ asset, from, to: this.custodyAccount, amount }]));
  }

  transfer(asset: FundingAsset, recipient: AccountId, amount: bigint): Promise<boolean> {
    return this.queue.run(() => this.move([{ asset, from: this.custodyAccount, to: recipient, amount }]));
  }

  transferAll(legs: TransferLeg[]): Promise<boolean> {
    return this.queue.run(() =>
      this.move(legs.map((leg) => ({ asset: leg.asset, from: this.custodyAccount, to: leg.recipient, amount: leg.amount }))),
    );
  }

  /** Stage every move against running balances; apply all of them or none. */
  private async move(moves: Move[]): Promise<boolean> {
    const staged = new Map<string, BalanceEntry>();
    const current = (asset: FundingAsset, account: AccountId) =>
      staged.get(`${assetKey(asset)}|${account}`)?.amount ?? this.balanceOf(asset, account);
    const stage = (asset: FundingAsset, account: AccountId, amount: bigint) => {
      staged.set(`${assetKey(asset)}|${account}`, { asset, account, amount });
    };

    for (const { asset, from, to, amount } of moves) {
      if (amount <= 0n) return false;
      const available = current(asset, from);
      if (available < amount) return false;
      stage(asset, from, available - amount);
      stage(asset, to, current(asset, to) + amount);
    }
    await this.apply([...staged.values()]);
    return true;
  }

  private async apply(entries: BalanceEntry[]): Promise<void> {
    if (this.store) {
      await this.store.save(entries);
    }
    for (const { asset, account, amount } of entries) {
      this.book(asset).set(account, amount);
    }
  }

  private book(asset: FundingAsset): Map<AccountId, bigint> {
    const key = assetKey(asset);
    let book = this.balances.get(key);
    if (!book) {
      book = new Map();
      this.balances.set(key, book);
    }
    return book;
  }
}

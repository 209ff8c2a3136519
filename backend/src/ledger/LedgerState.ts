import {
  cloneCampaign,
  unreturnedKey,
  type AccountId,
  type CampaignId,
  type CampaignRecord,
  type FundingAsset,
  type LedgerEvent,
  type UnreturnedBalance,
} from './types';

export type PlatformSettings = {
  feeBps: number;
  allowedTokens: string[];
};

/**
 * In-memory ledger: campaign table, ownership index and platform settings.
 * Mutation goes through a {@link LedgerTransaction} so it can be undone.
 */
export class LedgerState {
  readonly campaigns = new Map<CampaignId, CampaignRecord>();
  readonly owners = new Map<AccountId, CampaignId[]>();
  /** Keyed by {@link unreturnedKey}. */
  readonly unreturned = new Map<string, UnreturnedBalance>();
  counter = 0;
  platform: PlatformSettings;

  constructor(platform: PlatformSettings) {
    this.platform = { ...platform, allowedTokens: [...platform.allowedTokens] };
  }

  getCampaign(id: CampaignId): CampaignRecord | undefined {
    return this.campaigns.get(id);
  }

  getOwned(account: AccountId): CampaignId[] {
    return [...(this.owners.get(account) ?? [])];
  }

  getUnreturned(account: AccountId): UnreturnedBalance[] {
    return [...this.unreturned.values()]
      .filter((entry) => entry.account === account && entry.amount > 0n)
      .map((entry) => ({ ...entry, asset: { ...entry.asset } }));
  }
}

export type TransactionChanges = {
  campaignIds: CampaignId[];
  owners: AccountId[];
  unreturned: string[];
  counterChanged: boolean;
  platformChanged: boolean;
};

/**
 * Copy-on-first-touch transaction over {@link LedgerState}. Mutations are
 * applied to the live state immediately so a value transfer made later in the
 * operation sees them; `rollback` restores every captured copy in place.
 *
 * Unreturned balances recorded with {@link recordUnreturned} are the one
 * exception: they and their events outlive a rollback.
 */
export class LedgerTransaction {
  private readonly campaignOriginals = new Map<CampaignId, CampaignRecord | null>();
  private readonly ownerOriginals = new Map<AccountId, CampaignId[] | null>();
  private readonly unreturnedOriginals = new Map<string, UnreturnedBalance>();
  private readonly durableKeys = new Set<string>();
  private counterOriginal: number | null = null;
  private platformOriginal: PlatformSettings | null = null;
  private readonly pending: LedgerEvent[] = [];
  private readonly durable: LedgerEvent[] = [];

  constructor(private readonly state: LedgerState) {}

  get counter(): number {
    return this.state.counter;
  }

  get platform(): Readonly<PlatformSettings> {
    return this.state.platform;
  }

  get events(): readonly LedgerEvent[] {
    return this.pending;
  }

  read(id: CampaignId): CampaignRecord | undefined {
    return this.state.campaigns.get(id);
  }

  write(id: CampaignId): CampaignRecord {
    const record = this.state.campaigns.get(id);
    if (!record) {
      throw new Error(`ledger-write-missing-campaign:${id}`);
    }
    if (!this.campaignOriginals.has(id)) {
      this.campaignOriginals.set(id, cloneCampaign(record));
    }
    return record;
  }

  allocateId(): CampaignId {
    if (this.counterOriginal === null) {
      this.counterOriginal = this.state.counter;
    }
    this.state.counter += 1;
    return this.state.counter;
  }

  insert(record: CampaignRecord): void {
    if (this.state.campaigns.has(record.id)) {
      throw new Error(`ledger-duplicate-campaign:${record.id}`);
    }
    this.campaignOriginals.set(record.id, null);
    this.state.campaigns.set(record.id, record);
  }

  addOwned(account: AccountId, id: CampaignId): void {
    const owned = this.captureOwner(account);
    if (!owned.includes(id)) {
      owned.push(id);
    }
  }

  removeOwned(account: AccountId, id: CampaignId): void {
    const owned = this.captureOwner(account);
    const idx = owned.indexOf(id);
    if (idx >= 0) {
      owned.splice(idx, 1);
    }
  }

  writePlatform(): PlatformSettings {
    if (this.platformOriginal === null) {
      this.platformOriginal = {
        ...this.state.platform,
        allowedTokens: [...this.state.platform.allowedTokens],
      };
    }
    return this.state.platform;
  }

  /** Remove and return what custody owes `account` in `asset`. */
  takeUnreturned(account: AccountId, asset: FundingAsset): bigint {
    const key = unreturnedKey(account, asset);
    const entry = this.state.unreturned.get(key);
    if (!entry || entry.amount === 0n) return 0n;
    if (!this.unreturnedOriginals.has(key)) {
      this.unreturnedOriginals.set(key, { ...entry });
    }
    const amount = entry.amount;
    entry.amount = 0n;
    return amount;
  }

  recordUnreturned(campaignId: CampaignId, account: AccountId, asset: FundingAsset, amount: bigint): void {
    const key = unreturnedKey(account, asset);
    const entry = this.state.unreturned.get(key);
    if (entry) {
      entry.amount += amount;
    } else {
      this.state.unreturned.set(key, { account, asset: { ...asset }, amount });
    }
    this.durableKeys.add(key);
    const event: LedgerEvent = { type: 'ReturnFailed', campaignId, contributor: account, asset, amount };
    this.pending.push(event);
    this.durable.push(event);
  }

  emit(event: LedgerEvent): void {
    this.pending.push(event);
  }

  changes(): TransactionChanges {
    return {
      campaignIds: [...this.campaignOriginals.keys()],
      owners: [...this.ownerOriginals.keys()],
      unreturned: [...new Set([...this.unreturnedOriginals.keys(), ...this.durableKeys])],
      counterChanged: this.counterOriginal !== null,
      platformChanged: this.platformOriginal !== null,
    };
  }

  /** True when both transactions captured the same campaign, owner, counter or settings. */
  overlaps(other: LedgerTransaction): boolean {
    const mine = this.changes();
    const theirs = other.changes();
    return (
      mine.campaignIds.some((id) => theirs.campaignIds.includes(id)) ||
      mine.owners.some((account) => theirs.owners.includes(account)) ||
      mine.unreturned.some((key) => theirs.unreturned.includes(key)) ||
      (mine.counterChanged && theirs.counterChanged) ||
      (mine.platformChanged && theirs.platformChanged)
    );
  }

  /**
   * Restore every captured value. Campaign records are restored in place so
   * references held by the running operation stay attached to the table.
   * Afterwards `changes()` and `events` describe only what outlives the rollback.
   */
  rollback(): void {
    for (const [id, original] of this.campaignOriginals) {
      const live = this.state.campaigns.get(id);
      if (original === null) {
        this.state.campaigns.delete(id);
      } else if (live) {
        Object.assign(live, original);
      } else {
        this.state.campaigns.set(id, original);
      }
    }
    for (const [key, original] of this.unreturnedOriginals) {
      this.state.unreturned.set(key, original);
    }
    for (const [account, original] of this.ownerOriginals) {
      if (original === null) {
        this.state.owners.delete(account);
      } else {
        this.state.owners.set(account, original);
      }
    }
    if (this.counterOriginal !== null) {
      this.state.counter = this.counterOriginal;
    }
    if (this.platformOriginal !== null) {
      this.state.platform = this.platformOriginal;
    }
    this.campaignOriginals.clear();
    this.ownerOriginals.clear();
    this.unreturnedOriginals.clear();
    this.counterOriginal = null;
    this.platformOriginal = null;
    this.pending.length = 0;
    this.pending.push(...this.durable);
  }

  private captureOwner(account: AccountId): CampaignId[] {
    const existing = this.state.owners.get(account);
    if (!this.ownerOriginals.has(account)) {
      this.ownerOriginals.set(account, existing ? [...existing] : null);
    }
    if (existing) return existing;
    const created: CampaignId[] = [];
    this.state.owners.set(account, created);
    return created;
  }
}

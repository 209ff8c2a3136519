import type { PlatformSettings } from './LedgerState';
import type { AccountId, CampaignId, CampaignRecord, LedgerEvent, UnreturnedBalance } from './types';

export type PersistedPlatform = PlatformSettings & { paused: boolean };

export type LedgerCommit = {
  campaigns: CampaignRecord[];
  owners: Array<{ account: AccountId; campaignIds: CampaignId[] }>;
  /** A zero amount removes the row. */
  unreturned: UnreturnedBalance[];
  counter: number | null;
  platform: PersistedPlatform | null;
  events: LedgerEvent[];
};

export type LedgerSnapshot = {
  campaigns: CampaignRecord[];
  owners: Array<{ account: AccountId; campaignIds: CampaignId[] }>;
  unreturned: UnreturnedBalance[];
  counter: number;
  platform: PersistedPlatform | null;
};

/** Durable home for committed engine state. */
export interface LedgerRepository {
  load(): Promise<LedgerSnapshot>;
  commit(commit: LedgerCommit): Promise<void>;
}

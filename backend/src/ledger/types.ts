export type AccountId = string;
export type CampaignId = number;

export type FundingAsset =
  | { kind: 'native' }
  | { kind: 'token'; tokenId: string };

export const NATIVE_ASSET: FundingAsset = { kind: 'native' };

export type CampaignStatus = 'open' | 'expired' | 'funded' | 'cancelled';

export interface Milestone {
  amount: bigint;
  description: string;
  completed: boolean;
}

export interface WithdrawalLimit {
  enabled: boolean;
  ceiling: bigint;
  totalWithdrawn: bigint;
  lastWithdrawalAt: number | null;
  minInterval: number;
}

export interface CampaignRecord {
  id: CampaignId;
  creator: AccountId;
  title: string;
  description: string;
  mediaRef: string;
  category: string;
  goal: bigint;
  raised: bigint;
  /** Gross amount paid out of the goal portion: completion payout plus milestone releases. */
  released: bigint;
  minContribution: bigint;
  maxContribution: bigint;
  createdAt: number;
  deadline: number;
  asset: FundingAsset;
  verified: boolean;
  promoted: boolean;
  completed: boolean;
  cancelled: boolean;
  refundable: boolean;
  allowPartialWithdrawals: boolean;
  withdrawalLimit: WithdrawalLimit;
  milestones: Milestone[];
  backerCount: number;
  contributions: Map<AccountId, bigint>;
  roster: AccountId[];
  /** Index into `roster` where the cancellation sweep resumes. */
  refundCursor: number;
}

/** Value custody still owes an account after a failed return of pulled funds. */
export interface UnreturnedBalance {
  account: AccountId;
  asset: FundingAsset;
  amount: bigint;
}

export type CampaignSummary = Omit<CampaignRecord, 'contributions' | 'roster'> & {
  status: CampaignStatus;
};

export type LedgerEvent =
  | { type: 'CampaignCreated'; campaignId: CampaignId; creator: AccountId; goal: bigint; deadline: number }
  | { type: 'ContributionReceived'; campaignId: CampaignId; contributor: AccountId; amount: bigint; raised: bigint }
  | { type: 'CampaignFunded'; campaignId: CampaignId; raised: bigint; payout: bigint; fee: bigint }
  | { type: 'CampaignCancelled'; campaignId: CampaignId }
  | { type: 'RefundsEnabled'; campaignId: CampaignId }
  | { type: 'RefundIssued'; campaignId: CampaignId; contributor: AccountId; amount: bigint }
  | { type: 'GoalModified'; campaignId: CampaignId; previousGoal: bigint; goal: bigint }
  | { type: 'DeadlineExtended'; campaignId: CampaignId; deadline: number }
  | { type: 'SurplusWithdrawn'; campaignId: CampaignId; amount: bigint; fee: bigint }
  | { type: 'PartialWithdrawal'; campaignId: CampaignId; amount: bigint; fee: bigint; totalWithdrawn: bigint }
  | { type: 'MilestoneAdded'; campaignId: CampaignId; index: number; amount: bigint }
  | { type: 'MilestoneCompleted'; campaignId: CampaignId; index: number; amount: bigint; fee: bigint }
  | { type: 'MetadataUpdated'; campaignId: CampaignId }
  | { type: 'OwnershipTransferred'; campaignId: CampaignId; previousCreator: AccountId; creator: AccountId }
  | { type: 'FundingAssetChanged'; campaignId: CampaignId; asset: FundingAsset }
  | { type: 'WithdrawalsConfigured'; campaignId: CampaignId }
  | { type: 'CampaignFlagged'; campaignId: CampaignId; flag: 'verified' | 'promoted'; value: boolean }
  | { type: 'PlatformUpdated'; setting: 'paused' | 'feeBps' | 'allowedTokens' }
  | { type: 'ReturnFailed'; campaignId: CampaignId; contributor: AccountId; asset: FundingAsset; amount: bigint }
  | { type: 'UnreturnedClaimed'; account: AccountId; asset: FundingAsset; amount: bigint };

export function assetKey(asset: FundingAsset): string {
  return asset.kind === 'native' ? 'native' : `token:${asset.tokenId}`;
}

export function parseAssetKey(key: string): FundingAsset | null {
  if (key === 'native') return NATIVE_ASSET;
  if (key.startsWith('token:') && key.length > 'token:'.length) {
    return { kind: 'token', tokenId: key.slice('token:'.length) };
  }
  return null;
}

export function unreturnedKey(account: AccountId, asset: FundingAsset): string {
  return `${assetKey(asset)}|${account}`;
}

export function cloneCampaign(record: CampaignRecord): CampaignRecord {
  return {
    ...record,
    asset: { ...record.asset },
    withdrawalLimit: { ...record.withdrawalLimit },
    milestones: record.milestones.map((milestone) => ({ ...milestone })),
    contributions: new Map(record.contributions),
    roster: [...record.roster],
  };
}

export function deriveStatus(record: CampaignRecord, now: number): CampaignStatus {
  if (record.cancelled) return 'cancelled';
  if (record.completed) return 'funded';
  if (now >= record.deadline) return 'expired';
  return 'open';
}

export function milestoneTotal(record: CampaignRecord): bigint {
  return record.milestones.reduce((total, milestone) => total + milestone.amount, 0n);
}

export function toSummary(record: CampaignRecord, now: number): CampaignSummary {
  const { contributions: _contributions, roster: _roster, ...rest } = cloneCampaign(record);
  return { ...rest, status: deriveStatus(record, now) };
}

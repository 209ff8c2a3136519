import { DAY_MS } from '../config/constants';
import { CrowdfundError } from '../ledger/errors';
import type { LedgerState } from '../ledger/LedgerState';
import {
  NATIVE_ASSET,
  deriveStatus,
  toSummary,
  type AccountId,
  type CampaignId,
  type CampaignRecord,
  type CampaignSummary,
  type FundingAsset,
} from '../ledger/types';
import {
  mustExist,
  requireCaller,
  requireCreator,
  requireNotCompleted,
  requireNotPaused,
  requireOwner,
  type OperationContext,
} from './context';

export type WithdrawalLimitInput = {
  ceiling: bigint;
  minIntervalMs?: number;
};

export type CreateCampaignInput = {
  goal: bigint;
  minContribution: bigint;
  maxContribution: bigint;
  durationDays: number;
  title: string;
  description?: string;
  mediaRef?: string;
  category?: string;
  asset?: FundingAsset;
  allowPartialWithdrawals?: boolean;
  withdrawalLimit?: WithdrawalLimitInput | null;
};

export type MetadataUpdate = {
  title?: string;
  description?: string;
  mediaRef?: string;
  category?: string;
};

export type WithdrawalConfigInput = {
  allowPartialWithdrawals?: boolean;
  limit?: WithdrawalLimitInput | null;
};

function invalid(detail: string): CrowdfundError {
  return new CrowdfundError('InvalidParameters', detail);
}

function validateLimit(limit: WithdrawalLimitInput): { ceiling: bigint; minInterval: number } {
  if (limit.ceiling <= 0n) throw invalid('ceiling-invalid');
  const minInterval = limit.minIntervalMs ?? 0;
  if (!Number.isInteger(minInterval) || minInterval < 0) throw invalid('interval-invalid');
  return { ceiling: limit.ceiling, minInterval };
}

/** Campaign registry: creation, identity, ownership and descriptive fields. */
export class CampaignService {
  validateAsset(ctx: OperationContext, asset: FundingAsset): FundingAsset {
    if (asset.kind === 'native') return NATIVE_ASSET;
    const tokenId = asset.tokenId.trim();
    if (!tokenId || !ctx.tx.platform.allowedTokens.includes(tokenId)) {
      throw invalid('token-not-allowed');
    }
    return { kind: 'token', tokenId };
  }

  createCampaign(ctx: OperationContext, caller: AccountId, input: CreateCampaignInput): CampaignId {
    const creator = requireCaller(caller);
    requireNotPaused(ctx);

    if (input.goal <= 0n) throw invalid('goal-invalid');
    if (input.minContribution <= 0n) throw invalid('min-contribution-invalid');
    if (input.maxContribution < input.minContribution) throw invalid('max-contribution-invalid');
    if (!Number.isInteger(input.durationDays) || input.durationDays <= 0) {
      throw invalid('duration-invalid');
    }
    const title = (input.title ?? '').trim();
    if (!title) throw invalid('title-required');
    const asset = this.validateAsset(ctx, input.asset ?? NATIVE_ASSET);
    const limit = input.withdrawalLimit ? validateLimit(input.withdrawalLimit) : null;

    const id = ctx.tx.allocateId();
    const record: CampaignRecord = {
      id,
      creator,
      title,
      description: (input.description ?? '').trim(),
      mediaRef: (input.mediaRef ?? '').trim(),
      category: (input.category ?? '').trim(),
      goal: input.goal,
      raised: 0n,
      released: 0n,
      minContribution: input.minContribution,
      maxContribution: input.maxContribution,
      createdAt: ctx.now,
      deadline: ctx.now + input.durationDays * DAY_MS,
      asset,
      verified: false,
      promoted: false,
      completed: false,
      cancelled: false,
      refundable: false,
      allowPartialWithdrawals: input.allowPartialWithdrawals ?? false,
      withdrawalLimit: {
        enabled: limit !== null,
        ceiling: limit?.ceiling ?? 0n,
        totalWithdrawn: 0n,
        lastWithdrawalAt: null,
        minInterval: limit?.minInterval ?? 0,
      },
      milestones: [],
      backerCount: 0,
      contributions: new Map(),
      roster: [],
      refundCursor: 0,
    };
    ctx.tx.insert(record);
    ctx.tx.addOwned(creator, id);
    ctx.tx.emit({ type: 'CampaignCreated', campaignId: id, creator, goal: record.goal, deadline: record.deadline });
    return id;
  }

  updateMetadata(ctx: OperationContext, caller: AccountId, id: CampaignId, update: MetadataUpdate): void {
    const record = mustExist(ctx.tx, id);
    requireCreator(record, requireCaller(caller));

    // Empty string keeps the current value.
    const title = update.title?.trim();
    if (title) record.title = title;
    const description = update.description?.trim();
    if (description) record.description = description;
    const mediaRef = update.mediaRef?.trim();
    if (mediaRef) record.mediaRef = mediaRef;
    const category = update.category?.trim();
    if (category) record.category = category;
    ctx.tx.emit({ type: 'MetadataUpdated', campaignId: id });
  }

  transferOwnership(ctx: OperationContext, caller: AccountId, id: CampaignId, newCreator: AccountId): void {
    const record = mustExist(ctx.tx, id);
    const previousCreator = requireCaller(caller);
    requireCreator(record, previousCreator);
    const next = typeof newCreator === 'string' ? newCreator.trim() : '';
    if (!next || next === record.creator) throw invalid('new-creator-invalid');

    record.creator = next;
    ctx.tx.removeOwned(previousCreator, id);
    ctx.tx.addOwned(next, id);
    ctx.tx.emit({ type: 'OwnershipTransferred', campaignId: id, previousCreator, creator: next });
  }

  setFundingAsset(ctx: OperationContext, caller: AccountId, id: CampaignId, asset: FundingAsset): void {
    const record = mustExist(ctx.tx, id);
    requireCreator(record, requireCaller(caller));
    requireNotCompleted(record);
    if (record.backerCount > 0) throw invalid('asset-locked');
    record.asset = this.validateAsset(ctx, asset);
    ctx.tx.emit({ type: 'FundingAssetChanged', campaignId: id, asset: record.asset });
  }

  configureWithdrawals(
    ctx: OperationContext,
    caller: AccountId,
    id: CampaignId,
    config: WithdrawalConfigInput,
  ): void {
    const record = mustExist(ctx.tx, id);
    requireCreator(record, requireCaller(caller));
    requireNotCompleted(record);

    if (config.allowPartialWithdrawals !== undefined) {
      record.allowPartialWithdrawals = config.allowPartialWithdrawals;
    }
    if (config.limit === null) {
      record.withdrawalLimit.enabled = false;
      record.withdrawalLimit.ceiling = 0n;
      record.withdrawalLimit.minInterval = 0;
    } else if (config.limit !== undefined) {
      const limit = validateLimit(config.limit);
      if (limit.ceiling < record.withdrawalLimit.totalWithdrawn) throw invalid('ceiling-below-withdrawn');
      record.withdrawalLimit.enabled = true;
      record.withdrawalLimit.ceiling = limit.ceiling;
      record.withdrawalLimit.minInterval = limit.minInterval;
    }
    ctx.tx.emit({ type: 'WithdrawalsConfigured', campaignId: id });
  }

  setFlag(
    ctx: OperationContext,
    caller: AccountId,
    id: CampaignId,
    flag: 'verified' | 'promoted',
    value: boolean,
  ): void {
    requireOwner(ctx, requireCaller(caller));
    const record = mustExist(ctx.tx, id);
    record[flag] = value;
    ctx.tx.emit({ type: 'CampaignFlagged', campaignId: id, flag, value });
  }

  // Queries read the committed state directly and never mutate it.

  exists(state: LedgerState, id: CampaignId): boolean {
    return Number.isInteger(id) && id >= 1 && id <= state.counter && state.campaigns.has(id);
  }

  getRecord(state: LedgerState, id: CampaignId): CampaignRecord {
    const record = this.exists(state, id) ? state.getCampaign(id) : undefined;
    if (!record) throw new CrowdfundError('CampaignNotFound', `campaign:${id}`);
    return record;
  }

  getCampaign(state: LedgerState, id: CampaignId, now: number): CampaignSummary {
    return toSummary(this.getRecord(state, id), now);
  }

  getCampaignsByOwner(state: LedgerState, account: AccountId): CampaignId[] {
    return state.getOwned(account);
  }

  listCampaigns(
    state: LedgerState,
    now: number,
    predicate: (record: CampaignRecord) => boolean = () => true,
  ): CampaignSummary[] {
    return Array.from(state.campaigns.values())
      .filter(predicate)
      .sort((a, b) => a.id - b.id)
      .map((record) => toSummary(record, now));
  }

  listActive(state: LedgerState, now: number): CampaignSummary[] {
    return this.listCampaigns(state, now, (record) => deriveStatus(record, now) === 'open');
  }

  listSuccessful(state: LedgerState, now: number): CampaignSummary[] {
    return this.listCampaigns(state, now, (record) => record.completed && !record.cancelled);
  }

  listVerified(state: LedgerState, now: number): CampaignSummary[] {
    return this.listCampaigns(state, now, (record) => record.verified);
  }

  listPromoted(state: LedgerState, now: number): CampaignSummary[] {
    return this.listCampaigns(state, now, (record) => record.promoted);
  }
}

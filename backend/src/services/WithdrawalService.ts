import { CrowdfundError } from '../ledger/errors';
import { milestoneTotal, type AccountId, type CampaignId, type CampaignRecord } from '../ledger/types';
import {
  mustExist,
  requireCaller,
  requireCreator,
  requireFunded,
  requireNotCompleted,
  requireNotPaused,
  type OperationContext,
} from './context';
import { payCreatorWithFee } from './payouts';

export type WithdrawalResult = {
  amount: bigint;
  fee: bigint;
  net: bigint;
};

/** Interval and ceiling checks shared by partial withdrawals and milestone releases. */
function checkWithdrawalLimit(record: CampaignRecord, amount: bigint, now: number): void {
  const limit = record.withdrawalLimit;
  if (limit.minInterval > 0 && limit.lastWithdrawalAt !== null && now < limit.lastWithdrawalAt + limit.minInterval) {
    throw new CrowdfundError('IntervalNotElapsed', `next-at:${limit.lastWithdrawalAt + limit.minInterval}`);
  }
  if (limit.enabled && limit.totalWithdrawn + amount > limit.ceiling) {
    throw new CrowdfundError('WithdrawalLimitExceeded', `ceiling:${limit.ceiling}`);
  }
}

function recordWithdrawal(record: CampaignRecord, amount: bigint, now: number): void {
  record.withdrawalLimit.totalWithdrawn += amount;
  record.withdrawalLimit.lastWithdrawalAt = now;
}

export class WithdrawalService {
  async withdrawSurplus(ctx: OperationContext, caller: AccountId, id: CampaignId): Promise<WithdrawalResult> {
    const record = mustExist(ctx.tx, id);
    requireCreator(record, requireCaller(caller));
    requireNotPaused(ctx);
    requireFunded(record);

    const excess = record.raised > record.goal ? record.raised - record.goal : 0n;
    if (excess === 0n) {
      throw new CrowdfundError('NoExcess', `campaign:${id}`);
    }
    record.raised -= excess;

    const split = await payCreatorWithFee(ctx, record, excess, 'surplus');
    ctx.tx.emit({ type: 'SurplusWithdrawn', campaignId: id, amount: excess, fee: split.fee });
    return { amount: excess, ...split };
  }

  async withdrawPartialFunds(
    ctx: OperationContext,
    caller: AccountId,
    id: CampaignId,
    amount: bigint,
  ): Promise<WithdrawalResult> {
    const record = mustExist(ctx.tx, id);
    requireCreator(record, requireCaller(caller));
    requireNotPaused(ctx);
    requireNotCompleted(record);
    if (!record.allowPartialWithdrawals) {
      throw new CrowdfundError('InvalidParameters', 'partial-withdrawals-disabled');
    }
    if (amount <= 0n || amount > record.raised) {
      throw new CrowdfundError('InvalidParameters', 'amount-exceeds-raised');
    }
    checkWithdrawalLimit(record, amount, ctx.now);

    record.raised -= amount;
    recordWithdrawal(record, amount, ctx.now);

    const split = await payCreatorWithFee(ctx, record, amount, 'partial-withdrawal');
    ctx.tx.emit({
      type: 'PartialWithdrawal',
      campaignId: id,
      amount,
      fee: split.fee,
      totalWithdrawn: record.withdrawalLimit.totalWithdrawn,
    });
    return { amount, ...split };
  }

  addMilestone(
    ctx: OperationContext,
    caller: AccountId,
    id: CampaignId,
    amount: bigint,
    description: string,
  ): number {
    const record = mustExist(ctx.tx, id);
    requireCreator(record, requireCaller(caller));
    requireNotCompleted(record);
    const text = (description ?? '').trim();
    if (amount <= 0n || !text) {
      throw new CrowdfundError('InvalidParameters', 'milestone-invalid');
    }
    if (milestoneTotal(record) + amount > record.goal) {
      throw new CrowdfundError('InvalidParameters', 'milestones-exceed-goal');
    }

    record.milestones.push({ amount, description: text, completed: false });
    const index = record.milestones.length - 1;
    ctx.tx.emit({ type: 'MilestoneAdded', campaignId: id, index, amount });
    return index;
  }

  /** Milestones can be completed in any order, each exactly once. */
  async completeMilestone(
    ctx: OperationContext,
    caller: AccountId,
    id: CampaignId,
    index: number,
  ): Promise<WithdrawalResult> {
    const record = mustExist(ctx.tx, id);
    requireCreator(record, requireCaller(caller));
    requireNotPaused(ctx);
    requireFunded(record);
    const milestone = Number.isInteger(index) ? record.milestones[index] : undefined;
    if (!milestone) {
      throw new CrowdfundError('InvalidParameters', 'milestone-not-found');
    }
    if (milestone.completed) {
      throw new CrowdfundError('InvalidParameters', 'milestone-already-completed');
    }
    checkWithdrawalLimit(record, milestone.amount, ctx.now);

    milestone.completed = true;
    record.released += milestone.amount;
    recordWithdrawal(record, milestone.amount, ctx.now);

    const split = await payCreatorWithFee(ctx, record, milestone.amount, 'milestone');
    ctx.tx.emit({ type: 'MilestoneCompleted', campaignId: id, index, amount: milestone.amount, fee: split.fee });
    return { amount: milestone.amount, ...split };
  }
}

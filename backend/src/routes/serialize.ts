import { assetKey, type CampaignSummary } from '../ledger/types';
import type { SweepResult } from '../services/RefundService';
import type { WithdrawalResult } from '../services/WithdrawalService';

export function serializeCampaign(campaign: CampaignSummary) {
  return {
    id: campaign.id,
    creator: campaign.creator,
    title: campaign.title,
    description: campaign.description,
    mediaRef: campaign.mediaRef,
    category: campaign.category,
    goal: campaign.goal.toString(),
    raised: campaign.raised.toString(),
    released: campaign.released.toString(),
    minContribution: campaign.minContribution.toString(),
    maxContribution: campaign.maxContribution.toString(),
    createdAt: new Date(campaign.createdAt).toISOString(),
    deadline: new Date(campaign.deadline).toISOString(),
    asset: assetKey(campaign.asset),
    status: campaign.status,
    verified: campaign.verified,
    promoted: campaign.promoted,
    completed: campaign.completed,
    cancelled: campaign.cancelled,
    refundable: campaign.refundable,
    allowPartialWithdrawals: campaign.allowPartialWithdrawals,
    withdrawalLimit: {
      enabled: campaign.withdrawalLimit.enabled,
      ceiling: campaign.withdrawalLimit.ceiling.toString(),
      totalWithdrawn: campaign.withdrawalLimit.totalWithdrawn.toString(),
      lastWithdrawalAt:
        campaign.withdrawalLimit.lastWithdrawalAt === null
          ? null
          : new Date(campaign.withdrawalLimit.lastWithdrawalAt).toISOString(),
      minIntervalMs: campaign.withdrawalLimit.minInterval,
    },
    milestones: campaign.milestones.map((milestone, index) => ({
      index,
      amount: milestone.amount.toString(),
      description: milestone.description,
      completed: milestone.completed,
    })),
    backerCount: campaign.backerCount,
    refundCursor: campaign.refundCursor,
  };
}

export function serializeWithdrawal(result: WithdrawalResult) {
  return {
    amount: result.amount.toString(),
    fee: result.fee.toString(),
    net: result.net.toString(),
  };
}

export function serializeSweep(result: SweepResult) {
  return {
    refunded: result.refunded,
    amount: result.amount.toString(),
    remaining: result.remaining,
    done: result.done,
  };
}

import { CrowdfundError } from '../ledger/errors';
import type { AccountId, CampaignId, CampaignRecord } from '../ledger/types';
import type { TransferLeg } from '../transfer/types';
import {
  mustExist,
  requireCaller,
  requireCreator,
  requireNotCompleted,
  type OperationContext,
} from './context';
import { payAll, payTo } from './payouts';

export type SweepResult = {
  refunded: number;
  amount: bigint;
  remaining: number;
  done: boolean;
};

/**
 * Zero the contributor's record and take the payable amount out of `raised`.
 * Partial withdrawals can leave `raised` below the record, so the payout is
 * capped at what the campaign still holds.
 */
function debitContributor(record: CampaignRecord, contributor: AccountId): bigint {
  const owed = record.contributions.get(contributor) ?? 0n;
  if (owed === 0n) return 0n;
  const paid = owed < record.raised ? owed : record.raised;
  record.contributions.set(contributor, 0n);
  record.raised -= paid;
  return paid;
}

export class RefundService {
  enableRefunds(ctx: OperationContext, caller: AccountId, id: CampaignId): void {
    const record = mustExist(ctx.tx, id);
    requireCreator(record, requireCaller(caller));
    requireNotCompleted(record);
    if (record.refundable) return;
    record.refundable = true;
    ctx.tx.emit({ type: 'RefundsEnabled', campaignId: id });
  }

  async requestRefund(ctx: OperationContext, caller: AccountId, id: CampaignId): Promise<bigint> {
    const record = mustExist(ctx.tx, id);
    const contributor = requireCaller(caller);
    requireNotCompleted(record);
    const expired = ctx.now >= record.deadline;
    if (!record.refundable && !expired) {
      throw new CrowdfundError('RefundsUnavailable', `campaign:${id}`);
    }
    if ((record.contributions.get(contributor) ?? 0n) === 0n) {
      throw new CrowdfundError('NoContribution', `campaign:${id}`);
    }

    const paid = debitContributor(record, contributor);
    ctx.tx.emit({ type: 'RefundIssued', campaignId: id, contributor, amount: paid });
    if (paid > 0n) {
      await payTo(ctx, record.asset, contributor, paid);
    }
    return paid;
  }

  /**
   * Refund up to `limit` roster entries starting at the campaign's sweep
   * cursor, paying them in a single all-or-nothing transfer.
   */
  async sweep(ctx: OperationContext, record: CampaignRecord, limit: number): Promise<SweepResult> {
    const legs: TransferLeg[] = [];
    const end = Math.min(record.roster.length, record.refundCursor + Math.max(1, limit));
    let refunded = 0;
    let amount = 0n;

    for (let idx = record.refundCursor; idx < end; idx += 1) {
      const contributor = record.roster[idx];
      if ((record.contributions.get(contributor) ?? 0n) === 0n) continue;
      const paid = debitContributor(record, contributor);
      refunded += 1;
      amount += paid;
      legs.push({ asset: record.asset, recipient: contributor, amount: paid });
      ctx.tx.emit({ type: 'RefundIssued', campaignId: record.id, contributor, amount: paid });
    }
    record.refundCursor = end;

    await payAll(ctx, `refund-sweep:${record.id}`, legs);
    const remaining = record.roster.length - record.refundCursor;
    return { refunded, amount, remaining, done: remaining === 0 };
  }

  async sweepRefunds(
    ctx: OperationContext,
    caller: AccountId,
    id: CampaignId,
    limit?: number,
  ): Promise<SweepResult> {
    requireCaller(caller);
    const record = mustExist(ctx.tx, id);
    if (!record.cancelled) {
      throw new CrowdfundError('RefundsUnavailable', `campaign-not-cancelled:${id}`);
    }
    const batch = limit !== undefined && Number.isInteger(limit) && limit > 0 ? limit : ctx.cancelSweepBatch;
    return this.sweep(ctx, record, batch);
  }
}

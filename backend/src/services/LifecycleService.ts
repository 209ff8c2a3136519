import { DAY_MS } from '../config/constants';
import { CrowdfundError } from '../ledger/errors';
import { milestoneTotal, type AccountId, type CampaignId, type CampaignRecord } from '../ledger/types';
import {
  mustExist,
  requireCaller,
  requireCreator,
  requireNotCompleted,
  requireOpen,
  type OperationContext,
} from './context';
import { payCreatorWithFee } from './payouts';
import type { RefundService, SweepResult } from './RefundService';

export class LifecycleService {
  constructor(private readonly refunds: RefundService) {}

  /**
   * Open → Funded. Runs inside the contribution that crossed the goal.
   * Completion is recorded before paying out the goal portion; amounts held
   * back for milestones are released later by `completeMilestone`.
   */
  async fund(ctx: OperationContext, record: CampaignRecord): Promise<void> {
    if (record.completed) return;
    record.completed = true;

    const held = milestoneTotal(record);
    const payout = record.goal > held ? record.goal - held : 0n;
    record.released += payout;

    const split = await payCreatorWithFee(ctx, record, payout, 'funded-payout');
    ctx.tx.emit({
      type: 'CampaignFunded',
      campaignId: record.id,
      raised: record.raised,
      payout,
      fee: split.fee,
    });
  }

  async cancelCampaign(ctx: OperationContext, caller: AccountId, id: CampaignId): Promise<SweepResult> {
    const record = mustExist(ctx.tx, id);
    requireCreator(record, requireCaller(caller));
    requireNotCompleted(record);

    record.completed = true;
    record.cancelled = true;
    ctx.tx.emit({ type: 'CampaignCancelled', campaignId: id });
    return this.refunds.sweep(ctx, record, ctx.cancelSweepBatch);
  }

  modifyGoal(ctx: OperationContext, caller: AccountId, id: CampaignId, newGoal: bigint): void {
    const record = mustExist(ctx.tx, id);
    requireCreator(record, requireCaller(caller));
    requireOpen(record, ctx.now);
    if (newGoal <= record.raised) {
      throw new CrowdfundError('InvalidParameters', 'goal-not-above-raised');
    }
    if (newGoal < milestoneTotal(record)) {
      throw new CrowdfundError('InvalidParameters', 'goal-below-milestones');
    }

    const previousGoal = record.goal;
    record.goal = newGoal;
    ctx.tx.emit({ type: 'GoalModified', campaignId: id, previousGoal, goal: newGoal });
  }

  extendDeadline(ctx: OperationContext, caller: AccountId, id: CampaignId, extraDays: number): number {
    const record = mustExist(ctx.tx, id);
    requireCreator(record, requireCaller(caller));
    requireNotCompleted(record);
    if (!Number.isInteger(extraDays) || extraDays <= 0) {
      throw new CrowdfundError('InvalidParameters', 'extra-days-invalid');
    }

    record.deadline += extraDays * DAY_MS;
    ctx.tx.emit({ type: 'DeadlineExtended', campaignId: id, deadline: record.deadline });
    return record.deadline;
  }
}

import { CrowdfundError } from '../ledger/errors';
import { assetKey, type AccountId, type CampaignId, type FundingAsset } from '../ledger/types';
import { mustExist, requireCaller, requireNotPaused, requireOpen, type OperationContext } from './context';
import type { LifecycleService } from './LifecycleService';
import { payTo, pullFrom } from './payouts';

export type ContributionResult = {
  contributed: bigint;
  raised: bigint;
  funded: boolean;
};

export class ContributionService {
  constructor(private readonly lifecycle: LifecycleService) {}

  /**
   * Pull the amount into custody, credit the contributor and, when the goal is
   * crossed, fund the campaign in the same operation. If funding fails the
   * pulled amount goes back to the contributor before the error propagates.
   */
  async contribute(
    ctx: OperationContext,
    caller: AccountId,
    id: CampaignId,
    amount: bigint,
  ): Promise<ContributionResult> {
    const contributor = requireCaller(caller);
    requireNotPaused(ctx);
    const record = mustExist(ctx.tx, id);
    requireOpen(record, ctx.now);
    if (amount <= 0n || amount < record.minContribution || amount > record.maxContribution) {
      throw new CrowdfundError('ContributionOutOfBounds', `amount:${amount}`);
    }

    await pullFrom(ctx, record.asset, contributor, amount);

    try {
      const previous = record.contributions.get(contributor) ?? 0n;
      if (previous === 0n && !record.roster.includes(contributor)) {
        record.roster.push(contributor);
        record.backerCount += 1;
      }
      record.contributions.set(contributor, previous + amount);
      record.raised += amount;
      ctx.tx.emit({
        type: 'ContributionReceived',
        campaignId: id,
        contributor,
        amount,
        raised: record.raised,
      });

      if (record.raised >= record.goal) {
        await this.lifecycle.fund(ctx, record);
      }
    } catch (err) {
      await this.returnPulled(ctx, id, record.asset, contributor, amount);
      throw err;
    }

    return { contributed: amount, raised: record.raised, funded: record.completed };
  }

  /**
   * Pay out everything custody owes the caller in `asset` after earlier
   * failed returns. The balance is restored if the transfer fails.
   */
  async claimUnreturned(ctx: OperationContext, caller: AccountId, asset: FundingAsset): Promise<bigint> {
    const account = requireCaller(caller);
    const amount = ctx.tx.takeUnreturned(account, asset);
    if (amount === 0n) {
      throw new CrowdfundError('NoContribution', `unreturned:${assetKey(asset)}`);
    }
    ctx.tx.emit({ type: 'UnreturnedClaimed', account, asset, amount });
    await payTo(ctx, asset, account, amount);
    return amount;
  }

  /**
   * Send a pulled amount back. When that transfer fails too, the amount is
   * booked as unreturned so the contributor can claim it later; the booking
   * survives the rollback of the failed contribution.
   */
  private async returnPulled(
    ctx: OperationContext,
    id: CampaignId,
    asset: FundingAsset,
    contributor: AccountId,
    amount: bigint,
  ): Promise<void> {
    try {
      await payTo(ctx, asset, contributor, amount);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[contributions] failed to return ${amount} to ${contributor}, booked as unreturned: ${message}`);
      ctx.tx.recordUnreturned(id, contributor, asset, amount);
    }
  }
}

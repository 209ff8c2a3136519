import { CrowdfundError } from '../ledger/errors';
import { splitFee, type FeeSplit } from '../ledger/fees';
import type { AccountId, CampaignRecord, FundingAsset } from '../ledger/types';
import type { TransferLeg } from '../transfer/types';
import type { OperationContext } from './context';

async function settle(label: string, attempt: () => Promise<boolean>): Promise<void> {
  let ok: boolean;
  try {
    ok = await attempt();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[payouts] ${label} threw: ${message}`);
    throw new CrowdfundError('TransferFailed', `${label}:${message}`);
  }
  if (!ok) {
    throw new CrowdfundError('TransferFailed', label);
  }
}

export async function pullFrom(
  ctx: OperationContext,
  asset: FundingAsset,
  from: AccountId,
  amount: bigint,
): Promise<void> {
  ctx.beforeTransfer();
  await settle(`pull:${from}`, () => ctx.transfers.pull(asset, from, amount));
}

export async function payTo(
  ctx: OperationContext,
  asset: FundingAsset,
  recipient: AccountId,
  amount: bigint,
): Promise<void> {
  ctx.beforeTransfer();
  await settle(`transfer:${recipient}`, () => ctx.transfers.transfer(asset, recipient, amount));
}

export async function payAll(ctx: OperationContext, label: string, legs: TransferLeg[]): Promise<void> {
  const payable = legs.filter((leg) => leg.amount > 0n);
  if (payable.length === 0) return;
  ctx.beforeTransfer();
  await settle(label, () => ctx.transfers.transferAll(payable));
}

/**
 * Split `gross` with the current platform rate and pay net to the creator and
 * the fee to the platform in one all-or-nothing transfer.
 */
export async function payCreatorWithFee(
  ctx: OperationContext,
  record: CampaignRecord,
  gross: bigint,
  label: string,
): Promise<FeeSplit> {
  const split = splitFee(gross, ctx.tx.platform.feeBps);
  await payAll(ctx, `${label}:${record.id}`, [
    { asset: record.asset, recipient: record.creator, amount: split.net },
    { asset: record.asset, recipient: ctx.feeRecipient, amount: split.fee },
  ]);
  return split;
}

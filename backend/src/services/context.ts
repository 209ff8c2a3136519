import type { AccessGate } from '../auth/accessGate';
import { CrowdfundError } from '../ledger/errors';
import type { LedgerTransaction } from '../ledger/LedgerState';
import type { AccountId, CampaignId, CampaignRecord } from '../ledger/types';
import type { ValueTransfer } from '../transfer/types';

export interface OperationContext {
  tx: LedgerTransaction;
  now: number;
  transfers: ValueTransfer;
  gate: AccessGate;
  feeRecipient: AccountId;
  cancelSweepBatch: number;
  /** Runs before every value transfer; throws when the transfer must not happen. */
  beforeTransfer: () => void;
}

export function requireCaller(caller: AccountId): AccountId {
  const trimmed = typeof caller === 'string' ? caller.trim() : '';
  if (!trimmed) {
    throw new CrowdfundError('Unauthorized', 'caller-required');
  }
  return trimmed;
}

export function exists(tx: LedgerTransaction, id: CampaignId): boolean {
  return Number.isInteger(id) && id >= 1 && id <= tx.counter && tx.read(id) !== undefined;
}

export function mustExist(tx: LedgerTransaction, id: CampaignId): CampaignRecord {
  if (!exists(tx, id)) {
    throw new CrowdfundError('CampaignNotFound', `campaign:${id}`);
  }
  return tx.write(id);
}

export function requireCreator(record: CampaignRecord, caller: AccountId): void {
  if (record.creator !== caller) {
    throw new CrowdfundError('Unauthorized', 'creator-only');
  }
}

export function requireOwner(ctx: OperationContext, caller: AccountId): void {
  if (!ctx.gate.isOwner(caller)) {
    throw new CrowdfundError('Unauthorized', 'owner-only');
  }
}

export function requireNotPaused(ctx: OperationContext): void {
  if (ctx.gate.isPaused()) {
    throw new CrowdfundError('EnginePaused');
  }
}

export function requireNotCompleted(record: CampaignRecord): void {
  if (record.completed) {
    throw new CrowdfundError('CampaignClosed', `campaign:${record.id}`);
  }
}

/** Open: not completed and the deadline has not passed. */
export function requireOpen(record: CampaignRecord, now: number): void {
  requireNotCompleted(record);
  if (now >= record.deadline) {
    throw new CrowdfundError('DeadlinePassed', `campaign:${record.id}`);
  }
}

export function requireFunded(record: CampaignRecord): void {
  if (!record.completed || record.cancelled) {
    throw new CrowdfundError('CampaignClosed', `campaign-not-funded:${record.id}`);
  }
}

import { StaticAccessGate } from '../../auth/accessGate';
import { DAY_MS, type PlatformConfig } from '../../config/constants';
import type { Clock } from '../../ledger/clock';
import type { LedgerRepository } from '../../ledger/repository';
import { NATIVE_ASSET, type AccountId, type FundingAsset } from '../../ledger/types';
import type { CreateCampaignInput } from '../../services/CampaignService';
import { CrowdfundEngine } from '../../services/CrowdfundEngine';
import { CustodyLedger } from '../../transfer/CustodyLedger';
import type { TransferLeg, ValueTransfer } from '../../transfer/types';

export const START_MS = 1_700_000_000_000;
export { DAY_MS };

export const TEST_PLATFORM: PlatformConfig = {
  owner: 'admin',
  feeRecipient: 'treasury',
  feeBps: 250,
  maxFeeBps: 1_000,
  cancelSweepBatch: 100,
  allowedTokens: ['tok-1'],
};

export class ManualClock implements Clock {
  constructor(private current = START_MS) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/** Wraps a CustodyLedger so a test can make legs fail or call back into the engine mid-transfer. */
export class ScriptedTransfer implements ValueTransfer {
  failPull = false;
  failTransfer = false;
  failTransferAll = false;
  /** Awaited before a single-recipient transfer settles. */
  onTransfer?: (recipient: AccountId, amount: bigint) => void | Promise<void>;

  constructor(readonly custody: CustodyLedger) {}

  async pull(asset: FundingAsset, from: AccountId, amount: bigint): Promise<boolean> {
    if (this.failPull) return false;
    return this.custody.pull(asset, from, amount);
  }

  async transfer(asset: FundingAsset, recipient: AccountId, amount: bigint): Promise<boolean> {
    await this.onTransfer?.(recipient, amount);
    if (this.failTransfer) return false;
    return this.custody.transfer(asset, recipient, amount);
  }

  async transferAll(legs: TransferLeg[]): Promise<boolean> {
    if (this.failTransferAll) return false;
    return this.custody.transferAll(legs);
  }
}

export type HarnessOptions = {
  platform?: Partial<PlatformConfig>;
  repository?: LedgerRepository;
};

export function createHarness(options: HarnessOptions = {}) {
  const clock = new ManualClock();
  const custody = new CustodyLedger();
  const transfers = new ScriptedTransfer(custody);
  const gate = new StaticAccessGate(TEST_PLATFORM.owner);
  const engine = new CrowdfundEngine({
    transfers,
    gate,
    clock,
    platform: { ...TEST_PLATFORM, ...options.platform },
    repository: options.repository,
  });

  const mint = (account: AccountId, amount: bigint, asset: FundingAsset = NATIVE_ASSET) =>
    custody.mint(asset, account, amount);
  const balance = (account: AccountId, asset: FundingAsset = NATIVE_ASSET) => custody.balanceOf(asset, account);

  return { engine, custody, transfers, gate, clock, mint, balance };
}

export function campaignInput(overrides: Partial<CreateCampaignInput> = {}): CreateCampaignInput {
  return {
    goal: 100n,
    minContribution: 1n,
    maxContribution: 1_000n,
    durationDays: 30,
    title: 'Community garden',
    ...overrides,
  };
}

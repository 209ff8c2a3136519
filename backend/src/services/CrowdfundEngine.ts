import { AsyncLocalStorage } from 'async_hooks';
import type { AccessGate } from '../auth/accessGate';
import { defaultPlatformConfig, type PlatformConfig } from '../config/constants';
import { systemClock, type Clock } from '../ledger/clock';
import { CrowdfundError, PersistenceError } from '../ledger/errors';
import { LedgerState, LedgerTransaction } from '../ledger/LedgerState';
import { OperationQueue } from '../ledger/OperationQueue';
import type { LedgerCommit, LedgerRepository } from '../ledger/repository';
import {
  cloneCampaign,
  unreturnedKey,
  type AccountId,
  type CampaignId,
  type CampaignRecord,
  type CampaignSummary,
  type FundingAsset,
  type LedgerEvent,
  type UnreturnedBalance,
} from '../ledger/types';
import type { ValueTransfer } from '../transfer/types';
import {
  CampaignService,
  type CreateCampaignInput,
  type MetadataUpdate,
  type WithdrawalConfigInput,
} from './CampaignService';
import { ContributionService, type ContributionResult } from './ContributionService';
import { requireCaller, requireOwner, type OperationContext } from './context';
import { LifecycleService } from './LifecycleService';
import { RefundService, type SweepResult } from './RefundService';
import { WithdrawalService, type WithdrawalResult } from './WithdrawalService';

export type EngineOptions = {
  transfers: ValueTransfer;
  gate: AccessGate;
  clock?: Clock;
  platform?: Partial<PlatformConfig>;
  repository?: LedgerRepository;
};

export type EventListener = (event: LedgerEvent) => void;

export type PlatformView = {
  owner: AccountId;
  feeRecipient: AccountId;
  feeBps: number;
  maxFeeBps: number;
  paused: boolean;
  allowedTokens: string[];
};

type RunningOperation = {
  name: string;
  tx: LedgerTransaction;
  parent: RunningOperation | null;
  active: boolean;
};

const shouldLogEvents = process.env.NODE_ENV !== 'test';

/**
 * Campaign accounting engine. Every public mutation is queued, runs in a
 * ledger transaction and either commits fully or is rolled back.
 *
 * A call made from inside a running operation (a transfer backend calling
 * back into the engine) does not queue behind it. It runs at once against the
 * state as the running operation left it, and is rejected with
 * `ReentrantCall` before any transfer or commit if it touches the same
 * campaigns, owners, counter or settings.
 */
export class CrowdfundEngine {
  private readonly state: LedgerState;
  private readonly queue = new OperationQueue();
  private readonly running = new AsyncLocalStorage<RunningOperation>();
  private readonly listeners = new Set<EventListener>();
  private readonly config: PlatformConfig;
  private readonly clock: Clock;
  private readonly transfers: ValueTransfer;
  private readonly gate: AccessGate;
  private readonly repository?: LedgerRepository;

  private readonly campaigns = new CampaignService();
  private readonly refunds = new RefundService();
  private readonly lifecycle = new LifecycleService(this.refunds);
  private readonly contributions = new ContributionService(this.lifecycle);
  private readonly withdrawals = new WithdrawalService();

  constructor(options: EngineOptions) {
    this.config = { ...defaultPlatformConfig(), ...options.platform };
    this.clock = options.clock ?? systemClock;
    this.transfers = options.transfers;
    this.gate = options.gate;
    this.repository = options.repository;
    this.state = new LedgerState({
      feeBps: this.config.feeBps,
      allowedTokens: [...this.config.allowedTokens],
    });
  }

  /** Build an engine and load previously committed state from the repository. */
  static async hydrate(options: EngineOptions & { repository: LedgerRepository }): Promise<CrowdfundEngine> {
    const engine = new CrowdfundEngine(options);
    const snapshot = await options.repository.load();
    for (const campaign of snapshot.campaigns) {
      engine.state.campaigns.set(campaign.id, campaign);
    }
    for (const { account, campaignIds } of snapshot.owners) {
      engine.state.owners.set(account, [...campaignIds]);
    }
    for (const entry of snapshot.unreturned) {
      engine.state.unreturned.set(unreturnedKey(entry.account, entry.asset), { ...entry });
    }
    engine.state.counter = Math.max(snapshot.counter, ...snapshot.campaigns.map((c) => c.id), 0);
    if (snapshot.platform) {
      engine.state.platform = {
        feeBps: snapshot.platform.feeBps,
        allowedTokens: [...snapshot.platform.allowedTokens],
      };
      options.gate.setPaused(snapshot.platform.paused);
    }
    return engine;
  }

  onEvent(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves when every queued operation has settled. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  // Registry

  createCampaign(caller: AccountId, input: CreateCampaignInput): Promise<CampaignId> {
    return this.execute('createCampaign', async (ctx) => this.campaigns.createCampaign(ctx, caller, input));
  }

  updateMetadata(caller: AccountId, id: CampaignId, update: MetadataUpdate): Promise<void> {
    return this.execute('updateMetadata', async (ctx) => this.campaigns.updateMetadata(ctx, caller, id, update));
  }

  transferOwnership(caller: AccountId, id: CampaignId, newCreator: AccountId): Promise<void> {
    return this.execute('transferOwnership', async (ctx) =>
      this.campaigns.transferOwnership(ctx, caller, id, newCreator),
    );
  }

  setFundingAsset(caller: AccountId, id: CampaignId, asset: FundingAsset): Promise<void> {
    return this.execute('setFundingAsset', async (ctx) => this.campaigns.setFundingAsset(ctx, caller, id, asset));
  }

  configureWithdrawals(caller: AccountId, id: CampaignId, config: WithdrawalConfigInput): Promise<void> {
    return this.execute('configureWithdrawals', async (ctx) =>
      this.campaigns.configureWithdrawals(ctx, caller, id, config),
    );
  }

  // Contributions and lifecycle

  contribute(caller: AccountId, id: CampaignId, amount: bigint): Promise<ContributionResult> {
    return this.execute('contribute', (ctx) => this.contributions.contribute(ctx, caller, id, amount));
  }

  cancelCampaign(caller: AccountId, id: CampaignId): Promise<SweepResult> {
    return this.execute('cancelCampaign', (ctx) => this.lifecycle.cancelCampaign(ctx, caller, id));
  }

  modifyGoal(caller: AccountId, id: CampaignId, newGoal: bigint): Promise<void> {
    return this.execute('modifyGoal', async (ctx) => this.lifecycle.modifyGoal(ctx, caller, id, newGoal));
  }

  extendDeadline(caller: AccountId, id: CampaignId, extraDays: number): Promise<number> {
    return this.execute('extendDeadline', async (ctx) => this.lifecycle.extendDeadline(ctx, caller, id, extraDays));
  }

  // Refunds

  enableRefunds(caller: AccountId, id: CampaignId): Promise<void> {
    return this.execute('enableRefunds', async (ctx) => this.refunds.enableRefunds(ctx, caller, id));
  }

  requestRefund(caller: AccountId, id: CampaignId): Promise<bigint> {
    return this.execute('requestRefund', (ctx) => this.refunds.requestRefund(ctx, caller, id));
  }

  sweepRefunds(caller: AccountId, id: CampaignId, limit?: number): Promise<SweepResult> {
    return this.execute('sweepRefunds', (ctx) => this.refunds.sweepRefunds(ctx, caller, id, limit));
  }

  claimUnreturned(caller: AccountId, asset: FundingAsset): Promise<bigint> {
    return this.execute('claimUnreturned', (ctx) => this.contributions.claimUnreturned(ctx, caller, asset));
  }

  // Withdrawals and milestones

  withdrawSurplus(caller: AccountId, id: CampaignId): Promise<WithdrawalResult> {
    return this.execute('withdrawSurplus', (ctx) => this.withdrawals.withdrawSurplus(ctx, caller, id));
  }

  withdrawPartialFunds(caller: AccountId, id: CampaignId, amount: bigint): Promise<WithdrawalResult> {
    return this.execute('withdrawPartialFunds', (ctx) =>
      this.withdrawals.withdrawPartialFunds(ctx, caller, id, amount),
    );
  }

  addMilestone(caller: AccountId, id: CampaignId, amount: bigint, description: string): Promise<number> {
    return this.execute('addMilestone', async (ctx) =>
      this.withdrawals.addMilestone(ctx, caller, id, amount, description),
    );
  }

  completeMilestone(caller: AccountId, id: CampaignId, index: number): Promise<WithdrawalResult> {
    return this.execute('completeMilestone', (ctx) => this.withdrawals.completeMilestone(ctx, caller, id, index));
  }

  // Platform administration

  setPaused(caller: AccountId, paused: boolean): Promise<void> {
    return this.execute('setPaused', async (ctx) => {
      requireOwner(ctx, requireCaller(caller));
      this.gate.setPaused(paused);
      // Touch the settings so the pause flag is persisted with them.
      ctx.tx.writePlatform();
      ctx.tx.emit({ type: 'PlatformUpdated', setting: 'paused' });
    });
  }

  setVerified(caller: AccountId, id: CampaignId, verified: boolean): Promise<void> {
    return this.execute('setVerified', async (ctx) => this.campaigns.setFlag(ctx, caller, id, 'verified', verified));
  }

  setPromoted(caller: AccountId, id: CampaignId, promoted: boolean): Promise<void> {
    return this.execute('setPromoted', async (ctx) => this.campaigns.setFlag(ctx, caller, id, 'promoted', promoted));
  }

  allowToken(caller: AccountId, tokenId: string): Promise<void> {
    return this.execute('allowToken', async (ctx) => {
      requireOwner(ctx, requireCaller(caller));
      const token = tokenId.trim();
      if (!token) throw new CrowdfundError('InvalidParameters', 'token-required');
      const platform = ctx.tx.writePlatform();
      if (!platform.allowedTokens.includes(token)) {
        platform.allowedTokens.push(token);
      }
      ctx.tx.emit({ type: 'PlatformUpdated', setting: 'allowedTokens' });
    });
  }

  disallowToken(caller: AccountId, tokenId: string): Promise<void> {
    return this.execute('disallowToken', async (ctx) => {
      requireOwner(ctx, requireCaller(caller));
      const platform = ctx.tx.writePlatform();
      platform.allowedTokens = platform.allowedTokens.filter((token) => token !== tokenId.trim());
      ctx.tx.emit({ type: 'PlatformUpdated', setting: 'allowedTokens' });
    });
  }

  setPlatformFee(caller: AccountId, feeBps: number): Promise<void> {
    return this.execute('setPlatformFee', async (ctx) => {
      requireOwner(ctx, requireCaller(caller));
      if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > this.config.maxFeeBps) {
        throw new CrowdfundError('InvalidParameters', 'fee-bps-invalid');
      }
      ctx.tx.writePlatform().feeBps = feeBps;
      ctx.tx.emit({ type: 'PlatformUpdated', setting: 'feeBps' });
    });
  }

  // Queries

  exists(id: CampaignId): boolean {
    return this.campaigns.exists(this.state, id);
  }

  getCampaign(id: CampaignId): CampaignSummary {
    return this.campaigns.getCampaign(this.state, id, this.clock.now());
  }

  getContribution(id: CampaignId, account: AccountId): bigint {
    return this.campaigns.getRecord(this.state, id).contributions.get(account) ?? 0n;
  }

  getContributors(id: CampaignId): AccountId[] {
    return [...this.campaigns.getRecord(this.state, id).roster];
  }

  getCampaignsByOwner(account: AccountId): CampaignId[] {
    return this.campaigns.getCampaignsByOwner(this.state, account);
  }

  getUnreturned(account: AccountId): UnreturnedBalance[] {
    return this.state.getUnreturned(account);
  }

  listCampaigns(): CampaignSummary[] {
    return this.campaigns.listCampaigns(this.state, this.clock.now());
  }

  listActiveCampaigns(): CampaignSummary[] {
    return this.campaigns.listActive(this.state, this.clock.now());
  }

  listSuccessfulCampaigns(): CampaignSummary[] {
    return this.campaigns.listSuccessful(this.state, this.clock.now());
  }

  listVerifiedCampaigns(): CampaignSummary[] {
    return this.campaigns.listVerified(this.state, this.clock.now());
  }

  listPromotedCampaigns(): CampaignSummary[] {
    return this.campaigns.listPromoted(this.state, this.clock.now());
  }

  getPlatformSettings(): PlatformView {
    return {
      owner: this.config.owner,
      feeRecipient: this.config.feeRecipient,
      feeBps: this.state.platform.feeBps,
      maxFeeBps: this.config.maxFeeBps,
      paused: this.gate.isPaused(),
      allowedTokens: [...this.state.platform.allowedTokens],
    };
  }

  private execute<T>(name: string, operation: (ctx: OperationContext) => Promise<T>): Promise<T> {
    const current = this.running.getStore();
    if (current?.active) {
      // Queueing here would wait on the operation that is waiting on us.
      return this.runFrame({ name, tx: new LedgerTransaction(this.state), parent: current, active: true }, operation);
    }
    return this.queue.run(() =>
      this.runFrame({ name, tx: new LedgerTransaction(this.state), parent: null, active: true }, operation),
    );
  }

  private runFrame<T>(frame: RunningOperation, operation: (ctx: OperationContext) => Promise<T>): Promise<T> {
    const guard = () => {
      for (let outer = frame.parent; outer; outer = outer.parent) {
        if (frame.tx.overlaps(outer.tx)) {
          throw new CrowdfundError('ReentrantCall', `${frame.name}:inside:${outer.name}`);
        }
      }
    };
    return this.running.run(frame, async () => {
      try {
        return await this.runOperation(frame, guard, operation);
      } finally {
        frame.active = false;
      }
    });
  }

  private async runOperation<T>(
    frame: RunningOperation,
    guard: () => void,
    operation: (ctx: OperationContext) => Promise<T>,
  ): Promise<T> {
    const { name, tx } = frame;
    const ctx: OperationContext = {
      tx,
      now: this.clock.now(),
      transfers: this.transfers,
      gate: this.gate,
      feeRecipient: this.config.feeRecipient,
      cancelSweepBatch: this.config.cancelSweepBatch,
      beforeTransfer: guard,
    };

    let result: T;
    try {
      result = await operation(ctx);
      guard();
    } catch (err) {
      frame.active = false;
      tx.rollback();
      if (shouldLogEvents) {
        const code = err instanceof CrowdfundError ? err.code : 'internal-error';
        console.warn(`[engine] ${name} rejected: ${code}`);
      }
      await this.persistSurvivors(name, tx);
      throw err;
    }

    // Listeners and later callers queue normally from here on.
    frame.active = false;
    const events = [...tx.events];
    try {
      await this.persist(name, tx, events);
    } catch (err) {
      this.publish(events);
      throw new PersistenceError(name, err);
    }
    this.publish(events);
    return result;
  }

  /** Persist and publish what a rolled-back transaction kept. The operation's own error still reaches the caller. */
  private async persistSurvivors(name: string, tx: LedgerTransaction): Promise<void> {
    const events = [...tx.events];
    if (events.length === 0) return;
    try {
      await this.persist(name, tx, events);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[engine] ${name} could not persist records kept after rollback: ${message}`);
    }
    this.publish(events);
  }

  private async persist(name: string, tx: LedgerTransaction, events: LedgerEvent[]): Promise<void> {
    if (!this.repository) return;
    const changes = tx.changes();
    const commit: LedgerCommit = {
      campaigns: changes.campaignIds
        .map((id) => this.state.getCampaign(id))
        .filter((record): record is CampaignRecord => record !== undefined)
        .map(cloneCampaign),
      owners: changes.owners.map((account) => ({ account, campaignIds: this.state.getOwned(account) })),
      unreturned: changes.unreturned
        .map((key) => this.state.unreturned.get(key))
        .filter((entry): entry is UnreturnedBalance => entry !== undefined)
        .map((entry) => ({ ...entry, asset: { ...entry.asset } })),
      counter: changes.counterChanged ? this.state.counter : null,
      platform: changes.platformChanged
        ? {
            feeBps: this.state.platform.feeBps,
            allowedTokens: [...this.state.platform.allowedTokens],
            paused: this.gate.isPaused(),
          }
        : null,
      events,
    };
    if (
      commit.campaigns.length === 0 &&
      commit.owners.length === 0 &&
      commit.unreturned.length === 0 &&
      !commit.platform &&
      events.length === 0
    ) {
      return;
    }
    try {
      await this.repository.commit(commit);
    } catch (err) {
      // Transfers already happened; memory stays authoritative.
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[engine] ${name} committed in memory but persistence failed: ${message}`);
      throw err;
    }
  }

  private publish(events: LedgerEvent[]): void {
    for (const event of events) {
      if (shouldLogEvents) {
        console.log(`[engine] ${event.type}`, 'campaignId' in event ? `campaign=${event.campaignId}` : '');
      }
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          console.error(`[engine] event listener failed on ${event.type}: ${message}`);
        }
      }
    }
  }
}

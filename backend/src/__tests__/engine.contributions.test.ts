import { afterEach, describe, expect, it, vi } from 'vitest';
import { isCrowdfundError } from '../ledger/errors';
import { NATIVE_ASSET, type LedgerEvent } from '../ledger/types';
import { DAY_MS, campaignInput, createHarness } from './helpers/engineHarness';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('contributions', () => {
  it('pulls funds into custody and credits the contributor', async () => {
    const { engine, custody, mint, balance } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 100n);

    await expect(engine.contribute('alice', id, 40n)).resolves.toEqual({
      contributed: 40n,
      raised: 40n,
      funded: false,
    });
    await engine.contribute('alice', id, 10n);

    expect(engine.getContribution(id, 'alice')).toBe(50n);
    expect(engine.getContributors(id)).toEqual(['alice']);
    expect(engine.getCampaign(id).backerCount).toBe(1);
    expect(balance('alice')).toBe(50n);
    expect(custody.custodyBalance({ kind: 'native' })).toBe(50n);
  });

  it('enforces the per-call bounds', async () => {
    const { engine, mint } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput({ minContribution: 5n, maxContribution: 50n }));
    mint('alice', 100n);

    await expect(engine.contribute('alice', id, 4n)).rejects.toMatchObject({ kind: 'ContributionOutOfBounds' });
    await expect(engine.contribute('alice', id, 51n)).rejects.toMatchObject({ kind: 'ContributionOutOfBounds' });
    await expect(engine.contribute('alice', id, 0n)).rejects.toMatchObject({ kind: 'ContributionOutOfBounds' });
    await expect(engine.contribute('alice', id, 5n)).resolves.toMatchObject({ raised: 5n });
    await expect(engine.contribute('alice', id, 50n)).resolves.toMatchObject({ raised: 55n });
  });

  it('stops accepting contributions at the deadline', async () => {
    const { engine, clock, mint } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 100n);

    clock.advance(30 * DAY_MS - 1);
    await engine.contribute('alice', id, 10n);
    clock.advance(1);
    await expect(engine.contribute('alice', id, 10n)).rejects.toMatchObject({ kind: 'DeadlinePassed' });
    expect(engine.getCampaign(id).status).toBe('expired');
  });

  it('leaves the ledger untouched when the pull fails', async () => {
    const { engine, mint } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 5n);

    await expect(engine.contribute('alice', id, 10n)).rejects.toMatchObject({ kind: 'TransferFailed' });
    expect(engine.getCampaign(id)).toMatchObject({ raised: 0n, backerCount: 0 });
    expect(engine.getContributors(id)).toEqual([]);
  });

  it('funds the campaign in the contribution that crosses the goal', async () => {
    const { engine, custody, mint, balance } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 100n);
    mint('bob', 100n);

    await engine.contribute('alice', id, 40n);
    await expect(engine.contribute('bob', id, 70n)).resolves.toEqual({
      contributed: 70n,
      raised: 110n,
      funded: true,
    });

    expect(engine.getCampaign(id)).toMatchObject({ status: 'funded', completed: true, raised: 110n, released: 100n });
    // Goal portion 100 at 250 bps: fee 2, net 98.
    expect(balance('creator')).toBe(98n);
    expect(balance('treasury')).toBe(2n);
    expect(custody.custodyBalance({ kind: 'native' })).toBe(10n);

    await expect(engine.contribute('alice', id, 5n)).rejects.toMatchObject({ kind: 'CampaignClosed' });
  });

  it('rolls back a contribution whose funding payout fails and returns the pulled amount', async () => {
    const { engine, transfers, custody, mint, balance } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 1_000n);
    const events: LedgerEvent[] = [];
    engine.onEvent((event) => events.push(event));

    transfers.failTransferAll = true;
    await expect(engine.contribute('alice', id, 100n)).rejects.toMatchObject({ kind: 'TransferFailed' });

    expect(engine.getCampaign(id)).toMatchObject({
      raised: 0n,
      released: 0n,
      backerCount: 0,
      completed: false,
      status: 'open',
    });
    expect(engine.getContribution(id, 'alice')).toBe(0n);
    expect(engine.getContributors(id)).toEqual([]);
    expect(balance('alice')).toBe(1_000n);
    expect(balance('creator')).toBe(0n);
    expect(custody.custodyBalance({ kind: 'native' })).toBe(0n);
    expect(events).toEqual([]);

    transfers.failTransferAll = false;
    await expect(engine.contribute('alice', id, 100n)).resolves.toMatchObject({ funded: true });
  });

  it('does not list a returning contributor twice after a refund', async () => {
    const { engine, mint } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 100n);

    await engine.contribute('alice', id, 20n);
    await engine.enableRefunds('creator', id);
    await engine.requestRefund('alice', id);
    await engine.contribute('alice', id, 30n);

    expect(engine.getContributors(id)).toEqual(['alice']);
    expect(engine.getCampaign(id)).toMatchObject({ backerCount: 1, raised: 30n });
    expect(engine.getContribution(id, 'alice')).toBe(30n);
  });

  it('emits events after the operation commits', async () => {
    const { engine, mint } = createHarness();
    const seen: string[] = [];
    const unsubscribe = engine.onEvent((event) => seen.push(event.type));
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 100n);

    await engine.contribute('alice', id, 100n);
    unsubscribe();
    await engine.createCampaign('creator', campaignInput());

    expect(seen).toEqual(['CampaignCreated', 'ContributionReceived', 'CampaignFunded']);
  });

  it('books the amount as unreturned when returning it also fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { engine, transfers, custody, mint, balance } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 100n);
    const events: LedgerEvent[] = [];
    engine.onEvent((event) => events.push(event));

    transfers.failTransferAll = true;
    transfers.failTransfer = true;
    await expect(engine.contribute('alice', id, 100n)).rejects.toMatchObject({ kind: 'TransferFailed' });

    expect(engine.getCampaign(id)).toMatchObject({ raised: 0n, backerCount: 0, completed: false });
    expect(balance('alice')).toBe(0n);
    expect(custody.custodyBalance(NATIVE_ASSET)).toBe(100n);
    expect(engine.getUnreturned('alice')).toEqual([{ account: 'alice', asset: NATIVE_ASSET, amount: 100n }]);
    expect(events).toEqual([
      { type: 'ReturnFailed', campaignId: id, contributor: 'alice', asset: NATIVE_ASSET, amount: 100n },
    ]);

    await expect(engine.claimUnreturned('alice', NATIVE_ASSET)).rejects.toMatchObject({ kind: 'TransferFailed' });
    expect(engine.getUnreturned('alice')).toEqual([{ account: 'alice', asset: NATIVE_ASSET, amount: 100n }]);

    transfers.failTransfer = false;
    await expect(engine.claimUnreturned('alice', NATIVE_ASSET)).resolves.toBe(100n);
    expect(balance('alice')).toBe(100n);
    expect(custody.custodyBalance(NATIVE_ASSET)).toBe(0n);
    expect(engine.getUnreturned('alice')).toEqual([]);
    await expect(engine.claimUnreturned('alice', NATIVE_ASSET)).rejects.toMatchObject({ kind: 'NoContribution' });
  });

  it('settles every queued operation before idle resolves', async () => {
    const { engine, mint } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 100n);

    const accepted = engine.contribute('alice', id, 30n);
    const rejected = engine.contribute('alice', id, 0n).catch((err: unknown) => err);
    await engine.idle();

    expect(engine.getCampaign(id).raised).toBe(30n);
    await expect(accepted).resolves.toMatchObject({ raised: 30n });
    expect(isCrowdfundError(await rejected, 'ContributionOutOfBounds')).toBe(true);
  });
});

describe('calls made from inside a transfer', () => {
  it('rejects a refund re-requested while its own payout is in flight', async () => {
    const { engine, transfers, mint, balance } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 100n);
    await engine.contribute('alice', id, 50n);
    await engine.enableRefunds('creator', id);

    let inner: unknown = null;
    let entered = false;
    transfers.onTransfer = async (recipient) => {
      if (recipient !== 'alice' || entered) return;
      entered = true;
      inner = await engine.requestRefund('alice', id).then(
        (paid) => paid,
        (err: unknown) => err,
      );
    };

    await expect(engine.requestRefund('alice', id)).resolves.toBe(50n);

    expect(isCrowdfundError(inner, 'NoContribution')).toBe(true);
    expect(balance('alice')).toBe(100n);
    expect(engine.getCampaign(id).raised).toBe(0n);
    await expect(engine.createCampaign('creator', campaignInput())).resolves.toBe(id + 1);
  });

  it('rejects a contribution to the campaign being refunded before any funds move', async () => {
    const { engine, transfers, custody, mint, balance } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 100n);
    mint('bob', 10n);
    await engine.contribute('alice', id, 50n);
    await engine.enableRefunds('creator', id);

    let inner: unknown = null;
    transfers.onTransfer = async () => {
      transfers.onTransfer = undefined;
      inner = await engine.contribute('bob', id, 10n).then(
        (result) => result,
        (err: unknown) => err,
      );
    };

    await expect(engine.requestRefund('alice', id)).resolves.toBe(50n);

    expect(inner).toMatchObject({ kind: 'ReentrantCall', detail: 'contribute:inside:requestRefund' });
    expect(balance('bob')).toBe(10n);
    expect(custody.custodyBalance(NATIVE_ASSET)).toBe(0n);
    expect(engine.getContributors(id)).toEqual(['alice']);
    expect(engine.getCampaign(id).raised).toBe(0n);
  });

  it('runs a contribution to another campaign straight away', async () => {
    const { engine, transfers, custody, mint, balance } = createHarness();
    const refunding = await engine.createCampaign('creator', campaignInput());
    const other = await engine.createCampaign('creator', campaignInput({ title: 'Tool library' }));
    mint('alice', 100n);
    mint('bob', 30n);
    await engine.contribute('alice', refunding, 50n);
    await engine.enableRefunds('creator', refunding);
    const seen: string[] = [];
    engine.onEvent((event) => seen.push(event.type));

    let inner: unknown = null;
    transfers.onTransfer = async () => {
      transfers.onTransfer = undefined;
      inner = await engine.contribute('bob', other, 30n);
    };

    await expect(engine.requestRefund('alice', refunding)).resolves.toBe(50n);

    expect(inner).toEqual({ contributed: 30n, raised: 30n, funded: false });
    expect(engine.getCampaign(other).raised).toBe(30n);
    expect(balance('bob')).toBe(0n);
    expect(balance('alice')).toBe(100n);
    expect(custody.custodyBalance(NATIVE_ASSET)).toBe(30n);
    expect(seen).toEqual(['ContributionReceived', 'RefundIssued']);
  });
});

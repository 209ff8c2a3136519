import { describe, expect, it } from 'vitest';
import { NATIVE_ASSET } from '../ledger/types';
import { DAY_MS, START_MS, campaignInput, createHarness } from './helpers/engineHarness';

describe('campaign registry', () => {
  it('creates campaigns with sequential ids and indexes them by owner', async () => {
    const { engine } = createHarness();

    await expect(engine.createCampaign('creator', campaignInput())).resolves.toBe(1);
    await expect(engine.createCampaign('creator', campaignInput({ title: 'Second' }))).resolves.toBe(2);

    expect(engine.getCampaignsByOwner('creator')).toEqual([1, 2]);
    const summary = engine.getCampaign(1);
    expect(summary).toMatchObject({
      id: 1,
      creator: 'creator',
      title: 'Community garden',
      goal: 100n,
      raised: 0n,
      released: 0n,
      createdAt: START_MS,
      deadline: START_MS + 30 * DAY_MS,
      asset: NATIVE_ASSET,
      status: 'open',
      backerCount: 0,
      completed: false,
      cancelled: false,
      refundable: false,
    });
    expect(summary.withdrawalLimit).toEqual({
      enabled: false,
      ceiling: 0n,
      totalWithdrawn: 0n,
      lastWithdrawalAt: null,
      minInterval: 0,
    });
  });

  it('rejects invalid parameters without consuming an id', async () => {
    const { engine } = createHarness();

    await expect(engine.createCampaign('creator', campaignInput({ goal: 0n }))).rejects.toMatchObject({
      kind: 'InvalidParameters',
      detail: 'goal-invalid',
    });
    await expect(engine.createCampaign('creator', campaignInput({ minContribution: 0n }))).rejects.toMatchObject({
      kind: 'InvalidParameters',
    });
    await expect(
      engine.createCampaign('creator', campaignInput({ minContribution: 10n, maxContribution: 5n })),
    ).rejects.toMatchObject({ kind: 'InvalidParameters' });
    await expect(engine.createCampaign('creator', campaignInput({ durationDays: 0 }))).rejects.toMatchObject({
      kind: 'InvalidParameters',
    });
    await expect(engine.createCampaign('creator', campaignInput({ title: '   ' }))).rejects.toMatchObject({
      kind: 'InvalidParameters',
      detail: 'title-required',
    });

    expect(engine.exists(1)).toBe(false);
    await expect(engine.createCampaign('creator', campaignInput())).resolves.toBe(1);
  });

  it('requires a caller', async () => {
    const { engine } = createHarness();
    await expect(engine.createCampaign('  ', campaignInput())).rejects.toMatchObject({
      kind: 'Unauthorized',
      detail: 'caller-required',
    });
  });

  it('reports unknown ids as not found', async () => {
    const { engine } = createHarness();
    await engine.createCampaign('creator', campaignInput());

    expect(engine.exists(0)).toBe(false);
    expect(engine.exists(2)).toBe(false);
    expect(() => engine.getCampaign(2)).toThrow('campaign-not-found');
    expect(() => engine.getContributors(0)).toThrow('campaign-not-found');
    await expect(engine.contribute('alice', 9, 10n)).rejects.toMatchObject({ kind: 'CampaignNotFound' });
  });

  it('accepts only allowed tokens as funding assets', async () => {
    const { engine } = createHarness();

    await expect(
      engine.createCampaign('creator', campaignInput({ asset: { kind: 'token', tokenId: 'tok-9' } })),
    ).rejects.toMatchObject({ kind: 'InvalidParameters', detail: 'token-not-allowed' });

    const id = await engine.createCampaign('creator', campaignInput({ asset: { kind: 'token', tokenId: 'tok-1' } }));
    expect(engine.getCampaign(id).asset).toEqual({ kind: 'token', tokenId: 'tok-1' });
  });

  it('updates metadata, treating empty strings as no change', async () => {
    const { engine } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput({ description: 'Seeds and soil' }));

    await engine.updateMetadata('creator', id, { title: '', description: 'Seeds, soil and tools', category: 'local' });

    expect(engine.getCampaign(id)).toMatchObject({
      title: 'Community garden',
      description: 'Seeds, soil and tools',
      category: 'local',
      mediaRef: '',
    });
    await expect(engine.updateMetadata('mallory', id, { title: 'Mine now' })).rejects.toMatchObject({
      kind: 'Unauthorized',
    });
  });

  it('transfers ownership between owner indexes', async () => {
    const { engine } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());

    await expect(engine.transferOwnership('creator', id, 'creator')).rejects.toMatchObject({
      kind: 'InvalidParameters',
    });
    await engine.transferOwnership('creator', id, 'dana');

    expect(engine.getCampaign(id).creator).toBe('dana');
    expect(engine.getCampaignsByOwner('creator')).toEqual([]);
    expect(engine.getCampaignsByOwner('dana')).toEqual([id]);
    await expect(engine.updateMetadata('creator', id, { title: 'Old owner' })).rejects.toMatchObject({
      kind: 'Unauthorized',
    });
  });

  it('locks the funding asset once someone has contributed', async () => {
    const { engine, mint } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());

    await engine.setFundingAsset('creator', id, { kind: 'token', tokenId: 'tok-1' });
    expect(engine.getCampaign(id).asset).toEqual({ kind: 'token', tokenId: 'tok-1' });
    await engine.setFundingAsset('creator', id, NATIVE_ASSET);

    mint('alice', 10n);
    await engine.contribute('alice', id, 10n);
    await expect(
      engine.setFundingAsset('creator', id, { kind: 'token', tokenId: 'tok-1' }),
    ).rejects.toMatchObject({ kind: 'InvalidParameters', detail: 'asset-locked' });
  });

  it('configures partial withdrawals and the withdrawal ceiling', async () => {
    const { engine, mint } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput({ goal: 1_000n }));

    await engine.configureWithdrawals('creator', id, {
      allowPartialWithdrawals: true,
      limit: { ceiling: 50n, minIntervalMs: DAY_MS },
    });
    expect(engine.getCampaign(id).allowPartialWithdrawals).toBe(true);
    expect(engine.getCampaign(id).withdrawalLimit).toMatchObject({ enabled: true, ceiling: 50n, minInterval: DAY_MS });

    mint('alice', 100n);
    await engine.contribute('alice', id, 100n);
    await engine.withdrawPartialFunds('creator', id, 40n);

    await expect(
      engine.configureWithdrawals('creator', id, { limit: { ceiling: 39n } }),
    ).rejects.toMatchObject({ kind: 'InvalidParameters', detail: 'ceiling-below-withdrawn' });

    await engine.configureWithdrawals('creator', id, { limit: null });
    expect(engine.getCampaign(id).withdrawalLimit).toEqual({
      enabled: false,
      ceiling: 0n,
      totalWithdrawn: 40n,
      lastWithdrawalAt: START_MS,
      minInterval: 0,
    });
  });
});

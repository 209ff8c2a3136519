import { describe, expect, it } from 'vitest';
import { NATIVE_ASSET } from '../ledger/types';
import { START_MS, campaignInput, createHarness } from './helpers/engineHarness';

describe('failed payouts', () => {
  it('keeps the contribution record when a refund transfer fails', async () => {
    const { engine, transfers, custody, mint, balance } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 100n);
    await engine.contribute('alice', id, 50n);
    await engine.enableRefunds('creator', id);
    const seen: string[] = [];
    engine.onEvent((event) => seen.push(event.type));

    transfers.failTransfer = true;
    await expect(engine.requestRefund('alice', id)).rejects.toMatchObject({ kind: 'TransferFailed' });

    expect(engine.getContribution(id, 'alice')).toBe(50n);
    expect(engine.getCampaign(id).raised).toBe(50n);
    expect(balance('alice')).toBe(50n);
    expect(custody.custodyBalance(NATIVE_ASSET)).toBe(50n);
    expect(seen).toEqual([]);

    transfers.failTransfer = false;
    await expect(engine.requestRefund('alice', id)).resolves.toBe(50n);
  });

  it('leaves raised and the withdrawal limit alone when a partial withdrawal fails', async () => {
    const { engine, transfers, custody, mint, balance } = createHarness();
    const id = await engine.createCampaign(
      'creator',
      campaignInput({ goal: 1_000n, allowPartialWithdrawals: true, withdrawalLimit: { ceiling: 100n } }),
    );
    mint('alice', 200n);
    await engine.contribute('alice', id, 200n);

    transfers.failTransferAll = true;
    await expect(engine.withdrawPartialFunds('creator', id, 60n)).rejects.toMatchObject({ kind: 'TransferFailed' });

    const summary = engine.getCampaign(id);
    expect(summary.raised).toBe(200n);
    expect(summary.withdrawalLimit.totalWithdrawn).toBe(0n);
    expect(summary.withdrawalLimit.lastWithdrawalAt).toBeNull();
    expect(balance('creator')).toBe(0n);
    expect(custody.custodyBalance(NATIVE_ASSET)).toBe(200n);

    transfers.failTransferAll = false;
    await expect(engine.withdrawPartialFunds('creator', id, 60n)).resolves.toEqual({ amount: 60n, fee: 1n, net: 59n });
  });

  it('keeps the surplus in the campaign when its payout fails', async () => {
    const { engine, transfers, custody, mint, balance } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    mint('alice', 150n);
    await engine.contribute('alice', id, 150n);
    // Completion paid 100: fee 2, net 98.
    expect(balance('creator')).toBe(98n);

    transfers.failTransferAll = true;
    await expect(engine.withdrawSurplus('creator', id)).rejects.toMatchObject({ kind: 'TransferFailed' });

    expect(engine.getCampaign(id).raised).toBe(150n);
    expect(balance('creator')).toBe(98n);
    expect(custody.custodyBalance(NATIVE_ASSET)).toBe(50n);

    transfers.failTransferAll = false;
    await expect(engine.withdrawSurplus('creator', id)).resolves.toEqual({ amount: 50n, fee: 1n, net: 49n });
  });

  it('leaves a milestone open when its release fails', async () => {
    const { engine, transfers, custody, mint, balance } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput());
    await engine.addMilestone('creator', id, 30n, 'Prototype');
    mint('alice', 100n);
    await engine.contribute('alice', id, 100n);
    // Completion paid 70: fee 1, net 69.
    expect(balance('creator')).toBe(69n);

    transfers.failTransferAll = true;
    await expect(engine.completeMilestone('creator', id, 0)).rejects.toMatchObject({ kind: 'TransferFailed' });

    const summary = engine.getCampaign(id);
    expect(summary.released).toBe(70n);
    expect(summary.milestones[0].completed).toBe(false);
    expect(summary.withdrawalLimit.totalWithdrawn).toBe(0n);
    expect(summary.withdrawalLimit.lastWithdrawalAt).toBeNull();
    expect(custody.custodyBalance(NATIVE_ASSET)).toBe(30n);

    transfers.failTransferAll = false;
    await expect(engine.completeMilestone('creator', id, 0)).resolves.toEqual({ amount: 30n, fee: 0n, net: 30n });
    expect(engine.getCampaign(id).withdrawalLimit.lastWithdrawalAt).toBe(START_MS);
  });
});

describe('raised balance', () => {
  it('equals contributions less refunds and withdrawals after every step', async () => {
    const { engine, transfers, custody, mint } = createHarness();
    const id = await engine.createCampaign('creator', campaignInput({ goal: 1_000n, allowPartialWithdrawals: true }));
    mint('alice', 300n);
    mint('bob', 200n);
    mint('carol', 50n);

    const totals = { contributed: 0n, refunded: 0n, withdrawn: 0n };
    engine.onEvent((event) => {
      if (event.type === 'ContributionReceived') totals.contributed += event.amount;
      if (event.type === 'RefundIssued') totals.refunded += event.amount;
      if (event.type === 'PartialWithdrawal') totals.withdrawn += event.amount;
    });
    const check = (expected: bigint) => {
      const { raised } = engine.getCampaign(id);
      expect(raised).toBe(expected);
      expect(raised).toBe(totals.contributed - totals.refunded - totals.withdrawn);
      expect(custody.custodyBalance(NATIVE_ASSET)).toBe(raised);
    };

    await engine.contribute('alice', id, 300n);
    check(300n);
    await engine.contribute('bob', id, 200n);
    check(500n);
    await engine.withdrawPartialFunds('creator', id, 100n);
    check(400n);
    await engine.enableRefunds('creator', id);
    await expect(engine.requestRefund('alice', id)).resolves.toBe(300n);
    check(100n);
    // Bob's record is 200 but only 100 is left.
    await expect(engine.requestRefund('bob', id)).resolves.toBe(100n);
    check(0n);
    await engine.contribute('carol', id, 50n);
    check(50n);
    transfers.failTransferAll = true;
    await expect(engine.withdrawPartialFunds('creator', id, 20n)).rejects.toMatchObject({ kind: 'TransferFailed' });
    check(50n);
    transfers.failTransferAll = false;
    await expect(engine.requestRefund('carol', id)).resolves.toBe(50n);
    check(0n);

    expect(totals).toEqual({ contributed: 550n, refunded: 450n, withdrawn: 100n });
  });
});

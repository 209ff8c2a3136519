import fs from 'fs';
import path from 'path';
import sqlite3 from 'sqlite3';
import { Database, open } from 'sqlite';
import {
  assetKey,
  parseAssetKey,
  type AccountId,
  type CampaignId,
  type CampaignRecord,
  type FundingAsset,
  type LedgerEvent,
  type Milestone,
  type UnreturnedBalance,
} from '../ledger/types';
import { OperationQueue } from '../ledger/OperationQueue';
import type { BalanceEntry } from '../transfer/types';
import { bigintReplacer } from '../utils/json';

const DEFAULT_DB_FILENAME = 'crowdvault.db';

let dbPromise: Promise<Database<sqlite3.Database, sqlite3.Statement>> | null = null;
let dbPromisePath: string | null = null;

function getDataDir(): string {
  const dataDir = path.join(process.cwd(), 'data');
  fs.mkdirSync(dataDir, { recursive: true });
  return dataDir;
}

export function getDefaultDbPath(): string {
  return path.join(getDataDir(), DEFAULT_DB_FILENAME);
}

function getEffectiveDbPath(dbPath?: string): string {
  const envPath = process.env.CROWDVAULT_SQLITE_PATH?.trim();
  return dbPath ?? (envPath && envPath.length > 0 ? envPath : getDefaultDbPath());
}

export async function openDatabase(dbPath?: string): Promise<Database> {
  const effectivePath = getEffectiveDbPath(dbPath);
  if (!dbPromise || dbPromisePath !== effectivePath) {
    dbPromise = open({
      filename: effectivePath,
      driver: sqlite3.Database,
    });
    dbPromisePath = effectivePath;
  }
  return dbPromise;
}

export async function initializeDatabase(database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());

  await db.exec(`
    CREATE TABLE IF NOT EXISTS campaigns (
      id INTEGER PRIMARY KEY,
      creator TEXT NOT NULL,
      title TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      mediaRef TEXT NOT NULL DEFAULT '',
      category TEXT NOT NULL DEFAULT '',
      goal TEXT NOT NULL,
      raised TEXT NOT NULL DEFAULT '0',
      released TEXT NOT NULL DEFAULT '0',
      minContribution TEXT NOT NULL,
      maxContribution TEXT NOT NULL,
      createdAt INTEGER NOT NULL,
      deadline INTEGER NOT NULL,
      asset TEXT NOT NULL DEFAULT 'native',
      verified INTEGER NOT NULL DEFAULT 0,
      promoted INTEGER NOT NULL DEFAULT 0,
      completed INTEGER NOT NULL DEFAULT 0,
      cancelled INTEGER NOT NULL DEFAULT 0,
      refundable INTEGER NOT NULL DEFAULT 0,
      allowPartialWithdrawals INTEGER NOT NULL DEFAULT 0,
      limit_enabled INTEGER NOT NULL DEFAULT 0,
      limit_ceiling TEXT NOT NULL DEFAULT '0',
      limit_totalWithdrawn TEXT NOT NULL DEFAULT '0',
      limit_lastWithdrawalAt INTEGER,
      limit_minInterval INTEGER NOT NULL DEFAULT 0,
      backerCount INTEGER NOT NULL DEFAULT 0,
      refundCursor INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS contributions (
      campaignId INTEGER NOT NULL,
      contributor TEXT NOT NULL,
      amount TEXT NOT NULL,
      position INTEGER NOT NULL,
      PRIMARY KEY (campaignId, contributor),
      FOREIGN KEY(campaignId) REFERENCES campaigns(id)
    );

    CREATE TABLE IF NOT EXISTS milestones (
      campaignId INTEGER NOT NULL,
      idx INTEGER NOT NULL,
      amount TEXT NOT NULL,
      description TEXT NOT NULL,
      completed INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (campaignId, idx),
      FOREIGN KEY(campaignId) REFERENCES campaigns(id)
    );

    CREATE TABLE IF NOT EXISTS campaign_owners (
      account TEXT NOT NULL,
      campaignId INTEGER NOT NULL,
      position INTEGER NOT NULL,
      PRIMARY KEY (account, campaignId)
    );

    CREATE TABLE IF NOT EXISTS platform_settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS audit_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      campaignId INTEGER,
      event TEXT NOT NULL,
      details TEXT,
      timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS unreturned (
      account TEXT NOT NULL,
      asset TEXT NOT NULL,
      amount TEXT NOT NULL,
      PRIMARY KEY (account, asset)
    );

    CREATE TABLE IF NOT EXISTS balances (
      account TEXT NOT NULL,
      asset TEXT NOT NULL,
      amount TEXT NOT NULL,
      PRIMARY KEY (account, asset)
    );
  `);
}

const writeQueues = new WeakMap<Database, OperationQueue>();

/**
 * Run `work` between BEGIN and COMMIT, rolling back on error. Transactions on
 * one connection are serialized so writers sharing it cannot nest a BEGIN.
 */
export function runInTransaction<T>(db: Database, work: () => Promise<T>): Promise<T> {
  let queue = writeQueues.get(db);
  if (!queue) {
    queue = new OperationQueue();
    writeQueues.set(db, queue);
  }
  return queue.run(async () => {
    await db.exec('BEGIN TRANSACTION');
    try {
      const result = await work();
      await db.exec('COMMIT');
      return result;
    } catch (error) {
      await db.exec('ROLLBACK');
      throw error;
    }
  });
}

type CampaignRow = {
  id: number;
  creator: string;
  title: string;
  description: string;
  mediaRef: string;
  category: string;
  goal: string;
  raised: string;
  released: string;
  minContribution: string;
  maxContribution: string;
  createdAt: number;
  deadline: number;
  asset: string;
  verified: number;
  promoted: number;
  completed: number;
  cancelled: number;
  refundable: number;
  allowPartialWithdrawals: number;
  limit_enabled: number;
  limit_ceiling: string;
  limit_totalWithdrawn: string;
  limit_lastWithdrawalAt: number | null;
  limit_minInterval: number;
  backerCount: number;
  refundCursor: number;
};

type AmountRow = {
  account: string;
  asset: string;
  amount: string;
};

type ContributionRow = {
  campaignId: number;
  contributor: string;
  amount: string;
  position: number;
};

type MilestoneRow = {
  campaignId: number;
  idx: number;
  amount: string;
  description: string;
  completed: number;
};

export type AuditLogEntry = {
  id: number;
  campaignId: number | null;
  event: string;
  details: Record<string, unknown>;
  timestamp: string;
};

function toBigInt(value: string | null, field: string): bigint {
  if (value === null || !/^-?\d+$/.test(value.trim())) {
    throw new Error(`invalid-amount:${field}:${value}`);
  }
  return BigInt(value.trim());
}

function toAsset(value: string, field: string): FundingAsset {
  const asset = parseAssetKey(value);
  if (!asset) {
    throw new Error(`invalid-asset:${field}:${value}`);
  }
  return asset;
}

function mapRowToCampaign(row: CampaignRow, contributions: ContributionRow[], milestones: MilestoneRow[]): CampaignRecord {
  const ordered = [...contributions].sort((a, b) => a.position - b.position);
  return {
    id: row.id,
    creator: row.creator,
    title: row.title,
    description: row.description,
    mediaRef: row.mediaRef,
    category: row.category,
    goal: toBigInt(row.goal, 'goal'),
    raised: toBigInt(row.raised, 'raised'),
    released: toBigInt(row.released, 'released'),
    minContribution: toBigInt(row.minContribution, 'minContribution'),
    maxContribution: toBigInt(row.maxContribution, 'maxContribution'),
    createdAt: row.createdAt,
    deadline: row.deadline,
    asset: toAsset(row.asset, 'asset'),
    verified: row.verified === 1,
    promoted: row.promoted === 1,
    completed: row.completed === 1,
    cancelled: row.cancelled === 1,
    refundable: row.refundable === 1,
    allowPartialWithdrawals: row.allowPartialWithdrawals === 1,
    withdrawalLimit: {
      enabled: row.limit_enabled === 1,
      ceiling: toBigInt(row.limit_ceiling, 'limit_ceiling'),
      totalWithdrawn: toBigInt(row.limit_totalWithdrawn, 'limit_totalWithdrawn'),
      lastWithdrawalAt: row.limit_lastWithdrawalAt,
      minInterval: row.limit_minInterval,
    },
    milestones: [...milestones]
      .sort((a, b) => a.idx - b.idx)
      .map((milestone): Milestone => ({
        amount: toBigInt(milestone.amount, `milestone:${milestone.idx}`),
        description: milestone.description,
        completed: milestone.completed === 1,
      })),
    backerCount: row.backerCount,
    contributions: new Map(
      ordered.map((entry) => [entry.contributor, toBigInt(entry.amount, `contribution:${entry.contributor}`)]),
    ),
    roster: ordered.map((entry) => entry.contributor),
    refundCursor: row.refundCursor,
  };
}

/** Writes the campaign row plus its contribution and milestone rows. Callers own the SQL transaction. */
export async function upsertCampaign(campaign: CampaignRecord, database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());
  try {
    await db.run(
      `
      INSERT OR REPLACE INTO campaigns (
        id, creator, title, description, mediaRef, category,
        goal, raised, released, minContribution, maxContribution,
        createdAt, deadline, asset,
        verified, promoted, completed, cancelled, refundable,
        allowPartialWithdrawals, limit_enabled, limit_ceiling, limit_totalWithdrawn,
        limit_lastWithdrawalAt, limit_minInterval, backerCount, refundCursor
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      [
        campaign.id,
        campaign.creator,
        campaign.title,
        campaign.description,
        campaign.mediaRef,
        campaign.category,
        campaign.goal.toString(),
        campaign.raised.toString(),
        campaign.released.toString(),
        campaign.minContribution.toString(),
        campaign.maxContribution.toString(),
        campaign.createdAt,
        campaign.deadline,
        assetKey(campaign.asset),
        campaign.verified ? 1 : 0,
        campaign.promoted ? 1 : 0,
        campaign.completed ? 1 : 0,
        campaign.cancelled ? 1 : 0,
        campaign.refundable ? 1 : 0,
        campaign.allowPartialWithdrawals ? 1 : 0,
        campaign.withdrawalLimit.enabled ? 1 : 0,
        campaign.withdrawalLimit.ceiling.toString(),
        campaign.withdrawalLimit.totalWithdrawn.toString(),
        campaign.withdrawalLimit.lastWithdrawalAt,
        campaign.withdrawalLimit.minInterval,
        campaign.backerCount,
        campaign.refundCursor,
      ],
    );

    await db.run('DELETE FROM contributions WHERE campaignId = ?', [campaign.id]);
    for (const [position, contributor] of campaign.roster.entries()) {
      await db.run(
        'INSERT INTO contributions (campaignId, contributor, amount, position) VALUES (?, ?, ?, ?)',
        [campaign.id, contributor, (campaign.contributions.get(contributor) ?? 0n).toString(), position],
      );
    }

    await db.run('DELETE FROM milestones WHERE campaignId = ?', [campaign.id]);
    for (const [idx, milestone] of campaign.milestones.entries()) {
      await db.run(
        'INSERT INTO milestones (campaignId, idx, amount, description, completed) VALUES (?, ?, ?, ?, ?)',
        [campaign.id, idx, milestone.amount.toString(), milestone.description, milestone.completed ? 1 : 0],
      );
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`sqlite-upsert-campaign-failed:${campaign.id}:${message}`);
  }
}

export async function getCampaignById(id: CampaignId, database?: Database): Promise<CampaignRecord | null> {
  const db = database ?? (await openDatabase());
  try {
    const row = await db.get<CampaignRow>('SELECT * FROM campaigns WHERE id = ?', [id]);
    if (!row) return null;
    const contributions = await db.all<ContributionRow[]>('SELECT * FROM contributions WHERE campaignId = ?', [id]);
    const milestones = await db.all<MilestoneRow[]>('SELECT * FROM milestones WHERE campaignId = ?', [id]);
    return mapRowToCampaign(row, contributions, milestones);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`sqlite-get-campaign-failed:${id}:${message}`);
  }
}

export async function listCampaigns(database?: Database): Promise<CampaignRecord[]> {
  const db = database ?? (await openDatabase());
  try {
    const rows = await db.all<CampaignRow[]>('SELECT * FROM campaigns ORDER BY id ASC');
    const contributions = await db.all<ContributionRow[]>('SELECT * FROM contributions');
    const milestones = await db.all<MilestoneRow[]>('SELECT * FROM milestones');
    return rows.map((row) =>
      mapRowToCampaign(
        row,
        contributions.filter((entry) => entry.campaignId === row.id),
        milestones.filter((entry) => entry.campaignId === row.id),
      ),
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`sqlite-list-campaigns-failed:${message}`);
  }
}

export async function setOwnedCampaigns(
  account: AccountId,
  campaignIds: CampaignId[],
  database?: Database,
): Promise<void> {
  const db = database ?? (await openDatabase());
  await db.run('DELETE FROM campaign_owners WHERE account = ?', [account]);
  for (const [position, campaignId] of campaignIds.entries()) {
    await db.run(
      'INSERT INTO campaign_owners (account, campaignId, position) VALUES (?, ?, ?)',
      [account, campaignId, position],
    );
  }
}

export async function listOwnership(database?: Database): Promise<Array<{ account: AccountId; campaignIds: CampaignId[] }>> {
  const db = database ?? (await openDatabase());
  const rows = await db.all<Array<{ account: string; campaignId: number; position: number }>>(
    'SELECT account, campaignId, position FROM campaign_owners ORDER BY account ASC, position ASC',
  );
  const byAccount = new Map<AccountId, CampaignId[]>();
  for (const row of rows) {
    const owned = byAccount.get(row.account) ?? [];
    owned.push(row.campaignId);
    byAccount.set(row.account, owned);
  }
  return Array.from(byAccount.entries()).map(([account, campaignIds]) => ({ account, campaignIds }));
}

/** Zero amounts delete the row. */
export async function setUnreturned(entry: UnreturnedBalance, database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());
  await writeAmount(db, 'unreturned', entry.account, entry.asset, entry.amount);
}

export async function listUnreturned(database?: Database): Promise<UnreturnedBalance[]> {
  const db = database ?? (await openDatabase());
  return readAmounts(db, 'unreturned');
}

/** Zero amounts delete the row. Callers own the SQL transaction. */
export async function setBalance(entry: BalanceEntry, database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());
  await writeAmount(db, 'balances', entry.account, entry.asset, entry.amount);
}

export async function listBalances(database?: Database): Promise<BalanceEntry[]> {
  const db = database ?? (await openDatabase());
  return readAmounts(db, 'balances');
}

async function writeAmount(
  db: Database,
  table: 'unreturned' | 'balances',
  account: AccountId,
  asset: FundingAsset,
  amount: bigint,
): Promise<void> {
  try {
    if (amount === 0n) {
      await db.run(`DELETE FROM ${table} WHERE account = ? AND asset = ?`, [account, assetKey(asset)]);
      return;
    }
    await db.run(`INSERT OR REPLACE INTO ${table} (account, asset, amount) VALUES (?, ?, ?)`, [
      account,
      assetKey(asset),
      amount.toString(),
    ]);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`sqlite-set-${table}-failed:${account}:${message}`);
  }
}

async function readAmounts(db: Database, table: 'unreturned' | 'balances'): Promise<BalanceEntry[]> {
  try {
    const rows = await db.all<AmountRow[]>(`SELECT account, asset, amount FROM ${table} ORDER BY account ASC, asset ASC`);
    return rows.map((row) => ({
      account: row.account,
      asset: toAsset(row.asset, `${table}:${row.account}`),
      amount: toBigInt(row.amount, `${table}:${row.account}`),
    }));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`sqlite-list-${table}-failed:${message}`);
  }
}

export async function getSetting(key: string, database?: Database): Promise<string | null> {
  const db = database ?? (await openDatabase());
  const row = await db.get<{ value: string }>('SELECT value FROM platform_settings WHERE key = ?', [key]);
  return row?.value ?? null;
}

export async function setSetting(key: string, value: string, database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());
  await db.run('INSERT OR REPLACE INTO platform_settings (key, value) VALUES (?, ?)', [key, value]);
}

export async function appendAuditLog(event: LedgerEvent, database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());
  const { type, ...details } = event;
  await db.run(
    'INSERT INTO audit_logs (campaignId, event, details) VALUES (?, ?, ?)',
    ['campaignId' in event ? event.campaignId : null, type, JSON.stringify(details, bigintReplacer)],
  );
}

export async function getAuditLogs(campaignId: CampaignId, database?: Database): Promise<AuditLogEntry[]> {
  const db = database ?? (await openDatabase());
  const rows = await db.all<Array<{ id: number; campaignId: number | null; event: string; details: string | null; timestamp: string }>>(
    'SELECT id, campaignId, event, details, timestamp FROM audit_logs WHERE campaignId = ? ORDER BY id ASC',
    [campaignId],
  );
  return rows.map((row) => ({
    id: row.id,
    campaignId: row.campaignId,
    event: row.event,
    details: parseDetails(row.details),
    timestamp: row.timestamp,
  }));
}

function parseDetails(raw: string | null): Record<string, unknown> {
  if (!raw || !raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return {};
  }
}

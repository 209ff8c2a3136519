import type { Database } from 'sqlite';
import {
  appendAuditLog,
  getSetting,
  initializeDatabase,
  listCampaigns,
  listOwnership,
  listUnreturned,
  openDatabase,
  runInTransaction,
  setOwnedCampaigns,
  setSetting,
  setUnreturned,
  upsertCampaign,
} from '../db/SQLiteStore';
import type { LedgerCommit, LedgerRepository, LedgerSnapshot, PersistedPlatform } from '../ledger/repository';

const COUNTER_KEY = 'campaign_counter';
const PLATFORM_KEY = 'platform';

function parsePlatform(raw: string | null): PersistedPlatform | null {
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed === null || typeof parsed !== 'object') return null;
    const feeBps = 'feeBps' in parsed ? parsed.feeBps : undefined;
    const allowedTokens = 'allowedTokens' in parsed ? parsed.allowedTokens : undefined;
    if (typeof feeBps !== 'number' || !Array.isArray(allowedTokens)) {
      return null;
    }
    return {
      feeBps,
      allowedTokens: allowedTokens.filter((token): token is string => typeof token === 'string'),
      paused: 'paused' in parsed && parsed.paused === true,
    };
  } catch (err) {
    console.warn('[ledger-store] ignoring unreadable platform settings', err);
    return null;
  }
}

/** Ledger state in SQLite. Each commit is written in a single SQL transaction together with its audit log rows. */
export class SqliteLedgerRepository implements LedgerRepository {
  private constructor(private readonly db: Database) {}

  static async open(dbPath?: string): Promise<SqliteLedgerRepository> {
    const db = await openDatabase(dbPath);
    await initializeDatabase(db);
    return new SqliteLedgerRepository(db);
  }

  get database(): Database {
    return this.db;
  }

  async load(): Promise<LedgerSnapshot> {
    const campaigns = await listCampaigns(this.db);
    const owners = await listOwnership(this.db);
    const unreturned = await listUnreturned(this.db);
    const counterRaw = await getSetting(COUNTER_KEY, this.db);
    const counter = counterRaw !== null && /^\d+$/.test(counterRaw) ? Number(counterRaw) : 0;
    const platform = parsePlatform(await getSetting(PLATFORM_KEY, this.db));
    return { campaigns, owners, unreturned, counter, platform };
  }

  async commit(commit: LedgerCommit): Promise<void> {
    await runInTransaction(this.db, async () => {
      for (const campaign of commit.campaigns) {
        await upsertCampaign(campaign, this.db);
      }
      for (const { account, campaignIds } of commit.owners) {
        await setOwnedCampaigns(account, campaignIds, this.db);
      }
      for (const entry of commit.unreturned) {
        await setUnreturned(entry, this.db);
      }
      if (commit.counter !== null) {
        await setSetting(COUNTER_KEY, String(commit.counter), this.db);
      }
      if (commit.platform) {
        await setSetting(PLATFORM_KEY, JSON.stringify(commit.platform), this.db);
      }
      for (const event of commit.events) {
        await appendAuditLog(event, this.db);
      }
    });
  }
}

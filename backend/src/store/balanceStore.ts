import type { Database } from 'sqlite';
import { initializeDatabase, listBalances, openDatabase, runInTransaction, setBalance } from '../db/SQLiteStore';
import type { BalanceEntry, BalanceStore } from '../transfer/types';

/** Custody balances in the `balances` table; each save is one SQL transaction. */
export class SqliteBalanceStore implements BalanceStore {
  constructor(private readonly db: Database) {}

  static async open(dbPath?: string): Promise<SqliteBalanceStore> {
    const db = await openDatabase(dbPath);
    await initializeDatabase(db);
    return new SqliteBalanceStore(db);
  }

  load(): Promise<BalanceEntry[]> {
    return listBalances(this.db);
  }

  async save(entries: BalanceEntry[]): Promise<void> {
    await runInTransaction(this.db, async () => {
      for (const entry of entries) {
        await setBalance(entry, this.db);
      }
    });
  }
}

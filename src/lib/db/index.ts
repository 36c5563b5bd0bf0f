import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import * as schema from "./schema";

export type LedgerDatabase = BetterSQLite3Database<typeof schema>;

export interface LedgerConnection {
  sqlite: Database.Database;
  db: LedgerDatabase;
}

export type LedgerConnectionFactory = (databasePath: string) => LedgerConnection;

/**
 * Opens (or creates) the SQLite file and makes sure the sales table exists.
 */
export const openLedgerConnection: LedgerConnectionFactory = (databasePath) => {
  const sqlite = new Database(databasePath);
  try {
    sqlite.pragma("journal_mode = WAL"); // Better concurrency
    sqlite.exec(schema.CREATE_SALES_SCHEMA_SQL);
  } catch (error) {
    sqlite.close();
    throw error;
  }
  return { sqlite, db: drizzle(sqlite, { schema }) };
};

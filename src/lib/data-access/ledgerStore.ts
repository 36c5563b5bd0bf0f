// src/lib/data-access/ledgerStore.ts
import fs from "fs/promises";
import path from "path";
import { and, count, desc, gte, lte } from "drizzle-orm";
import { openLedgerConnection, type LedgerConnection, type LedgerConnectionFactory } from "@/lib/db";
import { sales } from "@/lib/db/schema";
import { InvalidStateError, StorageUnavailableError, toError } from "@/lib/errors";
import { deserializeSale, serializeSale, toStoredRangeBound, validateSaleInput } from "@/lib/sale";
import { logger } from "@/lib/services/logging";
import type { DateRange, PersistedSale, Sale } from "@/lib/types";

const DATA_ACCESS_LOG_PREFIX = "LedgerStore";

export type LedgerStoreState = "uninitialized" | "initializing" | "ready" | "closed";

export interface LedgerStoreOptions {
  /**
   * SQLite file path, or ":memory:".
   */
  databasePath: string;
  openConnection?: LedgerConnectionFactory;
}

/**
 * Sole owner of persisted sales. Create one per application context and pass it around;
 * `initialize()` must complete before `create`/`readAll`.
 */
export class LedgerStore {
  private readonly _databasePath: string;
  private readonly _openConnection: LedgerConnectionFactory;
  private _state: LedgerStoreState = "uninitialized";
  private _connection: LedgerConnection | null = null;
  private _initialization: Promise<LedgerConnection> | null = null;

  constructor(options: LedgerStoreOptions) {
    this._databasePath = options.databasePath;
    this._openConnection = options.openConnection ?? openLedgerConnection;
  }

  get state(): LedgerStoreState {
    return this._state;
  }

  get databasePath(): string {
    return this._databasePath;
  }

  /**
   * Opens the database once. Concurrent and repeated calls share the same connection.
   */
  initialize(): Promise<LedgerConnection> {
    const funcPrefix = `${DATA_ACCESS_LOG_PREFIX}:initialize`;
    if (this._state === "closed") {
      return Promise.reject(new InvalidStateError("initialize", this._state));
    }
    if (this._initialization) {
      logger.debug(funcPrefix, "Initialization already started, reusing it.");
      return this._initialization;
    }

    this._state = "initializing";
    logger.info(funcPrefix, `Opening sales ledger at ${this._databasePath}`);
    this._initialization = this._open().then(
      (connection) => {
        this._connection = connection;
        this._state = "ready";
        logger.info(funcPrefix, "Sales ledger ready.");
        return connection;
      },
      (error: unknown) => {
        // Leave the store retryable by an explicit second initialize()
        this._initialization = null;
        this._state = "uninitialized";
        const failure = new StorageUnavailableError(this._databasePath, error);
        logger.error(funcPrefix, "FATAL: Could not open sales ledger", failure);
        throw failure;
      },
    );
    return this._initialization;
  }

  private async _open(): Promise<LedgerConnection> {
    if (this._databasePath !== ":memory:") {
      await fs.mkdir(path.dirname(this._databasePath), { recursive: true });
    }
    return this._openConnection(this._databasePath);
  }

  private async _requireConnection(operation: string): Promise<LedgerConnection> {
    if (this._state === "initializing" && this._initialization) {
      await this._initialization;
    }
    if (this._state !== "ready" || !this._connection) {
      const error = new InvalidStateError(operation, this._state);
      logger.error(`${DATA_ACCESS_LOG_PREFIX}:${operation}`, error.message);
      throw error;
    }
    return this._connection;
  }

  /**
   * Persists a sale under a fresh id. Any id on the input is ignored.
   */
  async create(sale: Sale): Promise<PersistedSale> {
    const funcPrefix = `${DATA_ACCESS_LOG_PREFIX}:create`;
    const { db } = await this._requireConnection("create");
    const row = serializeSale({ ...validateSaleInput(sale), id: undefined });

    try {
      const inserted = db.insert(sales).values(row).returning().get();
      const created = deserializeSale(inserted);
      logger.info(funcPrefix, `Sale recorded with ID: ${inserted.id}`);
      return { ...created, id: inserted.id };
    } catch (error) {
      logger.error(funcPrefix, "Error writing sale", toError(error));
      throw error;
    }
  }

  /**
   * Sales whose date lies in [from, to], newest first; equal dates fall back to newest id first.
   * A range missing either bound returns every sale.
   */
  async readAll(range: DateRange = {}): Promise<PersistedSale[]> {
    const funcPrefix = `${DATA_ACCESS_LOG_PREFIX}:readAll`;
    const { db } = await this._requireConnection("readAll");
    const { from, to } = range;
    const filter =
      from && to
        ? and(gte(sales.date, toStoredRangeBound(from)), lte(sales.date, toStoredRangeBound(to)))
        : undefined;

    const rows = db
      .select()
      .from(sales)
      .where(filter)
      .orderBy(desc(sales.date), desc(sales.id))
      .all();
    logger.debug(
      funcPrefix,
      `Read ${rows.length} sales${filter ? ` between ${range.from?.toISOString()} and ${range.to?.toISOString()}` : ""}.`,
    );

    return rows.map((row) => ({ ...deserializeSale(row), id: row.id }));
  }

  async count(): Promise<number> {
    const { db } = await this._requireConnection("count");
    const result = db.select({ value: count() }).from(sales).get();
    return result?.value ?? 0;
  }

  /**
   * Releases the connection. The store cannot be reopened afterwards.
   */
  async close(): Promise<void> {
    const funcPrefix = `${DATA_ACCESS_LOG_PREFIX}:close`;
    if (this._state === "closed") {
      logger.debug(funcPrefix, "Already closed.");
      return;
    }
    const connection = await this._requireConnection("close");
    connection.sqlite.close();
    this._connection = null;
    this._initialization = null;
    this._state = "closed";
    logger.info(funcPrefix, "Sales ledger closed.");
  }
}

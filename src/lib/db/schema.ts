import { sqliteTable, text, integer, real, index } from "drizzle-orm/sqlite-core";
import { TRANSACTION_TYPES } from "@/lib/types";

// --- Sales Table ---
export const sales = sqliteTable(
  "sales",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    client: text("client").notNull(),
    quantity: integer("quantity").notNull(),
    paid: real("paid").notNull(),
    unpaid: real("unpaid").notNull(),
    transaction_type: text("transaction_type", { enum: TRANSACTION_TYPES }).notNull(),
    location: text("location").notNull(),
    date: text("date").notNull(), // ISO string, UTC, fixed width so text order is time order
  },
  (table) => ({
    dateIdx: index("sales_date_idx").on(table.date),
  }),
);

export type SaleRow = typeof sales.$inferSelect;
export type NewSaleRow = typeof sales.$inferInsert;

// Kept in step with the table above; run on every open, so it must stay idempotent
export const CREATE_SALES_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS sales (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    client TEXT NOT NULL,
    quantity INTEGER NOT NULL,
    paid REAL NOT NULL,
    unpaid REAL NOT NULL,
    transaction_type TEXT NOT NULL,
    location TEXT NOT NULL,
    date TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS sales_date_idx ON sales (date);
`;

// src/lib/sale.ts
import { isValid, parseISO } from "date-fns";
import { z } from "zod";
import type { NewSaleRow } from "@/lib/db/schema";
import { MalformedRecordError, SaleValidationError } from "@/lib/errors";
import { TRANSACTION_TYPES, type Sale } from "@/lib/types";

/**
 * Total value of a sale. Derived on every read, never stored.
 */
export function saleTotal(sale: Pick<Sale, "paid" | "unpaid">): number {
  return sale.paid + sale.unpaid;
}

/**
 * Flattens a sale into a storage row. The date becomes an ISO-8601 UTC string.
 */
export function serializeSale(sale: Sale): NewSaleRow {
  const row: NewSaleRow = {
    client: sale.client,
    quantity: sale.quantity,
    paid: sale.paid,
    unpaid: sale.unpaid,
    transaction_type: sale.transactionType,
    location: sale.location,
    date: sale.date.toISOString(),
  };
  if (sale.id !== undefined) {
    row.id = sale.id;
  }
  return row;
}

// ISO strings keep text order equal to time order only for four-digit years
const EARLIEST_STORABLE_TIME = Date.parse("0000-01-01T00:00:00.000Z");
const LATEST_STORABLE_TIME = Date.parse("9999-12-31T23:59:59.999Z");

export function isStorableDate(date: Date): boolean {
  const time = date.getTime();
  return time >= EARLIEST_STORABLE_TIME && time <= LATEST_STORABLE_TIME;
}

/**
 * Stored form of a date-range bound. Bounds past either end of the storable years are
 * pulled back to it, which selects the same sales.
 */
export function toStoredRangeBound(date: Date): string {
  const time = Math.min(Math.max(date.getTime(), EARLIEST_STORABLE_TIME), LATEST_STORABLE_TIME);
  return new Date(time).toISOString();
}

// Shape of a row as it comes back from SQLite; nothing is trusted
const storedSaleSchema = z.object({
  id: z.number().int().optional(),
  client: z.string(),
  quantity: z.number().int(),
  paid: z.number(),
  unpaid: z.number(),
  transaction_type: z.enum(TRANSACTION_TYPES),
  location: z.string(),
  date: z
    .string()
    .transform((val, ctx) => {
      const parsed = parseISO(val);
      if (!isValid(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparsable timestamp "${val}"` });
        return z.NEVER;
      }
      return parsed;
    }),
});

export function deserializeSale(row: unknown): Sale {
  const result = storedSaleSchema.safeParse(row);
  if (!result.success) {
    const rowId =
      typeof row === "object" && row !== null && "id" in row && typeof row.id === "number"
        ? row.id
        : null;
    throw new MalformedRecordError(
      rowId,
      result.error.issues.map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`),
    );
  }

  const data = result.data;
  const sale: Sale = {
    client: data.client,
    quantity: data.quantity,
    paid: data.paid,
    unpaid: data.unpaid,
    transactionType: data.transaction_type,
    location: data.location,
    date: data.date,
  };
  if (data.id !== undefined) {
    sale.id = data.id;
  }
  return sale;
}

// --- Input validation ---

export const saleInputSchema = z.object({
  id: z.number().int().optional(),
  client: z.string().trim().min(1, "is required"),
  quantity: z
    .number({ invalid_type_error: "must be a number" })
    .int("must be a whole number")
    .min(0, "cannot be negative"),
  paid: z
    .number({ invalid_type_error: "must be a number" })
    .finite("must be finite")
    .min(0, "cannot be negative"),
  unpaid: z
    .number({ invalid_type_error: "must be a number" })
    .finite("must be finite")
    .min(0, "cannot be negative"),
  transactionType: z.enum(TRANSACTION_TYPES),
  location: z.string().trim().min(1, "is required"),
  date: z
    .date({ invalid_type_error: "must be a valid date" })
    .refine(isStorableDate, "must fall between the years 0000 and 9999"),
});

/**
 * Precondition for persisting a sale. Trims text fields; throws SaleValidationError listing every bad field.
 */
export function validateSaleInput(input: Sale): Sale {
  const result = saleInputSchema.safeParse(input);
  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors;
    const errors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(fieldErrors)) {
      if (messages && messages.length > 0) {
        errors[field] = messages;
      }
    }
    throw new SaleValidationError(errors);
  }
  return result.data;
}

// --- Form coercion ---

export interface SaleFormFields {
  client: string;
  quantity: string;
  paid: string;
  unpaid: string;
  transactionType?: string;
  location: string;
  date?: Date;
}

const numberOrZero = (parse: (text: string) => number) =>
  z
    .string()
    .transform((val) => parse(val.trim()))
    .pipe(z.number().finite().min(0))
    .catch(0);

const saleFormSchema = z.object({
  client: z.string().trim(),
  quantity: numberOrZero((text) => (/^\d+$/.test(text) ? Number.parseInt(text, 10) : NaN)),
  paid: numberOrZero((text) => (text === "" ? NaN : Number(text))),
  unpaid: numberOrZero((text) => (text === "" ? NaN : Number(text))),
  transactionType: z.enum(TRANSACTION_TYPES).catch("Mpesa"),
  location: z.string().trim(),
  date: z.date().optional(),
});

/**
 * Builds a sale from raw form text: unparsable or negative amounts become 0, a missing
 * transaction type becomes Mpesa, and a missing date becomes `now`.
 */
export function parseSaleForm(fields: SaleFormFields, now: Date = new Date()): Sale {
  const data = saleFormSchema.parse(fields);
  return {
    client: data.client,
    quantity: data.quantity,
    paid: data.paid,
    unpaid: data.unpaid,
    transactionType: data.transactionType,
    location: data.location,
    date: data.date && isValid(data.date) ? data.date : now,
  };
}

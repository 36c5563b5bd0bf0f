// src/lib/types.ts

export const TRANSACTION_TYPES = ["Mpesa", "Cash", "Cheque"] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export interface Sale {
  /**
   * Assigned by the ledger store on creation. Absent until the sale is persisted.
   */
  id?: number;
  client: string;
  /**
   * Units sold. Non-negative integer.
   */
  quantity: number;
  /**
   * Amount already received, in Ksh.
   */
  paid: number;
  /**
   * Amount still owed, in Ksh.
   */
  unpaid: number;
  transactionType: TransactionType;
  location: string; // Entered manually, no geocoding
  date: Date;
}

export interface PersistedSale extends Sale {
  id: number;
}

/**
 * Optional date filter. Both bounds are inclusive; a range missing either bound matches everything.
 */
export interface DateRange {
  from?: Date;
  to?: Date;
}

export interface SalesSummary {
  paid: number;
  unpaid: number;
  total: number;
  count: number;
}

export interface SalesReport {
  title: string;
  from: Date;
  to: Date;
  rangeLabel: string; // "From: yyyy-MM-dd  To: yyyy-MM-dd"
  headers: readonly string[];
  rows: string[][]; // Already formatted cells, same order as headers
  totalsLabel: string;
  totals: {
    paid: string;
    unpaid: string;
    total: string;
  };
  generatedAt: Date;
}

export interface ReportArtifact {
  /**
   * sales_report_<epoch-millis>.pdf
   */
  filename: string;
  filePath: string;
  mimeType: "application/pdf";
  content: Buffer;
  report: SalesReport;
}

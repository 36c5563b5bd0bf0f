// src/lib/services/salesReport.ts
import { saleTotal } from "@/lib/sale";
import type { DateRange, Sale, SalesReport } from "@/lib/types";
import { formatDateTime, formatDay, formatMoney } from "@/lib/utils";
import { summarizeSales } from "./salesAggregator";

export const SALES_REPORT_TITLE = "Sales Report";

export const SALES_REPORT_HEADERS = [
  "Date",
  "Client",
  "Qty",
  "Paid",
  "Unpaid",
  "Total",
  "Type",
  "Location",
] as const;

/**
 * Lower bound used when a report is requested without a start date.
 * Matches the earliest day the entry form lets a sale be dated.
 */
export const REPORT_EARLIEST_DATE = new Date(2000, 0, 1);

export function resolveReportRange(range: DateRange | undefined, now: Date): Required<DateRange> {
  return {
    from: range?.from ?? new Date(REPORT_EARLIEST_DATE.getTime()),
    to: range?.to ?? now,
  };
}

/**
 * Lays out the report content. Sales are expected newest first, as the ledger returns them.
 */
export function buildSalesReport(
  sales: readonly Sale[],
  range: Required<DateRange>,
  generatedAt: Date,
): SalesReport {
  const summary = summarizeSales(sales);
  return {
    title: SALES_REPORT_TITLE,
    from: range.from,
    to: range.to,
    rangeLabel: `From: ${formatDay(range.from)}  To: ${formatDay(range.to)}`,
    headers: SALES_REPORT_HEADERS,
    rows: sales.map((sale) => [
      formatDateTime(sale.date),
      sale.client,
      sale.quantity.toString(),
      formatMoney(sale.paid),
      formatMoney(sale.unpaid),
      formatMoney(saleTotal(sale)),
      sale.transactionType,
      sale.location,
    ]),
    totalsLabel: "Totals",
    totals: {
      paid: `Paid: ${formatMoney(summary.paid)}`,
      unpaid: `Unpaid: ${formatMoney(summary.unpaid)}`,
      total: `Total: ${formatMoney(summary.total)}`,
    },
    generatedAt,
  };
}

import type { SalesReport } from "@/lib/types";

export interface ISalesReportTemplate {
  setDocument(doc: PDFKit.PDFDocument): void;
  setLogPrefix(logPrefix: string): void;
  addHeader(title: string): void;
  addDateRange(rangeLabel: string): void;
  addSalesTable(headers: readonly string[], rows: readonly string[][]): void;
  addTotals(label: string, totals: SalesReport["totals"]): void;
}

export type SalesReportTemplateConstructor = new (logPrefix?: string) => ISalesReportTemplate;

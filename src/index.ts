export * from "./lib/types";
export * from "./lib/errors";
export { loadConfig, type AppConfig, type ConfigOverrides } from "./lib/config";
export {
  saleTotal,
  serializeSale,
  deserializeSale,
  validateSaleInput,
  parseSaleForm,
  type SaleFormFields,
} from "./lib/sale";
export { LedgerStore, type LedgerStoreOptions, type LedgerStoreState } from "./lib/data-access/ledgerStore";
export { sumPaid, sumUnpaid, sumTotal, summarizeSales } from "./lib/services/salesAggregator";
export {
  buildSalesReport,
  resolveReportRange,
  SALES_REPORT_HEADERS,
  REPORT_EARLIEST_DATE,
} from "./lib/services/salesReport";
export { SalesReportGenerator, reportFilename } from "./lib/services/reportGenerator";
export { PdfReportRenderer } from "./lib/services/pdfReportRenderer";
export { DirectoryDeliverySink } from "./lib/services/deliverySinks";
export type { IReportDeliverySink, IReportRenderer } from "./lib/services/reportGeneratorInterface";
export {
  createSalesLedgerContext,
  initializeSalesLedger,
  shutdownSalesLedger,
  type SalesLedgerContext,
} from "./lib/context";
export {
  recordSale,
  getSalesOverview,
  exportSalesReport,
  retryReportDelivery,
  type SalesOverview,
  type ExportReportResult,
} from "./lib/actions/sales";
export { formatMoney, formatDateTime, formatDay, toInclusiveDayRange } from "./lib/utils";

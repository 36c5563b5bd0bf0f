import type { SalesReportTemplateConstructor } from "./ISalesReportTemplate";
import { DefaultSalesReportTemplate } from "./DefaultSalesReportTemplate";

export const REPORT_TEMPLATES = {
  default: DefaultSalesReportTemplate,
} satisfies Record<string, SalesReportTemplateConstructor>;

/**
 * Layout used by PdfReportRenderer when none is passed in.
 */
export const CURRENT_REPORT_TEMPLATE: SalesReportTemplateConstructor = REPORT_TEMPLATES.default;

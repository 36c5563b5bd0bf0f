// src/lib/services/pdfReportRenderer.ts
import PDFDocument from "pdfkit";
import type { SalesReport } from "@/lib/types";
import { toError } from "@/lib/errors";
import type { IReportRenderer } from "./reportGeneratorInterface";
import type { ISalesReportTemplate, SalesReportTemplateConstructor } from "./reportTemplates/ISalesReportTemplate";
import { CURRENT_REPORT_TEMPLATE } from "./reportTemplates/templateRegistry";
import { logger } from "@/lib/services/logging";
import * as pdfStyles from "./pdfStyles";

export class PdfReportRenderer implements IReportRenderer {
  private _template: ISalesReportTemplate;

  constructor(TemplateClass: SalesReportTemplateConstructor = CURRENT_REPORT_TEMPLATE) {
    this._template = new TemplateClass();
  }

  render(report: SalesReport, operationId: string): Promise<Buffer> {
    const logPrefix = `[${operationId} PDFKit SalesReport]`;
    logger.info(logPrefix, `Rendering report with ${report.rows.length} rows.`);

    return new Promise<Buffer>((resolve, reject) => {
      const doc = new PDFDocument({
        size: pdfStyles.PAGE_SIZE,
        margin: pdfStyles.PAGE_MARGIN,
        bufferPages: true,
        font: pdfStyles.FONT_REGULAR,
        info: {
          Title: report.title,
          CreationDate: report.generatedAt, // Keeps the bytes a function of the report
        },
      });
      const chunks: Buffer[] = [];

      doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      doc.on("end", () => {
        const content = Buffer.concat(chunks);
        logger.info(logPrefix, `PDF rendered (${content.length} bytes).`);
        resolve(content);
      });
      doc.on("error", (err: unknown) => {
        const error = toError(err);
        logger.error(logPrefix, "PDF document error", error);
        reject(error);
      });

      try {
        this._template.setDocument(doc);
        this._template.setLogPrefix(logPrefix);
        this._template.addHeader(report.title);
        this._template.addDateRange(report.rangeLabel);
        this._template.addSalesTable(report.headers, report.rows);
        this._template.addTotals(report.totalsLabel, report.totals);
        doc.end();
      } catch (layoutError) {
        const error = toError(layoutError);
        logger.error(logPrefix, "ERROR while laying out report", error);
        reject(new Error(`PDF layout failed: ${error.message}`, { cause: error }));
        doc.end();
      }
    });
  }
}

import type { SalesReport } from "@/lib/types";
import type { ISalesReportTemplate } from "./ISalesReportTemplate";
import * as pdfStyles from "../pdfStyles";
import { logger } from "@/lib/services/logging";

export class DefaultSalesReportTemplate implements ISalesReportTemplate {
  private _doc: PDFKit.PDFDocument | null = null;
  logPrefix: string = "[DefaultSalesReportTemplate]";

  constructor(logPrefix?: string) {
    if (logPrefix) {
      this.logPrefix = logPrefix;
    }
  }

  private get doc(): PDFKit.PDFDocument {
    if (!this._doc) {
      throw new Error("Report template used before a PDF document was set.");
    }
    return this._doc;
  }

  setDocument(doc: PDFKit.PDFDocument): void {
    this._doc = doc;
  }

  setLogPrefix(logPrefix: string): void {
    this.logPrefix = logPrefix;
  }

  addHeader(title: string): void {
    logger.debug(`${this.logPrefix}:addHeader`, `Adding header: ${title}`);
    this.doc
      .font(pdfStyles.FONT_BOLD)
      .fontSize(pdfStyles.HEADER_FONT_SIZE)
      .text(title, { align: "left" });
    this.doc.font(pdfStyles.FONT_REGULAR).fontSize(pdfStyles.BODY_FONT_SIZE);
    this.doc.moveDown(0.5);
  }

  addDateRange(rangeLabel: string): void {
    logger.debug(`${this.logPrefix}:addDateRange`, rangeLabel);
    this.doc.font(pdfStyles.FONT_REGULAR).fontSize(pdfStyles.BODY_FONT_SIZE);
    this.doc.text(rangeLabel);
    this.doc.moveDown(1.2);
  }

  // Tallest cell decides the row height
  private _rowHeight(cells: readonly string[]): number {
    return pdfStyles.REPORT_COLUMNS.reduce((tallest, column, index) => {
      const height = this.doc.heightOfString(cells[index] ?? "", { width: column.width });
      return Math.max(tallest, height);
    }, 0) + pdfStyles.CELL_PADDING;
  }

  private _drawRow(cells: readonly string[], y: number, font: string): number {
    const startX = this.doc.page.margins.left;
    this.doc.font(font).fontSize(pdfStyles.TABLE_FONT_SIZE);
    const height = this._rowHeight(cells);
    pdfStyles.REPORT_COLUMNS.forEach((column, index) => {
      this.doc.text(cells[index] ?? "", startX + column.x, y, {
        width: column.width,
        align: column.align,
      });
    });
    return y + height;
  }

  private _drawTableHeader(headers: readonly string[], y: number): number {
    logger.debug(`${this.logPrefix}:_drawTableHeader`, `Drawing table header at Y=${y}`);
    const startX = this.doc.page.margins.left;
    const endX = this.doc.page.width - this.doc.page.margins.right;
    const bottom = this._drawRow(headers, y, pdfStyles.FONT_BOLD);
    this.doc
      .moveTo(startX, bottom)
      .lineTo(endX, bottom)
      .lineWidth(pdfStyles.LINE_THIN)
      .strokeColor(pdfStyles.COLOR_BLACK)
      .stroke();
    return bottom + pdfStyles.CELL_PADDING;
  }

  addSalesTable(headers: readonly string[], rows: readonly string[][]): void {
    const funcPrefix = `${this.logPrefix}:addSalesTable`;
    logger.debug(funcPrefix, `Adding ${rows.length} sale rows.`);
    const startX = this.doc.page.margins.left;
    const endX = this.doc.page.width - this.doc.page.margins.right;
    const pageBottom =
      this.doc.page.height - this.doc.page.margins.bottom - pdfStyles.TABLE_BOTTOM_MARGIN;

    let currentY = this._drawTableHeader(headers, this.doc.y);

    rows.forEach((cells, index) => {
      this.doc.font(pdfStyles.FONT_REGULAR).fontSize(pdfStyles.TABLE_FONT_SIZE);
      if (currentY + this._rowHeight(cells) > pageBottom) {
        logger.debug(funcPrefix, `Adding new page before row ${index + 1} at Y=${currentY}.`);
        this.doc.addPage();
        currentY = this._drawTableHeader(headers, this.doc.page.margins.top);
      }
      currentY = this._drawRow(cells, currentY, pdfStyles.FONT_REGULAR);
    });

    this.doc
      .moveTo(startX, currentY)
      .lineTo(endX, currentY)
      .lineWidth(pdfStyles.LINE_THIN)
      .strokeColor(pdfStyles.COLOR_GREY_LIGHT)
      .stroke();
    this.doc.x = startX;
    this.doc.y = currentY;
    this.doc.moveDown(1.2);
  }

  addTotals(label: string, totals: SalesReport["totals"]): void {
    const funcPrefix = `${this.logPrefix}:addTotals`;
    logger.debug(funcPrefix, "Adding totals section", totals);
    const pageBottom = this.doc.page.height - this.doc.page.margins.bottom;
    if (this.doc.y + pdfStyles.TOTALS_SECTION_HEIGHT_ESTIMATE > pageBottom) {
      logger.debug(funcPrefix, `Adding new page before totals at Y=${this.doc.y}.`);
      this.doc.addPage();
    }

    this.doc.x = this.doc.page.margins.left;
    this.doc
      .font(pdfStyles.FONT_BOLD)
      .fontSize(pdfStyles.SECTION_LABEL_FONT_SIZE)
      .text(label);
    this.doc.font(pdfStyles.FONT_REGULAR).fontSize(pdfStyles.TOTALS_FONT_SIZE);
    this.doc.text(totals.paid);
    this.doc.text(totals.unpaid);
    this.doc.text(totals.total);
  }
}

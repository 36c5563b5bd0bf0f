// PDF Styling and Constants

// Built-in PDFKit standard fonts, no font files needed
export const FONT_REGULAR = "Helvetica";
export const FONT_BOLD = "Helvetica-Bold";

export const PAGE_SIZE = "A4";
export const PAGE_MARGIN = 40;

export const HEADER_FONT_SIZE = 20;
export const SECTION_LABEL_FONT_SIZE = 12;
export const BODY_FONT_SIZE = 10;
export const TABLE_FONT_SIZE = 8;
export const TOTALS_FONT_SIZE = 10;

export const COLOR_BLACK = "#000000";
export const COLOR_GREY_LIGHT = "#cccccc";

export const LINE_THIN = 0.5;
export const CELL_PADDING = 3;

export interface TableColumn {
  x: number; // Offset from the left margin
  width: number;
  align: "left" | "right";
}

// A4 is ~595pt wide; with 40pt margins the drawable width is ~515pt.
// Order matches the report headers: Date, Client, Qty, Paid, Unpaid, Total, Type, Location
export const REPORT_COLUMNS: readonly TableColumn[] = [
  { x: 0, width: 74, align: "left" },
  { x: 76, width: 78, align: "left" },
  { x: 156, width: 24, align: "right" },
  { x: 182, width: 58, align: "right" },
  { x: 242, width: 58, align: "right" },
  { x: 302, width: 58, align: "right" },
  { x: 362, width: 44, align: "left" },
  { x: 408, width: 107, align: "left" },
];

export const TABLE_BOTTOM_MARGIN = 20;
export const TOTALS_SECTION_HEIGHT_ESTIMATE = 70; // For page break calculations

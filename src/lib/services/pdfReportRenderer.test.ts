import { describe, it, expect, vi } from "vitest";
import { PdfReportRenderer } from "./pdfReportRenderer";
import { buildSalesReport } from "./salesReport";
import { DefaultSalesReportTemplate } from "./reportTemplates/DefaultSalesReportTemplate";
import type { ISalesReportTemplate } from "./reportTemplates/ISalesReportTemplate";
import type { Sale } from "@/lib/types";

vi.mock("@/lib/services/logging", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const range = { from: new Date(2024, 0, 1), to: new Date(2024, 0, 31, 23, 59, 59) };
const generatedAt = new Date(2024, 1, 1, 12, 0);

const sales: Sale[] = Array.from({ length: 75 }, (_, index) => ({
  id: 75 - index,
  client: `Client ${index + 1}`,
  quantity: index,
  paid: index * 10,
  unpaid: 5,
  transactionType: "Cash",
  location: "Machakos",
  date: new Date(2024, 0, 31 - (index % 30), 10, 0),
}));

describe("PdfReportRenderer", () => {
  it("renders a complete PDF spanning several pages", async () => {
    const renderer = new PdfReportRenderer(DefaultSalesReportTemplate);
    const content = await renderer.render(buildSalesReport(sales, range, generatedAt), "render-test");

    expect(content.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(content.subarray(-6).toString("latin1")).toContain("%%EOF");
    expect(content.toString("latin1")).toMatch(/\/Count [2-9]/);
  });

  it("renders an empty report", async () => {
    const renderer = new PdfReportRenderer();
    const content = await renderer.render(buildSalesReport([], range, generatedAt), "empty-test");
    expect(content.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("rejects when the template fails", async () => {
    const onEnd = vi.fn();
    class BrokenTemplate extends DefaultSalesReportTemplate implements ISalesReportTemplate {
      setDocument(doc: PDFKit.PDFDocument): void {
        super.setDocument(doc);
        doc.on("end", onEnd);
      }
      addSalesTable(): void {
        throw new Error("column overflow");
      }
    }
    const renderer = new PdfReportRenderer(BrokenTemplate);
    await expect(
      renderer.render(buildSalesReport(sales, range, generatedAt), "broken-test"),
    ).rejects.toThrow("PDF layout failed: column overflow");
    // The document is still finished so its stream closes
    await vi.waitFor(() => expect(onEnd).toHaveBeenCalledTimes(1));
  });
});

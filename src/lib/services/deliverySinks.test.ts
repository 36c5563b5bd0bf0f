import { describe, it, expect, vi, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { DirectoryDeliverySink } from "./deliverySinks";
import { buildSalesReport } from "./salesReport";
import type { ReportArtifact } from "@/lib/types";

vi.mock("@/lib/services/logging", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe("DirectoryDeliverySink", () => {
  let tempDir: string | undefined;

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it("saves the report under its generated filename", async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "delivery-sink-"));
    const exportDir = path.join(tempDir, "exports");
    const artifact: ReportArtifact = {
      filename: "sales_report_1700000000000.pdf",
      filePath: path.join(tempDir, "sales_report_1700000000000.pdf"),
      mimeType: "application/pdf",
      content: Buffer.from("%PDF-saved"),
      report: buildSalesReport([], { from: new Date(2024, 0, 1), to: new Date(2024, 0, 2) }, new Date(2024, 0, 2)),
    };

    await new DirectoryDeliverySink(exportDir).deliver(artifact);

    const saved = await fs.readFile(path.join(exportDir, "sales_report_1700000000000.pdf"), "utf8");
    expect(saved).toBe("%PDF-saved");
  });
});

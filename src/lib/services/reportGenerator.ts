// src/lib/services/reportGenerator.ts
import fs from "fs/promises";
import path from "path";
import type { LedgerStore } from "@/lib/data-access/ledgerStore";
import { DeliveryFailureError, toError } from "@/lib/errors";
import type { DateRange, ReportArtifact } from "@/lib/types";
import { logger } from "@/lib/services/logging";
import type { IReportDeliverySink, IReportRenderer } from "./reportGeneratorInterface";
import { buildSalesReport, resolveReportRange } from "./salesReport";

const REPORT_LOG_PREFIX = "SalesReportGenerator";

export interface SalesReportGeneratorOptions {
  /**
   * Directory the rendered file is written to before delivery.
   */
  outputDirectory: string;
  clock?: () => Date;
}

export function reportFilename(timestampMillis: number): string {
  return `sales_report_${timestampMillis}.pdf`;
}

export class SalesReportGenerator {
  private readonly _clock: () => Date;
  private _lastTimestamp = 0;

  constructor(
    private readonly store: LedgerStore,
    private readonly renderer: IReportRenderer,
    private readonly options: SalesReportGeneratorOptions,
  ) {
    this._clock = options.clock ?? (() => new Date());
  }

  // Bumped past the previous export so two exports in the same millisecond never share a file
  private _nextTimestamp(now: Date): number {
    const timestamp = Math.max(now.getTime(), this._lastTimestamp + 1);
    this._lastTimestamp = timestamp;
    return timestamp;
  }

  /**
   * Reads the sales in range, renders them and writes the PDF to the output directory.
   * Without a range the report covers everything from 2000-01-01 until now.
   */
  async generate(range: DateRange | undefined, operationId: string): Promise<ReportArtifact> {
    const funcPrefix = `${REPORT_LOG_PREFIX}:generate:${operationId}`;
    const now = this._clock();
    const resolvedRange = resolveReportRange(range, now);

    const sales = await this.store.readAll(resolvedRange);
    logger.debug(funcPrefix, `Building report for ${sales.length} sales.`);
    const report = buildSalesReport(sales, resolvedRange, now);
    const content = await this.renderer.render(report, operationId);

    const filename = reportFilename(this._nextTimestamp(now));
    const filePath = path.join(this.options.outputDirectory, filename);
    try {
      await fs.mkdir(this.options.outputDirectory, { recursive: true });
      await fs.writeFile(filePath, content);
    } catch (error) {
      logger.error(funcPrefix, `Error writing report file: ${filePath}`, toError(error));
      throw error;
    }
    logger.info(funcPrefix, `Report written to ${filePath} (${content.length} bytes).`);

    return {
      filename,
      filePath,
      mimeType: "application/pdf",
      content,
      report,
    };
  }

  /**
   * Hands a generated report to a sink. Safe to call again with the same artifact after a failure.
   */
  async deliver(artifact: ReportArtifact, sink: IReportDeliverySink, operationId: string): Promise<void> {
    const funcPrefix = `${REPORT_LOG_PREFIX}:deliver:${operationId}`;
    try {
      await sink.deliver(artifact);
      logger.info(funcPrefix, `Delivered ${artifact.filename} via ${sink.name}.`);
    } catch (error) {
      const failure = new DeliveryFailureError(artifact, error);
      logger.warn(funcPrefix, failure.message, toError(error));
      throw failure;
    }
  }
}

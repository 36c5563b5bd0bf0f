// src/lib/services/reportGeneratorInterface.ts
import type { ReportArtifact, SalesReport } from '@/lib/types';

/**
 * Turns a laid-out report into document bytes.
 */
export interface IReportRenderer {
  /**
   * @param operationId - Correlates the log lines of one export.
   */
  render(report: SalesReport, operationId: string): Promise<Buffer>;
}

/**
 * Where a finished report goes: share sheet, printer, a folder.
 * Implementations throw when they cannot complete delivery.
 */
export interface IReportDeliverySink {
  readonly name: string;
  deliver(artifact: ReportArtifact): Promise<void>;
}

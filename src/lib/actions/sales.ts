// src/lib/actions/sales.ts
import { v4 as uuidv4 } from "uuid";
import type { SalesLedgerContext } from "@/lib/context";
import { DeliveryFailureError, SaleValidationError, toError } from "@/lib/errors";
import { summarizeSales } from "@/lib/services/salesAggregator";
import { logger } from "@/lib/services/logging";
import type { DateRange, PersistedSale, ReportArtifact, Sale, SalesSummary } from "@/lib/types";
import { toInclusiveDayRange } from "@/lib/utils";

const ACTION_LOG_PREFIX = "SalesActions";

interface ActionResult<T> {
  success: boolean;
  message?: string;
  data?: T;
  errors?: Record<string, string[]>; // For validation errors
}

export interface SalesOverview {
  sales: PersistedSale[];
  totals: SalesSummary;
  filter: DateRange | null;
}

export interface ExportReportResult {
  success: boolean;
  message?: string;
  /**
   * Present whenever the PDF was produced, including when delivery failed.
   */
  artifact?: ReportArtifact;
  delivered: boolean;
}

function newOperationId(): string {
  return uuidv4().substring(0, 8);
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error.";
}

export async function recordSale(
  context: SalesLedgerContext,
  sale: Sale,
): Promise<ActionResult<PersistedSale>> {
  const funcPrefix = `${ACTION_LOG_PREFIX}:recordSale:${newOperationId()}`;
  logger.info(funcPrefix, "Recording sale.", {
    client: sale.client,
    transactionType: sale.transactionType,
  });
  try {
    const created = await context.store.create(sale);
    return { success: true, data: created };
  } catch (error) {
    if (error instanceof SaleValidationError) {
      logger.warn(funcPrefix, "Validation failed", error.errors);
      return { success: false, message: "Please correct the highlighted fields.", errors: error.errors };
    }
    logger.error(funcPrefix, "Error recording sale", toError(error));
    return { success: false, message: `Failed to record sale: ${messageOf(error)}` };
  }
}

/**
 * Sales plus running totals. `from`/`to` are calendar days; both days are included entirely.
 */
export async function getSalesOverview(
  context: SalesLedgerContext,
  days?: { from: Date; to: Date },
): Promise<ActionResult<SalesOverview>> {
  const funcPrefix = `${ACTION_LOG_PREFIX}:getSalesOverview`;
  const filter = days ? toInclusiveDayRange(days.from, days.to) : null;
  try {
    const sales = await context.store.readAll(filter ?? {});
    logger.debug(funcPrefix, `Loaded ${sales.length} sales.`);
    return { success: true, data: { sales, totals: summarizeSales(sales), filter } };
  } catch (error) {
    logger.error(funcPrefix, "Error loading sales", toError(error));
    return { success: false, message: `Failed to load sales: ${messageOf(error)}` };
  }
}

export async function exportSalesReport(
  context: SalesLedgerContext,
  days?: { from: Date; to: Date },
): Promise<ExportReportResult> {
  const operationId = newOperationId();
  const funcPrefix = `${ACTION_LOG_PREFIX}:exportSalesReport:${operationId}`;
  const range = days ? toInclusiveDayRange(days.from, days.to) : undefined;

  let artifact: ReportArtifact;
  try {
    artifact = await context.reportGenerator.generate(range, operationId);
  } catch (error) {
    logger.error(funcPrefix, "Error generating report", toError(error));
    return { success: false, message: `Failed to generate report: ${messageOf(error)}`, delivered: false };
  }

  return deliver(context, artifact, operationId);
}

/**
 * Re-sends an already generated report without reading or rendering again.
 */
export async function retryReportDelivery(
  context: SalesLedgerContext,
  artifact: ReportArtifact,
): Promise<ExportReportResult> {
  return deliver(context, artifact, newOperationId());
}

async function deliver(
  context: SalesLedgerContext,
  artifact: ReportArtifact,
  operationId: string,
): Promise<ExportReportResult> {
  try {
    await context.reportGenerator.deliver(artifact, context.deliverySink, operationId);
    return { success: true, artifact, delivered: true };
  } catch (error) {
    if (error instanceof DeliveryFailureError) {
      return { success: false, message: error.message, artifact: error.artifact, delivered: false };
    }
    throw error;
  }
}

// src/lib/context.ts
import { loadConfig, type AppConfig, type ConfigOverrides } from "@/lib/config";
import { LedgerStore } from "@/lib/data-access/ledgerStore";
import type { LedgerConnectionFactory } from "@/lib/db";
import { DirectoryDeliverySink } from "@/lib/services/deliverySinks";
import { PdfReportRenderer } from "@/lib/services/pdfReportRenderer";
import { SalesReportGenerator } from "@/lib/services/reportGenerator";
import type { IReportDeliverySink, IReportRenderer } from "@/lib/services/reportGeneratorInterface";
import { configureLogger, logger } from "@/lib/services/logging";

export interface SalesLedgerContext {
  config: AppConfig;
  store: LedgerStore;
  reportGenerator: SalesReportGenerator;
  deliverySink: IReportDeliverySink;
}

export interface SalesLedgerContextOverrides {
  config?: ConfigOverrides;
  openConnection?: LedgerConnectionFactory;
  renderer?: IReportRenderer;
  deliverySink?: IReportDeliverySink;
  clock?: () => Date;
}

/**
 * Wires the store, report generator and delivery sink around one configuration,
 * and points the logger at it. Nothing is opened until `initializeSalesLedger` runs.
 */
export function createSalesLedgerContext(
  overrides: SalesLedgerContextOverrides = {},
): SalesLedgerContext {
  const config = loadConfig(process.env, overrides.config);
  configureLogger(config);
  const store = new LedgerStore({
    databasePath: config.databasePath,
    openConnection: overrides.openConnection,
  });
  const reportGenerator = new SalesReportGenerator(
    store,
    overrides.renderer ?? new PdfReportRenderer(),
    { outputDirectory: config.reportTempDirectory, clock: overrides.clock },
  );
  return {
    config,
    store,
    reportGenerator,
    deliverySink: overrides.deliverySink ?? new DirectoryDeliverySink(config.reportExportDirectory),
  };
}

/**
 * Startup gate: resolves once the ledger database is open.
 */
export async function initializeSalesLedger(context: SalesLedgerContext): Promise<void> {
  await context.store.initialize();
  logger.debug("SalesLedgerContext", `Initialized with database ${context.config.databasePath}`);
}

export async function shutdownSalesLedger(context: SalesLedgerContext): Promise<void> {
  await context.store.close();
}

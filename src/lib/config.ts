// src/lib/config.ts
import * as dotenv from "dotenv";
import os from "os";
import path from "path";
import { z } from "zod";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val ? val : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
  SALES_LEDGER_HOME: optionalString,
  DATABASE_URL: optionalString,
  REPORT_TMP_DIR: optionalString,
  REPORT_EXPORT_DIR: optionalString,
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((val) => val?.trim().toUpperCase() || undefined)
    .pipe(z.enum(LOG_LEVELS).optional()),
  LOG_TO_FILE: z
    .enum(["true", "false", "1", "0"])
    .default("true")
    .transform((val) => val === "true" || val === "1"),
  LOG_FILE_PATH: optionalString,
});

export interface AppConfig {
  env: "development" | "production" | "test";
  /**
   * Application-private directory that holds the database.
   */
  dataDirectory: string;
  databasePath: string;
  reportTempDirectory: string;
  reportExportDirectory: string;
  logLevel: LogLevelName;
  logToFile: boolean;
  logFilePath: string;
}

export type ConfigOverrides = Partial<AppConfig>;

let dotenvLoaded = false;

/**
 * Reads configuration from the environment. `.env` is loaded once when reading `process.env`.
 * Overrides win over the environment, and paths left unset are derived from the
 * overridden `dataDirectory`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): AppConfig {
  if (env === process.env && !dotenvLoaded) {
    dotenv.config();
    dotenvLoaded = true;
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid sales ledger configuration: ${details}`);
  }

  const vars = parsed.data;
  const nodeEnv = overrides.env ?? vars.NODE_ENV;
  const dataDirectory = path.resolve(
    overrides.dataDirectory ?? vars.SALES_LEDGER_HOME ?? path.join(os.homedir(), ".sales-ledger"),
  );

  return {
    env: nodeEnv,
    dataDirectory,
    databasePath:
      overrides.databasePath ??
      (vars.DATABASE_URL === ":memory:"
        ? ":memory:"
        : path.resolve(vars.DATABASE_URL ?? path.join(dataDirectory, "sales.db"))),
    reportTempDirectory:
      overrides.reportTempDirectory ?? path.resolve(vars.REPORT_TMP_DIR ?? os.tmpdir()),
    reportExportDirectory:
      overrides.reportExportDirectory ??
      path.resolve(vars.REPORT_EXPORT_DIR ?? path.join(dataDirectory, "reports")),
    logLevel: overrides.logLevel ?? vars.LOG_LEVEL ?? (nodeEnv === "development" ? "DEBUG" : "INFO"),
    logToFile: overrides.logToFile ?? vars.LOG_TO_FILE,
    logFilePath:
      overrides.logFilePath ??
      path.resolve(vars.LOG_FILE_PATH ?? path.join(process.cwd(), "logs", "app.log")),
  };
}

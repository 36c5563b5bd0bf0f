import { describe, it, expect } from "vitest";
import os from "os";
import path from "path";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("keeps the ledger under the home directory by default", () => {
    const config = loadConfig({ NODE_ENV: "production" });
    const home = path.join(os.homedir(), ".sales-ledger");
    expect(config.dataDirectory).toBe(home);
    expect(config.databasePath).toBe(path.join(home, "sales.db"));
    expect(config.reportExportDirectory).toBe(path.join(home, "reports"));
    expect(config.reportTempDirectory).toBe(path.resolve(os.tmpdir()));
    expect(config.logLevel).toBe("INFO");
    expect(config.logToFile).toBe(true);
  });

  it("reads paths and logging settings from the environment", () => {
    const config = loadConfig({
      NODE_ENV: "development",
      SALES_LEDGER_HOME: "/srv/ledger",
      REPORT_TMP_DIR: "/tmp/reports",
      LOG_LEVEL: "warn",
      LOG_TO_FILE: "false",
    });
    expect(config.databasePath).toBe(path.resolve("/srv/ledger/sales.db"));
    expect(config.reportTempDirectory).toBe(path.resolve("/tmp/reports"));
    expect(config.logLevel).toBe("WARN");
    expect(config.logToFile).toBe(false);
  });

  it("defaults to debug logging in development", () => {
    expect(loadConfig({ NODE_ENV: "development" }).logLevel).toBe("DEBUG");
  });

  it("lets DATABASE_URL point at an in-memory database", () => {
    expect(loadConfig({ DATABASE_URL: ":memory:" }).databasePath).toBe(":memory:");
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/^Invalid sales ledger configuration: LOG_LEVEL/);
  });

  it("derives unset paths from an overridden data directory", () => {
    const config = loadConfig(
      { NODE_ENV: "production" },
      { dataDirectory: "/srv/ledger", env: "development", logFilePath: "/var/log/ledger.log" },
    );
    expect(config.dataDirectory).toBe(path.resolve("/srv/ledger"));
    expect(config.databasePath).toBe(path.resolve("/srv/ledger/sales.db"));
    expect(config.reportExportDirectory).toBe(path.resolve("/srv/ledger/reports"));
    expect(config.logLevel).toBe("DEBUG");
    expect(config.logFilePath).toBe("/var/log/ledger.log");
  });

  it("prefers an overridden path to the one derived from the data directory", () => {
    const config = loadConfig({ SALES_LEDGER_HOME: "/srv/ledger" }, { databasePath: ":memory:" });
    expect(config.databasePath).toBe(":memory:");
    expect(config.reportExportDirectory).toBe(path.resolve("/srv/ledger/reports"));
  });
});

// src/lib/services/logging.ts
import { format } from 'date-fns';
import fs from 'fs'; // Use standard fs for appendFile callback
import path from 'path';
import { loadConfig, type AppConfig, type LogLevelName } from '@/lib/config';

type LogData = Record<string, unknown> | string | number | boolean | Error | undefined;

enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
};

interface LoggerConfig {
  logLevel: LogLevel;
  logToFile: boolean;
  logFilePath: string;
  logLevelsToFile: LogLevel[];
}

// Resolved on first log call so dotenv has been applied by then
let config: LoggerConfig | null = null;

let logDirectoryEnsured = false;

function toLoggerConfig(appConfig: Pick<AppConfig, 'logLevel' | 'logToFile' | 'logFilePath'>): LoggerConfig {
  return {
    logLevel: LEVEL_BY_NAME[appConfig.logLevel],
    logToFile: appConfig.logToFile,
    logFilePath: appConfig.logFilePath,
    logLevelsToFile: [LogLevel.ERROR, LogLevel.WARN],
  };
}

/**
 * Replaces the environment-derived logger settings, e.g. with an application context's config.
 */
export function configureLogger(appConfig: Pick<AppConfig, 'logLevel' | 'logToFile' | 'logFilePath'>): void {
  config = toLoggerConfig(appConfig);
  logDirectoryEnsured = false;
}

function getConfig(): LoggerConfig {
  if (!config) {
    config = toLoggerConfig(loadConfig());
  }
  return config;
}
function ensureLogDirectoryExistsSync(cfg: LoggerConfig) {
    if (logDirectoryEnsured) return;
    const logDirectory = path.dirname(cfg.logFilePath);
    try {
        if (!fs.existsSync(logDirectory)) {
            fs.mkdirSync(logDirectory, { recursive: true });
            console.log(`[Logger] Created log directory: ${logDirectory}`); // Logger itself is not usable yet
        }
    } catch (error) {
        console.error('[Logger] FATAL: Error creating log directory', error);
        cfg.logToFile = false;
    }
    logDirectoryEnsured = true;
}

function isLevelEnabled(cfg: LoggerConfig, level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(cfg.logLevel);
}

function stringifyData(data: LogData, pretty: boolean): string {
    if (data === undefined) return '';
    if (data instanceof Error) {
        return `\nError: ${data.stack || data.message}`;
    }
    const separator = pretty ? '\nData: ' : ' | Data: ';
    try {
        const text = typeof data === 'object'
            ? JSON.stringify(data, null, pretty ? 2 : undefined)
            : String(data);
        return `${separator}${text}`;
    } catch {
        return `${separator}[Could not stringify data]`;
    }
}

function log(level: LogLevel, prefix: string, message: string, data?: LogData): void {
    const cfg = getConfig();
    if (!isLevelEnabled(cfg, level)) {
        return;
    }

    const timestamp = format(new Date(), 'yyyy-MM-dd HH:mm:ss.SSS');
    const logPrefix = `[${timestamp}] [${level}]${prefix ? ` [${prefix}]` : ''}:`;

    const consoleLogMethod = level === LogLevel.ERROR ? console.error
                           : level === LogLevel.WARN ? console.warn
                           : console.log;
    consoleLogMethod(`${logPrefix} ${message}${stringifyData(data, true)}`);

    if (cfg.logToFile && cfg.logLevelsToFile.includes(level)) {
        ensureLogDirectoryExistsSync(cfg);
        if (!cfg.logToFile) return; // Directory creation failed

        const fileLogMessage = `${logPrefix} ${message}${stringifyData(data, false)}\n`;
        fs.appendFile(cfg.logFilePath, fileLogMessage, (err) => {
            if (err) {
                console.error('[Logger] Error writing to log file:', err);
            }
        });
    }
}

export const logger: {
  info: (prefix: string, message: string, data?: LogData) => void;
  warn: (prefix: string, message: string, data?: LogData) => void;
  error: (prefix: string, message: string, error?: LogData) => void;
  debug: (prefix: string, message: string, data?: LogData) => void;
} = {
  info: (prefix, message, data) => log(LogLevel.INFO, prefix, message, data),
  warn: (prefix, message, data) => log(LogLevel.WARN, prefix, message, data),
  error: (prefix, message, error) => log(LogLevel.ERROR, prefix, message, error),
  debug: (prefix, message, data) => log(LogLevel.DEBUG, prefix, message, data),
};

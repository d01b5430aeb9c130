import chalk from "chalk";
import { appendFileSync } from "node:fs";

// Diagnostics go to stderr so that extracted comment text on stdout can be piped.

export type LogLevel = "SUCCESS" | "ERROR" | "WARNING" | "INFO" | "DEBUG";

let logFilePath: string | null = null;
let verbose = false;

function isTestEnv(): boolean {
  return process.env.NODE_ENV === "test" || process.env.JEST_WORKER_ID !== undefined;
}

function writeToConsole(message: string): void {
  if (!isTestEnv()) {
    process.stderr.write(`${message}\n`);
  }
}

export function setLogFile(filePath: string | null): void {
  logFilePath = filePath;
}

export function getLogFile(): string | null {
  return logFilePath;
}

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function formatLogLine(level: LogLevel, message: string, timestamp: Date = new Date()): string {
  return `[${timestamp.toISOString()}] [${level}] ${message}\n`;
}

function writeToLog(level: LogLevel, message: string): void {
  if (!logFilePath) {
    return;
  }
  appendFileSync(logFilePath, formatLogLine(level, message), "utf-8");
}

export function success(message: string): void {
  writeToConsole(chalk.green(message));
  writeToLog("SUCCESS", message);
}

export function error(message: string): void {
  writeToConsole(chalk.red(message));
  writeToLog("ERROR", message);
}

export function warning(message: string): void {
  writeToConsole(chalk.bgHex(`#FFA500`).black(`WARNING: ${message}`));
  writeToLog("WARNING", message);
}

export function info(message: string): void {
  writeToConsole(chalk.blue(message));
  writeToLog("INFO", message);
}

// only shown with --verbose, always logged
export function dim(message: string): void {
  if (verbose) {
    writeToConsole(chalk.gray(message));
  }
  writeToLog("DEBUG", message);
}

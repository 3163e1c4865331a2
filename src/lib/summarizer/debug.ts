/**
 * Debug logging utilities for the summarizer
 *
 * Console logging plus an optional append-only debug log file.
 * Configured via environment variables:
 * - SUMMARIZER_DEBUG_LOG_FILE=true enables the file (off by default)
 * - SUMMARIZER_DEBUG_LOG_PATH overrides ./summarizer-debug.log
 *
 * @module summarizer/debug
 */

import * as fs from "fs";
import * as path from "path";

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

function isFileLoggingEnabled(): boolean {
  return (process.env.SUMMARIZER_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";
}

export function getDebugLogPath(): string {
  return process.env.SUMMARIZER_DEBUG_LOG_PATH || path.resolve(process.cwd(), "summarizer-debug.log");
}

/**
 * Format a log line: `[timestamp] message | payload`, payload truncated.
 */
export function formatDebugLine(message: string, data?: unknown, now: Date = new Date()): string {
  let logLine = `[${now.toISOString()}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }

  return logLine;
}

/**
 * Log a message to the console and, when enabled, the debug file
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatDebugLine(message, data);

  if (isFileLoggingEnabled()) {
    // Async append so long batches never block on disk
    void fs.promises.appendFile(getDebugLogPath(), logLine + "\n").catch((err: unknown) => {
      console.warn(`[Debug] Could not write debug log: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  console.log(logLine);
}

/**
 * Logging Middleware
 *
 * Structured JSON logging for the platform. Every line carries a context
 * identifier; warnings and errors are also forwarded to observability.
 */

import type { Logger } from "@workgate/contracts";
import { captureMessage } from "../../observability/index.js";

/**
 * Creates a structured logger.
 * Prefixes all messages with a context identifier.
 */
export function createLogger(context: string): Logger {
  return {
    info(message, data) {
      console.log(JSON.stringify({ level: "info", context, message, ...data }));
    },
    warn(message, data) {
      console.warn(JSON.stringify({ level: "warn", context, message, ...data }));
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      console.error(JSON.stringify({ level: "error", context, message, ...data }));
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (process.env.NODE_ENV !== "production") {
        console.debug(JSON.stringify({ level: "debug", context, message, ...data }));
      }
    },
  };
}

export interface ActionExecutionRecord {
  actionId: string;
  userId: string;
  /** Absent when the dispatch failed before the tenant was resolved */
  tenantId?: string;
  durationMs: number;
  success: boolean;
  errorType?: string;
  error?: string;
}

/**
 * Logs one dispatch with its duration and outcome.
 */
export function logActionExecution(record: ActionExecutionRecord): void {
  const entry = {
    level: record.success ? "info" : "error",
    context: "action-bus",
    event: "action.executed",
    ...record,
  };

  if (record.success) {
    console.log(JSON.stringify(entry));
  } else {
    console.error(JSON.stringify(entry));
  }
}

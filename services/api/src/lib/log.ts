import { toStructuredLog } from "@filedesk/core";

function emitLog(level: "info" | "error", event: string, payload: Record<string, unknown>): void {
  const rawLog = toStructuredLog(event, payload);

  if (level === "error") {
    // eslint-disable-next-line no-console
    console.error(rawLog);
    return;
  }

  // eslint-disable-next-line no-console
  console.log(rawLog);
}

/**
 * Logs an informational structured event to stdout.
 *
 * @param event - Event name or type to include in the structured log
 * @param payload - Key/value data to attach to the log entry
 */
export function logInfo(event: string, payload: Record<string, unknown>): void {
  emitLog("info", event, payload);
}

/**
 * Logs an error-level structured message for a named event and associated data.
 *
 * @param event - Identifier or name of the event being logged
 * @param payload - Additional key/value data to include in the structured log
 */
export function logError(event: string, payload: Record<string, unknown>): void {
  emitLog("error", event, payload);
}

export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return { value: error };
}

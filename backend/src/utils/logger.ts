type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

function loggingEnabled(): boolean {
  return process.env.NODE_ENV !== "test" || process.env.TEST_LOGGING === "true";
}

function writeLog(level: LogLevel, event: string, fields: LogFields = {}): void {
  if (!loggingEnabled()) {
    return;
  }
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    event,
    ...fields
  });
  if (level === "error") {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
}

export function logInfo(event: string, fields?: LogFields): void {
  writeLog("info", event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  writeLog("warn", event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  writeLog("error", event, fields);
}

export function describeError(error: unknown): LogFields {
  if (error instanceof Error) {
    return { errorName: error.name, errorMessage: error.message, stack: error.stack };
  }
  return { errorMessage: String(error) };
}

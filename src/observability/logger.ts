type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export interface CorrelationContext {
  requestId?: string | null;
  documentId?: string | null;
}

export interface LogFields {
  [key: string]: unknown;
}

const toLogEntry = (
  level: LogLevel,
  event: string,
  context: CorrelationContext,
  fields: LogFields
): Record<string, unknown> => ({
  ts: new Date().toISOString(),
  level,
  event,
  request_id: context.requestId ?? null,
  document_id: context.documentId ?? null,
  ...fields
});

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

export const parseConfiguredLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === "trace" ||
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return "info";
};

const configuredLogLevel = parseConfiguredLogLevel(process.env.LOG_LEVEL);

export const isLogLevelEnabled = (level: LogLevel): boolean =>
  LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[configuredLogLevel];

const emit = (entry: Record<string, unknown>, level: LogLevel): void => {
  if (!isLogLevelEnabled(level)) {
    return;
  }
  const serialized = JSON.stringify(entry);
  if (level === "error") {
    console.error(serialized);
    return;
  }
  if (level === "warn") {
    console.warn(serialized);
    return;
  }
  console.info(serialized);
};

export const logInfo = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit(toLogEntry("info", event, context, fields), "info");
};

export const logDebug = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit(toLogEntry("debug", event, context, fields), "debug");
};

export const logTrace = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit(toLogEntry("trace", event, context, fields), "trace");
};

export const logWarn = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit(toLogEntry("warn", event, context, fields), "warn");
};

export const logError = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit(toLogEntry("error", event, context, fields), "error");
};

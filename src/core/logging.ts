import { randomUUID } from "crypto";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEnvelope = {
  ts: string;
  level: LogLevel;
  module: string;
  event: string;
  requestId: string;
  connectionId?: string;
  port?: number;
  data?: unknown;
};

export type LogFields = {
  requestId?: string;
  connectionId?: string;
  port?: number;
  data?: unknown;
};

export type LogSink = (entry: LogEnvelope) => void;

export type Logger = {
  debug: (event: string, fields?: LogFields) => LogEnvelope | null;
  info: (event: string, fields?: LogFields) => LogEnvelope | null;
  warn: (event: string, fields?: LogFields) => LogEnvelope | null;
  error: (event: string, fields?: LogFields) => LogEnvelope | null;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const SECRET_KEY_PATTERN = /(token|secret|password|authorization|cookie|api[-_]?key)/i;
const SECRET_VALUE_PATTERN = /(bearer\s+[a-z0-9._-]+|sk_[a-z0-9_-]+|eyJ[a-z0-9_-]+\.[a-z0-9_-]+\.[a-z0-9_-]+)/gi;

function redactString(value: string): string {
  return value.replace(SECRET_VALUE_PATTERN, "[REDACTED]");
}

export function redactSensitive(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === "string") {
    return redactString(value);
  }
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      output[key] = "[REDACTED]";
      continue;
    }
    output[key] = redactSensitive(entry, seen);
  }
  return output;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return fallback;
}

// Writes to stderr so stdout stays free for callers that print results.
const defaultSink: LogSink = (entry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

export function createLogger(
  moduleName: string,
  sink: LogSink = defaultSink,
  minLevel: LogLevel = parseLogLevel(process.env.CDP_PILOT_LOG_LEVEL)
): Logger {
  const emit = (level: LogLevel, event: string, fields: LogFields = {}): LogEnvelope | null => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return null;
    }
    const entry: LogEnvelope = {
      ts: new Date().toISOString(),
      level,
      module: moduleName,
      event,
      requestId: fields.requestId ?? randomUUID(),
      ...(fields.connectionId ? { connectionId: fields.connectionId } : {}),
      ...(typeof fields.port === "number" ? { port: fields.port } : {}),
      ...(typeof fields.data === "undefined" ? {} : { data: redactSensitive(fields.data) })
    };
    sink(entry);
    return entry;
  };

  return {
    debug: (event, fields) => emit("debug", event, fields),
    info: (event, fields) => emit("info", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    error: (event, fields) => emit("error", event, fields)
  };
}

/** Logger that drops everything; handy as an injected default in tests. */
export const silentLogger: Logger = createLogger("silent", () => undefined, "error");

export const __test__ = {
  redactString,
  defaultSink
};

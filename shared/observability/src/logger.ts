/**
 * Structured logger.
 *
 * Usage:  logger.info("Lexicon loaded", { locale: "pt-BR" });
 *
 * Writes to the console at or above LOG_LEVEL (debug | info | warn | error |
 * silent, default warn) and emits every record through the OpenTelemetry logs
 * API. Without a registered LoggerProvider the OTel side is a no-op.
 */

import { logs, SeverityNumber, type LogAttributes } from "@opentelemetry/api-logs";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Accepted LOG_LEVEL values */
export const LOG_THRESHOLDS = ["debug", "info", "warn", "error", "silent"] as const;

type Threshold = (typeof LOG_THRESHOLDS)[number];

const RANK: Record<Threshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const SEVERITY: Record<LogLevel, SeverityNumber> = {
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
};

export const serviceName = process.env.OTEL_SERVICE_NAME || "relative-date";

function isThreshold(value: string): value is Threshold {
  return Object.hasOwn(RANK, value);
}

/** Current console threshold; read on every call so tests can change LOG_LEVEL */
function threshold(): Threshold {
  const raw = (process.env.LOG_LEVEL || "warn").trim().toLowerCase();
  return isThreshold(raw) ? raw : "warn";
}

function write(level: LogLevel, message: string, attributes: LogAttributes = {}): void {
  logs.getLogger(serviceName).emit({
    severityNumber: SEVERITY[level],
    severityText: level.toUpperCase(),
    body: message,
    attributes,
  });

  if (RANK[level] < RANK[threshold()]) {
    return;
  }

  const line = Object.keys(attributes).length > 0
    ? `[${serviceName}] ${message} ${JSON.stringify(attributes)}`
    : `[${serviceName}] ${message}`;

  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export const logger = {
  debug: (message: string, attributes?: LogAttributes) => write("debug", message, attributes),
  info: (message: string, attributes?: LogAttributes) => write("info", message, attributes),
  warn: (message: string, attributes?: LogAttributes) => write("warn", message, attributes),
  error: (message: string, attributes?: LogAttributes) => write("error", message, attributes),
};

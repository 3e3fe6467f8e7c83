import winston from "winston";

const { combine, timestamp, printf, colorize, json } = winston.format;

const SECRET_KEY = /(api[-_]?key|secret|signature|passphrase|password)/i;

/**
 * Blank out credential-looking fields before any transport sees them
 */
export const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (SECRET_KEY.test(key)) {
      info[key] = "[REDACTED]";
    }
  }
  return info;
});

const consoleFormat = printf(({ level, message, timestamp, ...metadata }) => {
  const fields = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : "";
  return `${timestamp} [${level}]: ${message}${fields}`;
});

const consoleTransport = new winston.transports.Console({
  format: combine(colorize(), consoleFormat),
});

export const logger = winston.createLogger({
  format: combine(
    redactSecrets(),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  ),
  transports: [consoleTransport],
});

type Env = Record<string, string | undefined>;

// Optional file sink (structured JSON lines)
let fileTransport: winston.transports.FileTransportInstance | null = null;
let filePath: string | null = null;

/**
 * Apply LOG_LEVEL, LOG_SILENT and LOG_FILE. Runs at import and again
 * once .env has been loaded.
 */
export function configureLogger(env: Env = process.env): void {
  logger.level = env.LOG_LEVEL || "info";
  logger.silent = env.LOG_SILENT === "true";

  const filename = env.LOG_FILE || null;
  if (filename === filePath) return;

  if (fileTransport) {
    logger.remove(fileTransport);
    fileTransport.close?.();
    fileTransport = null;
  }
  filePath = filename;
  if (filename) {
    fileTransport = new winston.transports.File({ filename, format: json() });
    logger.add(fileTransport);
  }
}

configureLogger();

/**
 * Engine events the log sink receives
 */
export type EngineEvent =
  | "order_submitted"
  | "order_status_changed"
  | "order_rejected"
  | "order_amended"
  | "validation_rejected"
  | "strategy_started"
  | "strategy_finished"
  | "strategy_slice_emitted"
  | "strategy_slice_failed"
  | "oco_activated"
  | "oco_sibling_cancelled"
  | "oco_race_detected"
  | "grid_level_placed"
  | "grid_level_rebalanced"
  | "grid_level_pending"
  | "grid_range_updated"
  | "cancel_failed";

export type LogLevel = "error" | "warn" | "info" | "debug";

/**
 * Emit one structured event: `event` goes in the fields, `message` is the human line
 */
export function logEvent(
  event: EngineEvent,
  message: string,
  fields: Record<string, unknown> = {},
  level: LogLevel = "info",
): void {
  logger.log(level, message, { event, ...fields });
}

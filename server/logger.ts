/**
 * Structured logging with Winston.
 *
 * One root logger for the process; engine modules take a child logger tagged
 * with their module name. Development output is colorized text, production
 * output is JSON.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize, json } = winston.format;

const devFormat = combine(
  colorize(),
  timestamp({ format: "HH:mm:ss" }),
  printf(({ level, message, timestamp, module, ...meta }) => {
    const moduleTag = module ? `[${module}]` : "[server]";
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${timestamp} ${level} ${moduleTag} ${message}${metaStr}`;
  })
);

const prodFormat = combine(timestamp(), json());

const isProduction = process.env.NODE_ENV === "production";

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: isProduction ? prodFormat : devFormat,
  defaultMeta: { module: "server" },
  // Extraction logs per section; keep test output quiet unless asked for.
  silent: process.env.NODE_ENV === "test" && !process.env.LOG_LEVEL,
  transports: [new winston.transports.Console()],
});

/**
 * Child logger carrying the module name.
 *
 * @example
 * const log = createLogger("form-106d");
 * log.info("Schedule D read", { creditors: 4 });
 */
export function createLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

/**
 * Log a finished HTTP request. Extraction payloads are large; only their
 * top-level keys are logged.
 */
export function logRequest(
  method: string,
  path: string,
  status: number,
  duration: number,
  response?: Record<string, unknown>
): void {
  const meta: Record<string, unknown> = { method, path, status, duration };

  if (response) {
    meta.responseKeys = Object.keys(response);
  }

  logger.info(`${method} ${path} ${status} in ${duration}ms`, meta);
}

export default logger;

import pino from "pino";

const pretty = !["production", "test"].includes(process.env.NODE_ENV ?? "");

// Set log level via env LOG_LEVEL (default: info)
const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport: pretty
    ? {
        target: "pino-pretty",
        options: { colorize: true },
      }
    : undefined,
});

export interface LogMeta {
  shardId?: number;
  storeId?: string;
  site?: string;
  url?: string;
  duration?: number;
  count?: number;
  [key: string]: unknown;
}

function describeError(error: unknown): { error?: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return error === undefined ? {} : { error: String(error) };
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: unknown, meta?: LogMeta): void {
    logger.error({ ...meta, ...describeError(error) }, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static shardProgress(
    shardId: number,
    processed: number,
    total: number,
    rate: number,
  ): void {
    this.info(`Progress: ${processed}/${total}`, {
      shardId,
      processed,
      total,
      rate: rate.toFixed(2),
    });
  }
  static storeFailed(shardId: number, storeId: string, error: string): void {
    this.warn(`Store scrape failed: ${storeId}`, { shardId, storeId, error });
  }
}

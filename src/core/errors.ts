/**
 * Error taxonomy for shard planning, lookup, persistence and scraping
 */

export type ShardErrorCode =
  | "INVALID_CONFIGURATION"
  | "NOT_FOUND"
  | "PERSISTENCE_FAILURE"
  | "SCRAPE_FAILURE";

export class ShardError extends Error {
  constructor(
    message: string,
    public readonly code: ShardErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ShardError";
  }
}

export class InvalidConfigurationError extends ShardError {
  constructor(message: string, public readonly option?: string) {
    super(message, "INVALID_CONFIGURATION");
    this.name = "InvalidConfigurationError";
  }
}

export class StoreListNotFoundError extends InvalidConfigurationError {
  constructor(storesFile: string, shardsDir: string) {
    super(
      `No store list found at ${storesFile} and no stores recorded in ${shardsDir}`,
      "storesFile",
    );
    this.name = "StoreListNotFoundError";
  }
}

export class ShardNotFoundError extends ShardError {
  constructor(
    public readonly shardId: number,
    public readonly availableIds: number[],
  ) {
    const range =
      availableIds.length > 0
        ? `valid IDs are 1..${availableIds.length}`
        : "no shards exist, run create-shards first";
    super(`Shard ${shardId} not found (${range})`, "NOT_FOUND");
    this.name = "ShardNotFoundError";
  }
}

export class PersistenceError extends ShardError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(`${message}: ${path}`, "PERSISTENCE_FAILURE", { cause });
    this.name = "PersistenceError";
  }
}

/** Per-store failure, recorded on the result and never fatal for a shard */
export class ScrapeError extends ShardError {
  constructor(
    message: string,
    public readonly storeId: string,
    cause?: unknown,
  ) {
    super(message, "SCRAPE_FAILURE", { cause });
    this.name = "ScrapeError";
  }
}

export class StoreDeadlineExceededError extends ScrapeError {
  constructor(storeId: string, public readonly timeoutMs: number) {
    super(
      `Store ${storeId} deadline reached after ${Math.round(timeoutMs / 1000)}s`,
      storeId,
    );
    this.name = "StoreDeadlineExceededError";
  }
}

/** Narrow an unknown thrown value to a message */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

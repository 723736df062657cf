/**
 * File names of the persisted shard and result layout
 */

import path from "node:path";
import { SHARD_CONSTANTS } from "../constants/index";

export const shardFilename = (shardId: number): string =>
  `shard_${shardId}.json`;

export const manifestPath = (shardsDir: string): string =>
  path.join(shardsDir, SHARD_CONSTANTS.MANIFEST_FILENAME);

export const shardPath = (shardsDir: string, shardId: number): string =>
  path.join(shardsDir, shardFilename(shardId));

export const resultPaths = (
  resultsDir: string,
  shardId: number,
): { json: string; csv: string } => ({
  json: path.join(resultsDir, `shard_${shardId}_results.json`),
  csv: path.join(resultsDir, `shard_${shardId}_results.csv`),
});

/** Shard ID encoded in a file name, or null for any other file */
export function parseShardFilename(name: string): number | null {
  const m = SHARD_CONSTANTS.SHARD_FILE_PATTERN.exec(name);
  if (!m) return null;
  const id = Number(m[1]);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

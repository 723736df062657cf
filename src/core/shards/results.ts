/**
 * Persistence of shard results as JSON and CSV
 */

import { stringify } from "csv-stringify";
import { PersistenceError } from "../errors";
import { writeFileAtomic, writeJsonAtomic } from "../storage";
import type { ShardResult } from "../types/shard";
import { resultPaths } from "./layout";

export const BASE_COLUMNS = [
  "store_id",
  "store_name",
  "city",
  "province",
  "postal_code",
  "success",
  "error",
  "started_at",
  "duration_ms",
] as const;

type Row = Record<string, string>;

function cell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

/** One CSV row per result; scraped fields become extra columns */
export function flattenResult(result: ShardResult): Row {
  const row: Row = {
    store_id: result.store.storeId,
    store_name: result.store.name,
    city: result.store.city,
    province: result.store.province,
    postal_code: result.store.postalCode,
    success: cell(result.success),
    error: cell(result.error),
    started_at: result.startedAt,
    duration_ms: cell(Math.round(result.durationMs)),
  };

  const { data } = result;
  if (data !== null && typeof data === "object" && !Array.isArray(data)) {
    for (const [key, value] of Object.entries(data)) {
      if (!Object.hasOwn(row, key)) row[key] = cell(value);
    }
  } else if (data !== null) {
    row.data = cell(data);
  }
  return row;
}

/** Base columns followed by the sorted union of scraped field names */
export function csvColumns(rows: Row[]): string[] {
  const base: readonly string[] = BASE_COLUMNS;
  const extra = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!base.includes(key)) extra.add(key);
    }
  }
  return [...base, ...Array.from(extra).sort()];
}

export function resultsToCsv(results: ShardResult[]): Promise<string> {
  const rows = results.map(flattenResult);
  const columns = csvColumns(rows);
  return new Promise((resolve, reject) => {
    stringify(rows, { header: true, columns }, (err, output) => {
      if (err) reject(err);
      else resolve(output);
    });
  });
}

/**
 * Writes `shard_<ID>_results.json` and `.csv`, replacing that shard's
 * previous output and nothing else
 * @throws PersistenceError on any I/O failure
 */
export async function persistShardResults(
  resultsDir: string,
  shardId: number,
  results: ShardResult[],
): Promise<{ json: string; csv: string }> {
  const paths = resultPaths(resultsDir, shardId);

  let csv: string;
  try {
    csv = await resultsToCsv(results);
  } catch (e) {
    throw new PersistenceError("Could not encode CSV", paths.csv, e);
  }

  await writeJsonAtomic(paths.json, results);
  await writeFileAtomic(paths.csv, csv);
  return paths;
}

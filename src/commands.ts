/**
 * CLI commands: argument parsing and dispatch to the shard service
 */

import {
  createShardsAction,
  enrichStoresAction,
  formatShardListing,
  listShardsAction,
  rebuildManifestAction,
  runShardAction,
  serviceOptionsFromConfig,
  type ShardServiceOptions,
} from "./core/services/shard-service";
import { AppConfig } from "./core/config/app-config";
import { InvalidConfigurationError, ShardError } from "./core/errors";
import {
  formatClearanceSummary,
  summarizeClearance,
} from "./core/shards/summary";
import { Logger } from "./core/utils/logger";
import type { SiteAdapter } from "./sites/types";
import { getSiteKeys } from "./sites/registry";

export const COMMANDS = [
  "create-shards",
  "list-shards",
  "run-shard",
  "rebuild-manifest",
  "enrich-stores",
] as const;

export type Command = (typeof COMMANDS)[number];

const usage = () => `Usage:
  store-shards create-shards [--stores-per-shard N]
  store-shards list-shards
  store-shards run-shard <ID>            (or --shard <ID>)
  store-shards rebuild-manifest
  store-shards enrich-stores [--max-stores N] [--dry-run]

Options:
  --stores-per-shard  Stores per shard (default: ${AppConfig.STORES_PER_SHARD})
  --stores-file       Store list (default: ${AppConfig.STORES_FILE})
  --shards-dir        Shard directory (default: ${AppConfig.SHARDS_DIR})
  --results-dir       Result directory (default: ${AppConfig.RESULTS_DIR})
  --site              Site adapter (default: ${AppConfig.SITE})
  --concurrency       Stores scraped at once (default: ${AppConfig.MAX_CONCURRENCY})
  --max-stores        Stores to enrich, 0 = all (default: ${AppConfig.ENRICH_MAX_STORES})
  --dry-run           Enrich without writing the store list

Examples:
  npm run cli -- create-shards --stores-per-shard 5
  npm run cli -- list-shards
  npm run cli -- run-shard 3

Available sites: ${getSiteKeys().join(", ")}`;

export interface CliDeps {
  /** Replaces the registry adapter, for run-shard and enrich-stores */
  adapter?: SiteAdapter;
  print?: (text: string) => void;
}

interface ParsedArgs {
  command: Command | null;
  positional: string[];
  hasFlag: (flag: string) => boolean;
  getArg: (flag: string) => string | undefined;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  // flag values are not positionals
  const positional = argv.filter(
    (a, i) => !a.startsWith("--") && !(i > 0 && valueFlag(argv[i - 1])),
  );

  let command: Command | null = null;
  const first = positional[0]?.replace(/_/g, "-");
  if (first && isCommand(first)) {
    command = first;
    positional.shift();
  } else if (hasFlag("--create-shards")) command = "create-shards";
  else if (hasFlag("--list-shards")) command = "list-shards";
  else if (hasFlag("--run-shard")) command = "run-shard";

  return { command, positional, hasFlag, getArg };
}

const VALUE_FLAGS = new Set([
  "--stores-per-shard",
  "--stores-file",
  "--shards-dir",
  "--results-dir",
  "--site",
  "--concurrency",
  "--max-stores",
  "--shard",
  "--run-shard",
]);

const valueFlag = (a: string | undefined) =>
  a !== undefined && VALUE_FLAGS.has(a);

const isCommand = (s: string): s is Command =>
  COMMANDS.some((c) => c === s);

function intArg(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    throw new InvalidConfigurationError(
      `${name} must be an integer, got "${raw}"`,
      name,
    );
  }
  return n;
}

function resolveOptions(args: ParsedArgs): ShardServiceOptions {
  const base = serviceOptionsFromConfig();
  return {
    ...base,
    storesFile: args.getArg("--stores-file") ?? base.storesFile,
    shardsDir: args.getArg("--shards-dir") ?? base.shardsDir,
    resultsDir: args.getArg("--results-dir") ?? base.resultsDir,
    site: args.getArg("--site") ?? base.site,
    storesPerShard:
      intArg(args.getArg("--stores-per-shard"), "stores-per-shard") ??
      base.storesPerShard,
    concurrency:
      intArg(args.getArg("--concurrency"), "concurrency") ?? base.concurrency,
  };
}

/**
 * Runs one CLI action
 * @returns the process exit code
 */
export async function runCli(
  argv: string[],
  deps: CliDeps = {},
): Promise<number> {
  const print = deps.print ?? ((text: string) => console.log(text));
  const args = parseArgs(argv);
  const { command } = args;

  if (args.hasFlag("--help") || !command) {
    print(usage());
    return 0;
  }

  try {
    const options = resolveOptions(args);

    switch (command) {
      case "create-shards": {
        const { manifest } = await createShardsAction(options);
        print(
          `✅ ${manifest.total_shards} shard(s) created for ${manifest.total_stores} stores (${manifest.stores_per_shard} per shard) in ${options.shardsDir}`,
        );
        return 0;
      }

      case "list-shards": {
        print(formatShardListing(await listShardsAction(options)));
        return 0;
      }

      case "run-shard": {
        const raw =
          args.positional[0] ??
          args.getArg("--shard") ??
          args.getArg("--run-shard");
        const shardId = intArg(raw, "shard");
        if (shardId === undefined) {
          throw new InvalidConfigurationError(
            "run-shard needs a shard ID",
            "shard",
          );
        }
        const report = await runShardAction(shardId, options, deps.adapter);
        print(
          `✅ Shard ${shardId} finished: ${report.succeeded} succeeded, ${report.failed} failed\n   ${report.jsonPath}\n   ${report.csvPath}`,
        );
        print(formatClearanceSummary(summarizeClearance(report.results)));
        return 0;
      }

      case "rebuild-manifest": {
        const manifest = await rebuildManifestAction(options);
        print(`✅ Manifest rebuilt: ${manifest.total_shards} shard(s)`);
        return 0;
      }

      case "enrich-stores": {
        const summary = await enrichStoresAction(
          options,
          {
            maxStores:
              intArg(args.getArg("--max-stores"), "max-stores") ??
              AppConfig.ENRICH_MAX_STORES,
            dryRun: args.hasFlag("--dry-run") || AppConfig.DRY_RUN,
            skipTimeouts: AppConfig.ENRICH_SKIP_TIMEOUTS,
          },
          deps.adapter,
        );
        print(
          `✅ Enrichment complete: enriched ${summary.enriched}/${summary.processed} processed stores`,
        );
        return 0;
      }
    }
  } catch (error) {
    if (error instanceof ShardError) {
      Logger.error(`❌ ${error.message}`, undefined, { code: error.code });
    } else {
      Logger.error("❌ Unexpected failure", error);
    }
    return 1;
  }
}

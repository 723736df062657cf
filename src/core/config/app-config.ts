/**
 * Centralized application configuration
 */

import { envBool, envInt, envStr } from "./env";

const CI = envBool("CI", false);
const SAFE_MODE = envBool("SAFE_MODE", false);

export class AppConfig {
  // File layout
  static readonly STORES_FILE = envStr("STORES_FILE", "data/stores.json");
  static readonly SHARDS_DIR = envStr("SHARDS_DIR", "shards");
  static readonly RESULTS_DIR = envStr("RESULTS_DIR", "results");

  // Sharding
  static readonly STORES_PER_SHARD = envInt("STORES_PER_SHARD", 8);

  // Execution
  static readonly CI = CI;
  static readonly SAFE_MODE = SAFE_MODE;
  static readonly MAX_CONCURRENCY = SAFE_MODE
    ? Math.min(envInt("MAX_CONCURRENCY", 4), 2)
    : envInt("MAX_CONCURRENCY", 4);
  static readonly MAX_MINUTES_PER_STORE = envInt("MAX_MINUTES_PER_STORE", 25);

  // HTTP, CI runners get blocked quickly so they fail fast
  static readonly SITE = envStr("SITE", "homedepot-ca");
  static readonly BASE_URL = envStr("BASE_URL", "https://www.homedepot.ca");
  static readonly REQUEST_TIMEOUT_MS = envInt(
    "REQUEST_TIMEOUT_MS",
    CI ? 15_000 : 90_000,
  );
  static readonly REQUEST_ATTEMPTS = envInt("REQUEST_ATTEMPTS", CI ? 1 : 4);
  static readonly MIN_DELAY_MS = envInt("MIN_DELAY_MS", 2000);
  static readonly MAX_DELAY_MS = envInt("MAX_DELAY_MS", 5000);

  // Enrichment
  static readonly ENRICH_MAX_STORES = envInt("ENRICH_MAX_STORES", 25);
  static readonly ENRICH_SKIP_TIMEOUTS = envBool("ENRICH_SKIP_TIMEOUTS", false);
  static readonly DRY_RUN = envBool("DRY_RUN", false);
}

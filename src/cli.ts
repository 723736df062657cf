#!/usr/bin/env node
import "dotenv/config";
import { runCli } from "./commands";
import { Logger } from "./core/utils/logger";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((e: unknown) => {
  Logger.error("❌ Unexpected failure", e);
  process.exit(1);
});

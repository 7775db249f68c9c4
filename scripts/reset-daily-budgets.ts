/**
 * 日次の消化額をリセットするスクリプト
 *
 * 実行方法: npm run reset-daily -- [--dry-run]
 */

import "dotenv/config";

import { runResetCommand } from "../src/cli/reset-command";
import { loadEnvConfig } from "../src/config";
import { logger } from "../src/logger";
import { createPlannerFromConfig } from "../src/server";

async function main(): Promise<void> {
  const planner = createPlannerFromConfig(loadEnvConfig());
  await runResetCommand(planner, "daily", process.argv.slice(2));
}

main().catch((error) => {
  logger.error("Daily budget reset failed", {
    error: error instanceof Error ? error : String(error),
  });
  process.exit(1);
});

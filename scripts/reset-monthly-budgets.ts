/**
 * 月次の消化額をリセットするスクリプト
 *
 * 実行方法: npm run reset-monthly -- [--dry-run]
 */

import "dotenv/config";

import { runResetCommand } from "../src/cli/reset-command";
import { loadEnvConfig } from "../src/config";
import { logger } from "../src/logger";
import { createPlannerFromConfig } from "../src/server";

async function main(): Promise<void> {
  const planner = createPlannerFromConfig(loadEnvConfig());
  await runResetCommand(planner, "monthly", process.argv.slice(2));
}

main().catch((error) => {
  logger.error("Monthly budget reset failed", {
    error: error instanceof Error ? error : String(error),
  });
  process.exit(1);
});

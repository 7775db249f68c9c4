/**
 * brands / campaigns / spend_events テーブルを作成するスクリプト
 *
 * 実行方法: npm run create-tables -- [--dry-run]
 */

import "dotenv/config";

import { createTables, getBigQueryClient } from "../src/bigquery";
import { loadEnvConfig } from "../src/config";
import { logger } from "../src/logger";

async function main(): Promise<void> {
  const config = loadEnvConfig();
  const dryRun = process.argv.includes("--dry-run");

  const result = await createTables(
    getBigQueryClient(config.bigqueryProjectId),
    {
      projectId: config.bigqueryProjectId,
      datasetId: config.bigqueryDatasetId,
      location: config.bigqueryLocation,
    },
    { dryRun }
  );

  console.log(`Created: ${result.created.join(", ") || "(none)"}`);
  console.log(`Already existed: ${result.existing.join(", ") || "(none)"}`);
}

main().catch((error) => {
  logger.error("Error creating tables", {
    error: error instanceof Error ? error : String(error),
  });
  process.exit(1);
});

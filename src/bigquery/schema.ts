/**
 * BigQuery テーブル定義と作成
 *
 * 金額は NUMERIC（小数2桁）、dayparting_schedule は JSON 文字列
 */

import { BigQuery } from "@google-cloud/bigquery";
import { TABLES } from "../constants";
import { logger } from "../logger";
import { BigQueryConfig } from "./client";

export interface ColumnDefinition {
  name: string;
  type: "STRING" | "NUMERIC" | "BOOL" | "TIMESTAMP";
  mode: "REQUIRED" | "NULLABLE";
}

export const TABLE_SCHEMAS: Record<string, ColumnDefinition[]> = {
  [TABLES.BRANDS]: [
    { name: "id", type: "STRING", mode: "REQUIRED" },
    { name: "name", type: "STRING", mode: "REQUIRED" },
    { name: "daily_budget", type: "NUMERIC", mode: "REQUIRED" },
    { name: "monthly_budget", type: "NUMERIC", mode: "REQUIRED" },
    { name: "daily_spend", type: "NUMERIC", mode: "REQUIRED" },
    { name: "monthly_spend", type: "NUMERIC", mode: "REQUIRED" },
    { name: "is_active", type: "BOOL", mode: "REQUIRED" },
    { name: "created_at", type: "TIMESTAMP", mode: "REQUIRED" },
    { name: "updated_at", type: "TIMESTAMP", mode: "REQUIRED" },
  ],
  [TABLES.CAMPAIGNS]: [
    { name: "id", type: "STRING", mode: "REQUIRED" },
    { name: "brand_id", type: "STRING", mode: "REQUIRED" },
    { name: "name", type: "STRING", mode: "REQUIRED" },
    { name: "status", type: "STRING", mode: "REQUIRED" },
    { name: "daily_spend", type: "NUMERIC", mode: "REQUIRED" },
    { name: "monthly_spend", type: "NUMERIC", mode: "REQUIRED" },
    { name: "dayparting_enabled", type: "BOOL", mode: "REQUIRED" },
    { name: "dayparting_schedule", type: "STRING", mode: "NULLABLE" },
    { name: "created_at", type: "TIMESTAMP", mode: "REQUIRED" },
    { name: "updated_at", type: "TIMESTAMP", mode: "REQUIRED" },
  ],
  [TABLES.SPEND_EVENTS]: [
    { name: "id", type: "STRING", mode: "REQUIRED" },
    { name: "campaign_id", type: "STRING", mode: "REQUIRED" },
    { name: "amount", type: "NUMERIC", mode: "REQUIRED" },
    { name: "timestamp", type: "TIMESTAMP", mode: "REQUIRED" },
    { name: "description", type: "STRING", mode: "NULLABLE" },
  ],
};

export interface CreateTablesResult {
  created: string[];
  existing: string[];
}

/**
 * データセットとテーブルを作成（既存のものはそのまま）
 */
export async function createTables(
  client: BigQuery,
  config: BigQueryConfig,
  options: { dryRun?: boolean } = {}
): Promise<CreateTablesResult> {
  const dataset = client.dataset(config.datasetId);
  const [datasetExists] = await dataset.exists();

  if (!datasetExists) {
    if (options.dryRun) {
      logger.info("[DRY RUN] Would create dataset", { dataset: config.datasetId });
    } else {
      await client.createDataset(config.datasetId, { location: config.location });
      logger.info("Created dataset", { dataset: config.datasetId });
    }
  }

  const result: CreateTablesResult = { created: [], existing: [] };

  for (const [tableName, schema] of Object.entries(TABLE_SCHEMAS)) {
    const [exists] = datasetExists ? await dataset.table(tableName).exists() : [false];
    if (exists) {
      result.existing.push(tableName);
      continue;
    }

    if (options.dryRun) {
      logger.info("[DRY RUN] Would create table", { table: tableName });
    } else {
      await dataset.createTable(tableName, { schema });
      logger.info("Created table", { table: tableName });
    }
    result.created.push(tableName);
  }

  return result;
}

/**
 * BigQuery 永続化
 */

import { BigQuery } from "@google-cloud/bigquery";
import { Repositories } from "../repositories/interfaces";
import { BigQueryConfig, BigQueryExecutor, getBigQueryClient } from "./client";
import { BigQueryBrandRepository } from "./brand-repository";
import { BigQueryCampaignRepository } from "./campaign-repository";
import { BigQuerySpendEventRepository } from "./spend-event-repository";

export { BigQueryConfig, BigQueryExecutor, BigQueryRow, getBigQueryClient } from "./client";
export { BigQueryBrandRepository } from "./brand-repository";
export { BigQueryCampaignRepository } from "./campaign-repository";
export { BigQuerySpendEventRepository } from "./spend-event-repository";
export { TABLE_SCHEMAS, ColumnDefinition, createTables, CreateTablesResult } from "./schema";

/**
 * BigQuery 実装のリポジトリ一式を作成
 */
export function createBigQueryRepositories(
  config: BigQueryConfig,
  client: BigQuery = getBigQueryClient(config.projectId)
): Repositories {
  const executor = new BigQueryExecutor(client, config);
  return {
    brands: new BigQueryBrandRepository(executor),
    campaigns: new BigQueryCampaignRepository(executor),
    spendEvents: new BigQuerySpendEventRepository(executor),
  };
}

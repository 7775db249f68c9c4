/**
 * BigQuery クライアント
 *
 * ADC（Application Default Credentials）認証で動作する。
 * Cloud Run 上ではサービスアカウントの認証情報を自動取得。
 */

import { BigQuery } from "@google-cloud/bigquery";
import { BigQueryError } from "../errors";
import { logger } from "../logger";

/** クエリ結果の1行（列名 → 値） */
export type BigQueryRow = Record<string, unknown>;

export interface BigQueryConfig {
  projectId?: string;
  datasetId: string;
  location: string;
}

// シングルトンインスタンス
let bigqueryInstance: BigQuery | null = null;

/**
 * BigQuery クライアントを取得
 */
export function getBigQueryClient(projectId?: string): BigQuery {
  if (!bigqueryInstance) {
    bigqueryInstance = new BigQuery({ projectId });
    logger.debug("BigQuery client initialized", { projectId });
  }
  return bigqueryInstance;
}

/**
 * データセットを指定してクエリ・DMLを実行する
 */
export class BigQueryExecutor {
  constructor(
    private readonly client: BigQuery,
    private readonly config: BigQueryConfig
  ) {}

  /**
   * 完全修飾テーブル名（バッククォート付き）
   */
  table(tableName: string): string {
    const path = this.config.projectId
      ? `${this.config.projectId}.${this.config.datasetId}.${tableName}`
      : `${this.config.datasetId}.${tableName}`;
    return `\`${path}\``;
  }

  /**
   * クエリを実行して結果を取得
   */
  async query(query: string, params?: Record<string, unknown>): Promise<BigQueryRow[]> {
    try {
      const [rows] = await this.client.query({
        query,
        params,
        location: this.config.location,
      });
      return rows;
    } catch (error) {
      logger.error("BigQuery query failed", {
        error: error instanceof Error ? error.message : String(error),
        query: query.substring(0, 200),
      });
      throw BigQueryError.fromError(error, "query");
    }
  }

  /**
   * DMLクエリを実行（INSERT/UPDATE/DELETE）し、影響を受けた行数を返す
   */
  async dml(query: string, params?: Record<string, unknown>): Promise<number> {
    try {
      const [job] = await this.client.createQueryJob({
        query,
        params,
        location: this.config.location,
      });

      await job.getQueryResults();

      const [metadata] = await job.getMetadata();
      const numDmlAffectedRows = metadata?.statistics?.query?.numDmlAffectedRows;

      logger.debug("BigQuery DML executed", {
        affectedRows: numDmlAffectedRows,
      });

      return parseInt(numDmlAffectedRows || "0", 10);
    } catch (error) {
      logger.error("BigQuery DML failed", {
        error: error instanceof Error ? error.message : String(error),
        query: query.substring(0, 200),
      });
      throw BigQueryError.fromError(error, "dml");
    }
  }
}

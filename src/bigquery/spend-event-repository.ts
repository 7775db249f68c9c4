/**
 * spend_events テーブルのリポジトリ（追記と集計のみ）
 */

import { TABLES } from "../constants";
import { SpendEvent, TimeRange } from "../models";
import { Money, ZERO, formatMoney } from "../money";
import { SpendEventRepository } from "../repositories/interfaces";
import { BigQueryExecutor, BigQueryRow } from "./client";
import { SPEND_EVENT_COLUMNS, rowToSpendEvent, toMoney } from "./row-mappers";

function firstTotal(rows: BigQueryRow[]): Money {
  return rows.length > 0 ? toMoney(rows[0].total) : ZERO;
}

export class BigQuerySpendEventRepository implements SpendEventRepository {
  constructor(private readonly bq: BigQueryExecutor) {}

  private get spendEvents(): string {
    return this.bq.table(TABLES.SPEND_EVENTS);
  }

  async append(event: SpendEvent): Promise<void> {
    await this.bq.dml(
      `INSERT INTO ${this.spendEvents} (id, campaign_id, amount, timestamp, description)
       VALUES (@id, @campaign_id, CAST(@amount AS NUMERIC), @timestamp, @description)`,
      {
        id: event.id,
        campaign_id: event.campaignId,
        amount: formatMoney(event.amount),
        timestamp: event.timestamp,
        description: event.description,
      }
    );
  }

  async sumForCampaign(campaignId: string, range: TimeRange): Promise<Money> {
    const rows = await this.bq.query(
      `SELECT CAST(COALESCE(SUM(amount), 0) AS STRING) AS total
       FROM ${this.spendEvents}
       WHERE campaign_id = @campaign_id
         AND timestamp >= @from AND timestamp < @to`,
      { campaign_id: campaignId, from: range.from, to: range.to }
    );
    return firstTotal(rows);
  }

  async sumForBrand(brandId: string, range: TimeRange): Promise<Money> {
    const rows = await this.bq.query(
      `SELECT CAST(COALESCE(SUM(e.amount), 0) AS STRING) AS total
       FROM ${this.spendEvents} e
       JOIN ${this.bq.table(TABLES.CAMPAIGNS)} c ON e.campaign_id = c.id
       WHERE c.brand_id = @brand_id
         AND e.timestamp >= @from AND e.timestamp < @to`,
      { brand_id: brandId, from: range.from, to: range.to }
    );
    return firstTotal(rows);
  }

  async listForCampaign(campaignId: string, limit: number): Promise<SpendEvent[]> {
    const rows = await this.bq.query(
      `SELECT ${SPEND_EVENT_COLUMNS} FROM ${this.spendEvents}
       WHERE campaign_id = @campaign_id
       ORDER BY timestamp DESC
       LIMIT @limit`,
      { campaign_id: campaignId, limit }
    );
    return rows.map(rowToSpendEvent);
  }
}

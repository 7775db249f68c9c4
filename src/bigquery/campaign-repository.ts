/**
 * campaigns テーブルのリポジトリ
 *
 * dayparting_schedule は JSON 文字列として STRING 列に保存する
 */

import { v4 as uuidv4 } from "uuid";
import { TABLES } from "../constants";
import { NotFoundError } from "../errors";
import {
  BudgetPeriod,
  Campaign,
  CampaignStatus,
  CampaignUpdate,
  NewCampaign,
  SpendTotals,
} from "../models";
import { ZERO, formatMoney } from "../money";
import { CampaignRepository } from "../repositories/interfaces";
import { BigQueryExecutor } from "./client";
import { CAMPAIGN_COLUMNS, SPEND_COLUMN_BY_PERIOD, rowToCampaign } from "./row-mappers";

export class BigQueryCampaignRepository implements CampaignRepository {
  constructor(private readonly bq: BigQueryExecutor) {}

  private get campaigns(): string {
    return this.bq.table(TABLES.CAMPAIGNS);
  }

  async findById(id: string): Promise<Campaign | null> {
    const rows = await this.bq.query(
      `SELECT ${CAMPAIGN_COLUMNS} FROM ${this.campaigns} WHERE id = @id LIMIT 1`,
      { id }
    );
    return rows.length > 0 ? rowToCampaign(rows[0]) : null;
  }

  async findByBrandAndName(brandId: string, name: string): Promise<Campaign | null> {
    const rows = await this.bq.query(
      `SELECT ${CAMPAIGN_COLUMNS} FROM ${this.campaigns}
       WHERE brand_id = @brand_id AND name = @name LIMIT 1`,
      { brand_id: brandId, name }
    );
    return rows.length > 0 ? rowToCampaign(rows[0]) : null;
  }

  async list(filter: { brandId?: string; status?: CampaignStatus } = {}): Promise<Campaign[]> {
    const conditions: string[] = [];
    const params: Record<string, unknown> = {};

    if (filter.brandId !== undefined) {
      conditions.push("brand_id = @brand_id");
      params.brand_id = filter.brandId;
    }
    if (filter.status !== undefined) {
      conditions.push("status = @status");
      params.status = filter.status;
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const rows = await this.bq.query(
      `SELECT ${CAMPAIGN_COLUMNS} FROM ${this.campaigns} ${where} ORDER BY brand_id, name`,
      params
    );
    return rows.map(rowToCampaign);
  }

  async create(input: NewCampaign, now: Date): Promise<Campaign> {
    const campaign: Campaign = {
      id: uuidv4(),
      brandId: input.brandId,
      name: input.name,
      status: input.status ?? CampaignStatus.ACTIVE,
      dailySpend: ZERO,
      monthlySpend: ZERO,
      daypartingEnabled: input.daypartingEnabled ?? false,
      daypartingSchedule: input.daypartingSchedule ?? {},
      createdAt: now,
      updatedAt: now,
    };

    await this.bq.dml(
      `INSERT INTO ${this.campaigns}
        (id, brand_id, name, status, daily_spend, monthly_spend,
         dayparting_enabled, dayparting_schedule, created_at, updated_at)
       VALUES
        (@id, @brand_id, @name, @status, NUMERIC '0', NUMERIC '0',
         @dayparting_enabled, @dayparting_schedule, @now, @now)`,
      {
        id: campaign.id,
        brand_id: campaign.brandId,
        name: campaign.name,
        status: campaign.status,
        dayparting_enabled: campaign.daypartingEnabled,
        dayparting_schedule: JSON.stringify(campaign.daypartingSchedule),
        now,
      }
    );

    return campaign;
  }

  async update(id: string, patch: CampaignUpdate, now: Date): Promise<Campaign> {
    const assignments: string[] = ["updated_at = @now"];
    const params: Record<string, unknown> = { id, now };

    if (patch.name !== undefined) {
      assignments.push("name = @name");
      params.name = patch.name;
    }
    if (patch.daypartingEnabled !== undefined) {
      assignments.push("dayparting_enabled = @dayparting_enabled");
      params.dayparting_enabled = patch.daypartingEnabled;
    }
    if (patch.daypartingSchedule !== undefined) {
      assignments.push("dayparting_schedule = @dayparting_schedule");
      params.dayparting_schedule = JSON.stringify(patch.daypartingSchedule);
    }

    const affected = await this.bq.dml(
      `UPDATE ${this.campaigns} SET ${assignments.join(", ")} WHERE id = @id`,
      params
    );
    if (affected === 0) {
      throw new NotFoundError("Campaign", id);
    }

    const updated = await this.findById(id);
    if (!updated) {
      throw new NotFoundError("Campaign", id);
    }
    return updated;
  }

  async updateSpendTotals(id: string, totals: SpendTotals, now: Date): Promise<void> {
    await this.bq.dml(
      `UPDATE ${this.campaigns}
       SET daily_spend = CAST(@daily_spend AS NUMERIC),
           monthly_spend = CAST(@monthly_spend AS NUMERIC),
           updated_at = @now
       WHERE id = @id`,
      {
        id,
        daily_spend: formatMoney(totals.dailySpend),
        monthly_spend: formatMoney(totals.monthlySpend),
        now,
      }
    );
  }

  async updateStatus(id: string, status: CampaignStatus, now: Date): Promise<void> {
    await this.bq.dml(
      `UPDATE ${this.campaigns} SET status = @status, updated_at = @now WHERE id = @id`,
      { id, status, now }
    );
  }

  async resetSpend(period: BudgetPeriod, now: Date): Promise<number> {
    return this.bq.dml(
      `UPDATE ${this.campaigns} SET ${SPEND_COLUMN_BY_PERIOD[period]} = NUMERIC '0', updated_at = @now WHERE TRUE`,
      { now }
    );
  }

  async delete(id: string): Promise<void> {
    await this.bq.dml(
      `DELETE FROM ${this.bq.table(TABLES.SPEND_EVENTS)} WHERE campaign_id = @id`,
      { id }
    );
    await this.bq.dml(`DELETE FROM ${this.campaigns} WHERE id = @id`, { id });
  }

  async count(): Promise<number> {
    const rows = await this.bq.query(`SELECT COUNT(*) AS count FROM ${this.campaigns}`);
    return rows.length > 0 ? Number(rows[0].count) : 0;
  }
}

/**
 * brands テーブルのリポジトリ
 */

import { v4 as uuidv4 } from "uuid";
import { TABLES } from "../constants";
import { NotFoundError } from "../errors";
import { Brand, BrandUpdate, BudgetPeriod, NewBrand, SpendTotals } from "../models";
import { ZERO, formatMoney } from "../money";
import { BrandRepository } from "../repositories/interfaces";
import { BigQueryExecutor } from "./client";
import { BRAND_COLUMNS, SPEND_COLUMN_BY_PERIOD, rowToBrand } from "./row-mappers";

export class BigQueryBrandRepository implements BrandRepository {
  constructor(private readonly bq: BigQueryExecutor) {}

  private get brands(): string {
    return this.bq.table(TABLES.BRANDS);
  }

  async findById(id: string): Promise<Brand | null> {
    const rows = await this.bq.query(
      `SELECT ${BRAND_COLUMNS} FROM ${this.brands} WHERE id = @id LIMIT 1`,
      { id }
    );
    return rows.length > 0 ? rowToBrand(rows[0]) : null;
  }

  async findByName(name: string): Promise<Brand | null> {
    const rows = await this.bq.query(
      `SELECT ${BRAND_COLUMNS} FROM ${this.brands} WHERE name = @name LIMIT 1`,
      { name }
    );
    return rows.length > 0 ? rowToBrand(rows[0]) : null;
  }

  async list(filter: { activeOnly?: boolean } = {}): Promise<Brand[]> {
    const where = filter.activeOnly ? "WHERE is_active = TRUE" : "";
    const rows = await this.bq.query(
      `SELECT ${BRAND_COLUMNS} FROM ${this.brands} ${where} ORDER BY name`
    );
    return rows.map(rowToBrand);
  }

  async create(input: NewBrand, now: Date): Promise<Brand> {
    const brand: Brand = {
      id: uuidv4(),
      name: input.name,
      dailyBudget: input.dailyBudget,
      monthlyBudget: input.monthlyBudget,
      dailySpend: ZERO,
      monthlySpend: ZERO,
      isActive: input.isActive ?? true,
      createdAt: now,
      updatedAt: now,
    };

    await this.bq.dml(
      `INSERT INTO ${this.brands}
        (id, name, daily_budget, monthly_budget, daily_spend, monthly_spend, is_active, created_at, updated_at)
       VALUES
        (@id, @name, CAST(@daily_budget AS NUMERIC), CAST(@monthly_budget AS NUMERIC),
         NUMERIC '0', NUMERIC '0', @is_active, @now, @now)`,
      {
        id: brand.id,
        name: brand.name,
        daily_budget: formatMoney(brand.dailyBudget),
        monthly_budget: formatMoney(brand.monthlyBudget),
        is_active: brand.isActive,
        now,
      }
    );

    return brand;
  }

  async update(id: string, patch: BrandUpdate, now: Date): Promise<Brand> {
    const assignments: string[] = ["updated_at = @now"];
    const params: Record<string, unknown> = { id, now };

    if (patch.name !== undefined) {
      assignments.push("name = @name");
      params.name = patch.name;
    }
    if (patch.dailyBudget !== undefined) {
      assignments.push("daily_budget = CAST(@daily_budget AS NUMERIC)");
      params.daily_budget = formatMoney(patch.dailyBudget);
    }
    if (patch.monthlyBudget !== undefined) {
      assignments.push("monthly_budget = CAST(@monthly_budget AS NUMERIC)");
      params.monthly_budget = formatMoney(patch.monthlyBudget);
    }
    if (patch.isActive !== undefined) {
      assignments.push("is_active = @is_active");
      params.is_active = patch.isActive;
    }

    const affected = await this.bq.dml(
      `UPDATE ${this.brands} SET ${assignments.join(", ")} WHERE id = @id`,
      params
    );
    if (affected === 0) {
      throw new NotFoundError("Brand", id);
    }

    const updated = await this.findById(id);
    if (!updated) {
      throw new NotFoundError("Brand", id);
    }
    return updated;
  }

  async updateSpendTotals(id: string, totals: SpendTotals, now: Date): Promise<void> {
    await this.bq.dml(
      `UPDATE ${this.brands}
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

  async resetSpend(period: BudgetPeriod, now: Date): Promise<number> {
    return this.bq.dml(
      `UPDATE ${this.brands} SET ${SPEND_COLUMN_BY_PERIOD[period]} = NUMERIC '0', updated_at = @now WHERE TRUE`,
      { now }
    );
  }

  async delete(id: string): Promise<void> {
    const campaigns = this.bq.table(TABLES.CAMPAIGNS);
    const spendEvents = this.bq.table(TABLES.SPEND_EVENTS);

    await this.bq.dml(
      `DELETE FROM ${spendEvents}
       WHERE campaign_id IN (SELECT id FROM ${campaigns} WHERE brand_id = @id)`,
      { id }
    );
    await this.bq.dml(`DELETE FROM ${campaigns} WHERE brand_id = @id`, { id });
    await this.bq.dml(`DELETE FROM ${this.brands} WHERE id = @id`, { id });
  }

  async count(): Promise<number> {
    const rows = await this.bq.query(`SELECT COUNT(*) AS count FROM ${this.brands}`);
    return rows.length > 0 ? Number(rows[0].count) : 0;
  }
}

/**
 * BigQuery 行 ⇔ モデルの変換
 *
 * NUMERIC 列は SELECT 側で CAST(... AS STRING) した値を受け取り、
 * 浮動小数点を経由せずに Money に変換する
 */

import { normalizeDaypartingSchedule, DaypartingSchedule } from "../dayparting";
import { Brand, BudgetPeriod, Campaign, CampaignStatus, SpendEvent, isCampaignStatus } from "../models";
import { Money, ZERO, tryParseMoney } from "../money";
import { logger } from "../logger";
import { BigQueryRow } from "./client";

// =============================================================================
// 列の値の変換
// =============================================================================

export function toStringValue(value: unknown): string {
  return value === null || value === undefined ? "" : String(value);
}

export function toMoney(value: unknown): Money {
  return tryParseMoney(value) ?? ZERO;
}

/**
 * TIMESTAMP 列を Date に変換
 * クライアントは BigQueryTimestamp（{ value: string }）で返す
 */
export function toDate(value: unknown): Date {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === "object" && value !== null && "value" in value && typeof value.value === "string") {
    return new Date(value.value);
  }
  if (typeof value === "string" || typeof value === "number") {
    return new Date(value);
  }
  return new Date(0);
}

function toStatus(value: unknown): CampaignStatus {
  return isCampaignStatus(value) ? value : CampaignStatus.INACTIVE;
}

/**
 * dayparting_schedule 列（JSON文字列）をパース
 * パースできない値は「ウィンドウなし」として扱う
 */
export function parseScheduleColumn(value: unknown, campaignId: string): DaypartingSchedule {
  if (value === null || value === undefined || value === "") {
    return {};
  }
  try {
    return normalizeDaypartingSchedule(JSON.parse(String(value)));
  } catch (error) {
    logger.warn("Malformed dayparting_schedule, treating as empty", {
      campaignId,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }
}

// =============================================================================
// 行 → モデル
// =============================================================================

export function rowToBrand(row: BigQueryRow): Brand {
  return {
    id: toStringValue(row.id),
    name: toStringValue(row.name),
    dailyBudget: toMoney(row.daily_budget),
    monthlyBudget: toMoney(row.monthly_budget),
    dailySpend: toMoney(row.daily_spend),
    monthlySpend: toMoney(row.monthly_spend),
    isActive: row.is_active === true,
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

export function rowToCampaign(row: BigQueryRow): Campaign {
  const id = toStringValue(row.id);
  return {
    id,
    brandId: toStringValue(row.brand_id),
    name: toStringValue(row.name),
    status: toStatus(row.status),
    dailySpend: toMoney(row.daily_spend),
    monthlySpend: toMoney(row.monthly_spend),
    daypartingEnabled: row.dayparting_enabled === true,
    daypartingSchedule: parseScheduleColumn(row.dayparting_schedule, id),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}

export function rowToSpendEvent(row: BigQueryRow): SpendEvent {
  return {
    id: toStringValue(row.id),
    campaignId: toStringValue(row.campaign_id),
    amount: toMoney(row.amount),
    timestamp: toDate(row.timestamp),
    description: toStringValue(row.description),
  };
}

// =============================================================================
// SELECT 列リスト
// =============================================================================

export const BRAND_COLUMNS = `
  id,
  name,
  CAST(daily_budget AS STRING) AS daily_budget,
  CAST(monthly_budget AS STRING) AS monthly_budget,
  CAST(daily_spend AS STRING) AS daily_spend,
  CAST(monthly_spend AS STRING) AS monthly_spend,
  is_active,
  created_at,
  updated_at`;

export const CAMPAIGN_COLUMNS = `
  id,
  brand_id,
  name,
  status,
  CAST(daily_spend AS STRING) AS daily_spend,
  CAST(monthly_spend AS STRING) AS monthly_spend,
  dayparting_enabled,
  dayparting_schedule,
  created_at,
  updated_at`;

export const SPEND_EVENT_COLUMNS = `
  id,
  campaign_id,
  CAST(amount AS STRING) AS amount,
  timestamp,
  description`;

export const SPEND_COLUMN_BY_PERIOD: Record<BudgetPeriod, string> = {
  daily: "daily_spend",
  monthly: "monthly_spend",
};

/**
 * ブランド・キャンペーン・消化イベントのモデル定義
 *
 * Brand 1:N Campaign 1:N SpendEvent
 * dailySpend / monthlySpend は SpendEvent から再計算されるキャッシュであり、
 * 独立した正本ではない
 */

import { Money } from "../money";
import { DaypartingSchedule } from "../dayparting/types";

// =============================================================================
// キャンペーンステータス
// =============================================================================

/**
 * キャンペーンステータス
 *
 * PAUSED はオペレーターが手動で設定する値で、自動評価は設定も解除もしない
 */
export const CampaignStatus = {
  ACTIVE: "active",
  PAUSED: "paused",
  BUDGET_EXCEEDED: "budget_exceeded",
  DAYPARTING_PAUSED: "dayparting_paused",
  INACTIVE: "inactive",
} as const;

export type CampaignStatus = (typeof CampaignStatus)[keyof typeof CampaignStatus];

export const VALID_CAMPAIGN_STATUSES: readonly CampaignStatus[] = Object.values(CampaignStatus);

export function isCampaignStatus(value: unknown): value is CampaignStatus {
  return typeof value === "string" && VALID_CAMPAIGN_STATUSES.includes(value as CampaignStatus);
}

/**
 * オペレーターが手動で設定できるステータス
 */
export const MANUAL_CAMPAIGN_STATUSES = [
  CampaignStatus.ACTIVE,
  CampaignStatus.PAUSED,
  CampaignStatus.INACTIVE,
] as const;

export type ManualCampaignStatus = (typeof MANUAL_CAMPAIGN_STATUSES)[number];

// =============================================================================
// エンティティ
// =============================================================================

export interface Brand {
  id: string;
  name: string;
  dailyBudget: Money;
  monthlyBudget: Money;
  dailySpend: Money;
  monthlySpend: Money;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Campaign {
  id: string;
  brandId: string;
  name: string;
  status: CampaignStatus;
  dailySpend: Money;
  monthlySpend: Money;
  daypartingEnabled: boolean;
  daypartingSchedule: DaypartingSchedule;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * 広告費の消化イベント（追記のみ、更新・削除しない）
 */
export interface SpendEvent {
  id: string;
  campaignId: string;
  amount: Money;
  timestamp: Date;
  description: string;
}

// =============================================================================
// 入力型
// =============================================================================

export interface NewBrand {
  name: string;
  dailyBudget: Money;
  monthlyBudget: Money;
  isActive?: boolean;
}

export interface BrandUpdate {
  name?: string;
  dailyBudget?: Money;
  monthlyBudget?: Money;
  isActive?: boolean;
}

export interface NewCampaign {
  brandId: string;
  name: string;
  status?: CampaignStatus;
  daypartingEnabled?: boolean;
  daypartingSchedule?: DaypartingSchedule;
}

export interface CampaignUpdate {
  name?: string;
  daypartingEnabled?: boolean;
  daypartingSchedule?: DaypartingSchedule;
}

// =============================================================================
// 集計
// =============================================================================

/**
 * 予算期間
 */
export type BudgetPeriod = "daily" | "monthly";

/**
 * 日次・月次の消化合計
 */
export interface SpendTotals {
  dailySpend: Money;
  monthlySpend: Money;
}

/**
 * 集計対象の時間範囲 [from, to)
 */
export interface TimeRange {
  from: Date;
  to: Date;
}

/**
 * キャンペーンステータス遷移
 *
 * 判定順（先に該当したものが優先）:
 * 1. ブランド停止中            → INACTIVE
 * 2. 日予算 or 月予算の超過     → BUDGET_EXCEEDED
 * 3. 配信ウィンドウ外           → DAYPARTING_PAUSED
 * 4. 停止理由が解消された       → ACTIVE
 * 5. それ以外                  → 現状維持（手動の PAUSED はここで残る）
 */

import { PlannerContext } from "../context";
import { isWithinDaypartingWindow } from "../dayparting";
import { Brand, Campaign, CampaignStatus } from "../models";
import { NotFoundError } from "../errors";
import {
  isAnyBudgetExceeded,
  isDailyBudgetExceeded,
  isMonthlyBudgetExceeded,
} from "../budget/budget-ledger";

// =============================================================================
// 純粋関数
// =============================================================================

/**
 * ステータス判定の入力
 */
export interface StatusInput {
  brandActive: boolean;
  dailyBudgetExceeded: boolean;
  monthlyBudgetExceeded: boolean;
  daypartingEnabled: boolean;
  withinDaypartingWindow: boolean;
  currentStatus: CampaignStatus;
}

/**
 * 自動評価で解除される停止ステータス
 */
const AUTO_PAUSED_STATUSES: readonly CampaignStatus[] = [
  CampaignStatus.BUDGET_EXCEEDED,
  CampaignStatus.DAYPARTING_PAUSED,
];

export function decideNextStatus(input: StatusInput): CampaignStatus {
  if (!input.brandActive) {
    return CampaignStatus.INACTIVE;
  }
  if (input.dailyBudgetExceeded || input.monthlyBudgetExceeded) {
    return CampaignStatus.BUDGET_EXCEEDED;
  }
  if (input.daypartingEnabled && !input.withinDaypartingWindow) {
    return CampaignStatus.DAYPARTING_PAUSED;
  }
  if (AUTO_PAUSED_STATUSES.includes(input.currentStatus)) {
    return CampaignStatus.ACTIVE;
  }
  return input.currentStatus;
}

/**
 * 現在の状態からステータス判定の入力を組み立てる
 */
export function buildStatusInput(
  campaign: Campaign,
  brand: Brand,
  now: Date,
  timeZone: string
): StatusInput {
  return {
    brandActive: brand.isActive,
    dailyBudgetExceeded: isDailyBudgetExceeded(brand),
    monthlyBudgetExceeded: isMonthlyBudgetExceeded(brand),
    daypartingEnabled: campaign.daypartingEnabled,
    withinDaypartingWindow: isWithinDaypartingWindow(campaign, now, timeZone),
    currentStatus: campaign.status,
  };
}

/**
 * 配信可能か（書き込みなしのプレビュー用）
 *
 * PAUSED / INACTIVE のキャンペーンは条件を満たしていても false。
 * 遷移ロジックとは独立しており、true でも評価後に ACTIVE になるとは限らない。
 */
export function shouldBeActive(
  campaign: Campaign,
  brand: Brand,
  now: Date,
  timeZone: string
): boolean {
  if (!brand.isActive) {
    return false;
  }
  if (isAnyBudgetExceeded(brand)) {
    return false;
  }
  if (campaign.daypartingEnabled && !isWithinDaypartingWindow(campaign, now, timeZone)) {
    return false;
  }
  return (
    campaign.status !== CampaignStatus.INACTIVE &&
    campaign.status !== CampaignStatus.PAUSED
  );
}

// =============================================================================
// 適用
// =============================================================================

export interface StatusEvaluation {
  campaign: Campaign;
  previousStatus: CampaignStatus;
  changed: boolean;
}

export class CampaignStatusMachine {
  constructor(private readonly context: PlannerContext) {}

  /**
   * キャンペーンのステータスを評価して保存
   *
   * 値が変わらなくても status / updatedAt を書き込む
   * @param brand - 呼び出し側で取得済みならそれを使う（スイープ用）
   */
  async evaluate(campaign: Campaign, brand?: Brand): Promise<StatusEvaluation> {
    const owner = brand ?? (await this.loadBrand(campaign));
    const now = this.context.clock();

    const nextStatus = decideNextStatus(
      buildStatusInput(campaign, owner, now, this.context.timeZone)
    );

    await this.context.repositories.campaigns.updateStatus(campaign.id, nextStatus, now);

    const changed = nextStatus !== campaign.status;
    if (changed) {
      this.context.logger.info("Campaign status changed", {
        campaignId: campaign.id,
        brandId: owner.id,
        from: campaign.status,
        to: nextStatus,
      });
    }

    return {
      campaign: { ...campaign, status: nextStatus, updatedAt: now },
      previousStatus: campaign.status,
      changed,
    };
  }

  private async loadBrand(campaign: Campaign): Promise<Brand> {
    const brand = await this.context.repositories.brands.findById(campaign.brandId);
    if (!brand) {
      throw new NotFoundError("Brand", campaign.brandId);
    }
    return brand;
  }
}

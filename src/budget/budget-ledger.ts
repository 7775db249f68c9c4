/**
 * 予算台帳
 *
 * ブランド・キャンペーンの dailySpend / monthlySpend を消化イベントの合計から
 * 再計算する（書き込み時の再計算によるキャッシュ更新）。
 * 残予算・超過判定は保存値から都度導出する。
 */

import { PlannerContext } from "../context";
import { Brand, BudgetPeriod, Campaign, SpendTotals } from "../models";
import { Money, ZERO, maxMoney } from "../money";
import { getBudgetPeriodRanges } from "../utils/time-zone";

// =============================================================================
// 残予算・超過判定（純粋関数）
// =============================================================================

type BrandBudget = Pick<Brand, "dailyBudget" | "monthlyBudget" | "dailySpend" | "monthlySpend">;

/**
 * 日予算の残り（負にならない）
 */
export function dailyBudgetRemaining(brand: BrandBudget): Money {
  return maxMoney(ZERO, brand.dailyBudget - brand.dailySpend);
}

/**
 * 月予算の残り（負にならない）
 */
export function monthlyBudgetRemaining(brand: BrandBudget): Money {
  return maxMoney(ZERO, brand.monthlyBudget - brand.monthlySpend);
}

/**
 * 日予算超過
 * spend >= budget のため、予算 0 のブランドは消化 0 でも超過扱い
 */
export function isDailyBudgetExceeded(brand: BrandBudget): boolean {
  return brand.dailySpend >= brand.dailyBudget;
}

/**
 * 月予算超過（判定規則は日予算と同じ）
 */
export function isMonthlyBudgetExceeded(brand: BrandBudget): boolean {
  return brand.monthlySpend >= brand.monthlyBudget;
}

export function isAnyBudgetExceeded(brand: BrandBudget): boolean {
  return isDailyBudgetExceeded(brand) || isMonthlyBudgetExceeded(brand);
}

export function getSpend(entity: SpendTotals, period: BudgetPeriod): Money {
  return period === "daily" ? entity.dailySpend : entity.monthlySpend;
}

export function getBudget(brand: BrandBudget, period: BudgetPeriod): Money {
  return period === "daily" ? brand.dailyBudget : brand.monthlyBudget;
}

/**
 * 指定期間の消化額を 0 にしたブランド（ドライランの見込み計算用、保存しない）
 */
export function withSpendReset<T extends SpendTotals>(entity: T, period: BudgetPeriod): T {
  return period === "daily"
    ? { ...entity, dailySpend: ZERO }
    : { ...entity, monthlySpend: ZERO };
}

// =============================================================================
// 再計算
// =============================================================================

export class BudgetLedger {
  constructor(private readonly context: PlannerContext) {}

  /**
   * キャンペーンの日次・月次消化を消化イベントから再計算して保存
   */
  async recomputeCampaign(campaign: Campaign): Promise<Campaign> {
    const now = this.context.clock();
    const ranges = getBudgetPeriodRanges(now, this.context.timeZone);
    const { spendEvents, campaigns } = this.context.repositories;

    const totals: SpendTotals = {
      dailySpend: await spendEvents.sumForCampaign(campaign.id, ranges.daily),
      monthlySpend: await spendEvents.sumForCampaign(campaign.id, ranges.monthly),
    };

    await campaigns.updateSpendTotals(campaign.id, totals, now);

    this.context.logger.debug("Campaign spend totals recomputed", {
      campaignId: campaign.id,
      dailySpend: totals.dailySpend,
      monthlySpend: totals.monthlySpend,
    });

    return { ...campaign, ...totals, updatedAt: now };
  }

  /**
   * ブランド配下の全キャンペーンの消化イベントから再計算して保存
   * キャンペーンのキャッシュ値は使わない
   */
  async recomputeBrand(brand: Brand): Promise<Brand> {
    const now = this.context.clock();
    const ranges = getBudgetPeriodRanges(now, this.context.timeZone);
    const { spendEvents, brands } = this.context.repositories;

    const totals: SpendTotals = {
      dailySpend: await spendEvents.sumForBrand(brand.id, ranges.daily),
      monthlySpend: await spendEvents.sumForBrand(brand.id, ranges.monthly),
    };

    await brands.updateSpendTotals(brand.id, totals, now);

    this.context.logger.debug("Brand spend totals recomputed", {
      brandId: brand.id,
      dailySpend: totals.dailySpend,
      monthlySpend: totals.monthlySpend,
    });

    return { ...brand, ...totals, updatedAt: now };
  }
}

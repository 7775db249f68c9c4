/**
 * 予算レポート
 */

import { PlannerContext } from "../context";
import { isDailyBudgetExceeded, isMonthlyBudgetExceeded } from "../budget/budget-ledger";
import { Campaign, CampaignStatus } from "../models";
import { formatMoney, sumMoney } from "../money";

/**
 * 全ブランドの予算状況サマリー（金額は "123.45" 形式）
 */
export interface BudgetStatusSummary {
  totalBrands: number;
  activeBrands: number;
  dailyExceededBrands: number;
  monthlyExceededBrands: number;
  totalDailySpend: string;
  totalMonthlySpend: string;
  totalDailyBudget: string;
  totalMonthlyBudget: string;
}

export async function getBudgetStatusSummary(context: PlannerContext): Promise<BudgetStatusSummary> {
  const brands = await context.repositories.brands.list();

  return {
    totalBrands: brands.length,
    activeBrands: brands.filter((brand) => brand.isActive).length,
    dailyExceededBrands: brands.filter(isDailyBudgetExceeded).length,
    monthlyExceededBrands: brands.filter(isMonthlyBudgetExceeded).length,
    totalDailySpend: formatMoney(sumMoney(brands.map((brand) => brand.dailySpend))),
    totalMonthlySpend: formatMoney(sumMoney(brands.map((brand) => brand.monthlySpend))),
    totalDailyBudget: formatMoney(sumMoney(brands.map((brand) => brand.dailyBudget))),
    totalMonthlyBudget: formatMoney(sumMoney(brands.map((brand) => brand.monthlyBudget))),
  };
}

/**
 * 配信中のキャンペーン（ACTIVE かつブランドが有効）
 */
export async function getActiveCampaigns(context: PlannerContext): Promise<Campaign[]> {
  const { brands, campaigns } = context.repositories;
  const activeBrandIds = new Set(
    (await brands.list({ activeOnly: true })).map((brand) => brand.id)
  );
  const active = await campaigns.list({ status: CampaignStatus.ACTIVE });
  return active.filter((campaign) => activeBrandIds.has(campaign.brandId));
}

/**
 * API レスポンス用の変換（金額は "123.45" 形式の文字列）
 */

import {
  dailyBudgetRemaining,
  isDailyBudgetExceeded,
  isMonthlyBudgetExceeded,
  monthlyBudgetRemaining,
} from "../budget/budget-ledger";
import { DaypartingSchedule } from "../dayparting";
import { Brand, Campaign, CampaignStatus, SpendEvent } from "../models";
import { formatMoney } from "../money";

export interface BrandView {
  id: string;
  name: string;
  dailyBudget: string;
  monthlyBudget: string;
  dailySpend: string;
  monthlySpend: string;
  dailyBudgetRemaining: string;
  monthlyBudgetRemaining: string;
  dailyBudgetExceeded: boolean;
  monthlyBudgetExceeded: boolean;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface CampaignView {
  id: string;
  brandId: string;
  name: string;
  status: CampaignStatus;
  dailySpend: string;
  monthlySpend: string;
  daypartingEnabled: boolean;
  daypartingSchedule: DaypartingSchedule;
  createdAt: string;
  updatedAt: string;
}

export interface SpendEventView {
  id: string;
  campaignId: string;
  amount: string;
  timestamp: string;
  description: string;
}

export function toBrandView(brand: Brand): BrandView {
  return {
    id: brand.id,
    name: brand.name,
    dailyBudget: formatMoney(brand.dailyBudget),
    monthlyBudget: formatMoney(brand.monthlyBudget),
    dailySpend: formatMoney(brand.dailySpend),
    monthlySpend: formatMoney(brand.monthlySpend),
    dailyBudgetRemaining: formatMoney(dailyBudgetRemaining(brand)),
    monthlyBudgetRemaining: formatMoney(monthlyBudgetRemaining(brand)),
    dailyBudgetExceeded: isDailyBudgetExceeded(brand),
    monthlyBudgetExceeded: isMonthlyBudgetExceeded(brand),
    isActive: brand.isActive,
    createdAt: brand.createdAt.toISOString(),
    updatedAt: brand.updatedAt.toISOString(),
  };
}

export function toCampaignView(campaign: Campaign): CampaignView {
  return {
    id: campaign.id,
    brandId: campaign.brandId,
    name: campaign.name,
    status: campaign.status,
    dailySpend: formatMoney(campaign.dailySpend),
    monthlySpend: formatMoney(campaign.monthlySpend),
    daypartingEnabled: campaign.daypartingEnabled,
    daypartingSchedule: campaign.daypartingSchedule,
    createdAt: campaign.createdAt.toISOString(),
    updatedAt: campaign.updatedAt.toISOString(),
  };
}

export function toSpendEventView(event: SpendEvent): SpendEventView {
  return {
    id: event.id,
    campaignId: event.campaignId,
    amount: formatMoney(event.amount),
    timestamp: event.timestamp.toISOString(),
    description: event.description,
  };
}

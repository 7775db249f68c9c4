/**
 * 定期ジョブ - 型定義
 */

import { PlannerContext } from "../context";
import { BudgetLedger } from "../budget/budget-ledger";
import { CampaignStatusMachine } from "../status/campaign-status-machine";
import { BudgetPeriod } from "../models";

/**
 * ジョブが使うサービス群
 */
export interface JobDependencies {
  context: PlannerContext;
  ledger: BudgetLedger;
  statusMachine: CampaignStatusMachine;
}

/**
 * ステータススイープで変化したキャンペーン数（変化後のステータス別）
 * PAUSED へは自動遷移しないため集計対象にない
 */
export interface StatusChangeTally {
  activated: number;
  budgetPaused: number;
  daypartingPaused: number;
  deactivated: number;
}

export interface TotalsSweepResult {
  campaignsRecomputed: number;
  brandsRecomputed: number;
}

/**
 * 日次・月次リセットのレポート
 *
 * ドライランでは brandsReset / campaignsReset は「リセット予定」の件数、
 * reactivated は「再開予定」の件数
 */
export interface BudgetResetReport {
  period: BudgetPeriod;
  dryRun: boolean;
  brandsReset: number;
  campaignsReset: number;
  reactivated: number;
  /** ドライランでは null */
  statusChanges: StatusChangeTally | null;
}

/**
 * 予算アラート種別
 */
export type BudgetAlertKind = "daily_budget_warning" | "monthly_budget_warning";

export interface BudgetAlert {
  kind: BudgetAlertKind;
  brandId: string;
  brand: string;
  /** 消化率（%）。予算 0 の場合は 0 */
  percentUsed: number;
  /** "123.45" 形式 */
  spend: string;
  budget: string;
}

/**
 * アラート通知先
 */
export interface BudgetAlertNotifier {
  notifyBudgetAlerts(alerts: BudgetAlert[]): Promise<boolean>;
}

export function emptyTally(): StatusChangeTally {
  return { activated: 0, budgetPaused: 0, daypartingPaused: 0, deactivated: 0 };
}

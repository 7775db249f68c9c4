/**
 * 予算アラートスキャン
 *
 * 有効なブランドのうち、日予算・月予算の消化が閾値（デフォルト 90%）以上のものを検出する。
 * アラートは返却とログ出力のみで、保存はしない。
 */

import { BUDGET } from "../constants";
import { getBudget, getSpend } from "../budget/budget-ledger";
import { Brand, BudgetPeriod } from "../models";
import { formatMoney, isAtLeastPercentOf, percentUsed } from "../money";
import { BudgetAlert, BudgetAlertKind, BudgetAlertNotifier, JobDependencies } from "./types";

const ALERT_KIND_BY_PERIOD: Record<BudgetPeriod, BudgetAlertKind> = {
  daily: "daily_budget_warning",
  monthly: "monthly_budget_warning",
};

export interface BudgetAlertScanOptions {
  thresholdPercent?: number;
  /** 指定時、アラートがあれば通知する（失敗してもスキャンは失敗させない） */
  notifier?: BudgetAlertNotifier;
}

function toAlert(brand: Brand, period: BudgetPeriod): BudgetAlert {
  const spend = getSpend(brand, period);
  const budget = getBudget(brand, period);
  return {
    kind: ALERT_KIND_BY_PERIOD[period],
    brandId: brand.id,
    brand: brand.name,
    percentUsed: percentUsed(spend, budget),
    spend: formatMoney(spend),
    budget: formatMoney(budget),
  };
}

/**
 * ブランド一覧からアラートを算出（日次アラートをすべて出してから月次）
 *
 * 予算 0 のブランドは消化 0 でも閾値以上となり、percentUsed 0 のアラートになる
 */
export function evaluateBudgetAlerts(
  brands: readonly Brand[],
  thresholdPercent: number = BUDGET.DEFAULT_ALERT_THRESHOLD_PERCENT
): BudgetAlert[] {
  const alerts: BudgetAlert[] = [];
  const periods: BudgetPeriod[] = ["daily", "monthly"];

  for (const period of periods) {
    for (const brand of brands) {
      if (!brand.isActive) {
        continue;
      }
      if (isAtLeastPercentOf(getSpend(brand, period), getBudget(brand, period), thresholdPercent)) {
        alerts.push(toAlert(brand, period));
      }
    }
  }

  return alerts;
}

export async function scanBudgetAlerts(
  deps: JobDependencies,
  options: BudgetAlertScanOptions = {}
): Promise<BudgetAlert[]> {
  const log = deps.context.logger.child({ job: "budget-alerts" });
  const thresholdPercent = options.thresholdPercent ?? BUDGET.DEFAULT_ALERT_THRESHOLD_PERCENT;

  const brands = await deps.context.repositories.brands.list({ activeOnly: true });
  const alerts = evaluateBudgetAlerts(brands, thresholdPercent);

  for (const alert of alerts) {
    log.warn("Budget alert", { ...alert, thresholdPercent });
  }

  if (alerts.length > 0 && options.notifier) {
    const notified = await options.notifier.notifyBudgetAlerts(alerts);
    if (!notified) {
      log.warn("Budget alert notification was not delivered", { alertCount: alerts.length });
    }
  }

  log.info("Budget alert scan completed", {
    brandsScanned: brands.length,
    alertCount: alerts.length,
  });

  return alerts;
}

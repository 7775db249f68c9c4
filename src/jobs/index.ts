/**
 * 定期ジョブ
 */

export * from "./types";
export { runStatusSweep, sweepCampaignStatuses, tallyStatusChange } from "./status-sweep";
export { runTotalsSweep } from "./totals-sweep";
export { runBudgetReset, runDailyReset, runMonthlyReset } from "./budget-reset";
export { evaluateBudgetAlerts, scanBudgetAlerts } from "./budget-alerts";
export type { BudgetAlertScanOptions } from "./budget-alerts";

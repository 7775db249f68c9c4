/**
 * 予算リセットの CLI 共通処理
 *
 * 使い方: reset-<period>-budgets [--dry-run]
 */

import { BudgetPlanner } from "../budget-planner";
import { BudgetResetReport } from "../jobs";
import { BudgetPeriod } from "../models";

export interface ResetCommandOptions {
  dryRun: boolean;
}

export function parseResetArgs(argv: readonly string[]): ResetCommandOptions {
  return { dryRun: argv.includes("--dry-run") };
}

/**
 * レポートを人が読める形式にする
 */
export function formatResetReport(report: BudgetResetReport): string[] {
  if (report.dryRun) {
    return [
      `DRY RUN - No changes will be made`,
      `Would reset ${report.period} spend for ${report.brandsReset} brands`,
      `Would reset ${report.period} spend for ${report.campaignsReset} campaigns`,
      `Would reactivate ${report.reactivated} campaigns`,
    ];
  }

  const lines = [
    `Reset ${report.period} spend for ${report.brandsReset} brands`,
    `Reset ${report.period} spend for ${report.campaignsReset} campaigns`,
    `Reactivated ${report.reactivated} campaigns`,
  ];
  if (report.statusChanges) {
    const { activated, budgetPaused, daypartingPaused, deactivated } = report.statusChanges;
    lines.push(
      `Status changes: activated=${activated} budget_paused=${budgetPaused} ` +
        `dayparting_paused=${daypartingPaused} deactivated=${deactivated}`
    );
  }
  return lines;
}

export async function runResetCommand(
  planner: BudgetPlanner,
  period: BudgetPeriod,
  argv: readonly string[],
  write: (line: string) => void = (line) => console.log(line)
): Promise<BudgetResetReport> {
  const { dryRun } = parseResetArgs(argv);
  const report =
    period === "daily"
      ? await planner.runDailyReset(dryRun)
      : await planner.runMonthlyReset(dryRun);

  formatResetReport(report).forEach((line) => write(line));
  return report;
}

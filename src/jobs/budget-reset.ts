/**
 * 日次・月次の予算リセットジョブ
 *
 * キャッシュ（dailySpend / monthlySpend）を 0 にするだけで、消化イベントは消さない。
 * リセット後にステータススイープを実行し、予算超過で止まっていたキャンペーンを再開させる。
 *
 * ドライランでは何も書き込まず、リセット後のブランド状態を仮定して
 * shouldBeActive で再開予定件数を数える。
 */

import { withSpendReset } from "../budget/budget-ledger";
import { Brand, BudgetPeriod, CampaignStatus } from "../models";
import { shouldBeActive } from "../status/campaign-status-machine";
import { sweepCampaignStatuses } from "./status-sweep";
import { BudgetResetReport, JobDependencies } from "./types";

export async function runBudgetReset(
  period: BudgetPeriod,
  dryRun: boolean,
  deps: JobDependencies
): Promise<BudgetResetReport> {
  const log = deps.context.logger.child({ job: `reset-${period}`, dryRun });
  const report = dryRun
    ? await previewReset(period, deps)
    : await applyReset(period, deps);

  log.info(
    dryRun
      ? `DRY RUN: would reset ${period} spend for ${report.brandsReset} brands and ${report.campaignsReset} campaigns`
      : `Reset ${period} spend for ${report.brandsReset} brands and ${report.campaignsReset} campaigns`,
    {
      reactivated: report.reactivated,
      statusChanges: report.statusChanges,
    }
  );

  return report;
}

export function runDailyReset(deps: JobDependencies, dryRun: boolean = false): Promise<BudgetResetReport> {
  return runBudgetReset("daily", dryRun, deps);
}

export function runMonthlyReset(deps: JobDependencies, dryRun: boolean = false): Promise<BudgetResetReport> {
  return runBudgetReset("monthly", dryRun, deps);
}

async function applyReset(period: BudgetPeriod, deps: JobDependencies): Promise<BudgetResetReport> {
  const { repositories, clock } = deps.context;
  const now = clock();

  const brandsReset = await repositories.brands.resetSpend(period, now);
  const campaignsReset = await repositories.campaigns.resetSpend(period, now);

  const { tally, evaluations } = await sweepCampaignStatuses(deps);
  const reactivated = evaluations.filter(
    (evaluation) =>
      evaluation.previousStatus === CampaignStatus.BUDGET_EXCEEDED &&
      evaluation.campaign.status === CampaignStatus.ACTIVE
  ).length;

  return {
    period,
    dryRun: false,
    brandsReset,
    campaignsReset,
    reactivated,
    statusChanges: tally,
  };
}

async function previewReset(period: BudgetPeriod, deps: JobDependencies): Promise<BudgetResetReport> {
  const { repositories, clock, timeZone } = deps.context;
  const now = clock();

  const brands = await repositories.brands.list();
  const projectedBrands = new Map<string, Brand>(
    brands.map((brand) => [brand.id, withSpendReset(brand, period)])
  );
  const campaigns = await repositories.campaigns.list();

  let reactivated = 0;
  for (const campaign of campaigns) {
    if (campaign.status !== CampaignStatus.BUDGET_EXCEEDED) {
      continue;
    }
    const brand = projectedBrands.get(campaign.brandId);
    if (brand && shouldBeActive(campaign, brand, now, timeZone)) {
      reactivated++;
    }
  }

  return {
    period,
    dryRun: true,
    brandsReset: brands.length,
    campaignsReset: campaigns.length,
    reactivated,
    statusChanges: null,
  };
}

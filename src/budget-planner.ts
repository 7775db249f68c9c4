/**
 * ブランド予算プランナー
 *
 * 消化記録・ステータス評価・定期ジョブ・レポートの入口をまとめたオブジェクト。
 * リポジトリ・時計・タイムゾーンを注入して組み立てる。
 */

import { AdminService } from "./admin/admin-service";
import { BudgetLedger } from "./budget/budget-ledger";
import { SpendRecorder } from "./budget/spend-recorder";
import { BUDGET } from "./constants";
import { Clock, PlannerContext, systemClock } from "./context";
import { isWithinDaypartingWindow } from "./dayparting";
import { NotFoundError } from "./errors";
import {
  BudgetAlert,
  BudgetAlertNotifier,
  BudgetResetReport,
  JobDependencies,
  StatusChangeTally,
  TotalsSweepResult,
  runDailyReset,
  runMonthlyReset,
  runStatusSweep,
  runTotalsSweep,
  scanBudgetAlerts,
} from "./jobs";
import { StructuredLogger, logger as rootLogger } from "./logger";
import { Brand, Campaign, SpendEvent } from "./models";
import { Money } from "./money";
import {
  BudgetStatusSummary,
  getActiveCampaigns,
  getBudgetStatusSummary,
} from "./reports/budget-summary";
import { Repositories } from "./repositories/interfaces";
import { CampaignStatusMachine, shouldBeActive } from "./status/campaign-status-machine";

export interface BudgetPlannerOptions {
  repositories: Repositories;
  timeZone?: string;
  clock?: Clock;
  logger?: StructuredLogger;
  alertThresholdPercent?: number;
  alertNotifier?: BudgetAlertNotifier;
}

/**
 * 再計算の対象
 */
export type RecomputeTarget =
  | { type: "brand"; id: string }
  | { type: "campaign"; id: string };

export class BudgetPlanner {
  readonly context: PlannerContext;
  readonly ledger: BudgetLedger;
  readonly statusMachine: CampaignStatusMachine;
  readonly recorder: SpendRecorder;
  readonly admin: AdminService;

  private readonly alertThresholdPercent: number;
  private readonly alertNotifier?: BudgetAlertNotifier;

  constructor(options: BudgetPlannerOptions) {
    this.context = {
      repositories: options.repositories,
      timeZone: options.timeZone ?? BUDGET.DEFAULT_TIME_ZONE,
      clock: options.clock ?? systemClock,
      logger: options.logger ?? rootLogger,
    };
    this.ledger = new BudgetLedger(this.context);
    this.statusMachine = new CampaignStatusMachine(this.context);
    this.recorder = new SpendRecorder(this.context, this.ledger, this.statusMachine);
    this.admin = new AdminService(this.context);
    this.alertThresholdPercent =
      options.alertThresholdPercent ?? BUDGET.DEFAULT_ALERT_THRESHOLD_PERCENT;
    this.alertNotifier = options.alertNotifier;
  }

  private get jobDependencies(): JobDependencies {
    return {
      context: this.context,
      ledger: this.ledger,
      statusMachine: this.statusMachine,
    };
  }

  // ===========================================================================
  // 単体操作
  // ===========================================================================

  recordSpend(
    campaignId: string,
    amount: Money | string | number,
    description: string = ""
  ): Promise<SpendEvent> {
    return this.recorder.record(campaignId, amount, description);
  }

  /**
   * キャンペーンのステータスを評価して保存し、更新後のキャンペーンを返す
   */
  async evaluateCampaign(campaign: Campaign | string): Promise<Campaign> {
    const target = typeof campaign === "string" ? await this.loadCampaign(campaign) : campaign;
    const evaluation = await this.statusMachine.evaluate(target);
    return evaluation.campaign;
  }

  /**
   * ブランドまたはキャンペーンの消化合計を再計算
   */
  recomputeTotals(target: { type: "brand"; id: string }): Promise<Brand>;
  recomputeTotals(target: { type: "campaign"; id: string }): Promise<Campaign>;
  async recomputeTotals(target: RecomputeTarget): Promise<Brand | Campaign> {
    if (target.type === "brand") {
      return this.ledger.recomputeBrand(await this.loadBrand(target.id));
    }
    return this.ledger.recomputeCampaign(await this.loadCampaign(target.id));
  }

  isWithinDaypartingWindow(campaign: Campaign, now: Date = this.context.clock()): boolean {
    return isWithinDaypartingWindow(campaign, now, this.context.timeZone);
  }

  /**
   * 配信可能か（書き込みなし）
   */
  async shouldBeActive(campaign: Campaign, brand?: Brand): Promise<boolean> {
    const owner = brand ?? (await this.loadBrand(campaign.brandId));
    return shouldBeActive(campaign, owner, this.context.clock(), this.context.timeZone);
  }

  // ===========================================================================
  // 定期ジョブ
  // ===========================================================================

  runStatusSweep(): Promise<StatusChangeTally> {
    return runStatusSweep(this.jobDependencies);
  }

  runTotalsSweep(): Promise<TotalsSweepResult> {
    return runTotalsSweep(this.jobDependencies);
  }

  runDailyReset(dryRun: boolean = false): Promise<BudgetResetReport> {
    return runDailyReset(this.jobDependencies, dryRun);
  }

  runMonthlyReset(dryRun: boolean = false): Promise<BudgetResetReport> {
    return runMonthlyReset(this.jobDependencies, dryRun);
  }

  scanBudgetAlerts(): Promise<BudgetAlert[]> {
    return scanBudgetAlerts(this.jobDependencies, {
      thresholdPercent: this.alertThresholdPercent,
      notifier: this.alertNotifier,
    });
  }

  // ===========================================================================
  // レポート
  // ===========================================================================

  getBudgetStatusSummary(): Promise<BudgetStatusSummary> {
    return getBudgetStatusSummary(this.context);
  }

  getActiveCampaigns(): Promise<Campaign[]> {
    return getActiveCampaigns(this.context);
  }

  private async loadBrand(id: string): Promise<Brand> {
    const brand = await this.context.repositories.brands.findById(id);
    if (!brand) {
      throw new NotFoundError("Brand", id);
    }
    return brand;
  }

  private async loadCampaign(id: string): Promise<Campaign> {
    const campaign = await this.context.repositories.campaigns.findById(id);
    if (!campaign) {
      throw new NotFoundError("Campaign", id);
    }
    return campaign;
  }
}

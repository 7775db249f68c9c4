/**
 * ブランド予算プランナー
 *
 * ブランドの日予算・月予算に対する広告費の消化を記録し、
 * 予算・時間帯（デイパーティング）に応じてキャンペーンの配信ステータスを切り替える
 */

export { BudgetPlanner, BudgetPlannerOptions, RecomputeTarget } from "./budget-planner";
export { PlannerContext, Clock, systemClock } from "./context";
export * from "./models";
export { Money, formatMoney, parseMoney, tryParseMoney, percentUsed } from "./money";
export * from "./dayparting";
export * from "./budget";
export * from "./status";
export * from "./jobs";
export { AdminService } from "./admin/admin-service";
export { BudgetStatusSummary, getBudgetStatusSummary, getActiveCampaigns } from "./reports/budget-summary";
export { Repositories, BrandRepository, CampaignRepository, SpendEventRepository } from "./repositories/interfaces";
export { createBigQueryRepositories, createTables } from "./bigquery";
export { SlackNotifier } from "./lib/slackNotifier";
export * from "./errors";
export { loadEnvConfig, validateEnvConfig, EnvConfig } from "./config";
export { logger, StructuredLogger } from "./logger";

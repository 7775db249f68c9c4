/**
 * ブランド予算プランナー - 定数定義
 */

// =============================================================================
// サーバー設定
// =============================================================================
export const SERVER = {
  /** デフォルトポート */
  DEFAULT_PORT: 8080,
  /** リクエストボディ上限 */
  JSON_BODY_LIMIT: "1mb",
} as const;

// =============================================================================
// BigQuery設定
// =============================================================================
export const BIGQUERY = {
  /** デフォルトデータセットID */
  DATASET_ID: "brand_budget_planner",
  /** デフォルトロケーション */
  LOCATION: "US",
} as const;

export const TABLES = {
  BRANDS: "brands",
  CAMPAIGNS: "campaigns",
  SPEND_EVENTS: "spend_events",
} as const;

// =============================================================================
// 予算・アラート
// =============================================================================
export const BUDGET = {
  /** 金額の小数桁数（DECIMAL(…, 2) 相当） */
  CURRENCY_SCALE: 2,
  /** アラート閾値（予算に対する消化率 %） */
  DEFAULT_ALERT_THRESHOLD_PERCENT: 90,
  /** デフォルトタイムゾーン（日・月の境界判定に使用） */
  DEFAULT_TIME_ZONE: "UTC",
} as const;

export const FIELD_LIMITS = {
  BRAND_NAME_MAX: 100,
  CAMPAIGN_NAME_MAX: 200,
  SPEND_DESCRIPTION_MAX: 500,
  /** DECIMAL(10, 2) の上限 */
  DAILY_AMOUNT_MAX_DIGITS: 10,
  /** DECIMAL(12, 2) の上限 */
  MONTHLY_AMOUNT_MAX_DIGITS: 12,
} as const;

// =============================================================================
// 定期ジョブのスケジュール
// =============================================================================

/**
 * Cloud Scheduler 等の外部スケジューラに渡す設定
 * サービス自身はスケジュールを持たず、各エンドポイントが呼ばれた時に1回実行する
 */
export const JOB_SCHEDULES = [
  { name: "check-campaign-statuses", cron: "*/5 * * * *", endpoint: "/cron/status-sweep" },
  { name: "recalculate-spend-totals", cron: "*/10 * * * *", endpoint: "/cron/recompute-totals" },
  { name: "reset-daily-budgets", cron: "0 0 * * *", endpoint: "/cron/reset-daily" },
  { name: "reset-monthly-budgets", cron: "0 0 1 * *", endpoint: "/cron/reset-monthly" },
  { name: "monitor-budget-limits", cron: "*/15 * * * *", endpoint: "/cron/budget-alerts" },
] as const;

export type JobName = (typeof JOB_SCHEDULES)[number]["name"];

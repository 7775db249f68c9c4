/**
 * ブランド予算プランナー - 環境変数設定
 */

import { SERVER, BIGQUERY, BUDGET } from "./constants";
import { ConfigurationError } from "./errors";

/**
 * 環境変数の設定インターフェース
 */
export interface EnvConfig {
  // サーバー設定
  port: number;
  nodeEnv: string;

  // BigQuery設定
  bigqueryProjectId?: string;
  bigqueryDatasetId: string;
  bigqueryLocation: string;

  // 認証設定
  apiKey?: string;
  corsAllowedOrigins: string[];

  // 予算設定
  /**
   * 日・月の境界判定とデイパーティングの曜日/時刻判定に使うタイムゾーン
   * - 環境変数 TIME_ZONE（IANA 名）で設定
   * - 未設定の場合は "UTC"
   */
  timeZone: string;

  /**
   * 予算アラートの閾値（%）
   * - 環境変数 BUDGET_ALERT_THRESHOLD_PERCENT で設定
   * - 不正な値や未設定の場合は 90
   */
  alertThresholdPercent: number;

  // Slack通知
  slackBotToken?: string;
  slackChannel: string;
}

/**
 * IANA タイムゾーン名として有効か判定
 */
export function isValidTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

function parseTimeZone(value: string | undefined): string {
  if (value && isValidTimeZone(value)) {
    return value;
  }
  return BUDGET.DEFAULT_TIME_ZONE;
}

/**
 * BUDGET_ALERT_THRESHOLD_PERCENT をパース
 * 0 より大きい有限数でなければデフォルトにフォールバック
 */
function parseAlertThreshold(value: string | undefined): number {
  const parsed = value !== undefined ? Number(value) : NaN;
  if (Number.isFinite(parsed) && parsed > 0) {
    return parsed;
  }
  return BUDGET.DEFAULT_ALERT_THRESHOLD_PERCENT;
}

function parseOrigins(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * 環境変数を読み込み、設定オブジェクトを返す
 * @throws {ConfigurationError} 値が不正な場合
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const validation = validateEnvConfig(env);
  if (!validation.valid) {
    throw new ConfigurationError(
      `Invalid configuration: ${validation.errors.join(", ")}`,
      validation.errors
    );
  }

  return {
    port: parseInt(env.PORT || String(SERVER.DEFAULT_PORT), 10),
    nodeEnv: env.NODE_ENV || "development",

    bigqueryProjectId: env.BIGQUERY_PROJECT_ID || env.GCP_PROJECT_ID || undefined,
    bigqueryDatasetId: env.BIGQUERY_DATASET_ID || BIGQUERY.DATASET_ID,
    bigqueryLocation: env.BIGQUERY_LOCATION || BIGQUERY.LOCATION,

    apiKey: env.API_KEY || undefined,
    corsAllowedOrigins: parseOrigins(env.CORS_ALLOWED_ORIGINS),

    timeZone: parseTimeZone(env.TIME_ZONE),
    alertThresholdPercent: parseAlertThreshold(env.BUDGET_ALERT_THRESHOLD_PERCENT),

    slackBotToken: env.SLACK_BOT_TOKEN || undefined,
    slackChannel: env.SLACK_CHANNEL || "#budget-alerts",
  };
}

/**
 * 環境変数を検証のみ行う（起動時チェック用）
 * @returns 検証結果とエラーメッセージ
 */
export function validateEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  const port = parseInt(env.PORT || String(SERVER.DEFAULT_PORT), 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    errors.push(`Invalid PORT value: ${env.PORT}`);
  }

  if (env.TIME_ZONE && !isValidTimeZone(env.TIME_ZONE)) {
    errors.push(`Invalid TIME_ZONE value: ${env.TIME_ZONE}`);
  }

  if (env.BUDGET_ALERT_THRESHOLD_PERCENT !== undefined) {
    const threshold = Number(env.BUDGET_ALERT_THRESHOLD_PERCENT);
    if (!Number.isFinite(threshold) || threshold <= 0) {
      errors.push(
        `Invalid BUDGET_ALERT_THRESHOLD_PERCENT value: ${env.BUDGET_ALERT_THRESHOLD_PERCENT}`
      );
    }
  }

  if (env.NODE_ENV === "production" && !env.API_KEY) {
    errors.push("API_KEY is required in production");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

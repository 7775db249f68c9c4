/**
 * Slack通知モジュール
 * Slack APIを使用してメッセージを送信
 */

import { BudgetAlert, BudgetAlertNotifier } from "../jobs/types";
import { logger } from "../logger";

const WARNING_PREFIX = "⚠️";

const ALERT_LABEL: Record<BudgetAlert["kind"], string> = {
  daily_budget_warning: "日予算",
  monthly_budget_warning: "月予算",
};

/** Slack API レスポンス */
interface SlackResponse {
  ok: boolean;
  error?: string;
  ts?: string;
}

function isSlackResponse(value: unknown): value is SlackResponse {
  return typeof value === "object" && value !== null && "ok" in value && typeof value.ok === "boolean";
}

export interface SlackNotifierOptions {
  botToken?: string;
  channel: string;
}

/**
 * 予算アラートを Slack 用のテキストに整形
 */
export function formatBudgetAlertMessage(alerts: readonly BudgetAlert[]): string {
  const lines = alerts.map(
    (alert) =>
      `• *${alert.brand}* ${ALERT_LABEL[alert.kind]} ${alert.percentUsed.toFixed(1)}% (${alert.spend} / ${alert.budget})`
  );
  return [`*予算アラート* (${alerts.length}件)`, ...lines].join("\n");
}

/**
 * Slack通知クラス
 */
export class SlackNotifier implements BudgetAlertNotifier {
  private botToken: string | undefined;
  private channel: string;

  constructor(options: SlackNotifierOptions) {
    this.botToken = options.botToken;
    this.channel = options.channel;
  }

  /**
   * 設定チャンネルに警告メッセージを送信
   */
  async send(message: string): Promise<boolean> {
    if (!this.botToken) {
      logger.warn("Slack notification skipped: SLACK_BOT_TOKEN is not set");
      return false;
    }

    const targetChannel = this.channel;
    const formattedMessage = `${WARNING_PREFIX} ${message}`;

    try {
      const response = await fetch("https://slack.com/api/chat.postMessage", {
        method: "POST",
        headers: {
          "Content-Type": "application/json; charset=utf-8",
          Authorization: `Bearer ${this.botToken}`,
        },
        body: JSON.stringify({
          channel: targetChannel,
          text: formattedMessage,
          mrkdwn: true,
        }),
      });

      const data: unknown = await response.json();

      if (!isSlackResponse(data) || !data.ok) {
        logger.error("Slack send failed", {
          error: isSlackResponse(data) ? data.error : "unexpected response",
          channel: targetChannel,
        });
        return false;
      }

      logger.debug("Slack send succeeded", { channel: targetChannel, ts: data.ts });
      return true;
    } catch (error) {
      logger.error("Slack send error", {
        error: error instanceof Error ? error.message : String(error),
        channel: targetChannel,
      });
      return false;
    }
  }

  async notifyBudgetAlerts(alerts: BudgetAlert[]): Promise<boolean> {
    if (alerts.length === 0) {
      return true;
    }
    return this.send(formatBudgetAlertMessage(alerts));
  }
}

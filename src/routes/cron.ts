/**
 * Cronジョブエンドポイント
 *
 * 外部スケジューラ（Cloud Scheduler）から呼ばれ、各ジョブを1回実行する。
 * 失敗時にサービス側でリトライはしない（ジョブは再実行しても安全）。
 */

import { Router, Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { BudgetPlanner } from "../budget-planner";
import { JobName } from "../constants";
import { ApiResponseBuilder } from "../errors";
import { logger } from "../logger";
import { DryRunQuerySchema, parseRequest } from "../schemas";

type JobRunner<T> = (req: Request) => Promise<T>;

/**
 * ジョブを実行し、実行ID・所要時間付きでレスポンスを返すハンドラを作る
 */
function jobHandler<T>(jobName: JobName, run: JobRunner<T>) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const executionId = uuidv4();
    const startedAt = Date.now();

    logger.info("Cron job started", { jobName, executionId });

    try {
      const result = await run(req);
      const durationMs = Date.now() - startedAt;

      logger.info("Cron job completed", { jobName, executionId, durationMs });

      res.json(
        ApiResponseBuilder.success(
          { jobName, executionId, durationMs, result },
          { requestId: executionId }
        )
      );
    } catch (error) {
      logger.error("Cron job failed", {
        jobName,
        executionId,
        error: error instanceof Error ? error : String(error),
      });
      next(error);
    }
  };
}

export function createCronRoutes(planner: BudgetPlanner): Router {
  const router = Router();

  /**
   * POST /cron/status-sweep
   * 全キャンペーンのステータス評価（5分ごと）
   */
  router.post(
    "/status-sweep",
    jobHandler("check-campaign-statuses", () => planner.runStatusSweep())
  );

  /**
   * POST /cron/recompute-totals
   * 消化合計の再計算（10分ごと）
   */
  router.post(
    "/recompute-totals",
    jobHandler("recalculate-spend-totals", () => planner.runTotalsSweep())
  );

  /**
   * POST /cron/reset-daily?dryRun=true
   * 日次リセット（毎日 0:00）
   */
  router.post(
    "/reset-daily",
    jobHandler("reset-daily-budgets", (req) =>
      planner.runDailyReset(parseRequest(DryRunQuerySchema, req.query).dryRun)
    )
  );

  /**
   * POST /cron/reset-monthly?dryRun=true
   * 月次リセット（毎月1日 0:00）
   */
  router.post(
    "/reset-monthly",
    jobHandler("reset-monthly-budgets", (req) =>
      planner.runMonthlyReset(parseRequest(DryRunQuerySchema, req.query).dryRun)
    )
  );

  /**
   * POST /cron/budget-alerts
   * 予算アラートスキャン（15分ごと）
   */
  router.post(
    "/budget-alerts",
    jobHandler("monitor-budget-limits", async () => {
      const alerts = await planner.scanBudgetAlerts();
      return { alertCount: alerts.length, alerts };
    })
  );

  return router;
}

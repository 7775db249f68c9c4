/**
 * ヘルスチェック・ルートインデックス
 */

import { Router, Request, Response } from "express";
import { BudgetPlanner } from "../budget-planner";
import { JOB_SCHEDULES } from "../constants";
import { logger } from "../logger";

export function createHealthRoutes(planner: BudgetPlanner): Router {
  const router = Router();

  // ルート一覧
  router.get("/", (_req: Request, res: Response) => {
    res.json({
      message: "Brand Budget Planner API",
      endpoints: {
        health: "GET /health",
        brands: "GET|POST /brands, GET|PATCH|DELETE /brands/:id",
        brand_recompute: "POST /brands/:id/recompute",
        campaigns: "GET|POST /campaigns, GET|PATCH|DELETE /campaigns/:id",
        campaign_status: "PUT /campaigns/:id/status",
        campaign_evaluate: "POST /campaigns/:id/evaluate",
        campaign_recompute: "POST /campaigns/:id/recompute",
        spend: "POST /campaigns/:id/spend",
        spend_events: "GET /campaigns/:id/spend-events",
        budget_status: "GET /reports/budget-status",
        active_campaigns: "GET /reports/active-campaigns",
      },
      schedules: JOB_SCHEDULES,
    });
  });

  // ヘルスチェック（ストレージに到達できるか）
  router.get("/health", async (_req: Request, res: Response) => {
    let storageHealthy = true;
    try {
      await planner.context.repositories.brands.count();
    } catch (error) {
      storageHealthy = false;
      logger.warn("Health check: storage unreachable", {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    res.status(storageHealthy ? 200 : 503).json({
      status: storageHealthy ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      service: "brand-budget-planner",
      checks: {
        storage: storageHealthy ? "ok" : "failed",
      },
    });
  });

  return router;
}

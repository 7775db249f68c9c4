/**
 * レポート APIルート
 */

import { Router, Request, Response, NextFunction } from "express";
import { BudgetPlanner } from "../budget-planner";
import { ApiResponseBuilder } from "../errors";
import { toCampaignView } from "./serializers";

export function createReportRoutes(planner: BudgetPlanner): Router {
  const router = Router();

  /**
   * GET /reports/budget-status
   * 全ブランドの予算状況サマリー
   */
  router.get("/budget-status", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(ApiResponseBuilder.success(await planner.getBudgetStatusSummary()));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /reports/active-campaigns
   * 配信中のキャンペーン（ACTIVE かつブランド有効）
   */
  router.get("/active-campaigns", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const campaigns = await planner.getActiveCampaigns();
      res.json(
        ApiResponseBuilder.success({
          count: campaigns.length,
          campaigns: campaigns.map(toCampaignView),
        })
      );
    } catch (error) {
      next(error);
    }
  });

  return router;
}

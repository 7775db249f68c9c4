/**
 * キャンペーン管理・消化記録 APIルート
 */

import { Router, Request, Response, NextFunction } from "express";
import { BudgetPlanner } from "../budget-planner";
import { ApiResponseBuilder } from "../errors";
import {
  CreateCampaignRequestSchema,
  ListCampaignsQuerySchema,
  RecordSpendRequestSchema,
  SetCampaignStatusRequestSchema,
  SpendEventsQuerySchema,
  UpdateCampaignRequestSchema,
  parseRequest,
} from "../schemas";
import { toCampaignView, toSpendEventView } from "./serializers";

export function createCampaignRoutes(planner: BudgetPlanner): Router {
  const router = Router();
  const { admin } = planner;

  /**
   * POST /campaigns
   * キャンペーンを作成
   */
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseRequest(CreateCampaignRequestSchema, req.body);
      const campaign = await admin.createCampaign(input);
      res.status(201).json(ApiResponseBuilder.success(toCampaignView(campaign), { statusCode: 201 }));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /campaigns?brandId=&status=
   */
  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filter = parseRequest(ListCampaignsQuerySchema, req.query);
      const campaigns = await admin.listCampaigns(filter);
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

  /**
   * GET /campaigns/:id
   * 配信ウィンドウ内か・配信可能かのプレビュー付き
   */
  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const campaign = await admin.getCampaign(req.params.id);
      const brand = await admin.getBrand(campaign.brandId);
      res.json(
        ApiResponseBuilder.success({
          ...toCampaignView(campaign),
          withinDaypartingWindow: planner.isWithinDaypartingWindow(campaign),
          shouldBeActive: await planner.shouldBeActive(campaign, brand),
        })
      );
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /campaigns/:id
   * 名前・デイパーティング設定の更新
   */
  router.patch("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const patch = parseRequest(UpdateCampaignRequestSchema, req.body);
      const campaign = await admin.updateCampaign(req.params.id, patch);
      res.json(ApiResponseBuilder.success(toCampaignView(campaign)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /campaigns/:id
   */
  router.delete("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      await admin.deleteCampaign(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /campaigns/:id/status
   * 手動ステータス設定（active / paused / inactive）
   */
  router.put("/:id/status", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { status } = parseRequest(SetCampaignStatusRequestSchema, req.body);
      const campaign = await admin.setCampaignStatus(req.params.id, status);
      res.json(ApiResponseBuilder.success(toCampaignView(campaign)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /campaigns/:id/evaluate
   * ステータスを今すぐ評価
   */
  router.post("/:id/evaluate", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const campaign = await planner.evaluateCampaign(req.params.id);
      res.json(ApiResponseBuilder.success(toCampaignView(campaign)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /campaigns/:id/recompute
   * 消化合計を消化イベントから再計算
   */
  router.post("/:id/recompute", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const campaign = await planner.recomputeTotals({ type: "campaign", id: req.params.id });
      res.json(ApiResponseBuilder.success(toCampaignView(campaign)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /campaigns/:id/spend
   * 消化を記録
   */
  router.post("/:id/spend", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { amount, description } = parseRequest(RecordSpendRequestSchema, req.body);
      const event = await planner.recordSpend(req.params.id, amount, description);
      res.status(201).json(ApiResponseBuilder.success(toSpendEventView(event), { statusCode: 201 }));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /campaigns/:id/spend-events?limit=
   * 消化イベント（新しい順）
   */
  router.get("/:id/spend-events", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = parseRequest(SpendEventsQuerySchema, req.query);
      const events = await admin.listSpendEvents(req.params.id, limit);
      res.json(
        ApiResponseBuilder.success({
          count: events.length,
          spendEvents: events.map(toSpendEventView),
        })
      );
    } catch (error) {
      next(error);
    }
  });

  return router;
}

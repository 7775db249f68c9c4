/**
 * ブランド管理 APIルート
 */

import { Router, Request, Response, NextFunction } from "express";
import { BudgetPlanner } from "../budget-planner";
import { ApiResponseBuilder } from "../errors";
import { CreateBrandRequestSchema, UpdateBrandRequestSchema, parseRequest } from "../schemas";
import { toBrandView, toCampaignView } from "./serializers";

export function createBrandRoutes(planner: BudgetPlanner): Router {
  const router = Router();
  const { admin } = planner;

  /**
   * POST /brands
   * ブランドを作成
   */
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseRequest(CreateBrandRequestSchema, req.body);
      const brand = await admin.createBrand(input);
      res.status(201).json(ApiResponseBuilder.success(toBrandView(brand), { statusCode: 201 }));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /brands
   * ブランド一覧（残予算・超過フラグ付き）
   */
  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const activeOnly = req.query.activeOnly === "true";
      const brands = await admin.listBrands({ activeOnly });
      res.json(ApiResponseBuilder.success({ count: brands.length, brands: brands.map(toBrandView) }));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /brands/:id
   */
  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const brand = await admin.getBrand(req.params.id);
      res.json(ApiResponseBuilder.success(toBrandView(brand)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * PATCH /brands/:id
   * 名前・予算・有効フラグの更新
   */
  router.patch("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const patch = parseRequest(UpdateBrandRequestSchema, req.body);
      const brand = await admin.updateBrand(req.params.id, patch);
      res.json(ApiResponseBuilder.success(toBrandView(brand)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /brands/:id
   * 配下のキャンペーン・消化イベントごと削除
   */
  router.delete("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      await admin.deleteBrand(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /brands/:id/recompute
   * 消化合計を消化イベントから再計算
   */
  router.post("/:id/recompute", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const brand = await planner.recomputeTotals({ type: "brand", id: req.params.id });
      res.json(ApiResponseBuilder.success(toBrandView(brand)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /brands/:id/campaigns
   */
  router.get("/:id/campaigns", async (req: Request, res: Response, next: NextFunction) => {
    try {
      await admin.getBrand(req.params.id);
      const campaigns = await admin.listCampaigns({ brandId: req.params.id });
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

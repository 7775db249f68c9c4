/**
 * ブランド予算プランナー - 認証ミドルウェア
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { AuthenticationError } from "../errors";
import { logger } from "../logger";

/**
 * Authorization: Bearer <token> からトークンを取り出す
 */
export function extractBearerToken(authHeader: string | undefined): string | undefined {
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    return undefined;
  }
  return authHeader.substring(7);
}

/**
 * API Key認証ミドルウェア
 * ヘッダー: X-API-Key または Authorization: Bearer <api_key>
 *
 * Cloud Scheduler からの /cron 呼び出しも同じキーをヘッダーに付けて送る
 */
export function apiKeyAuth(apiKey: string | undefined): RequestHandler {
  if (!apiKey) {
    // API Keyが設定されていない場合は認証をスキップ
    logger.warn("API Key authentication is disabled (API_KEY not set)");
  }

  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const providedKey = req.header("x-api-key") || extractBearerToken(req.header("authorization"));

    if (!providedKey) {
      next(
        new AuthenticationError(
          "API key is required. Provide via X-API-Key header or Authorization: Bearer <key>"
        )
      );
      return;
    }

    if (providedKey !== apiKey) {
      logger.warn("Invalid API key attempt", {
        ip: req.ip,
        path: req.path,
      });
      next(new AuthenticationError("Invalid API key"));
      return;
    }

    next();
  };
}

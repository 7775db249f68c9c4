/**
 * エラーハンドリングミドルウェア
 *
 * ルートから next(error) で渡されたエラーを統一レスポンス形式に変換する
 */

import { Request, Response, NextFunction } from "express";
import { ApiResponseBuilder, NotFoundError, toAppError } from "../errors";
import { logger } from "../logger";

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(ApiResponseBuilder.error(new NotFoundError("Route", `${req.method} ${req.path}`)));
}

export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  // Express はエラーハンドラを引数の数で判定する
  _next: NextFunction
): void {
  const appError = toAppError(error);
  const traceId = typeof res.locals.traceId === "string" ? res.locals.traceId : undefined;

  if (appError.statusCode >= 500) {
    logger.error("Request failed", {
      traceId,
      method: req.method,
      path: req.path,
      code: appError.code,
      error: appError.originalCause ?? appError,
    });
  } else {
    logger.warn("Request rejected", {
      traceId,
      method: req.method,
      path: req.path,
      code: appError.code,
      message: appError.message,
    });
  }

  const body = ApiResponseBuilder.error(appError, traceId);
  res.status(body.statusCode).json(body);
}

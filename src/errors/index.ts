/**
 * カスタムエラークラスと統一レスポンス形式
 *
 * ジョブ・API の双方で同じエラー分類を使い、呼び出し側が
 * 「識別子を解決し直すべきか」「入力を直すべきか」を判断できるようにする
 */

// =============================================================================
// エラーコード定義
// =============================================================================

export const ErrorCode = {
  // 認証・アクセス拒否 (401 / 403)
  UNAUTHORIZED: "UNAUTHORIZED",
  FORBIDDEN: "FORBIDDEN",

  // バリデーションエラー (400)
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // リソースエラー (404 / 409)
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",

  // 外部サービスエラー (5xx)
  BIGQUERY_ERROR: "BIGQUERY_ERROR",

  // サーバーエラー (500)
  INTERNAL_ERROR: "INTERNAL_ERROR",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// 基底エラークラス
// =============================================================================

export interface AppErrorOptions {
  code: ErrorCodeType;
  message: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * アプリケーション基底エラークラス
 */
export class AppError extends Error {
  public readonly code: ErrorCodeType;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly originalCause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.message);
    this.name = "AppError";
    this.code = options.code;
    this.statusCode = options.statusCode ?? 500;
    this.details = options.details;
    this.timestamp = new Date().toISOString();
    this.originalCause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * JSON形式でエラー情報を取得
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// 認証エラー
// =============================================================================

export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication failed") {
    super({
      code: ErrorCode.UNAUTHORIZED,
      message,
      statusCode: 401,
    });
    this.name = "AuthenticationError";
  }
}

/**
 * アクセス拒否（403）
 * 許可されていないオリジンからのリクエスト等
 */
export class ForbiddenError extends AppError {
  constructor(message: string = "Forbidden") {
    super({
      code: ErrorCode.FORBIDDEN,
      message,
      statusCode: 403,
    });
    this.name = "ForbiddenError";
  }
}

// =============================================================================
// バリデーションエラー
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
  received?: unknown;
}

/**
 * バリデーションエラー（400）
 * 入力を直さない限り同じ結果になる
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(errors: ValidationErrorDetail[], message: string = "Validation failed") {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message,
      statusCode: 400,
      details: { errors },
    });
    this.name = "ValidationError";
    this.errors = errors;
  }

  static forField(field: string, message: string, received?: unknown): ValidationError {
    return new ValidationError([{ field, message, received }], message);
  }

  static fromZodError(zodError: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors: ValidationErrorDetail[] = zodError.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    }));
    return new ValidationError(errors);
  }
}

// =============================================================================
// リソースエラー
// =============================================================================

/**
 * リソース未検出エラー（404）
 * 盲目的にリトライせず、識別子を解決し直すこと
 */
export class NotFoundError extends AppError {
  public readonly resource: string;
  public readonly identifier?: string;

  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super({
      code: ErrorCode.NOT_FOUND,
      message,
      statusCode: 404,
      details: { resource, identifier },
    });
    this.name = "NotFoundError";
    this.resource = resource;
    this.identifier = identifier;
  }
}

/**
 * 一意制約違反（409）
 * ブランド名の重複、同一ブランド内のキャンペーン名の重複
 */
export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: ErrorCode.CONFLICT,
      message,
      statusCode: 409,
      details,
    });
    this.name = "ConflictError";
  }
}

// =============================================================================
// 外部サービスエラー
// =============================================================================

export class BigQueryError extends AppError {
  constructor(message: string, options?: { cause?: Error; details?: Record<string, unknown> }) {
    super({
      code: ErrorCode.BIGQUERY_ERROR,
      message,
      statusCode: 500,
      cause: options?.cause,
      details: options?.details,
    });
    this.name = "BigQueryError";
  }

  static fromError(error: unknown, operation: string): BigQueryError {
    if (error instanceof Error) {
      return new BigQueryError(`${operation}: ${error.message}`, {
        cause: error,
        details: { operation },
      });
    }
    return new BigQueryError(`${operation}: ${String(error)}`, { details: { operation } });
  }
}

// =============================================================================
// 設定エラー
// =============================================================================

export class ConfigurationError extends AppError {
  constructor(message: string, invalidConfig?: string[]) {
    super({
      code: ErrorCode.CONFIGURATION_ERROR,
      message,
      statusCode: 500,
      details: invalidConfig ? { invalidConfig } : undefined,
    });
    this.name = "ConfigurationError";
  }
}

// =============================================================================
// 統一レスポンス形式
// =============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  statusCode: number;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  meta?: {
    requestId?: string;
    timestamp: string;
  };
}

/**
 * 統一レスポンスビルダー
 */
export class ApiResponseBuilder {
  static success<T>(
    data: T,
    options?: { statusCode?: number; requestId?: string }
  ): ApiResponse<T> {
    return {
      success: true,
      statusCode: options?.statusCode ?? 200,
      data,
      meta: {
        requestId: options?.requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }

  static error(error: Error, requestId?: string): ApiResponse<never> {
    if (error instanceof AppError) {
      return {
        success: false,
        statusCode: error.statusCode,
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
        },
        meta: {
          requestId,
          timestamp: new Date().toISOString(),
        },
      };
    }

    // 一般的なErrorの場合
    return {
      success: false,
      statusCode: 500,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: error.message || "An unexpected error occurred",
      },
      meta: {
        requestId,
        timestamp: new Date().toISOString(),
      },
    };
  }
}

// =============================================================================
// エラーハンドリングユーティリティ
// =============================================================================

/**
 * http-errors 系（body-parser 等）の 4xx ステータスを取り出す
 */
function getClientErrorStatus(error: Error): number | null {
  const status = "status" in error ? error.status : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

/**
 * エラーをAppErrorに変換
 * ミドルウェアが投げた 4xx はクライアントエラーとして扱う
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    if ("type" in error && error.type === "entity.parse.failed") {
      return ValidationError.forField("body", "Request body is not valid JSON");
    }
    const clientStatus = getClientErrorStatus(error);
    if (clientStatus !== null) {
      return new AppError({
        code: ErrorCode.VALIDATION_ERROR,
        message: error.message,
        statusCode: clientStatus,
      });
    }
    return new AppError({
      code: ErrorCode.INTERNAL_ERROR,
      message: error.message,
      cause: error,
    });
  }
  return new AppError({
    code: ErrorCode.INTERNAL_ERROR,
    message: String(error),
  });
}

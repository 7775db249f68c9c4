/**
 * ブランド予算プランナー - APIサーバー
 *
 * エントリポイント: startServer() を呼び出してHTTPサーバーを起動
 */

// dotenv を最初に読み込んで .env ファイルから環境変数を設定
import "dotenv/config";

import express, { Express } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { createBigQueryRepositories } from "./bigquery";
import { BudgetPlanner } from "./budget-planner";
import { EnvConfig, loadEnvConfig } from "./config";
import { SERVER } from "./constants";
import { SlackNotifier } from "./lib/slackNotifier";
import { apiKeyAuth } from "./middleware/auth";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import { ForbiddenError } from "./errors";
import { logger } from "./logger";
import {
  createBrandRoutes,
  createCampaignRoutes,
  createCronRoutes,
  createHealthRoutes,
  createReportRoutes,
} from "./routes";

/**
 * CORS オプション
 * オリジンなし（サーバー間通信）と許可リストのオリジンのみ受け入れる
 */
function buildCorsOptions(allowedOrigins: string[]): cors.CorsOptions {
  return {
    origin: (origin, callback) => {
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }
      logger.warn("CORS request blocked", { origin });
      callback(new ForbiddenError("Not allowed by CORS"));
    },
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-API-Key", "X-Request-ID"],
    exposedHeaders: ["X-RateLimit-Limit", "X-RateLimit-Remaining"],
    maxAge: 86400, // プリフライトリクエストを24時間キャッシュ
  };
}

/**
 * Express app を作成
 * テストではインメモリのリポジトリで作った planner を渡す
 */
export function createApp(
  planner: BudgetPlanner,
  config: Pick<EnvConfig, "apiKey" | "corsAllowedOrigins">
): Express {
  const app = express();

  app.use(cors(buildCorsOptions(config.corsAllowedOrigins)));
  app.use(express.json({ limit: SERVER.JSON_BODY_LIMIT }));
  app.use(logger.requestLogger());

  // レート制限（API全体）
  app.use(
    rateLimit({
      windowMs: 1 * 60 * 1000, // 1分間
      max: 100, // 100リクエスト/分
      message: {
        success: false,
        error: "rate-limit-exceeded",
        message: "Too many requests, please try again later.",
      },
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  const auth = apiKeyAuth(config.apiKey);

  app.use("/", createHealthRoutes(planner));
  app.use("/brands", auth, createBrandRoutes(planner));
  app.use("/campaigns", auth, createCampaignRoutes(planner));
  app.use("/reports", auth, createReportRoutes(planner));
  app.use("/cron", auth, createCronRoutes(planner));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * 環境変数から BigQuery 実装の planner を組み立てる
 */
export function createPlannerFromConfig(config: EnvConfig): BudgetPlanner {
  return new BudgetPlanner({
    repositories: createBigQueryRepositories({
      projectId: config.bigqueryProjectId,
      datasetId: config.bigqueryDatasetId,
      location: config.bigqueryLocation,
    }),
    timeZone: config.timeZone,
    alertThresholdPercent: config.alertThresholdPercent,
    alertNotifier: config.slackBotToken
      ? new SlackNotifier({ botToken: config.slackBotToken, channel: config.slackChannel })
      : undefined,
  });
}

/**
 * HTTPサーバーを起動する
 *
 * @returns サーバー起動完了後にresolve（プロセスは終了しない）
 */
export async function startServer(): Promise<void> {
  const config = loadEnvConfig();
  const app = createApp(createPlannerFromConfig(config), config);

  return new Promise<void>((resolve) => {
    app.listen(config.port, () => {
      logger.info("Server started", {
        port: config.port,
        environment: config.nodeEnv,
        timeZone: config.timeZone,
        authEnabled: !!config.apiKey,
        notificationsEnabled: !!config.slackBotToken,
      });
      resolve();
    });
  });
}

// =============================================================================
// エントリポイント
// =============================================================================

if (require.main === module) {
  startServer().catch((error) => {
    logger.error("Failed to start server", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  });
}

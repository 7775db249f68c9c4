/**
 * ルートインデックス
 */

export { createHealthRoutes } from "./health";
export { createBrandRoutes } from "./brands";
export { createCampaignRoutes } from "./campaigns";
export { createReportRoutes } from "./reports";
export { createCronRoutes } from "./cron";

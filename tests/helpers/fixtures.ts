/**
 * テストデータ
 */

import { BudgetPlanner } from "../../src/budget-planner";
import { StructuredLogger } from "../../src/logger";
import { Brand, Campaign, CampaignStatus } from "../../src/models";
import { parseMoney } from "../../src/money";
import { InMemoryStore, createInMemoryRepositories, createStore } from "./in-memory-repositories";

/** 2024-06-12（水）10:30 UTC */
export const FIXED_NOW = new Date("2024-06-12T10:30:00.000Z");

export const createMockBrand = (overrides: Partial<Brand> = {}): Brand => ({
  id: "brand-a",
  name: "Brand A",
  dailyBudget: parseMoney("100.00"),
  monthlyBudget: parseMoney("3000.00"),
  dailySpend: parseMoney("0"),
  monthlySpend: parseMoney("0"),
  isActive: true,
  createdAt: new Date("2024-06-01T00:00:00.000Z"),
  updatedAt: new Date("2024-06-01T00:00:00.000Z"),
  ...overrides,
});

export const createMockCampaign = (overrides: Partial<Campaign> = {}): Campaign => ({
  id: "campaign-a",
  brandId: "brand-a",
  name: "Campaign A",
  status: CampaignStatus.ACTIVE,
  dailySpend: parseMoney("0"),
  monthlySpend: parseMoney("0"),
  daypartingEnabled: false,
  daypartingSchedule: {},
  createdAt: new Date("2024-06-01T00:00:00.000Z"),
  updatedAt: new Date("2024-06-01T00:00:00.000Z"),
  ...overrides,
});

/**
 * ログ出力を抑えたロガー
 */
export function createSilentLogger(): StructuredLogger {
  const silent = new StructuredLogger({ test: true });
  jest.spyOn(silent, "child").mockReturnValue(silent);
  jest.spyOn(silent, "debug").mockImplementation(() => undefined);
  jest.spyOn(silent, "info").mockImplementation(() => undefined);
  jest.spyOn(silent, "warn").mockImplementation(() => undefined);
  jest.spyOn(silent, "error").mockImplementation(() => undefined);
  return silent;
}

export interface TestPlanner {
  planner: BudgetPlanner;
  store: InMemoryStore;
  logger: StructuredLogger;
  setNow: (date: Date) => void;
}

/**
 * インメモリのリポジトリと固定時計で planner を作る
 */
export function createTestPlanner(
  options: { now?: Date; timeZone?: string; alertThresholdPercent?: number } = {}
): TestPlanner {
  const store = createStore();
  const logger = createSilentLogger();
  let now = options.now ?? FIXED_NOW;

  const planner = new BudgetPlanner({
    repositories: createInMemoryRepositories(store),
    timeZone: options.timeZone ?? "UTC",
    clock: () => now,
    logger,
    alertThresholdPercent: options.alertThresholdPercent,
  });

  return {
    planner,
    store,
    logger,
    setNow: (date: Date) => {
      now = date;
    },
  };
}

/**
 * ストアにブランド・キャンペーンを直接登録
 */
export function seed(store: InMemoryStore, brands: Brand[], campaigns: Campaign[] = []): void {
  brands.forEach((brand) => store.brands.set(brand.id, brand));
  campaigns.forEach((campaign) => store.campaigns.set(campaign.id, campaign));
}

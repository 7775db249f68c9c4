/**
 * 定期ジョブ（ステータススイープ・合計再計算・予算リセット）ユニットテスト
 */

import { CampaignStatus } from "../src/models";
import { parseMoney } from "../src/money";
import {
  createMockBrand,
  createMockCampaign,
  createTestPlanner,
  seed,
} from "./helpers/fixtures";

describe("runStatusSweep", () => {
  test("変化したキャンペーンを変化後のステータス別に数える", async () => {
    const { planner, store } = createTestPlanner();
    seed(
      store,
      [
        createMockBrand(),
        createMockBrand({ id: "brand-b", name: "Brand B", isActive: false }),
        createMockBrand({ id: "brand-c", name: "Brand C", dailySpend: parseMoney("100.00") }),
      ],
      [
        createMockCampaign({ id: "a1", name: "A1", status: CampaignStatus.BUDGET_EXCEEDED }),
        createMockCampaign({ id: "a2", name: "A2", daypartingEnabled: true }),
        createMockCampaign({ id: "a3", name: "A3" }),
        createMockCampaign({ id: "b1", brandId: "brand-b", name: "B1" }),
        createMockCampaign({ id: "c1", brandId: "brand-c", name: "C1" }),
        createMockCampaign({
          id: "c2",
          brandId: "brand-c",
          name: "C2",
          status: CampaignStatus.PAUSED,
        }),
      ]
    );

    const tally = await planner.runStatusSweep();

    expect(tally).toEqual({ activated: 1, budgetPaused: 2, daypartingPaused: 1, deactivated: 1 });
    expect(store.campaigns.get("a2")?.status).toBe(CampaignStatus.DAYPARTING_PAUSED);
    expect(store.campaigns.get("c2")?.status).toBe(CampaignStatus.BUDGET_EXCEEDED);
  });

  test("2回目のスイープでは変化なし", async () => {
    const { planner, store } = createTestPlanner();
    seed(
      store,
      [createMockBrand({ dailySpend: parseMoney("100.00") })],
      [createMockCampaign()]
    );

    await planner.runStatusSweep();
    const second = await planner.runStatusSweep();

    expect(second).toEqual({ activated: 0, budgetPaused: 0, daypartingPaused: 0, deactivated: 0 });
  });
});

describe("runTotalsSweep", () => {
  test("全キャンペーン・ブランドの合計を消化イベントから作り直す", async () => {
    const { planner, store } = createTestPlanner();
    seed(
      store,
      [
        createMockBrand({ dailySpend: parseMoney("999.00") }),
        createMockBrand({ id: "brand-b", name: "Brand B" }),
      ],
      [createMockCampaign({ dailySpend: parseMoney("999.00") })]
    );
    store.spendEvents.push({
      id: "e1",
      campaignId: "campaign-a",
      amount: parseMoney("12.34"),
      timestamp: new Date("2024-06-12T08:00:00Z"),
      description: "",
    });

    const result = await planner.runTotalsSweep();

    expect(result).toEqual({ campaignsRecomputed: 1, brandsRecomputed: 2 });
    expect(store.brands.get("brand-a")?.dailySpend).toBe(parseMoney("12.34"));
    expect(store.campaigns.get("campaign-a")?.dailySpend).toBe(parseMoney("12.34"));
    expect(store.brands.get("brand-b")?.dailySpend).toBe(parseMoney("0"));
  });
});

describe("予算リセット", () => {
  const seedMonthlyExceeded = () => {
    const context = createTestPlanner();
    seed(
      context.store,
      [
        createMockBrand({
          dailySpend: parseMoney("10.00"),
          monthlySpend: parseMoney("3000.00"),
        }),
      ],
      [
        createMockCampaign({ status: CampaignStatus.BUDGET_EXCEEDED }),
        createMockCampaign({
          id: "campaign-b",
          name: "Campaign B",
          status: CampaignStatus.BUDGET_EXCEEDED,
          daypartingEnabled: true,
        }),
        createMockCampaign({ id: "campaign-c", name: "Campaign C", status: CampaignStatus.PAUSED }),
      ]
    );
    return context;
  };

  test("月次ドライランは書き込まずに再開予定件数を返す", async () => {
    const { planner, store } = seedMonthlyExceeded();

    const report = await planner.runMonthlyReset(true);

    expect(report).toEqual({
      period: "monthly",
      dryRun: true,
      brandsReset: 1,
      campaignsReset: 3,
      reactivated: 1,
      statusChanges: null,
    });
    expect(store.writes).toEqual([]);
    expect(store.brands.get("brand-a")?.monthlySpend).toBe(parseMoney("3000.00"));
    expect(store.campaigns.get("campaign-a")?.status).toBe(CampaignStatus.BUDGET_EXCEEDED);
  });

  test("日次ドライランでは月予算超過のままなので再開予定 0", async () => {
    const { planner } = seedMonthlyExceeded();

    const report = await planner.runDailyReset(true);

    expect(report.reactivated).toBe(0);
    expect(report.period).toBe("daily");
  });

  test("月次リセットで消化を 0 にし、予算超過のキャンペーンを再開する", async () => {
    const { planner, store } = seedMonthlyExceeded();

    const report = await planner.runMonthlyReset();

    expect(report).toEqual({
      period: "monthly",
      dryRun: false,
      brandsReset: 1,
      campaignsReset: 3,
      reactivated: 1,
      statusChanges: { activated: 1, budgetPaused: 0, daypartingPaused: 1, deactivated: 0 },
    });
    expect(store.brands.get("brand-a")?.monthlySpend).toBe(parseMoney("0"));
    expect(store.brands.get("brand-a")?.dailySpend).toBe(parseMoney("10.00"));
    expect(store.campaigns.get("campaign-a")?.status).toBe(CampaignStatus.ACTIVE);
    expect(store.campaigns.get("campaign-b")?.status).toBe(CampaignStatus.DAYPARTING_PAUSED);
    expect(store.campaigns.get("campaign-c")?.status).toBe(CampaignStatus.PAUSED);
  });

  test("リセットしても消化イベントは消さない", async () => {
    const { planner, store } = seedMonthlyExceeded();
    store.spendEvents.push({
      id: "e1",
      campaignId: "campaign-a",
      amount: parseMoney("1.00"),
      timestamp: new Date("2024-06-12T08:00:00Z"),
      description: "",
    });

    await planner.runDailyReset();

    expect(store.spendEvents).toHaveLength(1);
    expect(store.brands.get("brand-a")?.dailySpend).toBe(parseMoney("0"));
  });
});

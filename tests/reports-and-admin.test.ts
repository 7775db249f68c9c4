/**
 * レポート・管理操作 ユニットテスト
 */

import { CampaignStatus } from "../src/models";
import { parseMoney } from "../src/money";
import { ConflictError, NotFoundError } from "../src/errors";
import {
  FIXED_NOW,
  createMockBrand,
  createMockCampaign,
  createTestPlanner,
  seed,
} from "./helpers/fixtures";

describe("getBudgetStatusSummary", () => {
  test("全ブランドの件数と合計を返す", async () => {
    const { planner, store } = createTestPlanner();
    seed(store, [
      createMockBrand({ dailySpend: parseMoney("100.00"), monthlySpend: parseMoney("100.00") }),
      createMockBrand({
        id: "brand-b",
        name: "Brand B",
        isActive: false,
        dailySpend: parseMoney("0.50"),
        monthlySpend: parseMoney("3000.00"),
      }),
    ]);

    const summary = await planner.getBudgetStatusSummary();

    expect(summary).toEqual({
      totalBrands: 2,
      activeBrands: 1,
      dailyExceededBrands: 1,
      monthlyExceededBrands: 1,
      totalDailySpend: "100.50",
      totalMonthlySpend: "3100.00",
      totalDailyBudget: "200.00",
      totalMonthlyBudget: "6000.00",
    });
  });

  test("ブランドが無ければ 0", async () => {
    const { planner } = createTestPlanner();

    const summary = await planner.getBudgetStatusSummary();

    expect(summary.totalBrands).toBe(0);
    expect(summary.totalDailySpend).toBe("0.00");
  });
});

describe("getActiveCampaigns", () => {
  test("ACTIVE かつブランドが有効なキャンペーンだけを返す", async () => {
    const { planner, store } = createTestPlanner();
    seed(
      store,
      [createMockBrand(), createMockBrand({ id: "brand-b", name: "Brand B", isActive: false })],
      [
        createMockCampaign(),
        createMockCampaign({ id: "paused", name: "Paused", status: CampaignStatus.PAUSED }),
        createMockCampaign({ id: "orphaned", brandId: "brand-b", name: "Orphaned" }),
      ]
    );

    const campaigns = await planner.getActiveCampaigns();

    expect(campaigns.map((campaign) => campaign.id)).toEqual(["campaign-a"]);
  });
});

describe("AdminService", () => {
  test("ブランドを作成できる", async () => {
    const { planner } = createTestPlanner();

    const brand = await planner.admin.createBrand({
      name: "New Brand",
      dailyBudget: parseMoney("50"),
      monthlyBudget: parseMoney("1500"),
    });

    expect(brand).toMatchObject({
      name: "New Brand",
      dailySpend: parseMoney("0"),
      isActive: true,
      createdAt: FIXED_NOW,
    });
  });

  test("ブランド名の重複は ConflictError", async () => {
    const { planner, store } = createTestPlanner();
    seed(store, [createMockBrand()]);

    await expect(
      planner.admin.createBrand({
        name: "Brand A",
        dailyBudget: parseMoney("1"),
        monthlyBudget: parseMoney("1"),
      })
    ).rejects.toThrow(ConflictError);
  });

  test("同じ名前のままの更新は重複扱いしない", async () => {
    const { planner, store } = createTestPlanner();
    seed(store, [createMockBrand()]);

    const updated = await planner.admin.updateBrand("brand-a", {
      name: "Brand A",
      dailyBudget: parseMoney("200"),
    });

    expect(updated.dailyBudget).toBe(parseMoney("200"));
  });

  test("キャンペーン名はブランド内で一意", async () => {
    const { planner, store } = createTestPlanner();
    seed(
      store,
      [createMockBrand(), createMockBrand({ id: "brand-b", name: "Brand B" })],
      [createMockCampaign()]
    );

    await expect(
      planner.admin.createCampaign({ brandId: "brand-a", name: "Campaign A" })
    ).rejects.toThrow(ConflictError);
    await expect(
      planner.admin.createCampaign({ brandId: "brand-b", name: "Campaign A" })
    ).resolves.toMatchObject({ brandId: "brand-b", status: CampaignStatus.ACTIVE });
  });

  test("存在しないブランドにはキャンペーンを作成できない", async () => {
    const { planner } = createTestPlanner();

    await expect(
      planner.admin.createCampaign({ brandId: "missing", name: "X" })
    ).rejects.toThrow(NotFoundError);
  });

  test("ブランド削除で配下のキャンペーン・消化イベントも削除される", async () => {
    const { planner, store } = createTestPlanner();
    seed(store, [createMockBrand()], [createMockCampaign()]);
    await planner.recordSpend("campaign-a", "1");

    await planner.admin.deleteBrand("brand-a");

    expect(store.brands.size).toBe(0);
    expect(store.campaigns.size).toBe(0);
    expect(store.spendEvents).toHaveLength(0);
  });

  test("手動でステータスを設定できる", async () => {
    const { planner, store } = createTestPlanner();
    seed(store, [createMockBrand()], [createMockCampaign()]);

    const campaign = await planner.admin.setCampaignStatus("campaign-a", CampaignStatus.PAUSED);

    expect(campaign.status).toBe(CampaignStatus.PAUSED);
    expect(store.campaigns.get("campaign-a")?.status).toBe(CampaignStatus.PAUSED);
  });

  test("消化イベントを新しい順に返す", async () => {
    const { planner, store, setNow } = createTestPlanner();
    seed(store, [createMockBrand()], [createMockCampaign()]);
    setNow(new Date("2024-06-12T08:00:00Z"));
    await planner.recordSpend("campaign-a", "1", "first");
    setNow(new Date("2024-06-12T09:00:00Z"));
    await planner.recordSpend("campaign-a", "2", "second");

    const events = await planner.admin.listSpendEvents("campaign-a", 1);

    expect(events.map((event) => event.description)).toEqual(["second"]);
  });
});

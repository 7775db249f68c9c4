/**
 * 予算アラート ユニットテスト
 */

import { evaluateBudgetAlerts, scanBudgetAlerts } from "../src/jobs";
import { parseMoney } from "../src/money";
import { createMockBrand, createTestPlanner, seed } from "./helpers/fixtures";

const brandA = createMockBrand({ dailySpend: parseMoney("95.00"), monthlySpend: parseMoney("100.00") });
const brandB = createMockBrand({
  id: "brand-b",
  name: "Brand B",
  dailySpend: parseMoney("10.00"),
  monthlySpend: parseMoney("2900.00"),
});
const inactiveBrand = createMockBrand({
  id: "brand-c",
  name: "Brand C",
  dailySpend: parseMoney("100.00"),
  isActive: false,
});
const zeroBudgetBrand = createMockBrand({
  id: "brand-d",
  name: "Brand D",
  dailyBudget: parseMoney("0"),
  monthlyBudget: parseMoney("1000.00"),
});

describe("evaluateBudgetAlerts", () => {
  test("日次アラートをすべて出してから月次アラートを出す", () => {
    const alerts = evaluateBudgetAlerts([brandA, brandB, inactiveBrand, zeroBudgetBrand]);

    expect(alerts.map((alert) => [alert.kind, alert.brandId])).toEqual([
      ["daily_budget_warning", "brand-a"],
      ["daily_budget_warning", "brand-d"],
      ["monthly_budget_warning", "brand-b"],
    ]);
  });

  test("消化率と金額を含める", () => {
    const [dailyA, , monthlyB] = evaluateBudgetAlerts([brandA, brandB, zeroBudgetBrand]);

    expect(dailyA).toEqual({
      kind: "daily_budget_warning",
      brandId: "brand-a",
      brand: "Brand A",
      percentUsed: 95,
      spend: "95.00",
      budget: "100.00",
    });
    expect(monthlyB.percentUsed).toBeCloseTo(96.667, 3);
    expect(monthlyB.spend).toBe("2900.00");
  });

  test("予算 0 のブランドは percentUsed 0 のアラートになる", () => {
    const [alert] = evaluateBudgetAlerts([zeroBudgetBrand]);

    expect(alert).toMatchObject({ kind: "daily_budget_warning", percentUsed: 0, budget: "0.00" });
  });

  test("閾値を変更できる", () => {
    expect(evaluateBudgetAlerts([brandA], 96)).toEqual([]);
    expect(evaluateBudgetAlerts([brandA], 3)).toHaveLength(2);
  });
});

describe("scanBudgetAlerts", () => {
  test("有効なブランドだけを対象にし、通知先に渡す", async () => {
    const { planner, store } = createTestPlanner();
    seed(store, [brandA, inactiveBrand]);
    const notifier = { notifyBudgetAlerts: jest.fn().mockResolvedValue(true) };

    const alerts = await scanBudgetAlerts(
      { context: planner.context, ledger: planner.ledger, statusMachine: planner.statusMachine },
      { notifier }
    );

    expect(alerts).toHaveLength(1);
    expect(notifier.notifyBudgetAlerts).toHaveBeenCalledWith(alerts);
  });

  test("通知に失敗してもアラートを返し、警告ログを出す", async () => {
    const { planner, store, logger } = createTestPlanner();
    seed(store, [brandA]);
    const notifier = { notifyBudgetAlerts: jest.fn().mockResolvedValue(false) };

    const alerts = await scanBudgetAlerts(
      { context: planner.context, ledger: planner.ledger, statusMachine: planner.statusMachine },
      { notifier }
    );

    expect(alerts).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledWith("Budget alert notification was not delivered", {
      alertCount: 1,
    });
  });

  test("アラートが無ければ通知しない", async () => {
    const { planner, store } = createTestPlanner();
    seed(store, [brandB]);
    const notifier = { notifyBudgetAlerts: jest.fn().mockResolvedValue(true) };

    const alerts = await scanBudgetAlerts(
      { context: planner.context, ledger: planner.ledger, statusMachine: planner.statusMachine },
      { notifier, thresholdPercent: 99 }
    );

    expect(alerts).toEqual([]);
    expect(notifier.notifyBudgetAlerts).not.toHaveBeenCalled();
  });

  test("planner の閾値設定を使う", async () => {
    const { planner, store } = createTestPlanner({ alertThresholdPercent: 50 });
    seed(store, [brandB]);

    const alerts = await planner.scanBudgetAlerts();

    expect(alerts.map((alert) => alert.kind)).toEqual(["monthly_budget_warning"]);
  });
});

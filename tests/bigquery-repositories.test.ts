/**
 * BigQuery リポジトリ ユニットテスト
 */

const mockQuery = jest.fn();
const mockCreateQueryJob = jest.fn();
const mockDataset = jest.fn();
const mockCreateDataset = jest.fn();

jest.mock("@google-cloud/bigquery", () => ({
  BigQuery: jest.fn().mockImplementation(() => ({
    query: mockQuery,
    createQueryJob: mockCreateQueryJob,
    dataset: mockDataset,
    createDataset: mockCreateDataset,
  })),
}));

jest.mock("uuid", () => ({
  v4: jest.fn(() => "test-uuid-1234"),
}));

// モック後にインポート
import { BigQuery } from "@google-cloud/bigquery";
import { createBigQueryRepositories, createTables } from "../src/bigquery";
import { toDate } from "../src/bigquery/row-mappers";
import { BigQueryError, NotFoundError } from "../src/errors";
import { CampaignStatus } from "../src/models";
import { parseMoney } from "../src/money";

const NOW = new Date("2024-06-12T10:30:00.000Z");

function mockDmlResult(affectedRows: string): void {
  mockCreateQueryJob.mockResolvedValueOnce([
    {
      getQueryResults: jest.fn().mockResolvedValue([[]]),
      getMetadata: jest
        .fn()
        .mockResolvedValue([{ statistics: { query: { numDmlAffectedRows: affectedRows } } }]),
    },
  ]);
}

const createRepositories = () =>
  createBigQueryRepositories(
    { projectId: "test-project", datasetId: "budget", location: "US" },
    new BigQuery()
  );

const brandRow = {
  id: "brand-1",
  name: "Brand One",
  daily_budget: "100",
  monthly_budget: "3000.5",
  daily_spend: "95.50",
  monthly_spend: "0",
  is_active: true,
  created_at: { value: "2024-06-01T00:00:00.000Z" },
  updated_at: { value: "2024-06-02T00:00:00.000Z" },
};

describe("BigQueryBrandRepository", () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, "debug").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  test("行を Brand に変換できる", async () => {
    mockQuery.mockResolvedValueOnce([[brandRow]]);

    const brand = await createRepositories().brands.findById("brand-1");

    expect(brand).toEqual({
      id: "brand-1",
      name: "Brand One",
      dailyBudget: parseMoney("100.00"),
      monthlyBudget: parseMoney("3000.50"),
      dailySpend: parseMoney("95.50"),
      monthlySpend: parseMoney("0"),
      isActive: true,
      createdAt: new Date("2024-06-01T00:00:00.000Z"),
      updatedAt: new Date("2024-06-02T00:00:00.000Z"),
    });
    expect(mockQuery).toHaveBeenCalledWith({
      query: expect.stringContaining("FROM `test-project.budget.brands` WHERE id = @id"),
      params: { id: "brand-1" },
      location: "US",
    });
  });

  test("該当行が無ければ null", async () => {
    mockQuery.mockResolvedValueOnce([[]]);

    await expect(createRepositories().brands.findById("missing")).resolves.toBeNull();
  });

  test("金額は文字列パラメータで INSERT する", async () => {
    mockDmlResult("1");

    const brand = await createRepositories().brands.create(
      { name: "New", dailyBudget: parseMoney("50"), monthlyBudget: parseMoney("1500.25") },
      NOW
    );

    expect(brand.id).toBe("test-uuid-1234");
    expect(brand.dailySpend).toBe(parseMoney("0"));
    expect(mockCreateQueryJob).toHaveBeenCalledWith(
      expect.objectContaining({
        params: {
          id: "test-uuid-1234",
          name: "New",
          daily_budget: "50.00",
          monthly_budget: "1500.25",
          is_active: true,
          now: NOW,
        },
      })
    );
  });

  test("更新対象が無ければ NotFoundError", async () => {
    mockDmlResult("0");

    await expect(
      createRepositories().brands.update("missing", { name: "X" }, NOW)
    ).rejects.toThrow(NotFoundError);
  });

  test("リセットは更新件数を返す", async () => {
    mockDmlResult("3");

    const count = await createRepositories().brands.resetSpend("monthly", NOW);

    expect(count).toBe(3);
    expect(mockCreateQueryJob).toHaveBeenCalledWith(
      expect.objectContaining({
        query: expect.stringContaining("SET monthly_spend = NUMERIC '0'"),
      })
    );
  });

  test("削除は消化イベント → キャンペーン → ブランドの順", async () => {
    mockDmlResult("2");
    mockDmlResult("1");
    mockDmlResult("1");

    await createRepositories().brands.delete("brand-1");

    const queries: string[] = mockCreateQueryJob.mock.calls.map(
      ([options]: [{ query: string }]) => options.query
    );
    expect(queries[0]).toContain("DELETE FROM `test-project.budget.spend_events`");
    expect(queries[1]).toContain("DELETE FROM `test-project.budget.campaigns`");
    expect(queries[2]).toContain("DELETE FROM `test-project.budget.brands`");
  });

  test("クエリ失敗は BigQueryError", async () => {
    mockQuery.mockRejectedValueOnce(new Error("boom"));

    await expect(createRepositories().brands.list()).rejects.toThrow(BigQueryError);
  });
});

describe("BigQueryCampaignRepository", () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  const campaignRow = {
    id: "campaign-1",
    brand_id: "brand-1",
    name: "Campaign One",
    status: "dayparting_paused",
    daily_spend: "1.5",
    monthly_spend: "20",
    dayparting_enabled: true,
    dayparting_schedule: '{"monday":[{"start":"09:00","end":"17:00"}]}',
    created_at: { value: "2024-06-01T00:00:00.000Z" },
    updated_at: { value: "2024-06-01T00:00:00.000Z" },
  };

  test("スケジュール JSON を復元できる", async () => {
    mockQuery.mockResolvedValueOnce([[campaignRow]]);

    const campaign = await createRepositories().campaigns.findById("campaign-1");

    expect(campaign?.status).toBe(CampaignStatus.DAYPARTING_PAUSED);
    expect(campaign?.dailySpend).toBe(parseMoney("1.50"));
    expect(campaign?.daypartingSchedule).toEqual({
      monday: [{ start: "09:00", end: "17:00" }],
    });
  });

  test("壊れたスケジュールは空、未知のステータスは INACTIVE として読む", async () => {
    mockQuery.mockResolvedValueOnce([
      [{ ...campaignRow, status: "archived", dayparting_schedule: "{" }],
    ]);

    const campaign = await createRepositories().campaigns.findById("campaign-1");

    expect(campaign?.status).toBe(CampaignStatus.INACTIVE);
    expect(campaign?.daypartingSchedule).toEqual({});
  });

  test("一覧はブランド・ステータスで絞り込める", async () => {
    mockQuery.mockResolvedValueOnce([[]]);

    await createRepositories().campaigns.list({ brandId: "brand-1", status: CampaignStatus.ACTIVE });

    expect(mockQuery).toHaveBeenCalledWith(
      expect.objectContaining({
        query: expect.stringContaining("WHERE brand_id = @brand_id AND status = @status"),
        params: { brand_id: "brand-1", status: "active" },
      })
    );
  });
});

describe("BigQuerySpendEventRepository", () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, "debug").mockImplementation(() => undefined);
  });

  const range = {
    from: new Date("2024-06-12T00:00:00.000Z"),
    to: new Date("2024-06-13T00:00:00.000Z"),
  };

  test("ブランドの消化合計を NUMERIC 文字列から読む", async () => {
    mockQuery.mockResolvedValueOnce([[{ total: "12.34" }]]);

    const total = await createRepositories().spendEvents.sumForBrand("brand-1", range);

    expect(total).toBe(parseMoney("12.34"));
    expect(mockQuery).toHaveBeenCalledWith(
      expect.objectContaining({
        params: { brand_id: "brand-1", from: range.from, to: range.to },
      })
    );
  });

  test("消化イベントを追記できる", async () => {
    mockDmlResult("1");

    await createRepositories().spendEvents.append({
      id: "event-1",
      campaignId: "campaign-1",
      amount: parseMoney("0.05"),
      timestamp: NOW,
      description: "",
    });

    expect(mockCreateQueryJob).toHaveBeenCalledWith(
      expect.objectContaining({
        params: {
          id: "event-1",
          campaign_id: "campaign-1",
          amount: "0.05",
          timestamp: NOW,
          description: "",
        },
      })
    );
  });
});

describe("toDate", () => {
  test("BigQueryTimestamp・文字列・Date を変換できる", () => {
    const iso = "2024-06-12T10:30:00.000Z";
    expect(toDate({ value: iso })).toEqual(new Date(iso));
    expect(toDate(iso)).toEqual(new Date(iso));
    expect(toDate(new Date(iso))).toEqual(new Date(iso));
  });
});

describe("createTables", () => {
  const config = { projectId: "test-project", datasetId: "budget", location: "US" };
  const mockCreateTable = jest.fn();

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    mockDataset.mockReturnValue({
      exists: jest.fn().mockResolvedValue([true]),
      table: jest.fn((name: string) => ({
        exists: jest.fn().mockResolvedValue([name === "brands"]),
      })),
      createTable: mockCreateTable,
    });
  });

  test("存在しないテーブルだけを作成する", async () => {
    const result = await createTables(new BigQuery(), config);

    expect(result).toEqual({ created: ["campaigns", "spend_events"], existing: ["brands"] });
    expect(mockCreateTable).toHaveBeenCalledTimes(2);
    expect(mockCreateDataset).not.toHaveBeenCalled();
  });

  test("ドライランでは作成しない", async () => {
    const result = await createTables(new BigQuery(), config, { dryRun: true });

    expect(result.created).toEqual(["campaigns", "spend_events"]);
    expect(mockCreateTable).not.toHaveBeenCalled();
  });
});

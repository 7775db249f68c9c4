/**
 * タイムゾーン変換 ユニットテスト
 */

import { getBudgetPeriodRanges, getLocalDayTime } from "../src/utils/time-zone";

describe("getBudgetPeriodRanges", () => {
  test("UTC の日次・月次範囲を返す", () => {
    const ranges = getBudgetPeriodRanges(new Date("2024-06-12T10:30:00.000Z"), "UTC");

    expect(ranges.daily.from.toISOString()).toBe("2024-06-12T00:00:00.000Z");
    expect(ranges.daily.to.toISOString()).toBe("2024-06-13T00:00:00.000Z");
    expect(ranges.monthly.from.toISOString()).toBe("2024-06-01T00:00:00.000Z");
    expect(ranges.monthly.to.toISOString()).toBe("2024-06-13T00:00:00.000Z");
  });

  test("Asia/Tokyo ではローカルの日付境界を使う", () => {
    // UTC 16:00 は東京の翌日 01:00
    const ranges = getBudgetPeriodRanges(new Date("2024-06-12T16:00:00.000Z"), "Asia/Tokyo");

    expect(ranges.daily.from.toISOString()).toBe("2024-06-12T15:00:00.000Z");
    expect(ranges.daily.to.toISOString()).toBe("2024-06-13T15:00:00.000Z");
    expect(ranges.monthly.from.toISOString()).toBe("2024-05-31T15:00:00.000Z");
  });

  test("月末の翌日境界は翌月1日になる", () => {
    const ranges = getBudgetPeriodRanges(new Date("2024-01-31T12:00:00.000Z"), "UTC");

    expect(ranges.daily.to.toISOString()).toBe("2024-02-01T00:00:00.000Z");
    expect(ranges.monthly.from.toISOString()).toBe("2024-01-01T00:00:00.000Z");
  });

  test("夏時間開始日は23時間の範囲になる", () => {
    const ranges = getBudgetPeriodRanges(
      new Date("2024-03-10T15:00:00.000Z"),
      "America/New_York"
    );

    expect(ranges.daily.from.toISOString()).toBe("2024-03-10T05:00:00.000Z");
    expect(ranges.daily.to.toISOString()).toBe("2024-03-11T04:00:00.000Z");
  });

  test("0:00 が存在しない日はその日の最初の時刻から始まる", () => {
    // America/Santiago は 2024-09-08 0:00 (-04) に 1:00 (-03) へ進む
    const dstDay = getBudgetPeriodRanges(
      new Date("2024-09-08T12:00:00.000Z"),
      "America/Santiago"
    );
    const dayBefore = getBudgetPeriodRanges(
      new Date("2024-09-07T12:00:00.000Z"),
      "America/Santiago"
    );

    expect(dstDay.daily.from.toISOString()).toBe("2024-09-08T04:00:00.000Z");
    expect(dstDay.daily.to.toISOString()).toBe("2024-09-09T03:00:00.000Z");
    expect(dayBefore.daily.from.toISOString()).toBe("2024-09-07T04:00:00.000Z");
    expect(dayBefore.daily.to.toISOString()).toBe("2024-09-08T04:00:00.000Z");
  });
});

describe("getLocalDayTime", () => {
  test("曜日と HH:MM を返す", () => {
    expect(getLocalDayTime(new Date("2024-06-12T09:05:00.000Z"), "UTC")).toEqual({
      weekday: "wednesday",
      time: "09:05",
    });
  });

  test("タイムゾーンで曜日が変わる", () => {
    expect(getLocalDayTime(new Date("2024-06-12T16:00:00.000Z"), "Asia/Tokyo")).toEqual({
      weekday: "thursday",
      time: "01:00",
    });
  });

  test("真夜中は 00:00 と表記する", () => {
    expect(getLocalDayTime(new Date("2024-06-12T00:00:00.000Z"), "UTC").time).toBe("00:00");
  });
});

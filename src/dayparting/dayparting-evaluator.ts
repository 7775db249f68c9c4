/**
 * Dayparting 判定
 *
 * 「現在時刻がキャンペーンの配信ウィンドウ内か」を判定する。
 * スケジュールの不正なエントリは例外にせず「その曜日はウィンドウなし」として扱い、
 * 多数のキャンペーンを回すスイープを止めない。
 */

import { Campaign } from "../models";
import { getLocalDayTime } from "../utils/time-zone";
import {
  DaypartingSchedule,
  DaypartingWindow,
  Weekday,
  isWeekday,
} from "./types";

// =============================================================================
// スケジュールの正規化
// =============================================================================

export function isDaypartingWindow(value: unknown): value is DaypartingWindow {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "start" in value &&
    "end" in value &&
    typeof value.start === "string" &&
    typeof value.end === "string"
  );
}

/**
 * 保存値（JSON）をスケジュールに変換
 *
 * - 曜日以外のキーは捨てる
 * - 配列でない曜日の値は捨てる
 * - start / end が文字列でないウィンドウは捨てる
 */
export function normalizeDaypartingSchedule(raw: unknown): DaypartingSchedule {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return {};
  }

  const schedule: DaypartingSchedule = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isWeekday(key) || !Array.isArray(value)) {
      continue;
    }
    schedule[key] = value
      .filter(isDaypartingWindow)
      .map((window) => ({ start: window.start, end: window.end }));
  }
  return schedule;
}

/**
 * 曜日のウィンドウ一覧（エントリなし・不正値は空）
 */
export function getWindowsForDay(
  schedule: DaypartingSchedule,
  weekday: Weekday
): DaypartingWindow[] {
  const windows: unknown = schedule[weekday];
  if (!Array.isArray(windows)) {
    return [];
  }
  return windows.filter(isDaypartingWindow);
}

// =============================================================================
// 判定
// =============================================================================

/**
 * "HH:MM" がいずれかのウィンドウに含まれるか（両端を含む、文字列比較）
 * ウィンドウの順序・重複は問わない
 */
export function isTimeWithinWindows(time: string, windows: DaypartingWindow[]): boolean {
  return windows.some((window) => window.start <= time && time <= window.end);
}

/**
 * 現在時刻がキャンペーンの配信ウィンドウ内か
 *
 * デイパーティング無効のキャンペーンは常に true
 */
export function isWithinDaypartingWindow(
  campaign: Pick<Campaign, "daypartingEnabled" | "daypartingSchedule">,
  now: Date,
  timeZone: string
): boolean {
  if (!campaign.daypartingEnabled) {
    return true;
  }

  const { weekday, time } = getLocalDayTime(now, timeZone);
  return isTimeWithinWindows(time, getWindowsForDay(campaign.daypartingSchedule, weekday));
}


/**
 * Dayparting（時間帯配信制御）モジュール
 *
 * 主要エクスポート:
 * - isWithinDaypartingWindow: 現在時刻が配信ウィンドウ内か
 * - normalizeDaypartingSchedule: 保存値（JSON）からスケジュールへの変換
 */

export {
  Weekday,
  WEEKDAYS,
  isWeekday,
  DaypartingWindow,
  DaypartingSchedule,
  LocalDayTime,
} from "./types";

export {
  isDaypartingWindow,
  normalizeDaypartingSchedule,
  getWindowsForDay,
  isTimeWithinWindows,
  isWithinDaypartingWindow,
} from "./dayparting-evaluator";

/**
 * Dayparting（時間帯配信制御） - 型定義
 *
 * キャンペーンの配信を曜日ごとの時間帯ウィンドウに制限する
 */

// =============================================================================
// 基本型
// =============================================================================

/**
 * 曜日（スケジュールのキー、英語小文字）
 */
export type Weekday =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

/**
 * 有効な曜日キー（月曜始まり）
 */
export const WEEKDAYS: readonly Weekday[] = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;

export function isWeekday(value: unknown): value is Weekday {
  return typeof value === "string" && WEEKDAYS.includes(value as Weekday);
}

/**
 * 配信ウィンドウ
 * start / end は "HH:MM"（24時間表記、ゼロ埋め）で、両端を含む
 */
export interface DaypartingWindow {
  start: string;
  end: string;
}

/**
 * 曜日ごとの配信ウィンドウ
 * キーが無い曜日はウィンドウ 0 件（終日停止）
 */
export type DaypartingSchedule = Partial<Record<Weekday, DaypartingWindow[]>>;

/**
 * 評価対象の現在時刻（設定タイムゾーンでのローカル表現）
 */
export interface LocalDayTime {
  weekday: Weekday;
  /** "HH:MM" */
  time: string;
}

/**
 * タイムゾーン変換ユーティリティ
 *
 * 予算の日・月境界とデイパーティングの曜日/時刻は、設定されたタイムゾーン
 * （TIME_ZONE）のローカル時刻で判定する
 */

import { Weekday, LocalDayTime, isWeekday } from "../dayparting/types";
import { TimeRange } from "../models";

/**
 * 指定タイムゾーンでの日時の構成要素
 */
export interface ZonedParts {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: Weekday;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      weekday: "long",
      hourCycle: "h23",
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * 日時を指定タイムゾーンの構成要素に分解
 */
export function getZonedParts(date: Date, timeZone: string): ZonedParts {
  const values: Record<string, string> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    values[part.type] = part.value;
  }

  const weekday = (values.weekday ?? "").toLowerCase();
  if (!isWeekday(weekday)) {
    throw new Error(`Unexpected weekday from Intl: ${values.weekday}`);
  }

  return {
    year: Number(values.year),
    month: Number(values.month),
    day: Number(values.day),
    hour: Number(values.hour),
    minute: Number(values.minute),
    second: Number(values.second),
    weekday,
  };
}

/**
 * 曜日（英語小文字）と "HH:MM" を取得
 */
export function getLocalDayTime(date: Date, timeZone: string): LocalDayTime {
  const parts = getZonedParts(date, timeZone);
  const hh = String(parts.hour).padStart(2, "0");
  const mm = String(parts.minute).padStart(2, "0");
  return { weekday: parts.weekday, time: `${hh}:${mm}` };
}

/**
 * UTC からのオフセット（ミリ秒）
 */
function getOffsetMs(date: Date, timeZone: string): number {
  const parts = getZonedParts(date, timeZone);
  const asUtc = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second
  );
  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  return asUtc - wholeSeconds;
}

/**
 * instant のローカル日付が target（UTC 上の年月日）と一致するか
 */
function isSameLocalDate(instant: Date, target: Date, timeZone: string): boolean {
  const parts = getZonedParts(instant, timeZone);
  return (
    parts.year === target.getUTCFullYear() &&
    parts.month === target.getUTCMonth() + 1 &&
    parts.day === target.getUTCDate()
  );
}

/**
 * ローカル日付の 0:00 に当たる UTC 時刻
 * monthIndex / day は範囲外でも Date.UTC と同様に繰り上がる
 */
export function zonedMidnight(
  year: number,
  monthIndex: number,
  day: number,
  timeZone: string
): Date {
  const guess = Date.UTC(year, monthIndex, day);
  const firstOffset = getOffsetMs(new Date(guess), timeZone);
  let instant = guess - firstOffset;

  // DST 切り替え日はオフセットが変わるため再計算
  const secondOffset = getOffsetMs(new Date(instant), timeZone);
  if (secondOffset !== firstOffset) {
    const corrected = guess - secondOffset;
    // 0:00 が存在しない日（0:00 に時計が進む）は補正すると前日に戻るので、
    // その日の最初の時刻（guess - firstOffset）のままにする
    if (isSameLocalDate(new Date(corrected), new Date(guess), timeZone)) {
      instant = corrected;
    }
  }
  return new Date(instant);
}

/**
 * 現在時刻を含む日次・月次の集計範囲
 *
 * - 日次: 今日 0:00 〜 明日 0:00
 * - 月次: 今月1日 0:00 〜 明日 0:00
 */
export function getBudgetPeriodRanges(
  now: Date,
  timeZone: string
): { daily: TimeRange; monthly: TimeRange } {
  const { year, month, day } = getZonedParts(now, timeZone);
  const startOfDay = zonedMidnight(year, month - 1, day, timeZone);
  const startOfTomorrow = zonedMidnight(year, month - 1, day + 1, timeZone);
  const startOfMonth = zonedMidnight(year, month - 1, 1, timeZone);

  return {
    daily: { from: startOfDay, to: startOfTomorrow },
    monthly: { from: startOfMonth, to: startOfTomorrow },
  };
}

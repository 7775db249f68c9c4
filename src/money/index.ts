/**
 * 金額（固定小数点）ユーティリティ
 *
 * 通貨は小数2桁の固定小数点として扱い、メモリ上は最小単位（セント）の bigint で保持する。
 * 浮動小数点は消化率（%）の表示用計算にのみ使う。
 */

import { BUDGET } from "../constants";
import { ValidationError } from "../errors";

/** 金額（最小単位の整数） */
export type Money = bigint;

export const ZERO: Money = BigInt(0);

const MINOR_UNITS_PER_MAJOR: bigint = BigInt(10) ** BigInt(BUDGET.CURRENCY_SCALE);

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

/**
 * 入力値を金額に変換（失敗時は null）
 *
 * 受け付ける形式: "95", "95.5", "95.00", 95, 95.5
 * bigint は既に最小単位の Money とみなしてそのまま返す
 * 小数3桁以上や指数表記は受け付けない
 */
export function tryParseMoney(value: unknown): Money | null {
  let text: string;
  if (typeof value === "string") {
    text = value.trim();
  } else if (typeof value === "number" && Number.isFinite(value)) {
    text = String(value);
  } else if (typeof value === "bigint") {
    return value;
  } else {
    return null;
  }

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const [, sign, integerPart, fractionPart = ""] = match;
  const minor =
    BigInt(integerPart) * MINOR_UNITS_PER_MAJOR +
    BigInt(fractionPart.padEnd(BUDGET.CURRENCY_SCALE, "0"));

  return sign === "-" ? -minor : minor;
}

/**
 * 入力値を金額に変換
 * @throws {ValidationError} 金額として解釈できない場合
 */
export function parseMoney(value: unknown, field: string = "amount"): Money {
  const parsed = tryParseMoney(value);
  if (parsed === null) {
    throw ValidationError.forField(
      field,
      `${field} must be a decimal amount with at most ${BUDGET.CURRENCY_SCALE} fractional digits`,
      value
    );
  }
  return parsed;
}

/**
 * 金額を "1234.50" 形式の文字列にする
 */
export function formatMoney(value: Money): string {
  const negative = value < ZERO;
  const abs = negative ? -value : value;
  const integerPart = abs / MINOR_UNITS_PER_MAJOR;
  const fractionPart = (abs % MINOR_UNITS_PER_MAJOR)
    .toString()
    .padStart(BUDGET.CURRENCY_SCALE, "0");
  return `${negative ? "-" : ""}${integerPart}.${fractionPart}`;
}

export function sumMoney(values: Iterable<Money>): Money {
  let total = ZERO;
  for (const value of values) {
    total += value;
  }
  return total;
}

export function maxMoney(a: Money, b: Money): Money {
  return a > b ? a : b;
}

/**
 * 整数部の桁数（DECIMAL(p, 2) の精度チェック用）
 */
export function integerDigits(value: Money): number {
  const abs = value < ZERO ? -value : value;
  return (abs / MINOR_UNITS_PER_MAJOR).toString().length;
}

/**
 * 予算に対する消化率（%）
 * 予算 0 の場合はゼロ除算せず 0 を返す
 */
export function percentUsed(spend: Money, budget: Money): number {
  if (budget === ZERO) {
    return 0;
  }
  return Number(spend * BigInt(100)) / Number(budget);
}

/**
 * spend が budget の percent% 以上か（固定小数点で比較）
 * percent は小数2桁まで考慮する
 */
export function isAtLeastPercentOf(spend: Money, budget: Money, percent: number): boolean {
  const basisPoints = BigInt(Math.round(percent * 100));
  return spend * BigInt(10000) >= budget * basisPoints;
}

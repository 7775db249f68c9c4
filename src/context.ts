/**
 * ドメインサービス共通の実行コンテキスト
 */

import { StructuredLogger } from "./logger";
import { Repositories } from "./repositories/interfaces";

/** 現在時刻の取得（テストで固定するため注入） */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface PlannerContext {
  repositories: Repositories;
  /** 日・月境界、デイパーティングの判定に使う IANA タイムゾーン */
  timeZone: string;
  clock: Clock;
  logger: StructuredLogger;
}

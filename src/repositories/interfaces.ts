/**
 * リポジトリインターフェース
 *
 * 永続化の実装（BigQuery）とドメインロジックを分離する。
 * テストでは同じインターフェースのインメモリ実装を使う。
 */

import {
  Brand,
  BrandUpdate,
  BudgetPeriod,
  Campaign,
  CampaignStatus,
  CampaignUpdate,
  NewBrand,
  NewCampaign,
  SpendEvent,
  SpendTotals,
  TimeRange,
} from "../models";
import { Money } from "../money";

export interface BrandRepository {
  findById(id: string): Promise<Brand | null>;
  findByName(name: string): Promise<Brand | null>;
  /** 名前順 */
  list(filter?: { activeOnly?: boolean }): Promise<Brand[]>;
  create(input: NewBrand, now: Date): Promise<Brand>;
  update(id: string, patch: BrandUpdate, now: Date): Promise<Brand>;
  updateSpendTotals(id: string, totals: SpendTotals, now: Date): Promise<void>;
  /** 全ブランドの指定期間の消化額を 0 にする。更新件数を返す */
  resetSpend(period: BudgetPeriod, now: Date): Promise<number>;
  /** 配下のキャンペーン・消化イベントも削除する */
  delete(id: string): Promise<void>;
  count(): Promise<number>;
}

export interface CampaignRepository {
  findById(id: string): Promise<Campaign | null>;
  findByBrandAndName(brandId: string, name: string): Promise<Campaign | null>;
  /** ブランドID・名前順 */
  list(filter?: { brandId?: string; status?: CampaignStatus }): Promise<Campaign[]>;
  create(input: NewCampaign, now: Date): Promise<Campaign>;
  update(id: string, patch: CampaignUpdate, now: Date): Promise<Campaign>;
  updateSpendTotals(id: string, totals: SpendTotals, now: Date): Promise<void>;
  updateStatus(id: string, status: CampaignStatus, now: Date): Promise<void>;
  /** 全キャンペーンの指定期間の消化額を 0 にする。更新件数を返す */
  resetSpend(period: BudgetPeriod, now: Date): Promise<number>;
  /** 配下の消化イベントも削除する */
  delete(id: string): Promise<void>;
  count(): Promise<number>;
}

export interface SpendEventRepository {
  append(event: SpendEvent): Promise<void>;
  /** キャンペーンの範囲内の消化合計 */
  sumForCampaign(campaignId: string, range: TimeRange): Promise<Money>;
  /** ブランド配下の全キャンペーンの範囲内の消化合計 */
  sumForBrand(brandId: string, range: TimeRange): Promise<Money>;
  /** 新しい順 */
  listForCampaign(campaignId: string, limit: number): Promise<SpendEvent[]>;
}

export interface Repositories {
  brands: BrandRepository;
  campaigns: CampaignRepository;
  spendEvents: SpendEventRepository;
}

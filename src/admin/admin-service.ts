/**
 * 管理操作（ブランド・キャンペーンの作成・更新・削除、手動ステータス設定）
 *
 * ブランド名は全体で一意、キャンペーン名はブランド内で一意
 */

import { PlannerContext } from "../context";
import { ConflictError, NotFoundError } from "../errors";
import {
  Brand,
  BrandUpdate,
  Campaign,
  CampaignStatus,
  CampaignUpdate,
  ManualCampaignStatus,
  NewBrand,
  NewCampaign,
  SpendEvent,
} from "../models";

export class AdminService {
  constructor(private readonly context: PlannerContext) {}

  private get repositories() {
    return this.context.repositories;
  }

  // ===========================================================================
  // ブランド
  // ===========================================================================

  async createBrand(input: NewBrand): Promise<Brand> {
    await this.assertBrandNameAvailable(input.name);
    const brand = await this.repositories.brands.create(input, this.context.clock());
    this.context.logger.info("Brand created", { brandId: brand.id, name: brand.name });
    return brand;
  }

  listBrands(filter: { activeOnly?: boolean } = {}): Promise<Brand[]> {
    return this.repositories.brands.list(filter);
  }

  async getBrand(id: string): Promise<Brand> {
    const brand = await this.repositories.brands.findById(id);
    if (!brand) {
      throw new NotFoundError("Brand", id);
    }
    return brand;
  }

  async updateBrand(id: string, patch: BrandUpdate): Promise<Brand> {
    const current = await this.getBrand(id);
    if (patch.name !== undefined && patch.name !== current.name) {
      await this.assertBrandNameAvailable(patch.name);
    }
    const updated = await this.repositories.brands.update(id, patch, this.context.clock());
    this.context.logger.info("Brand updated", { brandId: id, fields: Object.keys(patch) });
    return updated;
  }

  /**
   * 配下のキャンペーン・消化イベントごと削除
   */
  async deleteBrand(id: string): Promise<void> {
    await this.getBrand(id);
    await this.repositories.brands.delete(id);
    this.context.logger.info("Brand deleted", { brandId: id });
  }

  private async assertBrandNameAvailable(name: string): Promise<void> {
    const existing = await this.repositories.brands.findByName(name);
    if (existing) {
      throw new ConflictError(`Brand name already exists: ${name}`, { field: "name", name });
    }
  }

  // ===========================================================================
  // キャンペーン
  // ===========================================================================

  async createCampaign(input: NewCampaign): Promise<Campaign> {
    await this.getBrand(input.brandId);
    await this.assertCampaignNameAvailable(input.brandId, input.name);
    const campaign = await this.repositories.campaigns.create(input, this.context.clock());
    this.context.logger.info("Campaign created", {
      campaignId: campaign.id,
      brandId: campaign.brandId,
      name: campaign.name,
    });
    return campaign;
  }

  listCampaigns(filter: { brandId?: string; status?: CampaignStatus } = {}): Promise<Campaign[]> {
    return this.repositories.campaigns.list(filter);
  }

  async getCampaign(id: string): Promise<Campaign> {
    const campaign = await this.repositories.campaigns.findById(id);
    if (!campaign) {
      throw new NotFoundError("Campaign", id);
    }
    return campaign;
  }

  /**
   * 名前・デイパーティング設定の更新
   * ステータスは setCampaignStatus か評価でのみ変わる
   */
  async updateCampaign(id: string, patch: CampaignUpdate): Promise<Campaign> {
    const current = await this.getCampaign(id);
    if (patch.name !== undefined && patch.name !== current.name) {
      await this.assertCampaignNameAvailable(current.brandId, patch.name);
    }
    const updated = await this.repositories.campaigns.update(id, patch, this.context.clock());
    this.context.logger.info("Campaign updated", { campaignId: id, fields: Object.keys(patch) });
    return updated;
  }

  async deleteCampaign(id: string): Promise<void> {
    await this.getCampaign(id);
    await this.repositories.campaigns.delete(id);
    this.context.logger.info("Campaign deleted", { campaignId: id });
  }

  /**
   * オペレーターによる手動ステータス設定
   *
   * PAUSED / INACTIVE は次回の評価でも自動では解除されない（ブランド・予算・時間帯の
   * 条件による上書きは除く）
   */
  async setCampaignStatus(id: string, status: ManualCampaignStatus): Promise<Campaign> {
    const campaign = await this.getCampaign(id);
    const now = this.context.clock();
    await this.repositories.campaigns.updateStatus(id, status, now);

    this.context.logger.info("Campaign status set manually", {
      campaignId: id,
      from: campaign.status,
      to: status,
    });

    return { ...campaign, status, updatedAt: now };
  }

  async listSpendEvents(campaignId: string, limit: number): Promise<SpendEvent[]> {
    await this.getCampaign(campaignId);
    return this.repositories.spendEvents.listForCampaign(campaignId, limit);
  }

  private async assertCampaignNameAvailable(brandId: string, name: string): Promise<void> {
    const existing = await this.repositories.campaigns.findByBrandAndName(brandId, name);
    if (existing) {
      throw new ConflictError(`Campaign name already exists in brand: ${name}`, {
        field: "name",
        brandId,
        name,
      });
    }
  }
}

/**
 * 広告費の記録
 *
 * 消化イベントを追記し、キャンペーン → ブランドの順に合計を再計算してから
 * キャンペーンのステータスを評価する（記録した消化で即座に BUDGET_EXCEEDED になりうる）
 */

import { v4 as uuidv4 } from "uuid";
import { PlannerContext } from "../context";
import { NotFoundError, ValidationError } from "../errors";
import { SpendEvent } from "../models";
import { Money, ZERO, formatMoney, parseMoney } from "../money";
import { FIELD_LIMITS } from "../constants";
import { CampaignStatusMachine } from "../status/campaign-status-machine";
import { BudgetLedger } from "./budget-ledger";

export class SpendRecorder {
  constructor(
    private readonly context: PlannerContext,
    private readonly ledger: BudgetLedger,
    private readonly statusMachine: CampaignStatusMachine
  ) {}

  /**
   * 消化を記録する
   *
   * @param amount - Money、または "12.34" 形式の文字列・数値
   * @throws {NotFoundError} キャンペーンが存在しない場合
   * @throws {ValidationError} 金額が負・不正、説明が長すぎる場合（副作用なし）
   */
  async record(
    campaignId: string,
    amount: Money | string | number,
    description: string = ""
  ): Promise<SpendEvent> {
    const { campaigns, brands, spendEvents } = this.context.repositories;

    const campaign = await campaigns.findById(campaignId);
    if (!campaign) {
      throw new NotFoundError("Campaign", campaignId);
    }

    const value = typeof amount === "bigint" ? amount : parseMoney(amount, "amount");
    if (value < ZERO) {
      throw ValidationError.forField("amount", "amount must not be negative", formatMoney(value));
    }
    if (description.length > FIELD_LIMITS.SPEND_DESCRIPTION_MAX) {
      throw ValidationError.forField(
        "description",
        `description must be at most ${FIELD_LIMITS.SPEND_DESCRIPTION_MAX} characters`
      );
    }

    const brand = await brands.findById(campaign.brandId);
    if (!brand) {
      throw new NotFoundError("Brand", campaign.brandId);
    }

    const event: SpendEvent = {
      id: uuidv4(),
      campaignId: campaign.id,
      amount: value,
      timestamp: this.context.clock(),
      description,
    };
    await spendEvents.append(event);

    this.context.logger.info("Spend recorded", {
      spendEventId: event.id,
      campaignId: campaign.id,
      brandId: brand.id,
      amount: formatMoney(value),
    });

    const recomputedCampaign = await this.ledger.recomputeCampaign(campaign);
    const recomputedBrand = await this.ledger.recomputeBrand(brand);
    await this.statusMachine.evaluate(recomputedCampaign, recomputedBrand);

    return event;
  }
}

/**
 * キャンペーンステータス一括評価ジョブ
 */

import { Brand, CampaignStatus } from "../models";
import { StatusEvaluation } from "../status/campaign-status-machine";
import { JobDependencies, StatusChangeTally, emptyTally } from "./types";

/**
 * 評価結果を集計に加える（変化したものだけ、変化後のステータス別）
 */
export function tallyStatusChange(tally: StatusChangeTally, evaluation: StatusEvaluation): void {
  if (!evaluation.changed) {
    return;
  }
  switch (evaluation.campaign.status) {
    case CampaignStatus.ACTIVE:
      tally.activated++;
      break;
    case CampaignStatus.BUDGET_EXCEEDED:
      tally.budgetPaused++;
      break;
    case CampaignStatus.DAYPARTING_PAUSED:
      tally.daypartingPaused++;
      break;
    case CampaignStatus.INACTIVE:
      tally.deactivated++;
      break;
    default:
      break;
  }
}

/**
 * 全キャンペーンを評価し、評価結果の一覧と集計を返す
 */
export async function sweepCampaignStatuses(
  deps: JobDependencies
): Promise<{ tally: StatusChangeTally; evaluations: StatusEvaluation[] }> {
  const { repositories } = deps.context;

  const brands = await repositories.brands.list();
  const brandsById = new Map<string, Brand>(brands.map((brand) => [brand.id, brand]));
  const campaigns = await repositories.campaigns.list();

  const tally = emptyTally();
  const evaluations: StatusEvaluation[] = [];

  for (const campaign of campaigns) {
    const evaluation = await deps.statusMachine.evaluate(
      campaign,
      brandsById.get(campaign.brandId)
    );
    tallyStatusChange(tally, evaluation);
    evaluations.push(evaluation);
  }

  return { tally, evaluations };
}

/**
 * ステータススイープ
 */
export async function runStatusSweep(deps: JobDependencies): Promise<StatusChangeTally> {
  const log = deps.context.logger.child({ job: "status-sweep" });
  const startedAt = Date.now();

  const { tally, evaluations } = await sweepCampaignStatuses(deps);

  log.info("Campaign status update completed", {
    campaignsEvaluated: evaluations.length,
    statusChanges: tally,
    durationMs: Date.now() - startedAt,
  });

  return tally;
}

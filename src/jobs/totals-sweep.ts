/**
 * 消化合計の一括再計算ジョブ
 *
 * キャンペーン → ブランドの順に再計算する。ブランドの合計は消化イベントから直接
 * 集計するため順序は正しさに影響しないが、途中で読むと両者が一時的に食い違う。
 */

import { JobDependencies, TotalsSweepResult } from "./types";

export async function runTotalsSweep(deps: JobDependencies): Promise<TotalsSweepResult> {
  const log = deps.context.logger.child({ job: "recompute-totals" });
  const { repositories } = deps.context;
  const startedAt = Date.now();

  const campaigns = await repositories.campaigns.list();
  for (const campaign of campaigns) {
    await deps.ledger.recomputeCampaign(campaign);
  }

  const brands = await repositories.brands.list();
  for (const brand of brands) {
    await deps.ledger.recomputeBrand(brand);
  }

  const result: TotalsSweepResult = {
    campaignsRecomputed: campaigns.length,
    brandsRecomputed: brands.length,
  };

  log.info("Spend totals recalculation completed", {
    ...result,
    durationMs: Date.now() - startedAt,
  });

  return result;
}

import { serializeCampaignConfig } from '../campaign/campaignConfig';
import type { AccountView, CampaignStatus, ContributionRange } from '../campaign/types';
import type { CampaignSummary } from '../services/CampaignService';

export function serializeRange(range: ContributionRange) {
  return { min: range.min.toString(), max: range.max.toString() };
}

export function serializeStatus(status: CampaignStatus) {
  return {
    ...status,
    depositTotal: status.depositTotal.toString(),
    yieldTotal: status.yieldTotal.toString(),
    totalWithdrawn: status.totalWithdrawn.toString(),
    feesCollected: {
      upfront: status.feesCollected.upfront.toString(),
      payout: status.feesCollected.payout.toString(),
    },
  };
}

export function serializeCampaignSummary(summary: CampaignSummary) {
  return {
    ...summary,
    config: serializeCampaignConfig(summary.config),
    status: serializeStatus(summary.status),
  };
}

export function serializeAccountView(view: AccountView) {
  return {
    ...view,
    shares: view.shares.toString(),
    withdrawn: view.withdrawn.toString(),
    yieldBalance: view.yieldBalance.toString(),
    range: serializeRange(view.range),
  };
}

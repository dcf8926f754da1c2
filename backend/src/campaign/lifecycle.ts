import { STALE_FUNDS_SECONDS } from '../config/constants';
import type { CampaignConfig, CampaignState } from './types';

export interface LifecycleView {
  config: CampaignConfig;
  state: CampaignState;
  depositTotal: bigint;
  now: number;
}

export function isGoalMinMet({ config, depositTotal }: LifecycleView): boolean {
  return depositTotal >= config.goalMin;
}

export function isGoalMaxMet({ config, depositTotal }: LifecycleView): boolean {
  return depositTotal >= config.goalMax;
}

export function hasEnded({ config, now }: LifecycleView): boolean {
  return now >= config.endsAt;
}

/** The stale-funds failsafe opens exactly `STALE_FUNDS_SECONDS` after the end. */
export function isStale({ config, now }: LifecycleView): boolean {
  return now >= config.endsAt + STALE_FUNDS_SECONDS;
}

export function isContributionAllowed(view: LifecycleView): boolean {
  return (
    view.state === 'funding'
    && view.now >= view.config.startsAt
    && view.now < view.config.endsAt
    && !isGoalMaxMet(view)
  );
}

export function isSettlementAllowed(view: LifecycleView): boolean {
  if (view.state !== 'funding') return false;
  return isGoalMaxMet(view) || (hasEnded(view) && isGoalMinMet(view));
}

export function isFailureAllowed(view: LifecycleView): boolean {
  if (view.state !== 'funding' || !hasEnded(view)) return false;
  return !isGoalMinMet(view) || isStale(view);
}

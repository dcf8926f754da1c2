import { isContributionAllowed, type LifecycleView } from './lifecycle';
import type { ContributionRange } from './types';

const CLOSED: ContributionRange = { min: 0n, max: 0n };

/**
 * The legal next single contribution for an account holding `balance`
 * shares. Once the room left under `goalMax` is smaller than the
 * per-account minimum, any positive amount may top off the raise.
 */
export function contributionRangeFor(view: LifecycleView, balance: bigint): ContributionRange {
  if (!isContributionAllowed(view)) return CLOSED;

  const { contributionMin, contributionMax, goalMax } = view.config;
  const remainingGoal = goalMax - view.depositTotal;
  const personalRoom = contributionMax - balance;
  const max = personalRoom < remainingGoal ? personalRoom : remainingGoal;

  let min = contributionMin - balance;
  if (min < 1n || remainingGoal < contributionMin) min = 1n;

  // dead zone: nothing reachable is both legal and at least the minimum
  if (max <= 0n || max < min) return CLOSED;
  return { min, max };
}

/** True when the raise can only be closed by an amount below the per-account minimum. */
export function isTopOff(view: LifecycleView): boolean {
  return view.config.goalMax - view.depositTotal < view.config.contributionMin;
}

const DAY_SECONDS = 24 * 60 * 60;

export const BIPS_DENOMINATOR = 10_000n;

/** 12.5%, the ceiling for both the upfront and the payout fee. */
export const MAX_FEE_BIPS = 1250;

export const MAX_CAMPAIGN_WINDOW_SECONDS = 90 * DAY_SECONDS;

/** After this long past the end, an unsettled campaign may be released as failed. */
export const STALE_FUNDS_SECONDS = 90 * DAY_SECONDS;

export function parsePositiveIntegerEnv(raw: string | undefined, fallback: number): number {
  if (!raw || !raw.trim()) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0 || !Number.isInteger(parsed)) {
    return fallback;
  }
  return parsed;
}

export function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (!raw || !raw.trim()) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

/**
 * Every rejection raised by a campaign carries a kebab-case code, which is
 * also the error message and what the HTTP layer reports back.
 */
export class CampaignError extends Error {
  readonly code: string;

  constructor(code: string, options?: { cause?: unknown }) {
    super(code, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/** Rejected campaign parameters; initialization does not happen. */
export class ConfigError extends CampaignError {}

/** Outside the contribution or settlement timing. */
export class WindowError extends CampaignError {}

/** Operation not valid in the current lifecycle state. */
export class StateError extends CampaignError {}

/** Per-account or global contribution limits violated. */
export class BoundsError extends CampaignError {}

/** The value transport failed or delivered an unexpected amount. */
export class TransportError extends CampaignError {}

/** Not enough shares, allowance or claim for the request. */
export class BalanceError extends CampaignError {}

export function httpStatusFor(err: unknown): number {
  if (err instanceof StateError || err instanceof WindowError) return 409;
  if (err instanceof TransportError) return 502;
  return 400;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

import { MAX_CAMPAIGN_WINDOW_SECONDS, MAX_FEE_BIPS } from '../config/constants';
import { ConfigError } from './errors';
import type { CampaignConfig, Denomination } from './types';

/**
 * Rejects any parameter set a campaign cannot safely run with. The goal-range
 * rule keeps the last contributor able to close the raise: with a minimum
 * contribution at or above the gap between the goals, `goalMax` could become
 * unreachable without overshooting.
 */
export function validateCampaignConfig(config: CampaignConfig): CampaignConfig {
  if (!config.recipient.trim()) {
    throw new ConfigError('recipient-required');
  }

  if (config.goalMin <= 0n) throw new ConfigError('goal-min-invalid');
  if (config.goalMax < config.goalMin) throw new ConfigError('goal-range-invalid');

  if (config.contributionMin < 1n) throw new ConfigError('contribution-min-invalid');
  if (config.contributionMax < config.contributionMin) {
    throw new ConfigError('contribution-range-invalid');
  }
  if (!(config.contributionMin < config.goalMax - config.goalMin || config.contributionMin === 1n)) {
    throw new ConfigError('contribution-min-too-large');
  }

  if (!Number.isInteger(config.startsAt) || !Number.isInteger(config.endsAt)) {
    throw new ConfigError('time-window-invalid');
  }
  if (config.startsAt >= config.endsAt) throw new ConfigError('time-window-invalid');
  if (config.endsAt - config.startsAt > MAX_CAMPAIGN_WINDOW_SECONDS) {
    throw new ConfigError('time-window-too-long');
  }

  validateFeeBips(config.upfrontFeeBips);
  validateFeeBips(config.payoutFeeBips);
  if (config.feeCollector === null) {
    if (config.upfrontFeeBips > 0 || config.payoutFeeBips > 0) {
      throw new ConfigError('fee-collector-required');
    }
  } else {
    if (!config.feeCollector.trim()) throw new ConfigError('fee-collector-invalid');
    if (config.feeCollector === config.recipient) throw new ConfigError('fee-collector-is-recipient');
    if (config.upfrontFeeBips === 0 && config.payoutFeeBips === 0) {
      throw new ConfigError('fee-collector-without-fees');
    }
  }

  if (config.denomination.kind === 'token' && !config.denomination.token.trim()) {
    throw new ConfigError('denomination-invalid');
  }

  return config;
}

function validateFeeBips(bips: number): void {
  if (!Number.isInteger(bips) || bips < 0) throw new ConfigError('fee-bips-invalid');
  if (bips > MAX_FEE_BIPS) throw new ConfigError('fee-bips-too-high');
}

/**
 * Reads a config from a JSON body. Amounts arrive as decimal strings (or safe
 * integers), times as unix seconds.
 */
export function parseCampaignConfig(input: unknown): CampaignConfig {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new ConfigError('config-required');
  }
  const body = input as Record<string, unknown>;

  const config: CampaignConfig = {
    recipient: requireString(body.recipient, 'recipient-required'),
    feeCollector:
      body.feeCollector === undefined || body.feeCollector === null
        ? null
        : requireString(body.feeCollector, 'fee-collector-invalid'),
    upfrontFeeBips: optionalInteger(body.upfrontFeeBips, 'fee-bips-invalid'),
    payoutFeeBips: optionalInteger(body.payoutFeeBips, 'fee-bips-invalid'),
    goalMin: parseUnits(body.goalMin, 'goal-min-invalid'),
    goalMax: parseUnits(body.goalMax, 'goal-range-invalid'),
    contributionMin: parseUnits(body.contributionMin, 'contribution-min-invalid'),
    contributionMax: parseUnits(body.contributionMax, 'contribution-range-invalid'),
    startsAt: requireInteger(body.startsAt, 'time-window-invalid'),
    endsAt: requireInteger(body.endsAt, 'time-window-invalid'),
    denomination: parseDenomination(body.denomination),
  };
  return validateCampaignConfig(config);
}

function parseDenomination(value: unknown): Denomination {
  if (value === undefined || value === null || value === 'native') return { kind: 'native' };
  if (typeof value === 'object' && !Array.isArray(value)) {
    const { kind, token } = value as { kind?: unknown; token?: unknown };
    if (kind === 'native') return { kind: 'native' };
    if (kind === 'token' && typeof token === 'string' && token.trim()) {
      return { kind: 'token', token: token.trim() };
    }
  }
  throw new ConfigError('denomination-invalid');
}

function requireString(value: unknown, code: string): string {
  if (typeof value !== 'string' || !value.trim()) throw new ConfigError(code);
  return value.trim();
}

function requireInteger(value: unknown, code: string): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) throw new ConfigError(code);
  return value;
}

function optionalInteger(value: unknown, code: string): number {
  return value === undefined || value === null ? 0 : requireInteger(value, code);
}

function parseUnits(value: unknown, code: string): bigint {
  if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return BigInt(value.trim());
  throw new ConfigError(code);
}

export type SerializedCampaignConfig = Omit<
  CampaignConfig,
  'goalMin' | 'goalMax' | 'contributionMin' | 'contributionMax'
> & {
  goalMin: string;
  goalMax: string;
  contributionMin: string;
  contributionMax: string;
};

/** JSON-safe form accepted back by {@link parseCampaignConfig}. */
export function serializeCampaignConfig(config: CampaignConfig): SerializedCampaignConfig {
  return {
    ...config,
    goalMin: config.goalMin.toString(),
    goalMax: config.goalMax.toString(),
    contributionMin: config.contributionMin.toString(),
    contributionMax: config.contributionMax.toString(),
  };
}

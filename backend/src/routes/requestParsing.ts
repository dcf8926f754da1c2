import type { Response } from 'express';
import { BoundsError, BalanceError, errorMessage, httpStatusFor } from '../campaign/errors';
import { CampaignNotFoundError } from '../services/CampaignService';

/** Accepts a decimal string or a safe integer; amounts never travel as floats. */
export function parseAmount(value: unknown, field: string): bigint {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return BigInt(value.trim());
  throw new BoundsError(`${field}-invalid`);
}

export function parseAccount(value: unknown, field: string): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new BalanceError(`${field}-required`);
  }
  return value.trim();
}

export function sendError(res: Response, err: unknown) {
  if (err instanceof CampaignNotFoundError) {
    return res.status(404).json({ error: err.code });
  }
  return res.status(httpStatusFor(err)).json({ error: errorMessage(err) });
}

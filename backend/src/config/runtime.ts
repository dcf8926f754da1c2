import { ManualClock, systemClock, type Clock } from '../campaign/clock';
import { parseBooleanEnv } from './constants';

export type ClockMode = 'system' | 'manual';

export function readClockMode(): ClockMode {
  const raw = (process.env.CROWDSHARE_CLOCK || 'system').trim().toLowerCase();
  if (raw === 'system' || raw === 'manual') return raw;
  throw new Error('CROWDSHARE_CLOCK must be "system" or "manual"');
}

export function createRuntimeClock(mode: ClockMode = readClockMode()): Clock {
  return mode === 'manual' ? new ManualClock() : systemClock;
}

/** Debug routes (value book faucet, clock controls) never run in production. */
export function debugRoutesEnabled(): boolean {
  if (process.env.NODE_ENV === 'production') return false;
  return parseBooleanEnv(process.env.CROWDSHARE_DEBUG_ROUTES, true);
}

export function readAllowedOrigins(): string[] {
  return (process.env.CORS_ORIGINS || '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

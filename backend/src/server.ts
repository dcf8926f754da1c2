import fs from 'fs';
import path from 'path';

function loadDotEnv(): void {
  const envPath = path.resolve(process.cwd(), '.env');
  if (!fs.existsSync(envPath)) {
    return;
  }

  const contents = fs.readFileSync(envPath, 'utf8');
  for (const line of contents.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const separatorIndex = trimmed.indexOf('=');
    if (separatorIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, separatorIndex).trim();
    if (!key) {
      continue;
    }

    let value = trimmed.slice(separatorIndex + 1).trim();
    const hasMatchingQuotes =
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"));
    if (hasMatchingQuotes) {
      value = value.slice(1, -1);
    }

    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }

  if (process.env.PORT === undefined && process.env.API_PORT !== undefined) {
    process.env.PORT = process.env.API_PORT;
  }
}

loadDotEnv();

const { createApp } = require('./app') as typeof import('./app');
const { CampaignService } = require('./services/CampaignService') as typeof import('./services/CampaignService');
const { createRuntimeClock, readClockMode } = require('./config/runtime') as typeof import('./config/runtime');
const { parsePositiveIntegerEnv } = require('./config/constants') as typeof import('./config/constants');

async function main(): Promise<void> {
  const clockMode = readClockMode();
  const service = await CampaignService.open({ clock: createRuntimeClock(clockMode) });
  const app = createApp({ service });

  const port = parsePositiveIntegerEnv(process.env.PORT, 3001);
  const host = process.env.HOST ?? '127.0.0.1';

  app.listen(port, host, () => {
    if (process.env.NODE_ENV !== 'production') {
      console.log(`[config] clock=${clockMode}`);
    }
    console.log(`Crowdshare backend listening on http://${host}:${port}`);
  });
}

main().catch((err: unknown) => {
  console.error(`[server] failed to start: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});

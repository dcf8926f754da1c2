import fs from 'fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  initializeDatabase,
  listAuditEvents,
  listCampaigns,
  loadValueBook,
  openDatabase,
  saveCampaignChange,
  upsertCampaign,
  type StoredCampaign,
} from '../db/SQLiteStore';
import { ValueBook } from '../transport/ValueBook';
import { E18, setupCampaign } from './helpers/campaignFixtures';
import { makeTestDbPath } from './helpers/testDbPath';

let dbPath = '';

function sampleCampaign(id: string, createdAt = '2026-02-14T00:00:00.000Z'): StoredCampaign {
  const { campaign } = setupCampaign();
  return {
    id,
    vault: `vault:${id}`,
    createdAt,
    updatedAt: createdAt,
    snapshot: campaign.toSnapshot(),
  };
}

beforeEach(() => {
  dbPath = makeTestDbPath();
});

afterEach(async () => {
  try {
    const db = await openDatabase(dbPath);
    await db.close();
  } catch {
    // no-op
  }
  fs.rmSync(dbPath, { force: true });
});

describe('SQLiteStore', () => {
  it('creates its tables on initializeDatabase', async () => {
    const db = await openDatabase(dbPath);
    await initializeDatabase(db);

    const tables = await db.all<Array<{ name: string }>>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    );
    expect(tables.map((entry) => entry.name)).toEqual(['audit_logs', 'campaigns', 'value_book']);
  });

  it('upserts campaigns and reads them back', async () => {
    const db = await openDatabase(dbPath);
    await initializeDatabase(db);

    const first = sampleCampaign('campaign-b', '2026-02-14T00:00:00.000Z');
    const second = sampleCampaign('campaign-a', '2026-02-15T00:00:00.000Z');
    await upsertCampaign(second, db);
    await upsertCampaign(first, db);
    await upsertCampaign({ ...first, updatedAt: '2026-02-16T00:00:00.000Z' }, db);

    const stored = await listCampaigns(db);
    expect(stored.map((entry) => entry.id)).toEqual(['campaign-b', 'campaign-a']);
    expect(stored[0].updatedAt).toBe('2026-02-16T00:00:00.000Z');
    expect(stored[0].snapshot).toEqual(first.snapshot);
  });

  it('writes a campaign change with its events and the value book', async () => {
    const db = await openDatabase(dbPath);
    await initializeDatabase(db);
    const book = new ValueBook();
    book.credit('native', 'alice', E18);

    await saveCampaignChange(
      sampleCampaign('campaign-1'),
      [
        { type: 'ContributionAccepted', account: 'alice', amount: E18 },
        { type: 'Failed' },
      ],
      book.snapshot(),
      db,
    );

    const events = await listAuditEvents('campaign-1', db);
    expect(events.map(({ event, details, timestamp }) => ({ event, details, timestamp }))).toEqual([
      {
        event: 'ContributionAccepted',
        details: { account: 'alice', amount: '1000000000000000000' },
        timestamp: '2026-02-14T00:00:00.000Z',
      },
      { event: 'Failed', details: {}, timestamp: '2026-02-14T00:00:00.000Z' },
    ]);
    expect(await loadValueBook(db)).toEqual(book.snapshot());
  });

  it('rolls back the whole change when one write fails', async () => {
    const db = await openDatabase(dbPath);
    await initializeDatabase(db);
    await db.exec('DROP TABLE value_book');

    await expect(
      saveCampaignChange(
        sampleCampaign('campaign-1'),
        [{ type: 'Failed' }],
        new ValueBook().snapshot(),
        db,
      ),
    ).rejects.toThrow();

    expect(await listCampaigns(db)).toEqual([]);
    expect(await listAuditEvents('campaign-1', db)).toEqual([]);
  });
});

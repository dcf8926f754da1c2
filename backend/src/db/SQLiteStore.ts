import fs from 'fs';
import path from 'path';
import sqlite3 from 'sqlite3';
import { Database, open } from 'sqlite';
import type { CampaignSnapshot } from '../campaign/Campaign';
import type { CampaignEvent, CampaignEventType, CampaignState } from '../campaign/types';
import type { ValueBookSnapshot } from '../transport/ValueBook';
import { toJsonRecord } from '../utils/json';

export type StoredCampaign = {
  id: string;
  vault: string;
  createdAt: string;
  updatedAt: string;
  snapshot: CampaignSnapshot;
};

export type StoredAuditEvent = {
  id: number;
  campaignId: string;
  event: CampaignEventType;
  details: Record<string, unknown>;
  timestamp: string;
};

const DEFAULT_DB_FILENAME = 'crowdshare.db';

let dbPromise: Promise<Database<sqlite3.Database, sqlite3.Statement>> | null = null;
let dbPromisePath: string | null = null;

function getDataDir(): string {
  const dataDir = path.join(process.cwd(), 'data');
  fs.mkdirSync(dataDir, { recursive: true });
  return dataDir;
}

export function getDefaultDbPath(): string {
  return path.join(getDataDir(), DEFAULT_DB_FILENAME);
}

function getEffectiveDbPath(dbPath?: string): string {
  const envPath = process.env.CROWDSHARE_SQLITE_PATH?.trim();
  return dbPath ?? (envPath && envPath.length > 0 ? envPath : getDefaultDbPath());
}

export async function openDatabase(dbPath?: string): Promise<Database> {
  const effectivePath = getEffectiveDbPath(dbPath);
  if (!dbPromise || dbPromisePath !== effectivePath) {
    dbPromise = open({
      filename: effectivePath,
      driver: sqlite3.Database,
    });
    dbPromisePath = effectivePath;
  }
  return dbPromise;
}

export async function initializeDatabase(database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());

  await db.exec(`
    CREATE TABLE IF NOT EXISTS campaigns (
      id TEXT PRIMARY KEY,
      vault TEXT NOT NULL,
      state TEXT NOT NULL,
      snapshot TEXT NOT NULL,
      createdAt TEXT NOT NULL,
      updatedAt TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS audit_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      campaignId TEXT NOT NULL,
      event TEXT NOT NULL,
      details TEXT,
      timestamp TEXT NOT NULL,
      FOREIGN KEY(campaignId) REFERENCES campaigns(id)
    );

    CREATE TABLE IF NOT EXISTS value_book (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      snapshot TEXT NOT NULL,
      updatedAt TEXT NOT NULL
    );
  `);
}

type CampaignRow = {
  id: string;
  vault: string;
  state: CampaignState;
  snapshot: string;
  createdAt: string;
  updatedAt: string;
};

type AuditRow = {
  id: number;
  campaignId: string;
  event: CampaignEventType;
  details: string | null;
  timestamp: string;
};

function mapRowToCampaign(row: CampaignRow): StoredCampaign {
  return {
    id: row.id,
    vault: row.vault,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    snapshot: JSON.parse(row.snapshot) as CampaignSnapshot,
  };
}

function parseDetails(raw: string | null): Record<string, unknown> {
  if (!raw || !raw.trim()) return {};
  try {
    const parsed = JSON.parse(raw) as unknown;
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return {};
  } catch {
    return {};
  }
}

export async function upsertCampaign(campaign: StoredCampaign, database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());
  try {
    await db.run(
      `INSERT OR REPLACE INTO campaigns (id, vault, state, snapshot, createdAt, updatedAt)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        campaign.id,
        campaign.vault,
        campaign.snapshot.state,
        JSON.stringify(campaign.snapshot),
        campaign.createdAt,
        campaign.updatedAt,
      ],
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`sqlite-upsert-campaign-failed:${campaign.id}:${message}`);
  }
}

export async function listCampaigns(database?: Database): Promise<StoredCampaign[]> {
  const db = database ?? (await openDatabase());
  try {
    const rows = await db.all<CampaignRow[]>('SELECT * FROM campaigns ORDER BY createdAt ASC, id ASC');
    return rows.map((row) => mapRowToCampaign(row));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`sqlite-list-campaigns-failed:${message}`);
  }
}

export async function listAuditEvents(campaignId: string, database?: Database): Promise<StoredAuditEvent[]> {
  const db = database ?? (await openDatabase());
  const rows = await db.all<AuditRow[]>(
    `SELECT id, campaignId, event, details, timestamp
     FROM audit_logs
     WHERE campaignId = ?
     ORDER BY id ASC`,
    [campaignId],
  );
  return rows.map((row) => ({
    id: row.id,
    campaignId: row.campaignId,
    event: row.event,
    details: parseDetails(row.details),
    timestamp: row.timestamp,
  }));
}

export async function loadValueBook(database?: Database): Promise<ValueBookSnapshot | null> {
  const db = database ?? (await openDatabase());
  const row = await db.get<{ snapshot: string }>('SELECT snapshot FROM value_book WHERE id = 1');
  return row ? (JSON.parse(row.snapshot) as ValueBookSnapshot) : null;
}

/**
 * Writes one successful campaign operation: the new campaign snapshot, its
 * events and the value book balances, all in one transaction.
 */
export async function saveCampaignChange(
  campaign: StoredCampaign,
  events: CampaignEvent[],
  book: ValueBookSnapshot,
  database?: Database,
): Promise<void> {
  const db = database ?? (await openDatabase());
  await db.exec('BEGIN TRANSACTION');
  try {
    await upsertCampaign(campaign, db);

    for (const event of events) {
      const { type, ...details } = event;
      await db.run(
        'INSERT INTO audit_logs (campaignId, event, details, timestamp) VALUES (?, ?, ?, ?)',
        [campaign.id, type, JSON.stringify(toJsonRecord(details)), campaign.updatedAt],
      );
    }

    await saveValueBook(book, db);

    await db.exec('COMMIT');
  } catch (error) {
    await db.exec('ROLLBACK');
    throw error;
  }
}

export async function saveValueBook(book: ValueBookSnapshot, database?: Database): Promise<void> {
  const db = database ?? (await openDatabase());
  await db.run(
    'INSERT OR REPLACE INTO value_book (id, snapshot, updatedAt) VALUES (1, ?, ?)',
    [JSON.stringify(book), new Date().toISOString()],
  );
}

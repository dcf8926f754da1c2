import { randomUUID } from 'crypto';
import type { Database } from 'sqlite';
import { Campaign } from '../campaign/Campaign';
import { parseCampaignConfig } from '../campaign/campaignConfig';
import { systemClock, type Clock } from '../campaign/clock';
import { CampaignError, errorMessage } from '../campaign/errors';
import type {
  AccountId,
  AccountView,
  CampaignEvent,
  CampaignStatus,
  ContributionRange,
} from '../campaign/types';
import {
  initializeDatabase,
  listAuditEvents,
  listCampaigns,
  loadValueBook,
  openDatabase,
  saveCampaignChange,
  saveValueBook,
  type StoredAuditEvent,
} from '../db/SQLiteStore';
import { createTransport } from '../transport/bookTransport';
import { ValueBook } from '../transport/ValueBook';
import { toJsonRecord } from '../utils/json';

export class CampaignNotFoundError extends CampaignError {
  constructor() {
    super('campaign-not-found');
  }
}

export interface CampaignServiceOptions {
  clock?: Clock;
  book?: ValueBook;
  /** SQLite handle for persistence; `null` keeps everything in memory. */
  database?: Database | null;
}

export type CampaignSummary = {
  id: string;
  vault: string;
  createdAt: string;
  config: Campaign['config'];
  status: CampaignStatus;
};

type CampaignEntry = {
  id: string;
  vault: string;
  createdAt: string;
  campaign: Campaign;
  auditLog: StoredAuditEvent[];
};

/**
 * Hosts every campaign of the process. Campaigns share one value book, so
 * every mutating call runs strictly one after another across the service.
 * Each call is persisted together with the events it produced; when that
 * write fails the call is undone in memory and rejected.
 */
export class CampaignService {
  readonly clock: Clock;
  readonly book: ValueBook;
  private readonly database: Database | null;
  private readonly campaigns = new Map<string, CampaignEntry>();
  private auditSequence = 0;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: CampaignServiceOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.book = options.book ?? new ValueBook();
    this.database = options.database ?? null;
  }

  /** Opens the SQLite store and restores every campaign and balance saved in it. */
  static async open(options: Omit<CampaignServiceOptions, 'database' | 'book'> & { dbPath?: string } = {}) {
    const database = await openDatabase(options.dbPath);
    await initializeDatabase(database);
    const bookSnapshot = await loadValueBook(database);
    const service = new CampaignService({
      clock: options.clock,
      database,
      book: bookSnapshot ? ValueBook.restore(bookSnapshot) : new ValueBook(),
    });

    const stored = await listCampaigns(database);
    for (const record of stored) {
      const transport = createTransport(record.snapshot.config.denomination, service.book, record.vault);
      const auditLog = await listAuditEvents(record.id, database);
      service.campaigns.set(record.id, {
        id: record.id,
        vault: record.vault,
        createdAt: record.createdAt,
        campaign: Campaign.restore(record.snapshot, transport, service.clock),
        auditLog,
      });
      service.auditSequence = Math.max(service.auditSequence, ...auditLog.map((entry) => entry.id));
    }
    console.log(`[campaign] restored ${stored.length} campaign(s) from sqlite`);
    return service;
  }

  /** Deploys and initializes a new campaign from a JSON config. */
  async createCampaign(input: unknown): Promise<CampaignSummary> {
    const config = parseCampaignConfig(input);
    const id = `campaign-${randomUUID()}`;
    const vault = `vault:${id}`;
    const campaign = new Campaign(createTransport(config.denomination, this.book, vault), this.clock);

    const entry: CampaignEntry = {
      id,
      vault,
      createdAt: new Date().toISOString(),
      campaign,
      auditLog: [],
    };
    const events: CampaignEvent[] = [];
    const unsubscribe = campaign.onEvent((event) => events.push(event));
    try {
      campaign.initialize(config);
    } finally {
      unsubscribe();
    }

    // registered only once the row is written
    await this.serialize(() => this.persist(entry, events));
    this.campaigns.set(id, entry);
    console.log(`[campaign] created id=${id} recipient=${config.recipient} goalMax=${config.goalMax}`);
    return this.summarize(entry);
  }

  getCampaign(id: string): CampaignSummary | null {
    const entry = this.campaigns.get(id);
    return entry ? this.summarize(entry) : null;
  }

  listCampaigns(): CampaignSummary[] {
    return Array.from(this.campaigns.values()).map((entry) => this.summarize(entry));
  }

  getAccount(id: string, account: AccountId): AccountView {
    return this.require(id).campaign.accountView(account);
  }

  contributionRange(id: string, account: AccountId): ContributionRange {
    return this.require(id).campaign.contributionRangeFor(account);
  }

  hasContribution(id: string, account: AccountId): boolean {
    return this.require(id).campaign.hasContribution(account);
  }

  allowance(id: string, owner: AccountId, spender: AccountId): bigint {
    return this.require(id).campaign.allowance(owner, spender);
  }

  listEvents(id: string): StoredAuditEvent[] {
    return [...this.require(id).auditLog];
  }

  contribute(id: string, account: AccountId, amount: bigint): Promise<bigint> {
    return this.run(id, (campaign) => campaign.contribute(account, amount));
  }

  async settle(id: string): Promise<bigint> {
    const paid = await this.run(id, (campaign) => campaign.settle());
    console.log(`[campaign] settled id=${id} recipientAmount=${paid}`);
    return paid;
  }

  async releaseFailed(id: string): Promise<void> {
    await this.run(id, (campaign) => campaign.releaseFailed());
    console.log(`[campaign] released as failed id=${id}`);
  }

  depositYield(id: string, from: AccountId, amount: bigint): Promise<bigint> {
    return this.run(id, (campaign) => campaign.depositYield(from, amount));
  }

  syncYield(id: string): Promise<bigint> {
    return this.run(id, (campaign) => campaign.syncYield());
  }

  withdraw(id: string, account: AccountId): Promise<bigint> {
    return this.run(id, (campaign) => campaign.withdraw(account));
  }

  transfer(id: string, from: AccountId, to: AccountId, amount: bigint): Promise<void> {
    return this.run(id, (campaign) => campaign.transfer(from, to, amount));
  }

  transferFrom(id: string, spender: AccountId, from: AccountId, to: AccountId, amount: bigint): Promise<void> {
    return this.run(id, (campaign) => campaign.transferFrom(spender, from, to, amount));
  }

  approve(id: string, owner: AccountId, spender: AccountId, amount: bigint): Promise<void> {
    return this.run(id, (campaign) => campaign.approve(owner, spender, amount));
  }

  /** Dev faucet: mints value book units for a holder. */
  creditBalance(asset: string, holder: AccountId, amount: bigint): Promise<bigint> {
    return this.runOnBook(() => {
      this.book.credit(asset, holder, amount);
      return this.book.balanceOf(asset, holder);
    });
  }

  setTokenTransferFee(asset: string, bips: number): Promise<void> {
    return this.runOnBook(() => this.book.setTransferFee(asset, bips));
  }

  approveVault(id: string, asset: string, owner: AccountId, amount: bigint): Promise<void> {
    const entry = this.campaigns.get(id);
    if (!entry) return Promise.reject(new CampaignNotFoundError());
    return this.runOnBook(() => this.book.approve(asset, owner, entry.vault, amount));
  }

  private require(id: string): CampaignEntry {
    const entry = this.campaigns.get(id);
    if (!entry) throw new CampaignNotFoundError();
    return entry;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    // the caller receives the rejection through `result`; the queue only orders calls
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private run<T>(id: string, operation: (campaign: Campaign) => Promise<T> | T): Promise<T> {
    const entry = this.campaigns.get(id);
    if (!entry) return Promise.reject(new CampaignNotFoundError());
    return this.serialize(async () => {
      const campaignBefore = entry.campaign.toSnapshot();
      const bookBefore = this.book.snapshot();
      const events: CampaignEvent[] = [];
      const unsubscribe = entry.campaign.onEvent((event) => events.push(event));
      let value: T;
      try {
        value = await operation(entry.campaign);
      } finally {
        unsubscribe();
      }

      try {
        await this.persist(entry, events);
      } catch (err) {
        entry.campaign.resetTo(campaignBefore);
        this.book.load(bookBefore);
        throw err;
      }
      return value;
    });
  }

  private runOnBook<T>(change: () => T): Promise<T> {
    return this.serialize(async () => {
      const before = this.book.snapshot();
      const value = change();
      if (!this.database) return value;
      try {
        await saveValueBook(this.book.snapshot(), this.database);
      } catch (err) {
        console.error(`[store] failed to persist value book: ${errorMessage(err)}`);
        this.book.load(before);
        throw err;
      }
      return value;
    });
  }

  /** Appends `events` to the audit log and writes the campaign; a failed write leaves the log as it was. */
  private async persist(entry: CampaignEntry, events: CampaignEvent[]): Promise<void> {
    const logLength = entry.auditLog.length;
    const sequence = this.auditSequence;
    const timestamp = new Date().toISOString();
    for (const event of events) {
      const { type, ...details } = event;
      this.auditSequence += 1;
      entry.auditLog.push({
        id: this.auditSequence,
        campaignId: entry.id,
        event: type,
        details: toJsonRecord(details),
        timestamp,
      });
    }

    if (!this.database) return;
    try {
      await saveCampaignChange(
        {
          id: entry.id,
          vault: entry.vault,
          createdAt: entry.createdAt,
          updatedAt: timestamp,
          snapshot: entry.campaign.toSnapshot(),
        },
        events,
        this.book.snapshot(),
        this.database,
      );
    } catch (err) {
      console.error(`[store] failed to persist campaign ${entry.id}: ${errorMessage(err)}`);
      entry.auditLog.length = logLength;
      this.auditSequence = sequence;
      throw err;
    }
  }

  private summarize(entry: CampaignEntry): CampaignSummary {
    return {
      id: entry.id,
      vault: entry.vault,
      createdAt: entry.createdAt,
      config: entry.campaign.config,
      status: entry.campaign.status(),
    };
  }
}

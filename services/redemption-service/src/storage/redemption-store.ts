import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import {
  type CertificateType,
  eventCertificateIDs,
  eventDigest,
  eventHolder,
  type RedemptionEvent,
  type StoredRedemptionEvent,
} from "@certclaim/shared";

export interface NewCertificateType {
  certificateID: string;
  amount: string;
  metadata: string;
  createdAt: string;
}

export interface EventFilter {
  certificateID?: string;
  holder?: string;
}

export interface RedemptionStore {
  /** Runs `fn` as one transaction; a throw rolls every write back. */
  atomically<T>(fn: () => T): T;

  insertCertificateType(record: NewCertificateType): boolean;
  getCertificateType(certificateID: string): CertificateType | null;
  listCertificateTypes(): CertificateType[];
  addDelegate(certificateID: string, address: string): boolean;
  isDelegate(certificateID: string, address: string): boolean;

  isClaimed(certificateID: string, holder: string): boolean;
  markClaimed(certificateID: string, holder: string, claimedAt: string): void;
  releaseClaim(certificateID: string, holder: string): void;

  setCondenserDelegate(address: string, trusted: boolean): boolean;
  isCondenserDelegate(address: string): boolean;
  listCondenserDelegates(): string[];

  appendEvent(event: RedemptionEvent): StoredRedemptionEvent;
  listEvents(filter?: EventFilter): StoredRedemptionEvent[];

  close(): void;
}

interface CertificateTypeRow {
  certificate_id: string;
  amount: string;
  metadata: string;
  created_at: string;
}

interface AddressRow {
  address: string;
}

interface EventRow {
  sequence: number;
  event_hash: string;
  event_json: string;
}

export class SqliteRedemptionStore implements RedemptionStore {
  private readonly db: Database.Database;
  private readonly insertTypeStmt: Database.Statement<[string, string, string, string]>;
  private readonly getTypeStmt: Database.Statement<[string], CertificateTypeRow>;
  private readonly listTypesStmt: Database.Statement<[], CertificateTypeRow>;
  private readonly addDelegateStmt: Database.Statement<[string, string]>;
  private readonly isDelegateStmt: Database.Statement<[string, string], { found: number }>;
  private readonly listDelegatesStmt: Database.Statement<[string], AddressRow>;
  private readonly isClaimedStmt: Database.Statement<[string, string], { found: number }>;
  private readonly markClaimedStmt: Database.Statement<[string, string, string]>;
  private readonly releaseClaimStmt: Database.Statement<[string, string]>;
  private readonly addCondenserStmt: Database.Statement<[string]>;
  private readonly removeCondenserStmt: Database.Statement<[string]>;
  private readonly isCondenserStmt: Database.Statement<[string], { found: number }>;
  private readonly listCondensersStmt: Database.Statement<[], AddressRow>;
  private readonly appendEventStmt: Database.Statement<[string, string]>;
  private readonly listEventsStmt: Database.Statement<[], EventRow>;

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS certificate_types (
        certificate_id TEXT PRIMARY KEY,
        amount TEXT NOT NULL,
        metadata TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS certificate_delegates (
        certificate_id TEXT NOT NULL,
        address TEXT NOT NULL,
        PRIMARY KEY (certificate_id, address)
      );
      CREATE TABLE IF NOT EXISTS claims (
        certificate_id TEXT NOT NULL,
        holder TEXT NOT NULL,
        claimed_at TEXT NOT NULL,
        PRIMARY KEY (certificate_id, holder)
      );
      CREATE TABLE IF NOT EXISTS condenser_delegates (
        address TEXT PRIMARY KEY
      );
      CREATE TABLE IF NOT EXISTS redemption_events (
        sequence INTEGER PRIMARY KEY AUTOINCREMENT,
        event_hash TEXT NOT NULL,
        event_json TEXT NOT NULL
      );
    `);

    this.insertTypeStmt = this.db.prepare<[string, string, string, string]>(`
      INSERT INTO certificate_types (certificate_id, amount, metadata, created_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(certificate_id) DO NOTHING
    `);

    this.getTypeStmt = this.db.prepare<[string], CertificateTypeRow>(`
      SELECT certificate_id, amount, metadata, created_at
      FROM certificate_types
      WHERE certificate_id = ?
      LIMIT 1
    `);

    this.listTypesStmt = this.db.prepare<[], CertificateTypeRow>(`
      SELECT certificate_id, amount, metadata, created_at
      FROM certificate_types
      ORDER BY rowid ASC
    `);

    this.addDelegateStmt = this.db.prepare<[string, string]>(`
      INSERT INTO certificate_delegates (certificate_id, address)
      VALUES (?, ?)
      ON CONFLICT(certificate_id, address) DO NOTHING
    `);

    this.isDelegateStmt = this.db.prepare<[string, string], { found: number }>(`
      SELECT 1 AS found
      FROM certificate_delegates
      WHERE certificate_id = ? AND address = ?
      LIMIT 1
    `);

    this.listDelegatesStmt = this.db.prepare<[string], AddressRow>(`
      SELECT address
      FROM certificate_delegates
      WHERE certificate_id = ?
      ORDER BY rowid ASC
    `);

    this.isClaimedStmt = this.db.prepare<[string, string], { found: number }>(`
      SELECT 1 AS found
      FROM claims
      WHERE certificate_id = ? AND holder = ?
      LIMIT 1
    `);

    this.markClaimedStmt = this.db.prepare<[string, string, string]>(`
      INSERT INTO claims (certificate_id, holder, claimed_at)
      VALUES (?, ?, ?)
    `);

    this.releaseClaimStmt = this.db.prepare<[string, string]>(`
      DELETE FROM claims
      WHERE certificate_id = ? AND holder = ?
    `);

    this.addCondenserStmt = this.db.prepare<[string]>(`
      INSERT INTO condenser_delegates (address)
      VALUES (?)
      ON CONFLICT(address) DO NOTHING
    `);

    this.removeCondenserStmt = this.db.prepare<[string]>(`
      DELETE FROM condenser_delegates
      WHERE address = ?
    `);

    this.isCondenserStmt = this.db.prepare<[string], { found: number }>(`
      SELECT 1 AS found
      FROM condenser_delegates
      WHERE address = ?
      LIMIT 1
    `);

    this.listCondensersStmt = this.db.prepare<[], AddressRow>(`
      SELECT address
      FROM condenser_delegates
      ORDER BY rowid ASC
    `);

    this.appendEventStmt = this.db.prepare<[string, string]>(`
      INSERT INTO redemption_events (event_hash, event_json)
      VALUES (?, ?)
    `);

    this.listEventsStmt = this.db.prepare<[], EventRow>(`
      SELECT sequence, event_hash, event_json
      FROM redemption_events
      ORDER BY sequence ASC
    `);
  }

  atomically<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  insertCertificateType(record: NewCertificateType): boolean {
    const result = this.insertTypeStmt.run(
      record.certificateID,
      record.amount,
      record.metadata,
      record.createdAt,
    );
    return result.changes > 0;
  }

  getCertificateType(certificateID: string): CertificateType | null {
    const row = this.getTypeStmt.get(certificateID);
    if (!row) return null;
    return this.toCertificateType(row);
  }

  listCertificateTypes(): CertificateType[] {
    return this.listTypesStmt.all().map((row) => this.toCertificateType(row));
  }

  addDelegate(certificateID: string, address: string): boolean {
    return this.addDelegateStmt.run(certificateID, address).changes > 0;
  }

  isDelegate(certificateID: string, address: string): boolean {
    return this.isDelegateStmt.get(certificateID, address) !== undefined;
  }

  isClaimed(certificateID: string, holder: string): boolean {
    return this.isClaimedStmt.get(certificateID, holder) !== undefined;
  }

  markClaimed(certificateID: string, holder: string, claimedAt: string): void {
    this.markClaimedStmt.run(certificateID, holder, claimedAt);
  }

  releaseClaim(certificateID: string, holder: string): void {
    this.releaseClaimStmt.run(certificateID, holder);
  }

  setCondenserDelegate(address: string, trusted: boolean): boolean {
    const stmt = trusted ? this.addCondenserStmt : this.removeCondenserStmt;
    return stmt.run(address).changes > 0;
  }

  isCondenserDelegate(address: string): boolean {
    return this.isCondenserStmt.get(address) !== undefined;
  }

  listCondenserDelegates(): string[] {
    return this.listCondensersStmt.all().map((row) => row.address);
  }

  appendEvent(event: RedemptionEvent): StoredRedemptionEvent {
    const eventHash = eventDigest(event);
    const result = this.appendEventStmt.run(eventHash, JSON.stringify(event));
    return { sequence: Number(result.lastInsertRowid), eventHash, event };
  }

  listEvents(filter: EventFilter = {}): StoredRedemptionEvent[] {
    const events = this.listEventsStmt.all().map((row) => ({
      sequence: row.sequence,
      eventHash: row.event_hash,
      event: JSON.parse(row.event_json) as RedemptionEvent,
    }));
    return events.filter(({ event }) => {
      if (filter.certificateID && !eventCertificateIDs(event).includes(filter.certificateID)) {
        return false;
      }
      if (filter.holder && eventHolder(event) !== filter.holder) {
        return false;
      }
      return true;
    });
  }

  close(): void {
    this.db.close();
  }

  private toCertificateType(row: CertificateTypeRow): CertificateType {
    return {
      certificateID: row.certificate_id,
      amount: row.amount,
      metadata: row.metadata,
      delegates: this.listDelegatesStmt.all(row.certificate_id).map((delegate) => delegate.address),
      createdAt: row.created_at,
    };
  }
}

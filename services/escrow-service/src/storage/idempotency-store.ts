import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export type IdempotentAction = "OPEN_ESCROW" | "RESOLVE_ESCROW" | "RESOLVE_REVIEW";

export interface IdempotencyRecord {
  action: IdempotentAction;
  idempotencyKey: string;
  requestHash: string;
  responseStatus: number;
  responseBody: unknown;
  createdAt: string;
}

export interface IdempotencyStore {
  getIdempotencyRecord(action: IdempotentAction, idempotencyKey: string): IdempotencyRecord | null;
  putIdempotencyRecord(record: IdempotencyRecord): void;
  close(): void;
}

interface IdempotencyRow {
  action: IdempotentAction;
  idempotency_key: string;
  request_hash: string;
  response_status: number;
  response_json: string;
  created_at: string;
}

export class SqliteIdempotencyStore implements IdempotencyStore {
  private readonly db: Database.Database;
  private readonly getStmt: Database.Statement<[string, string], IdempotencyRow>;
  private readonly putStmt: Database.Statement<[string, string, string, number, string, string]>;

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS escrow_idempotency (
        action TEXT NOT NULL,
        idempotency_key TEXT NOT NULL,
        request_hash TEXT NOT NULL,
        response_status INTEGER NOT NULL,
        response_json TEXT NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY(action, idempotency_key)
      );
    `);

    this.getStmt = this.db.prepare<[string, string], IdempotencyRow>(`
      SELECT action, idempotency_key, request_hash, response_status, response_json, created_at
      FROM escrow_idempotency
      WHERE action = ? AND idempotency_key = ?
      LIMIT 1
    `);
    this.putStmt = this.db.prepare(`
      INSERT INTO escrow_idempotency (action, idempotency_key, request_hash, response_status, response_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(action, idempotency_key) DO NOTHING
    `);
  }

  getIdempotencyRecord(action: IdempotentAction, idempotencyKey: string): IdempotencyRecord | null {
    const row = this.getStmt.get(action, idempotencyKey);
    if (!row) return null;
    return {
      action: row.action,
      idempotencyKey: row.idempotency_key,
      requestHash: row.request_hash,
      responseStatus: row.response_status,
      responseBody: JSON.parse(row.response_json),
      createdAt: row.created_at,
    };
  }

  putIdempotencyRecord(record: IdempotencyRecord): void {
    this.putStmt.run(
      record.action,
      record.idempotencyKey,
      record.requestHash,
      record.responseStatus,
      JSON.stringify(record.responseBody),
      record.createdAt,
    );
  }

  close(): void {
    this.db.close();
  }
}

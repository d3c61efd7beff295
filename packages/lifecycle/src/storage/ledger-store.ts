import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type {
  Commission,
  EscrowAuditEvent,
  EscrowContract,
  EscrowState,
  Evaluation,
  TokenRecord,
  Watch,
} from "@chrono/shared";
import { isTerminalEscrowState } from "../escrow/state-machine.js";

export interface ListEscrowsFilter {
  state?: EscrowState;
  watchId?: string;
}

/**
 * Persistence collaborator. Records are loaded and saved by identity; every
 * mutable record carries a `version` and is only ever updated through a
 * compare-and-swap on it. Update methods return false when the stored version
 * no longer matches, insert methods when a uniqueness rule refuses the row.
 */
export interface LedgerStore {
  transaction<T>(fn: () => T): T;

  insertWatch(watch: Watch): boolean;
  getWatch(watchId: string): Watch | null;
  getWatchBySerial(serial: string): Watch | null;
  listWatches(): Watch[];
  updateWatch(watch: Watch, expectedVersion: number): boolean;

  insertEscrow(contract: EscrowContract): boolean;
  getEscrow(contractId: string): EscrowContract | null;
  getActiveEscrowForWatch(watchId: string): EscrowContract | null;
  listEscrows(filter?: ListEscrowsFilter): EscrowContract[];
  listOverdueEscrows(nowIso: string): EscrowContract[];
  updateEscrow(contract: EscrowContract, expectedVersion: number): boolean;

  insertEvaluation(evaluation: Evaluation): boolean;
  getEvaluation(evaluationId: string): Evaluation | null;
  updateEvaluation(evaluation: Evaluation, expectedVersion: number): boolean;

  appendTokenRecord(record: TokenRecord): boolean;
  getTokenRecord(tokenRecordId: string): TokenRecord | null;
  getTokenRecordByOperationRef(operationRef: string): TokenRecord | null;
  listTokenRecords(watchId: string): TokenRecord[];
  listTokenRecordsForContract(contractId: string): TokenRecord[];

  insertCommission(commission: Commission): boolean;
  getCommissionForContract(contractId: string): Commission | null;

  appendAuditEvent(event: EscrowAuditEvent): void;
  getAuditEvents(contractId: string): EscrowAuditEvent[];

  close(): void;
}

interface JsonRow {
  record_json: string;
}

export class SqliteLedgerStore implements LedgerStore {
  private readonly db: Database.Database;
  private readonly insertWatchStmt: Database.Statement<[string, string, string, number, string]>;
  private readonly getWatchStmt: Database.Statement<[string], JsonRow>;
  private readonly getWatchBySerialStmt: Database.Statement<[string], JsonRow>;
  private readonly listWatchesStmt: Database.Statement<[], JsonRow>;
  private readonly updateWatchStmt: Database.Statement<[string, number, string, string, number]>;
  private readonly insertEscrowStmt: Database.Statement<
    [string, string, string, number, string, number, string, string]
  >;
  private readonly getEscrowStmt: Database.Statement<[string], JsonRow>;
  private readonly getActiveEscrowStmt: Database.Statement<[string], JsonRow>;
  private readonly listEscrowsStmt: Database.Statement<[], JsonRow>;
  private readonly listEscrowsByStateStmt: Database.Statement<[string], JsonRow>;
  private readonly listEscrowsByWatchStmt: Database.Statement<[string], JsonRow>;
  private readonly listOverdueStmt: Database.Statement<[string], JsonRow>;
  private readonly updateEscrowStmt: Database.Statement<
    [string, number, number, string, string, string, string, number]
  >;
  private readonly insertEvaluationStmt: Database.Statement<[string, string, string, number, string]>;
  private readonly getEvaluationStmt: Database.Statement<[string], JsonRow>;
  private readonly updateEvaluationStmt: Database.Statement<[number, string, string, string, number]>;
  private readonly appendTokenStmt: Database.Statement<[string, string, number, string, string, string]>;
  private readonly getTokenStmt: Database.Statement<[string], JsonRow>;
  private readonly getTokenByOperationStmt: Database.Statement<[string], JsonRow>;
  private readonly listTokensStmt: Database.Statement<[string], JsonRow>;
  private readonly listTokensByContractStmt: Database.Statement<[string], JsonRow>;
  private readonly insertCommissionStmt: Database.Statement<[string, string, string]>;
  private readonly getCommissionStmt: Database.Statement<[string], JsonRow>;
  private readonly appendAuditStmt: Database.Statement<
    [string, string, string, string | null, string, string]
  >;
  private readonly getAuditStmt: Database.Statement<[string], JsonRow>;

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS watches (
        watch_id TEXT PRIMARY KEY,
        serial TEXT NOT NULL UNIQUE,
        state TEXT NOT NULL,
        version INTEGER NOT NULL,
        record_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS escrow_contracts (
        contract_id TEXT PRIMARY KEY,
        watch_id TEXT NOT NULL,
        state TEXT NOT NULL,
        active INTEGER NOT NULL,
        deadline TEXT NOT NULL,
        version INTEGER NOT NULL,
        updated_at TEXT NOT NULL,
        record_json TEXT NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_escrow_one_active_per_watch
      ON escrow_contracts(watch_id) WHERE active = 1;

      CREATE INDEX IF NOT EXISTS idx_escrow_active_deadline
      ON escrow_contracts(active, deadline ASC);

      CREATE TABLE IF NOT EXISTS evaluations (
        evaluation_id TEXT PRIMARY KEY,
        contract_id TEXT NOT NULL,
        result TEXT NOT NULL,
        version INTEGER NOT NULL,
        record_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS token_records (
        token_record_id TEXT PRIMARY KEY,
        watch_id TEXT NOT NULL,
        sequence INTEGER NOT NULL,
        operation_ref TEXT NOT NULL UNIQUE,
        contract_id TEXT NOT NULL,
        record_json TEXT NOT NULL,
        UNIQUE(watch_id, sequence)
      );

      CREATE INDEX IF NOT EXISTS idx_token_records_contract
      ON token_records(contract_id);

      CREATE TABLE IF NOT EXISTS commissions (
        commission_id TEXT PRIMARY KEY,
        contract_id TEXT NOT NULL UNIQUE,
        record_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS escrow_audit_events (
        event_id TEXT PRIMARY KEY,
        contract_id TEXT NOT NULL,
        event_type TEXT NOT NULL,
        actor TEXT,
        occurred_at TEXT NOT NULL,
        record_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_escrow_audit_contract
      ON escrow_audit_events(contract_id, occurred_at ASC);
    `);

    this.insertWatchStmt = this.db.prepare(`
      INSERT INTO watches (watch_id, serial, state, version, record_json)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT DO NOTHING
    `);
    this.getWatchStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM watches WHERE watch_id = ? LIMIT 1
    `);
    this.getWatchBySerialStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM watches WHERE serial = ? LIMIT 1
    `);
    this.listWatchesStmt = this.db.prepare<[], JsonRow>(`
      SELECT record_json FROM watches ORDER BY serial ASC
    `);
    this.updateWatchStmt = this.db.prepare(`
      UPDATE watches
      SET state = ?, version = ?, record_json = ?
      WHERE watch_id = ? AND version = ?
    `);

    this.insertEscrowStmt = this.db.prepare(`
      INSERT INTO escrow_contracts (contract_id, watch_id, state, active, deadline, version, updated_at, record_json)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT DO NOTHING
    `);
    this.getEscrowStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM escrow_contracts WHERE contract_id = ? LIMIT 1
    `);
    this.getActiveEscrowStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM escrow_contracts WHERE watch_id = ? AND active = 1 LIMIT 1
    `);
    this.listEscrowsStmt = this.db.prepare<[], JsonRow>(`
      SELECT record_json FROM escrow_contracts ORDER BY updated_at DESC
    `);
    this.listEscrowsByStateStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM escrow_contracts WHERE state = ? ORDER BY updated_at DESC
    `);
    this.listEscrowsByWatchStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM escrow_contracts WHERE watch_id = ? ORDER BY updated_at DESC
    `);
    this.listOverdueStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM escrow_contracts
      WHERE active = 1 AND deadline <= ?
      ORDER BY deadline ASC
    `);
    this.updateEscrowStmt = this.db.prepare(`
      UPDATE escrow_contracts
      SET state = ?, active = ?, version = ?, deadline = ?, updated_at = ?, record_json = ?
      WHERE contract_id = ? AND version = ?
    `);

    this.insertEvaluationStmt = this.db.prepare(`
      INSERT INTO evaluations (evaluation_id, contract_id, result, version, record_json)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT DO NOTHING
    `);
    this.getEvaluationStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM evaluations WHERE evaluation_id = ? LIMIT 1
    `);
    this.updateEvaluationStmt = this.db.prepare(`
      UPDATE evaluations
      SET version = ?, result = ?, record_json = ?
      WHERE evaluation_id = ? AND version = ?
    `);

    this.appendTokenStmt = this.db.prepare(`
      INSERT INTO token_records (token_record_id, watch_id, sequence, operation_ref, contract_id, record_json)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT DO NOTHING
    `);
    this.getTokenStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM token_records WHERE token_record_id = ? LIMIT 1
    `);
    this.getTokenByOperationStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM token_records WHERE operation_ref = ? LIMIT 1
    `);
    this.listTokensStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM token_records WHERE watch_id = ? ORDER BY sequence ASC
    `);
    this.listTokensByContractStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM token_records WHERE contract_id = ? ORDER BY sequence ASC
    `);

    this.insertCommissionStmt = this.db.prepare(`
      INSERT INTO commissions (commission_id, contract_id, record_json)
      VALUES (?, ?, ?)
      ON CONFLICT DO NOTHING
    `);
    this.getCommissionStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM commissions WHERE contract_id = ? LIMIT 1
    `);

    this.appendAuditStmt = this.db.prepare(`
      INSERT INTO escrow_audit_events (event_id, contract_id, event_type, actor, occurred_at, record_json)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    this.getAuditStmt = this.db.prepare<[string], JsonRow>(`
      SELECT record_json FROM escrow_audit_events
      WHERE contract_id = ?
      ORDER BY occurred_at ASC, rowid ASC
    `);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  insertWatch(watch: Watch): boolean {
    const info = this.insertWatchStmt.run(
      watch.watchId,
      watch.serial,
      watch.state,
      watch.version,
      JSON.stringify(watch),
    );
    return info.changes === 1;
  }

  getWatch(watchId: string): Watch | null {
    const row = this.getWatchStmt.get(watchId);
    if (!row) return null;
    return JSON.parse(row.record_json) as Watch;
  }

  getWatchBySerial(serial: string): Watch | null {
    const row = this.getWatchBySerialStmt.get(serial);
    if (!row) return null;
    return JSON.parse(row.record_json) as Watch;
  }

  listWatches(): Watch[] {
    return this.listWatchesStmt.all().map((row) => JSON.parse(row.record_json) as Watch);
  }

  updateWatch(watch: Watch, expectedVersion: number): boolean {
    const info = this.updateWatchStmt.run(
      watch.state,
      watch.version,
      JSON.stringify(watch),
      watch.watchId,
      expectedVersion,
    );
    return info.changes === 1;
  }

  insertEscrow(contract: EscrowContract): boolean {
    const info = this.insertEscrowStmt.run(
      contract.contractId,
      contract.watchId,
      contract.state,
      isTerminalEscrowState(contract.state) ? 0 : 1,
      contract.deadline,
      contract.version,
      contract.updatedAt,
      JSON.stringify(contract),
    );
    return info.changes === 1;
  }

  getEscrow(contractId: string): EscrowContract | null {
    const row = this.getEscrowStmt.get(contractId);
    if (!row) return null;
    return JSON.parse(row.record_json) as EscrowContract;
  }

  getActiveEscrowForWatch(watchId: string): EscrowContract | null {
    const row = this.getActiveEscrowStmt.get(watchId);
    if (!row) return null;
    return JSON.parse(row.record_json) as EscrowContract;
  }

  listEscrows(filter: ListEscrowsFilter = {}): EscrowContract[] {
    let rows: JsonRow[];
    if (filter.watchId !== undefined) {
      rows = this.listEscrowsByWatchStmt.all(filter.watchId);
    } else if (filter.state !== undefined) {
      rows = this.listEscrowsByStateStmt.all(filter.state);
    } else {
      rows = this.listEscrowsStmt.all();
    }
    const contracts = rows.map((row) => JSON.parse(row.record_json) as EscrowContract);
    if (filter.watchId !== undefined && filter.state !== undefined) {
      return contracts.filter((contract) => contract.state === filter.state);
    }
    return contracts;
  }

  listOverdueEscrows(nowIso: string): EscrowContract[] {
    return this.listOverdueStmt
      .all(nowIso)
      .map((row) => JSON.parse(row.record_json) as EscrowContract);
  }

  updateEscrow(contract: EscrowContract, expectedVersion: number): boolean {
    const info = this.updateEscrowStmt.run(
      contract.state,
      isTerminalEscrowState(contract.state) ? 0 : 1,
      contract.version,
      contract.deadline,
      contract.updatedAt,
      JSON.stringify(contract),
      contract.contractId,
      expectedVersion,
    );
    return info.changes === 1;
  }

  insertEvaluation(evaluation: Evaluation): boolean {
    const info = this.insertEvaluationStmt.run(
      evaluation.evaluationId,
      evaluation.contractId,
      evaluation.result,
      evaluation.version,
      JSON.stringify(evaluation),
    );
    return info.changes === 1;
  }

  getEvaluation(evaluationId: string): Evaluation | null {
    const row = this.getEvaluationStmt.get(evaluationId);
    if (!row) return null;
    return JSON.parse(row.record_json) as Evaluation;
  }

  updateEvaluation(evaluation: Evaluation, expectedVersion: number): boolean {
    const info = this.updateEvaluationStmt.run(
      evaluation.version,
      evaluation.result,
      JSON.stringify(evaluation),
      evaluation.evaluationId,
      expectedVersion,
    );
    return info.changes === 1;
  }

  appendTokenRecord(record: TokenRecord): boolean {
    const info = this.appendTokenStmt.run(
      record.tokenRecordId,
      record.watchId,
      record.sequence,
      record.operationRef,
      record.contractId,
      JSON.stringify(record),
    );
    return info.changes === 1;
  }

  getTokenRecord(tokenRecordId: string): TokenRecord | null {
    const row = this.getTokenStmt.get(tokenRecordId);
    if (!row) return null;
    return JSON.parse(row.record_json) as TokenRecord;
  }

  getTokenRecordByOperationRef(operationRef: string): TokenRecord | null {
    const row = this.getTokenByOperationStmt.get(operationRef);
    if (!row) return null;
    return JSON.parse(row.record_json) as TokenRecord;
  }

  listTokenRecords(watchId: string): TokenRecord[] {
    return this.listTokensStmt
      .all(watchId)
      .map((row) => JSON.parse(row.record_json) as TokenRecord);
  }

  listTokenRecordsForContract(contractId: string): TokenRecord[] {
    return this.listTokensByContractStmt
      .all(contractId)
      .map((row) => JSON.parse(row.record_json) as TokenRecord);
  }

  insertCommission(commission: Commission): boolean {
    const info = this.insertCommissionStmt.run(
      commission.commissionId,
      commission.contractId,
      JSON.stringify(commission),
    );
    return info.changes === 1;
  }

  getCommissionForContract(contractId: string): Commission | null {
    const row = this.getCommissionStmt.get(contractId);
    if (!row) return null;
    return JSON.parse(row.record_json) as Commission;
  }

  appendAuditEvent(event: EscrowAuditEvent): void {
    this.appendAuditStmt.run(
      event.eventId,
      event.contractId,
      event.type,
      event.actor || null,
      event.occurredAt,
      JSON.stringify(event),
    );
  }

  getAuditEvents(contractId: string): EscrowAuditEvent[] {
    return this.getAuditStmt
      .all(contractId)
      .map((row) => JSON.parse(row.record_json) as EscrowAuditEvent);
  }

  close(): void {
    this.db.close();
  }
}

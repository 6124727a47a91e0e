import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { CappedToken } from "./token";
import type { TokenEventType } from "./types";
import { TokenError } from "./errors";
import {
  deserializeState,
  serializeEvent,
  serializeState,
  type SerializedEventFields,
} from "./snapshot";

// ── Row types ───────────────────────────────────────────────────────

interface TokenRow {
  state: string;
}

interface EventRow {
  id: number;
  event_type: string;
  data: string;
  created_at: string;
}

interface OperationRow {
  id: number;
  operation: string;
  actor: string;
  amount: string | null;
  target: string | null;
  status: string;
  created_at: string;
}

export interface StoredEvent {
  id: number;
  type: string;
  fields: SerializedEventFields;
  createdAt: string;
}

export type OperationStatus = "confirmed" | "failed";

export interface OperationRecord {
  operation: string;
  actor: string;
  amount?: string;
  target?: string;
  status?: OperationStatus;
}

export interface StoredOperation extends Required<Omit<OperationRecord, "amount" | "target">> {
  id: number;
  amount: string | null;
  target: string | null;
  createdAt: string;
}

export interface PageQuery {
  limit?: number;
  offset?: number;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS token (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      state TEXT NOT NULL,
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      event_type TEXT NOT NULL,
      data TEXT NOT NULL,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_events_type ON events(event_type);

    CREATE TABLE IF NOT EXISTS operations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      operation TEXT NOT NULL,
      actor TEXT NOT NULL,
      amount TEXT,
      target TEXT,
      status TEXT NOT NULL DEFAULT 'confirmed',
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_ops_actor ON operations(actor);
  `);
}

function parseFields(data: string, id: number): SerializedEventFields {
  const parsed: unknown = JSON.parse(data);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new TokenError("CorruptSnapshot", "Event payload is not an object", { id });
  }
  const fields: SerializedEventFields = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "string" && value !== null) {
      throw new TokenError("CorruptSnapshot", "Event field is not a string", { id, key });
    }
    fields[key] = value;
  }
  return fields;
}

/**
 * SQLite persistence for a single token: its current state, the log of
 * events it has emitted and a log of operations run against it.
 */
export class TokenStore {
  private readonly db: Database.Database;
  /** How many of a token object's journal entries are already on disk. */
  private readonly persisted = new WeakMap<CappedToken, number>();

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    initSchema(this.db);
  }

  exists(): boolean {
    return this.db.prepare<[], TokenRow>(`SELECT state FROM token WHERE id = 1`).get() !== undefined;
  }

  load(): CappedToken | null {
    const row = this.db.prepare<[], TokenRow>(`SELECT state FROM token WHERE id = 1`).get();
    if (!row) return null;
    const token = CappedToken.restore(deserializeState(row.state));
    this.persisted.set(token, token.events().length);
    return token;
  }

  /** Write the token state and any events not yet stored, in one transaction. */
  save(token: CappedToken): void {
    const from = this.persisted.get(token) ?? 0;
    const events = token.events().slice(from);
    const state = JSON.stringify(serializeState(token.snapshot()));

    const upsert = this.db.prepare<[string]>(
      `INSERT INTO token (id, state) VALUES (1, ?)
       ON CONFLICT(id) DO UPDATE SET state = excluded.state, updated_at = datetime('now')`
    );
    const insertEvent = this.db.prepare<[string, string]>(
      `INSERT INTO events (event_type, data) VALUES (?, ?)`
    );

    this.db.transaction(() => {
      upsert.run(state);
      for (const event of events) {
        insertEvent.run(event.type, JSON.stringify(serializeEvent(event)));
      }
    })();

    this.persisted.set(token, from + events.length);
  }

  recordOperation(op: OperationRecord): number {
    const result = this.db
      .prepare<[string, string, string | null, string | null, string]>(
        `INSERT INTO operations (operation, actor, amount, target, status) VALUES (?, ?, ?, ?, ?)`
      )
      .run(op.operation, op.actor, op.amount ?? null, op.target ?? null, op.status ?? "confirmed");
    return Number(result.lastInsertRowid);
  }

  getEvents(query: PageQuery & { type?: TokenEventType } = {}): StoredEvent[] {
    const limit = query.limit ?? 50;
    const offset = query.offset ?? 0;
    const rows = query.type
      ? this.db
          .prepare<[string, number, number], EventRow>(
            `SELECT * FROM events WHERE event_type = ? ORDER BY id DESC LIMIT ? OFFSET ?`
          )
          .all(query.type, limit, offset)
      : this.db
          .prepare<[number, number], EventRow>(`SELECT * FROM events ORDER BY id DESC LIMIT ? OFFSET ?`)
          .all(limit, offset);

    return rows.map((row) => ({
      id: row.id,
      type: row.event_type,
      fields: parseFields(row.data, row.id),
      createdAt: row.created_at,
    }));
  }

  getOperations(query: PageQuery & { actor?: string } = {}): StoredOperation[] {
    const limit = query.limit ?? 50;
    const offset = query.offset ?? 0;
    const rows = query.actor
      ? this.db
          .prepare<[string, number, number], OperationRow>(
            `SELECT * FROM operations WHERE actor = ? ORDER BY id DESC LIMIT ? OFFSET ?`
          )
          .all(query.actor, limit, offset)
      : this.db
          .prepare<[number, number], OperationRow>(`SELECT * FROM operations ORDER BY id DESC LIMIT ? OFFSET ?`)
          .all(limit, offset);

    return rows.map((row) => ({
      id: row.id,
      operation: row.operation,
      actor: row.actor,
      amount: row.amount,
      target: row.target,
      status: row.status === "failed" ? "failed" : "confirmed",
      createdAt: row.created_at,
    }));
  }

  close(): void {
    this.db.close();
  }
}

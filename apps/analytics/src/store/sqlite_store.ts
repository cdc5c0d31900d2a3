import path from "node:path";
import fs from "node:fs";
import Database from "better-sqlite3";
import { LogRecordV1Schema, type LogRecordV1 } from "@lanewatch/contracts";
import { indexColumns, type EventStore, type ListEventsQuery, type StoredEvent } from "./event_store";

export type SqliteEventStoreConfig = {
  filePath: string; // ":memory:" for an in-process database
};

type EventRow = {
  seq: number;
  record_json: string;
};

export class SqliteEventStore implements EventStore {
  readonly kind = "sqlite" as const;
  private db: Database.Database;

  constructor(cfg: SqliteEventStoreConfig) {
    if (cfg.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    this.db.pragma("journal_mode = WAL");
    this.createTables();
  }

  private createTables(): void {
    // append-only
    this.db.exec(`
      create table if not exists event_log (
        seq integer primary key autoincrement,
        type text not null,
        ts_ms integer not null,
        lane_id text,
        track_id integer,
        record_json text not null
      );

      create index if not exists idx_event_log_ts on event_log(ts_ms);
      create index if not exists idx_event_log_type on event_log(type);
    `);
  }

  async init(): Promise<void> {
    // tables are created in the constructor
  }

  async ping(): Promise<void> {
    const row = this.db.prepare<[], { ok: number }>(`select 1 as ok`).get();
    if (row?.ok !== 1) throw new Error("sqlite ping failed");
  }

  async insert(record: LogRecordV1): Promise<void> {
    this.insertSync(record);
  }

  private insertSync(record: LogRecordV1): number {
    const { lane_id, track_id } = indexColumns(record);
    const stmt = this.db.prepare<[string, number, string | null, number | null, string]>(
      `insert into event_log (type, ts_ms, lane_id, track_id, record_json) values (?, ?, ?, ?, ?)`
    );
    const info = stmt.run(record.type, Math.round(record.ts_ms), lane_id, track_id, JSON.stringify(record));
    return Number(info.lastInsertRowid);
  }

  async listRecent(q: ListEventsQuery): Promise<StoredEvent[]> {
    const stmt = this.db.prepare<[string | null, string | null, number], EventRow>(
      `select seq, record_json from event_log
       where (? is null or type = ?)
       order by seq desc
       limit ?`
    );
    const type = q.type ?? null;
    return stmt.all(type, type, q.limit).map((row) => ({
      seq: row.seq,
      record: LogRecordV1Schema.parse(JSON.parse(row.record_json)),
    }));
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>(`select count(*) as n from event_log`).get();
    return row?.n ?? 0;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

import { Pool } from "pg";
import { LogRecordV1Schema, type LogRecordV1 } from "@lanewatch/contracts";
import { indexColumns, type EventStore, type ListEventsQuery, type StoredEvent } from "./event_store";

type EventRow = {
  seq: string; // bigserial arrives as text
  record_json: unknown; // jsonb, already parsed by pg
};

export class PgEventStore implements EventStore {
  readonly kind = "postgres" as const;
  private pool: Pool;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async ping(): Promise<void> {
    const r = await this.pool.query("select 1 as ok");
    if (!r.rows.length) throw new Error("pg ping failed");
  }

  async init(): Promise<void> {
    await this.pool.query(`
      create table if not exists traffic_events (
        seq bigserial primary key,
        type text not null,
        ts_ms bigint not null,
        lane_id text,
        track_id integer,
        record_json jsonb not null
      );
      create index if not exists idx_traffic_events_ts on traffic_events(ts_ms);
      create index if not exists idx_traffic_events_type on traffic_events(type);
    `);
  }

  async insert(record: LogRecordV1): Promise<void> {
    const { lane_id, track_id } = indexColumns(record);
    await this.pool.query(
      `insert into traffic_events (type, ts_ms, lane_id, track_id, record_json)
       values ($1, $2, $3, $4, $5::jsonb)`,
      [record.type, Math.round(record.ts_ms), lane_id, track_id, JSON.stringify(record)]
    );
  }

  async listRecent(q: ListEventsQuery): Promise<StoredEvent[]> {
    const where: string[] = [];
    const values: Array<string | number> = [];
    let i = 1;

    if (q.type) {
      where.push(`type = $${i++}`);
      values.push(q.type);
    }
    values.push(q.limit);

    const r = await this.pool.query<EventRow>(
      `select seq, record_json from traffic_events
       ${where.length ? `where ${where.join(" and ")}` : ""}
       order by seq desc
       limit $${i}`,
      values
    );
    return r.rows.map((row) => ({ seq: Number(row.seq), record: LogRecordV1Schema.parse(row.record_json) }));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

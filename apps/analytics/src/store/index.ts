import path from "node:path";
import { PgEventStore } from "./pg_store";
import { SqliteEventStore } from "./sqlite_store";
import type { EventStore } from "./event_store";

export * from "./event_store";
export { PgEventStore } from "./pg_store";
export { SqliteEventStore } from "./sqlite_store";

export const DEFAULT_EVENT_DB_RELATIVE = path.join("apps", "analytics", "data", "events.sqlite");

export function makeEventStoreFromEnv(repoRoot: string, env: NodeJS.ProcessEnv = process.env): EventStore {
  const driver = (env.EVENT_STORE_DRIVER ?? "sqlite").toLowerCase();

  if (driver === "sqlite") {
    const configured = env.EVENT_DB_PATH?.trim();
    const filePath = !configured
      ? path.join(repoRoot, DEFAULT_EVENT_DB_RELATIVE)
      : configured === ":memory:"
        ? configured
        : path.resolve(configured);
    return new SqliteEventStore({ filePath });
  }

  if (driver === "postgres") {
    const url = env.DATABASE_URL;
    if (!url) throw new Error("missing DATABASE_URL (EVENT_STORE_DRIVER=postgres)");
    return new PgEventStore(url);
  }

  throw new Error(`EVENT_STORE_DRIVER=${driver} not supported (sqlite | postgres)`);
}

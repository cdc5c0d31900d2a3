#!/usr/bin/env node
/**
 * Frame replay
 *
 * Streams recorded frame batches (JSONL, one FrameBatchV1 per line) through a
 * TrafficEngine wired to the sqlite event store, then prints the session summary.
 *
 * Contract:
 * - Lines are fed in file order; the engine decides ticks from batch timestamps.
 * - A line that is not a valid batch envelope stops the replay.
 * - Per-observation problems are counted, never fatal.
 *
 * Usage:
 *   npm run replay -- --file ./recordings/site-a.jsonl [--config ./config/analytics/default.json] [--db ./tmp/replay.sqlite]
 */

import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { FrameBatchV1Schema } from "@lanewatch/contracts";
import { TrafficEngine, createKernelLogger } from "@lanewatch/traffic-kernel";

import { loadAnalyticsConfig, resolveConfigPath } from "../apps/analytics/src/config";
import { SqliteEventStore } from "../apps/analytics/src/store";

/* -------------------- CLI utils -------------------- */

function arg(name: string, fallback: string | null = null): string | null {
  const i = process.argv.indexOf(name);
  if (i === -1) return fallback;
  const v = process.argv[i + 1];
  return v == null ? fallback : String(v);
}

function die(msg: string): never {
  console.error(msg);
  process.exit(1);
}

function iso(tsMs: number | null): string | null {
  return tsMs == null ? null : new Date(tsMs).toISOString();
}

/* -------------------- replay -------------------- */

async function main(): Promise<void> {
  const filePath = arg("--file", null);
  if (!filePath) die("Missing --file");

  const absFile = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(absFile)) die(`File not found: ${absFile}`);

  const configPath = arg("--config", null);
  const loaded = loadAnalyticsConfig(configPath ? path.resolve(process.cwd(), configPath) : resolveConfigPath());

  const dbArg = arg("--db", null);
  const store = new SqliteEventStore({ filePath: dbArg ? path.resolve(process.cwd(), dbArg) : ":memory:" });

  const logger = createKernelLogger("replay");
  const engine = new TrafficEngine(loaded.config, {
    logger,
    sinks: { log: { write: (record) => store.insert(record) } },
  });

  const rl = readline.createInterface({ input: fs.createReadStream(absFile, "utf8"), crlfDelay: Infinity });
  let lineNo = 0;
  let batches = 0;
  for await (const line of rl) {
    lineNo++;
    if (!line.trim()) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      die(`${absFile}:${lineNo}: invalid JSON (${String(err)})`);
    }
    const parsed = FrameBatchV1Schema.safeParse(raw);
    if (!parsed.success) {
      die(`${absFile}:${lineNo}: ${parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")}`);
    }

    engine.processFrame(parsed.data);
    batches++;
  }
  if (batches === 0) die(`No frame batches in ${absFile}`);

  await engine.flush();
  const stats = engine.stats();
  const sinks = engine.sinkStats();
  const stored = store.count();
  await store.close();

  const durationMs =
    stats.started_at_ms != null && stats.last_frame_ms != null ? stats.last_frame_ms - stats.started_at_ms : 0;

  console.log(
    JSON.stringify(
      {
        file: absFile,
        config: loaded.source,
        config_hash: loaded.config_hash,
        batches,
        duration_s: durationMs / 1000,
        started_utc: iso(stats.started_at_ms),
        tracks_created: stats.tracks_created,
        peak_vehicle_count: stats.peak_vehicle_count,
        peak_at_utc: iso(stats.peak_at_ms),
        incidents_opened: stats.incidents_opened,
        speed_violations: stats.violations,
        priority_requests: stats.priority_requests,
        observations_accepted: stats.observations_accepted,
        observations_rejected: stats.observations_rejected,
        events_stored: stored,
        sinks,
      },
      null,
      2
    )
  );
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});

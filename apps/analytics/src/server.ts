import Fastify from "fastify";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { ConfigError, loadAnalyticsConfig, repoRoot } from "./config";
import { registerAnalyticsRoutes } from "./routes";
import { AnalyticsRuntime } from "./runtime";
import { makeSignalSinkFromEnv } from "./sinks/signal_sink";
import { makeEventStoreFromEnv } from "./store";

function loadDotEnvFile(fp: string): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // real environment wins
    if (process.env[key] == null) process.env[key] = val;
  }
}

function loadEnv(): void {
  // Repo root .env first, then the app's own.
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const root = path.resolve(__dirname, "..", "..", "..");
  loadDotEnvFile(path.join(root, ".env"));
  loadDotEnvFile(path.join(__dirname, "..", ".env"));
}

loadEnv();

const app = Fastify({ logger: { level: process.env.LOG_LEVEL ?? "info" } });

app.addHook("onRequest", async (req, reply) => {
  reply.header("Access-Control-Allow-Origin", "*");
  reply.header("Access-Control-Allow-Headers", "content-type");
  reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
  if (req.method === "OPTIONS") return reply.code(204).send();
});

async function main(): Promise<void> {
  const loaded = loadAnalyticsConfig();
  app.log.info({ source: loaded.source, config_hash: loaded.config_hash, lanes: loaded.config.lanes.length }, "config loaded");

  const store = makeEventStoreFromEnv(repoRoot());
  await store.init();
  await store.ping();
  app.log.info({ store: store.kind }, "event store ready");

  const runtime = new AnalyticsRuntime({
    loaded,
    store,
    logger: app.log,
    signal: makeSignalSinkFromEnv(app.log),
  });
  registerAnalyticsRoutes(app, runtime);

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ signal }, "shutting down");
    await app.close();
    await runtime.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        app.log.error(err);
        process.exit(1);
      });
    });
  }

  const port = Number(process.env.PORT ?? 3210);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen({ port, host });
}

main().catch((err) => {
  if (err instanceof ConfigError) app.log.error({ errors: err.errors }, "invalid analytics config");
  else app.log.error(err);
  process.exit(1);
});

// Analytics config SSOT loader.
//
// Source of truth:
//   config/analytics/default.json (override with ANALYTICS_CONFIG)
//
// Contract:
// - Whole file validated by AnalyticsConfigV1Schema; defaults filled in.
// - Lane geometry validated by validateLanes (LaneConfigError propagates as-is).
// - config_hash = "sha256:" + sha256(stableStringify(effective config)).

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { AnalyticsConfigV1Schema, type AnalyticsConfigV1 } from "@lanewatch/contracts";
import { validateLanes } from "@lanewatch/traffic-kernel";
import { findRepoRoot, sha256Hex, stableStringify } from "./util";

export const DEFAULT_CONFIG_RELATIVE = path.join("config", "analytics", "default.json");

export type ConfigIssue = {
  path: string;
  message: string;
};

export class ConfigError extends Error {
  public readonly status: number;
  public readonly errors: ConfigIssue[];

  constructor(errors: ConfigIssue[], status = 400) {
    super(errors.map((e) => `${e.path}: ${e.message}`).join("; "));
    this.name = "ConfigError";
    this.status = status;
    this.errors = errors;
  }
}

export type LoadedConfig = {
  config: AnalyticsConfigV1;
  config_hash: string;
  source: string;
};

export function repoRoot(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return findRepoRoot(here, DEFAULT_CONFIG_RELATIVE);
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.ANALYTICS_CONFIG;
  if (override && override.trim()) return path.resolve(override.trim());
  return path.join(repoRoot(), DEFAULT_CONFIG_RELATIVE);
}

export function computeConfigHash(config: AnalyticsConfigV1): string {
  return `sha256:${sha256Hex(stableStringify(config))}`;
}

export function parseAnalyticsConfig(raw: unknown, source = "(inline)"): LoadedConfig {
  const parsed = AnalyticsConfigV1Schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => ({ path: i.path.length ? i.path.join(".") : "(root)", message: i.message }))
    );
  }
  validateLanes(parsed.data.lanes);
  return { config: parsed.data, config_hash: computeConfigHash(parsed.data), source };
}

export function loadAnalyticsConfig(filePath: string = resolveConfigPath()): LoadedConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ConfigError([{ path: filePath, message: `cannot read config: ${String(err)}` }], 500);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError([{ path: filePath, message: `invalid JSON: ${String(err)}` }], 500);
  }
  return parseAnalyticsConfig(raw, filePath);
}

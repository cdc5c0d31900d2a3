import pino from "pino";
import type { BaseLogger } from "pino";

// Subset of the pino logger the kernel writes to. Fastify's `app.log` satisfies it.
export type KernelLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export function createKernelLogger(name = "traffic-kernel"): KernelLogger {
  return pino({ name, level: process.env.LOG_LEVEL ?? "info" });
}

export function silentLogger(): KernelLogger {
  return pino({ level: "silent" });
}

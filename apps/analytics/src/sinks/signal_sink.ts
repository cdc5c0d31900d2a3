import type { PriorityRequestV1 } from "@lanewatch/contracts";
import type { KernelLogger, SignalSink } from "@lanewatch/traffic-kernel";

// Posts each request as JSON to the signal controller's endpoint.
export class HttpSignalSink implements SignalSink {
  constructor(
    private readonly url: string,
    private readonly timeoutMs = 2000
  ) {}

  async requestPriority(request: PriorityRequestV1): Promise<void> {
    const res = await fetch(this.url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(request),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`signal controller rejected ${request.request_id}: HTTP ${res.status}`);
    }
  }
}

// Used when no controller is configured; requests only reach the log.
export class LoggingSignalSink implements SignalSink {
  constructor(private readonly log: KernelLogger) {}

  requestPriority(request: PriorityRequestV1): void {
    this.log.info({ request }, "signal priority request (no controller configured)");
  }
}

export function makeSignalSinkFromEnv(log: KernelLogger, env: NodeJS.ProcessEnv = process.env): SignalSink {
  const url = env.SIGNAL_SINK_URL;
  if (url && url.trim()) return new HttpSignalSink(url.trim());
  return new LoggingSignalSink(log);
}

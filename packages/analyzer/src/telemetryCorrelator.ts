import {
  createLogger,
  describeError,
  type JsonObject,
  type Logger,
  type ScreenSession,
  type SessionTelemetry,
  type TimelineEvent,
} from "@screenflow/metrics-io";
import { InsightEngine } from "./insightEngine";

/** Outcome of one backend query. `absent` means the backend had nothing to give. */
export type ProbeResult<T> =
  | { status: "ok"; data: T }
  | { status: "absent" }
  | { status: "failed"; error: string };

export type ProbeStatus = ProbeResult<unknown>["status"];

export interface VmTimeline {
  traceEvents?: TimelineEvent[];
}

/** Live profiling connection to the running application. */
export interface ProfilingBackend {
  isConnected(): boolean;
  selectedIsolateId(): string | null;
  getCpuSamples(
    isolateId: string,
    timeOriginMicros: number,
    timeExtentMicros: number
  ): Promise<JsonObject | null>;
  getVMTimeline(): Promise<VmTimeline | null>;
  getMemoryUsage?(isolateId: string): Promise<JsonObject | null>;
}

/** Backend for observers with no profiling connection. */
export class DisconnectedBackend implements ProfilingBackend {
  isConnected(): boolean {
    return false;
  }

  selectedIsolateId(): string | null {
    return null;
  }

  async getCpuSamples(): Promise<JsonObject | null> {
    return null;
  }

  async getVMTimeline(): Promise<VmTimeline | null> {
    return null;
  }
}

export interface CorrelationReport {
  sessionId: string;
  cpuProfile: ProbeStatus;
  timeline: ProbeStatus;
  memoryStats: ProbeStatus;
  insightCount: number;
}

export interface TelemetryCorrelatorOptions {
  backend: ProfilingBackend;
  insightEngine?: InsightEngine;
  /** Called once per correlated session, after insights are attached. */
  onEnriched?: (session: ScreenSession) => void;
  logger?: Logger;
}

/**
 * Enriches a completed session with CPU samples for its time window plus the
 * current timeline snapshot and memory statistics, then runs insight
 * analysis on it.
 *
 * Every probe is best effort: a failure leaves that field untouched and
 * the remaining probes still run.
 */
export class TelemetryCorrelator {
  readonly insightEngine: InsightEngine;
  private readonly backend: ProfilingBackend;
  private readonly logger: Logger;

  constructor(private readonly options: TelemetryCorrelatorOptions) {
    this.backend = options.backend;
    this.insightEngine = options.insightEngine ?? new InsightEngine();
    this.logger = options.logger ?? createLogger("TelemetryCorrelator");
  }

  async correlate(session: ScreenSession): Promise<CorrelationReport> {
    const cpu = await this.probeCpuSamples(session);
    const timeline = await this.probeTimeline();
    const memory = await this.probeMemory();

    const telemetry: SessionTelemetry = {};
    if (cpu.status === "ok") telemetry.cpuProfile = cpu.data;
    if (timeline.status === "ok") telemetry.timelineEvents = timeline.data;
    if (memory.status === "ok") telemetry.memoryStats = memory.data;
    session.setTelemetry(telemetry);

    const insights = this.insightEngine.analyze(session);
    session.setInsights(insights);
    this.logger.debug(
      `Correlated ${session.routeName} (${session.sessionId}): ${insights.length} insights`
    );
    this.options.onEnriched?.(session);

    return {
      sessionId: session.sessionId,
      cpuProfile: cpu.status,
      timeline: timeline.status,
      memoryStats: memory.status,
      insightCount: insights.length,
    };
  }

  private connectedIsolate(): string | null {
    if (!this.backend.isConnected()) return null;
    return this.backend.selectedIsolateId();
  }

  private async probeCpuSamples(session: ScreenSession): Promise<ProbeResult<JsonObject>> {
    const isolateId = this.connectedIsolate();
    const durationMicros = session.durationMicros;
    if (isolateId === null || durationMicros === null) {
      return { status: "absent" };
    }
    return this.probe("CPU samples", () =>
      this.backend.getCpuSamples(isolateId, session.startTimeMicros, durationMicros)
    );
  }

  /** The backend has no windowed timeline query; the whole snapshot is kept. */
  private async probeTimeline(): Promise<ProbeResult<TimelineEvent[]>> {
    if (!this.backend.isConnected()) {
      return { status: "absent" };
    }

    const result = await this.probe("VM timeline", () => this.backend.getVMTimeline());
    if (result.status !== "ok") return result;
    return { status: "ok", data: result.data.traceEvents ?? [] };
  }

  private async probeMemory(): Promise<ProbeResult<JsonObject>> {
    const isolateId = this.connectedIsolate();
    const getMemoryUsage = this.backend.getMemoryUsage;
    if (isolateId === null || !getMemoryUsage) {
      return { status: "absent" };
    }
    return this.probe("memory usage", () => getMemoryUsage.call(this.backend, isolateId));
  }

  private async probe<T>(
    label: string,
    query: () => Promise<T | null>
  ): Promise<ProbeResult<T>> {
    try {
      const data = await query();
      return data === null ? { status: "absent" } : { status: "ok", data };
    } catch (e) {
      const error = describeError(e);
      this.logger.warn(`Failed to fetch ${label}: ${error}`);
      return { status: "failed", error };
    }
  }
}

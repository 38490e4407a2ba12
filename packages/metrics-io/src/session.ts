import { randomUUID } from "node:crypto";
import {
  buildDurationMs,
  createFrameMetric,
  frameMetricToJson,
  isJanky,
  rasterDurationMs,
} from "./frameMetric";
import type {
  FrameMetric,
  FrameMetricsAggregate,
  JsonObject,
  PerformanceInsight,
  PerformanceInsightJson,
  ScreenSessionJson,
  TimelineEvent,
} from "./types";

export interface ScreenSessionInit {
  sessionId?: string;
  routeName: string;
  startTimeMicros: number;
  endTimeMicros?: number | null;
  isPopup?: boolean;
  previousRoute?: string | null;
  frameMetrics?: FrameMetric[];
  timelineEvents?: TimelineEvent[];
  insights?: PerformanceInsight[];
  cpuProfile?: JsonObject | null;
  memoryStats?: JsonObject | null;
}

export interface SessionTelemetry {
  cpuProfile?: JsonObject | null;
  memoryStats?: JsonObject | null;
  timelineEvents?: TimelineEvent[];
}

/**
 * One continuous period during which a single route is the active screen.
 *
 * Frame metrics are append-only while the session is active and frozen once
 * it ends. Telemetry and insights may still be attached after the end.
 */
export class ScreenSession {
  readonly sessionId: string;
  readonly routeName: string;
  readonly startTimeMicros: number;
  readonly isPopup: boolean;
  readonly previousRoute: string | null;

  private _endTimeMicros: number | null;
  private readonly _frameMetrics: Readonly<FrameMetric>[];
  private _timelineEvents: TimelineEvent[];
  private _insights: Readonly<PerformanceInsight>[];
  private _cpuProfile: JsonObject | null;
  private _memoryStats: JsonObject | null;

  constructor(init: ScreenSessionInit) {
    this.sessionId = init.sessionId ?? randomUUID();
    this.routeName = init.routeName;
    this.startTimeMicros = init.startTimeMicros;
    this.isPopup = init.isPopup ?? false;
    this.previousRoute = init.previousRoute ?? null;
    this._endTimeMicros = init.endTimeMicros ?? null;
    this._frameMetrics = (init.frameMetrics ?? []).map(createFrameMetric);
    this._timelineEvents = [...(init.timelineEvents ?? [])];
    this._insights = (init.insights ?? []).map(freezeInsight);
    this._cpuProfile = init.cpuProfile ?? null;
    this._memoryStats = init.memoryStats ?? null;
  }

  get endTimeMicros(): number | null {
    return this._endTimeMicros;
  }

  get isActive(): boolean {
    return this._endTimeMicros === null;
  }

  /** Null while the session is still active. */
  get durationMicros(): number | null {
    if (this._endTimeMicros === null) return null;
    return this._endTimeMicros - this.startTimeMicros;
  }

  get durationMs(): number | null {
    const micros = this.durationMicros;
    return micros === null ? null : micros / 1000;
  }

  get frameMetrics(): readonly Readonly<FrameMetric>[] {
    return this._frameMetrics;
  }

  get timelineEvents(): readonly TimelineEvent[] {
    return this._timelineEvents;
  }

  get insights(): readonly Readonly<PerformanceInsight>[] {
    return this._insights;
  }

  get cpuProfile(): JsonObject | null {
    return this._cpuProfile;
  }

  get memoryStats(): JsonObject | null {
    return this._memoryStats;
  }

  /**
   * Seals the session. Only the first call has an effect; an end time earlier
   * than the start is clamped to the start.
   *
   * @returns whether this call ended the session
   */
  end(endTimeMicros: number): boolean {
    if (this._endTimeMicros !== null) return false;
    this._endTimeMicros = Math.max(endTimeMicros, this.startTimeMicros);
    return true;
  }

  /** @returns false when the session has already ended and the metric was not taken */
  addFrameMetric(metric: FrameMetric): boolean {
    if (this._endTimeMicros !== null) return false;
    this._frameMetrics.push(createFrameMetric(metric));
    return true;
  }

  setTelemetry(telemetry: SessionTelemetry): void {
    if (telemetry.cpuProfile !== undefined) this._cpuProfile = telemetry.cpuProfile;
    if (telemetry.memoryStats !== undefined) this._memoryStats = telemetry.memoryStats;
    if (telemetry.timelineEvents !== undefined) {
      this._timelineEvents = [...telemetry.timelineEvents];
    }
  }

  /** Replaces the insight list; every analysis run produces a fresh one. */
  setInsights(insights: PerformanceInsight[]): void {
    this._insights = insights.map(freezeInsight);
  }

  get avgBuildMs(): number {
    if (this._frameMetrics.length === 0) return 0;
    const sum = this._frameMetrics.reduce((acc, m) => acc + buildDurationMs(m), 0);
    return sum / this._frameMetrics.length;
  }

  get avgRasterMs(): number {
    if (this._frameMetrics.length === 0) return 0;
    const sum = this._frameMetrics.reduce((acc, m) => acc + rasterDurationMs(m), 0);
    return sum / this._frameMetrics.length;
  }

  get jankyFrameCount(): number {
    return this._frameMetrics.filter(isJanky).length;
  }

  /** 0-100 */
  get jankPercentage(): number {
    if (this._frameMetrics.length === 0) return 0;
    return (this.jankyFrameCount / this._frameMetrics.length) * 100;
  }

  /** Null when the session has no frames. */
  aggregate(): FrameMetricsAggregate | null {
    if (this._frameMetrics.length === 0) return null;
    return aggregateFrameMetrics(this._frameMetrics);
  }

  toJSON(): ScreenSessionJson {
    return {
      sessionId: this.sessionId,
      routeName: this.routeName,
      startTimeMicros: this.startTimeMicros,
      endTimeMicros: this._endTimeMicros,
      isPopup: this.isPopup,
      previousRoute: this.previousRoute,
      frameMetrics: this._frameMetrics.map(frameMetricToJson),
      cpuProfile: this._cpuProfile,
      memoryStats: this._memoryStats,
      timelineEvents: [...this._timelineEvents],
      insights: this._insights.map(insightToJson),
      aggregate: this.aggregate(),
    };
  }

  /** The `aggregate` field is derived and ignored on the way in. */
  static fromJSON(json: ScreenSessionJson): ScreenSession {
    return new ScreenSession({
      sessionId: json.sessionId,
      routeName: json.routeName,
      startTimeMicros: json.startTimeMicros,
      endTimeMicros: json.endTimeMicros,
      isPopup: json.isPopup,
      previousRoute: json.previousRoute,
      frameMetrics: json.frameMetrics,
      cpuProfile: json.cpuProfile,
      memoryStats: json.memoryStats,
      timelineEvents: json.timelineEvents,
      insights: json.insights.map(insightFromJson),
    });
  }
}

/**
 * Nearest-rank percentile: the value at `floor(n * p)` of the ascending
 * array, clamped to the last index. Not interpolated.
 */
export function percentile(sortedValues: readonly number[], p: number): number {
  if (sortedValues.length === 0) return 0;
  const index = Math.floor(sortedValues.length * p);
  return sortedValues[Math.min(Math.max(index, 0), sortedValues.length - 1)] ?? 0;
}

export function aggregateFrameMetrics(
  metrics: readonly FrameMetric[]
): FrameMetricsAggregate {
  if (metrics.length === 0) {
    return {
      avgBuildMs: 0,
      p90BuildMs: 0,
      p99BuildMs: 0,
      avgRasterMs: 0,
      p90RasterMs: 0,
      p99RasterMs: 0,
      frameCount: 0,
      jankyFrameCount: 0,
    };
  }

  const buildTimes = metrics.map(buildDurationMs).sort((a, b) => a - b);
  const rasterTimes = metrics.map(rasterDurationMs).sort((a, b) => a - b);
  const sum = (values: number[]) => values.reduce((a, b) => a + b, 0);

  return {
    avgBuildMs: sum(buildTimes) / buildTimes.length,
    p90BuildMs: percentile(buildTimes, 0.9),
    p99BuildMs: percentile(buildTimes, 0.99),
    avgRasterMs: sum(rasterTimes) / rasterTimes.length,
    p90RasterMs: percentile(rasterTimes, 0.9),
    p99RasterMs: percentile(rasterTimes, 0.99),
    frameCount: metrics.length,
    jankyFrameCount: metrics.filter(isJanky).length,
  };
}

function freezeInsight(insight: PerformanceInsight): Readonly<PerformanceInsight> {
  const frozen: PerformanceInsight = {
    type: insight.type,
    title: insight.title,
    description: insight.description,
    suggestions: Object.freeze([...insight.suggestions]),
    severity: insight.severity,
  };
  if (insight.metadata !== undefined) {
    frozen.metadata = Object.freeze({ ...insight.metadata });
  }
  return Object.freeze(frozen);
}

export function insightToJson(insight: PerformanceInsight): PerformanceInsightJson {
  return {
    type: insight.type,
    title: insight.title,
    description: insight.description,
    suggestions: [...insight.suggestions],
    severity: insight.severity,
    metadata: insight.metadata ? { ...insight.metadata } : null,
  };
}

export function insightFromJson(json: PerformanceInsightJson): PerformanceInsight {
  const insight: PerformanceInsight = {
    type: json.type,
    title: json.title,
    description: json.description,
    suggestions: [...json.suggestions],
    severity: json.severity,
  };
  if (json.metadata !== null) {
    insight.metadata = { ...json.metadata };
  }
  return insight;
}

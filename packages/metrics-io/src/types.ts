export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Opaque trace event as delivered by the profiling backend's timeline. */
export type TimelineEvent = JsonObject;

export interface FrameMetric {
  /** Monotonic capture time, microseconds. */
  timestampMicros: number;
  buildDurationMicros: number;
  rasterDurationMicros: number;
  totalDurationMicros: number;
  /** Sequential for the lifetime of the collector, not per session. */
  frameNumber: number;
}

/** Raw per-frame phase boundaries reported by the host rendering pipeline. */
export interface FrameTiming {
  buildStartMicros: number;
  buildFinishMicros: number;
  rasterStartMicros: number;
  rasterFinishMicros: number;
}

export type InsightSeverity = "info" | "warning" | "critical";

export type InsightMetadata = Record<string, number | string | boolean>;

export interface PerformanceInsight {
  type: string;
  title: string;
  description: string;
  suggestions: readonly string[];
  severity: InsightSeverity;
  metadata?: Readonly<InsightMetadata>;
}

export interface FrameMetricsAggregate {
  avgBuildMs: number;
  p90BuildMs: number;
  p99BuildMs: number;
  avgRasterMs: number;
  p90RasterMs: number;
  p99RasterMs: number;
  frameCount: number;
  jankyFrameCount: number;
}

export interface FrameMetricJson {
  timestampMicros: number;
  buildDurationMicros: number;
  rasterDurationMicros: number;
  totalDurationMicros: number;
  frameNumber: number;
}

export interface PerformanceInsightJson {
  type: string;
  title: string;
  description: string;
  suggestions: string[];
  severity: InsightSeverity;
  metadata: InsightMetadata | null;
}

export interface ScreenSessionJson {
  sessionId: string;
  routeName: string;
  startTimeMicros: number;
  endTimeMicros: number | null;
  isPopup: boolean;
  previousRoute: string | null;
  frameMetrics: FrameMetricJson[];
  cpuProfile: JsonObject | null;
  memoryStats: JsonObject | null;
  timelineEvents: TimelineEvent[];
  insights: PerformanceInsightJson[];
  aggregate: FrameMetricsAggregate | null;
}

export interface ExportMeta {
  schemaVersion: string;
  appId: string;
  flutterVersion: string;
  /** ISO-8601 wall-clock time of the export. */
  timestamp: string;
  device: string;
  totalFrames?: number;
}

export interface ExportEnvelope {
  meta: ExportMeta;
  sessions: ScreenSessionJson[];
}

export interface ExportOptions {
  appId?: string;
  frameworkVersion?: string;
  device?: string;
  totalFrames?: number;
  /** Overrides the export timestamp; defaults to the current time. */
  exportedAt?: Date;
}

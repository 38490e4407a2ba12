export {
  JANK_THRESHOLD_MICROS,
  createFrameMetric,
  frameMetricFromTiming,
  wholeMicros,
  isJanky,
  buildDurationMs,
  rasterDurationMs,
  totalDurationMs,
  frameMetricToJson,
  describeFrameMetric,
} from "./frameMetric";
export {
  ScreenSession,
  aggregateFrameMetrics,
  percentile,
  insightToJson,
  insightFromJson,
  type ScreenSessionInit,
  type SessionTelemetry,
} from "./session";
export {
  EVENT_PREFIX,
  EVENT_SCHEMAS,
  LoopbackTransport,
  qualifiedKind,
  postEvent,
  parseEvent,
  encodeEventLine,
  decodeEventLine,
  decodeEventStream,
  flattenIssues,
  type EventKind,
  type EventPayloads,
  type ScreenStartPayload,
  type ScreenEndPayload,
  type FrameBatchPayload,
  type CollectorStartPayload,
  type CollectorStopPayload,
  type TelemetryEvent,
  type RawEvent,
  type RawEventListener,
  type TelemetryTransport,
} from "./events";
export {
  SCHEMA_VERSION,
  buildExportMeta,
  exportSessions,
  serializeSessions,
  importSessions,
  type ImportedSessions,
} from "./json";
export { ArchiveImporter, writeArchive, readArchive, type SessionArchive } from "./importer";
export { ArchiveReader, type FramePage } from "./exporter";
export { ARCHIVE_SCHEMA_VERSION, CREATE_TABLES_SQL, DROP_TABLES_SQL } from "./schema";
export {
  ScreenflowError,
  ScreenflowErrorCode,
  UnknownSessionError,
  InvalidFormatError,
  isScreenflowError,
} from "./errors";
export { createLogger, describeError, type Logger, type LogLevel } from "./logger";
export { env, parseLogLevel } from "./env";
export type {
  JsonValue,
  JsonObject,
  TimelineEvent,
  FrameMetric,
  FrameTiming,
  InsightSeverity,
  InsightMetadata,
  PerformanceInsight,
  FrameMetricsAggregate,
  FrameMetricJson,
  PerformanceInsightJson,
  ScreenSessionJson,
  ExportMeta,
  ExportEnvelope,
  ExportOptions,
} from "./types";

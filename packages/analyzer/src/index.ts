export {
  InsightEngine,
  DEFAULT_DETECTORS,
  JANK_PERCENT_WARNING,
  JANK_PERCENT_CRITICAL,
  PHASE_MS_WARNING,
  PHASE_MS_CRITICAL,
  BUILD_STORM_MIN_FRAMES,
  BUILD_STORM_FACTOR,
  BUILD_STORM_FRAME_SHARE,
  SAVE_LAYER_CRITICAL_COUNT,
  excessiveJankDetector,
  highBuildTimeDetector,
  highRasterTimeDetector,
  buildStormDetector,
  saveLayerDetector,
  shaderJankDetector,
  intrinsicLayoutDetector,
  type InsightDetector,
} from "./insightEngine";
export {
  TelemetryCorrelator,
  DisconnectedBackend,
  type ProfilingBackend,
  type ProbeResult,
  type ProbeStatus,
  type VmTimeline,
  type CorrelationReport,
  type TelemetryCorrelatorOptions,
} from "./telemetryCorrelator";
export {
  createSessionStore,
  type SessionStore,
  type SessionState,
  type SessionFilters,
  type ComparisonSelection,
  type ComparisonPair,
} from "./sessionStore";
export {
  RemoteSessionManager,
  NOTIFY_THROTTLE_MS,
  type RemoteSessionManagerOptions,
  type SessionStateListener,
  type TimerFunctions,
} from "./remoteSessionManager";
export {
  compareSessions,
  isImprovement,
  isRegression,
  formatDelta,
  matchSessionsByRoute,
  type MetricDelta,
  type SessionComparison,
  type RoutePair,
} from "./comparison";
export {
  formatMicros,
  formatMs,
  formatPercent,
  formatDuration,
  truncateRoute,
  summarizeSession,
  formatAggregate,
} from "./utils";

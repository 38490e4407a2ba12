export { monotonicClock, type MonotonicClock } from "./clock";
export { resolveRouteName, type RouteLike, type RouteSettings } from "./routes";
export {
  FRAME_BATCH_SIZE,
  FrameTimingCollector,
  type FrameTimingCollectorOptions,
  type FrameTimingSource,
  type TimingsCallback,
} from "./frameTimingCollector";
export {
  NavigationTracker,
  type NavigationTrackerOptions,
  type SessionListener,
} from "./navigationTracker";
export {
  SessionRegistry,
  type SessionRegistryOptions,
  type ExportDataOptions,
} from "./sessionRegistry";
export { ManualFrameSource, timingFromDurations } from "./manualFrameSource";

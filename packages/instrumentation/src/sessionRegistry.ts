import {
  exportSessions,
  type ExportEnvelope,
  type ExportOptions,
  type FrameMetric,
  type Logger,
  type ScreenSession,
  type TelemetryTransport,
} from "@screenflow/metrics-io";
import type { MonotonicClock } from "./clock";
import { FrameTimingCollector, type FrameTimingSource } from "./frameTimingCollector";
import { NavigationTracker, type SessionListener } from "./navigationTracker";

export interface SessionRegistryOptions {
  frameSource: FrameTimingSource;
  transport?: TelemetryTransport;
  clock?: MonotonicClock;
  onSessionStart?: SessionListener;
  onSessionEnd?: SessionListener;
  onFrameMetric?: (metric: Readonly<FrameMetric>) => void;
  logger?: Logger;
}

export type ExportDataOptions = Omit<ExportOptions, "totalFrames">;

/**
 * Wires frame capture into navigation tracking: every collected frame goes to
 * the session on top of the navigation stack.
 *
 * Navigation is always tracked; only frame capture can be paused.
 *
 * @example
 * ```typescript
 * const registry = new SessionRegistry({ frameSource, transport });
 * registry.navigationTracker.didPush({ kind: "PageRoute", settings: { name: "/home" } });
 * registry.startCollecting();
 * ```
 */
export class SessionRegistry {
  readonly navigationTracker: NavigationTracker;
  readonly frameCollector: FrameTimingCollector;

  private active = false;

  constructor(options: SessionRegistryOptions) {
    this.navigationTracker = new NavigationTracker({
      transport: options.transport,
      clock: options.clock,
      logger: options.logger,
      onSessionStart: (session) => options.onSessionStart?.(session),
      onSessionEnd: (session) => options.onSessionEnd?.(session),
    });

    this.frameCollector = new FrameTimingCollector({
      source: options.frameSource,
      transport: options.transport,
      clock: options.clock,
      logger: options.logger,
      onFrameMetric: (metric) => {
        this.navigationTracker.addFrameToActiveSession(metric);
        options.onFrameMetric?.(metric);
      },
    });
  }

  get isActive(): boolean {
    return this.active;
  }

  get currentSession(): ScreenSession | null {
    return this.navigationTracker.currentSession;
  }

  get completedSessions(): readonly ScreenSession[] {
    return this.navigationTracker.completedSessions;
  }

  get frameCount(): number {
    return this.frameCollector.frameCount;
  }

  startCollecting(): void {
    if (this.active) return;
    this.frameCollector.start();
    this.active = true;
  }

  stopCollecting(): void {
    if (!this.active) return;
    this.frameCollector.stop();
    this.active = false;
  }

  clearSessions(): void {
    this.navigationTracker.clearCompletedSessions();
  }

  /** Stops capture, drops completed sessions and restarts frame numbering. */
  reset(): void {
    this.stopCollecting();
    this.clearSessions();
    this.frameCollector.reset();
  }

  /** Completed sessions only; the open session is not exported. */
  exportData(options: ExportDataOptions = {}): ExportEnvelope {
    return exportSessions(this.completedSessions, {
      ...options,
      totalFrames: this.frameCount,
    });
  }

  dispose(): void {
    this.stopCollecting();
  }
}

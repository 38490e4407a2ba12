import {
  EVENT_PREFIX,
  ScreenSession,
  UnknownSessionError,
  createLogger,
  describeError,
  exportSessions,
  importSessions,
  parseEvent,
  type ExportEnvelope,
  type ExportOptions,
  type FrameBatchPayload,
  type ImportedSessions,
  type Logger,
  type RawEvent,
  type ScreenEndPayload,
  type ScreenStartPayload,
  type TelemetryTransport,
} from "@screenflow/metrics-io";
import { createSessionStore, type SessionState, type SessionStore } from "./sessionStore";
import { DisconnectedBackend, TelemetryCorrelator } from "./telemetryCorrelator";

/** Minimum spacing between frame-driven notifications. */
export const NOTIFY_THROTTLE_MS = 100;

type TimerHandle = ReturnType<typeof setTimeout>;

export interface TimerFunctions {
  setTimeout: (callback: () => void, ms: number) => TimerHandle;
  clearTimeout: (handle: TimerHandle) => void;
}

export interface RemoteSessionManagerOptions {
  correlator?: TelemetryCorrelator;
  store?: SessionStore;
  prefix?: string;
  throttleMs?: number;
  timers?: TimerFunctions;
  /** Receives errors raised while handling transport events. */
  onError?: (error: Error, event: RawEvent) => void;
  logger?: Logger;
}

export type SessionStateListener = (state: SessionState, previous: SessionState) => void;

const defaultTimers: TimerFunctions = {
  setTimeout: (callback, ms) => setTimeout(callback, ms),
  clearTimeout: (handle) => clearTimeout(handle),
};

/**
 * Observer-side mirror of the application's sessions, rebuilt from the
 * event stream.
 *
 * State changes are published to a zustand store. Start, end and enrichment
 * publish immediately; frame batches publish at most once per throttle
 * window, with one trailing publish for whatever arrived in between.
 */
export class RemoteSessionManager {
  readonly store: SessionStore;
  readonly correlator: TelemetryCorrelator;

  private readonly prefix: string;
  private readonly throttleMs: number;
  private readonly timers: TimerFunctions;
  private readonly logger: Logger;

  private sessions: ScreenSession[] = [];
  private readonly sessionsById = new Map<string, ScreenSession>();
  private activeSession: ScreenSession | null = null;

  private throttleTimer: TimerHandle | null = null;
  private pendingNotify = false;
  private readonly inFlight = new Set<Promise<void>>();
  private unsubscribe: (() => void) | null = null;
  private disposed = false;

  constructor(private readonly options: RemoteSessionManagerOptions = {}) {
    this.store = options.store ?? createSessionStore();
    this.correlator =
      options.correlator ?? new TelemetryCorrelator({ backend: new DisconnectedBackend() });
    this.prefix = options.prefix ?? EVENT_PREFIX;
    this.throttleMs = options.throttleMs ?? NOTIFY_THROTTLE_MS;
    this.timers = options.timers ?? defaultTimers;
    this.logger = options.logger ?? createLogger("RemoteSessionManager");
  }

  get allSessions(): readonly ScreenSession[] {
    return [...this.sessions];
  }

  get completedSessions(): ScreenSession[] {
    return this.sessions.filter((s) => !s.isActive);
  }

  get currentSession(): ScreenSession | null {
    return this.activeSession;
  }

  get isAttached(): boolean {
    return this.unsubscribe !== null;
  }

  getSession(sessionId: string): ScreenSession | null {
    return this.sessionsById.get(sessionId) ?? null;
  }

  subscribe(listener: SessionStateListener): () => void {
    return this.store.subscribe(listener);
  }

  /** Starts consuming events from `transport`, replacing any earlier attachment. */
  attach(transport: TelemetryTransport): void {
    this.detach();
    this.unsubscribe = transport.subscribe((event) => {
      try {
        this.handleEvent(event);
      } catch (e) {
        const error = e instanceof Error ? e : new Error(String(e));
        this.logger.error(`Failed to handle ${event.kind}: ${describeError(e)}`);
        this.options.onError?.(error, event);
      }
    });
  }

  detach(): void {
    if (!this.unsubscribe) return;
    this.unsubscribe();
    this.unsubscribe = null;
  }

  /**
   * Applies one raw event. Events under a foreign prefix or of an unknown
   * kind are ignored.
   *
   * @throws InvalidFormatError when the payload is malformed
   * @throws UnknownSessionError when a screen end names a session never started
   */
  handleEvent(raw: RawEvent): void {
    const event = parseEvent(raw, this.prefix);
    if (!event) return;

    switch (event.kind) {
      case "screen_start":
        this.handleScreenStart(event.data);
        break;
      case "screen_end":
        this.handleScreenEnd(event.data);
        break;
      case "frame_batch":
        this.handleFrameBatch(event.data);
        break;
      case "collector_start":
        this.logger.info("Remote frame collection started");
        this.store.getState().setCollecting(true);
        break;
      case "collector_stop":
        this.logger.info(
          `Remote frame collection stopped (${event.data.totalFrames ?? "?"} frames)`
        );
        this.store.getState().setCollecting(false);
        break;
    }
  }

  /** Resolves once every enrichment started so far has finished. */
  async pendingCorrelations(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  clearSessions(): void {
    this.sessions = [];
    this.sessionsById.clear();
    this.activeSession = null;
    this.notifyNow();
  }

  exportSessions(options: ExportOptions = {}): ExportEnvelope {
    return exportSessions(this.completedSessions, options);
  }

  /**
   * Loads sessions from an export as baselines. They go to the store's
   * imported list and never mix with live sessions.
   */
  importSessions(input: unknown): ImportedSessions {
    const imported = importSessions(input);
    this.store.getState().addImportedSessions(imported.sessions);
    this.logger.info(`Imported ${imported.sessions.length} sessions from ${imported.meta.appId}`);
    return imported;
  }

  /** Detaches and stops all further publishing, including from in-flight enrichment. */
  dispose(): void {
    this.disposed = true;
    this.detach();
    if (this.throttleTimer !== null) {
      this.timers.clearTimeout(this.throttleTimer);
      this.throttleTimer = null;
    }
    this.pendingNotify = false;
  }

  private handleScreenStart(data: ScreenStartPayload): void {
    const existing = this.sessionsById.get(data.sessionId);
    if (existing) {
      // Redelivered start: keep the session, only move the pointer
      this.activeSession = existing;
      this.notifyNow();
      return;
    }

    const session = new ScreenSession({
      sessionId: data.sessionId,
      routeName: data.route,
      startTimeMicros: data.timestamp,
      isPopup: data.isPopup,
      previousRoute: data.previousRoute ?? null,
    });
    this.sessions.push(session);
    this.sessionsById.set(session.sessionId, session);
    this.activeSession = session;

    this.logger.debug(`Remote session started: ${session.routeName}`);
    this.notifyNow();
  }

  private handleScreenEnd(data: ScreenEndPayload): void {
    const session = this.sessionsById.get(data.sessionId);
    if (!session) {
      throw new UnknownSessionError(data.sessionId);
    }

    if (session.end(data.timestamp)) {
      this.logger.debug(
        `Remote session ended: ${session.routeName} (${session.frameMetrics.length} frames)`
      );
      this.startCorrelation(session);
    }

    this.activeSession = this.sessions.filter((s) => s.isActive).at(-1) ?? null;
    this.notifyNow();
  }

  private handleFrameBatch(data: FrameBatchPayload): void {
    const session = this.activeSession;
    if (!session) {
      this.logger.debug(`Dropped ${data.frames.length} frames with no active session`);
      return;
    }

    for (const frame of data.frames) {
      session.addFrameMetric(frame);
    }
    this.scheduleNotify();
  }

  private startCorrelation(session: ScreenSession): void {
    const task = this.correlator
      .correlate(session)
      .then(() => {
        if (!this.disposed) this.notifyNow();
      })
      .catch((e: unknown) => {
        this.logger.error(`Correlation failed for ${session.sessionId}: ${describeError(e)}`);
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private scheduleNotify(): void {
    if (this.throttleTimer !== null) {
      this.pendingNotify = true;
      return;
    }

    this.notifyNow();
    this.throttleTimer = this.timers.setTimeout(() => {
      this.throttleTimer = null;
      if (this.pendingNotify) {
        this.pendingNotify = false;
        this.notifyNow();
      }
    }, this.throttleMs);
  }

  private notifyNow(): void {
    this.store.getState().publish(this.sessions, this.activeSession?.sessionId ?? null);
  }
}

import {
  ScreenSession,
  createLogger,
  postEvent,
  type FrameMetric,
  type Logger,
  type ScreenSessionJson,
  type TelemetryTransport,
} from "@screenflow/metrics-io";
import { monotonicClock, truncatingClock, type MonotonicClock } from "./clock";
import { resolveRouteName, type RouteLike } from "./routes";

export type SessionListener = (session: ScreenSession) => void;

export interface NavigationTrackerOptions {
  transport?: TelemetryTransport;
  clock?: MonotonicClock;
  onSessionStart?: SessionListener;
  onSessionEnd?: SessionListener;
  logger?: Logger;
}

/**
 * Ordered stack of open sessions. The top is the screen currently in front;
 * nested navigation (a dialog over a page) pushes on top of it.
 */
class SessionStack {
  private items: ScreenSession[] = [];

  push(session: ScreenSession): void {
    this.items.push(session);
  }

  get top(): ScreenSession | null {
    return this.items[this.items.length - 1] ?? null;
  }

  /** Removes and returns the entry nearest the top that satisfies `predicate`. */
  removeLast(predicate: (session: ScreenSession) => boolean): ScreenSession | null {
    for (let i = this.items.length - 1; i >= 0; i--) {
      const session = this.items[i];
      if (session && predicate(session)) {
        this.items.splice(i, 1);
        return session;
      }
    }
    return null;
  }

  toArray(): readonly ScreenSession[] {
    return [...this.items];
  }
}

/**
 * Opens a session when a route becomes current and closes it when the route
 * is popped, removed or replaced.
 *
 * End signals are paired with open sessions by route name, not by route
 * object. Two open sessions with the same name resolve to the most recently
 * pushed one.
 */
export class NavigationTracker {
  private readonly stack = new SessionStack();
  private completed: ScreenSession[] = [];
  private readonly clock: MonotonicClock;
  private readonly logger: Logger;

  constructor(private readonly options: NavigationTrackerOptions = {}) {
    this.clock = options.clock ? truncatingClock(options.clock) : monotonicClock;
    this.logger = options.logger ?? createLogger("NavigationTracker");
  }

  /** Top of the open-session stack. */
  get currentSession(): ScreenSession | null {
    return this.stack.top;
  }

  get activeSessions(): readonly ScreenSession[] {
    return this.stack.toArray();
  }

  get completedSessions(): readonly ScreenSession[] {
    return [...this.completed];
  }

  didPush(route: RouteLike, previousRoute: RouteLike | null = null): ScreenSession {
    return this.startSession(route, previousRoute);
  }

  didPop(route: RouteLike): ScreenSession | null {
    return this.endSession(route);
  }

  didRemove(route: RouteLike): ScreenSession | null {
    return this.endSession(route);
  }

  didReplace(newRoute: RouteLike | null, oldRoute: RouteLike | null): void {
    if (oldRoute) {
      this.endSession(oldRoute);
    }
    if (newRoute) {
      this.startSession(newRoute, null);
    }
  }

  /**
   * Attaches a frame to the top session. Frames stamped before that session
   * started belong to a screen that already closed and are dropped.
   *
   * @returns whether the frame was attached
   */
  addFrameToActiveSession(frame: FrameMetric): boolean {
    const session = this.stack.top;
    if (!session) return false;
    if (frame.timestampMicros < session.startTimeMicros) return false;
    return session.addFrameMetric(frame);
  }

  clearCompletedSessions(): void {
    this.completed = [];
  }

  exportSessions(): ScreenSessionJson[] {
    return this.completed.map((session) => session.toJSON());
  }

  private startSession(route: RouteLike, previousRoute: RouteLike | null): ScreenSession {
    const now = this.clock();
    const routeName = resolveRouteName(route);
    const previousRouteName = previousRoute ? resolveRouteName(previousRoute) : null;
    const isPopup = route.isPopup ?? false;

    const session = new ScreenSession({
      routeName,
      startTimeMicros: now,
      isPopup,
      previousRoute: previousRouteName,
    });
    this.stack.push(session);

    if (this.options.transport) {
      postEvent(this.options.transport, "screen_start", {
        sessionId: session.sessionId,
        route: routeName,
        timestamp: now,
        isPopup,
        previousRoute: previousRouteName,
      });
    }

    this.logger.debug(`Session started: ${routeName} (${session.sessionId})`);
    this.options.onSessionStart?.(session);
    return session;
  }

  private endSession(route: RouteLike): ScreenSession | null {
    const routeName = resolveRouteName(route);
    const now = this.clock();

    const session = this.stack.removeLast((s) => s.routeName === routeName && s.isActive);
    if (!session) {
      this.logger.debug(`No open session for ${routeName}; end signal ignored`);
      return null;
    }

    session.end(now);
    this.completed.push(session);

    if (this.options.transport) {
      postEvent(this.options.transport, "screen_end", {
        sessionId: session.sessionId,
        route: routeName,
        timestamp: session.endTimeMicros ?? now,
        durationMicros: session.durationMicros ?? 0,
        frameCount: session.frameMetrics.length,
      });
    }

    this.logger.debug(`Session ended: ${routeName} (${session.durationMicros ?? 0}µs)`);
    this.options.onSessionEnd?.(session);
    return session;
  }
}

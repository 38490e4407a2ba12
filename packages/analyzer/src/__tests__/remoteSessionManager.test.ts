import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  InvalidFormatError,
  LoopbackTransport,
  UnknownSessionError,
  exportSessions,
  type FrameMetric,
  type Logger,
  type RawEvent,
} from '@screenflow/metrics-io';
import { ManualFrameSource, SessionRegistry, timingFromDurations } from '@screenflow/instrumentation';
import { RemoteSessionManager } from '../remoteSessionManager';
import { DisconnectedBackend, TelemetryCorrelator, type ProfilingBackend } from '../telemetryCorrelator';

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const screenStart = (sessionId: string, route: string, timestamp: number): RawEvent => ({
  kind: 'screenflow:screen_start',
  data: { sessionId, route, timestamp, isPopup: false, previousRoute: null },
});

const screenEnd = (sessionId: string, route: string, timestamp: number): RawEvent => ({
  kind: 'screenflow:screen_end',
  data: { sessionId, route, timestamp, durationMicros: 0, frameCount: 0 },
});

const frame = (frameNumber: number, timestampMicros = frameNumber * 1000): FrameMetric => ({
  timestampMicros,
  buildDurationMicros: 3000,
  rasterDurationMicros: 2000,
  totalDurationMicros: 5000,
  frameNumber,
});

const frameBatch = (frames: FrameMetric[]): RawEvent => ({
  kind: 'screenflow:frame_batch',
  data: { timestamp: 0, frameCount: frames.length, frames },
});

function setup(backend: ProfilingBackend = new DisconnectedBackend()) {
  const logger = silentLogger();
  const correlator = new TelemetryCorrelator({ backend, logger });
  const onError = vi.fn();
  const manager = new RemoteSessionManager({ correlator, onError, logger });
  const revision = () => manager.store.getState().revision;
  return { manager, correlator, onError, logger, revision };
}

describe('RemoteSessionManager session events', () => {
  it('opens a session on screen start', () => {
    const { manager, revision } = setup();

    manager.handleEvent(screenStart('s1', '/home', 1000));

    const session = manager.getSession('s1');
    expect(session?.routeName).toBe('/home');
    expect(session?.startTimeMicros).toBe(1000);
    expect(manager.currentSession).toBe(session);
    expect(manager.store.getState().activeSessionId).toBe('s1');
    expect(revision()).toBe(1);
  });

  it('treats a repeated screen start as the same session', () => {
    const { manager } = setup();

    manager.handleEvent(screenStart('s1', '/home', 1000));
    manager.handleEvent(screenStart('s2', '/detail', 2000));
    manager.handleEvent(screenStart('s1', '/home', 1000));

    expect(manager.allSessions.map((s) => s.sessionId)).toEqual(['s1', 's2']);
    expect(manager.currentSession?.sessionId).toBe('s1');
  });

  it('raises a distinct error for an unknown screen end', () => {
    const { manager } = setup();

    expect(() => manager.handleEvent(screenEnd('ghost', '/home', 10))).toThrow(UnknownSessionError);
  });

  it('rejects a malformed payload', () => {
    const { manager } = setup();

    expect(() =>
      manager.handleEvent({ kind: 'screenflow:screen_start', data: { route: '/home' } })
    ).toThrow(InvalidFormatError);
  });

  it('ignores events under another prefix or of unknown kind', () => {
    const { manager, revision } = setup();

    manager.handleEvent({ kind: 'other:screen_start', data: {} });
    manager.handleEvent({ kind: 'screenflow:heartbeat', data: {} });

    expect(manager.allSessions).toEqual([]);
    expect(revision()).toBe(0);
  });

  it('listens under a custom prefix', () => {
    const manager = new RemoteSessionManager({ prefix: 'shop', logger: silentLogger() });

    manager.handleEvent({ ...screenStart('s1', '/home', 0), kind: 'shop:screen_start' });

    expect(manager.getSession('s1')).not.toBeNull();
  });

  it('moves the active pointer to the last open session on end', () => {
    const { manager } = setup();

    manager.handleEvent(screenStart('home', '/home', 0));
    manager.handleEvent(screenStart('detail', '/detail', 100));
    manager.handleEvent(screenEnd('home', '/home', 300));
    expect(manager.currentSession?.sessionId).toBe('detail');

    manager.handleEvent(screenEnd('detail', '/detail', 400));
    expect(manager.currentSession).toBeNull();
    expect(manager.getSession('home')?.durationMicros).toBe(300);
    expect(manager.getSession('detail')?.durationMicros).toBe(300);
  });

  it('correlates a session once even if its end is repeated', async () => {
    const { manager, correlator } = setup();
    const correlate = vi.spyOn(correlator, 'correlate');

    manager.handleEvent(screenStart('s1', '/home', 0));
    manager.handleEvent(screenEnd('s1', '/home', 100));
    manager.handleEvent(screenEnd('s1', '/home', 900));
    await manager.pendingCorrelations();

    expect(correlate).toHaveBeenCalledTimes(1);
    expect(manager.getSession('s1')?.endTimeMicros).toBe(100);
  });

  it('records collector state', () => {
    const { manager } = setup();

    manager.handleEvent({ kind: 'screenflow:collector_start', data: { timestamp: 0 } });
    expect(manager.store.getState().collecting).toBe(true);

    manager.handleEvent({ kind: 'screenflow:collector_stop', data: { timestamp: 5, totalFrames: 9 } });
    expect(manager.store.getState().collecting).toBe(false);
  });
});

describe('RemoteSessionManager frame batches', () => {
  it('drops frames when no session is active', () => {
    const { manager, revision } = setup();

    manager.handleEvent(frameBatch([frame(1)]));

    expect(manager.allSessions).toEqual([]);
    expect(revision()).toBe(0);
  });

  it('appends frames to the active session in batch order', () => {
    const { manager } = setup();
    manager.handleEvent(screenStart('s1', '/home', 0));

    manager.handleEvent(frameBatch([frame(1), frame(2)]));
    manager.handleEvent(frameBatch([frame(3)]));

    expect(manager.getSession('s1')?.frameMetrics.map((m) => m.frameNumber)).toEqual([1, 2, 3]);
  });

  it('drops frames once the only session has ended', () => {
    const { manager } = setup();
    manager.handleEvent(screenStart('s1', '/home', 0));
    manager.handleEvent(screenEnd('s1', '/home', 100));

    manager.handleEvent(frameBatch([frame(1)]));

    expect(manager.getSession('s1')?.frameMetrics).toEqual([]);
  });
});

describe('RemoteSessionManager notification throttle', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('coalesces bursts into one trailing notification', () => {
    const { manager } = setup();
    manager.handleEvent(screenStart('s1', '/home', 0));
    const listener = vi.fn();
    manager.subscribe(listener);

    manager.handleEvent(frameBatch([frame(1)]));
    expect(listener).toHaveBeenCalledTimes(1);

    manager.handleEvent(frameBatch([frame(2)]));
    manager.handleEvent(frameBatch([frame(3)]));
    expect(listener).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(100);
    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.lastCall?.[0].sessions[0].frameMetrics).toHaveLength(3);

    vi.advanceTimersByTime(500);
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it('sends no trailing notification when nothing arrived in the window', () => {
    const { manager } = setup();
    manager.handleEvent(screenStart('s1', '/home', 0));
    const listener = vi.fn();
    manager.subscribe(listener);

    manager.handleEvent(frameBatch([frame(1)]));
    vi.advanceTimersByTime(100);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('notifies immediately again once the window has passed', () => {
    const { manager } = setup();
    manager.handleEvent(screenStart('s1', '/home', 0));
    const listener = vi.fn();
    manager.subscribe(listener);

    manager.handleEvent(frameBatch([frame(1)]));
    vi.advanceTimersByTime(100);
    manager.handleEvent(frameBatch([frame(2)]));

    expect(listener).toHaveBeenCalledTimes(2);
  });

  it('cancels a pending notification on dispose', () => {
    const { manager } = setup();
    manager.handleEvent(screenStart('s1', '/home', 0));
    const listener = vi.fn();
    manager.subscribe(listener);

    manager.handleEvent(frameBatch([frame(1)]));
    manager.handleEvent(frameBatch([frame(2)]));
    manager.dispose();
    vi.advanceTimersByTime(100);

    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe('RemoteSessionManager enrichment', () => {
  it('publishes again once correlation finishes', async () => {
    const backend: ProfilingBackend = {
      isConnected: () => true,
      selectedIsolateId: () => 'isolates/7',
      getCpuSamples: async () => ({ sampleCount: 2 }),
      getVMTimeline: async () => ({ traceEvents: [{ name: 'RenderIntrinsicHeight' }] }),
    };
    const { manager, revision } = setup(backend);
    manager.handleEvent(screenStart('s1', '/home', 0));
    manager.handleEvent(frameBatch([frame(1)]));
    manager.handleEvent(screenEnd('s1', '/home', 100));
    const beforeEnrichment = revision();

    await manager.pendingCorrelations();

    const session = manager.getSession('s1');
    expect(session?.cpuProfile).toEqual({ sampleCount: 2 });
    expect(session?.insights.map((i) => i.type)).toEqual(['intrinsic_layout']);
    expect(revision()).toBe(beforeEnrichment + 1);
  });

  it('stops publishing enrichment results after dispose', async () => {
    const { manager, revision } = setup();
    manager.handleEvent(screenStart('s1', '/home', 0));
    manager.handleEvent(screenEnd('s1', '/home', 100));
    const beforeEnrichment = revision();

    manager.dispose();
    await manager.pendingCorrelations();

    expect(revision()).toBe(beforeEnrichment);
  });
});

describe('RemoteSessionManager transport', () => {
  it('consumes events until detached', () => {
    const { manager } = setup();
    const transport = new LoopbackTransport();

    manager.attach(transport);
    transport.post('screenflow:screen_start', screenStart('s1', '/home', 0).data);
    manager.detach();
    transport.post('screenflow:screen_start', screenStart('s2', '/cart', 5).data);

    expect(manager.allSessions.map((s) => s.sessionId)).toEqual(['s1']);
    expect(manager.isAttached).toBe(false);
    expect(transport.listenerCount).toBe(0);
  });

  it('reports handler errors without throwing into the transport', () => {
    const { manager, onError, logger } = setup();
    const transport = new LoopbackTransport();
    manager.attach(transport);

    const event = screenEnd('ghost', '/home', 10);
    expect(() => transport.post(event.kind, event.data)).not.toThrow();

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(UnknownSessionError);
    expect(onError.mock.calls[0]?.[1]).toEqual(event);
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to handle screenflow:screen_end: Session not found: ghost'
    );
  });

  it('mirrors sessions recorded by the instrumentation side', async () => {
    let now = 0;
    const frameSource = new ManualFrameSource();
    const transport = new LoopbackTransport();
    const registry = new SessionRegistry({
      frameSource,
      transport,
      clock: () => now,
      logger: silentLogger(),
    });
    const { manager } = setup();
    manager.attach(transport);

    registry.startCollecting();
    now = 1000;
    const local = registry.navigationTracker.didPush({ kind: 'PageRoute', settings: { name: '/home' } });
    now = 2000;
    frameSource.emit(Array.from({ length: 30 }, () => timingFromDurations(4000, 3000)));
    now = 9000;
    registry.navigationTracker.didPop({ kind: 'PageRoute', settings: { name: '/home' } });
    await manager.pendingCorrelations();

    const remote = manager.getSession(local.sessionId);
    expect(remote?.frameMetrics).toHaveLength(30);
    expect(remote?.durationMicros).toBe(8000);
    expect(remote?.toJSON().frameMetrics).toEqual(local.toJSON().frameMetrics);
  });
});

describe('RemoteSessionManager with fractional host timings', () => {
  it('mirrors and re-imports sessions recorded in fractional microseconds', async () => {
    let now = 0;
    const frameSource = new ManualFrameSource();
    const transport = new LoopbackTransport();
    const registry = new SessionRegistry({
      frameSource,
      transport,
      clock: () => now,
      logger: silentLogger(),
    });
    const { manager, onError } = setup();
    manager.attach(transport);

    registry.startCollecting();
    now = 1000.25;
    const local = registry.navigationTracker.didPush({ kind: 'PageRoute', settings: { name: '/home' } });
    now = 2000.75;
    frameSource.emit([
      {
        buildStartMicros: 0,
        buildFinishMicros: 4000.5,
        rasterStartMicros: 4000.5,
        rasterFinishMicros: 7000.9,
      },
    ]);
    registry.stopCollecting();
    now = 9000.5;
    registry.navigationTracker.didPop({ kind: 'PageRoute', settings: { name: '/home' } });
    await manager.pendingCorrelations();

    expect(onError).not.toHaveBeenCalled();
    expect(local.frameMetrics).toEqual([
      {
        timestampMicros: 2000,
        buildDurationMicros: 4000,
        rasterDurationMicros: 3000,
        totalDurationMicros: 7000,
        frameNumber: 1,
      },
    ]);

    const remote = manager.getSession(local.sessionId);
    expect(remote?.durationMicros).toBe(8000);
    expect(remote?.toJSON().frameMetrics).toEqual(local.toJSON().frameMetrics);

    const imported = manager.importSessions(JSON.stringify(registry.exportData({ appId: 'shop' })));
    expect(imported.sessions[0]?.toJSON()).toEqual(local.toJSON());
  });
});

describe('RemoteSessionManager collection', () => {
  it('exports completed sessions only', () => {
    const { manager } = setup();
    manager.handleEvent(screenStart('done', '/home', 0));
    manager.handleEvent(screenEnd('done', '/home', 10));
    manager.handleEvent(screenStart('open', '/cart', 20));

    const envelope = manager.exportSessions({ exportedAt: new Date('2026-05-06T07:08:09.000Z') });

    expect(envelope.sessions.map((s) => s.sessionId)).toEqual(['done']);
    expect(envelope.meta.timestamp).toBe('2026-05-06T07:08:09.000Z');
  });

  it('keeps imported sessions apart from live ones', () => {
    const { manager } = setup();
    const donor = new RemoteSessionManager({ logger: silentLogger() });
    donor.handleEvent(screenStart('baseline', '/home', 0));
    donor.handleEvent(screenEnd('baseline', '/home', 10));
    const payload = JSON.stringify(exportSessions(donor.completedSessions, { appId: 'shop' }));

    const imported = manager.importSessions(payload);

    expect(imported.meta.appId).toBe('shop');
    expect(manager.allSessions).toEqual([]);
    expect(manager.store.getState().importedSessions.map((s) => s.sessionId)).toEqual(['baseline']);
  });

  it('clears live sessions', () => {
    const { manager } = setup();
    manager.handleEvent(screenStart('s1', '/home', 0));

    manager.clearSessions();

    expect(manager.allSessions).toEqual([]);
    expect(manager.currentSession).toBeNull();
    expect(manager.store.getState().sessions).toEqual([]);
  });
});

import { describe, it, expect } from 'vitest';
import {
  ScreenSession,
  type FrameMetric,
  type PerformanceInsight,
  type TimelineEvent,
} from '@screenflow/metrics-io';
import { InsightEngine, highBuildTimeDetector } from '../insightEngine';

const frame = (
  frameNumber: number,
  buildMicros: number,
  rasterMicros: number,
  totalMicros = buildMicros + rasterMicros
): FrameMetric => ({
  timestampMicros: frameNumber * 16000,
  buildDurationMicros: buildMicros,
  rasterDurationMicros: rasterMicros,
  totalDurationMicros: totalMicros,
  frameNumber,
});

const quietFrames = (count: number, offset = 0): FrameMetric[] =>
  Array.from({ length: count }, (_, i) => frame(offset + i + 1, 2000, 2000));

function completedSession(
  frames: FrameMetric[],
  timelineEvents: TimelineEvent[] = []
): ScreenSession {
  const session = new ScreenSession({ routeName: '/feed', startTimeMicros: 0 });
  frames.forEach((f) => session.addFrameMetric(f));
  session.end(1_000_000);
  session.setTelemetry({ timelineEvents });
  return session;
}

const engine = new InsightEngine();
const analyze = (session: ScreenSession) => engine.analyze(session);
const types = (insights: PerformanceInsight[]) => insights.map((i) => i.type);
const only = (insights: PerformanceInsight[]): PerformanceInsight => {
  expect(insights).toHaveLength(1);
  const [insight] = insights;
  if (!insight) throw new Error('expected one insight');
  return insight;
};

const jankyFrameList = (count: number): FrameMetric[] =>
  Array.from({ length: count }, (_, i) => frame(i + 1, 1000, 1000, 20000));

describe('InsightEngine preconditions', () => {
  it('returns nothing for an active session', () => {
    const session = new ScreenSession({ routeName: '/feed', startTimeMicros: 0 });
    jankyFrameList(20).forEach((f) => session.addFrameMetric(f));

    expect(analyze(session)).toEqual([]);
  });

  it('returns nothing for a session without frames', () => {
    expect(analyze(completedSession([], [{ name: 'saveLayer' }]))).toEqual([]);
  });

  it('returns nothing for smooth frames', () => {
    expect(analyze(completedSession(quietFrames(20)))).toEqual([]);
  });
});

describe('excessive jank', () => {
  const jankyFrames = (count: number, offset: number) =>
    Array.from({ length: count }, (_, i) => frame(offset + i + 1, 2000, 2000, 17000));

  it('fires at exactly 10% as a warning', () => {
    const insight = only(analyze(completedSession([...quietFrames(18), ...jankyFrames(2, 18)])));

    expect(insight).toEqual({
      type: 'excessive_jank',
      title: 'Excessive Frame Jank',
      description:
        '10.0% of frames exceeded the 16.67ms target. ' +
        'This results in visible stuttering and poor user experience.',
      suggestions: [
        'Profile the screen to identify expensive operations',
        'Move heavy computations off the UI thread',
        'Reduce widget tree complexity',
        'Use const constructors where possible',
      ],
      severity: 'warning',
      metadata: { jankPercentage: 10, jankyFrames: 2, totalFrames: 20 },
    });
  });

  it('stays quiet just under 10%', () => {
    expect(analyze(completedSession([...quietFrames(10), ...jankyFrames(1, 10)]))).toEqual([]);
  });

  it('is critical from 20%', () => {
    const insight = only(analyze(completedSession([...quietFrames(16), ...jankyFrames(4, 16)])));
    expect(insight.severity).toBe('critical');
  });
});

describe('phase averages', () => {
  const buildFrames = (buildMicros: number) =>
    Array.from({ length: 5 }, (_, i) => frame(i + 1, buildMicros, 1000));

  it('warns when average build time exceeds 8ms', () => {
    const insight = only(analyze(completedSession(buildFrames(9000))));

    expect(insight.type).toBe('high_build_time');
    expect(insight.severity).toBe('warning');
    expect(insight.description).toBe(
      'Average build time is 9.00ms, which is above the recommended 8ms threshold for 60fps.'
    );
    expect(insight.metadata).toEqual({ avgBuildMs: 9 });
  });

  it('is critical above 12ms', () => {
    expect(only(analyze(completedSession(buildFrames(13000)))).severity).toBe('critical');
  });

  it('treats the thresholds as exclusive', () => {
    expect(analyze(completedSession(buildFrames(8000)))).toEqual([]);
    expect(only(analyze(completedSession(buildFrames(12000)))).severity).toBe('warning');
  });

  it('warns on high raster time', () => {
    const frames = Array.from({ length: 5 }, (_, i) => frame(i + 1, 1000, 10000));
    const insight = only(analyze(completedSession(frames)));

    expect(insight.type).toBe('high_raster_time');
    expect(insight.title).toBe('High Average Raster Time');
    expect(insight.severity).toBe('warning');
    expect(insight.metadata).toEqual({ avgRasterMs: 10 });
  });
});

describe('build storm', () => {
  const withSpikes = (normal: number, spikes: number) => [
    ...Array.from({ length: normal }, (_, i) => frame(i + 1, 1000, 1000)),
    ...Array.from({ length: spikes }, (_, i) => frame(normal + i + 1, 10000, 1000)),
  ];

  it('fires when more than 10% of frames spike past 3x the average', () => {
    const insight = only(analyze(completedSession(withSpikes(8, 2))));

    expect(insight.type).toBe('build_storm');
    expect(insight.description).toBe(
      '2 frames had build times 3x higher than average. ' +
        'This suggests excessive widget rebuilding in response to state changes.'
    );
    expect(insight.metadata).toEqual({ stormFrames: 2, avgBuildMs: 2.8 });
  });

  it('needs at least 10 frames', () => {
    expect(analyze(completedSession(withSpikes(7, 2)))).toEqual([]);
  });

  it('does not fire at exactly 10% of frames', () => {
    expect(analyze(completedSession(withSpikes(9, 1)))).toEqual([]);
  });
});

describe('timeline detectors', () => {
  it('counts saveLayer markers case-sensitively', () => {
    const insight = only(
      analyze(
        completedSession(quietFrames(3), [
          { name: 'Canvas::saveLayer', ts: 1 },
          { name: 'saveLayer', ts: 2 },
          { name: 'SaveLayer', ts: 3 },
          { name: 'Paint', ts: 4 },
          { ts: 5 },
          { name: 7 },
        ])
      )
    );

    expect(insight.type).toBe('save_layer_bleed');
    expect(insight.severity).toBe('warning');
    expect(insight.metadata).toEqual({ saveLayerCount: 2 });
  });

  it('marks more than 5 saveLayer calls as critical', () => {
    const events = Array.from({ length: 6 }, (_, i) => ({ name: 'saveLayer', ts: i }));
    expect(only(analyze(completedSession(quietFrames(3), events))).severity).toBe('critical');
  });

  it('counts each shader compilation event once', () => {
    const insight = only(
      analyze(
        completedSession(quietFrames(3), [
          { name: 'GrGLProgramBuilder::finalize' },
          { name: 'finalize' },
          { name: 'Rasterizer::Draw' },
        ])
      )
    );

    expect(insight.type).toBe('shader_jank');
    expect(insight.metadata).toEqual({ shaderEventCount: 2 });
  });

  it('matches intrinsic layout case-insensitively', () => {
    const insight = only(
      analyze(
        completedSession(quietFrames(3), [
          { name: 'RenderIntrinsicWidth' },
          { name: 'INTRINSIC height' },
          { name: 'Layout' },
        ])
      )
    );

    expect(insight.type).toBe('intrinsic_layout');
    expect(insight.title).toBe('Intrinsic Layout Operations');
    expect(insight.metadata).toEqual({ intrinsicEventCount: 2 });
  });
});

describe('InsightEngine', () => {
  it('runs every detector independently', () => {
    const frames = Array.from({ length: 5 }, (_, i) => frame(i + 1, 13000, 13000, 26000));
    const insights = analyze(completedSession(frames, [{ name: 'saveLayer' }]));

    expect(types(insights)).toEqual([
      'excessive_jank',
      'high_build_time',
      'high_raster_time',
      'save_layer_bleed',
    ]);
  });

  it('produces fresh insights on every run', () => {
    const session = completedSession(quietFrames(3), [{ name: 'saveLayer' }]);
    const first = analyze(session);
    const second = analyze(session);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it('accepts a custom detector list', () => {
    const buildOnly = new InsightEngine([highBuildTimeDetector]);
    const frames = Array.from({ length: 5 }, (_, i) => frame(i + 1, 13000, 13000, 26000));

    expect(types(buildOnly.analyze(completedSession(frames)))).toEqual(['high_build_time']);
  });
});

import { describe, it, expect } from 'vitest';
import { InvalidFormatError } from '../errors';
import { ArchiveReader } from '../exporter';
import { ArchiveImporter, readArchive, writeArchive } from '../importer';
import { ScreenSession } from '../session';
import type { FrameMetric } from '../types';

const frame = (frameNumber: number, totalMicros: number): FrameMetric => ({
  timestampMicros: frameNumber * 10000,
  buildDurationMicros: Math.floor(totalMicros / 2),
  rasterDurationMicros: Math.floor(totalMicros / 4),
  totalDurationMicros: totalMicros,
  frameNumber,
});

function sampleSessions(): ScreenSession[] {
  const home = new ScreenSession({ sessionId: 'home', routeName: '/home', startTimeMicros: 0 });
  home.addFrameMetric(frame(1, 8000));
  home.addFrameMetric(frame(2, 20000));
  home.addFrameMetric(frame(3, 9000));
  home.end(100000);
  home.setTelemetry({
    cpuProfile: { sampleCount: 12 },
    timelineEvents: [{ name: 'saveLayer', ts: 15000 }],
  });
  home.setInsights([
    {
      type: 'save_layer_bleed',
      title: 'SaveLayer Operations Detected',
      description: 'Detected 1 saveLayer operations.',
      suggestions: ['Avoid shader masks where possible'],
      severity: 'warning',
      metadata: { saveLayerCount: 1 },
    },
  ]);

  const sheet = new ScreenSession({
    sessionId: 'sheet',
    routeName: '/sheet',
    startTimeMicros: 50000,
    isPopup: true,
    previousRoute: '/home',
  });
  sheet.addFrameMetric(frame(4, 17000));

  return [home, sheet];
}

describe('session archive', () => {
  it('round-trips sessions through SQLite', async () => {
    const sessions = sampleSessions();
    const restored = await readArchive(await writeArchive(sessions));

    expect(restored.map((s) => s.toJSON())).toEqual(sessions.map((s) => s.toJSON()));
  });

  it('looks up a single session', async () => {
    const importer = new ArchiveImporter();
    const archive = await importer.loadFromBuffer(await writeArchive(sampleSessions(), importer));

    expect(archive.getSession('sheet')?.isPopup).toBe(true);
    expect(archive.getSession('missing')).toBeNull();
    expect(archive.getInsights('home').map((i) => i.type)).toEqual(['save_layer_bleed']);
    expect(archive.getFrameMetrics('home').map((m) => m.frameNumber)).toEqual([1, 2, 3]);
    archive.close();
  });

  it('rejects bytes that are not an archive', async () => {
    const garbage = new Uint8Array(1024).fill(0x78);
    await expect(readArchive(garbage)).rejects.toBeInstanceOf(InvalidFormatError);
  });
});

describe('ArchiveReader', () => {
  it('reads frames page by page', async () => {
    const reader = new ArchiveReader(await writeArchive(sampleSessions()));

    const first = await reader.getFrameMetrics('home', { limit: 2 });
    expect(first.map((m) => m.frameNumber)).toEqual([1, 2]);

    const rest = await reader.getFrameMetrics('home', { offset: 2 });
    expect(rest.map((m) => m.frameNumber)).toEqual([3]);

    expect(await reader.getFrameMetrics('sheet')).toHaveLength(1);
    reader.close();
  });

  it('streams frames in batches', async () => {
    const reader = new ArchiveReader(await writeArchive(sampleSessions()));

    const frameNumbers: number[] = [];
    for await (const metric of reader.streamFrameMetrics('home', 2)) {
      frameNumbers.push(metric.frameNumber);
    }

    expect(frameNumbers).toEqual([1, 2, 3]);
    reader.close();
  });
});

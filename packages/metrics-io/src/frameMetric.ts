import type { FrameMetric, FrameMetricJson, FrameTiming } from "./types";

/** 60 Hz frame budget, 16.67 ms. */
export const JANK_THRESHOLD_MICROS = 16670;

export function createFrameMetric(fields: FrameMetric): Readonly<FrameMetric> {
  return Object.freeze({
    timestampMicros: fields.timestampMicros,
    buildDurationMicros: fields.buildDurationMicros,
    rasterDurationMicros: fields.rasterDurationMicros,
    totalDurationMicros: fields.totalDurationMicros,
    frameNumber: fields.frameNumber,
  });
}

/** Drops any sub-microsecond fraction; the wire format carries integers only. */
export function wholeMicros(micros: number): number {
  return Math.trunc(micros);
}

/** Total spans from build start to raster finish. */
export function frameMetricFromTiming(
  timing: FrameTiming,
  timestampMicros: number,
  frameNumber: number
): Readonly<FrameMetric> {
  return createFrameMetric({
    timestampMicros: wholeMicros(timestampMicros),
    buildDurationMicros: wholeMicros(timing.buildFinishMicros - timing.buildStartMicros),
    rasterDurationMicros: wholeMicros(timing.rasterFinishMicros - timing.rasterStartMicros),
    totalDurationMicros: wholeMicros(timing.rasterFinishMicros - timing.buildStartMicros),
    frameNumber,
  });
}

export function isJanky(metric: FrameMetric): boolean {
  return metric.totalDurationMicros > JANK_THRESHOLD_MICROS;
}

export function buildDurationMs(metric: FrameMetric): number {
  return metric.buildDurationMicros / 1000;
}

export function rasterDurationMs(metric: FrameMetric): number {
  return metric.rasterDurationMicros / 1000;
}

export function totalDurationMs(metric: FrameMetric): number {
  return metric.totalDurationMicros / 1000;
}

export function frameMetricToJson(metric: FrameMetric): FrameMetricJson {
  return {
    timestampMicros: metric.timestampMicros,
    buildDurationMicros: metric.buildDurationMicros,
    rasterDurationMicros: metric.rasterDurationMicros,
    totalDurationMicros: metric.totalDurationMicros,
    frameNumber: metric.frameNumber,
  };
}

export function describeFrameMetric(metric: FrameMetric): string {
  return (
    `FrameMetric(frame: ${metric.frameNumber}, build: ${buildDurationMs(metric).toFixed(2)}ms, ` +
    `raster: ${rasterDurationMs(metric).toFixed(2)}ms, total: ${totalDurationMs(metric).toFixed(2)}ms)`
  );
}

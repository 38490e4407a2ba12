import type { FrameTiming } from "@screenflow/metrics-io";
import type { FrameTimingSource, TimingsCallback } from "./frameTimingCollector";

/**
 * Frame source driven by the caller, for hosts that hand over timings
 * themselves (replays, synthetic workloads, bridges from another process).
 */
export class ManualFrameSource implements FrameTimingSource {
  private callbacks = new Set<TimingsCallback>();

  addTimingsCallback(callback: TimingsCallback): void {
    this.callbacks.add(callback);
  }

  removeTimingsCallback(callback: TimingsCallback): void {
    this.callbacks.delete(callback);
  }

  get subscriberCount(): number {
    return this.callbacks.size;
  }

  emit(timings: readonly FrameTiming[]): void {
    for (const callback of [...this.callbacks]) {
      callback(timings);
    }
  }
}

/**
 * Builds a timing whose build phase starts at `buildStartMicros` and whose
 * raster phase follows immediately after the build.
 */
export function timingFromDurations(
  buildMicros: number,
  rasterMicros: number,
  buildStartMicros = 0
): FrameTiming {
  const buildFinishMicros = buildStartMicros + buildMicros;
  return {
    buildStartMicros,
    buildFinishMicros,
    rasterStartMicros: buildFinishMicros,
    rasterFinishMicros: buildFinishMicros + rasterMicros,
  };
}

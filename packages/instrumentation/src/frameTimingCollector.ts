import {
  createLogger,
  describeError,
  frameMetricFromTiming,
  frameMetricToJson,
  postEvent,
  type FrameMetric,
  type FrameTiming,
  type Logger,
  type TelemetryTransport,
} from "@screenflow/metrics-io";
import { monotonicClock, truncatingClock, type MonotonicClock } from "./clock";

/** Frames buffered before a batch is transmitted. */
export const FRAME_BATCH_SIZE = 30;

export type TimingsCallback = (timings: readonly FrameTiming[]) => void;

/** Per-frame timing notifications from the host rendering pipeline. */
export interface FrameTimingSource {
  addTimingsCallback(callback: TimingsCallback): void;
  removeTimingsCallback(callback: TimingsCallback): void;
}

export interface FrameTimingCollectorOptions {
  source: FrameTimingSource;
  transport?: TelemetryTransport;
  clock?: MonotonicClock;
  onFrameMetric?: (metric: Readonly<FrameMetric>) => void;
  onBatchSent?: (batch: readonly Readonly<FrameMetric>[]) => void;
  logger?: Logger;
}

/**
 * Turns raw frame timings into numbered frame metrics and ships them in
 * batches of {@link FRAME_BATCH_SIZE}.
 *
 * Frame numbers start at 1 and keep counting across sessions and batches
 * until `reset()`.
 */
export class FrameTimingCollector {
  private readonly source: FrameTimingSource;
  private readonly transport: TelemetryTransport | undefined;
  private readonly clock: MonotonicClock;
  private readonly logger: Logger;

  private buffer: Readonly<FrameMetric>[] = [];
  private frameCounter = 0;
  private collecting = false;
  private readonly callback: TimingsCallback;

  constructor(private readonly options: FrameTimingCollectorOptions) {
    this.source = options.source;
    this.transport = options.transport;
    this.clock = options.clock ? truncatingClock(options.clock) : monotonicClock;
    this.logger = options.logger ?? createLogger("FrameTimingCollector");
    this.callback = (timings) => this.handleTimings(timings);
  }

  get isCollecting(): boolean {
    return this.collecting;
  }

  /** Frames numbered so far. */
  get frameCount(): number {
    return this.frameCounter;
  }

  get bufferedCount(): number {
    return this.buffer.length;
  }

  start(): void {
    if (this.collecting) return;

    this.source.addTimingsCallback(this.callback);
    this.collecting = true;
    this.logger.debug("Frame collection started");

    if (this.transport) {
      postEvent(this.transport, "collector_start", { timestamp: this.clock() });
    }
  }

  /** Unsubscribes and flushes whatever is buffered. */
  stop(): void {
    if (!this.collecting) return;

    this.source.removeTimingsCallback(this.callback);
    this.collecting = false;
    this.flush();
    this.logger.debug(`Frame collection stopped after ${this.frameCounter} frames`);

    if (this.transport) {
      postEvent(this.transport, "collector_stop", {
        timestamp: this.clock(),
        totalFrames: this.frameCounter,
      });
    }
  }

  reset(): void {
    this.stop();
    this.buffer = [];
    this.frameCounter = 0;
  }

  /**
   * Transmits the buffer as one batch; nothing is sent when it is empty.
   * A batch the transport rejects stays buffered for the next flush.
   */
  flush(): void {
    if (this.buffer.length === 0) return;

    const batch = this.buffer;
    this.buffer = [];

    if (this.transport) {
      try {
        postEvent(this.transport, "frame_batch", {
          timestamp: this.clock(),
          frameCount: batch.length,
          frames: batch.map(frameMetricToJson),
        });
      } catch (e) {
        this.buffer = [...batch, ...this.buffer];
        this.logger.error(`Failed to send ${batch.length} frames: ${describeError(e)}`);
        return;
      }
    }

    this.options.onBatchSent?.(batch);
  }

  private handleTimings(timings: readonly FrameTiming[]): void {
    const now = this.clock();

    for (const timing of timings) {
      this.frameCounter++;
      const metric = frameMetricFromTiming(timing, now, this.frameCounter);

      this.options.onFrameMetric?.(metric);
      this.buffer.push(metric);

      if (this.buffer.length >= FRAME_BATCH_SIZE) {
        this.flush();
      }
    }
  }
}

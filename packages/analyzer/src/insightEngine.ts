import {
  buildDurationMs,
  type PerformanceInsight,
  type ScreenSession,
  type TimelineEvent,
} from "@screenflow/metrics-io";

export const JANK_PERCENT_WARNING = 10;
export const JANK_PERCENT_CRITICAL = 20;
export const PHASE_MS_WARNING = 8;
export const PHASE_MS_CRITICAL = 12;
export const BUILD_STORM_MIN_FRAMES = 10;
export const BUILD_STORM_FACTOR = 3;
export const BUILD_STORM_FRAME_SHARE = 0.1;
export const SAVE_LAYER_CRITICAL_COUNT = 5;

const SAVE_LAYER_MARKERS = ["saveLayer", "Canvas::saveLayer"] as const;
const SHADER_MARKERS = ["GrGLProgramBuilder", "finalize"] as const;
const INTRINSIC_MARKER = "intrinsic";

/** One anti-pattern check. Returns null when the pattern is absent. */
export interface InsightDetector {
  readonly type: string;
  detect(session: ScreenSession): PerformanceInsight | null;
}

function eventName(event: TimelineEvent): string | null {
  const name = event["name"];
  return typeof name === "string" ? name : null;
}

function countEvents(
  session: ScreenSession,
  matches: (name: string) => boolean
): number {
  return session.timelineEvents.filter((event) => {
    const name = eventName(event);
    return name !== null && matches(name);
  }).length;
}

export const excessiveJankDetector: InsightDetector = {
  type: "excessive_jank",
  detect(session) {
    const jankPercentage = session.jankPercentage;
    if (jankPercentage < JANK_PERCENT_WARNING) return null;

    return {
      type: this.type,
      title: "Excessive Frame Jank",
      description:
        `${jankPercentage.toFixed(1)}% of frames exceeded the 16.67ms target. ` +
        "This results in visible stuttering and poor user experience.",
      suggestions: [
        "Profile the screen to identify expensive operations",
        "Move heavy computations off the UI thread",
        "Reduce widget tree complexity",
        "Use const constructors where possible",
      ],
      severity: jankPercentage >= JANK_PERCENT_CRITICAL ? "critical" : "warning",
      metadata: {
        jankPercentage,
        jankyFrames: session.jankyFrameCount,
        totalFrames: session.frameMetrics.length,
      },
    };
  },
};

export const highBuildTimeDetector: InsightDetector = {
  type: "high_build_time",
  detect(session) {
    const avgBuildMs = session.avgBuildMs;
    if (avgBuildMs <= PHASE_MS_WARNING) return null;

    return {
      type: this.type,
      title: "High Average Build Time",
      description:
        `Average build time is ${avgBuildMs.toFixed(2)}ms, ` +
        "which is above the recommended 8ms threshold for 60fps.",
      suggestions: [
        "Push state changes down to leaf widgets",
        "Use const constructors for static widgets",
        "Use selectors to filter rebuilds to the widgets that need them",
        "Avoid building complex widgets inline",
      ],
      severity: avgBuildMs > PHASE_MS_CRITICAL ? "critical" : "warning",
      metadata: { avgBuildMs },
    };
  },
};

export const highRasterTimeDetector: InsightDetector = {
  type: "high_raster_time",
  detect(session) {
    const avgRasterMs = session.avgRasterMs;
    if (avgRasterMs <= PHASE_MS_WARNING) return null;

    return {
      type: this.type,
      title: "High Average Raster Time",
      description:
        `Average raster time is ${avgRasterMs.toFixed(2)}ms, ` +
        "indicating GPU-intensive rendering operations.",
      suggestions: [
        "Avoid opacity layers that trigger saveLayer",
        "Reduce use of shadows and complex clipping",
        "Use RepaintBoundary to cache static subtrees",
        "Consider simplifying visual effects",
      ],
      severity: avgRasterMs > PHASE_MS_CRITICAL ? "critical" : "warning",
      metadata: { avgRasterMs },
    };
  },
};

export const buildStormDetector: InsightDetector = {
  type: "build_storm",
  detect(session) {
    const frames = session.frameMetrics;
    if (frames.length < BUILD_STORM_MIN_FRAMES) return null;

    const avgBuildMs = session.avgBuildMs;
    const stormFrames = frames.filter(
      (frame) => buildDurationMs(frame) > avgBuildMs * BUILD_STORM_FACTOR
    ).length;
    if (stormFrames <= frames.length * BUILD_STORM_FRAME_SHARE) return null;

    return {
      type: this.type,
      title: "Build Storm Detected",
      description:
        `${stormFrames} frames had build times 3x higher than average. ` +
        "This suggests excessive widget rebuilding in response to state changes.",
      suggestions: [
        "Review state updates for over-reaching scope",
        "Listen to individual values instead of whole models",
        "Break large widgets into smaller, focused components",
        "Use keys judiciously to preserve widget state",
      ],
      severity: "warning",
      metadata: { stormFrames, avgBuildMs },
    };
  },
};

export const saveLayerDetector: InsightDetector = {
  type: "save_layer_bleed",
  detect(session) {
    const saveLayerCount = countEvents(session, (name) =>
      SAVE_LAYER_MARKERS.some((marker) => name.includes(marker))
    );
    if (saveLayerCount === 0) return null;

    return {
      type: this.type,
      title: "SaveLayer Operations Detected",
      description:
        `Detected ${saveLayerCount} saveLayer operations. ` +
        "Each saveLayer forces the GPU to switch render targets, causing high raster costs.",
      suggestions: [
        "Replace opacity layers with colors that carry alpha",
        "Use image fade-in widgets for image transitions",
        "Avoid shader masks where possible",
        "Wrap static subtrees in RepaintBoundary to cache them",
      ],
      severity: saveLayerCount > SAVE_LAYER_CRITICAL_COUNT ? "critical" : "warning",
      metadata: { saveLayerCount },
    };
  },
};

export const shaderJankDetector: InsightDetector = {
  type: "shader_jank",
  detect(session) {
    const shaderEventCount = countEvents(session, (name) =>
      SHADER_MARKERS.some((marker) => name.includes(marker))
    );
    if (shaderEventCount === 0) return null;

    return {
      type: this.type,
      title: "Shader Compilation Jank",
      description:
        "Shader compilation detected. " +
        "This causes significant jank on first run of animations.",
      suggestions: [
        "Capture shaders during a profiling run and bundle them",
        "Pre-warm shaders on app startup",
        "Use a renderer that precompiles shaders",
        "Simplify complex shader operations",
      ],
      severity: "warning",
      metadata: { shaderEventCount },
    };
  },
};

export const intrinsicLayoutDetector: InsightDetector = {
  type: "intrinsic_layout",
  detect(session) {
    const intrinsicEventCount = countEvents(session, (name) =>
      name.toLowerCase().includes(INTRINSIC_MARKER)
    );
    if (intrinsicEventCount === 0) return null;

    return {
      type: this.type,
      title: "Intrinsic Layout Operations",
      description:
        "IntrinsicWidth/IntrinsicHeight widgets detected. " +
        "These force multiple layout passes, turning O(N) into O(N²).",
      suggestions: [
        "Avoid intrinsic sizing in lists or deep trees",
        "Use Flex, Expanded, or fixed constraints instead",
        "Pre-compute sizes if possible",
        "Use a custom single-child layout for complex cases",
      ],
      severity: "warning",
      metadata: { intrinsicEventCount },
    };
  },
};

export const DEFAULT_DETECTORS: readonly InsightDetector[] = [
  excessiveJankDetector,
  highBuildTimeDetector,
  highRasterTimeDetector,
  buildStormDetector,
  saveLayerDetector,
  shaderJankDetector,
  intrinsicLayoutDetector,
];

/**
 * Stateless rule evaluator. Detectors run independently; any number of them
 * may fire for one session.
 */
export class InsightEngine {
  constructor(readonly detectors: readonly InsightDetector[] = DEFAULT_DETECTORS) {}

  /** Empty for open sessions and sessions without frames. */
  analyze(session: ScreenSession): PerformanceInsight[] {
    if (session.isActive || session.frameMetrics.length === 0) {
      return [];
    }

    const insights: PerformanceInsight[] = [];
    for (const detector of this.detectors) {
      const insight = detector.detect(session);
      if (insight) {
        insights.push(insight);
      }
    }
    return insights;
  }
}

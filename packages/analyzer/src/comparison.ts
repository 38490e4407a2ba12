import type { ScreenSession } from "@screenflow/metrics-io";

export interface MetricDelta {
  baseline: number;
  candidate: number;
  /** candidate − baseline */
  delta: number;
}

export interface SessionComparison {
  baselineId: string;
  candidateId: string;
  avgBuildMs: MetricDelta;
  avgRasterMs: MetricDelta;
  jankPercentage: MetricDelta;
}

export interface RoutePair {
  routeName: string;
  baseline: ScreenSession;
  candidate: ScreenSession;
}

function metricDelta(baseline: number, candidate: number): MetricDelta {
  return { baseline, candidate, delta: candidate - baseline };
}

export function compareSessions(
  baseline: ScreenSession,
  candidate: ScreenSession
): SessionComparison {
  return {
    baselineId: baseline.sessionId,
    candidateId: candidate.sessionId,
    avgBuildMs: metricDelta(baseline.avgBuildMs, candidate.avgBuildMs),
    avgRasterMs: metricDelta(baseline.avgRasterMs, candidate.avgRasterMs),
    jankPercentage: metricDelta(baseline.jankPercentage, candidate.jankPercentage),
  };
}

/** Lower is better for every compared metric. */
export function isImprovement(metric: MetricDelta): boolean {
  return metric.delta < 0;
}

export function isRegression(metric: MetricDelta): boolean {
  return metric.delta > 0;
}

export function formatDelta(delta: number, suffix = ""): string {
  const sign = delta > 0 ? "+" : "";
  return `${sign}${delta.toFixed(2)}${suffix}`;
}

/**
 * Pairs the latest completed session of each route present on both sides,
 * in baseline route order.
 */
export function matchSessionsByRoute(
  baselines: readonly ScreenSession[],
  candidates: readonly ScreenSession[]
): RoutePair[] {
  const latestByRoute = (sessions: readonly ScreenSession[]) => {
    const latest = new Map<string, ScreenSession>();
    for (const session of sessions) {
      if (!session.isActive) latest.set(session.routeName, session);
    }
    return latest;
  };

  const baselineRoutes = latestByRoute(baselines);
  const candidateRoutes = latestByRoute(candidates);

  const pairs: RoutePair[] = [];
  for (const [routeName, baseline] of baselineRoutes) {
    const candidate = candidateRoutes.get(routeName);
    if (candidate) {
      pairs.push({ routeName, baseline, candidate });
    }
  }
  return pairs;
}

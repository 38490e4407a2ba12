import type { FrameMetricsAggregate, ScreenSession } from "@screenflow/metrics-io";

export function formatMicros(micros: number | null): string {
  if (micros === null) return "-";
  return `${(micros / 1000).toFixed(2)}ms`;
}

export function formatMs(ms: number | null): string {
  if (ms === null) return "-";
  return `${ms.toFixed(2)}ms`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  if (seconds > 0) {
    return `${seconds}s`;
  }
  return `${Math.round(ms)}ms`;
}

export function truncateRoute(routeName: string, maxLength = 40): string {
  if (routeName.length <= maxLength) return routeName;
  return routeName.slice(0, maxLength - 3) + "...";
}

/** One-line summary, e.g. `/home 3s · 72 frames · 4.2% jank`. */
export function summarizeSession(session: ScreenSession): string {
  const duration =
    session.durationMs === null ? "active" : formatDuration(session.durationMs);
  const frames = session.frameMetrics.length;
  return [
    `${truncateRoute(session.routeName)} ${duration}`,
    `${frames} frame${frames === 1 ? "" : "s"}`,
    `${formatPercent(session.jankPercentage)} jank`,
  ].join(" · ");
}

export function formatAggregate(aggregate: FrameMetricsAggregate | null): string {
  if (!aggregate) return "no frames";
  return (
    `build avg ${formatMs(aggregate.avgBuildMs)} p90 ${formatMs(aggregate.p90BuildMs)}, ` +
    `raster avg ${formatMs(aggregate.avgRasterMs)} p90 ${formatMs(aggregate.p90RasterMs)}`
  );
}

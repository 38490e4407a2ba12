import { z } from "zod";
import type {
  ExportEnvelope,
  JsonObject,
  JsonValue,
  PerformanceInsightJson,
  ScreenSessionJson,
} from "./types";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const frameMetricSchema = z.object({
  timestampMicros: z.number().int(),
  buildDurationMicros: z.number().int().min(0),
  rasterDurationMicros: z.number().int().min(0),
  totalDurationMicros: z.number().int().min(0),
  frameNumber: z.number().int().min(0),
});

export const insightSeveritySchema = z.enum(["info", "warning", "critical"]);

export const performanceInsightSchema: z.ZodType<PerformanceInsightJson> = z.object({
  type: z.string().min(1),
  title: z.string(),
  description: z.string(),
  suggestions: z.array(z.string()),
  severity: insightSeveritySchema,
  metadata: z.record(z.union([z.number(), z.string(), z.boolean()])).nullable(),
});

export const frameMetricsAggregateSchema = z.object({
  avgBuildMs: z.number(),
  p90BuildMs: z.number(),
  p99BuildMs: z.number(),
  avgRasterMs: z.number(),
  p90RasterMs: z.number(),
  p99RasterMs: z.number(),
  frameCount: z.number().int().min(0),
  jankyFrameCount: z.number().int().min(0),
});

export const screenSessionSchema: z.ZodType<ScreenSessionJson, z.ZodTypeDef, unknown> = z.object({
  sessionId: z.string().min(1),
  routeName: z.string(),
  startTimeMicros: z.number().int(),
  endTimeMicros: z.number().int().nullable(),
  isPopup: z.boolean().default(false),
  previousRoute: z.string().nullable().default(null),
  frameMetrics: z.array(frameMetricSchema).default([]),
  cpuProfile: jsonObjectSchema.nullable().default(null),
  memoryStats: jsonObjectSchema.nullable().default(null),
  timelineEvents: z.array(jsonObjectSchema).default([]),
  insights: z.array(performanceInsightSchema).default([]),
  aggregate: frameMetricsAggregateSchema.nullable().default(null),
});

export const exportMetaSchema = z.object({
  schemaVersion: z.string(),
  appId: z.string(),
  flutterVersion: z.string(),
  timestamp: z.string(),
  device: z.string(),
  totalFrames: z.number().int().min(0).optional(),
});

export const exportEnvelopeSchema: z.ZodType<ExportEnvelope, z.ZodTypeDef, unknown> = z.object({
  meta: exportMetaSchema,
  sessions: z.array(screenSessionSchema),
});

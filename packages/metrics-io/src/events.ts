import { z } from "zod";
import { InvalidFormatError } from "./errors";
import { frameMetricSchema } from "./schemas";

/** Every event kind on the wire is `<prefix>:<kind>`. */
export const EVENT_PREFIX = "screenflow";

export const screenStartSchema = z.object({
  sessionId: z.string().min(1),
  route: z.string(),
  timestamp: z.number().int(),
  isPopup: z.boolean(),
  previousRoute: z.string().nullable().optional(),
});

export const screenEndSchema = z.object({
  sessionId: z.string().min(1),
  route: z.string(),
  timestamp: z.number().int(),
  durationMicros: z.number().int(),
  frameCount: z.number().int().min(0),
});

export const frameBatchSchema = z.object({
  timestamp: z.number().int(),
  frameCount: z.number().int().min(0),
  frames: z.array(frameMetricSchema),
});

export const collectorStartSchema = z.object({
  timestamp: z.number().int(),
});

export const collectorStopSchema = z.object({
  timestamp: z.number().int(),
  totalFrames: z.number().int().min(0).optional(),
});

export const EVENT_SCHEMAS = {
  screen_start: screenStartSchema,
  screen_end: screenEndSchema,
  frame_batch: frameBatchSchema,
  collector_start: collectorStartSchema,
  collector_stop: collectorStopSchema,
} as const;

export type EventKind = keyof typeof EVENT_SCHEMAS;

export type EventPayloads = {
  [K in EventKind]: z.infer<(typeof EVENT_SCHEMAS)[K]>;
};

export type ScreenStartPayload = EventPayloads["screen_start"];
export type ScreenEndPayload = EventPayloads["screen_end"];
export type FrameBatchPayload = EventPayloads["frame_batch"];
export type CollectorStartPayload = EventPayloads["collector_start"];
export type CollectorStopPayload = EventPayloads["collector_stop"];

export type TelemetryEvent = {
  [K in EventKind]: { kind: K; data: EventPayloads[K] };
}[EventKind];

/** An event as seen on the transport before its kind is interpreted. */
export interface RawEvent {
  /** Fully qualified kind, e.g. `screenflow:frame_batch`. */
  kind: string;
  data: unknown;
}

export type RawEventListener = (event: RawEvent) => void;

/**
 * Carries instrumentation events from the application to an observer.
 * Delivery may duplicate events; consumers must tolerate that.
 */
export interface TelemetryTransport {
  post(kind: string, data: unknown): void;
  subscribe(listener: RawEventListener): () => void;
}

export function qualifiedKind(kind: EventKind, prefix: string = EVENT_PREFIX): string {
  return `${prefix}:${kind}`;
}

export function postEvent<K extends EventKind>(
  transport: TelemetryTransport,
  kind: K,
  data: EventPayloads[K],
  prefix: string = EVENT_PREFIX
): void {
  transport.post(qualifiedKind(kind, prefix), data);
}

function isEventKind(value: string): value is EventKind {
  return Object.prototype.hasOwnProperty.call(EVENT_SCHEMAS, value);
}

/**
 * Interprets a raw transport event.
 *
 * @returns null when the kind does not carry `prefix` or is not a known kind
 * @throws InvalidFormatError when the kind is known but the payload is malformed
 */
export function parseEvent(raw: RawEvent, prefix: string = EVENT_PREFIX): TelemetryEvent | null {
  const head = `${prefix}:`;
  if (!raw.kind.startsWith(head)) return null;

  const kind = raw.kind.slice(head.length);
  if (!isEventKind(kind)) return null;

  return validatePayload(kind, raw.data);
}

function validatePayload(kind: EventKind, data: unknown): TelemetryEvent {
  const fail = (error: z.ZodError): never => {
    throw new InvalidFormatError(
      `Malformed ${kind} payload`,
      flattenIssues(error)
    );
  };

  switch (kind) {
    case "screen_start": {
      const result = screenStartSchema.safeParse(data);
      return result.success ? { kind, data: result.data } : fail(result.error);
    }
    case "screen_end": {
      const result = screenEndSchema.safeParse(data);
      return result.success ? { kind, data: result.data } : fail(result.error);
    }
    case "frame_batch": {
      const result = frameBatchSchema.safeParse(data);
      return result.success ? { kind, data: result.data } : fail(result.error);
    }
    case "collector_start": {
      const result = collectorStartSchema.safeParse(data);
      return result.success ? { kind, data: result.data } : fail(result.error);
    }
    case "collector_stop": {
      const result = collectorStopSchema.safeParse(data);
      return result.success ? { kind, data: result.data } : fail(result.error);
    }
  }
}

export function flattenIssues(error: z.ZodError): Record<string, string[]> {
  const fields: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    (fields[key] ??= []).push(issue.message);
  }
  return fields;
}

// =============================================================================
// Line codec
// =============================================================================

/** One event per line: `{"kind": "...", "data": {...}}`. */
export function encodeEventLine(event: RawEvent): string {
  return JSON.stringify({ kind: event.kind, data: event.data });
}

const rawEventSchema = z.object({
  kind: z.string().min(1),
  data: z.unknown(),
});

export function decodeEventLine(line: string): RawEvent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new InvalidFormatError("Event line is not valid JSON");
  }

  const result = rawEventSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidFormatError("Event line is missing kind", flattenIssues(result.error));
  }
  return { kind: result.data.kind, data: result.data.data };
}

/** Blank lines are skipped. */
export function decodeEventStream(text: string): RawEvent[] {
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map(decodeEventLine);
}

// =============================================================================
// Loopback transport
// =============================================================================

/**
 * In-process transport: `post` delivers synchronously to every subscriber,
 * in subscription order. Optionally keeps a transcript of every event posted.
 */
export class LoopbackTransport implements TelemetryTransport {
  private listeners = new Set<RawEventListener>();
  private transcript: RawEvent[] = [];

  constructor(private readonly options: { record?: boolean } = {}) {}

  post(kind: string, data: unknown): void {
    const event: RawEvent = { kind, data };
    if (this.options.record) {
      this.transcript.push(event);
    }
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  subscribe(listener: RawEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  /** Events posted so far, when recording is enabled. */
  recorded(): RawEvent[] {
    return [...this.transcript];
  }

  /** Transcript as line-delimited JSON. */
  exportLines(): string {
    return this.transcript.map(encodeEventLine).join("\n");
  }

  /** Re-posts previously captured events, e.g. from `decodeEventStream`. */
  replay(events: readonly RawEvent[]): void {
    for (const event of events) {
      this.post(event.kind, event.data);
    }
  }
}

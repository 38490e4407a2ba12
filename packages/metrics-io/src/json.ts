import { InvalidFormatError, ScreenflowErrorCode } from "./errors";
import { flattenIssues } from "./events";
import { exportEnvelopeSchema } from "./schemas";
import { ScreenSession } from "./session";
import type { ExportEnvelope, ExportMeta, ExportOptions } from "./types";

export const SCHEMA_VERSION = "1.0";

const SUPPORTED_SCHEMA_VERSIONS: readonly string[] = [SCHEMA_VERSION];

export function buildExportMeta(options: ExportOptions = {}): ExportMeta {
  const meta: ExportMeta = {
    schemaVersion: SCHEMA_VERSION,
    appId: options.appId ?? "unknown",
    flutterVersion: options.frameworkVersion ?? "unknown",
    timestamp: (options.exportedAt ?? new Date()).toISOString(),
    device: options.device ?? "unknown",
  };
  if (options.totalFrames !== undefined) {
    meta.totalFrames = options.totalFrames;
  }
  return meta;
}

export function exportSessions(
  sessions: readonly ScreenSession[],
  options: ExportOptions = {}
): ExportEnvelope {
  return {
    meta: buildExportMeta(options),
    sessions: sessions.map((session) => session.toJSON()),
  };
}

export function serializeSessions(
  sessions: readonly ScreenSession[],
  options: ExportOptions = {}
): string {
  return JSON.stringify(exportSessions(sessions, options), null, 2);
}

export interface ImportedSessions {
  meta: ExportMeta;
  sessions: ScreenSession[];
}

/**
 * Rebuilds session records from an export envelope, either already parsed or
 * as JSON text.
 *
 * @throws InvalidFormatError when the payload does not match the export
 * schema or carries a schema version this build does not understand
 */
export function importSessions(input: unknown): ImportedSessions {
  let data = input;
  if (typeof input === "string") {
    try {
      data = JSON.parse(input);
    } catch {
      throw new InvalidFormatError("Import payload is not valid JSON");
    }
  }

  const result = exportEnvelopeSchema.safeParse(data);
  if (!result.success) {
    throw new InvalidFormatError("Import payload does not match the export schema", flattenIssues(result.error));
  }

  const { meta, sessions } = result.data;
  if (!SUPPORTED_SCHEMA_VERSIONS.includes(meta.schemaVersion)) {
    throw new InvalidFormatError(
      `Unsupported schema version: ${meta.schemaVersion}`,
      { "meta.schemaVersion": [`expected one of ${SUPPORTED_SCHEMA_VERSIONS.join(", ")}`] },
      ScreenflowErrorCode.UNSUPPORTED_SCHEMA_VERSION
    );
  }

  return {
    meta,
    sessions: sessions.map((session) => ScreenSession.fromJSON(session)),
  };
}

import initSqlJs, { type Database, type SqlJsStatic, type SqlValue } from "sql.js";
import { z } from "zod";
import { InvalidFormatError } from "./errors";
import { describeError } from "./logger";
import {
  integer,
  jsonColumn,
  nullableInteger,
  nullableJsonColumn,
  nullableText,
  text,
} from "./rows";
import { ARCHIVE_SCHEMA_VERSION, CREATE_TABLES_SQL } from "./schema";
import { insightSeveritySchema, jsonObjectSchema } from "./schemas";
import { ScreenSession } from "./session";
import type { FrameMetric, PerformanceInsight } from "./types";

/** Session collection held in an in-memory SQLite database. */
export interface SessionArchive {
  addSession(session: ScreenSession): void;
  getSession(id: string): ScreenSession | null;
  getSessions(): ScreenSession[];
  getFrameMetrics(sessionId: string): FrameMetric[];
  getInsights(sessionId: string): PerformanceInsight[];
  export(): Uint8Array;
  close(): void;
}

const SESSION_COLUMNS = `id, route_name, start_time_micros, end_time_micros, is_popup,
  previous_route, cpu_profile, memory_stats, timeline_events`;

const timelineEventsSchema = z.array(jsonObjectSchema);
const suggestionsSchema = z.array(z.string());
const metadataSchema = z.record(z.union([z.number(), z.string(), z.boolean()]));

export class ArchiveImporter {
  private sqlPromise: Promise<SqlJsStatic> | null = null;

  private async getSql(): Promise<SqlJsStatic> {
    if (!this.sqlPromise) {
      this.sqlPromise = initSqlJs();
    }
    return this.sqlPromise;
  }

  /**
   * Opens an archive produced by `SessionArchive.export()`.
   *
   * @throws InvalidFormatError when the bytes are not a session archive
   */
  async loadFromBuffer(buffer: ArrayBuffer | Uint8Array): Promise<SessionArchive> {
    const SQL = await this.getSql();
    const bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
    const db = new SQL.Database(bytes);

    try {
      const result = db.exec("SELECT version FROM schema_version");
      const version = result[0]?.values[0]?.[0];
      if (version !== ARCHIVE_SCHEMA_VERSION) {
        throw new InvalidFormatError(`Unsupported archive version: ${String(version)}`);
      }
    } catch (e) {
      db.close();
      if (e instanceof InvalidFormatError) throw e;
      throw new InvalidFormatError(`Not a session archive: ${describeError(e)}`);
    }

    return new SessionArchiveImpl(db);
  }

  async createArchive(): Promise<SessionArchive> {
    const SQL = await this.getSql();
    const db = new SQL.Database();
    db.run(CREATE_TABLES_SQL);
    return new SessionArchiveImpl(db);
  }
}

class SessionArchiveImpl implements SessionArchive {
  constructor(private db: Database) {}

  addSession(session: ScreenSession): void {
    this.db.run("BEGIN TRANSACTION");
    try {
      this.db.run(
        `
        INSERT INTO sessions (${SESSION_COLUMNS})
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
        [
          session.sessionId,
          session.routeName,
          session.startTimeMicros,
          session.endTimeMicros,
          session.isPopup ? 1 : 0,
          session.previousRoute,
          session.cpuProfile ? JSON.stringify(session.cpuProfile) : null,
          session.memoryStats ? JSON.stringify(session.memoryStats) : null,
          JSON.stringify(session.timelineEvents),
        ]
      );

      const frameStmt = this.db.prepare(`
        INSERT INTO frame_metrics (session_id, seq, timestamp_micros, build_duration_micros,
          raster_duration_micros, total_duration_micros, frame_number)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);
      session.frameMetrics.forEach((metric, seq) => {
        frameStmt.run([
          session.sessionId,
          seq,
          metric.timestampMicros,
          metric.buildDurationMicros,
          metric.rasterDurationMicros,
          metric.totalDurationMicros,
          metric.frameNumber,
        ]);
      });
      frameStmt.free();

      session.insights.forEach((insight, position) => {
        this.db.run(
          `
          INSERT INTO insights (session_id, position, type, title, description, suggestions, severity, metadata)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `,
          [
            session.sessionId,
            position,
            insight.type,
            insight.title,
            insight.description,
            JSON.stringify(insight.suggestions),
            insight.severity,
            insight.metadata ? JSON.stringify(insight.metadata) : null,
          ]
        );
      });

      this.db.run("COMMIT");
    } catch (e) {
      this.db.run("ROLLBACK");
      throw e;
    }
  }

  getSession(id: string): ScreenSession | null {
    const stmt = this.db.prepare(`SELECT ${SESSION_COLUMNS} FROM sessions WHERE id = ?`);
    stmt.bind([id]);

    if (!stmt.step()) {
      stmt.free();
      return null;
    }

    const row = stmt.get();
    stmt.free();
    return this.toSession(row);
  }

  getSessions(): ScreenSession[] {
    const result = this.db.exec(`SELECT ${SESSION_COLUMNS} FROM sessions ORDER BY rowid ASC`);

    if (result.length === 0) {
      return [];
    }

    return result[0].values.map((row) => this.toSession(row));
  }

  getFrameMetrics(sessionId: string): FrameMetric[] {
    const stmt = this.db.prepare(`
      SELECT timestamp_micros, build_duration_micros, raster_duration_micros,
             total_duration_micros, frame_number
      FROM frame_metrics
      WHERE session_id = ?
      ORDER BY seq ASC
    `);
    stmt.bind([sessionId]);

    const metrics: FrameMetric[] = [];
    while (stmt.step()) {
      metrics.push(frameMetricFromRow(stmt.get()));
    }
    stmt.free();

    return metrics;
  }

  getInsights(sessionId: string): PerformanceInsight[] {
    const stmt = this.db.prepare(`
      SELECT type, title, description, suggestions, severity, metadata
      FROM insights
      WHERE session_id = ?
      ORDER BY position ASC
    `);
    stmt.bind([sessionId]);

    const insights: PerformanceInsight[] = [];
    while (stmt.step()) {
      const row = stmt.get();
      const severity = insightSeveritySchema.safeParse(row[4]);
      if (!severity.success) {
        stmt.free();
        throw new InvalidFormatError("Archive column insights.severity is not a known severity");
      }
      const insight: PerformanceInsight = {
        type: text(row[0], "insights.type"),
        title: text(row[1], "insights.title"),
        description: text(row[2], "insights.description"),
        suggestions: jsonColumn(row[3], suggestionsSchema, "insights.suggestions"),
        severity: severity.data,
      };
      const metadata = nullableJsonColumn(row[5], metadataSchema, "insights.metadata");
      if (metadata !== null) {
        insight.metadata = metadata;
      }
      insights.push(insight);
    }
    stmt.free();

    return insights;
  }

  export(): Uint8Array {
    return this.db.export();
  }

  close(): void {
    this.db.close();
  }

  private toSession(row: SqlValue[]): ScreenSession {
    const sessionId = text(row[0], "sessions.id");
    return new ScreenSession({
      sessionId,
      routeName: text(row[1], "sessions.route_name"),
      startTimeMicros: integer(row[2], "sessions.start_time_micros"),
      endTimeMicros: nullableInteger(row[3], "sessions.end_time_micros"),
      isPopup: integer(row[4], "sessions.is_popup") === 1,
      previousRoute: nullableText(row[5], "sessions.previous_route"),
      cpuProfile: nullableJsonColumn(row[6], jsonObjectSchema, "sessions.cpu_profile"),
      memoryStats: nullableJsonColumn(row[7], jsonObjectSchema, "sessions.memory_stats"),
      timelineEvents: jsonColumn(row[8], timelineEventsSchema, "sessions.timeline_events"),
      frameMetrics: this.getFrameMetrics(sessionId),
      insights: this.getInsights(sessionId),
    });
  }
}

export function frameMetricFromRow(row: SqlValue[]): FrameMetric {
  return {
    timestampMicros: integer(row[0], "frame_metrics.timestamp_micros"),
    buildDurationMicros: integer(row[1], "frame_metrics.build_duration_micros"),
    rasterDurationMicros: integer(row[2], "frame_metrics.raster_duration_micros"),
    totalDurationMicros: integer(row[3], "frame_metrics.total_duration_micros"),
    frameNumber: integer(row[4], "frame_metrics.frame_number"),
  };
}

/** Packs sessions into a SQLite archive image. */
export async function writeArchive(
  sessions: readonly ScreenSession[],
  importer: ArchiveImporter = new ArchiveImporter()
): Promise<Uint8Array> {
  const archive = await importer.createArchive();
  try {
    sessions.forEach((session) => archive.addSession(session));
    return archive.export();
  } finally {
    archive.close();
  }
}

export async function readArchive(
  bytes: ArrayBuffer | Uint8Array,
  importer: ArchiveImporter = new ArchiveImporter()
): Promise<ScreenSession[]> {
  const archive = await importer.loadFromBuffer(bytes);
  try {
    return archive.getSessions();
  } finally {
    archive.close();
  }
}

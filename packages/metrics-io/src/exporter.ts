import initSqlJs, { type Database } from "sql.js";
import { frameMetricFromRow } from "./importer";
import type { FrameMetric } from "./types";

export interface FramePage {
  limit?: number;
  offset?: number;
}

/**
 * Read-only, lazily opened view over an archive image, for reading a
 * session's frames page by page without restoring whole sessions.
 */
export class ArchiveReader {
  private db: Database | null = null;
  private initPromise: Promise<Database> | null = null;

  constructor(private archiveBytes: ArrayBuffer | Uint8Array) {}

  private async ensureInitialized(): Promise<Database> {
    if (this.db) {
      return this.db;
    }

    if (!this.initPromise) {
      this.initPromise = this.initialize();
    }

    return this.initPromise;
  }

  private async initialize(): Promise<Database> {
    const SQL = await initSqlJs();
    const bytes =
      this.archiveBytes instanceof Uint8Array ? this.archiveBytes : new Uint8Array(this.archiveBytes);
    this.db = new SQL.Database(bytes);
    return this.db;
  }

  /** One page of a session's frames, in recording order. */
  async getFrameMetrics(
    sessionId: string,
    page: FramePage = {}
  ): Promise<FrameMetric[]> {
    const db = await this.ensureInitialized();
    const stmt = db.prepare(`
      SELECT timestamp_micros, build_duration_micros, raster_duration_micros,
             total_duration_micros, frame_number
      FROM frame_metrics
      WHERE session_id = ?
      ORDER BY seq ASC
      LIMIT ? OFFSET ?
    `);
    stmt.bind([sessionId, page.limit ?? -1, page.offset ?? 0]);

    const metrics: FrameMetric[] = [];
    while (stmt.step()) {
      metrics.push(frameMetricFromRow(stmt.get()));
    }
    stmt.free();

    return metrics;
  }

  async *streamFrameMetrics(
    sessionId: string,
    batchSize = 100
  ): AsyncIterable<FrameMetric> {
    let offset = 0;
    while (true) {
      const metrics = await this.getFrameMetrics(sessionId, {
        limit: batchSize,
        offset,
      });

      if (metrics.length === 0) {
        break;
      }

      for (const metric of metrics) {
        yield metric;
      }

      offset += batchSize;
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
    this.initPromise = null;
  }
}

export const ARCHIVE_SCHEMA_VERSION = 1;

export const CREATE_TABLES_SQL = `
-- Screen sessions
CREATE TABLE IF NOT EXISTS sessions (
  id TEXT PRIMARY KEY,
  route_name TEXT NOT NULL,
  start_time_micros INTEGER NOT NULL,
  end_time_micros INTEGER,
  is_popup INTEGER NOT NULL DEFAULT 0,
  previous_route TEXT,
  cpu_profile TEXT,
  memory_stats TEXT,
  timeline_events TEXT NOT NULL DEFAULT '[]'
);

-- Frame metrics, seq preserves arrival order within a session
CREATE TABLE IF NOT EXISTS frame_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
  seq INTEGER NOT NULL,
  timestamp_micros INTEGER NOT NULL,
  build_duration_micros INTEGER NOT NULL,
  raster_duration_micros INTEGER NOT NULL,
  total_duration_micros INTEGER NOT NULL,
  frame_number INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_frame_metrics_session_seq
  ON frame_metrics(session_id, seq);

CREATE INDEX IF NOT EXISTS idx_frame_metrics_session_time
  ON frame_metrics(session_id, timestamp_micros);

-- Insights
CREATE TABLE IF NOT EXISTS insights (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  type TEXT NOT NULL,
  title TEXT NOT NULL,
  description TEXT NOT NULL,
  suggestions TEXT NOT NULL,
  severity TEXT NOT NULL,
  metadata TEXT
);

CREATE INDEX IF NOT EXISTS idx_insights_session
  ON insights(session_id, position);

-- Schema version table
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY
);

INSERT OR REPLACE INTO schema_version (version) VALUES (${ARCHIVE_SCHEMA_VERSION});
`;

export const DROP_TABLES_SQL = `
DROP TABLE IF EXISTS insights;
DROP TABLE IF EXISTS frame_metrics;
DROP TABLE IF EXISTS sessions;
DROP TABLE IF EXISTS schema_version;
`;

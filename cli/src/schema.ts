/**
 * SQLite schema definition for crashdesk
 */

/**
 * Database configuration SQL
 */
export const DB_CONFIG = `
-- Enable WAL mode so readers never see a half-written record
PRAGMA journal_mode=WAL;

-- Enforce foreign keys (duplicate_of, app_id)
PRAGMA foreign_keys=ON;

PRAGMA synchronous=NORMAL;
PRAGMA temp_store=MEMORY;
`;

/**
 * Core table schemas
 */

export const APPS_TABLE = `
CREATE TABLE IF NOT EXISTS apps (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    bundle_id TEXT NOT NULL UNIQUE,
    asc_id TEXT UNIQUE,
    name TEXT
);
`;

export const CRASHES_TABLE = `
CREATE TABLE IF NOT EXISTS crashes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    app_id INTEGER NOT NULL REFERENCES apps(id),
    remote_id TEXT NOT NULL,
    created_at TEXT NOT NULL,
    first_seen_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    device_model TEXT,
    os_version TEXT,
    app_platform TEXT,
    device_family TEXT,
    architecture TEXT,
    connection_type TEXT,
    battery_pct INTEGER,
    app_uptime_ms INTEGER,
    tester_email TEXT,
    tester_comment TEXT,
    build_bundle_id TEXT,
    build_id TEXT,
    attachment_state TEXT NOT NULL DEFAULT 'pending'
        CHECK(attachment_state IN ('pending', 'downloaded', 'unavailable')),
    attachment_path TEXT,
    status TEXT NOT NULL DEFAULT 'new'
        CHECK(status IN ('new', 'investigating', 'fixed', 'wontfix', 'duplicate')),
    notes TEXT,
    fixed_at TEXT,
    duplicate_of INTEGER REFERENCES crashes(id),
    UNIQUE (app_id, remote_id),
    CHECK ((status = 'duplicate') = (duplicate_of IS NOT NULL)),
    CHECK (duplicate_of IS NULL OR duplicate_of != id)
);
`;

export const FEEDBACKS_TABLE = `
CREATE TABLE IF NOT EXISTS feedbacks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    app_id INTEGER NOT NULL REFERENCES apps(id),
    remote_id TEXT NOT NULL,
    created_at TEXT NOT NULL,
    first_seen_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    device_model TEXT,
    os_version TEXT,
    app_platform TEXT,
    device_family TEXT,
    connection_type TEXT,
    battery_pct INTEGER,
    tester_email TEXT,
    tester_comment TEXT,
    build_bundle_id TEXT,
    build_id TEXT,
    mime_type TEXT,
    attachment_state TEXT NOT NULL DEFAULT 'pending'
        CHECK(attachment_state IN ('pending', 'downloaded', 'unavailable')),
    attachment_path TEXT,
    status TEXT NOT NULL DEFAULT 'new'
        CHECK(status IN ('new', 'investigating', 'fixed', 'wontfix', 'duplicate')),
    notes TEXT,
    fixed_at TEXT,
    duplicate_of INTEGER REFERENCES feedbacks(id),
    UNIQUE (app_id, remote_id),
    CHECK ((status = 'duplicate') = (duplicate_of IS NOT NULL)),
    CHECK (duplicate_of IS NULL OR duplicate_of != id)
);
`;

export const STATUS_EVENTS_TABLE = `
CREATE TABLE IF NOT EXISTS status_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    entity_kind TEXT NOT NULL CHECK(entity_kind IN ('crash', 'feedback')),
    entity_id INTEGER NOT NULL,
    from_status TEXT NOT NULL,
    to_status TEXT NOT NULL,
    notes TEXT,
    duplicate_of INTEGER,
    created_at TEXT NOT NULL
);
`;

export const SYNC_CURSORS_TABLE = `
CREATE TABLE IF NOT EXISTS sync_cursors (
    app_id INTEGER NOT NULL REFERENCES apps(id),
    kind TEXT NOT NULL CHECK(kind IN ('crash', 'feedback')),
    next_url TEXT,
    pages_fetched INTEGER NOT NULL DEFAULT 0,
    records_seen INTEGER NOT NULL DEFAULT 0,
    started_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    completed_at TEXT,
    PRIMARY KEY (app_id, kind)
);
`;

/**
 * Index definitions
 */

export const CRASHES_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_crashes_status ON crashes(status);
CREATE INDEX IF NOT EXISTS idx_crashes_created_at ON crashes(created_at DESC);
CREATE INDEX IF NOT EXISTS idx_crashes_app ON crashes(app_id);
CREATE INDEX IF NOT EXISTS idx_crashes_attachment ON crashes(attachment_state);
`;

export const FEEDBACKS_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_feedbacks_status ON feedbacks(status);
CREATE INDEX IF NOT EXISTS idx_feedbacks_created_at ON feedbacks(created_at DESC);
CREATE INDEX IF NOT EXISTS idx_feedbacks_app ON feedbacks(app_id);
CREATE INDEX IF NOT EXISTS idx_feedbacks_attachment ON feedbacks(attachment_state);
`;

export const STATUS_EVENTS_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_status_events_entity ON status_events(entity_kind, entity_id);
`;

/**
 * Combined schema initialization
 */
export const ALL_TABLES = [
  APPS_TABLE,
  CRASHES_TABLE,
  FEEDBACKS_TABLE,
  STATUS_EVENTS_TABLE,
  SYNC_CURSORS_TABLE,
];

export const ALL_INDEXES = [
  CRASHES_INDEXES,
  FEEDBACKS_INDEXES,
  STATUS_EVENTS_INDEXES,
];

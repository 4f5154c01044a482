/**
 * SQLite schema of the fact store.
 *
 * Unrelated* tables hold facts whose referent was unknown at ingestion
 * time. Test runs, tests and reviews are history and are only removed by
 * an explicit prune or clear.
 *
 * Linked requirements: REQ-STORE-001
 */

export const SCHEMA_VERSION = '1';

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS Meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS Batches (
  generation INTEGER PRIMARY KEY,
  started_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS Requirements (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  origin TEXT NOT NULL,
  annotation TEXT CHECK (annotation IN ('manual', 'deprecated')),
  info TEXT,
  generation INTEGER NOT NULL,
  first_generation INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS RequirementHierarchies (
  child_id TEXT NOT NULL REFERENCES Requirements(id) ON DELETE CASCADE,
  parent_id TEXT NOT NULL REFERENCES Requirements(id) ON DELETE CASCADE,
  PRIMARY KEY (child_id, parent_id)
);
CREATE INDEX IF NOT EXISTS idx_hierarchy_parent ON RequirementHierarchies(parent_id);

CREATE TABLE IF NOT EXISTS UnrelatedHierarchies (
  child_id TEXT NOT NULL REFERENCES Requirements(id) ON DELETE CASCADE,
  parent_id TEXT NOT NULL,
  PRIMARY KEY (child_id, parent_id)
);

CREATE TABLE IF NOT EXISTS Traces (
  req_id TEXT NOT NULL REFERENCES Requirements(id) ON DELETE CASCADE,
  filepath TEXT NOT NULL,
  line INTEGER NOT NULL,
  generation INTEGER NOT NULL,
  first_generation INTEGER NOT NULL,
  span_start INTEGER,
  span_end INTEGER,
  item_name TEXT,
  PRIMARY KEY (req_id, filepath, line)
);
CREATE INDEX IF NOT EXISTS idx_traces_generation ON Traces(generation);

CREATE TABLE IF NOT EXISTS UnrelatedTraces (
  req_id TEXT NOT NULL,
  filepath TEXT NOT NULL,
  line INTEGER NOT NULL,
  generation INTEGER NOT NULL,
  span_start INTEGER,
  span_end INTEGER,
  item_name TEXT,
  PRIMARY KEY (req_id, filepath, line)
);

CREATE TABLE IF NOT EXISTS TestRuns (
  name TEXT NOT NULL,
  date TEXT NOT NULL,
  expected_test_count INTEGER NOT NULL,
  meta TEXT,
  logs TEXT,
  PRIMARY KEY (name, date)
);

CREATE TABLE IF NOT EXISTS Tests (
  test_run_name TEXT NOT NULL,
  test_run_date TEXT NOT NULL,
  name TEXT NOT NULL,
  filepath TEXT NOT NULL,
  line INTEGER NOT NULL,
  outcome TEXT NOT NULL CHECK (outcome IN ('passed', 'failed', 'skipped', 'pending')),
  skip_reason TEXT,
  PRIMARY KEY (test_run_name, test_run_date, name),
  FOREIGN KEY (test_run_name, test_run_date) REFERENCES TestRuns(name, date) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS TestCoverage (
  req_id TEXT NOT NULL REFERENCES Requirements(id) ON DELETE CASCADE,
  test_run_name TEXT NOT NULL,
  test_run_date TEXT NOT NULL,
  test_name TEXT NOT NULL,
  trace_filepath TEXT NOT NULL,
  trace_line INTEGER NOT NULL,
  PRIMARY KEY (req_id, test_run_name, test_run_date, test_name, trace_filepath, trace_line),
  FOREIGN KEY (test_run_name, test_run_date, test_name)
    REFERENCES Tests(test_run_name, test_run_date, name) ON DELETE CASCADE,
  FOREIGN KEY (req_id, trace_filepath, trace_line)
    REFERENCES Traces(req_id, filepath, line) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS UnrelatedTestCoverage (
  req_id TEXT NOT NULL,
  test_run_name TEXT NOT NULL,
  test_run_date TEXT NOT NULL,
  test_name TEXT NOT NULL,
  trace_filepath TEXT NOT NULL,
  trace_line INTEGER NOT NULL,
  PRIMARY KEY (req_id, test_run_name, test_run_date, test_name, trace_filepath, trace_line),
  FOREIGN KEY (test_run_name, test_run_date, test_name)
    REFERENCES Tests(test_run_name, test_run_date, name) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS Reviews (
  name TEXT NOT NULL,
  date TEXT NOT NULL,
  reviewer TEXT NOT NULL,
  comment TEXT,
  PRIMARY KEY (name, date)
);

CREATE TABLE IF NOT EXISTS ManuallyVerified (
  req_id TEXT NOT NULL REFERENCES Requirements(id) ON DELETE CASCADE,
  review_name TEXT NOT NULL,
  review_date TEXT NOT NULL,
  comment TEXT,
  PRIMARY KEY (req_id, review_name, review_date),
  FOREIGN KEY (review_name, review_date) REFERENCES Reviews(name, date) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS UnrelatedManuallyVerified (
  req_id TEXT NOT NULL,
  review_name TEXT NOT NULL,
  review_date TEXT NOT NULL,
  comment TEXT,
  PRIMARY KEY (req_id, review_name, review_date),
  FOREIGN KEY (review_name, review_date) REFERENCES Reviews(name, date) ON DELETE CASCADE
);
`;

/** Tables in the order `clear` empties them. */
export const ALL_TABLES = [
  'UnrelatedManuallyVerified',
  'ManuallyVerified',
  'Reviews',
  'UnrelatedTestCoverage',
  'TestCoverage',
  'Tests',
  'TestRuns',
  'UnrelatedTraces',
  'Traces',
  'UnrelatedHierarchies',
  'RequirementHierarchies',
  'Requirements',
  'Batches',
] as const;

import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 2;

const BASE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS github_repos (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    full_name TEXT NOT NULL UNIQUE,
    description TEXT,
    url TEXT,
    clone_url TEXT,
    ssh_url TEXT,
    is_private INTEGER NOT NULL DEFAULT 0,
    is_fork INTEGER NOT NULL DEFAULT 0,
    updated_at TEXT,
    last_discovered TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS projects (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    path TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    remote_url TEXT,
    branch TEXT,
    last_modified TEXT,
    git_count INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS project_dirs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    path TEXT NOT NULL UNIQUE,
    last_scanned TEXT,
    git_count INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS dir_usage (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    path TEXT NOT NULL UNIQUE,
    frequency INTEGER NOT NULL DEFAULT 1,
    last_seen TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS cache_metadata (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    cache_key TEXT NOT NULL UNIQUE,
    last_updated TEXT NOT NULL,
    ttl_seconds INTEGER NOT NULL DEFAULT 300,
    data_hash TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_projects_name ON projects(name);
  CREATE INDEX IF NOT EXISTS idx_projects_remote ON projects(remote_url);
  CREATE INDEX IF NOT EXISTS idx_projects_updated ON projects(updated_at);
  CREATE INDEX IF NOT EXISTS idx_project_dirs_scanned ON project_dirs(last_scanned);
  CREATE INDEX IF NOT EXISTS idx_github_repos_name ON github_repos(name);
  CREATE INDEX IF NOT EXISTS idx_github_repos_updated ON github_repos(updated_at);
  CREATE INDEX IF NOT EXISTS idx_dir_usage_last_seen ON dir_usage(last_seen);
`;

function hasColumn(db: Database.Database, table: string, column: string): boolean {
  const columns = db.prepare<unknown[], { name: string }>(`PRAGMA table_info(${table})`).all();
  return columns.some((c) => c.name === column);
}

/**
 * Create tables and bring older databases forward. Every step is idempotent so
 * two processes opening a fresh file at the same time both succeed.
 */
export function initSchema(db: Database.Database): void {
  const migrate = db.transaction(() => {
    db.exec(BASE_SCHEMA);

    // v2: link projects to remote repos and to the root they were found under
    if (!hasColumn(db, 'projects', 'github_repo_id')) {
      db.exec('ALTER TABLE projects ADD COLUMN github_repo_id INTEGER REFERENCES github_repos(id) ON DELETE SET NULL');
    }
    if (!hasColumn(db, 'projects', 'root_path')) {
      db.exec('ALTER TABLE projects ADD COLUMN root_path TEXT');
    }
    db.exec('CREATE INDEX IF NOT EXISTS idx_projects_github_repo ON projects(github_repo_id)');
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  });
  migrate.immediate();
}

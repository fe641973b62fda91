import Database from 'better-sqlite3';
import * as fs from 'fs-extra';
import * as path from 'path';
import { StoreError, wrapStoreError } from '../errors.js';
import { rankByFrecency } from '../ranking/frecency.js';
import type {
  CacheMetadata,
  CacheMetadataInput,
  DirUsage,
  DirUsageInput,
  GitHubRepo,
  GitHubRepoInput,
  Project,
  ProjectDir,
  ProjectDirInput,
  ProjectInput,
  RankedDirUsage,
  StoreStats,
  TableName,
} from '../types/Records.js';
import { TABLES } from '../types/Records.js';
import { createLogger } from '../utils/log.js';
import { DEFAULT_RETRY, withBusyRetry, type RetryOptions } from './retry.js';
import { initSchema } from './schema.js';
import type { ProjectLink, RecordStore } from './StorageAdapter.js';

const log = createLogger('SqliteStore');

export interface SqliteStoreOptions {
  /** How long SQLite itself waits on a held lock before reporting SQLITE_BUSY. */
  busyTimeoutMs?: number;
  retry?: RetryOptions;
  /** Clock used for created/updated stamps and frecency. */
  now?: () => Date;
  readonly?: boolean;
}

// ─── Row shapes ───────────────────────────────────────────────────────────────

interface ProjectRow {
  id: number;
  path: string;
  name: string;
  remote_url: string | null;
  branch: string | null;
  last_modified: string | null;
  git_count: number;
  github_repo_id: number | null;
  root_path: string | null;
  created_at: string;
  updated_at: string;
}

interface ProjectDirRow {
  id: number;
  path: string;
  last_scanned: string | null;
  git_count: number;
  created_at: string;
  updated_at: string;
}

interface DirUsageRow {
  id: number;
  path: string;
  frequency: number;
  last_seen: string;
  created_at: string;
  updated_at: string;
}

interface GitHubRepoRow {
  id: number;
  name: string;
  full_name: string;
  description: string | null;
  url: string | null;
  clone_url: string | null;
  ssh_url: string | null;
  is_private: number;
  is_fork: number;
  updated_at: string | null;
  last_discovered: string;
  created_at: string;
}

interface CacheMetadataRow {
  id: number;
  cache_key: string;
  last_updated: string;
  ttl_seconds: number;
  data_hash: string | null;
  created_at: string;
}

interface ProjectParams {
  path: string;
  name: string;
  remoteUrl: string | null;
  branch: string | null;
  lastModified: string | null;
  gitCount: number;
  githubRepoId: number | null;
  rootPath: string | null;
  now: string;
}

interface ProjectDirParams {
  path: string;
  lastScanned: string | null;
  gitCount: number;
  now: string;
}

interface DirUsageParams {
  path: string;
  frequency: number;
  lastSeen: string;
  now: string;
}

interface GitHubRepoParams {
  name: string;
  fullName: string;
  description: string | null;
  url: string | null;
  cloneUrl: string | null;
  sshUrl: string | null;
  isPrivate: number;
  isFork: number;
  updatedAt: string | null;
  now: string;
}

interface CacheMetadataParams {
  cacheKey: string;
  lastUpdated: string;
  ttlSeconds: number;
  dataHash: string | null;
  now: string;
}

// ─── SQL ──────────────────────────────────────────────────────────────────────

/**
 * Keep the most recent of the stored and incoming timestamp. ISO strings
 * compare lexically in time order; a NULL incoming value keeps the stored one.
 */
function latest(table: string, column: string): string {
  return `CASE
      WHEN excluded.${column} IS NULL THEN ${table}.${column}
      WHEN ${table}.${column} IS NULL OR excluded.${column} > ${table}.${column} THEN excluded.${column}
      ELSE ${table}.${column}
    END`;
}

const UPSERT_PROJECT = `
  INSERT INTO projects (path, name, remote_url, branch, last_modified, git_count, github_repo_id, root_path, created_at, updated_at)
  VALUES (@path, @name, @remoteUrl, @branch, @lastModified, @gitCount, @githubRepoId, @rootPath, @now, @now)
  ON CONFLICT(path) DO UPDATE SET
    name = excluded.name,
    remote_url = excluded.remote_url,
    branch = excluded.branch,
    last_modified = ${latest('projects', 'last_modified')},
    git_count = excluded.git_count,
    github_repo_id = COALESCE(excluded.github_repo_id, projects.github_repo_id),
    root_path = COALESCE(excluded.root_path, projects.root_path),
    updated_at = ${latest('projects', 'updated_at')}
`;

const UPSERT_PROJECT_DIR = `
  INSERT INTO project_dirs (path, last_scanned, git_count, created_at, updated_at)
  VALUES (@path, @lastScanned, @gitCount, @now, @now)
  ON CONFLICT(path) DO UPDATE SET
    last_scanned = ${latest('project_dirs', 'last_scanned')},
    git_count = excluded.git_count,
    updated_at = ${latest('project_dirs', 'updated_at')}
`;

const VISIT_DIR = `
  INSERT INTO dir_usage (path, frequency, last_seen, created_at, updated_at)
  VALUES (@path, @frequency, @lastSeen, @now, @now)
  ON CONFLICT(path) DO UPDATE SET
    frequency = dir_usage.frequency + 1,
    last_seen = ${latest('dir_usage', 'last_seen')},
    updated_at = ${latest('dir_usage', 'updated_at')}
`;

const IMPORT_DIR = `
  INSERT INTO dir_usage (path, frequency, last_seen, created_at, updated_at)
  VALUES (@path, @frequency, @lastSeen, @now, @now)
  ON CONFLICT(path) DO UPDATE SET
    frequency = MAX(dir_usage.frequency, excluded.frequency),
    last_seen = ${latest('dir_usage', 'last_seen')},
    updated_at = ${latest('dir_usage', 'updated_at')}
`;

const UPSERT_GITHUB_REPO = `
  INSERT INTO github_repos (name, full_name, description, url, clone_url, ssh_url, is_private, is_fork, updated_at, last_discovered, created_at)
  VALUES (@name, @fullName, @description, @url, @cloneUrl, @sshUrl, @isPrivate, @isFork, @updatedAt, @now, @now)
  ON CONFLICT(full_name) DO UPDATE SET
    name = excluded.name,
    description = excluded.description,
    url = excluded.url,
    clone_url = excluded.clone_url,
    ssh_url = excluded.ssh_url,
    is_private = excluded.is_private,
    is_fork = excluded.is_fork,
    updated_at = ${latest('github_repos', 'updated_at')},
    last_discovered = ${latest('github_repos', 'last_discovered')}
`;

const UPSERT_CACHE_METADATA = `
  INSERT INTO cache_metadata (cache_key, last_updated, ttl_seconds, data_hash, created_at)
  VALUES (@cacheKey, @lastUpdated, @ttlSeconds, @dataHash, @now)
  ON CONFLICT(cache_key) DO UPDATE SET
    last_updated = excluded.last_updated,
    ttl_seconds = excluded.ttl_seconds,
    data_hash = excluded.data_hash
`;

// Tier 0: exact name, tier 1: substring of name or path, tier 2: the rest.
const RANKED_PROJECTS = `
  SELECT *, CASE
      WHEN lower(name) = lower(@query) THEN 0
      WHEN instr(lower(name), lower(@query)) > 0 OR instr(lower(path), lower(@query)) > 0 THEN 1
      ELSE 2
    END AS tier
  FROM projects
`;

// ─── Mappers ──────────────────────────────────────────────────────────────────

function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    path: row.path,
    name: row.name,
    remoteUrl: row.remote_url,
    branch: row.branch,
    lastModified: row.last_modified,
    gitCount: row.git_count,
    githubRepoId: row.github_repo_id,
    rootPath: row.root_path,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toProjectDir(row: ProjectDirRow): ProjectDir {
  return {
    id: row.id,
    path: row.path,
    lastScanned: row.last_scanned,
    gitCount: row.git_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toDirUsage(row: DirUsageRow): DirUsage {
  return {
    id: row.id,
    path: row.path,
    frequency: row.frequency,
    lastSeen: row.last_seen,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toGitHubRepo(row: GitHubRepoRow): GitHubRepo {
  return {
    id: row.id,
    name: row.name,
    fullName: row.full_name,
    description: row.description,
    url: row.url,
    cloneUrl: row.clone_url,
    sshUrl: row.ssh_url,
    isPrivate: row.is_private !== 0,
    isFork: row.is_fork !== 0,
    updatedAt: row.updated_at,
    lastDiscovered: row.last_discovered,
    createdAt: row.created_at,
  };
}

function toCacheMetadata(row: CacheMetadataRow): CacheMetadata {
  return {
    id: row.id,
    cacheKey: row.cache_key,
    lastUpdated: row.last_updated,
    ttlSeconds: row.ttl_seconds,
    dataHash: row.data_hash,
    createdAt: row.created_at,
  };
}

/** Basename of a path, ignoring trailing separators. */
function baseName(target: string): string {
  return path.basename(target.replace(/[\\/]+$/, ''));
}

// ─── SqliteStore ──────────────────────────────────────────────────────────────

/**
 * SQLite-backed record store. One file, WAL journal, one connection per
 * process. Writers from other processes are handled by busy_timeout first
 * and bounded retry after that.
 */
export class SqliteStore implements RecordStore {
  private db: Database.Database | null = null;
  private readonly busyTimeoutMs: number;
  private readonly retry: RetryOptions;
  private readonly now: () => Date;
  private readonly readOnly: boolean;

  constructor(
    public readonly dbPath: string,
    options: SqliteStoreOptions = {}
  ) {
    this.busyTimeoutMs = options.busyTimeoutMs ?? 5000;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.now = options.now ?? (() => new Date());
    this.readOnly = options.readonly ?? false;
  }

  static async open(dbPath: string, options: SqliteStoreOptions = {}): Promise<SqliteStore> {
    const store = new SqliteStore(dbPath, options);
    await store.open();
    return store;
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  async open(): Promise<void> {
    if (this.db) return;
    try {
      if (!this.readOnly) {
        await fs.ensureDir(path.dirname(this.dbPath));
      }
    } catch (error) {
      throw wrapStoreError(error, 'open', this.dbPath);
    }

    const db = await withBusyRetry('open', this.dbPath, this.retry, () => {
      const conn = new Database(this.dbPath, { readonly: this.readOnly, fileMustExist: this.readOnly });
      try {
        // busy_timeout first so the remaining pragmas wait on a concurrent initialiser
        conn.pragma(`busy_timeout = ${Math.max(0, Math.floor(this.busyTimeoutMs))}`);
        if (!this.readOnly) {
          conn.pragma('journal_mode = WAL');
          conn.pragma('synchronous = NORMAL');
        }
        conn.pragma('foreign_keys = ON');
        if (!this.readOnly) {
          initSchema(conn);
        }
        return conn;
      } catch (error) {
        conn.close();
        throw error;
      }
    });

    this.db = db;
    log.debug(`Opened ${this.dbPath}${this.readOnly ? ' (readonly)' : ''}`);
  }

  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
  }

  private get conn(): Database.Database {
    if (!this.db) {
      throw new StoreError('Store is not open', 'storage', 'access', this.dbPath);
    }
    return this.db;
  }

  private run<T>(operation: string, key: string | undefined, fn: (db: Database.Database) => T): Promise<T> {
    return withBusyRetry(operation, key, this.retry, () => fn(this.conn));
  }

  private stamp(): string {
    return this.now().toISOString();
  }

  // ─── Parameter builders ─────────────────────────────────────────────────────

  private projectParams(p: ProjectInput, now: string): ProjectParams {
    return {
      path: p.path,
      name: p.name,
      remoteUrl: p.remoteUrl ?? null,
      branch: p.branch ?? null,
      lastModified: p.lastModified ?? null,
      gitCount: p.gitCount ?? 0,
      githubRepoId: p.githubRepoId ?? null,
      rootPath: p.rootPath ?? null,
      now,
    };
  }

  private projectDirParams(d: ProjectDirInput, now: string): ProjectDirParams {
    return {
      path: d.path,
      lastScanned: d.lastScanned ?? null,
      gitCount: d.gitCount ?? 0,
      now,
    };
  }

  private dirUsageParams(u: DirUsageInput, now: string): DirUsageParams {
    return {
      path: u.path,
      frequency: Math.max(1, Math.floor(u.frequency ?? 1)),
      lastSeen: u.lastSeen ?? now,
      now,
    };
  }

  private gitHubRepoParams(r: GitHubRepoInput, now: string): GitHubRepoParams {
    return {
      name: r.name,
      fullName: r.fullName,
      description: r.description ?? null,
      url: r.url ?? null,
      cloneUrl: r.cloneUrl ?? null,
      sshUrl: r.sshUrl ?? null,
      isPrivate: r.isPrivate ? 1 : 0,
      isFork: r.isFork ? 1 : 0,
      updatedAt: r.updatedAt ?? null,
      now,
    };
  }

  // ─── Single upserts ─────────────────────────────────────────────────────────

  upsertProject(project: ProjectInput): Promise<void> {
    return this.run('upsertProject', project.path, (db) => {
      db.prepare<ProjectParams>(UPSERT_PROJECT).run(this.projectParams(project, this.stamp()));
    });
  }

  upsertProjectDir(dir: ProjectDirInput): Promise<void> {
    return this.run('upsertProjectDir', dir.path, (db) => {
      db.prepare<ProjectDirParams>(UPSERT_PROJECT_DIR).run(this.projectDirParams(dir, this.stamp()));
    });
  }

  upsertDirUsage(usage: DirUsageInput): Promise<void> {
    return this.run('upsertDirUsage', usage.path, (db) => {
      db.prepare<DirUsageParams>(VISIT_DIR).run(this.dirUsageParams(usage, this.stamp()));
    });
  }

  importDirUsage(usage: DirUsageInput): Promise<void> {
    return this.run('importDirUsage', usage.path, (db) => {
      db.prepare<DirUsageParams>(IMPORT_DIR).run(this.dirUsageParams(usage, this.stamp()));
    });
  }

  upsertGitHubRepo(repo: GitHubRepoInput): Promise<void> {
    return this.run('upsertGitHubRepo', repo.fullName, (db) => {
      db.prepare<GitHubRepoParams>(UPSERT_GITHUB_REPO).run(this.gitHubRepoParams(repo, this.stamp()));
    });
  }

  upsertCacheMetadata(meta: CacheMetadataInput): Promise<void> {
    return this.run('upsertCacheMetadata', meta.cacheKey, (db) => {
      const now = this.stamp();
      db.prepare<CacheMetadataParams>(UPSERT_CACHE_METADATA).run({
        cacheKey: meta.cacheKey,
        lastUpdated: meta.lastUpdated ?? now,
        ttlSeconds: Math.floor(meta.ttlSeconds),
        dataHash: meta.dataHash ?? null,
        now,
      });
    });
  }

  // ─── Batches ────────────────────────────────────────────────────────────────

  private batch<I, P>(
    operation: string,
    sql: string,
    items: readonly I[],
    toParams: (item: I, now: string) => P,
    clearFirst?: TableName
  ): Promise<number> {
    if (items.length === 0 && !clearFirst) return Promise.resolve(0);
    return this.run(operation, undefined, (db) => {
      const stmt = db.prepare<[P]>(sql);
      const now = this.stamp();
      const tx = db.transaction((rows: readonly I[]) => {
        if (clearFirst) db.prepare(`DELETE FROM ${clearFirst}`).run();
        for (const row of rows) stmt.run(toParams(row, now));
        return rows.length;
      });
      return tx.immediate(items);
    });
  }

  upsertProjects(projects: ProjectInput[]): Promise<number> {
    return this.batch('upsertProjects', UPSERT_PROJECT, projects, (p, now) => this.projectParams(p, now));
  }

  upsertProjectDirs(dirs: ProjectDirInput[]): Promise<number> {
    return this.batch('upsertProjectDirs', UPSERT_PROJECT_DIR, dirs, (d, now) => this.projectDirParams(d, now));
  }

  importDirUsages(usages: DirUsageInput[]): Promise<number> {
    return this.batch('importDirUsages', IMPORT_DIR, usages, (u, now) => this.dirUsageParams(u, now));
  }

  upsertGitHubRepos(repos: GitHubRepoInput[]): Promise<number> {
    return this.batch('upsertGitHubRepos', UPSERT_GITHUB_REPO, repos, (r, now) => this.gitHubRepoParams(r, now));
  }

  replaceProjects(projects: ProjectInput[]): Promise<number> {
    return this.batch('replaceProjects', UPSERT_PROJECT, projects, (p, now) => this.projectParams(p, now), 'projects');
  }

  replaceProjectDirs(dirs: ProjectDirInput[]): Promise<number> {
    return this.batch(
      'replaceProjectDirs',
      UPSERT_PROJECT_DIR,
      dirs,
      (d, now) => this.projectDirParams(d, now),
      'project_dirs'
    );
  }

  setProjectLinks(links: ProjectLink[]): Promise<number> {
    if (links.length === 0) return Promise.resolve(0);
    return this.run('setProjectLinks', undefined, (db) => {
      const stmt = db.prepare<[number, string]>('UPDATE projects SET github_repo_id = ? WHERE path = ?');
      const tx = db.transaction((rows: readonly ProjectLink[]) => {
        let changed = 0;
        for (const link of rows) changed += stmt.run(link.githubRepoId, link.path).changes;
        return changed;
      });
      return tx.immediate(links);
    });
  }

  // ─── Queries ────────────────────────────────────────────────────────────────

  listProjects(): Promise<Project[]> {
    return this.run('listProjects', undefined, (db) =>
      db.prepare<[], ProjectRow>('SELECT * FROM projects ORDER BY updated_at DESC, path').all().map(toProject)
    );
  }

  listProjectDirs(): Promise<ProjectDir[]> {
    return this.run('listProjectDirs', undefined, (db) =>
      db.prepare<[], ProjectDirRow>('SELECT * FROM project_dirs ORDER BY path').all().map(toProjectDir)
    );
  }

  listGitHubRepos(): Promise<GitHubRepo[]> {
    return this.run('listGitHubRepos', undefined, (db) =>
      db
        .prepare<[], GitHubRepoRow>('SELECT * FROM github_repos ORDER BY updated_at DESC, full_name')
        .all()
        .map(toGitHubRepo)
    );
  }

  listDirUsage(options: { limit?: number; now?: Date } = {}): Promise<RankedDirUsage[]> {
    return this.run('listDirUsage', undefined, (db) => {
      const rows = db.prepare<[], DirUsageRow>('SELECT * FROM dir_usage').all().map(toDirUsage);
      return rankByFrecency(rows, options.now ?? this.now(), options.limit);
    });
  }

  listCacheMetadata(): Promise<CacheMetadata[]> {
    return this.run('listCacheMetadata', undefined, (db) =>
      db.prepare<[], CacheMetadataRow>('SELECT * FROM cache_metadata ORDER BY cache_key').all().map(toCacheMetadata)
    );
  }

  getProject(projectPath: string): Promise<Project | null> {
    return this.run('getProject', projectPath, (db) => {
      const row = db.prepare<[string], ProjectRow>('SELECT * FROM projects WHERE path = ?').get(projectPath);
      return row ? toProject(row) : null;
    });
  }

  getGitHubRepo(fullName: string): Promise<GitHubRepo | null> {
    return this.run('getGitHubRepo', fullName, (db) => {
      const row = db.prepare<[string], GitHubRepoRow>('SELECT * FROM github_repos WHERE full_name = ?').get(fullName);
      return row ? toGitHubRepo(row) : null;
    });
  }

  getDirUsage(dirPath: string): Promise<DirUsage | null> {
    return this.run('getDirUsage', dirPath, (db) => {
      const row = db.prepare<[string], DirUsageRow>('SELECT * FROM dir_usage WHERE path = ?').get(dirPath);
      return row ? toDirUsage(row) : null;
    });
  }

  getCacheMetadata(cacheKey: string): Promise<CacheMetadata | null> {
    return this.run('getCacheMetadata', cacheKey, (db) => {
      const row = db
        .prepare<[string], CacheMetadataRow>('SELECT * FROM cache_metadata WHERE cache_key = ?')
        .get(cacheKey);
      return row ? toCacheMetadata(row) : null;
    });
  }

  // ─── Similarity ─────────────────────────────────────────────────────────────

  private ranked(
    operation: string,
    query: string,
    maxTier: number,
    limit: number | undefined,
    excludePath?: string
  ): Promise<Project[]> {
    return this.run(operation, query, (db) => {
      const sql = `
        SELECT * FROM (${RANKED_PROJECTS})
        WHERE tier <= @maxTier AND path IS NOT @excludePath
        ORDER BY tier, updated_at DESC, path
        LIMIT @limit
      `;
      const rows = db
        .prepare<{ query: string; maxTier: number; excludePath: string | null; limit: number }, ProjectRow>(sql)
        .all({ query, maxTier, excludePath: excludePath ?? null, limit: limit === undefined ? -1 : Math.max(0, limit) });
      return rows.map(toProject);
    });
  }

  /** Every project, ordered by similarity tier to `query`. */
  rankProjects(query: string, limit?: number): Promise<Project[]> {
    return this.ranked('rankProjects', query, 2, limit);
  }

  /** Projects whose name equals or contains `query`, or whose path contains it. */
  searchProjects(query: string, limit?: number): Promise<Project[]> {
    return this.ranked('searchProjects', query, 1, limit);
  }

  /** Projects resembling the directory at `targetPath`, excluding that project itself. */
  similarProjects(targetPath: string, limit?: number): Promise<Project[]> {
    return this.ranked('similarProjects', baseName(targetPath), 1, limit, targetPath);
  }

  // ─── Maintenance ────────────────────────────────────────────────────────────

  clear(tables: readonly TableName[]): Promise<void> {
    // projects first: deleting a repo row would otherwise rewrite links via SET NULL
    const ordered = TABLES.filter((t) => tables.includes(t));
    const unknown = tables.filter((t) => !TABLES.includes(t));
    if (unknown.length > 0) {
      return Promise.reject(new StoreError(`Unknown table(s): ${unknown.join(', ')}`, 'storage', 'clear'));
    }
    if (ordered.length === 0) return Promise.resolve();
    return this.run('clear', ordered.join(','), (db) => {
      const tx = db.transaction(() => {
        for (const table of ordered) db.prepare(`DELETE FROM ${table}`).run();
      });
      tx.immediate();
      log.debug(`Cleared ${ordered.join(', ')}`);
    });
  }

  stats(): Promise<StoreStats> {
    return this.run('stats', undefined, (db) => {
      const count = (table: TableName) =>
        db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;
      return {
        projects: count('projects'),
        project_dirs: count('project_dirs'),
        github_repos: count('github_repos'),
        dir_usage: count('dir_usage'),
        cache_metadata: count('cache_metadata'),
      };
    });
  }

  countLinkedProjects(): Promise<number> {
    return this.run(
      'countLinkedProjects',
      undefined,
      (db) =>
        db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM projects WHERE github_repo_id IS NOT NULL').get()?.n ??
        0
    );
  }

  // ─── Backup / restore ───────────────────────────────────────────────────────

  /** Online copy of the database to `destination`; safe while other processes write. */
  async backup(destination: string): Promise<{ totalPages: number }> {
    const db = this.conn;
    try {
      await fs.ensureDir(path.dirname(destination));
      const result = await db.backup(destination);
      log.info(`Backed up database to ${destination}`);
      return { totalPages: result.totalPages };
    } catch (error) {
      throw wrapStoreError(error, 'backup', destination);
    }
  }

  /**
   * Replace the database file with `source`, then reopen. The source is opened
   * readonly and checked first so a bad file never replaces a good one.
   */
  async restore(source: string): Promise<void> {
    if (!(await fs.pathExists(source))) {
      throw new StoreError(`Backup file not found: ${source}`, 'storage', 'restore', source);
    }
    try {
      const probe = new Database(source, { readonly: true, fileMustExist: true });
      try {
        const result = probe.pragma('quick_check', { simple: true });
        if (result !== 'ok') {
          throw new StoreError(`Backup file failed quick_check: ${String(result)}`, 'corruption', 'restore', source);
        }
      } finally {
        probe.close();
      }

      if (this.db) {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
        this.close();
      }
      await fs.copy(source, this.dbPath, { overwrite: true });
      await fs.remove(`${this.dbPath}-wal`);
      await fs.remove(`${this.dbPath}-shm`);
    } catch (error) {
      throw wrapStoreError(error, 'restore', source);
    }
    await this.open();
    log.info(`Restored database from ${source}`);
  }
}

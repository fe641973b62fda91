import Database from 'better-sqlite3';
import * as fs from 'fs-extra';
import { StoreError, wrapStoreError } from '../errors.js';
import { NATURAL_KEYS, TABLES, type StoreStats, type TableName } from '../types/Records.js';
import { createLogger } from '../utils/log.js';

const log = createLogger('IntegrityChecker');

export type IntegrityCheckName = 'structure' | 'foreign-keys' | 'orphans' | 'duplicates' | 'cache-metadata';

export interface IntegrityCheck {
  name: IntegrityCheckName;
  passed: boolean;
  findings: string[];
}

export interface IntegrityReport {
  dbPath: string;
  checkedAt: string;
  checks: IntegrityCheck[];
  counts: StoreStats;
  passed: boolean;
  summary: string;
}

export interface IntegrityCheckerOptions {
  /** How far in the future a cache stamp may be before it counts as bad. */
  clockSkewMs?: number;
  now?: () => Date;
}

const DEFAULT_CLOCK_SKEW_MS = 5 * 60 * 1000;

/**
 * Read-only diagnostics over the store file. Opens its own readonly
 * connection and never repairs anything it finds.
 */
export class IntegrityChecker {
  private readonly clockSkewMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly dbPath: string,
    options: IntegrityCheckerOptions = {}
  ) {
    this.clockSkewMs = options.clockSkewMs ?? DEFAULT_CLOCK_SKEW_MS;
    this.now = options.now ?? (() => new Date());
  }

  async run(): Promise<IntegrityReport> {
    if (!(await fs.pathExists(this.dbPath))) {
      throw new StoreError(`Database not found: ${this.dbPath}`, 'storage', 'integrity', this.dbPath);
    }

    let db: Database.Database;
    try {
      db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
    } catch (error) {
      throw wrapStoreError(error, 'integrity', this.dbPath);
    }

    try {
      const tables = this.existingTables(db);
      const checks = [
        this.checkStructure(db, tables),
        this.checkForeignKeys(db),
        this.checkOrphans(db, tables),
        this.checkDuplicates(db, tables),
        this.checkCacheMetadata(db, tables),
      ];
      const counts = this.countRows(db, tables);
      const failed = checks.filter((c) => !c.passed);
      const passed = failed.length === 0;
      const summary = passed
        ? `All ${checks.length} checks passed`
        : `${failed.length} of ${checks.length} checks failed: ${failed.map((c) => c.name).join(', ')}`;
      log.debug(summary);
      return { dbPath: this.dbPath, checkedAt: this.now().toISOString(), checks, counts, passed, summary };
    } catch (error) {
      throw wrapStoreError(error, 'integrity', this.dbPath);
    } finally {
      db.close();
    }
  }

  private existingTables(db: Database.Database): Set<TableName> {
    const rows = db.prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'").all();
    const names = new Set(rows.map((r) => r.name));
    return new Set(TABLES.filter((t) => names.has(t)));
  }

  private hasColumn(db: Database.Database, table: TableName, column: string): boolean {
    return db
      .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
      .all()
      .some((c) => c.name === column);
  }

  private checkStructure(db: Database.Database, tables: Set<TableName>): IntegrityCheck {
    const findings = db
      .prepare<[], { integrity_check: string }>('PRAGMA integrity_check')
      .all()
      .map((r) => r.integrity_check)
      .filter((line) => line !== 'ok');
    for (const table of TABLES) {
      if (!tables.has(table)) findings.push(`missing table ${table}`);
    }
    return { name: 'structure', passed: findings.length === 0, findings };
  }

  private checkForeignKeys(db: Database.Database): IntegrityCheck {
    const rows = db
      .prepare<[], { table: string; rowid: number | null; parent: string; fkid: number }>('PRAGMA foreign_key_check')
      .all();
    const findings = rows.map((r) => `${r.table} row ${r.rowid ?? '?'} references missing ${r.parent}`);
    return { name: 'foreign-keys', passed: findings.length === 0, findings };
  }

  private checkOrphans(db: Database.Database, tables: Set<TableName>): IntegrityCheck {
    const findings: string[] = [];
    if (tables.has('projects') && tables.has('github_repos') && this.hasColumn(db, 'projects', 'github_repo_id')) {
      const rows = db
        .prepare<[], { path: string; github_repo_id: number }>(
          `SELECT p.path, p.github_repo_id FROM projects p
           LEFT JOIN github_repos g ON g.id = p.github_repo_id
           WHERE p.github_repo_id IS NOT NULL AND g.id IS NULL
           ORDER BY p.path`
        )
        .all();
      for (const r of rows) findings.push(`project ${r.path} links to missing repo #${r.github_repo_id}`);
    }
    if (tables.has('projects') && tables.has('project_dirs') && this.hasColumn(db, 'projects', 'root_path')) {
      const rows = db
        .prepare<[], { path: string; root_path: string }>(
          `SELECT p.path, p.root_path FROM projects p
           LEFT JOIN project_dirs d ON d.path = p.root_path
           WHERE p.root_path IS NOT NULL AND d.id IS NULL
           ORDER BY p.path`
        )
        .all();
      for (const r of rows) findings.push(`project ${r.path} was found under unknown root ${r.root_path}`);
    }
    return { name: 'orphans', passed: findings.length === 0, findings };
  }

  private checkDuplicates(db: Database.Database, tables: Set<TableName>): IntegrityCheck {
    const findings: string[] = [];
    for (const table of TABLES) {
      if (!tables.has(table)) continue;
      const key = NATURAL_KEYS[table];
      const rows = db
        .prepare<[], { value: string; copies: number }>(
          `SELECT ${key} AS value, COUNT(*) AS copies FROM ${table} GROUP BY ${key} HAVING COUNT(*) > 1 ORDER BY ${key}`
        )
        .all();
      for (const r of rows) findings.push(`${table}.${key} ${r.value} (${r.copies} copies)`);
    }
    return { name: 'duplicates', passed: findings.length === 0, findings };
  }

  private checkCacheMetadata(db: Database.Database, tables: Set<TableName>): IntegrityCheck {
    const findings: string[] = [];
    if (tables.has('cache_metadata')) {
      const limit = this.now().getTime() + this.clockSkewMs;
      const rows = db
        .prepare<[], { cache_key: string; last_updated: string | null; ttl_seconds: number | null }>(
          'SELECT cache_key, last_updated, ttl_seconds FROM cache_metadata ORDER BY cache_key'
        )
        .all();
      for (const r of rows) {
        if (r.ttl_seconds === null || r.ttl_seconds <= 0) {
          findings.push(`${r.cache_key}: ttl_seconds is ${r.ttl_seconds ?? 'null'}`);
        }
        const updated = r.last_updated === null ? Number.NaN : Date.parse(r.last_updated);
        if (Number.isNaN(updated)) {
          findings.push(`${r.cache_key}: last_updated ${r.last_updated ?? 'null'} is not a timestamp`);
        } else if (updated > limit) {
          findings.push(`${r.cache_key}: last_updated ${r.last_updated ?? ''} is in the future`);
        }
      }
    }
    return { name: 'cache-metadata', passed: findings.length === 0, findings };
  }

  private countRows(db: Database.Database, tables: Set<TableName>): StoreStats {
    const count = (table: TableName) =>
      tables.has(table) ? (db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0) : 0;
    return {
      projects: count('projects'),
      project_dirs: count('project_dirs'),
      github_repos: count('github_repos'),
      dir_usage: count('dir_usage'),
      cache_metadata: count('cache_metadata'),
    };
  }
}

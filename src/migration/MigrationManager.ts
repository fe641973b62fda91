import * as fs from 'fs-extra';
import * as path from 'path';
import { StoreCache } from '../cache/StoreCache.js';
import { readLegacyFile } from '../cache/FileCache.js';
import { linkProjectsToRepos } from '../discovery/linking.js';
import { CacheFormatError, MigrationError, WorkdexError, errorMessage, isErrno, wrapStoreError } from '../errors.js';
import { getBackupDir, getCacheFile, getManifestPath } from '../storage/paths.js';
import type { RecordStore } from '../storage/StorageAdapter.js';
import type { LegacyDir, LegacyProject, LegacyProjectDir, ParsedPayload } from '../types/LegacyCache.js';
import { CACHE_KEYS, type CacheKey, type StoreStats, type TableName } from '../types/Records.js';
import { createLogger } from '../utils/log.js';
import {
  createManifest,
  fileDigest,
  findEntry,
  readManifest,
  removeEntry,
  upsertEntry,
  writeManifest,
  type Manifest,
  type ManifestFile,
} from './manifest.js';
import { acquireMigrationLock, readMigrationLock } from './lock.js';

const log = createLogger('MigrationManager');

export type MigrationState = 'not-migrated' | 'partial' | 'migrated';

export interface MigrationProgress {
  phase: 'backing-up' | 'importing' | 'removing-source' | 'linking' | 'completed';
  key?: CacheKey;
  filesProcessed: number;
  totalFiles: number;
}

export interface MigrateOptions {
  signal?: AbortSignal;
  /** Parse and count only; nothing is written or moved. */
  dryRun?: boolean;
  onProgress?: (progress: MigrationProgress) => void;
  /** How long to wait for a concurrent run to release the migration lock. */
  lockWaitMs?: number;
}

export interface FileMigrationResult {
  key: CacheKey;
  file: string;
  status: 'migrated' | 'already-migrated' | 'failed' | 'would-migrate';
  records: number;
  skipped: number;
  error?: string;
}

export interface MigrationResult {
  status: 'completed' | 'partial' | 'already-migrated' | 'nothing-to-migrate' | 'aborted' | 'dry-run' | 'in-progress';
  files: FileMigrationResult[];
  linkedProjects: number;
  totals: { records: number; skipped: number; failed: number };
}

export interface RollbackResult {
  status: 'rolled-back' | 'not-migrated';
  restored: Array<{ key: CacheKey; file: string; sizeBytes: number }>;
  clearedTables: TableName[];
}

export interface MigrationStatus {
  state: MigrationState;
  legacyFiles: CacheKey[];
  manifest: Manifest | null;
  counts: StoreStats;
}

export interface MigrationValidationResult {
  success: boolean;
  state: MigrationState;
  missingBackups: string[];
  corruptedBackups: string[];
  inconsistencies: Array<{ table: TableName; expected: number; actual: number }>;
}

/** Table each legacy key is imported into. */
export const TABLE_FOR_KEY: Readonly<Record<CacheKey, TableName>> = {
  projects: 'projects',
  'project-dirs': 'project_dirs',
  dirs: 'dir_usage',
};

function stateOf(manifest: Manifest | null): MigrationState {
  if (!manifest) return 'not-migrated';
  return manifest.completedAt ? 'migrated' : 'partial';
}

function distinctByPath<T extends { path: string }>(items: readonly T[]): T[] {
  const seen = new Map<string, T>();
  for (const item of items) seen.set(item.path, item);
  return [...seen.values()];
}

function emptyResult(status: MigrationResult['status']): MigrationResult {
  return { status, files: [], linkedProjects: 0, totals: { records: 0, skipped: 0, failed: 0 } };
}

/** Null when the file is absent, including when it disappears while being read. */
async function digestIfPresent(file: string): Promise<{ sha256: string; sizeBytes: number } | null> {
  try {
    return await fileDigest(file);
  } catch (error) {
    if (isErrno(error, 'ENOENT')) return null;
    throw error;
  }
}

async function removeIfEmpty(dir: string): Promise<void> {
  try {
    if ((await fs.readdir(dir)).length === 0) await fs.remove(dir);
  } catch (error) {
    if (!isErrno(error, 'ENOENT')) throw error;
  }
}

function projectName(projectPath: string): string {
  return path.basename(projectPath.replace(/[\\/]+$/, '')) || projectPath;
}

/**
 * Moves the legacy per-key JSON cache into the record store. Each file is
 * backed up before it is read and removed only after its rows are committed;
 * the manifest in the backup dir records how far a run got so the next one
 * resumes there. Rollback puts the original files back byte for byte.
 */
export class MigrationManager {
  private readonly cache: StoreCache;
  private readonly now: () => Date;

  constructor(
    private readonly store: RecordStore,
    options: { ttls?: Partial<Record<CacheKey, number>>; now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.cache = new StoreCache(store, { ttls: options.ttls, now: this.now });
  }

  async getState(sourceDir: string): Promise<MigrationState> {
    return stateOf(await readManifest(sourceDir));
  }

  private async presentLegacyFiles(sourceDir: string): Promise<CacheKey[]> {
    const present: CacheKey[] = [];
    for (const key of CACHE_KEYS) {
      if (await fs.pathExists(getCacheFile(sourceDir, key))) present.push(key);
    }
    return present;
  }

  // ─── migrate ────────────────────────────────────────────────────────────────

  /** Keys still to migrate: files on disk plus files a previous run backed up but never finished. */
  private async plan(sourceDir: string): Promise<{ existing: Manifest | null; todo: CacheKey[] }> {
    const existing = await readManifest(sourceDir);
    const pending = CACHE_KEYS.filter((key) => {
      const entry = existing ? findEntry(existing, key) : undefined;
      return entry ? entry.status !== 'removed' : true;
    });
    const present = await this.presentLegacyFiles(sourceDir);
    const todo = pending.filter((key) => present.includes(key) || (existing && findEntry(existing, key)));
    return { existing, todo };
  }

  async migrate(sourceDir: string, options: MigrateOptions = {}): Promise<MigrationResult> {
    const { existing, todo } = await this.plan(sourceDir);
    if (stateOf(existing) === 'migrated') {
      log.info('Legacy cache already migrated, nothing to do');
      return emptyResult('already-migrated');
    }
    if (!existing && todo.length === 0) {
      return emptyResult('nothing-to-migrate');
    }
    if (options.dryRun) {
      return this.dryRun(sourceDir, todo);
    }

    const lock = await acquireMigrationLock(sourceDir, { waitMs: options.lockWaitMs });
    if (!lock) {
      const holder = await readMigrationLock(sourceDir);
      log.warn(`Another migration is running${holder ? ` (pid ${holder.pid}, since ${holder.startedAt})` : ''}`);
      return emptyResult('in-progress');
    }
    try {
      return await this.migrateLocked(sourceDir, options);
    } finally {
      await lock.release();
    }
  }

  /** Runs with the migration lock held, so the manifest on disk is ours to rewrite. */
  private async migrateLocked(sourceDir: string, options: MigrateOptions): Promise<MigrationResult> {
    const { signal, onProgress } = options;
    // Plan again: a run that held the lock before us may have finished the job.
    const { existing, todo } = await this.plan(sourceDir);
    if (stateOf(existing) === 'migrated') {
      log.info('Legacy cache was migrated by a concurrent run');
      return emptyResult('already-migrated');
    }
    if (!existing && todo.length === 0) {
      return emptyResult('nothing-to-migrate');
    }

    const result = emptyResult('completed');
    const manifest = existing ?? createManifest(this.now());
    if (existing) {
      log.info(`Resuming migration started at ${existing.startedAt}`);
    }
    await writeManifest(sourceDir, manifest);

    let processed = 0;
    for (const key of CACHE_KEYS) {
      if (!todo.includes(key)) {
        const done = findEntry(manifest, key);
        if (done) {
          result.files.push({
            key,
            file: done.file,
            status: 'already-migrated',
            records: done.records,
            skipped: done.skipped,
          });
        }
        continue;
      }
      if (signal?.aborted) {
        log.warn('Migration aborted; committed files stay migrated');
        result.status = 'aborted';
        break;
      }

      let fileResult: FileMigrationResult;
      try {
        fileResult = await this.migrateFile(sourceDir, key, manifest, (phase) =>
          onProgress?.({ phase, key, filesProcessed: processed, totalFiles: todo.length })
        );
      } catch (error) {
        if (error instanceof WorkdexError) throw error;
        throw wrapStoreError(error, 'migrate', `${key}.json`);
      }
      processed++;
      result.files.push(fileResult);
    }

    for (const file of result.files) {
      result.totals.records += file.records;
      result.totals.skipped += file.skipped;
      if (file.status === 'failed') result.totals.failed++;
    }

    if (result.status === 'aborted') {
      return result;
    }

    onProgress?.({ phase: 'linking', filesProcessed: processed, totalFiles: todo.length });
    result.linkedProjects = await linkProjectsToRepos(this.store);
    manifest.linkedProjects += result.linkedProjects;

    if (result.totals.failed > 0) {
      result.status = 'partial';
      log.warn(`Migration incomplete: ${result.totals.failed} file(s) failed`);
    } else {
      manifest.completedAt = this.now().toISOString();
      log.info(`Migration completed: ${result.totals.records} record(s), ${result.totals.skipped} skipped`);
    }
    await writeManifest(sourceDir, manifest);
    onProgress?.({ phase: 'completed', filesProcessed: processed, totalFiles: todo.length });
    return result;
  }

  private async migrateFile(
    sourceDir: string,
    key: CacheKey,
    manifest: Manifest,
    progress: (phase: MigrationProgress['phase']) => void
  ): Promise<FileMigrationResult> {
    const original = getCacheFile(sourceDir, key);
    const fileName = path.basename(original);
    const backup = path.join(getBackupDir(sourceDir), fileName);
    const digest = await digestIfPresent(original);
    const originalExists = digest !== null;
    let entry = findEntry(manifest, key);

    // 1. Back up first. A crash after the original was removed leaves the backup as the source.
    if (digest) {
      progress('backing-up');
      const backupCurrent = entry && entry.sha256 === digest.sha256 && (await fs.pathExists(backup));
      if (!backupCurrent) {
        await fs.copy(original, backup, { overwrite: true, preserveTimestamps: true });
      }
      entry = {
        key,
        file: fileName,
        backup: fileName,
        sha256: digest.sha256,
        sizeBytes: digest.sizeBytes,
        records: entry?.records ?? 0,
        skipped: entry?.skipped ?? 0,
        status: entry && backupCurrent ? entry.status : 'backed-up',
        updatedAt: this.now().toISOString(),
      };
      upsertEntry(manifest, entry);
      await writeManifest(sourceDir, manifest);
    } else if (!entry || !(await fs.pathExists(backup))) {
      return { key, file: fileName, status: 'failed', records: 0, skipped: 0, error: `${fileName} and its backup are both missing` };
    }

    // 2. Parse and import in one transaction. Re-importing after a crash is idempotent.
    progress('importing');
    let records: number;
    let skipped: number;
    try {
      const source = originalExists ? original : backup;
      ({ records, skipped } = await this.importFile(source, key));
    } catch (error) {
      if (!(error instanceof CacheFormatError)) throw error;
      log.error(`Skipping ${fileName}: ${error.message}`);
      // Never imported: drop the backup so rollback has nothing to restore for it.
      if (originalExists) {
        await fs.remove(backup);
        removeEntry(manifest, key);
        await writeManifest(sourceDir, manifest);
      }
      return { key, file: fileName, status: 'failed', records: 0, skipped: 0, error: error.message };
    }

    const imported: ManifestFile = { ...entry, records, skipped, status: 'imported', updatedAt: this.now().toISOString() };
    upsertEntry(manifest, imported);
    await writeManifest(sourceDir, manifest);
    await this.cache.touch(key);

    // 3. Only now remove the original.
    progress('removing-source');
    await fs.remove(original);
    upsertEntry(manifest, { ...imported, status: 'removed', updatedAt: this.now().toISOString() });
    await writeManifest(sourceDir, manifest);

    log.info(`Migrated ${fileName}: ${records} record(s)${skipped ? `, ${skipped} invalid skipped` : ''}`);
    return { key, file: fileName, status: 'migrated', records, skipped };
  }

  private async importFile(file: string, key: CacheKey): Promise<{ records: number; skipped: number }> {
    switch (key) {
      case 'projects': {
        const { payload } = await readLegacyFile(file, key);
        return { records: await this.importProjects(payload), skipped: payload.skipped };
      }
      case 'project-dirs': {
        const { payload } = await readLegacyFile(file, key);
        return { records: await this.importProjectDirs(payload), skipped: payload.skipped };
      }
      case 'dirs': {
        const { payload } = await readLegacyFile(file, key);
        return { records: await this.importDirs(payload), skipped: payload.skipped };
      }
    }
  }

  private importProjects(payload: ParsedPayload<LegacyProject>): Promise<number> {
    const projects = distinctByPath(payload.items).map((p) => ({
      path: p.path,
      name: projectName(p.path),
      remoteUrl: p.remote,
      branch: p.branch,
    }));
    return this.store.upsertProjects(projects);
  }

  private importProjectDirs(payload: ParsedPayload<LegacyProjectDir>): Promise<number> {
    const dirs = distinctByPath(payload.items).map((d) => ({
      path: d.path,
      lastScanned: d.lastScanned,
      gitCount: d.gitCount,
    }));
    return this.store.upsertProjectDirs(dirs);
  }

  private importDirs(payload: ParsedPayload<LegacyDir>): Promise<number> {
    const usages = distinctByPath(payload.items).map((d) => ({
      path: d.path,
      frequency: d.frequency,
      lastSeen: d.lastSeen ?? undefined,
    }));
    return this.store.importDirUsages(usages);
  }

  private async dryRun(sourceDir: string, keys: CacheKey[]): Promise<MigrationResult> {
    const result: MigrationResult = {
      status: 'dry-run',
      files: [],
      linkedProjects: 0,
      totals: { records: 0, skipped: 0, failed: 0 },
    };
    for (const key of keys) {
      const file = getCacheFile(sourceDir, key);
      const fileName = path.basename(file);
      const source = (await fs.pathExists(file)) ? file : path.join(getBackupDir(sourceDir), fileName);
      try {
        const { payload } = await readLegacyFile(source, key);
        const records = distinctByPath(payload.items).length;
        result.files.push({ key, file: fileName, status: 'would-migrate', records, skipped: payload.skipped });
        result.totals.records += records;
        result.totals.skipped += payload.skipped;
      } catch (error) {
        if (!(error instanceof CacheFormatError)) throw error;
        result.files.push({ key, file: fileName, status: 'failed', records: 0, skipped: 0, error: error.message });
        result.totals.failed++;
      }
    }
    return result;
  }

  // ─── rollback ───────────────────────────────────────────────────────────────

  /**
   * Restore the original files and clear what migration imported. Every backup
   * is checked before anything is touched; a missing or altered backup aborts.
   */
  async rollback(sourceDir: string, options: { lockWaitMs?: number } = {}): Promise<RollbackResult> {
    if (!(await readManifest(sourceDir))) {
      return { status: 'not-migrated', restored: [], clearedTables: [] };
    }

    const lock = await acquireMigrationLock(sourceDir, { waitMs: options.lockWaitMs });
    if (!lock) {
      const holder = await readMigrationLock(sourceDir);
      throw new MigrationError('Another migration run is in progress, rollback not started', { holder });
    }
    let result: RollbackResult;
    try {
      result = await this.rollbackLocked(sourceDir);
    } finally {
      await lock.release();
    }

    await removeIfEmpty(getBackupDir(sourceDir));
    return result;
  }

  private async rollbackLocked(sourceDir: string): Promise<RollbackResult> {
    const manifest = await readManifest(sourceDir);
    if (!manifest) {
      return { status: 'not-migrated', restored: [], clearedTables: [] };
    }

    const backupDir = getBackupDir(sourceDir);
    const problems: string[] = [];
    for (const entry of manifest.files) {
      const backup = path.join(backupDir, entry.backup);
      if (!(await fs.pathExists(backup))) {
        problems.push(`missing backup ${entry.backup}`);
        continue;
      }
      const digest = await fileDigest(backup);
      if (digest.sha256 !== entry.sha256) {
        problems.push(`checksum mismatch for ${entry.backup}`);
      }
    }
    if (problems.length > 0) {
      throw new MigrationError(`Rollback aborted, nothing was changed: ${problems.join('; ')}`, {
        backupDir,
        problems,
      });
    }

    const restored: RollbackResult['restored'] = [];
    for (const entry of manifest.files) {
      const target = path.join(sourceDir, entry.file);
      await fs.copy(path.join(backupDir, entry.backup), target, { overwrite: true, preserveTimestamps: true });
      const digest = await fileDigest(target);
      if (digest.sha256 !== entry.sha256) {
        throw new MigrationError(`Restored ${entry.file} does not match its backup`, { file: target });
      }
      restored.push({ key: entry.key, file: entry.file, sizeBytes: digest.sizeBytes });
    }

    const clearedTables: TableName[] = [...manifest.files.map((f) => TABLE_FOR_KEY[f.key]), 'cache_metadata'];
    await this.store.clear(clearedTables);

    for (const entry of manifest.files) {
      await fs.remove(path.join(backupDir, entry.backup));
    }
    await fs.remove(getManifestPath(sourceDir));

    log.info(`Rolled back ${restored.length} file(s), cleared ${clearedTables.join(', ')}`);
    return { status: 'rolled-back', restored, clearedTables };
  }

  // ─── status / verify ────────────────────────────────────────────────────────

  async getMigrationStatus(sourceDir: string): Promise<MigrationStatus> {
    const manifest = await readManifest(sourceDir);
    return {
      state: stateOf(manifest),
      legacyFiles: await this.presentLegacyFiles(sourceDir),
      manifest,
      counts: await this.store.stats(),
    };
  }

  /** Backups match the manifest and the store holds at least what was imported. */
  async validateMigration(sourceDir: string): Promise<MigrationValidationResult> {
    const manifest = await readManifest(sourceDir);
    const result: MigrationValidationResult = {
      success: true,
      state: stateOf(manifest),
      missingBackups: [],
      corruptedBackups: [],
      inconsistencies: [],
    };
    if (!manifest) return result;

    const backupDir = getBackupDir(sourceDir);
    for (const entry of manifest.files) {
      const backup = path.join(backupDir, entry.backup);
      if (!(await fs.pathExists(backup))) {
        result.missingBackups.push(entry.backup);
        continue;
      }
      try {
        const digest = await fileDigest(backup);
        if (digest.sha256 !== entry.sha256) result.corruptedBackups.push(entry.backup);
      } catch (error) {
        log.warn(`Could not read ${backup}: ${errorMessage(error)}`);
        result.corruptedBackups.push(entry.backup);
      }
    }

    const counts = await this.store.stats();
    for (const entry of manifest.files) {
      if (entry.status === 'backed-up') continue;
      const table = TABLE_FOR_KEY[entry.key];
      if (counts[table] < entry.records) {
        result.inconsistencies.push({ table, expected: entry.records, actual: counts[table] });
      }
    }

    result.success =
      result.missingBackups.length === 0 && result.corruptedBackups.length === 0 && result.inconsistencies.length === 0;
    return result;
  }
}

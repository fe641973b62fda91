import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs-extra';
import * as path from 'path';
import { MigrationError, StoreError, errorMessage } from '../src/errors.js';
import { MigrationManager, type MigrationProgress } from '../src/migration/MigrationManager.js';
import { createManifest, fileDigest, readManifest, upsertEntry, writeManifest } from '../src/migration/manifest.js';
import { SqliteStore } from '../src/storage/SqliteStore.js';
import { makeTempDir, removeTempDir, writeLegacyFile } from './helpers/fixtures.js';

const STORE_NOW = '2024-06-01T12:00:00.000Z';

function legacyProjects(count: number) {
  return Array.from({ length: count }, (_, i) => {
    const name = `p${String(i).padStart(2, '0')}`;
    return { Path: `/code/${name}`, Remote: i % 2 === 0 ? `git@github.com:acme/${name}.git` : '', Branch: 'main' };
  });
}

const legacyDirs = [{ path: '/home/dev/notes', frequency: 7, last_seen: '2024-05-30T08:00:00.5+02:00' }];

const legacyProjectDirs = [{ path: '/code', last_scanned: '2024-05-31T10:00:00Z', git_count: 50 }];

describe('MigrationManager', () => {
  let dir: string;
  let store: SqliteStore;
  let manager: MigrationManager;

  const file = (name: string) => path.join(dir, name);
  const backup = (name: string) => path.join(dir, 'backup', name);

  beforeEach(async () => {
    dir = await makeTempDir('migration');
    store = await SqliteStore.open(file('workdex.db'), { now: () => new Date(STORE_NOW) });
    manager = new MigrationManager(store);
  });

  afterEach(async () => {
    store.close();
    await removeTempDir(dir);
  });

  it('reports nothing to migrate in an empty directory', async () => {
    const result = await manager.migrate(dir);
    expect(result.status).toBe('nothing-to-migrate');
    expect(await fs.pathExists(path.join(dir, 'backup'))).toBe(false);
  });

  it('shows the legacy files waiting to be migrated', async () => {
    await writeLegacyFile(dir, 'projects', legacyProjects(2));
    await writeLegacyFile(dir, 'dirs', legacyDirs);

    expect(await manager.getMigrationStatus(dir)).toEqual({
      state: 'not-migrated',
      legacyFiles: ['projects', 'dirs'],
      manifest: null,
      counts: { projects: 0, project_dirs: 0, github_repos: 0, dir_usage: 0, cache_metadata: 0 },
    });
  });

  it('migrates 50 projects and their root, then rolls back to the original bytes', async () => {
    const projectsFile = await writeLegacyFile(dir, 'projects', legacyProjects(50));
    const rootsFile = await writeLegacyFile(dir, 'project-dirs', legacyProjectDirs);
    const dirsFile = await writeLegacyFile(dir, 'dirs', legacyDirs);
    const projectsBefore = await fs.readFile(projectsFile);
    const rootsBefore = await fs.readFile(rootsFile);
    const dirsBefore = await fs.readFile(dirsFile);

    const phases: string[] = [];
    const result = await manager.migrate(dir, {
      onProgress: (p: MigrationProgress) => phases.push(p.key ? `${p.phase}:${p.key}` : p.phase),
    });

    expect(result.status).toBe('completed');
    expect(result.files).toEqual([
      { key: 'projects', file: 'projects.json', status: 'migrated', records: 50, skipped: 0 },
      { key: 'project-dirs', file: 'project-dirs.json', status: 'migrated', records: 1, skipped: 0 },
      { key: 'dirs', file: 'dirs.json', status: 'migrated', records: 1, skipped: 0 },
    ]);
    expect(result.totals).toEqual({ records: 52, skipped: 0, failed: 0 });
    expect(phases).toEqual([
      'backing-up:projects',
      'importing:projects',
      'removing-source:projects',
      'backing-up:project-dirs',
      'importing:project-dirs',
      'removing-source:project-dirs',
      'backing-up:dirs',
      'importing:dirs',
      'removing-source:dirs',
      'linking',
      'completed',
    ]);

    expect(await fs.pathExists(projectsFile)).toBe(false);
    expect(await fs.pathExists(rootsFile)).toBe(false);
    expect(await fs.pathExists(dirsFile)).toBe(false);
    expect(await fs.readFile(backup('projects.json'))).toEqual(projectsBefore);
    expect(await fs.readFile(backup('project-dirs.json'))).toEqual(rootsBefore);
    expect(await store.stats()).toMatchObject({ projects: 50, project_dirs: 1, dir_usage: 1 });
    expect(await store.listProjectDirs()).toMatchObject([
      { path: '/code', gitCount: 50, lastScanned: '2024-05-31T10:00:00.000Z' },
    ]);
    expect(await store.getProject('/code/p04')).toMatchObject({
      name: 'p04',
      remoteUrl: 'git@github.com:acme/p04.git',
      branch: 'main',
      gitCount: 0,
    });
    expect(await store.getDirUsage('/home/dev/notes')).toMatchObject({
      frequency: 7,
      lastSeen: '2024-05-30T06:00:00.500Z',
    });
    expect((await store.listCacheMetadata()).map((m) => m.cacheKey)).toEqual(['dirs', 'project-dirs', 'projects']);
    expect(await manager.getState(dir)).toBe('migrated');

    const rollback = await manager.rollback(dir);
    expect(rollback).toEqual({
      status: 'rolled-back',
      restored: [
        { key: 'projects', file: 'projects.json', sizeBytes: projectsBefore.length },
        { key: 'project-dirs', file: 'project-dirs.json', sizeBytes: rootsBefore.length },
        { key: 'dirs', file: 'dirs.json', sizeBytes: dirsBefore.length },
      ],
      clearedTables: ['projects', 'project_dirs', 'dir_usage', 'cache_metadata'],
    });
    expect(await fs.readFile(projectsFile)).toEqual(projectsBefore);
    expect(await fs.readFile(rootsFile)).toEqual(rootsBefore);
    expect(await fs.readFile(dirsFile)).toEqual(dirsBefore);
    expect(await store.stats()).toEqual({ projects: 0, project_dirs: 0, github_repos: 0, dir_usage: 0, cache_metadata: 0 });
    expect(await fs.pathExists(path.join(dir, 'backup'))).toBe(false);
    expect(await manager.getState(dir)).toBe('not-migrated');
  });

  it('does nothing on a second run', async () => {
    await writeLegacyFile(dir, 'dirs', legacyDirs);
    await manager.migrate(dir);

    const again = await manager.migrate(dir);
    expect(again.status).toBe('already-migrated');
    expect(again.files).toEqual([]);
    expect((await store.getDirUsage('/home/dev/notes'))?.frequency).toBe(7);
  });

  it('counts invalid entries and imports the rest', async () => {
    await writeLegacyFile(dir, 'project-dirs', [
      { path: '/code', last_scanned: '2024-05-01T00:00:00Z', git_count: 12 },
      { path: '/work', last_scanned: 'not a time', git_count: 1 },
    ]);

    const result = await manager.migrate(dir);
    expect(result.files).toEqual([
      { key: 'project-dirs', file: 'project-dirs.json', status: 'migrated', records: 1, skipped: 1 },
    ]);
    expect(await store.listProjectDirs()).toMatchObject([
      { path: '/code', lastScanned: '2024-05-01T00:00:00.000Z', gitCount: 12 },
    ]);
  });

  it('stamps dirs that were never seen with the import time', async () => {
    await writeLegacyFile(dir, 'dirs', [{ path: '/x', frequency: 2, last_seen: '0001-01-01T00:00:00Z' }]);
    await manager.migrate(dir);
    expect((await store.getDirUsage('/x'))?.lastSeen).toBe(STORE_NOW);
  });

  it('links migrated projects to known remote repositories', async () => {
    await store.upsertGitHubRepo({ name: 'api', fullName: 'acme/api' });
    await writeLegacyFile(dir, 'projects', [{ Path: '/code/api', Remote: 'git@github.com:Acme/api.git' }]);

    const result = await manager.migrate(dir);
    expect(result.linkedProjects).toBe(1);
    expect((await readManifest(dir))?.linkedProjects).toBe(1);
    expect(await store.countLinkedProjects()).toBe(1);
  });

  it('leaves an unreadable file in place and finishes on the next run', async () => {
    const projectsFile = file('projects.json');
    await fs.writeFile(projectsFile, '{"data": [');
    await writeLegacyFile(dir, 'dirs', legacyDirs);

    const first = await manager.migrate(dir);
    expect(first.status).toBe('partial');
    expect(first.totals.failed).toBe(1);
    expect(first.files[0]).toMatchObject({ key: 'projects', status: 'failed', records: 0 });
    expect(first.files[0]?.error).toMatch(/^Invalid JSON in projects\.json/);
    expect(first.files[1]).toMatchObject({ key: 'dirs', status: 'migrated', records: 1 });
    expect(await fs.pathExists(projectsFile)).toBe(true);
    expect(await fs.pathExists(backup('projects.json'))).toBe(false);
    expect((await readManifest(dir))?.files.map((f) => f.key)).toEqual(['dirs']);
    expect(await manager.getState(dir)).toBe('partial');

    await writeLegacyFile(dir, 'projects', legacyProjects(3));
    const second = await manager.migrate(dir);
    expect(second.status).toBe('completed');
    expect(second.files).toEqual([
      { key: 'projects', file: 'projects.json', status: 'migrated', records: 3, skipped: 0 },
      { key: 'dirs', file: 'dirs.json', status: 'already-migrated', records: 1, skipped: 0 },
    ]);
    expect(await manager.getState(dir)).toBe('migrated');
  });

  it('resumes a run that stopped after importing, without double counting', async () => {
    const dirsFile = await writeLegacyFile(dir, 'dirs', [{ path: '/srv', frequency: 4, last_seen: '2024-05-01T00:00:00Z' }]);
    await fs.copy(dirsFile, backup('dirs.json'));
    const manifest = createManifest(new Date('2024-05-01T00:00:00.000Z'));
    upsertEntry(manifest, {
      key: 'dirs',
      file: 'dirs.json',
      backup: 'dirs.json',
      ...(await fileDigest(dirsFile)),
      records: 1,
      skipped: 0,
      status: 'imported',
      updatedAt: '2024-05-01T00:00:01.000Z',
    });
    await writeManifest(dir, manifest);
    await store.importDirUsage({ path: '/srv', frequency: 4, lastSeen: '2024-05-01T00:00:00.000Z' });

    const result = await manager.migrate(dir);
    expect(result.status).toBe('completed');
    expect(result.files).toEqual([{ key: 'dirs', file: 'dirs.json', status: 'migrated', records: 1, skipped: 0 }]);
    expect((await store.getDirUsage('/srv'))?.frequency).toBe(4);
    expect(await fs.pathExists(dirsFile)).toBe(false);
    expect((await readManifest(dir))?.startedAt).toBe('2024-05-01T00:00:00.000Z');
  });

  it('imports from the backup when the original is already gone', async () => {
    const dirsFile = await writeLegacyFile(dir, 'dirs', legacyDirs);
    await fs.copy(dirsFile, backup('dirs.json'));
    const manifest = createManifest(new Date());
    upsertEntry(manifest, {
      key: 'dirs',
      file: 'dirs.json',
      backup: 'dirs.json',
      ...(await fileDigest(dirsFile)),
      records: 0,
      skipped: 0,
      status: 'backed-up',
      updatedAt: new Date().toISOString(),
    });
    await writeManifest(dir, manifest);
    await fs.remove(dirsFile);

    const result = await manager.migrate(dir);
    expect(result.files).toEqual([{ key: 'dirs', file: 'dirs.json', status: 'migrated', records: 1, skipped: 0 }]);
    expect((await store.getDirUsage('/home/dev/notes'))?.frequency).toBe(7);
  });

  it('stops between files when aborted and picks up later', async () => {
    await writeLegacyFile(dir, 'projects', legacyProjects(4));
    const dirsFile = await writeLegacyFile(dir, 'dirs', legacyDirs);
    const controller = new AbortController();

    const aborted = await manager.migrate(dir, {
      signal: controller.signal,
      onProgress: (p) => {
        if (p.phase === 'removing-source' && p.key === 'projects') controller.abort();
      },
    });
    expect(aborted.status).toBe('aborted');
    expect(aborted.files.map((f) => `${f.key}:${f.status}`)).toEqual(['projects:migrated']);
    expect(await fs.pathExists(dirsFile)).toBe(true);
    expect(await store.stats()).toMatchObject({ projects: 4, dir_usage: 0 });
    expect(await manager.getState(dir)).toBe('partial');

    const resumed = await manager.migrate(dir);
    expect(resumed.status).toBe('completed');
    expect(resumed.files.map((f) => `${f.key}:${f.status}`)).toEqual(['projects:already-migrated', 'dirs:migrated']);
  });

  it('changes nothing in a dry run', async () => {
    const projectsFile = await writeLegacyFile(dir, 'projects', [{ Path: '/a' }, { Path: '/a', Branch: 'dev' }, { Path: '' }]);

    const result = await manager.migrate(dir, { dryRun: true });
    expect(result).toEqual({
      status: 'dry-run',
      files: [{ key: 'projects', file: 'projects.json', status: 'would-migrate', records: 1, skipped: 1 }],
      linkedProjects: 0,
      totals: { records: 1, skipped: 1, failed: 0 },
    });
    expect(await fs.pathExists(projectsFile)).toBe(true);
    expect(await fs.pathExists(path.join(dir, 'backup'))).toBe(false);
    expect((await store.stats()).projects).toBe(0);
  });

  describe('rollback', () => {
    it('reports when there is nothing to roll back', async () => {
      expect(await manager.rollback(dir)).toEqual({ status: 'not-migrated', restored: [], clearedTables: [] });
    });

    it('touches nothing when a backup is missing', async () => {
      await writeLegacyFile(dir, 'projects', legacyProjects(2));
      await writeLegacyFile(dir, 'dirs', legacyDirs);
      await manager.migrate(dir);
      await fs.remove(backup('dirs.json'));

      await expect(manager.rollback(dir)).rejects.toThrow(MigrationError);
      await expect(manager.rollback(dir)).rejects.toThrow('missing backup dirs.json');
      expect(await fs.pathExists(file('projects.json'))).toBe(false);
      expect(await fs.pathExists(backup('projects.json'))).toBe(true);
      expect(await store.stats()).toMatchObject({ projects: 2, dir_usage: 1 });
    });

    it('refuses a backup whose checksum changed', async () => {
      await writeLegacyFile(dir, 'dirs', legacyDirs);
      await manager.migrate(dir);
      await fs.appendFile(backup('dirs.json'), '\n');

      await expect(manager.rollback(dir)).rejects.toThrow('checksum mismatch for dirs.json');
      expect(await fs.pathExists(file('dirs.json'))).toBe(false);
    });
  });

  describe('validateMigration', () => {
    it('passes after a clean migration and reports tampering', async () => {
      await writeLegacyFile(dir, 'projects', legacyProjects(2));
      await manager.migrate(dir);
      expect(await manager.validateMigration(dir)).toEqual({
        success: true,
        state: 'migrated',
        missingBackups: [],
        corruptedBackups: [],
        inconsistencies: [],
      });

      await fs.appendFile(backup('projects.json'), ' ');
      await store.clear(['projects']);
      expect(await manager.validateMigration(dir)).toEqual({
        success: false,
        state: 'migrated',
        missingBackups: [],
        corruptedBackups: ['projects.json'],
        inconsistencies: [{ table: 'projects', expected: 2, actual: 0 }],
      });
    });

    it('succeeds trivially before any migration', async () => {
      expect((await manager.validateMigration(dir)).state).toBe('not-migrated');
    });
  });
});

describe('MigrationManager with concurrent runs', () => {
  let dir: string;
  let first: SqliteStore;
  let second: SqliteStore;

  const lockFile = () => path.join(dir, 'backup', 'migration.lock');

  beforeEach(async () => {
    dir = await makeTempDir('migration-race');
    first = await SqliteStore.open(path.join(dir, 'workdex.db'));
    second = await SqliteStore.open(path.join(dir, 'workdex.db'));
  });

  afterEach(async () => {
    first.close();
    second.close();
    await removeTempDir(dir);
  });

  it('lets one of two simultaneous runs migrate and the other see it done', async () => {
    const projectsFile = await writeLegacyFile(dir, 'projects', legacyProjects(50));
    const dirsFile = await writeLegacyFile(dir, 'dirs', legacyDirs);
    const projectsBefore = await fs.readFile(projectsFile);
    const dirsBefore = await fs.readFile(dirsFile);

    const outcomes = await Promise.allSettled([
      new MigrationManager(first).migrate(dir),
      new MigrationManager(second).migrate(dir),
    ]);

    const statuses = outcomes.map((o) => (o.status === 'fulfilled' ? o.value.status : `rejected: ${errorMessage(o.reason)}`));
    expect([...statuses].sort()).toEqual(['already-migrated', 'completed']);
    expect(await first.stats()).toMatchObject({ projects: 50, dir_usage: 1 });
    expect((await readManifest(dir))?.files.map((f) => [f.key, f.status])).toEqual([
      ['projects', 'removed'],
      ['dirs', 'removed'],
    ]);
    expect(await fs.pathExists(lockFile())).toBe(false);

    const rollback = await new MigrationManager(second).rollback(dir);
    expect(rollback.restored.map((r) => r.file)).toEqual(['projects.json', 'dirs.json']);
    expect(await fs.readFile(projectsFile)).toEqual(projectsBefore);
    expect(await fs.readFile(dirsFile)).toEqual(dirsBefore);
    expect(await fs.pathExists(path.join(dir, 'backup'))).toBe(false);
  });

  it('reports in-progress while a live process holds the lock', async () => {
    const dirsFile = await writeLegacyFile(dir, 'dirs', legacyDirs);
    await fs.outputFile(lockFile(), JSON.stringify({ pid: process.pid, token: 'other-run', startedAt: STORE_NOW }));

    const result = await new MigrationManager(first).migrate(dir, { lockWaitMs: 0 });

    expect(result).toEqual({
      status: 'in-progress',
      files: [],
      linkedProjects: 0,
      totals: { records: 0, skipped: 0, failed: 0 },
    });
    expect(await fs.pathExists(dirsFile)).toBe(true);
    expect((await first.stats()).dir_usage).toBe(0);
    expect(await fs.readJson(lockFile())).toMatchObject({ token: 'other-run' });
  });

  it('refuses to roll back while another run holds the lock', async () => {
    await writeLegacyFile(dir, 'dirs', legacyDirs);
    const manager = new MigrationManager(first);
    await manager.migrate(dir);
    await fs.outputFile(lockFile(), JSON.stringify({ pid: process.pid, token: 'other-run', startedAt: STORE_NOW }));

    await expect(manager.rollback(dir, { lockWaitMs: 0 })).rejects.toThrow(MigrationError);
    expect(await manager.getState(dir)).toBe('migrated');
  });

  it('takes over a lock left by a process that has exited', async () => {
    await writeLegacyFile(dir, 'dirs', legacyDirs);
    await fs.outputFile(lockFile(), JSON.stringify({ pid: 2147483646, token: 'crashed-run', startedAt: STORE_NOW }));

    const result = await new MigrationManager(first).migrate(dir, { lockWaitMs: 0 });

    expect(result.status).toBe('completed');
    expect(await fs.pathExists(lockFile())).toBe(false);
  });

  it('wraps filesystem failures with the operation and file', async () => {
    await fs.ensureDir(path.join(dir, 'projects.json'));

    const error = await new MigrationManager(first).migrate(dir).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({ kind: 'storage', operation: 'migrate', key: 'projects.json' });
    expect(await fs.pathExists(lockFile())).toBe(false);
  });
});

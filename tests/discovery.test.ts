import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs-extra';
import * as path from 'path';
import { StoreCache } from '../src/cache/StoreCache.js';
import { GitDirectoryScanner, parseBranchFromHead, parseRemoteFromConfig } from '../src/discovery/GitDirectoryScanner.js';
import { linkProjectsToRepos, parseRemoteSlug } from '../src/discovery/linking.js';
import { ProjectIndexer } from '../src/discovery/ProjectIndexer.js';
import { RepositorySync } from '../src/discovery/RepositorySync.js';
import type { DiscoveredRepository, RepoMetadata, RepoMetadataSource, RepositoryScanner } from '../src/discovery/types.js';
import { SqliteStore } from '../src/storage/SqliteStore.js';
import { makeGitRepo, makeTempDir, removeTempDir } from './helpers/fixtures.js';

const NOW = new Date('2024-06-01T00:00:00.000Z');

describe('git metadata parsing', () => {
  it('prefers the origin remote', () => {
    const config = [
      '[core]',
      '\tbare = false',
      '[remote "upstream"]',
      '\turl = https://github.com/upstream/api.git',
      '[remote "origin"]',
      '\turl = git@github.com:acme/api.git',
      '\tfetch = +refs/heads/*:refs/remotes/origin/*',
    ].join('\n');
    expect(parseRemoteFromConfig(config)).toBe('git@github.com:acme/api.git');
  });

  it('falls back to the first remote, or null', () => {
    expect(parseRemoteFromConfig('[remote "fork"]\n\turl = https://example.com/me/api.git\n')).toBe(
      'https://example.com/me/api.git'
    );
    expect(parseRemoteFromConfig('[core]\n\tbare = false\n')).toBeNull();
  });

  it('reads the branch from HEAD', () => {
    expect(parseBranchFromHead('ref: refs/heads/feature/login\n')).toBe('feature/login');
    expect(parseBranchFromHead('3f1c2a9d0b7e4c6a8f5d2e1b0c9a8d7e6f5a4b3c\n')).toBeNull();
  });

  it('extracts owner/name from remote URLs', () => {
    expect(parseRemoteSlug('https://github.com/Acme/API.git')).toBe('acme/api');
    expect(parseRemoteSlug('git@github.com:acme/api.git')).toBe('acme/api');
    expect(parseRemoteSlug('ssh://git@github.com/acme/api')).toBe('acme/api');
    expect(parseRemoteSlug('https://github.com/acme/api/')).toBe('acme/api');
    expect(parseRemoteSlug('https://github.com/acme')).toBeNull();
    expect(parseRemoteSlug('https://gitlab.com/group/sub/repo.git')).toBeNull();
    expect(parseRemoteSlug('/srv/git/api')).toBeNull();
  });
});

describe('GitDirectoryScanner', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('scan');
    await makeGitRepo(path.join(root, 'api'), { remote: 'https://github.com/acme/api.git', branch: 'main' });
    await makeGitRepo(path.join(root, 'group', 'web'), { branch: null });
    await makeGitRepo(path.join(root, 'node_modules', 'pkg'), { branch: 'main' });
    await makeGitRepo(path.join(root, 'deep', 'a', 'b', 'c', 'd'), { branch: 'main' });
    await fs.outputFile(path.join(root, 'worktree', '.git'), 'gitdir: ../api/.git\n');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  async function collect(scanner: GitDirectoryScanner): Promise<DiscoveredRepository[]> {
    const found: DiscoveredRepository[] = [];
    for await (const repo of scanner.scan(root)) found.push(repo);
    return found;
  }

  it('finds repositories breadth first, skipping vendored dirs', async () => {
    const found = await collect(new GitDirectoryScanner({ maxDepth: 4 }));

    expect(found.map((r) => path.relative(root, r.path))).toEqual(['api', 'worktree', path.join('group', 'web')]);
    expect(found[0]).toMatchObject({
      name: 'api',
      root,
      remoteUrl: 'https://github.com/acme/api.git',
      branch: 'main',
    });
    expect(found[0]?.lastModified).toEqual(expect.any(String));
    expect(found[1]).toMatchObject({ name: 'worktree', remoteUrl: 'https://github.com/acme/api.git', branch: 'main' });
    expect(found[2]).toMatchObject({ name: 'web', remoteUrl: null, branch: null });
  });

  it('descends further when allowed', async () => {
    const found = await collect(new GitDirectoryScanner({ maxDepth: 5, skip: [] }));
    expect(found.map((r) => path.relative(root, r.path))).toEqual([
      'api',
      'worktree',
      path.join('group', 'web'),
      path.join('node_modules', 'pkg'),
      path.join('deep', 'a', 'b', 'c', 'd'),
    ]);
  });

  it('yields nothing for a missing root', async () => {
    const scanner = new GitDirectoryScanner();
    const found: DiscoveredRepository[] = [];
    for await (const repo of scanner.scan(path.join(root, 'missing'))) found.push(repo);
    expect(found).toEqual([]);
  });
});

class FakeScanner implements RepositoryScanner {
  calls: string[] = [];

  constructor(private readonly trees: Record<string, DiscoveredRepository[] | Error>) {}

  async *scan(root: string): AsyncIterable<DiscoveredRepository> {
    this.calls.push(root);
    const tree = this.trees[root] ?? [];
    if (tree instanceof Error) throw tree;
    yield* tree;
  }
}

function repo(root: string, name: string, remoteUrl: string | null = null): DiscoveredRepository {
  return { path: `${root}/${name}`, name, root, remoteUrl, branch: 'main', lastModified: '2024-05-01T00:00:00.000Z' };
}

describe('ProjectIndexer', () => {
  let dir: string;
  let store: SqliteStore;

  beforeEach(async () => {
    dir = await makeTempDir('indexer');
    store = await SqliteStore.open(path.join(dir, 'workdex.db'), { now: () => NOW });
  });

  afterEach(async () => {
    store.close();
    await removeTempDir(dir);
  });

  it('scans given and stored roots and records failures per root', async () => {
    await store.upsertProjectDir({ path: '/roots/c' });
    const scanner = new FakeScanner({
      '/roots/a': [repo('/roots/a', 'api'), repo('/roots/a', 'web')],
      '/roots/b': new Error('permission denied'),
      '/roots/c': [repo('/roots/c', 'cli')],
    });
    const indexer = new ProjectIndexer(store, scanner, { now: () => NOW });

    const result = await indexer.discover(['/roots/a', '/roots/b']);

    expect(scanner.calls).toEqual(['/roots/a', '/roots/b', '/roots/c']);
    expect(result.projects.map((p) => p.path)).toEqual(['/roots/a/api', '/roots/a/web', '/roots/c/cli']);
    expect(result.projects[0]).toEqual({
      path: '/roots/a/api',
      name: 'api',
      remoteUrl: null,
      branch: 'main',
      lastModified: '2024-05-01T00:00:00.000Z',
      gitCount: 1,
      rootPath: '/roots/a',
    });
    expect(result.failures).toEqual([{ item: '/roots/b', error: 'permission denied' }]);
    expect(await store.listProjectDirs()).toMatchObject([
      { path: '/roots/a', gitCount: 2, lastScanned: NOW.toISOString() },
      { path: '/roots/c', gitCount: 1, lastScanned: NOW.toISOString() },
    ]);
  });

  it('stops when aborted', async () => {
    const indexer = new ProjectIndexer(store, new FakeScanner({}));
    const controller = new AbortController();
    controller.abort();
    await expect(indexer.discover(['/roots/a'], controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
  });

  it('serves projects from the cache and links fresh scans', async () => {
    await store.upsertGitHubRepo({ name: 'api', fullName: 'acme/api' });
    const scanner = new FakeScanner({
      '/roots/a': [repo('/roots/a', 'api', 'git@github.com:acme/api.git'), repo('/roots/a', 'web')],
    });
    const indexer = new ProjectIndexer(store, scanner);
    const cache = new StoreCache(store, { now: () => NOW });

    const first = await indexer.refresh(cache, ['/roots/a']);
    expect(first.map((p) => [p.path, p.githubRepoId !== null])).toEqual([
      ['/roots/a/api', true],
      ['/roots/a/web', false],
    ]);

    const second = await indexer.refresh(cache, ['/roots/a']);
    expect(scanner.calls).toEqual(['/roots/a']);
    expect(second).toEqual(first);

    await indexer.refresh(cache, ['/roots/a'], { refresh: true });
    expect(scanner.calls).toEqual(['/roots/a', '/roots/a']);
  });
});

class FakeSource implements RepoMetadataSource {
  calls: string[] = [];

  constructor(
    private readonly repos: Record<string, RepoMetadata | null | Error>,
    private readonly onFetch?: () => void
  ) {}

  async fetch(owner: string, name: string): Promise<RepoMetadata | null> {
    const slug = `${owner}/${name}`;
    this.calls.push(slug);
    this.onFetch?.();
    const found = this.repos[slug];
    if (found instanceof Error) throw found;
    return found ?? null;
  }
}

describe('RepositorySync and linking', () => {
  let dir: string;
  let store: SqliteStore;

  beforeEach(async () => {
    dir = await makeTempDir('sync');
    store = await SqliteStore.open(path.join(dir, 'workdex.db'), { now: () => NOW });
    await store.upsertProjects([
      { path: '/code/api', name: 'api', remoteUrl: 'git@github.com:acme/api.git' },
      { path: '/code/api-copy', name: 'api-copy', remoteUrl: 'https://github.com/acme/api' },
      { path: '/code/web', name: 'web', remoteUrl: 'https://github.com/acme/web' },
      { path: '/code/scratch', name: 'scratch' },
    ]);
  });

  afterEach(async () => {
    store.close();
    await removeTempDir(dir);
  });

  it('derives distinct targets from project remotes', async () => {
    const sync = new RepositorySync(store, new FakeSource({}));
    expect(await sync.targetsFromProjects()).toEqual([
      { owner: 'acme', name: 'api' },
      { owner: 'acme', name: 'web' },
    ]);
  });

  it('keeps going past missing and failing repositories', async () => {
    const source = new FakeSource({
      'acme/api': { name: 'api', fullName: 'acme/api', sshUrl: 'git@github.com:acme/api.git', isPrivate: true },
      'acme/web': null,
      'acme/cli': new Error('rate limited'),
    });
    const sync = new RepositorySync(store, source);

    const result = await sync.sync([
      { owner: 'acme', name: 'cli' },
      { owner: 'acme', name: 'api' },
      { owner: 'acme', name: 'web' },
    ]);

    expect(result).toEqual({
      synced: 1,
      notFound: ['acme/web'],
      failures: [{ item: 'acme/cli', error: 'rate limited' }],
      aborted: false,
      linkedProjects: 2,
    });
    expect(await store.getGitHubRepo('acme/api')).toMatchObject({ isPrivate: true, lastDiscovered: NOW.toISOString() });
  });

  it('keeps what was synced before an abort', async () => {
    const controller = new AbortController();
    const source = new FakeSource(
      {
        'acme/api': { name: 'api', fullName: 'acme/api' },
        'acme/web': { name: 'web', fullName: 'acme/web' },
      },
      () => controller.abort()
    );

    const result = await new RepositorySync(store, source).sync(undefined, { signal: controller.signal });

    expect(source.calls).toEqual(['acme/api']);
    expect(result).toMatchObject({ synced: 1, aborted: true });
    expect(await store.getGitHubRepo('acme/web')).toBeNull();
  });

  it('links through clone and ssh URLs and leaves linked projects alone', async () => {
    await store.upsertGitHubRepo({
      name: 'web-app',
      fullName: 'acme/web-app',
      cloneUrl: 'https://github.com/acme/web.git',
    });

    expect(await linkProjectsToRepos(store)).toBe(1);
    expect((await store.getProject('/code/web'))?.githubRepoId).toBe((await store.getGitHubRepo('acme/web-app'))?.id);
    expect(await linkProjectsToRepos(store)).toBe(0);
  });
});

import * as path from 'path';
import type { StoreCache } from '../cache/StoreCache.js';
import { errorMessage } from '../errors.js';
import type { RecordStore } from '../storage/StorageAdapter.js';
import type { Project, ProjectDirInput, ProjectInput } from '../types/Records.js';
import { createLogger } from '../utils/log.js';
import { linkProjectsToRepos } from './linking.js';
import type { ItemFailure, RepositoryScanner } from './types.js';

const log = createLogger('ProjectIndexer');

export interface DiscoveryResult {
  projects: ProjectInput[];
  roots: ProjectDirInput[];
  failures: ItemFailure[];
}

/**
 * Scans project roots for repositories. Roots come from the caller and from
 * the roots already stored; every root scanned is recorded with its repo count.
 */
export class ProjectIndexer {
  private readonly now: () => Date;

  constructor(
    private readonly store: RecordStore,
    private readonly scanner: RepositoryScanner,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async discover(roots: readonly string[], signal?: AbortSignal): Promise<DiscoveryResult> {
    const stored = await this.store.listProjectDirs();
    const allRoots = [...new Set([...roots.map((r) => path.resolve(r)), ...stored.map((d) => d.path)])];

    const byPath = new Map<string, ProjectInput>();
    const scannedRoots: ProjectDirInput[] = [];
    const failures: ItemFailure[] = [];

    for (const root of allRoots) {
      signal?.throwIfAborted();
      let found = 0;
      try {
        for await (const repo of this.scanner.scan(root, signal)) {
          found++;
          byPath.set(repo.path, {
            path: repo.path,
            name: repo.name,
            remoteUrl: repo.remoteUrl,
            branch: repo.branch,
            lastModified: repo.lastModified,
            gitCount: 1,
            rootPath: root,
          });
        }
      } catch (error) {
        if (signal?.aborted) throw error;
        log.warn(`Scan of ${root} failed: ${errorMessage(error)}`);
        failures.push({ item: root, error: errorMessage(error) });
        continue;
      }
      scannedRoots.push({ path: root, lastScanned: this.now().toISOString(), gitCount: found });
    }

    await this.store.upsertProjectDirs(scannedRoots);
    log.debug(`Discovered ${byPath.size} project(s) under ${scannedRoots.length} root(s)`);
    return { projects: [...byPath.values()], roots: scannedRoots, failures };
  }

  /**
   * Serve projects through the cache, rescanning on a miss or when `refresh`
   * is set, and link fresh rows to known remote repositories.
   */
  async refresh(
    cache: StoreCache,
    roots: readonly string[],
    options: { refresh?: boolean; signal?: AbortSignal } = {}
  ): Promise<Project[]> {
    let scanned = false;
    const projects = await cache.getOrLoad(
      'projects',
      async () => {
        scanned = true;
        return (await this.discover(roots, options.signal)).projects;
      },
      { refresh: options.refresh }
    );
    if (!scanned) return projects;
    const linked = await linkProjectsToRepos(this.store);
    return linked > 0 ? this.store.listProjects() : projects;
  }
}

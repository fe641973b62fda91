import { createHash } from 'node:crypto';
import type { RecordStore } from '../storage/StorageAdapter.js';
import {
  CACHE_KEYS,
  type CacheKey,
  type DirUsageInput,
  type Project,
  type ProjectDir,
  type ProjectDirInput,
  type ProjectInput,
  type RankedDirUsage,
  type StoreStats,
} from '../types/Records.js';
import { createLogger } from '../utils/log.js';
import { DEFAULT_TTLS } from './FileCache.js';

const log = createLogger('StoreCache');

export interface CacheInputMap {
  projects: ProjectInput;
  'project-dirs': ProjectDirInput;
  dirs: DirUsageInput;
}

export interface CacheRecordMap {
  projects: Project;
  'project-dirs': ProjectDir;
  dirs: RankedDirUsage;
}

interface Handler<I, R> {
  read(): Promise<R[]>;
  write(items: I[]): Promise<number>;
}

export interface StoreCacheOptions {
  /** Freshness windows in ms, per key. */
  ttls?: Partial<Record<CacheKey, number>>;
  /** How many frecency-ranked dirs a cached read returns. */
  dirsLimit?: number;
  now?: () => Date;
}

export interface CacheKeyStatus {
  key: CacheKey;
  lastUpdated: string | null;
  ttlSeconds: number;
  ageSeconds: number | null;
  fresh: boolean;
}

export interface CacheStats {
  counts: StoreStats;
  linkedProjects: number;
  keys: CacheKeyStatus[];
}

function hashItems(items: readonly unknown[]): string {
  return createHash('sha256').update(JSON.stringify(items)).digest('hex');
}

/**
 * Time-boxed view over the store. Rows live only in the store; this class
 * decides whether they are fresh enough to serve, using `cache_metadata`.
 */
export class StoreCache {
  private readonly ttlSeconds: Record<CacheKey, number>;
  private readonly now: () => Date;
  private readonly handlers: { [K in CacheKey]: Handler<CacheInputMap[K], CacheRecordMap[K]> };

  constructor(
    private readonly store: RecordStore,
    options: StoreCacheOptions = {}
  ) {
    const ttls = { ...DEFAULT_TTLS, ...options.ttls };
    this.ttlSeconds = {
      projects: Math.ceil(ttls.projects / 1000),
      'project-dirs': Math.ceil(ttls['project-dirs'] / 1000),
      dirs: Math.ceil(ttls.dirs / 1000),
    };
    this.now = options.now ?? (() => new Date());
    const dirsLimit = options.dirsLimit ?? 1000;

    this.handlers = {
      projects: {
        read: () => store.listProjects(),
        write: (items) => store.replaceProjects(items),
      },
      'project-dirs': {
        read: () => store.listProjectDirs(),
        write: (items) => store.replaceProjectDirs(items),
      },
      dirs: {
        read: () => store.listDirUsage({ limit: dirsLimit, now: this.now() }),
        // Imports never inflate visit counts that are already stored.
        write: (items) => store.importDirUsages(items),
      },
    };
  }

  ttlFor(key: CacheKey): number {
    return this.ttlSeconds[key];
  }

  async isFresh(key: CacheKey): Promise<boolean> {
    const meta = await this.store.getCacheMetadata(key);
    if (!meta) return false;
    const updated = Date.parse(meta.lastUpdated);
    if (Number.isNaN(updated)) return false;
    return this.now().getTime() - updated < meta.ttlSeconds * 1000;
  }

  /** Store rows for `key` when fresh, otherwise undefined. */
  async get<K extends CacheKey>(key: K): Promise<Array<CacheRecordMap[K]> | undefined> {
    if (!(await this.isFresh(key))) return undefined;
    return this.handlers[key].read();
  }

  getProjects(): Promise<Project[] | undefined> {
    return this.get('projects');
  }

  getProjectDirs(): Promise<ProjectDir[] | undefined> {
    return this.get('project-dirs');
  }

  async getDirs(limit?: number): Promise<RankedDirUsage[] | undefined> {
    if (limit === undefined) return this.get('dirs');
    if (!(await this.isFresh('dirs'))) return undefined;
    return this.store.listDirUsage({ limit, now: this.now() });
  }

  /** Write rows for `key` and mark them fresh. */
  async set<K extends CacheKey>(key: K, items: Array<CacheInputMap[K]>): Promise<number> {
    const written = await this.handlers[key].write(items);
    await this.touch(key, hashItems(items));
    log.debug(`Stored ${written} ${key} row(s)`);
    return written;
  }

  setProjects(projects: ProjectInput[]): Promise<number> {
    return this.set('projects', projects);
  }

  setProjectDirs(dirs: ProjectDirInput[]): Promise<number> {
    return this.set('project-dirs', dirs);
  }

  setDirs(dirs: DirUsageInput[]): Promise<number> {
    return this.set('dirs', dirs);
  }

  /** Stamp `key` as fresh as of now without touching its rows. */
  async touch(key: CacheKey, dataHash?: string | null): Promise<void> {
    await this.store.upsertCacheMetadata({
      cacheKey: key,
      lastUpdated: this.now().toISOString(),
      ttlSeconds: this.ttlSeconds[key],
      dataHash: dataHash ?? null,
    });
  }

  /**
   * Serve fresh rows, or run `loader`, store what it returns and serve that.
   * `refresh` skips the freshness check.
   */
  async getOrLoad<K extends CacheKey>(
    key: K,
    loader: () => Promise<Array<CacheInputMap[K]>>,
    options: { refresh?: boolean } = {}
  ): Promise<Array<CacheRecordMap[K]>> {
    if (!options.refresh) {
      const cached = await this.get(key);
      if (cached) {
        log.debug(`Cache hit for ${key}`);
        return cached;
      }
    }
    log.debug(`Cache ${options.refresh ? 'refresh' : 'miss'} for ${key}, loading`);
    await this.set(key, await loader());
    return this.handlers[key].read();
  }

  /** Mark keys stale; rows stay until the next load replaces them. */
  async invalidate(key: CacheKey | 'all'): Promise<void> {
    const keys = key === 'all' ? CACHE_KEYS : [key];
    for (const k of keys) {
      await this.store.upsertCacheMetadata({
        cacheKey: k,
        lastUpdated: new Date(0).toISOString(),
        ttlSeconds: this.ttlSeconds[k],
        dataHash: null,
      });
    }
  }

  async cacheStats(): Promise<CacheStats> {
    const [counts, linkedProjects, metadata] = await Promise.all([
      this.store.stats(),
      this.store.countLinkedProjects(),
      this.store.listCacheMetadata(),
    ]);
    const nowMs = this.now().getTime();
    const keys = CACHE_KEYS.map((key): CacheKeyStatus => {
      const meta = metadata.find((m) => m.cacheKey === key);
      const updated = meta ? Date.parse(meta.lastUpdated) : Number.NaN;
      const ttlSeconds = meta?.ttlSeconds ?? this.ttlSeconds[key];
      if (!meta || Number.isNaN(updated)) {
        return { key, lastUpdated: meta?.lastUpdated ?? null, ttlSeconds, ageSeconds: null, fresh: false };
      }
      const ageSeconds = Math.max(0, Math.floor((nowMs - updated) / 1000));
      return { key, lastUpdated: meta.lastUpdated, ttlSeconds, ageSeconds, fresh: nowMs - updated < ttlSeconds * 1000 };
    });
    return { counts, linkedProjects, keys };
  }
}

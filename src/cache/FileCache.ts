import * as fs from 'fs-extra';
import * as path from 'path';
import { CacheFormatError, errorMessage } from '../errors.js';
import { getCacheFile } from '../storage/paths.js';
import {
  LegacyEnvelopeSchema,
  NANOS_PER_MS,
  parseLegacyTime,
  parsePayload,
  serializePayload,
  type LegacyEnvelope,
  type LegacyItemMap,
  type LegacyPayload,
  type ParsedPayload,
} from '../types/LegacyCache.js';
import { CACHE_KEYS, type CacheKey } from '../types/Records.js';
import { createLogger } from '../utils/log.js';

const log = createLogger('FileCache');

/** Default freshness windows in ms. dirs < projects < project-dirs. */
export const DEFAULT_TTLS: Readonly<Record<CacheKey, number>> = {
  dirs: 30 * 1000,
  projects: 5 * 60 * 1000,
  'project-dirs': 60 * 60 * 1000,
};

export type CacheLookup<T> = { found: true; value: T } | { found: false };

export interface CacheEntryInfo {
  key: CacheKey;
  file: string;
  sizeBytes: number;
  /** null when the envelope could not be read. */
  writtenAt: string | null;
  ageMs: number | null;
  ttlMs: number | null;
  fresh: boolean;
  items: number | null;
  error?: string;
}

export interface LegacyFile<K extends CacheKey> {
  envelope: LegacyEnvelope;
  writtenAt: string;
  payload: ParsedPayload<LegacyItemMap[K]>;
}

/**
 * Read and validate one legacy cache file regardless of its age.
 * Throws CacheFormatError when the envelope or payload list is malformed.
 */
export async function readLegacyFile<K extends CacheKey>(file: string, key: K): Promise<LegacyFile<K>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(file, 'utf8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new CacheFormatError(`Invalid JSON in ${path.basename(file)}: ${error.message}`, file, { cause: error });
    }
    throw error;
  }

  const envelope = LegacyEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    const issues = envelope.error.issues.map((i) => `${i.path.join('.') || 'entry'}: ${i.message}`).join('; ');
    throw new CacheFormatError(`Malformed cache envelope in ${path.basename(file)}: ${issues}`, file);
  }

  const payload = parsePayload(key, envelope.data.data);
  if (!payload) {
    throw new CacheFormatError(`Cache payload in ${path.basename(file)} is not a list`, file);
  }

  return {
    envelope: envelope.data,
    writtenAt: parseLegacyTime(envelope.data.timestamp) ?? new Date(0).toISOString(),
    payload,
  };
}

/**
 * Per-key JSON file cache kept for compatibility with existing cache files.
 * Each key is one `<key>.json` file holding `{ data, timestamp, ttl }`.
 */
export class FileCache {
  private readonly now: () => Date;

  constructor(
    public readonly cacheDir: string,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  fileFor(key: CacheKey): string {
    return getCacheFile(this.cacheDir, key);
  }

  /** Fresh entries only; expired entries are removed, malformed ones are a miss. */
  async get<K extends CacheKey>(key: K): Promise<CacheLookup<LegacyPayload<K>>> {
    const file = this.fileFor(key);
    if (!(await fs.pathExists(file))) return { found: false };

    let entry: LegacyFile<K>;
    try {
      entry = await readLegacyFile(file, key);
    } catch (error) {
      if (error instanceof CacheFormatError) {
        log.debug(`Ignoring ${key}: ${error.message}`);
        return { found: false };
      }
      throw error;
    }

    const ageMs = this.now().getTime() - Date.parse(entry.writtenAt);
    if (ageMs > entry.envelope.ttl / NANOS_PER_MS) {
      log.debug(`Expired ${key} (age ${ageMs}ms)`);
      await fs.remove(file);
      return { found: false };
    }
    return { found: true, value: entry.payload.items };
  }

  async set<K extends CacheKey>(key: K, value: LegacyPayload<K>, ttlMs: number = DEFAULT_TTLS[key]): Promise<void> {
    const file = this.fileFor(key);
    const envelope = {
      data: serializePayload(key, value),
      timestamp: this.now().toISOString(),
      ttl: Math.max(0, Math.round(ttlMs * NANOS_PER_MS)),
    };

    await fs.ensureDir(this.cacheDir);
    // Last writer wins: readers only ever see a complete file.
    const tmp = `${file}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(envelope));
      await fs.rename(tmp, file);
    } catch (error) {
      await fs.remove(tmp);
      throw error;
    }
  }

  async clear(key: CacheKey): Promise<void> {
    await fs.remove(this.fileFor(key));
  }

  /** Removes every known cache file. The rest of the directory (database, backups) is left alone. */
  async clearAll(): Promise<void> {
    for (const key of CACHE_KEYS) {
      await this.clear(key);
    }
  }

  async inspect(): Promise<CacheEntryInfo[]> {
    const entries: CacheEntryInfo[] = [];
    for (const key of CACHE_KEYS) {
      const file = this.fileFor(key);
      if (!(await fs.pathExists(file))) continue;
      const { size } = await fs.stat(file);
      try {
        const entry = await readLegacyFile(file, key);
        const ageMs = this.now().getTime() - Date.parse(entry.writtenAt);
        const ttlMs = entry.envelope.ttl / NANOS_PER_MS;
        entries.push({
          key,
          file,
          sizeBytes: size,
          writtenAt: entry.writtenAt,
          ageMs,
          ttlMs,
          fresh: ageMs <= ttlMs,
          items: entry.payload.items.length,
        });
      } catch (error) {
        if (!(error instanceof CacheFormatError)) throw error;
        entries.push({
          key,
          file,
          sizeBytes: size,
          writtenAt: null,
          ageMs: null,
          ttlMs: null,
          fresh: false,
          items: null,
          error: errorMessage(error),
        });
      }
    }
    return entries;
  }
}

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_TTLS } from './cache/FileCache.js';
import { ConfigError, errorMessage } from './errors.js';
import { DEFAULT_RETRY, type RetryOptions } from './storage/retry.js';
import { getDatabasePath, getLegacyCacheDir } from './storage/paths.js';
import type { CacheKey } from './types/Records.js';

export const APP_DIRNAME = 'workdex';
export const CONFIG_FILENAME = 'config.json';

export type OutputFormat = 'text' | 'json';

const ConfigFileSchema = z
  .object({
    projectRoots: z.array(z.string().min(1)).default([]),
    /** Per-key freshness windows in seconds. */
    ttlSeconds: z
      .object({
        projects: z.number().positive(),
        'project-dirs': z.number().positive(),
        dirs: z.number().positive(),
      })
      .partial()
      .default({}),
    retry: z
      .object({
        attempts: z.number().int().min(1).max(50),
        baseDelayMs: z.number().int().min(0),
        maxDelayMs: z.number().int().min(0),
      })
      .partial()
      .default({}),
    busyTimeoutMs: z.number().int().min(0).default(5000),
    scanDepth: z.number().int().min(0).max(32).default(4),
    outputFormat: z.enum(['text', 'json']).default('text'),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface WorkdexConfig {
  baseDir: string;
  dbPath: string;
  /** Directory holding the legacy `<key>.json` cache files. */
  cacheDir: string;
  configFile: string | null;
  projectRoots: string[];
  /** Freshness windows in ms. */
  ttls: Record<CacheKey, number>;
  retry: RetryOptions;
  busyTimeoutMs: number;
  scanDepth: number;
  outputFormat: OutputFormat;
}

export interface LoadConfigOptions {
  /** Wins over everything else when set. */
  baseDir?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

function expandHome(value: string, homeDir: string): string {
  if (value === '~') return homeDir;
  if (value.startsWith('~/')) return path.join(homeDir, value.slice(2));
  return value;
}

/** --base-dir, then WORKDEX_HOME, then $XDG_CACHE_HOME/workdex, then ~/.cache/workdex. */
export function resolveBaseDir(options: LoadConfigOptions = {}): string {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();
  const candidates = [options.baseDir, env.WORKDEX_HOME];
  for (const candidate of candidates) {
    if (candidate && candidate.trim()) return path.resolve(expandHome(candidate.trim(), homeDir));
  }
  const xdg = env.XDG_CACHE_HOME?.trim();
  const cacheRoot = xdg ? expandHome(xdg, homeDir) : path.join(homeDir, '.cache');
  return path.resolve(cacheRoot, APP_DIRNAME);
}

/**
 * Resolve every setting the core needs. Components receive these values and
 * never read the environment themselves.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<WorkdexConfig> {
  const homeDir = options.homeDir ?? os.homedir();
  const baseDir = resolveBaseDir(options);
  const configFile = path.join(baseDir, CONFIG_FILENAME);

  let raw: unknown = {};
  const exists = await fs.pathExists(configFile);
  if (exists) {
    try {
      raw = JSON.parse(await fs.readFile(configFile, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Cannot read ${configFile}: ${errorMessage(error)}`, { configFile }, { cause: error });
    }
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration in ${configFile}: ${issues.join('; ')}`, { configFile, issues });
  }
  const file = parsed.data;

  const ttls: Record<CacheKey, number> = {
    projects: (file.ttlSeconds.projects ?? DEFAULT_TTLS.projects / 1000) * 1000,
    'project-dirs': (file.ttlSeconds['project-dirs'] ?? DEFAULT_TTLS['project-dirs'] / 1000) * 1000,
    dirs: (file.ttlSeconds.dirs ?? DEFAULT_TTLS.dirs / 1000) * 1000,
  };
  if (!(ttls.dirs < ttls.projects && ttls.projects < ttls['project-dirs'])) {
    throw new ConfigError('ttlSeconds must satisfy dirs < projects < project-dirs', { configFile, ttls });
  }

  return {
    baseDir,
    dbPath: getDatabasePath(baseDir),
    cacheDir: getLegacyCacheDir(baseDir),
    configFile: exists ? configFile : null,
    projectRoots: file.projectRoots.map((root) => path.resolve(expandHome(root, homeDir))),
    ttls,
    retry: { ...DEFAULT_RETRY, ...file.retry },
    busyTimeoutMs: file.busyTimeoutMs,
    scanDepth: file.scanDepth,
    outputFormat: file.outputFormat,
  };
}

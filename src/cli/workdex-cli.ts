#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import * as path from 'path';
import { FileCache } from '../cache/FileCache.js';
import { StoreCache } from '../cache/StoreCache.js';
import { loadConfig, type OutputFormat, type WorkdexConfig } from '../config.js';
import { GitDirectoryScanner } from '../discovery/GitDirectoryScanner.js';
import { ProjectIndexer } from '../discovery/ProjectIndexer.js';
import { EXIT_CODES, WorkdexError, errorMessage, exitCodeFor } from '../errors.js';
import { IntegrityChecker } from '../integrity/IntegrityChecker.js';
import { MigrationManager } from '../migration/MigrationManager.js';
import { SqliteStore } from '../storage/SqliteStore.js';
import { isCacheKey, type LegacyDir, type LegacyProject, type LegacyProjectDir } from '../types/LegacyCache.js';
import { CACHE_KEYS, type CacheKey, type Project } from '../types/Records.js';
import { setVerbose } from '../utils/log.js';
import {
  LIST_FORMATS,
  formatCacheInspect,
  formatDirs,
  formatIntegrity,
  formatMigrationResult,
  formatMigrationStatus,
  formatProjects,
  formatRollback,
  formatValidation,
  isListFormat,
  type ListFormat,
} from './format.js';

export const VERSION = '0.3.0';

type GlobalOptions = {
  baseDir?: string;
  format?: OutputFormat;
  verbose?: boolean;
};

interface ProjectsOptions {
  format: string;
  refresh?: boolean;
  search?: string;
  similarTo?: string;
  limit?: number;
  verbose?: boolean;
  clearCache?: boolean;
}

interface DirsOptions {
  format: string;
  limit?: number;
}

interface FormatOption {
  format?: string;
}

export interface CLIIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return n;
}

function parseOutputFormat(value: string): OutputFormat {
  if (value !== 'text' && value !== 'json') {
    throw new InvalidArgumentError('must be text or json');
  }
  return value;
}

function listFormat(value: string): ListFormat {
  return isListFormat(value) ? value : 'default';
}

function toCacheKey(value: string | undefined): CacheKey | undefined {
  if (value === undefined || value === 'all') return undefined;
  if (!isCacheKey(value)) {
    throw new Error(`Unknown cache key "${value}" (expected ${CACHE_KEYS.join(', ')} or all)`);
  }
  return value;
}

/**
 * Command-line front end. Every action resolves configuration, opens the
 * store for the duration of the command and reports through `log`/`logError`
 * in the selected output format.
 */
export class WorkdexCLI {
  private readonly program = new Command();
  private outputFormat: OutputFormat = 'text';
  /** Set once --format was given, so the config file no longer decides. */
  private formatChosen = false;
  private exitCode: number = EXIT_CODES.success;

  constructor(private readonly io: CLIIO = { stdout: (t) => process.stdout.write(t), stderr: (t) => process.stderr.write(t) }) {
    this.build();
  }

  // ─── Output ─────────────────────────────────────────────────────────────────

  private print(lines: string | readonly string[]): void {
    for (const line of typeof lines === 'string' ? [lines] : lines) {
      this.io.stdout(`${line}\n`);
    }
  }

  private log(message: string, data?: unknown): void {
    if (this.outputFormat === 'json') {
      this.io.stderr(`${JSON.stringify({ type: 'info', message, data, timestamp: new Date().toISOString() })}\n`);
    } else {
      this.io.stderr(`[INFO] ${message}${data === undefined ? '' : ` ${JSON.stringify(data)}`}\n`);
    }
  }

  private logError(message: string, error?: unknown): void {
    const detail = error instanceof WorkdexError ? error.toJSON() : error === undefined ? undefined : errorMessage(error);
    if (this.outputFormat === 'json') {
      this.io.stderr(`${JSON.stringify({ type: 'error', message, error: detail, timestamp: new Date().toISOString() })}\n`);
    } else {
      this.io.stderr(`[ERROR] ${message}${error === undefined ? '' : `: ${errorMessage(error)}`}\n`);
    }
  }

  /** JSON mode prints the raw result; text mode prints the rendered lines. */
  private emit(result: unknown, text: () => string[]): void {
    this.print(this.outputFormat === 'json' ? JSON.stringify(result, null, 2) : text());
  }

  // ─── Context ────────────────────────────────────────────────────────────────

  private async config(): Promise<WorkdexConfig> {
    const opts = this.program.opts<GlobalOptions>();
    const config = await loadConfig({ baseDir: opts.baseDir, env: this.io.env, homeDir: this.io.homeDir });
    if (!this.formatChosen) this.outputFormat = config.outputFormat;
    return config;
  }

  private async withStore<T>(fn: (store: SqliteStore, config: WorkdexConfig) => Promise<T>): Promise<T> {
    const config = await this.config();
    const store = await SqliteStore.open(config.dbPath, { busyTimeoutMs: config.busyTimeoutMs, retry: config.retry });
    try {
      return await fn(store, config);
    } finally {
      store.close();
    }
  }

  private applyFormat(options: FormatOption): void {
    if (options.format) this.setFormat(parseOutputFormat(options.format));
  }

  private setFormat(format: OutputFormat): void {
    this.outputFormat = format;
    this.formatChosen = true;
  }

  // ─── Commands ───────────────────────────────────────────────────────────────

  async listProjects(options: ProjectsOptions): Promise<void> {
    if (options.verbose) setVerbose(true);
    await this.withStore(async (store, config) => {
      const cache = new StoreCache(store, { ttls: config.ttls });

      if (options.clearCache) {
        await store.clear(['projects']);
        await cache.invalidate('projects');
        this.print('Projects cache cleared');
        return;
      }

      const indexer = new ProjectIndexer(store, new GitDirectoryScanner({ maxDepth: config.scanDepth }));
      const all = await indexer.refresh(cache, config.projectRoots, { refresh: options.refresh });

      let projects: Project[];
      if (options.search !== undefined) {
        projects = await store.searchProjects(options.search, options.limit);
      } else if (options.similarTo !== undefined) {
        projects = await store.similarProjects(path.resolve(options.similarTo), options.limit);
      } else {
        projects = [...all].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)).slice(0, options.limit);
      }

      this.print(formatProjects(projects, listFormat(options.format)));

      if (options.verbose) {
        this.log('Cache stats', await cache.cacheStats());
      }
    });
  }

  async listDirs(options: DirsOptions): Promise<void> {
    await this.withStore(async (store) => {
      const dirs = await store.listDirUsage({ limit: options.limit });
      this.print(formatDirs(dirs, listFormat(options.format)));
    });
  }

  async visitDir(dirPath: string): Promise<void> {
    await this.withStore(async (store) => {
      await store.upsertDirUsage({ path: path.resolve(dirPath) });
    });
  }

  async migrateRun(options: FormatOption & { dryRun?: boolean }): Promise<void> {
    this.applyFormat(options);
    await this.withStore(async (store, config) => {
      const manager = new MigrationManager(store, { ttls: config.ttls });
      const controller = new AbortController();
      const onSignal = () => controller.abort();
      process.once('SIGINT', onSignal);
      try {
        const result = await manager.migrate(config.cacheDir, {
          signal: controller.signal,
          dryRun: options.dryRun,
          onProgress: (p) => {
            if (p.key) this.log(`${p.phase} ${p.key}.json (${p.filesProcessed + 1}/${p.totalFiles})`);
          },
        });
        this.emit(result, () => formatMigrationResult(result));
        if (result.totals.failed > 0 || result.status === 'aborted' || result.status === 'in-progress') {
          this.exitCode = EXIT_CODES.failure;
        }
      } finally {
        process.removeListener('SIGINT', onSignal);
      }
    });
  }

  async migrateRollback(options: FormatOption): Promise<void> {
    this.applyFormat(options);
    await this.withStore(async (store, config) => {
      const result = await new MigrationManager(store, { ttls: config.ttls }).rollback(config.cacheDir);
      this.emit(result, () => formatRollback(result));
    });
  }

  async migrateStatus(options: FormatOption): Promise<void> {
    this.applyFormat(options);
    await this.withStore(async (store, config) => {
      const status = await new MigrationManager(store, { ttls: config.ttls }).getMigrationStatus(config.cacheDir);
      this.emit(status, () => formatMigrationStatus(status));
    });
  }

  async migrateVerify(options: FormatOption): Promise<void> {
    this.applyFormat(options);
    await this.withStore(async (store, config) => {
      const result = await new MigrationManager(store, { ttls: config.ttls }).validateMigration(config.cacheDir);
      this.emit(result, () => formatValidation(result));
      if (!result.success) this.exitCode = EXIT_CODES.failure;
    });
  }

  async backupDatabase(file: string): Promise<void> {
    await this.withStore(async (store) => {
      const target = path.resolve(file);
      const { totalPages } = await store.backup(target);
      this.log(`Database backed up to ${target}`, { totalPages });
    });
  }

  async restoreDatabase(file: string): Promise<void> {
    await this.withStore(async (store) => {
      await store.restore(path.resolve(file));
      this.log(`Database restored from ${path.resolve(file)}`);
    });
  }

  async checkIntegrity(options: FormatOption): Promise<void> {
    this.applyFormat(options);
    const config = await this.config();
    const report = await new IntegrityChecker(config.dbPath).run();
    this.emit(report, () => formatIntegrity(report));
    if (!report.passed) this.exitCode = EXIT_CODES.failure;
  }

  async inspectCache(options: FormatOption): Promise<void> {
    this.applyFormat(options);
    await this.withStore(async (store, config) => {
      const entries = await new FileCache(config.cacheDir).inspect();
      const stats = await new StoreCache(store, { ttls: config.ttls }).cacheStats();
      this.emit({ files: entries, store: stats }, () => formatCacheInspect(entries, stats));
    });
  }

  async clearCache(keyArg: string | undefined): Promise<void> {
    const key = toCacheKey(keyArg);
    await this.withStore(async (store, config) => {
      const files = new FileCache(config.cacheDir);
      if (key) {
        await files.clear(key);
      } else {
        await files.clearAll();
      }
      await new StoreCache(store, { ttls: config.ttls }).invalidate(key ?? 'all');
      this.log(`Cleared ${key ?? 'all'} cache`);
    });
  }

  /** Rebuild store rows where a source exists, then rewrite the legacy file from them. */
  async refreshCache(keyArg: string | undefined): Promise<void> {
    const key = toCacheKey(keyArg);
    await this.withStore(async (store, config) => {
      const files = new FileCache(config.cacheDir);
      const cache = new StoreCache(store, { ttls: config.ttls });
      for (const k of key ? [key] : CACHE_KEYS) {
        switch (k) {
          case 'projects': {
            const indexer = new ProjectIndexer(store, new GitDirectoryScanner({ maxDepth: config.scanDepth }));
            const projects = await indexer.refresh(cache, config.projectRoots, { refresh: true });
            const payload: LegacyProject[] = projects.map((p) => ({ path: p.path, remote: p.remoteUrl, branch: p.branch }));
            await files.set(k, payload, config.ttls[k]);
            break;
          }
          case 'project-dirs': {
            const dirs = await store.listProjectDirs();
            const payload: LegacyProjectDir[] = dirs.map((d) => ({ path: d.path, lastScanned: d.lastScanned, gitCount: d.gitCount }));
            await files.set(k, payload, config.ttls[k]);
            await cache.touch(k);
            break;
          }
          case 'dirs': {
            const dirs = await store.listDirUsage();
            const payload: LegacyDir[] = dirs.map((d) => ({ path: d.path, frequency: d.frequency, lastSeen: d.lastSeen }));
            await files.set(k, payload, config.ttls[k]);
            await cache.touch(k);
            break;
          }
        }
        this.log(`Refreshed ${k} cache`);
      }
    });
  }

  // ─── Program ────────────────────────────────────────────────────────────────

  private build(): void {
    const program = this.program;
    const formatOption = () => new Option('--format <format>', 'Output format: text or json').argParser(parseOutputFormat);

    program
      .name('workdex')
      .description('Index of local projects and frequently used directories')
      .version(VERSION)
      .enablePositionalOptions()
      .option('--base-dir <dir>', 'Data directory (default: $WORKDEX_HOME or $XDG_CACHE_HOME/workdex)')
      .addOption(formatOption())
      .option('--verbose', 'Debug logging on stderr')
      .exitOverride()
      .configureOutput({ writeOut: (s) => this.io.stdout(s), writeErr: (s) => this.io.stderr(s) })
      .hook('preAction', () => {
        const opts = program.opts<GlobalOptions>();
        if (opts.format) this.setFormat(opts.format);
        if (opts.verbose) setVerbose(true);
      });

    program
      .command('projects')
      .description('List git projects found under the configured roots')
      .addOption(new Option('-f, --format <format>', 'Output format').choices(LIST_FORMATS).default('default'))
      .option('-r, --refresh', 'Rescan instead of using cached results')
      .option('-s, --search <text>', 'Only projects whose name or path contains text')
      .option('--similar-to <path>', 'Projects resembling the directory at path')
      .option('-n, --limit <n>', 'Maximum number of results', parseLimit)
      .option('-v, --verbose', 'Show cache statistics')
      .option('--clear-cache', 'Clear cached projects and exit')
      .action((options: ProjectsOptions) => this.listProjects(options));

    const dirs = program
      .command('dirs')
      .description('List frequently used directories by frecency')
      .addOption(new Option('-f, --format <format>', 'Output format').choices(LIST_FORMATS).default('default'))
      .option('-n, --limit <n>', 'Maximum number of results', parseLimit)
      .action((options: DirsOptions) => this.listDirs(options));

    dirs
      .command('visit <path>')
      .description('Record a visit to a directory')
      .action((dirPath: string) => this.visitDir(dirPath));

    const migrate = program.command('migrate').description('Move the legacy JSON cache into the database');

    migrate
      .command('run')
      .description('Import legacy cache files, backing them up first')
      .option('-d, --dry-run', 'Parse and count without changing anything')
      .addOption(formatOption())
      .action((options: FormatOption & { dryRun?: boolean }) => this.migrateRun(options));

    migrate
      .command('rollback')
      .description('Restore legacy files from backup and clear imported rows')
      .addOption(formatOption())
      .action((options: FormatOption) => this.migrateRollback(options));

    migrate
      .command('status')
      .description('Show migration state, legacy files and row counts')
      .addOption(formatOption())
      .action((options: FormatOption) => this.migrateStatus(options));

    migrate
      .command('verify')
      .description('Check backups against the manifest and imported row counts')
      .addOption(formatOption())
      .action((options: FormatOption) => this.migrateVerify(options));

    migrate
      .command('backup <file>')
      .description('Write an online copy of the database to file')
      .action((file: string) => this.backupDatabase(file));

    migrate
      .command('restore <file>')
      .description('Replace the database with a backup copy')
      .action((file: string) => this.restoreDatabase(file));

    program
      .command('integrity')
      .description('Run read-only consistency checks against the database')
      .addOption(formatOption())
      .action((options: FormatOption) => this.checkIntegrity(options));

    const cache = program.command('cache').description('Inspect and manage the legacy file cache');

    cache
      .command('inspect')
      .description('Show cache files and store freshness')
      .addOption(formatOption())
      .action((options: FormatOption) => this.inspectCache(options));

    cache
      .command('clear [key]')
      .description(`Remove cached data (${CACHE_KEYS.join(', ')} or all)`)
      .action((key: string | undefined) => this.clearCache(key));

    cache
      .command('refresh [key]')
      .description(`Rebuild cached data (${CACHE_KEYS.join(', ')} or all)`)
      .action((key: string | undefined) => this.refreshCache(key));

    program.addHelpText(
      'after',
      `
Examples:
  $ workdex projects -f lines | fzf
  $ workdex projects --search api -n 5
  $ workdex dirs visit "$PWD"
  $ workdex migrate run --dry-run
  $ workdex --format json integrity

Configuration file: <base-dir>/config.json
{
  "projectRoots": ["~/src", "~/work"],
  "ttlSeconds": { "dirs": 30, "projects": 300, "project-dirs": 3600 },
  "retry": { "attempts": 5, "baseDelayMs": 50 },
  "outputFormat": "text"
}`
    );
  }

  /** Parse argv and run one command; resolves to the process exit code. */
  async run(argv: readonly string[] = process.argv): Promise<number> {
    this.exitCode = EXIT_CODES.success;
    this.formatChosen = false;
    try {
      await this.program.parseAsync([...argv]);
      return this.exitCode;
    } catch (error) {
      if (error instanceof CommanderError) {
        // --help and --version surface here too, with exit code 0
        return error.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.failure;
      }
      this.logError('Command failed', error);
      return exitCodeFor(error);
    }
  }
}

if (require.main === module) {
  new WorkdexCLI()
    .run()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_CODES.failure;
    });
}
